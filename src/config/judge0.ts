import dotenv from "dotenv";

dotenv.config();

export interface Judge0Config {
    baseUrl: string;
    apiKey?: string;
    pollIntervalMs: number;
    maxPolls: number;
    requestTimeoutMs: number;
}

export const judge0Config: Judge0Config = {
    baseUrl: process.env.JUDGE0_API_URL || "https://ce.judge0.com",
    apiKey: process.env.JUDGE0_API_KEY || undefined,
    pollIntervalMs: parseInt(process.env.JUDGE0_POLL_INTERVAL_MS || "1000", 10),
    maxPolls: parseInt(process.env.JUDGE0_MAX_POLLS || "10", 10),
    requestTimeoutMs: parseInt(process.env.JUDGE0_REQUEST_TIMEOUT_MS || "10000", 10),
};
