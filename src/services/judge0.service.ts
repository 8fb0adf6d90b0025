import axios, { AxiosInstance } from "axios";
import { Judge0Config, judge0Config } from "../config/judge0";
import { Language } from "../entities/submission.entity";
import { errorMessage } from "../utils/error.util";
import logger from "../utils/logger";

// Language ID mapping for Judge0 CE
export const LANGUAGE_IDS: Record<Language, number> = {
    [Language.PYTHON]: 71,      // Python 3.8
    [Language.JAVA]: 62,        // Java (OpenJDK 13.0.1)
    [Language.CPP]: 54,         // C++ (GCC 9.2.0)
    [Language.C]: 50,           // C (GCC 9.2.0)
    [Language.JAVASCRIPT]: 63,  // JavaScript (Node.js 12.14.0)
};

/** One execution unit sent to the sandbox. */
export interface ExecutionUnit {
    sourceCode: string;
    language: Language;
    stdin: string;
    expectedOutput: string;
    cpuTimeLimit: number;   // seconds
    memoryLimit: number;    // KB
}

/** Fields of a Judge0 submission the judge reads. Any of them may be missing or mistyped upstream. */
export interface Judge0Outcome {
    token?: string;
    status?: { id?: unknown; description?: unknown } | null;
    time?: unknown;
    memory?: unknown;
    stdout?: unknown;
    stderr?: unknown;
    compile_output?: unknown;
    message?: unknown;
}

export type SandboxResult =
    | { ok: true; outcome: Judge0Outcome }
    | { ok: false; reason: string };

export type SandboxExecutor = (unit: ExecutionUnit) => Promise<SandboxResult>;

const PENDING_STATUS_IDS = new Set([1, 2]); // In Queue, Processing

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === "object" && value !== null;

const toOutcome = (data: unknown): Judge0Outcome | null => {
    if (!isRecord(data)) return null;
    const status = isRecord(data.status) ? { id: data.status.id, description: data.status.description } : null;
    return {
        token: typeof data.token === "string" ? data.token : undefined,
        status,
        time: data.time,
        memory: data.memory,
        stdout: data.stdout,
        stderr: data.stderr,
        compile_output: data.compile_output,
        message: data.message,
    };
};

/**
 * Thin adapter over the Judge0 REST API: submit one unit, poll until it is terminal.
 * Every problem on the way comes back as `{ ok: false }`; nothing is thrown.
 */
export class Judge0Service {
    private readonly http: AxiosInstance;

    constructor(private readonly config: Judge0Config = judge0Config) {
        this.http = axios.create({
            baseURL: config.baseUrl,
            timeout: config.requestTimeoutMs,
            headers: {
                "Content-Type": "application/json",
                ...(config.apiKey ? { "X-Auth-Token": config.apiKey } : {}),
            },
        });
    }

    execute: SandboxExecutor = async (unit) => {
        const token = await this.submit(unit);
        if (!token) {
            return { ok: false, reason: "sandbox rejected the submission" };
        }
        return this.poll(token);
    };

    private async submit(unit: ExecutionUnit): Promise<string | null> {
        try {
            const response = await this.http.post("/submissions?base64_encoded=false&wait=false", {
                source_code: unit.sourceCode,
                language_id: LANGUAGE_IDS[unit.language],
                stdin: unit.stdin,
                expected_output: unit.expectedOutput,
                cpu_time_limit: unit.cpuTimeLimit,
                memory_limit: unit.memoryLimit,
            });
            const outcome = toOutcome(response.data);
            if (!outcome?.token) {
                logger.warn(`⚠️ [JUDGE0] Submission answered ${response.status} without a token`);
                return null;
            }
            return outcome.token;
        } catch (error) {
            logger.error(`❌ [JUDGE0] Submit failed: ${errorMessage(error)}`);
            return null;
        }
    }

    private async poll(token: string): Promise<SandboxResult> {
        for (let attempt = 1; attempt <= this.config.maxPolls; attempt++) {
            await sleep(this.config.pollIntervalMs);

            try {
                const response = await this.http.get(`/submissions/${token}?base64_encoded=false`);
                const outcome = toOutcome(response.data);
                const statusId = outcome?.status?.id;

                if (outcome && typeof statusId === "number" && !PENDING_STATUS_IDS.has(statusId)) {
                    return { ok: true, outcome };
                }
                logger.debug(`⏳ [JUDGE0] ${token} still running (attempt ${attempt})`);
            } catch (error) {
                logger.warn(`⚠️ [JUDGE0] Poll ${attempt} for ${token} failed: ${errorMessage(error)}`);
            }
        }

        logger.error(`❌ [JUDGE0] ${token} not finished after ${this.config.maxPolls} polls`);
        return { ok: false, reason: "execution timeout/unavailable" };
    }
}

export const judge0 = new Judge0Service();
