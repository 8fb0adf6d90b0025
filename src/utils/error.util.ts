import { Response } from "express";
import logger from "./logger";

/**
 * Error carrying the HTTP status a service wants surfaced to the client.
 */
export class HttpError extends Error {
    constructor(public readonly status: number, message: string) {
        super(message);
        this.name = "HttpError";
    }
}

export const errorMessage = (error: unknown): string =>
    error instanceof Error ? error.message : String(error);

export const handleError = (res: Response, error: unknown) => {
    if (error instanceof HttpError) {
        res.status(error.status).json({ message: error.message });
        return;
    }
    logger.error(`❌ Unhandled error: ${errorMessage(error)}`);
    res.status(500).json({ message: "Internal Server Error" });
};
