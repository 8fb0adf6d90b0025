import { Verdict } from "../entities/submission.entity";
import { Judge0Outcome } from "./judge0.service";

export interface ResolvedOutcome {
    verdict: Verdict;
    statusId: number | null;
    executionTimeMs: number;
    memoryUsedKb: number;
    stdout: string;
    stderr: string;
    compileOutput: string;
    message: string;
}

/**
 * Judge0 status id -> verdict. Signal, NZEC and exec-format failures all collapse
 * into RUNTIME_ERROR; ids outside the table resolve to INTERNAL_ERROR.
 */
export const STATUS_VERDICTS: Readonly<Record<number, Verdict>> = {
    1: Verdict.PENDING,              // In Queue
    2: Verdict.RUNNING,              // Processing
    3: Verdict.ACCEPTED,
    4: Verdict.WRONG_ANSWER,
    5: Verdict.TIME_LIMIT_EXCEEDED,
    6: Verdict.COMPILATION_ERROR,
    7: Verdict.RUNTIME_ERROR,        // SIGSEGV
    8: Verdict.RUNTIME_ERROR,        // SIGXFSZ
    9: Verdict.RUNTIME_ERROR,        // SIGFPE
    10: Verdict.RUNTIME_ERROR,       // SIGABRT
    11: Verdict.RUNTIME_ERROR,       // NZEC
    12: Verdict.RUNTIME_ERROR,       // Other
    13: Verdict.INTERNAL_ERROR,
    14: Verdict.RUNTIME_ERROR,       // Exec Format Error
};

/**
 * Lenient numeric coercion: numbers and numeric strings pass, everything else is 0.
 */
export const toNumber = (value: unknown): number => {
    if (typeof value === "number") return Number.isFinite(value) ? value : 0;
    if (typeof value === "string" && value.trim() !== "") {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : 0;
    }
    return 0;
};

const toText = (value: unknown): string => (typeof value === "string" ? value : "");

export const verdictForStatus = (statusId: number | null): Verdict =>
    (statusId !== null && STATUS_VERDICTS[statusId]) || Verdict.INTERNAL_ERROR;

export const resolveOutcome = (outcome: Judge0Outcome): ResolvedOutcome => {
    const rawId = outcome.status?.id;
    const statusId = typeof rawId === "number" && Number.isInteger(rawId) ? rawId : null;

    return {
        verdict: verdictForStatus(statusId),
        statusId,
        executionTimeMs: Math.round(toNumber(outcome.time) * 1000),
        memoryUsedKb: Math.round(toNumber(outcome.memory)),
        stdout: toText(outcome.stdout),
        stderr: toText(outcome.stderr),
        compileOutput: toText(outcome.compile_output),
        message: toText(outcome.message),
    };
};
