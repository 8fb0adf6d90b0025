import { Language, Verdict } from "../entities/submission.entity";
import { CaseStatus } from "../entities/testCaseResult.entity";
import logger from "../utils/logger";
import { SandboxExecutor } from "./judge0.service";
import { ResolvedOutcome, resolveOutcome } from "./verdict.service";

/** A test case as the engine sees it, whatever table it came from. */
export interface JudgeCase {
    id: string;
    order: number;
    input: string;
    expectedOutput: string;
}

export interface JudgeLimits {
    timeLimitMs: number;
    memoryLimitMb: number;
}

export interface CaseResult {
    testCase: JudgeCase;
    status: CaseStatus;
    actualOutput: string;
    executionTime: number;
    memoryUsed: number;
    errorMessage: string;
    /** false when the sandbox never produced an outcome for this case */
    resolved: boolean;
}

export type JudgeState = "RUNNING" | "COMPLETED" | "ABORTED";

export interface JudgeSummary {
    state: Exclude<JudgeState, "RUNNING">;
    verdict: Verdict;
    testCasesPassed: number;
    totalTestCases: number;
    executionTime: number | null;
    memoryUsed: number | null;
    errorMessage: string;
    compilationOutput: string;
    results: CaseResult[];
}

export interface JudgeHooks {
    /** Runs before a case is sent to the sandbox. */
    beforeCase?: (testCase: JudgeCase) => Promise<void>;
}

export interface JudgeRequest {
    code: string;
    language: Language;
    testCases: JudgeCase[];
    limits: JudgeLimits;
    executor: SandboxExecutor;
    hooks?: JudgeHooks;
}

const CASE_STATUS_BY_VERDICT: Record<Verdict, CaseStatus> = {
    [Verdict.ACCEPTED]: CaseStatus.ACCEPTED,
    [Verdict.WRONG_ANSWER]: CaseStatus.WRONG_ANSWER,
    [Verdict.TIME_LIMIT_EXCEEDED]: CaseStatus.TIME_LIMIT_EXCEEDED,
    [Verdict.MEMORY_LIMIT_EXCEEDED]: CaseStatus.MEMORY_LIMIT_EXCEEDED,
    [Verdict.RUNTIME_ERROR]: CaseStatus.RUNTIME_ERROR,
    [Verdict.COMPILATION_ERROR]: CaseStatus.COMPILATION_ERROR,
    [Verdict.INTERNAL_ERROR]: CaseStatus.INTERNAL_ERROR,
    // a terminal poll should never hand these back
    [Verdict.PENDING]: CaseStatus.INTERNAL_ERROR,
    [Verdict.RUNNING]: CaseStatus.INTERNAL_ERROR,
};

const VERDICT_BY_CASE_STATUS: Record<Exclude<CaseStatus, CaseStatus.PENDING | CaseStatus.ACCEPTED>, Verdict> = {
    [CaseStatus.WRONG_ANSWER]: Verdict.WRONG_ANSWER,
    [CaseStatus.TIME_LIMIT_EXCEEDED]: Verdict.TIME_LIMIT_EXCEEDED,
    [CaseStatus.MEMORY_LIMIT_EXCEEDED]: Verdict.MEMORY_LIMIT_EXCEEDED,
    [CaseStatus.RUNTIME_ERROR]: Verdict.RUNTIME_ERROR,
    [CaseStatus.COMPILATION_ERROR]: Verdict.COMPILATION_ERROR,
    [CaseStatus.INTERNAL_ERROR]: Verdict.INTERNAL_ERROR,
};

export const sortByOrder = <T extends { order: number }>(cases: T[]): T[] =>
    cases
        .map((testCase, index) => ({ testCase, index }))
        .sort((a, b) => a.testCase.order - b.testCase.order || a.index - b.index)
        .map(({ testCase }) => testCase);

const failedCase = (testCase: JudgeCase, reason: string): CaseResult => ({
    testCase,
    status: CaseStatus.RUNTIME_ERROR,
    actualOutput: "",
    executionTime: 0,
    memoryUsed: 0,
    errorMessage: `Failed to execute code (${reason})`,
    resolved: false,
});

const resolvedCase = (testCase: JudgeCase, parsed: ResolvedOutcome): CaseResult => {
    const status = CASE_STATUS_BY_VERDICT[parsed.verdict];
    return {
        testCase,
        status,
        actualOutput: parsed.stdout.trim(),
        executionTime: parsed.executionTimeMs,
        memoryUsed: parsed.memoryUsedKb,
        errorMessage: status === CaseStatus.COMPILATION_ERROR
            ? "Compilation error"
            : parsed.stderr || parsed.message,
        resolved: true,
    };
};

/**
 * Final verdict from per-case results in execution order. The first case that
 * did not pass decides; nothing resolved by the sandbox means INTERNAL_ERROR.
 */
export const decideVerdict = (results: CaseResult[], state: JudgeState): Verdict => {
    if (state === "ABORTED") return Verdict.COMPILATION_ERROR;
    if (results.length === 0 || !results.some((r) => r.resolved)) return Verdict.INTERNAL_ERROR;

    // results may arrive in completion order; precedence follows case order
    const firstFailure = sortByOrder(results.map((r) => ({ ...r, order: r.testCase.order })))
        .find((r) => r.status !== CaseStatus.ACCEPTED);
    if (!firstFailure) return Verdict.ACCEPTED;

    const status = firstFailure.status;
    if (status === CaseStatus.ACCEPTED || status === CaseStatus.PENDING) return Verdict.INTERNAL_ERROR;
    return VERDICT_BY_CASE_STATUS[status];
};

/**
 * Drives one submission through its test cases, sequentially and in `order`.
 * A compilation error is the only transition into ABORTED; every other outcome,
 * including a sandbox transport failure, lets the remaining cases run.
 */
export const judgeTestCases = async (request: JudgeRequest): Promise<JudgeSummary> => {
    const { code, language, limits, executor, hooks } = request;
    const testCases = sortByOrder(request.testCases);

    let state: JudgeState = "RUNNING";
    const results: CaseResult[] = [];
    let passed = 0;
    let maxTime = 0;
    let maxMemory = 0;
    let compilationOutput = "";

    for (const testCase of testCases) {
        if (state !== "RUNNING") break;

        await hooks?.beforeCase?.(testCase);

        const execution = await executor({
            sourceCode: code,
            language,
            stdin: testCase.input,
            expectedOutput: testCase.expectedOutput,
            cpuTimeLimit: limits.timeLimitMs / 1000,
            memoryLimit: limits.memoryLimitMb * 1024,
        });

        if (!execution.ok) {
            logger.warn(`   ⚠️ [JUDGE] Case #${testCase.order} not executed: ${execution.reason}`);
            results.push(failedCase(testCase, execution.reason));
            continue;
        }

        const parsed = resolveOutcome(execution.outcome);
        const result = resolvedCase(testCase, parsed);
        results.push(result);

        maxTime = Math.max(maxTime, result.executionTime);
        maxMemory = Math.max(maxMemory, result.memoryUsed);

        if (result.status === CaseStatus.COMPILATION_ERROR) {
            compilationOutput = parsed.compileOutput;
            state = "ABORTED";
            logger.info(`   🛑 [JUDGE] Compilation error on case #${testCase.order}; skipping the rest`);
            break;
        }

        if (result.status === CaseStatus.ACCEPTED) passed++;
    }

    if (state === "RUNNING") state = "COMPLETED";

    const verdict = decideVerdict(results, state);
    const firstFailure = results.find((r) => r.status !== CaseStatus.ACCEPTED);

    logger.info(`📊 [JUDGE] ${verdict} (${passed}/${testCases.length} passed)`);

    return {
        state,
        verdict,
        testCasesPassed: passed,
        totalTestCases: testCases.length,
        executionTime: maxTime > 0 ? maxTime : null,
        memoryUsed: maxMemory > 0 ? maxMemory : null,
        errorMessage: verdict === Verdict.ACCEPTED ? "" : firstFailure?.errorMessage ?? "",
        compilationOutput,
        results,
    };
};
