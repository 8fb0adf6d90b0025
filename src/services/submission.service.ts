import { FindOptionsWhere } from "typeorm";
import { AppDataSource } from "../config/db";
import { Problem } from "../entities/problem.entity";
import { Language, Submission, Verdict } from "../entities/submission.entity";
import { TestCase, TestCaseType } from "../entities/testcase.entity";
import { CaseStatus, TestCaseResult } from "../entities/testCaseResult.entity";
import { User, UserRole } from "../entities/user.entity";
import { errorMessage, HttpError } from "../utils/error.util";
import logger from "../utils/logger";
import { submissionEvents } from "../utils/submissionEvents";
import { withTransaction } from "../utils/transaction.util";
import { parseLanguage, requireString, validateCodeInput } from "../utils/validation.util";
import { judge0, SandboxExecutor } from "./judge0.service";
import { CaseResult, JudgeCase, judgeTestCases } from "./judging.service";
import { acceptanceRate, applyPracticeStatistics } from "./statistics.service";

const submissionRepo = () => AppDataSource.getRepository(Submission);
const resultRepo = () => AppDataSource.getRepository(TestCaseResult);
const problemRepo = () => AppDataSource.getRepository(Problem);
const testCaseRepo = () => AppDataSource.getRepository(TestCase);
const userRepo = () => AppDataSource.getRepository(User);

export interface SubmitSolutionBody {
    problemSlug?: unknown;
    code?: unknown;
    language?: unknown;
}

export interface TestCaseResultView {
    order: number;
    testType: TestCaseType;
    status: CaseStatus;
    executionTime: number | null;
    memoryUsed: number | null;
    input?: string;
    expectedOutput?: string;
    actualOutput?: string;
    errorMessage?: string;
}

export interface SubmissionView {
    id: string;
    userId: string;
    username?: string;
    problemId: string;
    problemSlug?: string;
    problemTitle?: string;
    language: Language;
    verdict: Verdict;
    testCasesPassed: number;
    totalTestCases: number;
    passPercentage: number;
    executionTime: number | null;
    memoryUsed: number | null;
    submittedAt: Date;
    code?: string;
    errorMessage?: string;
    compilationOutput?: string;
    testCaseResults?: TestCaseResultView[];
}

export interface RunCaseView {
    order: number;
    input: string;
    expectedOutput: string;
    actualOutput: string;
    status: CaseStatus;
    passed: boolean;
    executionTime: number;
    memoryUsed: number;
    errorMessage: string;
}

export interface RunResponse {
    success: boolean;
    verdict: Verdict;
    compilationOutput: string;
    results: RunCaseView[];
    summary: { total: number; passed: number; failed: number };
}

export interface SubmissionFilters {
    problemSlug?: string;
    verdict?: string;
    language?: string;
    username?: string;
    limit?: number;
    offset?: number;
}

export interface SubmissionStats {
    totalSubmissions: number;
    accepted: number;
    wrongAnswer: number;
    timeLimitExceeded: number;
    runtimeError: number;
    compilationError: number;
    acceptanceRate: number;
}

const toJudgeCase = (testCase: TestCase): JudgeCase => ({
    id: testCase.id,
    order: testCase.order,
    input: testCase.inputData,
    expectedOutput: testCase.expectedOutput,
});

const passPercentage = (passed: number, total: number) =>
    total === 0 ? 0 : Math.round((passed / total) * 10000) / 100;

const findActiveProblem = async (slug: string): Promise<Problem> => {
    const problem = await problemRepo().findOne({ where: { slug, isActive: true } });
    if (!problem) throw new HttpError(404, "Problem not found");
    return problem;
};

const findActiveTestCases = (problemId: string, sampleOnly: boolean) =>
    testCaseRepo().find({
        where: {
            problemId,
            isActive: true,
            ...(sampleOnly ? { testType: TestCaseType.SAMPLE } : {}),
        },
        order: { order: "ASC" },
    });

export const assertCanSubmit = async (userId: string): Promise<User> => {
    const user = await userRepo().findOne({ where: { id: userId } });
    if (!user) throw new HttpError(404, "User not found");
    if (user.isBanned) throw new HttpError(403, "Banned users cannot submit");
    return user;
};

/**
 * SUBMIT - judge against every active test case (sample + hidden), persist
 * per-case rows, then store the verdict and the statistics in one transaction.
 */
export const submitSolution = async (
    userId: string,
    body: SubmitSolutionBody,
    executor: SandboxExecutor = judge0.execute
): Promise<SubmissionView> => {
    const problemSlug = requireString(body.problemSlug, "problemSlug");
    const { code, language } = validateCodeInput(body.code, body.language);
    await assertCanSubmit(userId);
    const problem = await findActiveProblem(problemSlug);

    const testCases = await findActiveTestCases(problem.id, false);

    const submission = await submissionRepo().save(
        submissionRepo().create({
            userId,
            problemId: problem.id,
            code,
            language,
            verdict: Verdict.RUNNING,
            totalTestCases: testCases.length,
        })
    );

    logger.info(`📨 [SUBMIT] ${submission.id}: user ${userId} -> ${problem.slug} (${testCases.length} cases, ${language})`);

    const pendingRows = new Map<string, string>();
    const summary = await judgeTestCases({
        code,
        language,
        testCases: testCases.map(toJudgeCase),
        limits: { timeLimitMs: problem.timeLimit, memoryLimitMb: problem.memoryLimit },
        executor,
        hooks: {
            beforeCase: async (testCase) => {
                const row = await resultRepo().save(
                    resultRepo().create({
                        submissionId: submission.id,
                        testCaseId: testCase.id,
                        order: testCase.order,
                        status: CaseStatus.PENDING,
                    })
                );
                pendingRows.set(testCase.id, row.id);
            },
        },
    });

    const accepted = summary.verdict === Verdict.ACCEPTED;

    try {
        await withTransaction("SUBMIT", async (manager) => {
            for (const result of summary.results) {
                const rowId = pendingRows.get(result.testCase.id);
                if (!rowId) continue;
                await manager.update(TestCaseResult, { id: rowId, status: CaseStatus.PENDING }, caseRowFields(result));
            }

            await manager.update(Submission, { id: submission.id }, {
                verdict: summary.verdict,
                testCasesPassed: summary.testCasesPassed,
                totalTestCases: summary.totalTestCases,
                executionTime: summary.executionTime,
                memoryUsed: summary.memoryUsed,
                errorMessage: summary.errorMessage,
                compilationOutput: summary.compilationOutput,
            });

            await applyPracticeStatistics(manager, { userId, problem, accepted });
        });
    } catch (error) {
        await markInternalError(submission.id, error);
        return getSubmissionDetail(submission.id, { id: userId, role: UserRole.USER });
    }

    submissionEvents.emitJudged({
        submissionId: submission.id,
        userId,
        problemId: problem.id,
        verdict: summary.verdict,
        submittedAt: submission.submittedAt,
    });

    return getSubmissionDetail(submission.id, { id: userId, role: UserRole.USER });
};

/**
 * Judging finished but its results could not be stored: close the submission
 * and its pending case rows as INTERNAL_ERROR. Statistics stay untouched.
 */
const markInternalError = async (submissionId: string, cause: unknown) => {
    logger.error(`❌ [SUBMIT] ${submissionId}: judged result not stored (${errorMessage(cause)}); closing as INTERNAL_ERROR`);
    try {
        await resultRepo().update({ submissionId, status: CaseStatus.PENDING }, { status: CaseStatus.INTERNAL_ERROR });
        await submissionRepo().update({ id: submissionId }, {
            verdict: Verdict.INTERNAL_ERROR,
            errorMessage: "Judging result could not be stored",
        });
    } catch (fallbackError) {
        logger.error(`❌ [SUBMIT] ${submissionId}: could not close as INTERNAL_ERROR: ${errorMessage(fallbackError)}`);
        throw cause;
    }
};

const caseRowFields = (result: CaseResult) => ({
    status: result.status,
    actualOutput: result.actualOutput,
    executionTime: result.resolved ? result.executionTime : null,
    memoryUsed: result.resolved ? result.memoryUsed : null,
    errorMessage: result.errorMessage,
});

/**
 * RUN - execute against sample cases only; nothing is persisted.
 */
export const runSolution = async (
    body: SubmitSolutionBody,
    executor: SandboxExecutor = judge0.execute
): Promise<RunResponse> => {
    const problemSlug = requireString(body.problemSlug, "problemSlug");
    const { code, language } = validateCodeInput(body.code, body.language);
    const problem = await findActiveProblem(problemSlug);

    const samples = await findActiveTestCases(problem.id, true);
    if (samples.length === 0) throw new HttpError(400, "No sample testcases available for execution");

    logger.info(`🏃 [RUN] ${problem.slug}: ${samples.length} sample case(s) in ${language}`);

    const summary = await judgeTestCases({
        code,
        language,
        testCases: samples.map(toJudgeCase),
        limits: { timeLimitMs: problem.timeLimit, memoryLimitMb: problem.memoryLimit },
        executor,
    });

    const results = summary.results.map((r) => ({
        order: r.testCase.order,
        input: r.testCase.input,
        expectedOutput: r.testCase.expectedOutput,
        actualOutput: r.actualOutput,
        status: r.status,
        passed: r.status === CaseStatus.ACCEPTED,
        executionTime: r.executionTime,
        memoryUsed: r.memoryUsed,
        errorMessage: r.errorMessage,
    }));

    return {
        success: summary.verdict === Verdict.ACCEPTED,
        verdict: summary.verdict,
        compilationOutput: summary.compilationOutput,
        results,
        summary: {
            total: summary.totalTestCases,
            passed: summary.testCasesPassed,
            failed: summary.totalTestCases - summary.testCasesPassed,
        },
    };
};

const toSummaryView = (submission: Submission): SubmissionView => ({
    id: submission.id,
    userId: submission.userId,
    username: submission.user?.username,
    problemId: submission.problemId,
    problemSlug: submission.problem?.slug,
    problemTitle: submission.problem?.title,
    language: submission.language,
    verdict: submission.verdict,
    testCasesPassed: submission.testCasesPassed,
    totalTestCases: submission.totalTestCases,
    passPercentage: passPercentage(submission.testCasesPassed, submission.totalTestCases),
    executionTime: submission.executionTime,
    memoryUsed: submission.memoryUsed,
    submittedAt: submission.submittedAt,
});

const toResultView = (row: TestCaseResult, revealHidden: boolean): TestCaseResultView => {
    const base = {
        order: row.order,
        testType: row.testCase.testType,
        status: row.status,
        executionTime: row.executionTime,
        memoryUsed: row.memoryUsed,
    };
    if (row.testCase.testType === TestCaseType.HIDDEN && !revealHidden) return base;
    return {
        ...base,
        input: row.testCase.inputData,
        expectedOutput: row.testCase.expectedOutput,
        actualOutput: row.actualOutput,
        errorMessage: row.errorMessage,
    };
};

/**
 * Owners get code, errors and per-case results; everyone else a summary.
 * Hidden case data is only revealed to managers.
 */
export const getSubmissionDetail = async (
    submissionId: string,
    requester: { id: string; role: UserRole }
): Promise<SubmissionView> => {
    const submission = await submissionRepo().findOne({
        where: { id: submissionId },
        relations: ["user", "problem"],
    });
    if (!submission) throw new HttpError(404, "Submission not found");

    const view = toSummaryView(submission);
    const isManager = requester.role === UserRole.MANAGER || requester.role === UserRole.SUPERUSER;
    if (submission.userId !== requester.id && !isManager) return view;

    const rows = await resultRepo().find({
        where: { submissionId },
        relations: ["testCase"],
        order: { order: "ASC" },
    });

    return {
        ...view,
        code: submission.code,
        errorMessage: submission.errorMessage,
        compilationOutput: submission.compilationOutput,
        testCaseResults: rows.map((row) => toResultView(row, isManager)),
    };
};

export const listSubmissions = async (filters: SubmissionFilters): Promise<SubmissionView[]> => {
    const where: FindOptionsWhere<Submission> = {};
    if (filters.problemSlug) where.problem = { slug: filters.problemSlug };
    if (filters.verdict) where.verdict = parseVerdict(filters.verdict);
    if (filters.language) where.language = parseLanguage(filters.language);
    if (filters.username) where.user = { username: filters.username };

    const submissions = await submissionRepo().find({
        where,
        relations: ["user", "problem"],
        order: { submittedAt: "DESC" },
        take: Math.min(Math.max(filters.limit ?? 50, 1), 100),
        skip: filters.offset ?? 0,
    });
    return submissions.map(toSummaryView);
};

const parseVerdict = (value: string): Verdict => {
    const upper = value.toUpperCase();
    const verdict = Object.values(Verdict).find((v) => v === upper);
    if (!verdict) throw new HttpError(400, `Unknown verdict: ${value}`);
    return verdict;
};

export const getMySubmissions = async (userId: string): Promise<SubmissionView[]> => {
    const submissions = await submissionRepo().find({
        where: { userId },
        relations: ["problem"],
        order: { submittedAt: "DESC" },
    });
    return submissions.map(toSummaryView);
};

export const getMyStats = async (userId: string): Promise<SubmissionStats> => {
    const rows = await submissionRepo()
        .createQueryBuilder("submission")
        .select("submission.verdict", "verdict")
        .addSelect("COUNT(*)", "count")
        .where("submission.userId = :userId", { userId })
        .groupBy("submission.verdict")
        .getRawMany<{ verdict: Verdict; count: string | number }>();

    const count = (verdict: Verdict) => Number(rows.find((r) => r.verdict === verdict)?.count ?? 0);
    const totalSubmissions = rows.reduce((sum, r) => sum + Number(r.count), 0);
    const accepted = count(Verdict.ACCEPTED);

    return {
        totalSubmissions,
        accepted,
        wrongAnswer: count(Verdict.WRONG_ANSWER),
        timeLimitExceeded: count(Verdict.TIME_LIMIT_EXCEEDED),
        runtimeError: count(Verdict.RUNTIME_ERROR),
        compilationError: count(Verdict.COMPILATION_ERROR),
        acceptanceRate: acceptanceRate(accepted, totalSubmissions),
    };
};
