import { EntityManager, Not } from "typeorm";
import { AppDataSource } from "../config/db";
import { AchievementType } from "../entities/achievement.entity";
import { Contest, ScoringType } from "../entities/contest.entity";
import { ContestParticipant } from "../entities/contestParticipant.entity";
import { ContestProblem } from "../entities/contestProblem.entity";
import { ContestProblemSolveStatus } from "../entities/contestProblemSolveStatus.entity";
import { ContestRegistration } from "../entities/contestRegistration.entity";
import { ContestSubmission } from "../entities/contestSubmission.entity";
import { ContestTestCase } from "../entities/contestTestCase.entity";
import { SolveStatus } from "../entities/problemSolveStatus.entity";
import { Language, Verdict } from "../entities/submission.entity";
import { UserRole } from "../entities/user.entity";
import { ContestTimeInfo, getContestTimeInfo, isContestRunning, minutesSinceStart } from "../utils/contestTimer.util";
import { errorMessage, HttpError } from "../utils/error.util";
import logger from "../utils/logger";
import { withTransaction } from "../utils/transaction.util";
import { requireString, validateCodeInput } from "../utils/validation.util";
import { awardAchievement } from "./activity.service";
import { judge0, SandboxExecutor } from "./judge0.service";
import { JudgeSummary, judgeTestCases } from "./judging.service";
import { ProblemCell, recomputeRanks } from "./ranking.service";
import { assertCanSubmit } from "./submission.service";

const contestRepo = () => AppDataSource.getRepository(Contest);
const registrationRepo = () => AppDataSource.getRepository(ContestRegistration);
const contestProblemRepo = () => AppDataSource.getRepository(ContestProblem);
const testCaseRepo = () => AppDataSource.getRepository(ContestTestCase);
const submissionRepo = () => AppDataSource.getRepository(ContestSubmission);
const participantRepo = () => AppDataSource.getRepository(ContestParticipant);
const solveStatusRepo = () => AppDataSource.getRepository(ContestProblemSolveStatus);

/** Wrong submissions before the first acceptance each cost this many minutes under ICPC. */
export const ICPC_PENALTY_MINUTES = 20;

export interface ContestSubmitBody {
    problemId?: unknown;
    code?: unknown;
    language?: unknown;
}

export interface ContestSubmissionView {
    id: string;
    contestId: string;
    userId: string;
    problemId: string;
    problemTitle?: string;
    language: Language;
    verdict: Verdict;
    testCasesPassed: number;
    totalTestCases: number;
    executionTime: number | null;
    memoryUsed: number | null;
    submittedAt: Date;
    code?: string;
    errorMessage?: string;
    compilationOutput?: string;
}

export interface ContestDashboard {
    contestId: string;
    title: string;
    scoringType: ScoringType;
    timeInfo: ContestTimeInfo;
    participant: {
        id: string;
        rank: number | null;
        totalScore: number;
        problemsSolved: number;
        totalTime: number;
        penaltyTime: number;
    } | null;
    problems: Array<ProblemCell & { title: string; points: number }>;
    recentSubmissions: ContestSubmissionView[];
}

const toView = (submission: ContestSubmission, withCode: boolean): ContestSubmissionView => {
    const view: ContestSubmissionView = {
        id: submission.id,
        contestId: submission.contestId,
        userId: submission.userId,
        problemId: submission.problemId,
        problemTitle: submission.problem?.title,
        language: submission.language,
        verdict: submission.verdict,
        testCasesPassed: submission.testCasesPassed,
        totalTestCases: submission.totalTestCases,
        executionTime: submission.executionTime,
        memoryUsed: submission.memoryUsed,
        submittedAt: submission.submittedAt,
    };
    if (!withCode) return view;
    return {
        ...view,
        code: submission.code,
        errorMessage: submission.errorMessage,
        compilationOutput: submission.compilationOutput,
    };
};

const findActiveContest = async (slug: string): Promise<Contest> => {
    const contest = await contestRepo().findOne({ where: { slug, isActive: true } });
    if (!contest) throw new HttpError(404, "Contest not found");
    return contest;
};

const ensureParticipant = async (contest: Contest, registration: ContestRegistration): Promise<ContestParticipant> => {
    const existing = await participantRepo().findOne({ where: { contestId: contest.id, userId: registration.userId } });
    if (existing) return existing;

    await participantRepo()
        .createQueryBuilder()
        .insert()
        .into(ContestParticipant)
        .values({ contestId: contest.id, userId: registration.userId, registeredAt: registration.registeredAt })
        .orIgnore()
        .execute();

    try {
        await awardAchievement(registration.userId, AchievementType.FIRST_CONTEST);
    } catch (error) {
        logger.warn(`⚠️ [CONTEST] Could not award ${AchievementType.FIRST_CONTEST}: ${errorMessage(error)}`);
    }

    return participantRepo().findOneOrFail({ where: { contestId: contest.id, userId: registration.userId } });
};

const ensureProblemStatus = async (participantId: string, problemId: string) => {
    await solveStatusRepo()
        .createQueryBuilder()
        .insert()
        .into(ContestProblemSolveStatus)
        .values({ participantId, problemId, status: SolveStatus.ATTEMPTED })
        .orIgnore()
        .execute();
};

interface ScoringContext {
    contest: Contest;
    problem: ContestProblem;
    participant: ContestParticipant;
    submissionId: string;
    summary: JudgeSummary;
    now: Date;
}

/**
 * Stores the verdict and moves every contest counter for one judged submission.
 * Runs inside a single transaction; the first-solve effects hang off a
 * compare-and-swap on the problem status so they apply at most once.
 */
const applyContestScoring = async (
    manager: EntityManager,
    { contest, problem, participant, submissionId, summary, now }: ScoringContext
) => {
    const accepted = summary.verdict === Verdict.ACCEPTED;
    const statusKey = { participantId: participant.id, problemId: problem.id };

    await manager.update(ContestSubmission, { id: submissionId }, {
        verdict: summary.verdict,
        testCasesPassed: summary.testCasesPassed,
        totalTestCases: summary.totalTestCases,
        executionTime: summary.executionTime,
        memoryUsed: summary.memoryUsed,
        errorMessage: summary.errorMessage,
        compilationOutput: summary.compilationOutput,
    });

    await manager.increment(ContestProblem, { id: problem.id }, "totalSubmissions", 1);

    if (!accepted) {
        // only counts while unsolved; later misses cost nothing
        await manager.increment(
            ContestProblemSolveStatus,
            { ...statusKey, status: SolveStatus.ATTEMPTED },
            "wrongAttempts",
            1
        );
    } else {
        await manager.increment(ContestProblem, { id: problem.id }, "acceptedSubmissions", 1);

        const solveTime = minutesSinceStart(contest, now);
        const swap = await manager.update(
            ContestProblemSolveStatus,
            { ...statusKey, status: Not(SolveStatus.SOLVED) },
            { status: SolveStatus.SOLVED, firstSolvedAt: now, solveTime, score: problem.points }
        );

        if (swap.affected) {
            await manager.increment(ContestProblem, { id: problem.id }, "totalSolved", 1);
            await manager.increment(ContestParticipant, { id: participant.id }, "problemsSolved", 1);
            await manager.increment(ContestParticipant, { id: participant.id }, "totalScore", problem.points);

            if (contest.scoringType === ScoringType.ICPC) {
                const status = await manager.findOneOrFail(ContestProblemSolveStatus, { where: statusKey });
                const penalty = solveTime + ICPC_PENALTY_MINUTES * status.wrongAttempts;
                await manager.increment(ContestParticipant, { id: participant.id }, "penaltyTime", penalty);
            }

            logger.info(`🎉 [CONTEST] ${participant.userId} solved "${problem.title}" at minute ${solveTime}`);
        }
    }

    // elapsed minutes at the latest submission, whatever its verdict
    await manager.update(ContestParticipant, { id: participant.id }, {
        totalTime: minutesSinceStart(contest, now),
        lastSubmissionTime: now,
    });
};

/**
 * Scoring could not be stored: close the submission as INTERNAL_ERROR and leave
 * the standings as they were.
 */
const markInternalError = async (submissionId: string, cause: unknown) => {
    logger.error(`❌ [CONTEST] ${submissionId}: judged result not stored (${errorMessage(cause)}); closing as INTERNAL_ERROR`);
    try {
        await submissionRepo().update({ id: submissionId }, {
            verdict: Verdict.INTERNAL_ERROR,
            errorMessage: "Judging result could not be stored",
        });
    } catch (fallbackError) {
        logger.error(`❌ [CONTEST] ${submissionId}: could not close as INTERNAL_ERROR: ${errorMessage(fallbackError)}`);
        throw cause;
    }
};

/**
 * CONTEST SUBMIT - every precondition is checked before the first write.
 */
export const submitContestSolution = async (
    slug: string,
    userId: string,
    body: ContestSubmitBody,
    now: Date = new Date(),
    executor: SandboxExecutor = judge0.execute
): Promise<ContestSubmissionView> => {
    const contest = await findActiveContest(slug);
    if (!isContestRunning(contest, now)) throw new HttpError(400, "Contest is not currently active");

    const problemId = requireString(body.problemId, "problemId");
    const { code, language } = validateCodeInput(body.code, body.language);
    await assertCanSubmit(userId);

    const registration = await registrationRepo().findOne({ where: { contestId: contest.id, userId } });
    if (!registration) throw new HttpError(403, "You are not registered for this contest");

    const problem = await contestProblemRepo().findOne({
        where: { id: problemId, contestId: contest.id, isActive: true },
    });
    if (!problem) throw new HttpError(404, "Problem not found in this contest");

    const testCases = await testCaseRepo().find({
        where: { problemId: problem.id, isActive: true },
        order: { order: "ASC" },
    });

    const submission = await submissionRepo().save(
        submissionRepo().create({
            contestId: contest.id,
            userId,
            problemId: problem.id,
            code,
            language,
            verdict: Verdict.RUNNING,
            totalTestCases: testCases.length,
        })
    );

    const participant = await ensureParticipant(contest, registration);
    await ensureProblemStatus(participant.id, problem.id);
    await solveStatusRepo().increment({ participantId: participant.id, problemId: problem.id }, "attempts", 1);

    logger.info(`📨 [CONTEST] ${submission.id}: user ${userId} -> ${contest.slug}/"${problem.title}" (${language})`);

    const summary = await judgeTestCases({
        code,
        language,
        testCases: testCases.map((t) => ({
            id: t.id,
            order: t.order,
            input: t.inputData,
            expectedOutput: t.expectedOutput,
        })),
        limits: { timeLimitMs: problem.timeLimit, memoryLimitMb: problem.memoryLimit },
        executor,
    });

    let scored = true;
    try {
        await withTransaction("CONTEST_SUBMIT", (manager) =>
            applyContestScoring(manager, { contest, problem, participant, submissionId: submission.id, summary, now })
        );
    } catch (error) {
        scored = false;
        await markInternalError(submission.id, error);
    }

    if (scored) await recomputeRanks(contest.id);

    const stored = await submissionRepo().findOneOrFail({ where: { id: submission.id }, relations: ["problem"] });
    return toView(stored, true);
};

export const getMyDashboard = async (slug: string, userId: string, now: Date = new Date()): Promise<ContestDashboard> => {
    const contest = await findActiveContest(slug);

    const registration = await registrationRepo().findOne({ where: { contestId: contest.id, userId } });
    if (!registration) throw new HttpError(403, "You are not registered for this contest");

    const participant = await participantRepo().findOne({
        where: { contestId: contest.id, userId },
        relations: ["problemStatuses"],
    });
    const problems = await contestProblemRepo().find({
        where: { contestId: contest.id, isActive: true },
        order: { order: "ASC" },
    });
    const recent = await submissionRepo().find({
        where: { contestId: contest.id, userId },
        relations: ["problem"],
        order: { submittedAt: "DESC" },
        take: 10,
    });

    return {
        contestId: contest.id,
        title: contest.title,
        scoringType: contest.scoringType,
        timeInfo: getContestTimeInfo(contest, now),
        participant: participant && {
            id: participant.id,
            rank: participant.rank,
            totalScore: participant.totalScore,
            problemsSolved: participant.problemsSolved,
            totalTime: participant.totalTime,
            penaltyTime: participant.penaltyTime,
        },
        problems: problems.map((problem) => {
            const status = participant?.problemStatuses.find((s) => s.problemId === problem.id);
            return {
                problemId: problem.id,
                order: problem.order,
                title: problem.title,
                points: problem.points,
                status: status?.status ?? "NOT_ATTEMPTED",
                score: status?.score ?? 0,
                attempts: status?.attempts ?? 0,
                wrongAttempts: status?.wrongAttempts ?? 0,
                solveTime: status?.solveTime ?? null,
            };
        }),
        recentSubmissions: recent.map((s) => toView(s, false)),
    };
};

export const getMyContestSubmissions = async (slug: string, userId: string): Promise<ContestSubmissionView[]> => {
    const contest = await findActiveContest(slug);
    const submissions = await submissionRepo().find({
        where: { contestId: contest.id, userId },
        relations: ["problem"],
        order: { submittedAt: "DESC" },
    });
    return submissions.map((s) => toView(s, false));
};

/**
 * Full submission, code included; only its author and the contest's staff may read it.
 */
export const getContestSubmissionDetail = async (
    submissionId: string,
    requester: { id: string; role: UserRole }
): Promise<ContestSubmissionView> => {
    const submission = await submissionRepo().findOne({
        where: { id: submissionId },
        relations: ["problem", "contest"],
    });
    if (!submission) throw new HttpError(404, "Submission not found");

    const allowed =
        submission.userId === requester.id ||
        submission.contest.managerId === requester.id ||
        requester.role === UserRole.SUPERUSER;
    if (!allowed) throw new HttpError(403, "You cannot view this submission");

    return toView(submission, true);
};
