import { FindOptionsWhere, MoreThan, MoreThanOrEqual } from "typeorm";
import { AppDataSource } from "../config/db";
import { Achievement, AchievementType } from "../entities/achievement.entity";
import { Difficulty, Problem } from "../entities/problem.entity";
import { Submission, Verdict } from "../entities/submission.entity";
import { User } from "../entities/user.entity";
import { ProblemSolveStatus, SolveStatus } from "../entities/problemSolveStatus.entity";
import { UserAchievement } from "../entities/userAchievement.entity";
import { UserActivity } from "../entities/userActivity.entity";
import { HttpError, errorMessage } from "../utils/error.util";
import logger from "../utils/logger";
import { SubmissionJudgedEvent, submissionEvents } from "../utils/submissionEvents";

const activityRepo = () => AppDataSource.getRepository(UserActivity);
const submissionRepo = () => AppDataSource.getRepository(Submission);
const achievementRepo = () => AppDataSource.getRepository(Achievement);
const userAchievementRepo = () => AppDataSource.getRepository(UserAchievement);
const userRepo = () => AppDataSource.getRepository(User);
const problemRepo = () => AppDataSource.getRepository(Problem);
const solveStatusRepo = () => AppDataSource.getRepository(ProblemSolveStatus);

const DAY_MS = 24 * 60 * 60 * 1000;

const SOLVE_MILESTONES: Array<[number, AchievementType]> = [
    [1, AchievementType.FIRST_SOLVE],
    [10, AchievementType.SOLVE_10],
    [50, AchievementType.SOLVE_50],
    [100, AchievementType.SOLVE_100],
];

const STREAK_MILESTONES: Array<[number, AchievementType]> = [
    [7, AchievementType.SOLVE_STREAK_7],
    [30, AchievementType.SOLVE_STREAK_30],
];

/** UTC calendar day as YYYY-MM-DD. */
export const utcDate = (moment: Date): string => moment.toISOString().slice(0, 10);

export const shiftDays = (date: string, days: number): string =>
    utcDate(new Date(Date.parse(`${date}T00:00:00.000Z`) + days * DAY_MS));

const isEarlier = (a: Pick<Submission, "id" | "submittedAt">, b: { id: string; submittedAt: Date }) =>
    a.submittedAt.getTime() < b.submittedAt.getTime() ||
    (a.submittedAt.getTime() === b.submittedAt.getTime() && a.id < b.id);

/**
 * Was another accepted submission of this problem made earlier on the same UTC day?
 */
const solvedEarlierToday = async (event: SubmissionJudgedEvent, date: string): Promise<boolean> => {
    const accepted = await submissionRepo().find({
        where: { userId: event.userId, problemId: event.problemId, verdict: Verdict.ACCEPTED },
        select: { id: true, submittedAt: true },
    });
    const current = { id: event.submissionId, submittedAt: event.submittedAt };
    return accepted.some((s) => s.id !== event.submissionId && utcDate(s.submittedAt) === date && isEarlier(s, current));
};

/**
 * Daily activity row for a judged practice submission, followed by the achievement check.
 */
export const recordSubmissionActivity = async (event: SubmissionJudgedEvent, now: Date = new Date()) => {
    const date = utcDate(event.submittedAt);

    await activityRepo()
        .createQueryBuilder()
        .insert()
        .into(UserActivity)
        .values({ userId: event.userId, date, submissionsCount: 0, problemsSolved: 0 })
        .orIgnore()
        .execute();

    await activityRepo().increment({ userId: event.userId, date }, "submissionsCount", 1);

    if (event.verdict === Verdict.ACCEPTED && !(await solvedEarlierToday(event, date))) {
        await activityRepo().increment({ userId: event.userId, date }, "problemsSolved", 1);
    }

    await checkAndAwardAchievements(event.userId, utcDate(now));
};

/**
 * Consecutive days with at least one solve, counting back from `today`.
 * A day without solves (today included) ends the streak.
 */
export const calculateSolveStreak = async (userId: string, today: string): Promise<number> => {
    const active = await activityRepo().find({
        where: { userId, problemsSolved: MoreThanOrEqual(1) },
        select: { date: true },
    });
    const days = new Set(active.map((a) => a.date));

    let streak = 0;
    let cursor = today;
    while (days.has(cursor)) {
        streak++;
        cursor = shiftDays(cursor, -1);
    }
    return streak;
};

/**
 * Grants an achievement once. A catalogue entry that was never seeded is skipped.
 */
export const awardAchievement = async (userId: string, type: AchievementType): Promise<boolean> => {
    const achievement = await achievementRepo().findOne({ where: { achievementType: type } });
    if (!achievement) {
        logger.warn(`⚠️ [ACHIEVEMENT] ${type} is not in the catalogue; skipping`);
        return false;
    }

    const earned = await userAchievementRepo().count({ where: { userId, achievementId: achievement.id } });
    if (earned > 0) return false;

    await userAchievementRepo()
        .createQueryBuilder()
        .insert()
        .into(UserAchievement)
        .values({ userId, achievementId: achievement.id })
        .orIgnore()
        .execute();

    logger.info(`🏅 [ACHIEVEMENT] ${userId} earned ${type}`);
    return true;
};

const countActiveProblems = (difficulty: Difficulty) =>
    problemRepo().count({ where: { difficulty, isActive: true } });

export const checkAndAwardAchievements = async (userId: string, today: string): Promise<void> => {
    const user = await userRepo().findOne({ where: { id: userId } });
    if (!user) return;

    for (const [threshold, type] of SOLVE_MILESTONES) {
        if (user.totalSolved >= threshold) await awardAchievement(userId, type);
    }

    const streak = await calculateSolveStreak(userId, today);
    for (const [threshold, type] of STREAK_MILESTONES) {
        if (streak >= threshold) await awardAchievement(userId, type);
    }

    const easyTotal = await countActiveProblems(Difficulty.EASY);
    if (easyTotal > 0 && user.easySolved >= easyTotal) {
        await awardAchievement(userId, AchievementType.ALL_EASY);
    }
};

type ActivityRecorder = (event: SubmissionJudgedEvent) => Promise<void>;

let detachTracker: (() => void) | null = null;

/**
 * Hooks the tracker onto judged practice submissions and returns the detach
 * function. Recorder failures are logged and never reach the submitter.
 */
export const registerActivityTracker = (record: ActivityRecorder = recordSubmissionActivity): (() => void) => {
    if (detachTracker) return detachTracker;

    const listener = (event: SubmissionJudgedEvent) => {
        Promise.resolve()
            .then(() => record(event))
            .catch((error: unknown) => {
                logger.error(`❌ [ACTIVITY] Could not record submission ${event.submissionId}: ${errorMessage(error)}`);
            });
    };

    submissionEvents.onJudged(listener);
    logger.info("📅 [ACTIVITY] Tracker registered");

    const detach = () => {
        submissionEvents.offJudged(listener);
        detachTracker = null;
    };
    detachTracker = detach;
    return detach;
};

export interface ActivityDay {
    date: string;
    problemsSolved: number;
    submissionsCount: number;
}

export interface UserProgress {
    userId: string;
    username: string;
    totalSolved: number;
    solvedByDifficulty: Record<Difficulty, { solved: number; total: number }>;
    solveStreak: number;
    achievements: Array<{ type: AchievementType; name: string; icon: string; earnedAt: Date }>;
    recentActivity: ActivityDay[];
}

const activitySince = async (userId: string, fromDate: string): Promise<ActivityDay[]> => {
    const rows = await activityRepo().find({
        where: { userId, date: MoreThanOrEqual(fromDate) },
        order: { date: "DESC" },
    });
    return rows.map(({ date, problemsSolved, submissionsCount }) => ({ date, problemsSolved, submissionsCount }));
};

/** Last 365 days, newest first; days without activity are absent. */
export const getActivityCalendar = (userId: string, now: Date = new Date()): Promise<ActivityDay[]> =>
    activitySince(userId, shiftDays(utcDate(now), -364));

export const getUserProgress = async (userId: string, now: Date = new Date()): Promise<UserProgress> => {
    const user = await userRepo().findOne({ where: { id: userId } });
    if (!user) throw new HttpError(404, "User not found");

    const earned = await userAchievementRepo().find({
        where: { userId },
        relations: ["achievement"],
        order: { earnedAt: "ASC" },
    });

    const today = utcDate(now);

    return {
        userId: user.id,
        username: user.username,
        totalSolved: user.totalSolved,
        solvedByDifficulty: {
            [Difficulty.EASY]: { solved: user.easySolved, total: await countActiveProblems(Difficulty.EASY) },
            [Difficulty.MEDIUM]: { solved: user.mediumSolved, total: await countActiveProblems(Difficulty.MEDIUM) },
            [Difficulty.HARD]: { solved: user.hardSolved, total: await countActiveProblems(Difficulty.HARD) },
        },
        solveStreak: await calculateSolveStreak(userId, today),
        achievements: earned.map((e) => ({
            type: e.achievement.achievementType,
            name: e.achievement.name,
            icon: e.achievement.icon,
            earnedAt: e.earnedAt,
        })),
        recentActivity: await activitySince(userId, shiftDays(today, -29)),
    };
};

export interface ProblemProgressItem {
    problemId: string;
    problemSlug: string;
    problemTitle: string;
    problemDifficulty: Difficulty;
    status: SolveStatus;
    attempts: number;
    firstSolvedAt: Date | null;
    lastAttemptedAt: Date;
}

const toProgressItem = (row: ProblemSolveStatus): ProblemProgressItem => ({
    problemId: row.problemId,
    problemSlug: row.problem.slug,
    problemTitle: row.problem.title,
    problemDifficulty: row.problem.difficulty,
    status: row.status,
    attempts: row.attempts,
    firstSolvedAt: row.firstSolvedAt,
    lastAttemptedAt: row.lastAttemptedAt,
});

const parseDifficulty = (value: string): Difficulty => {
    const upper = value.toUpperCase();
    const difficulty = Object.values(Difficulty).find((d) => d === upper);
    if (!difficulty) throw new HttpError(400, `Unknown difficulty: ${value}`);
    return difficulty;
};

/** Solved problems, most recently solved first; optionally one difficulty only. */
export const getSolvedProblems = async (userId: string, difficulty?: string): Promise<ProblemProgressItem[]> => {
    const where: FindOptionsWhere<ProblemSolveStatus> = { userId, status: SolveStatus.SOLVED };
    if (difficulty) where.problem = { difficulty: parseDifficulty(difficulty) };

    const rows = await solveStatusRepo().find({
        where,
        relations: ["problem"],
        order: { firstSolvedAt: "DESC" },
    });
    return rows.map(toProgressItem);
};

/** Attempted but unsolved problems, most recently attempted first. */
export const getAttemptedProblems = async (userId: string): Promise<ProblemProgressItem[]> => {
    const rows = await solveStatusRepo().find({
        where: { userId, status: SolveStatus.ATTEMPTED },
        relations: ["problem"],
        order: { lastAttemptedAt: "DESC" },
    });
    return rows.map(toProgressItem);
};

export interface GlobalLeaderboardEntry {
    rank: number;
    userId: string;
    username: string;
    totalSolved: number;
    easySolved: number;
    mediumSolved: number;
    hardSolved: number;
}

export const GLOBAL_LEADERBOARD_MAX = 100;

/**
 * Users with at least one solve, by total solved; equal totals fall back to
 * username so the order is stable.
 */
export const getGlobalLeaderboard = async (limit: number = GLOBAL_LEADERBOARD_MAX): Promise<GlobalLeaderboardEntry[]> => {
    const users = await userRepo().find({
        where: { totalSolved: MoreThan(0) },
        order: { totalSolved: "DESC", username: "ASC" },
        take: Math.min(Math.max(limit, 1), GLOBAL_LEADERBOARD_MAX),
    });

    return users.map((user, index) => ({
        rank: index + 1,
        userId: user.id,
        username: user.username,
        totalSolved: user.totalSolved,
        easySolved: user.easySolved,
        mediumSolved: user.mediumSolved,
        hardSolved: user.hardSolved,
    }));
};

export const listAchievements = async () => {
    const achievements = await achievementRepo().find({ order: { name: "ASC" } });
    return achievements.map(({ id, name, description, achievementType, icon }) => ({
        id,
        name,
        description,
        achievementType,
        icon,
    }));
};
