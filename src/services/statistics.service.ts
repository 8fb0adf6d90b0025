import { EntityManager, Not } from "typeorm";
import { Difficulty, Problem } from "../entities/problem.entity";
import { ProblemSolveStatus, SolveStatus } from "../entities/problemSolveStatus.entity";
import { User } from "../entities/user.entity";
import logger from "../utils/logger";

const SOLVED_COUNTER_BY_DIFFICULTY: Record<Difficulty, "easySolved" | "mediumSolved" | "hardSolved"> = {
    [Difficulty.EASY]: "easySolved",
    [Difficulty.MEDIUM]: "mediumSolved",
    [Difficulty.HARD]: "hardSolved",
};

export interface PracticeStatisticsInput {
    userId: string;
    problem: Pick<Problem, "id" | "difficulty">;
    accepted: boolean;
    now?: Date;
}

export interface PracticeStatisticsResult {
    firstSolve: boolean;
}

/**
 * Derived, never stored: accepted / total as a percentage with two decimals.
 */
export const acceptanceRate = (accepted: number, total: number): number => {
    if (total === 0) return 0;
    return Math.round((accepted / total) * 10000) / 100;
};

/**
 * Makes sure the (user, problem) status row exists without racing a concurrent insert.
 */
export const ensureSolveStatus = async (manager: EntityManager, userId: string, problemId: string) => {
    await manager
        .createQueryBuilder()
        .insert()
        .into(ProblemSolveStatus)
        .values({ userId, problemId, status: SolveStatus.ATTEMPTED, attempts: 0 })
        .orIgnore()
        .execute();
};

/**
 * Problem and user aggregates for one finished practice judging pass. Must run in
 * the same transaction that stores the verdict. Every counter moves through an
 * atomic `x = x + 1`; the first-solve side effects hang off a compare-and-swap on
 * the solve status, so repeated acceptances never count twice.
 */
export const applyPracticeStatistics = async (
    manager: EntityManager,
    { userId, problem, accepted, now = new Date() }: PracticeStatisticsInput
): Promise<PracticeStatisticsResult> => {
    await manager.increment(Problem, { id: problem.id }, "totalSubmissions", 1);
    if (accepted) {
        await manager.increment(Problem, { id: problem.id }, "acceptedSubmissions", 1);
    }

    await ensureSolveStatus(manager, userId, problem.id);
    await manager.increment(ProblemSolveStatus, { userId, problemId: problem.id }, "attempts", 1);

    if (!accepted) return { firstSolve: false };

    const swap = await manager.update(
        ProblemSolveStatus,
        { userId, problemId: problem.id, status: Not(SolveStatus.SOLVED) },
        { status: SolveStatus.SOLVED, firstSolvedAt: now }
    );
    if (!swap.affected) return { firstSolve: false };

    await manager.increment(Problem, { id: problem.id }, "totalSolved", 1);
    await manager.increment(User, { id: userId }, "totalSolved", 1);
    await manager.increment(User, { id: userId }, SOLVED_COUNTER_BY_DIFFICULTY[problem.difficulty], 1);

    logger.info(`🎉 [STATS] First solve of problem ${problem.id} by user ${userId}`);
    return { firstSolve: true };
};
