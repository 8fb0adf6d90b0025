import { Mutex } from "async-mutex";
import { AppDataSource } from "../config/db";
import { Contest, ScoringType } from "../entities/contest.entity";
import { ContestParticipant } from "../entities/contestParticipant.entity";
import { ContestProblem } from "../entities/contestProblem.entity";
import { SolveStatus } from "../entities/problemSolveStatus.entity";
import { HttpError } from "../utils/error.util";
import logger from "../utils/logger";
import { emitLeaderboardUpdate, LeaderboardUpdatePayload } from "../utils/socket";
import { withTransaction } from "../utils/transaction.util";

const contestRepo = () => AppDataSource.getRepository(Contest);
const participantRepo = () => AppDataSource.getRepository(ContestParticipant);
const contestProblemRepo = () => AppDataSource.getRepository(ContestProblem);

export type RankKeys = Pick<ContestParticipant, "id" | "totalScore" | "totalTime" | "registeredAt">;

export interface LeaderboardEntry {
    rank: number | null;
    participantId: string;
    userId: string;
    username: string;
    totalScore: number;
    problemsSolved: number;
    totalTime: number;
    penaltyTime: number;
    lastSubmissionTime: Date | null;
}

export interface ProblemCell {
    problemId: string;
    order: number;
    status: SolveStatus | "NOT_ATTEMPTED";
    score: number;
    attempts: number;
    wrongAttempts: number;
    solveTime: number | null;
}

export interface DetailedLeaderboardEntry extends LeaderboardEntry {
    problems: ProblemCell[];
}

export interface Leaderboard<T> {
    contestId: string;
    title: string;
    scoringType: ScoringType;
    standings: T[];
}

/**
 * Higher score first, then less time; earlier registration and finally the id
 * break what is left so the order is total.
 */
export const compareParticipants = (a: RankKeys, b: RankKeys): number =>
    b.totalScore - a.totalScore ||
    a.totalTime - b.totalTime ||
    a.registeredAt.getTime() - b.registeredAt.getTime() ||
    (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);

/** Pure ranking: returns the participants sorted with ranks 1..N attached. */
export const rankParticipants = <T extends RankKeys>(participants: T[]): Array<T & { rank: number }> =>
    [...participants].sort(compareParticipants).map((p, index) => ({ ...p, rank: index + 1 }));

// 🔒 one re-rank at a time per contest inside this process
const contestLocks = new Map<string, Mutex>();

const lockFor = (contestId: string): Mutex => {
    let lock = contestLocks.get(contestId);
    if (!lock) {
        lock = new Mutex();
        contestLocks.set(contestId, lock);
    }
    return lock;
};

/**
 * Recomputes and stores every participant's rank for one contest, then pushes the
 * standings to the contest room.
 */
export const recomputeRanks = async (contestId: string): Promise<LeaderboardUpdatePayload> => {
    const payload = await lockFor(contestId).runExclusive(() =>
        withTransaction("RANK", async (manager) => {
            const participants = await manager.find(ContestParticipant, { where: { contestId } });
            const ranked = rankParticipants(participants);

            for (const participant of ranked) {
                const stored = participants.find((p) => p.id === participant.id);
                if (stored?.rank === participant.rank) continue;
                await manager.update(ContestParticipant, { id: participant.id }, { rank: participant.rank });
            }

            return {
                contestId,
                standings: ranked.map((p) => ({
                    participantId: p.id,
                    userId: p.userId,
                    rank: p.rank,
                    totalScore: p.totalScore,
                    totalTime: p.totalTime,
                })),
            };
        })
    );

    logger.info(`🏆 [RANK] Contest ${contestId}: ranked ${payload.standings.length} participant(s)`);
    emitLeaderboardUpdate(payload);
    return payload;
};

export const findContestBySlug = async (slug: string): Promise<Contest> => {
    const contest = await contestRepo().findOne({ where: { slug } });
    if (!contest) throw new HttpError(404, "Contest not found");
    return contest;
};

const toEntry = (p: ContestParticipant): LeaderboardEntry => ({
    rank: p.rank,
    participantId: p.id,
    userId: p.userId,
    username: p.user.username,
    totalScore: p.totalScore,
    problemsSolved: p.problemsSolved,
    totalTime: p.totalTime,
    penaltyTime: p.penaltyTime,
    lastSubmissionTime: p.lastSubmissionTime,
});

const loadStandings = async (contestId: string, withStatuses: boolean) => {
    const participants = await participantRepo().find({
        where: { contestId },
        relations: withStatuses ? ["user", "problemStatuses"] : ["user"],
    });
    // stored ranks may lag a submission that is still being scored
    return participants.sort(compareParticipants);
};

export const getLeaderboard = async (slug: string): Promise<Leaderboard<LeaderboardEntry>> => {
    const contest = await findContestBySlug(slug);
    const participants = await loadStandings(contest.id, false);

    return {
        contestId: contest.id,
        title: contest.title,
        scoringType: contest.scoringType,
        standings: participants.map(toEntry),
    };
};

export const getDetailedLeaderboard = async (slug: string): Promise<Leaderboard<DetailedLeaderboardEntry>> => {
    const contest = await findContestBySlug(slug);
    const problems = await contestProblemRepo().find({
        where: { contestId: contest.id, isActive: true },
        order: { order: "ASC" },
    });
    const participants = await loadStandings(contest.id, true);

    return {
        contestId: contest.id,
        title: contest.title,
        scoringType: contest.scoringType,
        standings: participants.map((participant) => ({
            ...toEntry(participant),
            problems: problems.map((problem) => {
                const status = participant.problemStatuses.find((s) => s.problemId === problem.id);
                return {
                    problemId: problem.id,
                    order: problem.order,
                    status: status?.status ?? "NOT_ATTEMPTED",
                    score: status?.score ?? 0,
                    attempts: status?.attempts ?? 0,
                    wrongAttempts: status?.wrongAttempts ?? 0,
                    solveTime: status?.solveTime ?? null,
                };
            }),
        })),
    };
};
