import { Contest, ContestStatus } from "../entities/contest.entity";

export interface ContestTimeInfo {
    status: ContestStatus;
    timeUntilStartSeconds?: number;
    timeRemainingSeconds?: number;
    timeElapsedSeconds?: number;
    totalDurationSeconds?: number;
}

/**
 * Status of the contest window at `now`; both ends of the window count as running.
 */
export const getContestStatus = (contest: Contest, now: Date = new Date()): ContestStatus => {
    if (now.getTime() < contest.startTime.getTime()) return ContestStatus.NOT_STARTED;
    if (now.getTime() > contest.endTime.getTime()) return ContestStatus.ENDED;
    return ContestStatus.ACTIVE;
};

export const isContestRunning = (contest: Contest, now: Date = new Date()): boolean =>
    getContestStatus(contest, now) === ContestStatus.ACTIVE;

/**
 * Whole minutes elapsed since the contest started (floored, never negative).
 */
export const minutesSinceStart = (contest: Contest, now: Date = new Date()): number =>
    Math.max(0, Math.floor((now.getTime() - contest.startTime.getTime()) / 60000));

export const getContestTimeInfo = (contest: Contest, now: Date = new Date()): ContestTimeInfo => {
    const status = getContestStatus(contest, now);
    const seconds = (ms: number) => Math.floor(ms / 1000);

    switch (status) {
        case ContestStatus.NOT_STARTED:
            return { status, timeUntilStartSeconds: seconds(contest.startTime.getTime() - now.getTime()) };
        case ContestStatus.ACTIVE:
            return {
                status,
                timeRemainingSeconds: seconds(contest.endTime.getTime() - now.getTime()),
                timeElapsedSeconds: seconds(now.getTime() - contest.startTime.getTime()),
            };
        case ContestStatus.ENDED:
            return { status, totalDurationSeconds: seconds(contest.endTime.getTime() - contest.startTime.getTime()) };
    }
};
