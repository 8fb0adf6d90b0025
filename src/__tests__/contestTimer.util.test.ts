import { Contest, ContestStatus } from "../entities/contest.entity";
import { getContestStatus, getContestTimeInfo, isContestRunning, minutesSinceStart } from "../utils/contestTimer.util";

const contest = Object.assign(new Contest(), {
  startTime: new Date("2026-03-01T10:00:00.000Z"),
  endTime: new Date("2026-03-01T12:00:00.000Z"),
});

const at = (iso: string) => new Date(iso);

describe("contest window", () => {
  it("counts both ends of the window as running", () => {
    expect(isContestRunning(contest, at("2026-03-01T10:00:00.000Z"))).toBe(true);
    expect(isContestRunning(contest, at("2026-03-01T12:00:00.000Z"))).toBe(true);
  });

  it("is not running just outside the window", () => {
    expect(getContestStatus(contest, at("2026-03-01T09:59:59.999Z"))).toBe(ContestStatus.NOT_STARTED);
    expect(getContestStatus(contest, at("2026-03-01T12:00:00.001Z"))).toBe(ContestStatus.ENDED);
  });
});

describe("minutesSinceStart", () => {
  it("floors to whole minutes", () => {
    expect(minutesSinceStart(contest, at("2026-03-01T10:17:59.000Z"))).toBe(17);
  });

  it("never goes negative", () => {
    expect(minutesSinceStart(contest, at("2026-03-01T09:00:00.000Z"))).toBe(0);
  });
});

describe("getContestTimeInfo", () => {
  it("reports remaining and elapsed time while running", () => {
    expect(getContestTimeInfo(contest, at("2026-03-01T10:30:00.000Z"))).toEqual({
      status: ContestStatus.ACTIVE,
      timeRemainingSeconds: 5400,
      timeElapsedSeconds: 1800,
    });
  });

  it("reports the countdown before the start", () => {
    expect(getContestTimeInfo(contest, at("2026-03-01T09:59:00.000Z"))).toEqual({
      status: ContestStatus.NOT_STARTED,
      timeUntilStartSeconds: 60,
    });
  });

  it("reports the total duration once over", () => {
    expect(getContestTimeInfo(contest, at("2026-03-02T00:00:00.000Z"))).toEqual({
      status: ContestStatus.ENDED,
      totalDurationSeconds: 7200,
    });
  });
});
