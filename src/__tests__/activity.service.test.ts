import { AppDataSource } from "../config/db";
import { AchievementType } from "../entities/achievement.entity";
import { Difficulty, Problem } from "../entities/problem.entity";
import { ProblemSolveStatus, SolveStatus } from "../entities/problemSolveStatus.entity";
import { Language, Submission, Verdict } from "../entities/submission.entity";
import { User } from "../entities/user.entity";
import { UserAchievement } from "../entities/userAchievement.entity";
import { UserActivity } from "../entities/userActivity.entity";
import { seedAchievements } from "../seed/seedAchievements";
import {
  awardAchievement,
  calculateSolveStreak,
  checkAndAwardAchievements,
  getActivityCalendar,
  getAttemptedProblems,
  getGlobalLeaderboard,
  getSolvedProblems,
  getUserProgress,
  listAchievements,
  recordSubmissionActivity,
  shiftDays,
} from "../services/activity.service";
import { closeTestDatabase, connectTestDatabase, createProblem, createUser, resetTestDatabase } from "../test-utils/db";

const storeSubmission = (user: User, problem: Problem, verdict: Verdict, submittedAt: string) => {
  const repo = AppDataSource.getRepository(Submission);
  return repo.save(
    repo.create({
      userId: user.id,
      problemId: problem.id,
      code: "x",
      language: Language.C,
      verdict,
      submittedAt: new Date(submittedAt),
    })
  );
};

const judged = (submission: Submission) => ({
  submissionId: submission.id,
  userId: submission.userId,
  problemId: submission.problemId,
  verdict: submission.verdict,
  submittedAt: submission.submittedAt,
});

const activityOn = (user: User, date: string) =>
  AppDataSource.getRepository(UserActivity).findOneByOrFail({ userId: user.id, date });

const storeActivity = (user: User, dates: string[], problemsSolved = 1) =>
  AppDataSource.getRepository(UserActivity).save(
    dates.map((date) => ({ userId: user.id, date, problemsSolved, submissionsCount: problemsSolved }))
  );

const earnedTypes = async (user: User) => {
  const rows = await AppDataSource.getRepository(UserAchievement).find({
    where: { userId: user.id },
    relations: ["achievement"],
  });
  return rows.map((r) => r.achievement.achievementType).sort();
};

const storeStatus = (
  user: User,
  problem: Problem,
  status: SolveStatus,
  times: { firstSolvedAt?: string; lastAttemptedAt: string }
) =>
  AppDataSource.getRepository(ProblemSolveStatus).save({
    userId: user.id,
    problemId: problem.id,
    status,
    attempts: 2,
    firstSolvedAt: times.firstSolvedAt ? new Date(times.firstSolvedAt) : null,
    lastAttemptedAt: new Date(times.lastAttemptedAt),
  });

const now = new Date("2026-04-10T12:00:00.000Z");

beforeAll(connectTestDatabase);
beforeEach(resetTestDatabase);
afterAll(closeTestDatabase);

describe("recordSubmissionActivity", () => {
  it("counts every submission but each problem once per day", async () => {
    const user = await createUser();
    const problem = await createProblem([]);

    const first = await storeSubmission(user, problem, Verdict.ACCEPTED, "2026-04-10T08:00:00.000Z");
    const wrong = await storeSubmission(user, problem, Verdict.WRONG_ANSWER, "2026-04-10T08:30:00.000Z");
    const again = await storeSubmission(user, problem, Verdict.ACCEPTED, "2026-04-10T09:00:00.000Z");

    await recordSubmissionActivity(judged(first), now);
    await recordSubmissionActivity(judged(wrong), now);
    await recordSubmissionActivity(judged(again), now);

    expect(await activityOn(user, "2026-04-10")).toMatchObject({ submissionsCount: 3, problemsSolved: 1 });
  });

  it("gives the day's solve to the earliest acceptance even when events arrive out of order", async () => {
    const user = await createUser();
    const problem = await createProblem([]);

    const earlier = await storeSubmission(user, problem, Verdict.ACCEPTED, "2026-04-10T08:00:00.000Z");
    const later = await storeSubmission(user, problem, Verdict.ACCEPTED, "2026-04-10T10:00:00.000Z");

    await recordSubmissionActivity(judged(later), now);
    await recordSubmissionActivity(judged(earlier), now);

    expect(await activityOn(user, "2026-04-10")).toMatchObject({ submissionsCount: 2, problemsSolved: 1 });
  });

  it("starts a new day on the UTC date of the submission", async () => {
    const user = await createUser();
    const problem = await createProblem([]);
    const other = await createProblem([]);

    const late = await storeSubmission(user, problem, Verdict.ACCEPTED, "2026-04-09T23:59:59.000Z");
    const early = await storeSubmission(user, problem, Verdict.ACCEPTED, "2026-04-10T00:00:01.000Z");
    const second = await storeSubmission(user, other, Verdict.ACCEPTED, "2026-04-10T00:05:00.000Z");

    for (const submission of [late, early, second]) await recordSubmissionActivity(judged(submission), now);

    expect(await activityOn(user, "2026-04-09")).toMatchObject({ submissionsCount: 1, problemsSolved: 1 });
    expect(await activityOn(user, "2026-04-10")).toMatchObject({ submissionsCount: 2, problemsSolved: 2 });
  });
});

describe("calculateSolveStreak", () => {
  it("counts consecutive solving days back from today", async () => {
    const user = await createUser();
    await storeActivity(user, ["2026-04-10", "2026-04-09", "2026-04-08", "2026-04-06"]);

    expect(await calculateSolveStreak(user.id, "2026-04-10")).toBe(3);
  });

  it("is zero when today has no solves", async () => {
    const user = await createUser();
    await storeActivity(user, ["2026-04-09", "2026-04-08"]);
    await storeActivity(user, ["2026-04-10"], 0);

    expect(await calculateSolveStreak(user.id, "2026-04-10")).toBe(0);
  });

  it("crosses month boundaries", async () => {
    const user = await createUser();
    await storeActivity(user, ["2026-03-01", "2026-02-28", "2026-02-27"]);

    expect(await calculateSolveStreak(user.id, "2026-03-01")).toBe(3);
  });
});

describe("achievements", () => {
  it("awards solve milestones once", async () => {
    await seedAchievements();
    const user = await createUser({ totalSolved: 10 });

    await checkAndAwardAchievements(user.id, "2026-04-10");
    await checkAndAwardAchievements(user.id, "2026-04-10");

    expect(await earnedTypes(user)).toEqual([AchievementType.FIRST_SOLVE, AchievementType.SOLVE_10]);
  });

  it("awards the week streak", async () => {
    await seedAchievements();
    const user = await createUser();
    await storeActivity(user, Array.from({ length: 7 }, (_, i) => shiftDays("2026-04-10", -i)));

    await checkAndAwardAchievements(user.id, "2026-04-10");

    expect(await earnedTypes(user)).toEqual([AchievementType.SOLVE_STREAK_7]);
  });

  it("awards solving every easy problem", async () => {
    await seedAchievements();
    await createProblem([], { difficulty: Difficulty.EASY });
    await createProblem([], { difficulty: Difficulty.HARD });
    const user = await createUser({ totalSolved: 1, easySolved: 1 });

    await checkAndAwardAchievements(user.id, "2026-04-10");

    expect(await earnedTypes(user)).toEqual([AchievementType.ALL_EASY, AchievementType.FIRST_SOLVE]);
  });

  it("skips achievements missing from the catalogue", async () => {
    const user = await createUser({ totalSolved: 1 });

    await expect(awardAchievement(user.id, AchievementType.FIRST_SOLVE)).resolves.toBe(false);
    expect(await earnedTypes(user)).toEqual([]);
  });
});

describe("progress views", () => {
  it("summarises solved counts, streak, achievements and recent activity", async () => {
    await seedAchievements();
    await createProblem([], { difficulty: Difficulty.EASY });
    await createProblem([], { difficulty: Difficulty.EASY });
    await createProblem([], { difficulty: Difficulty.HARD });
    await createProblem([], { difficulty: Difficulty.MEDIUM, isActive: false });
    const user = await createUser({ totalSolved: 1, easySolved: 1 });
    await storeActivity(user, ["2026-04-10", "2026-03-01"]);
    await awardAchievement(user.id, AchievementType.FIRST_SOLVE);

    const progress = await getUserProgress(user.id, now);

    expect(progress.solvedByDifficulty).toEqual({
      [Difficulty.EASY]: { solved: 1, total: 2 },
      [Difficulty.MEDIUM]: { solved: 0, total: 0 },
      [Difficulty.HARD]: { solved: 0, total: 1 },
    });
    expect(progress.solveStreak).toBe(1);
    expect(progress.achievements.map((a) => [a.type, a.name, a.icon])).toEqual([
      [AchievementType.FIRST_SOLVE, "First Blood", "🎯"],
    ]);
    expect(progress.recentActivity).toEqual([{ date: "2026-04-10", problemsSolved: 1, submissionsCount: 1 }]);
  });

  it("limits the calendar to the last 365 days, newest first", async () => {
    const user = await createUser();
    await storeActivity(user, ["2025-04-10", "2025-04-11", "2026-03-01", "2026-04-10"]);

    const calendar = await getActivityCalendar(user.id, now);

    expect(calendar.map((day) => day.date)).toEqual(["2026-04-10", "2026-03-01", "2025-04-11"]);
  });

  it("answers 404 for an unknown user", async () => {
    await expect(getUserProgress("00000000-0000-4000-8000-000000000000", now)).rejects.toMatchObject({ status: 404 });
  });
});

describe("problem lists", () => {
  it("lists solved problems newest first and filters by difficulty", async () => {
    const user = await createUser();
    const easy = await createProblem([], { difficulty: Difficulty.EASY });
    const hard = await createProblem([], { difficulty: Difficulty.HARD });
    const pending = await createProblem([], { difficulty: Difficulty.EASY });
    await storeStatus(user, easy, SolveStatus.SOLVED, {
      firstSolvedAt: "2026-04-01T09:00:00.000Z",
      lastAttemptedAt: "2026-04-01T09:00:00.000Z",
    });
    await storeStatus(user, hard, SolveStatus.SOLVED, {
      firstSolvedAt: "2026-04-05T09:00:00.000Z",
      lastAttemptedAt: "2026-04-05T09:00:00.000Z",
    });
    await storeStatus(user, pending, SolveStatus.ATTEMPTED, { lastAttemptedAt: "2026-04-06T09:00:00.000Z" });

    const solved = await getSolvedProblems(user.id);
    expect(solved.map((p) => p.problemSlug)).toEqual([hard.slug, easy.slug]);
    expect(solved[0]).toMatchObject({
      problemTitle: hard.title,
      problemDifficulty: Difficulty.HARD,
      status: SolveStatus.SOLVED,
      attempts: 2,
    });

    const easyOnly = await getSolvedProblems(user.id, "easy");
    expect(easyOnly.map((p) => p.problemId)).toEqual([easy.id]);
  });

  it("rejects an unknown difficulty", async () => {
    const user = await createUser();

    await expect(getSolvedProblems(user.id, "legendary")).rejects.toMatchObject({ status: 400 });
  });

  it("lists attempted problems by last attempt, newest first", async () => {
    const user = await createUser();
    const older = await createProblem([]);
    const newer = await createProblem([]);
    const solved = await createProblem([]);
    await storeStatus(user, older, SolveStatus.ATTEMPTED, { lastAttemptedAt: "2026-04-02T09:00:00.000Z" });
    await storeStatus(user, newer, SolveStatus.ATTEMPTED, { lastAttemptedAt: "2026-04-08T09:00:00.000Z" });
    await storeStatus(user, solved, SolveStatus.SOLVED, {
      firstSolvedAt: "2026-04-09T09:00:00.000Z",
      lastAttemptedAt: "2026-04-09T09:00:00.000Z",
    });

    const attempted = await getAttemptedProblems(user.id);

    expect(attempted.map((p) => p.problemId)).toEqual([newer.id, older.id]);
  });
});

describe("global leaderboard", () => {
  it("ranks solvers by problems solved and leaves out users without a solve", async () => {
    await createUser({ username: "carol", totalSolved: 4, easySolved: 4 });
    await createUser({ username: "alice", totalSolved: 7, easySolved: 3, mediumSolved: 3, hardSolved: 1 });
    await createUser({ username: "bob", totalSolved: 4, mediumSolved: 4 });
    await createUser({ username: "dave", totalSolved: 0 });

    const board = await getGlobalLeaderboard();

    expect(board.map((e) => [e.rank, e.username, e.totalSolved])).toEqual([
      [1, "alice", 7],
      [2, "bob", 4],
      [3, "carol", 4],
    ]);
    expect(board[0]).toMatchObject({ easySolved: 3, mediumSolved: 3, hardSolved: 1 });
  });

  it("honours the limit", async () => {
    await createUser({ username: "alice", totalSolved: 7 });
    await createUser({ username: "bob", totalSolved: 4 });

    const board = await getGlobalLeaderboard(1);

    expect(board.map((e) => e.username)).toEqual(["alice"]);
  });
});

describe("achievement catalogue", () => {
  it("lists every seeded achievement by name", async () => {
    await seedAchievements();

    const catalogue = await listAchievements();

    expect(catalogue.map((a) => a.name)).toEqual([
      "Competitor",
      "Easy Peasy",
      "Expert",
      "First Blood",
      "Master",
      "Monthly Champion",
      "Problem Solver",
      "Week Warrior",
    ]);
    expect(catalogue[3]).toMatchObject({
      achievementType: AchievementType.FIRST_SOLVE,
      description: "Solve your first problem",
      icon: "🎯",
    });
  });
});
