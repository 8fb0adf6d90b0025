import { AppDataSource } from "../config/db";
import { Contest, ScoringType } from "../entities/contest.entity";
import { ContestProblem } from "../entities/contestProblem.entity";
import { ContestRegistration } from "../entities/contestRegistration.entity";
import { ContestTestCase } from "../entities/contestTestCase.entity";
import { Difficulty, Problem } from "../entities/problem.entity";
import { TestCase, TestCaseType } from "../entities/testcase.entity";
import { User, UserRole } from "../entities/user.entity";

export const connectTestDatabase = async () => {
  if (!AppDataSource.isInitialized) await AppDataSource.initialize();
};

export const resetTestDatabase = async () => {
  await AppDataSource.synchronize(true);
};

export const closeTestDatabase = async () => {
  if (AppDataSource.isInitialized) await AppDataSource.destroy();
};

let sequence = 0;
const next = () => ++sequence;

export const createUser = (overrides: Partial<User> = {}) => {
  const n = next();
  const repo = AppDataSource.getRepository(User);
  return repo.save(repo.create({ email: `user${n}@example.com`, username: `user${n}`, role: UserRole.USER, ...overrides }));
};

export interface CaseSeed {
  input: string;
  expectedOutput: string;
  order?: number;
  testType?: TestCaseType;
  isActive?: boolean;
}

export const createProblem = async (cases: CaseSeed[], overrides: Partial<Problem> = {}) => {
  const n = next();
  const repo = AppDataSource.getRepository(Problem);
  const problem = await repo.save(
    repo.create({ title: `Problem ${n}`, slug: `problem-${n}`, description: "", difficulty: Difficulty.EASY, ...overrides })
  );

  const caseRepo = AppDataSource.getRepository(TestCase);
  for (const [index, seed] of cases.entries()) {
    await caseRepo.save(
      caseRepo.create({
        problemId: problem.id,
        inputData: seed.input,
        expectedOutput: seed.expectedOutput,
        order: seed.order ?? index + 1,
        testType: seed.testType ?? TestCaseType.HIDDEN,
        isActive: seed.isActive ?? true,
      })
    );
  }
  return problem;
};

export const createContest = (overrides: Partial<Contest> = {}) => {
  const n = next();
  const repo = AppDataSource.getRepository(Contest);
  return repo.save(
    repo.create({
      title: `Contest ${n}`,
      slug: `contest-${n}`,
      startTime: new Date("2026-03-01T10:00:00.000Z"),
      endTime: new Date("2026-03-01T13:00:00.000Z"),
      scoringType: ScoringType.STANDARD,
      ...overrides,
    })
  );
};

export const createContestProblem = async (contest: Contest, cases: CaseSeed[], overrides: Partial<ContestProblem> = {}) => {
  const n = next();
  const repo = AppDataSource.getRepository(ContestProblem);
  const problem = await repo.save(
    repo.create({ contestId: contest.id, title: `Task ${n}`, order: n, points: 100, ...overrides })
  );

  const caseRepo = AppDataSource.getRepository(ContestTestCase);
  for (const [index, seed] of cases.entries()) {
    await caseRepo.save(
      caseRepo.create({
        problemId: problem.id,
        inputData: seed.input,
        expectedOutput: seed.expectedOutput,
        order: seed.order ?? index + 1,
        testType: seed.testType ?? TestCaseType.HIDDEN,
        isActive: seed.isActive ?? true,
      })
    );
  }
  return problem;
};

export const registerForContest = (contest: Contest, user: User, registeredAt?: Date) => {
  const repo = AppDataSource.getRepository(ContestRegistration);
  return repo.save(repo.create({ contestId: contest.id, userId: user.id, ...(registeredAt ? { registeredAt } : {}) }));
};
