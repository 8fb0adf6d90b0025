import { DataSource, DataSourceOptions } from "typeorm";
import dotenv from "dotenv";
import { User } from "../entities/user.entity";
import { Problem } from "../entities/problem.entity";
import { TestCase } from "../entities/testcase.entity";
import { Submission } from "../entities/submission.entity";
import { TestCaseResult } from "../entities/testCaseResult.entity";
import { ProblemSolveStatus } from "../entities/problemSolveStatus.entity";
import { Contest } from "../entities/contest.entity";
import { ContestRegistration } from "../entities/contestRegistration.entity";
import { ContestProblem } from "../entities/contestProblem.entity";
import { ContestTestCase } from "../entities/contestTestCase.entity";
import { ContestSubmission } from "../entities/contestSubmission.entity";
import { ContestParticipant } from "../entities/contestParticipant.entity";
import { ContestProblemSolveStatus } from "../entities/contestProblemSolveStatus.entity";
import { UserActivity } from "../entities/userActivity.entity";
import { Achievement } from "../entities/achievement.entity";
import { UserAchievement } from "../entities/userAchievement.entity";

dotenv.config();

export const entities = [
  User,
  Problem,
  TestCase,
  Submission,
  TestCaseResult,
  ProblemSolveStatus,
  Contest,
  ContestRegistration,
  ContestProblem,
  ContestTestCase,
  ContestSubmission,
  ContestParticipant,
  ContestProblemSolveStatus,
  UserActivity,
  Achievement,
  UserAchievement,
];

const buildOptions = (): DataSourceOptions => {
  // Jest runs against a throwaway in-memory database
  if (process.env.NODE_ENV === "test") {
    return {
      type: "better-sqlite3",
      database: ":memory:",
      synchronize: true,
      dropSchema: true,
      logging: false,
      entities,
    };
  }

  return {
    type: "postgres",
    url: process.env.DATABASE_URL,
    ssl: process.env.DB_SSL === "false" ? false : { rejectUnauthorized: false },
    synchronize: process.env.DB_SYNCHRONIZE === "true",
    logging: false,
    entities,
  };
};

export const AppDataSource = new DataSource(buildOptions());
