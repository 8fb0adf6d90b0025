import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
  Index,
} from "typeorm";
import { User } from "./user.entity";
import { Problem } from "./problem.entity";
import { TestCaseResult } from "./testCaseResult.entity";

export enum Language {
  PYTHON = "PYTHON",
  JAVA = "JAVA",
  CPP = "CPP",
  JAVASCRIPT = "JAVASCRIPT",
  C = "C",
}

export enum Verdict {
  PENDING = "PENDING",
  RUNNING = "RUNNING",
  ACCEPTED = "ACCEPTED",
  WRONG_ANSWER = "WRONG_ANSWER",
  TIME_LIMIT_EXCEEDED = "TIME_LIMIT_EXCEEDED",
  MEMORY_LIMIT_EXCEEDED = "MEMORY_LIMIT_EXCEEDED",
  RUNTIME_ERROR = "RUNTIME_ERROR",
  COMPILATION_ERROR = "COMPILATION_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

@Entity("submissions")
@Index(["userId", "submittedAt"])
@Index(["problemId", "submittedAt"])
export class Submission {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  userId!: string;

  @Column()
  problemId!: string;

  @Column("text")
  code!: string;

  @Column({ type: "simple-enum", enum: Language })
  language!: Language;

  @Index()
  @Column({ type: "simple-enum", enum: Verdict, default: Verdict.PENDING })
  verdict!: Verdict;

  // ⏱️ Maxima over every executed test case (ms / KB)
  @Column({ type: "int", nullable: true })
  executionTime!: number | null;

  @Column({ type: "int", nullable: true })
  memoryUsed!: number | null;

  @Column({ type: "int", default: 0 })
  testCasesPassed!: number;

  @Column({ type: "int", default: 0 })
  totalTestCases!: number;

  @Column({ type: "text", default: "" })
  errorMessage!: string;

  @Column({ type: "text", default: "" })
  compilationOutput!: string;

  @CreateDateColumn()
  submittedAt!: Date;

  @ManyToOne(() => User, { onDelete: "CASCADE" })
  @JoinColumn({ name: "userId" })
  user!: User;

  @ManyToOne(() => Problem, { onDelete: "CASCADE" })
  @JoinColumn({ name: "problemId" })
  problem!: Problem;

  @OneToMany(() => TestCaseResult, (r) => r.submission)
  testCaseResults!: TestCaseResult[];
}
