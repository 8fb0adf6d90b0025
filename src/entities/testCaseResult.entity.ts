import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  Index,
} from "typeorm";
import { Submission } from "./submission.entity";
import { TestCase } from "./testcase.entity";

export enum CaseStatus {
  PENDING = "PENDING",
  ACCEPTED = "ACCEPTED",
  WRONG_ANSWER = "WRONG_ANSWER",
  TIME_LIMIT_EXCEEDED = "TIME_LIMIT_EXCEEDED",
  MEMORY_LIMIT_EXCEEDED = "MEMORY_LIMIT_EXCEEDED",
  RUNTIME_ERROR = "RUNTIME_ERROR",
  COMPILATION_ERROR = "COMPILATION_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

@Entity("test_case_results")
export class TestCaseResult {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Index()
  @Column()
  submissionId!: string;

  @Column()
  testCaseId!: string;

  @Column({ type: "int", default: 0 })
  order!: number;

  @Column({ type: "simple-enum", enum: CaseStatus, default: CaseStatus.PENDING })
  status!: CaseStatus;

  @Column({ type: "text", default: "" })
  actualOutput!: string;

  @Column({ type: "int", nullable: true })
  executionTime!: number | null;

  @Column({ type: "int", nullable: true })
  memoryUsed!: number | null;

  @Column({ type: "text", default: "" })
  errorMessage!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @ManyToOne(() => Submission, (s) => s.testCaseResults, { onDelete: "CASCADE" })
  @JoinColumn({ name: "submissionId" })
  submission!: Submission;

  @ManyToOne(() => TestCase, { onDelete: "CASCADE" })
  @JoinColumn({ name: "testCaseId" })
  testCase!: TestCase;
}
