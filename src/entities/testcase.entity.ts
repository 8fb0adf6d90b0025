import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from "typeorm";
import { Problem } from "./problem.entity";

export enum TestCaseType {
  SAMPLE = "SAMPLE",
  HIDDEN = "HIDDEN",
}

@Entity("testcases")
export class TestCase {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  problemId!: string;

  @Column({ type: "simple-enum", enum: TestCaseType, default: TestCaseType.HIDDEN })
  testType!: TestCaseType;

  @Column("text")
  inputData!: string;

  @Column("text")
  expectedOutput!: string;

  @Column({ type: "int", default: 0 })
  order!: number;

  @Column({ default: true })
  isActive!: boolean;

  @ManyToOne(() => Problem, (p) => p.testcases, { onDelete: "CASCADE" })
  @JoinColumn({ name: "problemId" })
  problem!: Problem;
}
