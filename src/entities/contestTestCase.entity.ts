import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn } from "typeorm";
import { ContestProblem } from "./contestProblem.entity";
import { TestCaseType } from "./testcase.entity";

@Entity("contest_testcases")
export class ContestTestCase {
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

  @ManyToOne(() => ContestProblem, (p) => p.testcases, { onDelete: "CASCADE" })
  @JoinColumn({ name: "problemId" })
  problem!: ContestProblem;
}
