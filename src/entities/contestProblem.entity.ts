import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  Unique,
} from "typeorm";
import { Contest } from "./contest.entity";
import { Difficulty } from "./problem.entity";
import { ContestTestCase } from "./contestTestCase.entity";

@Entity("contest_problems")
@Unique(["contestId", "order"])
export class ContestProblem {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  contestId!: string;

  @Column()
  title!: string;

  @Column({ type: "text", default: "" })
  description!: string;

  @Column({ type: "simple-enum", enum: Difficulty, default: Difficulty.MEDIUM })
  difficulty!: Difficulty;

  @Column({ type: "int", default: 100 })
  points!: number;

  @Column({ type: "int", default: 2000 })
  timeLimit!: number;

  @Column({ type: "int", default: 256 })
  memoryLimit!: number;

  @Column({ type: "int", default: 0 })
  order!: number;

  @Column({ type: "int", default: 0 })
  totalSubmissions!: number;

  @Column({ type: "int", default: 0 })
  acceptedSubmissions!: number;

  @Column({ type: "int", default: 0 })
  totalSolved!: number;

  @Column({ default: true })
  isActive!: boolean;

  @ManyToOne(() => Contest, (c) => c.contestProblems, { onDelete: "CASCADE" })
  @JoinColumn({ name: "contestId" })
  contest!: Contest;

  @OneToMany(() => ContestTestCase, (t) => t.problem)
  testcases!: ContestTestCase[];
}
