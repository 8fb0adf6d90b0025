import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  OneToMany,
} from "typeorm";
import { TestCase } from "./testcase.entity";

export enum Difficulty {
  EASY = "EASY",
  MEDIUM = "MEDIUM",
  HARD = "HARD",
}

@Entity("problems")
export class Problem {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  title!: string;

  @Column({ unique: true })
  slug!: string;

  @Column("text")
  description!: string;

  @Column({ type: "simple-enum", enum: Difficulty, default: Difficulty.MEDIUM })
  difficulty!: Difficulty;

  // 👇 Limits: milliseconds and megabytes
  @Column({ type: "int", default: 2000 })
  timeLimit!: number;

  @Column({ type: "int", default: 256 })
  memoryLimit!: number;

  // 👇 Statistics (monotonic, incremented atomically)
  @Column({ type: "int", default: 0 })
  totalSubmissions!: number;

  @Column({ type: "int", default: 0 })
  acceptedSubmissions!: number;

  @Column({ type: "int", default: 0 })
  totalSolved!: number;

  @Column({ default: true })
  isActive!: boolean;

  @CreateDateColumn()
  createdAt!: Date;

  @OneToMany(() => TestCase, (t) => t.problem)
  testcases!: TestCase[];
}
