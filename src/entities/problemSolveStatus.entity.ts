import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  Unique,
  UpdateDateColumn,
} from "typeorm";
import { User } from "./user.entity";
import { Problem } from "./problem.entity";

export enum SolveStatus {
  ATTEMPTED = "ATTEMPTED",
  SOLVED = "SOLVED",
}

@Entity("problem_solve_statuses")
@Unique(["userId", "problemId"])
export class ProblemSolveStatus {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  userId!: string;

  @Column()
  problemId!: string;

  // ATTEMPTED -> SOLVED only, never back
  @Column({ type: "simple-enum", enum: SolveStatus, default: SolveStatus.ATTEMPTED })
  status!: SolveStatus;

  @Column({ type: "int", default: 0 })
  attempts!: number;

  @Column({ type: Date, nullable: true })
  firstSolvedAt!: Date | null;

  @UpdateDateColumn()
  lastAttemptedAt!: Date;

  @ManyToOne(() => User, { onDelete: "CASCADE" })
  @JoinColumn({ name: "userId" })
  user!: User;

  @ManyToOne(() => Problem, { onDelete: "CASCADE" })
  @JoinColumn({ name: "problemId" })
  problem!: Problem;
}
