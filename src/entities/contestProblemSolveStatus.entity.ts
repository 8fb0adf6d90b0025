import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique } from "typeorm";
import { ContestParticipant } from "./contestParticipant.entity";
import { ContestProblem } from "./contestProblem.entity";
import { SolveStatus } from "./problemSolveStatus.entity";

@Entity("contest_problem_solve_statuses")
@Unique(["participantId", "problemId"])
export class ContestProblemSolveStatus {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  participantId!: string;

  @Column()
  problemId!: string;

  @Column({ type: "simple-enum", enum: SolveStatus, default: SolveStatus.ATTEMPTED })
  status!: SolveStatus;

  @Column({ type: "int", default: 0 })
  score!: number;

  @Column({ type: "int", default: 0 })
  attempts!: number;

  // Non-accepted submissions made before the first acceptance
  @Column({ type: "int", default: 0 })
  wrongAttempts!: number;

  @Column({ type: "int", nullable: true })
  solveTime!: number | null;

  @Column({ type: Date, nullable: true })
  firstSolvedAt!: Date | null;

  @ManyToOne(() => ContestParticipant, (p) => p.problemStatuses, { onDelete: "CASCADE" })
  @JoinColumn({ name: "participantId" })
  participant!: ContestParticipant;

  @ManyToOne(() => ContestProblem, { onDelete: "CASCADE" })
  @JoinColumn({ name: "problemId" })
  problem!: ContestProblem;
}
