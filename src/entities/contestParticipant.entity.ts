import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Unique,
} from "typeorm";
import { Contest } from "./contest.entity";
import { User } from "./user.entity";
import { ContestProblemSolveStatus } from "./contestProblemSolveStatus.entity";

@Entity("contest_participants")
@Unique(["contestId", "userId"])
export class ContestParticipant {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  contestId!: string;

  @Column()
  userId!: string;

  @Column({ type: "int", default: 0 })
  totalScore!: number;

  @Column({ type: "int", default: 0 })
  problemsSolved!: number;

  // Minutes from contest start to the latest submission of any verdict
  @Column({ type: "int", default: 0 })
  totalTime!: number;

  @Column({ type: "int", default: 0 })
  penaltyTime!: number;

  // Cached projection, refreshed by the ranking pass
  @Column({ type: "int", nullable: true })
  rank!: number | null;

  @Column({ type: Date, nullable: true })
  lastSubmissionTime!: Date | null;

  // Copied from the registration; secondary tie-break key
  @Column({ type: Date })
  registeredAt!: Date;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @ManyToOne(() => Contest, { onDelete: "CASCADE" })
  @JoinColumn({ name: "contestId" })
  contest!: Contest;

  @ManyToOne(() => User, { onDelete: "CASCADE" })
  @JoinColumn({ name: "userId" })
  user!: User;

  @OneToMany(() => ContestProblemSolveStatus, (s) => s.participant)
  problemStatuses!: ContestProblemSolveStatus[];
}
