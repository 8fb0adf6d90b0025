import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  OneToMany,
  JoinColumn,
  CreateDateColumn,
} from "typeorm";
import { User } from "./user.entity";
import { ContestProblem } from "./contestProblem.entity";

export enum ScoringType {
  STANDARD = "STANDARD",
  ICPC = "ICPC",
}

export enum ContestStatus {
  NOT_STARTED = "NOT_STARTED",
  ACTIVE = "ACTIVE",
  ENDED = "ENDED",
}

@Entity("contests")
export class Contest {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  title!: string;

  @Column({ unique: true })
  slug!: string;

  @Column({ type: "text", default: "" })
  description!: string;

  @Column({ type: Date })
  startTime!: Date;

  @Column({ type: Date })
  endTime!: Date;

  // 🧑‍💼 Manager assigned to run this contest (may see every submission)
  @Column({ type: "varchar", nullable: true })
  managerId!: string | null;

  @ManyToOne(() => User, { onDelete: "SET NULL", nullable: true })
  @JoinColumn({ name: "managerId" })
  manager!: User | null;

  @Column({ type: "simple-enum", enum: ScoringType, default: ScoringType.STANDARD })
  scoringType!: ScoringType;

  @Column({ default: true })
  isActive!: boolean;

  @OneToMany(() => ContestProblem, (cp) => cp.contest)
  contestProblems!: ContestProblem[];

  @CreateDateColumn()
  createdAt!: Date;
}
