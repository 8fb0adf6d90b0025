import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  Unique,
} from "typeorm";
import { Contest } from "./contest.entity";
import { User } from "./user.entity";

@Entity("contest_registrations")
@Unique(["contestId", "userId"])
export class ContestRegistration {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  contestId!: string;

  @Column()
  userId!: string;

  @CreateDateColumn()
  registeredAt!: Date;

  @ManyToOne(() => Contest, { onDelete: "CASCADE" })
  @JoinColumn({ name: "contestId" })
  contest!: Contest;

  @ManyToOne(() => User, { onDelete: "CASCADE" })
  @JoinColumn({ name: "userId" })
  user!: User;
}
