import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Unique } from "typeorm";
import { User } from "./user.entity";

@Entity("user_activities")
@Unique(["userId", "date"])
export class UserActivity {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  userId!: string;

  // UTC calendar day, YYYY-MM-DD
  @Column({ type: "date" })
  date!: string;

  @Column({ type: "int", default: 0 })
  problemsSolved!: number;

  @Column({ type: "int", default: 0 })
  submissionsCount!: number;

  @ManyToOne(() => User, { onDelete: "CASCADE" })
  @JoinColumn({ name: "userId" })
  user!: User;
}
