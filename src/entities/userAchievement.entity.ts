import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  ManyToOne,
  JoinColumn,
  CreateDateColumn,
  Unique,
} from "typeorm";
import { User } from "./user.entity";
import { Achievement } from "./achievement.entity";

@Entity("user_achievements")
@Unique(["userId", "achievementId"])
export class UserAchievement {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  userId!: string;

  @Column()
  achievementId!: string;

  @CreateDateColumn()
  earnedAt!: Date;

  @ManyToOne(() => User, { onDelete: "CASCADE" })
  @JoinColumn({ name: "userId" })
  user!: User;

  @ManyToOne(() => Achievement, { onDelete: "CASCADE" })
  @JoinColumn({ name: "achievementId" })
  achievement!: Achievement;
}
