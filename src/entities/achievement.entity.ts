import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn } from "typeorm";

export enum AchievementType {
  FIRST_SOLVE = "FIRST_SOLVE",
  SOLVE_10 = "SOLVE_10",
  SOLVE_50 = "SOLVE_50",
  SOLVE_100 = "SOLVE_100",
  SOLVE_STREAK_7 = "SOLVE_STREAK_7",
  SOLVE_STREAK_30 = "SOLVE_STREAK_30",
  ALL_EASY = "ALL_EASY",
  FIRST_CONTEST = "FIRST_CONTEST",
}

@Entity("achievements")
export class Achievement {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column()
  name!: string;

  @Column("text")
  description!: string;

  @Column({ type: "simple-enum", enum: AchievementType, unique: true })
  achievementType!: AchievementType;

  @Column({ default: "" })
  icon!: string;

  @CreateDateColumn()
  createdAt!: Date;
}
