import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
} from "typeorm";

export enum UserRole {
  SUPERUSER = "SUPERUSER",
  MANAGER = "MANAGER",
  USER = "USER",
}

@Entity("users")
export class User {
  @PrimaryGeneratedColumn("uuid")
  id!: string;

  @Column({ unique: true })
  email!: string;

  @Column({ unique: true })
  username!: string;

  @Column({ type: "simple-enum", enum: UserRole, default: UserRole.USER })
  role!: UserRole;

  @Column({ default: false })
  isBanned!: boolean;

  // 📊 Solve counters, bumped only on a user's first acceptance of a problem
  @Column({ type: "int", default: 0 })
  totalSolved!: number;

  @Column({ type: "int", default: 0 })
  easySolved!: number;

  @Column({ type: "int", default: 0 })
  mediumSolved!: number;

  @Column({ type: "int", default: 0 })
  hardSolved!: number;

  @CreateDateColumn()
  dateJoined!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
