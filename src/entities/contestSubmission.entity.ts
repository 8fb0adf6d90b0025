import {
    Entity,
    PrimaryGeneratedColumn,
    Column,
    ManyToOne,
    JoinColumn,
    CreateDateColumn,
    Index,
} from "typeorm";
import { Contest } from "./contest.entity";
import { User } from "./user.entity";
import { ContestProblem } from "./contestProblem.entity";
import { Language, Verdict } from "./submission.entity";

@Entity("contest_submissions")
@Index(["contestId", "userId", "submittedAt"])
export class ContestSubmission {
    @PrimaryGeneratedColumn("uuid")
    id!: string;

    @Column()
    contestId!: string;

    @Column()
    userId!: string;

    @Column()
    problemId!: string;

    @Column("text")
    code!: string;

    @Column({ type: "simple-enum", enum: Language })
    language!: Language;

    @Column({ type: "simple-enum", enum: Verdict, default: Verdict.PENDING })
    verdict!: Verdict;

    @Column({ type: "int", nullable: true })
    executionTime!: number | null;

    @Column({ type: "int", nullable: true })
    memoryUsed!: number | null;

    // Running counters only; contest judging keeps no per-case rows
    @Column({ type: "int", default: 0 })
    testCasesPassed!: number;

    @Column({ type: "int", default: 0 })
    totalTestCases!: number;

    @Column({ type: "text", default: "" })
    errorMessage!: string;

    @Column({ type: "text", default: "" })
    compilationOutput!: string;

    @CreateDateColumn()
    submittedAt!: Date;

    @ManyToOne(() => Contest, { onDelete: "CASCADE" })
    @JoinColumn({ name: "contestId" })
    contest!: Contest;

    @ManyToOne(() => User, { onDelete: "CASCADE" })
    @JoinColumn({ name: "userId" })
    user!: User;

    @ManyToOne(() => ContestProblem, { onDelete: "CASCADE" })
    @JoinColumn({ name: "problemId" })
    problem!: ContestProblem;
}
