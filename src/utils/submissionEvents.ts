import { EventEmitter } from "events";
import { Verdict } from "../entities/submission.entity";

export interface SubmissionJudgedEvent {
    submissionId: string;
    userId: string;
    problemId: string;
    verdict: Verdict;
    submittedAt: Date;
}

type SubmissionEventMap = {
    "submission.judged": [SubmissionJudgedEvent];
};

/**
 * In-process bus for practice submissions that finished judging. Listeners run
 * after the judging transaction has committed.
 */
class SubmissionEvents extends EventEmitter {
    emitJudged(event: SubmissionJudgedEvent): boolean {
        return this.emit("submission.judged", event);
    }

    onJudged(listener: (...args: SubmissionEventMap["submission.judged"]) => void): this {
        return this.on("submission.judged", listener);
    }

    offJudged(listener: (...args: SubmissionEventMap["submission.judged"]) => void): this {
        return this.off("submission.judged", listener);
    }
}

export const submissionEvents = new SubmissionEvents();
