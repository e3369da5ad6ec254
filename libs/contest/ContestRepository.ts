import { QuestionSource } from '../notifications/poll.js';

export interface TaskRef {
    readonly id: number;
    readonly name: string;
    readonly contestId: number;
}

export interface NewTestcase {
    readonly input: string;
    readonly output: string;
    readonly isPublic: boolean;
}

/**
 * The persistence operations the coordination layer commits. Contest
 * editing and everything else about the entity model lives elsewhere.
 */
export interface ContestRepository extends QuestionSource {
    findTask(taskId: number): Promise<TaskRef | null>;
    setTaskStatement(taskId: number, digest: string): Promise<void>;
    addAttachment(taskId: number, digest: string, filename: string): Promise<void>;
    addManager(taskId: number, digest: string, filename: string): Promise<void>;
    /** Numbered after the task's existing testcases. Returns the new number. */
    addTestcase(taskId: number, testcase: NewTestcase): Promise<number>;
    /** Clears compilation and evaluation results. Returns false if unknown. */
    invalidateSubmission(submissionId: number): Promise<boolean>;
    /** Returns the ids of the invalidated submissions. */
    invalidateSubmissionsOfUser(userId: number): Promise<number[]>;
    invalidateSubmissionsOfTask(taskId: number): Promise<number[]>;
}
