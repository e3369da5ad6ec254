/**
 * PostgreSQL implementation of the contest repository.
 * Parameterized statements with explicit column lists only.
 */

import { Queryable } from '../db/index.js';
import { UnansweredQuestion } from '../notifications/poll.js';
import { ContestRepository, NewTestcase, TaskRef } from './ContestRepository.js';

// Type aliases, not interfaces: pg row types need an implicit index signature.
type TaskRow = {
    id: number;
    name: string;
    contest_id: number;
};

type QuestionRow = {
    question_timestamp: number;
    subject: string;
    text: string;
};

const INVALIDATE_SUBMISSIONS = `
    WITH dropped AS (
        DELETE FROM evaluations WHERE submission_id = ANY($1::int[])
    ), dropped_executables AS (
        DELETE FROM executables WHERE submission_id = ANY($1::int[])
    )
    UPDATE submissions
    SET compilation_outcome = NULL,
        compilation_text = NULL,
        compilation_tries = 0,
        evaluation_outcome = NULL,
        evaluation_tries = 0
    WHERE id = ANY($1::int[])
    RETURNING id`;

export class PgContestRepository implements ContestRepository {
    constructor(private readonly db: Queryable) { }

    async findTask(taskId: number): Promise<TaskRef | null> {
        const result = await this.db.query<TaskRow>(
            `SELECT id, name, contest_id FROM tasks WHERE id = $1 LIMIT 1`,
            [taskId]
        );
        const row = result.rows[0];
        return row ? { id: row.id, name: row.name, contestId: row.contest_id } : null;
    }

    async setTaskStatement(taskId: number, digest: string): Promise<void> {
        await this.db.query(`UPDATE tasks SET statement = $2 WHERE id = $1`, [taskId, digest]);
    }

    async addAttachment(taskId: number, digest: string, filename: string): Promise<void> {
        await this.db.query(
            `INSERT INTO attachments (task_id, digest, filename) VALUES ($1, $2, $3)`,
            [taskId, digest, filename]
        );
    }

    async addManager(taskId: number, digest: string, filename: string): Promise<void> {
        await this.db.query(
            `INSERT INTO managers (task_id, digest, filename) VALUES ($1, $2, $3)`,
            [taskId, digest, filename]
        );
    }

    async addTestcase(taskId: number, testcase: NewTestcase): Promise<number> {
        const result = await this.db.query<{ num: number }>(
            `INSERT INTO testcases (task_id, num, input, output, public)
             SELECT $1, COUNT(*), $2, $3, $4 FROM testcases WHERE task_id = $1
             RETURNING num`,
            [taskId, testcase.input, testcase.output, testcase.isPublic]
        );
        const row = result.rows[0];
        if (!row) {
            throw new Error(`Testcase insert for task ${taskId} returned no row`);
        }
        return Number(row.num);
    }

    async invalidateSubmission(submissionId: number): Promise<boolean> {
        const ids = await this.invalidate([submissionId]);
        return ids.length > 0;
    }

    async invalidateSubmissionsOfUser(userId: number): Promise<number[]> {
        const result = await this.db.query<{ id: number }>(
            `SELECT id FROM submissions WHERE user_id = $1 ORDER BY id`,
            [userId]
        );
        return this.invalidate(result.rows.map(row => row.id));
    }

    async invalidateSubmissionsOfTask(taskId: number): Promise<number[]> {
        const result = await this.db.query<{ id: number }>(
            `SELECT id FROM submissions WHERE task_id = $1 ORDER BY id`,
            [taskId]
        );
        return this.invalidate(result.rows.map(row => row.id));
    }

    async unansweredQuestionsSince(since: number): Promise<UnansweredQuestion[]> {
        const result = await this.db.query<QuestionRow>(
            `SELECT question_timestamp, subject, text
             FROM questions
             WHERE reply_timestamp IS NULL AND question_timestamp > $1
             ORDER BY question_timestamp, id`,
            [since]
        );
        return result.rows.map(row => ({
            timestamp: Number(row.question_timestamp),
            subject: row.subject,
            text: row.text
        }));
    }

    private async invalidate(submissionIds: number[]): Promise<number[]> {
        if (submissionIds.length === 0) return [];
        const result = await this.db.query<{ id: number }>(INVALIDATE_SUBMISSIONS, [submissionIds]);
        return result.rows.map(row => row.id).sort((a, b) => a - b);
    }
}
