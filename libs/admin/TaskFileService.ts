/**
 * Task file actions: statements, attachments, managers and testcases.
 *
 * Each action stores its file(s) through an upload session and commits the
 * resulting digests only from the session's success action. Failures are
 * surfaced to the admin UI as notifications.
 */

import { logger } from '../logging/logger.js';
import { ContentStore } from '../clients/FileStorageClient.js';
import { ContestRepository, TaskRef } from '../contest/ContestRepository.js';
import { NotificationQueue } from '../notifications/NotificationQueue.js';
import { UploadJoinCoordinator, UploadParts } from '../upload/UploadJoinCoordinator.js';
import { UploadPart, storeParts } from '../upload/storeParts.js';

export interface UploadedFile {
    readonly filename: string;
    readonly body: Buffer;
}

export type ActionResult =
    | { readonly ok: true }
    | { readonly ok: false; readonly error: string };

export const TASK_NOT_FOUND: ActionResult = Object.freeze({ ok: false, error: 'not-found' });

export interface TaskFileServiceDeps {
    readonly repository: ContestRepository;
    readonly store: ContentStore;
    readonly coordinator: UploadJoinCoordinator;
    readonly notifications: NotificationQueue;
}

const log = logger.child({ component: 'TaskFileService' });

export class TaskFileService {
    constructor(private readonly deps: TaskFileServiceDeps) { }

    async addStatement(taskId: number, file: UploadedFile): Promise<ActionResult> {
        const task = await this.deps.repository.findTask(taskId);
        if (!task) return TASK_NOT_FOUND;

        if (!file.filename.endsWith('.pdf')) {
            const reason = 'The task statement must be a .pdf file.';
            this.deps.notifications.notify('Invalid task statement', reason);
            return { ok: false, error: reason };
        }

        return this.upload(
            task,
            'Task statement',
            { statement: { data: file.body, description: `Task statement for ${task.name}` } },
            parts => this.deps.repository.setTaskStatement(task.id, parts.statement)
        );
    }

    async addAttachment(taskId: number, file: UploadedFile): Promise<ActionResult> {
        const task = await this.deps.repository.findTask(taskId);
        if (!task) return TASK_NOT_FOUND;

        return this.upload(
            task,
            'Attachment',
            { attachment: { data: file.body, description: `Task attachment for ${task.name}` } },
            parts => this.deps.repository.addAttachment(task.id, parts.attachment, file.filename)
        );
    }

    async addManager(taskId: number, file: UploadedFile): Promise<ActionResult> {
        const task = await this.deps.repository.findTask(taskId);
        if (!task) return TASK_NOT_FOUND;

        return this.upload(
            task,
            'Manager',
            { manager: { data: file.body, description: `Task manager for ${task.name}` } },
            parts => this.deps.repository.addManager(task.id, parts.manager, file.filename)
        );
    }

    /**
     * Stores input and output concurrently; the testcase row is written
     * only once both digests are known.
     */
    async addTestcase(taskId: number, input: Buffer, output: Buffer, isPublic: boolean): Promise<ActionResult> {
        const task = await this.deps.repository.findTask(taskId);
        if (!task) return TASK_NOT_FOUND;

        return this.upload(
            task,
            'Testcase',
            {
                input: { data: input, description: `Testcase input for task ${task.name}` },
                output: { data: output, description: `Testcase output for task ${task.name}` }
            },
            async parts => {
                const num = await this.deps.repository.addTestcase(task.id, {
                    input: parts.input,
                    output: parts.output,
                    isPublic
                });
                log.info({ taskId: task.id, num }, 'Testcase added');
            }
        );
    }

    private upload(
        task: TaskRef,
        label: string,
        parts: Readonly<Record<string, UploadPart>>,
        commit: (parts: UploadParts) => Promise<void>
    ): Promise<ActionResult> {
        return new Promise(resolve => {
            storeParts(this.deps.coordinator, this.deps.store, parts, {
                onSuccess: async stored => {
                    try {
                        await commit(stored);
                        resolve({ ok: true });
                    } catch (error) {
                        const reason = error instanceof Error ? error.message : String(error);
                        log.error({ taskId: task.id, label, error }, 'Commit after upload failed');
                        this.deps.notifications.notify(`${label} commit failed`, reason);
                        resolve({ ok: false, error: reason });
                    }
                },
                onFailure: error => {
                    this.deps.notifications.notify(`${label} storage failed`, error);
                    resolve({ ok: false, error });
                }
            });
        });
    }
}
