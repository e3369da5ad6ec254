import { logger } from '../logging/logger.js';
import { EvaluationServiceClient } from '../clients/EvaluationServiceClient.js';
import { ContestRepository } from '../contest/ContestRepository.js';
import { NotificationQueue } from '../notifications/NotificationQueue.js';

export interface ReevaluationReport {
    readonly requested: number[];
    readonly failed: number[];
}

const log = logger.child({ component: 'ReevaluationService' });

/**
 * Invalidates stored results and asks the evaluation service to start over.
 */
export class ReevaluationService {
    constructor(
        private readonly repository: ContestRepository,
        private readonly evaluation: EvaluationServiceClient,
        private readonly notifications: NotificationQueue
    ) { }

    /** Resolves to null when the submission does not exist. */
    async reevaluateSubmission(submissionId: number): Promise<ReevaluationReport | null> {
        const found = await this.repository.invalidateSubmission(submissionId);
        if (!found) return null;
        return this.request([submissionId]);
    }

    async reevaluateUser(userId: number): Promise<ReevaluationReport> {
        return this.request(await this.repository.invalidateSubmissionsOfUser(userId));
    }

    async reevaluateTask(taskId: number): Promise<ReevaluationReport> {
        return this.request(await this.repository.invalidateSubmissionsOfTask(taskId));
    }

    private async request(submissionIds: number[]): Promise<ReevaluationReport> {
        const results = await Promise.allSettled(
            submissionIds.map(id => this.evaluation.newSubmission(id))
        );

        const failed: number[] = [];
        results.forEach((result, index) => {
            if (result.status === 'fulfilled') return;
            const submissionId = submissionIds[index];
            const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
            failed.push(submissionId);
            log.warn({ submissionId, reason }, 'Re-evaluation request failed');
            this.notifications.notify('Re-evaluation request failed', `Submission ${submissionId}: ${reason}`);
        });

        return { requested: submissionIds, failed };
    }
}
