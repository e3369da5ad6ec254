import { RpcChannel } from '../rpc/RpcChannel.js';

/**
 * Server-initiated calls to the evaluation service. These are trusted and
 * do not pass through the RPC gate.
 */
export class EvaluationServiceClient {
    constructor(private readonly channel: RpcChannel) { }

    /**
     * Queue a submission for (re-)evaluation.
     */
    async newSubmission(submissionId: number): Promise<void> {
        await this.channel.call('new_submission', { submission_id: submissionId });
    }
}
