/**
 * Unit Tests: ReevaluationService
 *
 * @see libs/admin/ReevaluationService.ts
 * @see libs/clients/EvaluationServiceClient.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { ReevaluationService } from '../../libs/admin/ReevaluationService.js';
import { EvaluationServiceClient } from '../../libs/clients/EvaluationServiceClient.js';
import { NotificationQueue } from '../../libs/notifications/NotificationQueue.js';
import { RpcChannel } from '../../libs/rpc/RpcChannel.js';
import { ServiceRegistry } from '../../libs/services/ServiceRegistry.js';
import { serviceCoord } from '../../libs/services/serviceCoord.js';
import { InMemoryContestRepository } from '../helpers/inMemoryContestRepository.js';
import { fakeTransports, sequentialIds, settle } from '../helpers/fakeTransport.js';

describe('ReevaluationService', () => {
    let repository: InMemoryContestRepository;
    let notifications: NotificationQueue;
    let channel: RpcChannel;
    let fakes: ReturnType<typeof fakeTransports>;
    let service: ReevaluationService;

    beforeEach(() => {
        repository = new InMemoryContestRepository();
        repository.addSubmission(1, 10, 3);
        repository.addSubmission(2, 11, 3);
        repository.addSubmission(5, 10, 4);
        notifications = new NotificationQueue(() => 42);

        fakes = fakeTransports();
        channel = new RpcChannel(
            serviceCoord('EvaluationService', 0),
            new ServiceRegistry({ EvaluationService: [{ host: 'eval.local', port: 25000 }] }),
            { transportFactory: fakes.factory, callIdFactory: sequentialIds() }
        );
        channel.connect();
        service = new ReevaluationService(repository, new EvaluationServiceClient(channel), notifications);
    });

    afterEach(() => channel.close());

    it('should invalidate one submission and ask for its evaluation', async () => {
        const pending = service.reevaluateSubmission(2);
        await settle();

        const frame = fakes.only().lastSent();
        assert.strictEqual(frame.method, 'new_submission');
        assert.deepStrictEqual(frame.args, { submission_id: 2 });
        fakes.only().answer(frame.id, null);

        assert.deepStrictEqual(await pending, { requested: [2], failed: [] });
        assert.strictEqual(repository.submissions.find(s => s.id === 2)?.invalidations, 1);
    });

    it('should resolve to null for an unknown submission', async () => {
        assert.strictEqual(await service.reevaluateSubmission(99), null);
        assert.strictEqual(fakes.only().sent.length, 0);
    });

    it('should re-evaluate every submission of a task', async () => {
        const pending = service.reevaluateTask(3);
        await settle();

        const transport = fakes.only();
        assert.deepStrictEqual(transport.sent.map(frame => frame.args), [{ submission_id: 1 }, { submission_id: 2 }]);
        for (const frame of transport.sent) transport.answer(frame.id, null);

        assert.deepStrictEqual(await pending, { requested: [1, 2], failed: [] });
    });

    it('should notify about each request the evaluation service refuses', async () => {
        const pending = service.reevaluateUser(10);
        await settle();

        fakes.only().answer('call-1', null);
        fakes.only().fail('call-2', 'queue full');

        assert.deepStrictEqual(await pending, { requested: [1, 5], failed: [5] });
        assert.deepStrictEqual(notifications.drainAll(), [
            { timestamp: 42, subject: 'Re-evaluation request failed', body: 'Submission 5: queue full' }
        ]);
    });

    it('should report every request as failed while the evaluation service is down', async () => {
        fakes.only().drop();

        const report = await service.reevaluateUser(10);

        assert.deepStrictEqual(report, { requested: [1, 5], failed: [1, 5] });
        assert.strictEqual(notifications.size(), 2);
    });
});
