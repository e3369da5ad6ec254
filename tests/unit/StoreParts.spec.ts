/**
 * Unit Tests: storeParts
 *
 * @see libs/upload/storeParts.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { storeParts } from '../../libs/upload/storeParts.js';
import { UploadJoinCoordinator, UploadParts } from '../../libs/upload/UploadJoinCoordinator.js';
import { InMemoryContentStore } from '../helpers/inMemoryContentStore.js';

describe('storeParts', () => {
    let coordinator: UploadJoinCoordinator;
    let store: InMemoryContentStore;

    beforeEach(() => {
        coordinator = new UploadJoinCoordinator();
        store = new InMemoryContentStore();
    });

    it('should issue one store call per part and join the digests', () => {
        const successes: UploadParts[] = [];
        storeParts(coordinator, store, {
            input: { data: Buffer.from('1 2\n'), description: 'Testcase input' },
            output: { data: Buffer.from('3\n'), description: 'Testcase output' }
        }, {
            onSuccess: parts => { successes.push(parts); },
            onFailure: () => assert.fail('no part failed')
        });

        assert.deepStrictEqual(store.calls.map(call => [call.tag, call.description]), [
            ['input', 'Testcase input'],
            ['output', 'Testcase output']
        ]);

        store.completeAll();

        assert.deepStrictEqual(successes, [{
            input: InMemoryContentStore.digestOf(Buffer.from('1 2\n')),
            output: InMemoryContentStore.digestOf(Buffer.from('3\n'))
        }]);
    });

    it('should fail the whole upload when one part fails', () => {
        const errors: string[] = [];
        store.failTag('output', 'disk full');

        storeParts(coordinator, store, {
            input: { data: Buffer.from('in'), description: 'in' },
            output: { data: Buffer.from('out'), description: 'out' }
        }, {
            onSuccess: () => assert.fail('must not succeed'),
            onFailure: error => { errors.push(error); }
        });
        store.completeAll();

        assert.deepStrictEqual(errors, ['disk full']);
        assert.strictEqual(coordinator.pendingCount(), 0);
    });

    it('should complete in whatever order the store answers', () => {
        const successes: UploadParts[] = [];
        storeParts(coordinator, store, {
            input: { data: Buffer.from('a'), description: 'a' },
            output: { data: Buffer.from('b'), description: 'b' }
        }, {
            onSuccess: parts => { successes.push(parts); },
            onFailure: () => assert.fail('no part failed')
        });

        store.complete('output');
        assert.strictEqual(successes.length, 0);
        store.complete('input');

        assert.strictEqual(successes.length, 1);
    });
});
