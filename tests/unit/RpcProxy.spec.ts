/**
 * Unit Tests: RpcProxy and ServiceMesh
 *
 * @see libs/rpc/RpcProxy.ts
 * @see libs/rpc/ServiceMesh.ts
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { RpcProxy } from '../../libs/rpc/RpcProxy.js';
import { ServiceMesh } from '../../libs/rpc/ServiceMesh.js';
import { ServiceRegistry } from '../../libs/services/ServiceRegistry.js';
import { serviceCoord } from '../../libs/services/serviceCoord.js';
import { AuthorizationDeniedError } from '../../libs/errors/coordinationErrors.js';
import { fakeTransports, sequentialIds, settle } from '../helpers/fakeTransport.js';

const registry = new ServiceRegistry({
    EvaluationService: [{ host: 'eval.local', port: 25000 }],
    ResourceService: [
        { host: 'ws1.local', port: 28000 },
        { host: 'ws2.local', port: 28000 }
    ]
});

describe('ServiceMesh', () => {
    let fakes: ReturnType<typeof fakeTransports>;
    let mesh: ServiceMesh;

    beforeEach(() => {
        fakes = fakeTransports();
        mesh = new ServiceMesh(registry, { transportFactory: fakes.factory });
    });

    afterEach(() => mesh.closeAll());

    it('should open one channel per coordinate', () => {
        const first = mesh.connectTo(serviceCoord('EvaluationService', 0));
        const again = mesh.connectTo(serviceCoord('EvaluationService', 0));

        assert.strictEqual(first, again);
        assert.strictEqual(fakes.transports.length, 1);
        assert.strictEqual(first.connected, true);
    });

    it('should connect to every shard of a service', () => {
        const channels = mesh.connectToAll('ResourceService');

        assert.deepStrictEqual(channels.map(channel => channel.coord.shard), [0, 1]);
        assert.deepStrictEqual(fakes.transports.map(t => t.address.host), ['ws1.local', 'ws2.local']);
    });

    it('should close every transport', () => {
        mesh.connectToAll('ResourceService');
        mesh.closeAll();

        assert.ok(fakes.transports.every(t => t.closed));
    });
});

describe('RpcProxy', () => {
    let fakes: ReturnType<typeof fakeTransports>;
    let mesh: ServiceMesh;
    let proxy: RpcProxy;

    beforeEach(() => {
        fakes = fakeTransports();
        mesh = new ServiceMesh(registry, { transportFactory: fakes.factory, callIdFactory: sequentialIds() });
        proxy = new RpcProxy(mesh);
    });

    afterEach(() => mesh.closeAll());

    it('should deny a disallowed method without opening a channel', async () => {
        const forwarded = await proxy.forward(serviceCoord('EvaluationService', 0), 'shutdown', {});

        assert.strictEqual(forwarded.status, 'denied');
        assert.ok(forwarded.status === 'denied' && forwarded.error instanceof AuthorizationDeniedError);
        assert.strictEqual(forwarded.error.statusCode, 403);
        assert.strictEqual(fakes.transports.length, 0);
    });

    it('should forward an allowed call and return the answer', async () => {
        const pending = proxy.forward(serviceCoord('ResourceService', 1), 'get_resources', { last_time: 10 });
        await settle();

        const transport = fakes.only();
        assert.strictEqual(transport.address.host, 'ws2.local');
        assert.deepStrictEqual(transport.lastSent(), {
            id: 'call-1',
            service: 'ResourceService',
            shard: 1,
            method: 'get_resources',
            args: { last_time: 10 }
        });

        transport.answer('call-1', { cpu: 3 });
        assert.deepStrictEqual(await pending, {
            status: 'completed',
            outcome: { ok: true, result: { cpu: 3 }, tag: undefined }
        });
    });

    it('should answer an unconfigured shard without growing the mesh', async () => {
        const forwarded = await proxy.forward(serviceCoord('ResourceService', 9), 'get_resources', {});

        assert.deepStrictEqual(forwarded, {
            status: 'completed',
            outcome: {
                ok: false,
                error: 'No shard 9 for ResourceService (configured: 2)',
                kind: 'addressing',
                tag: undefined
            }
        });
        assert.strictEqual(fakes.transports.length, 0);
    });

    it('should honour a custom gate', async () => {
        const strict = new RpcProxy(mesh, { allow: () => false });
        const forwarded = await strict.forward(serviceCoord('ResourceService', 0), 'get_resources', {});

        assert.strictEqual(forwarded.status, 'denied');
    });
});
