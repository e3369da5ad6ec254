import { logger } from '../logging/logger.js';
import { AuthorizationDeniedError } from '../errors/coordinationErrors.js';
import { RpcGate, defaultRpcGate } from '../auth/authorizeRpc.js';
import { ServiceCoordinate, formatCoord } from '../services/serviceCoord.js';
import { RpcArguments } from './protocol.js';
import { RpcOutcome } from './RpcChannel.js';
import { ServiceMesh } from './ServiceMesh.js';

export type ProxyOutcome =
    | { readonly status: 'denied'; readonly error: AuthorizationDeniedError }
    | { readonly status: 'completed'; readonly outcome: RpcOutcome<undefined> };

/**
 * Forwards browser-originated RPCs to backend shards.
 *
 * The gate runs before any channel is touched: a denied call never opens a
 * connection or reaches the wire.
 */
export class RpcProxy {
    constructor(
        private readonly mesh: ServiceMesh,
        private readonly gate: RpcGate = defaultRpcGate
    ) { }

    forward(coord: ServiceCoordinate, method: string, args: RpcArguments): Promise<ProxyOutcome> {
        if (!this.gate.allow(coord, method, args)) {
            logger.warn({ service: formatCoord(coord), method, decision: 'DENY' }, 'Untrusted RPC rejected');
            return Promise.resolve({ status: 'denied', error: new AuthorizationDeniedError(formatCoord(coord), method) });
        }

        // Unconfigured shards are answered here so browser input cannot grow the mesh.
        try {
            this.mesh.registry.address(coord);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            return Promise.resolve({
                status: 'completed',
                outcome: { ok: false, error: reason, kind: 'addressing', tag: undefined }
            });
        }

        logger.debug({ service: formatCoord(coord), method, decision: 'ALLOW' }, 'Untrusted RPC forwarded');
        const channel = this.mesh.connectTo(coord);
        return new Promise(resolve => {
            channel.invoke(method, args, outcome => resolve({ status: 'completed', outcome }), undefined);
        });
    }
}
