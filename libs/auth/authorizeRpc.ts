import { ServiceCoordinate, isValidShard } from '../services/serviceCoord.js';
import { RpcArguments } from '../rpc/protocol.js';
import { AllowListEntry, RPC_ALLOW_LIST } from './rpcAllowList.js';

export interface RpcGate {
    allow(coord: ServiceCoordinate, method: string, args: RpcArguments): boolean;
}

interface CompiledEntry {
    readonly shards: ReadonlySet<number> | null;
    readonly methods: ReadonlySet<string>;
}

/**
 * Builds the deny-by-default decision function from a static table.
 *
 * The lookup goes through a Map, so names such as "constructor" or
 * "__proto__" never resolve to inherited object members.
 */
export function createRpcGate(table: Readonly<Record<string, AllowListEntry>>): RpcGate {
    const compiled = new Map<string, CompiledEntry>(
        Object.entries(table).map(([service, entry]): [string, CompiledEntry] => [
            service,
            {
                shards: entry.shards ? new Set(entry.shards) : null,
                methods: new Set(entry.methods)
            }
        ])
    );

    return {
        // Arguments are accepted for future per-argument policy; none applies today.
        allow(coord, method, _args) {
            if (typeof coord?.name !== 'string' || typeof method !== 'string') return false;
            if (typeof coord.shard !== 'number' || !isValidShard(coord.shard)) return false;

            const entry = compiled.get(coord.name);
            if (!entry) return false;
            if (entry.shards && !entry.shards.has(coord.shard)) return false;
            return entry.methods.has(method);
        }
    };
}

export const defaultRpcGate: RpcGate = createRpcGate(RPC_ALLOW_LIST);

export function allowRpc(coord: ServiceCoordinate, method: string, args: RpcArguments = {}): boolean {
    return defaultRpcGate.allow(coord, method, args);
}
