/**
 * RPC methods the browser may reach through the generic proxy endpoint.
 *
 * Closed table: a service or method missing here is unreachable from
 * untrusted callers. Adding a backend method to the admin UI means adding
 * an entry here first.
 */

export interface AllowListEntry {
    /** Shards the browser may address; omitted means every shard. */
    readonly shards?: readonly number[];
    readonly methods: readonly string[];
}

export const RPC_ALLOW_LIST = {
    EvaluationService: {
        shards: [0],
        methods: ['submissions_status', 'queue_status', 'workers_status']
    },
    LogService: {
        shards: [0],
        methods: ['last_messages']
    },
    ResourceService: {
        methods: ['get_resources', 'kill_service']
    }
} as const satisfies Record<string, AllowListEntry>;

