import { GuardRule } from '../config-guard.js';

function isPositiveInteger(value: string | undefined): boolean {
    return value === undefined || /^[1-9][0-9]*$/.test(value);
}

function isShardIndex(value: string | undefined): boolean {
    return value === undefined || /^(0|[1-9][0-9]*)$/.test(value);
}

/**
 * Admin front end configuration guards.
 */
export const ADMIN_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'ADMIN_LISTEN_PORT' },
    { type: 'required', name: 'SERVICES_CONFIG_PATH' },
    {
        type: 'assert',
        check: () => isPositiveInteger(process.env.ADMIN_LISTEN_PORT),
        message: 'ADMIN_LISTEN_PORT must be a positive integer'
    },
    {
        type: 'assert',
        check: () => isPositiveInteger(process.env.RPC_TIMEOUT_MS),
        message: 'RPC_TIMEOUT_MS must be a positive integer when set'
    },
    {
        type: 'assert',
        check: () => isPositiveInteger(process.env.RPC_RECONNECT_DELAY_MS),
        message: 'RPC_RECONNECT_DELAY_MS must be a positive integer when set'
    },
    {
        type: 'assert',
        check: () => isShardIndex(process.env.ADMIN_SHARD),
        message: 'ADMIN_SHARD must be a non-negative integer when set'
    }
];

export interface AdminSettings {
    readonly listenPort: number;
    readonly servicesConfigPath: string;
    readonly rpcTimeoutMs?: number;
    readonly reconnectDelayMs?: number;
    readonly shard: number;
}

function optionalInt(value: string | undefined): number | undefined {
    return value === undefined ? undefined : Number.parseInt(value, 10);
}

/**
 * Reads settings after ADMIN_CONFIG_GUARDS have passed.
 */
export function readAdminSettings(env: NodeJS.ProcessEnv = process.env): AdminSettings {
    return {
        listenPort: Number.parseInt(env.ADMIN_LISTEN_PORT ?? '', 10),
        servicesConfigPath: env.SERVICES_CONFIG_PATH ?? '',
        rpcTimeoutMs: optionalInt(env.RPC_TIMEOUT_MS),
        reconnectDelayMs: optionalInt(env.RPC_RECONNECT_DELAY_MS),
        shard: optionalInt(env.ADMIN_SHARD) ?? 0
    };
}
