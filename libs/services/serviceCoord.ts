import { AddressingError } from '../errors/coordinationErrors.js';

/**
 * Logical address of one shard of one named backend service.
 */
export interface ServiceCoordinate {
    readonly name: string;
    readonly shard: number;
}

export function isValidShard(shard: number): boolean {
    return Number.isInteger(shard) && shard >= 0;
}

export function serviceCoord(name: string, shard: number): ServiceCoordinate {
    if (name.length === 0) {
        throw new AddressingError('Service name must not be empty');
    }
    if (!isValidShard(shard)) {
        throw new AddressingError(`Invalid shard index ${shard} for service ${name}`);
    }
    return Object.freeze({ name, shard });
}

/** Stable map key. */
export function coordKey(coord: ServiceCoordinate): string {
    return `${coord.name}#${coord.shard}`;
}

export function formatCoord(coord: ServiceCoordinate): string {
    return `${coord.name},${coord.shard}`;
}
