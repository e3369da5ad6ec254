import { AddressingError, UnknownServiceError } from '../errors/coordinationErrors.js';
import { ServiceCoordinate, serviceCoord } from './serviceCoord.js';

export interface ServiceAddress {
    readonly host: string;
    readonly port: number;
}

export type ServiceTable = Readonly<Record<string, readonly ServiceAddress[]>>;

/**
 * Resolves (service name, shard) coordinates to network endpoints.
 *
 * Built once from the service configuration at startup; never mutated.
 */
export class ServiceRegistry {
    private readonly table: ReadonlyMap<string, readonly ServiceAddress[]>;

    constructor(services: ServiceTable) {
        const entries = Object.entries(services)
            .filter(([, shards]) => shards.length > 0)
            .map(([name, shards]): [string, readonly ServiceAddress[]] => [
                name,
                Object.freeze(shards.map(addr => Object.freeze({ host: addr.host, port: addr.port })))
            ]);
        this.table = new Map(entries);
    }

    shardCount(serviceName: string): number {
        return this.shardsOf(serviceName).length;
    }

    address(coord: ServiceCoordinate): ServiceAddress {
        const shards = this.shardsOf(coord.name);
        const addr = shards[coord.shard];
        if (!addr) {
            throw new AddressingError(
                `No shard ${coord.shard} for ${coord.name} (configured: ${shards.length})`
            );
        }
        return addr;
    }

    /**
     * Every shard coordinate of a service, in shard order.
     */
    coordsOf(serviceName: string): ServiceCoordinate[] {
        return this.shardsOf(serviceName).map((_, shard) => serviceCoord(serviceName, shard));
    }

    serviceNames(): string[] {
        return [...this.table.keys()];
    }

    private shardsOf(serviceName: string): readonly ServiceAddress[] {
        const shards = this.table.get(serviceName);
        if (!shards) {
            throw new UnknownServiceError(serviceName);
        }
        return shards;
    }
}
