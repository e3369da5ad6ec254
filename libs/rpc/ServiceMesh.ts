import { logger } from '../logging/logger.js';
import { ServiceCoordinate, coordKey } from '../services/serviceCoord.js';
import { ServiceRegistry } from '../services/ServiceRegistry.js';
import { RpcChannel, RpcChannelOptions } from './RpcChannel.js';

/**
 * Owns one channel per backend coordinate for the lifetime of the admin
 * service instance.
 */
export class ServiceMesh {
    private readonly channels = new Map<string, RpcChannel>();

    constructor(
        readonly registry: ServiceRegistry,
        private readonly channelOptions: RpcChannelOptions = {}
    ) { }

    /**
     * The channel for a coordinate, created and connected on first use.
     */
    connectTo(coord: ServiceCoordinate): RpcChannel {
        const key = coordKey(coord);
        const existing = this.channels.get(key);
        if (existing) return existing;

        const channel = new RpcChannel(coord, this.registry, this.channelOptions);
        this.channels.set(key, channel);
        channel.connect();
        logger.debug({ service: key }, 'Channel opened');
        return channel;
    }

    /**
     * Channels to every configured shard of a service.
     */
    connectToAll(serviceName: string): RpcChannel[] {
        return this.registry.coordsOf(serviceName).map(coord => this.connectTo(coord));
    }

    closeAll(): void {
        for (const channel of this.channels.values()) {
            channel.close();
        }
        this.channels.clear();
    }
}
