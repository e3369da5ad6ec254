import { RpcRequestFrame, RpcResponseFrame } from './protocol.js';
import { ServiceAddress } from '../services/ServiceRegistry.js';

export interface TransportListener {
    onConnect(): void;
    onDisconnect(reason: string): void;
    onFrame(frame: RpcResponseFrame): void;
}

/**
 * A persistent connection to one backend shard. It matches nothing and
 * retries nothing: the channel on top owns call ids, timeouts and
 * reconnection.
 */
export interface Transport {
    readonly connected: boolean;
    connect(): void;
    /** Throws TransportError when the frame cannot be written. */
    send(frame: RpcRequestFrame): void;
    close(): void;
}

export type TransportFactory = (address: ServiceAddress, listener: TransportListener) => Transport;
