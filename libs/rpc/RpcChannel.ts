/**
 * RPC Channel
 *
 * One reconnecting logical connection to one backend shard. Calls are
 * issued without blocking; each call's continuation runs exactly once, on
 * a later turn of the event loop, with either the result or a failure.
 *
 * Disconnected policy: fail fast. A call issued while the transport is down
 * is reported as a transport failure immediately instead of being queued.
 */

import crypto from 'node:crypto';
import { Logger, getServiceLogger } from '../logging/logger.js';
import {
    AddressingError,
    CoordinationError,
    RemoteCallError,
    TransportError
} from '../errors/coordinationErrors.js';
import { ServiceCoordinate, formatCoord } from '../services/serviceCoord.js';
import { ServiceAddress, ServiceRegistry } from '../services/ServiceRegistry.js';
import { RpcArguments, RpcResponseFrame, isErrorFrame } from './protocol.js';
import { Transport, TransportFactory } from './Transport.js';
import { tcpTransportFactory } from './TcpTransport.js';

export type RpcFailureKind = 'addressing' | 'transport' | 'remote';

export type RpcOutcome<TTag = undefined> =
    | { readonly ok: true; readonly result: unknown; readonly tag: TTag }
    | { readonly ok: false; readonly error: string; readonly kind: RpcFailureKind; readonly tag: TTag };

export type RpcContinuation<TTag = undefined> = (outcome: RpcOutcome<TTag>) => void;

export type InvokeStatus = 'pending' | 'failed';

type Settlement =
    | { readonly ok: true; readonly result: unknown }
    | { readonly ok: false; readonly error: string; readonly kind: RpcFailureKind };

interface PendingCall {
    readonly id: string;
    readonly method: string;
    readonly startedAt: number;
    readonly timer: NodeJS.Timeout;
    readonly settle: (settlement: Settlement) => void;
}

export interface RpcChannelOptions {
    /** Upper bound on the wait for any single response. */
    timeoutMs?: number;
    reconnectDelayMs?: number;
    transportFactory?: TransportFactory;
    callIdFactory?: () => string;
}

export const DEFAULT_RPC_TIMEOUT_MS = 30_000;
export const DEFAULT_RECONNECT_DELAY_MS = 5_000;

export function outcomeError(outcome: { error: string; kind: RpcFailureKind }): CoordinationError {
    switch (outcome.kind) {
        case 'addressing':
            return new AddressingError(outcome.error);
        case 'transport':
            return new TransportError(outcome.error);
        case 'remote':
            return new RemoteCallError(outcome.error);
    }
}

export class RpcChannel {
    private transport: Transport | null = null;
    private addressingFailure: string | null = null;
    private reconnectTimer: NodeJS.Timeout | null = null;
    private closed = false;
    private readonly pending = new Map<string, PendingCall>();
    private readonly log: Logger;
    private readonly timeoutMs: number;
    private readonly reconnectDelayMs: number;
    private readonly transportFactory: TransportFactory;
    private readonly callIdFactory: () => string;

    constructor(
        readonly coord: ServiceCoordinate,
        private readonly registry: ServiceRegistry,
        options: RpcChannelOptions = {}
    ) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS;
        this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
        this.transportFactory = options.transportFactory ?? tcpTransportFactory;
        this.callIdFactory = options.callIdFactory ?? (() => crypto.randomUUID());
        this.log = getServiceLogger(coord, 'RpcChannel');
    }

    get connected(): boolean {
        return this.transport?.connected ?? false;
    }

    get pendingCount(): number {
        return this.pending.size;
    }

    /**
     * Resolve the address and open the transport. An unresolvable
     * coordinate is not thrown: every later invoke reports it.
     */
    connect(): void {
        if (this.closed || this.transport || this.addressingFailure) return;

        let address: ServiceAddress;
        try {
            address = this.registry.address(this.coord);
        } catch (error) {
            this.addressingFailure = error instanceof Error ? error.message : String(error);
            this.log.error({ error: this.addressingFailure }, 'Cannot resolve service address');
            return;
        }

        this.transport = this.transportFactory(address, {
            onConnect: () => this.log.info('Connected to service'),
            onDisconnect: reason => this.handleDisconnect(reason),
            onFrame: frame => this.handleFrame(frame)
        });
        this.transport.connect();
    }

    invoke<TTag>(
        method: string,
        args: RpcArguments,
        onComplete: RpcContinuation<TTag>,
        tag: TTag
    ): InvokeStatus {
        const settleWith = (settlement: Settlement) => this.runContinuation(method, () => onComplete({ ...settlement, tag }));

        if (this.closed) {
            return this.failLater(settleWith, 'transport', `Channel to ${formatCoord(this.coord)} is closed`);
        }
        if (this.addressingFailure) {
            return this.failLater(settleWith, 'addressing', this.addressingFailure);
        }
        const transport = this.transport;
        if (!transport || !transport.connected) {
            return this.failLater(settleWith, 'transport', `Not connected to ${formatCoord(this.coord)}`);
        }

        const id = this.callIdFactory();
        const timer = setTimeout(() => this.expire(id), this.timeoutMs);
        this.pending.set(id, { id, method, startedAt: Date.now(), timer, settle: settleWith });

        try {
            transport.send({ id, service: this.coord.name, shard: this.coord.shard, method, args });
        } catch (error) {
            this.pending.delete(id);
            clearTimeout(timer);
            const reason = error instanceof Error ? error.message : String(error);
            this.log.warn({ method, error: reason }, 'RPC send failed');
            return this.failLater(settleWith, 'transport', reason);
        }

        this.log.debug({ method, callId: id }, 'RPC issued');
        return 'pending';
    }

    /**
     * Promise form of invoke.
     */
    call(method: string, args: RpcArguments = {}): Promise<unknown> {
        return new Promise((resolve, reject) => {
            this.invoke(method, args, outcome => {
                if (outcome.ok) {
                    resolve(outcome.result);
                } else {
                    reject(outcomeError(outcome));
                }
            }, undefined);
        });
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;

        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
        this.failAllPending(`Channel to ${formatCoord(this.coord)} closed`);
        this.transport?.close();
        this.transport = null;
    }

    private handleFrame(frame: RpcResponseFrame): void {
        const call = this.pending.get(frame.id);
        if (!call) {
            // Late answer after a timeout, or a redelivery.
            this.log.debug({ callId: frame.id }, 'Dropping response for unknown or completed call');
            return;
        }
        this.pending.delete(frame.id);
        clearTimeout(call.timer);

        this.log.debug({ method: call.method, callId: call.id, elapsedMs: Date.now() - call.startedAt }, 'RPC answered');
        if (isErrorFrame(frame)) {
            call.settle({ ok: false, error: frame.error, kind: 'remote' });
        } else {
            call.settle({ ok: true, result: frame.result });
        }
    }

    private expire(id: string): void {
        const call = this.pending.get(id);
        if (!call) return;
        this.pending.delete(id);

        this.log.warn({ method: call.method, callId: id, timeoutMs: this.timeoutMs }, 'RPC timed out');
        call.settle({ ok: false, error: `RPC ${call.method} timed out after ${this.timeoutMs}ms`, kind: 'transport' });
    }

    private handleDisconnect(reason: string): void {
        this.failAllPending(`Connection to ${formatCoord(this.coord)} lost: ${reason}`);
        if (this.closed) return;

        this.log.warn({ reason, retryInMs: this.reconnectDelayMs }, 'Disconnected from service');
        this.scheduleReconnect();
    }

    private scheduleReconnect(): void {
        if (this.reconnectTimer || this.closed) return;
        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            if (!this.closed) {
                this.transport?.connect();
            }
        }, this.reconnectDelayMs);
        this.reconnectTimer.unref();
    }

    private failAllPending(reason: string): void {
        const calls = [...this.pending.values()];
        this.pending.clear();
        for (const call of calls) {
            clearTimeout(call.timer);
            call.settle({ ok: false, error: reason, kind: 'transport' });
        }
    }

    private failLater(
        settle: (settlement: Settlement) => void,
        kind: RpcFailureKind,
        error: string
    ): InvokeStatus {
        queueMicrotask(() => settle({ ok: false, error, kind }));
        return 'failed';
    }

    /**
     * A throwing continuation must not break the channel or other calls.
     */
    private runContinuation(method: string, fn: () => void): void {
        try {
            fn();
        } catch (error) {
            this.log.error({ method, error }, 'RPC continuation threw');
        }
    }
}
