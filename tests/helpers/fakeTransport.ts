import { TransportError } from '../../libs/errors/coordinationErrors.js';
import { RpcRequestFrame } from '../../libs/rpc/protocol.js';
import { Transport, TransportFactory, TransportListener } from '../../libs/rpc/Transport.js';
import { ServiceAddress } from '../../libs/services/ServiceRegistry.js';

/**
 * In-process transport driven by the test: frames sent by the channel are
 * recorded, and answers or drops are injected by hand.
 */
export class FakeTransport implements Transport {
    connected = false;
    closed = false;
    connectCalls = 0;
    failSends = false;
    readonly sent: RpcRequestFrame[] = [];

    constructor(
        readonly address: ServiceAddress,
        private readonly listener: TransportListener,
        private readonly autoConnect: boolean
    ) { }

    connect(): void {
        this.connectCalls++;
        if (this.autoConnect) this.open();
    }

    open(): void {
        this.connected = true;
        this.listener.onConnect();
    }

    drop(reason = 'connection lost'): void {
        this.connected = false;
        this.listener.onDisconnect(reason);
    }

    answer(id: string, result: unknown): void {
        this.listener.onFrame({ id, result });
    }

    fail(id: string, error: string): void {
        this.listener.onFrame({ id, error });
    }

    lastSent(): RpcRequestFrame {
        const frame = this.sent[this.sent.length - 1];
        if (!frame) throw new Error('Nothing was sent');
        return frame;
    }

    send(frame: RpcRequestFrame): void {
        if (!this.connected || this.failSends) {
            throw new TransportError(`Cannot write to ${this.address.host}:${this.address.port}`);
        }
        this.sent.push(frame);
    }

    close(): void {
        this.closed = true;
        this.connected = false;
    }
}

export function fakeTransports(options: { autoConnect?: boolean } = {}) {
    const transports: FakeTransport[] = [];
    const factory: TransportFactory = (address, listener) => {
        const transport = new FakeTransport(address, listener, options.autoConnect ?? true);
        transports.push(transport);
        return transport;
    };

    const only = (): FakeTransport => {
        const transport = transports[0];
        if (!transport) throw new Error('No transport was created');
        return transport;
    };

    return { factory, transports, only };
}

export function sequentialIds(prefix = 'call'): () => string {
    let next = 0;
    return () => `${prefix}-${++next}`;
}

/** Lets queued microtasks and immediate callbacks run. */
export function settle(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

export async function waitFor(check: () => boolean, timeoutMs = 1000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while (!check()) {
        if (Date.now() > deadline) throw new Error('Condition not met in time');
        await sleep(5);
    }
}
