import net from 'node:net';
import { Logger, logger as rootLogger } from '../logging/logger.js';
import { TransportError } from '../errors/coordinationErrors.js';
import { ServiceAddress } from '../services/ServiceRegistry.js';
import { LineDecoder, RpcRequestFrame, RpcResponseFrame, encodeFrame, parseResponseFrame } from './protocol.js';
import { Transport, TransportFactory, TransportListener } from './Transport.js';

const CONNECT_TIMEOUT_MS = 2000;

/**
 * Newline-delimited JSON over a single TCP connection.
 */
export class TcpTransport implements Transport {
    private socket: net.Socket | null = null;
    private isConnected = false;
    private blocked = false;
    private readonly decoder = new LineDecoder();
    private readonly log: Logger;

    constructor(
        private readonly address: ServiceAddress,
        private readonly listener: TransportListener,
        log: Logger = rootLogger
    ) {
        this.log = log.child({ component: 'TcpTransport', host: address.host, port: address.port });
    }

    get connected(): boolean {
        return this.isConnected;
    }

    /** True while written frames wait in the socket buffer for a 'drain'. */
    get writeBlocked(): boolean {
        return this.blocked;
    }

    connect(): void {
        if (this.socket) return;

        const socket = net.createConnection({ host: this.address.host, port: this.address.port });
        this.socket = socket;
        this.decoder.reset();
        this.blocked = false;
        socket.setEncoding('utf8');
        socket.setNoDelay(true);
        socket.setTimeout(CONNECT_TIMEOUT_MS);

        socket.once('connect', () => {
            socket.setTimeout(0);
            this.isConnected = true;
            this.log.debug('Connected');
            this.listener.onConnect();
        });

        socket.on('timeout', () => {
            socket.destroy(new Error(`connect timed out after ${CONNECT_TIMEOUT_MS}ms`));
        });

        socket.on('data', (chunk: string) => this.handleData(chunk));

        socket.on('drain', () => {
            if (!this.blocked) return;
            this.blocked = false;
            this.log.debug('Socket buffer drained');
        });

        socket.on('error', (error: Error) => {
            this.log.warn({ error: error.message }, 'Socket error');
        });

        socket.once('close', () => {
            const wasConnected = this.isConnected;
            this.isConnected = false;
            if (this.socket === socket) {
                this.socket = null;
            }
            this.listener.onDisconnect(wasConnected ? 'connection lost' : 'connection failed');
        });
    }

    send(frame: RpcRequestFrame): void {
        const socket = this.socket;
        if (!socket || !this.isConnected || !socket.writable) {
            throw new TransportError(`Not connected to ${this.address.host}:${this.address.port}`);
        }
        let flushed: boolean;
        try {
            flushed = socket.write(encodeFrame(frame));
        } catch (error) {
            throw new TransportError(`Write failed: ${error instanceof Error ? error.message : String(error)}`);
        }
        if (!flushed && !this.blocked) {
            this.blocked = true;
            this.log.warn({ method: frame.method, bufferedBytes: socket.writableLength }, 'Socket buffer full; waiting for drain');
        }
    }

    close(): void {
        const socket = this.socket;
        if (!socket) return;
        this.socket = null;
        this.isConnected = false;
        socket.destroy();
    }

    private handleData(chunk: string): void {
        let lines: string[];
        try {
            lines = this.decoder.push(chunk);
        } catch (error) {
            this.log.error({ error }, 'Dropping connection after oversized frame');
            this.socket?.destroy();
            return;
        }

        for (const line of lines) {
            let decoded: unknown;
            try {
                decoded = JSON.parse(line);
            } catch {
                this.log.warn({ length: line.length }, 'Discarding malformed RPC frame');
                continue;
            }
            let frame: RpcResponseFrame;
            try {
                frame = parseResponseFrame(decoded, 'RPC response frame');
            } catch (error) {
                this.log.warn({ error }, 'Discarding invalid RPC frame');
                continue;
            }
            this.listener.onFrame(frame);
        }
    }
}

export const tcpTransportFactory: TransportFactory = (address, listener) => new TcpTransport(address, listener);
