/**
 * RPC wire contract between the admin front end and backend shards.
 *
 * A call is `{ id, service, shard, method, args }`; the answer is either
 * `{ id, result }` or `{ id, error }`. `id` is the transport-level call id
 * and the only correlation key on the wire; the caller's tag stays local.
 *
 * Frames travel as one JSON document per line.
 */

import { z } from 'zod';
import { createValidator } from '../validation/zod-middleware.js';

export type RpcArguments = Readonly<Record<string, unknown>>;

export interface RpcRequestFrame {
    readonly id: string;
    readonly service: string;
    readonly shard: number;
    readonly method: string;
    readonly args: RpcArguments;
}

export const RpcErrorFrameSchema = z.object({
    id: z.string().min(1),
    error: z.string()
});

export const RpcResultFrameSchema = z.object({
    id: z.string().min(1),
    result: z.unknown()
});

// A frame carrying a string `error` is a failure whatever else it holds.
export const RpcResponseFrameSchema = z.union([RpcErrorFrameSchema, RpcResultFrameSchema]);

export type RpcResponseFrame = z.infer<typeof RpcResponseFrameSchema>;

export const parseResponseFrame = createValidator(RpcResponseFrameSchema);

export function isErrorFrame(frame: RpcResponseFrame): frame is z.infer<typeof RpcErrorFrameSchema> {
    return 'error' in frame && typeof frame.error === 'string';
}

export const FRAME_DELIMITER = '\n';

export function encodeFrame(frame: RpcRequestFrame): string {
    return JSON.stringify(frame) + FRAME_DELIMITER;
}

/**
 * Splits decoded socket text into complete lines. The length limit counts
 * characters. Incomplete trailing data is kept until the next chunk arrives.
 */
export class LineDecoder {
    private buffer = '';

    constructor(private readonly maxLineLength: number = 16 * 1024 * 1024) { }

    push(chunk: string): string[] {
        this.buffer += chunk;
        const lines = this.buffer.split(FRAME_DELIMITER);
        this.buffer = lines.pop() ?? '';

        if (this.buffer.length > this.maxLineLength) {
            this.buffer = '';
            throw new Error(`RPC frame exceeds ${this.maxLineLength} characters`);
        }

        return lines.filter(line => line.trim().length > 0);
    }

    reset(): void {
        this.buffer = '';
    }
}
