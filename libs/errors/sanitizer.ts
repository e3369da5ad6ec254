import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Wraps internal errors in a generic public message plus an incident id,
 * so the admin UI never sees stack traces or SQL while the logs keep the
 * full details under the same id.
 */

export class AdminError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public readonly statusCode: number;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string; statusCode?: number }
    ) {
        super(publicMessage);
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.statusCode = options?.statusCode ?? 500;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            contextLabel: this.contextLabel,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

function describe(err: unknown): { message?: string; stack?: string } {
    if (err instanceof Error) {
        return { message: err.message, stack: err.stack };
    }
    if (typeof err === 'string') {
        return { message: err };
    }
    if (err && typeof err === 'object' && 'message' in err) {
        const message = err.message;
        const stack = 'stack' in err ? err.stack : undefined;
        return {
            message: typeof message === 'string' ? message : undefined,
            stack: typeof stack === 'string' ? stack : undefined
        };
    }
    return { message: String(err) };
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized AdminError.
     */
    sanitize: (err: unknown, contextLabel: string): AdminError => {
        if (err instanceof AdminError) return err;

        const original = describe(err);

        return new AdminError(
            `An internal error occurred (${contextLabel}). Check the server log for details.`,
            { originalError: original.message, stack: original.stack, context: contextLabel },
            { cause: err, contextLabel }
        );
    }
};
