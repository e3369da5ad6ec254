/**
 * Error taxonomy for the coordination layer.
 *
 * Every error carries a machine-readable code and the HTTP status the admin
 * front end maps it to. None of them is fatal to the process: they end up in
 * an RPC failure outcome, a session failure action, or a rejected HTTP
 * request.
 */

export type CoordinationErrorCode =
    | 'ADDRESSING_ERROR'
    | 'UNKNOWN_SERVICE'
    | 'TRANSPORT_ERROR'
    | 'REMOTE_CALL_ERROR'
    | 'AUTHORIZATION_DENIED'
    | 'PARTIAL_UPLOAD_FAILURE'
    | 'DUPLICATE_TAG'
    | 'UNEXPECTED_TAG'
    | 'INVALID_SESSION'
    | 'VALIDATION_ERROR';

export abstract class CoordinationError extends Error {
    abstract readonly code: CoordinationErrorCode;
    abstract readonly statusCode: number;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * A service coordinate that cannot be resolved to an endpoint.
 */
export class AddressingError extends CoordinationError {
    readonly code: CoordinationErrorCode = 'ADDRESSING_ERROR';
    readonly statusCode: number = 502;
}

export class UnknownServiceError extends AddressingError {
    override readonly code: CoordinationErrorCode = 'UNKNOWN_SERVICE';
    readonly serviceName: string;

    constructor(serviceName: string) {
        super(`Unknown service: ${serviceName} has no configured shards`);
        this.serviceName = serviceName;
    }
}

/**
 * Connection refused, reset, dropped or timed out. Never retried by the core.
 */
export class TransportError extends CoordinationError {
    readonly code: CoordinationErrorCode = 'TRANSPORT_ERROR';
    readonly statusCode: number = 502;
}

/**
 * The remote service received the call and answered with an error.
 */
export class RemoteCallError extends CoordinationError {
    readonly code: CoordinationErrorCode = 'REMOTE_CALL_ERROR';
    readonly statusCode: number = 502;
}

export class AuthorizationDeniedError extends CoordinationError {
    readonly code: CoordinationErrorCode = 'AUTHORIZATION_DENIED';
    readonly statusCode: number = 403;
    readonly service: string;
    readonly method: string;

    constructor(service: string, method: string) {
        super(`RPC ${service}.${method} is not allowed from untrusted callers`);
        this.service = service;
        this.method = method;
    }
}

/**
 * One part of a multi-part upload failed; the whole session is failed.
 */
export class PartialUploadFailure extends CoordinationError {
    readonly code: CoordinationErrorCode = 'PARTIAL_UPLOAD_FAILURE';
    readonly statusCode: number = 502;
    readonly failedTag: string;
    readonly reason: string;
    /** Parts already stored when the session failed; nothing references them. */
    readonly orphaned: Readonly<Record<string, string>>;

    constructor(failedTag: string, reason: string, orphaned: Readonly<Record<string, string>>) {
        super(`Upload part "${failedTag}" failed: ${reason}`);
        this.failedTag = failedTag;
        this.reason = reason;
        this.orphaned = orphaned;
    }
}

export class DuplicateTagError extends CoordinationError {
    readonly code: CoordinationErrorCode = 'DUPLICATE_TAG';
    readonly statusCode: number = 500;
}

export class UnexpectedTagError extends CoordinationError {
    readonly code: CoordinationErrorCode = 'UNEXPECTED_TAG';
    readonly statusCode: number = 500;
}

export class InvalidSessionError extends CoordinationError {
    readonly code: CoordinationErrorCode = 'INVALID_SESSION';
    readonly statusCode: number = 500;
}

/**
 * Input that failed schema validation (wire frames, config, request bodies).
 */
export class ValidationError extends CoordinationError {
    readonly code: CoordinationErrorCode = 'VALIDATION_ERROR';
    readonly statusCode: number = 400;
    readonly issues: ReadonlyArray<{ path: string; message: string }>;

    constructor(message: string, issues: ReadonlyArray<{ path: string; message: string }>) {
        super(message);
        this.issues = issues;
    }
}

export function isCoordinationError(err: unknown): err is CoordinationError {
    return err instanceof CoordinationError;
}
