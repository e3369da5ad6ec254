/**
 * Upload Join Coordinator
 *
 * Joins N independently issued store calls into one all-or-nothing
 * outcome. A session succeeds once every expected tag has reported a
 * content id, and fails on the first reported error. Whichever comes first
 * is final: the session leaves the table before its action runs, so any
 * report arriving afterwards (including one made from inside the action) is
 * discarded.
 *
 * Content stored for the other parts of a failed session is not deleted:
 * the store has no delete verb. It is logged as orphaned.
 */

import crypto from 'node:crypto';
import { LRUCache } from 'lru-cache';
import { logger } from '../logging/logger.js';
import {
    DuplicateTagError,
    InvalidSessionError,
    PartialUploadFailure,
    UnexpectedTagError
} from '../errors/coordinationErrors.js';

export type UploadParts = Readonly<Record<string, string>>;

export interface UploadSessionActions {
    /** The only place the aggregated result may be persisted. */
    onSuccess(parts: UploadParts): void | Promise<void>;
    onFailure(error: string, failure: PartialUploadFailure): void | Promise<void>;
}

export interface UploadSessionHandle {
    readonly id: string;
    readonly expectedTags: readonly string[];
}

type SessionOutcome = 'succeeded' | 'failed';

interface SessionState {
    readonly handle: UploadSessionHandle;
    readonly expected: ReadonlySet<string>;
    readonly stored: Map<string, string>;
    readonly actions: UploadSessionActions;
    readonly openedAt: number;
}

const log = logger.child({ component: 'UploadJoinCoordinator' });

export class UploadJoinCoordinator {
    private readonly sessions = new Map<string, SessionState>();

    // Remembers how recent sessions ended, to tell late reports from bogus handles.
    private readonly finished = new LRUCache<string, SessionOutcome>({ max: 1000 });

    begin(expectedTags: readonly string[], actions: UploadSessionActions): UploadSessionHandle {
        if (expectedTags.length === 0) {
            throw new InvalidSessionError('An upload session needs at least one expected tag');
        }
        const expected = new Set(expectedTags);
        if (expected.size !== expectedTags.length) {
            throw new DuplicateTagError(`Expected tags must be distinct: ${expectedTags.join(', ')}`);
        }

        const handle: UploadSessionHandle = Object.freeze({
            id: crypto.randomUUID(),
            expectedTags: Object.freeze([...expectedTags])
        });
        this.sessions.set(handle.id, {
            handle,
            expected,
            stored: new Map(),
            actions,
            openedAt: Date.now()
        });

        log.debug({ sessionId: handle.id, expectedTags }, 'Upload session opened');
        return handle;
    }

    reportSuccess(handle: UploadSessionHandle, tag: string, contentId: string): void {
        const session = this.sessions.get(handle.id);
        if (!session) {
            this.discardLateReport(handle, tag, contentId);
            return;
        }

        if (!session.expected.has(tag)) {
            throw new UnexpectedTagError(`Tag "${tag}" is not part of upload session ${handle.id}`);
        }
        if (session.stored.has(tag)) {
            throw new DuplicateTagError(`Tag "${tag}" already reported for upload session ${handle.id}`);
        }

        session.stored.set(tag, contentId);
        if (session.stored.size < session.expected.size) return;

        this.terminate(session, 'succeeded');
        const parts: UploadParts = Object.freeze(Object.fromEntries(session.stored));
        log.info({ sessionId: handle.id, parts, elapsedMs: Date.now() - session.openedAt }, 'Upload session complete');
        this.runAction(handle, 'success', () => session.actions.onSuccess(parts));
    }

    reportFailure(handle: UploadSessionHandle, tag: string, error: string): void {
        const session = this.sessions.get(handle.id);
        if (!session) {
            log.debug({ sessionId: handle.id, tag, error }, 'Ignoring failure report for finished upload session');
            return;
        }

        if (!session.expected.has(tag)) {
            throw new UnexpectedTagError(`Tag "${tag}" is not part of upload session ${handle.id}`);
        }

        this.terminate(session, 'failed');
        const orphaned: UploadParts = Object.freeze(Object.fromEntries(session.stored));
        const failure = new PartialUploadFailure(tag, error, orphaned);
        log.warn({ sessionId: handle.id, failedTag: tag, error, orphaned }, 'Upload session failed');
        this.runAction(handle, 'failure', () => session.actions.onFailure(error, failure));
    }

    /** Sessions still waiting for at least one part. */
    pendingCount(): number {
        return this.sessions.size;
    }

    private terminate(session: SessionState, outcome: SessionOutcome): void {
        this.sessions.delete(session.handle.id);
        this.finished.set(session.handle.id, outcome);
    }

    private discardLateReport(handle: UploadSessionHandle, tag: string, contentId: string): void {
        const outcome = this.finished.get(handle.id);
        if (outcome === 'failed') {
            log.warn({ sessionId: handle.id, tag, contentId }, 'Late part for failed upload session; content orphaned');
        } else if (outcome === 'succeeded') {
            log.debug({ sessionId: handle.id, tag }, 'Ignoring report for completed upload session');
        } else {
            log.warn({ sessionId: handle.id, tag }, 'Report for unknown upload session');
        }
    }

    private runAction(handle: UploadSessionHandle, kind: 'success' | 'failure', action: () => void | Promise<void>): void {
        let result: void | Promise<void>;
        try {
            result = action();
        } catch (error) {
            log.error({ sessionId: handle.id, kind, error }, 'Upload session action threw');
            return;
        }
        void Promise.resolve(result).catch(error => {
            log.error({ sessionId: handle.id, kind, error }, 'Upload session action rejected');
        });
    }
}
