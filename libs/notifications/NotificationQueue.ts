/**
 * Process-lifetime queue of notifications waiting for the admin UI poller.
 *
 * Delivery is at-most-once and best effort: nothing is persisted, and the
 * contents are gone after a restart.
 *
 * drainAll() swaps the backing array in one step. Appends and drains run
 * on the single event-loop thread, so an append is either in the returned
 * batch or in the fresh array, never in both and never lost.
 */

export interface Notification {
    /** Seconds since the epoch. */
    readonly timestamp: number;
    readonly subject: string;
    readonly body: string;
}

export type Clock = () => number;

export const unixSeconds: Clock = () => Math.floor(Date.now() / 1000);

export class NotificationQueue {
    private entries: Notification[] = [];

    constructor(private readonly clock: Clock = unixSeconds) { }

    append(notification: Notification): void {
        this.entries.push(Object.freeze({ ...notification }));
    }

    /**
     * Append a notification stamped with the current time.
     */
    notify(subject: string, body: string): Notification {
        const notification: Notification = Object.freeze({ timestamp: this.clock(), subject, body });
        this.entries.push(notification);
        return notification;
    }

    drainAll(): Notification[] {
        const drained = this.entries;
        this.entries = [];
        return drained;
    }

    size(): number {
        return this.entries.length;
    }
}
