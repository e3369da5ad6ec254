import { NotificationQueue } from './NotificationQueue.js';

export interface UnansweredQuestion {
    readonly timestamp: number;
    readonly subject: string;
    readonly text: string;
}

export interface QuestionSource {
    /** Unanswered questions asked strictly after `since` (seconds). */
    unansweredQuestionsSince(since: number): Promise<UnansweredQuestion[]>;
}

export type PollEntry =
    | { readonly type: 'new_question'; readonly timestamp: number; readonly subject: string; readonly text: string }
    | { readonly type: 'notification'; readonly timestamp: number; readonly subject: string; readonly text: string };

/**
 * Read-and-clear poll for the admin UI: computed signals (new unanswered
 * questions) first, then every queued notification.
 *
 * `since` filters only the computed signals. The queue is drained after
 * the question lookup settles, so a notification appended while the lookup
 * is in flight is returned by this poll.
 */
export async function pollNotifications(
    queue: NotificationQueue,
    questions: QuestionSource,
    since: number
): Promise<PollEntry[]> {
    const unanswered = await questions.unansweredQuestionsSince(since);

    const entries: PollEntry[] = unanswered.map((question): PollEntry => ({
        type: 'new_question',
        timestamp: question.timestamp,
        subject: question.subject,
        text: question.text
    }));

    for (const notification of queue.drainAll()) {
        entries.push({
            type: 'notification',
            timestamp: notification.timestamp,
            subject: notification.subject,
            text: notification.body
        });
    }

    return entries;
}
