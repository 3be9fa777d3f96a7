import shortUUID from "short-uuid";
import log, { logContext, NOTIFICATION_ID_KEY } from "../../logging/log.instance";
import { NotificationError } from "./observer-errors";

export type NotificationJob = () => void;

/**
 * Runs notification fan-outs one after another on the calling thread.
 *
 * A job enqueued while no job is running runs immediately, together with every job it
 * enqueues in turn, before {@link enqueue} returns. A job enqueued from inside a running
 * job waits until the running one has completed, so observers never see the fan-out of a
 * nested change interleaved with the one that caused it.
 */
export class NotificationQueue {
    private readonly pending: Array<NotificationJob> = [];
    private draining = false;

    enqueue(job: NotificationJob): void {
        this.pending.push(job);
        if (this.draining) {
            return;
        }

        let failures: Array<unknown> = [];
        this.draining = true;
        try {
            logContext.run(() => {
                logContext.set(NOTIFICATION_ID_KEY, shortUUID.generate());
                failures = this.drain();
            });
        } finally {
            this.draining = false;
        }
        NotificationQueue.raise(failures);
    }

    isDraining(): boolean {
        return this.draining;
    }

    /** Number of jobs waiting behind the running one */
    getPendingCount(): number {
        return this.pending.length;
    }

    /**
     * Throws nothing for no failure, the failure itself for one,
     * and a {@link NotificationError} listing them for several.
     */
    static raise(failures: ReadonlyArray<unknown>): void {
        if (failures.length === 1) {
            throw failures[0];
        }
        if (failures.length > 1) {
            throw new NotificationError(failures);
        }
    }

    private drain(): Array<unknown> {
        const failures: Array<unknown> = [];
        for (let job = this.pending.shift(); job; job = this.pending.shift()) {
            try {
                job();
            } catch (e) {
                failures.push(...(e instanceof NotificationError ? e.errors : [e]));
            }
        }
        if (failures.length > 0) {
            log.debug(`Notification batch finished with ${failures.length} failure(s)`);
        }
        return failures;
    }
}

/** Queue shared by every subject that is not given one explicitly */
export const defaultNotificationQueue = new NotificationQueue();
