import log from "../../logging/log.instance";
import { GlobalUtils } from "../../utils/global-utils";
import { defaultNotificationQueue, NotificationQueue } from "./notification-queue";
import { Observer } from "./observer.interface";
import { Subject } from "./subject.interface";

/**
 * The observer bookkeeping of a {@link Subject}, meant to be owned by any class that wants
 * to be observed without inheriting from {@link SubjectBase}.
 *
 * Observers form an ordered set: a second attach of the same observer is ignored.
 */
export class ObserverSet {
    private readonly observers: Array<Observer> = [];

    constructor(private readonly owner: Subject,
        private readonly queue: NotificationQueue = defaultNotificationQueue) {}

    add(observer: Observer): void {
        if (!this.observers.includes(observer)) {
            this.observers.push(observer);
        }
    }

    remove(observer: Observer): void {
        const index = this.observers.indexOf(observer);
        if (index > -1) {
            this.observers.splice(index, 1);
            observer.detached?.(this.owner);
        }
    }

    clear(): void {
        for (const observer of this.observers.splice(0)) {
            observer.detached?.(this.owner);
        }
    }

    has(observer: Observer): boolean {
        return this.observers.includes(observer);
    }

    size(): number {
        return this.observers.length;
    }

    notify(): void {
        this.queue.enqueue(() => this.fanOut());
    }

    /**
     * Observers attached while the fan-out runs are left for the next one.
     * An observer detached by an earlier observer of the same fan-out is skipped.
     */
    private fanOut(): void {
        const snapshot = [...this.observers];
        const failures: Array<unknown> = [];
        for (const observer of snapshot) {
            if (!this.observers.includes(observer)) {
                continue;
            }
            try {
                observer.update(this.owner);
            } catch (e) {
                log.error(`${GlobalUtils.describe(observer)} failed to handle a notification from ` +
                    `${GlobalUtils.describe(this.owner)}: ${GlobalUtils.errorMessage(e)}`);
                failures.push(e);
            }
        }
        NotificationQueue.raise(failures);
    }
}
