import { Readable, Writable } from "stream";
import { SubjectBase } from "../services/observer/subject-base";
import { NotificationQueue } from "../services/observer/notification-queue";

/**
 * Abstract base class for the data and business logic of an application.
 * A Model is a Subject: its view manager observes it and refreshes the widgets on every change.
 *
 * Concrete models must:
 *  - route every change of observable state through {@link mutate}, so that observers get exactly one
 *    notification per completed change and none while the change is half applied
 *  - implement {@link readFrom} so that it replaces the whole state in a single {@link mutate}
 *  - implement {@link writeTo}
 */
export abstract class Model extends SubjectBase {
    private mutationDepth = 0;

    protected constructor(queue?: NotificationQueue) {
        super(queue);
    }

    /**
     * Replaces the model with the content of `source`, then notifies once.
     * @param format file extension of the content, e.g. `.json`
     */
    abstract readFrom(source: Readable, format?: string): Promise<void>;

    /**
     * Writes the serialized model to `sink` without ending it.
     * @param format file extension of the content, e.g. `.json`
     */
    abstract writeTo(sink: Writable, format?: string): Promise<void>;

    /**
     * Applies `change` and notifies the observers once it is complete.
     * Changes nested in `change` share that single notification.
     * Nothing is notified when `change` throws.
     */
    protected mutate<T>(change: () => T): T {
        this.mutationDepth++;
        let completed = false;
        try {
            const result = change();
            completed = true;
            return result;
        } finally {
            this.mutationDepth--;
            if (completed && this.mutationDepth === 0) {
                this.notify();
            }
        }
    }

    protected isMutating(): boolean {
        return this.mutationDepth > 0;
    }
}
