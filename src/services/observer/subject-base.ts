import { NotificationQueue } from "./notification-queue";
import { Observer } from "./observer.interface";
import { ObserverSet } from "./observer-set";
import { Subject } from "./subject.interface";

/**
 * Base class for objects that are a Subject in an Observer design pattern.
 * {@link https://en.wikipedia.org/wiki/Observer_pattern#UML_class_diagram}
 */
export abstract class SubjectBase implements Subject {
    private readonly observerSet: ObserverSet;

    protected constructor(queue?: NotificationQueue) {
        this.observerSet = new ObserverSet(this, queue);
    }

    attach(observer: Observer): void {
        this.observerSet.add(observer);
    }

    detach(observer: Observer): void {
        this.observerSet.remove(observer);
    }

    notify(): void {
        this.observerSet.notify();
    }

    hasObserver(observer: Observer): boolean {
        return this.observerSet.has(observer);
    }

    getObserverCount(): number {
        return this.observerSet.size();
    }

    /** Detaches every observer, e.g. when the owner is torn down */
    detachAll(): void {
        this.observerSet.clear();
    }
}
