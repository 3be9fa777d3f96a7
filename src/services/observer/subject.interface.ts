import { Observer } from "./observer.interface";


export interface Subject {

    /** Adds an observer. Attaching an observer that is already attached has no effect */
    attach(observer: Observer): void;

    /** Removes the observer. Detaching an observer that is not attached has no effect */
    detach(observer: Observer): void;

    /** Notifies the attached observers by calling {@link Observer.update}, in attachment order */
    notify(): void;
}
