import log from "../logging/log.instance";
import { Model } from "../models/model";
import { GlobalUtils } from "../utils/global-utils";
import { Observer } from "./observer/observer.interface";
import { Subject } from "./observer/subject.interface";
import { UnregisteredSubjectError } from "./observer/observer-errors";

/** Runs when its subject notifies; reads whatever it needs from the subject or the model */
export type UpdateHandler = () => void;

/** What a view manager needs from the application that owns it */
export interface ModelProvider<M extends Model> {
    getModel(): M;
}

/**
 * Mediator between the widgets of an application and its model.
 *
 * The view manager observes every widget and the model, and is the only place where they meet:
 * instead of one generic update routine it keeps a handler per subject and runs the handler of
 * whichever subject notified. Widgets never reference one another.
 *
 * The constructor creates the widgets through {@link createWidgets} and then observes the model,
 * so every subject has its handler before it can notify. Subclass field initializers run after
 * the base constructor: keep widget references in the record returned by {@link createWidgets}
 * ({@link widgets}) rather than in fields of the subclass.
 */
export abstract class ViewManager<M extends Model = Model, W extends object = object> implements Observer {
    /** Subject -> handler. Subjects are keyed by identity and not owned */
    private readonly subjects = new Map<Subject, UpdateHandler>();
    protected readonly widgets: W;

    protected constructor(private readonly app: ModelProvider<M>) {
        this.widgets = this.createWidgets();
        this.observe(this.getModel(), () => this.handleModelUpdate());
        log.debug(`${GlobalUtils.describe(this)} created with ${this.subjects.size} subjects`);
    }

    getModel(): M {
        return this.app.getModel();
    }

    /**
     * Creates the child widgets, calling {@link observe} for each of them.
     * @return The widgets the handlers will need, available afterwards as {@link widgets}
     */
    protected abstract createWidgets(): W;

    /** Runs after every change of the model. Refreshes the widgets that depend on it */
    protected handleModelUpdate(): void {
        // no widget depends on the model by default
    }

    /**
     * Registers `handler` for `subject`. Registering a subject again replaces its handler.
     * The subject must also be attached to this view manager; {@link observe} does both.
     */
    registerSubject(subject: Subject, handler: UpdateHandler): void {
        if (this.subjects.has(subject)) {
            log.debug(`Replacing the handler of ${GlobalUtils.describe(subject)}`);
        }
        this.subjects.set(subject, handler);
    }

    /** Registers `handler` for `subject` and attaches this view manager to it */
    observe(subject: Subject, handler: UpdateHandler): void {
        this.registerSubject(subject, handler);
        subject.attach(this);
    }

    /** Detaches from `subject` and forgets its handler */
    unregisterSubject(subject: Subject): void {
        subject.detach(this);
        this.subjects.delete(subject);
    }

    /** Forgets the handler of a subject that dropped this view manager, e.g. a destroyed widget */
    detached(subject: Subject): void {
        this.subjects.delete(subject);
    }

    isRegistered(subject: Subject): boolean {
        return this.subjects.has(subject);
    }

    getRegisteredCount(): number {
        return this.subjects.size;
    }

    /**
     * Switchboard called by the subjects: runs the handler registered for `subject`.
     * @throws UnregisteredSubjectError if `subject` has no handler
     */
    update(subject: Subject): void {
        const handler = this.subjects.get(subject);
        if (!handler) {
            throw new UnregisteredSubjectError(GlobalUtils.describe(subject), GlobalUtils.describe(this));
        }
        try {
            handler();
        } catch (e) {
            log.error(`Handler ${GlobalUtils.functionName(handler)} for ${GlobalUtils.describe(subject)} failed: ` +
                `${GlobalUtils.errorMessage(e)}`);
            throw e;
        }
    }

    /** Detaches from every subject, the model included, and clears the registry */
    destroy(): void {
        for (const subject of this.subjects.keys()) {
            subject.detach(this);
        }
        this.subjects.clear();
        log.debug(`${GlobalUtils.describe(this)} destroyed`);
    }
}
