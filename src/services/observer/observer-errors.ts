/**
 * Raised by a view manager notified by a subject it holds no handler for.
 * This is a wiring bug: the subject was attached without being registered,
 * or its registration was removed while it was still attached.
 */
export class UnregisteredSubjectError extends Error {
    constructor(readonly subject: string, readonly mediator: string) {
        super(`${mediator} was notified by ${subject}, which has no registered handler`);
        this.name = "UnregisteredSubjectError";
    }
}

/** Raised once a notification batch is drained when more than one observer failed */
export class NotificationError extends Error {
    constructor(readonly errors: ReadonlyArray<unknown>) {
        super(`${errors.length} observers failed to handle a notification: ` +
            errors.map(e => e instanceof Error ? e.message : String(e)).join("; "));
        this.name = "NotificationError";
    }
}

/** Raised when a model cannot read or write the given content or format */
export class ModelFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ModelFormatError";
    }
}
