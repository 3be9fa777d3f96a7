import { SubjectBase } from "../services/observer/subject-base";
import { NotificationQueue } from "../services/observer/notification-queue";

/**
 * A headless widget: a named Subject that notifies its view manager when the user changes it.
 * Drawing it is left to whatever toolkit hosts the application.
 */
export abstract class Widget extends SubjectBase {

    protected constructor(readonly name: string, queue?: NotificationQueue) {
        super(queue);
    }

    /** Detaches every observer; a view manager among them forgets this widget's handler */
    destroy(): void {
        this.detachAll();
    }
}
