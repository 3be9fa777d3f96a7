import { Widget } from "./widget";
import { NotificationQueue } from "../services/observer/notification-queue";

/**
 * A button whose text cycles between 'Start' and 'Stop' when clicked.
 * Notifies its observers after every click.
 */
export class ToggleWidget extends Widget {
    static readonly START = "Start";
    static readonly STOP = "Stop";

    private started = false;

    constructor(name: string, queue?: NotificationQueue) {
        super(name, queue);
    }

    /** @return `true` if started, `false` if stopped */
    isStarted(): boolean {
        return this.started;
    }

    /** The text shown on the button: what the next click will do */
    getLabel(): string {
        return this.started ? ToggleWidget.STOP : ToggleWidget.START;
    }

    click(): void {
        this.started = !this.started;
        this.notify();
    }
}
