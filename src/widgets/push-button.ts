import { Widget } from "./widget";
import { NotificationQueue } from "../services/observer/notification-queue";

/** A button that notifies each time it is clicked */
export class PushButton extends Widget {
    private clicks = 0;

    constructor(name: string, readonly text: string, queue?: NotificationQueue) {
        super(name, queue);
    }

    click(): void {
        this.clicks++;
        this.notify();
    }

    getClickCount(): number {
        return this.clicks;
    }
}
