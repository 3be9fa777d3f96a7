import { Widget } from "./widget";
import { NotificationQueue } from "../services/observer/notification-queue";

/** Read-only text. Setting the text is done by the view manager and notifies nobody */
export class TextLabel extends Widget {

    constructor(name: string, private text = "", queue?: NotificationQueue) {
        super(name, queue);
    }

    getText(): string {
        return this.text;
    }

    setText(text: string): void {
        this.text = text;
    }
}
