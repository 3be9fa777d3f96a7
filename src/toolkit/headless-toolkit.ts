import { injectable } from "tsyringe";
import log from "../logging/log.instance";
import { flattenMenu, MenuSpec } from "../controller/menu";
import { FileDialogOptions, Toolkit } from "./toolkit.interface";

export type ShownMessage = {
    title: string;
    message: string;
}

/**
 * A {@link Toolkit} without a screen. It logs what a real toolkit would display, answers the file
 * dialogs from scripted answers and lets callers select menu items or close the window.
 * Used to run an application from a script and in the tests.
 */
@injectable()
export class HeadlessToolkit implements Toolkit {
    private title = "";
    private menubar: MenuSpec = {};
    private closeHandler?: () => void;
    private destroyed = false;
    private readonly openAnswers: Array<string | undefined> = [];
    private readonly saveAnswers: Array<string | undefined> = [];
    private readonly shownMessages: Array<ShownMessage> = [];

    setTitle(title: string): void {
        this.title = title;
        log.debug(`Window title set to "${title}"`);
    }

    getTitle(): string {
        return this.title;
    }

    setMenubar(menu: MenuSpec): void {
        this.menubar = menu;
        log.debug(`Menubar set: ${flattenMenu(menu).map(entry => entry.path.join(" > ")).join(", ")}`);
    }

    getMenubar(): MenuSpec {
        return this.menubar;
    }

    /** The next open dialog answers `filePath`; `undefined` answers as a cancel */
    queueOpenAnswer(filePath: string | undefined): void {
        this.openAnswers.push(filePath);
    }

    /** The next save dialog answers `filePath`; `undefined` answers as a cancel */
    queueSaveAnswer(filePath: string | undefined): void {
        this.saveAnswers.push(filePath);
    }

    async askOpenFilename(options: FileDialogOptions): Promise<string | undefined> {
        const answer = this.openAnswers.shift();
        log.info(`${options.title} (in ${options.initialDir}): ${answer ?? "cancelled"}`);
        return answer;
    }

    async askSaveAsFilename(options: FileDialogOptions): Promise<string | undefined> {
        const answer = this.saveAnswers.shift();
        log.info(`${options.title} (in ${options.initialDir}): ${answer ?? "cancelled"}`);
        return answer;
    }

    showInfo(title: string, message: string): void {
        this.shownMessages.push({ title, message });
        log.info(`${title}\n${message}`);
    }

    getShownMessages(): Array<ShownMessage> {
        return [...this.shownMessages];
    }

    /**
     * Runs the menu item found by following `path` from the menubar, e.g. `("File", "Save")`.
     * @throws Error if there is no such item
     */
    async selectMenuItem(...path: Array<string>): Promise<void> {
        const label = path.join(" > ");
        const entry = flattenMenu(this.menubar).find(e => e.path.join(" > ") === label);
        if (!entry) {
            throw new Error(`There is no menu item ${label}`);
        }
        log.debug(`Menu item ${label} selected`);
        await entry.action();
    }

    onCloseRequested(handler: () => void): void {
        this.closeHandler = handler;
    }

    /** Simulates the user closing the main window */
    requestClose(): void {
        if (this.closeHandler) {
            this.closeHandler();
        } else {
            this.destroy();
        }
    }

    destroy(): void {
        this.destroyed = true;
        log.debug("Main window destroyed");
    }

    isDestroyed(): boolean {
        return this.destroyed;
    }
}
