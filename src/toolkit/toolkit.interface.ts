import { MenuSpec } from "../controller/menu";

/** A file type offered by the file dialogs, e.g. `{ description: "JSON files", pattern: "*.json" }` */
export type FileType = {
    description: string;
    pattern: string;
}

export type FileDialogOptions = {
    title: string;
    initialDir: string;
    /** Extension appended when the user types a name without one, e.g. `.json` */
    defaultExtension?: string;
    fileTypes: Array<FileType>;
}

/**
 * The windowing toolkit hosting an application: main window, menubar and dialogs.
 * The framework only calls into it; drawing and event decoding stay on the toolkit side.
 */
export interface Toolkit {
    setTitle(title: string): void;

    /** Installs the menubar. Selecting an item runs its action */
    setMenubar(menu: MenuSpec): void;

    /** @return The chosen path, `undefined` if the user cancelled */
    askOpenFilename(options: FileDialogOptions): Promise<string | undefined>;

    /** @return The chosen path, `undefined` if the user cancelled */
    askSaveAsFilename(options: FileDialogOptions): Promise<string | undefined>;

    showInfo(title: string, message: string): void;

    /** Sets what runs when the user closes the main window */
    onCloseRequested(handler: () => void): void;

    /** Closes the main window and ends the event loop */
    destroy(): void;
}
