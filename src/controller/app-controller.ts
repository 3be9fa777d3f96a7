import * as fs from "fs";
import * as path from "path";
import { PassThrough } from "stream";
import shortUUID from "short-uuid";
import log from "../logging/log.instance";
import { Model } from "../models/model";
import { AppAboutInfo, formatAboutMessage, formatAboutTitle, toAboutInfo } from "../models/about-info";
import { Observer } from "../services/observer/observer.interface";
import { ModelProvider, ViewManager } from "../services/view-manager";
import { FileDialogOptions, FileType, Toolkit } from "../toolkit/toolkit.interface";
import { StreamUtils } from "../utils/stream-utils";
import { buildMenubar, MenuSpec } from "./menu";

export type AppControllerOptions = {
    /** Title of the main window */
    title?: string;
    /**
     * The menubar. Left empty, the application gets File (Open..., Save, Save As..., Exit) and Help (About...);
     * otherwise File > Exit and Help > About... are added where missing
     */
    menu?: MenuSpec;
    aboutInfo?: Partial<AppAboutInfo>;
    /** File types of the open and save dialogs; the first one gives the default extension */
    fileTypes?: Array<FileType>;
}

/**
 * Abstract base class of an application: owns its lifecycle, its model and its view manager.
 *
 * Concrete applications must implement the factories {@link createModel} and {@link createViewManager}.
 * They will likely pass an about info, file types and, for commands beyond the standard
 * File and Help items, a menubar to the constructor.
 */
export abstract class AppController<M extends Model = Model, V extends ViewManager<M> = ViewManager<M>>
    implements ModelProvider<M> {
    protected readonly model: M;
    protected readonly viewManager: V;
    private readonly aboutInfo: AppAboutInfo;
    private readonly fileTypes: Array<FileType>;
    private readonly menubar: MenuSpec;
    /** Path of the last open or save, empty if there was none */
    private savePath = "";
    private exited = false;

    protected constructor(protected readonly toolkit: Toolkit, options: AppControllerOptions = {}) {
        this.aboutInfo = toAboutInfo(options.aboutInfo);
        this.fileTypes = [...(options.fileTypes ?? [])];

        toolkit.setTitle(options.title ?? "");
        this.menubar = buildMenubar(options.menu ?? {}, {
            onFileOpen: () => this.onFileOpen(),
            onFileSave: () => this.onFileSave(),
            onFileSaveAs: () => this.onFileSaveAs(),
            onFileExit: () => this.onFileExit(),
            onHelpAbout: () => this.onHelpAbout()
        });
        toolkit.setMenubar(this.menubar);

        this.model = this.createModel();
        // the view manager observes the model itself, see ViewManager
        this.viewManager = this.createViewManager();

        toolkit.onCloseRequested(() => this.onFileExit());
    }

    /** Factory of the application's model, called once by the constructor */
    protected abstract createModel(): M;

    /**
     * Factory of the application's view manager, called once by the constructor after {@link createModel}.
     * The view manager creates every widget of the application.
     */
    protected abstract createViewManager(): V;

    getModel(): M {
        return this.model;
    }

    getViewManager(): V {
        return this.viewManager;
    }

    getAboutInfo(): AppAboutInfo {
        return { ...this.aboutInfo };
    }

    getMenubar(): MenuSpec {
        return this.menubar;
    }

    getSavePath(): string {
        return this.savePath;
    }

    /** File > Open...: asks for a file and reads the model from it */
    async onFileOpen(): Promise<void> {
        const filePath = await this.toolkit.askOpenFilename(this.getDialogOptions("Select file to open"));
        if (!filePath) {
            log.debug("Open was cancelled");
            return;
        }
        // the model may change and then fail in one of its observers: the path still follows the data
        let loaded = false;
        const loadWatcher: Observer = { update: () => { loaded = true; } };
        this.model.attach(loadWatcher);
        const source = fs.createReadStream(filePath);
        try {
            await this.model.readFrom(source, path.extname(filePath));
        } finally {
            source.destroy();
            this.model.detach(loadWatcher);
            if (loaded) {
                this.savePath = filePath;
            }
        }
        log.info(`Opened ${filePath}`);
    }

    /** File > Save: writes the model to the last path, or asks for one when there is none */
    async onFileSave(): Promise<void> {
        if (this.savePath.length === 0) {
            return this.onFileSaveAs();
        }
        await this.writeModel(this.savePath);
    }

    /** File > Save As...: asks for a path and writes the model to it */
    async onFileSaveAs(): Promise<void> {
        const filePath = await this.toolkit.askSaveAsFilename(this.getDialogOptions("Select file to save as"));
        if (!filePath) {
            log.debug("Save As was cancelled");
            return;
        }
        await this.writeModel(filePath);
        this.savePath = filePath;
    }

    /** File > Exit, and closing the main window */
    onFileExit(): void {
        if (this.exited) {
            return;
        }
        this.exited = true;
        this.viewManager.destroy();
        this.toolkit.destroy();
        log.info(`${this.aboutInfo.name} exited`);
    }

    /** Help > About... */
    onHelpAbout(): void {
        this.toolkit.showInfo(formatAboutTitle(this.aboutInfo), formatAboutMessage(this.aboutInfo));
    }

    isExited(): boolean {
        return this.exited;
    }

    private getDialogOptions(title: string): FileDialogOptions {
        const pattern = this.fileTypes[0]?.pattern;
        return {
            title,
            initialDir: this.savePath.length > 0 ? path.dirname(this.savePath) : process.cwd(),
            defaultExtension: pattern ? path.extname(pattern) || undefined : undefined,
            fileTypes: this.fileTypes.map(fileType => ({ ...fileType }))
        };
    }

    /**
     * Serializes the whole model before touching the disk, then replaces `filePath` with a file
     * written beside it, so a failed write leaves an existing file as it was.
     */
    private async writeModel(filePath: string): Promise<void> {
        const content = await this.serializeModel(path.extname(filePath));
        const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${shortUUID.generate()}.tmp`);
        try {
            await fs.promises.writeFile(tempPath, content, "utf8");
            await fs.promises.rename(tempPath, filePath);
        } catch (e) {
            await fs.promises.rm(tempPath, { force: true });
            throw e;
        }
        log.info(`Saved ${filePath}`);
    }

    private async serializeModel(format: string): Promise<string> {
        const buffer = new PassThrough();
        const [content] = await Promise.all([
            StreamUtils.readAll(buffer),
            this.model.writeTo(buffer, format).then(() => {
                buffer.end();
            }, (e: unknown) => {
                buffer.destroy();
                throw e;
            })
        ]);
        return content;
    }
}
