import { singleton } from "tsyringe";
import config, { IConfig } from "config";
import { AppAboutInfo } from "../models/about-info";
import { FileType } from "../toolkit/toolkit.interface";

@singleton()
export class ConfigService {
    private readonly config: IConfig = config;

    public getConfig(): IConfig {
        return this.config;
    }

    public isTestEnvironment(): boolean {
        return this.config.get<boolean>("test");
    }

    public getAppTitle(): string {
        return this.config.get<string>("app.title");
    }

    /** Whatever is configured under `app.about`; missing fields are completed by the controller */
    public getAboutInfo(): Partial<AppAboutInfo> {
        return { ...this.config.get<Partial<AppAboutInfo>>("app.about") };
    }

    public getFileTypes(): Array<FileType> {
        return this.config.get<Array<FileType>>("app.fileTypes").map(fileType => ({ ...fileType }));
    }

    /** Number of toggle clicks the scripted demo session performs */
    public getDemoClicks(): number {
        return this.config.has("demo.clicks") ? this.config.get<number>("demo.clicks") : 0;
    }

    public getDemoSavePath(): string | undefined {
        return this.config.has("demo.savePath") ? this.config.get<string>("demo.savePath") : undefined;
    }

}
