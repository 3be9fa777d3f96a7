import { AppController } from "../controller/app-controller";
import { ConfigService } from "../services/config-service";
import { Toolkit } from "../toolkit/toolkit.interface";
import { CounterModel } from "./counter-model";
import { DemoViewManager } from "./demo-view-manager";

/**
 * The demo application: a toggle button, a reset button and a label counting the starts.
 */
export class DemoApp extends AppController<CounterModel, DemoViewManager> {

    constructor(toolkit: Toolkit, configService: ConfigService) {
        super(toolkit, {
            title: configService.getAppTitle(),
            aboutInfo: configService.getAboutInfo(),
            fileTypes: configService.getFileTypes()
        });
    }

    protected createModel(): CounterModel {
        return new CounterModel();
    }

    protected createViewManager(): DemoViewManager {
        return new DemoViewManager(this);
    }
}
