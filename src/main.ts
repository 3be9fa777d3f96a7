import "reflect-metadata";
import * as path from "path";
import * as os from "os";
import { container } from "tsyringe";
import log from "./logging/log.instance";
import { ConfigService } from "./services/config-service";
import { HeadlessToolkit } from "./toolkit/headless-toolkit";
import { DemoApp } from "./demo/demo-app";
import { MenuLabel } from "./enums/menu-label.enum";

/**
 * Runs a scripted session of the demo application on the headless toolkit:
 * clicks the toggle, saves the counter, resets it, opens the saved file again and exits.
 */
async function runDemo(): Promise<void> {
    const configService = container.resolve(ConfigService);
    const toolkit = container.resolve(HeadlessToolkit);
    const app = new DemoApp(toolkit, configService);
    const { toggle, reset, countLabel } = app.getViewManager().getWidgets();

    for (let i = 0; i < configService.getDemoClicks(); i++) {
        toggle.click();
    }
    log.info(`Label shows "${countLabel.getText()}"`);

    const savePath = configService.getDemoSavePath();
    if (savePath) {
        const filePath = path.resolve(os.tmpdir(), savePath);
        toolkit.queueSaveAnswer(filePath);
        await toolkit.selectMenuItem(MenuLabel.FILE, MenuLabel.SAVE);

        reset.click();
        log.info(`Label shows "${countLabel.getText()}" after reset`);

        toolkit.queueOpenAnswer(filePath);
        await toolkit.selectMenuItem(MenuLabel.FILE, MenuLabel.OPEN);
        log.info(`Label shows "${countLabel.getText()}" after opening ${filePath}`);
    }

    await toolkit.selectMenuItem(MenuLabel.HELP, MenuLabel.ABOUT);
    toolkit.requestClose();
}

runDemo().catch(e => {
    log.error(`Demo session failed: ${e}. Stacktrace: ${e instanceof Error ? e.stack : ""}`);
    process.exitCode = 1;
});
