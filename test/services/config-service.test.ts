import "reflect-metadata";
import { container } from "tsyringe";
import { ConfigService } from "../../src/services/config-service";

describe("Config service", () => {
    let configService: ConfigService;

    beforeAll(() => {
        configService = container.resolve(ConfigService);
    });

    test("Should be a singleton", () => {
        expect(container.resolve(ConfigService)).toBe(configService);
    });

    test("Should load the test configuration over the defaults", () => {
        expect(configService.isTestEnvironment()).toBe(true);
        expect(configService.getConfig().get<string>("logging.level")).toBe("error");
    });

    test("Should read the application settings", () => {
        expect(configService.getAppTitle()).toBe("Counter Demo");
        expect(configService.getAboutInfo()).toMatchObject({ name: "Counter Demo", version: "1.0.0" });
        expect(configService.getFileTypes()).toEqual([{ description: "JSON files", pattern: "*.json" }]);
    });

    test("Should read the demo script", () => {
        expect(configService.getDemoClicks()).toBe(3);
        expect(configService.getDemoSavePath()).toBe("counter.json");
    });
});
