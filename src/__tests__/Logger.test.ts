/**
 * Leveled console logger
 */
import { createLogger } from "../lib/logger";

describe("createLogger", () => {
    let log: jest.SpyInstance;
    let warn: jest.SpyInstance;
    let error: jest.SpyInstance;

    beforeEach(() => {
        log = jest.spyOn(console, "log").mockImplementation(() => undefined);
        warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
        error = jest.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("drops messages below its level", () => {
        const logger = createLogger("claims", "warn");
        logger.debug("hidden");
        logger.warn("slow document");

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledTimes(1);
        expect(warn.mock.calls[0][0]).toMatch(/^\[claims\]\[WARN\]\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] slow document$/);
    });

    it("always writes errors with their extra arguments", () => {
        const cause = new Error("boom");
        createLogger("claims", "error").error("failed", cause);
        expect(error.mock.calls[0][1]).toBe(cause);
    });
});
