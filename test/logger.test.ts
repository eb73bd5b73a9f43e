import { describe, it, expect, vi, afterEach } from "vitest";
import { createConsoleLogger, silentLogger } from "../src/logger";

describe("createConsoleLogger", () => {
    afterEach(() => {
        vi.restoreAllMocks();
        vi.unstubAllEnvs();
    });

    it("should prefix messages with the namespace", () => {
        const info = vi.spyOn(console, "info").mockImplementation(() => {});
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const logger = createConsoleLogger("wheel");

        logger.info("started", { tick: 3 });
        logger.warn("late");

        expect(info).toHaveBeenCalledWith("[wheel]", "started", { tick: 3 });
        expect(warn).toHaveBeenCalledWith("[wheel]", "late", "");
    });

    it("should print debug output only when DEBUG is set", () => {
        const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
        const logger = createConsoleLogger("wheel");

        vi.stubEnv("DEBUG", "");
        logger.debug("hidden");
        expect(debug).not.toHaveBeenCalled();

        vi.stubEnv("DEBUG", "1");
        logger.debug("shown");
        expect(debug).toHaveBeenCalledWith("[wheel]", "shown", "");
    });
});

describe("silentLogger", () => {
    it("should not write to the console", () => {
        const error = vi.spyOn(console, "error").mockImplementation(() => {});
        silentLogger.error("nothing");

        expect(error).not.toHaveBeenCalled();
        error.mockRestore();
    });
});
