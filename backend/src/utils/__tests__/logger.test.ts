import { createLogger, resolveLogLevel, withLogTiming } from "../logger";

describe("logger", () => {
    let consoleDebug: jest.SpyInstance;
    let consoleInfo: jest.SpyInstance;
    let consoleWarn: jest.SpyInstance;
    let consoleError: jest.SpyInstance;

    beforeEach(() => {
        consoleDebug = jest.spyOn(console, "debug").mockImplementation(() => undefined);
        consoleInfo = jest.spyOn(console, "info").mockImplementation(() => undefined);
        consoleWarn = jest.spyOn(console, "warn").mockImplementation(() => undefined);
        consoleError = jest.spyOn(console, "error").mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it("resolves the level from LOG_LEVEL and NODE_ENV", () => {
        expect(resolveLogLevel({})).toBe("info");
        expect(resolveLogLevel({ NODE_ENV: "production" })).toBe("warn");
        expect(resolveLogLevel({ LOG_LEVEL: " DEBUG ", NODE_ENV: "production" })).toBe("debug");
        expect(resolveLogLevel({ LOG_LEVEL: "chatty" })).toBe("silent");
    });

    it("drops messages below the threshold", () => {
        const log = createLogger("search", { level: "warn" });

        log.debug("hidden");
        log.info("hidden");
        log.warn("shown");
        log.error("shown too");

        expect(consoleDebug).not.toHaveBeenCalled();
        expect(consoleInfo).not.toHaveBeenCalled();
        expect(consoleWarn).toHaveBeenCalledWith("[WARN] [search] shown");
        expect(consoleError).toHaveBeenCalledWith("[ERROR] [search] shown too");
    });

    it("nests child scopes", () => {
        const log = createLogger("artistlens", { level: "info" }).child("spotify");

        log.info("token refreshed");

        expect(consoleInfo).toHaveBeenCalledWith("[INFO] [artistlens.spotify] token refreshed");
    });

    it("flattens errors inside a context object", () => {
        const log = createLogger(undefined, { level: "debug" });
        const error = new Error("boom");

        log.error("failed", { operation: "search", error });

        expect(consoleError).toHaveBeenCalledWith("[ERROR] failed", {
            operation: "search",
            error: { name: "Error", message: "boom", stack: error.stack },
        });
    });

    it("logs nothing at the silent level", () => {
        const log = createLogger("quiet", { level: "silent" });

        log.error("nope");

        expect(consoleError).not.toHaveBeenCalled();
    });

    it("times an operation and rethrows its failure", async () => {
        const log = createLogger("timing", { level: "debug" });

        await expect(withLogTiming(log, "lookup", async () => 7)).resolves.toBe(7);
        await expect(
            withLogTiming(log, "lookup", async () => {
                throw new Error("down");
            })
        ).rejects.toThrow("down");

        expect(consoleDebug).toHaveBeenCalledWith("[DEBUG] [timing] lookup started", {});
        expect(consoleError).toHaveBeenCalledWith(
            "[ERROR] [timing] lookup failed",
            expect.objectContaining({ error: expect.objectContaining({ message: "down" }) })
        );
    });
});
