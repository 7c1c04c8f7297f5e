import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { error, formatDuration, info, isLogLevel, setLogLevel, step, stepFail, warn } from "./logger";

describe("terminal logger", () => {
    let log: MockInstance<typeof console.log>;
    let err: MockInstance<typeof console.error>;

    beforeEach(() => {
        log = vi.spyOn(console, "log").mockImplementation(() => {});
        err = vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        setLogLevel("info");
        vi.restoreAllMocks();
    });

    it("prints info, warn and error at the default level", () => {
        info("scanning");
        warn("careful");
        error("broken");
        expect(log.mock.calls).toEqual([["  \x1b[90m▸\x1b[0m scanning"], ["  \x1b[33m⚠ careful\x1b[0m"]]);
        expect(err.mock.calls).toEqual([["  \x1b[31m✗ broken\x1b[0m"]]);
    });

    it("gates output below the current level", () => {
        setLogLevel("warn");
        info("hidden");
        step("render", "3ms");
        warn("shown");
        expect(log).toHaveBeenCalledTimes(1);

        setLogLevel("silent");
        error("hidden");
        stepFail("write", "hidden");
        expect(err).not.toHaveBeenCalled();
    });

    it("aligns step labels with dot leaders", () => {
        step("analyze", "12ms", "3 file(s)");
        const dots = "·".repeat(18);
        expect(log).toHaveBeenCalledWith(
            `  analyze \x1b[90m${dots}\x1b[0m \x1b[32m✓\x1b[0m \x1b[32m 12ms\x1b[0m  \x1b[90m3 file(s)\x1b[0m`,
        );
    });

    it("formats durations", () => {
        expect(formatDuration(999)).toBe("999ms");
        expect(formatDuration(1500)).toBe("1.5s");
        expect(formatDuration(125_000)).toBe("2m05s");
    });

    it("recognizes log level names", () => {
        expect(isLogLevel("debug")).toBe(true);
        expect(isLogLevel("verbose")).toBe(false);
        expect(isLogLevel("toString")).toBe(false);
        expect(isLogLevel(3)).toBe(false);
    });
});
