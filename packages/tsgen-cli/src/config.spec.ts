/**
 * Contract: loadConfig() -- defaults, config file and flags merged in order.
 *
 * Sections:
 *   1. Precedence and paths
 *   2. Validation
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULTS, loadConfig } from "./config";
import { ConfigError, validateLayer } from "./validate";

let dir: string;

beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tsgen-config-"));
});

afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
});

async function writeConfig(name: string, content: unknown): Promise<string> {
    const path = join(dir, name);
    await writeFile(path, typeof content === "string" ? content : JSON.stringify(content));
    return path;
}

// ── 1. Precedence and paths ─────────────────────────────────────────

describe("loadConfig() precedence", () => {
    it("fills defaults when only the paths are given as flags", async () => {
        const { config, configPath } = await loadConfig({ inputPath: "src-tauri/src", outputPath: "out" }, dir);
        expect(configPath).toBeNull();
        expect(config).toEqual({
            ...DEFAULTS,
            inputPath: join(dir, "src-tauri/src"),
            outputPath: join(dir, "out"),
        });
    });

    it("picks up tsgen.config.json and resolves its paths against the file", async () => {
        await mkdir(join(dir, "app"));
        await writeConfig("app/tsgen.config.json", { inputPath: "../backend", outputPath: "gen", mockApi: true });
        const { config, configPath } = await loadConfig({}, join(dir, "app"));
        expect(configPath).toBe(join(dir, "app/tsgen.config.json"));
        expect(config.inputPath).toBe(join(dir, "backend"));
        expect(config.outputPath).toBe(join(dir, "app/gen"));
        expect(config.mockApi).toBe(true);
    });

    it("lets flags override the file", async () => {
        const path = await writeConfig("custom.json", {
            inputPath: "src",
            outputPath: "gen",
            concurrency: 2,
            logLevel: "warn",
        });
        const { config } = await loadConfig({ config: path, outputPath: "elsewhere", concurrency: "4" }, dir);
        expect(config).toEqual({
            inputPath: join(dir, "src"),
            outputPath: join(dir, "elsewhere"),
            mockApi: false,
            strictSerde: false,
            concurrency: 4,
            logLevel: "warn",
        });
    });

    it("accepts snake_case and kebab-case keys", async () => {
        await writeConfig("tsgen.config.json", { input_path: "a", "output-path": "b", strict_serde: true });
        const { config } = await loadConfig({}, dir);
        expect([config.inputPath, config.outputPath, config.strictSerde]).toEqual([join(dir, "a"), join(dir, "b"), true]);
    });
});

// ── 2. Validation ───────────────────────────────────────────────────

describe("loadConfig() validation", () => {
    it("requires both directories", async () => {
        await expect(loadConfig({ inputPath: "src" }, dir)).rejects.toThrow(
            'No output path: pass --output-path or set "outputPath" in tsgen.config.json',
        );
        await expect(loadConfig({}, dir)).rejects.toBeInstanceOf(ConfigError);
    });

    it("rejects a missing explicit config file", async () => {
        await expect(loadConfig({ config: "nope.json" }, dir)).rejects.toThrow(
            `Config file not found: ${join(dir, "nope.json")}`,
        );
    });

    it("rejects malformed JSON", async () => {
        await writeConfig("tsgen.config.json", "{ inputPath: ");
        await expect(loadConfig({}, dir)).rejects.toThrow(/tsgen\.config\.json: invalid JSON/);
    });

    it("rejects values of the wrong type", async () => {
        await expect(loadConfig({ inputPath: "a", outputPath: "b", concurrency: "0" }, dir)).rejects.toThrow(
            'command line: "concurrency" must be a positive integer, got "0"',
        );
        await expect(loadConfig({ inputPath: "a", outputPath: "b", logLevel: "loud" }, dir)).rejects.toThrow(
            'command line: "logLevel" must be one of debug, info, warn, error, silent',
        );
        expect(() => validateLayer({ mock_api: "yes" }, "f.json")).toThrow('f.json: "mock_api" must be true or false');
        expect(() => validateLayer([], "f.json")).toThrow("f.json: expected a JSON object");
    });

    it("warns about unknown keys and ignores them", () => {
        const log = vi.spyOn(console, "log").mockImplementation(() => {});
        expect(validateLayer({ inputPath: "src", outDir: "x" }, "f.json")).toEqual({ inputPath: "src" });
        expect(log).toHaveBeenCalledWith('  \x1b[33m⚠ f.json: unknown key "outDir" is ignored\x1b[0m');
    });
});
