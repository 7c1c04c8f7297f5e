import { camelCase } from "es-toolkit";
import { LOG_LEVELS, type LogLevel, isLogLevel, warn } from "./logger";

export interface TsgenConfig {
    /** Absolute directory scanned for `.rs` files. */
    inputPath: string;
    /** Absolute directory the generated tree is written to. */
    outputPath: string;
    mockApi: boolean;
    strictSerde: boolean;
    concurrency: number;
    logLevel: LogLevel;
}

export type ConfigKey = keyof TsgenConfig;

export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "ConfigError";
    }
}

// ── Field validators ───────────────────────────────────────────────

function expectPath(value: unknown, key: string, source: string): string {
    if (typeof value !== "string" || value.trim() === "") {
        throw new ConfigError(`${source}: "${key}" must be a non-empty string`);
    }
    return value;
}

function expectBoolean(value: unknown, key: string, source: string): boolean {
    if (typeof value !== "boolean") throw new ConfigError(`${source}: "${key}" must be true or false`);
    return value;
}

/** Flags arrive as strings or numbers depending on how they were typed. */
function expectConcurrency(value: unknown, key: string, source: string): number {
    const parsed = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
    if (typeof parsed !== "number" || !Number.isInteger(parsed) || parsed < 1) {
        throw new ConfigError(`${source}: "${key}" must be a positive integer, got ${JSON.stringify(value)}`);
    }
    return parsed;
}

function expectLogLevel(value: unknown, key: string, source: string): LogLevel {
    if (!isLogLevel(value)) {
        throw new ConfigError(`${source}: "${key}" must be one of ${LOG_LEVELS.join(", ")}`);
    }
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── Config validation ──────────────────────────────────────────────

/**
 * Validate one layer of settings (a parsed config file or the CLI flags).
 * Keys are accepted in any case style (`input_path`, `input-path`,
 * `inputPath`); unknown keys warn, wrong types throw {@link ConfigError}.
 * Paths are returned as written.
 */
export function validateLayer(raw: unknown, source: string): Partial<TsgenConfig> {
    if (!isRecord(raw)) throw new ConfigError(`${source}: expected a JSON object`);

    const layer: Partial<TsgenConfig> = {};
    for (const [rawKey, value] of Object.entries(raw)) {
        if (value === undefined) continue;
        const key = camelCase(rawKey);
        switch (key) {
            case "inputPath":
            case "outputPath":
                layer[key] = expectPath(value, rawKey, source);
                break;
            case "mockApi":
            case "strictSerde":
                layer[key] = expectBoolean(value, rawKey, source);
                break;
            case "concurrency":
                layer.concurrency = expectConcurrency(value, rawKey, source);
                break;
            case "logLevel":
                layer.logLevel = expectLogLevel(value, rawKey, source);
                break;
            default:
                warn(`${source}: unknown key "${rawKey}" is ignored`);
        }
    }
    return layer;
}

/** Check that the merged layers name both directories. */
export function validateConfig(merged: Partial<TsgenConfig>, defaults: Omit<TsgenConfig, "inputPath" | "outputPath">): TsgenConfig {
    const { inputPath, outputPath } = merged;
    if (inputPath === undefined) {
        throw new ConfigError("No input path: pass --input-path or set \"inputPath\" in tsgen.config.json");
    }
    if (outputPath === undefined) {
        throw new ConfigError("No output path: pass --output-path or set \"outputPath\" in tsgen.config.json");
    }
    return { ...defaults, ...merged, inputPath, outputPath };
}
