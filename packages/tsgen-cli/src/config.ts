import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { DEFAULT_CONCURRENCY } from "@tauria/tsgen-core";
import { ConfigError, type TsgenConfig, validateConfig, validateLayer } from "./validate";

export const DEFAULT_CONFIG_FILE = "tsgen.config.json";

export const DEFAULTS: Omit<TsgenConfig, "inputPath" | "outputPath"> = {
    mockApi: false,
    strictSerde: false,
    concurrency: DEFAULT_CONCURRENCY,
    logLevel: "info",
};

/** Options as cac hands them to the `generate` action. */
export interface CliFlags {
    config?: string;
    inputPath?: string;
    outputPath?: string;
    mockApi?: boolean;
    strictSerde?: boolean;
    concurrency?: number | string;
    logLevel?: string;
}

export interface LoadedConfig {
    config: TsgenConfig;
    /** Absolute path to the config file, when one was read. */
    configPath: string | null;
}

function resolvePaths(layer: Partial<TsgenConfig>, base: string): Partial<TsgenConfig> {
    const resolved = { ...layer };
    if (resolved.inputPath !== undefined) resolved.inputPath = resolve(base, resolved.inputPath);
    if (resolved.outputPath !== undefined) resolved.outputPath = resolve(base, resolved.outputPath);
    return resolved;
}

async function readConfigFile(path: string): Promise<unknown> {
    let text: string;
    try {
        text = await readFile(path, "utf-8");
    } catch (err) {
        throw new ConfigError(`Config file not readable: ${path}`, { cause: err });
    }
    try {
        return JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`${path}: invalid JSON (${reason})`, { cause: err });
    }
}

/**
 * Merge defaults, the config file and the CLI flags, later wins.
 *
 * Paths in the config file are relative to the file's directory; paths
 * given as flags are relative to `cwd`.
 */
export async function loadConfig(flags: CliFlags, cwd = process.cwd()): Promise<LoadedConfig> {
    let configPath: string | null = null;
    if (flags.config !== undefined) {
        configPath = isAbsolute(flags.config) ? flags.config : resolve(cwd, flags.config);
        if (!existsSync(configPath)) throw new ConfigError(`Config file not found: ${configPath}`);
    } else if (existsSync(resolve(cwd, DEFAULT_CONFIG_FILE))) {
        configPath = resolve(cwd, DEFAULT_CONFIG_FILE);
    }

    const fileLayer = configPath
        ? resolvePaths(validateLayer(await readConfigFile(configPath), configPath), dirname(configPath))
        : {};

    const { inputPath, outputPath, mockApi, strictSerde, concurrency, logLevel } = flags;
    const flagLayer = resolvePaths(
        validateLayer({ inputPath, outputPath, mockApi, strictSerde, concurrency, logLevel }, "command line"),
        cwd,
    );

    return { config: validateConfig({ ...fileLayer, ...flagLayer }, DEFAULTS), configPath };
}
