#!/usr/bin/env tsx
import cac from "cac";
import { version } from "../package.json";
import { generate } from "./commands/generate";
import { error } from "./logger";

const cli = cac("tsgen");

cli.command("generate", "Generate TypeScript clients from Tauri backend sources")
    .option("-c, --config <path>", "Path to a JSON config file (default: tsgen.config.json when present)")
    .option("-i, --input-path <dir>", "Directory of the Tauri backend sources")
    .option("-o, --output-path <dir>", "Directory to write the generated clients to")
    .option("--mock-api", "Also generate mock clients under mock-api/")
    .option("--strict-serde", "Export only types deriving Serialize/Deserialize")
    .option("--concurrency <n>", "Source files analyzed at once (default: 8)")
    .option("-l, --log-level <level>", "Log level (debug | info | warn | error | silent)")
    .action(async (options) => {
        process.exitCode = await generate(options);
    });

cli.help();
cli.version(version);

try {
    cli.parse(process.argv, { run: false });
    await cli.runMatchedCommand();
} catch (err) {
    error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
}
