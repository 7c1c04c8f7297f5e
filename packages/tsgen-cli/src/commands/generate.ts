import { basename } from "node:path";
import {
    type AnalysisResult,
    AnalysisFatalError,
    Logger,
    type WriteSummary,
    createConsoleHandler,
    analyze,
    formatDiagnostic,
} from "@tauria/tsgen-core";
import { generate as generateFiles } from "@tauria/tsgen-generator";
import { type CliFlags, loadConfig } from "../config";
import { createNodeFileProvider } from "../file-provider";
import { banner, error, footer, note, setLogLevel, startTimer, step, stepFail, warn } from "../logger";
import { ConfigError, type TsgenConfig } from "../validate";
import { StagedWriter } from "../writer";

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Core logger for a run; phase progress is printed only at `debug`. */
function createAnalysisLogger(config: TsgenConfig): Logger {
    const logger = new Logger();
    if (config.logLevel === "debug") {
        const print = createConsoleHandler("tsgen");
        logger.addHandler((entry) => {
            if (entry.kind === "phase") print(entry);
        });
    }
    return logger;
}

function reportDiagnostics(analysis: AnalysisResult): void {
    for (const diagnostic of analysis.diagnostics) {
        if (diagnostic.severity === "error") error(formatDiagnostic(diagnostic));
        else warn(formatDiagnostic(diagnostic));
    }
}

/**
 * `tsgen generate`: analyze, render and write. Resolves to the process exit
 * code: 1 when the configuration is invalid, the run aborted, or any source
 * file could not be analyzed (the rest of the output is still written).
 */
export async function generate(flags: CliFlags, cwd = process.cwd()): Promise<number> {
    const total = startTimer();

    // 1. Load config
    let config: TsgenConfig;
    try {
        const loaded = await loadConfig(flags, cwd);
        config = loaded.config;
        setLogLevel(config.logLevel);
        banner("generate", basename(config.inputPath));
        if (loaded.configPath) note(`config ${loaded.configPath}`);
    } catch (err) {
        if (!(err instanceof ConfigError)) throw err;
        error(err.message);
        return 1;
    }

    // 2. Analyze sources
    let timer = startTimer();
    let analysis: AnalysisResult;
    try {
        analysis = await analyze({
            files: createNodeFileProvider(config.inputPath),
            concurrency: config.concurrency,
            strictSerde: config.strictSerde,
            logger: createAnalysisLogger(config),
        });
    } catch (err) {
        if (!(err instanceof AnalysisFatalError)) throw err;
        stepFail("analyze", err.message);
        return 1;
    }
    step(
        "analyze",
        timer(),
        `${analysis.files.length} file(s), ${analysis.commands.length} command(s), ${analysis.types.length} type(s)`,
    );
    reportDiagnostics(analysis);

    // 3. Render
    timer = startTimer();
    const files = generateFiles({ analysis, mockApi: config.mockApi });
    step("render", timer(), `${files.length} file(s)`);

    // 4. Write
    timer = startTimer();
    let summary: WriteSummary;
    try {
        summary = await new StagedWriter(config.outputPath).write(files);
    } catch (err) {
        stepFail("write", describeError(err));
        return 1;
    }
    step("write", timer(), `${summary.written.length} written, ${summary.unchanged.length} unchanged`);

    const failed = analysis.diagnostics.filter((d) => d.severity === "error").length;
    if (failed > 0) {
        error(`${failed} source file(s) could not be analyzed`);
        return 1;
    }
    footer(`Generated into ${config.outputPath} in ${total()}`);
    return 0;
}
