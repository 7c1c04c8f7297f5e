/**
 * Analysis pipeline: Scan → Parse → Resolve → Detect-Events → Assemble.
 *
 * Files are read and parsed on a bounded pool; per-file results are joined
 * back in scan order before any cross-file phase runs, so the model does
 * not depend on read completion order.
 */

import { Semaphore } from "es-toolkit";
import type { FileProvider } from "./contracts";
import { AnalysisFatalError, DiagnosticBag } from "./diagnostics/diagnostics";
import { detectEventSites, mergeEventSites } from "./events/detector";
import { Logger } from "./logger/logger";
import { applySerdeGating, buildCommands } from "./model/commands";
import { TypeIndex, buildTypeDeclarations, linkCommands, linkTypeDeclarations } from "./model/type-model";
import { ParseError } from "./parser/lexer";
import { type ParsedFile, parseFile } from "./parser/parser";
import { buildAliasTable } from "./resolver/aliases";
import { assembleTree } from "./tree/assembler";
import type { AnalysisResult, CommandFunction, EventSite, SourceFileSummary, TypeDeclaration } from "./types";

export const DEFAULT_CONCURRENCY = 8;

export interface AnalyzeOptions {
    files: FileProvider;
    /** Files read and parsed at once. */
    concurrency?: number;
    /** Export only types deriving serde traits and gate command signatures on them. */
    strictSerde?: boolean;
    logger?: Logger;
}

interface FileAnalysis {
    summary: SourceFileSummary;
    commands: CommandFunction[];
    types: TypeDeclaration[];
    sites: EventSite[];
    diagnostics: DiagnosticBag;
}

// ── Per-file phases ─────────────────────────────────────────────────

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

async function analyzeFile(path: string, files: FileProvider): Promise<FileAnalysis> {
    const segments = path.split("/");
    const fileName = segments.pop() ?? path;
    const summary: SourceFileSummary = {
        path,
        modulePath: segments,
        baseName: fileName.replace(/\.rs$/, ""),
        aliases: {},
        parsed: false,
    };
    const diagnostics = new DiagnosticBag();
    const empty: FileAnalysis = { summary, commands: [], types: [], sites: [], diagnostics };

    let source: string;
    try {
        source = await files.read(path);
    } catch (err) {
        diagnostics.error("unreadable-file", `cannot read ${path}: ${describeError(err)}`, { file: path });
        return empty;
    }

    let parsed: ParsedFile;
    try {
        parsed = parseFile(source);
    } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        diagnostics.error("syntax-error", err.message, { file: path, line: err.line, column: err.column });
        return empty;
    }

    const aliases = buildAliasTable(parsed.aliases);
    summary.aliases = Object.fromEntries([...aliases].map(([alias, target]) => [alias, target.join("::")]));
    summary.parsed = true;

    return {
        summary,
        commands: buildCommands(path, parsed, aliases, diagnostics),
        types: buildTypeDeclarations(path, parsed, aliases, diagnostics),
        sites: detectEventSites(path, parsed, aliases, diagnostics),
        diagnostics,
    };
}

async function listSources(files: FileProvider): Promise<string[]> {
    let listed: string[];
    try {
        listed = await files.list();
    } catch (err) {
        if (err instanceof AnalysisFatalError) throw err;
        throw new AnalysisFatalError("missing-root", `cannot list source files: ${describeError(err)}`, { cause: err });
    }
    const paths = new Set(listed.map((p) => p.replaceAll("\\", "/")).filter((p) => p.endsWith(".rs")));
    return [...paths].sort();
}

// ── Pipeline ────────────────────────────────────────────────────────

/**
 * Analyze every `.rs` file the provider lists.
 *
 * Per-file problems become diagnostics on the result; only a missing
 * source root or a broken ownership invariant throws
 * ({@link AnalysisFatalError}).
 */
export async function analyze(options: AnalyzeOptions): Promise<AnalysisResult> {
    const logger = options.logger ?? new Logger();
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    // Phase 1: Scan
    const paths = await listSources(options.files);
    logger.phase("scan", `${paths.length} source file(s)`, { concurrency });

    // Phase 2: Parse and resolve each file on a bounded pool
    const semaphore = new Semaphore(concurrency);
    const perFile = await Promise.all(
        paths.map(async (path) => {
            await semaphore.acquire();
            try {
                return await analyzeFile(path, options.files);
            } finally {
                semaphore.release();
            }
        }),
    );
    logger.phase("parse", "per-file analysis complete", {
        parsed: perFile.filter((f) => f.summary.parsed).length,
        failed: perFile.filter((f) => !f.summary.parsed).length,
    });

    const diagnostics = new DiagnosticBag();
    for (const file of perFile) diagnostics.merge(file.diagnostics);

    // Phase 3: Link types across files
    const declarations = perFile.flatMap((f) => f.types);
    const index = new TypeIndex(declarations);
    let types = linkTypeDeclarations(declarations, index, diagnostics);
    let commands = linkCommands(
        perFile.flatMap((f) => f.commands),
        index,
        diagnostics,
    );
    if (options.strictSerde) {
        commands = applySerdeGating(commands, index.declarations, diagnostics);
        types = types.filter((t) => t.serialize || t.deserialize);
    }
    logger.phase("resolve", "types linked", { commands: commands.length, types: types.length });

    // Phase 4: Detect events
    const sites = perFile
        .flatMap((f) => f.sites)
        .map((site) => ({
            ...site,
            payload: index.link(site.payload, site.module, (missing) =>
                diagnostics.warn(
                    "unresolved-type",
                    `type '${missing}' used by event '${site.name}' is not declared in the scanned sources`,
                    site.location,
                ),
            ),
        }));
    const events = mergeEventSites(sites, diagnostics);
    logger.phase("events", `${sites.length} emit site(s) in ${events.length} scope(s)`);

    // Phase 5: Assemble
    const files = perFile.map((f) => f.summary);
    const tree = assembleTree(files, commands, types, diagnostics);

    const reported = diagnostics.list();
    for (const diagnostic of reported) logger.diagnostic(diagnostic);

    return { files, commands, types, sites, events, tree, diagnostics: reported };
}
