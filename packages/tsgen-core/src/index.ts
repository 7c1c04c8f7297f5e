export { type AnalyzeOptions, DEFAULT_CONCURRENCY, analyze } from "./analyze";
export type { FileProvider, GeneratedFile, Renderer, WriteSummary, Writer } from "./contracts";
export { AnalysisFatalError, DiagnosticBag, type FatalReason, formatDiagnostic } from "./diagnostics/diagnostics";
export { createConsoleHandler } from "./logger/console-handler";
export { Logger } from "./logger/logger";
export type { AnalysisPhase, DiagnosticEntry, LogEntry, LogHandler, LogLevel, PhaseEntry } from "./logger/types";
export { createMemoryFileProvider, type MemoryFileProviderOptions } from "./memory-provider";
export { safeIdentifier } from "./naming";
export { moduleNodes } from "./tree/assembler";
export { walkType } from "./resolver/type-resolver";
export type * from "./types";
