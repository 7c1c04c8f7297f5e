import type { Diagnostic } from "../types";

export type LogLevel = "debug" | "warn" | "error";

/** Pipeline phases that report progress. */
export type AnalysisPhase = "scan" | "parse" | "resolve" | "events";

/** Progress of one phase, with counts such as files parsed or types linked. */
export interface PhaseEntry {
    kind: "phase";
    level: "debug";
    phase: AnalysisPhase;
    message: string;
    counts: Record<string, number>;
    timestamp: number;
}

/** A diagnostic of the run, logged at its severity. */
export interface DiagnosticEntry {
    kind: "diagnostic";
    level: "warn" | "error";
    diagnostic: Diagnostic;
    timestamp: number;
}

export type LogEntry = PhaseEntry | DiagnosticEntry;

export type LogHandler = (entry: LogEntry) => void;
