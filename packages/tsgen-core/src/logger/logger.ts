import type { Diagnostic } from "../types";
import type { AnalysisPhase, LogEntry, LogHandler } from "./types";

/** Analysis logger with pluggable handlers. Emits nothing until a handler is added. */
export class Logger {
    private readonly handlers = new Set<LogHandler>();

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    phase(phase: AnalysisPhase, message: string, counts: Record<string, number> = {}): void {
        this.emit({ kind: "phase", level: "debug", phase, message, counts, timestamp: Date.now() });
    }

    diagnostic(diagnostic: Diagnostic): void {
        const level = diagnostic.severity === "error" ? "error" : "warn";
        this.emit({ kind: "diagnostic", level, diagnostic, timestamp: Date.now() });
    }

    private emit(entry: LogEntry): void {
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
