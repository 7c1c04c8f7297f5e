import { formatDiagnostic } from "../diagnostics/diagnostics";
import type { LogEntry, LogHandler } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const yellow = "\x1b[33m";
const red = "\x1b[31m";
const reset = "\x1b[0m";

function formatTime(ts: number): string {
    const d = new Date(ts);
    return [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":");
}

/** ` (parsed 3, failed 1)`, or nothing without counts. */
function formatCounts(counts: Record<string, number>): string {
    const pairs = Object.entries(counts).map(([name, count]) => `${name} ${count}`);
    return pairs.length === 0 ? "" : ` ${dim}(${pairs.join(", ")})${reset}`;
}

/**
 * Handler printing one line per entry:
 * `HH:MM:SS [tag] parse per-file analysis complete (parsed 3)` for phases,
 * `HH:MM:SS [tag] warn lib.rs:4:9 name-collision ...` for diagnostics.
 */
export function createConsoleHandler(tag = "tsgen"): LogHandler {
    return (entry: LogEntry) => {
        const prefix = `${dim}${formatTime(entry.timestamp)}${reset} [${tag}]`;
        if (entry.kind === "phase") {
            console.log(`${prefix} ${cyan}${entry.phase}${reset} ${entry.message}${formatCounts(entry.counts)}`);
            return;
        }
        const color = entry.level === "error" ? red : yellow;
        const line = `${prefix} ${color}${entry.level}${reset} ${formatDiagnostic(entry.diagnostic)}`;
        if (entry.level === "error") console.error(line);
        else console.warn(line);
    };
}
