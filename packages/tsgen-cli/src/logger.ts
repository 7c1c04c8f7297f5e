// ── ANSI constants ──────────────────────────────────────────────────

const yellow = "\x1b[33m";
const green = "\x1b[32m";
const cyan = "\x1b[36m";
const red = "\x1b[31m";
const dim = "\x1b[90m";
const bold = "\x1b[1m";
const reset = "\x1b[0m";

// ── Log level gating ────────────────────────────────────────────────

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

let currentLevel: LogLevel = "info";

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && Object.hasOwn(levels, value);
}

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

function muted(level: LogLevel): boolean {
    return levels[currentLevel] > levels[level];
}

// ── Basic log functions ─────────────────────────────────────────────

export function info(msg: string): void {
    if (muted("info")) return;
    console.log(`  ${dim}▸${reset} ${msg}`);
}

export function warn(msg: string): void {
    if (muted("warn")) return;
    console.log(`  ${yellow}⚠ ${msg}${reset}`);
}

export function error(msg: string): void {
    if (muted("error")) return;
    console.error(`  ${red}✗ ${msg}${reset}`);
}

export function note(msg: string): void {
    if (muted("info")) return;
    console.log(`    ${dim}${msg}${reset}`);
}

// ── Timer ───────────────────────────────────────────────────────────

export function startTimer(): () => string {
    const startedAt = Date.now();
    return () => formatDuration(Date.now() - startedAt);
}

export function formatDuration(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    const seconds = ms / 1000;
    if (seconds < 60) return `${seconds.toFixed(1)}s`;
    const minutes = Math.floor(seconds / 60);
    const rest = Math.round(seconds % 60)
        .toString()
        .padStart(2, "0");
    return `${minutes}m${rest}s`;
}

// ── Step output with dot-leaders ────────────────────────────────────

const STEP_WIDTH = 26;

function leader(label: string): string {
    return "·".repeat(Math.max(2, STEP_WIDTH - label.length - 1));
}

export function step(label: string, duration: string, extra?: string): void {
    if (muted("info")) return;
    const dur = duration.padStart(5);
    const suffix = extra ? `  ${dim}${extra}${reset}` : "";
    console.log(`  ${label} ${dim}${leader(label)}${reset} ${green}✓${reset} ${green}${dur}${reset}${suffix}`);
}

export function stepFail(label: string, message: string): void {
    if (muted("error")) return;
    console.error(`  ${label} ${dim}${leader(label)}${reset} ${red}✗ ${message}${reset}`);
}

// ── Banner and footer ───────────────────────────────────────────────

export function banner(command: string, target: string): void {
    if (muted("info")) return;
    console.log(`\n${bold}${yellow}⚡ tsgen ${command}${reset} → ${cyan}${target}${reset}\n`);
}

export function footer(message: string): void {
    if (muted("info")) return;
    console.log(`\n  ${bold}${green}✓ ${message}${reset}\n`);
}
