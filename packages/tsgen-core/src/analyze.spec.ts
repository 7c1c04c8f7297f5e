/**
 * Contract: analyze() -- the full pipeline over an in-memory source tree.
 *
 * Sections:
 *   1. Scenarios
 *   2. Determinism
 *   3. Per-file failures
 *   4. Options
 */

import { describe, expect, it } from "vitest";
import { DEFAULT_CONCURRENCY, analyze } from "./analyze";
import type { FileProvider } from "./contracts";
import { AnalysisFatalError, formatDiagnostic } from "./diagnostics/diagnostics";
import { Logger } from "./logger/logger";
import type { LogEntry } from "./logger/types";
import { createMemoryFileProvider } from "./memory-provider";

const MODELS = `
#[derive(Serialize, Deserialize)]
pub struct User {
    /// Unique id
    pub id: u32,
    /// Display name
    pub name: String,
}
`;

const USER_COMMANDS = `
use crate::models::User;

#[tauri::command]
pub fn get_user(id: u32) -> User { todo!() }

#[tauri::command]
pub async fn find_user(name: String) -> Result<Option<User>, String> { todo!() }
`;

const EVENTS = `
use tauri::{AppHandle, Emitter};

pub fn broadcast(app: &AppHandle) {
    app.emit_to("main", "window-event", 1).unwrap();
    app.emit_to("main", "main_event", "x").unwrap();
}
`;

function run(files: Record<string, string>, delays?: Record<string, number>) {
    return analyze({ files: createMemoryFileProvider(files, { delays }) });
}

// ── 1. Scenarios ────────────────────────────────────────────────────

describe("analyze() scenarios", () => {
    it("drops an application handle and keeps the String result", async () => {
        const result = await run({
            "lib.rs": `
use tauri::AppHandle;
#[tauri::command]
fn app_name(app: AppHandle) -> String { app.package_info().name.clone() }
`,
        });
        const [command] = result.commands;
        expect(command?.params).toEqual([]);
        expect(command?.excluded.map((e) => e.handle)).toEqual(["app"]);
        expect(command?.returns).toEqual({ kind: "primitive", name: "string" });
        expect(result.diagnostics).toEqual([]);
    });

    it("links a command's return type to a struct in another file", async () => {
        const result = await run({ "commands/user.rs": USER_COMMANDS, "models.rs": MODELS });

        expect(result.commands.map((c) => c.method)).toEqual(["getUser", "findUser"]);
        expect(result.commands[0]?.params.map((p) => p.tsName)).toEqual(["id"]);
        expect(result.commands[0]?.returns).toEqual({
            kind: "named",
            name: "User",
            path: ["crate", "models", "User"],
            args: [],
            target: "models.rs::User",
        });
        expect(result.commands[1]?.returns).toMatchObject({ kind: "optional", inner: { target: "models.rs::User" } });
        expect(result.commands[1]?.errorType).toEqual({ kind: "primitive", name: "string" });

        const [user] = result.types;
        expect(user?.kind === "struct" ? user.fields.map((f) => [f.name, f.docs]) : null).toEqual([
            ["id", "Unique id"],
            ["name", "Display name"],
        ]);
        expect(result.diagnostics).toEqual([]);
    });

    it("merges two window-scoped sites into one handler group", async () => {
        const result = await run({ "events.rs": EVENTS });
        expect(result.events).toHaveLength(1);
        expect(result.events[0]?.handlerName).toBe("MainWindowEventHandlers");
        expect(result.events[0]?.events.map((e) => [e.name, e.callback])).toEqual([
            ["window-event", "onWindowEvent"],
            ["main_event", "onMainEvent"],
        ]);
    });

    it("keeps both declarations of a duplicated type name", async () => {
        const result = await run({
            "a/models.rs": "pub struct User { pub id: u8 }",
            "b/models.rs": "pub struct User { pub id: u8 }",
        });
        expect(result.types.map((t) => t.id)).toEqual(["a/models.rs::User", "b/models.rs::User"]);
        expect(result.diagnostics.filter((d) => d.code === "name-collision")).toHaveLength(1);
    });

    it("excludes injected handles behind aliases and references", async () => {
        const result = await run({
            "lib.rs": `
use tauri::Window as Win;
#[tauri::command]
fn save(w: &Win, s: tauri::State<'_, Db>, h: &tauri::AppHandle, n: u8) {}
`,
        });
        expect(result.commands[0]?.params.map((p) => p.name)).toEqual(["n"]);
    });

    it("builds the module tree from files with declarations only", async () => {
        const result = await run({ "commands/user.rs": USER_COMMANDS, "models.rs": MODELS, "events.rs": EVENTS });
        expect(result.tree.children.map((c) => c.name)).toEqual(["commands", "models"]);
        expect(result.files.map((f) => f.path)).toEqual(["commands/user.rs", "events.rs", "models.rs"]);
        expect(result.files[0]?.aliases).toEqual({ User: "crate::models::User" });
    });
});

// ── 2. Determinism ──────────────────────────────────────────────────

describe("analyze() determinism", () => {
    const tree = { "commands/user.rs": USER_COMMANDS, "models.rs": MODELS, "events.rs": EVENTS };

    it("produces an identical model on every run", async () => {
        const first = await run(tree);
        const second = await run(tree);
        expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    });

    it("does not depend on the order reads complete in", async () => {
        const inOrder = await run(tree, { "commands/user.rs": 0, "events.rs": 10, "models.rs": 20 });
        const reversed = await run(tree, { "commands/user.rs": 20, "events.rs": 10, "models.rs": 0 });
        expect(JSON.stringify(reversed)).toBe(JSON.stringify(inOrder));
    });
});

// ── 3. Per-file failures ────────────────────────────────────────────

describe("analyze() failures", () => {
    it("reports a syntax error and analyzes the remaining files", async () => {
        const result = await run({
            "bad.rs": "struct A {\n    id u8,\n}",
            "good.rs": "#[tauri::command]\nfn ok() {}",
        });
        expect(result.commands.map((c) => c.name)).toEqual(["ok"]);
        expect(result.files.map((f) => [f.path, f.parsed])).toEqual([
            ["bad.rs", false],
            ["good.rs", true],
        ]);
        expect(result.diagnostics).toEqual([
            {
                code: "syntax-error",
                severity: "error",
                message: "expected ':', found 'u8'",
                file: "bad.rs",
                line: 2,
                column: 8,
            },
        ]);
    });

    it("reports unreadable files", async () => {
        const files: FileProvider = {
            list: async () => ["gone.rs"],
            read: async () => {
                throw new Error("permission denied");
            },
        };
        const result = await analyze({ files });
        expect(result.diagnostics).toEqual([
            {
                code: "unreadable-file",
                severity: "error",
                message: "cannot read gone.rs: permission denied",
                file: "gone.rs",
            },
        ]);
    });

    it("fails when the source root cannot be listed", async () => {
        const files: FileProvider = {
            list: async () => {
                throw new Error("no such directory");
            },
            read: async () => "",
        };
        const failure = analyze({ files });
        await expect(failure).rejects.toBeInstanceOf(AnalysisFatalError);
        await expect(failure).rejects.toMatchObject({
            reason: "missing-root",
            message: "cannot list source files: no such directory",
        });
    });

    it("ignores files that are not Rust sources", async () => {
        const result = await run({ "README.md": "# notes", "lib.rs": "" });
        expect(result.files.map((f) => f.path)).toEqual(["lib.rs"]);
    });
});

// ── 4. Options ──────────────────────────────────────────────────────

describe("analyze() options", () => {
    it("gates types and signatures on serde derives in strict mode", async () => {
        const result = await analyze({
            files: createMemoryFileProvider({
                "m.rs": `
#[derive(Serialize)]
pub struct Out { pub id: u8 }
pub struct Plain { pub id: u8 }
#[tauri::command]
fn put(input: Out, flag: bool) -> Plain { todo!() }
`,
            }),
            strictSerde: true,
        });
        expect(result.types.map((t) => t.name)).toEqual(["Out"]);
        expect(result.commands[0]?.params.map((p) => p.name)).toEqual(["flag"]);
        expect(result.commands[0]?.returns).toEqual({
            kind: "unsupported",
            text: "Plain",
            reason: "'Plain' does not derive Serialize",
        });
        expect(result.diagnostics.map((d) => d.code)).toEqual(["serde-gated", "serde-gated"]);
    });

    it("logs phases at debug and diagnostics at their severity", async () => {
        const entries: LogEntry[] = [];
        const logger = new Logger();
        logger.addHandler((entry) => entries.push(entry));

        await analyze({
            files: createMemoryFileProvider({
                "a/models.rs": "pub struct User { pub id: u8 }",
                "b/models.rs": "pub struct User { pub id: u8 }",
            }),
            logger,
        });

        expect(entries.map((e) => (e.kind === "phase" ? e.phase : e.level))).toEqual([
            "scan",
            "parse",
            "resolve",
            "events",
            "warn",
        ]);
        expect(entries[0]).toMatchObject({ message: "2 source file(s)", counts: { concurrency: DEFAULT_CONCURRENCY } });
        expect(entries[1]).toMatchObject({ counts: { parsed: 2, failed: 0 } });
        expect(entries.flatMap((e) => (e.kind === "diagnostic" ? [formatDiagnostic(e.diagnostic)] : []))).toEqual([
            "b/models.rs:1:12 name-collision type 'User' is declared 2 times (a/models.rs, b/models.rs); all are kept",
        ]);
    });

    it("rejects a concurrency below one", async () => {
        await expect(analyze({ files: createMemoryFileProvider({}), concurrency: 0 })).rejects.toThrow(
            "concurrency must be a positive integer, got 0",
        );
    });
});
