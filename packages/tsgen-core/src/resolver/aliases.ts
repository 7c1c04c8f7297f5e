import type { AliasBinding } from "../parser/parser";
import type { InjectedHandle } from "../types";

export type AliasTable = ReadonlyMap<string, readonly string[]>;

/** Build a file's alias table; a later binding for the same alias replaces an earlier one. */
export function buildAliasTable(bindings: AliasBinding[]): AliasTable {
    const table = new Map<string, readonly string[]>();
    for (const binding of bindings) {
        table.set(binding.alias, binding.path);
    }
    return table;
}

const MAX_ALIAS_HOPS = 8;

/**
 * Rewrite a path through the alias table until its first segment is no
 * longer an alias. `Win` with `use tauri::Window as Win` becomes
 * `tauri::Window`; `ipc::Response` with `use tauri::ipc` becomes
 * `tauri::ipc::Response`.
 */
export function canonicalize(path: readonly string[], aliases: AliasTable): string[] {
    let current = [...path];
    for (let hop = 0; hop < MAX_ALIAS_HOPS; hop++) {
        const [first, ...rest] = current;
        if (first === undefined) break;
        const target = aliases.get(first);
        if (!target || (target.length === 1 && target[0] === first)) break;
        current = [...target, ...rest];
    }
    if (current[0] === "$crate") current = ["crate", ...current.slice(1)];
    return current;
}

const INJECTED: ReadonlyMap<string, InjectedHandle> = new Map<string, InjectedHandle>([
    ["tauri::Window", "window"],
    ["tauri::window::Window", "window"],
    ["tauri::WebviewWindow", "window"],
    ["tauri::webview::WebviewWindow", "window"],
    ["tauri::Webview", "window"],
    ["tauri::webview::Webview", "window"],
    ["tauri::State", "state"],
    ["tauri::AppHandle", "app"],
]);

/** Which bridge-injected handle a canonical path names, if any. Generic arguments never matter. */
export function injectedHandle(canonicalPath: readonly string[]): InjectedHandle | null {
    return INJECTED.get(canonicalPath.join("::")) ?? null;
}
