/**
 * Render pipeline: analysis model to output files.
 *
 * Output layout, relative to the output directory:
 *
 *   tauria-api/<dirs>/<Module>.ts          invoke-backed client factories
 *   tauria-api/events/<Name>.ts             event listener records
 *   interface/commands/<dirs>/<Module>.ts  client interfaces
 *   interface/types/index.ts                data types
 *   mock-api/<dirs>/<Module>.ts            mock factories (opt-in)
 *   index.ts                                root re-exports
 *
 * plus an `index.ts` barrel in every directory.
 */

import { posix } from "node:path";
import { type AnalysisResult, type GeneratedFile, type Renderer, moduleNodes, safeIdentifier } from "@tauria/tsgen-core";
import { camelCase } from "es-toolkit";
import { createRenderer } from "./templates";
import type { BarrelEntry, TemplateContexts } from "./templates/contexts";

export interface GenerateInput {
    analysis: AnalysisResult;
    /** Also render `mock-api/`. */
    mockApi?: boolean;
    renderer?: Renderer<TemplateContexts>;
}

const API_ROOT = "tauria-api";
const COMMANDS_ROOT = "interface/commands";
const MOCK_ROOT = "mock-api";
const TYPES_INDEX = "interface/types/index.ts";

/** Import specifier of `to` as seen from `from`; both relative to the output directory. */
export function importPath(from: string, to: string): string {
    const relative = posix
        .relative(posix.dirname(from), to)
        .replace(/\.ts$/, "")
        .replace(/(^|\/)index$/, "");
    if (relative === "") return ".";
    return relative.startsWith(".") ? relative : `./${relative}`;
}

// ── Barrels ─────────────────────────────────────────────────────────

/** One barrel per directory under `root`, listing its files and sub-directories. */
function barrelContexts(root: string, paths: string[]): Map<string, BarrelEntry[]> {
    const modules = new Map<string, Set<string>>([[root, new Set()]]);
    const directories = new Map<string, Set<string>>([[root, new Set()]]);

    for (const path of paths) {
        if (!path.startsWith(`${root}/`)) continue;
        const segments = path.slice(root.length + 1).split("/");
        const file = segments.pop();
        if (file === undefined || file === "index.ts") continue;

        let current = root;
        for (const segment of segments) {
            directories.get(current)?.add(segment);
            current = `${current}/${segment}`;
            if (!directories.has(current)) directories.set(current, new Set());
            if (!modules.has(current)) modules.set(current, new Set());
        }
        modules.get(current)?.add(file.replace(/\.ts$/, ""));
    }

    const barrels = new Map<string, BarrelEntry[]>();
    for (const [directory, children] of directories) {
        const entries: BarrelEntry[] = [...children].sort().map((child) => ({
            from: `./${child}`,
            namespace: safeIdentifier(camelCase(child) || child),
        }));
        for (const module of [...(modules.get(directory) ?? [])].sort()) {
            entries.push({ from: `./${module}`, namespace: null });
        }
        barrels.set(`${directory}/index.ts`, entries);
    }
    return barrels;
}

// ── Generation ──────────────────────────────────────────────────────

/** Render every output file for one analysis, sorted by path. */
export function generate(input: GenerateInput): GeneratedFile[] {
    const { analysis } = input;
    const renderer = input.renderer ?? createRenderer();
    const typeNames = new Map(analysis.types.map((t) => [t.id, t.exportName]));
    const files: GeneratedFile[] = [];

    // Phase 1: Command modules
    for (const module of moduleNodes(analysis.tree)) {
        if (module.commands.length === 0) continue;
        const directories = module.path.slice(0, -1);
        const fileName = `${module.wrapperName}.ts`;
        const wrapperPath = posix.join(API_ROOT, ...directories, fileName);
        const interfacePath = posix.join(COMMANDS_ROOT, ...directories, fileName);

        const context = (path: string) => ({
            module,
            typeNames,
            interfaceImport: importPath(path, interfacePath),
            typesImport: importPath(path, TYPES_INDEX),
        });
        files.push(
            { path: wrapperPath, content: renderer.render("command-wrapper", context(wrapperPath)) },
            { path: interfacePath, content: renderer.render("command-interface", context(interfacePath)) },
        );
        if (input.mockApi) {
            const mockPath = posix.join(MOCK_ROOT, ...directories, fileName);
            files.push({ path: mockPath, content: renderer.render("mock-api", context(mockPath)) });
        }
    }

    // Phase 2: Event handler records
    for (const group of analysis.events) {
        const path = posix.join(API_ROOT, "events", `${group.handlerName}.ts`);
        files.push({
            path,
            content: renderer.render("event-handlers", { group, typeNames, typesImport: importPath(path, TYPES_INDEX) }),
        });
    }

    // Phase 3: Types
    files.push({ path: TYPES_INDEX, content: renderer.render("types-index", { types: analysis.types, typeNames }) });

    // Phase 4: Barrels and the root index
    const roots = input.mockApi ? [API_ROOT, COMMANDS_ROOT, MOCK_ROOT] : [API_ROOT, COMMANDS_ROOT];
    const paths = files.map((f) => f.path);
    for (const root of roots) {
        for (const [path, entries] of barrelContexts(root, paths)) {
            files.push({ path, content: renderer.render("barrel", { entries }) });
        }
    }
    files.push(
        {
            path: "interface/index.ts",
            content: renderer.render("barrel", {
                entries: [
                    { from: "./commands", namespace: "commands" },
                    { from: "./types", namespace: "types" },
                ],
            }),
        },
        { path: "index.ts", content: renderer.render("root-index", { mockApi: input.mockApi ?? false }) },
    );

    return files.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
