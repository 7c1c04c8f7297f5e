import type { EventEntry, EventHandlerGroup, SourceLocation } from "@tauria/tsgen-core";
import { GENERATED_HEADER, type PrintOptions, printType, referencesUserTypes } from "../printer";
import type { EventHandlersContext } from "./contexts";

/** Names derived from a group's handler name: `MainWindowEventHandlers` → `MainWindowEventCallbacks`, `listenMainWindowEvents`. */
export function handlerNames(group: EventHandlerGroup): { callbacks: string; record: string; listen: string } {
    const base = group.handlerName.replace(/EventHandlers(\d*)$/, "$1");
    return {
        callbacks: `${base}EventCallbacks`,
        record: group.handlerName,
        listen: `listen${base}Events`,
    };
}

function describe(group: EventHandlerGroup): string {
    switch (group.scope.kind) {
        case "global":
            return "Events broadcast to every window.";
        case "window":
            return `Events emitted to the window labelled '${group.scope.label}'.`;
        case "current-window":
            return "Events emitted to the window that invoked the emitting command.";
    }
}

function sitesText(sites: SourceLocation[]): string {
    return sites.map((s) => `${s.file}:${s.line}`).join(", ");
}

function isVoid(entry: EventEntry): boolean {
    return entry.payload.kind === "primitive" && entry.payload.name === "void";
}

export function renderEventHandlers(ctx: EventHandlersContext): string {
    const { group } = ctx;
    const names = handlerNames(group);
    const options: PrintOptions = { names: ctx.typeNames, qualifier: "T." };
    const global = group.scope.kind === "global";

    const lines = [
        GENERATED_HEADER,
        global
            ? 'import { type UnlistenFn, listen } from "@tauri-apps/api/event";'
            : 'import type { UnlistenFn } from "@tauri-apps/api/event";',
    ];
    if (!global) lines.push('import { getCurrentWebviewWindow } from "@tauri-apps/api/webviewWindow";');
    if (referencesUserTypes(group.events.map((e) => e.payload), ctx.typeNames)) {
        lines.push(`import type * as T from "${ctx.typesImport}";`);
    }

    lines.push("", `/** ${describe(group)} */`, `export interface ${names.callbacks} {`);
    for (const entry of group.events) {
        const param = isVoid(entry) ? "" : `payload: ${printType(entry.payload, options)}`;
        lines.push(`    /** \`${entry.name}\`, emitted at ${sitesText(entry.sites)} */`, `    ${entry.callback}(${param}): void;`);
    }
    lines.push(
        "}",
        "",
        `export interface ${names.record} {`,
        `    callbacks: ${names.callbacks};`,
        "    unlistenAll(): Promise<void>;",
        "}",
        "",
        `export async function ${names.listen}(callbacks: ${names.callbacks}): Promise<${names.record}> {`,
    );

    const subscribe = global ? "listen" : "target.listen";
    if (!global) lines.push("    const target = getCurrentWebviewWindow();");
    lines.push("    const results = await Promise.allSettled([");
    for (const entry of group.events) {
        const payload = isVoid(entry) ? "void" : printType(entry.payload, options);
        const call = isVoid(entry) ? `callbacks.${entry.callback}()` : `callbacks.${entry.callback}(event.payload)`;
        const handler = isVoid(entry) ? `() => ${call}` : `(event) => ${call}`;
        lines.push(`        ${subscribe}<${payload}>(${JSON.stringify(entry.name)}, ${handler}),`);
    }
    // A listener that failed to register drops the ones that did.
    lines.push(
        "    ]);",
        "    const unlisteners: UnlistenFn[] = [];",
        "    const failures: unknown[] = [];",
        "    for (const result of results) {",
        '        if (result.status === "fulfilled") unlisteners.push(result.value);',
        "        else failures.push(result.reason);",
        "    }",
        "    if (failures.length > 0) {",
        "        for (const unlisten of unlisteners) unlisten();",
        "        throw failures[0];",
        "    }",
        "    return {",
        "        callbacks,",
        "        async unlistenAll() {",
        "            for (const unlisten of unlisteners) unlisten();",
        "        },",
        "    };",
        "}",
        "",
    );
    return lines.join("\n");
}
