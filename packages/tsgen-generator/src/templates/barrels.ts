import { GENERATED_HEADER } from "../printer";
import type { BarrelContext, RootIndexContext } from "./contexts";

export function renderBarrel(ctx: BarrelContext): string {
    const lines = [GENERATED_HEADER];
    if (ctx.entries.length === 0) lines.push("export {};");
    for (const entry of ctx.entries) {
        lines.push(
            entry.namespace === null
                ? `export * from "${entry.from}";`
                : `export * as ${entry.namespace} from "${entry.from}";`,
        );
    }
    lines.push("");
    return lines.join("\n");
}

export function renderRootIndex(ctx: RootIndexContext): string {
    const lines = [GENERATED_HEADER, 'export * from "./interface";', 'export * as api from "./tauria-api";'];
    if (ctx.mockApi) {
        lines.push(
            "// Swap the line above for the mock clients to run the frontend without the Tauri backend:",
            '// export * as api from "./mock-api";',
        );
    }
    lines.push("");
    return lines.join("\n");
}
