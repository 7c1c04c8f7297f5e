import type { CommandFunction, ModuleFileNode } from "@tauria/tsgen-core";
import { GENERATED_HEADER, type PrintOptions, docComment, printType, propertyKey, referencesUserTypes } from "../printer";
import type { CommandModuleContext } from "./contexts";

// ── Shared ──────────────────────────────────────────────────────────

function interfaceName(module: ModuleFileNode): string {
    return `I${module.wrapperName}`;
}

function usesUserTypes(module: ModuleFileNode, names: ReadonlyMap<string, string>, withErrors: boolean): boolean {
    return referencesUserTypes(
        module.commands.flatMap((c) => [
            ...c.params.map((p) => p.type),
            c.returns,
            ...(withErrors && c.errorType ? [c.errorType] : []),
        ]),
        names,
    );
}

/** `getUser(id: number): Promise<T.User>` */
function signature(command: CommandFunction, options: PrintOptions): string {
    const params = command.params.map((p) => `${p.tsName}: ${printType(p.type, options)}`).join(", ");
    return `${command.method}(${params}): Promise<${printType(command.returns, options)}>`;
}

/** The command's docs, followed by the error arm of its `Result` as `@throws`. */
function commandDocs(command: CommandFunction, options: PrintOptions): string {
    const docs = command.docs.trim();
    if (!command.errorType) return docs;
    const throws = `@throws {${printType(command.errorType, options)}}`;
    return docs === "" ? throws : `${docs}\n${throws}`;
}

function invokeArguments(command: CommandFunction): string {
    const name = JSON.stringify(command.name);
    if (command.params.length === 0) return name;
    const entries = command.params.map((p) => (p.key === p.tsName ? p.tsName : `${propertyKey(p.key)}: ${p.tsName}`));
    return `${name}, { ${entries.join(", ")} }`;
}

function typesImportLine(ctx: CommandModuleContext, withErrors = false): string[] {
    return usesUserTypes(ctx.module, ctx.typeNames, withErrors) ? [`import type * as T from "${ctx.typesImport}";`] : [];
}

// ── Templates ───────────────────────────────────────────────────────

/** `tauria-api/<dirs>/<Module>.ts`: a factory returning the invoke-backed client. */
export function renderCommandWrapper(ctx: CommandModuleContext): string {
    const { module } = ctx;
    const options: PrintOptions = { names: ctx.typeNames, qualifier: "T." };
    const lines = [
        GENERATED_HEADER,
        'import { invoke } from "@tauri-apps/api/core";',
        `import type { ${interfaceName(module)} } from "${ctx.interfaceImport}";`,
        ...typesImportLine(ctx),
        "",
        `export function create${module.wrapperName}(): ${interfaceName(module)} {`,
        "    return {",
    ];
    for (const command of module.commands) {
        lines.push(
            `        ${signature(command, options)} {`,
            `            return invoke<${printType(command.returns, options)}>(${invokeArguments(command)});`,
            "        },",
        );
    }
    lines.push("    };", "}", "");
    return lines.join("\n");
}

/** `interface/commands/<dirs>/<Module>.ts`: the client's contract. */
export function renderCommandInterface(ctx: CommandModuleContext): string {
    const { module } = ctx;
    const options: PrintOptions = { names: ctx.typeNames, qualifier: "T." };
    const lines = [GENERATED_HEADER, ...typesImportLine(ctx, true), ""];
    lines.push(`/** Commands declared in ${module.file}. */`, `export interface ${interfaceName(module)} {`);
    for (const command of module.commands) {
        lines.push(...docComment(commandDocs(command, options), "    "), `    ${signature(command, options)};`);
    }
    lines.push("}", "");
    return lines.join("\n");
}

/** `mock-api/<dirs>/<Module>.ts`: the same contract backed by caller-supplied overrides. */
export function renderMockApi(ctx: CommandModuleContext): string {
    const { module } = ctx;
    const name = interfaceName(module);
    const lines = [
        GENERATED_HEADER,
        `import type { ${name} } from "${ctx.interfaceImport}";`,
        "",
        `export function createMock${module.wrapperName}(overrides: Partial<${name}> = {}): ${name} {`,
        "    const notMocked = (method: string) => () =>",
        `        Promise.reject(new Error("${module.wrapperName}." + method + " is not mocked"));`,
        "    return {",
    ];
    for (const command of module.commands) {
        lines.push(`        ${command.method}: overrides.${command.method} ?? notMocked(${JSON.stringify(command.method)}),`);
    }
    lines.push("    };", "}", "");
    return lines.join("\n");
}
