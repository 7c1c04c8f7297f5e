/**
 * Command Model Builder: bridgeable functions of one file.
 */

import { camelCase } from "es-toolkit";
import type { DiagnosticBag } from "../diagnostics/diagnostics";
import { methodName, safeIdentifier } from "../naming";
import { commandMarker } from "../parser/attributes";
import type { ParsedFile, RawFunction } from "../parser/parser";
import type { TypeExpr } from "../parser/type-syntax";
import { type AliasTable, canonicalize, injectedHandle } from "../resolver/aliases";
import { narrowReturn, resolveType, unsupportedParts, walkType } from "../resolver/type-resolver";
import type {
    CommandFunction,
    CommandParameter,
    ExcludedParameter,
    SourceLocation,
    TypeDeclaration,
    TypeDescriptor,
} from "../types";

/** Canonical path of the outermost named type, references stripped. */
export function topLevelPath(type: TypeExpr, aliases: AliasTable): string[] | null {
    let current = type;
    while (current.kind === "ref") current = current.inner;
    if (current.kind !== "path") return null;
    return canonicalize(
        current.segments.map((s) => s.name),
        aliases,
    );
}

export function buildCommands(
    file: string,
    parsed: ParsedFile,
    aliases: AliasTable,
    diagnostics: DiagnosticBag,
): CommandFunction[] {
    const commands: CommandFunction[] = [];
    const seen = new Set<string>();

    for (const item of parsed.items) {
        if (item.kind !== "fn" || item.inImpl) continue;
        const marker = commandMarker(item.attributes);
        if (!marker) continue;

        const location: SourceLocation = { file, line: item.line, column: item.column };
        if (seen.has(item.name)) {
            diagnostics.warn(
                "name-collision",
                `command '${item.name}' is declared more than once in ${file}; keeping the first declaration`,
                location,
            );
            continue;
        }
        seen.add(item.name);
        commands.push(buildCommand(file, item, marker.renameAll === "snake_case", aliases, diagnostics));
    }

    return commands;
}

function buildCommand(
    file: string,
    fn: RawFunction,
    snakeKeys: boolean,
    aliases: AliasTable,
    diagnostics: DiagnosticBag,
): CommandFunction {
    const ctx = { aliases, generics: new Set(fn.generics) };
    const params: CommandParameter[] = [];
    const excluded: ExcludedParameter[] = [];

    for (const param of fn.params) {
        const canonical = topLevelPath(param.type, aliases);
        const handle = canonical ? injectedHandle(canonical) : null;
        if (canonical && handle) {
            excluded.push({ name: param.name, handle, canonicalPath: canonical.join("::") });
            continue;
        }

        const type = resolveType(param.type, ctx);
        reportUnsupported(type, `parameter '${param.name}' of command '${fn.name}'`, diagnostics, {
            file,
            line: param.line,
            column: param.column,
        });
        params.push({
            name: param.name,
            tsName: safeIdentifier(camelCase(param.name) || param.name),
            key: snakeKeys ? param.name : camelCase(param.name) || param.name,
            type,
            isReference: param.type.kind === "ref",
        });
    }

    const location: SourceLocation = { file, line: fn.line, column: fn.column };
    const resolved: TypeDescriptor = fn.returnType
        ? resolveType(fn.returnType, ctx)
        : { kind: "primitive", name: "void" };
    const { returns, errorType } = narrowReturn(resolved);
    reportUnsupported(resolved, `return type of command '${fn.name}'`, diagnostics, location);

    return {
        id: `${file}::${fn.name}`,
        name: fn.name,
        method: methodName(fn.name),
        docs: fn.docs,
        params,
        excluded,
        returns,
        errorType,
        isAsync: fn.isAsync,
        argumentCase: snakeKeys ? "snake_case" : "camelCase",
        module: file,
        location,
    };
}

export function reportUnsupported(
    type: TypeDescriptor,
    subject: string,
    diagnostics: DiagnosticBag,
    location: SourceLocation,
): void {
    for (const part of unsupportedParts(type)) {
        diagnostics.warn("unsupported-type", `${subject} uses '${part.text}': ${part.reason}`, location);
    }
}

// ── Strict serde gating ─────────────────────────────────────────────

/**
 * Drop parameters whose user types do not derive `Deserialize`, and replace
 * return types whose user types do not derive `Serialize` with an
 * unsupported marker.
 */
export function applySerdeGating(
    commands: CommandFunction[],
    declarations: ReadonlyMap<string, TypeDeclaration>,
    diagnostics: DiagnosticBag,
): CommandFunction[] {
    const offending = (type: TypeDescriptor, direction: "serialize" | "deserialize"): string | null => {
        for (const node of walkType(type)) {
            if (node.kind !== "named" || node.target === null) continue;
            const declaration = declarations.get(node.target);
            if (declaration && !declaration[direction]) return declaration.name;
        }
        return null;
    };

    return commands.map((command) => {
        const params = command.params.filter((param) => {
            const name = offending(param.type, "deserialize");
            if (name === null) return true;
            diagnostics.warn(
                "serde-gated",
                `parameter '${param.name}' of command '${command.name}' dropped: '${name}' does not derive Deserialize`,
                command.location,
            );
            return false;
        });

        let returns = command.returns;
        const name = offending(returns, "serialize");
        if (name !== null) {
            diagnostics.warn(
                "serde-gated",
                `return type of command '${command.name}' is unknown: '${name}' does not derive Serialize`,
                command.location,
            );
            returns = { kind: "unsupported", text: name, reason: `'${name}' does not derive Serialize` };
        }
        return { ...command, params, returns };
    });
}
