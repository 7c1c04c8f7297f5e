/**
 * Type Model Builder: exportable data types.
 *
 * Declarations are collected per file, then linked in a second pass once
 * every file has been parsed, so declaration order across files never
 * matters.
 */

import type { DiagnosticBag } from "../diagnostics/diagnostics";
import { applyRenameRule, uniqueName } from "../naming";
import { derives, serdeOptions } from "../parser/attributes";
import type { ParsedFile, RawField } from "../parser/parser";
import type { AliasTable } from "../resolver/aliases";
import { type ResolveContext, mapType, resolveType } from "../resolver/type-resolver";
import type {
    CommandFunction,
    EnumRepresentation,
    FieldDeclaration,
    NamedTypeDescriptor,
    SourceLocation,
    TypeDeclaration,
    TypeDescriptor,
    VariantDeclaration,
} from "../types";
import { reportUnsupported } from "./commands";

// ── Collection ──────────────────────────────────────────────────────

export function buildTypeDeclarations(
    file: string,
    parsed: ParsedFile,
    aliases: AliasTable,
    diagnostics: DiagnosticBag,
): TypeDeclaration[] {
    const declarations: TypeDeclaration[] = [];
    const ids = new Set<string>();
    const declarationId = (name: string): string => {
        const base = `${file}::${name}`;
        let id = base;
        for (let n = 2; ids.has(id); n++) id = `${base}#${n}`;
        ids.add(id);
        return id;
    };

    for (const item of parsed.items) {
        if (item.kind === "fn") continue;

        const ctx: ResolveContext = { aliases, generics: new Set(item.generics) };
        const derived = derives(item.attributes);
        const serde = serdeOptions(item.attributes);
        const location: SourceLocation = { file, line: item.line, column: item.column };
        const base = {
            id: declarationId(item.name),
            name: item.name,
            exportName: item.name,
            docs: item.docs,
            generics: item.generics,
            module: file,
            location,
            serialize: derived.includes("Serialize"),
            deserialize: derived.includes("Deserialize"),
        };
        const fields = (raw: RawField[], renameAll: string | null): FieldDeclaration[] =>
            buildFields(raw, renameAll, ctx, `type '${item.name}'`, file, diagnostics);

        switch (item.kind) {
            case "struct":
                declarations.push({
                    ...base,
                    kind: "struct",
                    shape: item.shape,
                    fields: fields(item.fields, serde.renameAll),
                });
                break;
            case "enum": {
                const variants: VariantDeclaration[] = [];
                for (const variant of item.variants) {
                    const options = serdeOptions(variant.attributes);
                    if (options.skip) continue;
                    variants.push({
                        name: variant.name,
                        wireName: options.rename ?? applyRenameRule(variant.name, serde.renameAll),
                        docs: variant.docs,
                        shape: variant.shape,
                        fields: fields(variant.fields, options.renameAll),
                    });
                }
                declarations.push({ ...base, kind: "enum", representation: representation(serde), variants });
                break;
            }
            case "alias": {
                const target = resolveType(item.target, ctx);
                reportUnsupported(target, `type alias '${item.name}'`, diagnostics, location);
                declarations.push({ ...base, kind: "alias", target });
                break;
            }
        }
    }

    return declarations;
}

function buildFields(
    raw: RawField[],
    renameAll: string | null,
    ctx: ResolveContext,
    owner: string,
    file: string,
    diagnostics: DiagnosticBag,
): FieldDeclaration[] {
    const fields: FieldDeclaration[] = [];
    raw.forEach((field, index) => {
        const options = serdeOptions(field.attributes);
        if (options.skip) return;
        const name = field.name ?? String(index);
        const type = resolveType(field.type, ctx);
        reportUnsupported(type, `field '${name}' of ${owner}`, diagnostics, {
            file,
            line: field.line,
            column: field.column,
        });
        fields.push({
            name,
            wireName: field.name === null ? name : (options.rename ?? applyRenameRule(name, renameAll)),
            docs: field.docs,
            type,
        });
    });
    return fields;
}

function representation(serde: ReturnType<typeof serdeOptions>): EnumRepresentation {
    if (serde.untagged) return { kind: "untagged" };
    if (serde.tag !== null && serde.content !== null) return { kind: "adjacent", tag: serde.tag, content: serde.content };
    if (serde.tag !== null) return { kind: "internal", tag: serde.tag };
    return { kind: "external" };
}

// ── Linking ─────────────────────────────────────────────────────────

const PATH_KEYWORDS = new Set(["crate", "self", "super"]);

/** Module path segments of a file: `commands/user.rs` → `commands/user`, `models/mod.rs` → `models`. */
function moduleSegments(file: string): string[] {
    const segments = file.replace(/\.rs$/, "").split("/");
    const last = segments[segments.length - 1];
    if (last === "mod" || last === "lib" || last === "main") segments.pop();
    return segments;
}

function endsWith(haystack: string[], needle: string[]): boolean {
    if (needle.length > haystack.length) return false;
    const offset = haystack.length - needle.length;
    return needle.every((segment, i) => haystack[offset + i] === segment);
}

/** Name lookup over every declaration, in scan order. */
export class TypeIndex {
    private readonly byName = new Map<string, TypeDeclaration[]>();
    private readonly byId = new Map<string, TypeDeclaration>();

    constructor(declarations: TypeDeclaration[]) {
        for (const declaration of declarations) {
            const list = this.byName.get(declaration.name) ?? [];
            list.push(declaration);
            this.byName.set(declaration.name, list);
            this.byId.set(declaration.id, declaration);
        }
    }

    get(id: string): TypeDeclaration | undefined {
        return this.byId.get(id);
    }

    get declarations(): ReadonlyMap<string, TypeDeclaration> {
        return this.byId;
    }

    /**
     * Resolve a reference made from `fromModule`. A path hint such as
     * `models::User` picks the declaration in a matching module; otherwise
     * the same module wins, then the first declaration in scan order.
     */
    lookup(ref: NamedTypeDescriptor, fromModule: string): TypeDeclaration | null {
        const candidates = this.byName.get(ref.name);
        if (!candidates || candidates.length === 0) return null;
        if (candidates.length === 1) return candidates[0] ?? null;

        const hint = ref.path.slice(0, -1).filter((s) => !PATH_KEYWORDS.has(s));
        if (hint.length > 0) {
            const hinted = candidates.find((c) => endsWith(moduleSegments(c.module), hint));
            if (hinted) return hinted;
        }
        return candidates.find((c) => c.module === fromModule) ?? candidates[0] ?? null;
    }

    /** Link every named reference in `type`; `onUnresolved` is called once per missing name. */
    link(type: TypeDescriptor, fromModule: string, onUnresolved: (name: string) => void): TypeDescriptor {
        return mapType(type, (node) => {
            if (node.kind !== "named") return undefined;
            const target = this.lookup(node, fromModule);
            if (!target) {
                onUnresolved(node.name);
                return node;
            }
            return { ...node, target: target.id };
        });
    }
}

/**
 * Second pass over the type model: link field, variant and alias types,
 * flag names declared more than once, and give later duplicates distinct
 * export names.
 */
export function linkTypeDeclarations(
    declarations: TypeDeclaration[],
    index: TypeIndex,
    diagnostics: DiagnosticBag,
): TypeDeclaration[] {
    const exportNames = new Set<string>();
    const groups = new Map<string, TypeDeclaration[]>();
    for (const declaration of declarations) {
        const group = groups.get(declaration.name) ?? [];
        group.push(declaration);
        groups.set(declaration.name, group);
    }
    for (const [name, group] of groups) {
        if (group.length < 2) continue;
        const [, second] = group;
        diagnostics.warn(
            "name-collision",
            `type '${name}' is declared ${group.length} times (${group.map((d) => d.module).join(", ")}); all are kept`,
            second?.location,
        );
    }
    for (const declaration of declarations) exportNames.add(declaration.name);

    const assigned = new Set<string>();
    return declarations.map((declaration) => {
        const exportName = assigned.has(declaration.name)
            ? uniqueName(declaration.name, exportNames)
            : declaration.name;
        assigned.add(declaration.name);

        const link = (type: TypeDescriptor): TypeDescriptor =>
            index.link(type, declaration.module, (missing) =>
                diagnostics.warn(
                    "unresolved-type",
                    `type '${missing}' used by '${declaration.name}' is not declared in the scanned sources`,
                    declaration.location,
                ),
            );
        const linkFields = (fields: FieldDeclaration[]): FieldDeclaration[] =>
            fields.map((f) => ({ ...f, type: link(f.type) }));

        switch (declaration.kind) {
            case "struct":
                return { ...declaration, exportName, fields: linkFields(declaration.fields) };
            case "enum":
                return {
                    ...declaration,
                    exportName,
                    variants: declaration.variants.map((v) => ({ ...v, fields: linkFields(v.fields) })),
                };
            case "alias":
                return { ...declaration, exportName, target: link(declaration.target) };
        }
    });
}

/** Link parameter, return and error types of every command against the index. */
export function linkCommands(
    commands: CommandFunction[],
    index: TypeIndex,
    diagnostics: DiagnosticBag,
): CommandFunction[] {
    return commands.map((command) => {
        const link = (type: TypeDescriptor): TypeDescriptor =>
            index.link(type, command.module, (missing) =>
                diagnostics.warn(
                    "unresolved-type",
                    `type '${missing}' used by command '${command.name}' is not declared in the scanned sources`,
                    command.location,
                ),
            );
        return {
            ...command,
            params: command.params.map((p) => ({ ...p, type: link(p.type) })),
            returns: link(command.returns),
            errorType: command.errorType ? link(command.errorType) : null,
        };
    });
}
