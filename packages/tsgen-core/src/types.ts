/**
 * Analysis model types.
 *
 * These are the shapes the analysis pipeline produces and the render
 * pipeline consumes. Every value is plain data so a model can be compared
 * by its JSON form.
 */

// ── Locations & diagnostics ─────────────────────────────────────────

export interface SourceLocation {
    file: string;
    line: number;
    column: number;
}

export type DiagnosticSeverity = "warning" | "error";

export type DiagnosticCode =
    | "syntax-error"
    | "unreadable-file"
    | "unsupported-type"
    | "unstatic-event-name"
    | "name-collision"
    | "unresolved-type"
    | "serde-gated";

export interface Diagnostic {
    code: DiagnosticCode;
    severity: DiagnosticSeverity;
    message: string;
    file?: string;
    line?: number;
    column?: number;
}

// ── Type descriptors ────────────────────────────────────────────────

export type PrimitiveName = "string" | "number" | "boolean" | "void" | "json";

/** Bridge-injected handle kinds. Parameters of these types never reach the frontend. */
export type InjectedHandle = "window" | "state" | "app";

export type TypeDescriptor =
    | { kind: "primitive"; name: PrimitiveName }
    | { kind: "optional"; inner: TypeDescriptor }
    | { kind: "result"; ok: TypeDescriptor; err: TypeDescriptor | null }
    | { kind: "collection"; element: TypeDescriptor }
    | { kind: "map"; key: TypeDescriptor; value: TypeDescriptor }
    | { kind: "tuple"; elements: TypeDescriptor[] }
    | NamedTypeDescriptor
    | { kind: "generic"; name: string }
    | { kind: "opaque" }
    | { kind: "unsupported"; text: string; reason: string };

export interface NamedTypeDescriptor {
    kind: "named";
    name: string;
    /** Canonical path after alias resolution, e.g. `["crate", "models", "User"]`. */
    path: string[];
    args: TypeDescriptor[];
    /** Id of the declaration this reference resolved to; null until linked, or when unresolved. */
    target: string | null;
}

// ── Commands ────────────────────────────────────────────────────────

export type ArgumentCase = "camelCase" | "snake_case";

export interface CommandParameter {
    /** Name as written in the Rust signature. */
    name: string;
    /** Name of the TypeScript parameter. */
    tsName: string;
    /** Key of the argument object passed to `invoke`. */
    key: string;
    type: TypeDescriptor;
    isReference: boolean;
}

export interface ExcludedParameter {
    name: string;
    handle: InjectedHandle;
    /** Alias-resolved path the exclusion matched on. */
    canonicalPath: string;
}

export interface CommandFunction {
    id: string;
    /** Rust function name, also the `invoke` command name. */
    name: string;
    /** Wrapper method name on the generated client. */
    method: string;
    docs: string;
    params: CommandParameter[];
    excluded: ExcludedParameter[];
    /** Success type; `Result` returns are narrowed to their ok arm. */
    returns: TypeDescriptor;
    /** Error arm of a narrowed `Result`, or null. */
    errorType: TypeDescriptor | null;
    isAsync: boolean;
    argumentCase: ArgumentCase;
    module: string;
    location: SourceLocation;
}

// ── Data types ──────────────────────────────────────────────────────

export interface FieldDeclaration {
    name: string;
    /** Name on the wire after serde renames. */
    wireName: string;
    docs: string;
    type: TypeDescriptor;
}

export type VariantShape = "unit" | "tuple" | "named";

export interface VariantDeclaration {
    name: string;
    wireName: string;
    docs: string;
    shape: VariantShape;
    fields: FieldDeclaration[];
}

export type EnumRepresentation =
    | { kind: "external" }
    | { kind: "internal"; tag: string }
    | { kind: "adjacent"; tag: string; content: string }
    | { kind: "untagged" };

interface TypeDeclarationBase {
    id: string;
    name: string;
    /** Exported name; differs from `name` only for the later members of a name collision. */
    exportName: string;
    docs: string;
    generics: string[];
    module: string;
    location: SourceLocation;
    serialize: boolean;
    deserialize: boolean;
}

export interface StructDeclaration extends TypeDeclarationBase {
    kind: "struct";
    shape: VariantShape;
    fields: FieldDeclaration[];
}

export interface EnumDeclaration extends TypeDeclarationBase {
    kind: "enum";
    representation: EnumRepresentation;
    variants: VariantDeclaration[];
}

export interface AliasDeclaration extends TypeDeclarationBase {
    kind: "alias";
    target: TypeDescriptor;
}

export type TypeDeclaration = StructDeclaration | EnumDeclaration | AliasDeclaration;

// ── Events ──────────────────────────────────────────────────────────

export type EventScope = { kind: "global" } | { kind: "window"; label: string } | { kind: "current-window" };

export interface EventSite {
    name: string;
    payload: TypeDescriptor;
    scope: EventScope;
    module: string;
    function: string;
    location: SourceLocation;
}

export interface EventEntry {
    /** Unique key within the group; `name`, then `name#2`, ... for differing payloads. */
    key: string;
    name: string;
    callback: string;
    payload: TypeDescriptor;
    sites: SourceLocation[];
}

export interface EventHandlerGroup {
    scope: EventScope;
    handlerName: string;
    events: EventEntry[];
}

// ── Module tree ─────────────────────────────────────────────────────

export interface SourceFileSummary {
    path: string;
    /** Directory segments relative to the scan root. */
    modulePath: string[];
    baseName: string;
    aliases: Record<string, string>;
    parsed: boolean;
}

export interface ModuleDirectoryNode {
    kind: "directory";
    name: string;
    path: string[];
    children: ModuleTreeNode[];
}

export interface ModuleFileNode {
    kind: "module";
    name: string;
    path: string[];
    file: string;
    wrapperName: string;
    commands: CommandFunction[];
    types: TypeDeclaration[];
}

export type ModuleTreeNode = ModuleDirectoryNode | ModuleFileNode;

// ── Analysis result ─────────────────────────────────────────────────

export interface AnalysisResult {
    files: SourceFileSummary[];
    commands: CommandFunction[];
    types: TypeDeclaration[];
    sites: EventSite[];
    events: EventHandlerGroup[];
    tree: ModuleDirectoryNode;
    diagnostics: Diagnostic[];
}
