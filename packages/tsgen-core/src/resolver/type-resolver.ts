/**
 * Type Resolver: raw type expression to {@link TypeDescriptor}.
 *
 * Pure: the only inputs are the expression, the file's alias table and the
 * generic parameters in scope. Named types come out as unlinked references
 * (`target: null`); the type model links them once every file is parsed.
 */

import { type TypeExpr, typeText } from "../parser/type-syntax";
import type { PrimitiveName, TypeDescriptor } from "../types";
import { type AliasTable, canonicalize, injectedHandle } from "./aliases";

export interface ResolveContext {
    aliases: AliasTable;
    generics: ReadonlySet<string>;
}

// ── Known names ─────────────────────────────────────────────────────

const PRIMITIVES: ReadonlyMap<string, PrimitiveName> = new Map<string, PrimitiveName>([
    ...["String", "str", "char", "PathBuf", "Path", "OsString", "OsStr"].map((n) => [n, "string"] as const),
    ...["i8", "i16", "i32", "i64", "i128", "isize", "u8", "u16", "u32", "u64", "u128", "usize", "f32", "f64"].map(
        (n) => [n, "number"] as const,
    ),
    ["bool", "boolean"],
]);

/** Third-party types whose serde form is a string. Matched on the canonical path. */
const EXTERNAL_STRINGS = new Set([
    "chrono::DateTime",
    "chrono::NaiveDateTime",
    "chrono::NaiveDate",
    "chrono::NaiveTime",
    "uuid::Uuid",
    "url::Url",
]);

const TRANSPARENT = new Set(["Box", "Arc", "Rc", "Cow"]);
const COLLECTIONS = new Set(["Vec", "VecDeque", "LinkedList", "HashSet", "BTreeSet", "BinaryHeap", "IndexSet"]);
const MAPS = new Set(["HashMap", "BTreeMap", "IndexMap"]);

const OTHER_FORM_REASONS: Record<string, string> = {
    impl: "`impl Trait` has no fixed wire shape",
    dyn: "trait objects cannot cross the bridge",
    fn: "function types cannot cross the bridge",
    pointer: "raw pointers cannot cross the bridge",
    never: "the never type has no values",
    infer: "inferred types cannot be resolved statically",
    qualified: "qualified associated types cannot be resolved statically",
    macro: "macro types cannot be resolved statically",
};

// ── Resolution ──────────────────────────────────────────────────────

export function resolveType(expr: TypeExpr, ctx: ResolveContext): TypeDescriptor {
    switch (expr.kind) {
        case "ref":
            return resolveType(expr.inner, ctx);
        case "tuple":
            if (expr.elements.length === 0) return { kind: "primitive", name: "void" };
            return { kind: "tuple", elements: expr.elements.map((e) => resolveType(e, ctx)) };
        case "array":
            return { kind: "collection", element: resolveType(expr.element, ctx) };
        case "other":
            return unsupported(expr.text, OTHER_FORM_REASONS[expr.form] ?? "unsupported type form");
        case "path":
            return resolvePath(expr, ctx);
    }
}

function resolvePath(expr: Extract<TypeExpr, { kind: "path" }>, ctx: ResolveContext): TypeDescriptor {
    const path = canonicalize(
        expr.segments.map((s) => s.name),
        ctx.aliases,
    );
    const name = path[path.length - 1] ?? "";
    const args = expr.segments[expr.segments.length - 1]?.args ?? [];
    const arg = (index: number): TypeDescriptor => {
        const raw = args[index];
        return raw ? resolveType(raw, ctx) : unsupported(typeText(expr), `missing type argument for ${name}`);
    };
    const joined = path.join("::");

    if (path.length === 1 && ctx.generics.has(name)) {
        return { kind: "generic", name };
    }
    if (injectedHandle(path)) {
        return unsupported(typeText(expr), "bridge-injected handles cannot cross the bridge");
    }
    if (joined === "tauri::ipc::Response") return { kind: "opaque" };
    if (joined === "serde_json::Value") return { kind: "primitive", name: "json" };
    if (EXTERNAL_STRINGS.has(joined)) return { kind: "primitive", name: "string" };
    if (joined === "serde_json::Map") {
        return { kind: "map", key: { kind: "primitive", name: "string" }, value: { kind: "primitive", name: "json" } };
    }

    const primitive = PRIMITIVES.get(name);
    if (primitive) return { kind: "primitive", name: primitive };

    if (name === "Option") return { kind: "optional", inner: arg(0) };
    if (name === "Result") {
        return { kind: "result", ok: arg(0), err: args.length > 1 ? arg(1) : null };
    }
    if (TRANSPARENT.has(name)) return arg(0);
    if (COLLECTIONS.has(name)) return { kind: "collection", element: arg(0) };
    if (MAPS.has(name)) return { kind: "map", key: arg(0), value: arg(1) };

    if (path.length === 1 && /^[a-z]/.test(name)) {
        return unsupported(name, `unknown primitive type '${name}'`);
    }

    return { kind: "named", name, path, args: args.map((a) => resolveType(a, ctx)), target: null };
}

function unsupported(text: string, reason: string): TypeDescriptor {
    return { kind: "unsupported", text, reason };
}

// ── Narrowing & traversal ───────────────────────────────────────────

export interface NarrowedReturn {
    returns: TypeDescriptor;
    errorType: TypeDescriptor | null;
}

/** `Result<T, E>` narrows to `T` with `E` recorded apart; any other type passes through. */
export function narrowReturn(type: TypeDescriptor): NarrowedReturn {
    if (type.kind === "result") return { returns: type.ok, errorType: type.err };
    return { returns: type, errorType: null };
}

/** Every descriptor nested in `type`, depth first, the root included. */
export function* walkType(type: TypeDescriptor): Generator<TypeDescriptor> {
    yield type;
    switch (type.kind) {
        case "optional":
            yield* walkType(type.inner);
            break;
        case "result":
            yield* walkType(type.ok);
            if (type.err) yield* walkType(type.err);
            break;
        case "collection":
            yield* walkType(type.element);
            break;
        case "map":
            yield* walkType(type.key);
            yield* walkType(type.value);
            break;
        case "tuple":
            for (const element of type.elements) yield* walkType(element);
            break;
        case "named":
            for (const a of type.args) yield* walkType(a);
            break;
    }
}

/** Rebuild a descriptor bottom-up; `fn` sees each node after its children were rebuilt. */
export function mapType(
    type: TypeDescriptor,
    fn: (node: TypeDescriptor) => TypeDescriptor | undefined,
): TypeDescriptor {
    let rebuilt: TypeDescriptor;
    switch (type.kind) {
        case "optional":
            rebuilt = { ...type, inner: mapType(type.inner, fn) };
            break;
        case "result":
            rebuilt = { ...type, ok: mapType(type.ok, fn), err: type.err ? mapType(type.err, fn) : null };
            break;
        case "collection":
            rebuilt = { ...type, element: mapType(type.element, fn) };
            break;
        case "map":
            rebuilt = { ...type, key: mapType(type.key, fn), value: mapType(type.value, fn) };
            break;
        case "tuple":
            rebuilt = { ...type, elements: type.elements.map((e) => mapType(e, fn)) };
            break;
        case "named":
            rebuilt = { ...type, args: type.args.map((a) => mapType(a, fn)) };
            break;
        default:
            rebuilt = type;
    }
    return fn(rebuilt) ?? rebuilt;
}

export function unsupportedParts(type: TypeDescriptor): Extract<TypeDescriptor, { kind: "unsupported" }>[] {
    const parts: Extract<TypeDescriptor, { kind: "unsupported" }>[] = [];
    for (const node of walkType(type)) {
        if (node.kind === "unsupported") parts.push(node);
    }
    return parts;
}
