/**
 * Event Site Detector: `emit` calls in function bodies.
 *
 * Works on the flat body tokens the parser keeps for every function,
 * impl methods included. Only literal event names produce sites; payload
 * types are inferred from the few expression forms that carry a static
 * type (bindings, literals, struct literals, well-known macros).
 */

import { pascalCase } from "es-toolkit";
import type { DiagnosticBag } from "../diagnostics/diagnostics";
import { reportUnsupported, topLevelPath } from "../model/commands";
import { callbackName, uniqueName } from "../naming";
import { splitTopLevel, tokensText } from "../parser/cursor";
import { ParseError, type Token } from "../parser/lexer";
import type { ParsedFile, RawFunction } from "../parser/parser";
import { parseWhole } from "../parser/type-syntax";
import { type AliasTable, injectedHandle } from "../resolver/aliases";
import { type ResolveContext, mapType, resolveType } from "../resolver/type-resolver";
import type { EventEntry, EventHandlerGroup, EventScope, EventSite, SourceLocation, TypeDescriptor } from "../types";

const EMITTERS = new Set(["emit", "emit_to", "emit_all"]);
const WINDOW_LOOKUPS = new Set(["get_webview_window", "get_window", "get_webview"]);
const STRING_METHODS = new Set(["to_string", "as_str"]);
const PASSTHROUGH_METHODS = new Set(["clone", "to_owned", "into"]);
const SMART_POINTERS = new Set(["Box", "Arc", "Rc"]);
/** Untyped closure parameters with these names are taken to be the invoking window. */
const WINDOW_NAMES = new Set(["window", "webview_window"]);

const STRING: TypeDescriptor = { kind: "primitive", name: "string" };

interface BodyScope {
    ctx: ResolveContext;
    bindings: Map<string, TypeDescriptor>;
    receivers: Map<string, EventScope | "unstatic">;
    windows: Set<string>;
}

// ── Token helpers ───────────────────────────────────────────────────

const OPEN = new Set(["(", "[", "{"]);
const CLOSE = new Set([")", "]", "}"]);

function isPunct(token: Token | undefined, value: string): boolean {
    return token?.kind === "punct" && token.value === value;
}

function matchingClose(tokens: Token[], open: number): number {
    let depth = 0;
    for (let i = open; i < tokens.length; i++) {
        const token = tokens[i];
        if (token?.kind !== "punct") continue;
        if (OPEN.has(token.value)) depth++;
        else if (CLOSE.has(token.value) && --depth === 0) return i;
    }
    return tokens.length - 1;
}

/** Index of the `(` opening a method call at `name`, past any `::<...>` turbofish; -1 if none. */
function callOpen(tokens: Token[], name: number): number {
    let i = name + 1;
    if (isPunct(tokens[i], "::") && isPunct(tokens[i + 1], "<")) {
        let angles = 0;
        for (i++; i < tokens.length; i++) {
            if (isPunct(tokens[i], "<")) angles++;
            else if (isPunct(tokens[i], ">") && --angles === 0) break;
        }
        i++;
    }
    return isPunct(tokens[i], "(") ? i : -1;
}

function matchingOpen(tokens: Token[], close: number): number {
    let depth = 0;
    for (let i = close; i >= 0; i--) {
        const token = tokens[i];
        if (token?.kind !== "punct") continue;
        if (CLOSE.has(token.value)) depth++;
        else if (OPEN.has(token.value) && --depth === 0) return i;
    }
    return 0;
}

/**
 * Index of the first top-level token from `from` spelled like one of `stops`,
 * or of the closer that ends the enclosing group. Angle brackets nest only in
 * type positions.
 */
function findTopLevel(tokens: Token[], from: number, stops: string[], typePosition = false): number {
    let depth = 0;
    let angles = 0;
    for (let i = from; i < tokens.length; i++) {
        const token = tokens[i];
        if (token?.kind !== "punct") continue;
        if (depth === 0 && angles === 0 && stops.includes(token.value)) return i;
        if (OPEN.has(token.value)) depth++;
        else if (CLOSE.has(token.value)) {
            if (depth === 0) return i;
            depth--;
        } else if (typePosition && token.value === "<") angles++;
        else if (typePosition && token.value === ">" && angles > 0) angles--;
    }
    return tokens.length;
}

/** Start index of the receiver expression whose last token sits at `end`. */
function receiverStart(tokens: Token[], end: number): number {
    let i = end;
    for (;;) {
        const token = tokens[i];
        if (token === undefined) return i + 1;
        if (token.kind === "punct" && CLOSE.has(token.value)) {
            i = matchingOpen(tokens, i) - 1;
            continue;
        }
        if (isPunct(token, "?")) {
            i--;
            continue;
        }
        if (token.kind !== "ident") return i + 1;
        const before = tokens[i - 1];
        if (isPunct(before, ".") || isPunct(before, "::")) {
            i -= 2;
            continue;
        }
        return i;
    }
}

function stringLiteral(tokens: Token[] | undefined): string | null {
    const [only, extra] = tokens ?? [];
    return only?.kind === "string" && extra === undefined ? only.value : null;
}

// ── Payload classification ──────────────────────────────────────────

/** Leading `a::b::C` path of `tokens`; returns the names and the index after them. */
function leadingPath(tokens: Token[]): { names: string[]; end: number } {
    const names: string[] = [];
    let i = 0;
    while (tokens[i]?.kind === "ident") {
        names.push(tokens[i]?.value ?? "");
        if (!isPunct(tokens[i + 1], "::") || tokens[i + 2]?.kind !== "ident") {
            i++;
            break;
        }
        i += 2;
    }
    return { names, end: i };
}

const startsUpper = (name: string | undefined): boolean => name !== undefined && /^[A-Z]/.test(name);

function namedFromPath(names: string[], scope: BodyScope): TypeDescriptor {
    // `Status::Done` names a variant of `Status`.
    const path = names.length >= 2 && startsUpper(names[names.length - 2]) ? names.slice(0, -1) : names;
    return resolveType({ kind: "path", segments: path.map((name) => ({ name, args: [] })) }, scope.ctx);
}

function cannotInfer(tokens: Token[]): TypeDescriptor {
    return { kind: "unsupported", text: tokensText(tokens), reason: "payload type cannot be inferred statically" };
}

function classifyPayload(tokens: Token[], scope: BodyScope): TypeDescriptor {
    let expr = tokens;
    while (isPunct(expr[0], "&") || isPunct(expr[0], "&&") || expr[0]?.value === "mut") expr = expr.slice(1);

    // Trailing no-argument method calls.
    for (;;) {
        const last = expr.length - 1;
        if (!isPunct(expr[last], ")") || !isPunct(expr[last - 1], "(")) break;
        const method = expr[last - 2];
        if (method?.kind !== "ident" || !isPunct(expr[last - 3], ".")) break;
        if (STRING_METHODS.has(method.value)) return STRING;
        if (!PASSTHROUGH_METHODS.has(method.value)) break;
        expr = expr.slice(0, last - 3);
    }

    const [first, second] = expr;
    if (first === undefined) return cannotInfer(tokens);
    if (expr.length === 1) {
        if (first.kind === "string") return STRING;
        if (first.kind === "number") return { kind: "primitive", name: "number" };
        if (first.value === "true" || first.value === "false") return { kind: "primitive", name: "boolean" };
        if (first.kind === "ident") {
            const bound = scope.bindings.get(first.value);
            if (bound) return bound;
            if (startsUpper(first.value)) return namedFromPath([first.value], scope);
        }
        return cannotInfer(tokens);
    }
    if (expr.length === 2 && isPunct(first, "-") && second?.kind === "number") return { kind: "primitive", name: "number" };
    if (expr.length === 2 && isPunct(first, "(") && isPunct(second, ")")) return { kind: "primitive", name: "void" };

    const { names, end } = leadingPath(expr);
    const last = names[names.length - 1];
    const next = expr[end];
    const groupEndsExpr = (isPunct(next, "(") || isPunct(next, "{")) && matchingClose(expr, end) === expr.length - 1;

    if (isPunct(next, "!")) {
        if (last === "format") return STRING;
        if (last === "json") return { kind: "primitive", name: "json" };
        if (last === "vec") {
            const [element] = splitTopLevel(expr.slice(end + 2, -1));
            if (element) return { kind: "collection", element: classifyPayload(element, scope) };
        }
        return cannotInfer(tokens);
    }
    if (names.length === 0) return cannotInfer(tokens);
    if (end === expr.length && startsUpper(last)) return namedFromPath(names, scope);
    if (!groupEndsExpr) return cannotInfer(tokens);

    const inner = expr.slice(end + 1, -1);
    if (isPunct(next, "{") && startsUpper(last)) return namedFromPath(names, scope);
    if (isPunct(next, "(")) {
        if (last === "Some") return { kind: "optional", inner: classifyPayload(inner, scope) };
        if (names.length === 2 && names[0] === "String") return STRING;
        if (last === "new" && names.length === 2 && SMART_POINTERS.has(names[0] ?? "")) return classifyPayload(inner, scope);
        if (startsUpper(last) && last !== "Ok" && last !== "Err") return namedFromPath(names, scope);
    }
    return cannotInfer(tokens);
}

// ── Site detection ──────────────────────────────────────────────────

/** Every literal-named emit site in the functions of one file, in source order. */
export function detectEventSites(
    file: string,
    parsed: ParsedFile,
    aliases: AliasTable,
    diagnostics: DiagnosticBag,
): EventSite[] {
    const sites: EventSite[] = [];
    for (const item of parsed.items) {
        if (item.kind !== "fn" || item.body.length === 0) continue;
        sites.push(...scanFunction(file, item, aliases, diagnostics));
    }
    return sites;
}

function scanFunction(file: string, fn: RawFunction, aliases: AliasTable, diagnostics: DiagnosticBag): EventSite[] {
    const scope: BodyScope = {
        ctx: { aliases, generics: new Set(fn.generics) },
        bindings: new Map(),
        receivers: new Map(),
        windows: new Set(),
    };
    for (const param of fn.params) {
        bind(scope, param.name, resolveType(param.type, scope.ctx), topLevelPath(param.type, aliases));
    }

    const tokens = fn.body;
    const sites: EventSite[] = [];
    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        if (token?.kind !== "ident") continue;
        if (token.value === "let") {
            scanLet(tokens, i, scope);
            continue;
        }
        if (!EMITTERS.has(token.value) || !isPunct(tokens[i - 1], ".")) continue;
        const open = callOpen(tokens, i);
        if (open < 0) continue;

        const location: SourceLocation = { file, line: token.line, column: token.column };
        const close = matchingClose(tokens, open);
        const args = splitTopLevel(tokens.slice(open + 1, close));
        const receiver = tokens.slice(receiverStart(tokens, i - 2), i - 1);
        const site = emitSite(token.value, receiver, args, scope, fn.name, location, diagnostics);
        if (site) sites.push({ ...site, module: file, function: fn.name, location });
    }
    return sites;
}

function bind(scope: BodyScope, name: string, type: TypeDescriptor, canonical: string[] | null): void {
    if (canonical && injectedHandle(canonical) === "window") {
        scope.windows.add(name);
        return;
    }
    scope.bindings.set(name, type);
}

/** Record `let name: T = ...` and `let name = expr;` bindings. Destructuring patterns are ignored. */
function scanLet(tokens: Token[], at: number, scope: BodyScope): void {
    let i = at + 1;
    if (tokens[i]?.value === "mut") i++;
    const name = tokens[i];
    if (name?.kind !== "ident") return;

    if (isPunct(tokens[i + 1], ":")) {
        const end = findTopLevel(tokens, i + 2, ["=", ";"], true);
        try {
            const expr = parseWhole(tokens.slice(i + 2, end));
            bind(scope, name.value, resolveType(expr, scope.ctx), topLevelPath(expr, scope.ctx.aliases));
        } catch (err) {
            if (!(err instanceof ParseError)) throw err;
            scope.bindings.delete(name.value);
        }
        return;
    }
    if (!isPunct(tokens[i + 1], "=")) return;

    const init = tokens.slice(i + 2, findTopLevel(tokens, i + 2, [";"]));
    const windowScope = lookupScope(init);
    if (windowScope) {
        scope.receivers.set(name.value, windowScope);
        return;
    }
    const type = classifyPayload(init, scope);
    if (type.kind === "unsupported") scope.bindings.delete(name.value);
    else scope.bindings.set(name.value, type);
}

/** `get_webview_window("label")`-style lookups in a receiver chain. */
function lookupScope(tokens: Token[]): EventScope | "unstatic" | null {
    for (let i = 0; i < tokens.length; i++) {
        const token = tokens[i];
        if (token?.kind !== "ident" || !WINDOW_LOOKUPS.has(token.value) || !isPunct(tokens[i + 1], "(")) continue;
        const label = stringLiteral(tokens.slice(i + 2, matchingClose(tokens, i + 1)));
        return label === null ? "unstatic" : { kind: "window", label };
    }
    return null;
}

function receiverScope(receiver: Token[], scope: BodyScope): EventScope | "unstatic" {
    const lookup = lookupScope(receiver);
    if (lookup) return lookup;
    const root = receiver[0]?.value ?? "";
    const bound = scope.receivers.get(root);
    if (bound) return bound;
    if (scope.windows.has(root)) return { kind: "current-window" };
    if (receiver.length === 1 && WINDOW_NAMES.has(root) && !scope.bindings.has(root)) return { kind: "current-window" };
    return { kind: "global" };
}

function emitSite(
    method: string,
    receiver: Token[],
    args: Token[][],
    scope: BodyScope,
    fnName: string,
    location: SourceLocation,
    diagnostics: DiagnosticBag,
): Pick<EventSite, "name" | "payload" | "scope"> | null {
    const skip = (what: string): null => {
        diagnostics.warn(
            "unstatic-event-name",
            `${what} passed to ${method} in '${fnName}' is not a string literal; the emit site is skipped`,
            location,
        );
        return null;
    };

    let eventScope: EventScope | "unstatic";
    let rest = args;
    if (method === "emit_to") {
        const label = stringLiteral(args[0]);
        if (label === null) return skip("target");
        eventScope = { kind: "window", label };
        rest = args.slice(1);
    } else if (method === "emit_all") {
        eventScope = { kind: "global" };
    } else {
        eventScope = receiverScope(receiver, scope);
    }
    if (eventScope === "unstatic") return skip("window label");

    const name = stringLiteral(rest[0]);
    if (name === null) return skip("event name");

    const payloadTokens = rest[1];
    const payload: TypeDescriptor = payloadTokens ? classifyPayload(payloadTokens, scope) : { kind: "primitive", name: "void" };
    reportUnsupported(payload, `payload of event '${name}'`, diagnostics, location);
    return { name, payload, scope: eventScope };
}

// ── Grouping ────────────────────────────────────────────────────────

function scopeKey(scope: EventScope): string {
    return scope.kind === "window" ? `window:${scope.label}` : scope.kind;
}

function describeScope(scope: EventScope): string {
    switch (scope.kind) {
        case "global":
            return "the global scope";
        case "window":
            return `window '${scope.label}'`;
        case "current-window":
            return "the current window";
    }
}

function baseHandlerName(scope: EventScope): string {
    switch (scope.kind) {
        case "global":
            return "GlobalEventHandlers";
        case "window":
            return `${pascalCase(scope.label)}WindowEventHandlers`;
        case "current-window":
            return "CurrentWindowEventHandlers";
    }
}

/** Payload identity for merging. Uninferable payloads all render the same type, whatever their source text. */
function payloadKey(payload: TypeDescriptor): string {
    return JSON.stringify(
        mapType(payload, (node) => (node.kind === "unsupported" ? { kind: "unsupported", text: "", reason: "" } : undefined)),
    );
}

/**
 * Merge sites into one handler group per scope. Groups and events keep
 * first-discovery order; an event emitted with differing payloads gets one
 * entry per payload.
 */
export function mergeEventSites(sites: EventSite[], diagnostics: DiagnosticBag): EventHandlerGroup[] {
    const groups = new Map<string, EventHandlerGroup & { callbacks: Set<string> }>();
    const handlerNames = new Set<string>();

    for (const site of sites) {
        const key = scopeKey(site.scope);
        let group = groups.get(key);
        if (!group) {
            group = {
                scope: site.scope,
                handlerName: uniqueName(baseHandlerName(site.scope), handlerNames),
                events: [],
                callbacks: new Set(),
            };
            groups.set(key, group);
        }

        const payload = payloadKey(site.payload);
        const sameName = group.events.filter((e) => e.name === site.name);
        const existing = sameName.find((e) => payloadKey(e.payload) === payload);
        if (existing) {
            existing.sites.push(site.location);
            continue;
        }

        const entry: EventEntry = {
            key: sameName.length === 0 ? site.name : `${site.name}#${sameName.length + 1}`,
            name: site.name,
            callback: uniqueName(callbackName(site.name), group.callbacks),
            payload: site.payload,
            sites: [site.location],
        };
        if (sameName.length > 0) {
            diagnostics.warn(
                "name-collision",
                `event '${site.name}' is emitted with differing payloads in ${describeScope(site.scope)}; ` +
                    `generating a separate callback '${entry.callback}'`,
                site.location,
            );
        }
        group.events.push(entry);
    }

    return [...groups.values()].map(({ scope, handlerName, events }) => ({ scope, handlerName, events }));
}
