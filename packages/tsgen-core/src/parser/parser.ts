/**
 * Declaration parser: top-level items of one Rust source file.
 *
 * Retains functions, structs, enums, type aliases and `use` bindings. Every
 * other item (`impl`, `trait`, `const`, `static`, macros, ...) is skipped
 * without inspection, except that methods inside `impl` blocks are kept so
 * their bodies can be scanned for event emission. Items under
 * `#[cfg(test)]` are dropped entirely.
 */

import { TokenCursor, splitTopLevel } from "./cursor";
import { ParseError, type Token, tokenize } from "./lexer";
import { type TypeExpr, parseType, parseWhole } from "./type-syntax";

// ── Parsed shapes ───────────────────────────────────────────────────

export interface Attribute {
    /** Attribute path, e.g. `derive`, `serde`, `tauri::command`. */
    path: string;
    /** Tokens inside the parentheses, or after `=`. */
    args: Token[];
}

interface ItemBase {
    name: string;
    docs: string;
    attributes: Attribute[];
    generics: string[];
    line: number;
    column: number;
}

export interface RawParam {
    name: string;
    type: TypeExpr;
    line: number;
    column: number;
}

export interface RawFunction extends ItemBase {
    kind: "fn";
    isAsync: boolean;
    params: RawParam[];
    hasReceiver: boolean;
    returnType: TypeExpr | null;
    /** Tokens between the body braces; empty for bodiless declarations. */
    body: Token[];
    inImpl: boolean;
}

export interface RawField {
    /** Field name; null for tuple fields. */
    name: string | null;
    docs: string;
    attributes: Attribute[];
    type: TypeExpr;
    line: number;
    column: number;
}

export type RawShape = "named" | "tuple" | "unit";

export interface RawStruct extends ItemBase {
    kind: "struct";
    shape: RawShape;
    fields: RawField[];
}

export interface RawVariant {
    name: string;
    docs: string;
    attributes: Attribute[];
    shape: RawShape;
    fields: RawField[];
    line: number;
    column: number;
}

export interface RawEnum extends ItemBase {
    kind: "enum";
    variants: RawVariant[];
}

export interface RawAlias extends ItemBase {
    kind: "alias";
    target: TypeExpr;
}

export type RawItem = RawFunction | RawStruct | RawEnum | RawAlias;

/** `use original::path as alias` binding. */
export interface AliasBinding {
    alias: string;
    path: string[];
}

export interface ParsedFile {
    items: RawItem[];
    aliases: AliasBinding[];
}

// ── Entry point ─────────────────────────────────────────────────────

/** Parse one file. Throws {@link ParseError} on malformed input. */
export function parseFile(source: string): ParsedFile {
    const result: ParsedFile = { items: [], aliases: [] };
    parseItems(new TokenCursor(tokenize(source)), false, result);
    return result;
}

// ── Items ───────────────────────────────────────────────────────────

interface Outer {
    docs: string[];
    attributes: Attribute[];
}

function parseItems(cursor: TokenCursor, inImpl: boolean, out: ParsedFile): void {
    while (!cursor.atEnd()) {
        const outer = parseOuter(cursor);
        if (cursor.atEnd()) break;

        if (outer.attributes.some(isCfgTest)) {
            skipItem(cursor);
            continue;
        }

        skipVisibility(cursor);
        const isAsync = skipQualifiers(cursor);
        if (cursor.atEnd()) throw cursor.error("expected an item after qualifiers");

        if (cursor.is("fn")) {
            out.items.push(parseFunction(cursor, outer, isAsync, inImpl));
            continue;
        }

        if (inImpl) {
            skipItem(cursor);
            continue;
        }

        if (cursor.is("use")) {
            cursor.next();
            parseUseTree(cursor, [], out.aliases);
            cursor.expect(";");
        } else if (cursor.is("struct")) {
            out.items.push(parseStruct(cursor, outer));
        } else if (cursor.is("enum")) {
            out.items.push(parseEnum(cursor, outer));
        } else if (cursor.is("type")) {
            out.items.push(parseAlias(cursor, outer));
        } else if (cursor.is("mod")) {
            cursor.next();
            cursor.expectIdent();
            if (!cursor.eat(";")) {
                if (!cursor.is("{")) throw cursor.error("expected '{' or ';' after module name");
                parseItems(new TokenCursor(cursor.group()), false, out);
            }
        } else if (cursor.is("impl")) {
            cursor.next();
            skipToBrace(cursor);
            parseItems(new TokenCursor(cursor.group()), true, out);
        } else if (cursor.is("trait") || cursor.is("union") || cursor.is("const") || cursor.is("static")) {
            skipItem(cursor);
        } else if (cursor.is("extern")) {
            skipItem(cursor);
        } else if (cursor.isIdent() && (cursor.is("!", 1) || cursor.is("::", 1))) {
            skipMacroInvocation(cursor);
        } else {
            throw cursor.error(`unexpected '${cursor.peek()?.value ?? ""}' at item level`);
        }
    }
}

function parseOuter(cursor: TokenCursor): Outer {
    const outer: Outer = { docs: [], attributes: [] };
    for (;;) {
        const token = cursor.peek();
        if (token?.kind === "doc") {
            outer.docs.push(token.value);
            cursor.next();
        } else if (cursor.is("#") && cursor.is("!", 1)) {
            cursor.next();
            cursor.next();
            cursor.group();
        } else if (cursor.is("#") && cursor.is("[", 1)) {
            cursor.next();
            const attribute = parseAttribute(cursor.group());
            if (attribute.path === "doc") {
                const text = attribute.args.find((t) => t.kind === "string");
                if (text) outer.docs.push(text.value.trim());
            } else {
                outer.attributes.push(attribute);
            }
        } else {
            return outer;
        }
    }
}

function parseAttribute(tokens: Token[]): Attribute {
    const cursor = new TokenCursor(tokens);
    const segments: string[] = [];
    cursor.eat("::");
    do {
        segments.push(cursor.expectIdent().value);
    } while (cursor.eat("::"));

    let args: Token[] = [];
    if (cursor.is("(") || cursor.is("[") || cursor.is("{")) {
        args = cursor.group();
    } else if (cursor.eat("=")) {
        args = cursor.rest();
    }
    return { path: segments.join("::"), args };
}

function isCfgTest(attribute: Attribute): boolean {
    return attribute.path === "cfg" && attribute.args.length === 1 && attribute.args[0]?.value === "test";
}

function docsText(docs: string[]): string {
    return docs
        .flatMap((d) => d.split("\n"))
        .map((l) => l.trim())
        .join("\n")
        .trim();
}

function skipVisibility(cursor: TokenCursor): void {
    if (cursor.eat("pub") && cursor.is("(")) {
        cursor.group();
    }
}

/** Skip `default`, `async`, `unsafe`, `const fn` and `extern "abi" fn`; reports whether `async` was seen. */
function skipQualifiers(cursor: TokenCursor): boolean {
    let isAsync = false;
    for (;;) {
        if (cursor.is("default") && cursor.isIdent(1)) {
            cursor.next();
        } else if (cursor.is("async")) {
            cursor.next();
            isAsync = true;
        } else if (cursor.is("unsafe")) {
            cursor.next();
        } else if (cursor.is("const") && (cursor.is("fn", 1) || cursor.is("async", 1) || cursor.is("unsafe", 1))) {
            cursor.next();
        } else if (cursor.is("extern") && (cursor.is("fn", 1) || cursor.peek(1)?.kind === "string") && !cursor.is("{", 2)) {
            cursor.next();
            if (cursor.peek()?.kind === "string") cursor.next();
        } else {
            return isAsync;
        }
    }
}

/** Skip an item up to and including its terminating `;` or body block. */
function skipItem(cursor: TokenCursor): void {
    while (!cursor.atEnd()) {
        if (cursor.is("{")) {
            cursor.group();
            cursor.eat(";");
            return;
        }
        if (cursor.is("(") || cursor.is("[")) {
            cursor.group();
            continue;
        }
        if (cursor.next().value === ";") return;
    }
}

function skipToBrace(cursor: TokenCursor): void {
    while (!cursor.is("{")) {
        if (cursor.is("(") || cursor.is("[")) {
            cursor.group();
        } else {
            cursor.next();
        }
    }
}

function skipMacroInvocation(cursor: TokenCursor): void {
    while (!cursor.is("!")) cursor.next();
    cursor.next();
    if (cursor.isIdent()) cursor.next(); // macro_rules! name
    if (!(cursor.is("(") || cursor.is("[") || cursor.is("{"))) {
        throw cursor.error("expected a delimited macro body");
    }
    cursor.group();
    cursor.eat(";");
}

// ── use trees ───────────────────────────────────────────────────────

function parseUseTree(cursor: TokenCursor, prefix: string[], out: AliasBinding[]): void {
    cursor.eat("::");
    const path = [...prefix];

    for (;;) {
        if (cursor.is("{")) {
            for (const part of splitTopLevel(cursor.group())) {
                const sub = new TokenCursor(part);
                parseUseTree(sub, path, out);
                if (!sub.atEnd()) throw sub.error("unexpected token in use group");
            }
            return;
        }
        if (cursor.eat("*")) return;

        const name = cursor.expectIdent().value;
        if (cursor.eat("::")) {
            path.push(name);
            continue;
        }

        const target = name === "self" ? path : [...path, name];
        let alias = name === "self" ? (path[path.length - 1] ?? "") : name;
        if (cursor.eat("as")) alias = cursor.expectIdent().value;
        if (alias !== "" && alias !== "_" && target.length > 0) {
            out.push({ alias, path: target });
        }
        return;
    }
}

// ── Generics ────────────────────────────────────────────────────────

/** Names of type parameters in `<...>`; lifetimes and const parameters are left out. */
function parseGenerics(cursor: TokenCursor): string[] {
    if (!cursor.is("<")) return [];
    const names: string[] = [];
    for (const part of splitTopLevel(cursor.angleGroup(), ",", true)) {
        const first = part[0];
        if (!first || first.kind !== "ident" || first.value === "const") continue;
        names.push(first.value);
    }
    return names;
}

function skipWhereClause(cursor: TokenCursor): void {
    if (!cursor.eat("where")) return;
    while (!cursor.atEnd() && !cursor.is("{") && !cursor.is(";")) {
        if (cursor.is("(") || cursor.is("[")) {
            cursor.group();
        } else {
            cursor.next();
        }
    }
}

// ── Functions ───────────────────────────────────────────────────────

function parseFunction(cursor: TokenCursor, outer: Outer, isAsync: boolean, inImpl: boolean): RawFunction {
    cursor.expect("fn");
    const nameToken = cursor.expectIdent();
    const generics = parseGenerics(cursor);
    if (!cursor.is("(")) throw cursor.error(`expected parameter list for fn ${nameToken.value}`);

    let hasReceiver = false;
    const params: RawParam[] = [];
    for (const part of splitTopLevel(cursor.group(), ",", true)) {
        const param = parseParam(part);
        if (param === "self") {
            hasReceiver = true;
        } else {
            params.push(param);
        }
    }

    const returnType = cursor.eat("->") ? parseType(cursor) : null;
    skipWhereClause(cursor);

    let body: Token[] = [];
    if (cursor.is("{")) {
        body = cursor.group();
    } else {
        cursor.expect(";");
    }

    return {
        kind: "fn",
        name: nameToken.value,
        docs: docsText(outer.docs),
        attributes: outer.attributes,
        generics,
        isAsync,
        params,
        hasReceiver,
        returnType,
        body,
        inImpl,
        line: nameToken.line,
        column: nameToken.column,
    };
}

function parseParam(tokens: Token[]): RawParam | "self" {
    const cursor = new TokenCursor(tokens);
    parseOuter(cursor);
    const rest = cursor.rest();
    const first = rest[0];
    if (!first) throw cursor.error("empty parameter");

    const colon = rest.findIndex((t) => t.kind === "punct" && t.value === ":");
    const pattern = colon === -1 ? rest : rest.slice(0, colon);
    if (pattern.some((t) => t.kind === "ident" && t.value === "self")) return "self";
    if (colon === -1) {
        throw new ParseError("expected 'name: Type' parameter", first.line, first.column);
    }

    const names = pattern.filter((t) => t.kind === "ident" && t.value !== "mut" && t.value !== "ref");
    const nameToken = names[names.length - 1];
    if (!nameToken) {
        throw new ParseError("parameter pattern binds no name", first.line, first.column);
    }
    return {
        name: nameToken.value,
        type: parseWhole(rest.slice(colon + 1)),
        line: nameToken.line,
        column: nameToken.column,
    };
}

// ── Data types ──────────────────────────────────────────────────────

function parseStruct(cursor: TokenCursor, outer: Outer): RawStruct {
    cursor.expect("struct");
    const nameToken = cursor.expectIdent();
    const generics = parseGenerics(cursor);
    skipWhereClause(cursor);

    let shape: RawShape = "unit";
    let fields: RawField[] = [];
    if (cursor.is("{")) {
        shape = "named";
        fields = parseFields(cursor.group(), true);
    } else if (cursor.is("(")) {
        shape = "tuple";
        fields = parseFields(cursor.group(), false);
        skipWhereClause(cursor);
        cursor.expect(";");
    } else {
        cursor.expect(";");
    }

    return {
        kind: "struct",
        name: nameToken.value,
        docs: docsText(outer.docs),
        attributes: outer.attributes,
        generics,
        shape,
        fields,
        line: nameToken.line,
        column: nameToken.column,
    };
}

function parseFields(tokens: Token[], named: boolean): RawField[] {
    const fields: RawField[] = [];
    for (const part of splitTopLevel(tokens, ",", true)) {
        const cursor = new TokenCursor(part);
        const outer = parseOuter(cursor);
        if (cursor.atEnd()) continue;
        skipVisibility(cursor);

        let name: string | null = null;
        const start = cursor.peek();
        if (named) {
            name = cursor.expectIdent().value;
            cursor.expect(":");
        }
        const type = parseType(cursor);
        if (!cursor.atEnd()) throw cursor.error(`unexpected '${cursor.peek()?.value ?? ""}' after field type`);

        fields.push({
            name,
            docs: docsText(outer.docs),
            attributes: outer.attributes,
            type,
            line: start?.line ?? 0,
            column: start?.column ?? 0,
        });
    }
    return fields;
}

function parseEnum(cursor: TokenCursor, outer: Outer): RawEnum {
    cursor.expect("enum");
    const nameToken = cursor.expectIdent();
    const generics = parseGenerics(cursor);
    skipWhereClause(cursor);
    if (!cursor.is("{")) throw cursor.error(`expected '{' after enum ${nameToken.value}`);

    const variants: RawVariant[] = [];
    for (const part of splitTopLevel(cursor.group(), ",", true)) {
        const sub = new TokenCursor(part);
        const variantOuter = parseOuter(sub);
        if (sub.atEnd()) continue;
        const variantName = sub.expectIdent();

        let shape: RawShape = "unit";
        let fields: RawField[] = [];
        if (sub.is("{")) {
            shape = "named";
            fields = parseFields(sub.group(), true);
        } else if (sub.is("(")) {
            shape = "tuple";
            fields = parseFields(sub.group(), false);
        }
        // Explicit discriminant: `Variant = 3`
        if (sub.eat("=")) sub.rest();
        if (!sub.atEnd()) throw sub.error(`unexpected '${sub.peek()?.value ?? ""}' in variant ${variantName.value}`);

        variants.push({
            name: variantName.value,
            docs: docsText(variantOuter.docs),
            attributes: variantOuter.attributes,
            shape,
            fields,
            line: variantName.line,
            column: variantName.column,
        });
    }

    return {
        kind: "enum",
        name: nameToken.value,
        docs: docsText(outer.docs),
        attributes: outer.attributes,
        generics,
        variants,
        line: nameToken.line,
        column: nameToken.column,
    };
}

function parseAlias(cursor: TokenCursor, outer: Outer): RawAlias {
    cursor.expect("type");
    const nameToken = cursor.expectIdent();
    const generics = parseGenerics(cursor);
    skipWhereClause(cursor);
    cursor.expect("=");
    const target = parseType(cursor);
    cursor.expect(";");

    return {
        kind: "alias",
        name: nameToken.value,
        docs: docsText(outer.docs),
        attributes: outer.attributes,
        generics,
        target,
        line: nameToken.line,
        column: nameToken.column,
    };
}
