import { TokenCursor, splitTopLevel, tokensText } from "./cursor";
import type { Token } from "./lexer";

// ── Syntax tree ─────────────────────────────────────────────────────

export interface PathSegment {
    name: string;
    args: TypeExpr[];
}

export type OtherTypeForm = "impl" | "dyn" | "fn" | "pointer" | "never" | "infer" | "qualified" | "macro";

/** A Rust type expression as written, before any resolution. */
export type TypeExpr =
    | { kind: "path"; segments: PathSegment[] }
    | { kind: "ref"; mutable: boolean; inner: TypeExpr }
    | { kind: "tuple"; elements: TypeExpr[] }
    | { kind: "array"; element: TypeExpr }
    | { kind: "other"; form: OtherTypeForm; text: string };

// ── Parsing ─────────────────────────────────────────────────────────

/** Parse one type at the cursor, leaving the cursor on the first token after it. */
export function parseType(cursor: TokenCursor): TypeExpr {
    const start = cursor.position;
    const token = cursor.peek();
    if (!token) throw cursor.error("expected a type before end of input");

    if (cursor.is("&") || cursor.is("&&")) {
        const double = cursor.next().value === "&&";
        if (cursor.peek()?.kind === "lifetime") cursor.next();
        const mutable = cursor.eat("mut");
        const inner = parseType(cursor);
        const ref: TypeExpr = { kind: "ref", mutable, inner };
        return double ? { kind: "ref", mutable: false, inner: ref } : ref;
    }

    if (cursor.is("*")) {
        cursor.next();
        if (!cursor.eat("const")) cursor.eat("mut");
        parseType(cursor);
        return other(cursor, "pointer", start);
    }

    if (cursor.is("(")) {
        const inner = cursor.group();
        const elements = splitTopLevel(inner, ",", true).map(parseWhole);
        const last = inner[inner.length - 1];
        const trailingComma = last?.kind === "punct" && last.value === ",";
        const [only] = elements;
        if (elements.length === 1 && only && !trailingComma) return only;
        return { kind: "tuple", elements };
    }

    if (cursor.is("[")) {
        const inner = new TokenCursor(cursor.group());
        const element = parseType(inner);
        if (!inner.atEnd()) inner.expect(";");
        return { kind: "array", element };
    }

    if (cursor.is("!")) {
        cursor.next();
        return other(cursor, "never", start);
    }

    if (cursor.is("_")) {
        cursor.next();
        return other(cursor, "infer", start);
    }

    if (cursor.is("impl") || cursor.is("dyn")) {
        const form = cursor.next().value === "impl" ? "impl" : "dyn";
        parseBounds(cursor);
        return other(cursor, form, start);
    }

    if (cursor.is("for")) {
        cursor.next();
        cursor.angleGroup();
        return parseType(cursor);
    }

    if (cursor.is("fn") || cursor.is("unsafe") || cursor.is("extern")) {
        while (!cursor.is("fn")) {
            const skipped = cursor.next();
            if (skipped.kind !== "ident" && skipped.kind !== "string") {
                throw cursor.error(`unexpected '${skipped.value}' in function pointer type`);
            }
        }
        cursor.next();
        cursor.group();
        if (cursor.eat("->")) parseType(cursor);
        return other(cursor, "fn", start);
    }

    if (cursor.is("<")) {
        cursor.angleGroup();
        while (cursor.eat("::")) {
            cursor.expectIdent();
            if (cursor.is("<")) cursor.angleGroup();
        }
        return other(cursor, "qualified", start);
    }

    if (cursor.is("::") || token.kind === "ident") {
        return parsePath(cursor, start);
    }

    throw cursor.error(`expected a type, found '${token.value}'`);
}

/** Parse tokens that must form exactly one type. */
export function parseWhole(tokens: Token[]): TypeExpr {
    const cursor = new TokenCursor(tokens);
    const type = parseType(cursor);
    if (!cursor.atEnd()) {
        throw cursor.error(`unexpected '${cursor.peek()?.value ?? ""}' after type`);
    }
    return type;
}

function parsePath(cursor: TokenCursor, start: number): TypeExpr {
    cursor.eat("::");
    const segments: PathSegment[] = [];

    for (;;) {
        const name = cursor.expectIdent().value;

        if (cursor.is("!")) {
            cursor.next();
            cursor.group();
            return other(cursor, "macro", start);
        }

        // Fn(A) -> B sugar
        if (cursor.is("(") && (name === "Fn" || name === "FnMut" || name === "FnOnce")) {
            cursor.group();
            if (cursor.eat("->")) parseType(cursor);
            return other(cursor, "fn", start);
        }

        let args: TypeExpr[] = [];
        if (cursor.is("<") || (cursor.is("::") && cursor.is("<", 1))) {
            cursor.eat("::");
            args = parseGenericArgs(cursor.angleGroup());
        }
        segments.push({ name, args });

        if (cursor.is("::") && cursor.isIdent(1)) {
            cursor.next();
            continue;
        }
        return { kind: "path", segments };
    }
}

function parseGenericArgs(tokens: Token[]): TypeExpr[] {
    const args: TypeExpr[] = [];
    for (const part of splitTopLevel(tokens, ",", true)) {
        const first = part[0];
        if (!first) continue;
        if (first.kind === "lifetime" || first.kind === "number" || first.kind === "string" || first.kind === "char") {
            continue;
        }
        if (first.kind === "punct" && (first.value === "{" || first.value === "-")) continue;
        // Associated item bindings and constraints: `Item = T`, `Item: Bound`
        const second = part[1];
        if (first.kind === "ident" && second?.kind === "punct" && (second.value === "=" || second.value === ":")) {
            continue;
        }
        args.push(parseWhole(part));
    }
    return args;
}

function parseBounds(cursor: TokenCursor): void {
    do {
        if (cursor.peek()?.kind === "lifetime") {
            cursor.next();
            continue;
        }
        cursor.eat("?");
        if (cursor.is("for")) {
            cursor.next();
            cursor.angleGroup();
        }
        if (cursor.is("(")) {
            cursor.group();
            continue;
        }
        parsePath(cursor, cursor.position);
    } while (cursor.eat("+"));
}

function other(cursor: TokenCursor, form: OtherTypeForm, start: number): TypeExpr {
    return { kind: "other", form, text: tokensText(cursor.slice(start, cursor.position)) };
}

// ── Printing ────────────────────────────────────────────────────────

/** Rust-like text of a type expression, for diagnostics. */
export function typeText(type: TypeExpr): string {
    switch (type.kind) {
        case "path":
            return type.segments
                .map((s) => (s.args.length > 0 ? `${s.name}<${s.args.map(typeText).join(", ")}>` : s.name))
                .join("::");
        case "ref":
            return `&${type.mutable ? "mut " : ""}${typeText(type.inner)}`;
        case "tuple": {
            const [only] = type.elements;
            if (type.elements.length === 1 && only) return `(${typeText(only)},)`;
            return `(${type.elements.map(typeText).join(", ")})`;
        }
        case "array":
            return `[${typeText(type.element)}]`;
        case "other":
            return type.text;
    }
}
