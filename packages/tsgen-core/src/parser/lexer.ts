/**
 * Tokenizer for Rust source.
 *
 * Produces just enough token structure for the declaration parser and the
 * event detector: identifiers, lifetimes, literals, punctuation and outer
 * doc comments. Plain comments and inner doc comments (`//!`, `/*!`) are
 * dropped. Delimiters are checked for balance while lexing.
 */

export type TokenKind = "ident" | "lifetime" | "string" | "char" | "number" | "punct" | "doc";

export interface Token {
    kind: TokenKind;
    /** Identifier name, punctuation text, literal contents (unescaped for strings) or doc text. */
    value: string;
    line: number;
    column: number;
}

/** A lexical or structural problem, located in the file. */
export class ParseError extends Error {
    readonly line: number;
    readonly column: number;

    constructor(message: string, line: number, column: number) {
        super(message);
        this.name = "ParseError";
        this.line = line;
        this.column = column;
    }
}

const MULTI_PUNCT = ["::", "->", "=>", "==", "!=", "&&", "||", "..=", "...", ".."];
const CLOSERS: Record<string, string> = { ")": "(", "]": "[", "}": "{" };
const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", "0": "\0", "\\": "\\", '"': '"', "'": "'" };

function isIdentStart(ch: string): boolean {
    return /[\p{L}_]/u.test(ch);
}

function isIdentPart(ch: string): boolean {
    return /[\p{L}\p{N}_]/u.test(ch);
}

export function tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    const open: Token[] = [];
    let pos = 0;
    let line = 1;
    let column = 1;

    const peek = (offset = 0): string => source.charAt(pos + offset);

    const advance = (count = 1): void => {
        for (let i = 0; i < count; i++) {
            if (source.charAt(pos) === "\n") {
                line++;
                column = 1;
            } else {
                column++;
            }
            pos++;
        }
    };

    while (pos < source.length) {
        const ch = peek();
        const startLine = line;
        const startColumn = column;
        const push = (kind: TokenKind, value: string): void => {
            tokens.push({ kind, value, line: startLine, column: startColumn });
        };

        if (/\s/.test(ch)) {
            advance();
            continue;
        }

        // ── Comments ────────────────────────────────────────────────

        if (ch === "/" && peek(1) === "/") {
            const end = source.indexOf("\n", pos);
            const text = source.slice(pos, end === -1 ? source.length : end);
            advance(text.length);
            if (text.startsWith("///") && !text.startsWith("////")) {
                push("doc", text.slice(3).trim());
            }
            continue;
        }

        if (ch === "/" && peek(1) === "*") {
            const isDoc = peek(2) === "*" && peek(3) !== "*" && peek(3) !== "/";
            let depth = 0;
            const begin = pos;
            do {
                if (pos >= source.length) {
                    throw new ParseError("unterminated block comment", startLine, startColumn);
                }
                if (peek() === "/" && peek(1) === "*") {
                    depth++;
                    advance(2);
                } else if (peek() === "*" && peek(1) === "/") {
                    depth--;
                    advance(2);
                } else {
                    advance();
                }
            } while (depth > 0);
            if (isDoc) {
                push("doc", blockDocText(source.slice(begin + 3, pos - 2)));
            }
            continue;
        }

        // ── Strings & chars ─────────────────────────────────────────

        const rawPrefix = /^(?:br|r)(#*)"/.exec(source.slice(pos, pos + 260));
        if (rawPrefix) {
            const hashes = rawPrefix[1] ?? "";
            const terminator = `"${hashes}`;
            const bodyStart = pos + rawPrefix[0].length;
            const end = source.indexOf(terminator, bodyStart);
            if (end === -1) {
                throw new ParseError("unterminated raw string", startLine, startColumn);
            }
            const value = source.slice(bodyStart, end);
            advance(end + terminator.length - pos);
            push("string", value);
            continue;
        }

        if (ch === '"' || ((ch === "b" || ch === "c") && peek(1) === '"')) {
            advance(ch === '"' ? 1 : 2);
            let value = "";
            for (;;) {
                if (pos >= source.length) {
                    throw new ParseError("unterminated string literal", startLine, startColumn);
                }
                const c = peek();
                if (c === '"') {
                    advance();
                    break;
                }
                if (c === "\\") {
                    const next = peek(1);
                    if (next === "\n") {
                        // Line continuation swallows the newline and leading whitespace.
                        advance(2);
                        while (/\s/.test(peek())) advance();
                        continue;
                    }
                    value += ESCAPES[next] ?? next;
                    advance(2);
                    continue;
                }
                value += c;
                advance();
            }
            push("string", value);
            continue;
        }

        if (ch === "'" || (ch === "b" && peek(1) === "'")) {
            const quote = ch === "'" ? pos : pos + 1;
            const afterQuote = source.charAt(quote + 1);
            const isChar = afterQuote === "\\" || source.charAt(quote + 2) === "'";
            if (isChar) {
                const close = source.indexOf("'", quote + (afterQuote === "\\" ? 3 : 2));
                if (close === -1) {
                    throw new ParseError("unterminated character literal", startLine, startColumn);
                }
                const value = source.slice(quote + 1, close);
                advance(close + 1 - pos);
                push("char", value);
                continue;
            }
            if (ch === "'" && isIdentStart(afterQuote)) {
                advance();
                let name = "";
                while (pos < source.length && isIdentPart(peek())) {
                    name += peek();
                    advance();
                }
                push("lifetime", name);
                continue;
            }
        }

        // ── Identifiers & numbers ───────────────────────────────────

        if (ch === "r" && peek(1) === "#" && isIdentStart(peek(2))) {
            advance(2);
        }

        if (isIdentStart(peek())) {
            let name = "";
            while (pos < source.length && isIdentPart(peek())) {
                name += peek();
                advance();
            }
            push("ident", name);
            continue;
        }

        if (/[0-9]/.test(ch)) {
            let text = "";
            while (pos < source.length) {
                const c = peek();
                if (/[0-9A-Za-z_]/.test(c)) {
                    text += c;
                    advance();
                } else if (c === "." && /[0-9]/.test(peek(1)) && !text.includes(".")) {
                    text += c;
                    advance();
                } else {
                    break;
                }
            }
            push("number", text);
            continue;
        }

        // ── Punctuation ─────────────────────────────────────────────

        const multi = MULTI_PUNCT.find((p) => source.startsWith(p, pos));
        const punct = multi ?? ch;
        advance(punct.length);
        const token: Token = { kind: "punct", value: punct, line: startLine, column: startColumn };
        tokens.push(token);

        if (punct === "(" || punct === "[" || punct === "{") {
            open.push(token);
        } else if (punct in CLOSERS) {
            const opener = open.pop();
            if (!opener || opener.value !== CLOSERS[punct]) {
                throw new ParseError(`unbalanced delimiter '${punct}'`, startLine, startColumn);
            }
        }
    }

    const unclosed = open.pop();
    if (unclosed) {
        throw new ParseError(`unclosed delimiter '${unclosed.value}'`, unclosed.line, unclosed.column);
    }

    return tokens;
}

/** Text of a `/** ... *\/` comment with the leading `*` gutter removed. */
function blockDocText(body: string): string {
    const lines = body.split("\n").map((l) => l.replace(/^\s*\*?/, "").trim());
    while (lines.length > 0 && lines[0] === "") lines.shift();
    while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
    return lines.join("\n");
}
