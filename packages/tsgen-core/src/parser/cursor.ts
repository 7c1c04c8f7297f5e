import { ParseError, type Token } from "./lexer";

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };

/** Forward-only reader over a token slice. */
export class TokenCursor {
    private index = 0;

    constructor(private readonly tokens: Token[]) {}

    get position(): number {
        return this.index;
    }

    atEnd(): boolean {
        return this.index >= this.tokens.length;
    }

    peek(offset = 0): Token | undefined {
        return this.tokens[this.index + offset];
    }

    /** True when the token at `offset` is punctuation or an identifier spelled `value`. */
    is(value: string, offset = 0): boolean {
        const token = this.peek(offset);
        return token !== undefined && (token.kind === "punct" || token.kind === "ident") && token.value === value;
    }

    isIdent(offset = 0): boolean {
        return this.peek(offset)?.kind === "ident";
    }

    next(): Token {
        const token = this.tokens[this.index];
        if (!token) throw this.error("unexpected end of input");
        this.index++;
        return token;
    }

    eat(value: string): boolean {
        if (!this.is(value)) return false;
        this.index++;
        return true;
    }

    expect(value: string): Token {
        if (!this.is(value)) {
            throw this.error(`expected '${value}'${this.describeCurrent()}`);
        }
        return this.next();
    }

    expectIdent(): Token {
        const token = this.peek();
        if (token?.kind !== "ident") {
            throw this.error(`expected identifier${this.describeCurrent()}`);
        }
        return this.next();
    }

    /** Consume a bracketed group starting at the current opener; returns the tokens between the delimiters. */
    group(): Token[] {
        const opener = this.next();
        const closer = OPENERS[opener.value];
        if (opener.kind !== "punct" || !closer) {
            throw new ParseError(`expected a group, found '${opener.value}'`, opener.line, opener.column);
        }
        const start = this.index;
        let depth = 1;
        while (depth > 0) {
            const token = this.next();
            if (token.kind !== "punct") continue;
            if (token.value in OPENERS) depth++;
            else if (token.value === ")" || token.value === "]" || token.value === "}") depth--;
        }
        return this.tokens.slice(start, this.index - 1);
    }

    /** Consume `<...>` honoring nested angle brackets and groups; returns the inner tokens. */
    angleGroup(): Token[] {
        this.expect("<");
        const start = this.index;
        let depth = 1;
        while (depth > 0) {
            if (this.is("(") || this.is("[") || this.is("{")) {
                this.group();
                continue;
            }
            const token = this.next();
            if (token.kind !== "punct") continue;
            if (token.value === "<") depth++;
            else if (token.value === ">") depth--;
        }
        return this.tokens.slice(start, this.index - 1);
    }

    slice(from: number, to: number): Token[] {
        return this.tokens.slice(from, to);
    }

    /** Remaining tokens, consuming them. */
    rest(): Token[] {
        const rest = this.tokens.slice(this.index);
        this.index = this.tokens.length;
        return rest;
    }

    error(message: string): ParseError {
        const token = this.peek() ?? this.tokens[this.tokens.length - 1];
        return new ParseError(message, token?.line ?? 1, token?.column ?? 1);
    }

    private describeCurrent(): string {
        const token = this.peek();
        return token ? `, found '${token.value}'` : " before end of input";
    }
}

/**
 * Split tokens on a top-level separator. Groups are always opaque; angle
 * brackets nest only when `angles` is set (type positions).
 */
export function splitTopLevel(tokens: Token[], separator = ",", angles = false): Token[][] {
    const parts: Token[][] = [];
    let current: Token[] = [];
    let depth = 0;
    let angleDepth = 0;

    for (const token of tokens) {
        if (token.kind === "punct") {
            if (token.value in OPENERS) depth++;
            else if (token.value === ")" || token.value === "]" || token.value === "}") depth--;
            else if (angles && token.value === "<") angleDepth++;
            else if (angles && token.value === ">" && angleDepth > 0) angleDepth--;
            else if (token.value === separator && depth === 0 && angleDepth === 0) {
                parts.push(current);
                current = [];
                continue;
            }
        }
        current.push(token);
    }
    if (current.length > 0) parts.push(current);
    return parts;
}

const WORDISH = new Set<string>(["ident", "lifetime", "number"]);

/** Rebuild readable source text from tokens, for messages. */
export function tokensText(tokens: Token[]): string {
    let text = "";
    let previous: Token | undefined;
    for (const token of tokens) {
        const value =
            token.kind === "string" ? JSON.stringify(token.value) : token.kind === "lifetime" ? `'${token.value}` : token.value;
        if (previous && WORDISH.has(previous.kind) && (WORDISH.has(token.kind) || token.kind === "string")) {
            text += " ";
        } else if (previous?.kind === "punct" && (previous.value === "," || previous.value === "+")) {
            text += " ";
        } else if (token.kind === "punct" && token.value === "+") {
            text += " ";
        }
        text += value;
        previous = token;
    }
    return text;
}
