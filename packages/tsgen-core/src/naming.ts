import { camelCase, constantCase, kebabCase, pascalCase, snakeCase } from "es-toolkit";

// ── Identifiers ─────────────────────────────────────────────────────

const RESERVED = new Set([
    "arguments", "await", "break", "case", "catch", "class", "const", "continue", "debugger", "default",
    "delete", "do", "else", "enum", "eval", "export", "extends", "false", "finally", "for", "function",
    "if", "implements", "import", "in", "instanceof", "interface", "let", "new", "null", "package",
    "private", "protected", "public", "return", "static", "super", "switch", "this", "throw", "true",
    "try", "typeof", "var", "void", "while", "with", "yield",
]);

/** A TypeScript-safe binding name; reserved words get a trailing underscore. */
export function safeIdentifier(name: string): string {
    const cleaned = name.replace(/[^\p{L}\p{N}_$]/gu, "_");
    const identifier = /^\p{N}/u.test(cleaned) ? `_${cleaned}` : cleaned;
    if (identifier === "") return "_";
    return RESERVED.has(identifier) ? `${identifier}_` : identifier;
}

/** `get_user` → `getUser` */
export function methodName(rustName: string): string {
    return camelCase(rustName) || rustName;
}

/** `user_api` → `UserApi`; the wrapper and interface names derive from it. */
export function wrapperName(baseName: string): string {
    return pascalCase(baseName) || "Module";
}

/** `window-event` → `onWindowEvent` */
export function callbackName(eventName: string): string {
    return `on${pascalCase(eventName) || "Event"}`;
}

/** First of `base`, `base2`, `base3`, ... not yet in `taken`; the result is added to `taken`. */
export function uniqueName(base: string, taken: Set<string>): string {
    let candidate = base;
    for (let n = 2; taken.has(candidate); n++) {
        candidate = `${base}${n}`;
    }
    taken.add(candidate);
    return candidate;
}

// ── serde rename rules ──────────────────────────────────────────────

/** Apply a serde `rename_all` rule to a field or variant name. Unknown rules leave the name unchanged. */
export function applyRenameRule(name: string, rule: string | null): string {
    switch (rule) {
        case "lowercase":
            return name.toLowerCase();
        case "UPPERCASE":
            return name.toUpperCase();
        case "PascalCase":
            return pascalCase(name);
        case "camelCase":
            return camelCase(name);
        case "snake_case":
            return snakeCase(name);
        case "SCREAMING_SNAKE_CASE":
            return constantCase(name);
        case "kebab-case":
            return kebabCase(name);
        case "SCREAMING-KEBAB-CASE":
            return kebabCase(name).toUpperCase();
        default:
            return name;
    }
}
