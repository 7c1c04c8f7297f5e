/**
 * TypeScript rendering of type descriptors.
 */

import { type TypeDescriptor, walkType } from "@tauria/tsgen-core";

export interface PrintOptions {
    /** Declaration id → exported name. References to ids not listed print as `unknown`. */
    names: ReadonlyMap<string, string>;
    /** Prefix for user types, e.g. `T.` in command and event files; empty inside the types file. */
    qualifier: string;
}

const PRIMITIVES = {
    string: "string",
    number: "number",
    boolean: "boolean",
    void: "void",
    json: "unknown",
} as const;

/** True when the printed form is a union and must be parenthesized inside `T[]`. */
function isUnion(type: TypeDescriptor): boolean {
    return type.kind === "optional" || type.kind === "result";
}

export function printType(type: TypeDescriptor, options: PrintOptions): string {
    const print = (inner: TypeDescriptor): string => printType(inner, options);
    switch (type.kind) {
        case "primitive":
            return PRIMITIVES[type.name];
        case "optional":
            return `${print(type.inner)} | null`;
        case "result":
            return `{ Ok: ${print(type.ok)} } | { Err: ${type.err ? print(type.err) : "unknown"} }`;
        case "collection": {
            const element = print(type.element);
            return isUnion(type.element) ? `(${element})[]` : `${element}[]`;
        }
        case "map": {
            const key = type.key.kind === "primitive" && type.key.name === "number" ? "number" : "string";
            return `Record<${key}, ${print(type.value)}>`;
        }
        case "tuple":
            return `[${type.elements.map(print).join(", ")}]`;
        case "named": {
            const name = type.target === null ? undefined : options.names.get(type.target);
            if (name === undefined) return "unknown";
            const args = type.args.length > 0 ? `<${type.args.map(print).join(", ")}>` : "";
            return `${options.qualifier}${name}${args}`;
        }
        case "generic":
            return type.name;
        case "opaque":
        case "unsupported":
            return "unknown";
    }
}

/** Whether printing any of `types` emits a reference to a user type. */
export function referencesUserTypes(types: TypeDescriptor[], names: ReadonlyMap<string, string>): boolean {
    return types.some((type) => {
        for (const node of walkType(type)) {
            if (node.kind === "named" && node.target !== null && names.has(node.target)) return true;
        }
        return false;
    });
}

// ── Source text helpers ─────────────────────────────────────────────

export const GENERATED_HEADER = "// This file is generated by tauria-tsgen. Do not edit.";

/** A property key as written in an object type or literal. */
export function propertyKey(name: string): string {
    return /^[A-Za-z_$][\w$]*$/.test(name) ? name : JSON.stringify(name);
}

/** JSDoc block for `docs`, indented; empty docs yield no lines. */
export function docComment(docs: string, indent = ""): string[] {
    const text = docs.trim();
    if (text === "") return [];
    const escaped = text.split("\n").map((line) => line.replaceAll("*/", "*\\/"));
    if (escaped.length === 1) return [`${indent}/** ${escaped[0]} */`];
    return [`${indent}/**`, ...escaped.map((line) => (line === "" ? `${indent} *` : `${indent} * ${line}`)), `${indent} */`];
}
