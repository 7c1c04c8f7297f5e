import { splitTopLevel } from "./cursor";
import type { Attribute } from "./parser";

export interface CommandMarker {
    renameAll: string | null;
}

/** `#[tauri::command]` / `#[command]` marker with its arguments, or null for plain functions. */
export function commandMarker(attributes: Attribute[]): CommandMarker | null {
    const marker = attributes.find((a) => a.path === "tauri::command" || a.path === "command");
    if (!marker) return null;
    return { renameAll: stringOption(marker, "rename_all") };
}

/** Trait names listed in `#[derive(...)]`, by their last path segment. */
export function derives(attributes: Attribute[]): string[] {
    const names: string[] = [];
    for (const attribute of attributes) {
        if (attribute.path !== "derive") continue;
        for (const part of splitTopLevel(attribute.args)) {
            const last = part[part.length - 1];
            if (last?.kind === "ident") names.push(last.value);
        }
    }
    return names;
}

export interface SerdeOptions {
    rename: string | null;
    renameAll: string | null;
    tag: string | null;
    content: string | null;
    untagged: boolean;
    skip: boolean;
}

/** Merged `#[serde(...)]` options. Direction-specific forms such as `rename(serialize = "..")` take the serialize side. */
export function serdeOptions(attributes: Attribute[]): SerdeOptions {
    const options: SerdeOptions = { rename: null, renameAll: null, tag: null, content: null, untagged: false, skip: false };
    for (const attribute of attributes) {
        if (attribute.path !== "serde") continue;
        for (const part of splitTopLevel(attribute.args)) {
            const key = part[0]?.value;
            const value = optionValue(part);
            switch (key) {
                case "rename":
                    options.rename = value;
                    break;
                case "rename_all":
                    options.renameAll = value;
                    break;
                case "tag":
                    options.tag = value;
                    break;
                case "content":
                    options.content = value;
                    break;
                case "untagged":
                    options.untagged = true;
                    break;
                case "skip":
                case "skip_serializing":
                case "skip_deserializing":
                    options.skip = true;
                    break;
            }
        }
    }
    return options;
}

function stringOption(attribute: Attribute, key: string): string | null {
    for (const part of splitTopLevel(attribute.args)) {
        if (part[0]?.value === key) return optionValue(part);
    }
    return null;
}

/** Value of `key = "value"` or `key(serialize = "value", ...)`. */
function optionValue(part: Attribute["args"]): string | null {
    const second = part[1];
    if (second?.kind === "punct" && second.value === "=") {
        const literal = part[2];
        return literal?.kind === "string" ? literal.value : null;
    }
    if (second?.kind === "punct" && second.value === "(") {
        const inner = part.slice(2, -1);
        for (const entry of splitTopLevel(inner)) {
            if (entry[0]?.value === "serialize" && entry[2]?.kind === "string") return entry[2].value;
        }
    }
    return null;
}
