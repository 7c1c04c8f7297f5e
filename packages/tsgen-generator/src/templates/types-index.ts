/**
 * `interface/types/index.ts`: every exported data type, in scan order.
 *
 * Structs become interfaces (or tuple/alias types for tuple and unit
 * structs); enums become unions of serde's JSON shapes for the enum's
 * representation.
 */

import type {
    EnumDeclaration,
    EnumRepresentation,
    FieldDeclaration,
    StructDeclaration,
    TypeDeclaration,
    VariantDeclaration,
} from "@tauria/tsgen-core";
import { GENERATED_HEADER, type PrintOptions, docComment, printType, propertyKey } from "../printer";
import type { TypesIndexContext } from "./contexts";

function typeParameters(declaration: TypeDeclaration): string {
    return declaration.generics.length > 0 ? `<${declaration.generics.join(", ")}>` : "";
}

/** `{ id: number; name: string }` on one line. */
function inlineObject(fields: FieldDeclaration[], options: PrintOptions): string {
    if (fields.length === 0) return "{}";
    return `{ ${fields.map((f) => `${propertyKey(f.wireName)}: ${printType(f.type, options)}`).join("; ")} }`;
}

/** Payload of a tuple-shaped struct or variant: a newtype's inner type, otherwise a tuple. */
function tuplePayload(fields: FieldDeclaration[], options: PrintOptions): string {
    const [only] = fields;
    if (fields.length === 1 && only) return printType(only.type, options);
    return `[${fields.map((f) => printType(f.type, options)).join(", ")}]`;
}

function variantPayload(variant: VariantDeclaration, options: PrintOptions): string | null {
    switch (variant.shape) {
        case "unit":
            return null;
        case "tuple":
            return tuplePayload(variant.fields, options);
        case "named":
            return inlineObject(variant.fields, options);
    }
}

function variantShape(variant: VariantDeclaration, representation: EnumRepresentation, options: PrintOptions): string {
    const tag = JSON.stringify(variant.wireName);
    const payload = variantPayload(variant, options);
    switch (representation.kind) {
        case "external":
            return payload === null ? tag : `{ ${propertyKey(variant.wireName)}: ${payload} }`;
        case "internal": {
            const tagField = `${propertyKey(representation.tag)}: ${tag}`;
            if (variant.shape === "named" && variant.fields.length > 0) {
                const fields = variant.fields.map((f) => `${propertyKey(f.wireName)}: ${printType(f.type, options)}`);
                return `{ ${[tagField, ...fields].join("; ")} }`;
            }
            if (variant.shape === "tuple" && payload !== null) return `({ ${tagField} } & ${payload})`;
            return `{ ${tagField} }`;
        }
        case "adjacent": {
            const tagField = `${propertyKey(representation.tag)}: ${tag}`;
            if (payload === null) return `{ ${tagField} }`;
            return `{ ${tagField}; ${propertyKey(representation.content)}: ${payload} }`;
        }
        case "untagged":
            return payload ?? "null";
    }
}

// ── Declarations ────────────────────────────────────────────────────

function renderStruct(declaration: StructDeclaration, options: PrintOptions): string[] {
    const head = `${declaration.exportName}${typeParameters(declaration)}`;
    switch (declaration.shape) {
        case "unit":
            return [`export type ${head} = null;`];
        case "tuple":
            return [`export type ${head} = ${tuplePayload(declaration.fields, options)};`];
        case "named": {
            const lines = [`export interface ${head} {`];
            for (const field of declaration.fields) {
                lines.push(...docComment(field.docs, "    "), `    ${propertyKey(field.wireName)}: ${printType(field.type, options)};`);
            }
            lines.push("}");
            return lines;
        }
    }
}

function renderEnum(declaration: EnumDeclaration, options: PrintOptions): string[] {
    const head = `export type ${declaration.exportName}${typeParameters(declaration)} =`;
    if (declaration.variants.length === 0) return [`${head} never;`];
    const lines = [head];
    declaration.variants.forEach((variant, i) => {
        const end = i === declaration.variants.length - 1 ? ";" : "";
        lines.push(...docComment(variant.docs, "    "), `    | ${variantShape(variant, declaration.representation, options)}${end}`);
    });
    return lines;
}

function renderDeclaration(declaration: TypeDeclaration, options: PrintOptions): string[] {
    switch (declaration.kind) {
        case "struct":
            return renderStruct(declaration, options);
        case "enum":
            return renderEnum(declaration, options);
        case "alias":
            return [
                `export type ${declaration.exportName}${typeParameters(declaration)} = ${printType(declaration.target, options)};`,
            ];
    }
}

export function renderTypesIndex(ctx: TypesIndexContext): string {
    const options: PrintOptions = { names: ctx.typeNames, qualifier: "" };
    const lines = [GENERATED_HEADER];
    if (ctx.types.length === 0) lines.push("", "export {};");
    for (const declaration of ctx.types) {
        lines.push(
            "",
            `//- Generated from ${declaration.module}`,
            ...docComment(declaration.docs),
            ...renderDeclaration(declaration, options),
        );
    }
    lines.push("");
    return lines.join("\n");
}
