import type { TypeDescriptor } from "@tauria/tsgen-core";
import { describe, expect, it } from "vitest";
import { docComment, printType, propertyKey, referencesUserTypes } from "./printer";

const names = new Map([["models.rs::User", "User"]]);
const print = (type: TypeDescriptor, qualifier = "T.") => printType(type, { names, qualifier });

const num: TypeDescriptor = { kind: "primitive", name: "number" };
const str: TypeDescriptor = { kind: "primitive", name: "string" };
const user: TypeDescriptor = { kind: "named", name: "User", path: ["User"], args: [], target: "models.rs::User" };

describe("printType()", () => {
    it("prints primitives, json as unknown", () => {
        expect(print(str)).toBe("string");
        expect(print({ kind: "primitive", name: "void" })).toBe("void");
        expect(print({ kind: "primitive", name: "json" })).toBe("unknown");
    });

    it("prints optionals as nullable and parenthesizes unions in arrays", () => {
        expect(print({ kind: "optional", inner: num })).toBe("number | null");
        expect(print({ kind: "collection", element: { kind: "optional", inner: num } })).toBe("(number | null)[]");
        expect(print({ kind: "collection", element: { kind: "collection", element: str } })).toBe("string[][]");
    });

    it("prints nested results as serde's Ok/Err objects", () => {
        expect(print({ kind: "result", ok: str, err: null })).toBe("{ Ok: string } | { Err: unknown }");
        expect(print({ kind: "result", ok: str, err: num })).toBe("{ Ok: string } | { Err: number }");
    });

    it("prints maps as records keyed by string or number", () => {
        expect(print({ kind: "map", key: str, value: user })).toBe("Record<string, T.User>");
        expect(print({ kind: "map", key: num, value: str })).toBe("Record<number, string>");
        expect(print({ kind: "map", key: user, value: str })).toBe("Record<string, string>");
    });

    it("prints tuples and generics", () => {
        expect(print({ kind: "tuple", elements: [str, { kind: "generic", name: "T" }] })).toBe("[string, T]");
    });

    it("qualifies linked user types and prints their arguments", () => {
        expect(print({ ...user, args: [num] })).toBe("T.User<number>");
        expect(print(user, "")).toBe("User");
    });

    it("prints unlinked, unknown, opaque and unsupported types as unknown", () => {
        expect(print({ ...user, target: null })).toBe("unknown");
        expect(print({ ...user, target: "other.rs::User" })).toBe("unknown");
        expect(print({ kind: "opaque" })).toBe("unknown");
        expect(print({ kind: "unsupported", text: "impl Fn()", reason: "r" })).toBe("unknown");
    });
});

describe("referencesUserTypes()", () => {
    it("finds linked references at any depth", () => {
        expect(referencesUserTypes([num, { kind: "optional", inner: user }], names)).toBe(true);
        expect(referencesUserTypes([{ ...user, target: null }, str], names)).toBe(false);
    });
});

describe("source helpers", () => {
    it("propertyKey() quotes keys that are not identifiers", () => {
        expect(propertyKey("userId")).toBe("userId");
        expect(propertyKey("user-id")).toBe('"user-id"');
        expect(propertyKey("0")).toBe('"0"');
    });

    it("docComment() renders single and multi-line blocks", () => {
        expect(docComment("")).toEqual([]);
        expect(docComment("One line.", "    ")).toEqual(["    /** One line. */"]);
        expect(docComment("First.\n\nEnds with */ here.")).toEqual([
            "/**",
            " * First.",
            " *",
            " * Ends with *\\/ here.",
            " */",
        ]);
    });
});
