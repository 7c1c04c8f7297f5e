/**
 * Contract: type model -- declaration collection and cross-file linking.
 *
 * Sections:
 *   1. Structs & serde renames
 *   2. Enum representations
 *   3. Aliases & generics
 *   4. Linking
 *   5. Name collisions
 */

import { describe, expect, it } from "vitest";
import { DiagnosticBag } from "../diagnostics/diagnostics";
import { parseFile } from "../parser/parser";
import { buildAliasTable } from "../resolver/aliases";
import type { TypeDeclaration, TypeDescriptor } from "../types";
import { buildCommands } from "./commands";
import { TypeIndex, buildTypeDeclarations, linkCommands, linkTypeDeclarations } from "./type-model";

function model(files: Record<string, string>) {
    const diagnostics = new DiagnosticBag();
    const declarations = Object.entries(files).flatMap(([file, source]) => {
        const parsed = parseFile(source);
        return buildTypeDeclarations(file, parsed, buildAliasTable(parsed.aliases), diagnostics);
    });
    const index = new TypeIndex(declarations);
    const types = linkTypeDeclarations(declarations, index, diagnostics);
    return { types, index, diagnostics: diagnostics.list() };
}

function byName(types: TypeDeclaration[], name: string): TypeDeclaration | undefined {
    return types.find((t) => t.name === name);
}

function fieldType(declaration: TypeDeclaration | undefined, field: string): TypeDescriptor | undefined {
    if (declaration?.kind !== "struct") return undefined;
    return declaration.fields.find((f) => f.name === field)?.type;
}

const num: TypeDescriptor = { kind: "primitive", name: "number" };
const str: TypeDescriptor = { kind: "primitive", name: "string" };

// ── 1. Structs & serde renames ──────────────────────────────────────

describe("buildTypeDeclarations() structs", () => {
    it("applies field renames and drops skipped fields", () => {
        const { types } = model({
            "models.rs": `
#[derive(Serialize, Deserialize)]
#[serde(rename_all = "camelCase")]
pub struct User {
    /// Primary key
    pub user_id: u32,
    #[serde(rename = "mail")]
    pub email_address: String,
    #[serde(skip)]
    pub cache: Vec<u8>,
}`,
        });
        expect(types[0]).toMatchObject({
            id: "models.rs::User",
            kind: "struct",
            name: "User",
            exportName: "User",
            shape: "named",
            serialize: true,
            deserialize: true,
            fields: [
                { name: "user_id", wireName: "userId", docs: "Primary key", type: num },
                { name: "email_address", wireName: "mail", docs: "", type: str },
            ],
        });
    });

    it("names tuple fields by position", () => {
        const { types } = model({ "ids.rs": "pub struct Id(pub u64);" });
        expect(types[0]).toMatchObject({
            shape: "tuple",
            serialize: false,
            fields: [{ name: "0", wireName: "0", docs: "", type: num }],
        });
    });

    it("reports unsupported field types against the field", () => {
        const { diagnostics } = model({ "f.rs": "pub struct Hooks {\n    pub run: Box<dyn Fn()>,\n}" });
        expect(diagnostics).toEqual([
            {
                code: "unsupported-type",
                severity: "warning",
                message: "field 'run' of type 'Hooks' uses 'dyn Fn()': trait objects cannot cross the bridge",
                file: "f.rs",
                line: 2,
                column: 9,
            },
        ]);
    });
});

// ── 2. Enum representations ─────────────────────────────────────────

describe("buildTypeDeclarations() enums", () => {
    it("reads adjacent tagging and variant renames", () => {
        const { types } = model({
            "status.rs": `
#[serde(tag = "type", content = "data", rename_all = "snake_case")]
pub enum Status {
    Idle,
    #[serde(rename = "done")]
    Done { at: u64 },
    #[serde(skip)]
    Hidden,
}`,
        });
        const [status] = types;
        expect(status?.kind === "enum" ? status.representation : null).toEqual({
            kind: "adjacent",
            tag: "type",
            content: "data",
        });
        expect(status?.kind === "enum" ? status.variants.map((v) => [v.name, v.wireName, v.shape]) : null).toEqual([
            ["Idle", "idle", "unit"],
            ["Done", "done", "named"],
        ]);
    });

    it("distinguishes untagged, internal and external representations", () => {
        const { types } = model({
            "e.rs": `
#[serde(untagged)]
enum A { X(u8) }
#[serde(tag = "kind")]
enum B { X }
enum C { X }
`,
        });
        expect(types.map((t) => (t.kind === "enum" ? t.representation : null))).toEqual([
            { kind: "untagged" },
            { kind: "internal", tag: "kind" },
            { kind: "external" },
        ]);
    });
});

// ── 3. Aliases & generics ───────────────────────────────────────────

describe("buildTypeDeclarations() aliases and generics", () => {
    it("links alias targets", () => {
        const { types } = model({ "ids.rs": "pub struct Id(pub u64);\npub type Ids = Vec<Id>;" });
        expect(byName(types, "Ids")).toMatchObject({
            kind: "alias",
            target: {
                kind: "collection",
                element: { kind: "named", name: "Id", path: ["Id"], args: [], target: "ids.rs::Id" },
            },
        });
    });

    it("keeps generic parameters as generic references", () => {
        const { types } = model({ "page.rs": "pub struct Page<T> { pub items: Vec<T>, pub total: u32 }" });
        expect(types[0]?.generics).toEqual(["T"]);
        expect(fieldType(types[0], "items")).toEqual({ kind: "collection", element: { kind: "generic", name: "T" } });
    });
});

// ── 4. Linking ──────────────────────────────────────────────────────

describe("linkTypeDeclarations()", () => {
    it("follows a module path hint to the matching declaration", () => {
        const { types } = model({
            "api/models.rs": "pub struct User { pub id: u8 }",
            "admin/models.rs": "pub struct User { pub name: String }",
            "pages.rs": "use crate::admin::models::User;\npub struct Page { pub items: Vec<User> }",
        });
        expect(fieldType(byName(types, "Page"), "items")).toMatchObject({
            kind: "collection",
            element: { kind: "named", target: "admin/models.rs::User" },
        });
    });

    it("prefers a declaration in the same module, then the first one scanned", () => {
        const { types } = model({
            "a.rs": "pub struct Item;",
            "b.rs": "pub struct Item;\npub struct Holder { pub item: Item }",
            "c.rs": "pub struct Other { pub item: Item }",
        });
        expect(fieldType(byName(types, "Holder"), "item")).toMatchObject({ target: "b.rs::Item" });
        expect(fieldType(byName(types, "Other"), "item")).toMatchObject({ target: "a.rs::Item" });
    });

    it("warns about names that match no declaration and leaves them unlinked", () => {
        const { types, diagnostics } = model({ "bag.rs": "pub struct Bag { pub x: Missing }" });
        expect(fieldType(types[0], "x")).toEqual({ kind: "named", name: "Missing", path: ["Missing"], args: [], target: null });
        expect(diagnostics.map((d) => [d.code, d.message])).toEqual([
            ["unresolved-type", "type 'Missing' used by 'Bag' is not declared in the scanned sources"],
        ]);
    });

    it("linkCommands() links parameters, returns and error arms", () => {
        const diagnostics = new DiagnosticBag();
        const typesSource = parseFile("pub struct User { pub id: u8 }");
        const declarations = buildTypeDeclarations("models.rs", typesSource, buildAliasTable([]), diagnostics);
        const commandSource = parseFile("#[tauri::command]\nfn get(filter: Option<User>) -> Result<User, AppError> { todo!() }");
        const commands = buildCommands("cmd.rs", commandSource, buildAliasTable([]), diagnostics);

        const [get] = linkCommands(commands, new TypeIndex(declarations), diagnostics);
        expect(get?.params[0]?.type).toMatchObject({ kind: "optional", inner: { target: "models.rs::User" } });
        expect(get?.returns).toMatchObject({ kind: "named", target: "models.rs::User" });
        expect(get?.errorType).toMatchObject({ kind: "named", name: "AppError", target: null });
        expect(diagnostics.list().map((d) => d.message)).toEqual([
            "type 'AppError' used by command 'get' is not declared in the scanned sources",
        ]);
    });
});

// ── 5. Name collisions ──────────────────────────────────────────────

describe("name collisions", () => {
    it("keeps every declaration and suffixes later export names", () => {
        const { types, diagnostics } = model({
            "api/models.rs": "pub struct User { pub id: u8 }",
            "admin/models.rs": "pub struct User { pub name: String }",
        });
        expect(types.map((t) => [t.id, t.exportName])).toEqual([
            ["api/models.rs::User", "User"],
            ["admin/models.rs::User", "User2"],
        ]);
        expect(diagnostics).toEqual([
            {
                code: "name-collision",
                severity: "warning",
                message: "type 'User' is declared 2 times (api/models.rs, admin/models.rs); all are kept",
                file: "admin/models.rs",
                line: 1,
                column: 12,
            },
        ]);
    });

    it("gives same-file duplicates distinct ids", () => {
        const { types } = model({ "m.rs": "mod a { pub struct X; }\nmod b { pub struct X; }" });
        expect(types.map((t) => [t.id, t.exportName])).toEqual([
            ["m.rs::X", "X"],
            ["m.rs::X#2", "X2"],
        ]);
    });

    it("skips a suffix already taken by another declaration", () => {
        const { types } = model({
            "a.rs": "pub struct User2;\npub struct User;",
            "b.rs": "pub struct User;",
        });
        expect(types.map((t) => t.exportName)).toEqual(["User2", "User", "User3"]);
    });
});
