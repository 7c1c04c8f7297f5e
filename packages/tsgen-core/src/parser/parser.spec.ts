import { describe, expect, it } from "vitest";
import { commandMarker, derives, serdeOptions } from "./attributes";
import { ParseError } from "./lexer";
import { type RawEnum, type RawItem, type RawStruct, parseFile } from "./parser";
import { typeText } from "./type-syntax";

function only<K extends RawItem["kind"]>(items: RawItem[], kind: K): Extract<RawItem, { kind: K }>[] {
    return items.filter((item): item is Extract<RawItem, { kind: K }> => item.kind === kind);
}

describe("parseFile()", () => {
    // ── Functions ───────────────────────────────────────────────────

    describe("functions", () => {
        it("captures signature, docs and command marker", () => {
            const { items } = parseFile(`
/// Returns the user.
/// Second line.
#[tauri::command(rename_all = "snake_case")]
pub async fn get_user(app: tauri::AppHandle, user_id: u32) -> Result<User, String> {
    Ok(User::default())
}
`);
            const [fn] = only(items, "fn");
            expect(fn?.name).toBe("get_user");
            expect(fn?.docs).toBe("Returns the user.\nSecond line.");
            expect(fn?.isAsync).toBe(true);
            expect(fn?.params.map((p) => `${p.name}: ${typeText(p.type)}`)).toEqual([
                "app: tauri::AppHandle",
                "user_id: u32",
            ]);
            const returnType = fn?.returnType;
            expect(returnType ? typeText(returnType) : null).toBe("Result<User, String>");
            expect(commandMarker(fn?.attributes ?? [])).toEqual({ renameAll: "snake_case" });
            expect(fn?.line).toBe(5);
        });

        it("keeps the body tokens for later scanning", () => {
            const [fn] = only(parseFile('fn setup(app: AppHandle) { app.emit("ready", ()).ok(); }').items, "fn");
            expect(fn?.body.map((t) => t.value).slice(0, 4)).toEqual(["app", ".", "emit", "("]);
        });

        it("reads #[doc] attributes as documentation", () => {
            const [fn] = only(parseFile('#[doc = " From attr "]\n#[command]\nfn ping() {}').items, "fn");
            expect(fn?.docs).toBe("From attr");
            expect(commandMarker(fn?.attributes ?? [])).toEqual({ renameAll: null });
        });

        it("names destructured parameters by their binding", () => {
            const [fn] = only(parseFile("fn a(State(db): State<'_, Db>, mut count: u8) {}").items, "fn");
            expect(fn?.params.map((p) => p.name)).toEqual(["db", "count"]);
        });

        it("keeps impl methods, flags them, and records receivers", () => {
            const { items } = parseFile(`
impl<R: Runtime> Notifier<R> {
    const LIMIT: usize = 3;
    pub fn notify(&self, msg: String) { self.app.emit("note", msg); }
}`);
            const [fn] = only(items, "fn");
            expect(fn).toMatchObject({ name: "notify", inImpl: true, hasReceiver: true });
            expect(fn?.params.map((p) => p.name)).toEqual(["msg"]);
        });

        it("drops items under #[cfg(test)]", () => {
            const { items } = parseFile(`
#[command]
fn kept() {}
#[cfg(test)]
mod tests {
    #[test]
    fn hidden() { assert!(true); }
}`);
            expect(items.map((i) => i.name)).toEqual(["kept"]);
        });
    });

    // ── Skipped items ───────────────────────────────────────────────

    it("skips unrelated top-level items silently", () => {
        const { items } = parseFile(`
extern crate serde;
const MAX: usize = 10;
static NAMES: Lazy<Mutex<Vec<String>>> = Lazy::new(|| Mutex::new(vec![]));
macro_rules! twice { ($e:expr) => { $e; $e }; }
lazy_static::lazy_static! { static ref X: u8 = 1; }
pub trait Store { fn load(&self) -> u8; }
unsafe impl Send for Handle {}
extern "C" { fn abs(x: i32) -> i32; }
struct Kept;
`);
        expect(items.map((i) => i.name)).toEqual(["Kept"]);
    });

    it("descends into inline modules", () => {
        const { items } = parseFile("mod inner { pub struct Nested { pub id: u8 } }");
        expect(items.map((i) => i.name)).toEqual(["Nested"]);
    });

    // ── Data types ──────────────────────────────────────────────────

    describe("data types", () => {
        it("parses named, tuple and unit structs with field docs", () => {
            const structs: RawStruct[] = only(
                parseFile(`
#[derive(Debug, serde::Serialize, Deserialize)]
#[serde(rename_all = "camelCase")]
pub struct User<T> where T: Clone {
    /// Primary key
    pub id: u32,
    #[serde(skip)]
    cache: Option<T>,
}
pub struct Id(pub u64);
pub struct Marker;
`).items,
                "struct",
            );
            expect(structs.map((s) => [s.name, s.shape, s.fields.length])).toEqual([
                ["User", "named", 2],
                ["Id", "tuple", 1],
                ["Marker", "unit", 0],
            ]);
            const [user] = structs;
            expect(user?.generics).toEqual(["T"]);
            expect(user?.fields[0]).toMatchObject({ name: "id", docs: "Primary key" });
            expect(derives(user?.attributes ?? [])).toEqual(["Debug", "Serialize", "Deserialize"]);
            expect(serdeOptions(user?.attributes ?? []).renameAll).toBe("camelCase");
            expect(serdeOptions(user?.fields[1]?.attributes ?? []).skip).toBe(true);
        });

        it("parses enum variants of every shape", () => {
            const [status]: RawEnum[] = only(
                parseFile(`
#[serde(tag = "type", content = "data")]
enum Status {
    /// Waiting
    Idle,
    Failed(String, u8),
    #[serde(rename = "done")]
    Done { at: u64 },
    Code = 4,
}`).items,
                "enum",
            );
            expect(status?.variants.map((v) => [v.name, v.shape, v.fields.length])).toEqual([
                ["Idle", "unit", 0],
                ["Failed", "tuple", 2],
                ["Done", "named", 1],
                ["Code", "unit", 0],
            ]);
            expect(status?.variants[0]?.docs).toBe("Waiting");
            expect(serdeOptions(status?.variants[2]?.attributes ?? []).rename).toBe("done");
            expect(serdeOptions(status?.attributes ?? [])).toMatchObject({ tag: "type", content: "data" });
        });

        it("parses type aliases", () => {
            const [alias] = only(parseFile("pub type Page<T> = Vec<T>;").items, "alias");
            expect(alias?.generics).toEqual(["T"]);
            expect(alias ? typeText(alias.target) : null).toBe("Vec<T>");
        });
    });

    // ── use trees ───────────────────────────────────────────────────

    it("collects use bindings, renames and groups; ignores globs", () => {
        const { aliases } = parseFile(`
use tauri::{AppHandle, Window as Win, ipc::{self, Response}};
use crate::models::User;
use super::*;
use std::io::Write as _;
`);
        expect(aliases).toEqual([
            { alias: "AppHandle", path: ["tauri", "AppHandle"] },
            { alias: "Win", path: ["tauri", "Window"] },
            { alias: "ipc", path: ["tauri", "ipc"] },
            { alias: "Response", path: ["tauri", "ipc", "Response"] },
            { alias: "User", path: ["crate", "models", "User"] },
        ]);
    });

    // ── Errors ──────────────────────────────────────────────────────

    it("reports malformed declarations with a location", () => {
        let caught: unknown;
        try {
            parseFile("struct A {\n    id u8,\n}");
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(ParseError);
        expect(caught).toMatchObject({ line: 2, column: 8, message: "expected ':', found 'u8'" });
    });

    it("reports stray tokens at item level", () => {
        expect(() => parseFile("fn ok() {}\n42")).toThrow("unexpected '42' at item level");
    });

    it("returns an empty result for an empty file", () => {
        expect(parseFile("// nothing here\n")).toEqual({ items: [], aliases: [] });
    });
});
