import { describe, expect, it } from "vitest";
import { AnalysisFatalError, DiagnosticBag, formatDiagnostic } from "./diagnostics";

describe("DiagnosticBag", () => {
    it("keeps insertion order and only the location fields given", () => {
        const bag = new DiagnosticBag();
        bag.warn("name-collision", "User declared twice");
        bag.error("syntax-error", "unexpected token", { file: "lib.rs", line: 4, column: 9 });

        expect(bag.list()).toEqual([
            { code: "name-collision", severity: "warning", message: "User declared twice" },
            {
                code: "syntax-error",
                severity: "error",
                message: "unexpected token",
                file: "lib.rs",
                line: 4,
                column: 9,
            },
        ]);
    });

    it("merge() appends another bag after the current entries", () => {
        const first = new DiagnosticBag();
        const second = new DiagnosticBag();
        first.warn("unresolved-type", "A");
        second.warn("unresolved-type", "B");
        first.merge(second);
        expect(first.list().map((d) => d.message)).toEqual(["A", "B"]);
    });
});

describe("formatDiagnostic()", () => {
    it("prefixes file, line and column when present", () => {
        expect(
            formatDiagnostic({ code: "syntax-error", severity: "error", message: "oops", file: "a.rs", line: 2, column: 5 }),
        ).toBe("a.rs:2:5 syntax-error oops");
    });

    it("prints only code and message without a file", () => {
        expect(formatDiagnostic({ code: "name-collision", severity: "warning", message: "User" })).toBe(
            "name-collision User",
        );
    });
});

describe("AnalysisFatalError", () => {
    it("carries its reason and cause", () => {
        const cause = new Error("ENOENT");
        const err = new AnalysisFatalError("missing-root", "input root not found", { cause });
        expect(err).toBeInstanceOf(Error);
        expect(err.reason).toBe("missing-root");
        expect(err.cause).toBe(cause);
        expect(err.name).toBe("AnalysisFatalError");
    });
});
