import type { Diagnostic, DiagnosticCode, DiagnosticSeverity, SourceLocation } from "../types";

export type FatalReason = "missing-root" | "invariant";

/** Aborts a run before anything is written. */
export class AnalysisFatalError extends Error {
    readonly reason: FatalReason;

    constructor(reason: FatalReason, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "AnalysisFatalError";
        this.reason = reason;
    }
}

/** Append-only diagnostic list. Order of insertion is the reported order. */
export class DiagnosticBag {
    private readonly entries: Diagnostic[] = [];

    warn(code: DiagnosticCode, message: string, location?: Partial<SourceLocation>): void {
        this.push("warning", code, message, location);
    }

    error(code: DiagnosticCode, message: string, location?: Partial<SourceLocation>): void {
        this.push("error", code, message, location);
    }

    merge(other: DiagnosticBag): void {
        this.entries.push(...other.entries);
    }

    list(): Diagnostic[] {
        return [...this.entries];
    }

    private push(
        severity: DiagnosticSeverity,
        code: DiagnosticCode,
        message: string,
        location?: Partial<SourceLocation>,
    ): void {
        const diagnostic: Diagnostic = { code, severity, message };
        if (location?.file !== undefined) diagnostic.file = location.file;
        if (location?.line !== undefined) diagnostic.line = location.line;
        if (location?.column !== undefined) diagnostic.column = location.column;
        this.entries.push(diagnostic);
    }
}

/** `file:line:column code message`, the form used by terminal output. */
export function formatDiagnostic(diagnostic: Diagnostic): string {
    let where = "";
    if (diagnostic.file) {
        where = diagnostic.file;
        if (diagnostic.line !== undefined) where += `:${diagnostic.line}`;
        if (diagnostic.column !== undefined) where += `:${diagnostic.column}`;
        where += " ";
    }
    return `${where}${diagnostic.code} ${diagnostic.message}`;
}
