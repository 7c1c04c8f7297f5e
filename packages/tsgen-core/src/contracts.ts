/**
 * Collaborator contracts. The analysis core reaches the outside world only
 * through these interfaces.
 */

/** Enumerates and reads source files below a scan root. Paths are root-relative and `/`-separated. */
export interface FileProvider {
    list(): Promise<string[]>;
    read(path: string): Promise<string>;
}

export interface GeneratedFile {
    path: string; // relative to the output directory
    content: string;
}

/** Turns a named template plus its context into file text. */
export interface Renderer<TContexts> {
    render<K extends keyof TContexts & string>(template: K, context: TContexts[K]): string;
}

export interface WriteSummary {
    written: string[];
    unchanged: string[];
}

/** Persists one run's output. Either every file lands or none does. */
export interface Writer {
    write(files: GeneratedFile[]): Promise<WriteSummary>;
}
