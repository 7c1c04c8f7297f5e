import { delay } from "es-toolkit";
import type { FileProvider } from "./contracts";

export interface MemoryFileProviderOptions {
    /** Milliseconds to wait before each read resolves, per path. */
    delays?: Record<string, number>;
}

/** {@link FileProvider} over an in-memory path → source map. */
export function createMemoryFileProvider(
    files: Record<string, string>,
    options: MemoryFileProviderOptions = {},
): FileProvider {
    return {
        async list() {
            return Object.keys(files);
        },
        async read(path) {
            const wait = options.delays?.[path];
            if (wait) await delay(wait);
            const content = files[path];
            if (content === undefined) throw new Error(`no such file: ${path}`);
            return content;
        },
    };
}
