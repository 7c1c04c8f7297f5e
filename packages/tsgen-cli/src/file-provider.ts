import { readFile, stat } from "node:fs/promises";
import { resolve } from "node:path";
import { AnalysisFatalError, type FileProvider } from "@tauria/tsgen-core";
import { glob } from "tinyglobby";

/** Cargo build output and installed npm packages. */
const IGNORED = ["**/target/**", "**/node_modules/**"];

/** FileProvider over a directory on disk. Lists `.rs` files relative to `root`. */
export function createNodeFileProvider(root: string): FileProvider {
    return {
        async list() {
            const info = await stat(root).catch((err: unknown) => {
                throw new AnalysisFatalError("missing-root", `source root not found: ${root}`, { cause: err });
            });
            if (!info.isDirectory()) {
                throw new AnalysisFatalError("missing-root", `source root is not a directory: ${root}`);
            }
            const paths = await glob(["**/*.rs"], { cwd: root, ignore: IGNORED, onlyFiles: true });
            return paths.sort();
        },
        read(path) {
            return readFile(resolve(root, path), "utf-8");
        },
    };
}
