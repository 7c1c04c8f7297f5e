import { mkdir, mkdtemp, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join, resolve, sep } from "node:path";
import type { GeneratedFile, WriteSummary, Writer } from "@tauria/tsgen-core";

async function readIfExists(path: string): Promise<string | null> {
    try {
        return await readFile(path, "utf-8");
    } catch (err) {
        if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
        throw err;
    }
}

/** A file moved into the output directory, with what it replaced. */
interface Move {
    destination: string;
    backup: string | null;
    createdDir: string | undefined;
}

/**
 * Writes a run's files into a staging directory beside the output
 * directory, then moves the files whose content changed into place.
 * Every destination is checked before the first move, and a move that
 * fails puts back the files already replaced. Files from earlier runs
 * that are no longer generated stay.
 */
export class StagedWriter implements Writer {
    private readonly outputDir: string;

    constructor(outputDir: string) {
        this.outputDir = resolve(outputDir);
    }

    async write(files: GeneratedFile[]): Promise<WriteSummary> {
        const parent = dirname(this.outputDir);
        await mkdir(parent, { recursive: true });
        const staging = await mkdtemp(join(parent, `.${basename(this.outputDir)}-staging-`));
        const stage = join(staging, "files");
        const backups = join(staging, "backup");

        try {
            // Phase 1: Stage every file
            for (const file of files) {
                const staged = this.target(stage, file.path);
                await mkdir(dirname(staged), { recursive: true });
                await writeFile(staged, file.content);
            }

            // Phase 2: Compare against the output directory
            const summary: WriteSummary = { written: [], unchanged: [] };
            const changed: { path: string; existed: boolean }[] = [];
            for (const file of files) {
                const current = await readIfExists(this.target(this.outputDir, file.path));
                if (current === file.content) summary.unchanged.push(file.path);
                else changed.push({ path: file.path, existed: current !== null });
            }

            // Phase 3: Move changed files in, keeping what they replace
            const moves: Move[] = [];
            try {
                for (const { path, existed } of changed) {
                    const destination = this.target(this.outputDir, path);
                    const move: Move = { destination, backup: null, createdDir: undefined };
                    if (existed) {
                        const backup = this.target(backups, path);
                        await mkdir(dirname(backup), { recursive: true });
                        await rename(destination, backup);
                        move.backup = backup;
                    }
                    moves.push(move);
                    move.createdDir = await mkdir(dirname(destination), { recursive: true });
                    await rename(this.target(stage, path), destination);
                    summary.written.push(path);
                }
            } catch (err) {
                await restore(moves);
                throw err;
            }
            return summary;
        } finally {
            await rm(staging, { recursive: true, force: true });
        }
    }

    /** Absolute path of `path` under `root`; rejects paths that leave it. */
    private target(root: string, path: string): string {
        const absolute = resolve(root, path);
        if (!absolute.startsWith(root + sep)) {
            throw new Error(`Refusing to write outside the output directory: ${path}`);
        }
        return absolute;
    }
}

/** Undo moves newest first: drop the new file, put the old one back, remove directories made for it. */
async function restore(moves: Move[]): Promise<void> {
    for (const move of [...moves].reverse()) {
        await rm(move.destination, { force: true });
        if (move.backup) await rename(move.backup, move.destination);
        if (move.createdDir) await rm(move.createdDir, { recursive: true, force: true });
    }
}
