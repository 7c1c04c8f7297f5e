/**
 * Module Tree Assembler: one module node per source file that declares
 * commands or types, nested under directory nodes mirroring the scan root.
 */

import { AnalysisFatalError, type DiagnosticBag } from "../diagnostics/diagnostics";
import { uniqueName, wrapperName } from "../naming";
import type {
    CommandFunction,
    ModuleDirectoryNode,
    ModuleFileNode,
    SourceFileSummary,
    TypeDeclaration,
} from "../types";

export function assembleTree(
    files: SourceFileSummary[],
    commands: CommandFunction[],
    types: TypeDeclaration[],
    diagnostics: DiagnosticBag,
): ModuleDirectoryNode {
    const root: ModuleDirectoryNode = { kind: "directory", name: "", path: [], children: [] };
    const wrappersByDirectory = new Map<string, Set<string>>();

    for (const file of files) {
        const ownCommands = commands.filter((c) => c.module === file.path);
        const ownTypes = types.filter((t) => t.module === file.path);
        if (ownCommands.length === 0 && ownTypes.length === 0) continue;

        const directoryKey = file.modulePath.join("/");
        const taken = wrappersByDirectory.get(directoryKey) ?? new Set<string>();
        wrappersByDirectory.set(directoryKey, taken);

        const base = wrapperName(file.baseName);
        const wrapper = uniqueName(base, taken);
        if (wrapper !== base) {
            diagnostics.warn(
                "name-collision",
                `${file.path} maps to wrapper '${base}', already taken in its directory; using '${wrapper}'`,
                { file: file.path },
            );
        }

        directoryAt(root, file.modulePath).children.push({
            kind: "module",
            name: file.baseName,
            path: [...file.modulePath, file.baseName],
            file: file.path,
            wrapperName: wrapper,
            commands: ownCommands,
            types: ownTypes,
        });
    }

    verifyOwnership(root, commands, types);
    return root;
}

function directoryAt(root: ModuleDirectoryNode, segments: string[]): ModuleDirectoryNode {
    let current = root;
    for (const segment of segments) {
        let next = current.children.find(
            (child): child is ModuleDirectoryNode => child.kind === "directory" && child.name === segment,
        );
        if (!next) {
            next = { kind: "directory", name: segment, path: [...current.path, segment], children: [] };
            current.children.push(next);
        }
        current = next;
    }
    return current;
}

/** Module nodes in tree order, depth first. */
export function moduleNodes(directory: ModuleDirectoryNode): ModuleFileNode[] {
    return directory.children.flatMap((child) => (child.kind === "module" ? [child] : moduleNodes(child)));
}

// ── Ownership ───────────────────────────────────────────────────────

function verifyOwnership(root: ModuleDirectoryNode, commands: CommandFunction[], types: TypeDeclaration[]): void {
    const owners = new Map<string, number>();
    const keys = (owned: { commands: CommandFunction[]; types: TypeDeclaration[] }): string[] => [
        ...owned.commands.map((c) => `command ${c.id}`),
        ...owned.types.map((t) => `type ${t.id}`),
    ];
    for (const node of moduleNodes(root)) {
        for (const key of keys(node)) owners.set(key, (owners.get(key) ?? 0) + 1);
    }
    for (const key of keys({ commands, types })) {
        const count = owners.get(key) ?? 0;
        if (count !== 1) {
            throw new AnalysisFatalError("invariant", `${key} is owned by ${count} modules, expected 1`);
        }
    }
}
