import type { EventHandlerGroup, ModuleFileNode, TypeDeclaration } from "@tauria/tsgen-core";

export interface CommandModuleContext {
    module: ModuleFileNode;
    /** Declaration id → exported type name. */
    typeNames: ReadonlyMap<string, string>;
    /** Import specifier of the module's command interface, relative to the rendered file. */
    interfaceImport: string;
    /** Import specifier of the types index, relative to the rendered file. */
    typesImport: string;
}

export interface TypesIndexContext {
    types: TypeDeclaration[];
    typeNames: ReadonlyMap<string, string>;
}

export interface EventHandlersContext {
    group: EventHandlerGroup;
    typeNames: ReadonlyMap<string, string>;
    typesImport: string;
}

export interface BarrelEntry {
    /** Relative specifier without extension, e.g. `./User` or `./commands`. */
    from: string;
    /** Re-export as a namespace of this name; null re-exports every member. */
    namespace: string | null;
}

export interface BarrelContext {
    entries: BarrelEntry[];
}

export interface RootIndexContext {
    mockApi: boolean;
}

export interface TemplateContexts {
    "command-wrapper": CommandModuleContext;
    "command-interface": CommandModuleContext;
    "mock-api": CommandModuleContext;
    "types-index": TypesIndexContext;
    "event-handlers": EventHandlersContext;
    barrel: BarrelContext;
    "root-index": RootIndexContext;
}
