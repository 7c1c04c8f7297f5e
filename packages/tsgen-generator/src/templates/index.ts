import type { Renderer } from "@tauria/tsgen-core";
import { renderBarrel, renderRootIndex } from "./barrels";
import { renderCommandInterface, renderCommandWrapper, renderMockApi } from "./commands";
import type { TemplateContexts } from "./contexts";
import { renderEventHandlers } from "./event-handlers";
import { renderTypesIndex } from "./types-index";

export type TemplateTable = { [K in keyof TemplateContexts]: (context: TemplateContexts[K]) => string };

export const templates: TemplateTable = {
    "command-wrapper": renderCommandWrapper,
    "command-interface": renderCommandInterface,
    "mock-api": renderMockApi,
    "types-index": renderTypesIndex,
    "event-handlers": renderEventHandlers,
    barrel: renderBarrel,
    "root-index": renderRootIndex,
};

/** Template-table renderer; `overrides` replace individual templates. */
export function createRenderer(overrides: Partial<TemplateTable> = {}): Renderer<TemplateContexts> {
    const table: TemplateTable = { ...templates, ...overrides };
    return {
        render(template, context) {
            return table[template](context);
        },
    };
}
