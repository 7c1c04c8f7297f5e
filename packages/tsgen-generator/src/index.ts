export { type GenerateInput, generate, importPath } from "./generator";
export { type PrintOptions, printType } from "./printer";
export { type TemplateTable, createRenderer, templates } from "./templates";
export type * from "./templates/contexts";
