/**
 * Codegen module - output buffers for the C translation.
 */

export { Emitter } from "./emitter";
export type { Region } from "./emitter";
export { CodeBuilder } from "./code-builder";
