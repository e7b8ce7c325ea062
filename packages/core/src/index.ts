/**
 * @bytepair/core -- shared types, errors, ports and config for the tokenizer.
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./interfaces.js";
export { Registry } from "./registry.js";
export { resolveTokenizerConfig } from "./config.js";
