/**
 * Template parsing.
 */

export { PromptParser } from "./parser.js";
export { getCachedParser, parse } from "./cache.js";
export { PromptSyntaxError, locate } from "./errors.js";
