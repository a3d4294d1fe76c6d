/**
 * Grammar configuration module.
 *
 * Usage:
 *   import { loadGrammarConfig, DEFAULT_GRAMMAR_CONFIG } from "./config/grammar/index.js";
 *
 *   // Angle-bracket variants, everything else default
 *   const config = loadGrammarConfig({ variantStart: "<", variantEnd: ">" });
 */

export type { GrammarConfig } from "./schema.js";
export { GrammarConfigSchema } from "./schema.js";

export {
  loadGrammarConfig,
  validateGrammarConfig,
  grammarConfigKey,
  ConfigurationError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_GRAMMAR_CONFIG } from "./defaults.js";
