/**
 * variant-prompts: a templating language for generative text prompts.
 *
 *   import { generate, StaticWildcardResolver } from "variant-prompts";
 *
 *   const resolver = new StaticWildcardResolver({ animals: ["cat", "dog"] });
 *   generate("a {red|blue} __animals__", "combinatorial", resolver, 10);
 *   // ["a red cat", "a red dog", "a blue cat", "a blue dog"]
 */

export * from "./commands/index.js";
export * from "./parser/index.js";
export * from "./generator/index.js";
export * from "./wildcards/index.js";
export {
  loadGrammarConfig,
  validateGrammarConfig,
  grammarConfigKey,
  GrammarConfigSchema,
  ConfigurationError,
  DEFAULT_GRAMMAR_CONFIG,
  type GrammarConfig,
  type ConfigValidationIssue,
} from "./config/grammar/index.js";
export {
  createLogger,
  silentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logging/index.js";
