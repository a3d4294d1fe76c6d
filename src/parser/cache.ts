/**
 * Parser cache.
 *
 * Building a parser validates its configuration, so parsers are shared.
 * A configuration object seen before is found by identity; an equal
 * configuration built elsewhere is found by value. Parsers are held
 * weakly in the value table so unused ones can be collected.
 */

import { DEFAULT_GRAMMAR_CONFIG, grammarConfigKey, loadGrammarConfig } from "../config/grammar/index.js";
import type { GrammarConfig } from "../config/grammar/index.js";
import type { Command } from "../commands/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { PromptParser } from "./parser.js";

const byIdentity = new WeakMap<object, PromptParser>();
const byValue = new Map<string, WeakRef<PromptParser>>();
const cleanup = new FinalizationRegistry<string>((key) => {
  const ref = byValue.get(key);
  if (ref !== undefined && ref.deref() === undefined) {
    byValue.delete(key);
  }
});

/**
 * Get the parser for a grammar configuration, building it on first use.
 *
 * @throws ConfigurationError if the configuration is invalid
 */
export function getCachedParser(
  config: Partial<GrammarConfig> = DEFAULT_GRAMMAR_CONFIG,
  logger: Logger = silentLogger
): PromptParser {
  const known = byIdentity.get(config);
  if (known !== undefined) {
    return known;
  }

  const key = grammarConfigKey(loadGrammarConfig(config));
  let parser = byValue.get(key)?.deref();
  if (parser === undefined) {
    parser = new PromptParser(config);
    byValue.set(key, new WeakRef(parser));
    cleanup.register(parser, key);
    logger.debug("Built parser", { grammar: key });
  }
  byIdentity.set(config, parser);
  return parser;
}

/**
 * Parse a template with the cached parser for `config`.
 *
 * @throws PromptSyntaxError if the template does not match the grammar
 */
export function parse(source: string, config?: Partial<GrammarConfig>): Command {
  return getCachedParser(config).parse(source);
}
