/**
 * Prompt generation.
 */

import { SamplingMethod, type Command } from "../commands/index.js";
import type { GrammarConfig } from "../config/grammar/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { getCachedParser } from "../parser/index.js";
import type { WildcardResolver } from "../wildcards/resolver.js";
import { enumerateDistinct } from "./enumerate.js";
import type { EmptyWildcardPolicy, GenerationEnvironment } from "./environment.js";
import { GenerationError } from "./errors.js";
import type { RandomSource } from "./random.js";
import { VariableScope } from "./scope.js";
import { CyclicalState } from "./state.js";
import { renderOnce } from "./walk.js";

export interface GenerateOptions {
  /** Grammar for string templates and wildcard values. */
  config?: Partial<GrammarConfig>;
  /** Defaults to Math.random. */
  random?: RandomSource;
  /**
   * Cyclical counters. A fresh table is used per call unless one is
   * passed, so repeated calls restart every rotation. Counters follow node
   * identity: pass the same parsed tree to continue a rotation.
   */
  cyclicalState?: CyclicalState;
  /**
   * Parsed wildcard values, parsed with this call's grammar. A fresh table
   * is used per call unless one is passed; pass it along with
   * `cyclicalState` for wildcard values to continue their rotations too.
   */
  candidates?: Map<string, Command>;
  /** Defaults to "auto". */
  emptyWildcards?: EmptyWildcardPolicy;
  logger?: Logger;
}

/**
 * Generate prompts from a template or a parsed tree.
 *
 * Random and cyclical sampling always return `count` prompts, each from a
 * fresh variable scope. Combinatorial sampling returns the first `count`
 * distinct prompts of the enumeration, fewer when it is exhausted.
 *
 * @throws GenerationError for a negative or fractional count
 * @throws PromptSyntaxError if `input` is a string that does not parse
 */
export function generate(
  input: string | Command,
  method: SamplingMethod,
  resolver: WildcardResolver,
  count: number,
  options: GenerateOptions = {}
): string[] {
  if (!Number.isInteger(count) || count < 0) {
    throw new GenerationError(`Prompt count must be a non-negative integer, got: ${count}`);
  }
  const checked = SamplingMethod.safeParse(method);
  if (!checked.success) {
    throw new GenerationError(
      `Unknown sampling method: ${String(method)}. Must be ${SamplingMethod.options.join(", ")}.`
    );
  }

  const logger = options.logger ?? silentLogger;
  const parser = getCachedParser(options.config, logger);
  const tree = typeof input === "string" ? parser.parse(input) : input;

  if (count === 0) {
    return [];
  }

  const env: GenerationEnvironment = {
    resolver,
    parser,
    random: options.random ?? Math.random,
    cyclical: options.cyclicalState ?? new CyclicalState(),
    emptyWildcards: options.emptyWildcards ?? "auto",
    logger,
    candidates: options.candidates ?? new Map(),
  };

  const prompts: string[] = [];
  if (checked.data === "combinatorial") {
    prompts.push(...enumerateDistinct(tree, VariableScope.root(), env, count));
  } else {
    for (let i = 0; i < count; i++) {
      prompts.push(renderOnce(tree, checked.data, VariableScope.root(), env));
    }
  }

  logger.debug("Generated prompts", {
    method: checked.data,
    requested: count,
    generated: prompts.length,
  });
  return prompts;
}
