/**
 * PromptGenerator: generation settings bundled behind one object.
 *
 * USAGE:
 *
 *   const generator = new PromptGenerator({
 *     resolver: new WildcardFileResolver("wildcards/"),
 *     method: "combinatorial",
 *   });
 *
 *   generator.generate("a {red|blue} __animals__", 10);
 *
 * A generator keeps its cyclical state between calls, so a cyclical
 * generator continues its rotation where the previous call stopped. It
 * also keeps every template and wildcard value it has parsed. Call
 * resetCycles() to start over and drop those, or clearCache() to also
 * empty the resolver's cache.
 */

import type { Command, SamplingMethod } from "../commands/index.js";
import type { GrammarConfig } from "../config/grammar/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { getCachedParser } from "../parser/index.js";
import { StaticWildcardResolver } from "../wildcards/static-resolver.js";
import type { WildcardResolver } from "../wildcards/resolver.js";
import { generate } from "./engine.js";
import type { EmptyWildcardPolicy } from "./environment.js";
import { createSeededRandom, type RandomSource } from "./random.js";
import { CyclicalState } from "./state.js";

export interface PromptGeneratorOptions {
  /** Defaults to a resolver with no wildcards. */
  resolver?: WildcardResolver;
  /** Defaults to "random". */
  method?: SamplingMethod;
  config?: Partial<GrammarConfig>;
  /** Seed for a Mulberry32 source; ignored when `random` is given. */
  seed?: number;
  random?: RandomSource;
  emptyWildcards?: EmptyWildcardPolicy;
  logger?: Logger;
}

export class PromptGenerator {
  readonly method: SamplingMethod;
  private readonly resolver: WildcardResolver;
  private readonly config: Partial<GrammarConfig> | undefined;
  private readonly random: RandomSource;
  private readonly emptyWildcards: EmptyWildcardPolicy;
  private readonly logger: Logger;
  private readonly cyclicalState = new CyclicalState();
  private readonly trees = new Map<string, Command>();
  private readonly candidates = new Map<string, Command>();

  /**
   * @throws ConfigurationError if the grammar configuration is invalid
   */
  constructor(options: PromptGeneratorOptions = {}) {
    this.method = options.method ?? "random";
    this.resolver = options.resolver ?? new StaticWildcardResolver();
    this.config = options.config;
    this.random =
      options.random ??
      (options.seed !== undefined ? createSeededRandom(options.seed) : Math.random);
    this.emptyWildcards = options.emptyWildcards ?? "auto";
    this.logger = options.logger ?? silentLogger;

    getCachedParser(this.config, this.logger);
  }

  /**
   * Parse a template. Trees are kept, so the same template keeps its
   * cyclical rotation from one call to the next.
   */
  parse(template: string): Command {
    let tree = this.trees.get(template);
    if (tree === undefined) {
      tree = getCachedParser(this.config, this.logger).parse(template);
      this.trees.set(template, tree);
    }
    return tree;
  }

  generate(template: string | Command, count = 1, method: SamplingMethod = this.method): string[] {
    const tree = typeof template === "string" ? this.parse(template) : template;
    return generate(tree, method, this.resolver, count, {
      config: this.config,
      random: this.random,
      cyclicalState: this.cyclicalState,
      candidates: this.candidates,
      emptyWildcards: this.emptyWildcards,
      logger: this.logger,
    });
  }

  resetCycles(): void {
    this.cyclicalState.reset();
    this.trees.clear();
    this.candidates.clear();
  }

  clearCache(): void {
    this.resetCycles();
    this.resolver.clearCache?.();
  }
}
