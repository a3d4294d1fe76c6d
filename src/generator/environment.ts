/**
 * Everything a walk needs besides the tree and the variable scope.
 */

import type { Command, SamplingMethod, WildcardCommand } from "../commands/index.js";
import type { Logger } from "../logging/index.js";
import type { PromptParser } from "../parser/index.js";
import type { WildcardResolver } from "../wildcards/resolver.js";
import { UnresolvedWildcardError } from "./errors.js";
import type { RandomSource } from "./random.js";
import { deferred, type Binding, type VariableScope } from "./scope.js";
import type { CyclicalState } from "./state.js";

/**
 * What an empty wildcard contributes. "auto" raises under random sampling
 * and contributes nothing otherwise.
 */
export type EmptyWildcardPolicy = "auto" | "error" | "empty";

export interface GenerationEnvironment {
  readonly resolver: WildcardResolver;
  readonly parser: PromptParser;
  readonly random: RandomSource;
  readonly cyclical: CyclicalState;
  readonly emptyWildcards: EmptyWildcardPolicy;
  readonly logger: Logger;
  /**
   * Parsed wildcard values by source text. Node identity carries the
   * cyclical rotation, so a value keeps its rotation for as long as this
   * table lives.
   */
  readonly candidates: Map<string, Command>;
}

function parseCandidate(env: GenerationEnvironment, value: string): Command {
  let tree = env.candidates.get(value);
  if (tree === undefined) {
    tree = env.parser.parse(value);
    env.candidates.set(value, tree);
  }
  return tree;
}

/**
 * Parsed candidates of a wildcard. Applies the empty-wildcard policy.
 *
 * @throws UnresolvedWildcardError when there are none and the policy says so
 */
export function wildcardCandidates(
  env: GenerationEnvironment,
  name: string,
  method: SamplingMethod
): readonly Command[] {
  const values = env.resolver.resolve(name);
  if (values.length === 0) {
    if (env.emptyWildcards === "error" || (env.emptyWildcards === "auto" && method === "random")) {
      throw new UnresolvedWildcardError(name, method);
    }
    env.logger.debug("Wildcard resolved to no values", { wildcard: name, method });
    return [];
  }
  return values.map((value) => parseCandidate(env, value));
}

/**
 * Child scope holding a wildcard's inline variables. Each may refer to the
 * caller's binding of the same name.
 */
export function wildcardScope(node: WildcardCommand, scope: VariableScope): VariableScope {
  const bindings: Record<string, Binding> = {};
  for (const [name, value] of Object.entries(node.variables)) {
    bindings[name] = deferred(value, scope.lookup(name));
  }
  return scope.child(bindings);
}
