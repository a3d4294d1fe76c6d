/**
 * Single-walk rendering for random and cyclical sampling.
 *
 * Every node is visited once, depth first and left to right, and renders
 * to exactly one string. A node marked combinatorial inside a single walk
 * steps through its enumeration one choice per visit, the way a cyclical
 * node does.
 */

import {
  assertNever,
  type Command,
  type ConditionCommand,
  type ProbabilityCommand,
  type SamplingMethod,
  type VariableAccessCommand,
  type VariableAssignmentCommand,
  type VariantCommand,
  type WildcardCommand,
} from "../commands/index.js";
import { eligibleOptions, probabilityChoices, variantChoices } from "./choices.js";
import { wildcardCandidates, wildcardScope, type GenerationEnvironment } from "./environment.js";
import { UnknownVariableError } from "./errors.js";
import { randomInt, weightedIndex } from "./random.js";
import { evaluated, deferred, type VariableScope } from "./scope.js";

/**
 * Random or cyclical; a combinatorial override steps like cyclical.
 */
type WalkMethod = Exclude<SamplingMethod, "combinatorial">;

export function walkMethod(method: SamplingMethod): WalkMethod {
  return method === "combinatorial" ? "cyclical" : method;
}

/**
 * Put `inner` at the substitution point of `wrapper`: the first "...",
 * else the first "…", else the end.
 */
export function applyWrap(wrapper: string, inner: string): string {
  for (const marker of ["...", "…"]) {
    const index = wrapper.indexOf(marker);
    if (index !== -1) {
      return wrapper.slice(0, index) + inner + wrapper.slice(index + marker.length);
    }
  }
  return wrapper + inner;
}

/**
 * Render `node` once.
 *
 * @param ambient text rendered before this node in the same output; what
 *   conditions without a variable name test against
 */
export function renderOnce(
  node: Command,
  method: SamplingMethod,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient = ""
): string {
  switch (node.type) {
    case "literal":
      return node.text;
    case "comment":
      return "";
    case "sequence": {
      let text = "";
      for (const child of node.children) {
        text += renderOnce(child, method, scope, env, ambient + text);
      }
      return text;
    }
    case "variant":
      return renderVariant(node, walkMethod(node.samplingMethod ?? method), scope, env, ambient);
    case "wildcard":
      return renderWildcard(node, method, scope, env, ambient);
    case "wrap": {
      const inner = renderOnce(node.inner, method, scope, env, ambient);
      const wrapper = renderOnce(node.wrapper, method, scope, env, ambient);
      return applyWrap(wrapper, inner);
    }
    case "probability":
      return renderProbability(node, walkMethod(node.samplingMethod ?? method), scope, env, ambient);
    case "condition":
      return renderCondition(node, method, scope, env, ambient);
    case "variable-access":
      return renderAccess(node, method, scope, env, ambient);
    case "variable-assignment":
      assign(node, method, scope, env, ambient);
      return "";
    default:
      return assertNever(node);
  }
}

function renderVariant(
  node: VariantCommand,
  method: WalkMethod,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): string {
  const render = (index: number): string =>
    renderOnce(node.options[index].value, method, scope, env, ambient);

  if (method === "random") {
    if (eligibleOptions(node).length === 0) return "";
    const weights = node.options.map((option) => option.weight);
    const count = randomInt(env.random, node.minBound, node.maxBound);
    const picks: string[] = [];
    for (let i = 0; i < count; i++) {
      picks.push(render(weightedIndex(env.random, weights)));
    }
    return picks.join(node.separator);
  }

  const choices = variantChoices(node);
  if (choices.length === 0) return "";
  const choice = choices[env.cyclical.next(node, choices.length)];
  return choice.map(render).join(node.separator);
}

function renderWildcard(
  node: WildcardCommand,
  method: SamplingMethod,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): string {
  const own = walkMethod(node.samplingMethod ?? method);
  const name =
    typeof node.name === "string" ? node.name : renderOnce(node.name, method, scope, env, ambient);

  const candidates = wildcardCandidates(env, name, node.samplingMethod ?? method);
  if (candidates.length === 0) return "";

  const index =
    own === "random"
      ? Math.floor(env.random() * candidates.length)
      : env.cyclical.next(node, candidates.length);
  return renderOnce(candidates[index], own, wildcardScope(node, scope), env, ambient);
}

function renderProbability(
  node: ProbabilityCommand,
  method: WalkMethod,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): string {
  let include: boolean;
  if (method === "random") {
    include = env.random() < node.chance;
  } else {
    const choices = probabilityChoices(node.chance);
    include = choices[env.cyclical.next(node, choices.length)];
  }
  return include ? renderOnce(node.value, method, scope, env, ambient) : "";
}

/**
 * Text a condition branch tests: the named variable (unbound reads as
 * empty) or the ambient text.
 */
function conditionTarget(
  contextKey: string | undefined,
  method: SamplingMethod,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): string {
  if (contextKey === undefined) return ambient;
  const binding = scope.lookup(contextKey);
  if (binding === undefined) return "";
  if (binding.kind === "evaluated") return binding.text;
  return renderOnce(binding.command, method, scope.resolving(contextKey, binding), env, ambient);
}

function renderCondition(
  node: ConditionCommand,
  method: SamplingMethod,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): string {
  for (const branch of node.conditions) {
    if (branch.matcher.test(conditionTarget(branch.contextKey, method, scope, env, ambient))) {
      return renderOnce(branch.ifValue, method, scope, env, ambient);
    }
  }
  return renderOnce(node.elseValue, method, scope, env, ambient);
}

function renderAccess(
  node: VariableAccessCommand,
  method: SamplingMethod,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): string {
  const binding = scope.lookup(node.name);
  if (binding?.kind === "evaluated") return binding.text;
  if (binding?.kind === "deferred") {
    return renderOnce(binding.command, method, scope.resolving(node.name, binding), env, ambient);
  }
  if (node.defaultValue !== undefined) {
    return renderOnce(node.defaultValue, method, scope, env, ambient);
  }
  throw new UnknownVariableError(node.name);
}

function assign(
  node: VariableAssignmentCommand,
  method: SamplingMethod,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): void {
  if (!node.overwrite && scope.has(node.name)) return;
  scope.bind(
    node.name,
    node.immediate
      ? evaluated(renderOnce(node.value, method, scope, env, ambient))
      : deferred(node.value, scope.lookup(node.name))
  );
}
