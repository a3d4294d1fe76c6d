/**
 * Combinatorial enumeration.
 *
 * Each node yields its renderings lazily, in declaration order, as
 * branches: the rendered text together with the variable scope that
 * results from it. Scopes are never mutated here; an assignment yields a
 * new scope, so sibling branches cannot see each other's bindings.
 *
 * A node marked random or cyclical yields a single branch, rendered by a
 * single walk over a copy of the scope.
 */

import { assertNever, type Command, type ConditionCommand, type SamplingMethod } from "../commands/index.js";
import { probabilityChoices, variantChoices } from "./choices.js";
import { wildcardCandidates, wildcardScope, type GenerationEnvironment } from "./environment.js";
import { UnknownVariableError } from "./errors.js";
import { evaluated, deferred, type VariableScope } from "./scope.js";
import { applyWrap, renderOnce } from "./walk.js";

export interface Branch {
  readonly text: string;
  readonly scope: VariableScope;
}

function* single(
  node: Command,
  method: SamplingMethod,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): Generator<Branch> {
  const branchScope = scope.clone();
  const text = renderOnce(node, method, branchScope, env, ambient);
  yield { text, scope: branchScope };
}

export function* enumerate(
  node: Command,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient = ""
): Generator<Branch> {
  switch (node.type) {
    case "literal":
      yield { text: node.text, scope };
      return;
    case "comment":
      yield { text: "", scope };
      return;
    case "sequence":
      yield* enumerateSequence(node.children, scope, env, ambient);
      return;
    case "variant": {
      if (node.samplingMethod !== undefined && node.samplingMethod !== "combinatorial") {
        yield* single(node, node.samplingMethod, scope, env, ambient);
        return;
      }
      const choices = variantChoices(node);
      if (choices.length === 0) {
        yield { text: "", scope };
        return;
      }
      const { options } = node;
      for (const choice of choices) {
        const values = choice.map((index) => options[index].value);
        yield* enumerateJoined(values, node.separator, [], scope, env, ambient);
      }
      return;
    }
    case "wildcard": {
      if (node.samplingMethod !== undefined && node.samplingMethod !== "combinatorial") {
        yield* single(node, node.samplingMethod, scope, env, ambient);
        return;
      }
      const names =
        typeof node.name === "string"
          ? [{ text: node.name, scope }]
          : enumerate(node.name, scope, env, ambient);
      const seen = new Set<string>();
      for (const name of names) {
        if (seen.has(name.text)) continue;
        seen.add(name.text);

        const candidates = wildcardCandidates(env, name.text, "combinatorial");
        if (candidates.length === 0) {
          yield { text: "", scope: name.scope };
          continue;
        }
        for (const candidate of candidates) {
          for (const branch of enumerate(candidate, wildcardScope(node, name.scope), env, ambient)) {
            yield { text: branch.text, scope: name.scope };
          }
        }
      }
      return;
    }
    case "wrap":
      for (const inner of enumerate(node.inner, scope, env, ambient)) {
        for (const wrapper of enumerate(node.wrapper, inner.scope, env, ambient)) {
          yield { text: applyWrap(wrapper.text, inner.text), scope: wrapper.scope };
        }
      }
      return;
    case "probability":
      if (node.samplingMethod !== undefined && node.samplingMethod !== "combinatorial") {
        yield* single(node, node.samplingMethod, scope, env, ambient);
        return;
      }
      for (const include of probabilityChoices(node.chance)) {
        if (include) {
          yield* enumerate(node.value, scope, env, ambient);
        } else {
          yield { text: "", scope };
        }
      }
      return;
    case "condition":
      yield* enumerateCondition(node, 0, scope, env, ambient);
      return;
    case "variable-access": {
      const binding = scope.lookup(node.name);
      if (binding?.kind === "evaluated") {
        yield { text: binding.text, scope };
      } else if (binding?.kind === "deferred") {
        const resolving = scope.resolving(node.name, binding);
        for (const branch of enumerate(binding.command, resolving, env, ambient)) {
          yield { text: branch.text, scope };
        }
      } else if (node.defaultValue !== undefined) {
        yield* enumerate(node.defaultValue, scope, env, ambient);
      } else {
        throw new UnknownVariableError(node.name);
      }
      return;
    }
    case "variable-assignment":
      if (!node.overwrite && scope.has(node.name)) {
        yield { text: "", scope };
      } else if (node.immediate) {
        for (const value of enumerate(node.value, scope, env, ambient)) {
          yield { text: "", scope: value.scope.withBinding(node.name, evaluated(value.text)) };
        }
      } else {
        const binding = deferred(node.value, scope.lookup(node.name));
        yield { text: "", scope: scope.withBinding(node.name, binding) };
      }
      return;
    default:
      assertNever(node);
  }
}

/**
 * Cartesian product of `children`, left to right, kept on an explicit
 * stack of iterators.
 */
function* enumerateSequence(
  children: readonly Command[],
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): Generator<Branch> {
  if (children.length === 0) {
    yield { text: "", scope };
    return;
  }
  const prefixes: string[] = [""];
  const iterators: Iterator<Branch>[] = [enumerate(children[0], scope, env, ambient)];
  while (iterators.length > 0) {
    const depth = iterators.length - 1;
    const next = iterators[depth].next();
    if (next.done === true) {
      iterators.pop();
      prefixes.pop();
      continue;
    }
    const text = prefixes[depth] + next.value.text;
    if (depth + 1 === children.length) {
      yield { text, scope: next.value.scope };
      continue;
    }
    prefixes.push(text);
    iterators.push(enumerate(children[depth + 1], next.value.scope, env, ambient + text));
  }
}

/** Cartesian product of `values`, each result joined with `separator`. */
function* enumerateJoined(
  values: readonly Command[],
  separator: string,
  parts: readonly string[],
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): Generator<Branch> {
  if (parts.length === values.length) {
    yield { text: parts.join(separator), scope };
    return;
  }
  for (const branch of enumerate(values[parts.length], scope, env, ambient)) {
    yield* enumerateJoined(values, separator, [...parts, branch.text], branch.scope, env, ambient);
  }
}

/** Texts a branch tests, with the scope each leaves behind. */
function* conditionTargets(
  contextKey: string | undefined,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): Generator<Branch> {
  if (contextKey === undefined) {
    yield { text: ambient, scope };
    return;
  }
  const binding = scope.lookup(contextKey);
  if (binding === undefined) {
    yield { text: "", scope };
  } else if (binding.kind === "evaluated") {
    yield { text: binding.text, scope };
  } else {
    const resolving = scope.resolving(contextKey, binding);
    for (const branch of enumerate(binding.command, resolving, env, ambient)) {
      yield { text: branch.text, scope };
    }
  }
}

function* enumerateCondition(
  node: ConditionCommand,
  index: number,
  scope: VariableScope,
  env: GenerationEnvironment,
  ambient: string
): Generator<Branch> {
  if (index === node.conditions.length) {
    yield* enumerate(node.elseValue, scope, env, ambient);
    return;
  }
  const branch = node.conditions[index];
  for (const target of conditionTargets(branch.contextKey, scope, env, ambient)) {
    if (branch.matcher.test(target.text)) {
      yield* enumerate(branch.ifValue, target.scope, env, ambient);
    } else {
      yield* enumerateCondition(node, index + 1, target.scope, env, ambient);
    }
  }
}

/**
 * The first `limit` distinct renderings of `tree`.
 */
export function enumerateDistinct(
  tree: Command,
  scope: VariableScope,
  env: GenerationEnvironment,
  limit: number
): string[] {
  const seen = new Set<string>();
  if (limit <= 0) return [];
  for (const branch of enumerate(tree, scope, env)) {
    seen.add(branch.text);
    if (seen.size >= limit) break;
  }
  return [...seen];
}
