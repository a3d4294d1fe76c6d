/**
 * Variant choice lists.
 *
 * A variant with bounds (min, max) chooses one index combination of size k
 * for some k in [min, max]. Combinatorial and cyclical sampling walk these
 * combinations in a fixed order: k ascending, then lexicographic by index.
 * Options of weight zero never take part.
 */

import type { VariantCommand } from "../commands/index.js";

const cache = new WeakMap<VariantCommand, readonly (readonly number[])[]>();

function* combinations(pool: readonly number[], k: number): Generator<number[]> {
  if (k === 0) {
    yield [];
    return;
  }
  for (let i = 0; i <= pool.length - k; i++) {
    for (const rest of combinations(pool.slice(i + 1), k - 1)) {
      yield [pool[i], ...rest];
    }
  }
}

/** Indices of the options that can be chosen. */
export function eligibleOptions(node: VariantCommand): number[] {
  const indices: number[] = [];
  node.options.forEach((option, index) => {
    if (option.weight > 0) indices.push(index);
  });
  return indices;
}

export function variantChoices(node: VariantCommand): readonly (readonly number[])[] {
  const cached = cache.get(node);
  if (cached !== undefined) return cached;

  const eligible = eligibleOptions(node);
  const choices: number[][] = [];
  const upper = Math.min(node.maxBound, eligible.length);
  for (let k = Math.max(node.minBound, 1); k <= upper; k++) {
    choices.push(...combinations(eligible, k));
  }

  cache.set(node, choices);
  return choices;
}

/**
 * Outcomes of a probability block in enumeration order: excluded, then
 * included. An outcome with no chance at all is left out.
 */
export function probabilityChoices(chance: number): readonly boolean[] {
  return [...(chance < 1 ? [false] : []), ...(chance > 0 ? [true] : [])];
}
