/**
 * Sampling methods.
 *
 * A sampling method decides how a variant, wildcard or probability block
 * resolves its choice. It is chosen globally for a generation call and can
 * be overridden per node with a one-character marker in the template:
 *
 *   ~   random         independent weighted draw on every visit
 *   !   combinatorial  exhaustive enumeration in declaration order
 *   @   cyclical       deterministic round-robin through the choices
 */

import { z } from "zod";

export const SamplingMethod = z.enum(["random", "combinatorial", "cyclical"]);
export type SamplingMethod = z.infer<typeof SamplingMethod>;

/** Template marker → sampling method. */
export const SAMPLER_SYMBOLS: Readonly<Record<string, SamplingMethod>> = {
  "~": "random",
  "!": "combinatorial",
  "@": "cyclical",
};

/**
 * Get the template marker for a sampling method.
 */
export function samplerSymbol(method: SamplingMethod): string {
  switch (method) {
    case "random":
      return "~";
    case "combinatorial":
      return "!";
    case "cyclical":
      return "@";
  }
}
