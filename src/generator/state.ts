/**
 * Cyclical sampling state.
 *
 * Counters live in a side table keyed by node identity, so one parsed tree
 * can be shared by callers that each keep their own rotation.
 */

import type { Command } from "../commands/index.js";

export class CyclicalState {
  private positions = new WeakMap<Command, number>();

  /**
   * Position to use for `node` on this visit, in [0, size). Advances the
   * counter.
   */
  next(node: Command, size: number): number {
    if (size <= 0) return 0;
    const position = (this.positions.get(node) ?? 0) % size;
    this.positions.set(node, (position + 1) % size);
    return position;
  }

  reset(): void {
    this.positions = new WeakMap();
  }
}
