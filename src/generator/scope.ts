/**
 * Variable scope.
 *
 * Bindings are either already-rendered text or a deferred command that is
 * rendered again on every access. A deferred command renders in a scope
 * where its own name reads as the binding it replaced, so `${x=${x} B}`
 * extends the earlier `x` and a name with no earlier binding is unbound
 * there. Scopes chain to a parent: wildcard variables live in a child scope
 * that reads through to the caller's.
 *
 * Single walks (random, cyclical) mutate one scope with `bind`.
 * Combinatorial enumeration branches with `withBinding`, which copies the
 * scope's own table and leaves the original untouched.
 */

import type { Command } from "../commands/index.js";

export type Binding =
  | { readonly kind: "evaluated"; readonly text: string }
  | DeferredBinding;

export interface DeferredBinding {
  readonly kind: "deferred";
  readonly command: Command;
  /** Binding of the same name when this one was made. */
  readonly previous?: Binding;
}

export function evaluated(text: string): Binding {
  return { kind: "evaluated", text };
}

export function deferred(command: Command, previous?: Binding): Binding {
  return previous === undefined
    ? { kind: "deferred", command }
    : { kind: "deferred", command, previous };
}

export class VariableScope {
  private constructor(
    // null hides a name bound in a parent
    private readonly bindings: Map<string, Binding | null>,
    readonly parent: VariableScope | undefined
  ) {}

  static root(initial: Readonly<Record<string, Binding>> = {}): VariableScope {
    return new VariableScope(new Map(Object.entries(initial)), undefined);
  }

  /** A scope whose own bindings shadow this one. */
  child(initial: Readonly<Record<string, Binding>> = {}): VariableScope {
    return new VariableScope(new Map(Object.entries(initial)), this);
  }

  lookup(name: string): Binding | undefined {
    const own = this.bindings.get(name);
    if (own !== undefined) return own ?? undefined;
    return this.parent?.lookup(name);
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /** Bind in place. */
  bind(name: string, binding: Binding): void {
    this.bindings.set(name, binding);
  }

  /** A copy of this scope with one more binding; the parent is shared. */
  withBinding(name: string, binding: Binding): VariableScope {
    const bindings = new Map(this.bindings);
    bindings.set(name, binding);
    return new VariableScope(bindings, this.parent);
  }

  clone(): VariableScope {
    return new VariableScope(new Map(this.bindings), this.parent);
  }

  /** Scope in which the deferred binding of `name` renders. */
  resolving(name: string, binding: DeferredBinding): VariableScope {
    return new VariableScope(new Map([[name, binding.previous ?? null]]), this);
  }
}
