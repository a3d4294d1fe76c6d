import { isGlob, resolveGlob } from "./glob.js";
import type { WildcardResolver } from "./resolver.js";

/**
 * Resolver over an in-memory record of collections.
 *
 *   const resolver = new StaticWildcardResolver({
 *     "colors/warm": ["red", "orange"],
 *     "colors/cool": ["blue"],
 *   });
 *   resolver.resolve("colors/*"); // ["blue", "red", "orange"]
 */
export class StaticWildcardResolver implements WildcardResolver {
  private readonly collections: ReadonlyMap<string, readonly string[]>;

  constructor(collections: Readonly<Record<string, readonly string[]>> = {}) {
    this.collections = new Map(
      Object.entries(collections).map(([name, values]) => [name, Object.freeze([...values])])
    );
  }

  resolve(name: string): readonly string[] {
    if (isGlob(name)) {
      return resolveGlob(name, this.collections.keys(), (match) => this.collections.get(match) ?? []);
    }
    return this.collections.get(name) ?? [];
  }

  listWildcards(): string[] {
    return [...this.collections.keys()].sort();
  }
}
