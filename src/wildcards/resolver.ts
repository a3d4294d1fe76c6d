/**
 * Wildcard resolution contract.
 */

/**
 * Maps a wildcard name to its candidate values. Each value is a template
 * and may itself contain directives. An unknown name resolves to an empty
 * list.
 */
export interface WildcardResolver {
  resolve(name: string): readonly string[];
  /** Drop anything the resolver has cached. */
  clearCache?(): void;
}
