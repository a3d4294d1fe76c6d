/**
 * Wildcard resolvers.
 */

export type { WildcardResolver } from "./resolver.js";
export { StaticWildcardResolver } from "./static-resolver.js";
export { WildcardFileResolver, WildcardLoadError } from "./file-resolver.js";
export { compileGlob, isGlob, resolveGlob } from "./glob.js";
