/**
 * Default grammar delimiters.
 *
 *   {a|b}        variant        ${name}      variable
 *   %{w$$inner}  wrap           __name__     wildcard
 */

import type { GrammarConfig } from "./schema.js";

export const DEFAULT_GRAMMAR_CONFIG: Readonly<GrammarConfig> = Object.freeze({
  variantStart: "{",
  variantEnd: "}",
  variableStart: "${",
  variableEnd: "}",
  wrapStart: "%{",
  wrapEnd: "}",
  wildcardWrap: "__",
});
