/**
 * Grammar configuration schema.
 *
 * The delimiters decide which characters of a template are punctuation and
 * which are literal text, so a parser is only ever built from a validated
 * configuration. Two start markers that are equal, or a start marker equal
 * to the wildcard marker, would make the grammar ambiguous and are rejected
 * here rather than surfacing later as confusing parse results.
 */

import { z } from "zod";

/** Punctuation the grammar uses inside blocks; delimiters may not take it. */
const RESERVED_TOKENS: ReadonlySet<string> = new Set(["|", "$$", "::", "#", "*"]);

const Delimiter = z
  .string()
  .min(1, "Delimiter must not be empty")
  .refine((value) => !/\s/.test(value), "Delimiter must not contain whitespace")
  .refine(
    (value) => !RESERVED_TOKENS.has(value),
    (value) => ({ message: `Delimiter "${value}" is reserved by the grammar` })
  );

export const GrammarConfigSchema = z
  .object({
    /** Opens a variant, probability, condition or comment block */
    variantStart: Delimiter.describe("Opens a variant block"),
    /** Closes a variant, probability, condition or comment block */
    variantEnd: Delimiter.describe("Closes a variant block"),
    /** Opens a variable assignment or access */
    variableStart: Delimiter.describe("Opens a variable assignment or access"),
    /** Closes a variable assignment or access */
    variableEnd: Delimiter.describe("Closes a variable assignment or access"),
    /** Opens a wrap block */
    wrapStart: Delimiter.describe("Opens a wrap block"),
    /** Closes a wrap block */
    wrapEnd: Delimiter.describe("Closes a wrap block"),
    /** Encloses a wildcard name on both sides */
    wildcardWrap: Delimiter.describe("Encloses a wildcard name"),
  })
  .strict()
  .superRefine((config, ctx) => {
    const starts: [keyof typeof config, string][] = [
      ["variantStart", config.variantStart],
      ["variableStart", config.variableStart],
      ["wrapStart", config.wrapStart],
      ["wildcardWrap", config.wildcardWrap],
    ];

    for (let i = 0; i < starts.length; i++) {
      for (let j = i + 1; j < starts.length; j++) {
        const [leftKey, leftValue] = starts[i];
        const [rightKey, rightValue] = starts[j];
        if (leftValue === rightValue) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [rightKey],
            message: `${rightKey} conflicts with ${leftKey}: both are "${rightValue}"`,
          });
        }
      }
    }
  });

export type GrammarConfig = z.infer<typeof GrammarConfigSchema>;
