/**
 * Grammar configuration loader and validator.
 *
 * Responsible for:
 * - Filling omitted delimiters from the defaults
 * - Validating against the schema with fail-fast behavior
 * - Producing structured error messages
 * - Freezing the configuration so it can key the parser cache
 */

import type { ZodIssue } from "zod";
import { GrammarConfigSchema, type GrammarConfig } from "./schema.js";
import { DEFAULT_GRAMMAR_CONFIG } from "./defaults.js";

/**
 * Invalid grammar configuration: empty, reserved or conflicting delimiters.
 */
export class ConfigurationError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Grammar configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface ConfigValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): ConfigValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

function withDefaults(input: unknown): unknown {
  if (input === undefined) return { ...DEFAULT_GRAMMAR_CONFIG };
  if (typeof input !== "object" || input === null || Array.isArray(input)) return input;
  return { ...DEFAULT_GRAMMAR_CONFIG, ...input };
}

/**
 * Validate and load a grammar configuration. Omitted delimiters take their
 * default value.
 *
 * @throws ConfigurationError if validation fails
 */
export function loadGrammarConfig(input?: unknown): Readonly<GrammarConfig> {
  const result = GrammarConfigSchema.safeParse(withDefaults(input));

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new ConfigurationError(
      `Invalid grammar configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return Object.freeze(result.data);
}

/**
 * Validate a grammar configuration without throwing.
 */
export function validateGrammarConfig(input?: unknown): {
  success: boolean;
  config?: GrammarConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = GrammarConfigSchema.safeParse(withDefaults(input));

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: formatZodIssues(result.error.issues),
  };
}

/**
 * Canonical string form of a configuration, used to share one compiled
 * parser between equal configurations.
 */
export function grammarConfigKey(config: GrammarConfig): string {
  return JSON.stringify([
    config.variantStart,
    config.variantEnd,
    config.variableStart,
    config.variableEnd,
    config.wrapStart,
    config.wrapEnd,
    config.wildcardWrap,
  ]);
}
