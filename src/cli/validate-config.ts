#!/usr/bin/env node
/**
 * CLI command to validate the prompt configuration stack.
 *
 * Validates:
 * - App configuration (environment variables)
 * - Grammar configuration (optional JSON file)
 * - Wildcard collections: every value must parse as a template
 * - Template files given as arguments
 *
 * Usage:
 *   npx tsx src/cli/validate-config.ts [options] [template files...]
 *   npm run validate-config -- templates/portrait.txt
 *
 * Options:
 *   --grammar <path>    Grammar configuration JSON (default: built-in delimiters)
 *   --wildcards <dir>   Wildcard directory (default: PROMPTS_WILDCARD_DIR)
 *   --verbose           Show detailed output
 *   --json              Output entire report as JSON (for CI parsing)
 *   --strict            Stop at the first failed step
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - All validations passed
 *   1 - One or more validations failed
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parseArgs } from "node:util";

import { describeCommand } from "../commands/index.js";
import {
  config as appConfig,
  validateConfig,
  validateGrammarConfig,
  DEFAULT_GRAMMAR_CONFIG,
  type AppConfig,
  type GrammarConfig,
} from "../config/index.js";
import { getCachedParser } from "../parser/index.js";
import { WildcardFileResolver } from "../wildcards/index.js";

// ============================================================
// Types
// ============================================================

export interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
}

export interface ValidationReport {
  timestamp: string;
  steps: StepResult[];
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================================
// Validation Steps
// ============================================================

export function runAppConfigStep(config: AppConfig = appConfig): StepResult {
  try {
    validateConfig(config);
    return {
      success: true,
      component: "App Configuration",
      message: "valid",
      details: [
        `Environment: ${config.env}`,
        `Log level: ${config.logLevel}`,
        `Default method: ${config.defaultMethod}`,
        `Default count: ${config.defaultCount}`,
        `Wildcard directory: ${config.wildcardDir}`,
        `Seed: ${config.seed ?? "none"}`,
      ],
    };
  } catch (err) {
    return { success: false, component: "App Configuration", message: errorMessage(err) };
  }
}

/**
 * Validate a grammar configuration file. Without a path the built-in
 * delimiters are used.
 */
export function runGrammarStep(path?: string): { step: StepResult; grammar?: GrammarConfig } {
  const component = "Grammar Configuration";
  if (path === undefined) {
    return {
      step: { success: true, component, message: "using default delimiters" },
      grammar: { ...DEFAULT_GRAMMAR_CONFIG },
    };
  }

  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    return { step: { success: false, component, message: `File not found: ${fullPath}` } };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(fullPath, "utf-8"));
  } catch (err) {
    return { step: { success: false, component, message: `Invalid JSON: ${errorMessage(err)}` } };
  }

  const result = validateGrammarConfig(raw);
  if (!result.success || result.config === undefined) {
    return {
      step: {
        success: false,
        component,
        message: `${result.errors?.length ?? 0} validation error(s)`,
        details: (result.errors ?? []).map(
          (issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`
        ),
      },
    };
  }

  const grammar = result.config;
  return {
    step: {
      success: true,
      component,
      message: "valid",
      details: [
        `Variants: ${grammar.variantStart} ... ${grammar.variantEnd}`,
        `Variables: ${grammar.variableStart} ... ${grammar.variableEnd}`,
        `Wraps: ${grammar.wrapStart} ... ${grammar.wrapEnd}`,
        `Wildcards: ${grammar.wildcardWrap}name${grammar.wildcardWrap}`,
      ],
    },
    grammar,
  };
}

/**
 * Parse every value of every wildcard collection.
 *
 * @param required - fail when the directory is missing instead of skipping
 */
export function runWildcardsStep(dir: string, grammar: GrammarConfig, required: boolean): StepResult {
  const component = "Wildcards";
  if (!existsSync(dir)) {
    return required
      ? { success: false, component, message: `Directory not found: ${resolve(dir)}` }
      : { success: true, component, message: `no directory at ${dir} (skipped)` };
  }

  try {
    const resolver = new WildcardFileResolver(dir);
    const parser = getCachedParser(grammar);
    const names = resolver.listWildcards();
    const errors: string[] = [];
    let valueCount = 0;

    for (const name of names) {
      for (const value of resolver.resolve(name)) {
        valueCount++;
        try {
          parser.parse(value);
        } catch (err) {
          errors.push(`${name}: "${value}": ${errorMessage(err)}`);
        }
      }
    }

    if (errors.length > 0) {
      return {
        success: false,
        component,
        message: `${errors.length} value(s) failed to parse`,
        details: errors,
      };
    }
    return {
      success: true,
      component,
      message: `${names.length} collection(s), ${valueCount} value(s)`,
      details: names,
    };
  } catch (err) {
    return { success: false, component, message: errorMessage(err) };
  }
}

export function runTemplateStep(path: string, grammar: GrammarConfig): StepResult {
  const component = `Template ${path}`;
  const fullPath = resolve(path);
  if (!existsSync(fullPath)) {
    return { success: false, component, message: `File not found: ${fullPath}` };
  }
  try {
    const tree = getCachedParser(grammar).parse(readFileSync(fullPath, "utf-8"));
    return { success: true, component, message: "parses", details: [describeCommand(tree)] };
  } catch (err) {
    return { success: false, component, message: errorMessage(err) };
  }
}

// ============================================================
// Report Building
// ============================================================

export function buildReport(steps: StepResult[]): ValidationReport {
  const passed = steps.filter((r) => r.success).length;
  const failed = steps.filter((r) => !r.success).length;

  return {
    timestamp: new Date().toISOString(),
    steps,
    summary: {
      stepsPassed: passed,
      stepsFailed: failed,
      stepsTotal: steps.length,
    },
  };
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      grammar: { type: "string" },
      wildcards: { type: "string" },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      strict: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-config [options] [template files...]

Options:
  --grammar <path>    Grammar configuration JSON (default: built-in delimiters)
  --wildcards <dir>   Wildcard directory (default: PROMPTS_WILDCARD_DIR)
  --verbose           Show detailed output
  --json              Output entire report as JSON (for CI parsing)
  --strict            Stop at the first failed step
  -h, --help          Show this help message
`);
    process.exit(0);
  }

  return { ...values, templates: positionals };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printHeader(): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Prompt Configuration Validation"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
}

function printStep(step: StepResult, verbose: boolean): void {
  if (step.success) {
    console.log(`${c("green", "✓")} ${c("bold", step.component)}: ${step.message}`);
    if (verbose) {
      step.details?.forEach((d) => console.log(`  ${c("dim", "•")} ${d}`));
    }
  } else {
    console.log(`${c("red", "✗")} ${c("bold", step.component)}: ${step.message}`);
    step.details?.forEach((d) => console.log(`    ${c("red", "•")} ${d}`));
  }
  console.log("");
}

function printFooter(passed: number, failed: number): void {
  console.log("");
  console.log("─".repeat(60));
  if (failed === 0) {
    console.log(c("green", `✓ All validations passed (${passed}/${passed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${failed} error(s)`));
  }
  console.log("─".repeat(60));
  console.log("");
}

// ============================================================
// Main
// ============================================================

function main(): void {
  const args = parseCliArgs();
  const steps: StepResult[] = [];

  if (!args.json) {
    printHeader();
  }

  function finish(): never {
    const report = buildReport(steps);
    if (args.json) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printFooter(report.summary.stepsPassed, report.summary.stepsFailed);
    }
    process.exit(report.summary.stepsFailed > 0 ? 1 : 0);
  }

  function record(step: StepResult): void {
    steps.push(step);
    if (!args.json) {
      printStep(step, args.verbose);
    }
    if (args.strict && !step.success) {
      finish();
    }
  }

  // ---- 1. App configuration ----
  record(runAppConfigStep());

  // ---- 2. Grammar ----
  const { step, grammar } = runGrammarStep(args.grammar);
  record(step);
  if (grammar === undefined) finish();

  // ---- 3. Wildcards ----
  record(
    runWildcardsStep(args.wildcards ?? appConfig.wildcardDir, grammar, args.wildcards !== undefined)
  );

  // ---- 4. Templates ----
  for (const template of args.templates) {
    record(runTemplateStep(template, grammar));
  }

  finish();
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("validate-config.ts") ||
   process.argv[1].endsWith("validate-config.js"));

if (isDirectExecution) {
  main();
}
