#!/usr/bin/env node
/**
 * CLI tool to generate prompts from a template.
 *
 * Usage:
 *   variant-prompts "a {red|blue} __animals__" --count 5
 *   variant-prompts --file template.txt --method combinatorial --count 100
 *   npx tsx src/cli/generate.ts "{~cat|dog}" --seed 7
 *
 * Options:
 *   --file <path>        Read the template from a file
 *   --method <method>    random | combinatorial | cyclical (default: PROMPTS_DEFAULT_METHOD)
 *   --count <n>          Number of prompts (default: PROMPTS_DEFAULT_COUNT)
 *   --seed <n>           Seed for random sampling (default: PROMPTS_SEED)
 *   --wildcards <dir>    Wildcard directory (default: PROMPTS_WILDCARD_DIR)
 *   --ast                Print the parsed template instead of generating
 *   --json               Output as JSON
 *   --no-color           Disable ANSI colors
 *   -h, --help           Show help
 *
 * Exit codes:
 *   0 - Success
 *   1 - Error (bad arguments, syntax error, unresolved wildcard, ...)
 */

import { existsSync, readFileSync } from "node:fs";
import { parseArgs } from "node:util";

import { describeCommand, SamplingMethod } from "../commands/index.js";
import { ConfigurationError, config as appConfig, type AppConfig } from "../config/index.js";
import { PromptGenerator } from "../generator/index.js";
import { createLogger, isLogLevel, type Logger } from "../logging/index.js";
import { PromptSyntaxError } from "../parser/index.js";
import {
  StaticWildcardResolver,
  WildcardFileResolver,
  type WildcardResolver,
} from "../wildcards/index.js";

// ============================================================
// Types
// ============================================================

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export interface CliOptions {
  template: string;
  method: SamplingMethod;
  count: number;
  seed: number | undefined;
  /** Explicit wildcard directory; must exist when given. */
  wildcards: string | undefined;
  ast: boolean;
  json: boolean;
  color: boolean;
  help: boolean;
}

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const HELP = `
Usage: variant-prompts [template] [options]

Options:
  --file <path>        Read the template from a file
  --method <method>    random | combinatorial | cyclical
  --count <n>          Number of prompts to generate
  --seed <n>           Seed for random sampling
  --wildcards <dir>    Directory of wildcard .txt files
  --ast                Print the parsed template instead of generating
  --json               Output as JSON
  --no-color           Disable ANSI colors
  -h, --help           Show this help message

Exit codes:
  0 - Success
  1 - Error
`;

// ============================================================
// CLI Parsing
// ============================================================

function parseInteger(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed)) {
    throw new CliUsageError(`--${flag} must be an integer, got: ${value}`);
  }
  return parsed;
}

/**
 * Parse command-line arguments. Defaults come from the app configuration.
 *
 * @throws CliUsageError on invalid or conflicting arguments
 */
export function parseCliArgs(argv: string[], defaults: AppConfig = appConfig): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      file: { type: "string" },
      method: { type: "string" },
      count: { type: "string" },
      seed: { type: "string" },
      wildcards: { type: "string" },
      ast: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      "no-color": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const base = {
    ast: values.ast,
    json: values.json,
    color: !values["no-color"],
    help: values.help,
  };

  const rawMethod = values.method ?? defaults.defaultMethod;
  const method = SamplingMethod.safeParse(rawMethod);
  if (!method.success) {
    throw new CliUsageError(
      `Invalid method: ${rawMethod}. Must be ${SamplingMethod.options.join(", ")}.`
    );
  }

  const count = values.count !== undefined ? parseInteger("count", values.count) : defaults.defaultCount;
  if (count < 0) {
    throw new CliUsageError(`--count must be zero or more, got: ${count}`);
  }

  const seed = values.seed !== undefined ? parseInteger("seed", values.seed) : defaults.seed;

  let template: string;
  if (values.file !== undefined) {
    if (positionals.length > 0) {
      throw new CliUsageError("Give the template either inline or with --file, not both");
    }
    if (!existsSync(values.file)) {
      throw new CliUsageError(`Template file not found: ${values.file}`);
    }
    template = readFileSync(values.file, "utf-8");
  } else if (positionals.length > 0) {
    template = positionals.join(" ");
  } else if (values.help) {
    template = "";
  } else {
    throw new CliUsageError("No template given. Pass it as an argument or with --file.");
  }

  return {
    ...base,
    template,
    method: method.data,
    count,
    seed,
    wildcards: values.wildcards,
  };
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  red: "\x1b[31m",
};

function colorizer(enabled: boolean): (color: keyof typeof COLORS, text: string) => string {
  return (color, text) => (enabled ? `${COLORS[color]}${text}${COLORS.reset}` : text);
}

/**
 * The offending line of a template with a caret under the error column.
 */
export function formatSyntaxError(template: string, err: PromptSyntaxError): string[] {
  const line = template.split("\n")[err.line - 1] ?? "";
  return [err.message, `  ${line}`, `  ${" ".repeat(err.column - 1)}^`];
}

// ============================================================
// Runner
// ============================================================

function createWildcardResolver(options: CliOptions, defaults: AppConfig): WildcardResolver {
  if (options.wildcards !== undefined) {
    return new WildcardFileResolver(options.wildcards);
  }
  if (existsSync(defaults.wildcardDir)) {
    return new WildcardFileResolver(defaults.wildcardDir);
  }
  return new StaticWildcardResolver();
}

function createCliLogger(defaults: AppConfig): Logger {
  const level = defaults.debug ? "debug" : defaults.logLevel;
  return createLogger({ level: isLogLevel(level) ? level : "info", scope: "generate" });
}

/**
 * Run the CLI and return its exit code.
 */
export function runCli(argv: string[], io: CliIO = consoleIO, defaults: AppConfig = appConfig): number {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv, defaults);
  } catch (err) {
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    io.err("Run with --help for usage.");
    return 1;
  }

  const c = colorizer(options.color && process.stdout.isTTY === true && !process.env.NO_COLOR);

  if (options.help) {
    io.out(HELP);
    return 0;
  }

  try {
    const generator = new PromptGenerator({
      resolver: createWildcardResolver(options, defaults),
      method: options.method,
      seed: options.seed,
      logger: createCliLogger(defaults),
    });

    if (options.ast) {
      const tree = generator.parse(options.template);
      io.out(options.json ? JSON.stringify({ ast: describeCommand(tree) }, null, 2) : describeCommand(tree));
      return 0;
    }

    const prompts = generator.generate(options.template, options.count);
    if (options.json) {
      io.out(
        JSON.stringify(
          { method: options.method, count: prompts.length, prompts },
          null,
          2
        )
      );
    } else {
      for (const prompt of prompts) {
        io.out(prompt);
      }
    }
    return 0;
  } catch (err) {
    if (err instanceof PromptSyntaxError) {
      for (const line of formatSyntaxError(options.template, err)) {
        io.err(c("red", line));
      }
    } else if (err instanceof ConfigurationError) {
      io.err(c("red", err.format()));
    } else {
      io.err(c("red", `Error: ${err instanceof Error ? err.message : String(err)}`));
    }
    return 1;
  }
}

// Only run when executed directly (not imported by tests)
const isDirectExecution = process.argv[1] &&
  (process.argv[1].endsWith("generate.ts") ||
   process.argv[1].endsWith("generate.js") ||
   process.argv[1].endsWith("variant-prompts"));

if (isDirectExecution) {
  process.exit(runCli(process.argv.slice(2)));
}
