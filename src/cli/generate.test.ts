/**
 * Tests for the generate CLI.
 *
 * Run: node --import tsx src/cli/generate.test.ts
 *
 * These tests verify:
 *   1. Argument parsing, defaults and usage errors
 *   2. Output of prompts, JSON and parsed trees
 *   3. Error reporting with exit code 1
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { AppConfig } from "../config/index.js";
import { parse, PromptSyntaxError } from "../parser/index.js";
import { CliUsageError, formatSyntaxError, parseCliArgs, runCli, type CliIO } from "./generate.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

const TEST_DIR = join(tmpdir(), `generate-cli-test-${Date.now()}`);
const WILDCARD_DIR = join(TEST_DIR, "wildcards");
const TEMPLATE_FILE = join(TEST_DIR, "template.txt");

mkdirSync(WILDCARD_DIR, { recursive: true });
writeFileSync(join(WILDCARD_DIR, "animals.txt"), "cat\ndog\n");
writeFileSync(TEMPLATE_FILE, "a {big|small} dog");

const DEFAULTS: AppConfig = {
  env: "test",
  debug: false,
  logLevel: "error",
  defaultMethod: "random",
  defaultCount: 1,
  wildcardDir: join(TEST_DIR, "no-such-dir"),
  seed: undefined,
};

interface Captured {
  code: number;
  out: string[];
  err: string[];
}

function run(argv: string[], defaults: AppConfig = DEFAULTS): Captured {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  };
  const code = runCli(argv, io, defaults);
  return { code, out, err };
}

// ═══════════════════════════════════════════════════════════════════════════
// 1. ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("parseCliArgs");

test("defaults come from the app configuration", () => {
  const options = parseCliArgs(["{a|b}"], { ...DEFAULTS, defaultCount: 4, seed: 9 });
  assert.equal(options.template, "{a|b}");
  assert.equal(options.method, "random");
  assert.equal(options.count, 4);
  assert.equal(options.seed, 9);
  assert.equal(options.wildcards, undefined);
  assert.equal(options.color, true);
});

test("positionals are joined into one template", () => {
  assert.equal(parseCliArgs(["a", "{b|c}"], DEFAULTS).template, "a {b|c}");
});

test("flags override the defaults", () => {
  const options = parseCliArgs(
    ["x", "--method", "cyclical", "--count", "3", "--seed", "5", "--no-color"],
    DEFAULTS
  );
  assert.equal(options.method, "cyclical");
  assert.equal(options.count, 3);
  assert.equal(options.seed, 5);
  assert.equal(options.color, false);
});

test("template can come from a file", () => {
  assert.equal(parseCliArgs(["--file", TEMPLATE_FILE], DEFAULTS).template, "a {big|small} dog");
});

test("usage errors", () => {
  assert.throws(
    () => parseCliArgs(["x", "--count", "abc"], DEFAULTS),
    (err: unknown) =>
      err instanceof CliUsageError && err.message === "--count must be an integer, got: abc"
  );
  assert.throws(() => parseCliArgs(["x", "--count=-1"], DEFAULTS), CliUsageError);
  assert.throws(() => parseCliArgs(["x", "--method", "shuffled"], DEFAULTS), CliUsageError);
  assert.throws(() => parseCliArgs([], DEFAULTS), CliUsageError);
  assert.throws(() => parseCliArgs(["x", "--file", TEMPLATE_FILE], DEFAULTS), CliUsageError);
  assert.throws(
    () => parseCliArgs(["--file", join(TEST_DIR, "missing.txt")], DEFAULTS),
    CliUsageError
  );
});

test("help needs no template", () => {
  assert.equal(parseCliArgs(["--help"], DEFAULTS).help, true);
});

// ═══════════════════════════════════════════════════════════════════════════
// 2. OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

section("runCli output");

test("prints one prompt per line", () => {
  const result = run(["{a|b}", "--method", "combinatorial", "--count", "5"]);
  assert.equal(result.code, 0);
  assert.deepEqual(result.out, ["a", "b"]);
  assert.deepEqual(result.err, []);
});

test("JSON output", () => {
  const result = run(["{a|b}", "--method", "cyclical", "--count", "3", "--json"]);
  assert.equal(result.code, 0);
  assert.deepEqual(JSON.parse(result.out[0]), {
    method: "cyclical",
    count: 3,
    prompts: ["a", "b", "a"],
  });
});

test("--ast prints the parsed template", () => {
  const result = run(["{a|b}", "--ast"]);
  assert.equal(result.code, 0);
  assert.deepEqual(result.out, ['variant(1-1 ",")[1::"a" | 1::"b"]']);
});

test("--wildcards reads collections from a directory", () => {
  const result = run([
    "a __animals__",
    "--wildcards",
    WILDCARD_DIR,
    "--method",
    "combinatorial",
    "--count",
    "10",
  ]);
  assert.equal(result.code, 0);
  assert.deepEqual(result.out, ["a cat", "a dog"]);
});

test("configured wildcard directory is used when it exists", () => {
  const result = run(["__animals__", "--method", "cyclical", "--count", "2"], {
    ...DEFAULTS,
    wildcardDir: WILDCARD_DIR,
  });
  assert.deepEqual(result.out, ["cat", "dog"]);
});

test("equal seeds print equal prompts", () => {
  const first = run(["{a|b|c|d} {e|f|g}", "--count", "4", "--seed", "11"]);
  const second = run(["{a|b|c|d} {e|f|g}", "--count", "4", "--seed", "11"]);
  assert.deepEqual(first.out, second.out);
});

test("help exits 0", () => {
  const result = run(["-h"]);
  assert.equal(result.code, 0);
  assert.ok(result.out[0].includes("Usage: variant-prompts [template] [options]"));
});

// ═══════════════════════════════════════════════════════════════════════════
// 3. ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("runCli errors");

test("syntax error shows the line with a caret", () => {
  const result = run(["{a|b", "--no-color"]);
  assert.equal(result.code, 1);
  assert.equal(result.err.length, 3);
  assert.ok(result.err[0].startsWith("Syntax error at line 1, column 5: "));
  assert.equal(result.err[1], "  {a|b");
  assert.equal(result.err[2], "      ^");
});

test("empty wildcard under random sampling fails", () => {
  const result = run(["a __animals__", "--no-color"]);
  assert.equal(result.code, 1);
  assert.deepEqual(result.err, [
    'Error: Wildcard "animals" has no values (sampling method: random)',
  ]);
});

test("usage error points to --help", () => {
  const result = run(["x", "--method", "shuffled"]);
  assert.equal(result.code, 1);
  assert.deepEqual(result.err, [
    "Error: Invalid method: shuffled. Must be random, combinatorial, cyclical.",
    "Run with --help for usage.",
  ]);
});

test("missing explicit wildcard directory fails", () => {
  const result = run(["x", "--wildcards", join(TEST_DIR, "missing"), "--no-color"]);
  assert.equal(result.code, 1);
  assert.ok(result.err[0].startsWith("Error: Wildcard directory does not exist: "));
});

test("formatSyntaxError() picks the failing line", () => {
  const template = "first line\n{a|b";
  let error: unknown;
  try {
    parse(template);
  } catch (err) {
    error = err;
  }
  assert.ok(error instanceof PromptSyntaxError);
  assert.deepEqual(formatSyntaxError(template, error).slice(1), ["  {a|b", "      ^"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(TEST_DIR, { recursive: true, force: true });

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
