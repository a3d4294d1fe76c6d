/**
 * Wildcard resolver tests.
 *
 * Run: node --import tsx src/wildcards/wildcards.test.ts
 *
 * These tests verify:
 *   1. Glob patterns match within and across path segments
 *   2. The static resolver serves records and globs
 *   3. The file resolver reads, cleans and caches .txt collections
 */

import { strict as assert } from "node:assert";
import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  StaticWildcardResolver,
  WildcardFileResolver,
  WildcardLoadError,
  compileGlob,
  isGlob,
  resolveGlob,
} from "./index.js";

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

// ═══════════════════════════════════════════════════════════════════════════
// 1. GLOBS
// ═══════════════════════════════════════════════════════════════════════════

section("Globs");

test("isGlob() looks for a star", () => {
  assert.equal(isGlob("colors/*"), true);
  assert.equal(isGlob("colors/warm"), false);
});

test("single star stays inside one segment", () => {
  const matcher = compileGlob("colors/*");
  assert.equal(matcher.test("colors/warm"), true);
  assert.equal(matcher.test("colors/warm/deep"), false);
  assert.equal(matcher.test("colorsXwarm"), false);
});

test("double star crosses segments", () => {
  const matcher = compileGlob("colors/**");
  assert.equal(matcher.test("colors/warm/deep"), true);
});

test("regex characters in names are literal", () => {
  assert.equal(compileGlob("a.b*").test("a.bc"), true);
  assert.equal(compileGlob("a.b*").test("axbc"), false);
});

test("resolveGlob() concatenates in name order without duplicates", () => {
  const values: Record<string, string[]> = {
    "colors/warm": ["red", "orange"],
    "colors/cool": ["blue", "red"],
    animals: ["cat"],
  };
  assert.deepEqual(
    resolveGlob("colors/*", Object.keys(values), (name) => values[name] ?? []),
    ["blue", "red", "orange"]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// 2. STATIC RESOLVER
// ═══════════════════════════════════════════════════════════════════════════

section("StaticWildcardResolver");

const staticResolver = new StaticWildcardResolver({
  "colors/warm": ["red", "orange"],
  "colors/cool": ["blue"],
  animals: ["cat", "dog"],
});

test("resolve() returns a collection", () => {
  assert.deepEqual(staticResolver.resolve("animals"), ["cat", "dog"]);
});

test("resolve() returns nothing for unknown names", () => {
  assert.deepEqual(staticResolver.resolve("plants"), []);
});

test("resolve() expands globs", () => {
  assert.deepEqual(staticResolver.resolve("colors/*"), ["blue", "red", "orange"]);
});

test("listWildcards() is sorted", () => {
  assert.deepEqual(staticResolver.listWildcards(), ["animals", "colors/cool", "colors/warm"]);
});

test("collections are copied on construction", () => {
  const source = { animals: ["cat"] };
  const resolver = new StaticWildcardResolver(source);
  source.animals.push("dog");
  assert.deepEqual(resolver.resolve("animals"), ["cat"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// 3. FILE RESOLVER
// ═══════════════════════════════════════════════════════════════════════════

section("WildcardFileResolver");

const WILDCARD_DIR = join(tmpdir(), `wildcard-test-${Date.now()}`);

function setupWildcardDir(): void {
  mkdirSync(join(WILDCARD_DIR, "colors"), { recursive: true });
  writeFileSync(join(WILDCARD_DIR, "animals.txt"), "cat\n  dog  \n\n# not an animal\nbird\n");
  writeFileSync(join(WILDCARD_DIR, "bom.txt"), "\uFEFFfirst\r\nsecond\r\n");
  writeFileSync(join(WILDCARD_DIR, "colors", "warm.txt"), "red\norange\n");
  writeFileSync(join(WILDCARD_DIR, "colors", "cool.txt"), "blue\n");
  writeFileSync(join(WILDCARD_DIR, "notes.md"), "not a wildcard\n");
}

function cleanupWildcardDir(): void {
  rmSync(WILDCARD_DIR, { recursive: true, force: true });
}

setupWildcardDir();

test("lines are trimmed; blanks and comments skipped", () => {
  const resolver = new WildcardFileResolver(WILDCARD_DIR);
  assert.deepEqual(resolver.resolve("animals"), ["cat", "dog", "bird"]);
});

test("byte order mark and CRLF endings are handled", () => {
  const resolver = new WildcardFileResolver(WILDCARD_DIR);
  assert.deepEqual(resolver.resolve("bom"), ["first", "second"]);
});

test("nested files are addressed with /", () => {
  const resolver = new WildcardFileResolver(WILDCARD_DIR);
  assert.deepEqual(resolver.resolve("colors/warm"), ["red", "orange"]);
});

test("globs expand over files", () => {
  const resolver = new WildcardFileResolver(WILDCARD_DIR);
  assert.deepEqual(resolver.resolve("colors/*"), ["blue", "red", "orange"]);
});

test("listWildcards() scans subdirectories and skips other files", () => {
  const resolver = new WildcardFileResolver(WILDCARD_DIR);
  assert.deepEqual(resolver.listWildcards(), ["animals", "bom", "colors/cool", "colors/warm"]);
});

test("unknown names resolve to nothing", () => {
  const resolver = new WildcardFileResolver(WILDCARD_DIR);
  assert.deepEqual(resolver.resolve("plants"), []);
});

test("names outside the directory resolve to nothing", () => {
  const resolver = new WildcardFileResolver(join(WILDCARD_DIR, "colors"));
  assert.deepEqual(resolver.resolve("../animals"), []);
});

test("results are cached", () => {
  const resolver = new WildcardFileResolver(WILDCARD_DIR);
  assert.equal(resolver.resolve("animals"), resolver.resolve("animals"));
});

test("clearCache() picks up edits", () => {
  const resolver = new WildcardFileResolver(WILDCARD_DIR);
  assert.deepEqual(resolver.resolve("colors/cool"), ["blue"]);
  writeFileSync(join(WILDCARD_DIR, "colors", "cool.txt"), "blue\ngreen\n");
  assert.deepEqual(resolver.resolve("colors/cool"), ["blue"]);
  resolver.clearCache();
  assert.deepEqual(resolver.resolve("colors/cool"), ["blue", "green"]);
});

test("missing directory is a WildcardLoadError", () => {
  assert.throws(
    () => new WildcardFileResolver(join(WILDCARD_DIR, "missing")),
    (err: unknown) => {
      assert.ok(err instanceof WildcardLoadError);
      assert.ok(err.message.startsWith("Wildcard directory does not exist: "));
      return true;
    }
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

cleanupWildcardDir();

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
