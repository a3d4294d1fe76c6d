/**
 * Tests for the template parser.
 *
 * Run: node --import tsx src/parser/parser.test.ts
 *
 * Trees are compared through describeCommand, which prints every field
 * that matters (bounds, separators, weights, samplers, defaults).
 */

import { strict as assert } from "node:assert";

import { describeCommand, InvalidBoundError, literal } from "../commands/index.js";
import { ConfigurationError } from "../config/grammar/index.js";
import { PromptParser, PromptSyntaxError, getCachedParser, locate, parse } from "./index.js";

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

function tree(source: string): string {
  return describeCommand(parse(source));
}

function syntaxError(source: string): PromptSyntaxError {
  try {
    parse(source);
  } catch (err) {
    if (err instanceof PromptSyntaxError) return err;
    throw err;
  }
  throw new Error(`Expected a syntax error for ${JSON.stringify(source)}`);
}

// ═══════════════════════════════════════════════════════════════════════════
// LITERALS AND COMMENTS
// ═══════════════════════════════════════════════════════════════════════════

section("Literals and comments");

test("alphanumeric text is a literal", () => {
  assert.deepEqual(parse("abc123"), literal("abc123"));
});

test("whitespace in top-level text is kept", () => {
  assert.deepEqual(parse("  a cat  "), literal("  a cat  "));
});

test("empty template is an empty literal", () => {
  assert.deepEqual(parse(""), literal(""));
});

test("block delimiters without an opener are plain text at top level", () => {
  assert.deepEqual(parse("a } b | c :: d"), literal("a } b | c :: d"));
});

test("line comment is dropped and the runs joined with a space", () => {
  assert.deepEqual(parse("a # note\nb"), literal("a  \nb"));
});

test("block comment is dropped and the runs joined with a space", () => {
  assert.deepEqual(parse("a /* x */b"), literal("a  b"));
});

test("// after a colon is not a comment", () => {
  assert.deepEqual(parse("see http://example.test"), literal("see http://example.test"));
});

test("template made only of a comment is empty", () => {
  assert.deepEqual(parse("// nothing here"), literal(""));
});

test("inline comment block becomes a comment node", () => {
  assert.equal(tree("{* note *}"), 'comment(" note ")');
});

// ═══════════════════════════════════════════════════════════════════════════
// VARIANTS
// ═══════════════════════════════════════════════════════════════════════════

section("Variants");

test("simple variant inside text", () => {
  assert.equal(
    tree("a {red|blue} cat"),
    'seq("a ", variant(1-1 ",")[1::"red" | 1::"blue"], " cat")'
  );
});

test("layout whitespace inside a variant is dropped", () => {
  assert.equal(tree("{ a | b }"), 'variant(1-1 ",")[1::"a" | 1::"b"]');
});

test("exact bound with punctuation separator trimmed", () => {
  assert.equal(tree("{2$$ , $$x|y|z}"), 'variant(2-2 ",")[1::"x" | 1::"y" | 1::"z"]');
});

test("word separator keeps its padding", () => {
  assert.equal(tree("{2$$ and $$a|b}"), 'variant(2-2 " and ")[1::"a" | 1::"b"]');
});

test("range bounds", () => {
  assert.equal(tree("{1-2$$a|b|c}"), 'variant(1-2 ",")[1::"a" | 1::"b" | 1::"c"]');
  assert.equal(tree("{-2$$a|b|c}"), 'variant(1-2 ",")[1::"a" | 1::"b" | 1::"c"]');
  assert.equal(tree("{2-$$a|b|c}"), 'variant(2-3 ",")[1::"a" | 1::"b" | 1::"c"]');
});

test("inverted bounds are an InvalidBoundError", () => {
  assert.throws(() => parse("{3-1$$a|b|c}"), InvalidBoundError);
});

test("a weight too large for a number is a syntax error at the weight", () => {
  const err = syntaxError("{" + "9".repeat(400) + "::a|b}");
  assert.equal(err.position, 1);
  assert.equal(err.column, 2);
  assert.deepEqual(err.expected, ["weight"]);
});

test("a bound too large for an integer is a syntax error at the bound", () => {
  const err = syntaxError("{ " + "9".repeat(30) + "$$a|b}");
  assert.equal(err.position, 2);
  assert.deepEqual(err.expected, ["bound"]);
});

test("weights", () => {
  assert.equal(tree("{0.5::a|2::b}"), 'variant(1-1 ",")[0.5::"a" | 2::"b"]');
});

test("a weight on a later option keeps the block a variant", () => {
  assert.equal(tree("{red|0.5::blue}"), 'variant(1-1 ",")[1::"red" | 0.5::"blue"]');
});

test("sampler markers", () => {
  assert.equal(tree("{~a|b}"), 'variant~(1-1 ",")[1::"a" | 1::"b"]');
  assert.equal(tree("{!a|b}"), 'variant!(1-1 ",")[1::"a" | 1::"b"]');
  assert.equal(tree("{@2$$a|b}"), 'variant@(2-2 ",")[1::"a" | 1::"b"]');
});

test("nested variants", () => {
  assert.equal(
    tree("{a {b|c}|d}"),
    'variant(1-1 ",")[1::seq("a ", variant(1-1 ",")[1::"b" | 1::"c"]) | 1::"d"]'
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// BLOCK DISAMBIGUATION
// ═══════════════════════════════════════════════════════════════════════════

section("Block disambiguation");

test("number before :: is a probability", () => {
  assert.equal(tree("{0.25::hat}"), 'chance(0.25, "hat")');
  assert.equal(tree("{.5::hat}"), 'chance(0.5, "hat")');
});

test("probability above 1 is clamped", () => {
  assert.equal(tree("{2::hat}"), 'chance(1, "hat")');
});

test("probability with empty value", () => {
  assert.equal(tree("{0.5::}"), 'chance(0.5, "")');
});

test("text before :: is a condition", () => {
  assert.equal(tree("{cat::meow}"), 'if(/cat/ => "meow"; else => "")');
});

test("condition with else-if chain and else", () => {
  assert.equal(
    tree("{cat::has cat|dog::has dog|none}"),
    'if(/cat/ => "has cat"; /dog/ => "has dog"; else => "none")'
  );
});

test("condition on a variable", () => {
  assert.equal(
    tree("{mood~=^happy$::smile|frown}"),
    'if(mood~/^happy$/ => "smile"; else => "frown")'
  );
});

test("invalid condition pattern is a syntax error at the pattern", () => {
  const err = syntaxError("{ca[t::x}");
  assert.equal(err.position, 1);
  assert.equal(err.column, 2);
  assert.deepEqual(err.expected, ["regular expression"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// VARIABLES AND WRAPS
// ═══════════════════════════════════════════════════════════════════════════

section("Variables and wraps");

test("assignment then access", () => {
  assert.equal(tree("${size=small}${size} cat"), 'seq($size="small", $size, " cat")');
});

test("non-overwriting and immediate assignments", () => {
  assert.equal(tree("${x?=B}"), '$x?="B"');
  assert.equal(tree("${x=!{a|b}}"), '$x=!variant(1-1 ",")[1::"a" | 1::"b"]');
});

test("access with default", () => {
  assert.equal(tree("${x:fallback}"), '$x:"fallback"');
  assert.equal(tree("${ x : a b }"), '$x:"a b"');
});

test("wrap", () => {
  assert.equal(tree("%{(...)$$cat}"), 'wrap("(...)", "cat")');
});

// ═══════════════════════════════════════════════════════════════════════════
// WILDCARDS
// ═══════════════════════════════════════════════════════════════════════════

section("Wildcards");

test("static wildcard", () => {
  assert.equal(tree("a __animals__"), 'seq("a ", wildcard(animals))');
});

test("wildcard with sampler", () => {
  assert.equal(tree("__@animals__"), "wildcard@(animals)");
});

test("dynamic wildcard name reads its own name when unbound", () => {
  assert.equal(tree("__colors/${tone}__"), 'wildcard(seq("colors/", $tone:"tone"))');
});

test("inline wildcard variables", () => {
  assert.equal(
    tree("__animals(size=big, color={red|blue})__"),
    'wildcard(animals, {size="big", color=variant(1-1 ",")[1::"red" | 1::"blue"]})'
  );
});

test("invalid inline variable name is a syntax error", () => {
  assert.throws(() => parse("__animals(1x=y)__"), PromptSyntaxError);
});

// ═══════════════════════════════════════════════════════════════════════════
// SYNTAX ERRORS
// ═══════════════════════════════════════════════════════════════════════════

section("Syntax errors");

test("unclosed variant reports the end of input", () => {
  const err = syntaxError("{a|b");
  assert.equal(err.position, 4);
  assert.equal(err.line, 1);
  assert.equal(err.column, 5);
  assert.ok(err.expected.includes('"}"'));
  assert.ok(err.message.startsWith("Syntax error at line 1, column 5: expected "));
  assert.ok(err.message.endsWith("but found end of input"));
});

test("error position on a later line", () => {
  const err = syntaxError("line one\n{a|b");
  assert.equal(err.position, 13);
  assert.equal(err.line, 2);
  assert.equal(err.column, 5);
});

test("locate counts lines and columns from one", () => {
  assert.deepEqual(locate("ab\ncd", 0), { line: 1, column: 1 });
  assert.deepEqual(locate("ab\ncd", 4), { line: 2, column: 2 });
});

// ═══════════════════════════════════════════════════════════════════════════
// GRAMMAR CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

section("Grammar configuration");

test("custom variant delimiters", () => {
  const parser = new PromptParser({ variantStart: "<", variantEnd: ">" });
  assert.equal(describeCommand(parser.parse("<a|b>")), 'variant(1-1 ",")[1::"a" | 1::"b"]');
  assert.deepEqual(parser.parse("{a|b}"), literal("{a|b}"));
});

test("invalid configuration is rejected at construction", () => {
  assert.throws(() => new PromptParser({ variantStart: "" }), ConfigurationError);
});

test("cached parsers are shared between equal configurations", () => {
  assert.equal(getCachedParser(), getCachedParser());
  const first = getCachedParser({ variantStart: "<", variantEnd: ">" });
  const second = getCachedParser({ variantStart: "<", variantEnd: ">" });
  assert.equal(first, second);
  assert.notEqual(first, getCachedParser());
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
