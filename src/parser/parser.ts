/**
 * Prompt template parser.
 *
 * A recursive descent parser that turns a template string into a Command
 * tree. Grammar (delimiters shown with their default values):
 *
 *   prompt      = chunk* ;
 *   chunk       = comment | probability | condition | assignment
 *               | access | wrap | variant | wildcard | text ;
 *   comment     = "{" "*" text "*" "}" ;
 *   probability = "{" real "::" chunk* "}" ;
 *   condition   = "{" pattern "::" chunk* { "|" pattern "::" chunk* }
 *                 [ "|" chunk* ] "}" ;
 *   assignment  = "${" name [ "?" ] "=" [ "!" ] chunk* "}" ;
 *   access      = "${" name [ ":" chunk* ] "}" ;
 *   wrap        = "%{" chunk* "$$" chunk* "}" ;
 *   variant     = "{" [ sampler ] [ bound "$$" [ separator "$$" ] ]
 *                 option { "|" option } "}" ;
 *   option      = [ real "::" ] chunk* ;
 *   wildcard    = "__" [ sampler ] path [ "(" bindings ")" ] "__" ;
 *   sampler     = "~" | "!" | "@" ;
 *   bound       = int | int "-" int | int "-" | "-" int ;
 *
 * Every block opened by the variant delimiter is tried in the fixed order
 * comment, probability, condition, variant. Probability only accepts a
 * number before "::" and condition only accepts a pattern that is NOT a
 * number, so the order decides which of the four a block becomes. Changing
 * it changes which programs are accepted.
 *
 * Alternatives backtrack. The furthest position any alternative reached is
 * remembered together with what it expected there; when the template
 * cannot be consumed entirely, that position is reported.
 */

import {
  CommandValidationError,
  comment,
  condition,
  literal,
  probability,
  sequence,
  variableAccess,
  variableAssignment,
  variant,
  wildcard,
  wrap,
  SAMPLER_SYMBOLS,
  type Command,
  type ConditionBranchInput,
  type SamplingMethod,
  type VariantOptionInput,
  type VariantSettings,
} from "../commands/index.js";
import { loadGrammarConfig, type GrammarConfig } from "../config/grammar/index.js";
import { PromptSyntaxError, locate } from "./errors.js";

/**
 * Where a run of literal text appears. Inside blocks, "|", "$$", "::" and
 * the closing delimiters end the text; inside wildcard paths parentheses
 * do too.
 */
type TextContext = "prompt" | "block" | "path";

const VARIABLE_NAME_RE = /[A-Za-z_-][A-Za-z0-9_-]*/y;
const REAL_RE = /\d+\.\d+|\d+\.|\.\d+|\d+/y;
const INTEGER_RE = /\d+/y;
const WILDCARD_BINDINGS_RE = /[^)]+/y;

/** Anything a float parser would accept; such patterns belong to probability. */
const NUMBER_LIKE_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$|^[+-]?(?:inf|infinity|nan)$/i;
const CONTEXT_KEY_RE = /^([A-Za-z_-][A-Za-z0-9_-]*)\s*~=\s*([\s\S]*)$/;
const WHITESPACE_RE = /\s/;
const ALPHANUMERIC_RE = /^[\p{L}\p{N}]+$/u;
const WORD_CHAR_RE = /[\p{L}\p{N}]/u;

function escapeCharClass(chars: string): string {
  return chars.replace(/[\\\]^-]/g, "\\$&");
}

/**
 * Drop trailing whitespace of the last literal; used for block operands,
 * where whitespace before "|", "$$" or a closing delimiter is layout.
 */
function trimTrailingWhitespace(command: Command): Command {
  if (command.type === "literal") {
    return literal(command.text.trimEnd());
  }
  if (command.type !== "sequence") {
    return command;
  }
  const children = [...command.children];
  const last = children[children.length - 1];
  if (last.type !== "literal") {
    return command;
  }
  const trimmed = last.text.trimEnd();
  if (trimmed === "") {
    children.pop();
  } else {
    children[children.length - 1] = literal(trimmed);
  }
  return sequence(children);
}

/**
 * Separators made only of punctuation lose their padding (` , ` joins as
 * `,`); separators containing words keep it (` and `).
 */
function normalizeSeparator(raw: string): string {
  const trimmed = raw.trim();
  return trimmed !== "" && !WORD_CHAR_RE.test(trimmed) ? trimmed : raw;
}

function splitContextKey(pattern: string): { contextKey?: string; pattern: string } {
  const match = CONTEXT_KEY_RE.exec(pattern);
  return match ? { contextKey: match[1], pattern: match[2] } : { pattern };
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/**
 * A parser compiled for one grammar configuration. Construction validates
 * the configuration; prefer `getCachedParser` over building parsers
 * directly.
 */
export class PromptParser {
  readonly config: Readonly<GrammarConfig>;
  /** Delimiters that start a directive anywhere. */
  readonly openers: readonly string[];
  /** Delimiters that end a block. */
  readonly closers: readonly string[];
  readonly separatorPattern: RegExp;

  /**
   * @throws ConfigurationError if the configuration is invalid
   */
  constructor(config?: Partial<GrammarConfig>) {
    this.config = loadGrammarConfig(config);
    const { variantStart, variantEnd, variableStart, variableEnd, wrapStart, wrapEnd, wildcardWrap } =
      this.config;
    this.openers = [variantStart, variableStart, wrapStart, wildcardWrap];
    this.closers = [...new Set([variantEnd, variableEnd, wrapEnd])];
    this.separatorPattern = new RegExp(
      `[^${escapeCharClass("$" + variantStart + variantEnd)}]+`,
      "y"
    );
  }

  /**
   * Parse a template into a single root command.
   *
   * @throws PromptSyntaxError if the template does not match the grammar
   * @throws InvalidBoundError if a variant bound is inverted
   */
  parse(source: string): Command {
    if (ALPHANUMERIC_RE.test(source) && !this.openers.some((opener) => source.includes(opener))) {
      return literal(source);
    }
    return new ParseRun(this, source).run();
  }
}

/**
 * State of a single parse. Kept apart from PromptParser so that parsing
 * wildcard variable values can start a nested run.
 */
class ParseRun {
  private pos = 0;
  private furthest = 0;
  private expected = new Set<string>();
  private readonly config: Readonly<GrammarConfig>;

  constructor(
    private readonly parser: PromptParser,
    private readonly source: string
  ) {
    this.config = parser.config;
  }

  run(): Command {
    const root = this.parsePrompt("prompt");
    this.skipComments();
    if (this.pos < this.source.length) {
      throw this.syntaxError();
    }
    return root;
  }

  // -------------------------------------------------------------------------
  // Low-level helpers
  // -------------------------------------------------------------------------

  private at(token: string): boolean {
    return this.source.startsWith(token, this.pos);
  }

  /** Consume `token` if present, without recording a failure. */
  private tryAccept(token: string): boolean {
    if (!this.at(token)) return false;
    this.pos += token.length;
    return true;
  }

  /** Consume a required `token`, recording it as expected when absent. */
  private accept(token: string): boolean {
    if (this.tryAccept(token)) return true;
    this.expect(JSON.stringify(token));
    return false;
  }

  private expect(description: string): void {
    if (this.pos > this.furthest) {
      this.furthest = this.pos;
      this.expected = new Set([description]);
    } else if (this.pos === this.furthest) {
      this.expected.add(description);
    }
  }

  private match(pattern: RegExp): string | null {
    pattern.lastIndex = this.pos;
    const result = pattern.exec(this.source);
    if (result === null) return null;
    this.pos += result[0].length;
    return result[0];
  }

  private skipWhitespace(): void {
    while (this.pos < this.source.length && WHITESPACE_RE.test(this.source[this.pos])) {
      this.pos++;
    }
  }

  /** Run `production`, restoring the position when it fails. */
  private attempt<T>(production: () => T | null): T | null {
    const start = this.pos;
    const result = production();
    if (result === null) {
      this.pos = start;
    }
    return result;
  }

  private atLineComment(): boolean {
    return (
      this.source[this.pos] === "#" ||
      (this.at("//") && this.source[this.pos - 1] !== ":")
    );
  }

  private atBlockComment(): boolean {
    return this.at("/*") && this.source.indexOf("*/", this.pos + 2) !== -1;
  }

  /** Skip `#`, `//` and block comments. Returns whether any were skipped. */
  private skipComments(): boolean {
    const start = this.pos;
    for (;;) {
      if (this.atLineComment()) {
        const newline = this.source.indexOf("\n", this.pos);
        this.pos = newline === -1 ? this.source.length : newline;
      } else if (this.atBlockComment()) {
        this.pos = this.source.indexOf("*/", this.pos + 2) + 2;
      } else {
        break;
      }
    }
    return this.pos > start;
  }

  private errorAt(position: number, message: string, expected: readonly string[]): PromptSyntaxError {
    const { line, column } = locate(this.source, position);
    return new PromptSyntaxError(message, position, line, column, expected);
  }

  private syntaxError(): PromptSyntaxError {
    const position = Math.max(this.furthest, this.pos);
    const expected = position === this.furthest ? [...this.expected] : [];
    const found =
      position < this.source.length ? JSON.stringify(this.source[position]) : "end of input";
    const message =
      expected.length > 0
        ? `expected ${expected.join(" or ")} but found ${found}`
        : `unexpected ${found}`;
    return this.errorAt(position, message, expected);
  }

  // -------------------------------------------------------------------------
  // Sequences and text
  // -------------------------------------------------------------------------

  private parsePrompt(context: TextContext): Command {
    const children: Command[] = [];
    for (;;) {
      if (context !== "path") {
        this.skipComments();
      }
      const chunk = this.parseChunk(context);
      if (chunk === null) break;
      children.push(chunk);
    }
    return sequence(children);
  }

  private parseChunk(context: TextContext): Command | null {
    if (context === "path") {
      return this.parseVariableAccess(true) ?? this.parseVariant() ?? this.parseText(context);
    }
    return (
      this.parseComment() ??
      this.parseProbability() ??
      this.parseCondition() ??
      this.parseVariableAssignment() ??
      this.parseVariableAccess(false) ??
      this.parseWrap() ??
      this.parseVariant() ??
      this.parseWildcard() ??
      this.parseText(context)
    );
  }

  private atTextStop(context: TextContext): boolean {
    if (this.atLineComment() || this.atBlockComment()) return true;
    if (this.parser.openers.some((opener) => this.at(opener))) return true;
    if (context === "prompt") return false;

    const ch = this.source[this.pos];
    if (ch === "|" || this.at("$$") || this.at("::")) return true;
    if (this.parser.closers.some((closer) => this.at(closer))) return true;
    return context === "path" && (ch === "(" || ch === ")");
  }

  /**
   * A run of literal text. Runs separated only by a skipped comment are
   * joined with a single space.
   */
  private parseText(context: TextContext): Command | null {
    const parts: string[] = [];
    for (;;) {
      const start = this.pos;
      while (this.pos < this.source.length && !this.atTextStop(context)) {
        this.pos++;
      }
      if (this.pos === start) break;
      parts.push(this.source.slice(start, this.pos));
      if (context === "path" || !this.skipComments()) break;
    }
    if (parts.length === 0) {
      this.expect("text");
      return null;
    }
    return literal(parts.join(" "));
  }

  /** Operand of a block: leading and trailing layout whitespace dropped. */
  private parseOperand(): Command {
    this.skipWhitespace();
    return trimTrailingWhitespace(this.parsePrompt("block"));
  }

  private parseSampler(): SamplingMethod | undefined {
    const method = SAMPLER_SYMBOLS[this.source[this.pos]];
    if (method !== undefined) {
      this.pos++;
    }
    return method;
  }

  private parseVariableName(): string | null {
    const name = this.match(VARIABLE_NAME_RE);
    if (name === null) {
      this.expect("variable name");
    }
    return name;
  }

  // -------------------------------------------------------------------------
  // Blocks opened by the variant delimiter
  // -------------------------------------------------------------------------

  private parseComment(): Command | null {
    return this.attempt(() => {
      const { variantStart, variantEnd } = this.config;
      if (!this.accept(variantStart)) return null;
      this.skipWhitespace();
      if (!this.tryAccept("*")) return null;

      const start = this.pos;
      while (
        this.pos < this.source.length &&
        this.source[this.pos] !== "*" &&
        !this.at(variantStart) &&
        !this.at(variantEnd)
      ) {
        this.pos++;
      }
      const text = this.source.slice(start, this.pos);

      if (!this.accept("*")) return null;
      this.skipWhitespace();
      if (!this.accept(variantEnd)) return null;
      return comment(text);
    });
  }

  private parseProbability(): Command | null {
    return this.attempt(() => {
      if (!this.accept(this.config.variantStart)) return null;
      this.skipWhitespace();
      const chance = this.match(REAL_RE);
      if (chance === null) {
        this.expect("number");
        return null;
      }
      if (!this.accept("::")) return null;
      const value = this.parseOperand();
      this.skipWhitespace();
      if (!this.accept(this.config.variantEnd)) return null;
      return probability(Number(chance), value);
    });
  }

  /**
   * Text up to the next "::", trimmed. Fails on block delimiters, on "|",
   * and when the text reads as a number (that form is a probability).
   */
  private parsePattern(): string | null {
    const { variantStart, variantEnd } = this.config;
    const start = this.pos;
    while (this.pos < this.source.length && !this.at("::")) {
      if (this.at(variantStart) || this.at(variantEnd) || this.source[this.pos] === "|") {
        return null;
      }
      this.pos++;
    }
    if (!this.accept("::")) return null;
    const pattern = this.source.slice(start, this.pos - 2).trim();
    if (pattern === "" || NUMBER_LIKE_RE.test(pattern)) {
      return null;
    }
    return pattern;
  }

  private parseCondition(): Command | null {
    return this.attempt(() => {
      if (!this.accept(this.config.variantStart)) return null;
      const patternStart = this.pos;
      const first = this.parsePattern();
      if (first === null) return null;

      const branches: ConditionBranchInput[] = [
        { ...splitContextKey(first), ifValue: this.parseOperand() },
      ];
      let elseValue: Command = literal("");

      while (this.tryAccept("|")) {
        const elseIf = this.attempt<ConditionBranchInput>(() => {
          this.skipWhitespace();
          const pattern = this.parsePattern();
          if (pattern === null) return null;
          return { ...splitContextKey(pattern), ifValue: this.parseOperand() };
        });
        if (elseIf === null) {
          elseValue = this.parseOperand();
          break;
        }
        branches.push(elseIf);
      }

      this.skipWhitespace();
      if (!this.accept(this.config.variantEnd)) return null;

      try {
        return condition(branches, elseValue);
      } catch (err) {
        if (err instanceof CommandValidationError) {
          throw this.errorAt(patternStart, err.message, ["regular expression"]);
        }
        throw err;
      }
    });
  }

  private parseBound(): VariantSettings | null {
    let minBound: number | undefined;
    let maxBound: number | undefined;

    const start = this.pos;
    const lower = this.match(INTEGER_RE);
    if (this.tryAccept("-")) {
      const upper = this.match(INTEGER_RE);
      if (lower === null && upper === null) return null;
      minBound = lower === null ? undefined : Number(lower);
      maxBound = upper === null ? undefined : Number(upper);
    } else {
      if (lower === null) return null;
      minBound = maxBound = Number(lower);
    }

    if (!this.accept("$$")) return null;
    for (const bound of [minBound, maxBound]) {
      if (bound !== undefined && !Number.isSafeInteger(bound)) {
        throw this.errorAt(start, "variant bound is too large", ["bound"]);
      }
    }

    const separator = this.attempt(() => {
      const text = this.match(this.parser.separatorPattern);
      if (text === null || !this.accept("$$")) return null;
      return text;
    });

    return {
      ...(minBound !== undefined ? { minBound } : {}),
      ...(maxBound !== undefined ? { maxBound } : {}),
      ...(separator !== null ? { separator: normalizeSeparator(separator) } : {}),
    };
  }

  private parseVariantOption(): VariantOptionInput {
    this.skipWhitespace();
    const start = this.pos;
    const weight = this.attempt(() => {
      const text = this.match(REAL_RE);
      if (text === null || !this.tryAccept("::")) return null;
      const value = Number(text);
      if (!Number.isFinite(value)) {
        throw this.errorAt(start, "option weight is too large", ["weight"]);
      }
      return value;
    });
    const value = this.parseOperand();
    return weight === null ? { value } : { value, weight };
  }

  private parseVariant(): Command | null {
    return this.attempt(() => {
      if (!this.accept(this.config.variantStart)) return null;
      this.skipWhitespace();
      const samplingMethod = this.parseSampler();
      const bound = this.attempt(() => this.parseBound()) ?? {};

      const options: VariantOptionInput[] = [this.parseVariantOption()];
      while (this.tryAccept("|")) {
        options.push(this.parseVariantOption());
      }

      this.skipWhitespace();
      if (!this.accept(this.config.variantEnd)) {
        this.expect(JSON.stringify("|"));
        return null;
      }
      return variant(options, { ...bound, ...(samplingMethod ? { samplingMethod } : {}) });
    });
  }

  // -------------------------------------------------------------------------
  // Variables and wraps
  // -------------------------------------------------------------------------

  private parseVariableAssignment(): Command | null {
    return this.attempt(() => {
      if (!this.accept(this.config.variableStart)) return null;
      this.skipWhitespace();
      const name = this.parseVariableName();
      if (name === null) return null;
      this.skipWhitespace();
      const preserve = this.tryAccept("?");
      if (!this.accept("=")) return null;
      const immediate = this.tryAccept("!");
      const value = this.parseOperand();
      this.skipWhitespace();
      if (!this.accept(this.config.variableEnd)) return null;
      return variableAssignment(name, value, { overwrite: !preserve, immediate });
    });
  }

  /**
   * Variable access. Inside a wildcard path an unbound variable without a
   * default stands for its own name.
   */
  private parseVariableAccess(inPath: boolean): Command | null {
    return this.attempt(() => {
      if (!this.accept(this.config.variableStart)) return null;
      this.skipWhitespace();
      const name = this.parseVariableName();
      if (name === null) return null;
      this.skipWhitespace();
      let defaultValue = this.tryAccept(":") ? this.parseOperand() : undefined;
      this.skipWhitespace();
      if (!this.accept(this.config.variableEnd)) return null;
      if (inPath && defaultValue === undefined) {
        defaultValue = literal(name);
      }
      return variableAccess(name, defaultValue);
    });
  }

  private parseWrap(): Command | null {
    return this.attempt(() => {
      if (!this.accept(this.config.wrapStart)) return null;
      const wrapper = this.parseOperand();
      this.skipWhitespace();
      if (!this.accept("$$")) return null;
      const inner = this.parseOperand();
      this.skipWhitespace();
      if (!this.accept(this.config.wrapEnd)) return null;
      return wrap(wrapper, inner);
    });
  }

  // -------------------------------------------------------------------------
  // Wildcards
  // -------------------------------------------------------------------------

  private parseWildcard(): Command | null {
    return this.attempt(() => {
      const { wildcardWrap } = this.config;
      if (!this.accept(wildcardWrap)) return null;
      const samplingMethod = this.parseSampler();

      const path: Command[] = [];
      for (let chunk = this.parseChunk("path"); chunk !== null; chunk = this.parseChunk("path")) {
        path.push(chunk);
      }
      if (path.length === 0) {
        this.expect("wildcard name");
        return null;
      }

      const bindingsStart = this.pos;
      const bindings = this.attempt(() => {
        this.skipWhitespace();
        if (!this.accept("(")) return null;
        const text = this.match(WILDCARD_BINDINGS_RE);
        if (text === null || !this.accept(")")) return null;
        return text;
      });

      if (!this.accept(wildcardWrap)) return null;

      return wildcard(sequence(path), {
        ...(samplingMethod ? { samplingMethod } : {}),
        variables: bindings === null ? {} : this.parseWildcardBindings(bindings, bindingsStart),
      });
    });
  }

  /**
   * `name=value, other=value` → name → parsed value. Pairs are split on
   * commas, then on the first "=".
   */
  private parseWildcardBindings(source: string, position: number): Record<string, Command> {
    const variables: Record<string, Command> = {};
    for (const pair of source.split(",")) {
      const eq = pair.indexOf("=");
      const name = (eq === -1 ? pair : pair.slice(0, eq)).trim();
      const value = eq === -1 ? "" : pair.slice(eq + 1).trim();

      VARIABLE_NAME_RE.lastIndex = 0;
      const valid = VARIABLE_NAME_RE.exec(name);
      if (valid === null || valid[0] !== name) {
        throw this.errorAt(position, `invalid wildcard variable name "${name}"`, ["variable name"]);
      }
      variables[name] = this.parser.parse(value);
    }
    return variables;
  }
}
