/**
 * Command model: the AST produced by the parser and consumed by the
 * generation engine.
 *
 * `Command` is a closed union discriminated by `type`. Every consumer
 * switches over all variants and ends with `assertNever`.
 *
 * Nodes are frozen at construction (see factory.ts) and never mutated.
 * Per-generation state lives outside the tree: variable bindings in a
 * VariableScope, cyclical positions in a CyclicalState keyed by node.
 */

import type { SamplingMethod } from "./sampling-method.js";

/** Verbatim output text. */
export interface LiteralCommand {
  readonly type: "literal";
  readonly text: string;
}

/** Children rendered in order and concatenated. */
export interface SequenceCommand {
  readonly type: "sequence";
  readonly children: readonly Command[];
}

export interface VariantOption {
  readonly value: Command;
  /** Relative weight for random draws; 0 excludes the option. */
  readonly weight: number;
}

/**
 * Picks between `minBound` and `maxBound` options and joins their
 * renderings with `separator`.
 */
export interface VariantCommand {
  readonly type: "variant";
  readonly options: readonly VariantOption[];
  readonly minBound: number;
  readonly maxBound: number;
  readonly separator: string;
  readonly samplingMethod?: SamplingMethod;
}

/**
 * Looks up a named collection through the WildcardResolver and renders
 * one of its candidates. `name` is a Command when the path embeds
 * variable access or variants.
 */
export interface WildcardCommand {
  readonly type: "wildcard";
  readonly name: string | Command;
  readonly samplingMethod?: SamplingMethod;
  /** Bound in a child scope while a candidate is rendered. */
  readonly variables: Readonly<Record<string, Command>>;
}

/** Renders `inner`, then places it at the substitution point of `wrapper`. */
export interface WrapCommand {
  readonly type: "wrap";
  readonly wrapper: Command;
  readonly inner: Command;
}

/** Includes `value` with probability `chance`. */
export interface ProbabilityCommand {
  readonly type: "probability";
  readonly chance: number;
  readonly value: Command;
  readonly samplingMethod?: SamplingMethod;
}

export interface ConditionBranch {
  /** Variable tested instead of the text generated so far. */
  readonly contextKey?: string;
  readonly pattern: string;
  readonly matcher: RegExp;
  readonly ifValue: Command;
}

/** First matching branch wins; `elseValue` when none match. */
export interface ConditionCommand {
  readonly type: "condition";
  readonly conditions: readonly ConditionBranch[];
  readonly elseValue: Command;
}

/** Documentation only. Renders nothing. */
export interface CommentCommand {
  readonly type: "comment";
  readonly text: string;
}

export interface VariableAccessCommand {
  readonly type: "variable-access";
  readonly name: string;
  readonly defaultValue?: Command;
}

export interface VariableAssignmentCommand {
  readonly type: "variable-assignment";
  readonly name: string;
  readonly value: Command;
  /** When false an existing binding wins. */
  readonly overwrite: boolean;
  /** When true `value` is rendered once, at assignment time. */
  readonly immediate: boolean;
}

export type Command =
  | LiteralCommand
  | SequenceCommand
  | VariantCommand
  | WildcardCommand
  | WrapCommand
  | ProbabilityCommand
  | ConditionCommand
  | CommentCommand
  | VariableAccessCommand
  | VariableAssignmentCommand;

export type CommandType = Command["type"];

/**
 * Exhaustiveness guard for switches over `Command["type"]`.
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}
