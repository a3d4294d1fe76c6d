/**
 * Command constructors.
 *
 * The parser builds every node through these functions, and library users
 * can build trees by hand with them. Each constructor validates its input,
 * applies the structural rules of the model and freezes the result:
 *
 *   - a sequence of zero children is an empty literal
 *   - a sequence of one child is that child
 *   - adjacent literals in a sequence are merged
 *   - variant bounds are clamped into [1, option count]
 *   - a wildcard whose name is a literal carries the plain string
 *   - probability chance is clamped into [0, 1]
 *   - condition patterns are compiled once, here
 */

import { CommandValidationError, InvalidBoundError } from "./errors.js";
import type { SamplingMethod } from "./sampling-method.js";
import type {
  Command,
  CommentCommand,
  ConditionBranch,
  ConditionCommand,
  LiteralCommand,
  ProbabilityCommand,
  VariableAccessCommand,
  VariableAssignmentCommand,
  VariantCommand,
  VariantOption,
  WildcardCommand,
  WrapCommand,
} from "./types.js";

export const DEFAULT_SEPARATOR = ",";

export function literal(text: string): LiteralCommand {
  return Object.freeze({ type: "literal", text });
}

export function sequence(children: readonly Command[]): Command {
  const merged: Command[] = [];
  for (const child of children) {
    const last = merged.length > 0 ? merged[merged.length - 1] : undefined;
    if (child.type === "literal" && last?.type === "literal") {
      merged[merged.length - 1] = literal(last.text + child.text);
    } else {
      merged.push(child);
    }
  }

  if (merged.length === 0) return literal("");
  if (merged.length === 1) return merged[0];
  return Object.freeze({
    type: "sequence",
    children: Object.freeze(merged),
  });
}

// ---------------------------------------------------------------------------
// Variants
// ---------------------------------------------------------------------------

export interface VariantOptionInput {
  value: Command;
  /** Defaults to 1. */
  weight?: number;
}

export interface VariantSettings {
  /** Defaults to 1. */
  minBound?: number;
  /** Defaults to `minBound` when omitted with it, else to the option count. */
  maxBound?: number;
  separator?: string;
  samplingMethod?: SamplingMethod;
}

function checkBound(value: number | undefined, label: string): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 0)) {
    throw new CommandValidationError(
      "variant",
      `Variant ${label} bound must be a non-negative integer, got: ${value}`
    );
  }
}

/**
 * Build a variant.
 *
 * With no bounds at all the variant picks exactly one option. A declared
 * lower bound above the declared upper bound is an InvalidBoundError; any
 * bound beyond the option count is clamped.
 */
export function variant(
  options: readonly VariantOptionInput[],
  settings: VariantSettings = {}
): VariantCommand {
  const frozenOptions: VariantOption[] = options.map((option) => {
    const weight = option.weight ?? 1;
    if (!Number.isFinite(weight) || weight < 0) {
      throw new CommandValidationError(
        "variant",
        `Variant option weight must be a finite non-negative number, got: ${weight}`
      );
    }
    return Object.freeze({ value: option.value, weight });
  });

  checkBound(settings.minBound, "lower");
  checkBound(settings.maxBound, "upper");

  const declaredMin = settings.minBound ?? 1;
  const declaredMax =
    settings.maxBound ??
    (settings.minBound === undefined ? 1 : frozenOptions.length);

  if (settings.maxBound !== undefined && declaredMin > declaredMax) {
    throw new InvalidBoundError(declaredMin, declaredMax);
  }

  const count = frozenOptions.length;
  const minBound = Math.min(Math.max(declaredMin, 1), count);
  const maxBound = Math.min(Math.max(declaredMax, minBound), count);

  return Object.freeze({
    type: "variant",
    options: Object.freeze(frozenOptions),
    minBound,
    maxBound,
    separator: settings.separator ?? DEFAULT_SEPARATOR,
    ...(settings.samplingMethod ? { samplingMethod: settings.samplingMethod } : {}),
  });
}

// ---------------------------------------------------------------------------
// Wildcards
// ---------------------------------------------------------------------------

export interface WildcardSettings {
  samplingMethod?: SamplingMethod;
  variables?: Readonly<Record<string, Command>>;
}

export function wildcard(
  name: string | Command,
  settings: WildcardSettings = {}
): WildcardCommand {
  const resolvedName =
    typeof name !== "string" && name.type === "literal" ? name.text : name;

  if (resolvedName === "") {
    throw new CommandValidationError("wildcard", "Wildcard name must not be empty");
  }

  return Object.freeze({
    type: "wildcard",
    name: resolvedName,
    variables: Object.freeze({ ...settings.variables }),
    ...(settings.samplingMethod ? { samplingMethod: settings.samplingMethod } : {}),
  });
}

export function wrap(wrapper: Command, inner: Command): WrapCommand {
  return Object.freeze({ type: "wrap", wrapper, inner });
}

export function probability(
  chance: number,
  value: Command,
  samplingMethod?: SamplingMethod
): ProbabilityCommand {
  if (Number.isNaN(chance)) {
    throw new CommandValidationError("probability", "Probability chance must be a number");
  }
  return Object.freeze({
    type: "probability",
    chance: Math.min(Math.max(chance, 0), 1),
    value,
    ...(samplingMethod ? { samplingMethod } : {}),
  });
}

// ---------------------------------------------------------------------------
// Conditions
// ---------------------------------------------------------------------------

export interface ConditionBranchInput {
  contextKey?: string;
  pattern: string;
  ifValue: Command;
}

function compilePattern(pattern: string): RegExp {
  try {
    return new RegExp(pattern);
  } catch (err) {
    throw new CommandValidationError(
      "condition",
      `Invalid condition pattern "${pattern}": ${err instanceof Error ? err.message : String(err)}`
    );
  }
}

export function condition(
  branches: readonly ConditionBranchInput[],
  elseValue: Command = literal("")
): ConditionCommand {
  if (branches.length === 0) {
    throw new CommandValidationError("condition", "A condition needs at least one branch");
  }

  const conditions: ConditionBranch[] = branches.map((branch) =>
    Object.freeze({
      ...(branch.contextKey !== undefined ? { contextKey: branch.contextKey } : {}),
      pattern: branch.pattern,
      matcher: compilePattern(branch.pattern),
      ifValue: branch.ifValue,
    })
  );

  return Object.freeze({
    type: "condition",
    conditions: Object.freeze(conditions),
    elseValue,
  });
}

export function comment(text: string): CommentCommand {
  return Object.freeze({ type: "comment", text });
}

// ---------------------------------------------------------------------------
// Variables
// ---------------------------------------------------------------------------

const VARIABLE_NAME_RE = /^[A-Za-z_-][A-Za-z0-9_-]*$/;

function checkVariableName(name: string, commandType: string): void {
  if (!VARIABLE_NAME_RE.test(name)) {
    throw new CommandValidationError(commandType, `Invalid variable name: "${name}"`);
  }
}

export function variableAccess(
  name: string,
  defaultValue?: Command
): VariableAccessCommand {
  checkVariableName(name, "variable-access");
  return Object.freeze({
    type: "variable-access",
    name,
    ...(defaultValue ? { defaultValue } : {}),
  });
}

export interface AssignmentSettings {
  /** Defaults to true. */
  overwrite?: boolean;
  /** Defaults to false. */
  immediate?: boolean;
}

export function variableAssignment(
  name: string,
  value: Command,
  settings: AssignmentSettings = {}
): VariableAssignmentCommand {
  checkVariableName(name, "variable-assignment");
  return Object.freeze({
    type: "variable-assignment",
    name,
    value,
    overwrite: settings.overwrite ?? true,
    immediate: settings.immediate ?? false,
  });
}
