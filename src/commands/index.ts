/**
 * Command model: node types, constructors and the pretty-printer.
 */

export type {
  Command,
  CommandType,
  LiteralCommand,
  SequenceCommand,
  VariantCommand,
  VariantOption,
  WildcardCommand,
  WrapCommand,
  ProbabilityCommand,
  ConditionBranch,
  ConditionCommand,
  CommentCommand,
  VariableAccessCommand,
  VariableAssignmentCommand,
} from "./types.js";
export { assertNever } from "./types.js";

export {
  literal,
  sequence,
  variant,
  wildcard,
  wrap,
  probability,
  condition,
  comment,
  variableAccess,
  variableAssignment,
  DEFAULT_SEPARATOR,
  type VariantOptionInput,
  type VariantSettings,
  type WildcardSettings,
  type ConditionBranchInput,
  type AssignmentSettings,
} from "./factory.js";

export { CommandValidationError, InvalidBoundError } from "./errors.js";
export { SamplingMethod, SAMPLER_SYMBOLS, samplerSymbol } from "./sampling-method.js";
export { describeCommand } from "./describe.js";
