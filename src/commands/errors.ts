/**
 * Construction-time errors for command nodes.
 */

export class CommandValidationError extends Error {
  constructor(
    public readonly commandType: string,
    message: string
  ) {
    super(message);
    this.name = "CommandValidationError";
  }
}

/**
 * A variant bound whose lower end exceeds its declared upper end,
 * e.g. `{3-1$$a|b|c}`.
 */
export class InvalidBoundError extends CommandValidationError {
  constructor(
    public readonly minBound: number,
    public readonly maxBound: number
  ) {
    super(
      "variant",
      `Invalid variant bound ${minBound}-${maxBound}: lower bound is greater than upper bound`
    );
    this.name = "InvalidBoundError";
  }
}
