/**
 * Generation errors.
 */

import type { SamplingMethod } from "../commands/index.js";

export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenerationError";
  }
}

/**
 * A wildcard resolved to no candidates under the "error" policy.
 */
export class UnresolvedWildcardError extends GenerationError {
  constructor(
    public readonly wildcardName: string,
    public readonly samplingMethod: SamplingMethod
  ) {
    super(`Wildcard "${wildcardName}" has no values (sampling method: ${samplingMethod})`);
    this.name = "UnresolvedWildcardError";
  }
}

export { UnresolvedWildcardError as EmptyWildcardError };

/**
 * A variable was read that is not bound and has no default.
 */
export class UnknownVariableError extends GenerationError {
  constructor(public readonly variableName: string) {
    super(`Variable "${variableName}" is not bound and has no default`);
    this.name = "UnknownVariableError";
  }
}
