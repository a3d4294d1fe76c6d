/**
 * Parse-time errors.
 */

export class PromptSyntaxError extends Error {
  constructor(
    message: string,
    /** Zero-based offset into the template */
    public readonly position: number,
    /** One-based line of `position` */
    public readonly line: number,
    /** One-based column of `position` */
    public readonly column: number,
    /** Constructs that would have been accepted at `position` */
    public readonly expected: readonly string[]
  ) {
    super(`Syntax error at line ${line}, column ${column}: ${message}`);
    this.name = "PromptSyntaxError";
  }
}

/**
 * Line and column (both one-based) of an offset.
 */
export function locate(source: string, position: number): { line: number; column: number } {
  let line = 1;
  let lineStart = 0;
  for (let i = 0; i < position && i < source.length; i++) {
    if (source[i] === "\n") {
      line++;
      lineStart = i + 1;
    }
  }
  return { line, column: position - lineStart + 1 };
}
