/**
 * Base error type shared by every stage of the interpreter.
 *
 * @module
 */

export type LimeErrorKind =
  | "LexError"
  | "ParseError"
  | "UnboundIdentifier"
  | "NotCallable"
  | "TypeError"
  | "DivisionByZero"
  | "IndexOutOfRange"
  | "NumberParseError"
  | "RecursionLimitExceeded";

export class LimeError extends Error {
  line: number | undefined;
  col: number | undefined;

  constructor(
    public readonly kind: LimeErrorKind,
    message: string,
    line?: number,
    col?: number,
  ) {
    super(message);
    this.name = kind;
    this.line = line;
    this.col = col;
  }

  /**
   * Records the line of the statement that raised this error, unless a more
   * precise location is already known.
   */
  atLine(line: number): this {
    if (this.line === undefined) {
      this.line = line;
    }
    return this;
  }

  describe(): string {
    if (this.line === undefined) {
      return `${this.kind}: ${this.message}`;
    }
    const col = this.col === undefined ? "" : `, col ${this.col}`;
    return `${this.kind}: ${this.message} (line ${this.line}${col})`;
  }
}
