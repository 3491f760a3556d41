/**
 * Parse error definitions.
 *
 * This module defines the error raised when a line of tokens does not match
 * the statement grammar.
 *
 * @module
 */
import { LimeError } from "../shared/limeError.js";

export class ParseError extends LimeError {
  constructor(message: string, line?: number, col?: number) {
    super("ParseError", message, line, col);
  }
}
