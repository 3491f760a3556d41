/**
 * Lexer error definitions.
 *
 * @module
 */
import { LimeError } from "../shared/limeError.js";

export class LexError extends LimeError {
  constructor(message: string, line?: number, col?: number) {
    super("LexError", message, line, col);
  }
}
