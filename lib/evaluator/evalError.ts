/**
 * Runtime error definitions.
 *
 * @module
 */
import { LimeError, type LimeErrorKind } from "../shared/limeError.js";

export type EvalErrorKind = Exclude<LimeErrorKind, "LexError" | "ParseError">;

export class EvalError extends LimeError {
  declare readonly kind: EvalErrorKind;

  constructor(kind: EvalErrorKind, message: string) {
    super(kind, message);
  }
}
