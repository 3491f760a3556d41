/**
 * Lime: lexing, parsing and lazy evaluation of a small curried lambda
 * language.
 *
 * This module re-exports the public API:
 * - the lexer and its tokens
 * - the statement parser and the expression tree
 * - the call-by-need evaluator, its values, thunks and environments
 * - the line-by-line interpreter
 *
 * @example
 * ```ts
 * import { Interpreter } from "lime-lang";
 * const interp = new Interpreter();
 * interp.run("fact_rec := \\f.\\n.= n 1 n (* n (f f (- n 1)))\nfact_rec fact_rec 5");
 * // prints 120
 * ```
 *
 * @module
 */

// Lexer exports
export { lex, tokenize } from "./lexer/lexer.js";
export { LexError } from "./lexer/lexError.js";
export { describeToken, type Token, type TokenKind } from "./lexer/token.js";

// Parser exports
/** Parses the tokens of one line into a binding, an expression or nothing. */
export { parseSource, parseStatement } from "./parser/statement.js";
export { ParseError } from "./parser/parseError.js";

// Expression exports
export {
  apply,
  type Binding,
  type Expression,
  mkBinding,
  mkLambda,
  mkList,
  mkNone,
  mkNum,
  mkStr,
  mkVar,
  /** Generates a fully parenthesized rendering of an expression. */
  prettyPrint,
  type Statement,
} from "./terms/expression.js";

// Evaluator exports
export { BUILTINS, createGlobalEnvironment } from "./evaluator/builtins.js";
export { Environment } from "./evaluator/environment.js";
export { EvalError, type EvalErrorKind } from "./evaluator/evalError.js";
export { Evaluator, type EvaluatorOptions } from "./evaluator/evaluator.js";
export { Thunk } from "./evaluator/thunk.js";
export {
  type Builtin,
  type Closure,
  display,
  type TypeName,
  typeName,
  type Value,
  valuesEqual,
} from "./evaluator/values.js";

// Interpreter exports
export {
  Interpreter,
  type InterpreterOptions,
  type RunResult,
} from "./interpreter.js";
export type { LineReader, LineWriter } from "./io/lineIo.js";
export { LimeError, type LimeErrorKind } from "./shared/limeError.js";
export { VERSION } from "./shared/version.js";
