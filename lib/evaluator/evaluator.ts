/**
 * Call-by-need evaluator.
 *
 * Arguments are never evaluated at the call site: each application wraps its
 * argument in a {@link Thunk} over the caller's environment, and the thunk is
 * forced only when a builtin or an identifier lookup needs its value.
 *
 * @module
 */
import type { LineReader, LineWriter } from "../io/lineIo.js";
import { stdinLineReader, stdoutLineWriter } from "../io/lineIo.js";
import type { Binding, Expression } from "../terms/expression.js";
import type { Environment } from "./environment.js";
import { EvalError } from "./evalError.js";
import { Thunk } from "./thunk.js";
import {
  mkClosure,
  mkListValue,
  mkNumber,
  mkString,
  NONE,
  typeName,
  type Value,
} from "./values.js";

export interface EvaluatorOptions {
  /** Source of lines for `get`. Defaults to standard input. */
  input?: LineReader;
  /** Sink for `print`. Defaults to standard output. */
  output?: LineWriter;
  /** Maximum nesting of evaluations before failing; unlimited by default. */
  maxDepth?: number;
}

export class Evaluator {
  readonly input: LineReader;
  readonly output: LineWriter;
  readonly maxDepth: number | undefined;
  private depth = 0;

  constructor(options: EvaluatorOptions = {}) {
    this.input = options.input ?? stdinLineReader();
    this.output = options.output ?? stdoutLineWriter();
    this.maxDepth = options.maxDepth;
  }

  /**
   * Evaluates `expr` in `env` to a value.
   *
   * @throws EvalError on an unbound name, a call of a non-function, a failing
   *   builtin or when `maxDepth` is exceeded
   */
  evaluate(expr: Expression, env: Environment): Value {
    if (this.maxDepth !== undefined && this.depth >= this.maxDepth) {
      throw new EvalError(
        "RecursionLimitExceeded",
        `maximum recursion depth of ${this.maxDepth} exceeded`,
      );
    }
    this.depth++;
    try {
      return this.evaluateNode(expr, env);
    } finally {
      this.depth--;
    }
  }

  private evaluateNode(expr: Expression, env: Environment): Value {
    switch (expr.kind) {
      case "number":
        return mkNumber(expr.value);
      case "string":
        return mkString(expr.value);
      case "none":
        return NONE;
      case "list":
        return mkListValue(expr.elements.map((el) => this.evaluate(el, env)));
      case "identifier": {
        const thunk = env.lookup(expr.name);
        if (thunk === undefined) {
          throw new EvalError(
            "UnboundIdentifier",
            `\`${expr.name}\` is not defined`,
          );
        }
        return this.force(thunk);
      }
      case "lambda":
        return mkClosure(expr.param, expr.body, env);
      case "application":
        return this.apply(
          this.evaluate(expr.fn, env),
          Thunk.delay(expr.arg, env),
        );
    }
  }

  /**
   * Applies a function value to one suspended argument.
   *
   * @throws EvalError NotCallable when `fn` is not a closure or builtin
   */
  apply(fn: Value, arg: Thunk): Value {
    switch (fn.kind) {
      case "closure":
        return this.evaluate(fn.body, fn.env.extend(fn.param, arg));
      case "builtin": {
        const args = [...fn.args, arg];
        if (args.length < fn.arity) {
          return { ...fn, args };
        }
        return fn.impl(args, this);
      }
      default:
        throw new EvalError(
          "NotCallable",
          `unable to call a value of type ${typeName(fn)}`,
        );
    }
  }

  force(thunk: Thunk): Value {
    return thunk.force(this);
  }

  /**
   * Stores an unforced thunk for `binding` in `globals`, replacing any
   * earlier binding of the same name. The expression sees `globals` itself,
   * so it may refer to names bound later; on a rebinding its own name still
   * refers to the previous binding.
   */
  define(binding: Binding, globals: Environment): void {
    const previous = globals.lookup(binding.name);
    const scope = previous === undefined
      ? globals
      : globals.extend(binding.name, previous);
    globals.define(binding.name, Thunk.delay(binding.expr, scope));
  }
}
