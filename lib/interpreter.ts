/**
 * Line-by-line driver.
 *
 * An {@link Interpreter} owns one top-level environment and runs source text
 * against it one line at a time: bindings are stored unforced, and the value
 * of every expression statement is written to the output.
 *
 * @example
 * ```ts
 * const interp = new Interpreter();
 * interp.run(["sq := \\x.* x x", "sq 7"].join("\n")); // prints 49
 * ```
 *
 * @module
 */
import type { Environment } from "./evaluator/environment.js";
import { createGlobalEnvironment } from "./evaluator/builtins.js";
import { EvalError } from "./evaluator/evalError.js";
import { Evaluator, type EvaluatorOptions } from "./evaluator/evaluator.js";
import { display, type Value } from "./evaluator/values.js";
import { parseSource } from "./parser/statement.js";
import { LimeError } from "./shared/limeError.js";

export interface InterpreterOptions extends EvaluatorOptions {
  /** Keep running after a failing statement instead of stopping. */
  continueOnError?: boolean;
  /** Write diagnostics to standard error. */
  verbose?: boolean;
  /** Called with each error as it is raised during {@link Interpreter.run}. */
  onError?: (error: LimeError) => void;
}

export interface RunResult {
  /** Statements executed without error. */
  executed: number;
  errors: LimeError[];
}

const STACK_OVERFLOW = /call stack/i;

export class Interpreter {
  readonly globals: Environment;
  readonly evaluator: Evaluator;
  private readonly continueOnError: boolean;
  private readonly verbose: boolean;
  private readonly onError: ((error: LimeError) => void) | undefined;

  constructor(options: InterpreterOptions = {}) {
    this.globals = createGlobalEnvironment();
    this.evaluator = new Evaluator(options);
    this.continueOnError = options.continueOnError ?? false;
    this.verbose = options.verbose ?? false;
    this.onError = options.onError;
  }

  /**
   * Runs a single line.
   *
   * @param line the line number reported in errors
   * @returns the value of an expression statement (after writing it), or
   *   undefined for a binding or an empty line
   * @throws LimeError stamped with `line`
   */
  execute(source: string, line = 1): Value | undefined {
    try {
      const statement = parseSource(source, line);
      if (statement === null) {
        return undefined;
      }
      if (statement.kind === "binding") {
        this.evaluator.define(statement, this.globals);
        if (this.verbose) {
          console.error(`[DEBUG] line ${line}: bound \`${statement.name}\``);
        }
        return undefined;
      }
      const value = this.evaluator.evaluate(statement, this.globals);
      this.evaluator.output.writeLine(display(value));
      return value;
    } catch (e) {
      throw toLimeError(e, line);
    }
  }

  /**
   * Runs every line of `source` in order. Stops at the first error unless
   * `continueOnError` is set.
   */
  run(source: string): RunResult {
    const lines = source.split(/\r?\n/);
    const errors: LimeError[] = [];
    let executed = 0;

    if (this.verbose) {
      console.error(`[DEBUG] running ${lines.length} lines`);
    }

    for (const [i, text] of lines.entries()) {
      try {
        this.execute(text, i + 1);
        executed++;
      } catch (e) {
        if (!(e instanceof LimeError)) {
          throw e;
        }
        errors.push(e);
        this.onError?.(e);
        if (!this.continueOnError) {
          break;
        }
      }
    }

    return { executed, errors };
  }
}

/**
 * Stamps the statement's line on Lime errors and reports a host stack
 * overflow as exceeding the recursion limit. Anything else is returned as is.
 */
function toLimeError(e: unknown, line: number): unknown {
  if (e instanceof LimeError) {
    return e.atLine(line);
  }
  if (e instanceof RangeError && STACK_OVERFLOW.test(e.message)) {
    return new EvalError(
      "RecursionLimitExceeded",
      "maximum recursion depth exceeded",
    ).atLine(line);
  }
  return e;
}
