/**
 * Deferred computations for call-by-need evaluation.
 *
 * @module
 */
import type { Expression } from "../terms/expression.js";
import type { Environment } from "./environment.js";
import { EvalError } from "./evalError.js";
import type { Evaluator } from "./evaluator.js";
import type { Value } from "./values.js";

type ThunkState =
  | { status: "pending"; expr: Expression; env: Environment }
  | { status: "forcing"; expr: Expression; env: Environment }
  | { status: "forced"; value: Value };

/**
 * An expression paired with the environment to evaluate it in, evaluated at
 * most once. The first successful force caches the value; every later force
 * returns that same value without evaluating again.
 */
export class Thunk {
  private state: ThunkState;

  private constructor(state: ThunkState) {
    this.state = state;
  }

  /**
   * Suspends `expr` in `env`.
   */
  static delay(expr: Expression, env: Environment): Thunk {
    return new Thunk({ status: "pending", expr, env });
  }

  /**
   * Wraps a value that needs no evaluation.
   */
  static of(value: Value): Thunk {
    return new Thunk({ status: "forced", value });
  }

  get isForced(): boolean {
    return this.state.status === "forced";
  }

  /**
   * Returns the cached value, computing it first if needed.
   *
   * @throws EvalError RecursionLimitExceeded when the thunk's own evaluation
   *   demands its value
   */
  force(evaluator: Evaluator): Value {
    const state = this.state;
    switch (state.status) {
      case "forced":
        return state.value;
      case "forcing":
        throw new EvalError(
          "RecursionLimitExceeded",
          "value depends on itself",
        );
      case "pending": {
        const { expr, env } = state;
        this.state = { status: "forcing", expr, env };
        try {
          const value = evaluator.evaluate(expr, env);
          this.state = { status: "forced", value };
          return value;
        } catch (e) {
          // a failed force may be retried, e.g. after the missing name is bound
          this.state = { status: "pending", expr, env };
          throw e;
        }
      }
    }
  }
}
