/**
 * Runtime values.
 *
 * A value is one of five kinds: number, string, list, function (a user
 * closure or a builtin) and none. Values never change once built; list
 * elements are already-evaluated values.
 *
 * @module
 */
import type { Expression } from "../terms/expression.js";
import { quoteString } from "../terms/expression.js";
import type { Environment } from "./environment.js";
import type { Evaluator } from "./evaluator.js";
import type { Thunk } from "./thunk.js";

export interface NumberValue {
  kind: "number";
  value: number;
}

export interface StringValue {
  kind: "string";
  value: string;
}

export interface ListValue {
  kind: "list";
  elements: readonly Value[];
}

export interface NoneValue {
  kind: "none";
}

/**
 * A lambda paired with the environment it was evaluated in.
 */
export interface Closure {
  kind: "closure";
  param: string | null;
  body: Expression;
  env: Environment;
}

/**
 * Native implementation of a builtin. Receives exactly `arity` unforced
 * arguments and forces the ones it needs through the evaluator.
 */
export type BuiltinImpl = (args: readonly Thunk[], evaluator: Evaluator) => Value;

/**
 * A native function of fixed arity, possibly partially applied: `args` holds
 * the arguments received so far.
 */
export interface Builtin {
  kind: "builtin";
  name: string;
  arity: number;
  impl: BuiltinImpl;
  args: readonly Thunk[];
}

export type Value =
  | NumberValue
  | StringValue
  | ListValue
  | Closure
  | Builtin
  | NoneValue;

/** The five kinds visible to Lime programs. */
export type TypeName = "number" | "string" | "list" | "function" | "none";

export const mkNumber = (value: number): NumberValue => ({
  kind: "number",
  value,
});

export const mkString = (value: string): StringValue => ({
  kind: "string",
  value,
});

export const mkListValue = (elements: readonly Value[]): ListValue => ({
  kind: "list",
  elements,
});

export const NONE: NoneValue = { kind: "none" };

export const mkClosure = (
  param: string | null,
  body: Expression,
  env: Environment,
): Closure => ({ kind: "closure", param, body, env });

export const mkBuiltin = (
  name: string,
  arity: number,
  impl: BuiltinImpl,
): Builtin => ({ kind: "builtin", name, arity, impl, args: [] });

export function typeName(value: Value): TypeName {
  switch (value.kind) {
    case "closure":
    case "builtin":
      return "function";
    default:
      return value.kind;
  }
}

/**
 * Formats a value for output: numbers in shortest decimal form, strings raw,
 * lists bracketed with their string elements quoted.
 */
export function display(value: Value): string {
  return value.kind === "string" ? value.value : displayNested(value);
}

function displayNested(value: Value): string {
  switch (value.kind) {
    case "number":
      return String(value.value);
    case "string":
      return quoteString(value.value);
    case "list":
      return `[${value.elements.map(displayNested).join(", ")}]`;
    case "none":
      return "()";
    case "closure":
      return "<function>";
    case "builtin":
      return `<builtin ${value.name}>`;
  }
}

/**
 * Structural equality for numbers, strings, lists and none. Functions are
 * equal only to themselves; values of different kinds are never equal.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "number":
      return b.kind === "number" && a.value === b.value;
    case "string":
      return b.kind === "string" && a.value === b.value;
    case "none":
      return b.kind === "none";
    case "list":
      return (
        b.kind === "list" &&
        a.elements.length === b.elements.length &&
        a.elements.every((el, i) => valuesEqual(el, b.elements[i]))
      );
    case "closure":
    case "builtin":
      return a === b;
  }
}
