/**
 * The builtin library and the initial environment.
 *
 * Every builtin is curried like a closure: each application supplies one
 * argument, and the native implementation runs once all of them are present.
 * Implementations receive their arguments unforced and force only what they
 * use, which is what keeps the untaken branch of `=`, `<` and `>` unevaluated.
 *
 * @module
 */
import { Environment } from "./environment.js";
import { EvalError } from "./evalError.js";
import type { Evaluator } from "./evaluator.js";
import { Thunk } from "./thunk.js";
import {
  type Builtin,
  type BuiltinImpl,
  display,
  type ListValue,
  mkBuiltin,
  mkListValue,
  mkNumber,
  mkString,
  NONE,
  type StringValue,
  typeName,
  type Value,
  valuesEqual,
} from "./values.js";

const NUMBER_PATTERN = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

function typeMismatch(
  builtin: string,
  expected: string,
  received: Value,
): EvalError {
  return new EvalError(
    "TypeError",
    `\`${builtin}\` expected ${expected}; received ${typeName(received)}`,
  );
}

function forceNumber(
  evaluator: Evaluator,
  thunk: Thunk,
  builtin: string,
): number {
  const value = evaluator.force(thunk);
  if (value.kind !== "number") {
    throw typeMismatch(builtin, "number", value);
  }
  return value.value;
}

function forceString(
  evaluator: Evaluator,
  thunk: Thunk,
  builtin: string,
): string {
  const value = evaluator.force(thunk);
  if (value.kind !== "string") {
    throw typeMismatch(builtin, "string", value);
  }
  return value.value;
}

function forceSequence(
  evaluator: Evaluator,
  thunk: Thunk,
  builtin: string,
): StringValue | ListValue {
  const value = evaluator.force(thunk);
  if (value.kind !== "string" && value.kind !== "list") {
    throw typeMismatch(builtin, "string or list", value);
  }
  return value;
}

/**
 * Splits a string into characters by code point.
 */
const characters = (text: string): string[] => Array.from(text);

type Arithmetic = (a: number, b: number) => number;

const arithmetic = (
  name: string,
  op: Arithmetic,
  checkDivisor = false,
): Builtin =>
  mkBuiltin(name, 2, ([a, b], evaluator) => {
    const lhs = forceNumber(evaluator, a, name);
    const rhs = forceNumber(evaluator, b, name);
    if (checkDivisor && rhs === 0) {
      throw new EvalError("DivisionByZero", `\`${name}\` by zero`);
    }
    return mkNumber(op(lhs, rhs));
  });

/**
 * Orders two values of the same primitive kind. Returns undefined for pairs
 * that have no natural order.
 */
function compareValues(a: Value, b: Value): number | undefined {
  if (a.kind === "number" && b.kind === "number") {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  if (a.kind === "string" && b.kind === "string") {
    return a.value < b.value ? -1 : a.value > b.value ? 1 : 0;
  }
  return undefined;
}

/**
 * A four-argument conditional: tests the first two arguments, then forces
 * and returns the third or the fourth. The other branch is left untouched.
 */
const conditional = (
  name: string,
  holds: (a: Value, b: Value) => boolean,
): Builtin =>
  mkBuiltin(name, 4, ([a, b, whenTrue, whenFalse], evaluator) => {
    const taken = holds(evaluator.force(a), evaluator.force(b))
      ? whenTrue
      : whenFalse;
    return evaluator.force(taken);
  });

const at: BuiltinImpl = ([seq, idx], evaluator) => {
  const sequence = forceSequence(evaluator, seq, "at");
  const index = Math.trunc(forceNumber(evaluator, idx, "at"));
  const items = sequence.kind === "string"
    ? characters(sequence.value)
    : sequence.elements;

  if (!(index >= 0 && index < items.length)) {
    throw new EvalError(
      "IndexOutOfRange",
      `index ${index} out of range for ${typeName(sequence)} of length ${items.length}`,
    );
  }

  const item = items[index];
  return typeof item === "string" ? mkString(item) : item;
};

const join: BuiltinImpl = ([a, b], evaluator) => {
  const lhs = forceSequence(evaluator, a, "join");
  const rhs = evaluator.force(b);
  if (lhs.kind === "string" && rhs.kind === "string") {
    return mkString(lhs.value + rhs.value);
  }
  if (lhs.kind === "list" && rhs.kind === "list") {
    return mkListValue([...lhs.elements, ...rhs.elements]);
  }
  throw typeMismatch("join", typeName(lhs), rhs);
};

const len: BuiltinImpl = ([seq], evaluator) => {
  const sequence = forceSequence(evaluator, seq, "len");
  return mkNumber(
    sequence.kind === "string"
      ? characters(sequence.value).length
      : sequence.elements.length,
  );
};

const num: BuiltinImpl = ([text], evaluator) => {
  const source = forceString(evaluator, text, "num");
  if (!NUMBER_PATTERN.test(source)) {
    throw new EvalError(
      "NumberParseError",
      `cannot convert "${source}" to a number`,
    );
  }
  return mkNumber(Number(source));
};

const get: BuiltinImpl = ([unit], evaluator) => {
  const value = evaluator.force(unit);
  if (value.kind !== "none") {
    throw typeMismatch("get", "none", value);
  }
  return mkString(evaluator.input.readLine() ?? "");
};

const print: BuiltinImpl = ([arg], evaluator) => {
  evaluator.output.writeLine(display(evaluator.force(arg)));
  return NONE;
};

const doBoth: BuiltinImpl = ([first, second], evaluator) => {
  evaluator.force(first);
  return evaluator.force(second);
};

/**
 * Every builtin, in the order they are bound.
 */
export const BUILTINS: readonly Builtin[] = [
  arithmetic("+", (a, b) => a + b),
  arithmetic("-", (a, b) => a - b),
  arithmetic("*", (a, b) => a * b),
  arithmetic("/", (a, b) => a / b, true),
  arithmetic("%", (a, b) => a - b * Math.floor(a / b), true),
  conditional("=", valuesEqual),
  conditional("<", (a, b) => (compareValues(a, b) ?? 0) < 0),
  conditional(">", (a, b) => (compareValues(a, b) ?? 0) > 0),
  mkBuiltin("cat", 2, ([a, b], evaluator) =>
    mkString(forceString(evaluator, a, "cat") + forceString(evaluator, b, "cat"))),
  mkBuiltin("at", 2, at),
  mkBuiltin("join", 2, join),
  mkBuiltin("len", 1, len),
  mkBuiltin("num", 1, num),
  mkBuiltin("str", 1, ([n], evaluator) =>
    mkString(String(forceNumber(evaluator, n, "str")))),
  mkBuiltin("get", 1, get),
  mkBuiltin("print", 1, print),
  mkBuiltin("do", 2, doBoth),
];

/**
 * Builds a fresh top-level environment holding every builtin. Each call
 * returns an independent frame.
 */
export function createGlobalEnvironment(): Environment {
  const globals = new Environment();
  for (const builtin of BUILTINS) {
    globals.define(builtin.name, Thunk.of(builtin));
  }
  return globals;
}
