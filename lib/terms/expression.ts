/**
 * Lime expression tree.
 *
 * This module defines the AST produced by the parser and consumed by the
 * evaluator: literals, list literals, identifiers, single-parameter lambdas
 * and single-argument applications, plus top-level bindings. Trees are never
 * mutated after construction, so a subtree may be evaluated any number of
 * times.
 *
 * @module
 */

export interface NumberLiteral {
  kind: "number";
  value: number;
}

export interface StringLiteral {
  kind: "string";
  value: string;
}

/**
 * The unit value, written `()`.
 */
export interface NoneLiteral {
  kind: "none";
}

export interface ListLiteral {
  kind: "list";
  elements: Expression[];
}

export interface Identifier {
  kind: "identifier";
  name: string;
}

/**
 * `\param.body`. A null parameter (`\.body`) accepts an argument and ignores
 * it.
 */
export interface Lambda {
  kind: "lambda";
  param: string | null;
  body: Expression;
}

/**
 * One function applied to one argument. `f a b` is `((f a) b)`.
 */
export interface Application {
  kind: "application";
  fn: Expression;
  arg: Expression;
}

/**
 * The legal expressions of Lime.
 * e ::= n | s | () | [e, ...] | x | \x.e | e e
 */
export type Expression =
  | NumberLiteral
  | StringLiteral
  | NoneLiteral
  | ListLiteral
  | Identifier
  | Lambda
  | Application;

/**
 * `name := expr`, allowed only at the top level of a line.
 */
export interface Binding {
  kind: "binding";
  name: string;
  expr: Expression;
}

export type Statement = Binding | Expression;

export const mkNum = (value: number): NumberLiteral => ({
  kind: "number",
  value,
});

export const mkStr = (value: string): StringLiteral => ({
  kind: "string",
  value,
});

export const mkNone = (): NoneLiteral => ({ kind: "none" });

export const mkList = (elements: Expression[]): ListLiteral => ({
  kind: "list",
  elements,
});

export const mkVar = (name: string): Identifier => ({
  kind: "identifier",
  name,
});

export const mkLambda = (param: string | null, body: Expression): Lambda => ({
  kind: "lambda",
  param,
  body,
});

/**
 * Creates an application of one expression to another.
 * @param fn the function expression
 * @param arg the argument expression
 * @returns a new application node
 */
export const createApplication = (
  fn: Expression,
  arg: Expression,
): Expression => ({
  kind: "application",
  fn,
  arg,
});

/**
 * Left-folds its operands into nested applications: `apply(f, a, b)` is
 * `((f a) b)`.
 */
export const apply = (fn: Expression, ...args: Expression[]): Expression =>
  args.reduce(createApplication, fn);

export const mkBinding = (name: string, expr: Expression): Binding => ({
  kind: "binding",
  name,
  expr,
});

const ESCAPES: Record<string, string> = {
  "\n": "\\n",
  "\t": "\\t",
  "\r": "\\r",
  "\b": "\\b",
  "\f": "\\f",
  "\v": "\\v",
  "\\": "\\\\",
  '"': '\\"',
};

/**
 * Quotes a string the way it would be written in source.
 */
export const quoteString = (value: string): string =>
  `"${value.replace(/[\n\t\r\b\f\v\\"]/g, (ch) => ESCAPES[ch] ?? ch)}"`;

/**
 * Pretty-prints an expression using `\` and full parenthesization.
 */
export const prettyPrint = (expr: Statement): string => {
  switch (expr.kind) {
    case "number":
      return String(expr.value);
    case "string":
      return quoteString(expr.value);
    case "none":
      return "()";
    case "list":
      return `[${expr.elements.map(prettyPrint).join(", ")}]`;
    case "identifier":
      return expr.name;
    case "lambda":
      return `(\\${expr.param ?? ""}.${prettyPrint(expr.body)})`;
    case "application":
      return `(${prettyPrint(expr.fn)} ${prettyPrint(expr.arg)})`;
    case "binding":
      return `${expr.name} := ${prettyPrint(expr.expr)}`;
  }
};
