/**
 * Lime statement parser.
 *
 * A line is either empty, a binding `name := expr`, or a bare expression.
 * Expressions are left-associative chains of atoms:
 *
 * ```
 * line ::= ε | Ident ":=" expr | expr
 * expr ::= atom atom*
 * atom ::= "(" ")" | "(" expr ")" | "[" "]" | "[" expr ("," expr)* "]"
 *        | "\" Ident? "." expr | Ident | Number | String
 * ```
 *
 * @module
 */
import { tokenize } from "../lexer/lexer.js";
import { describeToken, type Token } from "../lexer/token.js";
import {
  type Expression,
  mkBinding,
  mkLambda,
  mkList,
  mkNone,
  mkNum,
  mkStr,
  mkVar,
  type Statement,
} from "../terms/expression.js";
import { parseChain } from "./chain.js";
import { parseWithEOF } from "./eof.js";
import { ParseError } from "./parseError.js";
import {
  consume,
  matchKind,
  type ParserState,
  peek,
  unexpectedToken,
} from "./parserState.js";

/**
 * Parses an expression: one or more atoms applied left to right.
 */
export function parseExpression(
  state: ParserState,
): [Expression, ParserState] {
  return parseChain(state, parseAtom);
}

/**
 * Parses an atomic expression.
 */
export function parseAtom(state: ParserState): [Expression, ParserState] {
  const next = peek(state);

  switch (next.kind) {
    case "identifier":
      return [mkVar(next.text), consume(state)];
    case "number":
      return [mkNum(Number(next.text)), consume(state)];
    case "string":
      return [mkStr(next.text), consume(state)];
    case "lparen":
      return parseParenthesized(state);
    case "lbracket":
      return parseListLiteral(state);
    case "lambda":
      return parseLambdaAbstraction(state);
    default:
      return unexpectedToken(next);
  }
}

/**
 * Reports the token found where the closer of `open` was expected.
 */
function unclosed(open: Token, found: Token): never {
  if (found.kind === "eof") {
    throw new ParseError(`unmatched \`${open.text}\``, open.line, open.col);
  }
  return unexpectedToken(found);
}

function parseParenthesized(state: ParserState): [Expression, ParserState] {
  const open = peek(state);
  const inner = consume(state);

  if (peek(inner).kind === "rparen") {
    return [mkNone(), consume(inner)];
  }

  const [expr, afterExpr] = parseExpression(inner);
  const close = peek(afterExpr);
  if (close.kind !== "rparen") {
    unclosed(open, close);
  }
  return [expr, consume(afterExpr)];
}

function parseListLiteral(state: ParserState): [Expression, ParserState] {
  const open = peek(state);
  let currentState = consume(state);

  if (peek(currentState).kind === "rbracket") {
    return [mkList([]), consume(currentState)];
  }

  const elements: Expression[] = [];
  for (;;) {
    const [element, afterElement] = parseExpression(currentState);
    elements.push(element);
    const next = peek(afterElement);
    if (next.kind === "comma") {
      currentState = consume(afterElement);
    } else if (next.kind === "rbracket") {
      return [mkList(elements), consume(afterElement)];
    } else {
      unclosed(open, next);
    }
  }
}

/**
 * Parses `\x.body` or `\.body`. The body runs to the end of the enclosing
 * group, so `\a.\b.e` nests.
 */
function parseLambdaAbstraction(
  state: ParserState,
): [Expression, ParserState] {
  let currentState = consume(state);
  let param: string | null = null;

  const next = peek(currentState);
  if (next.kind === "identifier") {
    param = next.text;
    currentState = consume(currentState);
  } else if (next.kind !== "dot") {
    throw new ParseError(
      `expected parameter name after \`\\\` but found ${describeToken(next)}`,
      next.line,
      next.col,
    );
  }

  [, currentState] = matchKind(currentState, "dot", "`.` after parameter");
  const [body, afterBody] = parseExpression(currentState);
  return [mkLambda(param, body), afterBody];
}

function parseLine(state: ParserState): [Statement | null, ParserState] {
  const first = peek(state);

  if (first.kind === "eof") {
    return [null, state];
  }

  if (first.kind === "identifier" && peek(state, 1).kind === "assign") {
    const [expr, afterExpr] = parseExpression(consume(consume(state)));
    return [mkBinding(first.text, expr), afterExpr];
  }

  return parseExpression(state);
}

/**
 * Parses the tokens of one line into a statement.
 *
 * @returns the binding or expression, or null for a line with no statement
 * @throws ParseError when the tokens do not form a statement
 */
export function parseStatement(tokens: readonly Token[]): Statement | null {
  return parseWithEOF(tokens, parseLine);
}

/**
 * Lexes and parses one source line.
 *
 * @param line the line number stamped on tokens and errors
 */
export function parseSource(source: string, line = 1): Statement | null {
  return parseStatement(tokenize(source, line));
}
