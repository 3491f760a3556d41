import { createApplication, type Expression } from "../terms/expression.js";
import { describeToken, type TokenKind } from "../lexer/token.js";
import { ParseError } from "./parseError.js";
import { type ParserState, peek } from "./parserState.js";

/**
 * Tokens that end an application chain without being part of it.
 */
const CHAIN_TERMINATORS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  "eof",
  "rparen",
  "rbracket",
  "comma",
]);

/**
 * Parses a chain of expressions (applications) by repeatedly consuming
 * atomic terms until either the line is exhausted or a closing token
 * (`)`, `]` or `,`) is reached. The atoms associate to the left.
 *
 * @param state the current parser state.
 * @param parseAtomic a function that parses an atomic term from the state.
 * @returns the chained expression and the updated parser state.
 * @throws ParseError if no term is parsed.
 */
export function parseChain(
  state: ParserState,
  parseAtomic: (state: ParserState) => [Expression, ParserState],
): [Expression, ParserState] {
  let resultTerm: Expression | undefined = undefined;
  let currentState = state;

  while (!CHAIN_TERMINATORS.has(peek(currentState).kind)) {
    const [atomTerm, newState] = parseAtomic(currentState);
    resultTerm = resultTerm === undefined
      ? atomTerm
      : createApplication(resultTerm, atomTerm);
    currentState = newState;
  }

  if (resultTerm === undefined) {
    const next = peek(currentState);
    throw new ParseError(
      `expected an expression but found ${describeToken(next)}`,
      next.line,
      next.col,
    );
  }

  return [resultTerm, currentState];
}
