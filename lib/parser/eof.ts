import type { Token } from "../lexer/token.js";
import {
  createParserState,
  type ParserState,
  peek,
  unexpectedToken,
} from "./parserState.js";

/**
 * Wraps a parser function so that after parsing the tokens of a line, any
 * extra (unconsumed) token causes an error.
 *
 * @param tokens the tokens of one line
 * @param parser a function that parses from a state and returns a tuple:
 *               [result, updatedState]
 * @returns the result of the parser
 * @throws ParseError if tokens remain after parsing
 */
export function parseWithEOF<T>(
  tokens: readonly Token[],
  parser: (state: ParserState) => [T, ParserState],
): T {
  const [result, finalState] = parser(createParserState(tokens));
  const next = peek(finalState);
  if (next.kind !== "eof") {
    unexpectedToken(next);
  }
  return result;
}
