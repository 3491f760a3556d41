import type { Token, TokenKind } from "../lexer/token.js";
import { describeToken, mkToken } from "../lexer/token.js";
import { ParseError } from "./parseError.js";

/**
 * An immutable cursor over the tokens of one line. Parsing functions take a
 * state and return the state after what they consumed.
 */
export interface ParserState {
  tokens: readonly Token[];
  idx: number;
}

export function createParserState(tokens: readonly Token[]): ParserState {
  const last = tokens[tokens.length - 1];
  if (last !== undefined && last.kind === "eof") {
    return { tokens, idx: 0 };
  }
  const line = last?.line ?? 1;
  const col = last === undefined ? 1 : last.col + last.text.length;
  return { tokens: [...tokens, mkToken("eof", "", line, col)], idx: 0 };
}

/**
 * Returns the token `offset` places past the cursor. Reads past the end see
 * the trailing `eof` token.
 */
export function peek(state: ParserState, offset = 0): Token {
  const { tokens } = state;
  return tokens[Math.min(state.idx + offset, tokens.length - 1)];
}

export function consume(state: ParserState): ParserState {
  return {
    tokens: state.tokens,
    idx: Math.min(state.idx + 1, state.tokens.length - 1),
  };
}

export function unexpectedToken(token: Token): never {
  throw new ParseError(
    `unexpected token ${describeToken(token)}`,
    token.line,
    token.col,
  );
}

/**
 * Consumes a token of the given kind.
 *
 * @param what how the expected token is named in the error message
 * @throws ParseError naming the token found instead
 */
export function matchKind(
  state: ParserState,
  kind: TokenKind,
  what: string,
): [Token, ParserState] {
  const next = peek(state);
  if (next.kind !== kind) {
    throw new ParseError(
      `expected ${what} but found ${describeToken(next)}`,
      next.line,
      next.col,
    );
  }
  return [next, consume(state)];
}
