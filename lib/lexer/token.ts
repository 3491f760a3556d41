/**
 * Token representation.
 *
 * @module
 */

export type TokenKind =
  | "identifier"
  | "number"
  | "string"
  | "lambda"
  | "dot"
  | "assign"
  | "lparen"
  | "rparen"
  | "lbracket"
  | "rbracket"
  | "comma"
  | "eof";

/**
 * A single lexeme of a source line. For string tokens `text` holds the
 * unescaped contents; for every other kind it is the source text itself
 * (empty for `eof`).
 */
export interface Token {
  kind: TokenKind;
  text: string;
  /** 1-based line number. */
  line: number;
  /** 1-based column of the first character. */
  col: number;
}

export const mkToken = (
  kind: TokenKind,
  text: string,
  line: number,
  col: number,
): Token => ({ kind, text, line, col });

/**
 * Renders a token the way error messages quote it.
 */
export const describeToken = (token: Token): string => {
  switch (token.kind) {
    case "eof":
      return "end of line";
    case "string":
      return `string "${token.text}"`;
    default:
      return `\`${token.text}\``;
  }
};
