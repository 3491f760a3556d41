/**
 * Lime lexer.
 *
 * Splits one source line into tokens. Comments (`;` to end of line) and
 * whitespace are dropped, and every line ends with an `eof` token.
 *
 * @example
 * ```ts
 * const kinds = tokenize(`sq := \\x.* x x`).map((t) => t.kind);
 * // ["identifier", "assign", "lambda", "identifier", "dot",
 * //  "identifier", "identifier", "identifier", "eof"]
 * ```
 *
 * @module
 */
import {
  ASSIGN,
  DIGIT_REGEX,
  DOT,
  ESCAPE_CODES,
  PUNCTUATION,
  QUOTE,
  SEMICOLON,
  SIGN_REGEX,
  WHITESPACE_REGEX,
} from "./consts.js";
import { LexError } from "./lexError.js";
import { LineBuffer } from "./lineBuffer.js";
import { mkToken, type Token } from "./token.js";

const isDigit = (ch: string | null): boolean =>
  ch !== null && DIGIT_REGEX.test(ch);

/**
 * Whether `ch` ends an identifier at the cursor of `buf`.
 */
const endsIdentifier = (buf: LineBuffer, ch: string): boolean =>
  WHITESPACE_REGEX.test(ch) ||
  PUNCTUATION.has(ch) ||
  ch === QUOTE ||
  ch === SEMICOLON ||
  buf.lookingAt(ASSIGN);

/**
 * Lazily yields the tokens of `source`, which must be a single line.
 *
 * @param line the line number stamped on tokens and errors
 * @throws LexError on an unterminated string, an unknown escape code or a
 *   decimal point without digits after it
 */
export function* lex(source: string, line = 1): Generator<Token, void> {
  const buf = new LineBuffer(source);

  for (;;) {
    buf.skipWhitespace();
    const ch = buf.peek();
    const col = buf.col;

    if (ch === null || ch === SEMICOLON) {
      yield mkToken("eof", "", line, col);
      return;
    }

    if (buf.lookingAt(ASSIGN)) {
      yield mkToken("assign", buf.consume(ASSIGN.length), line, col);
      continue;
    }

    const punctuation = PUNCTUATION.get(ch);
    if (punctuation !== undefined) {
      yield mkToken(punctuation, buf.consume(), line, col);
      continue;
    }

    if (ch === QUOTE) {
      yield lexString(buf, line);
    } else if (
      isDigit(ch) || (SIGN_REGEX.test(ch) && isDigit(buf.peek(1)))
    ) {
      yield lexNumber(buf, line);
    } else {
      yield lexIdentifier(buf, line);
    }
  }
}

/**
 * Tokenizes a whole line eagerly.
 */
export function tokenize(source: string, line = 1): Token[] {
  return [...lex(source, line)];
}

function lexString(buf: LineBuffer, line: number): Token {
  const col = buf.col;
  let text = "";
  buf.consume(); // opening quote

  for (;;) {
    const ch = buf.peek();
    if (ch === null) {
      throw new LexError("unterminated string literal", line, col);
    }
    if (ch === QUOTE) {
      buf.consume();
      return mkToken("string", text, line, col);
    }
    if (ch === "\\") {
      const escapeCol = buf.col;
      buf.consume();
      const code = buf.peek();
      const replacement = code === null ? undefined : ESCAPE_CODES.get(code);
      if (code === null || replacement === undefined) {
        throw new LexError(
          code === null
            ? "unterminated string literal"
            : `invalid escape code \`\\${code}\``,
          line,
          code === null ? col : escapeCol,
        );
      }
      buf.consume();
      text += replacement;
      continue;
    }
    text += buf.consume();
  }
}

function lexNumber(buf: LineBuffer, line: number): Token {
  const start = buf.idx;
  const col = buf.col;

  if (SIGN_REGEX.test(buf.peek() ?? "")) {
    buf.consume();
  }
  while (isDigit(buf.peek())) {
    buf.consume();
  }
  if (buf.peek() === DOT) {
    if (!isDigit(buf.peek(1))) {
      buf.consume();
      throw new LexError("expected digit after decimal point", line, buf.col);
    }
    buf.consume();
    while (isDigit(buf.peek())) {
      buf.consume();
    }
  }

  return mkToken("number", buf.buf.slice(start, buf.idx), line, col);
}

function lexIdentifier(buf: LineBuffer, line: number): Token {
  const start = buf.idx;
  const col = buf.col;

  for (let ch = buf.peek(); ch !== null; ch = buf.peek()) {
    if (endsIdentifier(buf, ch)) break;
    buf.consume();
  }

  return mkToken("identifier", buf.buf.slice(start, buf.idx), line, col);
}
