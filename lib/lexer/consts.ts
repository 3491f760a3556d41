/**
 * Lexer constants.
 *
 * This module provides the character constants for Lime's punctuation and the
 * character classes used while scanning a line.
 *
 * @module
 */
import type { TokenKind } from "./token.js";

// Character constants
export const BACKSLASH = "\\";
export const DOT = ".";
export const LEFT_PAREN = "(";
export const RIGHT_PAREN = ")";
export const LEFT_BRACKET = "[";
export const RIGHT_BRACKET = "]";
export const COMMA = ",";
export const QUOTE = '"';
export const SEMICOLON = ";";
export const ASSIGN = ":=";

/** Single-character punctuation and the token each one produces. */
export const PUNCTUATION: ReadonlyMap<string, TokenKind> = new Map([
  [BACKSLASH, "lambda"],
  [DOT, "dot"],
  [LEFT_PAREN, "lparen"],
  [RIGHT_PAREN, "rparen"],
  [LEFT_BRACKET, "lbracket"],
  [RIGHT_BRACKET, "rbracket"],
  [COMMA, "comma"],
]);

/** Escape codes accepted after a backslash inside a string literal. */
export const ESCAPE_CODES: ReadonlyMap<string, string> = new Map([
  ["n", "\n"],
  ["t", "\t"],
  ["r", "\r"],
  ["b", "\b"],
  ["f", "\f"],
  ["v", "\v"],
  ["s", " "],
  ["\\", "\\"],
  ['"', '"'],
]);

// Regex patterns
export const DIGIT_REGEX = /[0-9]/;
export const SIGN_REGEX = /[+-]/;
export const WHITESPACE_REGEX = /[ \t\r\v\f]/;
