/**
 * Token types produced by the configurable scanner.
 *
 * Tokens form a closed tagged union: the `kind` discriminant decides which
 * payload fields exist, so consumers can switch exhaustively over it.
 */

export enum TokenKind {
  Symbol,
  Identifier,
  StringLiteral,       // Unescaped content, quotes excluded
  NumberLiteral,       // Literal text plus its numeric value
  Keyword,
  Comment,             // Full comment text including its markers
}

export interface SymbolToken {
  readonly kind: TokenKind.Symbol;
  readonly text: string;
}

export interface IdentifierToken {
  readonly kind: TokenKind.Identifier;
  readonly text: string;
}

export interface StringLiteralToken {
  readonly kind: TokenKind.StringLiteral;
  readonly text: string;
}

export interface NumberLiteralToken {
  readonly kind: TokenKind.NumberLiteral;
  readonly text: string;
  readonly value: number;
}

export interface KeywordToken {
  readonly kind: TokenKind.Keyword;
  readonly text: string;
}

export interface CommentToken {
  readonly kind: TokenKind.Comment;
  readonly text: string;
}

export type Token =
  | SymbolToken
  | IdentifierToken
  | StringLiteralToken
  | NumberLiteralToken
  | KeywordToken
  | CommentToken;

/**
 * One emitted token together with its position attributes.
 */
export interface TokenRecord {
  token: Token;
  /** Offset of the first character, in code points. */
  start: number;
  /** Length of the full span in code points, delimiters included. */
  length: number;
  /** 1-based line of the first character. */
  line: number;
}

/**
 * Scanner error codes
 */
export enum ScanErrorCode {
  /** No classifier matched at the current position. */
  UnknownToken,
  /** Input ended inside a string literal or multi-line comment. */
  UnexpectedEof,
}

/** Build a token; keeps literal construction sites short in the sub-scanners. */
export function symbolToken(text: string): SymbolToken {
  return { kind: TokenKind.Symbol, text };
}

export function identifierToken(text: string): IdentifierToken {
  return { kind: TokenKind.Identifier, text };
}

export function stringLiteralToken(text: string): StringLiteralToken {
  return { kind: TokenKind.StringLiteral, text };
}

export function numberLiteralToken(text: string, value: number): NumberLiteralToken {
  return { kind: TokenKind.NumberLiteral, text, value };
}

export function keywordToken(text: string): KeywordToken {
  return { kind: TokenKind.Keyword, text };
}

export function commentToken(text: string): CommentToken {
  return { kind: TokenKind.Comment, text };
}
