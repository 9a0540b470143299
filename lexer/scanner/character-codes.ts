/**
 * Character code constants and classification functions.
 * The scanner works on decoded code points, so every classifier takes a number.
 */

export const enum CharacterCodes {
  nullCharacter = 0,

  lineFeed = 0x0A,              // \n
  carriageReturn = 0x0D,        // \r
  tab = 0x09,                   // \t

  space = 0x20,
  doubleQuote = 0x22,           // "
  dot = 0x2E,                   // .

  _0 = 0x30,                    // 0
  _1 = 0x31,                    // 1
  _9 = 0x39,                    // 9

  A = 0x41,
  B = 0x42,
  F = 0x46,
  X = 0x58,
  Z = 0x5A,

  backslash = 0x5C,             // \
  underscore = 0x5F,            // _

  a = 0x61,
  b = 0x62,
  f = 0x66,
  n = 0x6E,
  t = 0x74,
  x = 0x78,
  z = 0x7A,

  digit0 = CharacterCodes._0,
  digit9 = CharacterCodes._9,
}

/**
 * Whitespace the scanner skips between tokens. Line feeds are classified
 * separately because they advance the line counter.
 */
export function isInlineWhiteSpace(ch: number): boolean {
  return ch === CharacterCodes.space ||
         ch === CharacterCodes.tab ||
         ch === CharacterCodes.carriageReturn;
}

/**
 * Check if character is an ASCII letter
 */
export function isLetter(ch: number): boolean {
  return (ch >= CharacterCodes.A && ch <= CharacterCodes.Z) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.z);
}

/**
 * Check if character is an ASCII digit
 */
export function isDigit(ch: number): boolean {
  return ch >= CharacterCodes.digit0 && ch <= CharacterCodes.digit9;
}

export function isBinaryDigit(ch: number): boolean {
  return ch === CharacterCodes._0 || ch === CharacterCodes._1;
}

/**
 * Check if character is a hexadecimal digit
 */
export function isHexDigit(ch: number): boolean {
  return isDigit(ch) ||
         (ch >= CharacterCodes.A && ch <= CharacterCodes.F) ||
         (ch >= CharacterCodes.a && ch <= CharacterCodes.f);
}

/** Numeric value of a hex digit; callers check `isHexDigit` first. */
export function hexDigitValue(ch: number): number {
  if (isDigit(ch)) return ch - CharacterCodes._0;
  if (ch >= CharacterCodes.a) return ch - CharacterCodes.a + 10;
  return ch - CharacterCodes.A + 10;
}

/**
 * Check if character can start an identifier (ASCII only)
 */
export function isIdentifierStart(ch: number): boolean {
  return isLetter(ch) || ch === CharacterCodes.underscore;
}

/**
 * Check if character can be part of an identifier (ASCII only)
 */
export function isIdentifierPart(ch: number): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/** Decode a string into its Unicode scalar values. */
export function toCodePoints(text: string): number[] {
  const codes: number[] = [];
  for (const ch of text) {
    // for..of yields whole code points, so codePointAt(0) is always defined
    codes.push(ch.codePointAt(0) ?? CharacterCodes.nullCharacter);
  }
  return codes;
}

/** Encode a run of code points back into a string. */
export function fromCodePoints(codes: readonly number[], start = 0, end = codes.length): string {
  let text = '';
  for (let i = start; i < end; i++) {
    text += String.fromCodePoint(codes[i]);
  }
  return text;
}
