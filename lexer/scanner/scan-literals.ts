/**
 * String, identifier and number literal recognition.
 */

import {
  CharacterCodes,
  fromCodePoints,
  hexDigitValue,
  isBinaryDigit,
  isDigit,
  isHexDigit,
  isIdentifierPart,
  isIdentifierStart,
} from './character-codes.js';
import type { ScanContext } from './scan-context.js';
import { ScanError } from './scan-error.js';
import {
  identifierToken,
  numberLiteralToken,
  stringLiteralToken,
  type IdentifierToken,
  type NumberLiteralToken,
  type StringLiteralToken,
} from './token-types.js';

/**
 * Double-quoted string. `\n` and `\t` translate to line feed and tab; any
 * other escaped character is kept without its backslash.
 *
 * When the input ends first, the partial literal goes into the buffer with a
 * span that counts the missing closing quote, and the run fails.
 */
export function scanString({ chars, cursor, buffer }: ScanContext): StringLiteralToken | ScanError | undefined {
  if (chars[cursor.current] !== CharacterCodes.doubleQuote) return undefined;
  cursor.current++;

  let escape = false;
  let value = '';

  while (cursor.current < chars.length) {
    const ch = chars[cursor.current];

    if (ch === CharacterCodes.backslash && !escape) {
      escape = true;
    } else {
      if (ch === CharacterCodes.doubleQuote && !escape) {
        cursor.current++;
        return stringLiteralToken(value);
      }

      if (escape && ch === CharacterCodes.n) {
        value += '\n';
      } else if (escape && ch === CharacterCodes.t) {
        value += '\t';
      } else {
        value += String.fromCodePoint(ch);
        if (ch === CharacterCodes.lineFeed) cursor.line++;
      }
      escape = false;
    }
    cursor.current++;
  }

  const length = chars.length - cursor.start + 1;
  buffer.push(stringLiteralToken(value), cursor.start, length, cursor.startLine);
  return ScanError.unexpectedEof(cursor.startLine, cursor.start, length);
}

export function scanIdentifier({ chars, cursor }: ScanContext): IdentifierToken | undefined {
  if (!isIdentifierStart(chars[cursor.current])) return undefined;

  const start = cursor.current;
  while (cursor.current < chars.length && isIdentifierPart(chars[cursor.current])) {
    cursor.current++;
  }
  return identifierToken(fromCodePoints(chars, start, cursor.current));
}

/**
 * Decimal literal with optional fraction, or a `0x` / `0b` prefixed literal.
 * A prefix only counts when a digit of its base follows, so `0x` alone scans
 * as `0` then the identifier `x`.
 */
export function scanNumber(ctx: ScanContext): NumberLiteralToken | undefined {
  const { chars, cursor } = ctx;
  const ch = chars[cursor.current];
  if (!isDigit(ch)) return undefined;

  if (ch === CharacterCodes._0 && cursor.current + 2 < chars.length) {
    const prefix = chars[cursor.current + 1];
    const first = chars[cursor.current + 2];

    if ((prefix === CharacterCodes.x || prefix === CharacterCodes.X) && isHexDigit(first)) {
      cursor.current += 2;
      return scanRadixDigits(ctx, 16, '0x', isHexDigit);
    }
    if ((prefix === CharacterCodes.b || prefix === CharacterCodes.B) && isBinaryDigit(first)) {
      cursor.current += 2;
      return scanRadixDigits(ctx, 2, '0b', isBinaryDigit);
    }
  }

  return scanDecimal(ctx);
}

function scanDecimal({ chars, cursor }: ScanContext): NumberLiteralToken {
  const start = cursor.current;
  let value = 0;

  while (cursor.current < chars.length && isDigit(chars[cursor.current])) {
    value = value * 10 + (chars[cursor.current] - CharacterCodes._0);
    cursor.current++;
  }

  if (cursor.current + 1 < chars.length &&
    chars[cursor.current] === CharacterCodes.dot &&
    isDigit(chars[cursor.current + 1])) {
    cursor.current++; // '.'
    let divisor = 1;
    while (cursor.current < chars.length && isDigit(chars[cursor.current])) {
      value = value * 10 + (chars[cursor.current] - CharacterCodes._0);
      divisor *= 10;
      cursor.current++;
    }
    value /= divisor;
  }

  return numberLiteralToken(fromCodePoints(chars, start, cursor.current), value);
}

function scanRadixDigits(
  { chars, cursor }: ScanContext,
  radix: number,
  prefix: string,
  isRadixDigit: (ch: number) => boolean,
): NumberLiteralToken {
  const digitsStart = cursor.current;
  let value = 0;

  while (cursor.current < chars.length && isRadixDigit(chars[cursor.current])) {
    value = value * radix + hexDigitValue(chars[cursor.current]);
    cursor.current++;
  }

  return numberLiteralToken(prefix + fromCodePoints(chars, digitsStart, cursor.current), value);
}
