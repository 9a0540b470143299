/**
 * Symbol and keyword recognition against the language's ordered lists.
 * The first listed candidate that matches wins; no length comparison happens
 * here, so longest match depends on the list order.
 */

import { isIdentifierPart } from './character-codes.js';
import { matchesAt, type ScanContext } from './scan-context.js';
import { keywordToken, symbolToken, type KeywordToken, type SymbolToken } from './token-types.js';

export function scanSymbol({ chars, cursor, language }: ScanContext): SymbolToken | undefined {
  for (const symbol of language.symbols) {
    if (matchesAt(chars, cursor.current, symbol.codes)) {
      cursor.current += symbol.codes.length;
      return symbolToken(symbol.text);
    }
  }
  return undefined;
}

export function scanKeyword({ chars, cursor, language }: ScanContext): KeywordToken | undefined {
  for (const keyword of language.keywords) {
    const after = cursor.current + keyword.codes.length;
    if (!matchesAt(chars, cursor.current, keyword.codes)) continue;

    // `endless` is an identifier, not `end` followed by `less`
    if (after < chars.length && isIdentifierPart(chars[after])) continue;

    cursor.current = after;
    return keywordToken(keyword.text);
  }
  return undefined;
}
