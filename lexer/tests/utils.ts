import { builtinLanguage } from '../languages/language-file.js';
import type { Language } from '../scanner/language.js';
import type { ScanBuffer } from '../scanner/scan-buffer.js';
import { scan } from '../scanner/scanner.js';
import { TokenKind } from '../scanner/token-types.js';

export const lua: Language = builtinLanguage('lua');

/**
 * Scan and render each token as `text Kind`, quoting text that has
 * whitespace or characters JSON would escape.
 */
export function scanTokensStrings(input: string, language: Language = lua): string[] {
  const { buffer } = scan(input, language);
  return tokenStrings(buffer);
}

export function tokenStrings(buffer: ScanBuffer): string[] {
  return buffer.kinds.map(token => {
    const text = token.text;
    const shown = /\s/.test(text) || JSON.stringify(text) !== '"' + text + '"' ?
      JSON.stringify(text) :
      text;
    return (text ? shown : '""') + ' ' + TokenKind[token.kind];
  });
}

/** Concatenate every token's span, clamped to the source. */
export function reconstruct(buffer: ScanBuffer): string {
  let text = '';
  for (let i = 0; i < buffer.count; i++) {
    text += buffer.lexeme(i);
  }
  return text;
}
