/**
 * Language descriptions driving the scanner.
 *
 * A `LanguageConfig` is plain data, as written by callers or read from a
 * language file. `defineLanguage` turns it into a frozen `Language` whose
 * candidates are decoded to code points once, so runs never re-decode them.
 */

import { toCodePoints } from './character-codes.js';

export interface MultiLineCommentMarkers {
  start: string;
  end: string;
}

export interface LanguageConfig {
  name?: string;
  /** Keywords; among candidates matching at one position the first listed wins. */
  keywords: readonly string[];
  /** Symbols; among candidates matching at one position the first listed wins. */
  symbols: readonly string[];
  singleLineComment?: string;
  multiLineComment?: MultiLineCommentMarkers;
}

export interface LanguageOptions {
  /**
   * Stable-sort keywords and symbols by descending length, so greedy
   * longest match holds whatever order the config lists them in.
   */
  sortByLength?: boolean;
}

/** A vocabulary entry: its text and the code points compared against the source. */
export interface Candidate {
  readonly text: string;
  readonly codes: readonly number[];
}

export interface Language {
  readonly name: string;
  readonly keywords: readonly Candidate[];
  readonly symbols: readonly Candidate[];
  readonly singleLineComment: Candidate | undefined;
  readonly multiLineComment: { readonly start: Candidate; readonly end: Candidate } | undefined;
}

export function defineLanguage(config: LanguageConfig, options: LanguageOptions = {}): Language {
  const keywords = config.keywords.map(text => candidate(text, 'keyword'));
  const symbols = config.symbols.map(text => candidate(text, 'symbol'));

  if (options.sortByLength) {
    // Array.prototype.sort is stable, so equal lengths keep the config order
    keywords.sort(byDescendingLength);
    symbols.sort(byDescendingLength);
  }

  const singleLineComment = config.singleLineComment === undefined ?
    undefined :
    candidate(config.singleLineComment, 'single-line comment marker');

  const multiLineComment = config.multiLineComment === undefined ?
    undefined :
    Object.freeze({
      start: candidate(config.multiLineComment.start, 'multi-line comment start marker'),
      end: candidate(config.multiLineComment.end, 'multi-line comment end marker'),
    });

  return Object.freeze({
    name: config.name ?? 'custom',
    keywords: Object.freeze(keywords),
    symbols: Object.freeze(symbols),
    singleLineComment,
    multiLineComment,
  });
}

function candidate(text: string, role: string): Candidate {
  if (text.length === 0)
    throw new TypeError(`Language: ${role} must not be empty`);
  return Object.freeze({ text, codes: Object.freeze(toCodePoints(text)) });
}

function byDescendingLength(a: Candidate, b: Candidate): number {
  return b.codes.length - a.codes.length;
}
