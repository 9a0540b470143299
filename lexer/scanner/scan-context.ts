import type { Language } from './language.js';
import type { ScanBuffer } from './scan-buffer.js';

/**
 * Mutable position state of one run. Created when a run starts and dropped
 * when it ends; never shared between runs.
 */
export interface Cursor {
  /** Index where the pending token starts. */
  start: number;
  /** Line of `start`. */
  startLine: number;
  /** Index of the next unconsumed character. */
  current: number;
  /** Line of `current`, 1-based. */
  line: number;
}

/** Everything a sub-scanner reads or advances during a run. */
export interface ScanContext {
  readonly chars: readonly number[];
  readonly cursor: Cursor;
  readonly language: Language;
  readonly buffer: ScanBuffer;
}

export function createCursor(): Cursor {
  return { start: 0, startLine: 1, current: 0, line: 1 };
}

/**
 * Exact prefix comparison of `codes` against the source at `position`,
 * bounds-checked per character.
 */
export function matchesAt(chars: readonly number[], position: number, codes: readonly number[]): boolean {
  for (let i = 0; i < codes.length; i++) {
    if (position + i >= chars.length || chars[position + i] !== codes[i]) return false;
  }
  return true;
}
