/**
 * ScanBuffer - grow-only output record for one scan run.
 *
 * Holds the decoded source and four parallel sequences (kind, start, length,
 * line) with one entry per emitted token. All four grow in lockstep through
 * `push`, so a run that fails midway still leaves a consistent record.
 */

import { fromCodePoints, toCodePoints } from './character-codes.js';
import type { Token, TokenRecord } from './token-types.js';

export interface ScanBuffer {
  /** Source text of the current run. */
  readonly source: string;
  /** Source decoded to code points; offsets and lengths index into this. */
  readonly chars: readonly number[];

  readonly kinds: readonly Token[];
  readonly starts: readonly number[];
  readonly lengths: readonly number[];
  readonly lines: readonly number[];

  /** Number of emitted tokens. */
  readonly count: number;

  push(token: Token, start: number, length: number, line: number): void;
  /** Replace the source and drop every token; called at the start of a run. */
  reset(source: string): void;

  tokenAt(index: number): TokenRecord;
  tokens(): IterableIterator<TokenRecord>;
  /** Source text covered by a token's span, clamped to the end of the source. */
  lexeme(index: number): string;

  fillDebugState(state: Partial<ScanBufferDebugState>): void;
}

export interface ScanBufferDebugState {
  tokenCount: number;
  sourceLength: number;
  /** Line of the last emitted token, 0 when nothing was emitted. */
  lastLine: number;
}

export function createScanBuffer(): ScanBuffer {
  let source = '';
  let chars: number[] = [];

  // Parallel sequences, always the same length
  const kinds: Token[] = [];
  const starts: number[] = [];
  const lengths: number[] = [];
  const lines: number[] = [];

  function push(token: Token, start: number, length: number, line: number): void {
    kinds.push(token);
    starts.push(start);
    lengths.push(length);
    lines.push(line);
  }

  function reset(text: string): void {
    source = text;
    chars = toCodePoints(text);
    kinds.length = 0;
    starts.length = 0;
    lengths.length = 0;
    lines.length = 0;
  }

  function tokenAt(index: number): TokenRecord {
    if (index < 0 || index >= kinds.length)
      throw new RangeError(`ScanBuffer: token index ${index} out of range (count ${kinds.length})`);

    return {
      token: kinds[index],
      start: starts[index],
      length: lengths[index],
      line: lines[index],
    };
  }

  function* tokens(): IterableIterator<TokenRecord> {
    for (let i = 0; i < kinds.length; i++) {
      yield tokenAt(i);
    }
  }

  function lexeme(index: number): string {
    const { start, length } = tokenAt(index);
    return fromCodePoints(chars, start, Math.min(start + length, chars.length));
  }

  function fillDebugState(state: Partial<ScanBufferDebugState>): void {
    state.tokenCount = kinds.length;
    state.sourceLength = chars.length;
    state.lastLine = lines.length ? lines[lines.length - 1] : 0;
  }

  return {
    get source() { return source; },
    get chars() { return chars; },
    kinds,
    starts,
    lengths,
    lines,
    get count() { return kinds.length; },
    push,
    reset,
    tokenAt,
    tokens,
    lexeme,
    fillDebugState,
  };
}
