import { describe, expect, test } from 'vitest';

import { createScanBuffer, type ScanBufferDebugState } from '../scanner/scan-buffer.js';
import { scan } from '../scanner/scanner.js';
import { identifierToken, keywordToken, TokenKind } from '../scanner/token-types.js';
import { lua } from './utils.js';

describe('ScanBuffer', () => {
  test('push grows all sequences together', () => {
    const buffer = createScanBuffer();
    buffer.reset('local a');
    buffer.push(keywordToken('local'), 0, 5, 1);
    buffer.push(identifierToken('a'), 6, 1, 1);

    expect(buffer.count).toBe(2);
    expect(buffer.kinds).toEqual([
      { kind: TokenKind.Keyword, text: 'local' },
      { kind: TokenKind.Identifier, text: 'a' },
    ]);
    expect(buffer.starts).toEqual([0, 6]);
    expect(buffer.lengths).toEqual([5, 1]);
    expect(buffer.lines).toEqual([1, 1]);
  });

  test('reset decodes the source to code points', () => {
    const buffer = createScanBuffer();
    buffer.reset('a😀');

    expect(buffer.source).toBe('a😀');
    expect(buffer.chars).toEqual([0x61, 0x1F600]);
    expect(buffer.count).toBe(0);
  });

  test('tokenAt rejects indices outside the record', () => {
    const { buffer } = scan('x', lua);

    expect(() => buffer.tokenAt(1)).toThrow(new RangeError('ScanBuffer: token index 1 out of range (count 1)'));
    expect(() => buffer.tokenAt(-1)).toThrow(RangeError);
  });

  test('tokens iterates records in order', () => {
    const { buffer } = scan('a = 1', lua);
    const records = [...buffer.tokens()];

    expect(records.map(record => record.start)).toEqual([0, 2, 4]);
    expect(records[2]).toEqual({
      token: { kind: TokenKind.NumberLiteral, text: '1', value: 1 },
      start: 4,
      length: 1,
      line: 1,
    });
  });

  test('lexeme returns the raw source of a span', () => {
    const { buffer } = scan('s = "a\\tb"', lua);

    expect(buffer.kinds[2]).toEqual({ kind: TokenKind.StringLiteral, text: 'a\tb' });
    expect(buffer.lexeme(2)).toBe('"a\\tb"');
  });

  test('lexeme of an unterminated string stops at the end of the source', () => {
    const { buffer, ok } = scan('"ab', lua);

    expect(ok).toBe(false);
    expect(buffer.lengths).toEqual([4]);
    expect(buffer.lexeme(0)).toBe('"ab');
  });

  test('fillDebugState', () => {
    const { buffer } = scan('a\nb', lua);
    const state: Partial<ScanBufferDebugState> = {};
    buffer.fillDebugState(state);

    expect(state).toEqual({ tokenCount: 2, sourceLength: 3, lastLine: 2 });
  });

  test('fillDebugState on an empty run', () => {
    const state: Partial<ScanBufferDebugState> = {};
    createScanBuffer().fillDebugState(state);

    expect(state).toEqual({ tokenCount: 0, sourceLength: 0, lastLine: 0 });
  });
});
