/**
 * Human-readable token listing for debugging. Not a stable format.
 */

import type { ScanBuffer } from './scanner/scan-buffer.js';
import { TokenKind, type Token } from './scanner/token-types.js';

/** Anything with a `write`, e.g. `process.stdout` or a collecting array wrapper. */
export interface DumpSink {
  write(chunk: string): unknown;
}

export function formatToken(token: Token): string {
  const name = TokenKind[token.kind];
  switch (token.kind) {
    case TokenKind.NumberLiteral:
      return `${name}(${JSON.stringify(token.text)}, ${token.value})`;
    case TokenKind.Symbol:
    case TokenKind.Identifier:
    case TokenKind.StringLiteral:
    case TokenKind.Keyword:
    case TokenKind.Comment:
      return `${name}(${JSON.stringify(token.text)})`;
  }
}

/** One line per token: `[#000 line 1] Keyword("local")`. */
export function dump(buffer: ScanBuffer, sink: DumpSink): void {
  for (let i = 0; i < buffer.count; i++) {
    const index = String(i).padStart(3, '0');
    sink.write(`[#${index} line ${buffer.lines[i]}] ${formatToken(buffer.kinds[i])}\n`);
  }
}
