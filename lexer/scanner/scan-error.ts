import { ScanErrorCode } from './token-types.js';

const messages: Record<ScanErrorCode, string> = {
  [ScanErrorCode.UnknownToken]: 'unknown token',
  [ScanErrorCode.UnexpectedEof]: 'unexpected end of file',
};

/**
 * The single failure a scan run can end with.
 * `offset` is the absolute code-point index where the failing token starts.
 */
export class ScanError extends Error {
  readonly code: ScanErrorCode;
  readonly line: number;
  readonly offset: number;
  readonly length: number;

  constructor(code: ScanErrorCode, line: number, offset: number, length: number) {
    super(`${line}:${offset} : ${messages[code]}`);
    this.name = 'ScanError';
    this.code = code;
    this.line = line;
    this.offset = offset;
    this.length = length;
  }

  static unknownToken(line: number, offset: number): ScanError {
    return new ScanError(ScanErrorCode.UnknownToken, line, offset, 1);
  }

  static unexpectedEof(line: number, offset: number, length: number): ScanError {
    return new ScanError(ScanErrorCode.UnexpectedEof, line, offset, length);
  }
}
