import { CharacterCodes, isInlineWhiteSpace } from './character-codes.js';
import type { Language } from './language.js';
import { createScanBuffer, type ScanBuffer } from './scan-buffer.js';
import { scanComment } from './scan-comments.js';
import { createCursor, type ScanContext } from './scan-context.js';
import { ScanError } from './scan-error.js';
import { scanIdentifier, scanNumber, scanString } from './scan-literals.js';
import { scanKeyword, scanSymbol } from './scan-vocabulary.js';
import type { Token } from './token-types.js';

export interface Scanner {
  readonly language: Language;

  /**
   * Scan a whole buffer. Tokens accumulate in `buffer` as they are recognized,
   * so on failure everything before the error is still there.
   */
  run(text: string, buffer?: ScanBuffer): ScanResult;
}

export type ScanResult =
  | { readonly ok: true; readonly buffer: ScanBuffer }
  | { readonly ok: false; readonly buffer: ScanBuffer; readonly error: ScanError };

/** Classification outcomes that never reach the buffer. */
const enum StepKind {
  /** Whitespace run. */
  Ignore,
  NewLine,
  EndOfFile,
}

type ScanStep = Token | ScanError | StepKind;

export function createScanner(language: Language): Scanner {
  function run(text: string, buffer: ScanBuffer = createScanBuffer()): ScanResult {
    buffer.reset(text);

    const ctx: ScanContext = {
      chars: buffer.chars,
      cursor: createCursor(),
      language,
      buffer,
    };
    const { cursor } = ctx;

    for (;;) {
      const step = scanStep(ctx);

      if (step instanceof ScanError) return { ok: false, buffer, error: step };
      if (step === StepKind.EndOfFile) return { ok: true, buffer };

      if (typeof step !== 'number')
        buffer.push(step, cursor.start, cursor.current - cursor.start, cursor.startLine);

      // Every step, emitted or skipped, moves the pending start
      cursor.start = cursor.current;
      cursor.startLine = cursor.line;
    }
  }

  return { language, run };
}

/** Functional form of `createScanner(language).run(text, buffer)`. */
export function scan(text: string, language: Language, buffer?: ScanBuffer): ScanResult {
  return createScanner(language).run(text, buffer);
}

/** Scan and return the buffer, throwing the `ScanError` if the run fails. */
export function tokenize(text: string, language: Language): ScanBuffer {
  const result = scan(text, language);
  if (!result.ok) throw result.error;
  return result.buffer;
}

/**
 * Fixed priority: end of input, comment, newline, whitespace, symbol,
 * keyword, string, identifier, number. Comments go before symbols because
 * their markers are often built from symbol characters.
 */
function scanStep(ctx: ScanContext): ScanStep {
  const { chars, cursor } = ctx;
  if (cursor.current >= chars.length) return StepKind.EndOfFile;

  return scanComment(ctx) ??
    scanNewLine(ctx) ??
    scanWhiteSpace(ctx) ??
    scanSymbol(ctx) ??
    scanKeyword(ctx) ??
    scanString(ctx) ??
    scanIdentifier(ctx) ??
    scanNumber(ctx) ??
    ScanError.unknownToken(cursor.line, cursor.current);
}

function scanNewLine({ chars, cursor }: ScanContext): StepKind.NewLine | undefined {
  if (chars[cursor.current] !== CharacterCodes.lineFeed) return undefined;
  cursor.current++;
  cursor.line++;
  return StepKind.NewLine;
}

function scanWhiteSpace({ chars, cursor }: ScanContext): StepKind.Ignore | undefined {
  const start = cursor.current;
  while (cursor.current < chars.length && isInlineWhiteSpace(chars[cursor.current])) {
    cursor.current++;
  }
  return cursor.current === start ? undefined : StepKind.Ignore;
}
