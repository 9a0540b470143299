/**
 * Comment recognition. The multi-line start marker is tested first so that a
 * marker like `--[[` is not taken for the single-line `--`.
 */

import { CharacterCodes, fromCodePoints } from './character-codes.js';
import type { Candidate } from './language.js';
import { matchesAt, type ScanContext } from './scan-context.js';
import { ScanError } from './scan-error.js';
import { commentToken, type CommentToken } from './token-types.js';

export function scanComment(ctx: ScanContext): CommentToken | ScanError | undefined {
  const { chars, cursor, language } = ctx;

  const multi = language.multiLineComment;
  if (multi && matchesAt(chars, cursor.current, multi.start.codes))
    return scanMultiLineComment(ctx, multi.start, multi.end);

  const single = language.singleLineComment;
  if (single && matchesAt(chars, cursor.current, single.codes))
    return scanSingleLineComment(ctx);

  return undefined;
}

/**
 * Runs to the end of the line. The line break itself is not part of the
 * comment; the newline classifier consumes it next.
 */
function scanSingleLineComment({ chars, cursor }: ScanContext): CommentToken {
  while (cursor.current < chars.length) {
    const ch = chars[cursor.current];
    if (ch === CharacterCodes.lineFeed || ch === CharacterCodes.carriageReturn) break;
    cursor.current++;
  }
  return commentToken(fromCodePoints(chars, cursor.start, cursor.current));
}

/**
 * Nested comments are tracked by depth. Markers inside a double-quoted string
 * within the comment do not count; a backslash keeps the next character from
 * toggling the quoted state.
 */
function scanMultiLineComment(
  { chars, cursor, buffer }: ScanContext,
  start: Candidate,
  end: Candidate,
): CommentToken | ScanError {
  cursor.current += start.codes.length;

  let depth = 1;
  let inString = false;
  let escape = false;

  while (cursor.current < chars.length) {
    const ch = chars[cursor.current];

    if (ch === CharacterCodes.lineFeed) {
      cursor.line++;
      escape = false;
      cursor.current++;
      continue;
    }

    if (ch === CharacterCodes.backslash && !escape) {
      escape = true;
      cursor.current++;
      continue;
    }

    if (ch === CharacterCodes.doubleQuote && !escape) {
      inString = !inString;
    } else if (!inString) {
      if (matchesAt(chars, cursor.current, end.codes)) {
        cursor.current += end.codes.length;
        escape = false;
        depth--;
        if (depth === 0)
          return commentToken(fromCodePoints(chars, cursor.start, cursor.current));
        continue;
      }
      if (matchesAt(chars, cursor.current, start.codes)) {
        cursor.current += start.codes.length;
        escape = false;
        depth++;
        continue;
      }
    }

    escape = false;
    cursor.current++;
  }

  // Unterminated: keep what was read so a live buffer still shows the comment
  const length = chars.length - cursor.start;
  buffer.push(commentToken(fromCodePoints(chars, cursor.start, chars.length)), cursor.start, length, cursor.startLine);
  return ScanError.unexpectedEof(cursor.startLine, cursor.start, length);
}
