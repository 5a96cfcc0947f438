/**
 * Cursor
 * Positioned, read-only view over a token sequence and its navigation primitives
 */

import { messageFor, normalizeExpected, ParseError } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import {
  createToken,
  describeToken,
  EOF_KIND,
  isEofToken,
  type Token,
} from '../lexer/token.js';
import { fail, ok, type ParseResult } from './result.js';

// ============================================================
// CURSOR
// ============================================================

export interface Cursor {
  /** Tokens before the end marker */
  readonly tokens: readonly Token[];
  /** Returned by peek past the end; kind EOF */
  readonly endMarker: Token;
  /** Always in [0, tokens.length]; tokens.length means end of input */
  pos: number;
}

/** Saved cursor position */
export interface Mark {
  readonly pos: number;
}

const ORIGIN: SourceLocation = { line: 1, column: 1, offset: 0 };

function synthesizeEnd(last: Token | undefined): Token {
  const end = last?.span.end ?? ORIGIN;
  return createToken(EOF_KIND, '', '', end, end);
}

/**
 * Create a cursor over `tokens`. The first EOF token becomes the end
 * marker; without one, a marker is placed at the end of the last token.
 */
export function createCursor(tokens: readonly Token[]): Cursor {
  const eofIndex = tokens.findIndex(isEofToken);
  const body = eofIndex === -1 ? tokens : tokens.slice(0, eofIndex);
  const endMarker =
    tokens[eofIndex] ?? synthesizeEnd(body[body.length - 1]);

  return { tokens: body, endMarker, pos: 0 };
}

// ============================================================
// ERRORS
// ============================================================

/** Render an expected-kind set for messages */
export function formatExpected(expected: readonly string[]): string {
  const kinds = normalizeExpected(expected);
  if (kinds.length === 0) return 'any token';
  if (kinds.length === 1) return kinds[0] ?? '';
  if (kinds.length === 2) return `${kinds[0]} or ${kinds[1]}`;
  return `one of ${kinds.join(', ')}`;
}

/**
 * Build the error for `token` not being one of `expected`: LEX-P002 for
 * the end marker, LEX-P001 otherwise. `message` replaces the rendered
 * registry message.
 */
export function unexpected(
  token: Token,
  expected: readonly string[],
  message?: string
): ParseError {
  const context = { expected: formatExpected(expected), actual: describeToken(token) };
  const errorId = isEofToken(token) ? 'LEX-P002' : 'LEX-P001';
  return new ParseError(
    errorId,
    message ?? messageFor(errorId, context),
    token,
    expected,
    context
  );
}

/** Caller-defined semantic rejection of `token` */
export function reject(token: Token, reason: string): ParseError {
  return new ParseError('LEX-P003', messageFor('LEX-P003', { reason }), token, [], {
    reason,
  });
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** Token `offset` positions ahead of the cursor; the end marker past the end */
export function peek(cursor: Cursor, offset = 0): Token {
  return cursor.tokens[cursor.pos + offset] ?? cursor.endMarker;
}

export function atEnd(cursor: Cursor): boolean {
  return cursor.pos >= cursor.tokens.length;
}

export function position(cursor: Cursor): number {
  return cursor.pos;
}

/** Last consumed token, or null before the first advance */
export function previous(cursor: Cursor): Token | null {
  return cursor.tokens[cursor.pos - 1] ?? null;
}

export function check(cursor: Cursor, ...kinds: string[]): boolean {
  return kinds.includes(peek(cursor).kind);
}

/** Consume and return the current token */
export function advance(cursor: Cursor): ParseResult<Token> {
  const token = cursor.tokens[cursor.pos];
  if (token === undefined) {
    return fail(unexpected(cursor.endMarker, []));
  }
  cursor.pos++;
  return ok(token);
}

/**
 * Consume the current token if it has `kind`. On mismatch the cursor
 * does not move and the error carries `message` when one is given.
 */
export function expect(
  cursor: Cursor,
  kind: string,
  message?: string
): ParseResult<Token> {
  const token = peek(cursor);
  if (token.kind === kind && !atEnd(cursor)) {
    cursor.pos++;
    return ok(token);
  }
  return fail(unexpected(token, [kind], message));
}

/** Consume the current token if it has one of `kinds`; null otherwise */
export function match(cursor: Cursor, ...kinds: string[]): Token | null {
  if (atEnd(cursor) || !check(cursor, ...kinds)) return null;
  const token = peek(cursor);
  cursor.pos++;
  return token;
}

/** Succeed with the end marker only when every token was consumed */
export function expectEnd(cursor: Cursor): ParseResult<Token> {
  if (atEnd(cursor)) return ok(cursor.endMarker);
  return fail(unexpected(peek(cursor), [EOF_KIND]));
}

// ============================================================
// BACKTRACKING
// ============================================================

export function checkpoint(cursor: Cursor): Mark {
  return { pos: cursor.pos };
}

export function restore(cursor: Cursor, mark: Mark): void {
  if (mark.pos < 0 || mark.pos > cursor.tokens.length) {
    throw new RangeError(
      `Mark ${mark.pos} is outside the token sequence [0, ${cursor.tokens.length}]`
    );
  }
  cursor.pos = mark.pos;
}
