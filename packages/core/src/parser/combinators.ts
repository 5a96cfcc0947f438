/**
 * Backtracking Combinators
 * Alternation, repetition and lookahead helpers for hand-written grammars.
 *
 * Every helper here leaves the cursor where it started when it fails, so
 * callers can try another alternative without re-lexing.
 */

import type { ParseError } from '../error-classes.js';
import type { Token } from '../lexer/token.js';
import {
  checkpoint,
  createCursor,
  expectEnd,
  match,
  restore,
  unexpected,
  type Cursor,
} from './cursor.js';
import { fail, ok, type ParseResult } from './result.js';

/** A grammar rule written as a function over a cursor */
export type GrammarFn<T> = (cursor: Cursor) => ParseResult<T>;

/** Run `fn`; rewind the cursor if it fails */
export function attempt<T>(cursor: Cursor, fn: GrammarFn<T>): ParseResult<T> {
  const mark = checkpoint(cursor);
  const result = fn(cursor);
  if (!result.ok) restore(cursor, mark);
  return result;
}

/** Run `fn`, turning failure into `null` without consuming anything */
export function optional<T>(
  cursor: Cursor,
  fn: GrammarFn<T>
): ParseResult<T | null> {
  const result = attempt(cursor, fn);
  return result.ok ? result : ok(null);
}

/**
 * Apply `fn` until it fails. An application that succeeds without
 * consuming a token ends the loop and is not collected.
 */
export function many<T>(cursor: Cursor, fn: GrammarFn<T>): ParseResult<T[]> {
  const items: T[] = [];
  for (;;) {
    const before = cursor.pos;
    const result = attempt(cursor, fn);
    if (!result.ok || cursor.pos === before) break;
    items.push(result.value);
  }
  return ok(items);
}

/** Like many, but the first application must succeed */
export function many1<T>(cursor: Cursor, fn: GrammarFn<T>): ParseResult<T[]> {
  const first = attempt(cursor, fn);
  if (!first.ok) return first;
  const rest = many(cursor, fn);
  return rest.ok ? ok([first.value, ...rest.value]) : rest;
}

/**
 * Zero or more `item`s separated by tokens of kind `separator`.
 * A separator commits to another item: if that item fails, the whole
 * list fails and the cursor returns to where the list started.
 */
export function sepBy<T>(
  cursor: Cursor,
  item: GrammarFn<T>,
  separator: string
): ParseResult<T[]> {
  const mark = checkpoint(cursor);
  const first = attempt(cursor, item);
  if (!first.ok) return ok([]);

  const items: T[] = [first.value];
  while (match(cursor, separator) !== null) {
    const next = item(cursor);
    if (!next.ok) {
      restore(cursor, mark);
      return next;
    }
    items.push(next.value);
  }
  return ok(items);
}

/**
 * Pick the most informative error among failed alternatives: the one
 * whose offending token lies furthest into the input. Among errors at
 * that same token, the first rejection wins; otherwise their expected
 * sets are merged.
 *
 * @throws RangeError when `errors` is empty
 */
export function furthestFailure(errors: readonly ParseError[]): ParseError {
  const [first, ...rest] = errors;
  if (first === undefined) {
    throw new RangeError('furthestFailure requires at least one error');
  }

  let furthest: ParseError[] = [first];
  for (const error of rest) {
    const best = furthest[0]?.offset ?? -1;
    if (error.offset > best) {
      furthest = [error];
    } else if (error.offset === best) {
      furthest.push(error);
    }
  }

  // A grammar's own rejection outranks structural mismatches at the same token
  const rejected = furthest.find((error) => error.reason === 'Rejected');
  if (rejected) return rejected;

  const lead = furthest[0] ?? first;
  if (furthest.length === 1) return lead;
  return unexpected(
    lead.token,
    furthest.flatMap((error) => error.expected)
  );
}

/**
 * Try `alternatives` in order from the same position; return the first
 * success. When all fail, report the furthest failure.
 */
export function oneOf<T>(
  cursor: Cursor,
  ...alternatives: GrammarFn<T>[]
): ParseResult<T> {
  const errors: ParseError[] = [];
  for (const alternative of alternatives) {
    const result = attempt(cursor, alternative);
    if (result.ok) return result;
    errors.push(result.error);
  }
  if (errors.length === 0) {
    throw new RangeError('oneOf requires at least one alternative');
  }
  return fail(furthestFailure(errors));
}

/**
 * Run `grammar` over `tokens` and require it to consume all of them.
 */
export function parseTokens<T>(
  tokens: readonly Token[],
  grammar: GrammarFn<T>
): ParseResult<T> {
  const cursor = createCursor(tokens);
  const result = grammar(cursor);
  if (!result.ok) return result;
  const end = expectEnd(cursor);
  return end.ok ? result : end;
}
