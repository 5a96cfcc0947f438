/**
 * Parse Results
 * A grammar step yields its value or a ParseError; failures are returned, not thrown
 */

import type { ParseError } from '../error-classes.js';

export type ParseResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: ParseError };

export function ok<T>(value: T): ParseResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: ParseError): ParseResult<T> {
  return { ok: false, error };
}

/**
 * Return the value of a successful result, or throw its ParseError.
 * For grammars that prefer exceptions at their outer boundary.
 */
export function unwrap<T>(result: ParseResult<T>): T {
  if (result.ok) return result.value;
  throw result.error;
}

export function mapResult<T, U>(
  result: ParseResult<T>,
  fn: (value: T) => U
): ParseResult<U> {
  return result.ok ? ok(fn(result.value)) : result;
}
