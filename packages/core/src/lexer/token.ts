import type { SourceLocation, SourceSpan } from '../source-location.js';

// ============================================================
// TOKENS
// ============================================================

/** Kind of the end-of-stream sentinel; reserved, no rule may use it */
export const EOF_KIND = 'EOF';

/** Interpreted value of a token, as computed by a rule's value transform */
export type TokenValue = string | number | boolean | bigint | null;

export interface Token {
  /** Name of the rule that produced the token */
  readonly kind: string;
  /** Exact matched substring */
  readonly text: string;
  /** Interpreted value (the text unless the rule transforms it) */
  readonly value: TokenValue;
  /** Offset of the first character */
  readonly start: number;
  /** Offset one past the last character */
  readonly end: number;
  readonly line: number;
  readonly column: number;
  readonly span: SourceSpan;
}

export function isEofToken(token: Token): boolean {
  return token.kind === EOF_KIND;
}

/** Render a token for error messages, e.g. `IDENT "foo"` */
export function describeToken(token: Token): string {
  if (isEofToken(token)) return 'end of input';
  return `${token.kind} ${JSON.stringify(token.text)}`;
}

function freezeLocation(location: SourceLocation): SourceLocation {
  return Object.freeze({
    line: location.line,
    column: location.column,
    offset: location.offset,
  });
}

/**
 * Build a frozen token spanning `start` to `end`. The span and both
 * locations are copied and frozen with it.
 */
export function createToken(
  kind: string,
  text: string,
  value: TokenValue,
  start: SourceLocation,
  end: SourceLocation
): Token {
  const span: SourceSpan = Object.freeze({
    start: freezeLocation(start),
    end: freezeLocation(end),
  });
  return Object.freeze({
    kind,
    text,
    value,
    start: start.offset,
    end: end.offset,
    line: start.line,
    column: start.column,
    span,
  });
}
