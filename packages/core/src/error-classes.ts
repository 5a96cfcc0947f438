/**
 * Error Classes
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import type { Token } from './lexer/token.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface LexloomErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Render the registry message template for an error ID.
 *
 * @throws TypeError if errorId is not found in registry
 *
 * @example
 * messageFor('LEX-P001', { expected: 'RPAREN', actual: 'NUMBER' })
 * // Returns: "Expected RPAREN, got NUMBER"
 */
export function messageFor(
  errorId: string,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

function assertCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all lexloom errors.
 * Provides structured data for host applications to format as needed.
 */
export class LexloomError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: LexloomErrorData) {
    if (!data.errorId) {
      throw new TypeError('errorId is required');
    }
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'LexloomError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): LexloomErrorData {
    return {
      errorId: this.errorId,
      message: this.message.replace(/ at \d+:\d+$/, ''),
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LexloomErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Rule table construction errors */
export class RuleError extends LexloomError {
  constructor(errorId: string, context: Record<string, unknown>) {
    assertCategory(errorId, 'rules');
    super({ errorId, message: messageFor(errorId, context), context });
    this.name = 'RuleError';
  }
}

export type ParseErrorReason = 'UnexpectedToken' | 'UnexpectedEnd' | 'Rejected';

const PARSE_ERROR_REASONS: Record<string, ParseErrorReason> = {
  'LEX-P001': 'UnexpectedToken',
  'LEX-P002': 'UnexpectedEnd',
  'LEX-P003': 'Rejected',
};

/**
 * Token-stream structural mismatch.
 * Carries the offending token (the end marker for UnexpectedEnd) and the
 * set of kinds that would have been accepted.
 */
export class ParseError extends LexloomError {
  override readonly location: SourceLocation;
  readonly reason: ParseErrorReason;
  readonly token: Token;
  readonly expected: readonly string[];

  constructor(
    errorId: string,
    message: string,
    token: Token,
    expected: readonly string[] = [],
    context?: Record<string, unknown>
  ) {
    assertCategory(errorId, 'parse');
    const reason = PARSE_ERROR_REASONS[errorId];
    if (reason === undefined) {
      throw new TypeError(`Expected parse error ID, got: ${errorId}`);
    }

    const location = token.span.start;
    super({ errorId, message, location, context });
    this.name = 'ParseError';
    this.location = location;
    this.reason = reason;
    this.token = token;
    this.expected = normalizeExpected(expected);
  }

  /** Offset of the offending token */
  get offset(): number {
    return this.token.start;
  }
}

/** Sort and de-duplicate an expected-kind set */
export function normalizeExpected(expected: readonly string[]): string[] {
  return [...new Set(expected)].sort();
}
