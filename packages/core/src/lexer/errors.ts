/**
 * Lexer Errors
 */

import { LexloomError } from '../error-classes.js';
import { ERROR_REGISTRY } from '../error-registry.js';
import type { SourceLocation } from '../source-location.js';

export class LexError extends LexloomError {
  // Lexer errors always point at a position in the input
  override readonly location: SourceLocation;
  /** Lexer state active when scanning failed */
  readonly state: string;
  /** Offending input: one code point, or the matched text for LEX-L002 */
  readonly slice: string;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    details: { state: string; slice: string },
    context?: Record<string, unknown>
  ) {
    const definition = ERROR_REGISTRY.get(errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${errorId}`);
    }
    if (definition.category !== 'lexer') {
      throw new TypeError(`Expected lexer error ID, got: ${errorId}`);
    }

    super({ errorId, message, location, context });
    this.name = 'LexError';
    this.location = location;
    this.state = details.state;
    this.slice = details.slice;
  }

  get offset(): number {
    return this.location.offset;
  }

  get line(): number {
    return this.location.line;
  }

  get column(): number {
    return this.location.column;
  }
}
