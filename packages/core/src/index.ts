/**
 * lexloom
 * Rule-based lexer engine and recursive-descent parser toolkit
 */

export type { SourceLocation, SourceSpan } from './source-location.js';
export { suggestSimilarNames } from './suggest.js';
export { VERSION } from './version.js';

// ============================================================
// LEXER ENGINE
// ============================================================
export * from './lexer/index.js';

// ============================================================
// PARSER TOOLKIT
// ============================================================
export * from './parser/index.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorRegistry,
} from './error-registry.js';
export {
  LexloomError,
  ParseError,
  RuleError,
  messageFor,
  normalizeExpected,
  type LexloomErrorData,
  type ParseErrorReason,
} from './error-classes.js';
