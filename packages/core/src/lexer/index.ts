/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexError } from './errors.js';
export {
  DEFAULT_STATE,
  assertState,
  defineRules,
  jump,
  literal,
  matchAt,
  pattern,
  pop,
  push,
  rulesFor,
  type CompiledMatcher,
  type CompiledRule,
  type Matcher,
  type RuleSpec,
  type RuleTable,
  type RuleTableOptions,
  type Transition,
  type ValueTransform,
} from './rules.js';
export {
  advanceBy,
  advanceChar,
  createScanner,
  currentLocation,
  isScanEnd,
  peekChar,
  peekString,
  previousChar,
  type Scanner,
} from './scanner.js';
export {
  EOF_KIND,
  createToken,
  describeToken,
  isEofToken,
  type Token,
  type TokenValue,
} from './token.js';
export {
  lex,
  tokenize,
  type LexResult,
  type TokenizeCallbacks,
  type TokenizeOptions,
  type TransitionEvent,
} from './tokenizer.js';
