/**
 * Parser Toolkit
 * Cursor primitives and combinators for hand-written recursive-descent parsers
 */

export {
  advance,
  atEnd,
  check,
  checkpoint,
  createCursor,
  expect,
  expectEnd,
  formatExpected,
  match,
  peek,
  position,
  previous,
  reject,
  restore,
  unexpected,
  type Cursor,
  type Mark,
} from './cursor.js';
export {
  attempt,
  furthestFailure,
  many,
  many1,
  oneOf,
  optional,
  parseTokens,
  sepBy,
  type GrammarFn,
} from './combinators.js';
export {
  fail,
  mapResult,
  ok,
  unwrap,
  type ParseResult,
} from './result.js';
