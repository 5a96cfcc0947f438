/**
 * Tests for backtracking combinators
 */

import { describe, it, expect as assert } from 'vitest';
import {
  ParseError,
  attempt,
  createCursor,
  expect,
  fail,
  furthestFailure,
  many,
  many1,
  mapResult,
  ok,
  oneOf,
  optional,
  parseTokens,
  position,
  reject,
  peek,
  sepBy,
  unexpected,
  unwrap,
  type Cursor,
  type ParseResult,
  type Token,
} from '../../src/index.js';
import { tokensOf } from '../helpers/calculator.js';

function ident(cursor: Cursor): ParseResult<string> {
  return mapResult(expect(cursor, 'IDENT'), (token) => token.text);
}

/** IDENT PLUS <kind> */
function sumWith(kind: string) {
  return (cursor: Cursor): ParseResult<Token> => {
    const left = expect(cursor, 'IDENT');
    if (!left.ok) return left;
    const plus = expect(cursor, 'PLUS');
    if (!plus.ok) return plus;
    return expect(cursor, kind);
  };
}

describe('attempt', () => {
  it('rewinds the cursor when the grammar fails part way', () => {
    const cursor = createCursor(tokensOf('a + )'));

    const result = attempt(cursor, sumWith('NUMBER'));

    assert(result.ok).toBe(false);
    assert(position(cursor)).toBe(0);
  });

  it('keeps the position on success', () => {
    const cursor = createCursor(tokensOf('a + 1'));

    const result = attempt(cursor, sumWith('NUMBER'));

    assert(result.ok).toBe(true);
    assert(position(cursor)).toBe(3);
  });
});

describe('optional', () => {
  it('turns failure into null without consuming', () => {
    const cursor = createCursor(tokensOf('1'));

    const result = optional(cursor, ident);

    assert(result).toEqual({ ok: true, value: null });
    assert(position(cursor)).toBe(0);
  });
});

describe('many', () => {
  it('collects items until the first failure', () => {
    const cursor = createCursor(tokensOf('a b c + 1'));

    const result = many(cursor, ident);

    assert(result).toEqual({ ok: true, value: ['a', 'b', 'c'] });
    assert(peek(cursor).kind).toBe('PLUS');
  });

  it('stops on an item that consumes nothing', () => {
    const cursor = createCursor(tokensOf('a'));

    const result = many(cursor, () => ok(1));

    assert(result).toEqual({ ok: true, value: [] });
  });

  it('requires one item in many1', () => {
    const cursor = createCursor(tokensOf('1'));

    const result = many1(cursor, ident);

    assert(result.ok).toBe(false);
    if (!result.ok) {
      assert(result.error.expected).toEqual(['IDENT']);
    }
    assert(unwrap(many1(createCursor(tokensOf('a b')), ident))).toEqual(['a', 'b']);
  });
});

describe('sepBy', () => {
  it('parses separated items', () => {
    const cursor = createCursor(tokensOf('a, b, c'));

    assert(unwrap(sepBy(cursor, ident, 'COMMA'))).toEqual(['a', 'b', 'c']);
  });

  it('accepts an empty list', () => {
    const cursor = createCursor(tokensOf('1'));

    assert(sepBy(cursor, ident, 'COMMA')).toEqual({ ok: true, value: [] });
    assert(position(cursor)).toBe(0);
  });

  it('fails on a trailing separator and rewinds the whole list', () => {
    const cursor = createCursor(tokensOf('a, b,'));

    const result = sepBy(cursor, ident, 'COMMA');

    assert(result.ok).toBe(false);
    if (!result.ok) {
      assert(result.error.toData().message).toBe(
        'Expected IDENT, got end of input'
      );
    }
    assert(position(cursor)).toBe(0);
  });
});

describe('oneOf', () => {
  it('returns the first successful alternative', () => {
    const cursor = createCursor(tokensOf('a + b'));

    const result = oneOf(cursor, sumWith('NUMBER'), sumWith('IDENT'));

    assert(result.ok && result.value.text).toBe('b');
  });

  it('merges expected sets of the furthest failures', () => {
    const cursor = createCursor(tokensOf('a + )'));

    const result = oneOf(
      cursor,
      sumWith('NUMBER'),
      sumWith('IDENT'),
      (c) => expect(c, 'NUMBER')
    );

    assert(position(cursor)).toBe(0);
    assert(result.ok).toBe(false);
    if (!result.ok) {
      assert(result.error.errorId).toBe('LEX-P001');
      assert(result.error.offset).toBe(4);
      assert(result.error.expected).toEqual(['IDENT', 'NUMBER']);
      assert(result.error.toData().message).toBe(
        'Expected IDENT or NUMBER, got RPAREN ")"'
      );
    }
  });

  it('prefers a rejection at the furthest token', () => {
    const cursor = createCursor(tokensOf('a + )'));

    const result = oneOf(cursor, sumWith('NUMBER'), (c) => {
      const head = sumWith('PLUS')(c);
      return head.ok ? head : fail(reject(head.error.token, 'No empty operand'));
    });

    assert(result.ok).toBe(false);
    if (!result.ok) {
      assert(result.error.reason).toBe('Rejected');
      assert(result.error.toData().message).toBe('No empty operand');
    }
  });

  it('requires at least one alternative', () => {
    const cursor = createCursor(tokensOf('a'));

    assert(() => oneOf<string>(cursor)).toThrow(RangeError);
  });
});

describe('furthestFailure', () => {
  const tokens = tokensOf('a + 1');

  function errorAt(index: number, expected: string[]): ParseError {
    const token = tokens[index];
    if (token === undefined) throw new Error(`no token ${index}`);
    return unexpected(token, expected);
  }

  it('picks the error furthest into the input', () => {
    const error = furthestFailure([
      errorAt(0, ['NUMBER']),
      errorAt(2, ['IDENT']),
      errorAt(1, ['STAR']),
    ]);

    assert(error.offset).toBe(4);
    assert(error.expected).toEqual(['IDENT']);
  });

  it('returns a lone furthest error unchanged', () => {
    const lone = errorAt(1, ['STAR']);

    assert(furthestFailure([errorAt(0, ['NUMBER']), lone])).toBe(lone);
  });

  it('throws on an empty list', () => {
    assert(() => furthestFailure([])).toThrow(RangeError);
  });
});

describe('parseTokens', () => {
  it('requires the grammar to consume every token', () => {
    const result = parseTokens(tokensOf('a 1'), (c) => many(c, ident));

    assert(result.ok).toBe(false);
    if (!result.ok) {
      assert(result.error.toData().message).toBe('Expected EOF, got NUMBER "1"');
    }
  });

  it('returns the grammar value on full consumption', () => {
    assert(unwrap(parseTokens(tokensOf('a b'), (c) => many(c, ident)))).toEqual([
      'a',
      'b',
    ]);
  });

  it('throws the ParseError from unwrap', () => {
    assert(() => unwrap(parseTokens(tokensOf('1'), ident))).toThrow(ParseError);
  });
});
