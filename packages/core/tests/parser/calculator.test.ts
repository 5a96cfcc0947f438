/**
 * End-to-end grammar tests: lexer rules plus a recursive-descent
 * calculator built from the toolkit
 */

import { describe, it, expect } from 'vitest';
import { LexError, unwrap } from '../../src/index.js';
import { evaluate } from '../helpers/calculator.js';

describe('calculator grammar', () => {
  describe('evaluation', () => {
    it.each([
      ['1 + 2 * 3', 7],
      ['(1 + 2) * 3', 9],
      ['10 - 4 - 3', 3],
      ['8 / 2 / 2', 2],
      ['-4 + 10', 6],
      ['-(2 + 3) * 2', -10],
      ['2.5 * 4', 10],
      ['max(1, 5, 3)', 5],
      ['min(4, max(2, 9)) * 2', 8],
    ])('evaluates %s to %d', (text, expected) => {
      expect(unwrap(evaluate(text))).toBe(expected);
    });
  });

  describe('errors', () => {
    it('lists every way an operand can start at the end of input', () => {
      const result = evaluate('1 +');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.errorId).toBe('LEX-P002');
        expect(result.error.expected).toEqual(['IDENT', 'LPAREN', 'MINUS', 'NUMBER']);
        expect(result.error.toData().message).toBe(
          'Expected one of IDENT, LPAREN, MINUS, NUMBER, got end of input'
        );
      }
    });

    it('reports an unclosed parenthesis at the end of input', () => {
      const result = evaluate('(1 + 2');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.offset).toBe(6);
        expect(result.error.toData().message).toBe(
          'Expected RPAREN, got end of input'
        );
      }
    });

    it('surfaces grammar rejections over structural mismatches', () => {
      const result = evaluate('2 * x');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.reason).toBe('Rejected');
        expect(result.error.offset).toBe(4);
        expect(result.error.message).toBe('Unknown function x at 1:5');
      }
    });

    it('rejects division by zero at the operator', () => {
      const result = evaluate('1 / 0');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.errorId).toBe('LEX-P003');
        expect(result.error.token.text).toBe('/');
        expect(result.error.offset).toBe(2);
      }
    });

    it('reports trailing tokens', () => {
      const result = evaluate('1 2');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.toData().message).toBe('Expected EOF, got NUMBER "2"');
      }
    });

    it('throws lexer errors before parsing', () => {
      expect(() => evaluate('1 $ 2')).toThrow(LexError);
    });
  });
});
