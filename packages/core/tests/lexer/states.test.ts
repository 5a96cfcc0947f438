/**
 * Tests for lexer states and the state stack
 */

import { describe, it, expect } from 'vitest';
import {
  RuleError,
  defineRules,
  jump,
  lex,
  literal,
  pattern,
  pop,
  push,
  tokenize,
  type RuleTable,
  type Token,
  type TransitionEvent,
} from '../../src/index.js';

const stringTable = defineRules([
  { kind: 'QUOTE', match: literal('"'), transition: push('string') },
  { kind: 'IDENT', match: pattern(/[a-z]+/) },
  { kind: 'WS', match: pattern(/\s+/), ignore: true },
  { kind: 'CHARS', match: pattern(/[^"\\]+/), state: 'string' },
  { kind: 'ESCAPE', match: pattern(/\\./), state: 'string' },
  { kind: 'END_QUOTE', match: literal('"'), state: 'string', transition: pop() },
]);

function kinds(tokens: readonly Token[]): string[] {
  return tokens.map((token) => token.kind);
}

function transitionsOf(
  text: string,
  rules: RuleTable
): Pick<TransitionEvent, 'action' | 'from' | 'to'>[] {
  const events: Pick<TransitionEvent, 'action' | 'from' | 'to'>[] = [];
  const iterator = tokenize(text, rules, {
    callbacks: {
      onTransition: ({ action, from, to }) => events.push({ action, from, to }),
    },
  });
  for (const token of iterator) {
    if (token.kind === 'EOF') break;
  }
  return events;
}

describe('lexer states', () => {
  it('switches rule sets on push and pop', () => {
    const tokens = [...tokenize('say "hi\\n there" ok', stringTable)];

    expect(kinds(tokens)).toEqual([
      'IDENT',
      'QUOTE',
      'CHARS',
      'ESCAPE',
      'CHARS',
      'END_QUOTE',
      'IDENT',
      'EOF',
    ]);
    expect(tokens[3]?.text).toBe('\\n');
    expect(tokens[4]?.text).toBe(' there');
  });

  it('reports each transition after the stack changes', () => {
    expect(transitionsOf('"a" b', stringTable)).toEqual([
      { action: 'push', from: 'main', to: 'string' },
      { action: 'pop', from: 'string', to: 'main' },
    ]);
  });

  it('replaces the current state on jump', () => {
    const table = defineRules([
      { kind: 'WORD', match: pattern(/[a-z]+/) },
      { kind: 'SECTION', match: literal('[data]'), transition: jump('data') },
      { kind: 'NUM', match: pattern(/\d+/), state: 'data' },
      { kind: 'NL', match: pattern(/\n/), ignore: true, state: ['main', 'data'] },
    ]);

    const result = lex('abc\n[data]\n12', table);

    expect(result.ok).toBe(true);
    expect(kinds(result.tokens)).toEqual(['WORD', 'SECTION', 'NUM', 'EOF']);
    expect(transitionsOf('[data]', table)).toEqual([
      { action: 'jump', from: 'main', to: 'data' },
    ]);
  });

  it('fails when a pop would empty the stack', () => {
    const table = defineRules([
      { kind: 'OPEN', match: literal('('), transition: push('main') },
      { kind: 'CLOSE', match: literal(')'), transition: pop() },
    ]);

    expect(lex('(())', table).ok).toBe(true);

    const result = lex('())', table);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.errorId).toBe('LEX-L002');
      expect(result.error.offset).toBe(2);
      expect(result.error.column).toBe(3);
      expect(result.error.slice).toBe(')');
      expect(result.error.state).toBe('main');
      expect(result.error.toData().message).toBe(
        "Rule CLOSE pops state 'main', which is the bottom of the state stack"
      );
      expect(kinds(result.tokens)).toEqual(['OPEN', 'CLOSE']);
    }
  });

  it('starts in a caller-chosen state', () => {
    const tokens = [...tokenize('hi', stringTable, { initialState: 'string' })];

    expect(kinds(tokens)).toEqual(['CHARS', 'EOF']);
    expect(lex('"', stringTable, { initialState: 'string' }).ok).toBe(false);
  });

  it('rejects an unknown initial state before iteration starts', () => {
    expect(() => tokenize('x', stringTable, { initialState: 'strin' })).toThrow(
      RuleError
    );
    expect(() => tokenize('x', stringTable, { initialState: 'strin' })).toThrow(
      "Unknown lexer state 'strin'. Did you mean 'string'?"
    );
  });

  it('keeps the stacks of interleaved runs apart', () => {
    const first = tokenize('"a" b', stringTable);
    const second = tokenize('c "d"', stringTable);

    const order: string[] = [];
    for (;;) {
      const a = first.next();
      const b = second.next();
      if (a.done && b.done) break;
      if (!a.done) order.push(`1:${a.value.kind}`);
      if (!b.done) order.push(`2:${b.value.kind}`);
    }

    expect(order).toEqual([
      '1:QUOTE',
      '2:IDENT',
      '1:CHARS',
      '2:QUOTE',
      '1:END_QUOTE',
      '2:CHARS',
      '1:IDENT',
      '2:END_QUOTE',
      '1:EOF',
      '2:EOF',
    ]);
  });
});
