/**
 * Tests for the error registry and message templates
 */

import { describe, it, expect } from 'vitest';
import {
  ERROR_ID_PATTERN,
  ERROR_REGISTRY,
  renderMessage,
} from '../../src/index.js';

describe('ERROR_REGISTRY', () => {
  it('holds every lexer, parse and rule error', () => {
    expect([...ERROR_REGISTRY.entries()].map(([id]) => id)).toEqual([
      'LEX-L001',
      'LEX-L002',
      'LEX-P001',
      'LEX-P002',
      'LEX-P003',
      'LEX-R001',
      'LEX-R002',
      'LEX-R003',
      'LEX-R004',
      'LEX-R005',
      'LEX-R006',
      'LEX-R007',
    ]);
    expect(ERROR_REGISTRY.size).toBe(12);
  });

  it('files each ID under the category its letter names', () => {
    const letters: Record<string, string> = { L: 'lexer', P: 'parse', R: 'rules' };

    for (const [id, definition] of ERROR_REGISTRY.entries()) {
      expect(id).toMatch(ERROR_ID_PATTERN);
      expect(definition.errorId).toBe(id);
      expect(definition.category).toBe(letters[id.charAt(4)]);
      expect(definition.description.length).toBeLessThanOrEqual(50);
    }
  });

  it('returns undefined for unknown IDs', () => {
    expect(ERROR_REGISTRY.get('LEX-L999')).toBeUndefined();
    expect(ERROR_REGISTRY.has('LEX-L999')).toBe(false);
    expect(ERROR_REGISTRY.has('LEX-L001')).toBe(true);
  });
});

describe('renderMessage', () => {
  it('replaces placeholders with context values', () => {
    expect(
      renderMessage('Expected {expected}, got {actual}', {
        expected: 'IDENT',
        actual: 'NUMBER "1"',
      })
    ).toBe('Expected IDENT, got NUMBER "1"');
  });

  it('coerces non-string values', () => {
    expect(renderMessage('rule #{index}', { index: 3 })).toBe('rule #3');
  });

  it('renders missing values as empty strings', () => {
    expect(renderMessage('state {state}{hint}', { state: 'main' })).toBe(
      'state main'
    );
  });

  it('returns a template with an unclosed brace unchanged', () => {
    expect(renderMessage('broken {name', { name: 'x' })).toBe('broken {name');
  });
});
