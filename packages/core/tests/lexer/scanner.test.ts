/**
 * Tests for character-level scanner primitives
 */

import { describe, it, expect } from 'vitest';
import {
  advanceBy,
  advanceChar,
  createScanner,
  currentLocation,
  isScanEnd,
  peekChar,
  peekString,
  previousChar,
} from '../../src/index.js';

describe('scanner', () => {
  it('starts at 1:1 offset 0', () => {
    const scanner = createScanner('ab');

    expect(currentLocation(scanner)).toEqual({ line: 1, column: 1, offset: 0 });
    expect(previousChar(scanner)).toBe('');
  });

  it('peeks without moving', () => {
    const scanner = createScanner('abc');

    expect(peekChar(scanner)).toBe('a');
    expect(peekChar(scanner, 2)).toBe('c');
    expect(peekChar(scanner, 3)).toBe('');
    expect(peekString(scanner, 2)).toBe('ab');
    expect(scanner.pos).toBe(0);
  });

  it('moves to the next line after a newline', () => {
    const scanner = createScanner('a\nb');

    expect(advanceChar(scanner)).toBe('a');
    expect(advanceChar(scanner)).toBe('\n');
    expect(currentLocation(scanner)).toEqual({ line: 2, column: 1, offset: 2 });
    expect(previousChar(scanner)).toBe('\n');
  });

  it('counts a carriage return as an ordinary column', () => {
    const scanner = createScanner('\r\nx');

    advanceChar(scanner);
    expect(currentLocation(scanner)).toEqual({ line: 1, column: 2, offset: 1 });
  });

  it('consumes several characters and stops at the end', () => {
    const scanner = createScanner('hello');

    expect(advanceBy(scanner, 3)).toBe('hel');
    expect(advanceBy(scanner, 10)).toBe('lo');
    expect(isScanEnd(scanner)).toBe(true);
    expect(currentLocation(scanner)).toEqual({ line: 1, column: 6, offset: 5 });
  });

  it('reports locations relative to a base location', () => {
    const scanner = createScanner('x\ny', { line: 4, column: 7, offset: 30 });

    advanceBy(scanner, 3);

    expect(currentLocation(scanner)).toEqual({ line: 5, column: 2, offset: 33 });
  });
});
