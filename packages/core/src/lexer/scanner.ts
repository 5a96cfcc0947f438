/**
 * Scanner
 * Character-level cursor over source text with line/column tracking.
 * The rule engine moves through input with it; hand-rolled tokenizers
 * can use the same primitives directly.
 */

import type { SourceLocation } from '../source-location.js';

export interface Scanner {
  readonly source: string;
  pos: number;
  line: number;
  column: number;
  baseOffset: number;
}

export function createScanner(
  source: string,
  baseLocation?: SourceLocation
): Scanner {
  return {
    source,
    pos: 0,
    line: baseLocation?.line ?? 1,
    column: baseLocation?.column ?? 1,
    baseOffset: baseLocation?.offset ?? 0,
  };
}

export function currentLocation(scanner: Scanner): SourceLocation {
  return {
    line: scanner.line,
    column: scanner.column,
    offset: scanner.pos + scanner.baseOffset,
  };
}

/** Character `offset` positions ahead, or '' past the end */
export function peekChar(scanner: Scanner, offset = 0): string {
  return scanner.source[scanner.pos + offset] ?? '';
}

export function peekString(scanner: Scanner, length: number): string {
  return scanner.source.slice(scanner.pos, scanner.pos + length);
}

/** Last consumed character, or '' at the start */
export function previousChar(scanner: Scanner): string {
  return scanner.source[scanner.pos - 1] ?? '';
}

export function advanceChar(scanner: Scanner): string {
  const ch = scanner.source[scanner.pos] ?? '';
  scanner.pos++;
  if (ch === '\n') {
    scanner.line++;
    scanner.column = 1;
  } else {
    scanner.column++;
  }
  return ch;
}

/** Consume `count` characters and return them */
export function advanceBy(scanner: Scanner, count: number): string {
  const start = scanner.pos;
  for (let i = 0; i < count && !isScanEnd(scanner); i++) {
    advanceChar(scanner);
  }
  return scanner.source.slice(start, scanner.pos);
}

export function isScanEnd(scanner: Scanner): boolean {
  return scanner.pos >= scanner.source.length;
}
