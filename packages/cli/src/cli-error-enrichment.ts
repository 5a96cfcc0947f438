/**
 * CLI Error Enrichment
 * Attaches source snippets, spans and hints to lexloom errors
 */

import {
  LexError,
  ParseError,
  advanceBy,
  createScanner,
  currentLocation,
  matchAt,
  type LexloomError,
  type RuleTable,
  type SourceSpan,
} from '@lexloom/core';

// ============================================================
// PUBLIC TYPES
// ============================================================

export interface SourceSnippet {
  readonly lines: SnippetLine[];
  readonly highlightSpan: SourceSpan;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface EnrichedError {
  readonly errorId: string;
  readonly message: string;
  readonly span?: SourceSpan | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly sourceSnippet?: SourceSnippet | undefined;
  readonly suggestions?: string[] | undefined;
}

// ============================================================
// SOURCE SNIPPET EXTRACTION
// ============================================================

/**
 * Extract source lines around an error span, `contextLines` before and
 * after. Line numbers are 1-based.
 *
 * @throws {RangeError} When the span lies outside the source
 */
export function extractSnippet(
  source: string,
  span: SourceSpan,
  contextLines: number = 2
): SourceSnippet {
  if (source === '') {
    return { lines: [], highlightSpan: span };
  }

  const lines = source.split('\n');
  const totalLines = lines.length;

  if (span.start.line < 1 || span.start.line > totalLines) {
    throw new RangeError('Span exceeds source bounds');
  }
  if (span.end.line < 1 || span.end.line > totalLines) {
    throw new RangeError('Span exceeds source bounds');
  }

  const firstLine = Math.max(1, span.start.line - contextLines);
  const lastLine = Math.min(totalLines, span.end.line + contextLines);

  const snippetLines: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippetLines.push({
      lineNumber: lineNum,
      content: lines[lineNum - 1] ?? '',
      isErrorLine: lineNum >= span.start.line && lineNum <= span.end.line,
    });
  }

  return { lines: snippetLines, highlightSpan: span };
}

// ============================================================
// SPANS
// ============================================================

function errorSpan(error: LexloomError): SourceSpan | undefined {
  if (error instanceof ParseError) {
    return error.token.span;
  }
  if (error instanceof LexError) {
    // The offending slice can run over several lines (LEX-L002)
    const scanner = createScanner(error.slice, error.location);
    advanceBy(scanner, error.slice.length);
    return { start: error.location, end: currentLocation(scanner) };
  }
  if (error.location) {
    return { start: error.location, end: error.location };
  }
  return undefined;
}

function lineCount(source: string): number {
  return source.split('\n').length;
}

// ============================================================
// SUGGESTIONS
// ============================================================

/**
 * Rules in other states that would have matched where scanning stopped.
 */
function otherStateMatches(
  error: LexError,
  source: string,
  table: RuleTable
): string[] {
  const hints: string[] = [];
  for (const [state, rules] of table.states) {
    if (state === error.state) continue;
    for (const rule of rules) {
      const length = matchAt(rule.matcher, source, error.offset);
      if (length !== null && length > 0) {
        hints.push(`Rule ${rule.kind} matches here in state '${state}'`);
      }
    }
  }
  return hints;
}

// ============================================================
// ERROR ENRICHMENT
// ============================================================

/**
 * Enrich a lexloom error with a source snippet and hints.
 *
 * @param error - Error raised while loading rules, lexing or parsing
 * @param source - Input text the error refers to
 * @param table - Rule table in use, for state hints on lexer errors
 */
export function enrichError(
  error: LexloomError,
  source: string,
  table?: RuleTable
): EnrichedError {
  const span = errorSpan(error);

  let sourceSnippet: SourceSnippet | undefined;
  if (span && source !== '' && span.end.line <= lineCount(source)) {
    sourceSnippet = extractSnippet(source, span);
  }

  let suggestions: string[] | undefined;
  if (table && error instanceof LexError && error.errorId === 'LEX-L001') {
    const hints = otherStateMatches(error, source, table);
    if (hints.length > 0) {
      suggestions = hints;
    }
  }

  return {
    errorId: error.errorId,
    message: error.toData().message,
    span,
    context: error.context,
    sourceSnippet,
    suggestions,
  };
}
