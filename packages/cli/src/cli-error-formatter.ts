/**
 * CLI Error Formatter
 * Format enriched errors for human-readable, JSON, or compact output
 */

import type { SourceSpan } from '@lexloom/core';
import type { EnrichedError } from './cli-error-enrichment.js';

// ============================================================
// PUBLIC TYPES
// ============================================================

export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = [
  'human',
  'json',
  'compact',
];

export interface FormatOptions {
  readonly format: OutputFormat;
  /** Input name shown in the human location line */
  readonly fileName?: string | undefined;
}

// ============================================================
// ERROR FORMATTING
// ============================================================

/**
 * Format an enriched error for output.
 *
 * - human: multi-line with snippet and caret underline
 * - json: LSP Diagnostic compatible
 * - compact: a single line for CI logs
 *
 * @throws {TypeError} Unknown format
 */
export function formatError(
  error: EnrichedError,
  options: FormatOptions
): string {
  switch (options.format) {
    case 'json':
      return formatErrorJson(error);
    case 'compact':
      return formatErrorCompact(error);
    case 'human':
      return formatErrorHuman(error, options);
    default:
      throw new TypeError(`Unknown format: ${String(options.format)}`);
  }
}

/**
 * Output format:
 * ```
 * error[LEX-L001]: Unexpected character "#" in state 'main'
 *   --> input.txt:1:5
 *   |
 * 1 | let # x
 *   |     ^
 *   |
 *   = help: Rule COMMENT matches here in state 'block'
 * ```
 */
function formatErrorHuman(error: EnrichedError, options: FormatOptions): string {
  const lines: string[] = [`error[${error.errorId}]: ${error.message}`];

  if (error.span) {
    const location = `${error.span.start.line}:${error.span.start.column}`;
    const prefix = options.fileName ? `${options.fileName}:` : '';
    lines.push(`  --> ${prefix}${location}`);
  }

  const snippet = error.sourceSnippet;
  const gutterWidth = snippet
    ? Math.max(...snippet.lines.map((l) => String(l.lineNumber).length), 1)
    : 1;
  const gutter = ' '.repeat(gutterWidth);

  if (snippet && snippet.lines.length > 0) {
    lines.push(`${gutter} |`);
    for (const line of snippet.lines) {
      const lineNumStr = String(line.lineNumber).padStart(gutterWidth, ' ');
      lines.push(`${lineNumStr} | ${line.content}`);
      if (line.isErrorLine && line.lineNumber === snippet.highlightSpan.start.line) {
        lines.push(
          `${gutter} | ${renderCaretUnderline(snippet.highlightSpan, line.content)}`
        );
      }
    }
    lines.push(`${gutter} |`);
  }

  for (const suggestion of error.suggestions ?? []) {
    lines.push(`${gutter} = help: ${suggestion}`);
  }

  return lines.join('\n');
}

interface LspPosition {
  line: number;
  character: number;
}

interface Diagnostic {
  errorId: string;
  severity: number;
  message: string;
  range?: { start: LspPosition; end: LspPosition };
  source: string;
  code: string;
  suggestions?: string[];
}

function toLspPosition(location: SourceSpan['start']): LspPosition {
  // LSP positions are 0-based on both axes
  return { line: location.line - 1, character: location.column - 1 };
}

function formatErrorJson(error: EnrichedError): string {
  const diagnostic: Diagnostic = {
    errorId: error.errorId,
    severity: 1,
    message: error.message,
    source: 'lexloom',
    code: error.errorId,
  };

  if (error.span) {
    diagnostic.range = {
      start: toLspPosition(error.span.start),
      end: toLspPosition(error.span.end),
    };
  }

  if (error.suggestions && error.suggestions.length > 0) {
    diagnostic.suggestions = error.suggestions;
  }

  return JSON.stringify(diagnostic, null, 2);
}

function formatErrorCompact(error: EnrichedError): string {
  const parts: string[] = [`[${error.errorId}]`, error.message];

  if (error.span) {
    parts.push(`at ${error.span.start.line}:${error.span.start.column}`);
  }

  const hint = error.suggestions?.[0];
  if (hint !== undefined) {
    parts.push(`(hint: ${hint})`);
  }

  return parts.join(' ');
}

// ============================================================
// CARET UNDERLINE
// ============================================================

/**
 * Render the caret line under the first line of `span`.
 * Columns are 1-based; a multi-line span is underlined to the end of its
 * first line and an empty span gets a single caret.
 *
 * @throws {RangeError} Span start after end
 */
export function renderCaretUnderline(
  span: SourceSpan,
  lineContent: string
): string {
  if (
    span.start.line > span.end.line ||
    (span.start.line === span.end.line && span.start.column > span.end.column)
  ) {
    throw new RangeError('Span start must precede end');
  }

  const endColumn =
    span.start.line === span.end.line
      ? span.end.column
      : lineContent.length + 1;

  const padding = ' '.repeat(span.start.column - 1);
  const carets = '^'.repeat(Math.max(1, endColumn - span.start.column));
  return padding + carets;
}
