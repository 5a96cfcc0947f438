/**
 * CLI Shared Utilities
 * Token and error output for the lexloom command
 */

import {
  LexloomError,
  VERSION,
  type RuleTable,
  type Token,
  type TokenValue,
} from '@lexloom/core';
import { enrichError } from './cli-error-enrichment.js';
import {
  formatError as formatEnrichedError,
  type FormatOptions,
  type OutputFormat,
} from './cli-error-formatter.js';

export { VERSION };

// ============================================================
// TOKEN OUTPUT
// ============================================================

function jsonValue(value: TokenValue): string | number | boolean | null {
  return typeof value === 'bigint' ? value.toString() : value;
}

function formatTokenHuman(token: Token): string {
  const base = `${token.line}:${token.column} ${token.kind} ${JSON.stringify(token.text)}`;
  if (token.value === token.text) return base;
  return `${base} = ${String(token.value)}`;
}

/**
 * Render a token sequence.
 *
 * - human: one `line:column KIND "text"` line per token, plus `= value`
 *   when a value transform changed it
 * - json: array of token records
 * - compact: `KIND("text")` items on one line
 */
export function formatTokens(
  tokens: readonly Token[],
  format: OutputFormat
): string {
  switch (format) {
    case 'json':
      return JSON.stringify(
        tokens.map((token) => ({
          kind: token.kind,
          text: token.text,
          value: jsonValue(token.value),
          start: token.start,
          end: token.end,
          line: token.line,
          column: token.column,
        })),
        null,
        2
      );
    case 'compact':
      return tokens
        .map((token) => `${token.kind}(${JSON.stringify(token.text)})`)
        .join(' ');
    case 'human':
      return tokens.map(formatTokenHuman).join('\n');
  }
}

// ============================================================
// ERROR OUTPUT
// ============================================================

function isNotFound(err: Error): err is Error & { path: unknown } {
  return 'code' in err && err.code === 'ENOENT' && 'path' in err;
}

/**
 * Format an error for stderr.
 *
 * lexloom errors go through the enrichment pipeline; `source` adds a
 * snippet and `table` adds state hints to lexer errors.
 */
export function formatError(
  err: Error,
  source?: string,
  options?: Partial<FormatOptions>,
  table?: RuleTable
): string {
  if (err instanceof LexloomError) {
    const enriched = enrichError(err, source ?? '', table);
    return formatEnrichedError(enriched, {
      format: options?.format ?? 'human',
      fileName: options?.fileName,
    });
  }

  if (isNotFound(err)) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}
