/**
 * CLI Error Explanation
 * Renders the registry documentation for --explain
 */

import { ERROR_ID_PATTERN, ERROR_REGISTRY } from '@lexloom/core';

/**
 * Render full documentation for an error ID.
 *
 * @returns Documentation text, or null for a malformed or unknown ID
 *
 * @example
 * explainError('LEX-L001')
 * // "LEX-L001: Unexpected character\n\nCause: ..."
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [
    `${definition.errorId}: ${definition.description}`,
    '',
  ];

  if (definition.cause) {
    sections.push('Cause:', `  ${definition.cause}`, '');
  }

  if (definition.resolution) {
    sections.push('Resolution:', `  ${definition.resolution}`, '');
  }

  if (definition.examples && definition.examples.length > 0) {
    sections.push('Examples:');
    for (const example of definition.examples) {
      sections.push(`  ${example.description}`, '');
      for (const line of example.code.split('\n')) {
        sections.push(`    ${line}`);
      }
      sections.push('');
    }
  }

  return sections.join('\n').trimEnd();
}
