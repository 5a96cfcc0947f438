/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'rules';

/**
 * Example demonstrating an error condition.
 * Used by `lexloom --explain` to show common scenarios.
 */
export interface ErrorExample {
  /** Description of the example scenario */
  readonly description: string;
  /** Rules and input demonstrating the error */
  readonly code: string;
}

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LEX-{category}{3-digit} (e.g., LEX-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  readonly cause?: string | undefined;
  readonly resolution?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

/** Pattern every error ID follows (L=lexer, P=parse, R=rules) */
export const ERROR_ID_PATTERN = /^LEX-[LPR]\d{3}$/;

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Central registry for all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (LEX-L0xx)
  {
    errorId: 'LEX-L001',
    category: 'lexer',
    description: 'Unexpected character',
    messageTemplate: 'Unexpected character {char} in state {state}',
    cause:
      'No rule active in the current lexer state matches a non-empty prefix of the input at this position.',
    resolution:
      'Add a rule covering the character to the active state, or mark a catch-all rule (such as whitespace) as ignored.',
    examples: [
      {
        description: 'Character not covered by any rule',
        code: 'rules: IDENT /[a-z]+/, WS /\\s+/ (ignored)\ninput: "abc # def"',
      },
    ],
  },
  {
    errorId: 'LEX-L002',
    category: 'lexer',
    description: 'Lexer state stack underflow',
    messageTemplate:
      'Rule {kind} pops state {state}, which is the bottom of the state stack',
    cause:
      'A rule with a pop transition matched while only the initial state was on the stack.',
    resolution:
      'Pair every pop with an earlier push, or use a jump transition to switch states without the stack.',
    examples: [
      {
        description: 'Closing quote matched in the initial state',
        code: 'rules: CLOSE \'"\' (pop) in state main\ninput: \'"\'',
      },
    ],
  },

  // Parse Errors (LEX-P0xx)
  {
    errorId: 'LEX-P001',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'Expected {expected}, got {actual}',
    cause: 'The current token does not have any of the kinds the grammar accepts here.',
    resolution:
      'Check the input near the reported token, or extend the grammar to accept this kind.',
    examples: [
      {
        description: 'Missing closing parenthesis',
        code: 'input: "(1 + 2" with grammar expecting RPAREN',
      },
    ],
  },
  {
    errorId: 'LEX-P002',
    category: 'parse',
    description: 'Unexpected end of input',
    messageTemplate: 'Expected {expected}, got end of input',
    cause: 'The token sequence ended while the grammar still required more tokens.',
    resolution: 'Complete the construct that was left open before the end of input.',
  },
  {
    errorId: 'LEX-P003',
    category: 'parse',
    description: 'Input rejected by grammar',
    messageTemplate: '{reason}',
    cause:
      'A grammar function rejected a structurally valid token sequence (for example a duplicate name or an out-of-range literal).',
    resolution: 'See the message for the grammar-specific reason.',
  },

  // Rule Table Errors (LEX-R0xx)
  {
    errorId: 'LEX-R001',
    category: 'rules',
    description: 'Empty rule table',
    messageTemplate: 'Rule table has no rules',
    cause: 'defineRules was called with an empty list.',
    resolution: 'Declare at least one rule.',
  },
  {
    errorId: 'LEX-R002',
    category: 'rules',
    description: 'Invalid token kind',
    messageTemplate: 'Invalid token kind {kind} for rule #{index}',
    cause: 'A rule kind is empty or uses the reserved name EOF.',
    resolution: 'Give the rule a non-empty kind other than EOF.',
  },
  {
    errorId: 'LEX-R003',
    category: 'rules',
    description: 'Invalid matcher',
    messageTemplate: 'Invalid matcher for rule {kind}: {reason}',
    cause: 'A literal is empty or a pattern does not compile as a regular expression.',
    resolution: 'Use a non-empty literal, or fix the regular expression syntax.',
    examples: [
      {
        description: 'Unbalanced group',
        code: "pattern('([a-z]+')",
      },
    ],
  },
  {
    errorId: 'LEX-R004',
    category: 'rules',
    description: 'Shadowed rule',
    messageTemplate:
      'Rule {kind} in state {state} can never match: {shadowedBy} has the same matcher and priority',
    cause:
      'Two rules in one state have identical matchers and identical priorities, so the first-declared one always wins.',
    resolution: 'Remove the duplicate or give one of the rules a different priority.',
  },
  {
    errorId: 'LEX-R005',
    category: 'rules',
    description: 'Unknown lexer state',
    messageTemplate: 'Unknown lexer state {state}{hint}',
    cause:
      'The initial state or a transition target names a state that no rule belongs to.',
    resolution: 'Declare rules for the state, or fix the state name.',
  },
  {
    errorId: 'LEX-R006',
    category: 'rules',
    description: 'Invalid priority',
    messageTemplate: 'Invalid priority {priority} for rule {kind}',
    cause: 'A rule priority is NaN or infinite.',
    resolution: 'Use a finite number; higher priorities win ties on match length.',
  },
  {
    errorId: 'LEX-R007',
    category: 'rules',
    description: 'Rule active in no state',
    messageTemplate: 'Rule {kind} has an empty state list',
    cause: 'A rule was declared with an empty list of states, so it can never match.',
    resolution:
      'Name at least one state, or omit the state list to use the initial state.',
  },
];

/**
 * Global error registry instance.
 * Read-only, initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {actual}", {expected: "IDENT", actual: "NUMBER"})
 * // Returns: "Expected IDENT, got NUMBER"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{' && template.charAt(i + 1) !== '{') {
      let j = i + 1;
      while (j < template.length && template.charAt(j) !== '}') {
        j++;
      }

      if (j >= template.length) {
        return template;
      }

      const value = context[template.slice(i + 1, j)];
      if (value !== undefined) {
        try {
          result += String(value);
        } catch {
          // Objects without a usable toString (e.g. null prototype)
          result += Object.prototype.toString.call(value);
        }
      }

      i = j + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
