/**
 * Rule Tables
 * Declaring, validating and compiling lexer rules
 */

import { RuleError } from '../error-classes.js';
import { suggestSimilarNames } from '../suggest.js';
import { EOF_KIND, type TokenValue } from './token.js';

// ============================================================
// MATCHERS
// ============================================================

/** How a rule recognizes its text: an exact literal or a regular expression */
export type Matcher =
  | { readonly type: 'literal'; readonly text: string }
  | { readonly type: 'pattern'; readonly source: string; readonly flags: string };

export type CompiledMatcher =
  | { readonly type: 'literal'; readonly text: string }
  | {
      readonly type: 'pattern';
      readonly source: string;
      readonly flags: string;
      readonly regex: RegExp;
    };

export function literal(text: string): Matcher {
  return { type: 'literal', text };
}

/**
 * Build a pattern matcher. Flags default to the RegExp's own flags;
 * `g` and `y` are ignored because matching is always anchored.
 */
export function pattern(re: RegExp | string, flags?: string): Matcher {
  if (typeof re === 'string') {
    return { type: 'pattern', source: re, flags: flags ?? '' };
  }
  return { type: 'pattern', source: re.source, flags: flags ?? re.flags };
}

/**
 * Attempt a match anchored at `offset`.
 * Returns the matched length, or null when the matcher does not apply.
 */
export function matchAt(
  matcher: CompiledMatcher,
  text: string,
  offset: number
): number | null {
  if (matcher.type === 'literal') {
    return text.startsWith(matcher.text, offset) ? matcher.text.length : null;
  }
  matcher.regex.lastIndex = offset;
  const found = matcher.regex.exec(text);
  return found === null ? null : found[0].length;
}

// ============================================================
// STATE TRANSITIONS
// ============================================================

export type Transition =
  | { readonly type: 'push'; readonly state: string }
  | { readonly type: 'pop' }
  | { readonly type: 'jump'; readonly state: string };

/** Enter `state`, returning to the current one on pop */
export function push(state: string): Transition {
  return { type: 'push', state };
}

/** Return to the state below the current one */
export function pop(): Transition {
  return { type: 'pop' };
}

/** Replace the current state with `state` */
export function jump(state: string): Transition {
  return { type: 'jump', state };
}

// ============================================================
// RULES
// ============================================================

export type ValueTransform = (text: string) => TokenValue;

export interface RuleSpec {
  readonly kind: string;
  readonly match: Matcher;
  /** Breaks ties between equal-length matches; higher wins (default 0) */
  readonly priority?: number;
  /** Matched but not emitted */
  readonly ignore?: boolean;
  /** State(s) the rule is active in; defaults to the initial state */
  readonly state?: string | readonly string[];
  readonly transition?: Transition;
  readonly value?: ValueTransform;
}

export interface CompiledRule {
  readonly kind: string;
  /** Declaration order; earlier rules win full ties */
  readonly index: number;
  readonly matcher: CompiledMatcher;
  readonly priority: number;
  readonly ignore: boolean;
  readonly states: readonly string[];
  readonly transition: Transition | undefined;
  readonly value: ValueTransform | undefined;
}

export interface RuleTable {
  readonly initialState: string;
  /** All rules in declaration order */
  readonly rules: readonly CompiledRule[];
  /** Active rules per state, in declaration order */
  readonly states: ReadonlyMap<string, readonly CompiledRule[]>;
}

export interface RuleTableOptions {
  initialState?: string;
}

export const DEFAULT_STATE = 'main';

// ============================================================
// COMPILATION
// ============================================================

function compileMatcher(kind: string, matcher: Matcher): CompiledMatcher {
  if (matcher.type === 'literal') {
    if (matcher.text === '') {
      throw new RuleError('LEX-R003', { kind, reason: 'empty literal' });
    }
    const compiled: CompiledMatcher = { type: 'literal', text: matcher.text };
    return Object.freeze(compiled);
  }

  const flags = [...new Set(matcher.flags.replace(/[gy]/g, ''))]
    .sort()
    .join('');
  let regex: RegExp;
  try {
    regex = new RegExp(matcher.source, `${flags}y`);
  } catch (err) {
    throw new RuleError('LEX-R003', {
      kind,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  const compiled: CompiledMatcher = {
    type: 'pattern',
    source: matcher.source,
    flags,
    regex,
  };
  return Object.freeze(compiled);
}

function matcherKey(matcher: CompiledMatcher): string {
  return matcher.type === 'literal'
    ? `literal:${matcher.text}`
    : `pattern:/${matcher.source}/${matcher.flags}`;
}

function compileRule(
  spec: RuleSpec,
  index: number,
  initialState: string
): CompiledRule {
  if (spec.kind === '' || spec.kind === EOF_KIND) {
    throw new RuleError('LEX-R002', { kind: JSON.stringify(spec.kind), index });
  }

  const priority = spec.priority ?? 0;
  if (!Number.isFinite(priority)) {
    throw new RuleError('LEX-R006', { kind: spec.kind, priority });
  }

  const states =
    spec.state === undefined
      ? [initialState]
      : typeof spec.state === 'string'
        ? [spec.state]
        : [...new Set(spec.state)];
  if (states.length === 0) {
    throw new RuleError('LEX-R007', { kind: spec.kind });
  }

  const rule: CompiledRule = {
    kind: spec.kind,
    index,
    matcher: compileMatcher(spec.kind, spec.match),
    priority,
    ignore: spec.ignore ?? false,
    states: Object.freeze(states),
    transition: spec.transition,
    value: spec.value,
  };
  return Object.freeze(rule);
}

/**
 * Throw LEX-R005 unless `state` owns at least one rule.
 */
export function assertState(table: RuleTable, state: string): void {
  if (table.states.has(state)) return;
  const suggestions = suggestSimilarNames(state, [...table.states.keys()]);
  const hint =
    suggestions.length > 0 ? `. Did you mean '${suggestions[0]}'?` : '';
  throw new RuleError('LEX-R005', {
    state: `'${state}'`,
    hint,
    suggestions,
  });
}

/**
 * Validate and compile a rule table.
 *
 * Rules keep their declaration order, which decides ties that match
 * length and priority leave open. The returned table is frozen and can
 * be shared by any number of tokenize calls.
 *
 * @throws RuleError on an invalid rule or an unknown state
 */
export function defineRules(
  specs: readonly RuleSpec[],
  options: RuleTableOptions = {}
): RuleTable {
  if (specs.length === 0) {
    throw new RuleError('LEX-R001', {});
  }

  const initialState = options.initialState ?? DEFAULT_STATE;
  const rules = specs.map((spec, index) =>
    compileRule(spec, index, initialState)
  );

  const states = new Map<string, CompiledRule[]>();
  for (const rule of rules) {
    for (const state of rule.states) {
      const active = states.get(state) ?? [];
      const key = matcherKey(rule.matcher);
      const shadowing = active.find(
        (other) =>
          other.priority === rule.priority && matcherKey(other.matcher) === key
      );
      if (shadowing) {
        throw new RuleError('LEX-R004', {
          kind: rule.kind,
          state,
          shadowedBy: shadowing.kind,
        });
      }
      active.push(rule);
      states.set(state, active);
    }
  }

  const frozenStates = new Map<string, readonly CompiledRule[]>();
  for (const [name, active] of states) {
    frozenStates.set(name, Object.freeze(active));
  }
  const table: RuleTable = Object.freeze({
    initialState,
    rules: Object.freeze(rules),
    states: frozenStates,
  });

  assertState(table, initialState);
  for (const rule of rules) {
    if (rule.transition && rule.transition.type !== 'pop') {
      assertState(table, rule.transition.state);
    }
  }

  return table;
}

/** Active rules in `state` (empty for unknown states) */
export function rulesFor(
  table: RuleTable,
  state: string
): readonly CompiledRule[] {
  return table.states.get(state) ?? [];
}
