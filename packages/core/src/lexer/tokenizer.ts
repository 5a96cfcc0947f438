/**
 * Tokenizer
 * Rule-driven scanning: longest match, then priority, then declaration order
 */

import { messageFor } from '../error-classes.js';
import type { SourceLocation } from '../source-location.js';
import { LexError } from './errors.js';
import {
  assertState,
  matchAt,
  rulesFor,
  type CompiledRule,
  type RuleTable,
  type Transition,
} from './rules.js';
import {
  advanceBy,
  createScanner,
  currentLocation,
  isScanEnd,
  type Scanner,
} from './scanner.js';
import { createToken, EOF_KIND, type Token } from './token.js';

// ============================================================
// OPTIONS
// ============================================================

export interface TransitionEvent {
  readonly action: Transition['type'];
  readonly from: string;
  readonly to: string;
  /** Token whose rule carried the transition */
  readonly token: Token;
}

/** Synchronous observers; they cannot alter scanning */
export interface TokenizeCallbacks {
  /** Called for every emitted token, EOF included */
  onToken?: (token: Token) => void;
  /** Called for every match of an ignored rule */
  onIgnore?: (token: Token) => void;
  onTransition?: (event: TransitionEvent) => void;
}

export interface TokenizeOptions {
  /** State to start in; defaults to the table's initial state */
  initialState?: string;
  /** Emit tokens of ignored rules instead of dropping them */
  includeIgnored?: boolean;
  /** Kinds to drop from the output (EOF is always emitted) */
  exclude?: readonly string[];
  callbacks?: TokenizeCallbacks;
  /** Location of `text` inside a larger document */
  baseLocation?: SourceLocation;
}

export type LexResult =
  | { readonly ok: true; readonly tokens: Token[] }
  | { readonly ok: false; readonly error: LexError; readonly tokens: Token[] };

// ============================================================
// MATCH SELECTION
// ============================================================

interface Candidate {
  readonly rule: CompiledRule;
  readonly length: number;
}

/**
 * Pick the winning rule at `offset`. Zero-length matches never win, so
 * every accepted match moves the scanner forward.
 */
function selectRule(
  rules: readonly CompiledRule[],
  text: string,
  offset: number
): Candidate | null {
  let best: Candidate | null = null;

  for (const rule of rules) {
    const length = matchAt(rule.matcher, text, offset);
    if (length === null || length === 0) continue;

    if (
      best === null ||
      length > best.length ||
      (length === best.length && rule.priority > best.rule.priority)
    ) {
      best = { rule, length };
    }
  }

  return best;
}

/**
 * The rule's value transform runs only when `deliver` is set; tokens
 * nobody receives carry their text as value.
 */
function makeToken(
  rule: CompiledRule,
  text: string,
  start: SourceLocation,
  end: SourceLocation,
  deliver: boolean
): Token {
  const value = deliver && rule.value ? rule.value(text) : text;
  return createToken(rule.kind, text, value, start, end);
}

function unexpectedCharacter(scanner: Scanner, state: string): LexError {
  const slice = [...scanner.source.slice(scanner.pos, scanner.pos + 2)][0] ?? '';
  return new LexError(
    'LEX-L001',
    messageFor('LEX-L001', {
      char: JSON.stringify(slice),
      state: `'${state}'`,
    }),
    currentLocation(scanner),
    { state, slice },
    { char: slice, state }
  );
}

// ============================================================
// STATE STACK
// ============================================================

function applyTransition(
  stack: string[],
  transition: Transition,
  token: Token,
  callbacks: TokenizeCallbacks
): void {
  const from = stack[stack.length - 1] ?? '';

  switch (transition.type) {
    case 'push':
      stack.push(transition.state);
      break;
    case 'pop':
      if (stack.length <= 1) {
        throw new LexError(
          'LEX-L002',
          messageFor('LEX-L002', { kind: token.kind, state: `'${from}'` }),
          token.span.start,
          { state: from, slice: token.text },
          { kind: token.kind, state: from }
        );
      }
      stack.pop();
      break;
    case 'jump':
      stack[stack.length - 1] = transition.state;
      break;
  }

  callbacks.onTransition?.({
    action: transition.type,
    from,
    to: stack[stack.length - 1] ?? '',
    token,
  });
}

// ============================================================
// TOKENIZE
// ============================================================

function* scan(
  text: string,
  table: RuleTable,
  initialState: string,
  options: TokenizeOptions
): Generator<Token, void, undefined> {
  const scanner = createScanner(text, options.baseLocation);
  const stack: string[] = [initialState];
  const excluded = new Set(options.exclude ?? []);
  const callbacks = options.callbacks ?? {};

  while (!isScanEnd(scanner)) {
    const state = stack[stack.length - 1] ?? initialState;
    const winner = selectRule(rulesFor(table, state), text, scanner.pos);
    if (winner === null) {
      throw unexpectedCharacter(scanner, state);
    }

    const { rule } = winner;
    const emit =
      (!rule.ignore || options.includeIgnored === true) &&
      !excluded.has(rule.kind);
    const deliver = emit || (rule.ignore && callbacks.onIgnore !== undefined);

    const start = currentLocation(scanner);
    const matched = advanceBy(scanner, winner.length);
    const token = makeToken(rule, matched, start, currentLocation(scanner), deliver);

    if (rule.transition) {
      applyTransition(stack, rule.transition, token, callbacks);
    }

    if (rule.ignore) {
      callbacks.onIgnore?.(token);
    }
    if (!emit) continue;

    callbacks.onToken?.(token);
    yield token;
  }

  const end = currentLocation(scanner);
  const eof = createToken(EOF_KIND, '', '', end, end);
  callbacks.onToken?.(eof);
  yield eof;
}

/**
 * Lazily tokenize `text` with the rules of `table`.
 *
 * The sequence ends with an EOF token. When no rule matches, every token
 * before the failure is yielded and then the iteration throws a LexError.
 * Each call owns its scanner and state stack, so repeated calls over the
 * same text and table produce the same tokens.
 *
 * @throws RuleError synchronously when `initialState` is unknown
 */
export function tokenize(
  text: string,
  table: RuleTable,
  options: TokenizeOptions = {}
): Generator<Token, void, undefined> {
  const initialState = options.initialState ?? table.initialState;
  assertState(table, initialState);
  return scan(text, table, initialState, options);
}

/**
 * Eagerly tokenize `text`, returning lexer failures as a value.
 * On failure `tokens` holds everything produced before the error.
 */
export function lex(
  text: string,
  table: RuleTable,
  options: TokenizeOptions = {}
): LexResult {
  const tokens: Token[] = [];
  try {
    for (const token of tokenize(text, table, options)) {
      tokens.push(token);
    }
  } catch (err) {
    if (err instanceof LexError) {
      return { ok: false, error: err, tokens };
    }
    throw err;
  }
  return { ok: true, tokens };
}
