/**
 * Rule File Loader
 * Loads and validates YAML (or JSON) rule tables for the lexloom command.
 */

import { readFile } from 'fs/promises';
import * as yaml from 'yaml';
import {
  defineRules,
  jump,
  literal,
  pattern,
  pop,
  push,
  type RuleSpec,
  type RuleTable,
  type Transition,
  type ValueTransform,
} from '@lexloom/core';

// ============================================================
// VALUE TRANSFORMS
// ============================================================

/** Named value transforms a rule file can attach to a rule */
export const VALUE_TRANSFORMS: Readonly<Record<string, ValueTransform>> = {
  number: (text) => Number(text),
  integer: (text) => Number.parseInt(text, 10),
  lowercase: (text) => text.toLowerCase(),
  uppercase: (text) => text.toUpperCase(),
  unquote: (text) => text.slice(1, -1),
};

const TOP_LEVEL_KEYS = new Set(['initial', 'rules']);

const RULE_KEYS = new Set([
  'kind',
  'literal',
  'pattern',
  'flags',
  'priority',
  'ignore',
  'state',
  'push',
  'pop',
  'jump',
  'value',
]);

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(reason: string): Error {
  return new Error(`Invalid rule file: ${reason}`);
}

function optionalString(
  entry: Record<string, unknown>,
  key: string,
  where: string
): string | undefined {
  const value = entry[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw invalid(`${where}: ${key} must be a string`);
  }
  return value;
}

function readState(
  entry: Record<string, unknown>,
  where: string
): string | string[] | undefined {
  const value = entry['state'];
  if (value === undefined || typeof value === 'string') return value;
  if (Array.isArray(value) && value.every((s) => typeof s === 'string')) {
    return value.map(String);
  }
  throw invalid(`${where}: state must be a string or a list of strings`);
}

function readTransition(
  entry: Record<string, unknown>,
  where: string
): Transition | undefined {
  const pushTo = optionalString(entry, 'push', where);
  const jumpTo = optionalString(entry, 'jump', where);
  const popValue = entry['pop'];
  if (popValue !== undefined && typeof popValue !== 'boolean') {
    throw invalid(`${where}: pop must be a boolean`);
  }

  const transitions: Transition[] = [];
  if (pushTo !== undefined) transitions.push(push(pushTo));
  if (jumpTo !== undefined) transitions.push(jump(jumpTo));
  if (popValue === true) transitions.push(pop());

  if (transitions.length > 1) {
    throw invalid(`${where}: use only one of push, pop and jump`);
  }
  return transitions[0];
}

function readRule(entry: unknown, index: number): RuleSpec {
  const where = `rule #${index + 1}`;
  if (!isRecord(entry)) {
    throw invalid(`${where} must be an object`);
  }

  for (const key of Object.keys(entry)) {
    if (!RULE_KEYS.has(key)) {
      throw invalid(`${where}: unknown key ${key}`);
    }
  }

  const kind = entry['kind'];
  if (typeof kind !== 'string') {
    throw invalid(`${where}: kind must be a string`);
  }

  const literalText = optionalString(entry, 'literal', where);
  const source = optionalString(entry, 'pattern', where);
  const flags = optionalString(entry, 'flags', where);
  if ((literalText === undefined) === (source === undefined)) {
    throw invalid(`${where} (${kind}): set exactly one of literal and pattern`);
  }
  if (flags !== undefined && source === undefined) {
    throw invalid(`${where} (${kind}): flags only apply to patterns`);
  }

  const priority = entry['priority'];
  if (priority !== undefined && typeof priority !== 'number') {
    throw invalid(`${where} (${kind}): priority must be a number`);
  }

  const ignore = entry['ignore'];
  if (ignore !== undefined && typeof ignore !== 'boolean') {
    throw invalid(`${where} (${kind}): ignore must be a boolean`);
  }

  const valueName = optionalString(entry, 'value', where);
  let value: ValueTransform | undefined;
  if (valueName !== undefined) {
    value = VALUE_TRANSFORMS[valueName];
    if (value === undefined) {
      throw invalid(
        `${where} (${kind}): unknown value transform ${valueName} (must be one of: ${Object.keys(VALUE_TRANSFORMS).join(', ')})`
      );
    }
  }

  const state = readState(entry, where);
  const transition = readTransition(entry, where);

  return {
    kind,
    match:
      literalText !== undefined
        ? literal(literalText)
        : pattern(source ?? '', flags ?? ''),
    ...(priority !== undefined && { priority }),
    ...(ignore !== undefined && { ignore }),
    ...(state !== undefined && { state }),
    ...(transition !== undefined && { transition }),
    ...(value !== undefined && { value }),
  };
}

// ============================================================
// LOADING
// ============================================================

/**
 * Build a rule table from rule-file text.
 *
 * @throws Error with "Invalid rule file: {reason}" for malformed files
 * @throws RuleError when the rules themselves are invalid
 */
export function parseRuleFile(content: string): RuleTable {
  let data: unknown;
  try {
    data = yaml.parse(content);
  } catch (err) {
    throw invalid(
      `invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  if (!isRecord(data)) {
    throw invalid('must be an object');
  }

  for (const key of Object.keys(data)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      throw invalid(`top level: unknown key ${key}`);
    }
  }

  const initial = optionalString(data, 'initial', 'top level');
  const rules = data['rules'];
  if (!Array.isArray(rules)) {
    throw invalid('rules must be a list');
  }

  const specs = rules.map((entry: unknown, index) => readRule(entry, index));
  return defineRules(specs, initial !== undefined ? { initialState: initial } : {});
}

/**
 * Load a rule table from a file on disk.
 *
 * @throws Error "Rule file not found: {path}" when the file is missing
 */
export async function loadRuleFile(path: string): Promise<RuleTable> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (isRecord(err) && err['code'] === 'ENOENT') {
      throw new Error(`Rule file not found: ${path}`);
    }
    throw err;
  }
  return parseRuleFile(content);
}
