#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * lexloom <rules-file> <input|-> tokenizes the input with the rules of a
 * YAML rule file and prints the tokens.
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import {
  lex,
  type LexResult,
  type RuleTable,
  type TokenizeOptions,
  type TransitionEvent,
} from '@lexloom/core';
import { explainError } from './cli-explain.js';
import { OUTPUT_FORMATS, type OutputFormat } from './cli-error-formatter.js';
import { formatError, formatTokens, VERSION } from './cli-shared.js';
import { loadRuleFile } from './rule-file.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | LexArgs
  | { mode: 'help' | 'version' }
  | { mode: 'explain'; errorId: string };

export interface LexArgs {
  mode: 'lex';
  rulesFile: string;
  /** Input path, or '-' for stdin */
  inputFile: string;
  format: OutputFormat;
  state: string | undefined;
  includeIgnored: boolean;
  exclude: string[];
  trace: boolean;
}

const VALUE_FLAGS = new Set(['--format', '--state', '--exclude', '--explain']);
const SWITCH_FLAGS = new Set([
  '--help',
  '-h',
  '--version',
  '-v',
  '--include-ignored',
  '--trace',
]);

export const USAGE = `Usage:
  lexloom <rules.yaml> <input>     Tokenize a file
  lexloom <rules.yaml> -           Tokenize stdin
  lexloom --help                   Show this help message
  lexloom --version                Show version information
  lexloom --explain LEX-XXXX       Show error documentation

Options:
  --format <format>     Output format: human, json, compact (default: human)
  --state <name>        Start in this lexer state instead of the rule file's initial state
  --include-ignored     Print tokens of ignored rules too
  --exclude <kind>      Drop tokens of this kind (repeatable)
  --trace               Log state transitions to stderr

Examples:
  lexloom rules.yaml input.txt
  lexloom --format json rules.yaml input.txt
  lexloom --exclude COMMENT --exclude NEWLINE rules.yaml input.txt
  echo "let x = 1" | lexloom rules.yaml -`;

function isOutputFormat(value: string | undefined): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Parse command-line arguments into a structured command
 *
 * @param argv - Raw arguments (typically process.argv.slice(2))
 * @throws Error on unknown options, missing values or missing files
 */
export function parseArgs(argv: string[]): ParsedArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  let format: OutputFormat = 'human';
  let state: string | undefined;
  let includeIgnored = false;
  let trace = false;
  const exclude: string[] = [];
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (VALUE_FLAGS.has(arg)) {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value after ${arg}`);
      }
      i++;
      switch (arg) {
        case '--explain':
          return { mode: 'explain', errorId: value };
        case '--format':
          if (!isOutputFormat(value)) {
            throw new Error(
              `Invalid --format value: ${value}. Must be one of: ${OUTPUT_FORMATS.join(', ')}`
            );
          }
          format = value;
          break;
        case '--state':
          state = value;
          break;
        case '--exclude':
          exclude.push(value);
          break;
      }
      continue;
    }

    if (SWITCH_FLAGS.has(arg)) {
      if (arg === '--include-ignored') includeIgnored = true;
      if (arg === '--trace') trace = true;
      continue;
    }

    if (arg.startsWith('-') && arg !== '-') {
      throw new Error(`Unknown option: ${arg}`);
    }
    positional.push(arg);
  }

  const [rulesFile, inputFile, extra] = positional;
  if (rulesFile === undefined) {
    throw new Error('Missing rules file argument');
  }
  if (inputFile === undefined) {
    throw new Error('Missing input argument');
  }
  if (extra !== undefined) {
    throw new Error(`Unexpected argument: ${extra}`);
  }

  return {
    mode: 'lex',
    rulesFile,
    inputFile,
    format,
    state,
    includeIgnored,
    exclude,
    trace,
  };
}

/**
 * Read the input text from a file, or from stdin for '-'
 *
 * @throws Error "File not found: {path}" when the file is missing
 */
export async function readInput(file: string): Promise<string> {
  if (file === '-') {
    return fsSync.readFileSync(0, 'utf-8');
  }
  try {
    await fs.access(file);
  } catch {
    throw new Error(`File not found: ${file}`);
  }
  return fs.readFile(file, 'utf-8');
}

export function formatTransition(event: TransitionEvent): string {
  const { line, column } = event.token;
  return `trace ${line}:${column} ${event.action} ${event.from} -> ${event.to} (${event.token.kind})`;
}

/**
 * Tokenize `source` with the options a lex command asks for.
 * Transitions are passed to `onTrace` when tracing is on.
 */
export function lexSource(
  source: string,
  table: RuleTable,
  args: LexArgs,
  onTrace: (line: string) => void = (line) => console.error(line)
): LexResult {
  const options: TokenizeOptions = {
    includeIgnored: args.includeIgnored,
    exclude: args.exclude,
    ...(args.state !== undefined && { initialState: args.state }),
    ...(args.trace && {
      callbacks: {
        onTransition: (event: TransitionEvent) =>
          onTrace(formatTransition(event)),
      },
    }),
  };
  return lex(source, table, options);
}

/**
 * Entry point for the lexloom binary
 *
 * Writes tokens to stdout and errors to stderr.
 *
 * @returns Process exit code: 0 on success, 1 on any error
 */
export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  let source: string | undefined;
  let table: RuleTable | undefined;
  let format: OutputFormat = 'human';
  let fileName: string | undefined;

  try {
    const parsed = parseArgs(argv);

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return 0;

      case 'version':
        console.log(VERSION);
        return 0;

      case 'explain': {
        const documentation = explainError(parsed.errorId);
        if (documentation === null) {
          console.error(`Invalid error ID: ${parsed.errorId}`);
          console.error(
            'Error ID must be in format LEX-{L|P|R}{3-digit}, e.g., LEX-L001'
          );
          return 1;
        }
        console.log(documentation);
        return 0;
      }

      case 'lex': {
        format = parsed.format;
        table = await loadRuleFile(parsed.rulesFile);
        source = await readInput(parsed.inputFile);
        fileName = parsed.inputFile === '-' ? '<stdin>' : parsed.inputFile;

        const result = lexSource(source, table, parsed);
        if (!result.ok) {
          console.error(formatError(result.error, source, { format, fileName }, table));
          return 1;
        }
        console.log(formatTokens(result.tokens, format));
        return 0;
      }
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    console.error(formatError(error, source, { format, fileName }, table));
    return 1;
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
