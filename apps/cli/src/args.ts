/**
 * Argument parsing for the pocket-ledger command line
 *
 * Grammar:
 *   <command> [positionals] [--option value | --option=value] [--file path] [--help]
 */

import type { AddEntryInput, EntryFilter } from '@pocket-ledger/core';
import { UsageError } from './errors.js';

export type QueryCommandName = 'list' | 'balance' | 'summarize';
export type CommandName = 'add' | QueryCommandName;

export type ParsedCommand =
  | { command: 'help' }
  | { command: 'add'; file?: string; entry: AddEntryInput }
  | { command: QueryCommandName; file?: string; filter: EntryFilter };

const COMMANDS: readonly CommandName[] = ['add', 'list', 'balance', 'summarize'];
const QUERY_OPTIONS = ['start', 'end', 'category'] as const;

const ALLOWED_OPTIONS: Record<CommandName, readonly string[]> = {
  add: ['file', 'date', 'note'],
  list: ['file', ...QUERY_OPTIONS],
  balance: ['file', ...QUERY_OPTIONS],
  summarize: ['file', ...QUERY_OPTIONS],
};

const AMOUNT_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export const USAGE = `Usage: pocket-ledger <command> [options] [--file path]

Commands:
  add <income|expense> <amount> <category> [note]   Record an entry
      --date YYYY-MM-DD   Entry date (default: today)
      --note TEXT         Free-text note
  list        List entries
  balance     Show income, expense and net balance
  summarize   Show totals per category

Filters (list, balance, summarize):
  --start YYYY-MM-DD   First day to include
  --end YYYY-MM-DD     Last day to include
  --category NAME      Exact category match

Global:
  --file PATH   Ledger file (default: $LEDGER_FILE or ledger.json)
  --help, -h    Show this help
`;

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse an amount written in plain decimal notation; anything else is NaN
 * so that validation reports it.
 */
export function parseAmount(raw: string): number {
  return AMOUNT_PATTERN.test(raw) ? Number(raw) : Number.NaN;
}

export function parseArgs(argv: readonly string[]): ParsedCommand {
  const options = new Map<string, string>();
  const positionals: string[] = [];

  for (let index = 0; index < argv.length; index++) {
    const token = argv[index] ?? '';

    if (token === '--help' || token === '-h') {
      return { command: 'help' };
    }

    if (!token.startsWith('--')) {
      positionals.push(token);
      continue;
    }

    const body = token.slice(2);
    const equals = body.indexOf('=');
    if (equals !== -1) {
      const optionName = body.slice(0, equals);
      const value = body.slice(equals + 1);
      if (value === '') {
        throw new UsageError(`Option --${optionName} requires a value`);
      }
      options.set(optionName, value);
      continue;
    }

    const value = argv[index + 1];
    if (value === undefined || value === '' || value.startsWith('--')) {
      throw new UsageError(`Option --${body} requires a value`);
    }
    options.set(body, value);
    index++;
  }

  const [name, ...rest] = positionals;
  if (name === undefined) {
    throw new UsageError('Missing command');
  }
  if (!isCommandName(name)) {
    throw new UsageError(`Unknown command "${name}"`);
  }

  for (const option of options.keys()) {
    if (!ALLOWED_OPTIONS[name].includes(option)) {
      throw new UsageError(`Unknown option --${option} for ${name}`);
    }
  }

  const file = options.get('file');

  if (name === 'add') {
    return { command: 'add', file, entry: parseAddArguments(rest, options) };
  }

  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument "${rest[0]}" for ${name}`);
  }

  return {
    command: name,
    file,
    filter: {
      start: options.get('start'),
      end: options.get('end'),
      category: options.get('category'),
    },
  };
}

function parseAddArguments(args: readonly string[], options: Map<string, string>): AddEntryInput {
  const [type, amount, category, note, ...extra] = args;

  if (type === undefined || amount === undefined || category === undefined) {
    throw new UsageError('add requires <income|expense> <amount> <category>');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument "${extra[0]}" for add`);
  }
  if (note !== undefined && options.has('note')) {
    throw new UsageError('Give the note either as an argument or with --note, not both');
  }

  return {
    type,
    amount: parseAmount(amount),
    category,
    note: note ?? options.get('note'),
    date: options.get('date'),
  };
}
