/**
 * Command boundary
 *
 * Parses arguments, wires the store and service, prints results and maps
 * errors to exit codes:
 *   0 success, 1 validation or unexpected failure, 2 usage, 3 unreadable ledger
 */

import {
  JsonFileLedgerRepository,
  LedgerService,
  ParseError,
  ValidationError,
} from '@pocket-ledger/core';
import { createLogger } from '@pocket-ledger/observability';
import type { Logger } from '@pocket-ledger/observability';
import { USAGE, parseArgs } from './args.js';
import type { ParsedCommand } from './args.js';
import { loadConfig } from './config.js';
import { UsageError } from './errors.js';
import { formatBalance, formatEntries, formatSavedEntry, formatSummary } from './format.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_PARSE = 3;

export interface OutputStream {
  write(chunk: string): unknown;
}

export interface RunCliOptions {
  stdout?: OutputStream;
  stderr?: OutputStream;
  env?: NodeJS.ProcessEnv;
  /** Defaults to a pino logger on stderr at the configured level */
  logger?: Logger;
  today?: () => string;
}

function execute(parsed: Exclude<ParsedCommand, { command: 'help' }>, service: LedgerService): string {
  switch (parsed.command) {
    case 'add':
      return formatSavedEntry(service.addEntry(parsed.entry));
    case 'list':
      return formatEntries(service.listEntries(parsed.filter));
    case 'balance':
      return formatBalance(service.getBalance(parsed.filter));
    case 'summarize':
      return formatSummary(service.summarize(parsed.filter));
  }
}

export function runCli(argv: readonly string[], options: RunCliOptions = {}): number {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  let logger = options.logger;

  try {
    const parsed = parseArgs(argv);
    if (parsed.command === 'help') {
      stdout.write(USAGE);
      return EXIT_OK;
    }

    const config = loadConfig(options.env ?? process.env);
    logger ??= createLogger({ level: config.logLevel }, stderr);

    const filePath = parsed.file ?? config.ledgerFile;
    logger.debug({ command: parsed.command, filePath }, 'Running command');

    const service = new LedgerService(new JsonFileLedgerRepository(filePath), {
      logger,
      today: options.today,
    });

    stdout.write(execute(parsed, service));
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      stderr.write(`Error: ${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (error instanceof ValidationError) {
      stderr.write(`Error: ${error.message}\n`);
      return EXIT_FAILURE;
    }
    if (error instanceof ParseError) {
      stderr.write(`Error: ${error.message}\n`);
      return EXIT_PARSE;
    }

    const message = error instanceof Error ? error.message : String(error);
    (logger ?? createLogger({ level: 'error' }, stderr)).error({ err: error }, 'Command failed');
    stderr.write(`Error: ${message}\n`);
    return EXIT_FAILURE;
  }
}
