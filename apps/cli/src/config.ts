/**
 * CLI configuration
 *
 * Read from the environment (optionally seeded from a .env file in the
 * working directory) and validated with zod.
 */

import { resolve } from 'node:path';
import { config as loadDotenvFile } from 'dotenv';
import { z } from 'zod';
import { UsageError } from './errors.js';

export const DEFAULT_LEDGER_FILE = 'ledger.json';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  LEDGER_FILE: z.string().min(1, 'must not be empty').default(DEFAULT_LEDGER_FILE),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CliConfig {
  ledgerFile: string;
  logLevel: LogLevel;
}

/**
 * Seed process.env from <cwd>/.env; variables already set win
 */
export function loadEnvFile(cwd: string = process.cwd()): void {
  loadDotenvFile({ path: resolve(cwd, '.env') });
}

/**
 * @throws UsageError if a variable holds an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const result = EnvSchema.safeParse({
    LEDGER_FILE: env.LEDGER_FILE,
    LOG_LEVEL: env.LOG_LEVEL,
  });

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new UsageError(`Invalid configuration: ${errors}`, { cause: result.error });
  }

  return {
    ledgerFile: result.data.LEDGER_FILE,
    logLevel: result.data.LOG_LEVEL,
  };
}
