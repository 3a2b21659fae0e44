#!/usr/bin/env tsx
/**
 * pocket-ledger - record income and expenses in a JSON ledger
 *
 * Usage:
 *   pocket-ledger add income 1500 maas --date 2024-03-05
 *   pocket-ledger list --start 2024-03-01 --end 2024-03-31
 *   pocket-ledger balance
 *   pocket-ledger summarize --file ~/finance/ledger.json
 */

import { loadEnvFile } from './config.js';
import { runCli } from './run.js';

loadEnvFile();
process.exitCode = runCli(process.argv.slice(2));
