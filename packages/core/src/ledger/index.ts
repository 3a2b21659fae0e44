/**
 * Ledger Domain
 *
 * Exports the ledger store, queries, service, errors and types.
 */

export { JsonFileLedgerRepository, nextEntryId, serializeLedger } from './ledger-repository.js';
export type { LedgerRepository } from './ledger-repository.js';

export {
  filterEntries,
  sumByType,
  computeBalance,
  summarizeByCategory,
  roundAmount,
  toCents,
} from './ledger-queries.js';

export { LedgerService, formatLocalDate } from './ledger-service.js';
export type { LedgerServiceOptions } from './ledger-service.js';

export { LedgerError, ValidationError, ParseError, describeIssues } from './ledger-errors.js';

export type {
  Entry,
  EntryType,
  EntryFilter,
  AddEntryInput,
  BalanceReport,
  CategorySummary,
} from './ledger-types.js';
