/**
 * Ledger Service
 *
 * Business logic for recording entries and answering list, balance and
 * summary queries. Validates input with the shared zod schemas and reads and
 * writes through a LedgerRepository.
 */

import { AddEntryRequestSchema, EntryFilterSchema } from '@pocket-ledger/types';
import { silentLogger } from '@pocket-ledger/observability';
import type { Logger } from '@pocket-ledger/observability';
import { ValidationError, describeIssues } from './ledger-errors.js';
import type { LedgerRepository } from './ledger-repository.js';
import { nextEntryId } from './ledger-repository.js';
import { computeBalance, filterEntries, roundAmount, summarizeByCategory } from './ledger-queries.js';
import type {
  AddEntryInput,
  BalanceReport,
  CategorySummary,
  Entry,
  EntryFilter,
} from './ledger-types.js';

export interface LedgerServiceOptions {
  logger?: Logger;
  /** Current date as YYYY-MM-DD; defaults to the local calendar date */
  today?: () => string;
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatLocalDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export class LedgerService {
  private repository: LedgerRepository;
  private logger: Logger;
  private today: () => string;

  constructor(repository: LedgerRepository, options: LedgerServiceOptions = {}) {
    this.repository = repository;
    this.logger = options.logger ?? silentLogger;
    this.today = options.today ?? (() => formatLocalDate(new Date()));
  }

  /**
   * Record a new entry and persist the ledger
   *
   * The amount is rounded to cents, category and note are trimmed, an empty
   * note is dropped and a missing date defaults to today.
   *
   * @returns The stored entry with its assigned id
   * @throws ValidationError if type, amount, category, note or date is invalid
   */
  addEntry(request: AddEntryInput): Entry {
    const result = AddEntryRequestSchema.safeParse(request);
    if (!result.success) {
      throw new ValidationError(describeIssues(result.error));
    }

    const { type, amount, category, note, date } = result.data;
    const entries = this.loadEntries();

    const entry: Entry = {
      id: nextEntryId(entries),
      date: date ?? this.today(),
      type,
      amount: roundAmount(amount),
      category,
      ...(note ? { note } : {}),
    };

    this.repository.save([...entries, entry]);
    this.logger.debug({ entryId: entry.id, entryCount: entries.length + 1 }, 'Entry added');

    return entry;
  }

  /**
   * Entries matching the filter, in insertion order
   *
   * @throws ValidationError if a filter date is malformed
   */
  listEntries(filter: EntryFilter = {}): Entry[] {
    return filterEntries(this.loadEntries(), this.validateFilter(filter));
  }

  /**
   * Income, expense and net over the (optionally filtered) ledger
   */
  getBalance(filter: EntryFilter = {}): BalanceReport {
    return computeBalance(this.listEntries(filter));
  }

  /**
   * Per-category totals over the (optionally filtered) ledger
   */
  summarize(filter: EntryFilter = {}): CategorySummary[] {
    return summarizeByCategory(this.listEntries(filter));
  }

  private loadEntries(): Entry[] {
    const entries = this.repository.load();
    this.logger.debug({ entryCount: entries.length }, 'Ledger loaded');
    return entries;
  }

  private validateFilter(filter: EntryFilter): EntryFilter {
    const result = EntryFilterSchema.safeParse(filter);
    if (!result.success) {
      throw new ValidationError(describeIssues(result.error));
    }
    return result.data;
  }
}
