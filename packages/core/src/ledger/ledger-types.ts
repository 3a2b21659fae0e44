/**
 * Ledger Domain Types
 */

export type { Entry, EntryType, EntryFilter } from '@pocket-ledger/types';

/**
 * Raw add-entry input, validated by the service before anything is stored
 */
export interface AddEntryInput {
  type: string;
  amount: number;
  category: string;
  note?: string;
  date?: string;
}

/**
 * Totals over a set of entries. Amounts are decimals rounded to cents.
 */
export interface BalanceReport {
  income: number;
  expense: number;
  net: number;
  entryCount: number;
}

/**
 * Per-category totals, reported in first-seen order
 */
export interface CategorySummary {
  category: string;
  income: number;
  expense: number;
  net: number;
}
