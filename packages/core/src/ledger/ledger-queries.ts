/**
 * Ledger queries
 *
 * Pure functions over an in-memory entry sequence: date range and category
 * filtering, sums by type and per-category summaries. Sums are taken in
 * integer cents so repeated decimal additions don't drift.
 */

import type { BalanceReport, CategorySummary, Entry, EntryFilter, EntryType } from './ledger-types.js';

export function toCents(amount: number): number {
  return Math.round(amount * 100);
}

function fromCents(cents: number): number {
  return cents / 100;
}

/**
 * Round a decimal amount to two places
 */
export function roundAmount(amount: number): number {
  return fromCents(toCents(amount));
}

/**
 * Entries whose date lies in [start, end] (each bound optional, inclusive)
 * and whose category matches exactly, in insertion order.
 * A start later than the end selects nothing.
 */
export function filterEntries(entries: readonly Entry[], filter: EntryFilter = {}): Entry[] {
  const { start, end, category } = filter;

  if (start !== undefined && end !== undefined && start > end) {
    return [];
  }

  // ISO dates compare correctly as strings
  return entries.filter(
    (entry) =>
      (start === undefined || entry.date >= start) &&
      (end === undefined || entry.date <= end) &&
      (category === undefined || entry.category === category)
  );
}

export function sumByType(entries: readonly Entry[]): Record<EntryType, number> {
  const cents: Record<EntryType, number> = { income: 0, expense: 0 };
  for (const entry of entries) {
    cents[entry.type] += toCents(entry.amount);
  }

  return {
    income: fromCents(cents.income),
    expense: fromCents(cents.expense),
  };
}

/**
 * Income minus expense over the given entries
 */
export function computeBalance(entries: readonly Entry[]): BalanceReport {
  const { income, expense } = sumByType(entries);

  return {
    income,
    expense,
    net: fromCents(toCents(income) - toCents(expense)),
    entryCount: entries.length,
  };
}

/**
 * Totals per category, in the order each category first appears
 */
export function summarizeByCategory(entries: readonly Entry[]): CategorySummary[] {
  const groups = new Map<string, Record<EntryType, number>>();

  for (const entry of entries) {
    let group = groups.get(entry.category);
    if (!group) {
      group = { income: 0, expense: 0 };
      groups.set(entry.category, group);
    }
    group[entry.type] += toCents(entry.amount);
  }

  return Array.from(groups, ([category, cents]) => ({
    category,
    income: fromCents(cents.income),
    expense: fromCents(cents.expense),
    net: fromCents(cents.income - cents.expense),
  }));
}
