/**
 * Plain-text rendering of command results
 */

import type { BalanceReport, CategorySummary, Entry } from '@pocket-ledger/core';

export const EMPTY_RESULT = 'No entries found.\n';

const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatAmount(amount: number): string {
  return amountFormat.format(amount);
}

export interface Column<T> {
  header: string;
  value: (row: T) => string;
  align?: 'left' | 'right';
}

/**
 * Render rows as a " | "-separated table with a dashed rule under the header
 */
export function renderTable<T>(columns: readonly Column<T>[], rows: readonly T[]): string {
  const cells = rows.map((row) => columns.map((column) => column.value(row)));
  const widths = columns.map((column, i) =>
    Math.max(column.header.length, ...cells.map((row) => (row[i] ?? '').length))
  );

  const line = (values: readonly string[]) =>
    values
      .map((value, i) => {
        const width = widths[i] ?? 0;
        return columns[i]?.align === 'right' ? value.padStart(width) : value.padEnd(width);
      })
      .join(' | ')
      .trimEnd();

  const lines = [
    line(columns.map((column) => column.header)),
    widths.map((width) => '-'.repeat(width)).join('-+-'),
    ...cells.map(line),
  ];

  return `${lines.join('\n')}\n`;
}

const ENTRY_COLUMNS: Column<Entry>[] = [
  { header: 'ID', value: (entry) => String(entry.id), align: 'right' },
  { header: 'Date', value: (entry) => entry.date },
  { header: 'Type', value: (entry) => entry.type },
  { header: 'Category', value: (entry) => entry.category },
  { header: 'Amount', value: (entry) => formatAmount(entry.amount), align: 'right' },
  { header: 'Note', value: (entry) => entry.note ?? '-' },
];

const SUMMARY_COLUMNS: Column<CategorySummary>[] = [
  { header: 'Category', value: (row) => row.category },
  { header: 'Income', value: (row) => formatAmount(row.income), align: 'right' },
  { header: 'Expense', value: (row) => formatAmount(row.expense), align: 'right' },
  { header: 'Net', value: (row) => formatAmount(row.net), align: 'right' },
];

export function formatEntries(entries: readonly Entry[]): string {
  return entries.length === 0 ? EMPTY_RESULT : renderTable(ENTRY_COLUMNS, entries);
}

export function formatSummary(summary: readonly CategorySummary[]): string {
  return summary.length === 0 ? EMPTY_RESULT : renderTable(SUMMARY_COLUMNS, summary);
}

export function formatBalance(report: BalanceReport): string {
  return [
    `Income:  ${formatAmount(report.income)}`,
    `Expense: ${formatAmount(report.expense)}`,
    `Balance: ${formatAmount(report.net)}`,
    '',
  ].join('\n');
}

export function formatSavedEntry(entry: Entry): string {
  return `Saved entry #${entry.id}: ${entry.date} ${entry.type} ${entry.category} ${formatAmount(entry.amount)}\n`;
}
