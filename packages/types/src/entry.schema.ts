/**
 * Ledger entry schemas
 *
 * Shared by the ledger file loader (stored entries), the add command
 * (new entry requests) and the query commands (date range / category filters).
 */

import { z } from 'zod';

export const ENTRY_TYPES = ['income', 'expense'] as const;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Largest amount whose value in cents is still a safe integer
 */
export const MAX_AMOUNT = Number.MAX_SAFE_INTEGER / 100;

/**
 * True for a real calendar date written as YYYY-MM-DD (2024-02-30 is not one)
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // setUTCFullYear keeps years 0-99 as written; Date.UTC maps them to 19xx
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export const EntryTypeSchema = z.enum(ENTRY_TYPES, {
  errorMap: () => ({ message: 'Type must be "income" or "expense"' }),
});

export const IsoDateSchema = z
  .string()
  .refine(isCalendarDate, 'Date must be a valid calendar date in YYYY-MM-DD format');

/**
 * A persisted entry, as stored in the ledger file. Unknown keys are rejected
 * rather than dropped on the next rewrite.
 */
export const EntrySchema = z
  .object({
    id: z.number().int().positive(),
    date: IsoDateSchema,
    type: EntryTypeSchema,
    amount: z.number().finite().positive().max(MAX_AMOUNT),
    category: z.string().min(1),
    note: z.string().optional(),
  })
  .strict();

/**
 * Whole ledger file: an array of entries with unique ids
 */
export const LedgerFileSchema = z.array(EntrySchema).superRefine((entries, ctx) => {
  const seen = new Set<number>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate entry id ${entry.id}`,
      });
    }
    seen.add(entry.id);
  });
});

/**
 * Request schema for recording a new entry
 * - amount: positive, at most MAX_AMOUNT, rounded to cents by the service (must not round to 0)
 * - category: 1-64 characters after trimming
 * - note: optional, up to 500 characters
 * - date: optional, defaults to today
 */
export const AddEntryRequestSchema = z.object({
  type: EntryTypeSchema,
  amount: z
    .number({
      required_error: 'Amount is required',
      invalid_type_error: 'Amount must be a number',
    })
    .superRefine((value, ctx) => {
      if (!Number.isFinite(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be a finite number' });
      } else if (value <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be greater than zero' });
      } else if (value > MAX_AMOUNT) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount is too large' });
      } else if (Math.round(value * 100) === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Amount must be at least 0.01' });
      }
    }),
  category: z
    .string({ required_error: 'Category is required' })
    .trim()
    .min(1, 'Category is required')
    .max(64, 'Category must be 64 characters or less'),
  note: z.string().trim().max(500, 'Note must be 500 characters or less').optional(),
  date: IsoDateSchema.optional(),
});

/**
 * Filter schema shared by list, balance and summarize
 */
export const EntryFilterSchema = z.object({
  start: IsoDateSchema.optional(),
  end: IsoDateSchema.optional(),
  category: z.string().min(1, 'Category filter must not be empty').optional(),
});

export type EntryType = z.infer<typeof EntryTypeSchema>;
export type Entry = z.infer<typeof EntrySchema>;
export type EntryFilter = z.infer<typeof EntryFilterSchema>;
