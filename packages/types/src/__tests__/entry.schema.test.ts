import { describe, it, expect } from 'vitest';
import {
  AddEntryRequestSchema,
  EntryFilterSchema,
  EntrySchema,
  MAX_AMOUNT,
  LedgerFileSchema,
  isCalendarDate,
} from '../entry.schema.js';

function messagesOf(result: { success: boolean; error?: { errors: { message: string }[] } }) {
  return result.error?.errors.map((e) => e.message) ?? [];
}

describe('isCalendarDate', () => {
  it('should accept real dates', () => {
    expect(isCalendarDate('2024-03-05')).toBe(true);
    expect(isCalendarDate('2024-02-29')).toBe(true);
  });

  it('should accept years below 100 as written', () => {
    expect(isCalendarDate('0024-01-01')).toBe(true);
    expect(isCalendarDate('0099-12-31')).toBe(true);
    expect(isCalendarDate('0000-02-29')).toBe(true);
    expect(isCalendarDate('0023-02-29')).toBe(false);
  });

  it('should reject impossible dates and other formats', () => {
    expect(isCalendarDate('2023-02-29')).toBe(false);
    expect(isCalendarDate('2024-13-01')).toBe(false);
    expect(isCalendarDate('05/03/2024')).toBe(false);
    expect(isCalendarDate('2024-3-5')).toBe(false);
  });
});

describe('AddEntryRequestSchema', () => {
  it('should trim category and note', () => {
    const result = AddEntryRequestSchema.parse({
      type: 'income',
      amount: 10,
      category: '  maas ',
      note: ' March ',
    });

    expect(result.category).toBe('maas');
    expect(result.note).toBe('March');
  });

  it('should reject an unknown type', () => {
    const result = AddEntryRequestSchema.safeParse({ type: 'transfer', amount: 10, category: 'x' });
    expect(messagesOf(result)).toEqual(['Type must be "income" or "expense"']);
  });

  it('should report one message per amount problem', () => {
    const cases: [number, string][] = [
      [Number.NaN, 'Amount must be a number'],
      [Number.POSITIVE_INFINITY, 'Amount must be a finite number'],
      [0, 'Amount must be greater than zero'],
      [-4, 'Amount must be greater than zero'],
      [0.001, 'Amount must be at least 0.01'],
      [1e307, 'Amount is too large'],
      [MAX_AMOUNT + 1, 'Amount is too large'],
    ];

    for (const [amount, message] of cases) {
      const result = AddEntryRequestSchema.safeParse({ type: 'expense', amount, category: 'x' });
      expect(messagesOf(result)).toEqual([message]);
    }
  });

  it('should reject a blank category', () => {
    const result = AddEntryRequestSchema.safeParse({ type: 'expense', amount: 1, category: '   ' });
    expect(messagesOf(result)).toEqual(['Category is required']);
  });
});

describe('EntrySchema', () => {
  it('should accept the largest allowed amount', () => {
    const result = AddEntryRequestSchema.safeParse({ type: 'income', amount: MAX_AMOUNT, category: 'x' });
    expect(result.success).toBe(true);
  });

  it('should reject unknown keys on a stored entry', () => {
    const result = EntrySchema.safeParse({
      id: 1,
      date: '2024-01-01',
      type: 'income',
      amount: 5,
      category: 'a',
      tag: 'kept',
    });

    expect(messagesOf(result)).toEqual(["Unrecognized key(s) in object: 'tag'"]);
  });
});

describe('EntryFilterSchema', () => {
  it('should reject a malformed start date', () => {
    const result = EntryFilterSchema.safeParse({ start: '2024-02-30' });
    expect(result.success).toBe(false);
    expect(result.error?.errors[0]?.path).toEqual(['start']);
  });
});

describe('LedgerFileSchema', () => {
  it('should flag repeated ids', () => {
    const result = LedgerFileSchema.safeParse([
      { id: 1, date: '2024-01-01', type: 'income', amount: 5, category: 'a' },
      { id: 1, date: '2024-01-02', type: 'expense', amount: 2, category: 'b' },
    ]);

    expect(result.success).toBe(false);
    expect(result.error?.errors[0]?.path).toEqual([1, 'id']);
    expect(result.error?.errors[0]?.message).toBe('Duplicate entry id 1');
  });
});
