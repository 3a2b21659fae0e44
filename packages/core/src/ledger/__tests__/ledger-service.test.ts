/**
 * Ledger Service Unit Tests
 *
 * Tests business logic against an in-memory repository.
 * No file system access - pure unit tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LedgerService, formatLocalDate } from '../ledger-service.js';
import { ParseError, ValidationError } from '../ledger-errors.js';
import type { LedgerRepository } from '../ledger-repository.js';
import type { Entry } from '../ledger-types.js';

class InMemoryLedgerRepository implements LedgerRepository {
  entries: Entry[] = [];

  load(): Entry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  save(entries: readonly Entry[]): void {
    this.entries = entries.map((entry) => ({ ...entry }));
  }
}

describe('LedgerService', () => {
  let repo: InMemoryLedgerRepository;
  let service: LedgerService;

  beforeEach(() => {
    repo = new InMemoryLedgerRepository();
    service = new LedgerService(repo, { today: () => '2024-06-15' });
  });

  describe('addEntry', () => {
    it('should assign ids and persist the entry', () => {
      const first = service.addEntry({
        type: 'income',
        amount: 1500,
        category: 'maas',
        note: 'Mart',
        date: '2024-03-05',
      });
      const second = service.addEntry({
        type: 'expense',
        amount: 250,
        category: 'fatura',
        date: '2024-03-10',
      });

      expect(first).toEqual({
        id: 1,
        date: '2024-03-05',
        type: 'income',
        amount: 1500,
        category: 'maas',
        note: 'Mart',
      });
      expect(second.id).toBe(2);
      expect(repo.entries).toEqual([first, second]);
    });

    it('should default the date to today', () => {
      const entry = service.addEntry({ type: 'expense', amount: 3, category: 'kahve' });
      expect(entry.date).toBe('2024-06-15');
    });

    it('should round the amount to cents and drop an empty note', () => {
      const entry = service.addEntry({
        type: 'expense',
        amount: 19.999,
        category: ' market ',
        note: '   ',
      });

      expect(entry.amount).toBe(20);
      expect(entry.category).toBe('market');
      expect('note' in entry).toBe(false);
    });

    it('should keep existing entries untouched', () => {
      repo.entries = [
        { id: 7, date: '2024-01-01', type: 'income', amount: 10, category: 'a' },
        { id: 3, date: '2024-01-02', type: 'expense', amount: 4, category: 'b' },
      ];
      const before = repo.load();

      const entry = service.addEntry({ type: 'income', amount: 1, category: 'c' });

      expect(entry.id).toBe(8);
      expect(repo.entries.slice(0, 2)).toEqual(before);
    });

    it('should reject a non-positive amount without saving', () => {
      const saveSpy = vi.spyOn(repo, 'save');

      expect(() => service.addEntry({ type: 'income', amount: -5, category: 'maas' })).toThrow(
        new ValidationError(['amount: Amount must be greater than zero'])
      );
      expect(saveSpy).not.toHaveBeenCalled();
    });

    it('should reject an oversized amount and leave the ledger untouched', () => {
      service.addEntry({ type: 'income', amount: 10, category: 'maas', date: '2024-01-01' });
      const before = repo.load();
      const saveSpy = vi.spyOn(repo, 'save');

      expect(() => service.addEntry({ type: 'income', amount: 1e307, category: 'x' })).toThrow(
        new ValidationError(['amount: Amount is too large'])
      );
      expect(saveSpy).not.toHaveBeenCalled();
      expect(repo.entries).toEqual(before);
    });

    it('should reject an unknown type', () => {
      expect(() => service.addEntry({ type: 'gelir', amount: 5, category: 'maas' })).toThrow(
        'Validation failed: type: Type must be "income" or "expense"'
      );
    });

    it('should reject an impossible date', () => {
      const attempt = () =>
        service.addEntry({ type: 'income', amount: 5, category: 'maas', date: '2024-02-30' });

      expect(attempt).toThrow(ValidationError);
      expect(attempt).toThrow('date: Date must be a valid calendar date in YYYY-MM-DD format');
    });

    it('should propagate store errors', () => {
      vi.spyOn(repo, 'load').mockImplementation(() => {
        throw new ParseError('ledger.json', 'malformed JSON');
      });

      expect(() => service.addEntry({ type: 'income', amount: 5, category: 'maas' })).toThrow(ParseError);
    });
  });

  describe('queries', () => {
    beforeEach(() => {
      service.addEntry({ type: 'income', amount: 1500, category: 'maas', date: '2024-03-05' });
      service.addEntry({ type: 'expense', amount: 250, category: 'fatura', date: '2024-03-10' });
    });

    it('should report net 1250 for the two-entry ledger', () => {
      expect(service.getBalance()).toEqual({
        income: 1500,
        expense: 250,
        net: 1250,
        entryCount: 2,
      });
    });

    it('should list exactly the entry in the requested category', () => {
      const result = service.listEntries({ category: 'fatura' });

      expect(result).toHaveLength(1);
      expect(result[0]?.id).toBe(2);
    });

    it('should restrict the balance to a date range', () => {
      expect(service.getBalance({ start: '2024-03-06' })).toEqual({
        income: 0,
        expense: 250,
        net: -250,
        entryCount: 1,
      });
    });

    it('should return nothing when start is after end', () => {
      expect(service.listEntries({ start: '2024-03-31', end: '2024-03-01' })).toEqual([]);
    });

    it('should reject a malformed filter date', () => {
      expect(() => service.listEntries({ end: '31.03.2024' })).toThrow(ValidationError);
    });

    it('should summarize by category in first-seen order', () => {
      expect(service.summarize()).toEqual([
        { category: 'maas', income: 1500, expense: 0, net: 1500 },
        { category: 'fatura', income: 0, expense: 250, net: -250 },
      ]);
    });
  });

  it('should summarize an empty ledger to an empty result', () => {
    expect(service.summarize()).toEqual([]);
  });
});

describe('formatLocalDate', () => {
  it('should zero-pad month and day', () => {
    expect(formatLocalDate(new Date(2024, 0, 5))).toBe('2024-01-05');
  });
});
