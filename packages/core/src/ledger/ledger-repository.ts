/**
 * Ledger Repository
 *
 * Loads and saves the whole ledger as a JSON array. Pure file I/O
 * with no business logic.
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { LedgerFileSchema } from '@pocket-ledger/types';
import type { Entry } from '@pocket-ledger/types';
import { ParseError, describeIssues } from './ledger-errors.js';

export interface LedgerRepository {
  load(): Entry[];
  save(entries: readonly Entry[]): void;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Serialized form written to disk: 2-space indent, trailing newline
 */
export function serializeLedger(entries: readonly Entry[]): string {
  return `${JSON.stringify(entries, null, 2)}\n`;
}

/**
 * Next id to assign: one past the highest id in use, or 1 for an empty ledger
 */
export function nextEntryId(entries: readonly Pick<Entry, 'id'>[]): number {
  return entries.reduce((max, entry) => Math.max(max, entry.id), 0) + 1;
}

export class JsonFileLedgerRepository implements LedgerRepository {
  constructor(readonly filePath: string) {}

  /**
   * Read every entry, in insertion order
   *
   * @returns An empty array when the file does not exist yet
   * @throws ParseError if the file is not valid JSON or not an array of entries
   */
  load(): Entry[] {
    let raw: string;
    try {
      raw = readFileSync(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ParseError(this.filePath, `malformed JSON (${detail})`, { cause: error });
    }

    const result = LedgerFileSchema.safeParse(data);
    if (!result.success) {
      throw new ParseError(this.filePath, describeIssues(result.error).join(', '), {
        cause: result.error,
      });
    }

    return result.data;
  }

  /**
   * Overwrite the file with the full sequence
   *
   * Writes a sibling temp file and renames it over the target, so readers
   * only ever see a complete snapshot.
   */
  save(entries: readonly Entry[]): void {
    mkdirSync(dirname(this.filePath), { recursive: true });

    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      writeFileSync(tempPath, serializeLedger(entries), 'utf8');
      renameSync(tempPath, this.filePath);
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw error;
    }
  }
}
