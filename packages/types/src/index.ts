/**
 * @pocket-ledger/types
 *
 * Zod schemas and inferred types shared by the ledger core and the CLI.
 */

export {
  ENTRY_TYPES,
  MAX_AMOUNT,
  isCalendarDate,
  EntryTypeSchema,
  IsoDateSchema,
  EntrySchema,
  LedgerFileSchema,
  AddEntryRequestSchema,
  EntryFilterSchema,
} from './entry.schema.js';
export type { EntryType, Entry, EntryFilter } from './entry.schema.js';
