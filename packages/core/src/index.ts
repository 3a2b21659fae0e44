/**
 * @pocket-ledger/core - Domain logic for the pocket ledger
 *
 * The ledger store, the pure filter/aggregate queries and the service that
 * the CLI drives.
 */

export * from './ledger/index.js';
