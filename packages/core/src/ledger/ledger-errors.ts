/**
 * Ledger Domain Errors
 *
 * Thrown by the store and the service layer; the CLI maps them to exit codes.
 */

import type { ZodError } from 'zod';

export class LedgerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad amount, type, date, category or filter
 */
export class ValidationError extends LedgerError {
  readonly issues: string[];

  constructor(issues: string[], options?: ErrorOptions) {
    super(`Validation failed: ${issues.join(', ')}`, options);
    this.issues = issues;
  }
}

/**
 * Ledger file exists but is not a valid JSON array of entries
 */
export class ParseError extends LedgerError {
  readonly filePath: string;

  constructor(filePath: string, detail: string, options?: ErrorOptions) {
    super(`Could not read ledger file ${filePath}: ${detail}`, options);
    this.filePath = filePath;
  }
}

/**
 * Flatten zod issues into "path: message" strings
 */
export function describeIssues(error: ZodError): string[] {
  return error.errors.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
