/**
 * Command-line errors
 *
 * Domain errors (ValidationError, ParseError) come from @pocket-ledger/core;
 * these cover problems with how the tool was invoked.
 */

export class CliError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Missing or unknown command, option or argument, or invalid configuration
 */
export class UsageError extends CliError {}
