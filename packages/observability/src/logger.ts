import { pino, stdSerializers } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

export type { Logger } from 'pino';

/**
 * Create a structured logger instance with Pino
 *
 * Level comes from `options.level`, then LOG_LEVEL, then 'info'.
 * Timestamps are ISO 8601 and errors go through the standard `err` serializer.
 * Pass a destination to send lines somewhere other than stdout (the CLI
 * uses stderr so stdout only carries command output).
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const resolved: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    base: { pid: process.pid },
    serializers: {
      err: stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(resolved, destination) : pino(resolved);
}

/**
 * Logger that drops everything, for callers that don't care about logs
 */
export const silentLogger: Logger = pino({ level: 'silent' });
