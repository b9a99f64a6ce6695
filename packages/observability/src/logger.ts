import pino from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';

export type { Logger, LoggerOptions };

/**
 * Render bigint values as decimal strings.
 *
 * Ledger quantities are u64 fixed-point integers; JSON has no lossless
 * number type for them, so every bigint in a log object is written as text.
 */
function stringifyBigInts(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(stringifyBigInts);
  }
  if (value instanceof Error) {
    return value;
  }
  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = stringifyBigInts(entry);
    }
    return result;
  }
  return value;
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels (LOG_LEVEL)
 * - bigint fields written as decimal strings
 * - ISO 8601 timestamps
 *
 * @param destination - Optional stream; defaults to stdout
 */
export function createLogger(options?: LoggerOptions, destination?: DestinationStream): Logger {
  const config: LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    serializers: {
      err: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      log(object) {
        const normalized: Record<string, unknown> = {};
        for (const [key, entry] of Object.entries(object)) {
          normalized[key] = stringifyBigInts(entry);
        }
        return normalized;
      },
    },
    ...options,
  };

  return destination ? pino(config, destination) : pino(config);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
