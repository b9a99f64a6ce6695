/**
 * @trading-ledger/observability
 *
 * Structured logging for the order and vault ledgers.
 */

export { createLogger, logger } from './logger.js';
export type { Logger, LoggerOptions } from './logger.js';
