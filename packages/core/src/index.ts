/**
 * @trading-ledger/core - Order and vault ledgers
 *
 * Order placement and matching, grid strategies, the market price table,
 * and vault deposit accounting. Services run each operation as one atomic
 * transaction over a MemoryStore and publish its events after commit.
 */

export * from './shared/index.js';
export * from './orders/index.js';
export * from './strategies/index.js';
export * from './vault/index.js';
export * from './config.js';
