/**
 * Vault Ledger
 *
 * Pooled deposits with a lockup period and trade statistics.
 */

export { VaultService } from './vault-service.js';
export { VaultRepository, createVaultLedgerStore } from './vault-repository.js';
export { MemoryAssetBank, InsufficientFundsError, vaultCustodyAccount } from './asset-bank.js';
export type { Asset, AssetTransfer } from './asset-bank.js';

export {
  DEFAULT_VAULT_CONFIG,
  VaultConfigSchema,
  DepositSchema,
  WithdrawSchema,
  RecordTradeSchema,
} from './vault-types.js';
export type {
  VaultConfig,
  UserDeposit,
  VaultStats,
  VaultEventData,
  VaultEvent,
  VaultEventType,
  VaultRecord,
  VaultLedgerState,
  VaultLedgerView,
  DepositParams,
  WithdrawParams,
  RecordTradeParams,
} from './vault-types.js';

export {
  VaultNotFoundError,
  VaultAlreadyExistsError,
  DepositBelowMinimumError,
  DepositNotFoundError,
  VaultLockedError,
  InsufficientDepositError,
  TradeNotAuthorizedError,
  InvalidVaultRequestError,
} from './vault-errors.js';
