/**
 * Vault Errors
 */

import {
  AlreadyExistsError,
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  UnauthorizedError,
} from '../shared/ledger-errors.js';

export class VaultNotFoundError extends NotFoundError {
  constructor(owner: string) {
    super(`Vault not found for ${owner}`);
  }
}

export class VaultAlreadyExistsError extends AlreadyExistsError {
  constructor(owner: string) {
    super(`Vault already exists for ${owner}`);
  }
}

export class DepositBelowMinimumError extends InvalidArgumentError {
  constructor(amount: bigint, minimum: bigint) {
    super(`Deposit of ${amount} is below the minimum of ${minimum}`);
  }
}

export class DepositNotFoundError extends NotFoundError {
  constructor(user: string) {
    super(`No deposit found for ${user}`);
  }
}

export class VaultLockedError extends InvalidStateError {
  constructor(public readonly unlocksAt: number) {
    super(`Deposit is locked until ${unlocksAt}`);
  }
}

export class InsufficientDepositError extends InvalidStateError {
  constructor(requested: bigint, available: bigint) {
    super(`Withdrawal of ${requested} exceeds deposited balance of ${available}`);
  }
}

export class TradeNotAuthorizedError extends UnauthorizedError {
  constructor(trader: string) {
    super(`Only the vault owner can record trades (caller ${trader})`);
  }
}

export class InvalidVaultRequestError extends InvalidArgumentError {
  constructor(message: string) {
    super(message);
  }
}
