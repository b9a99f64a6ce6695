/**
 * Asset transfer boundary
 *
 * The vault never moves value itself. Deposits withdraw an asset from the
 * depositor through an AssetTransfer and hand it to the vault's custody
 * account; withdrawals only reduce the recorded liability.
 */

import { checkedAdd } from '../shared/fixed-point.js';
import { InvalidStateError } from '../shared/ledger-errors.js';

export interface Asset {
  readonly amount: bigint;
}

export interface AssetTransfer {
  withdraw(identity: string, amount: bigint): Asset | Promise<Asset>;
  deposit(identity: string, asset: Asset): void | Promise<void>;
}

/**
 * Identity holding the assets deposited into a vault
 */
export function vaultCustodyAccount(vaultOwner: string): string {
  return `vault:${vaultOwner}`;
}

export class InsufficientFundsError extends InvalidStateError {
  constructor(identity: string, available: bigint, requested: bigint) {
    super(`Insufficient funds: ${identity} holds ${available}, needs ${requested}`);
  }
}

/**
 * In-process AssetTransfer with a balance per identity
 */
export class MemoryAssetBank implements AssetTransfer {
  private balances = new Map<string, bigint>();

  /**
   * Credit new funds to an identity
   */
  mint(identity: string, amount: bigint): void {
    this.balances.set(identity, checkedAdd(this.balanceOf(identity), amount));
  }

  balanceOf(identity: string): bigint {
    return this.balances.get(identity) ?? 0n;
  }

  withdraw(identity: string, amount: bigint): Asset {
    const available = this.balanceOf(identity);
    if (available < amount) {
      throw new InsufficientFundsError(identity, available, amount);
    }
    this.balances.set(identity, available - amount);
    return { amount };
  }

  deposit(identity: string, asset: Asset): void {
    this.balances.set(identity, checkedAdd(this.balanceOf(identity), asset.amount));
  }
}
