/**
 * Vault Repository
 *
 * Data access layer for vaults.
 * Table operations only; balance rules and lockup checks live in VaultService.
 */

import { MemoryStore, type TransactionCallback } from '@trading-ledger/database';
import { appendLedgerEvent, eventsAfter } from '../shared/events.js';
import type {
  UserDeposit,
  VaultConfig,
  VaultEvent,
  VaultEventData,
  VaultLedgerState,
  VaultLedgerView,
  VaultRecord,
} from './vault-types.js';

export function createVaultLedgerStore(): MemoryStore<VaultRecord> {
  return new MemoryStore<VaultRecord>();
}

export class VaultRepository {
  constructor(private store: MemoryStore<VaultRecord> = createVaultLedgerStore()) {}

  transaction<T>(fn: TransactionCallback<VaultRecord, T>): Promise<T> {
    return this.store.transaction(fn);
  }

  read<T>(fn: (state: VaultLedgerView) => T): T {
    return this.store.read(fn);
  }

  findVault(state: VaultLedgerView, owner: string): VaultRecord | null {
    return state.get(owner) ?? null;
  }

  createVault(tx: VaultLedgerState, owner: string, config: VaultConfig, createdAt: number): VaultRecord {
    const vault: VaultRecord = {
      owner,
      createdAt,
      config: { ...config },
      totalBalance: 0n,
      totalProfit: 0n,
      totalTrades: 0,
      deposits: new Map(),
      events: [],
    };
    tx.set(owner, vault);
    return vault;
  }

  findDeposit(vault: VaultRecord, user: string): UserDeposit | null {
    return vault.deposits.get(user) ?? null;
  }

  /**
   * Insert a deposit record; the caller guarantees none exists for `user`
   */
  createDeposit(vault: VaultRecord, user: string, amount: bigint, depositTime: number): UserDeposit {
    const record: UserDeposit = { user, amount, depositTime, lastProfitShare: 0n };
    vault.deposits.set(user, record);
    return record;
  }

  setDepositAmount(record: UserDeposit, amount: bigint): void {
    record.amount = amount;
  }

  setTotalBalance(vault: VaultRecord, totalBalance: bigint): void {
    vault.totalBalance = totalBalance;
  }

  recordTradeTotals(vault: VaultRecord, totalProfit: bigint, totalTrades: number): void {
    vault.totalProfit = totalProfit;
    vault.totalTrades = totalTrades;
  }

  appendEvent(vault: VaultRecord, timestamp: number, data: VaultEventData): VaultEvent {
    return appendLedgerEvent<VaultEventData>(vault.events, vault.owner, timestamp, data);
  }

  findEvents(vault: VaultRecord, afterSequence: number): VaultEvent[] {
    return eventsAfter(vault.events, afterSequence);
  }
}
