/**
 * Vault Service
 *
 * Business logic layer for vaults.
 * Handles deposits behind a per-user lockup, withdrawals, and the trade
 * statistics the vault owner records. Every mutating operation runs in one
 * store transaction and appends its events before committing.
 */

import { logger as defaultLogger, type Logger } from '@trading-ledger/observability';
import { systemClock, type Clock } from '../shared/clock.js';
import type { LedgerEventEmitter } from '../shared/events.js';
import { applyBps, checkedAdd, checkedSub } from '../shared/fixed-point.js';
import { isLedgerError } from '../shared/ledger-errors.js';
import { parseInput } from '../shared/validation.js';
import { vaultCustodyAccount, type AssetTransfer } from './asset-bank.js';
import {
  DepositBelowMinimumError,
  DepositNotFoundError,
  InsufficientDepositError,
  InvalidVaultRequestError,
  TradeNotAuthorizedError,
  VaultAlreadyExistsError,
  VaultLockedError,
  VaultNotFoundError,
} from './vault-errors.js';
import type { VaultRepository } from './vault-repository.js';
import {
  DEFAULT_VAULT_CONFIG,
  DepositSchema,
  RecordTradeSchema,
  VaultConfigSchema,
  WithdrawSchema,
  type DepositParams,
  type RecordTradeParams,
  type UserDeposit,
  type VaultConfig,
  type VaultEvent,
  type VaultEventData,
  type VaultLedgerState,
  type VaultLedgerView,
  type VaultRecord,
  type VaultStats,
  type WithdrawParams,
} from './vault-types.js';

interface OperationContext {
  tx: VaultLedgerState;
  now: number;
  emit: (vault: VaultRecord, data: VaultEventData) => void;
}

export class VaultService {
  private config: VaultConfig;
  private logger: Logger;

  constructor(
    private vaultRepo: VaultRepository,
    private assets: AssetTransfer,
    private events: LedgerEventEmitter<VaultEvent>,
    config: VaultConfig = DEFAULT_VAULT_CONFIG,
    private clock: Clock = systemClock,
    logger?: Logger
  ) {
    this.config = parseInput(VaultConfigSchema, config, (message) => new InvalidVaultRequestError(message));
    this.logger = logger ?? defaultLogger.child({ module: 'vault' });
  }

  /**
   * Create an empty vault with the service configuration
   *
   * @throws {VaultAlreadyExistsError} If `owner` already has a vault
   */
  async initializeVault(owner: string): Promise<void> {
    await this.execute('initializeVault', { owner }, ({ tx, now, emit }) => {
      if (this.vaultRepo.findVault(tx, owner)) {
        throw new VaultAlreadyExistsError(owner);
      }

      const vault = this.vaultRepo.createVault(tx, owner, this.config, now);
      emit(vault, { type: 'vault.initialized', payload: { ...vault.config } });
    });
  }

  /**
   * Deposit funds into a vault
   *
   * Business rules:
   * - Every deposit must reach the vault's minimum, top-ups included
   * - The first deposit starts the user's lockup clock; later ones do not
   * - Funds move from the caller into the vault's custody account
   *
   * @returns The caller's deposited balance after this deposit
   * @throws {VaultNotFoundError} If the vault does not exist
   * @throws {DepositBelowMinimumError} If amount is below the minimum
   */
  async deposit(params: DepositParams): Promise<bigint> {
    return this.execute(
      'deposit',
      { caller: params.caller, vaultOwner: params.vaultOwner, amount: params.amount },
      async ({ tx, now, emit }) => {
        const input = parseInput(DepositSchema, params, (message) => new InvalidVaultRequestError(message));
        const vault = this.requireVault(tx, input.vaultOwner);

        if (input.amount < vault.config.minimumDeposit) {
          throw new DepositBelowMinimumError(input.amount, vault.config.minimumDeposit);
        }

        const existing = this.vaultRepo.findDeposit(vault, input.caller);
        const balance = checkedAdd(existing?.amount ?? 0n, input.amount);
        const totalBalance = checkedAdd(vault.totalBalance, input.amount);

        await this.transferToCustody(input.caller, vault.owner, input.amount);

        if (existing) {
          this.vaultRepo.setDepositAmount(existing, balance);
        } else {
          this.vaultRepo.createDeposit(vault, input.caller, balance, now);
        }
        this.vaultRepo.setTotalBalance(vault, totalBalance);

        emit(vault, {
          type: 'vault.deposit',
          payload: {
            user: input.caller,
            amount: input.amount,
            balance,
            totalBalance,
            firstDeposit: existing === null,
          },
        });
        return balance;
      }
    );
  }

  /**
   * Withdraw from a deposit once its lockup has elapsed
   *
   * Business rules:
   * - Lockup is checked before balance sufficiency
   * - Any amount up to the recorded balance is accepted, zero included
   * - The record stays in place at zero balance
   *
   * Only the recorded liability is reduced; returning the asset to the
   * caller is left to the asset-transfer boundary.
   *
   * @returns The caller's remaining balance
   * @throws {VaultNotFoundError} If the vault does not exist
   * @throws {DepositNotFoundError} If the caller never deposited
   * @throws {VaultLockedError} If the lockup period has not elapsed
   * @throws {InsufficientDepositError} If amount exceeds the balance
   */
  async withdraw(params: WithdrawParams): Promise<bigint> {
    return this.execute(
      'withdraw',
      { caller: params.caller, vaultOwner: params.vaultOwner, amount: params.amount },
      ({ tx, now, emit }) => {
        const input = parseInput(WithdrawSchema, params, (message) => new InvalidVaultRequestError(message));
        const vault = this.requireVault(tx, input.vaultOwner);

        const record = this.vaultRepo.findDeposit(vault, input.caller);
        if (!record) {
          throw new DepositNotFoundError(input.caller);
        }

        const unlocksAt = this.unlocksAt(vault, record);
        if (now < unlocksAt) {
          throw new VaultLockedError(unlocksAt);
        }
        if (input.amount > record.amount) {
          throw new InsufficientDepositError(input.amount, record.amount);
        }

        const balance = checkedSub(record.amount, input.amount);
        const totalBalance = checkedSub(vault.totalBalance, input.amount);
        this.vaultRepo.setDepositAmount(record, balance);
        this.vaultRepo.setTotalBalance(vault, totalBalance);

        // TODO: return the asset from custody once AssetTransfer can sign for the vault account
        this.logger.debug(
          { vaultOwner: vault.owner, user: input.caller, amount: input.amount },
          'Withdrawal recorded without asset return'
        );

        emit(vault, {
          type: 'vault.withdrawal',
          payload: { user: input.caller, amount: input.amount, balance, totalBalance },
        });
        return balance;
      }
    );
  }

  /**
   * Record a trade executed on behalf of the vault
   *
   * Only the vault owner may record trades. `profitLoss` is unsigned and
   * always added to the running profit.
   *
   * @throws {TradeNotAuthorizedError} If `trader` is not the vault owner
   * @throws {VaultNotFoundError} If the vault does not exist
   */
  async recordTrade(params: RecordTradeParams): Promise<void> {
    await this.execute(
      'recordTrade',
      { trader: params.trader, vaultOwner: params.vaultOwner, symbol: params.symbol },
      ({ tx, emit }) => {
        const input = parseInput(RecordTradeSchema, params, (message) => new InvalidVaultRequestError(message));
        if (input.trader !== input.vaultOwner) {
          throw new TradeNotAuthorizedError(input.trader);
        }
        const vault = this.requireVault(tx, input.vaultOwner);

        const totalTrades = vault.totalTrades + 1;
        this.vaultRepo.recordTradeTotals(vault, checkedAdd(vault.totalProfit, input.profitLoss), totalTrades);

        emit(vault, {
          type: 'vault.trade_recorded',
          payload: {
            symbol: input.symbol,
            side: input.side,
            amount: input.amount,
            price: input.price,
            profitLoss: input.profitLoss,
            totalTrades,
          },
        });
      }
    );
  }

  async getVaultStats(vaultOwner: string): Promise<VaultStats> {
    return this.query(vaultOwner, (vault) => ({
      totalBalance: vault.totalBalance,
      totalProfit: vault.totalProfit,
      totalTrades: vault.totalTrades,
      userCount: vault.deposits.size,
    }));
  }

  /**
   * Deposited balance of a user, 0 if they never deposited
   */
  async getUserDeposit(vaultOwner: string, user: string): Promise<bigint> {
    return this.query(vaultOwner, (vault) => this.vaultRepo.findDeposit(vault, user)?.amount ?? 0n);
  }

  async getDepositRecord(vaultOwner: string, user: string): Promise<UserDeposit | null> {
    return this.query(vaultOwner, (vault) => {
      const record = this.vaultRepo.findDeposit(vault, user);
      return record ? { ...record } : null;
    });
  }

  async getVaultConfig(vaultOwner: string): Promise<VaultConfig> {
    return this.query(vaultOwner, (vault) => ({ ...vault.config }));
  }

  /**
   * Fee owed on the accumulated profit, rounded down. Nothing is charged.
   */
  async getPerformanceFee(vaultOwner: string): Promise<bigint> {
    return this.query(vaultOwner, (vault) => applyBps(vault.totalProfit, vault.config.performanceFeeBps));
  }

  /**
   * Earliest time a user may withdraw, or null if they never deposited
   */
  async getWithdrawableAt(vaultOwner: string, user: string): Promise<number | null> {
    return this.query(vaultOwner, (vault) => {
      const record = this.vaultRepo.findDeposit(vault, user);
      return record ? this.unlocksAt(vault, record) : null;
    });
  }

  async getEvents(vaultOwner: string, afterSequence = 0): Promise<VaultEvent[]> {
    return this.query(vaultOwner, (vault) => structuredClone(this.vaultRepo.findEvents(vault, afterSequence)));
  }

  /**
   * Move funds from the depositor into custody, returning them if custody
   * rejects the asset
   *
   * The custody error is always the one rethrown. A failed refund is logged
   * at error with the stranded amount.
   */
  private async transferToCustody(user: string, vaultOwner: string, amount: bigint): Promise<void> {
    const asset = await this.assets.withdraw(user, amount);
    try {
      await this.assets.deposit(vaultCustodyAccount(vaultOwner), asset);
    } catch (custodyError) {
      try {
        await this.assets.deposit(user, asset);
      } catch (refundError) {
        this.logger.error(
          {
            err: refundError,
            custodyError: custodyError instanceof Error ? custodyError.message : String(custodyError),
            vaultOwner,
            user,
            amount: asset.amount,
          },
          'Deposit refund failed after custody rejected the asset'
        );
      }
      throw custodyError;
    }
  }

  private unlocksAt(vault: VaultRecord, record: UserDeposit): number {
    return record.depositTime + vault.config.lockupPeriodSeconds;
  }

  private requireVault(state: VaultLedgerView, owner: string): VaultRecord {
    const vault = this.vaultRepo.findVault(state, owner);
    if (!vault) {
      throw new VaultNotFoundError(owner);
    }
    return vault;
  }

  private async query<T>(vaultOwner: string, fn: (vault: VaultRecord) => T): Promise<T> {
    return this.vaultRepo.read((state) => fn(this.requireVault(state, vaultOwner)));
  }

  private async execute<T>(
    operation: string,
    context: Record<string, unknown>,
    work: (ctx: OperationContext) => T | Promise<T>
  ): Promise<T> {
    const emitted: VaultEvent[] = [];

    let result: T;
    try {
      result = await this.vaultRepo.transaction((tx) => {
        const now = this.clock.now();
        return work({
          tx,
          now,
          emit: (vault, data) => {
            emitted.push(this.vaultRepo.appendEvent(vault, now, data));
          },
        });
      });
    } catch (error) {
      this.logger.warn(
        { operation, ...context, code: isLedgerError(error) ? error.code : 'INTERNAL', err: error },
        `${operation} rejected`
      );
      throw error;
    }

    this.logger.info({ operation, ...context, events: emitted.map((e) => e.type) }, `${operation} committed`);
    await this.events.publish(emitted);
    return result;
  }
}
