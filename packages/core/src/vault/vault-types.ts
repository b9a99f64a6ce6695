/**
 * Vault Types
 *
 * A vault pools user deposits behind a lockup period and accumulates the
 * statistics of trades its owner records against it. Amounts are u64
 * fixed-point integers (APT ×10^8).
 */

import type { StoreDraft, StoreView } from '@trading-ledger/database';
import { z } from 'zod';
import type { LedgerEvent } from '../shared/events.js';
import { BPS_DENOMINATOR, U64_MAX } from '../shared/fixed-point.js';
import { OrderSideSchema, type OrderSide, type OrderSideInput } from '../shared/trade-side.js';

export interface VaultConfig {
  minimumDeposit: bigint;
  performanceFeeBps: number;
  lockupPeriodSeconds: number;
}

export const DEFAULT_VAULT_CONFIG: Readonly<VaultConfig> = {
  minimumDeposit: 50_000_000n,
  performanceFeeBps: 1000,
  lockupPeriodSeconds: 86_400,
};

export interface UserDeposit {
  user: string;
  amount: bigint;
  // Set by the first deposit; top-ups never move the lockup clock
  depositTime: number;
  lastProfitShare: bigint;
}

export interface VaultStats {
  totalBalance: bigint;
  totalProfit: bigint;
  totalTrades: number;
  userCount: number;
}

// ─── Events ─────────────────────────────────────────────────────

export type VaultEventData =
  | {
      type: 'vault.initialized';
      payload: VaultConfig;
    }
  | {
      type: 'vault.deposit';
      payload: {
        user: string;
        amount: bigint;
        balance: bigint;
        totalBalance: bigint;
        firstDeposit: boolean;
      };
    }
  | {
      type: 'vault.withdrawal';
      payload: {
        user: string;
        amount: bigint;
        balance: bigint;
        totalBalance: bigint;
      };
    }
  | {
      type: 'vault.trade_recorded';
      payload: {
        symbol: string;
        side: OrderSide;
        amount: bigint;
        price: bigint;
        profitLoss: bigint;
        totalTrades: number;
      };
    };

export type VaultEvent = LedgerEvent<VaultEventData>;
export type VaultEventType = VaultEvent['type'];

// ─── Persisted state ────────────────────────────────────────────

export interface VaultRecord {
  owner: string;
  createdAt: number;
  config: VaultConfig;
  totalBalance: bigint;
  totalProfit: bigint;
  totalTrades: number;
  // Insertion-ordered: iteration follows first-deposit order
  deposits: Map<string, UserDeposit>;
  events: VaultEvent[];
}

/** Vaults keyed by owner, as seen inside a transaction */
export type VaultLedgerState = StoreDraft<VaultRecord>;
export type VaultLedgerView = StoreView<VaultRecord>;

// ─── Validation ─────────────────────────────────────────────────

const u64 = (label: string) =>
  z.bigint().nonnegative(`${label} must not be negative`).lte(U64_MAX, `${label} exceeds u64 range`);

export const VaultConfigSchema = z.object({
  minimumDeposit: u64('Minimum deposit'),
  performanceFeeBps: z
    .number()
    .int('Performance fee must be a whole number of basis points')
    .min(0, 'Performance fee must not be negative')
    .max(Number(BPS_DENOMINATOR), 'Performance fee cannot exceed 10000 bps'),
  lockupPeriodSeconds: z
    .number()
    .int('Lockup period must be a whole number of seconds')
    .nonnegative('Lockup period must not be negative'),
});

export const DepositSchema = z.object({
  caller: z.string().min(1, 'Caller identity is required'),
  vaultOwner: z.string().min(1, 'Vault owner is required'),
  amount: u64('Amount'),
});

export const WithdrawSchema = DepositSchema;

export const RecordTradeSchema = z.object({
  trader: z.string().min(1, 'Trader identity is required'),
  vaultOwner: z.string().min(1, 'Vault owner is required'),
  symbol: z.string().min(1, 'Symbol is required'),
  side: OrderSideSchema,
  amount: u64('Amount'),
  price: u64('Price'),
  profitLoss: u64('Profit'),
});

// ─── Parameters ─────────────────────────────────────────────────

export interface DepositParams {
  caller: string;
  vaultOwner: string;
  amount: bigint;
}

export type WithdrawParams = DepositParams;

export interface RecordTradeParams {
  trader: string;
  vaultOwner: string;
  symbol: string;
  side: OrderSideInput;
  amount: bigint;
  price: bigint;
  // Unsigned: losses cannot be recorded and never reduce totalProfit
  profitLoss: bigint;
}
