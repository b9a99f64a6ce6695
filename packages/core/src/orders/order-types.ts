/**
 * Order Ledger Types
 *
 * Entity, state and parameter types for the order ledger.
 * Quantities are u64 fixed-point integers; prices are conventionally
 * quoted ×10^6 but the ledger never converts between scales.
 */

import type { StoreDraft, StoreView } from '@trading-ledger/database';
import { z } from 'zod';
import { U64_MAX } from '../shared/fixed-point.js';
import type { LedgerEvent } from '../shared/events.js';
import { OrderSideSchema, type OrderSide, type OrderSideInput } from '../shared/trade-side.js';
import type { GridStrategy } from '../strategies/strategy-types.js';

export type OrderStatus = 'PENDING' | 'FILLED' | 'CANCELLED';

export interface Order {
  id: number;
  owner: string;
  symbol: string;
  side: OrderSide;
  amount: bigint;
  limitPrice: bigint;
  status: OrderStatus;
  createdAt: number;
  filledAt: number | null;
  strategyId: number | null;
}

export type OrderResponse = Order;

/**
 * Demo prices seeded into every new ledger (×10^6)
 */
export const DEFAULT_MARKET_PRICES: ReadonlyArray<readonly [symbol: string, price: bigint]> = [
  ['APT/USDC', 1_000_000n],
  ['BTC/USDC', 6_500_000_000n],
  ['ETH/USDC', 300_000_000n],
];

// ─── Events ─────────────────────────────────────────────────────

export type OrderLedgerEventData =
  | {
      type: 'ledger.initialized';
      payload: { seededSymbols: string[] };
    }
  | {
      type: 'order.placed';
      payload: {
        orderId: number;
        owner: string;
        symbol: string;
        side: OrderSide;
        amount: bigint;
        limitPrice: bigint;
        strategyId: number | null;
      };
    }
  | {
      type: 'order.filled';
      payload: {
        orderId: number;
        owner: string;
        symbol: string;
        side: OrderSide;
        amount: bigint;
        limitPrice: bigint;
        // The price the fill was matched at, not the order's limit
        marketPrice: bigint;
      };
    }
  | {
      type: 'order.cancelled';
      payload: { orderId: number; owner: string };
    }
  | {
      type: 'strategy.created';
      payload: {
        strategyId: number;
        owner: string;
        symbol: string;
        basePrice: bigint;
        gridSpacingBps: number;
        numLevels: number;
        amountPerLevel: bigint;
      };
    }
  | {
      type: 'market_price.updated';
      payload: { symbol: string; price: bigint; previousPrice: bigint | null };
    };

export type OrderLedgerEvent = LedgerEvent<OrderLedgerEventData>;
export type OrderLedgerEventType = OrderLedgerEvent['type'];

// ─── Persisted state ────────────────────────────────────────────

/**
 * One order ledger instance, keyed by the identity that initialized it
 */
export interface OrderLedgerRecord {
  owner: string;
  createdAt: number;
  nextOrderId: number;
  nextStrategyId: number;
  orders: Map<number, Order>;
  strategies: Map<number, GridStrategy>;
  userOrders: Map<string, number[]>;
  userStrategies: Map<string, number[]>;
  marketPrices: Map<string, bigint>;
  events: OrderLedgerEvent[];
}

/** Order ledgers keyed by owner, as seen inside a transaction */
export type OrderLedgerState = StoreDraft<OrderLedgerRecord>;
export type OrderLedgerView = StoreView<OrderLedgerRecord>;

// ─── Validation ─────────────────────────────────────────────────

const identity = (label: string) => z.string().min(1, `${label} is required`);

const positiveU64 = (label: string) =>
  z.bigint().positive(`${label} must be greater than zero`).lte(U64_MAX, `${label} exceeds u64 range`);

export const PlaceOrderSchema = z.object({
  caller: identity('Caller identity'),
  ledgerOwner: identity('Ledger owner'),
  symbol: identity('Symbol'),
  side: OrderSideSchema,
  amount: positiveU64('Amount'),
  limitPrice: positiveU64('Limit price'),
});

export const CancelOrderSchema = z.object({
  caller: identity('Caller identity'),
  ledgerOwner: identity('Ledger owner'),
  orderId: z.number().int().nonnegative('Order id must not be negative'),
});

export const UpdateMarketPriceSchema = z.object({
  caller: identity('Caller identity'),
  symbol: identity('Symbol'),
  price: z.bigint().nonnegative('Price must not be negative').lte(U64_MAX, 'Price exceeds u64 range'),
});

export const SweepRestingOrdersSchema = z.object({
  caller: identity('Caller identity'),
  symbol: identity('Symbol'),
});

// ─── Parameters ─────────────────────────────────────────────────

export interface PlaceOrderParams {
  caller: string;
  ledgerOwner: string;
  symbol: string;
  side: OrderSideInput;
  amount: bigint;
  limitPrice: bigint;
}

export interface CancelOrderParams {
  caller: string;
  ledgerOwner: string;
  orderId: number;
}

export interface UpdateMarketPriceParams {
  caller: string;
  symbol: string;
  price: bigint;
}

export interface SweepRestingOrdersParams {
  caller: string;
  symbol: string;
}

export interface CreateOrderData {
  owner: string;
  symbol: string;
  side: OrderSide;
  amount: bigint;
  limitPrice: bigint;
  createdAt: number;
  strategyId: number | null;
}
