/**
 * Order Repository
 *
 * Data access layer for order ledgers.
 * Pure table operations with no business rules; every mutating method
 * works on a transaction draft obtained through `transaction()`.
 */

import { MemoryStore, type TransactionCallback } from '@trading-ledger/database';
import { appendLedgerEvent, eventsAfter } from '../shared/events.js';
import type { CreateStrategyData, GridStrategy } from '../strategies/strategy-types.js';
import type {
  CreateOrderData,
  Order,
  OrderLedgerEvent,
  OrderLedgerEventData,
  OrderLedgerRecord,
  OrderLedgerState,
  OrderLedgerView,
} from './order-types.js';

export function createOrderLedgerStore(): MemoryStore<OrderLedgerRecord> {
  return new MemoryStore<OrderLedgerRecord>();
}

function appendToIndex(index: Map<string, number[]>, identity: string, id: number): void {
  const ids = index.get(identity);
  if (ids) {
    ids.push(id);
  } else {
    index.set(identity, [id]);
  }
}

export class OrderRepository {
  constructor(private store: MemoryStore<OrderLedgerRecord> = createOrderLedgerStore()) {}

  /**
   * Run an atomic transaction against all order ledgers
   */
  transaction<T>(fn: TransactionCallback<OrderLedgerRecord, T>): Promise<T> {
    return this.store.transaction(fn);
  }

  /**
   * Read committed state
   */
  read<T>(fn: (state: OrderLedgerView) => T): T {
    return this.store.read(fn);
  }

  /**
   * Find a ledger by owner identity
   */
  findLedger(state: OrderLedgerView, owner: string): OrderLedgerRecord | null {
    return state.get(owner) ?? null;
  }

  /**
   * Create an empty ledger
   */
  createLedger(tx: OrderLedgerState, owner: string, createdAt: number): OrderLedgerRecord {
    const ledger: OrderLedgerRecord = {
      owner,
      createdAt,
      nextOrderId: 1,
      nextStrategyId: 1,
      orders: new Map(),
      strategies: new Map(),
      userOrders: new Map(),
      userStrategies: new Map(),
      marketPrices: new Map(),
      events: [],
    };
    tx.set(owner, ledger);
    return ledger;
  }

  /**
   * Insert an order under the next sequential id and index it by owner
   */
  createOrder(ledger: OrderLedgerRecord, data: CreateOrderData): Order {
    const order: Order = {
      id: ledger.nextOrderId,
      owner: data.owner,
      symbol: data.symbol,
      side: data.side,
      amount: data.amount,
      limitPrice: data.limitPrice,
      status: 'PENDING',
      createdAt: data.createdAt,
      filledAt: null,
      strategyId: data.strategyId,
    };
    ledger.nextOrderId += 1;
    ledger.orders.set(order.id, order);
    appendToIndex(ledger.userOrders, order.owner, order.id);
    return order;
  }

  /**
   * Find order by id
   */
  findOrderById(ledger: OrderLedgerRecord, orderId: number): Order | null {
    return ledger.orders.get(orderId) ?? null;
  }

  /**
   * PENDING orders for a symbol, ascending id
   */
  findPendingBySymbol(ledger: OrderLedgerRecord, symbol: string): Order[] {
    return [...ledger.orders.values()].filter(
      (order) => order.symbol === symbol && order.status === 'PENDING'
    );
  }

  /**
   * Orders generated by a strategy, ascending id
   */
  findOrdersByStrategy(ledger: OrderLedgerRecord, strategyId: number): Order[] {
    return [...ledger.orders.values()].filter((order) => order.strategyId === strategyId);
  }

  markFilled(order: Order, filledAt: number): void {
    order.status = 'FILLED';
    order.filledAt = filledAt;
  }

  markCancelled(order: Order): void {
    order.status = 'CANCELLED';
  }

  /**
   * Insert a strategy under the next sequential id and index it by owner
   */
  createStrategy(ledger: OrderLedgerRecord, data: CreateStrategyData): GridStrategy {
    const strategy: GridStrategy = {
      id: ledger.nextStrategyId,
      owner: data.owner,
      symbol: data.symbol,
      basePrice: data.basePrice,
      gridSpacingBps: data.gridSpacingBps,
      numLevels: data.numLevels,
      amountPerLevel: data.amountPerLevel,
      active: true,
      createdAt: data.createdAt,
    };
    ledger.nextStrategyId += 1;
    ledger.strategies.set(strategy.id, strategy);
    appendToIndex(ledger.userStrategies, strategy.owner, strategy.id);
    return strategy;
  }

  findStrategyById(ledger: OrderLedgerRecord, strategyId: number): GridStrategy | null {
    return ledger.strategies.get(strategyId) ?? null;
  }

  findOrderIdsByUser(ledger: OrderLedgerRecord, user: string): number[] {
    return [...(ledger.userOrders.get(user) ?? [])];
  }

  findStrategyIdsByUser(ledger: OrderLedgerRecord, user: string): number[] {
    return [...(ledger.userStrategies.get(user) ?? [])];
  }

  findMarketPrice(ledger: OrderLedgerRecord, symbol: string): bigint | null {
    return ledger.marketPrices.get(symbol) ?? null;
  }

  upsertMarketPrice(ledger: OrderLedgerRecord, symbol: string, price: bigint): void {
    ledger.marketPrices.set(symbol, price);
  }

  appendEvent(ledger: OrderLedgerRecord, timestamp: number, data: OrderLedgerEventData): OrderLedgerEvent {
    return appendLedgerEvent<OrderLedgerEventData>(ledger.events, ledger.owner, timestamp, data);
  }

  findEvents(ledger: OrderLedgerRecord, afterSequence: number): OrderLedgerEvent[] {
    return eventsAfter(ledger.events, afterSequence);
  }
}
