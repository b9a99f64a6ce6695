/**
 * Order Ledger Service
 *
 * Business logic layer for order ledgers.
 * Places and cancels orders, seeds grid strategies, maintains the market
 * price table and runs the price-crossing matcher. Every mutating
 * operation is one store transaction: it either commits with its events
 * or leaves no trace.
 *
 * Matching happens once, when an order is placed. Price updates never
 * re-evaluate resting orders; `sweepRestingOrders` is the explicit way to
 * do that.
 */

import { logger as defaultLogger, type Logger } from '@trading-ledger/observability';
import { systemClock, type Clock } from '../shared/clock.js';
import type { LedgerEventEmitter } from '../shared/events.js';
import { isLedgerError } from '../shared/ledger-errors.js';
import { parseInput } from '../shared/validation.js';
import { generateGridLevels } from '../strategies/grid-generator.js';
import { InvalidGridStrategyError, StrategyNotFoundError } from '../strategies/strategy-errors.js';
import {
  CreateGridStrategySchema,
  type CreateGridStrategyParams,
  type GridStrategyResponse,
} from '../strategies/strategy-types.js';
import {
  InvalidOrderError,
  OrderLedgerAlreadyExistsError,
  OrderLedgerNotFoundError,
  OrderNotFoundError,
  OrderNotPendingError,
  OrderOwnershipError,
} from './order-errors.js';
import { crossesMarket } from './order-matching.js';
import type { OrderRepository } from './order-repository.js';
import {
  CancelOrderSchema,
  DEFAULT_MARKET_PRICES,
  PlaceOrderSchema,
  SweepRestingOrdersSchema,
  UpdateMarketPriceSchema,
  type CancelOrderParams,
  type Order,
  type OrderLedgerEvent,
  type OrderLedgerEventData,
  type OrderLedgerRecord,
  type OrderLedgerState,
  type OrderLedgerView,
  type OrderResponse,
  type PlaceOrderParams,
  type SweepRestingOrdersParams,
  type UpdateMarketPriceParams,
} from './order-types.js';

interface OperationContext {
  tx: OrderLedgerState;
  now: number;
  emit: (ledger: OrderLedgerRecord, data: OrderLedgerEventData) => void;
}

export class OrderLedgerService {
  private logger: Logger;

  constructor(
    private orderRepo: OrderRepository,
    private events: LedgerEventEmitter<OrderLedgerEvent>,
    private clock: Clock = systemClock,
    logger?: Logger
  ) {
    this.logger = logger ?? defaultLogger.child({ module: 'order-ledger' });
  }

  /**
   * Create an empty ledger owned by `owner` and seed the demo prices
   *
   * @throws {OrderLedgerAlreadyExistsError} If `owner` already has a ledger
   */
  async initializeLedger(owner: string): Promise<void> {
    await this.execute('initializeLedger', { owner }, ({ tx, now, emit }) => {
      if (this.orderRepo.findLedger(tx, owner)) {
        throw new OrderLedgerAlreadyExistsError(owner);
      }

      const ledger = this.orderRepo.createLedger(tx, owner, now);
      for (const [symbol, price] of DEFAULT_MARKET_PRICES) {
        this.orderRepo.upsertMarketPrice(ledger, symbol, price);
      }

      emit(ledger, {
        type: 'ledger.initialized',
        payload: { seededSymbols: DEFAULT_MARKET_PRICES.map(([symbol]) => symbol) },
      });
    });
  }

  /**
   * Place an order and try to fill it against the current market price
   *
   * Business rules:
   * - Side must be BUY or SELL (or wire code 1 / 2)
   * - Amount and limit price must be non-zero
   * - The order is matched once, before this call returns
   *
   * @returns The new order id; query the order to see whether it filled
   * @throws {InvalidOrderError} If the parameters are invalid
   * @throws {OrderLedgerNotFoundError} If the target ledger does not exist
   */
  async placeOrder(params: PlaceOrderParams): Promise<number> {
    return this.execute(
      'placeOrder',
      { caller: params.caller, ledgerOwner: params.ledgerOwner, symbol: params.symbol },
      ({ tx, now, emit }) => {
        const input = parseInput(PlaceOrderSchema, params, (message) => new InvalidOrderError(message));
        const ledger = this.requireLedger(tx, input.ledgerOwner);

        const order = this.orderRepo.createOrder(ledger, {
          owner: input.caller,
          symbol: input.symbol,
          side: input.side,
          amount: input.amount,
          limitPrice: input.limitPrice,
          createdAt: now,
          strategyId: null,
        });
        emit(ledger, { type: 'order.placed', payload: this.placedPayload(order) });

        this.tryFill(ledger, order, now, emit);
        return order.id;
      }
    );
  }

  /**
   * Cancel a resting order
   *
   * Business rules:
   * - Only the order's owner may cancel it
   * - Only PENDING orders can be cancelled
   *
   * @throws {OrderNotFoundError} If the order does not exist
   * @throws {OrderOwnershipError} If the caller does not own the order
   * @throws {OrderNotPendingError} If the order is FILLED or CANCELLED
   */
  async cancelOrder(params: CancelOrderParams): Promise<void> {
    await this.execute(
      'cancelOrder',
      { caller: params.caller, ledgerOwner: params.ledgerOwner, orderId: params.orderId },
      ({ tx, emit }) => {
        const input = parseInput(CancelOrderSchema, params, (message) => new InvalidOrderError(message));
        const ledger = this.requireLedger(tx, input.ledgerOwner);

        const order = this.orderRepo.findOrderById(ledger, input.orderId);
        if (!order) {
          throw new OrderNotFoundError(input.orderId);
        }
        if (order.owner !== input.caller) {
          throw new OrderOwnershipError(order.id);
        }
        if (order.status !== 'PENDING') {
          throw new OrderNotPendingError(order.id, order.status);
        }

        this.orderRepo.markCancelled(order);
        emit(ledger, { type: 'order.cancelled', payload: { orderId: order.id, owner: order.owner } });
      }
    );
  }

  /**
   * Create a grid strategy and seed its ladder of resting orders
   *
   * Business rules:
   * - 1 ≤ numLevels ≤ 20 and 1 ≤ gridSpacingBps ≤ 1000
   * - floor(numLevels / 2) BUY and SELL levels; odd counts lose one level
   * - Grid orders continue the ledger's order id sequence and are never
   *   matched on creation
   *
   * @returns The new strategy id
   * @throws {InvalidGridStrategyError} If levels or spacing are out of range
   * @throws {OrderLedgerNotFoundError} If the target ledger does not exist
   */
  async createGridStrategy(params: CreateGridStrategyParams): Promise<number> {
    return this.execute(
      'createGridStrategy',
      { caller: params.caller, ledgerOwner: params.ledgerOwner, symbol: params.symbol },
      ({ tx, now, emit }) => {
        const input = parseInput(
          CreateGridStrategySchema,
          params,
          (message) => new InvalidGridStrategyError(message)
        );
        const ledger = this.requireLedger(tx, input.ledgerOwner);
        const levels = generateGridLevels(input);

        const strategy = this.orderRepo.createStrategy(ledger, {
          owner: input.caller,
          symbol: input.symbol,
          basePrice: input.basePrice,
          gridSpacingBps: input.gridSpacingBps,
          numLevels: input.numLevels,
          amountPerLevel: input.amountPerLevel,
          createdAt: now,
        });
        emit(ledger, {
          type: 'strategy.created',
          payload: {
            strategyId: strategy.id,
            owner: strategy.owner,
            symbol: strategy.symbol,
            basePrice: strategy.basePrice,
            gridSpacingBps: strategy.gridSpacingBps,
            numLevels: strategy.numLevels,
            amountPerLevel: strategy.amountPerLevel,
          },
        });

        for (const level of levels) {
          for (const [side, limitPrice] of [
            ['BUY', level.buyPrice],
            ['SELL', level.sellPrice],
          ] as const) {
            const order = this.orderRepo.createOrder(ledger, {
              owner: input.caller,
              symbol: input.symbol,
              side,
              amount: input.amountPerLevel,
              limitPrice,
              createdAt: now,
              strategyId: strategy.id,
            });
            emit(ledger, { type: 'order.placed', payload: this.placedPayload(order) });
          }
        }

        return strategy.id;
      }
    );
  }

  /**
   * Set the market price for a symbol on the caller's own ledger
   *
   * Unconditional upsert with no staleness or bounds checks. Resting
   * orders are not re-evaluated.
   *
   * @throws {OrderLedgerNotFoundError} If the caller has no ledger
   */
  async updateMarketPrice(params: UpdateMarketPriceParams): Promise<void> {
    await this.execute(
      'updateMarketPrice',
      { caller: params.caller, symbol: params.symbol, price: params.price },
      ({ tx, emit }) => {
        const input = parseInput(UpdateMarketPriceSchema, params, (message) => new InvalidOrderError(message));
        const ledger = this.requireLedger(tx, input.caller);

        const previousPrice = this.orderRepo.findMarketPrice(ledger, input.symbol);
        this.orderRepo.upsertMarketPrice(ledger, input.symbol, input.price);
        emit(ledger, {
          type: 'market_price.updated',
          payload: { symbol: input.symbol, price: input.price, previousPrice },
        });
      }
    );
  }

  /**
   * Re-run the matcher over every resting order of a symbol
   *
   * Owner-only: operates on the caller's own ledger. Orders are visited in
   * ascending id order. Does nothing when the symbol has no price.
   *
   * @returns Ids of the orders that filled
   * @throws {OrderLedgerNotFoundError} If the caller has no ledger
   */
  async sweepRestingOrders(params: SweepRestingOrdersParams): Promise<number[]> {
    return this.execute(
      'sweepRestingOrders',
      { caller: params.caller, symbol: params.symbol },
      ({ tx, now, emit }) => {
        const input = parseInput(SweepRestingOrdersSchema, params, (message) => new InvalidOrderError(message));
        const ledger = this.requireLedger(tx, input.caller);

        const filled: number[] = [];
        for (const order of this.orderRepo.findPendingBySymbol(ledger, input.symbol)) {
          if (this.tryFill(ledger, order, now, emit)) {
            filled.push(order.id);
          }
        }
        return filled;
      }
    );
  }

  /**
   * Last known price for a symbol, 0 if unknown
   */
  async getMarketPrice(ledgerOwner: string, symbol: string): Promise<bigint> {
    return this.query(ledgerOwner, (ledger) => this.orderRepo.findMarketPrice(ledger, symbol) ?? 0n);
  }

  /**
   * Ids of the orders a user placed on a ledger, in placement order
   */
  async getUserOrders(ledgerOwner: string, user: string): Promise<number[]> {
    return this.query(ledgerOwner, (ledger) => this.orderRepo.findOrderIdsByUser(ledger, user));
  }

  /**
   * @throws {OrderNotFoundError} If the order does not exist
   */
  async getOrder(ledgerOwner: string, orderId: number): Promise<OrderResponse> {
    return this.query(ledgerOwner, (ledger) => {
      const order = this.orderRepo.findOrderById(ledger, orderId);
      if (!order) {
        throw new OrderNotFoundError(orderId);
      }
      return this.mapToOrderResponse(order);
    });
  }

  /**
   * @throws {StrategyNotFoundError} If the strategy does not exist
   */
  async getStrategy(ledgerOwner: string, strategyId: number): Promise<GridStrategyResponse> {
    return this.query(ledgerOwner, (ledger) => {
      const strategy = this.orderRepo.findStrategyById(ledger, strategyId);
      if (!strategy) {
        throw new StrategyNotFoundError(strategyId);
      }
      return { ...strategy };
    });
  }

  async getUserStrategies(ledgerOwner: string, user: string): Promise<number[]> {
    return this.query(ledgerOwner, (ledger) => this.orderRepo.findStrategyIdsByUser(ledger, user));
  }

  /**
   * Orders generated by a strategy, ascending id
   *
   * @throws {StrategyNotFoundError} If the strategy does not exist
   */
  async getStrategyOrders(ledgerOwner: string, strategyId: number): Promise<OrderResponse[]> {
    return this.query(ledgerOwner, (ledger) => {
      if (!this.orderRepo.findStrategyById(ledger, strategyId)) {
        throw new StrategyNotFoundError(strategyId);
      }
      return this.orderRepo
        .findOrdersByStrategy(ledger, strategyId)
        .map((order) => this.mapToOrderResponse(order));
    });
  }

  /**
   * Committed events with a sequence greater than `afterSequence`
   */
  async getEvents(ledgerOwner: string, afterSequence = 0): Promise<OrderLedgerEvent[]> {
    return this.query(ledgerOwner, (ledger) => structuredClone(this.orderRepo.findEvents(ledger, afterSequence)));
  }

  /**
   * Fill an order if the market price crosses its limit
   *
   * @returns Whether the order filled
   */
  private tryFill(
    ledger: OrderLedgerRecord,
    order: Order,
    now: number,
    emit: OperationContext['emit']
  ): boolean {
    const marketPrice = this.orderRepo.findMarketPrice(ledger, order.symbol);
    if (marketPrice === null || !crossesMarket(order.side, order.limitPrice, marketPrice)) {
      return false;
    }

    this.orderRepo.markFilled(order, now);
    emit(ledger, {
      type: 'order.filled',
      payload: {
        orderId: order.id,
        owner: order.owner,
        symbol: order.symbol,
        side: order.side,
        amount: order.amount,
        limitPrice: order.limitPrice,
        marketPrice,
      },
    });
    return true;
  }

  private requireLedger(state: OrderLedgerView, owner: string): OrderLedgerRecord {
    const ledger = this.orderRepo.findLedger(state, owner);
    if (!ledger) {
      throw new OrderLedgerNotFoundError(owner);
    }
    return ledger;
  }

  private async query<T>(ledgerOwner: string, fn: (ledger: OrderLedgerRecord) => T): Promise<T> {
    return this.orderRepo.read((state) => fn(this.requireLedger(state, ledgerOwner)));
  }

  /**
   * Run one operation as a transaction, then publish its events
   *
   * Rejections are logged with their ledger error code and rethrown unchanged.
   */
  private async execute<T>(
    operation: string,
    context: Record<string, unknown>,
    work: (ctx: OperationContext) => T
  ): Promise<T> {
    const emitted: OrderLedgerEvent[] = [];

    let result: T;
    try {
      result = await this.orderRepo.transaction((tx) => {
        const now = this.clock.now();
        return work({
          tx,
          now,
          emit: (ledger, data) => {
            emitted.push(this.orderRepo.appendEvent(ledger, now, data));
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

  private placedPayload(order: Order): Extract<OrderLedgerEventData, { type: 'order.placed' }>['payload'] {
    return {
      orderId: order.id,
      owner: order.owner,
      symbol: order.symbol,
      side: order.side,
      amount: order.amount,
      limitPrice: order.limitPrice,
      strategyId: order.strategyId,
    };
  }

  /**
   * Copy an order out of committed state
   */
  private mapToOrderResponse(order: Order): OrderResponse {
    return { ...order };
  }
}
