/**
 * Order Ledger Service Unit Tests
 *
 * Runs the service against an in-memory repository and a manual clock
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createLogger } from '@trading-ledger/observability';
import { ManualClock } from '../../shared/clock.js';
import { LedgerEventEmitter } from '../../shared/events.js';
import { U64_MAX } from '../../shared/fixed-point.js';
import { InvalidGridStrategyError, StrategyNotFoundError } from '../../strategies/strategy-errors.js';
import { OrderLedgerService } from '../order-service.js';
import { OrderRepository } from '../order-repository.js';
import {
  InvalidOrderError,
  OrderLedgerAlreadyExistsError,
  OrderLedgerNotFoundError,
  OrderNotFoundError,
  OrderNotPendingError,
  OrderOwnershipError,
} from '../order-errors.js';
import type { OrderLedgerEvent, PlaceOrderParams } from '../order-types.js';

const OWNER = '0xengine';
const ALICE = '0xalice';
const BOB = '0xbob';
const START = 1_700_000_000;

describe('OrderLedgerService', () => {
  let clock: ManualClock;
  let orderRepo: OrderRepository;
  let events: LedgerEventEmitter<OrderLedgerEvent>;
  let service: OrderLedgerService;

  const order = (overrides: Partial<PlaceOrderParams> = {}): PlaceOrderParams => ({
    caller: ALICE,
    ledgerOwner: OWNER,
    symbol: 'APT/USDC',
    side: 'BUY',
    amount: 100_000_000n,
    limitPrice: 900_000n,
    ...overrides,
  });

  beforeEach(async () => {
    clock = new ManualClock(START);
    orderRepo = new OrderRepository();
    events = new LedgerEventEmitter<OrderLedgerEvent>();
    service = new OrderLedgerService(orderRepo, events, clock);

    await service.initializeLedger(OWNER);
  });

  describe('initializeLedger', () => {
    it('should seed the demo market prices', async () => {
      expect(await service.getMarketPrice(OWNER, 'APT/USDC')).toBe(1_000_000n);
      expect(await service.getMarketPrice(OWNER, 'BTC/USDC')).toBe(6_500_000_000n);
      expect(await service.getMarketPrice(OWNER, 'ETH/USDC')).toBe(300_000_000n);
      expect(await service.getMarketPrice(OWNER, 'SOL/USDC')).toBe(0n);
    });

    it('should append a ledger.initialized event', async () => {
      expect(await service.getEvents(OWNER)).toEqual([
        {
          sequence: 1,
          ledger: OWNER,
          timestamp: START,
          type: 'ledger.initialized',
          payload: { seededSymbols: ['APT/USDC', 'BTC/USDC', 'ETH/USDC'] },
        },
      ]);
    });

    it('should reject a second ledger for the same owner', async () => {
      await expect(service.initializeLedger(OWNER)).rejects.toThrow(OrderLedgerAlreadyExistsError);
      await expect(service.initializeLedger(OWNER)).rejects.toThrow('Order ledger already exists for 0xengine');
    });

    it('should keep ledgers of different owners apart', async () => {
      await service.initializeLedger(BOB);
      await service.placeOrder(order({ ledgerOwner: BOB }));

      expect(await service.getUserOrders(BOB, ALICE)).toEqual([1]);
      expect(await service.getUserOrders(OWNER, ALICE)).toEqual([]);
    });
  });

  describe('placeOrder', () => {
    it('should assign strictly increasing ids shared with grid orders', async () => {
      const first = await service.placeOrder(order());
      await service.createGridStrategy({
        caller: ALICE,
        ledgerOwner: OWNER,
        symbol: 'APT/USDC',
        basePrice: 1_000_000n,
        gridSpacingBps: 100,
        numLevels: 4,
        amountPerLevel: 10n,
      });
      const last = await service.placeOrder(order());

      expect(first).toBe(1);
      expect(last).toBe(6);
      expect(await service.getUserOrders(OWNER, ALICE)).toEqual([1, 2, 3, 4, 5, 6]);
    });

    it('should fill a BUY at or above the market price', async () => {
      clock.advance(30);
      const orderId = await service.placeOrder(order({ limitPrice: 1_000_000n }));

      expect(await service.getOrder(OWNER, orderId)).toEqual({
        id: orderId,
        owner: ALICE,
        symbol: 'APT/USDC',
        side: 'BUY',
        amount: 100_000_000n,
        limitPrice: 1_000_000n,
        status: 'FILLED',
        createdAt: START + 30,
        filledAt: START + 30,
        strategyId: null,
      });
    });

    it('should leave a BUY below the market price pending', async () => {
      const orderId = await service.placeOrder(order({ limitPrice: 999_999n }));

      const placed = await service.getOrder(OWNER, orderId);
      expect(placed.status).toBe('PENDING');
      expect(placed.filledAt).toBeNull();
    });

    it('should fill a SELL at or below the market price', async () => {
      const filled = await service.placeOrder(order({ side: 'SELL', limitPrice: 1_000_000n }));
      const resting = await service.placeOrder(order({ side: 'SELL', limitPrice: 1_000_001n }));

      expect((await service.getOrder(OWNER, filled)).status).toBe('FILLED');
      expect((await service.getOrder(OWNER, resting)).status).toBe('PENDING');
    });

    it('should leave orders for an unpriced symbol pending', async () => {
      const orderId = await service.placeOrder(order({ symbol: 'SOL/USDC', limitPrice: U64_MAX }));

      expect((await service.getOrder(OWNER, orderId)).status).toBe('PENDING');
    });

    it('should accept wire side codes', async () => {
      const buy = await service.placeOrder(order({ side: 1 }));
      const sell = await service.placeOrder(order({ side: 2, limitPrice: 2_000_000n }));

      expect((await service.getOrder(OWNER, buy)).side).toBe('BUY');
      expect((await service.getOrder(OWNER, sell)).side).toBe('SELL');
    });

    it('should reject an unknown side code', async () => {
      await expect(service.placeOrder(order({ side: 3 }))).rejects.toThrow(InvalidOrderError);
      await expect(service.placeOrder(order({ side: 3 }))).rejects.toThrow(
        'side: Side must be BUY (1) or SELL (2)'
      );
    });

    it('should reject a zero amount or limit price', async () => {
      await expect(service.placeOrder(order({ amount: 0n }))).rejects.toThrow(
        'Validation failed: amount: Amount must be greater than zero'
      );
      await expect(service.placeOrder(order({ limitPrice: 0n }))).rejects.toThrow(
        'Validation failed: limitPrice: Limit price must be greater than zero'
      );
    });

    it('should reject an empty symbol', async () => {
      await expect(service.placeOrder(order({ symbol: '' }))).rejects.toThrow(
        'Validation failed: symbol: Symbol is required'
      );
    });

    it('should reject orders on a missing ledger', async () => {
      await expect(service.placeOrder(order({ ledgerOwner: BOB }))).rejects.toThrow(OrderLedgerNotFoundError);
    });

    it('should record placement and fill events with the matched price', async () => {
      await service.placeOrder(order({ limitPrice: 1_500_000n }));

      expect(await service.getEvents(OWNER, 1)).toEqual([
        {
          sequence: 2,
          ledger: OWNER,
          timestamp: START,
          type: 'order.placed',
          payload: {
            orderId: 1,
            owner: ALICE,
            symbol: 'APT/USDC',
            side: 'BUY',
            amount: 100_000_000n,
            limitPrice: 1_500_000n,
            strategyId: null,
          },
        },
        {
          sequence: 3,
          ledger: OWNER,
          timestamp: START,
          type: 'order.filled',
          payload: {
            orderId: 1,
            owner: ALICE,
            symbol: 'APT/USDC',
            side: 'BUY',
            amount: 100_000_000n,
            limitPrice: 1_500_000n,
            marketPrice: 1_000_000n,
          },
        },
      ]);
    });

    it('should leave the event log unchanged when rejected', async () => {
      await expect(service.placeOrder(order({ amount: 0n }))).rejects.toThrow(InvalidOrderError);

      expect(await service.getEvents(OWNER)).toHaveLength(1);
      expect(await service.getUserOrders(OWNER, ALICE)).toEqual([]);
    });
  });

  describe('cancelOrder', () => {
    it('should cancel a pending order for its owner', async () => {
      const orderId = await service.placeOrder(order());

      await service.cancelOrder({ caller: ALICE, ledgerOwner: OWNER, orderId });

      expect((await service.getOrder(OWNER, orderId)).status).toBe('CANCELLED');
      const [cancelled] = await service.getEvents(OWNER, 2);
      expect(cancelled).toMatchObject({
        sequence: 3,
        type: 'order.cancelled',
        payload: { orderId, owner: ALICE },
      });
    });

    it('should reject a second cancel as invalid state', async () => {
      const orderId = await service.placeOrder(order());
      await service.cancelOrder({ caller: ALICE, ledgerOwner: OWNER, orderId });

      await expect(service.cancelOrder({ caller: ALICE, ledgerOwner: OWNER, orderId })).rejects.toThrow(
        OrderNotPendingError
      );
    });

    it('should reject cancelling a filled order', async () => {
      const orderId = await service.placeOrder(order({ limitPrice: 1_000_000n }));

      await expect(service.cancelOrder({ caller: ALICE, ledgerOwner: OWNER, orderId })).rejects.toThrow(
        'Order 1 is FILLED, only PENDING orders can be cancelled'
      );
    });

    it('should reject a caller who does not own the order', async () => {
      const orderId = await service.placeOrder(order());

      await expect(service.cancelOrder({ caller: BOB, ledgerOwner: OWNER, orderId })).rejects.toThrow(
        OrderOwnershipError
      );
      expect((await service.getOrder(OWNER, orderId)).status).toBe('PENDING');
    });

    it('should reject an unknown order', async () => {
      await expect(service.cancelOrder({ caller: ALICE, ledgerOwner: OWNER, orderId: 99 })).rejects.toThrow(
        'Order not found: 99'
      );
    });

    it('should report order id 0 as not found', async () => {
      await expect(service.cancelOrder({ caller: ALICE, ledgerOwner: OWNER, orderId: 0 })).rejects.toThrow(
        OrderNotFoundError
      );
      await expect(service.cancelOrder({ caller: ALICE, ledgerOwner: OWNER, orderId: 0 })).rejects.toThrow(
        'Order not found: 0'
      );
    });

    it('should reject a negative order id', async () => {
      await expect(service.cancelOrder({ caller: ALICE, ledgerOwner: OWNER, orderId: -1 })).rejects.toThrow(
        'Validation failed: orderId: Order id must not be negative'
      );
    });
  });

  describe('createGridStrategy', () => {
    const grid = {
      caller: ALICE,
      ledgerOwner: OWNER,
      symbol: 'APT/USDC',
      basePrice: 1_000_000n,
      gridSpacingBps: 100,
      numLevels: 10,
      amountPerLevel: 5_000_000n,
    };

    it('should create five buy and five sell orders around the base price', async () => {
      const strategyId = await service.createGridStrategy(grid);

      const orders = await service.getStrategyOrders(OWNER, strategyId);
      expect(orders.map((o) => [o.id, o.side, o.limitPrice])).toEqual([
        [1, 'BUY', 990_000n],
        [2, 'SELL', 1_010_000n],
        [3, 'BUY', 980_000n],
        [4, 'SELL', 1_020_000n],
        [5, 'BUY', 970_000n],
        [6, 'SELL', 1_030_000n],
        [7, 'BUY', 960_000n],
        [8, 'SELL', 1_040_000n],
        [9, 'BUY', 950_000n],
        [10, 'SELL', 1_050_000n],
      ]);
      expect(orders.every((o) => o.status === 'PENDING' && o.strategyId === strategyId)).toBe(true);
      expect(orders.every((o) => o.amount === 5_000_000n && o.owner === ALICE)).toBe(true);
    });

    it('should store the strategy and index it under the caller', async () => {
      clock.advance(60);
      const strategyId = await service.createGridStrategy(grid);

      expect(strategyId).toBe(1);
      expect(await service.getUserStrategies(OWNER, ALICE)).toEqual([1]);
      expect(await service.getStrategy(OWNER, strategyId)).toEqual({
        id: 1,
        owner: ALICE,
        symbol: 'APT/USDC',
        basePrice: 1_000_000n,
        gridSpacingBps: 100,
        numLevels: 10,
        amountPerLevel: 5_000_000n,
        active: true,
        createdAt: START + 60,
      });
    });

    it('should not match grid orders on creation', async () => {
      await service.updateMarketPrice({ caller: OWNER, symbol: 'APT/USDC', price: 2_000_000n });

      const strategyId = await service.createGridStrategy(grid);

      const orders = await service.getStrategyOrders(OWNER, strategyId);
      expect(orders.filter((o) => o.status !== 'PENDING')).toEqual([]);
    });

    it('should append the strategy event before its order events', async () => {
      await service.createGridStrategy({ ...grid, numLevels: 2 });

      const types = (await service.getEvents(OWNER, 1)).map((e) => e.type);
      expect(types).toEqual(['strategy.created', 'order.placed', 'order.placed']);
    });

    it('should create no orders for a single level', async () => {
      const strategyId = await service.createGridStrategy({ ...grid, numLevels: 1 });

      expect(await service.getStrategyOrders(OWNER, strategyId)).toEqual([]);
    });

    it('should reject level counts and spacing outside the grid limits', async () => {
      await expect(service.createGridStrategy({ ...grid, numLevels: 21 })).rejects.toThrow(
        'numLevels: Number of levels cannot exceed 20'
      );
      await expect(service.createGridStrategy({ ...grid, numLevels: 0 })).rejects.toThrow(InvalidGridStrategyError);
      await expect(service.createGridStrategy({ ...grid, gridSpacingBps: 0 })).rejects.toThrow(
        'gridSpacingBps: Grid spacing must be at least 1 bps'
      );
      await expect(service.createGridStrategy({ ...grid, gridSpacingBps: 1001 })).rejects.toThrow(
        InvalidGridStrategyError
      );
    });

    it('should roll back the strategy when an order write fails', async () => {
      const createOrder = orderRepo.createOrder.bind(orderRepo);
      let calls = 0;
      const spy = vi.spyOn(orderRepo, 'createOrder').mockImplementation((ledger, data) => {
        calls += 1;
        if (calls === 3) {
          throw new Error('storage fault');
        }
        return createOrder(ledger, data);
      });

      await expect(service.createGridStrategy({ ...grid, numLevels: 4 })).rejects.toThrow('storage fault');
      spy.mockRestore();

      expect(await service.getUserStrategies(OWNER, ALICE)).toEqual([]);
      expect(await service.getUserOrders(OWNER, ALICE)).toEqual([]);
      expect(await service.getEvents(OWNER)).toHaveLength(1);
      expect(await service.placeOrder(order())).toBe(1);
    });

    it('should report unknown strategies', async () => {
      await expect(service.getStrategy(OWNER, 7)).rejects.toThrow(StrategyNotFoundError);
      await expect(service.getStrategyOrders(OWNER, 7)).rejects.toThrow('Strategy not found: 7');
    });
  });

  describe('updateMarketPrice', () => {
    it('should upsert the price on the caller ledger', async () => {
      await service.updateMarketPrice({ caller: OWNER, symbol: 'APT/USDC', price: 1_250_000n });
      await service.updateMarketPrice({ caller: OWNER, symbol: 'SOL/USDC', price: 0n });

      expect(await service.getMarketPrice(OWNER, 'APT/USDC')).toBe(1_250_000n);
      expect(await service.getMarketPrice(OWNER, 'SOL/USDC')).toBe(0n);
      expect((await service.getEvents(OWNER, 1)).map((e) => e.payload)).toEqual([
        { symbol: 'APT/USDC', price: 1_250_000n, previousPrice: 1_000_000n },
        { symbol: 'SOL/USDC', price: 0n, previousPrice: null },
      ]);
    });

    it('should reject a caller without a ledger', async () => {
      await expect(
        service.updateMarketPrice({ caller: BOB, symbol: 'APT/USDC', price: 1n })
      ).rejects.toThrow('Order ledger not found for 0xbob');
    });

    it('should not re-evaluate resting orders', async () => {
      const orderId = await service.placeOrder(order({ limitPrice: 900_000n }));

      await service.updateMarketPrice({ caller: OWNER, symbol: 'APT/USDC', price: 800_000n });

      expect((await service.getOrder(OWNER, orderId)).status).toBe('PENDING');
    });
  });

  describe('sweepRestingOrders', () => {
    it('should fill only resting orders that now cross', async () => {
      await service.placeOrder(order({ limitPrice: 900_000n }));
      await service.placeOrder(order({ side: 'SELL', limitPrice: 1_200_000n }));
      await service.placeOrder(order({ limitPrice: 850_000n }));
      await service.updateMarketPrice({ caller: OWNER, symbol: 'APT/USDC', price: 880_000n });
      clock.advance(5);

      const filled = await service.sweepRestingOrders({ caller: OWNER, symbol: 'APT/USDC' });

      expect(filled).toEqual([1]);
      expect(await service.getOrder(OWNER, 1)).toMatchObject({ status: 'FILLED', filledAt: START + 5 });
      expect((await service.getOrder(OWNER, 2)).status).toBe('PENDING');
      expect((await service.getOrder(OWNER, 3)).status).toBe('PENDING');
    });

    it('should do nothing for a symbol without a price', async () => {
      await service.placeOrder(order({ symbol: 'SOL/USDC' }));

      expect(await service.sweepRestingOrders({ caller: OWNER, symbol: 'SOL/USDC' })).toEqual([]);
      expect(await service.getEvents(OWNER)).toHaveLength(2);
    });

    it('should only run on the caller ledger', async () => {
      await expect(service.sweepRestingOrders({ caller: ALICE, symbol: 'APT/USDC' })).rejects.toThrow(
        OrderLedgerNotFoundError
      );
    });
  });

  describe('queries', () => {
    it('should return copies of committed orders', async () => {
      const orderId = await service.placeOrder(order());

      const copy = await service.getOrder(OWNER, orderId);
      copy.status = 'CANCELLED';

      expect((await service.getOrder(OWNER, orderId)).status).toBe('PENDING');
    });

    it('should return an empty list for unknown users', async () => {
      expect(await service.getUserOrders(OWNER, BOB)).toEqual([]);
      expect(await service.getUserStrategies(OWNER, BOB)).toEqual([]);
    });

    it('should reject queries on a missing ledger', async () => {
      await expect(service.getMarketPrice(BOB, 'APT/USDC')).rejects.toThrow(OrderLedgerNotFoundError);
      await expect(service.getUserOrders(BOB, ALICE)).rejects.toThrow(OrderLedgerNotFoundError);
      await expect(service.getOrder(OWNER, 3)).rejects.toThrow(OrderNotFoundError);
    });
  });

  describe('event publishing', () => {
    it('should publish committed events to subscribers in order', async () => {
      const received: string[] = [];
      events.on((event) => {
        received.push(`${event.sequence}:${event.type}`);
      });

      await service.placeOrder(order({ limitPrice: 1_000_000n }));

      expect(received).toEqual(['2:order.placed', '3:order.filled']);
    });

    it('should not publish events of a rejected operation', async () => {
      const handler = vi.fn();
      events.on(handler);

      await expect(service.cancelOrder({ caller: ALICE, ledgerOwner: OWNER, orderId: 1 })).rejects.toThrow(
        OrderNotFoundError
      );

      expect(handler).not.toHaveBeenCalled();
    });

    it('should complete the operation when a subscriber fails', async () => {
      events.on(() => {
        throw new Error('subscriber down');
      });

      await expect(service.placeOrder(order())).resolves.toBe(1);
    });
  });

  describe('logging', () => {
    let lines: Array<Record<string, unknown>>;

    beforeEach(() => {
      lines = [];
      const logger = createLogger(
        { level: 'info' },
        {
          write: (line: string) => {
            lines.push(JSON.parse(line));
          },
        }
      );
      service = new OrderLedgerService(orderRepo, events, clock, logger);
    });

    it('should log committed operations at info', async () => {
      await service.placeOrder(order());

      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: 30,
        msg: 'placeOrder committed',
        operation: 'placeOrder',
        caller: ALICE,
        events: ['order.placed'],
      });
    });

    it('should log rejections at warn with the error code', async () => {
      await expect(service.cancelOrder({ caller: ALICE, ledgerOwner: OWNER, orderId: 4 })).rejects.toThrow(
        OrderNotFoundError
      );

      expect(lines).toHaveLength(1);
      expect(lines[0]).toMatchObject({
        level: 40,
        msg: 'cancelOrder rejected',
        code: 'NOT_FOUND',
        orderId: 4,
        err: { type: 'OrderNotFoundError', message: 'Order not found: 4' },
      });
    });
  });
});
