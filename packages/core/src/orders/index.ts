/**
 * Order Ledger
 *
 * Orders, the market price table and the price-crossing matcher.
 */

export { OrderLedgerService } from './order-service.js';
export { OrderRepository, createOrderLedgerStore } from './order-repository.js';
export { crossesMarket } from './order-matching.js';

export {
  DEFAULT_MARKET_PRICES,
  PlaceOrderSchema,
  CancelOrderSchema,
  UpdateMarketPriceSchema,
  SweepRestingOrdersSchema,
} from './order-types.js';
export type {
  OrderStatus,
  Order,
  OrderResponse,
  OrderLedgerEventData,
  OrderLedgerEvent,
  OrderLedgerEventType,
  OrderLedgerRecord,
  OrderLedgerState,
  OrderLedgerView,
  PlaceOrderParams,
  CancelOrderParams,
  UpdateMarketPriceParams,
  SweepRestingOrdersParams,
  CreateOrderData,
} from './order-types.js';

export {
  OrderLedgerNotFoundError,
  OrderLedgerAlreadyExistsError,
  OrderNotFoundError,
  OrderOwnershipError,
  OrderNotPendingError,
  InvalidOrderError,
} from './order-errors.js';
