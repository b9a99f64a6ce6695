export {
  LedgerError,
  NotFoundError,
  UnauthorizedError,
  InvalidArgumentError,
  InvalidStateError,
  AlreadyExistsError,
  isLedgerError,
} from './ledger-errors.js';
export type { LedgerErrorCode } from './ledger-errors.js';

export {
  U64_MAX,
  BPS_DENOMINATOR,
  PRICE_DECIMALS,
  AMOUNT_DECIMALS,
  ArithmeticOverflowError,
  checkedAdd,
  checkedSub,
  checkedMul,
  applyBps,
  formatFixedPoint,
  parseFixedPoint,
  formatPrice,
  formatAmount,
} from './fixed-point.js';

export { systemClock, ManualClock } from './clock.js';
export type { Clock } from './clock.js';

export { LedgerEventEmitter, appendLedgerEvent, eventsAfter } from './events.js';
export type { LedgerEvent, LedgerEventEnvelope, LedgerEventHandler } from './events.js';

export { formatZodIssues, parseInput } from './validation.js';

export { ORDER_SIDES, ORDER_SIDE_CODES, OrderSideSchema } from './trade-side.js';
export type { OrderSide, OrderSideInput } from './trade-side.js';
