/**
 * Order Ledger Errors
 *
 * Thrown by OrderLedgerService; each extends one of the shared ledger
 * error classes so callers can branch on `code`.
 */

import {
  AlreadyExistsError,
  InvalidArgumentError,
  InvalidStateError,
  NotFoundError,
  UnauthorizedError,
} from '../shared/ledger-errors.js';
import type { OrderStatus } from './order-types.js';

export class OrderLedgerNotFoundError extends NotFoundError {
  constructor(owner: string) {
    super(`Order ledger not found for ${owner}`);
  }
}

export class OrderLedgerAlreadyExistsError extends AlreadyExistsError {
  constructor(owner: string) {
    super(`Order ledger already exists for ${owner}`);
  }
}

export class OrderNotFoundError extends NotFoundError {
  constructor(orderId: number) {
    super(`Order not found: ${orderId}`);
  }
}

export class OrderOwnershipError extends UnauthorizedError {
  constructor(orderId: number) {
    super(`Caller does not own order ${orderId}`);
  }
}

export class OrderNotPendingError extends InvalidStateError {
  constructor(orderId: number, status: OrderStatus) {
    super(`Order ${orderId} is ${status}, only PENDING orders can be cancelled`);
  }
}

export class InvalidOrderError extends InvalidArgumentError {
  constructor(message: string) {
    super(message);
  }
}
