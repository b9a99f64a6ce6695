/**
 * Ledger Errors
 *
 * Every rejection raised by the order and vault ledgers extends LedgerError
 * and carries one of five codes. Domain modules subclass these to name the
 * specific rule that was violated.
 */

export type LedgerErrorCode =
  | 'NOT_FOUND'
  | 'UNAUTHORIZED'
  | 'INVALID_ARGUMENT'
  | 'INVALID_STATE'
  | 'ALREADY_EXISTS';

export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends LedgerError {
  readonly code = 'NOT_FOUND';
}

export class UnauthorizedError extends LedgerError {
  readonly code = 'UNAUTHORIZED';
}

export class InvalidArgumentError extends LedgerError {
  readonly code = 'INVALID_ARGUMENT';
}

export class InvalidStateError extends LedgerError {
  readonly code = 'INVALID_STATE';
}

export class AlreadyExistsError extends LedgerError {
  readonly code = 'ALREADY_EXISTS';
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
