/**
 * Grid Strategy Errors
 */

import { InvalidArgumentError, NotFoundError } from '../shared/ledger-errors.js';

export class InvalidGridStrategyError extends InvalidArgumentError {
  constructor(message: string) {
    super(message);
  }
}

export class StrategyNotFoundError extends NotFoundError {
  constructor(strategyId: number) {
    super(`Strategy not found: ${strategyId}`);
  }
}
