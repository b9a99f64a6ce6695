/**
 * Grid Strategies
 *
 * Strategy records live in the order ledger; this module holds their
 * types, validation and the ladder generator.
 */

export { generateGridLevels } from './grid-generator.js';

export { GRID_LIMITS, CreateGridStrategySchema } from './strategy-types.js';
export type {
  GridStrategy,
  GridStrategyResponse,
  GridLevel,
  GridParameters,
  CreateGridStrategyParams,
  CreateStrategyData,
} from './strategy-types.js';

export { InvalidGridStrategyError, StrategyNotFoundError } from './strategy-errors.js';
