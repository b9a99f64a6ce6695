import { BPS_DENOMINATOR, checkedAdd, checkedMul, checkedSub } from '../shared/fixed-point.js';
import type { GridLevel, GridParameters } from './strategy-types.js';

/**
 * Compute the price ladder for a grid strategy
 *
 * Each side gets `floor(numLevels / 2)` levels, so an odd level count
 * produces one level fewer than its value suggests. For level `i` the
 * offset is `basePrice × gridSpacingBps × i / 10000`, floored; buys sit
 * that far below the base and sells that far above.
 *
 * @throws {ArithmeticOverflowError} If a sell price leaves the u64 range
 */
export function generateGridLevels(params: GridParameters): GridLevel[] {
  const levelsPerSide = Math.floor(params.numLevels / 2);
  const spacing = BigInt(params.gridSpacingBps);
  const levels: GridLevel[] = [];

  for (let level = 1; level <= levelsPerSide; level++) {
    const offset = checkedMul(checkedMul(params.basePrice, spacing), BigInt(level)) / BPS_DENOMINATOR;
    levels.push({
      level,
      buyPrice: checkedSub(params.basePrice, offset),
      sellPrice: checkedAdd(params.basePrice, offset),
    });
  }

  return levels;
}
