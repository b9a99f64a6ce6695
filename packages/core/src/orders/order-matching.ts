import type { OrderSide } from '../shared/trade-side.js';

/**
 * Price-crossing rule for a single order
 *
 * A BUY fills when the market is at or below its limit; a SELL fills when
 * the market is at or above it.
 */
export function crossesMarket(side: OrderSide, limitPrice: bigint, marketPrice: bigint): boolean {
  return side === 'BUY' ? marketPrice <= limitPrice : marketPrice >= limitPrice;
}
