import { z } from 'zod';

export const ORDER_SIDES = ['BUY', 'SELL'] as const;
export type OrderSide = (typeof ORDER_SIDES)[number];

/**
 * u8 side codes used on the wire
 */
export const ORDER_SIDE_CODES = { BUY: 1, SELL: 2 } as const;

/**
 * Side as accepted from callers: the label or its wire code
 */
export type OrderSideInput = OrderSide | number;

export const OrderSideSchema = z.union(
  [
    z.enum(ORDER_SIDES),
    z.literal(ORDER_SIDE_CODES.BUY).transform((): OrderSide => 'BUY'),
    z.literal(ORDER_SIDE_CODES.SELL).transform((): OrderSide => 'SELL'),
  ],
  { errorMap: () => ({ message: 'Side must be BUY (1) or SELL (2)' }) }
);
