/**
 * Fixed-point arithmetic over u64 ledger quantities.
 *
 * Prices are quoted ×10^6 and asset amounts ×10^8. Nothing in the ledgers
 * converts between scales; these helpers only enforce the u64 range and
 * format values for display.
 */

import { InvalidArgumentError } from './ledger-errors.js';

export const U64_MAX = (1n << 64n) - 1n;
export const BPS_DENOMINATOR = 10_000n;
export const PRICE_DECIMALS = 6;
export const AMOUNT_DECIMALS = 8;

export class ArithmeticOverflowError extends InvalidArgumentError {
  constructor(operation: string) {
    super(`Arithmetic ${operation} leaves the u64 range`);
  }
}

function assertU64(value: bigint, operation: string): bigint {
  if (value < 0n || value > U64_MAX) {
    throw new ArithmeticOverflowError(operation);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return assertU64(a + b, 'addition');
}

export function checkedSub(a: bigint, b: bigint): bigint {
  return assertU64(a - b, 'subtraction');
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return assertU64(a * b, 'multiplication');
}

/**
 * Floor of `value × bps / 10000`. Only the result must fit in u64; the
 * intermediate product may exceed it.
 */
export function applyBps(value: bigint, bps: number | bigint): bigint {
  return assertU64((value * BigInt(bps)) / BPS_DENOMINATOR, 'basis-point scaling');
}

/**
 * Render a fixed-point integer with a decimal point, e.g. 1000000 at 6 → "1.000000"
 */
export function formatFixedPoint(value: bigint, decimals: number): string {
  const sign = value < 0n ? '-' : '';
  const magnitude = value < 0n ? -value : value;
  if (decimals === 0) {
    return `${sign}${magnitude}`;
  }
  const scale = 10n ** BigInt(decimals);
  const whole = magnitude / scale;
  const fraction = (magnitude % scale).toString().padStart(decimals, '0');
  return `${sign}${whole}.${fraction}`;
}

/**
 * Parse a decimal string into a fixed-point integer.
 *
 * Accepts a leading `$` and `,` group separators. Digits beyond `decimals`
 * are truncated.
 */
export function parseFixedPoint(text: string, decimals: number): bigint {
  const cleaned = text.trim().replace(/^\$/, '').replace(/,/g, '');
  const match = /^(\d+)(?:\.(\d*))?$/.exec(cleaned);
  if (!match) {
    throw new InvalidArgumentError(`Invalid fixed-point value: "${text}"`);
  }
  const whole = match[1] ?? '0';
  const fraction = (match[2] ?? '').slice(0, decimals).padEnd(decimals, '0');
  return assertU64(BigInt(`${whole}${fraction}`), 'parse');
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

/**
 * Display a price quoted ×10^6, e.g. 6500000000 → "$6,500.000000"
 */
export function formatPrice(price: bigint, decimals: number = PRICE_DECIMALS): string {
  const [whole = '0', fraction] = formatFixedPoint(price, decimals).split('.');
  return fraction === undefined ? `$${groupThousands(whole)}` : `$${groupThousands(whole)}.${fraction}`;
}

/**
 * Display a native asset amount quoted ×10^8, e.g. 50000000 → "0.50000000 APT"
 */
export function formatAmount(amount: bigint): string {
  return `${formatFixedPoint(amount, AMOUNT_DECIMALS)} APT`;
}
