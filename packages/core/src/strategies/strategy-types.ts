/**
 * Grid Strategy Types
 *
 * A grid strategy is a ladder of resting BUY orders below and SELL orders
 * above a base price, spaced in basis points.
 */

import { z } from 'zod';
import { U64_MAX } from '../shared/fixed-point.js';

export const GRID_LIMITS = {
  minLevels: 1,
  maxLevels: 20,
  minSpacingBps: 1,
  maxSpacingBps: 1000,
} as const;

export interface GridStrategy {
  id: number;
  owner: string;
  symbol: string;
  basePrice: bigint;
  gridSpacingBps: number;
  numLevels: number;
  amountPerLevel: bigint;
  // Write-once: no operation deactivates a strategy yet
  active: boolean;
  createdAt: number;
}

export type GridStrategyResponse = GridStrategy;

/**
 * One rung of the ladder; `level` runs from 1 outward
 */
export interface GridLevel {
  level: number;
  buyPrice: bigint;
  sellPrice: bigint;
}

export interface GridParameters {
  basePrice: bigint;
  gridSpacingBps: number;
  numLevels: number;
}

const u64 = z.bigint().nonnegative('Value must not be negative').lte(U64_MAX, 'Value exceeds u64 range');

export const CreateGridStrategySchema = z.object({
  caller: z.string().min(1, 'Caller identity is required'),
  ledgerOwner: z.string().min(1, 'Ledger owner is required'),
  symbol: z.string().min(1, 'Symbol is required'),
  basePrice: u64,
  gridSpacingBps: z
    .number()
    .int('Grid spacing must be a whole number of basis points')
    .min(GRID_LIMITS.minSpacingBps, 'Grid spacing must be at least 1 bps')
    .max(GRID_LIMITS.maxSpacingBps, 'Grid spacing cannot exceed 1000 bps'),
  numLevels: z
    .number()
    .int('Number of levels must be a whole number')
    .min(GRID_LIMITS.minLevels, 'Number of levels must be at least 1')
    .max(GRID_LIMITS.maxLevels, 'Number of levels cannot exceed 20'),
  amountPerLevel: u64,
});

export interface CreateGridStrategyParams {
  caller: string;
  ledgerOwner: string;
  symbol: string;
  basePrice: bigint;
  gridSpacingBps: number;
  numLevels: number;
  amountPerLevel: bigint;
}

export interface CreateStrategyData {
  owner: string;
  symbol: string;
  basePrice: bigint;
  gridSpacingBps: number;
  numLevels: number;
  amountPerLevel: bigint;
  createdAt: number;
}
