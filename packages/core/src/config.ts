import { z, type ZodType, type ZodTypeDef } from 'zod';
import { BPS_DENOMINATOR, U64_MAX } from './shared/fixed-point.js';
import { DEFAULT_VAULT_CONFIG, type VaultConfig } from './vault/vault-types.js';

export type LedgerConfig = {
  vault: VaultConfig;
};

const wholeNumber = z.string().regex(/^\d+$/, 'Must be a non-negative integer');

const minimumDepositSchema = wholeNumber
  .transform((value) => BigInt(value))
  .pipe(z.bigint().lte(U64_MAX, 'Minimum deposit exceeds u64 range'));

const performanceFeeSchema = wholeNumber
  .transform(Number)
  .pipe(z.number().max(Number(BPS_DENOMINATOR), 'Performance fee cannot exceed 10000 bps'));

const lockupPeriodSchema = wholeNumber
  .transform(Number)
  .pipe(z.number().max(Number.MAX_SAFE_INTEGER, 'Lockup period is too large'));

function readVariable<T>(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: ZodType<T, ZodTypeDef, string>,
  fallback: T
): T {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid ${name} value "${raw}": ${result.error.errors.map((e) => e.message).join(', ')}`);
  }
  return result.data;
}

/**
 * Read ledger settings from the environment, falling back to the vault defaults
 */
export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  return {
    vault: {
      minimumDeposit: readVariable(
        env,
        'VAULT_MINIMUM_DEPOSIT',
        minimumDepositSchema,
        DEFAULT_VAULT_CONFIG.minimumDeposit
      ),
      performanceFeeBps: readVariable(
        env,
        'VAULT_PERFORMANCE_FEE_BPS',
        performanceFeeSchema,
        DEFAULT_VAULT_CONFIG.performanceFeeBps
      ),
      lockupPeriodSeconds: readVariable(
        env,
        'VAULT_LOCKUP_PERIOD_SECONDS',
        lockupPeriodSchema,
        DEFAULT_VAULT_CONFIG.lockupPeriodSeconds
      ),
    },
  };
}
