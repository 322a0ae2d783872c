// config/env.ts: Strict environment variable validation using zod
// Every key has a default so the engine boots without a .env file

import { z } from 'zod';

// Helper for unsigned integer mantissas given as decimal strings
const mantissa = z
  .string()
  .regex(/^\d+$/, 'expected an unsigned integer string')
  .transform((val) => BigInt(val));

// Helper for boolean flags ('true' enables, anything else disables)
const flag = z.string().transform((val) => val === 'true');

const envSchema = z.object({
  // Pool-wide risk parameters (1e18 mantissas)
  CLOSE_FACTOR_MANTISSA: mantissa.default('500000000000000000'),
  LIQUIDATION_INCENTIVE_MANTISSA: mantissa.default('1100000000000000000'),
  MIN_LIQUIDATABLE_COLLATERAL: mantissa.default('100000000000000000000'),

  // Upper bound on iterations over admin- or caller-supplied collections
  MAX_LOOPS_LIMIT: z.coerce.number().int().min(1).default(16),

  // Reward accrual clock: unix seconds when true, block numbers otherwise
  REWARD_TIME_BASED: flag.default('false'),

  // Price cache configuration
  PRICE_CACHE_TTL_MS: z.coerce.number().min(1000).max(3_600_000).default(8000),

  // Logging
  LOG_ENGINE_EVENTS: flag.default('false'),
  LOG_FLYWHEEL: flag.default('false'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse and validate environment variables.
 * Throws on validation failure after printing the zod error tree.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('[config] Environment validation failed:');
    console.error(JSON.stringify(result.error.format(), null, 2));
    throw new Error('Invalid environment configuration');
  }

  return result.data;
}
