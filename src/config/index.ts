// config/index.ts: Export validated config

import dotenv from 'dotenv';
import { formatUnits } from 'ethers';
import { MAX_CLOSE_FACTOR_MANTISSA, MIN_CLOSE_FACTOR_MANTISSA } from '../registry/MarketRegistry.js';
import { parseEnv, type Env } from './env.js';

dotenv.config();

/**
 * Cross-field checks that the schema cannot express
 * Applies the bounds the pool setters enforce so a bad .env fails at startup
 */
export function validateRiskParameters(env: Env): void {
  if (
    env.CLOSE_FACTOR_MANTISSA < MIN_CLOSE_FACTOR_MANTISSA ||
    env.CLOSE_FACTOR_MANTISSA > MAX_CLOSE_FACTOR_MANTISSA
  ) {
    throw new Error(
      `Invalid CLOSE_FACTOR_MANTISSA: ${env.CLOSE_FACTOR_MANTISSA}. ` +
      `Expected a value between ${MIN_CLOSE_FACTOR_MANTISSA} and ${MAX_CLOSE_FACTOR_MANTISSA}.`
    );
  }

  if (env.LIQUIDATION_INCENTIVE_MANTISSA < 10n ** 18n) {
    throw new Error(
      `Invalid LIQUIDATION_INCENTIVE_MANTISSA: ${env.LIQUIDATION_INCENTIVE_MANTISSA}. ` +
      `Liquidation incentive must be at least 1e18.`
    );
  }
}

// Parse env once on module load
export const config: Env = parseEnv();

validateRiskParameters(config);

console.log('[config] Loaded configuration:', {
  closeFactor: formatUnits(config.CLOSE_FACTOR_MANTISSA, 18),
  liquidationIncentive: formatUnits(config.LIQUIDATION_INCENTIVE_MANTISSA, 18),
  minLiquidatableCollateral: formatUnits(config.MIN_LIQUIDATABLE_COLLATERAL, 18),
  maxLoopsLimit: config.MAX_LOOPS_LIMIT,
  rewardTimeBased: config.REWARD_TIME_BASED,
  logEngineEvents: config.LOG_ENGINE_EVENTS,
});

export type { Env };
