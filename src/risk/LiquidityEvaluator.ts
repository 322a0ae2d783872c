// risk/LiquidityEvaluator.ts: Weighted collateral vs. debt across every entered market

import type { MarketLedger, PriceGateway } from '../collaborators/types.js';
import { CollaboratorError } from '../core/errors.js';
import { mulExp, mulScalarTruncateAdd, saturatingSub } from '../core/fixedPoint.js';
import type { EngineMetrics } from '../metrics/EngineMetrics.js';
import type { AccountMemberships } from '../registry/AccountMemberships.js';
import type { MarketConfig, MarketRegistry } from '../registry/MarketRegistry.js';

/**
 * Per-market weight applied to collateral value (1e18 mantissa)
 */
export type WeightPolicy = (market: Readonly<MarketConfig>) => bigint;

/** Borrow and redeem admission, borrowing power */
export const collateralFactorWeight: WeightPolicy = (market) => market.collateralFactor;

/** Liquidation eligibility */
export const liquidationThresholdWeight: WeightPolicy = (market) => market.liquidationThreshold;

export interface HypotheticalChange {
  market: string;
  redeemTokens: bigint;
  borrowAmount: bigint;
}

export interface AccountLiquiditySnapshot {
  weightedCollateral: bigint;
  totalCollateral: bigint;
  borrows: bigint;
  effects: bigint;
  liquidity: bigint;
  shortfall: bigint;
}

export interface AccountPosition {
  tokenBalance: bigint;
  debtBalance: bigint;
  exchangeRate: bigint;
}

/**
 * Ledger snapshot or throw; a failed snapshot aborts the whole operation
 */
export function safeAccountSnapshot(ledger: MarketLedger, account: string): AccountPosition {
  const result = ledger.accountSnapshot(account);
  if (!result.ok) {
    throw new CollaboratorError(
      'SnapshotError',
      `Ledger ${ledger.address} failed to snapshot ${account} (code ${result.code})`,
      { market: ledger.address, account, code: String(result.code) }
    );
  }
  return {
    tokenBalance: result.tokenBalance,
    debtBalance: result.debtBalance,
    exchangeRate: result.exchangeRate,
  };
}

/**
 * Oracle price or throw; zero means unavailable
 */
export function safeUnderlyingPrice(oracle: PriceGateway, market: string): bigint {
  const price = oracle.getUnderlyingPrice(market);
  if (price <= 0n) {
    throw new CollaboratorError('PriceError', `Price of ${market} is unavailable`, { market });
  }
  return price;
}

export interface LiquidityEvaluatorDeps {
  registry: MarketRegistry;
  memberships: AccountMemberships;
  oracle: () => PriceGateway;
  metrics: EngineMetrics;
}

/**
 * LiquidityEvaluator: one evaluation routine shared by every weight policy
 */
export class LiquidityEvaluator {
  constructor(private readonly deps: LiquidityEvaluatorDeps) {}

  /**
   * Evaluate the account as if `change` (redeem and/or borrow on one market) had happened.
   * All products truncate toward zero.
   */
  evaluate(account: string, weight: WeightPolicy, change?: HypotheticalChange): AccountLiquiditySnapshot {
    const startedAt = performance.now();
    const oracle = this.deps.oracle();
    const modifiedMarket = change?.market.toLowerCase();

    let weightedCollateral = 0n;
    let totalCollateral = 0n;
    let borrows = 0n;
    let effects = 0n;

    for (const market of this.deps.memberships.assetsOf(account)) {
      const position = safeAccountSnapshot(this.deps.registry.getLedger(market), account);
      const price = safeUnderlyingPrice(oracle, market);

      // Conversion factors from market tokens to USD
      const assetValue = mulExp(position.exchangeRate, price);
      const weightedAssetValue = mulExp(weight(this.deps.registry.requireListed(market)), assetValue);

      weightedCollateral = mulScalarTruncateAdd(weightedAssetValue, position.tokenBalance, weightedCollateral);
      totalCollateral = mulScalarTruncateAdd(assetValue, position.tokenBalance, totalCollateral);
      borrows = mulScalarTruncateAdd(price, position.debtBalance, borrows);

      if (change && market === modifiedMarket) {
        effects = mulScalarTruncateAdd(weightedAssetValue, change.redeemTokens, effects);
        effects = mulScalarTruncateAdd(price, change.borrowAmount, effects);
      }
    }

    const borrowsPlusEffects = borrows + effects;
    this.deps.metrics.recordEvaluation(performance.now() - startedAt);

    return {
      weightedCollateral,
      totalCollateral,
      borrows,
      effects,
      liquidity: saturatingSub(weightedCollateral, borrowsPlusEffects),
      shortfall: saturatingSub(borrowsPlusEffects, weightedCollateral),
    };
  }

  current(account: string, weight: WeightPolicy): AccountLiquiditySnapshot {
    return this.evaluate(account, weight);
  }

  /**
   * Refresh the oracle price of every market the account has entered
   */
  refreshPrices(account: string): void {
    const oracle = this.deps.oracle();
    for (const market of this.deps.memberships.assetsOf(account)) {
      oracle.updatePrice(market);
    }
  }
}
