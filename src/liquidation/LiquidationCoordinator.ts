// liquidation/LiquidationCoordinator.ts: Liquidation and seizure admission, heal and full-account liquidation

import { formatUnits } from 'ethers';
import type { PriceGateway } from '../collaborators/types.js';
import { sameAddress } from '../core/address.js';
import { CollaboratorError, InvariantViolation, PolicyError } from '../core/errors.js';
import type { EngineEvents } from '../core/events.js';
import { MANTISSA_ONE, divExp, mulExp, mulScalarTruncate } from '../core/fixedPoint.js';
import type { AccountMemberships } from '../registry/AccountMemberships.js';
import type { MarketRegistry } from '../registry/MarketRegistry.js';
import type { Flywheel } from '../rewards/flywheel.js';
import {
  type LiquidityEvaluator,
  liquidationThresholdWeight,
  safeAccountSnapshot,
  safeUnderlyingPrice,
} from '../risk/LiquidityEvaluator.js';

export interface LiquidationOrder {
  debtMarket: string;
  collateralMarket: string;
  repayAmount: bigint;
}

export interface HealOutcome {
  /** Share of each debt actually repaid (1e18 mantissa, at most 1.0) */
  percentage: bigint;
  seized: Array<{ market: string; tokens: bigint }>;
  repaid: Array<{ market: string; repayAmount: bigint; writtenOff: bigint }>;
}

export interface LiquidationCoordinatorDeps {
  poolAddress: string;
  registry: MarketRegistry;
  memberships: AccountMemberships;
  evaluator: LiquidityEvaluator;
  oracle: () => PriceGateway;
  flywheel: Flywheel;
  events: EngineEvents;
}

/**
 * LiquidationCoordinator: every path that takes collateral away from a borrower.
 *
 * Single-position liquidations are checked here and executed by the ledgers;
 * the two batch paths (heal, full-account liquidation) are driven from here and
 * have mutually exclusive eligibility on `liquidationIncentive × borrows` vs. collateral.
 */
export class LiquidationCoordinator {
  constructor(private readonly deps: LiquidationCoordinatorDeps) {}

  preLiquidate(
    debtMarket: string,
    collateralMarket: string,
    borrower: string,
    repayAmount: bigint,
    skipLiquidityCheck: boolean
  ): void {
    const { registry, evaluator } = this.deps;

    registry.checkActionPauseState(debtMarket, 'Liquidate');
    const debtConfig = registry.requireListed(debtMarket);
    registry.requireListed(collateralMarket);

    evaluator.refreshPrices(borrower);

    const { debtBalance } = safeAccountSnapshot(registry.getLedger(debtMarket), borrower);

    // Forced liquidation bypasses the shortfall and close factor checks
    if (skipLiquidityCheck || debtConfig.forcedLiquidationEnabled) {
      if (repayAmount > debtBalance) {
        throw tooMuchRepay(repayAmount, debtBalance);
      }
      return;
    }

    const snapshot = evaluator.current(borrower, liquidationThresholdWeight);
    if (snapshot.totalCollateral <= registry.minLiquidatableCollateral) {
      throw new PolicyError(
        'MinimalCollateralViolated',
        'Collateral is at or below the minimum for single-position liquidation; use a batch path',
        {
          minLiquidatableCollateral: registry.minLiquidatableCollateral.toString(),
          totalCollateral: snapshot.totalCollateral.toString(),
        }
      );
    }
    if (snapshot.shortfall === 0n) {
      throw insufficientShortfall(borrower);
    }

    const maxClose = mulScalarTruncate(registry.closeFactor, debtBalance);
    if (repayAmount > maxClose) {
      throw tooMuchRepay(repayAmount, maxClose);
    }
  }

  /**
   * @param seizer the pool itself (batch paths) or the debt market of a liquidation
   */
  preSeize(collateralMarket: string, seizer: string, liquidator: string, borrower: string): void {
    const { registry, memberships, poolAddress } = this.deps;

    registry.checkActionPauseState(collateralMarket, 'Seize');
    const collateral = registry.requireListed(collateralMarket);
    const collateralRegistry = registry.getLedger(collateral.address).registry();

    if (sameAddress(seizer, poolAddress)) {
      if (!sameAddress(collateralRegistry, poolAddress)) {
        throw comptrollerMismatch(collateral.address, seizer);
      }
    } else {
      registry.requireListed(seizer);
      if (!sameAddress(collateralRegistry, registry.getLedger(seizer).registry())) {
        throw comptrollerMismatch(collateral.address, seizer);
      }
    }

    if (!memberships.isMember(borrower, collateral.address)) {
      throw new PolicyError('MarketNotCollateral', `Market ${collateral.address} is not collateral of ${borrower}`, {
        market: collateral.address,
        borrower,
      });
    }

    this.deps.flywheel.supply(collateral.address, [borrower, liquidator]);
  }

  /**
   * Seize everything and repay the share of each debt the collateral covers;
   * the rest becomes bad debt. Only for accounts too small for regular liquidation
   * whose collateral cannot cover `borrows × liquidationIncentive`.
   */
  healAccount(liquidator: string, user: string): HealOutcome {
    const { registry, memberships, evaluator } = this.deps;
    const oracle = this.deps.oracle();
    const assets = memberships.assetsOf(user);

    // Every market must be fresh for the snapshot to be meaningful
    for (const market of assets) {
      registry.getLedger(market).accrueInterest();
      oracle.updatePrice(market);
    }

    const snapshot = evaluator.current(user, liquidationThresholdWeight);
    if (snapshot.totalCollateral > registry.minLiquidatableCollateral) {
      throw collateralExceedsThreshold(registry.minLiquidatableCollateral, snapshot.totalCollateral);
    }
    if (snapshot.shortfall === 0n) {
      throw insufficientShortfall(user);
    }

    // percentage = collateral / (borrows × liquidation incentive)
    const scaledBorrows = mulExp(snapshot.borrows, registry.liquidationIncentive);
    const percentage = divExp(snapshot.totalCollateral, scaledBorrows);
    if (percentage > MANTISSA_ONE) {
      throw collateralExceedsThreshold(scaledBorrows, snapshot.totalCollateral);
    }

    const outcome: HealOutcome = { percentage, seized: [], repaid: [] };

    for (const market of assets) {
      const ledger = registry.getLedger(market);
      const { tokenBalance, debtBalance } = safeAccountSnapshot(ledger, user);
      const repayAmount = mulScalarTruncate(percentage, debtBalance);

      if (tokenBalance !== 0n) {
        ledger.seize(liquidator, user, tokenBalance);
        outcome.seized.push({ market, tokens: tokenBalance });
      }
      if (debtBalance !== 0n) {
        ledger.forceRepayAndWriteOff(liquidator, user, repayAmount);
        outcome.repaid.push({ market, repayAmount, writtenOff: debtBalance - repayAmount });
      }
    }

    console.log(
      `[liquidation] Healed ${user}: percentage=${formatUnits(percentage, 18)} ` +
      `collateral=${formatUnits(snapshot.totalCollateral, 18)} borrows=${formatUnits(snapshot.borrows, 18)}`
    );
    this.deps.events.emit('AccountHealed', { account: user, liquidator, percentage });
    return outcome;
  }

  /**
   * Liquidate every position of a small account in one call. The orders must
   * clear all of the borrower's debt; any residual aborts the whole call.
   */
  liquidateAccount(liquidator: string, borrower: string, orders: LiquidationOrder[]): void {
    const { registry, memberships, evaluator } = this.deps;

    const snapshot = evaluator.current(borrower, liquidationThresholdWeight);
    if (snapshot.totalCollateral > registry.minLiquidatableCollateral) {
      throw collateralExceedsThreshold(registry.minLiquidatableCollateral, snapshot.totalCollateral);
    }

    const collateralToSeize = mulScalarTruncate(registry.liquidationIncentive, snapshot.borrows);
    if (collateralToSeize >= snapshot.totalCollateral) {
      throw new PolicyError('InsufficientCollateral', 'Collateral cannot cover the full liquidation; heal the account', {
        collateralToSeize: collateralToSeize.toString(),
        totalCollateral: snapshot.totalCollateral.toString(),
      });
    }
    if (snapshot.shortfall === 0n) {
      throw insufficientShortfall(borrower);
    }

    registry.ensureMaxLoops(orders.length);

    for (const order of orders) {
      registry.requireListed(order.debtMarket);
      const collateral = registry.requireListed(order.collateralMarket);
      registry
        .getLedger(order.debtMarket)
        .forceLiquidate(liquidator, borrower, order.repayAmount, collateral.address, true);
    }

    for (const market of memberships.assetsOf(borrower)) {
      const { debtBalance } = safeAccountSnapshot(registry.getLedger(market), borrower);
      if (debtBalance !== 0n) {
        throw new InvariantViolation(
          'NonzeroBorrowBalance',
          `Nonzero borrow balance after liquidation: ${borrower} still owes ${debtBalance} on ${market}`,
          { market, borrower, debtBalance: debtBalance.toString() }
        );
      }
    }

    console.log(`[liquidation] Liquidated account ${borrower} with ${orders.length} orders`);
    this.deps.events.emit('AccountLiquidated', { account: borrower, liquidator, orders: orders.length });
  }

  /**
   * Collateral tokens to seize for `repayAmount` of debt:
   * repay × incentive × priceBorrowed / (priceCollateral × exchangeRate)
   */
  liquidateCalculateSeizeTokens(debtMarket: string, collateralMarket: string, repayAmount: bigint): bigint {
    const { registry } = this.deps;
    const oracle = this.deps.oracle();

    const priceBorrowed = safeUnderlyingPrice(oracle, registry.requireListed(debtMarket).address);
    const collateral = registry.requireListed(collateralMarket);
    const priceCollateral = safeUnderlyingPrice(oracle, collateral.address);
    const exchangeRate = registry.getLedger(collateral.address).exchangeRate();
    if (exchangeRate <= 0n) {
      throw new CollaboratorError('ExchangeRateError', `Exchange rate of ${collateral.address} is zero`, {
        market: collateral.address,
      });
    }

    const numerator = mulExp(registry.liquidationIncentive, priceBorrowed);
    const denominator = mulExp(priceCollateral, exchangeRate);
    if (denominator === 0n) {
      return 0n;
    }
    const ratio = divExp(numerator, denominator);
    return mulScalarTruncate(ratio, repayAmount);
  }
}

function tooMuchRepay(repayAmount: bigint, limit: bigint): PolicyError {
  return new PolicyError('TooMuchRepay', `Repay amount ${repayAmount} exceeds ${limit}`, {
    repayAmount: repayAmount.toString(),
    limit: limit.toString(),
  });
}

function insufficientShortfall(account: string): PolicyError {
  return new PolicyError('InsufficientShortfall', `Account ${account} has no shortfall`, { account });
}

function collateralExceedsThreshold(threshold: bigint, collateral: bigint): PolicyError {
  return new PolicyError('CollateralExceedsThreshold', `Collateral ${collateral} exceeds ${threshold}`, {
    threshold: threshold.toString(),
    collateral: collateral.toString(),
  });
}

function comptrollerMismatch(collateralMarket: string, seizer: string): PolicyError {
  return new PolicyError('ComptrollerMismatch', `Seizer ${seizer} and ${collateralMarket} belong to different pools`, {
    market: collateralMarket,
    seizer,
  });
}
