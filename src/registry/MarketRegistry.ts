// registry/MarketRegistry.ts: Listed markets, risk parameters, caps and pause flags

import { formatUnits } from 'ethers';
import type { MarketLedger, PriceGateway } from '../collaborators/types.js';
import { normalizeAddress } from '../core/address.js';
import {
  CollaboratorError,
  ConfigurationError,
  PolicyError,
  marketNotListed,
} from '../core/errors.js';
import type { EngineEvents } from '../core/events.js';
import { MANTISSA_ONE } from '../core/fixedPoint.js';
import { ensureMaxLoops, validateNewMaxLoopsLimit } from '../core/loops.js';
import { recordedSet, type UndoJournal } from '../core/transaction.js';
import type { Action } from './actions.js';

/**
 * Collateral factor ceiling (0.9)
 */
export const MAX_COLLATERAL_FACTOR_MANTISSA = 9n * 10n ** 17n;

/**
 * Close factor bounds (5% .. 90%)
 */
export const MIN_CLOSE_FACTOR_MANTISSA = 5n * 10n ** 16n;
export const MAX_CLOSE_FACTOR_MANTISSA = 9n * 10n ** 17n;

export interface MarketConfig {
  address: string;
  isListed: boolean;
  collateralFactor: bigint;
  liquidationThreshold: bigint;
  supplyCap: bigint;
  borrowCap: bigint;
  pausedActions: Set<Action>;
  forcedLiquidationEnabled: boolean;
}

export interface PoolParameters {
  closeFactor: bigint;
  liquidationIncentive: bigint;
  minLiquidatableCollateral: bigint;
  maxLoopsLimit: number;
}

export interface MarketRegistryDeps {
  journal: UndoJournal;
  events: EngineEvents;
  oracle: () => PriceGateway;
}

/**
 * MarketRegistry: owns the pool's configuration state.
 * Every mutation goes through a validated setter and journals what it replaces.
 */
export class MarketRegistry {
  private readonly params: PoolParameters;
  private readonly markets: Map<string, MarketConfig> = new Map();
  private readonly allMarkets: string[] = [];
  private readonly ledgers: Map<string, MarketLedger> = new Map();

  constructor(
    private readonly deps: MarketRegistryDeps,
    initial: PoolParameters
  ) {
    this.params = { ...initial };
  }

  // ---------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------

  get closeFactor(): bigint {
    return this.params.closeFactor;
  }

  get liquidationIncentive(): bigint {
    return this.params.liquidationIncentive;
  }

  get minLiquidatableCollateral(): bigint {
    return this.params.minLiquidatableCollateral;
  }

  get maxLoopsLimit(): number {
    return this.params.maxLoopsLimit;
  }

  isListed(market: string): boolean {
    return this.markets.get(market.toLowerCase())?.isListed === true;
  }

  /**
   * Read-only copy of a market's configuration, or null when unknown
   */
  getMarket(market: string): Readonly<MarketConfig> | null {
    const config = this.markets.get(market.toLowerCase());
    if (!config) return null;
    return { ...config, pausedActions: new Set(config.pausedActions) };
  }

  requireListed(market: string): MarketConfig {
    const config = this.markets.get(market.toLowerCase());
    if (!config || !config.isListed) {
      throw marketNotListed(market);
    }
    return config;
  }

  getLedger(market: string): MarketLedger {
    this.requireListed(market);
    const ledger = this.ledgers.get(market.toLowerCase());
    if (!ledger) {
      throw marketNotListed(market);
    }
    return ledger;
  }

  getAllMarkets(): string[] {
    return [...this.allMarkets];
  }

  actionPaused(market: string, action: Action): boolean {
    return this.markets.get(market.toLowerCase())?.pausedActions.has(action) === true;
  }

  checkActionPauseState(market: string, action: Action): void {
    if (this.actionPaused(market, action)) {
      throw new PolicyError('ActionPaused', `Action ${action} is paused on market ${market}`, {
        market,
        action,
      });
    }
  }

  ensureMaxLoops(len: number): void {
    ensureMaxLoops(this.params.maxLoopsLimit, len);
  }

  // ---------------------------------------------------------------------
  // Market listing
  // ---------------------------------------------------------------------

  /**
   * List a market. New markets start with zero factors and zero caps.
   * @returns canonical market address
   */
  supportMarket(ledger: MarketLedger): string {
    const market = normalizeAddress(ledger.address);

    if (this.markets.get(market)?.isListed) {
      throw new ConfigurationError('MarketAlreadyListed', `Market ${market} is already listed`, { market });
    }
    if (!ledger.isMarket()) {
      throw new ConfigurationError('InvalidMarket', `Ledger ${market} does not identify as a market`, { market });
    }

    recordedSet(this.deps.journal, this.markets, market, {
      address: market,
      isListed: true,
      collateralFactor: 0n,
      liquidationThreshold: 0n,
      supplyCap: 0n,
      borrowCap: 0n,
      pausedActions: new Set(),
      forcedLiquidationEnabled: false,
    });
    recordedSet(this.deps.journal, this.ledgers, market, ledger);
    const listedCount = this.allMarkets.length;
    this.deps.journal.record(() => {
      this.allMarkets.length = listedCount;
    });
    this.allMarkets.push(market);

    console.log(`[registry] Listed market ${market} (${this.allMarkets.length} total)`);
    this.deps.events.emit('MarketSupported', { market });
    return market;
  }

  // ---------------------------------------------------------------------
  // Risk parameters
  // ---------------------------------------------------------------------

  setCollateralFactor(market: string, newCollateralFactor: bigint, newLiquidationThreshold: bigint): void {
    if (newCollateralFactor < 0n || newCollateralFactor > MAX_COLLATERAL_FACTOR_MANTISSA) {
      throw new ConfigurationError(
        'InvalidCollateralFactor',
        `Collateral factor ${formatUnits(newCollateralFactor, 18)} exceeds ${formatUnits(MAX_COLLATERAL_FACTOR_MANTISSA, 18)}`,
        { market, collateralFactor: newCollateralFactor.toString() }
      );
    }
    if (newLiquidationThreshold > MANTISSA_ONE) {
      throw new ConfigurationError('InvalidLiquidationThreshold', 'Liquidation threshold exceeds 1.0', {
        market,
        liquidationThreshold: newLiquidationThreshold.toString(),
      });
    }
    if (newLiquidationThreshold < newCollateralFactor) {
      throw new ConfigurationError(
        'InvalidLiquidationThreshold',
        'Liquidation threshold is below the collateral factor',
        {
          market,
          collateralFactor: newCollateralFactor.toString(),
          liquidationThreshold: newLiquidationThreshold.toString(),
        }
      );
    }

    const config = this.requireListed(market);

    if (newCollateralFactor !== 0n && this.deps.oracle().getUnderlyingPrice(config.address) === 0n) {
      throw new CollaboratorError('PriceError', `Price of ${config.address} is unavailable`, {
        market: config.address,
      });
    }

    if (config.collateralFactor !== newCollateralFactor) {
      const old = config.collateralFactor;
      this.saveMarket(config);
      config.collateralFactor = newCollateralFactor;
      this.deps.events.emit('NewCollateralFactor', {
        market: config.address,
        oldCollateralFactor: old,
        newCollateralFactor,
      });
    }

    if (config.liquidationThreshold !== newLiquidationThreshold) {
      const old = config.liquidationThreshold;
      this.saveMarket(config);
      config.liquidationThreshold = newLiquidationThreshold;
      this.deps.events.emit('NewLiquidationThreshold', {
        market: config.address,
        oldLiquidationThreshold: old,
        newLiquidationThreshold,
      });
    }
  }

  setCloseFactor(newCloseFactor: bigint): void {
    if (newCloseFactor > MAX_CLOSE_FACTOR_MANTISSA || newCloseFactor < MIN_CLOSE_FACTOR_MANTISSA) {
      throw new ConfigurationError(
        'InvalidCloseFactor',
        `Close factor ${formatUnits(newCloseFactor, 18)} is outside [0.05, 0.9]`,
        { closeFactor: newCloseFactor.toString() }
      );
    }
    const old = this.setParameter('closeFactor', newCloseFactor);
    this.deps.events.emit('NewCloseFactor', { oldCloseFactor: old, newCloseFactor });
  }

  setLiquidationIncentive(newLiquidationIncentive: bigint): void {
    if (newLiquidationIncentive < MANTISSA_ONE) {
      throw new ConfigurationError(
        'InvalidLiquidationIncentive',
        'Liquidation incentive should be greater than or equal to 1.0',
        { liquidationIncentive: newLiquidationIncentive.toString() }
      );
    }
    const old = this.setParameter('liquidationIncentive', newLiquidationIncentive);
    this.deps.events.emit('NewLiquidationIncentive', {
      oldLiquidationIncentive: old,
      newLiquidationIncentive,
    });
  }

  setMinLiquidatableCollateral(newMinLiquidatableCollateral: bigint): void {
    if (newMinLiquidatableCollateral < 0n) {
      throw new ConfigurationError('InvalidInput', 'Minimum liquidatable collateral cannot be negative');
    }
    const old = this.setParameter('minLiquidatableCollateral', newMinLiquidatableCollateral);
    this.deps.events.emit('NewMinLiquidatableCollateral', {
      oldMinLiquidatableCollateral: old,
      newMinLiquidatableCollateral,
    });
  }

  setForcedLiquidation(market: string, enabled: boolean): void {
    const config = this.requireListed(market);
    this.saveMarket(config);
    config.forcedLiquidationEnabled = enabled;
    this.deps.events.emit('IsForcedLiquidationEnabledUpdated', { market: config.address, enabled });
  }

  setMaxLoopsLimit(newLimit: number): void {
    validateNewMaxLoopsLimit(this.params.maxLoopsLimit, newLimit);
    const old = this.setParameter('maxLoopsLimit', newLimit);
    this.deps.events.emit('NewMaxLoopsLimit', { source: 'pool', oldMaxLoopsLimit: old, newMaxLoopsLimit: newLimit });
  }

  // ---------------------------------------------------------------------
  // Caps and pauses (bulk setters)
  // ---------------------------------------------------------------------

  /**
   * A cap below the current total is accepted: it blocks growth, not existing positions.
   * MAX_UINT256 means unlimited.
   */
  setMarketSupplyCaps(markets: string[], newCaps: bigint[]): void {
    this.validateBulkInput(markets, newCaps);
    const configs = markets.map((market) => this.requireListed(market));
    configs.forEach((config, i) => {
      this.saveMarket(config);
      config.supplyCap = newCaps[i];
      this.deps.events.emit('NewSupplyCap', { market: config.address, newSupplyCap: newCaps[i] });
    });
  }

  setMarketBorrowCaps(markets: string[], newCaps: bigint[]): void {
    this.validateBulkInput(markets, newCaps);
    const configs = markets.map((market) => this.requireListed(market));
    configs.forEach((config, i) => {
      this.saveMarket(config);
      config.borrowCap = newCaps[i];
      this.deps.events.emit('NewBorrowCap', { market: config.address, newBorrowCap: newCaps[i] });
    });
  }

  setActionsPaused(markets: string[], actions: Action[], paused: boolean): void {
    this.ensureMaxLoops(markets.length * actions.length);

    const configs = markets.map((market) => {
      const config = this.markets.get(market.toLowerCase());
      if (!config || !config.isListed) {
        throw new ConfigurationError('MarketNotListed', `Cannot pause market ${market}: not listed`, { market });
      }
      return config;
    });

    for (const config of configs) {
      this.saveMarket(config);
      for (const action of actions) {
        if (paused) {
          config.pausedActions.add(action);
        } else {
          config.pausedActions.delete(action);
        }
        this.deps.events.emit('ActionPausedMarket', { market: config.address, action, paused });
      }
    }
  }

  private setParameter<K extends keyof PoolParameters>(key: K, value: PoolParameters[K]): PoolParameters[K] {
    const old = this.params[key];
    this.deps.journal.record(() => {
      this.params[key] = old;
    });
    this.params[key] = value;
    return old;
  }

  private saveMarket(config: MarketConfig): void {
    const saved = { ...config, pausedActions: new Set(config.pausedActions) };
    this.deps.journal.record(() => {
      Object.assign(config, saved);
    });
  }

  private validateBulkInput(markets: string[], values: bigint[]): void {
    if (markets.length === 0 || markets.length !== values.length) {
      throw new ConfigurationError('InvalidInput', 'Markets and values must be non-empty and of equal length', {
        markets: String(markets.length),
        values: String(values.length),
      });
    }
    for (const value of values) {
      if (value < 0n) {
        throw new ConfigurationError('InvalidInput', `Negative cap ${value}`);
      }
    }
    this.ensureMaxLoops(markets.length);
  }
}
