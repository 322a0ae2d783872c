// index.ts: Public API of the pool risk engine

export { Comptroller } from './comptroller/Comptroller.js';
export type { AccountLiquidity, ComptrollerOptions } from './comptroller/Comptroller.js';

export {
  RewardsDistributor,
  INITIAL_INDEX,
} from './rewards/RewardsDistributor.js';
export type {
  RewardMarketState,
  RewardsDistributorOptions,
  RewardsHost,
} from './rewards/RewardsDistributor.js';
export {
  BlockSlotSource,
  ManualSlotSource,
  WallClockSlotSource,
} from './rewards/SlotSource.js';
export type { BlockEventSource, SlotKind, SlotSource } from './rewards/SlotSource.js';

export { PriceCache, normalizeTo1e18 } from './prices/PriceCache.js';
export type { PriceCacheOptions, PriceRefresher } from './prices/PriceCache.js';

export type { HealOutcome, LiquidationOrder } from './liquidation/LiquidationCoordinator.js';
export type { AccountLiquiditySnapshot, HypotheticalChange, WeightPolicy } from './risk/LiquidityEvaluator.js';
export type { MarketConfig } from './registry/MarketRegistry.js';
export {
  MAX_CLOSE_FACTOR_MANTISSA,
  MAX_COLLATERAL_FACTOR_MANTISSA,
  MIN_CLOSE_FACTOR_MANTISSA,
} from './registry/MarketRegistry.js';
export { ALL_ACTIONS, isAction } from './registry/actions.js';
export type { Action } from './registry/actions.js';

export type {
  AccessController,
  AccountSnapshotResult,
  MarketLedger,
  PriceGateway,
  Restore,
  RewardTokenVault,
} from './collaborators/types.js';

export {
  CollaboratorError,
  ConfigurationError,
  EngineError,
  InvariantViolation,
  PolicyError,
  isEngineError,
} from './core/errors.js';
export type { ErrorCode, ErrorKind } from './core/errors.js';
export type { EngineEventMap, EngineEventName, RewardSide } from './core/events.js';
export { EXP_SCALE, DOUBLE_SCALE, MAX_UINT256 } from './core/fixedPoint.js';
export { EngineMetrics } from './metrics/EngineMetrics.js';
export { config } from './config/index.js';
export type { Env } from './config/index.js';
