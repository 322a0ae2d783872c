// core/events.ts: Typed event bus, delivered only for committed operations

import EventEmitter from 'events';
import type { Action } from '../registry/actions.js';
import type { TransactionScope } from './transaction.js';

export type RewardSide = 'supply' | 'borrow';

export interface EngineEventMap {
  MarketSupported: { market: string };
  NewCollateralFactor: { market: string; oldCollateralFactor: bigint; newCollateralFactor: bigint };
  NewLiquidationThreshold: { market: string; oldLiquidationThreshold: bigint; newLiquidationThreshold: bigint };
  NewCloseFactor: { oldCloseFactor: bigint; newCloseFactor: bigint };
  NewLiquidationIncentive: { oldLiquidationIncentive: bigint; newLiquidationIncentive: bigint };
  NewMinLiquidatableCollateral: { oldMinLiquidatableCollateral: bigint; newMinLiquidatableCollateral: bigint };
  NewSupplyCap: { market: string; newSupplyCap: bigint };
  NewBorrowCap: { market: string; newBorrowCap: bigint };
  ActionPausedMarket: { market: string; action: Action; paused: boolean };
  IsForcedLiquidationEnabledUpdated: { market: string; enabled: boolean };
  NewMaxLoopsLimit: { source: string; oldMaxLoopsLimit: number; newMaxLoopsLimit: number };
  NewPriceOracle: { pool: string };
  MarketEntered: { market: string; account: string };
  MarketExited: { market: string; account: string };
  DelegateUpdated: { approver: string; delegate: string; approved: boolean };
  NewRewardsDistributor: { distributor: string };
  AccountHealed: { account: string; liquidator: string; percentage: bigint };
  AccountLiquidated: { account: string; liquidator: string; orders: number };
  MarketInitialized: { distributor: string; market: string };
  RewardTokenSpeedUpdated: { distributor: string; market: string; side: RewardSide; newSpeed: bigint };
  LastRewardingSlotUpdated: { distributor: string; market: string; side: RewardSide; newSlot: bigint };
  ContributorRewardTokenSpeedUpdated: { distributor: string; contributor: string; newSpeed: bigint };
  ContributorRewardsUpdated: { distributor: string; contributor: string; rewardAccrued: bigint };
  DistributedRewardToken: {
    distributor: string;
    market: string;
    side: RewardSide;
    account: string;
    delta: bigint;
    accountIndex: bigint;
  };
  RewardTokenGranted: { distributor: string; recipient: string; amount: bigint };
}

export type EngineEventName = keyof EngineEventMap;

/**
 * EngineEvents: EventEmitter wrapper whose `emit` waits for the running
 * operation to commit; events of an aborted operation are never delivered.
 */
export class EngineEvents {
  private readonly emitter = new EventEmitter();

  constructor(
    private readonly scope: TransactionScope,
    private readonly logEvents = false
  ) {}

  on<K extends EngineEventName>(name: K, listener: (payload: EngineEventMap[K]) => void): () => void {
    this.emitter.on(name, listener);
    return () => {
      this.emitter.off(name, listener);
    };
  }

  emit<K extends EngineEventName>(name: K, payload: EngineEventMap[K]): void {
    this.scope.afterCommit(() => {
      if (this.logEvents) {
        console.log(`[events] ${name}`, payload);
      }
      this.emitter.emit(name, payload);
    });
  }
}
