// rewards/RewardsDistributor.ts: Reward index accrual, distribution and claims for one reward token

import { formatUnits } from 'ethers';
import { config } from '../config/index.js';
import type { AccessController, MarketLedger, RewardTokenVault } from '../collaborators/types.js';
import { normalizeAddress } from '../core/address.js';
import {
  ConfigurationError,
  InvariantViolation,
  PolicyError,
  marketNotListed,
} from '../core/errors.js';
import type { EngineEvents, RewardSide } from '../core/events.js';
import {
  DOUBLE_SCALE,
  MAX_UINT224,
  divScalarByExp,
  fraction,
  mulDouble,
} from '../core/fixedPoint.js';
import { ensureMaxLoops, validateNewMaxLoopsLimit } from '../core/loops.js';
import {
  recordedDelete,
  recordedSet,
  type TransactionParticipant,
  type UndoJournal,
} from '../core/transaction.js';
import { safeAccountSnapshot } from '../risk/LiquidityEvaluator.js';
import { WallClockSlotSource, type SlotSource } from './SlotSource.js';

/**
 * Index every market starts from; accounts that never received a distribution
 * are treated as holding this index once rewards are configured
 */
export const INITIAL_INDEX = DOUBLE_SCALE;

const SIDES: readonly RewardSide[] = ['supply', 'borrow'];

export interface RewardMarketState {
  /** 1e36-scaled accumulator, non-decreasing */
  readonly index: bigint;
  /** Slot the index was last advanced to */
  readonly lastSlot: bigint;
  /** Cutoff after which the index stops advancing; 0 = none */
  readonly lastRewardingSlot: bigint;
}

const EMPTY_MARKET_STATE: RewardMarketState = { index: 0n, lastSlot: 0n, lastRewardingSlot: 0n };

/**
 * What a distributor needs from the pool that owns it
 */
export interface RewardsHost {
  readonly address: string;
  readonly events: EngineEvents;
  readonly access: AccessController;
  /** Journal of the pool's running operation */
  readonly transactions: UndoJournal;
  /**
   * Run `fn` as one pool operation named `operation`, snapshotting `participants`
   * when it starts
   */
  runAtomically<T>(operation: string, fn: () => T, participants?: TransactionParticipant[]): T;
  isMarketListed(market: string): boolean;
  getLedger(market: string): MarketLedger;
  getAllMarkets(): string[];
}

export interface RewardsDistributorOptions {
  address: string;
  vault: RewardTokenVault;
  /** Required for block-based accrual; defaults to unix seconds when REWARD_TIME_BASED is set */
  slots?: SlotSource;
  maxLoopsLimit?: number;
  logFlywheel?: boolean;
}

function resolveSlotSource(slots: SlotSource | undefined): SlotSource {
  if (slots) return slots;
  if (config.REWARD_TIME_BASED) return new WallClockSlotSource();
  throw new ConfigurationError('InvalidInput', 'Block-based reward accrual needs a slot source');
}

/**
 * RewardsDistributor: accrues one reward token to suppliers and borrowers of the
 * pool's markets in proportion to their principal, plus linear contributor grants.
 *
 * Index math (per market and side):
 *   index += elapsedSlots × speed × 1e36 / totalPrincipal
 *   accountReward += (index − accountIndex) × accountPrincipal / 1e36
 * Borrow principal is debt divided by the market borrow index, so interest
 * accrual does not inflate a borrower's share.
 *
 * Every write is journaled on the host's transaction, so a rejected call is undone
 * whether or not the distributor has been added to the pool yet.
 */
export class RewardsDistributor {
  readonly address: string;
  private readonly markets: Record<RewardSide, Map<string, RewardMarketState>> = {
    supply: new Map(),
    borrow: new Map(),
  };
  private readonly speeds: Record<RewardSide, Map<string, bigint>> = { supply: new Map(), borrow: new Map() };
  // market -> account -> index at last distribution
  private readonly accountIndexes: Record<RewardSide, Map<string, Map<string, bigint>>> = {
    supply: new Map(),
    borrow: new Map(),
  };
  private readonly accrued: Map<string, bigint> = new Map();
  private readonly contributorSpeeds: Map<string, bigint> = new Map();
  private readonly lastContributorSlots: Map<string, bigint> = new Map();
  private loopsLimit: number;
  private readonly vault: RewardTokenVault;
  private readonly slots: SlotSource;
  private readonly logFlywheel: boolean;

  constructor(
    readonly host: RewardsHost,
    options: RewardsDistributorOptions
  ) {
    this.address = normalizeAddress(options.address);
    this.vault = options.vault;
    this.slots = resolveSlotSource(options.slots);
    this.logFlywheel = options.logFlywheel ?? config.LOG_FLYWHEEL;
    this.loopsLimit = options.maxLoopsLimit ?? config.MAX_LOOPS_LIMIT;
  }

  // ---------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------

  get slotKind(): SlotSource['kind'] {
    return this.slots.kind;
  }

  get maxLoopsLimit(): number {
    return this.loopsLimit;
  }

  marketState(market: string, side: RewardSide): RewardMarketState {
    return this.markets[side].get(market.toLowerCase()) ?? EMPTY_MARKET_STATE;
  }

  speed(market: string, side: RewardSide): bigint {
    return this.speeds[side].get(market.toLowerCase()) ?? 0n;
  }

  accountIndex(market: string, side: RewardSide, account: string): bigint {
    return this.accountIndexes[side].get(market.toLowerCase())?.get(account.toLowerCase()) ?? 0n;
  }

  rewardTokenAccrued(account: string): bigint {
    return this.accrued.get(account.toLowerCase()) ?? 0n;
  }

  contributorSpeed(contributor: string): bigint {
    return this.contributorSpeeds.get(contributor.toLowerCase()) ?? 0n;
  }

  lastContributorSlot(contributor: string): bigint {
    return this.lastContributorSlots.get(contributor.toLowerCase()) ?? 0n;
  }

  // ---------------------------------------------------------------------
  // Pool-driven accrual (called by the pool inside its own operations)
  // ---------------------------------------------------------------------

  /**
   * Start both indices of a newly listed market at INITIAL_INDEX
   */
  initializeMarket(market: string): void {
    const now = this.slots.current();
    const normalizedMarket = market.toLowerCase();
    for (const side of SIDES) {
      const state = this.marketState(normalizedMarket, side);
      this.writeMarketState(normalizedMarket, side, {
        ...state,
        index: state.index === 0n ? INITIAL_INDEX : state.index,
        lastSlot: now,
      });
    }
    this.host.events.emit('MarketInitialized', { distributor: this.address, market: normalizedMarket });
  }

  /**
   * Advance the market index up to the current slot (or the cutoff, if earlier)
   */
  refreshIndex(market: string, side: RewardSide): void {
    const normalizedMarket = market.toLowerCase();
    const state = this.marketState(normalizedMarket, side);
    const speed = this.speed(normalizedMarket, side);

    let slot = this.slots.current();
    if (state.lastRewardingSlot > 0n && slot > state.lastRewardingSlot) {
      slot = state.lastRewardingSlot;
    }
    if (slot <= state.lastSlot) {
      return;
    }

    const elapsed = slot - state.lastSlot;
    let index = state.index;
    if (speed > 0n) {
      const principal = this.totalPrincipal(normalizedMarket, side);
      const ratio = fraction(elapsed * speed, principal);
      const nextIndex = state.index + ratio;
      if (nextIndex > MAX_UINT224) {
        throw new InvariantViolation('RewardIndexOverflow', `New ${side} index of ${normalizedMarket} exceeds 224 bits`, {
          market: normalizedMarket,
          side,
        });
      }
      index = nextIndex;
    }
    this.writeMarketState(normalizedMarket, side, { ...state, index, lastSlot: slot });
  }

  /**
   * Credit `account` with what it earned since its last distribution
   * @returns the amount credited
   */
  distribute(market: string, side: RewardSide, account: string): bigint {
    const normalizedMarket = market.toLowerCase();
    const normalizedAccount = account.toLowerCase();
    const marketIndex = this.marketState(normalizedMarket, side).index;

    let accountIndexes = this.accountIndexes[side].get(normalizedMarket);
    if (!accountIndexes) {
      accountIndexes = new Map();
      recordedSet(this.journal, this.accountIndexes[side], normalizedMarket, accountIndexes);
    }

    let accountIndex = accountIndexes.get(normalizedAccount) ?? 0n;
    recordedSet(this.journal, accountIndexes, normalizedAccount, marketIndex);

    // Positions opened before rewards were configured only earn from INITIAL_INDEX onward
    if (accountIndex === 0n && marketIndex >= INITIAL_INDEX) {
      accountIndex = INITIAL_INDEX;
    }

    const deltaIndex = marketIndex > accountIndex ? marketIndex - accountIndex : 0n;
    const principal = this.accountPrincipal(normalizedMarket, side, normalizedAccount);
    const delta = mulDouble(principal, deltaIndex);
    const accrued = this.rewardTokenAccrued(normalizedAccount) + delta;
    recordedSet(this.journal, this.accrued, normalizedAccount, accrued);

    if (this.logFlywheel && delta > 0n) {
      console.log(
        `[rewards] ${side} ${normalizedMarket} → ${normalizedAccount}: +${formatUnits(delta, 18)} (accrued ${formatUnits(accrued, 18)})`
      );
    }
    this.host.events.emit('DistributedRewardToken', {
      distributor: this.address,
      market: normalizedMarket,
      side,
      account: normalizedAccount,
      delta,
      accountIndex: marketIndex,
    });
    return delta;
  }

  // ---------------------------------------------------------------------
  // Caller-facing operations
  // ---------------------------------------------------------------------

  /**
   * Set per-slot speeds. Past accrual is settled at the old speed first.
   */
  setRewardTokenSpeeds(caller: string, markets: string[], supplySpeeds: bigint[], borrowSpeeds: bigint[]): void {
    this.host.runAtomically('setRewardTokenSpeeds', () => {
      this.checkAccess(caller, 'setRewardTokenSpeeds(address[],uint256[],uint256[])');
      if (markets.length !== supplySpeeds.length || markets.length !== borrowSpeeds.length) {
        throw new ConfigurationError('InvalidInput', 'Invalid setRewardTokenSpeeds input lengths');
      }
      ensureMaxLoops(this.loopsLimit, markets.length);

      markets.forEach((market, i) => {
        const normalizedMarket = this.requireListed(market);
        this.updateSpeed(normalizedMarket, 'supply', supplySpeeds[i]);
        this.updateSpeed(normalizedMarket, 'borrow', borrowSpeeds[i]);
      });
    });
  }

  /**
   * Set accrual cutoffs. A nonzero cutoff must be in the future, and a cutoff
   * that has already passed can no longer be changed.
   */
  setLastRewardingSlots(
    caller: string,
    markets: string[],
    supplyLastRewardingSlots: bigint[],
    borrowLastRewardingSlots: bigint[]
  ): void {
    this.host.runAtomically('setLastRewardingSlots', () => {
      this.checkAccess(caller, 'setLastRewardingBlocks(address[],uint32[],uint32[])');
      if (
        markets.length !== supplyLastRewardingSlots.length ||
        markets.length !== borrowLastRewardingSlots.length
      ) {
        throw new ConfigurationError('InvalidInput', 'Invalid setLastRewardingSlots input lengths');
      }
      ensureMaxLoops(this.loopsLimit, markets.length);

      markets.forEach((market, i) => {
        const normalizedMarket = this.requireListed(market);
        this.updateLastRewardingSlot(normalizedMarket, 'supply', supplyLastRewardingSlots[i]);
        this.updateLastRewardingSlot(normalizedMarket, 'borrow', borrowLastRewardingSlots[i]);
      });
    });
  }

  setContributorRewardTokenSpeed(caller: string, contributor: string, speed: bigint): void {
    this.host.runAtomically('setContributorRewardTokenSpeed', () => {
      this.checkAccess(caller, 'setContributorRewardTokenSpeed(address,uint256)');
      if (speed < 0n) {
        throw new ConfigurationError('InvalidInput', 'Contributor speed cannot be negative');
      }
      const normalizedContributor = normalizeAddress(contributor);

      // Settle what was earned at the previous speed
      this.settleContributor(normalizedContributor);

      if (speed === 0n) {
        recordedDelete(this.journal, this.lastContributorSlots, normalizedContributor);
        recordedDelete(this.journal, this.contributorSpeeds, normalizedContributor);
      } else {
        recordedSet(this.journal, this.lastContributorSlots, normalizedContributor, this.slots.current());
        recordedSet(this.journal, this.contributorSpeeds, normalizedContributor, speed);
      }
      this.host.events.emit('ContributorRewardTokenSpeedUpdated', {
        distributor: this.address,
        contributor: normalizedContributor,
        newSpeed: speed,
      });
    });
  }

  /**
   * Accrue a contributor's linear reward up to the current slot
   */
  updateContributorRewards(contributor: string): void {
    this.host.runAtomically('updateContributorRewards', () => {
      this.settleContributor(normalizeAddress(contributor));
    });
  }

  /**
   * Refresh, distribute and pay out the holder's accrued reward.
   * Pays the full balance or nothing; the balance stays accrued when the vault is short.
   * @param markets defaults to every market of the pool
   * @returns amount paid
   */
  claimRewardToken(holder: string, markets?: string[]): bigint {
    return this.host.runAtomically(
      'claimRewardToken',
      () => {
        const normalizedHolder = normalizeAddress(holder);
        const targets = markets ?? this.host.getAllMarkets();
        ensureMaxLoops(this.loopsLimit, targets.length);

        for (const market of targets) {
          const normalizedMarket = this.requireListed(market);
          this.refreshIndex(normalizedMarket, 'borrow');
          this.distribute(normalizedMarket, 'borrow', normalizedHolder);
          this.refreshIndex(normalizedMarket, 'supply');
          this.distribute(normalizedMarket, 'supply', normalizedHolder);
        }

        const owed = this.rewardTokenAccrued(normalizedHolder);
        const remaining = this.grant(normalizedHolder, owed);
        recordedSet(this.journal, this.accrued, normalizedHolder, remaining);

        const paid = owed - remaining;
        if (paid > 0n) {
          console.log(`[rewards] Paid ${formatUnits(paid, 18)} to ${normalizedHolder}`);
        } else if (owed > 0n) {
          console.warn(`[rewards] Vault cannot cover ${formatUnits(owed, 18)} for ${normalizedHolder}; balance kept`);
        }
        return paid;
      },
      [this.vault]
    );
  }

  /**
   * Transfer `amount` out of the vault, failing when it cannot be covered in full
   */
  grantRewardToken(caller: string, recipient: string, amount: bigint): void {
    this.host.runAtomically(
      'grantRewardToken',
      () => {
        this.checkAccess(caller, 'grantRewardToken(address,uint256)');
        const normalizedRecipient = normalizeAddress(recipient);
        const left = this.grant(normalizedRecipient, amount);
        if (left !== 0n) {
          throw new PolicyError('InsufficientRewardBalance', 'Insufficient reward token for grant', {
            amount: amount.toString(),
          });
        }
        this.host.events.emit('RewardTokenGranted', {
          distributor: this.address,
          recipient: normalizedRecipient,
          amount,
        });
      },
      [this.vault]
    );
  }

  setMaxLoopsLimit(caller: string, newLimit: number): void {
    this.host.runAtomically('setMaxLoopsLimit', () => {
      this.checkAccess(caller, 'setMaxLoopsLimit(uint256)');
      validateNewMaxLoopsLimit(this.loopsLimit, newLimit);
      const old = this.loopsLimit;
      this.journal.record(() => {
        this.loopsLimit = old;
      });
      this.loopsLimit = newLimit;
      this.host.events.emit('NewMaxLoopsLimit', {
        source: this.address,
        oldMaxLoopsLimit: old,
        newMaxLoopsLimit: newLimit,
      });
    });
  }

  // ---------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------

  private updateSpeed(market: string, side: RewardSide, newSpeed: bigint): void {
    if (newSpeed < 0n) {
      throw new ConfigurationError('InvalidInput', `Negative ${side} speed for ${market}`);
    }
    if (this.speed(market, side) === newSpeed) {
      return;
    }
    // Settle elapsed slots at the old speed before switching
    this.refreshIndex(market, side);
    recordedSet(this.journal, this.speeds[side], market, newSpeed);
    this.host.events.emit('RewardTokenSpeedUpdated', { distributor: this.address, market, side, newSpeed });
  }

  private updateLastRewardingSlot(market: string, side: RewardSide, newSlot: bigint): void {
    const now = this.slots.current();
    const state = this.marketState(market, side);

    if (state.lastRewardingSlot !== 0n && state.lastRewardingSlot <= now) {
      throw new ConfigurationError('LastRewardingSlotInPast', `Rewards for ${side} ${market} are already locked`, {
        market,
        side,
      });
    }
    if (newSlot !== 0n && newSlot <= now) {
      throw new ConfigurationError(
        'LastRewardingSlotInPast',
        'Setting the last rewarding slot in the past is not allowed',
        { market, side, slot: newSlot.toString(), now: now.toString() }
      );
    }
    if (state.lastRewardingSlot !== newSlot) {
      this.writeMarketState(market, side, { ...state, lastRewardingSlot: newSlot });
      this.host.events.emit('LastRewardingSlotUpdated', { distributor: this.address, market, side, newSlot });
    }
  }

  private settleContributor(contributor: string): void {
    const speed = this.contributorSpeed(contributor);
    const now = this.slots.current();
    const last = this.lastContributorSlot(contributor);
    if (speed === 0n || now <= last) {
      return;
    }
    const accrued = this.rewardTokenAccrued(contributor) + (now - last) * speed;
    recordedSet(this.journal, this.accrued, contributor, accrued);
    recordedSet(this.journal, this.lastContributorSlots, contributor, now);
    this.host.events.emit('ContributorRewardsUpdated', {
      distributor: this.address,
      contributor,
      rewardAccrued: accrued,
    });
  }

  /**
   * @returns the part of `amount` that could not be paid (all of it, or nothing)
   */
  private grant(recipient: string, amount: bigint): bigint {
    const available = this.vault.balanceOf(this.address);
    if (amount > 0n && amount <= available) {
      this.vault.transfer(this.address, recipient, amount);
      return 0n;
    }
    return amount;
  }

  private totalPrincipal(market: string, side: RewardSide): bigint {
    const ledger = this.host.getLedger(market);
    if (side === 'supply') {
      return ledger.totalSupply();
    }
    const borrowIndex = ledger.borrowIndex();
    return borrowIndex === 0n ? 0n : divScalarByExp(ledger.totalDebt(), borrowIndex);
  }

  private accountPrincipal(market: string, side: RewardSide, account: string): bigint {
    const ledger = this.host.getLedger(market);
    const position = safeAccountSnapshot(ledger, account);
    if (side === 'supply') {
      return position.tokenBalance;
    }
    const borrowIndex = ledger.borrowIndex();
    return borrowIndex === 0n ? 0n : divScalarByExp(position.debtBalance, borrowIndex);
  }

  private get journal(): UndoJournal {
    return this.host.transactions;
  }

  private writeMarketState(market: string, side: RewardSide, next: RewardMarketState): void {
    recordedSet(this.journal, this.markets[side], market, next);
  }

  private requireListed(market: string): string {
    if (!this.host.isMarketListed(market)) {
      throw marketNotListed(market);
    }
    return market.toLowerCase();
  }

  private checkAccess(caller: string, operation: string): void {
    if (!this.host.access.isAllowedToCall(caller, operation)) {
      throw new ConfigurationError('Unauthorized', `${caller} is not allowed to call ${operation}`, {
        caller,
        operation,
      });
    }
  }
}
