// comptroller/Comptroller.ts: Pool facade (hooks, memberships, admin setters, batch liquidation, queries)

import { formatUnits } from 'ethers';
import type { AccessController, MarketLedger, PriceGateway } from '../collaborators/types.js';
import { config } from '../config/index.js';
import { normalizeAddress, sameAddress } from '../core/address.js';
import {
  CollaboratorError,
  ConfigurationError,
  PolicyError,
  isEngineError,
} from '../core/errors.js';
import { EngineEvents } from '../core/events.js';
import { MAX_UINT256, mulScalarTruncate } from '../core/fixedPoint.js';
import {
  TransactionScope,
  recordedDelete,
  recordedSet,
  type TransactionParticipant,
} from '../core/transaction.js';
import {
  LiquidationCoordinator,
  type HealOutcome,
  type LiquidationOrder,
} from '../liquidation/LiquidationCoordinator.js';
import { EngineMetrics } from '../metrics/EngineMetrics.js';
import { AccountMemberships } from '../registry/AccountMemberships.js';
import type { Action } from '../registry/actions.js';
import { MarketRegistry, type MarketConfig } from '../registry/MarketRegistry.js';
import type { RewardsDistributor, RewardsHost } from '../rewards/RewardsDistributor.js';
import { FlywheelDispatcher } from '../rewards/flywheel.js';
import {
  LiquidityEvaluator,
  collateralFactorWeight,
  liquidationThresholdWeight,
  safeAccountSnapshot,
  type AccountLiquiditySnapshot,
} from '../risk/LiquidityEvaluator.js';

export interface ComptrollerOptions {
  address: string;
  oracle: PriceGateway;
  access: AccessController;
  closeFactor?: bigint;
  liquidationIncentive?: bigint;
  minLiquidatableCollateral?: bigint;
  maxLoopsLimit?: number;
  logEvents?: boolean;
}

export interface AccountLiquidity {
  liquidity: bigint;
  shortfall: bigint;
}

/**
 * Comptroller: the risk controller of one isolated pool.
 *
 * Markets call the `pre*Hook` methods before every principal-affecting operation;
 * a hook either returns (operation allowed, reward indices brought up to date)
 * or throws an EngineError. Every public mutation is atomic: a throw undoes
 * the writes journaled on `transactions` by the pool, its distributors and
 * ledgers that join the pool's transaction.
 */
export class Comptroller implements RewardsHost {
  readonly address: string;
  readonly access: AccessController;
  readonly transactions: TransactionScope;
  readonly events: EngineEvents;
  readonly metrics = new EngineMetrics();

  private oracle: PriceGateway;
  private readonly distributors: RewardsDistributor[] = [];
  // approver -> delegates
  private readonly delegates: Map<string, Set<string>> = new Map();

  private readonly registry: MarketRegistry;
  private readonly memberships: AccountMemberships;
  private readonly evaluator: LiquidityEvaluator;
  private readonly coordinator: LiquidationCoordinator;
  private readonly flywheel: FlywheelDispatcher;

  constructor(options: ComptrollerOptions) {
    this.address = normalizeAddress(options.address);
    this.access = options.access;
    this.oracle = options.oracle;

    this.transactions = new TransactionScope();
    this.events = new EngineEvents(this.transactions, options.logEvents ?? config.LOG_ENGINE_EVENTS);
    this.memberships = new AccountMemberships(this.transactions);

    const currentOracle = (): PriceGateway => this.oracle;
    this.registry = new MarketRegistry(
      { journal: this.transactions, events: this.events, oracle: currentOracle },
      {
        closeFactor: options.closeFactor ?? config.CLOSE_FACTOR_MANTISSA,
        liquidationIncentive: options.liquidationIncentive ?? config.LIQUIDATION_INCENTIVE_MANTISSA,
        minLiquidatableCollateral: options.minLiquidatableCollateral ?? config.MIN_LIQUIDATABLE_COLLATERAL,
        maxLoopsLimit: options.maxLoopsLimit ?? config.MAX_LOOPS_LIMIT,
      }
    );
    this.evaluator = new LiquidityEvaluator({
      registry: this.registry,
      memberships: this.memberships,
      oracle: currentOracle,
      metrics: this.metrics,
    });
    this.flywheel = new FlywheelDispatcher(() => this.distributors);
    this.coordinator = new LiquidationCoordinator({
      poolAddress: this.address,
      registry: this.registry,
      memberships: this.memberships,
      evaluator: this.evaluator,
      oracle: currentOracle,
      flywheel: this.flywheel,
      events: this.events,
    });
  }

  runAtomically<T>(operation: string, fn: () => T, participants: TransactionParticipant[] = []): T {
    return this.execute(operation, fn, participants);
  }

  // ---------------------------------------------------------------------
  // Hooks (called by markets)
  // ---------------------------------------------------------------------

  preMintHook(market: string, minter: string, mintAmount: bigint): void {
    this.execute('preMintHook', () => {
      this.registry.checkActionPauseState(market, 'Mint');
      const marketConfig = this.registry.requireListed(market);

      if (marketConfig.supplyCap !== MAX_UINT256) {
        const ledger = this.registry.getLedger(marketConfig.address);
        const currentSupply = mulScalarTruncate(ledger.exchangeRate(), ledger.totalSupply());
        const nextTotalSupply = currentSupply + mintAmount;
        if (nextTotalSupply > marketConfig.supplyCap) {
          throw new PolicyError('SupplyCapExceeded', `Supply cap of ${marketConfig.address} reached`, {
            market: marketConfig.address,
            cap: marketConfig.supplyCap.toString(),
            nextTotalSupply: nextTotalSupply.toString(),
          });
        }
      }

      this.flywheel.supply(marketConfig.address, [minter]);
    });
  }

  preRedeemHook(market: string, redeemer: string, redeemTokens: bigint): void {
    this.execute('preRedeemHook', () => {
      this.registry.checkActionPauseState(market, 'Redeem');
      this.checkRedeemAllowed(market, redeemer, redeemTokens);
      this.flywheel.supply(market.toLowerCase(), [redeemer]);
    });
  }

  /**
   * Enters the market on the borrower's behalf when needed
   */
  preBorrowHook(market: string, borrower: string, borrowAmount: bigint): void {
    this.execute('preBorrowHook', () => {
      this.registry.checkActionPauseState(market, 'Borrow');
      const marketConfig = this.registry.requireListed(market);

      if (!this.memberships.isMember(borrower, marketConfig.address)) {
        this.addToMarket(marketConfig.address, borrower);
      }

      this.evaluator.refreshPrices(borrower);

      if (this.oracle.getUnderlyingPrice(marketConfig.address) === 0n) {
        throw new CollaboratorError('PriceError', `Price of ${marketConfig.address} is unavailable`, {
          market: marketConfig.address,
        });
      }

      if (marketConfig.borrowCap !== MAX_UINT256) {
        const ledger = this.registry.getLedger(marketConfig.address);
        const nextTotalDebt = ledger.totalDebt() + borrowAmount + ledger.badDebt();
        if (nextTotalDebt > marketConfig.borrowCap) {
          throw new PolicyError('BorrowCapExceeded', `Borrow cap of ${marketConfig.address} reached`, {
            market: marketConfig.address,
            cap: marketConfig.borrowCap.toString(),
            nextTotalDebt: nextTotalDebt.toString(),
          });
        }
      }

      const snapshot = this.evaluator.evaluate(borrower, collateralFactorWeight, {
        market: marketConfig.address,
        redeemTokens: 0n,
        borrowAmount,
      });
      if (snapshot.shortfall > 0n) {
        throw insufficientLiquidity(borrower, snapshot);
      }

      this.flywheel.borrow(marketConfig.address, [borrower]);
    });
  }

  preRepayHook(market: string, borrower: string): void {
    this.execute('preRepayHook', () => {
      this.registry.checkActionPauseState(market, 'Repay');
      this.oracle.updatePrice(market);
      const marketConfig = this.registry.requireListed(market);
      this.flywheel.borrow(marketConfig.address, [borrower]);
    });
  }

  preLiquidateHook(
    debtMarket: string,
    collateralMarket: string,
    borrower: string,
    repayAmount: bigint,
    skipLiquidityCheck: boolean
  ): void {
    this.execute('preLiquidateHook', () => {
      this.coordinator.preLiquidate(debtMarket, collateralMarket, borrower, repayAmount, skipLiquidityCheck);
    });
  }

  /**
   * @param seizer this pool (batch paths) or the debt market performing the liquidation
   */
  preSeizeHook(collateralMarket: string, seizer: string, liquidator: string, borrower: string): void {
    this.execute('preSeizeHook', () => {
      this.coordinator.preSeize(collateralMarket, seizer, liquidator, borrower);
    });
  }

  preTransferHook(market: string, src: string, dst: string, transferTokens: bigint): void {
    this.execute('preTransferHook', () => {
      this.registry.checkActionPauseState(market, 'Transfer');
      this.checkRedeemAllowed(market, src, transferTokens);
      this.flywheel.supply(market.toLowerCase(), [src, dst]);
    });
  }

  // ---------------------------------------------------------------------
  // Memberships and delegates
  // ---------------------------------------------------------------------

  enterMarkets(caller: string, markets: string[]): void {
    this.execute('enterMarkets', () => {
      const account = normalizeAddress(caller);
      this.registry.ensureMaxLoops(this.memberships.count(account) + markets.length);
      for (const market of markets) {
        this.addToMarket(market, account);
      }
    });
  }

  enterMarketOnBehalf(caller: string, onBehalf: string, market: string): void {
    this.execute('enterMarketOnBehalf', () => {
      const account = normalizeAddress(onBehalf);
      if (!sameAddress(caller, account) && !this.approvedDelegates(account, caller)) {
        throw new PolicyError('DelegateNotApproved', `${caller} is not an approved delegate of ${account}`, {
          approver: account,
          delegate: caller.toLowerCase(),
        });
      }
      this.addToMarket(market, account);
    });
  }

  /**
   * Stop using a market as collateral. A no-op when the account never entered it.
   */
  exitMarket(caller: string, market: string): void {
    this.execute('exitMarket', () => {
      const account = normalizeAddress(caller);
      this.registry.checkActionPauseState(market, 'ExitMarket');

      const { tokenBalance, debtBalance } = safeAccountSnapshot(this.registry.getLedger(market), account);
      if (debtBalance !== 0n) {
        throw new PolicyError('NonzeroBorrowBalance', `Cannot exit ${market} with outstanding debt`, {
          market: market.toLowerCase(),
          account,
          debtBalance: debtBalance.toString(),
        });
      }

      this.checkRedeemAllowed(market, account, tokenBalance);

      if (this.memberships.exit(account, market)) {
        this.events.emit('MarketExited', { market: market.toLowerCase(), account });
      }
    });
  }

  updateDelegate(caller: string, delegate: string, approved: boolean): void {
    this.execute('updateDelegate', () => {
      const approver = normalizeAddress(caller);
      const normalizedDelegate = normalizeAddress(delegate);

      if (this.approvedDelegates(approver, normalizedDelegate) === approved) {
        throw new PolicyError('DelegationStatusUnchanged', 'Delegation status unchanged', {
          approver,
          delegate: normalizedDelegate,
        });
      }

      const next = new Set(this.delegates.get(approver));
      if (approved) {
        next.add(normalizedDelegate);
      } else {
        next.delete(normalizedDelegate);
      }
      if (next.size === 0) {
        recordedDelete(this.transactions, this.delegates, approver);
      } else {
        recordedSet(this.transactions, this.delegates, approver, next);
      }
      this.events.emit('DelegateUpdated', { approver, delegate: normalizedDelegate, approved });
    });
  }

  approvedDelegates(account: string, delegate: string): boolean {
    return this.delegates.get(account.toLowerCase())?.has(delegate.toLowerCase()) === true;
  }

  // ---------------------------------------------------------------------
  // Batch liquidation
  // ---------------------------------------------------------------------

  healAccount(caller: string, user: string): HealOutcome {
    return this.execute('healAccount', () =>
      this.coordinator.healAccount(normalizeAddress(caller), normalizeAddress(user))
    );
  }

  liquidateAccount(caller: string, borrower: string, orders: LiquidationOrder[]): void {
    this.execute('liquidateAccount', () => {
      this.coordinator.liquidateAccount(normalizeAddress(caller), normalizeAddress(borrower), orders);
    });
  }

  // ---------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------

  supportMarket(caller: string, ledger: MarketLedger): string {
    return this.execute('supportMarket', () => {
      this.checkAccess(caller, 'supportMarket(address)');
      const market = this.registry.supportMarket(ledger);
      for (const distributor of this.distributors) {
        distributor.initializeMarket(market);
      }
      return market;
    });
  }

  setCollateralFactor(caller: string, market: string, collateralFactor: bigint, liquidationThreshold: bigint): void {
    this.execute('setCollateralFactor', () => {
      this.checkAccess(caller, 'setCollateralFactor(address,uint256,uint256)');
      this.registry.setCollateralFactor(market, collateralFactor, liquidationThreshold);
    });
  }

  setCloseFactor(caller: string, closeFactor: bigint): void {
    this.execute('setCloseFactor', () => {
      this.checkAccess(caller, 'setCloseFactor(uint256)');
      this.registry.setCloseFactor(closeFactor);
    });
  }

  setLiquidationIncentive(caller: string, liquidationIncentive: bigint): void {
    this.execute('setLiquidationIncentive', () => {
      this.checkAccess(caller, 'setLiquidationIncentive(uint256)');
      this.registry.setLiquidationIncentive(liquidationIncentive);
    });
  }

  setMinLiquidatableCollateral(caller: string, minLiquidatableCollateral: bigint): void {
    this.execute('setMinLiquidatableCollateral', () => {
      this.checkAccess(caller, 'setMinLiquidatableCollateral(uint256)');
      this.registry.setMinLiquidatableCollateral(minLiquidatableCollateral);
    });
  }

  setForcedLiquidation(caller: string, market: string, enabled: boolean): void {
    this.execute('setForcedLiquidation', () => {
      this.checkAccess(caller, 'setForcedLiquidation(address,bool)');
      this.registry.setForcedLiquidation(market, enabled);
    });
  }

  setMaxLoopsLimit(caller: string, limit: number): void {
    this.execute('setMaxLoopsLimit', () => {
      this.checkAccess(caller, 'setMaxLoopsLimit(uint256)');
      this.registry.setMaxLoopsLimit(limit);
    });
  }

  setMarketSupplyCaps(caller: string, markets: string[], caps: bigint[]): void {
    this.execute('setMarketSupplyCaps', () => {
      this.checkAccess(caller, 'setMarketSupplyCaps(address[],uint256[])');
      this.registry.setMarketSupplyCaps(markets, caps);
    });
  }

  setMarketBorrowCaps(caller: string, markets: string[], caps: bigint[]): void {
    this.execute('setMarketBorrowCaps', () => {
      this.checkAccess(caller, 'setMarketBorrowCaps(address[],uint256[])');
      this.registry.setMarketBorrowCaps(markets, caps);
    });
  }

  setActionsPaused(caller: string, markets: string[], actions: Action[], paused: boolean): void {
    this.execute('setActionsPaused', () => {
      this.checkAccess(caller, 'setActionsPaused(address[],uint256[],bool)');
      this.registry.setActionsPaused(markets, actions, paused);
    });
  }

  setPriceOracle(caller: string, oracle: PriceGateway): void {
    this.execute('setPriceOracle', () => {
      this.checkAccess(caller, 'setPriceOracle(address)');
      const previous = this.oracle;
      this.transactions.record(() => {
        this.oracle = previous;
      });
      this.oracle = oracle;
      this.events.emit('NewPriceOracle', { pool: this.address });
    });
  }

  /**
   * Register a distributor built for this pool and initialize it on every listed market
   */
  addRewardsDistributor(caller: string, distributor: RewardsDistributor): void {
    this.execute('addRewardsDistributor', () => {
      this.checkAccess(caller, 'addRewardsDistributor(address)');

      if (distributor.host !== this) {
        throw new ConfigurationError('InvalidInput', `Distributor ${distributor.address} belongs to another pool`, {
          distributor: distributor.address,
        });
      }
      if (this.distributors.some((existing) => sameAddress(existing.address, distributor.address))) {
        throw new ConfigurationError(
          'RewardsDistributorAlreadyAdded',
          `Rewards distributor ${distributor.address} already exists`,
          { distributor: distributor.address }
        );
      }
      this.registry.ensureMaxLoops(this.distributors.length + 1);

      this.transactions.record(() => {
        this.distributors.pop();
      });
      this.distributors.push(distributor);
      for (const market of this.registry.getAllMarkets()) {
        distributor.initializeMarket(market);
      }

      console.log(`[comptroller] Added rewards distributor ${distributor.address} (${this.distributors.length} total)`);
      this.events.emit('NewRewardsDistributor', { distributor: distributor.address });
    });
  }

  // ---------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------

  /**
   * Liquidity against liquidation thresholds; shortfall > 0 means liquidatable
   */
  getAccountLiquidity(account: string): AccountLiquidity {
    return pickLiquidity(this.evaluator.current(account, liquidationThresholdWeight));
  }

  /**
   * Liquidity against collateral factors; what can still be borrowed
   */
  getBorrowingPower(account: string): AccountLiquidity {
    return pickLiquidity(this.evaluator.current(account, collateralFactorWeight));
  }

  getHypotheticalAccountLiquidity(
    account: string,
    market: string,
    redeemTokens: bigint,
    borrowAmount: bigint
  ): AccountLiquidity {
    return pickLiquidity(
      this.evaluator.evaluate(account, collateralFactorWeight, { market, redeemTokens, borrowAmount })
    );
  }

  liquidateCalculateSeizeTokens(debtMarket: string, collateralMarket: string, repayAmount: bigint): bigint {
    return this.coordinator.liquidateCalculateSeizeTokens(debtMarket, collateralMarket, repayAmount);
  }

  getAssetsIn(account: string): string[] {
    return this.memberships.assetsOf(account);
  }

  checkMembership(account: string, market: string): boolean {
    return this.memberships.isMember(account, market);
  }

  getAllMarkets(): string[] {
    return this.registry.getAllMarkets();
  }

  isMarketListed(market: string): boolean {
    return this.registry.isListed(market);
  }

  getLedger(market: string): MarketLedger {
    return this.registry.getLedger(market);
  }

  market(market: string): Readonly<MarketConfig> | null {
    return this.registry.getMarket(market);
  }

  actionPaused(market: string, action: Action): boolean {
    return this.registry.actionPaused(market, action);
  }

  getRewardDistributors(): readonly RewardsDistributor[] {
    return [...this.distributors];
  }

  getStats(): { markets: number; accounts: number; approvers: number; distributors: number } {
    return {
      markets: this.registry.getAllMarkets().length,
      accounts: this.memberships.accountCount(),
      approvers: this.delegates.size,
      distributors: this.distributors.length,
    };
  }

  get priceOracle(): PriceGateway {
    return this.oracle;
  }

  get closeFactor(): bigint {
    return this.registry.closeFactor;
  }

  get liquidationIncentive(): bigint {
    return this.registry.liquidationIncentive;
  }

  get minLiquidatableCollateral(): bigint {
    return this.registry.minLiquidatableCollateral;
  }

  get maxLoopsLimit(): number {
    return this.registry.maxLoopsLimit;
  }

  // ---------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------

  private execute<T>(operation: string, fn: () => T, participants: TransactionParticipant[] = []): T {
    this.metrics.recordOperation(operation);
    try {
      return this.transactions.run(fn, participants);
    } catch (err) {
      // Nested operations rethrow into the outer one, which reports once
      if (isEngineError(err) && !this.transactions.active) {
        this.metrics.recordRejection(err.code);
        console.warn(`[comptroller] ${operation} rejected: ${err.code} (${err.message})`);
      }
      throw err;
    }
  }

  private addToMarket(market: string, account: string): void {
    this.registry.checkActionPauseState(market, 'EnterMarket');
    const marketConfig = this.registry.requireListed(market);
    if (this.memberships.enter(account, marketConfig.address)) {
      this.events.emit('MarketEntered', { market: marketConfig.address, account: account.toLowerCase() });
    }
  }

  /**
   * Redeeming (or transferring) `redeemTokens` must leave no shortfall under collateral factors.
   * Accounts that never entered the market are unconstrained.
   */
  private checkRedeemAllowed(market: string, redeemer: string, redeemTokens: bigint): void {
    const marketConfig = this.registry.requireListed(market);
    if (!this.memberships.isMember(redeemer, marketConfig.address)) {
      return;
    }

    this.evaluator.refreshPrices(redeemer);

    const snapshot = this.evaluator.evaluate(redeemer, collateralFactorWeight, {
      market: marketConfig.address,
      redeemTokens,
      borrowAmount: 0n,
    });
    if (snapshot.shortfall > 0n) {
      throw insufficientLiquidity(redeemer, snapshot);
    }
  }

  private checkAccess(caller: string, operation: string): void {
    if (!this.access.isAllowedToCall(caller, operation)) {
      throw new ConfigurationError('Unauthorized', `${caller} is not allowed to call ${operation}`, {
        caller,
        operation,
      });
    }
  }
}

function pickLiquidity(snapshot: AccountLiquiditySnapshot): AccountLiquidity {
  return { liquidity: snapshot.liquidity, shortfall: snapshot.shortfall };
}

function insufficientLiquidity(account: string, snapshot: AccountLiquiditySnapshot): PolicyError {
  return new PolicyError(
    'InsufficientLiquidity',
    `Account ${account} would be short by ${formatUnits(snapshot.shortfall, 18)}`,
    { account, shortfall: snapshot.shortfall.toString() }
  );
}
