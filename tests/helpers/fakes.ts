// tests/helpers/fakes.ts: In-process stand-ins for the pool's collaborators

import type {
  AccessController,
  AccountSnapshotResult,
  MarketLedger,
  PriceGateway,
  Restore,
  RewardTokenVault,
} from '../../src/collaborators/types.js';
import { Comptroller } from '../../src/comptroller/Comptroller.js';
import { recordedSet } from '../../src/core/transaction.js';

export const E18 = 10n ** 18n;

export const ADMIN = '0x9999999999999999999999999999999999999999';
export const POOL = '0x7777777777777777777777777777777777777777';
export const OTHER_POOL = '0x7777777777777777777777777777777777777778';
export const ALICE = '0x1111111111111111111111111111111111111111';
export const BOB = '0x2222222222222222222222222222222222222222';
export const CAROL = '0x3333333333333333333333333333333333333333';
export const MARKET_A = '0x5555555555555555555555555555555555555551';
export const MARKET_B = '0x5555555555555555555555555555555555555552';
export const MARKET_C = '0x5555555555555555555555555555555555555553';
export const DISTRIBUTOR = '0x4444444444444444444444444444444444444441';

export class FakeOracle implements PriceGateway {
  private prices = new Map<string, bigint>();
  readonly updates: string[] = [];

  setPrice(market: string, price: bigint): void {
    this.prices.set(market.toLowerCase(), price);
  }

  getUnderlyingPrice(market: string): bigint {
    return this.prices.get(market.toLowerCase()) ?? 0n;
  }

  updatePrice(market: string): void {
    this.updates.push(market.toLowerCase());
  }
}

export const allowAll: AccessController = {
  isAllowedToCall: () => true,
};

export function allowOnly(admin: string): AccessController {
  return {
    isAllowedToCall: (account) => account.toLowerCase() === admin.toLowerCase(),
  };
}

export class FakeVault implements RewardTokenVault {
  private balances = new Map<string, bigint>();

  fund(holder: string, amount: bigint): void {
    this.balances.set(holder.toLowerCase(), this.balanceOf(holder) + amount);
  }

  balanceOf(holder: string): bigint {
    return this.balances.get(holder.toLowerCase()) ?? 0n;
  }

  transfer(from: string, to: string, amount: bigint): void {
    const available = this.balanceOf(from);
    if (available < amount) {
      throw new Error(`Vault transfer of ${amount} exceeds balance ${available}`);
    }
    this.balances.set(from.toLowerCase(), available - amount);
    this.balances.set(to.toLowerCase(), this.balanceOf(to) + amount);
  }

  checkpoint(): Restore {
    const saved = new Map(this.balances);
    return () => {
      this.balances = saved;
    };
  }
}

interface LedgerTotals {
  totalSupply: bigint;
  totalDebt: bigint;
  badDebt: bigint;
  exchangeRate: bigint;
  borrowIndex: bigint;
}

/**
 * Market ledger that calls back into the pool hooks the way a real market does.
 * Its writes are journaled on the pool's transaction, so a rejected pool
 * operation undoes them too.
 */
export class FakeLedger implements MarketLedger {
  readonly address: string;
  registryAddress: string;
  identifiesAsMarket = true;
  accrueCalls = 0;
  private readonly tokens = new Map<string, bigint>();
  private readonly debts = new Map<string, bigint>();
  private readonly failing = new Set<string>();
  private readonly totals: LedgerTotals = {
    totalSupply: 0n,
    totalDebt: 0n,
    badDebt: 0n,
    exchangeRate: E18,
    borrowIndex: E18,
  };

  constructor(
    address: string,
    private readonly pool: Comptroller,
    private readonly peers: Map<string, FakeLedger>
  ) {
    this.address = address.toLowerCase();
    this.registryAddress = pool.address;
    peers.set(this.address, this);
  }

  // --- direct state setup (bypasses hooks) ---

  setTokens(account: string, amount: bigint): void {
    const previous = this.tokensOf(account);
    recordedSet(this.pool.transactions, this.tokens, account.toLowerCase(), amount);
    this.setTotal('totalSupply', this.totals.totalSupply + amount - previous);
  }

  setDebt(account: string, amount: bigint): void {
    const previous = this.debtOf(account);
    recordedSet(this.pool.transactions, this.debts, account.toLowerCase(), amount);
    this.setTotal('totalDebt', this.totals.totalDebt + amount - previous);
  }

  setTotals(totals: { totalSupply?: bigint; totalDebt?: bigint; badDebt?: bigint }): void {
    this.setTotal('totalSupply', totals.totalSupply ?? this.totals.totalSupply);
    this.setTotal('totalDebt', totals.totalDebt ?? this.totals.totalDebt);
    this.setTotal('badDebt', totals.badDebt ?? this.totals.badDebt);
  }

  setExchangeRate(rate: bigint): void {
    this.setTotal('exchangeRate', rate);
  }

  setBorrowIndex(index: bigint): void {
    this.setTotal('borrowIndex', index);
  }

  failSnapshotFor(account: string): void {
    this.failing.add(account.toLowerCase());
  }

  tokensOf(account: string): bigint {
    return this.tokens.get(account.toLowerCase()) ?? 0n;
  }

  debtOf(account: string): bigint {
    return this.debts.get(account.toLowerCase()) ?? 0n;
  }

  // --- user operations (run the matching hook first) ---

  mint(minter: string, amount: bigint): void {
    this.pool.preMintHook(this.address, minter, amount);
    this.setTokens(minter, this.tokensOf(minter) + (amount * E18) / this.totals.exchangeRate);
  }

  redeem(redeemer: string, tokens: bigint): void {
    this.pool.preRedeemHook(this.address, redeemer, tokens);
    this.setTokens(redeemer, this.tokensOf(redeemer) - tokens);
  }

  borrow(borrower: string, amount: bigint): void {
    this.pool.preBorrowHook(this.address, borrower, amount);
    this.setDebt(borrower, this.debtOf(borrower) + amount);
  }

  repay(borrower: string, amount: bigint): void {
    this.pool.preRepayHook(this.address, borrower);
    this.setDebt(borrower, this.debtOf(borrower) - amount);
  }

  transfer(src: string, dst: string, tokens: bigint): void {
    this.pool.preTransferHook(this.address, src, dst, tokens);
    this.setTokens(src, this.tokensOf(src) - tokens);
    this.setTokens(dst, this.tokensOf(dst) + tokens);
  }

  // --- MarketLedger ---

  isMarket(): boolean {
    return this.identifiesAsMarket;
  }

  registry(): string {
    return this.registryAddress;
  }

  accountSnapshot(account: string): AccountSnapshotResult {
    if (this.failing.has(account.toLowerCase())) {
      return { ok: false, code: 3 };
    }
    return {
      ok: true,
      tokenBalance: this.tokensOf(account),
      debtBalance: this.debtOf(account),
      exchangeRate: this.totals.exchangeRate,
    };
  }

  totalSupply(): bigint {
    return this.totals.totalSupply;
  }

  totalDebt(): bigint {
    return this.totals.totalDebt;
  }

  badDebt(): bigint {
    return this.totals.badDebt;
  }

  exchangeRate(): bigint {
    return this.totals.exchangeRate;
  }

  borrowIndex(): bigint {
    return this.totals.borrowIndex;
  }

  /**
   * Seize on behalf of the pool (heal path)
   */
  seize(beneficiary: string, from: string, tokenAmount: bigint): void {
    this.seizeFor(this.pool.address, beneficiary, from, tokenAmount);
  }

  forceRepayAndWriteOff(_payer: string, borrower: string, repayAmount: bigint): void {
    const debt = this.debtOf(borrower);
    this.setDebt(borrower, 0n);
    this.setTotal('badDebt', this.totals.badDebt + debt - repayAmount);
  }

  forceLiquidate(
    liquidator: string,
    borrower: string,
    repayAmount: bigint,
    collateralMarket: string,
    skipCloseFactorCheck: boolean
  ): void {
    this.pool.preLiquidateHook(this.address, collateralMarket, borrower, repayAmount, skipCloseFactorCheck);
    this.repay(borrower, repayAmount);

    const seizeTokens = this.pool.liquidateCalculateSeizeTokens(this.address, collateralMarket, repayAmount);
    const collateral = this.peers.get(collateralMarket.toLowerCase());
    if (!collateral) {
      throw new Error(`Unknown collateral market ${collateralMarket}`);
    }
    collateral.seizeFor(this.address, liquidator, borrower, seizeTokens);
  }

  accrueInterest(): void {
    this.accrueCalls++;
  }

  seizeFor(seizer: string, liquidator: string, borrower: string, tokens: bigint): void {
    this.pool.preSeizeHook(this.address, seizer, liquidator, borrower);
    this.setTokens(borrower, this.tokensOf(borrower) - tokens);
    this.setTokens(liquidator, this.tokensOf(liquidator) + tokens);
  }

  private setTotal<K extends keyof LedgerTotals>(key: K, value: LedgerTotals[K]): void {
    const old = this.totals[key];
    this.pool.transactions.record(() => {
      this.totals[key] = old;
    });
    this.totals[key] = value;
  }
}

export interface TestPool {
  pool: Comptroller;
  oracle: FakeOracle;
  ledgers: Map<string, FakeLedger>;
  /** Create, list and price a market; optionally set CF/LT and lift caps */
  addMarket(address: string, options?: { price?: bigint; collateralFactor?: bigint; liquidationThreshold?: bigint }): FakeLedger;
}

export function createTestPool(options: { access?: AccessController; minLiquidatableCollateral?: bigint } = {}): TestPool {
  const oracle = new FakeOracle();
  const pool = new Comptroller({
    address: POOL,
    oracle,
    access: options.access ?? allowAll,
    closeFactor: 5n * 10n ** 17n,
    liquidationIncentive: 11n * 10n ** 17n,
    minLiquidatableCollateral: options.minLiquidatableCollateral ?? 100n * E18,
    maxLoopsLimit: 16,
    logEvents: false,
  });
  const ledgers = new Map<string, FakeLedger>();

  return {
    pool,
    oracle,
    ledgers,
    addMarket(address, marketOptions = {}) {
      const ledger = new FakeLedger(address, pool, ledgers);
      oracle.setPrice(address, marketOptions.price ?? E18);
      pool.supportMarket(ADMIN, ledger);
      if (marketOptions.collateralFactor !== undefined) {
        pool.setCollateralFactor(
          ADMIN,
          address,
          marketOptions.collateralFactor,
          marketOptions.liquidationThreshold ?? marketOptions.collateralFactor
        );
      }
      return ledger;
    },
  };
}
