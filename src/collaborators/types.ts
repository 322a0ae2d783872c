// collaborators/types.ts: Interfaces of the systems the engine calls into but does not own

/**
 * Puts back state captured earlier (a checkpoint or a journaled write)
 */
export type Restore = () => void;

/**
 * Price oracle: USD price of a market's underlying, scaled to 1e18.
 * A price of 0 means the price is unavailable.
 */
export interface PriceGateway {
  getUnderlyingPrice(market: string): bigint;
  /** Best effort; the engine never observes a result */
  updatePrice(market: string): void;
}

export type AccountSnapshotResult =
  | { ok: true; tokenBalance: bigint; debtBalance: bigint; exchangeRate: bigint }
  | { ok: false; code: number };

/**
 * Ledger of a single market (its own token balances, debt and interest).
 * Mutating methods are instructions issued by the engine during heal and
 * account liquidation; the ledger calls back into the pool hooks itself.
 * An in-process ledger joins the pool's transaction by journaling its own
 * writes on `Comptroller.transactions`.
 */
export interface MarketLedger {
  readonly address: string;
  /** Self-identification checked when the market is listed */
  isMarket(): boolean;
  /** Address of the pool (comptroller) that owns this market */
  registry(): string;

  accountSnapshot(account: string): AccountSnapshotResult;
  totalSupply(): bigint;
  totalDebt(): bigint;
  badDebt(): bigint;
  exchangeRate(): bigint;
  borrowIndex(): bigint;

  seize(beneficiary: string, from: string, tokenAmount: bigint): void;
  forceRepayAndWriteOff(payer: string, borrower: string, repayAmount: bigint): void;
  forceLiquidate(
    liquidator: string,
    borrower: string,
    repayAmount: bigint,
    collateralMarket: string,
    skipCloseFactorCheck: boolean
  ): void;
  accrueInterest(): void;
}

/**
 * Permission checks for administrative operations
 */
export interface AccessController {
  isAllowedToCall(account: string, operation: string): boolean;
}

/**
 * Holder of the reward token balance paid out by a distributor.
 * `checkpoint` is taken when a claim or grant starts and restored if it fails.
 */
export interface RewardTokenVault {
  balanceOf(holder: string): bigint;
  transfer(from: string, to: string, amount: bigint): void;
  checkpoint?(): Restore;
}
