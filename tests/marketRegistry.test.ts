import { describe, it, expect } from 'vitest';
import type { EngineEventMap } from '../src/core/events.js';
import { MAX_UINT256 } from '../src/core/fixedPoint.js';
import {
  ADMIN,
  ALICE,
  E18,
  FakeLedger,
  MARKET_A,
  MARKET_B,
  MARKET_C,
  allowOnly,
  createTestPool,
} from './helpers/fakes.js';
import { captureError } from './helpers/errors.js';

describe('Market listing', () => {
  it('should list a market with zero factors and zero caps', () => {
    const { pool, addMarket } = createTestPool();
    addMarket(MARKET_A);

    expect(pool.isMarketListed(MARKET_A)).toBe(true);
    expect(pool.getAllMarkets()).toEqual([MARKET_A]);

    const market = pool.market(MARKET_A);
    expect(market?.collateralFactor).toBe(0n);
    expect(market?.liquidationThreshold).toBe(0n);
    expect(market?.supplyCap).toBe(0n);
    expect(market?.borrowCap).toBe(0n);
  });

  it('should reject listing the same market twice', () => {
    const { pool, ledgers, addMarket } = createTestPool();
    addMarket(MARKET_A);
    const ledger = ledgers.get(MARKET_A);
    if (!ledger) throw new Error('ledger missing');

    expect(captureError(() => pool.supportMarket(ADMIN, ledger)).code).toBe('MarketAlreadyListed');
    expect(pool.getAllMarkets()).toEqual([MARKET_A]);
  });

  it('should reject a ledger that does not identify as a market', () => {
    const { pool, ledgers } = createTestPool();
    const ledger = new FakeLedger(MARKET_A, pool, ledgers);
    ledger.identifiesAsMarket = false;

    expect(captureError(() => pool.supportMarket(ADMIN, ledger)).code).toBe('InvalidMarket');
    expect(pool.isMarketListed(MARKET_A)).toBe(false);
  });

  it('should require the access controller to allow the caller', () => {
    const { pool, ledgers } = createTestPool({ access: allowOnly(ADMIN) });
    const ledger = new FakeLedger(MARKET_A, pool, ledgers);

    const err = captureError(() => pool.supportMarket(ALICE, ledger));
    expect(err.code).toBe('Unauthorized');
    expect(err.kind).toBe('configuration');
  });
});

describe('Collateral factor and liquidation threshold', () => {
  it('should reject a collateral factor above 0.9', () => {
    const { pool, addMarket } = createTestPool();
    addMarket(MARKET_A);

    const err = captureError(() => pool.setCollateralFactor(ADMIN, MARKET_A, 95n * 10n ** 16n, E18));
    expect(err.code).toBe('InvalidCollateralFactor');
  });

  it('should reject a threshold below the factor or above 1.0', () => {
    const { pool, addMarket } = createTestPool();
    addMarket(MARKET_A);

    expect(captureError(() => pool.setCollateralFactor(ADMIN, MARKET_A, 8n * 10n ** 17n, 7n * 10n ** 17n)).code).toBe(
      'InvalidLiquidationThreshold'
    );
    expect(captureError(() => pool.setCollateralFactor(ADMIN, MARKET_A, 8n * 10n ** 17n, E18 + 1n)).code).toBe(
      'InvalidLiquidationThreshold'
    );
  });

  it('should leave state unchanged after a rejected update', () => {
    const { pool, addMarket } = createTestPool();
    addMarket(MARKET_A, { collateralFactor: 5n * 10n ** 17n, liquidationThreshold: 6n * 10n ** 17n });

    captureError(() => pool.setCollateralFactor(ADMIN, MARKET_A, 7n * 10n ** 17n, 6n * 10n ** 17n));

    expect(pool.market(MARKET_A)?.collateralFactor).toBe(5n * 10n ** 17n);
    expect(pool.market(MARKET_A)?.liquidationThreshold).toBe(6n * 10n ** 17n);
  });

  it('should reject a nonzero factor when the price is unavailable', () => {
    const { pool, oracle, addMarket } = createTestPool();
    addMarket(MARKET_A);
    oracle.setPrice(MARKET_A, 0n);

    const err = captureError(() => pool.setCollateralFactor(ADMIN, MARKET_A, 5n * 10n ** 17n, 5n * 10n ** 17n));
    expect(err.code).toBe('PriceError');
    expect(err.kind).toBe('collaborator');

    // A zero factor needs no price
    pool.setCollateralFactor(ADMIN, MARKET_A, 0n, 5n * 10n ** 17n);
    expect(pool.market(MARKET_A)?.liquidationThreshold).toBe(5n * 10n ** 17n);
  });

  it('should reject an unlisted market', () => {
    const { pool } = createTestPool();
    expect(captureError(() => pool.setCollateralFactor(ADMIN, MARKET_A, 0n, 0n)).code).toBe('MarketNotListed');
  });

  it('should emit factor events after commit', () => {
    const { pool, addMarket } = createTestPool();
    addMarket(MARKET_A);
    const seen: Array<EngineEventMap['NewCollateralFactor']> = [];
    pool.events.on('NewCollateralFactor', (payload) => seen.push(payload));

    pool.setCollateralFactor(ADMIN, MARKET_A, 5n * 10n ** 17n, 6n * 10n ** 17n);

    expect(seen).toEqual([{ market: MARKET_A, oldCollateralFactor: 0n, newCollateralFactor: 5n * 10n ** 17n }]);
  });
});

describe('Pool-wide parameters', () => {
  it('should bound the close factor to [0.05, 0.9]', () => {
    const { pool } = createTestPool();
    expect(captureError(() => pool.setCloseFactor(ADMIN, 4n * 10n ** 16n)).code).toBe('InvalidCloseFactor');
    expect(captureError(() => pool.setCloseFactor(ADMIN, 91n * 10n ** 16n)).code).toBe('InvalidCloseFactor');

    pool.setCloseFactor(ADMIN, 9n * 10n ** 17n);
    expect(pool.closeFactor).toBe(9n * 10n ** 17n);
  });

  it('should require a liquidation incentive of at least 1.0', () => {
    const { pool } = createTestPool();
    expect(captureError(() => pool.setLiquidationIncentive(ADMIN, E18 - 1n)).code).toBe('InvalidLiquidationIncentive');

    pool.setLiquidationIncentive(ADMIN, E18);
    expect(pool.liquidationIncentive).toBe(E18);
  });

  it('should only raise the loop limit', () => {
    const { pool } = createTestPool();
    expect(captureError(() => pool.setMaxLoopsLimit(ADMIN, 16)).code).toBe('InvalidMaxLoopsLimit');
    expect(captureError(() => pool.setMaxLoopsLimit(ADMIN, 10)).code).toBe('InvalidMaxLoopsLimit');

    pool.setMaxLoopsLimit(ADMIN, 20);
    expect(pool.maxLoopsLimit).toBe(20);
  });

  it('should replace the price oracle', () => {
    const { pool } = createTestPool();
    const replacement = { getUnderlyingPrice: () => 7n, updatePrice: () => undefined };

    pool.setPriceOracle(ADMIN, replacement);
    expect(pool.priceOracle).toBe(replacement);
  });
});

describe('Caps and pauses', () => {
  it('should set caps, including the unlimited sentinel', () => {
    const { pool, addMarket } = createTestPool();
    addMarket(MARKET_A);
    addMarket(MARKET_B);

    pool.setMarketSupplyCaps(ADMIN, [MARKET_A, MARKET_B], [1000n * E18, MAX_UINT256]);
    pool.setMarketBorrowCaps(ADMIN, [MARKET_A], [500n * E18]);

    expect(pool.market(MARKET_A)?.supplyCap).toBe(1000n * E18);
    expect(pool.market(MARKET_B)?.supplyCap).toBe(MAX_UINT256);
    expect(pool.market(MARKET_A)?.borrowCap).toBe(500n * E18);
  });

  it('should reject mismatched or empty cap arrays', () => {
    const { pool, addMarket } = createTestPool();
    addMarket(MARKET_A);

    expect(captureError(() => pool.setMarketSupplyCaps(ADMIN, [MARKET_A], [1n, 2n])).code).toBe('InvalidInput');
    expect(captureError(() => pool.setMarketBorrowCaps(ADMIN, [], [])).code).toBe('InvalidInput');
  });

  it('should enforce the loop limit on bulk setters', () => {
    const { pool, addMarket } = createTestPool();
    addMarket(MARKET_A);
    const markets = Array.from({ length: 17 }, () => MARKET_A);
    const caps = Array.from({ length: 17 }, () => 1n);

    expect(captureError(() => pool.setMarketSupplyCaps(ADMIN, markets, caps)).code).toBe('MaxLoopsLimitExceeded');
  });

  it('should pause and unpause actions', () => {
    const { pool, addMarket } = createTestPool();
    addMarket(MARKET_A);

    pool.setActionsPaused(ADMIN, [MARKET_A], ['Mint', 'Borrow'], true);
    expect(pool.actionPaused(MARKET_A, 'Mint')).toBe(true);
    expect(pool.actionPaused(MARKET_A, 'Borrow')).toBe(true);
    expect(pool.actionPaused(MARKET_A, 'Redeem')).toBe(false);

    pool.setActionsPaused(ADMIN, [MARKET_A], ['Mint'], false);
    expect(pool.actionPaused(MARKET_A, 'Mint')).toBe(false);
  });

  it('should not pause anything when one market is unlisted', () => {
    const { pool, addMarket } = createTestPool();
    addMarket(MARKET_A);

    expect(captureError(() => pool.setActionsPaused(ADMIN, [MARKET_A, MARKET_C], ['Mint'], true)).code).toBe(
      'MarketNotListed'
    );
    expect(pool.actionPaused(MARKET_A, 'Mint')).toBe(false);
  });
});
