import { describe, it, expect } from 'vitest';
import { PriceCache, normalizeTo1e18 } from '../src/prices/PriceCache.js';
import { E18, MARKET_A, MARKET_B } from './helpers/fakes.js';

describe('normalizeTo1e18', () => {
  it('should scale 8-decimal answers up', () => {
    // $3000.00000000
    expect(normalizeTo1e18(300000000000n, 8)).toBe(3000n * E18);
  });

  it('should leave 18-decimal answers unchanged', () => {
    expect(normalizeTo1e18(3000n * E18, 18)).toBe(3000n * E18);
  });

  it('should truncate answers with more than 18 decimals', () => {
    expect(normalizeTo1e18(1234567n * 10n ** 14n + 99n, 20)).toBe(1234567n * 10n ** 12n);
  });
});

describe('PriceCache', () => {
  it('should serve a fresh price and expire it after the TTL', () => {
    let now = 1_000_000;
    const cache = new PriceCache({ ttlMs: 8000, now: () => now });
    cache.setPrice(MARKET_A, 2n * E18);

    now += 8000;
    expect(cache.getUnderlyingPrice(MARKET_A)).toBe(2n * E18);

    now += 1;
    expect(cache.getUnderlyingPrice(MARKET_A)).toBe(0n);
    expect(cache.getStats()).toEqual({ entries: 1, hits: 1, misses: 1 });
  });

  it('should read a missing price as unavailable', () => {
    const cache = new PriceCache({ ttlMs: 8000 });
    expect(cache.getUnderlyingPrice(MARKET_B)).toBe(0n);
  });

  it('should pull fresh answers through the refresher', () => {
    const answers = new Map<string, bigint>([[MARKET_A, 150000000n]]);
    const cache = new PriceCache({
      ttlMs: 8000,
      refresher: (market) => {
        const answer = answers.get(market);
        return answer === undefined ? null : { answer, decimals: 8 };
      },
    });

    cache.updatePrice(MARKET_A);
    cache.updatePrice(MARKET_B);

    expect(cache.getUnderlyingPrice(MARKET_A)).toBe(15n * 10n ** 17n);
    expect(cache.getUnderlyingPrice(MARKET_B)).toBe(0n);
  });

  it('should keep the previous entry when the refresher returns a non-positive answer', () => {
    const cache = new PriceCache({ ttlMs: 8000, refresher: () => ({ answer: 0n, decimals: 8 }) });
    cache.setPrice(MARKET_A, E18);

    cache.updatePrice(MARKET_A);

    expect(cache.getUnderlyingPrice(MARKET_A)).toBe(E18);
  });

  it('should drop every entry on clear', () => {
    const cache = new PriceCache({ ttlMs: 8000 });
    cache.setPriceWithDecimals(MARKET_A, 100000000n, 8);
    cache.clear();

    expect(cache.getUnderlyingPrice(MARKET_A)).toBe(0n);
  });
});
