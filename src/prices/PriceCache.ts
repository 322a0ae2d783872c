// prices/PriceCache.ts: In-memory 1e18 price cache implementing the pool's PriceGateway

import type { PriceGateway } from '../collaborators/types.js';
import { config } from '../config/index.js';
import { ConfigurationError } from '../core/errors.js';

const MISS_WARN_COOLDOWN_MS = 15_000;

/**
 * Synchronous price source consulted by `updatePrice`; returns the raw answer
 * and its decimals, or null when nothing is available
 */
export type PriceRefresher = (market: string) => { answer: bigint; decimals: number } | null;

export interface PriceCacheOptions {
  ttlMs?: number;
  refresher?: PriceRefresher;
  now?: () => number;
}

/**
 * Normalize a raw feed answer to 1e18
 */
export function normalizeTo1e18(answer: bigint, decimals: number): bigint {
  if (decimals === 18) {
    return answer;
  }
  if (decimals < 18) {
    return answer * 10n ** BigInt(18 - decimals);
  }
  return answer / 10n ** BigInt(decimals - 18);
}

/**
 * PriceCache: prices pushed by a feed listener (or pulled through the refresher)
 * are served until they are older than the TTL. A stale or missing entry reads as 0,
 * which the engine treats as "price unavailable".
 */
export class PriceCache implements PriceGateway {
  private readonly entries = new Map<string, { price: bigint; timestamp: number }>();
  private readonly lastMissWarnAt = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly refresher?: PriceRefresher;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: PriceCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? config.PRICE_CACHE_TTL_MS;
    this.refresher = options.refresher;
    this.now = options.now ?? Date.now;
  }

  setPrice(market: string, price1e18: bigint): void {
    if (price1e18 < 0n) {
      throw new ConfigurationError('InvalidInput', `Negative price for ${market}`, { market });
    }
    this.entries.set(market.toLowerCase(), { price: price1e18, timestamp: this.now() });
  }

  setPriceWithDecimals(market: string, answer: bigint, decimals: number): void {
    this.setPrice(market, normalizeTo1e18(answer, decimals));
  }

  getUnderlyingPrice(market: string): bigint {
    const normalizedMarket = market.toLowerCase();
    const cached = this.entries.get(normalizedMarket);

    if (!cached || this.now() - cached.timestamp > this.ttlMs) {
      this.misses++;
      this.warnOncePerMarket(normalizedMarket, cached ? 'stale' : 'missing');
      return 0n;
    }

    this.hits++;
    return cached.price;
  }

  updatePrice(market: string): void {
    if (!this.refresher) return;

    const fresh = this.refresher(market.toLowerCase());
    if (!fresh || fresh.answer <= 0n) {
      // Keep the previous entry; it expires on its own
      return;
    }
    this.setPriceWithDecimals(market, fresh.answer, fresh.decimals);
  }

  getStats(): { entries: number; hits: number; misses: number } {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }

  clear(): void {
    this.entries.clear();
    this.lastMissWarnAt.clear();
  }

  private warnOncePerMarket(market: string, context: string): void {
    const now = this.now();
    const lastWarn = this.lastMissWarnAt.get(market);
    if (lastWarn === undefined || now - lastWarn > MISS_WARN_COOLDOWN_MS) {
      console.warn(`[prices] Cache miss for ${market} (${context})`);
      this.lastMissWarnAt.set(market, now);
    }
  }
}
