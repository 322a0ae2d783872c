// registry/AccountMemberships.ts: Markets each account uses as collateral
// Maps account (lowercase) to an insertion-ordered Set<market (lowercase)>

import type { UndoJournal } from '../core/transaction.js';

/**
 * AccountMemberships: one insertion-ordered set per account.
 *
 * The set is both the membership flag and the iteration order used by the
 * liquidity evaluation, so the two can never disagree. Removal keeps the
 * relative order of the remaining markets. Each write journals the account's
 * previous set, so an aborted operation restores it, order included.
 */
export class AccountMemberships {
  private readonly accountToMarkets: Map<string, Set<string>> = new Map();

  constructor(private readonly journal: UndoJournal) {}

  /**
   * @returns false when the account was already a member
   */
  enter(account: string, market: string): boolean {
    const normalizedAccount = account.toLowerCase();
    const normalizedMarket = market.toLowerCase();

    const markets = this.accountToMarkets.get(normalizedAccount);
    if (markets?.has(normalizedMarket)) {
      return false;
    }
    this.saveAccount(normalizedAccount);
    if (markets) {
      markets.add(normalizedMarket);
    } else {
      this.accountToMarkets.set(normalizedAccount, new Set([normalizedMarket]));
    }
    return true;
  }

  /**
   * @returns false when the account was not a member
   */
  exit(account: string, market: string): boolean {
    const normalizedAccount = account.toLowerCase();
    const normalizedMarket = market.toLowerCase();
    const markets = this.accountToMarkets.get(normalizedAccount);
    if (!markets || !markets.has(normalizedMarket)) {
      return false;
    }
    this.saveAccount(normalizedAccount);
    markets.delete(normalizedMarket);
    // Clean up empty sets
    if (markets.size === 0) {
      this.accountToMarkets.delete(normalizedAccount);
    }
    return true;
  }

  isMember(account: string, market: string): boolean {
    return this.accountToMarkets.get(account.toLowerCase())?.has(market.toLowerCase()) === true;
  }

  /**
   * Entered markets in the order they were entered
   */
  assetsOf(account: string): string[] {
    const markets = this.accountToMarkets.get(account.toLowerCase());
    return markets ? [...markets] : [];
  }

  count(account: string): number {
    return this.accountToMarkets.get(account.toLowerCase())?.size ?? 0;
  }

  /**
   * Accounts with at least one entered market
   */
  accountCount(): number {
    return this.accountToMarkets.size;
  }

  private saveAccount(account: string): void {
    const previous = this.accountToMarkets.get(account);
    const saved = previous ? [...previous] : null;
    this.journal.record(() => {
      if (saved) {
        this.accountToMarkets.set(account, new Set(saved));
      } else {
        this.accountToMarkets.delete(account);
      }
    });
  }
}
