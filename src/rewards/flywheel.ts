// rewards/flywheel.ts: Drive every registered distributor on principal-affecting operations

import type { RewardsDistributor } from './RewardsDistributor.js';

export interface Flywheel {
  /** Refresh the supply index of `market`, then distribute to each account */
  supply(market: string, accounts: string[]): void;
  /** Refresh the borrow index of `market`, then distribute to each account */
  borrow(market: string, accounts: string[]): void;
}

/**
 * FlywheelDispatcher: fan a flywheel turn out to every distributor of the pool
 */
export class FlywheelDispatcher implements Flywheel {
  constructor(private readonly distributors: () => readonly RewardsDistributor[]) {}

  supply(market: string, accounts: string[]): void {
    for (const distributor of this.distributors()) {
      distributor.refreshIndex(market, 'supply');
      for (const account of accounts) {
        distributor.distribute(market, 'supply', account);
      }
    }
  }

  borrow(market: string, accounts: string[]): void {
    for (const distributor of this.distributors()) {
      distributor.refreshIndex(market, 'borrow');
      for (const account of accounts) {
        distributor.distribute(market, 'borrow', account);
      }
    }
  }
}
