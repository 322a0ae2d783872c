// rewards/SlotSource.ts: Monotonic clocks for reward accrual (block numbers or unix seconds)

import { ConfigurationError } from '../core/errors.js';

export type SlotKind = 'block' | 'timestamp';

/**
 * Opaque, monotonically increasing counter the accrual math is written against
 */
export interface SlotSource {
  readonly kind: SlotKind;
  current(): bigint;
}

/**
 * ManualSlotSource: advanced explicitly (simulations, tests, replay)
 */
export class ManualSlotSource implements SlotSource {
  constructor(
    private slot: bigint = 0n,
    readonly kind: SlotKind = 'block'
  ) {}

  current(): bigint {
    return this.slot;
  }

  set(slot: bigint): void {
    if (slot < this.slot) {
      throw new ConfigurationError('InvalidInput', `Slot cannot move backwards (${this.slot} → ${slot})`);
    }
    this.slot = slot;
  }

  advance(by: bigint = 1n): bigint {
    this.set(this.slot + by);
    return this.slot;
  }
}

/**
 * WallClockSlotSource: unix seconds
 */
export class WallClockSlotSource implements SlotSource {
  readonly kind = 'timestamp';

  constructor(private readonly nowMs: () => number = Date.now) {}

  current(): bigint {
    return BigInt(Math.floor(this.nowMs() / 1000));
  }
}

/**
 * Subset of an ethers Provider used to follow new blocks
 */
export interface BlockEventSource {
  on(event: 'block', listener: (blockNumber: number) => void): Promise<unknown>;
  off(event: 'block', listener: (blockNumber: number) => void): Promise<unknown>;
}

/**
 * BlockSlotSource: latest block number seen on a provider's `block` subscription
 */
export class BlockSlotSource implements SlotSource {
  readonly kind = 'block';
  private latest: bigint;
  private subscribed = false;

  constructor(
    private readonly provider: BlockEventSource,
    initialBlock: number
  ) {
    this.latest = BigInt(initialBlock);
  }

  private readonly onBlock = (blockNumber: number): void => {
    const next = BigInt(blockNumber);
    // Reorgs and out-of-order deliveries never move the clock backwards
    if (next > this.latest) {
      this.latest = next;
    }
  };

  current(): bigint {
    return this.latest;
  }

  start(): void {
    if (this.subscribed) return;
    this.subscribed = true;
    this.provider.on('block', this.onBlock).catch((err: unknown) => {
      this.subscribed = false;
      console.warn('[slots] Failed to subscribe to blocks:', err instanceof Error ? err.message : err);
    });
  }

  async stop(): Promise<void> {
    if (!this.subscribed) return;
    this.subscribed = false;
    await this.provider.off('block', this.onBlock);
  }
}
