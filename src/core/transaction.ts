// core/transaction.ts: All-or-nothing execution of pool operations

import type { Restore } from '../collaborators/types.js';

/**
 * Collaborator that snapshots itself when an operation involving it starts
 */
export interface TransactionParticipant {
  checkpoint?(): Restore;
}

/**
 * Where state owners register how to undo a write
 */
export interface UndoJournal {
  record(undo: Restore): void;
}

/**
 * TransactionScope: run an operation so that a thrown error undoes every write
 * made since the outermost operation started.
 *
 * State owners call `record` before each write with a callback that puts the
 * previous value back; a rollback replays those callbacks newest first. Only
 * what an operation touches is journaled, so the cost of an operation does not
 * depend on the size of untouched state.
 *
 * Operations invoked while another one is running (a ledger calling back into
 * a hook during a liquidation) join the running transaction. Callbacks queued
 * with `afterCommit` run only once the outermost operation returns.
 */
export class TransactionScope implements UndoJournal {
  private depth = 0;
  private journal: Restore[] = [];
  private pending: Array<() => void> = [];

  get active(): boolean {
    return this.depth > 0;
  }

  /**
   * Writes made outside an operation are not journaled
   */
  record(undo: Restore): void {
    if (this.depth > 0) {
      this.journal.push(undo);
    }
  }

  /**
   * @param participants collaborators snapshotted when this call starts, nested or not
   */
  run<T>(operation: () => T, participants: Iterable<TransactionParticipant> = []): T {
    const outermost = this.depth === 0;
    this.depth++;

    let result: T;
    try {
      for (const participant of participants) {
        const restore = participant.checkpoint?.();
        if (restore) this.journal.push(restore);
      }
      result = operation();
    } catch (err) {
      this.depth--;
      if (outermost) {
        this.rollback();
      }
      throw err;
    }
    this.depth--;

    if (outermost) {
      this.journal = [];
      const committed = this.pending;
      this.pending = [];
      for (const callback of committed) {
        callback();
      }
    }
    return result;
  }

  /**
   * Defer a side effect until the running operation commits (immediate when idle)
   */
  afterCommit(callback: () => void): void {
    if (this.depth === 0) {
      callback();
      return;
    }
    this.pending.push(callback);
  }

  private rollback(): void {
    const undos = this.journal;
    this.journal = [];
    this.pending = [];
    for (let i = undos.length - 1; i >= 0; i--) {
      undos[i]();
    }
  }
}

/**
 * `map.set` that journals the entry it replaces
 */
export function recordedSet<K, V>(journal: UndoJournal, map: Map<K, V>, key: K, value: V): void {
  journal.record(entryRestorer(map, key));
  map.set(key, value);
}

/**
 * `map.delete` that journals the entry it removes
 */
export function recordedDelete<K, V>(journal: UndoJournal, map: Map<K, V>, key: K): boolean {
  if (!map.has(key)) {
    return false;
  }
  journal.record(entryRestorer(map, key));
  return map.delete(key);
}

function entryRestorer<K, V>(map: Map<K, V>, key: K): Restore {
  if (!map.has(key)) {
    return () => {
      map.delete(key);
    };
  }
  const previous = map.get(key);
  return () => {
    if (previous !== undefined) map.set(key, previous);
  };
}
