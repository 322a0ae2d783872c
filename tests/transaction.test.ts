import { describe, it, expect } from 'vitest';
import { EngineEvents } from '../src/core/events.js';
import { TransactionScope, recordedDelete, recordedSet } from '../src/core/transaction.js';

class Counter {
  value = 0;

  checkpoint(): () => void {
    const saved = this.value;
    return () => {
      this.value = saved;
    };
  }
}

describe('TransactionScope', () => {
  it('should undo journaled writes newest first when the outermost operation throws', () => {
    const scope = new TransactionScope();
    const balances = new Map<string, bigint>([['alice', 1n]]);

    expect(() =>
      scope.run(() => {
        recordedSet(scope, balances, 'alice', 2n);
        scope.run(() => {
          recordedSet(scope, balances, 'alice', 3n);
          recordedSet(scope, balances, 'bob', 4n);
        });
        recordedDelete(scope, balances, 'alice');
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect([...balances]).toEqual([['alice', 1n]]);
    expect(scope.active).toBe(false);
  });

  it('should roll back the whole transaction when a nested operation throws', () => {
    const scope = new TransactionScope();
    const balances = new Map<string, bigint>();

    expect(() =>
      scope.run(() => {
        recordedSet(scope, balances, 'alice', 5n);
        scope.run(() => {
          throw new Error('nested');
        });
      })
    ).toThrow('nested');

    expect(balances.size).toBe(0);
  });

  it('should restore participants snapshotted by a nested call', () => {
    const scope = new TransactionScope();
    const counter = new Counter();

    expect(() =>
      scope.run(() => {
        scope.run(() => {
          counter.value = 7;
        }, [counter]);
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(counter.value).toBe(0);
  });

  it('should keep committed writes and ignore writes made outside an operation', () => {
    const scope = new TransactionScope();
    const balances = new Map<string, bigint>();
    recordedSet(scope, balances, 'setup', 1n);

    const result = scope.run(() => {
      recordedSet(scope, balances, 'alice', 2n);
      return 42;
    });
    expect(result).toBe(42);
    expect(() =>
      scope.run(() => {
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect([...balances]).toEqual([
      ['setup', 1n],
      ['alice', 2n],
    ]);
  });
});

describe('EngineEvents', () => {
  it('should deliver events only after the operation commits', () => {
    const scope = new TransactionScope();
    const events = new EngineEvents(scope);
    const delivered: string[] = [];
    events.on('MarketSupported', ({ market }) => delivered.push(market));

    scope.run(() => {
      events.emit('MarketSupported', { market: 'first' });
      expect(delivered).toEqual([]);
    });
    expect(delivered).toEqual(['first']);

    expect(() =>
      scope.run(() => {
        events.emit('MarketSupported', { market: 'dropped' });
        throw new Error('abort');
      })
    ).toThrow('abort');
    expect(delivered).toEqual(['first']);
  });

  it('should stop delivering after unsubscribe', () => {
    const scope = new TransactionScope();
    const events = new EngineEvents(scope);
    const delivered: string[] = [];
    const unsubscribe = events.on('MarketSupported', ({ market }) => delivered.push(market));

    events.emit('MarketSupported', { market: 'kept' });
    unsubscribe();
    events.emit('MarketSupported', { market: 'ignored' });

    expect(delivered).toEqual(['kept']);
  });
});
