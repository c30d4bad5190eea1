import { concurrencyConflict } from '../../../lib/errors';

type Waiter = {
  owner: symbol;
  resolve: () => void;
  timer: ReturnType<typeof setTimeout> | null;
};

type LockState = {
  owner: symbol;
  waiters: Waiter[];
};

/**
 * Exclusive per-key locks owned by a transaction token. Re-acquiring a key the owner already
 * holds is a no-op; waiters are served in arrival order and give up after `timeoutMs`.
 * A `timeoutMs` of 0 waits indefinitely, as Postgres does with `lock_timeout = 0`.
 */
export class KeyedLock {
  private readonly held = new Map<string, LockState>();

  async acquire(key: string, owner: symbol, timeoutMs: number): Promise<void> {
    const state = this.held.get(key);
    if (!state) {
      this.held.set(key, { owner, waiters: [] });
      return;
    }
    if (state.owner === owner) return;

    await new Promise<void>((resolve, reject) => {
      const timer =
        timeoutMs > 0
          ? setTimeout(() => {
              const index = state.waiters.indexOf(waiter);
              if (index >= 0) state.waiters.splice(index, 1);
              reject(concurrencyConflict('lock_timeout'));
            }, timeoutMs)
          : null;
      const waiter: Waiter = { owner, resolve, timer };
      state.waiters.push(waiter);
    });
  }

  release(key: string, owner: symbol) {
    const state = this.held.get(key);
    if (!state || state.owner !== owner) return;
    const next = state.waiters.shift();
    if (!next) {
      this.held.delete(key);
      return;
    }
    if (next.timer) clearTimeout(next.timer);
    state.owner = next.owner;
    next.resolve();
  }

  isHeld(key: string) {
    return this.held.has(key);
  }
}
