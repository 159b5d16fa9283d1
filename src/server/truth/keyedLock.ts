import { LockTimeoutError } from "../errors.js";

export interface LockGuard {
  readonly key: string;
  release(): void;
}

interface Waiter {
  grant(guard: LockGuard): void;
  timer?: NodeJS.Timeout;
}

interface KeyState {
  waiters: Waiter[];
}

export interface KeyedLockOptions {
  /** Bound applied when `acquire` is called without its own timeout. */
  defaultTimeoutMs: number;
}

/**
 * Per-key mutex. At most one guard exists per key; waiters are granted the key
 * in arrival order. Process-local by construction.
 */
export class KeyedLock {
  private readonly held = new Map<string, KeyState>();

  constructor(private readonly options: KeyedLockOptions) {}

  get size(): number {
    return this.held.size;
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  acquire(key: string, timeoutMs = this.options.defaultTimeoutMs): Promise<LockGuard> {
    const state = this.held.get(key);
    if (!state) {
      this.held.set(key, { waiters: [] });
      return Promise.resolve(this.createGuard(key));
    }

    return new Promise<LockGuard>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve };
      if (Number.isFinite(timeoutMs)) {
        waiter.timer = setTimeout(() => {
          const idx = state.waiters.indexOf(waiter);
          if (idx !== -1) state.waiters.splice(idx, 1);
          reject(new LockTimeoutError(key, timeoutMs));
        }, timeoutMs);
      }
      state.waiters.push(waiter);
    });
  }

  async runExclusive<T>(key: string, fn: () => Promise<T> | T, timeoutMs?: number): Promise<T> {
    const guard = await this.acquire(key, timeoutMs);
    try {
      return await fn();
    } finally {
      guard.release();
    }
  }

  private createGuard(key: string): LockGuard {
    let released = false;
    return {
      key,
      release: () => {
        if (released) return;
        released = true;
        this.handOff(key);
      }
    };
  }

  private handOff(key: string) {
    const state = this.held.get(key);
    if (!state) return;
    const next = state.waiters.shift();
    if (!next) {
      this.held.delete(key);
      return;
    }
    if (next.timer) clearTimeout(next.timer);
    next.grant(this.createGuard(key));
  }
}
