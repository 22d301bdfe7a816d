import { AsyncLocalStorage } from "node:async_hooks";

import { fail, ok, type TraceResult } from "./errors.js";

type Hold = {
  token: symbol;
  release: () => void;
};

/** Handle for a hold taken with `TraceLock.lock()`. */
export type LockHold = {
  /** False when `lock()` ran inside a hold its caller already had. */
  readonly owned: boolean;
  isActive: () => boolean;
  /** Runs `fn` as the holder; work started inside skips the queue. */
  run: <T>(fn: () => Promise<T> | T) => Promise<T>;
  /** Releases an owned hold; `value` is false when nothing was released. */
  unlock: () => TraceResult<boolean>;
};

/**
 * Advisory print lock: one promise-chain mutex plus the identity of its holder.
 *
 * The holder identity lives in AsyncLocalStorage and is only ever bound with
 * `run`, so it covers the callback handed to `withLock` or `LockHold.run` and
 * nothing the caller starts beside it. Everyone else queues, in call order, for
 * as long as the hold lasts. A `lock()` that is never unlocked starves every
 * other printer.
 */
export class TraceLock {
  private tail: Promise<void> = Promise.resolve();
  private hold: Hold | null = null;
  private readonly owners = new AsyncLocalStorage<symbol>();

  isHeld(): boolean {
    return this.hold !== null;
  }

  isHeldByCurrent(): boolean {
    const token = this.owners.getStore();
    return token !== undefined && this.hold?.token === token;
  }

  /**
   * Waits for the mutex and returns the hold. Inside a hold the caller already
   * has, resolves at once to a handle that does not own it.
   */
  async lock(): Promise<LockHold> {
    const current = this.currentToken();
    if (current !== undefined) return this.createHold(current, false);
    const token = Symbol("trace-lock-owner");
    await this.acquire(token);
    return this.createHold(token, true);
  }

  /**
   * Releases the hold the calling context runs under (inside `withLock` or
   * `LockHold.run`). `value` is true when a hold was released.
   */
  unlock(): TraceResult<boolean> {
    const hold = this.hold;
    if (!hold) return ok(false);
    if (this.owners.getStore() !== hold.token) {
      return fail("LOCK_NOT_OWNED", "Trace lock is held by another caller");
    }
    this.releaseIfOwner(hold.token);
    return ok(true);
  }

  /** Drops the hold the calling context runs under, whoever took it. */
  releaseCurrent(): boolean {
    const token = this.currentToken();
    if (token === undefined) return false;
    this.releaseIfOwner(token);
    return true;
  }

  /** Runs `fn` under the lock, scoped to `fn`; always releases what it took. */
  async withLock<T>(fn: () => Promise<T> | T): Promise<T> {
    if (this.currentToken() !== undefined) {
      return await fn();
    }
    const token = Symbol("trace-lock-owner");
    return await this.owners.run(token, async () => {
      await this.acquire(token);
      try {
        return await fn();
      } finally {
        this.releaseIfOwner(token);
      }
    });
  }

  private currentToken(): symbol | undefined {
    const token = this.owners.getStore();
    return token !== undefined && this.hold?.token === token ? token : undefined;
  }

  private createHold(token: symbol, owned: boolean): LockHold {
    const run = <T>(fn: () => Promise<T> | T): Promise<T> =>
      this.owners.run(token, async (): Promise<T> => await fn());
    return {
      owned,
      isActive: () => this.hold?.token === token,
      run,
      unlock: () => {
        if (!owned || this.hold?.token !== token) return ok(false);
        this.releaseIfOwner(token);
        return ok(true);
      },
    };
  }

  private acquire(token: symbol): Promise<void> {
    const prev = this.tail;
    let release: (() => void) | undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    return prev.then(() => {
      this.hold = { token, release: () => release?.() };
    });
  }

  private releaseIfOwner(token: symbol): void {
    const hold = this.hold;
    if (!hold || hold.token !== token) return;
    this.hold = null;
    hold.release();
  }
}
