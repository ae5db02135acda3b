/**
 * Async mutual exclusion.
 *
 * `Mutex` serializes registry read-modify-write cycles and config saves.
 * `PathLocks` keeps two mirror runs from writing into the same (or a
 * nested) destination at once.
 */

import { sep } from "node:path";

export class Mutex {
  private locked = false;
  private queue: Array<() => void> = [];

  /**
   * Acquire the lock. Returns a release function.
   * If the lock is already held, the caller is queued and will resolve
   * when the current holder releases.
   */
  private acquire(): Promise<() => void> {
    return new Promise<() => void>((resolve) => {
      const tryAcquire = () => {
        if (!this.locked) {
          this.locked = true;
          resolve(() => {
            this.locked = false;
            const next = this.queue.shift();
            if (next) next();
          });
        } else {
          this.queue.push(tryAcquire);
        }
      };
      tryAcquire();
    });
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}

/**
 * Exclusive locks over filesystem paths. A path is blocked while the same
 * path, one of its ancestors or one of its descendants is held.
 */
export class PathLocks {
  private readonly held = new Set<string>();
  private waiters: Array<() => boolean> = [];

  async runExclusive<T>(path: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(path);
    try {
      return await fn();
    } finally {
      this.release(path);
    }
  }

  private acquire(path: string): Promise<void> {
    return new Promise<void>((resolve) => {
      const tryAcquire = () => {
        if (this.overlapsHeld(path)) {
          return false;
        }
        this.held.add(path);
        resolve();
        return true;
      };
      if (!tryAcquire()) {
        this.waiters.push(tryAcquire);
      }
    });
  }

  private release(path: string): void {
    this.held.delete(path);
    const pending = this.waiters;
    this.waiters = [];
    for (const waiter of pending) {
      if (!waiter()) this.waiters.push(waiter);
    }
  }

  private overlapsHeld(path: string): boolean {
    for (const other of this.held) {
      if (
        other === path || other.startsWith(path + sep) ||
        path.startsWith(other + sep)
      ) {
        return true;
      }
    }
    return false;
  }
}
