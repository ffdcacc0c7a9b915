/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * A FIFO async mutual-exclusion lock.
 *
 * Usage:
 *   const mutex = new Mutex();
 *
 *   await mutex.runExclusive(async () => {
 *     // ... read, check and update shared state ...
 *   });
 */
export class Mutex {
  private locked = false;
  private waiting: Array<{
    resolve: () => void;
    reject: (err: unknown) => void;
  }> = [];

  /**
   * Acquire the lock. Resolves immediately when it is free, otherwise waits
   * in line. Waiting stops with the signal's reason if it aborts first.
   */
  acquire({ signal }: { signal?: AbortSignal } = {}): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiting.indexOf(waiter);
        if (index !== -1) {
          this.waiting.splice(index, 1);
          reject(signal?.reason);
        }
      };
      const waiter = {
        resolve: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject,
      };
      this.waiting.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Release the lock, handing it directly to the next waiter if any.
   */
  release(): void {
    const next = this.waiting.shift();
    if (next) {
      next.resolve();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(
    fn: () => Promise<T>,
    options: { signal?: AbortSignal } = {},
  ): Promise<T> {
    await this.acquire(options);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  isLocked(): boolean {
    return this.locked;
  }

  queueLength(): number {
    return this.waiting.length;
  }
}
