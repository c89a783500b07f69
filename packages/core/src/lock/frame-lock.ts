/**
 * Frame Lock
 * Serializes backward phases of one invocation frame:
 * - FIFO hand-off between waiters
 * - Abortable waits (the waiter is dropped from the queue)
 * - Owner tracking for diagnostics
 */

import { GraphError } from '@errata/shared';

export type ReleaseFn = () => void;

interface Waiter {
  owner: string;
  grant: (release: ReleaseFn) => void;
}

export class FrameLock {
  private owner: string | null = null;
  private waiters: Waiter[] = [];

  constructor(private readonly frameId: string) {}

  isLocked(): boolean {
    return this.owner !== null;
  }

  holder(): string | null {
    return this.owner;
  }

  queueLength(): number {
    return this.waiters.length;
  }

  /**
   * Acquire the lock. Resolves with a release function that must be called
   * exactly once; extra calls are ignored.
   */
  acquire(owner: string, signal?: AbortSignal): Promise<ReleaseFn> {
    if (signal?.aborted) {
      return Promise.reject(this.abortError(owner));
    }

    if (this.owner === null) {
      this.owner = owner;
      return Promise.resolve(this.releaseFor(owner));
    }

    return new Promise<ReleaseFn>((resolve, reject) => {
      const waiter: Waiter = {
        owner,
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };

      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
          reject(this.abortError(owner));
        }
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Run fn while holding the lock
   */
  async runExclusive<T>(owner: string, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(owner, signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaseFor(owner: string): ReleaseFn {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (this.owner !== owner) return;

      const next = this.waiters.shift();
      if (next) {
        this.owner = next.owner;
        next.grant(this.releaseFor(next.owner));
      } else {
        this.owner = null;
      }
    };
  }

  private abortError(owner: string): GraphError {
    return new GraphError(`Wait for frame lock ${this.frameId} was aborted`, 'E4003', {
      frameId: this.frameId,
      owner,
    });
  }
}
