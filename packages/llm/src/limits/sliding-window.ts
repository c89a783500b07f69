/**
 * Sliding-window rate limit
 *
 * Each unit consumed costs interval / limit ms of "debt". A request for n
 * units is allowed once the debt it would leave behind fits in one interval,
 * so up to `limit` units may burst inside any window.
 */

import { ValidationError } from '@errata/shared';
import { sleep } from '../utils/sleep.js';

export abstract class SlidingWindowLimit {
  protected readonly unitCostMs: number;
  private paidUntil: number;

  constructor(
    readonly limit: number,
    readonly intervalMs: number
  ) {
    if (!Number.isFinite(limit) || limit <= 0) {
      throw new ValidationError('Rate limit must be a positive number', { limit });
    }
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new ValidationError('Rate interval must be a non-negative number', { intervalMs });
    }
    this.unitCostMs = intervalMs / limit;
    this.paidUntil = Date.now();
  }

  /**
   * Epoch ms at which `count` units can be consumed
   */
  nextAllowed(count = 1): number {
    return Math.max(this.paidUntil + this.unitCostMs * count - this.intervalMs, Date.now());
  }

  async waitFor(count = 1): Promise<void> {
    const delay = this.nextAllowed(count) - Date.now();
    if (delay > 0) {
      await sleep(delay);
    }
  }

  protected charge(count: number): void {
    this.paidUntil = Math.max(this.paidUntil, Date.now()) + this.unitCostMs * count;
  }
}
