import { SlidingWindowLimit } from './sliding-window.js';

/**
 * At most `limit` tokens per interval. Callers wait for an estimate up
 * front and report the real count once the provider has answered.
 */
export class TokenLimit extends SlidingWindowLimit {
  reportConsumed(count: number): void {
    if (count > 0) {
      this.charge(count);
    }
  }
}
