import { sleep } from '../utils/sleep.js';
import { SlidingWindowLimit } from './sliding-window.js';

/**
 * At most `limit` calls per interval
 */
export class CallLimit extends SlidingWindowLimit {
  /**
   * Reserve one call and wait for its slot. The reservation is made before
   * waiting, so concurrent callers queue behind each other.
   */
  async consume(): Promise<void> {
    const at = this.nextAllowed(1);
    this.charge(1);
    const delay = at - Date.now();
    if (delay > 0) {
      await sleep(delay);
    }
  }
}
