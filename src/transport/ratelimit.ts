/**
 * Sliding-window permit source for one class of outbound calls.
 */
import type { Clock } from "../core/types.js";

export interface PoolLimits {
  limit: number;
  windowMs: number;
}

export class QuotaPool {
  readonly name: string;
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly clock: Clock;
  private stamps: number[] = [];
  private tail: Promise<void> = Promise.resolve();

  constructor(name: string, limits: PoolLimits, clock: Clock) {
    if (!Number.isInteger(limits.limit) || limits.limit <= 0) {
      throw new RangeError(`${name} pool limit must be a positive integer`);
    }
    if (!(limits.windowMs > 0)) {
      throw new RangeError(`${name} pool window must be positive`);
    }
    this.name = name;
    this.limit = limits.limit;
    this.windowMs = limits.windowMs;
    this.clock = clock;
  }

  /**
   * Resolves once a permit is granted. Waiters are served in call order; a
   * waiter suspends until the oldest permit in the window expires.
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot());
    this.tail = turn;
    return turn;
  }

  private expire(now: number): void {
    while (this.stamps.length > 0 && now - this.stamps[0] >= this.windowMs) {
      this.stamps.shift();
    }
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = this.clock.now();
      this.expire(now);
      if (this.stamps.length < this.limit) {
        this.stamps.push(now);
        return;
      }
      await this.clock.sleep(this.stamps[0] + this.windowMs - now);
    }
  }
}
