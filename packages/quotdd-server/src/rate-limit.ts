export interface RateLimitPolicy {
  /** Requests admitted per address before decay brings the count back down. */
  threshold: number;
  /** Amount subtracted from every counter on each decay tick. */
  decayAmount: number;
}

export const DEFAULT_RATE_LIMIT_POLICY: RateLimitPolicy = {
  threshold: 10,
  decayAmount: 10,
};

/**
 * Per-address attempt counter. Every attempt counts, admitted or not, so an
 * address that keeps hammering stays over the threshold across decay ticks.
 * Counters that decay to zero are dropped.
 */
export class DecayingRateLimiter {
  private readonly counters = new Map<string, number>();

  constructor(private readonly policy: RateLimitPolicy = DEFAULT_RATE_LIMIT_POLICY) {
    if (!Number.isInteger(policy.threshold) || policy.threshold < 1) {
      throw new Error(`Invalid rate limit threshold: ${policy.threshold}`);
    }
    if (!Number.isInteger(policy.decayAmount) || policy.decayAmount < 1) {
      throw new Error(`Invalid rate limit decay amount: ${policy.decayAmount}`);
    }
  }

  accept(address: string): boolean {
    const count = this.counters.get(address) ?? 0;
    this.counters.set(address, count + 1);
    return count < this.policy.threshold;
  }

  decay(): void {
    for (const [address, count] of this.counters) {
      const next = Math.max(0, count - this.policy.decayAmount);
      if (next === 0) {
        this.counters.delete(address);
      } else {
        this.counters.set(address, next);
      }
    }
  }

  count(address: string): number {
    return this.counters.get(address) ?? 0;
  }

  get trackedAddresses(): number {
    return this.counters.size;
  }
}
