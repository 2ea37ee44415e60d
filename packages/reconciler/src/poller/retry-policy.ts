/**
 * Retry Policy
 *
 * Constant-interval polling bounded by a maximum duration. The policy owns
 * its clock; the poller asks it how long to wait and whether time is up.
 */

import { OPERATION_POLL_INTERVAL_MS, OPERATION_TIMEOUT_MS } from "@dbplane/core";
import { systemClock, type Clock } from "./clock";

export class RetryPolicy {
  constructor(
    readonly intervalMs: number = OPERATION_POLL_INTERVAL_MS,
    readonly maxDurationMs: number = OPERATION_TIMEOUT_MS,
    readonly clock: Clock = systemClock,
  ) {
    if (intervalMs <= 0) {
      throw new RangeError(`Poll interval must be positive, got ${intervalMs}`);
    }
    if (maxDurationMs <= 0) {
      throw new RangeError(`Maximum duration must be positive, got ${maxDurationMs}`);
    }
  }

  /** Same interval and clock, different deadline. */
  withMaxDuration(maxDurationMs: number): RetryPolicy {
    return new RetryPolicy(this.intervalMs, maxDurationMs, this.clock);
  }

  withInterval(intervalMs: number): RetryPolicy {
    return new RetryPolicy(intervalMs, this.maxDurationMs, this.clock);
  }

  elapsedSince(startedAt: number): number {
    return this.clock.now() - startedAt;
  }

  isExpired(startedAt: number): boolean {
    return this.elapsedSince(startedAt) >= this.maxDurationMs;
  }

  /** Wait before the next attempt, clipped so the deadline is not overshot. */
  nextDelay(startedAt: number): number {
    const remaining = this.maxDurationMs - this.elapsedSince(startedAt);
    return Math.max(0, Math.min(this.intervalMs, remaining));
  }
}
