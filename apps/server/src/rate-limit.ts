// Copyright (c) 2026 Naresh. All rights reserved.
// Licensed under the MIT License. See LICENSE file for details.

import { RateLimitError, now } from '@coach/shared';

interface Bucket {
  tokens: number;
  refilledAt: number;
}

export interface TokenBucketOptions {
  /** Burst size and refill amount per window. */
  capacity: number;
  windowMs: number;
  clock?: () => number;
}

/**
 * Keyed token buckets. Each key starts full and refills continuously at
 * `capacity` tokens per `windowMs`. Buckets that have refilled completely are
 * dropped on the next sweep.
 */
export class TokenBucketLimiter {
  private buckets = new Map<string, Bucket>();
  private capacity: number;
  private refillPerMs: number;
  private clock: () => number;
  private windowMs: number;
  private sweptAt: number;

  constructor(options: TokenBucketOptions) {
    this.capacity = options.capacity;
    this.windowMs = options.windowMs;
    this.refillPerMs = options.capacity / options.windowMs;
    this.clock = options.clock ?? now;
    this.sweptAt = this.clock();
  }

  get size(): number {
    return this.buckets.size;
  }

  /**
   * Take one token for `key`, or throw RateLimitError with the number of
   * seconds until one is available.
   */
  consume(key: string, scope = key): void {
    const timestamp = this.clock();
    if (timestamp - this.sweptAt >= this.windowMs) this.sweep(timestamp);

    const bucket = this.buckets.get(key) ?? { tokens: this.capacity, refilledAt: timestamp };

    const elapsed = Math.max(0, timestamp - bucket.refilledAt);
    bucket.tokens = Math.min(this.capacity, bucket.tokens + elapsed * this.refillPerMs);
    bucket.refilledAt = timestamp;

    if (bucket.tokens < 1) {
      this.buckets.set(key, bucket);
      const retryAfterSec = Math.max(1, Math.ceil((1 - bucket.tokens) / this.refillPerMs / 1000));
      throw RateLimitError.exceeded(scope, retryAfterSec);
    }

    bucket.tokens -= 1;
    this.buckets.set(key, bucket);
  }

  private sweep(timestamp: number): void {
    for (const [key, bucket] of this.buckets) {
      const elapsed = Math.max(0, timestamp - bucket.refilledAt);
      if (bucket.tokens + elapsed * this.refillPerMs >= this.capacity) this.buckets.delete(key);
    }
    this.sweptAt = timestamp;
  }
}
