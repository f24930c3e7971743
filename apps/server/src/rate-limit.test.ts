import { describe, expect, it } from 'vitest';
import { RateLimitError } from '@coach/shared';
import { TokenBucketLimiter } from './rate-limit.js';

describe('TokenBucketLimiter', () => {
  it('allows a burst up to capacity then reports when to retry', () => {
    let time = 0;
    const limiter = new TokenBucketLimiter({ capacity: 2, windowMs: 60_000, clock: () => time });

    limiter.consume('user_a');
    limiter.consume('user_a');

    let caught: unknown;
    try {
      limiter.consume('user_a', 'requests');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(RateLimitError);
    expect(caught).toMatchObject({ retryAfterSec: 30, message: 'Rate limit exceeded for requests' });

    // Other keys have their own bucket.
    limiter.consume('user_b');

    time = 30_000;
    limiter.consume('user_a');
    expect(() => limiter.consume('user_a')).toThrow(RateLimitError);
  });

  it('drops buckets that have refilled completely', () => {
    let time = 0;
    const limiter = new TokenBucketLimiter({ capacity: 2, windowMs: 1_000, clock: () => time });

    limiter.consume('user_a');
    limiter.consume('user_b');
    limiter.consume('user_b');
    expect(limiter.size).toBe(2);

    time = 1_000;
    limiter.consume('user_c');

    // user_a and user_b are full again; only the new bucket remains.
    expect(limiter.size).toBe(1);
    limiter.consume('user_b');
    limiter.consume('user_b');
    expect(() => limiter.consume('user_b')).toThrow(RateLimitError);
  });
});
