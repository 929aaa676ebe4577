// ──────────────────────────────────────────────
// Coachgate - Attempt Rate Limiter
// Fixed window per key; admission is one synchronous check-and-increment
// ──────────────────────────────────────────────

import { monotonicNow } from "@coachgate/utils";
import type { RateLimitPolicy } from "@coachgate/utils";

export type Admission =
  | { allowed: true; remaining: number; resetAfterSeconds: number }
  | { allowed: false; retryAfterSeconds: number };

interface Bucket {
  count: number;
  windowStart: number;
}

export interface RateLimiter {
  readonly policy: Readonly<RateLimitPolicy>;
  readonly size: number;
  admit(key: string): Admission;
  reset(key: string): void;
  prune(): number;
}

function secondsUntil(ms: number): number {
  return Math.max(1, Math.ceil(ms / 1000));
}

/**
 * `clock` must be monotonic milliseconds. Denied attempts do not count
 * against the window.
 */
export function createRateLimiter(
  policy: RateLimitPolicy,
  clock: () => number = monotonicNow
): RateLimiter {
  if (!Number.isInteger(policy.max) || policy.max <= 0) {
    throw new Error(`Rate limit max must be a positive integer, got: ${policy.max}`);
  }
  if (!(policy.windowSeconds > 0)) {
    throw new Error(`Rate limit window must be positive, got: ${policy.windowSeconds}`);
  }

  const windowMs = policy.windowSeconds * 1000;
  const buckets = new Map<string, Bucket>();

  return {
    policy: Object.freeze({ ...policy }),

    get size() {
      return buckets.size;
    },

    admit(key) {
      const now = clock();
      const bucket = buckets.get(key);

      if (!bucket || now - bucket.windowStart >= windowMs) {
        buckets.set(key, { count: 1, windowStart: now });
        return { allowed: true, remaining: policy.max - 1, resetAfterSeconds: secondsUntil(windowMs) };
      }

      const remainingMs = bucket.windowStart + windowMs - now;
      if (bucket.count >= policy.max) {
        return { allowed: false, retryAfterSeconds: secondsUntil(remainingMs) };
      }

      bucket.count += 1;
      return {
        allowed: true,
        remaining: policy.max - bucket.count,
        resetAfterSeconds: secondsUntil(remainingMs),
      };
    },

    reset(key) {
      buckets.delete(key);
    },

    prune() {
      const now = clock();
      let removed = 0;
      for (const [key, bucket] of buckets) {
        if (now - bucket.windowStart >= windowMs) {
          buckets.delete(key);
          removed++;
        }
      }
      return removed;
    },
  };
}

export interface AuthRateLimiters {
  register: RateLimiter;
  login: RateLimiter;
  refresh: RateLimiter;
}

export function createAuthRateLimiters(
  policies: Record<keyof AuthRateLimiters, RateLimitPolicy>,
  clock?: () => number
): AuthRateLimiters {
  return {
    register: createRateLimiter(policies.register, clock),
    login: createRateLimiter(policies.login, clock),
    refresh: createRateLimiter(policies.refresh, clock),
  };
}
