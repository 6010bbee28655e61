import { type AppError, rateLimited } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Fixed-window rate limiter: in-memory, O(1) per check.
 * Automatically prunes expired entries.
 */
interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  readonly windowMs: number;
  readonly maxRequests: number;
}

export interface RateLimitResult {
  readonly remaining: number;
  readonly resetAt: number;
}

export type RateLimitedError = AppError & { readonly resetAt: number; readonly hits: number };

export interface RateLimiter {
  check(key: string): Result<RateLimitResult, RateLimitedError>;
  headers(result: RateLimitResult): Record<string, string>;
}

export const createRateLimiter = (
  options: RateLimitOptions,
  now: () => number = Date.now,
): RateLimiter => {
  const store = new Map<string, RateLimitEntry>();
  let lastPrune = now();

  const prune = (at: number): void => {
    if (at - lastPrune < 60_000) return; // prune at most once per minute
    lastPrune = at;
    for (const [key, entry] of store) {
      if (entry.resetAt <= at) store.delete(key);
    }
  };

  return {
    check(key) {
      const at = now();
      prune(at);

      let entry = store.get(key);
      if (!entry || entry.resetAt <= at) {
        entry = { count: 0, resetAt: at + options.windowMs };
        store.set(key, entry);
      }

      entry.count++;

      if (entry.count > options.maxRequests) {
        return err({ ...rateLimited(), resetAt: entry.resetAt, hits: entry.count });
      }

      return ok({ remaining: options.maxRequests - entry.count, resetAt: entry.resetAt });
    },

    headers: (result) => ({
      "X-RateLimit-Limit": String(options.maxRequests),
      "X-RateLimit-Remaining": String(Math.max(0, result.remaining)),
      "X-RateLimit-Reset": String(Math.ceil(result.resetAt / 1000)),
    }),
  };
};
