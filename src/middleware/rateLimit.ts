import type { Context, Next } from "hono";
import type { AuthVariables } from "./auth.js";

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

type AuthContext = Context<{ Variables: AuthVariables }>;

export interface RateLimitOptions {
  windowMs: number;
  max: number;
  /** Bucket prefix so separate limiters never share counts */
  prefix: string;
  keyGenerator?: (c: AuthContext) => string;
  now?: () => number;
}

function clientAddress(c: AuthContext): string {
  const forwarded = c.req.header("x-forwarded-for");
  return forwarded?.split(",")[0]?.trim() || "anonymous";
}

// Signed-in callers are counted per user, guests per client address
function defaultKey(c: AuthContext): string {
  const userId = c.get("userId");
  return userId ? `user:${userId}` : `ip:${clientAddress(c)}`;
}

/**
 * Fixed-window request limiter kept in memory
 */
export function createRateLimiter(options: RateLimitOptions) {
  const { windowMs, max, prefix } = options;
  const keyGenerator = options.keyGenerator ?? defaultKey;
  const now = options.now ?? Date.now;

  const store = new Map<string, RateLimitEntry>();
  let nextSweep = now() + windowMs;

  function sweep(at: number) {
    for (const [key, entry] of store) {
      if (entry.resetTime <= at) store.delete(key);
    }
    nextSweep = at + windowMs;
  }

  return async (c: AuthContext, next: Next) => {
    const at = now();
    if (at >= nextSweep) sweep(at);

    const key = `${prefix}:${keyGenerator(c)}`;
    let entry = store.get(key);
    if (!entry || entry.resetTime <= at) {
      entry = { count: 0, resetTime: at + windowMs };
      store.set(key, entry);
    }
    entry.count++;

    const remaining = Math.max(0, max - entry.count);
    const resetSeconds = Math.ceil((entry.resetTime - at) / 1000);

    c.header("X-RateLimit-Limit", max.toString());
    c.header("X-RateLimit-Remaining", remaining.toString());
    c.header("X-RateLimit-Reset", resetSeconds.toString());

    if (entry.count > max) {
      console.warn(`[RateLimit] ${key} exceeded ${max} requests`);
      c.header("Retry-After", resetSeconds.toString());
      return c.json(
        {
          error: "Too many requests, please try again later",
          code: "RATE_LIMITED",
          retry_after: resetSeconds,
        },
        429
      );
    }

    await next();
  };
}

// 100 requests per 15 minutes on the outfit endpoints
export const OUTFIT_RATE_LIMIT = {
  windowMs: 15 * 60 * 1000,
  max: 100,
} as const;
