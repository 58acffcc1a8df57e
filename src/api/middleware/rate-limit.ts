/**
 * Rate-limiting middleware for Hono.
 *
 * Every request is counted against its client id: the API key when one is
 * presented, otherwise the client IP. The counting itself is delegated to a
 * RateLimiter backend chosen at startup. A limited request throws
 * RateLimitedError, which the app's error handler turns into a 429.
 */

import type { Context, MiddlewareHandler, Next } from "hono";
import { RateLimitedError } from "../../domain/errors.js";
import type { RateLimiter } from "../rate-limiter.js";
import { extractApiKey } from "./api-key.js";
import { getClientIpFromContext } from "./get-client-ip.js";

export interface RateLimitConfig {
  limiter: RateLimiter;
  /** Requests per window; reported in `X-RateLimit-Limit`. */
  max: number;
  /** Proxies whose `X-Forwarded-For` is believed. */
  trustedProxies?: ReadonlySet<string>;
  /** Paths that are never counted (matched exactly). */
  exempt?: readonly string[];
}

/** Client id used for rate limiting. */
export function rateLimitClientId(c: Context, trusted: ReadonlySet<string>): string {
  return extractApiKey(c) ?? getClientIpFromContext(c, trusted);
}

/**
 * ```ts
 * app.use("*", rateLimit({ limiter, max: 120 }));
 * ```
 */
export function rateLimit(cfg: RateLimitConfig): MiddlewareHandler {
  const trusted = cfg.trustedProxies ?? new Set<string>();
  const exempt = new Set(cfg.exempt ?? []);

  return async (c: Context, next: Next) => {
    if (exempt.has(c.req.path)) return next();

    const clientId = rateLimitClientId(c, trusted);
    c.header("X-RateLimit-Limit", String(cfg.max));
    if (await cfg.limiter.isLimited(clientId)) {
      throw new RateLimitedError(clientId);
    }
    return next();
  };
}
