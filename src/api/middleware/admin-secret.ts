import { timingSafeEqual } from "node:crypto";
import type { Context, MiddlewareHandler, Next } from "hono";

export const ADMIN_SECRET_HEADER = "X-Admin-Secret";

function secretsMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Gate admin routes behind a shared secret, read from the `X-Admin-Secret`
 * header or the `secret` query parameter.
 *
 * An empty configured secret disables the routes entirely (403).
 */
export function requireAdminSecret(adminSecret: string): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    if (!adminSecret) {
      return c.json({ error: "Admin endpoints disabled (no ADMIN_SECRET set)" }, 403);
    }
    const provided = c.req.header(ADMIN_SECRET_HEADER) ?? c.req.query("secret") ?? "";
    if (!secretsMatch(provided, adminSecret)) {
      return c.json({ error: "Invalid admin secret" }, 401);
    }
    return next();
  };
}
