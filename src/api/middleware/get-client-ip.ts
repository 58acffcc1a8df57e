import type { Context } from "hono";

/** Strip IPv6-mapped-IPv4 prefix (::ffff:) for comparison. */
function normalizeIp(ip: string): string {
  return ip.startsWith("::ffff:") ? ip.slice(7) : ip;
}

/**
 * Determine the real client IP.
 *
 * - If `socketAddr` matches a trusted proxy, use the **last** (rightmost)
 *   value from `X-Forwarded-For` (closest hop to the trusted proxy).
 * - Otherwise, use `socketAddr` directly (XFF is untrusted), without any
 *   `::ffff:` prefix so a client keeps one identity across address families.
 * - Falls back to `"unknown"` if neither is available.
 */
export function getClientIp(
  xffHeader: string | undefined,
  socketAddr: string | undefined,
  trusted: ReadonlySet<string>,
): string {
  const normalizedSocket = socketAddr ? normalizeIp(socketAddr) : undefined;

  if (xffHeader && normalizedSocket && trusted.has(normalizedSocket)) {
    const parts = xffHeader.split(",");
    const last = parts[parts.length - 1]?.trim();
    if (last) return last;
  }

  return normalizedSocket || "unknown";
}

/** Socket address reported by @hono/node-server, if the runtime exposes one. */
function socketAddress(c: Context): string | undefined {
  const env: unknown = c.env;
  if (typeof env !== "object" || env === null || !("incoming" in env)) return undefined;
  const incoming: unknown = env.incoming;
  if (typeof incoming !== "object" || incoming === null || !("socket" in incoming)) return undefined;
  const socket: unknown = incoming.socket;
  if (typeof socket !== "object" || socket === null || !("remoteAddress" in socket)) return undefined;
  return typeof socket.remoteAddress === "string" ? socket.remoteAddress : undefined;
}

/** Extract the client IP from a Hono Context. */
export function getClientIpFromContext(c: Context, trusted: ReadonlySet<string>): string {
  return getClientIp(c.req.header("x-forwarded-for"), socketAddress(c), trusted);
}
