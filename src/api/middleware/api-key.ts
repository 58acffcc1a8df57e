import type { Context, MiddlewareHandler, Next } from "hono";
import type { ApiKeyRegistry } from "../../auth/api-key-registry.js";
import { UnauthorizedError } from "../../domain/errors.js";

export const API_KEY_HEADER = "X-API-Key";

/** Raw API key from the `X-API-Key` header, else the `api_key` query parameter. */
export function extractApiKey(c: Context): string | null {
  const header = c.req.header(API_KEY_HEADER)?.trim();
  if (header) return header;
  const query = c.req.query("api_key")?.trim();
  return query || null;
}

/** Reject the request (UnauthorizedError, 401) unless it carries an active API key. */
export function requireApiKey(keys: ApiKeyRegistry): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const token = extractApiKey(c);
    if (!(await keys.validateKey(token))) {
      throw new UnauthorizedError();
    }
    return next();
  };
}
