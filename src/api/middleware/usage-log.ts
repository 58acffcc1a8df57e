import type { Context, MiddlewareHandler, Next } from "hono";
import type { UsageRecorder } from "../../usage/usage-recorder.js";
import { extractApiKey } from "./api-key.js";

/** Schedule a usage entry for every request that presents an API key. Never delays the request. */
export function usageLog(recorder: UsageRecorder): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    const key = extractApiKey(c);
    if (key) recorder.record(key, c.req.path);
    return next();
  };
}
