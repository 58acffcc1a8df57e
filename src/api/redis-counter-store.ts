import { createClient } from "redis";
import { logger } from "../config/logger.js";
import type { SharedCounterStore } from "./rate-limiter.js";

export type RedisClient = ReturnType<typeof createClient>;

const CONNECT_TIMEOUT_MS = 5000;

/**
 * Rate-limit counters in Redis.
 *
 * INCR and EXPIRE NX travel in one MULTI, so the expiry is set exactly once per
 * window even if the process dies between commands.
 */
export class RedisCounterStore implements SharedCounterStore {
  constructor(private readonly client: RedisClient) {}

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const [count] = await this.client.multi().incr(key).expire(key, ttlSeconds, "NX").exec();
    return Number(count);
  }
}

/**
 * Connect a Redis client for rate limiting.
 *
 * Connection failures are logged, not thrown: the client keeps reconnecting in
 * the background and, with the offline queue disabled, commands issued while
 * disconnected reject immediately, so the limiter fails open until Redis is back.
 */
export async function connectRedis(url: string): Promise<RedisClient> {
  const client = createClient({ url, disableOfflineQueue: true });
  client.on("error", (err: unknown) => {
    logger.warn("Redis client error", { error: err instanceof Error ? err.message : String(err) });
  });

  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    await Promise.race([
      client.connect(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new Error("Redis connection timeout")), CONNECT_TIMEOUT_MS);
      }),
    ]);
    logger.info("Redis connected for rate limiting");
  } catch (err) {
    logger.warn("Redis unavailable at startup; shared rate limiting fails open until it connects", {
      error: err instanceof Error ? err.message : String(err),
    });
  } finally {
    clearTimeout(timer);
  }
  return client;
}
