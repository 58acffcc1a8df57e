import { type RateLimiter, SharedCounterRateLimiter, SlidingWindowRateLimiter } from "./api/rate-limiter.js";
import { connectRedis, type RedisClient, RedisCounterStore } from "./api/redis-counter-store.js";
import { ApiKeyRegistry } from "./auth/api-key-registry.js";
import type { Config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createDatasetRegistry, type DatasetRegistry } from "./datasets/dataset-registry.js";
import { openDatabase } from "./db/index.js";
import { DrizzleApiKeyRepository, DrizzleUsageLogRepository } from "./infrastructure/persistence/index.js";
import { UsageRecorder } from "./usage/usage-recorder.js";

export interface Services {
  registry: DatasetRegistry;
  keys: ApiKeyRegistry;
  usage: UsageRecorder;
  limiter: RateLimiter;
  /** Drain the usage log, disconnect Redis and close SQLite. */
  close(): Promise<void>;
}

export interface RateLimiterHandle {
  limiter: RateLimiter;
  /** Release the backend: stop pruning, or disconnect Redis. */
  close(): Promise<void>;
}

/** Pick the rate-limit backend configured at startup. */
export async function createRateLimiter(cfg: Config["rateLimit"]): Promise<RateLimiterHandle> {
  const policy = { max: cfg.max, windowSeconds: cfg.windowSeconds };
  if (cfg.backend === "redis" && cfg.redisUrl) {
    const redis = await connectRedis(cfg.redisUrl);
    const limiter = new SharedCounterRateLimiter(new RedisCounterStore(redis), policy, { timeoutMs: cfg.timeoutMs });
    return { limiter, close: () => quitRedis(redis) };
  }

  const limiter = new SlidingWindowRateLimiter(policy);
  // Forget idle clients once per window.
  const pruneTimer = setInterval(() => limiter.prune(), cfg.windowSeconds * 1000);
  pruneTimer.unref();
  return {
    limiter,
    close: async () => clearInterval(pruneTimer),
  };
}

async function quitRedis(redis: RedisClient): Promise<void> {
  if (!redis.isOpen) return;
  try {
    await redis.quit();
  } catch (err) {
    logger.warn("Redis quit failed", { error: err instanceof Error ? err.message : String(err) });
  }
}

/** Open storage and construct every long-lived service. */
export async function createServices(config: Config): Promise<Services> {
  const { sqlite, db } = openDatabase(config.databasePath);
  const registry = createDatasetRegistry({ documentPath: config.documentPath, db });
  const keys = new ApiKeyRegistry(new DrizzleApiKeyRepository(db));
  const usage = new UsageRecorder(new DrizzleUsageLogRepository(db), config.usageLog);
  const rateLimiter = await createRateLimiter(config.rateLimit);
  logger.info("Rate limiter ready", { backend: rateLimiter.limiter.backend, max: config.rateLimit.max });

  return {
    registry,
    keys,
    usage,
    limiter: rateLimiter.limiter,
    close: async () => {
      await usage.close();
      await rateLimiter.close();
      sqlite.close();
    },
  };
}
