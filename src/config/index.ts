import { z } from "zod";

/** Parse a comma-separated list, dropping blanks. */
function parseList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

const rateLimitSchema = z
  .object({
    /** Requests allowed per window, per client. */
    max: z.coerce.number().int().min(1).default(120),
    /** Window length in seconds. */
    windowSeconds: z.coerce.number().int().min(1).default(60),
    backend: z.enum(["memory", "redis"]),
    redisUrl: z.string().url().optional(),
    /** Upper bound for one round trip to the shared counter before failing open. */
    timeoutMs: z.coerce.number().int().min(1).default(250),
  })
  .refine((r) => r.backend !== "redis" || r.redisUrl !== undefined, {
    message: "REDIS_URL is required when RATE_LIMIT_BACKEND=redis",
    path: ["redisUrl"],
  });

const configSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  /** Authoritative JSON document holding every dataset record. */
  documentPath: z.string().min(1).default("./data/datasets.json"),
  /** SQLite file holding the search mirror, api keys and usage logs. */
  databasePath: z.string().min(1).default("./data/datasets.db"),

  /** Empty disables every admin route. */
  adminSecret: z.string().default(""),
  corsOrigins: z.array(z.string()).default(["*"]),
  trustedProxies: z.array(z.string()).default([]),

  rateLimit: rateLimitSchema,

  /** Background usage-log consumer. */
  usageLog: z
    .object({
      flushIntervalMs: z.coerce.number().int().min(10).default(1000),
      batchSize: z.coerce.number().int().min(1).default(100),
      maxPending: z.coerce.number().int().min(1).default(10_000),
    })
    .default({ flushIntervalMs: 1000, batchSize: 100, maxPending: 10_000 }),
});

export type Config = z.infer<typeof configSchema>;

/** Build the service configuration from environment variables. Throws a ZodError on invalid input. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const corsOrigins = parseList(env.CORS_ORIGINS);
  return configSchema.parse({
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    documentPath: env.DATASETS_JSON_PATH,
    databasePath: env.DATASETS_DB_PATH,
    adminSecret: env.ADMIN_SECRET,
    corsOrigins: corsOrigins.length > 0 ? corsOrigins : undefined,
    trustedProxies: parseList(env.TRUSTED_PROXY_IPS),
    rateLimit: {
      max: env.RATE_LIMIT,
      windowSeconds: env.RATE_WINDOW,
      // Redis when a URL is configured, unless explicitly overridden
      backend: env.RATE_LIMIT_BACKEND || (env.REDIS_URL ? "redis" : "memory"),
      redisUrl: env.REDIS_URL || undefined,
      timeoutMs: env.RATE_LIMIT_TIMEOUT_MS,
    },
    usageLog: {
      flushIntervalMs: env.USAGE_FLUSH_INTERVAL_MS,
      batchSize: env.USAGE_BATCH_SIZE,
      maxPending: env.USAGE_MAX_PENDING,
    },
  });
}
