import { type ErrorHandler, Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { secureHeaders } from "hono/secure-headers";
import type { ApiKeyRegistry } from "../auth/api-key-registry.js";
import type { Config } from "../config/index.js";
import { logger } from "../config/logger.js";
import type { DatasetRegistry } from "../datasets/dataset-registry.js";
import { RateLimitedError, RegistryError, type RegistryErrorCode, ValidationError } from "../domain/errors.js";
import type { UsageRecorder } from "../usage/usage-recorder.js";
import { ADMIN_SECRET_HEADER } from "./middleware/admin-secret.js";
import { API_KEY_HEADER } from "./middleware/api-key.js";
import { rateLimit } from "./middleware/rate-limit.js";
import { usageLog } from "./middleware/usage-log.js";
import type { RateLimiter } from "./rate-limiter.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createDatasetRoutes } from "./routes/datasets.js";
import { createHealthRoutes } from "./routes/health.js";

export interface AppDeps {
  registry: DatasetRegistry;
  keys: ApiKeyRegistry;
  usage: UsageRecorder;
  limiter: RateLimiter;
  config: Pick<Config, "adminSecret" | "corsOrigins" | "trustedProxies" | "rateLimit">;
  /** Clock for response timestamps and `updated` stamping. */
  now?: () => Date;
}

type ErrorStatus = 400 | 401 | 404 | 429 | 500;

const STATUS_BY_CODE: Record<RegistryErrorCode, ErrorStatus> = {
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
  STORAGE_CORRUPTION: 500,
  RATE_LIMITED: 429,
  UNAUTHORIZED: 401,
};

/** Paths never counted by the rate limiter. */
const RATE_LIMIT_EXEMPT = ["/health"];

// Global error handler: registry errors map to their status, anything else is a 500.
export const errorHandler: ErrorHandler = (err, c) => {
  if (err instanceof HTTPException) {
    return err.getResponse();
  }

  if (err instanceof RegistryError) {
    const status = STATUS_BY_CODE[err.code];
    if (status >= 500) {
      logger.error("Registry error in request", {
        code: err.code,
        error: err.message,
        stack: err.stack,
        path: c.req.path,
        method: c.req.method,
      });
      return c.json({ error: "Internal server error", code: err.code }, status);
    }
    if (err instanceof RateLimitedError) {
      return c.json({ error: err.message }, status);
    }
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, code: err.code, issues: err.issues }, status);
    }
    return c.json({ error: err.message, code: err.code }, status);
  }

  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    path: c.req.path,
    method: c.req.method,
  });
  return c.json(
    {
      error: "Internal server error",
      message: "An unexpected error occurred while processing your request",
    },
    500,
  );
};

/** Assemble the HTTP surface over already-constructed services. */
export function createApp(deps: AppDeps): Hono {
  const now = deps.now ?? (() => new Date());
  const app = new Hono();
  const { config } = deps;

  app.use(
    "/*",
    cors({
      origin: config.corsOrigins.includes("*") ? "*" : config.corsOrigins,
      allowMethods: ["GET", "POST"],
      allowHeaders: ["Content-Type", API_KEY_HEADER, ADMIN_SECRET_HEADER],
    }),
  );
  app.use("/*", secureHeaders());
  app.use(
    "*",
    rateLimit({
      limiter: deps.limiter,
      max: config.rateLimit.max,
      trustedProxies: new Set(config.trustedProxies),
      exempt: RATE_LIMIT_EXEMPT,
    }),
  );
  app.use("*", usageLog(deps.usage));

  app.route("/", createHealthRoutes(deps.registry, () => now().getTime()));
  app.route("/", createDatasetRoutes({ registry: deps.registry, keys: deps.keys, now }));
  app.route("/admin", createAdminRoutes({ keys: deps.keys, usage: deps.usage, adminSecret: config.adminSecret }));

  app.notFound((c) => c.json({ error: "Not found" }, 404));
  app.onError(errorHandler);

  return app;
}
