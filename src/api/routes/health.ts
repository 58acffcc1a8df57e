import { Hono } from "hono";
import { logger } from "../../config/logger.js";
import type { DatasetRegistry } from "../../datasets/dataset-registry.js";

export const SERVICE_NAME = "dataset-registry";

export type HealthDeps = Pick<DatasetRegistry, "mirroredCount" | "stats">;

function unixSeconds(now: () => number): number {
  return Math.floor(now() / 1000);
}

/** Public, unauthenticated probes used by load balancers and monitoring. */
export function createHealthRoutes(registry: HealthDeps, now: () => number = Date.now): Hono {
  const routes = new Hono();

  routes.get("/health", (c) => c.json({ status: "ok", timestamp: unixSeconds(now) }));

  // Healthy means the search mirror answers a query.
  routes.get("/status", (c) => {
    let healthy = true;
    try {
      registry.mirroredCount();
    } catch (err) {
      healthy = false;
      logger.warn("Status probe: search mirror unreachable", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return c.json({ service: SERVICE_NAME, healthy, time: unixSeconds(now) });
  });

  routes.get("/stats", async (c) => {
    const stats = await registry.stats();
    return c.json({ count: stats.count, last_updated: stats.lastUpdated, tag_counts: stats.tagCounts });
  });

  return routes;
}
