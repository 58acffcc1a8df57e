import { Hono } from "hono";
import type { ApiKeyRegistry } from "../../auth/api-key-registry.js";
import type { DatasetRegistry } from "../../datasets/dataset-registry.js";
import { ValidationError } from "../../domain/errors.js";
import { requireApiKey } from "../middleware/api-key.js";

const DEFAULT_SEARCH_LIMIT = 50;

export interface DatasetRouteDeps {
  registry: DatasetRegistry;
  keys: ApiKeyRegistry;
  now?: () => Date;
}

/** Parse an optional positive-integer query parameter. */
export function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError(`${name} must be a positive integer, got "${raw}"`, [
      { path: name, message: "must be a positive integer" },
    ]);
  }
  return n;
}

/** ISO-8601 UTC at second precision, e.g. "2024-03-01T12:00:00Z". */
export function utcTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function createDatasetRoutes(deps: DatasetRouteDeps): Hono {
  const { registry, keys } = deps;
  const now = deps.now ?? (() => new Date());
  const routes = new Hono();

  routes.get("/datasets", async (c) => c.json(await registry.queryAll()));

  routes.get("/datasets/:id", async (c) => c.json(await registry.get(c.req.param("id"))));
  routes.get("/get/:id", async (c) => c.json(await registry.get(c.req.param("id"))));

  routes.get("/latest", async (c) => {
    const n = parsePositiveInt("n", c.req.query("n"), 1);
    return c.json(await registry.queryLatest(n));
  });

  routes.get("/search", (c) => {
    const keyword = c.req.query("keyword");
    if (keyword === undefined) {
      throw new ValidationError("keyword is required", [{ path: "keyword", message: "required" }]);
    }
    const limit = parsePositiveInt("limit", c.req.query("limit"), DEFAULT_SEARCH_LIMIT);
    return c.json(registry.search(keyword, limit));
  });

  routes.post("/update", requireApiKey(keys), async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch (err) {
      throw new ValidationError("Invalid JSON body", [
        { path: "(root)", message: err instanceof Error ? err.message : String(err) },
      ]);
    }
    if (isRecord(body) && (body.updated === undefined || body.updated === null || body.updated === "")) {
      body = { ...body, updated: utcTimestamp(now()) };
    }
    const record = await registry.upsert(body);
    return c.json({ status: "ok", id: record.id });
  });

  return routes;
}
