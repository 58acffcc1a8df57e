import { Hono } from "hono";
import type { ApiKeyRegistry } from "../../auth/api-key-registry.js";
import { ValidationError } from "../../domain/errors.js";
import type { UsageRecorder } from "../../usage/usage-recorder.js";
import { requireAdminSecret } from "../middleware/admin-secret.js";

export interface AdminRouteDeps {
  keys: ApiKeyRegistry;
  usage: UsageRecorder;
  adminSecret: string;
}

function requiredQuery(name: string, raw: string | undefined): string {
  if (!raw) {
    throw new ValidationError(`${name} is required`, [{ path: name, message: "required" }]);
  }
  return raw;
}

function parseQuota(raw: string | undefined): number | null {
  if (raw === undefined || raw === "") return null;
  return Number(raw);
}

/** Key administration, mounted under /admin. */
export function createAdminRoutes(deps: AdminRouteDeps): Hono {
  const routes = new Hono();
  routes.use("*", requireAdminSecret(deps.adminSecret));

  routes.post("/create_key", async (c) => {
    const key = await deps.keys.createKey({
      label: c.req.query("label") ?? "",
      quota: parseQuota(c.req.query("quota")),
    });
    return c.json({ key });
  });

  routes.post("/deactivate_key", async (c) => {
    await deps.keys.deactivateKey(requiredQuery("key", c.req.query("key")));
    return c.json({ status: "ok" });
  });

  routes.get("/usage", async (c) => {
    const key = requiredQuery("key", c.req.query("key"));
    // Count what is still queued too.
    await deps.usage.flush();
    return c.json({ count: await deps.usage.countForKey(key) });
  });

  return routes;
}
