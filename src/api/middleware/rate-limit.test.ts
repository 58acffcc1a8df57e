import { Hono } from "hono";
import { describe, expect, it, vi } from "vitest";
import { errorHandler } from "../app.js";
import { type RateLimiter, SlidingWindowRateLimiter } from "../rate-limiter.js";
import { type RateLimitConfig, rateLimit } from "./rate-limit.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Build a Hono app with a rate-limited GET /test and an exempt GET /health. */
function buildApp(cfg: RateLimitConfig) {
  const app = new Hono();
  app.use("*", rateLimit({ exempt: ["/health"], ...cfg }));
  app.get("/test", (c) => c.json({ ok: true }));
  app.get("/health", (c) => c.json({ status: "ok" }));
  app.onError(errorHandler);
  return app;
}

function socketEnv(ip: string) {
  return { incoming: { socket: { remoteAddress: ip } } };
}

function req(headers: Record<string, string> = {}, path = "/test") {
  return new Request(`http://localhost${path}`, { headers });
}

/** Limiter that records every client id it is asked about. */
function recordingLimiter(limited = false): RateLimiter & { seen: string[] } {
  const seen: string[] = [];
  return {
    backend: "memory",
    seen,
    isLimited: async (clientId: string) => {
      seen.push(clientId);
      return limited;
    },
  };
}

// ---------------------------------------------------------------------------
// rateLimit
// ---------------------------------------------------------------------------

describe("rateLimit", () => {
  it("allows requests within the limit", async () => {
    const limiter = new SlidingWindowRateLimiter({ max: 3, windowSeconds: 60 });
    const app = buildApp({ limiter, max: 3 });

    for (let i = 0; i < 3; i++) {
      const res = await app.request(req(), {}, socketEnv("10.1.1.1"));
      expect(res.status).toBe(200);
    }
  });

  it("returns 429 with the limit header when the limit is exceeded", async () => {
    const limiter = new SlidingWindowRateLimiter({ max: 2, windowSeconds: 60 });
    const app = buildApp({ limiter, max: 2 });

    await app.request(req(), {}, socketEnv("10.1.1.1"));
    await app.request(req(), {}, socketEnv("10.1.1.1"));
    const res = await app.request(req(), {}, socketEnv("10.1.1.1"));

    expect(res.status).toBe(429);
    expect(await res.json()).toEqual({ error: "rate limit exceeded" });
    expect(res.headers.get("X-RateLimit-Limit")).toBe("2");
  });

  it("sets X-RateLimit-Limit on allowed responses", async () => {
    const app = buildApp({ limiter: recordingLimiter(), max: 5 });
    const res = await app.request(req());
    expect(res.headers.get("X-RateLimit-Limit")).toBe("5");
  });

  it("lets requests through again once the window has passed", async () => {
    let now = 1_000_000;
    const limiter = new SlidingWindowRateLimiter({ max: 1, windowSeconds: 10 }, new Map(), () => now);
    const app = buildApp({ limiter, max: 1 });

    expect((await app.request(req(), {}, socketEnv("10.1.1.1"))).status).toBe(200);
    expect((await app.request(req(), {}, socketEnv("10.1.1.1"))).status).toBe(429);

    now += 10_001;
    expect((await app.request(req(), {}, socketEnv("10.1.1.1"))).status).toBe(200);
  });

  it("tracks different IPs independently", async () => {
    const limiter = new SlidingWindowRateLimiter({ max: 1, windowSeconds: 60 });
    const app = buildApp({ limiter, max: 1 });

    expect((await app.request(req(), {}, socketEnv("10.0.0.1"))).status).toBe(200);
    expect((await app.request(req(), {}, socketEnv("10.0.0.1"))).status).toBe(429);
    expect((await app.request(req(), {}, socketEnv("10.0.0.2"))).status).toBe(200);
  });

  it("keys on the API key header when one is presented", async () => {
    const limiter = recordingLimiter();
    const app = buildApp({ limiter, max: 5 });

    await app.request(req({ "X-API-Key": "test-key" }), {}, socketEnv("10.0.0.1"));
    expect(limiter.seen).toEqual(["test-key"]);
  });

  it("keys on the api_key query parameter when there is no header", async () => {
    const limiter = recordingLimiter();
    const app = buildApp({ limiter, max: 5 });

    await app.request(req({}, "/test?api_key=query-key"), {}, socketEnv("10.0.0.1"));
    expect(limiter.seen).toEqual(["query-key"]);
  });

  it("uses the forwarded client IP only behind a trusted proxy", async () => {
    const limiter = recordingLimiter();
    const app = buildApp({ limiter, max: 5, trustedProxies: new Set(["10.0.0.1"]) });

    await app.request(req({ "x-forwarded-for": "203.0.113.9" }), {}, socketEnv("10.0.0.1"));
    await app.request(req({ "x-forwarded-for": "203.0.113.9" }), {}, socketEnv("10.0.0.50"));
    expect(limiter.seen).toEqual(["203.0.113.9", "10.0.0.50"]);
  });

  it("skips exempt paths without consulting the limiter", async () => {
    const limiter = recordingLimiter(true);
    const app = buildApp({ limiter, max: 1 });

    const res = await app.request(req({}, "/health"));
    expect(res.status).toBe(200);
    expect(limiter.seen).toEqual([]);
  });

  it("does not call the handler when limited", async () => {
    const handler = vi.fn(() => new Response("reached"));
    const app = new Hono();
    app.use("*", rateLimit({ limiter: recordingLimiter(true), max: 1 }));
    app.get("/test", handler);
    app.onError(errorHandler);

    const res = await app.request(req());
    expect(res.status).toBe(429);
    expect(handler).not.toHaveBeenCalled();
  });
});
