import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { loadConfig } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createServices } from "./services.js";

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
};

// Uncaught exceptions leave the process in an undefined state: log and exit.
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", { error: err.message, stack: err.stack, origin });
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

async function main(): Promise<void> {
  const config = loadConfig();
  const services = await createServices(config);

  // The document is authoritative; bring the mirror in line before serving.
  const mirrored = await services.registry.rebuildAll();
  logger.info("Search mirror rebuilt", { records: mirrored });

  const app = createApp({ ...services, config });
  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`dataset-registry listening on http://0.0.0.0:${info.port}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);
    server.close();
    try {
      await services.close();
      process.exit(0);
    } catch (err) {
      logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    }
  };
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.error("Startup failed", {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
