import winston from "winston";

const { combine, errors, json, timestamp } = winston.format;

/**
 * Process-wide structured logger.
 *
 * JSON lines on stdout. Call as `logger.warn("message", { meta })`.
 * Silent under NODE_ENV=test so test output stays readable; spies on the
 * level methods still observe calls.
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: combine(timestamp(), errors({ stack: true }), json()),
  defaultMeta: { service: "dataset-registry" },
  transports: [new winston.transports.Console()],
  silent: process.env.NODE_ENV === "test",
});
