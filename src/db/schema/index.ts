export * from "./api-keys.js";
export * from "./datasets.js";
export * from "./usage-logs.js";
