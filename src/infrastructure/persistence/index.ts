// Export persistence implementations
export { DrizzleApiKeyRepository } from "./drizzle-api-key-repository.js";
export { DrizzleSearchMirror } from "./drizzle-search-mirror.js";
export { DrizzleUsageLogRepository } from "./drizzle-usage-log-repository.js";
export { InMemoryApiKeyRepository } from "./in-memory-api-key-repository.js";
export { InMemoryUsageLogRepository } from "./in-memory-usage-log-repository.js";
export { JsonDocumentStore } from "./json-document-store.js";
