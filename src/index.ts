/**
 * mongo-liveness: rate-limited concurrent MongoDB liveness workload
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/limiter/index.js";
export * from "./lib/selector/index.js";
export * from "./lib/router/index.js";
export * from "./lib/heartbeat/index.js";
export * from "./lib/workload/index.js";
export * from "./lib/storage/index.js";
export * from "./lib/reporter/index.js";
export * from "./lib/runner/index.js";
export { DocumentFactory } from "./lib/generator/document-factory.js";
export type { DocumentFactoryOptions } from "./lib/generator/document-factory.js";

export * from "./lib/utils/time.js";

// Utilities
export * from "./utils/errors.js";
export * from "./utils/logger.js";
export * from "./utils/config-loader.js";
export * from "./utils/seed-manager.js";
