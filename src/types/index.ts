/**
 * Core type definitions for mongo-liveness
 */

export * from "./config.js";
export * from "./workload.js";
