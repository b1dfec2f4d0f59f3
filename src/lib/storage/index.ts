export { MongoStorage, createMongoStorage } from "./mongo-storage.js";
export { toStorageError, sanitizeUri } from "./mongo-errors.js";
export {
  collectionShardStats,
  detectClusterType,
  ensureShardKey,
  listShards,
  logClusterInfo,
} from "./cluster.js";
export type {
  CollectionShardStats,
  DetectedClusterType,
  EnsureShardKeyOptions,
  ShardInfo,
  ShardSetupResult,
} from "./cluster.js";
export { preloadDataset } from "./preload.js";
export type { Preload, PreloadOptions, PreloadResult } from "./preload.js";
export type {
  BulkInsertResult,
  BulkLoader,
  CommandRunner,
  LivenessBackend,
  MongoStorageConfig,
  StorageClient,
  StorageResult,
} from "./types.js";
