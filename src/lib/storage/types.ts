import type { DocumentKey, DocumentRecord, UpdateFields } from "../../types/workload.js";
import type { ErrorSink } from "../reporter/error-sink.js";

export interface StorageResult {
  /** Documents matched by the call: 0 on a find miss, 1 on a hit or insert */
  matchedCount: number;
}

/**
 * Abstract storage operations the workload engine drives. Implementations
 * reject with a StorageError for failures the engine should classify as
 * operation errors.
 */
export interface StorageClient {
  find(key: DocumentKey): Promise<StorageResult>;
  insert(document: DocumentRecord): Promise<StorageResult>;
  /** Rejects with StorageError("NOT_FOUND") when nothing matched */
  update(key: DocumentKey, fields: UpdateFields): Promise<StorageResult>;
  ping(): Promise<void>;
}

export interface BulkInsertResult {
  insertedCount: number;
  /** `_id`s known to exist after the call: written ones and duplicate-key rejects */
  presentIds: string[];
}

/**
 * Bulk operations used to size the dataset before the workload starts
 */
export interface BulkLoader {
  estimateCount(): Promise<number>;
  /** Unordered insert. Rejects only when nothing can be said about the batch. */
  insertMany(documents: DocumentRecord[]): Promise<BulkInsertResult>;
}

/**
 * Minimal command surface of a MongoDB database handle
 */
export interface CommandRunner {
  command(command: Record<string, unknown>): Promise<Record<string, unknown>>;
}

export interface MongoStorageConfig {
  uri: string;
  database: string;
  collection: string;
  maxPoolSize?: number;
  serverSelectionTimeoutMS?: number;
  appName?: string;
  /** Receives driver heartbeat failures the workload never sees as errors */
  errorSink?: ErrorSink;
}

/**
 * Everything a run needs from one connected storage backend
 */
export interface LivenessBackend extends StorageClient, BulkLoader {
  ensureIndexes(): Promise<void>;
  admin(): CommandRunner;
  database(): CommandRunner;
  close(): Promise<void>;
}
