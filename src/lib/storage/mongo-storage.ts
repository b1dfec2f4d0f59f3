/**
 * MongoDB storage collaborator
 */

import {
  MongoBulkWriteError,
  MongoClient,
  type Collection,
  type Db,
  type Document,
  type ServerHeartbeatFailedEvent,
} from "mongodb";
import { logger } from "../../utils/logger.js";
import { StorageError, errorMessage } from "../../utils/errors.js";
import type { DocumentKey, DocumentRecord, UpdateFields } from "../../types/workload.js";
import { routingFilter } from "../router/index.js";
import { DUPLICATE_KEY, sanitizeUri, toStorageError } from "./mongo-errors.js";
import type {
  BulkInsertResult,
  LivenessBackend,
  MongoStorageConfig,
  StorageResult,
} from "./types.js";

const log = logger.child("storage");

/**
 * StorageClient and BulkLoader over the official driver. Pooling, retries and
 * wire protocol stay with the driver.
 */
export class MongoStorage implements LivenessBackend {
  private readonly client: MongoClient;
  private readonly config: MongoStorageConfig;
  private collection: Collection<Document> | null = null;
  private db: Db | null = null;

  constructor(config: MongoStorageConfig) {
    this.config = config;
    this.client = new MongoClient(config.uri, {
      appName: config.appName ?? "mongo-liveness",
      maxPoolSize: config.maxPoolSize ?? 50,
      serverSelectionTimeoutMS: config.serverSelectionTimeoutMS ?? 10000,
      retryWrites: true,
    });
    this.client.on("serverHeartbeatFailed", (event) => this.onHeartbeatFailed(event));
  }

  /**
   * Connect to MongoDB and resolve the target collection
   */
  async connect(): Promise<void> {
    log.info("Connecting to MongoDB: " + sanitizeUri(this.config.uri));
    try {
      await this.client.connect();
    } catch (error) {
      throw toStorageError(error, { phase: "connect" });
    }
    this.db = this.client.db(this.config.database);
    this.collection = this.db.collection(this.config.collection);
    log.info(`Connected to collection: ${this.config.database}.${this.config.collection}`);
  }

  async find(key: DocumentKey): Promise<StorageResult> {
    const collection = this.getCollection();
    try {
      const doc = await collection.findOne(routingFilter(key), { projection: { _id: 1 } });
      return { matchedCount: doc ? 1 : 0 };
    } catch (error) {
      throw toStorageError(error, { op: "find", id: key.id });
    }
  }

  async insert(document: DocumentRecord): Promise<StorageResult> {
    const collection = this.getCollection();
    try {
      await collection.insertOne(document);
      return { matchedCount: 1 };
    } catch (error) {
      throw toStorageError(error, { op: "insert", id: document._id });
    }
  }

  async update(key: DocumentKey, fields: UpdateFields): Promise<StorageResult> {
    const collection = this.getCollection();
    let matchedCount: number;
    try {
      const result = await collection.updateOne(routingFilter(key), fields);
      matchedCount = result.matchedCount;
    } catch (error) {
      throw toStorageError(error, { op: "update", id: key.id });
    }

    if (matchedCount === 0) {
      throw new StorageError("NOT_FOUND", `No document matched ${key.id}`, false, {
        op: "update",
        id: key.id,
        location: key.location,
      });
    }
    return { matchedCount };
  }

  async ping(): Promise<void> {
    try {
      await this.client.db("admin").command({ ping: 1 });
    } catch (error) {
      throw toStorageError(error, { op: "ping" });
    }
  }

  async estimateCount(): Promise<number> {
    try {
      return await this.getCollection().estimatedDocumentCount();
    } catch (error) {
      throw toStorageError(error, { op: "estimateCount" });
    }
  }

  async insertMany(documents: DocumentRecord[]): Promise<BulkInsertResult> {
    if (documents.length === 0) return { insertedCount: 0, presentIds: [] };
    try {
      const result = await this.getCollection().insertMany(documents, { ordered: false });
      return { insertedCount: result.insertedCount, presentIds: documents.map((doc) => doc._id) };
    } catch (error) {
      // Unordered batches keep going past individual failures
      if (error instanceof MongoBulkWriteError) {
        log.warn("Bulk insert partially failed", {
          inserted: error.insertedCount,
          batchSize: documents.length,
        });
        return partialInsert(documents, error);
      }
      throw toStorageError(error, { op: "insertMany", batchSize: documents.length });
    }
  }

  /**
   * Index on the sequence number. The workload addresses documents by
   * `_id`; this one serves out-of-band lookups by sequence.
   */
  async ensureIndexes(): Promise<void> {
    await this.getCollection().createIndex({ k: 1 }, { name: "k_1" });
  }

  /**
   * Admin database handle, for cluster topology commands
   */
  admin(): Db {
    return this.client.db("admin");
  }

  database(): Db {
    if (!this.db) {
      throw new Error("Not connected to MongoDB. Call connect() first.");
    }
    return this.db;
  }

  async close(): Promise<void> {
    await this.client.close();
    this.collection = null;
    this.db = null;
    log.info("MongoDB connection closed");
  }

  private onHeartbeatFailed(event: ServerHeartbeatFailedEvent): void {
    const message = `MongoDB server heartbeat failed host=${event.connectionId} durationMs=${event.duration}`;
    log.warn(message, { error: errorMessage(event.failure) });
    this.config.errorSink?.captureMessage(message, "error", {
      source: "driver-heartbeat",
      tags: { host: event.connectionId },
      extra: { durationMs: event.duration, awaited: event.awaited, error: errorMessage(event.failure) },
    });
  }

  private getCollection(): Collection<Document> {
    if (!this.collection) {
      throw new Error("Not connected to MongoDB. Call connect() first.");
    }
    return this.collection;
  }
}

/**
 * Ids present after a partially failed unordered insert. Documents without a
 * write error count as written only when the write errors explain every
 * missing insert; duplicate-key rejects are present either way.
 */
function partialInsert(documents: DocumentRecord[], error: MongoBulkWriteError): BulkInsertResult {
  const writeErrors = Array.isArray(error.writeErrors) ? error.writeErrors : [error.writeErrors];
  const failedAt = new Set<number>();
  const duplicates: string[] = [];
  for (const writeError of writeErrors) {
    failedAt.add(writeError.index);
    const document = documents[writeError.index];
    if (writeError.code === DUPLICATE_KEY && document) {
      duplicates.push(document._id);
    }
  }

  const accounted = error.insertedCount + failedAt.size === documents.length;
  const written = accounted
    ? documents.filter((_, index) => !failedAt.has(index)).map((doc) => doc._id)
    : [];
  return { insertedCount: error.insertedCount, presentIds: [...written, ...duplicates] };
}

export async function createMongoStorage(config: MongoStorageConfig): Promise<MongoStorage> {
  const storage = new MongoStorage(config);
  await storage.connect();
  return storage;
}
