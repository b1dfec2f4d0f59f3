import { logger } from "../../utils/logger.js";
import { errorMessage } from "../../utils/errors.js";
import type { DocumentFactory } from "../generator/document-factory.js";
import { KeySpace, type DocumentKeyRouter } from "../router/index.js";
import type { ErrorSink } from "../reporter/error-sink.js";
import type { DocumentRecord } from "../../types/workload.js";
import type { BulkLoader } from "./types.js";

const log = logger.child("preload");

export interface PreloadOptions {
  loader: BulkLoader;
  router: DocumentKeyRouter;
  documents: DocumentFactory;
  totalDocs: number;
  batchSize?: number;
  errorSink?: ErrorSink;
}

export interface PreloadResult {
  existing: number;
  inserted: number;
  failed: number;
  /** Sequences the workload may read and update */
  keySpaceSize: number;
}

export interface Preload {
  result: PreloadResult;
  /** Existing sequences plus every preloaded one confirmed written */
  keySpace: KeySpace;
}

/**
 * Top the collection up to `totalDocs` documents. Existing documents are
 * assumed to hold sequences [0, existing); new ones continue from there.
 * Failed batches are counted, never fatal, and stay out of the key space.
 */
export async function preloadDataset(options: PreloadOptions): Promise<Preload> {
  const { loader, router, documents, errorSink } = options;
  const target = Math.max(0, options.totalDocs);
  const batchSize = options.batchSize ?? 1000;

  const existing = await loader.estimateCount();
  const keySpace = new KeySpace(existing);
  const toInsert = Math.max(0, target - existing);

  if (toInsert === 0) {
    log.info("Dataset already sized", { existing, target });
    return {
      result: { existing, inserted: 0, failed: 0, keySpaceSize: keySpace.size() },
      keySpace,
    };
  }

  log.info(`Preloading dataset: inserting ${toInsert} docs`, { existing, target });

  let inserted = 0;
  let failed = 0;
  const batch: DocumentRecord[] = [];
  const sequences = new Map<string, number>();

  const flush = async () => {
    if (batch.length === 0) return;
    try {
      const written = await loader.insertMany(batch);
      inserted += written.insertedCount;
      failed += batch.length - written.insertedCount;
      for (const id of written.presentIds) {
        const sequence = sequences.get(id);
        if (sequence !== undefined) {
          keySpace.commit(sequence);
          sequences.delete(id);
        }
      }
    } catch (error) {
      failed += batch.length;
      log.error("Preload batch failed", { error: errorMessage(error), batchSize: batch.length });
      errorSink?.captureException(error, {
        source: "preload",
        extra: { batchSize: batch.length },
      });
    }
    batch.length = 0;
    sequences.clear();
  };

  for (let sequence = existing; sequence < target; sequence++) {
    const document = documents.build(router.buildKey(sequence));
    batch.push(document);
    sequences.set(document._id, sequence);
    if (batch.length >= batchSize) {
      await flush();
    }
  }
  await flush();
  keySpace.skipTo(target);

  log.info("Preload complete", { inserted, failed, keySpaceSize: keySpace.size() });
  return { result: { existing, inserted, failed, keySpaceSize: keySpace.size() }, keySpace };
}
