/**
 * Best-effort cluster inspection and shard-key setup.
 *
 * Nothing here throws: the workload must start against clusters where the
 * client lacks admin rights, so every failure is logged and reported.
 */

import { logger } from "../../utils/logger.js";
import { errorMessage } from "../../utils/errors.js";
import type { ErrorSink } from "../reporter/error-sink.js";
import type { ShardKeyPattern } from "../router/index.js";
import type { CommandRunner } from "./types.js";

const log = logger.child("cluster");

export type DetectedClusterType =
  | "replica_set"
  | "standalone"
  | "sharded_cluster"
  | "global_cluster"
  | "unknown";

const REGION_MARKERS = ["us-east", "us-west", "eu-", "ap-", "sa-", "global"];

export interface ShardInfo {
  id: string;
  host?: string;
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

async function isMongos(admin: CommandRunner): Promise<boolean> {
  const hello = await admin.command({ hello: 1 });
  return hello.msg === "isdbgrid";
}

export async function listShards(admin: CommandRunner): Promise<ShardInfo[]> {
  const reply = await admin.command({ listShards: 1 });
  const shards = Array.isArray(reply.shards) ? reply.shards : [];
  const result: ShardInfo[] = [];
  for (const entry of shards) {
    const shard = asRecord(entry);
    if (shard && typeof shard._id === "string") {
      result.push({
        id: shard._id,
        ...(typeof shard.host === "string" ? { host: shard.host } : {}),
      });
    }
  }
  return result;
}

/**
 * Classify the deployment behind `admin` (the admin database handle)
 */
export async function detectClusterType(admin: CommandRunner): Promise<DetectedClusterType> {
  let hello: Record<string, unknown>;
  try {
    hello = await admin.command({ hello: 1 });
  } catch (error) {
    log.debug("hello command failed", { error: errorMessage(error) });
    return "unknown";
  }

  if (hello.msg !== "isdbgrid") {
    return "setName" in hello ? "replica_set" : "standalone";
  }

  try {
    const shards = await listShards(admin);
    const regional = shards.some((shard) =>
      REGION_MARKERS.some((marker) => shard.id.toLowerCase().includes(marker)),
    );
    return regional ? "global_cluster" : "sharded_cluster";
  } catch (error) {
    log.debug("listShards failed", { error: errorMessage(error) });
    return "sharded_cluster";
  }
}

export interface CollectionShardStats {
  sharded: boolean;
  shards: Array<{ name: string; count?: number; size?: number }>;
}

export async function collectionShardStats(
  db: CommandRunner,
  collection: string,
): Promise<CollectionShardStats> {
  const stats = await db.command({ collStats: collection });
  const perShard = asRecord(stats.shards) ?? {};
  return {
    sharded: stats.sharded === true,
    shards: Object.entries(perShard).map(([name, value]) => {
      const shard = asRecord(value) ?? {};
      return {
        name,
        ...(typeof shard.count === "number" ? { count: shard.count } : {}),
        ...(typeof shard.size === "number" ? { size: shard.size } : {}),
      };
    }),
  };
}

/**
 * Log topology and collection sharding. Returns the detected cluster type.
 */
export async function logClusterInfo(
  admin: CommandRunner,
  db: CommandRunner,
  dbName: string,
  collection: string,
): Promise<DetectedClusterType> {
  const clusterType = await detectClusterType(admin);

  switch (clusterType) {
    case "global_cluster":
    case "sharded_cluster": {
      try {
        const shards = await listShards(admin);
        log.info(`Topology: ${clusterType === "global_cluster" ? "global cluster" : "sharded cluster"}`, {
          shards: shards.map((shard) => shard.id),
        });
      } catch {
        log.info(`Topology: ${clusterType}`);
      }
      break;
    }
    case "replica_set": {
      try {
        const hello = await admin.command({ hello: 1 });
        log.info("Topology: replica set", { setName: hello.setName });
      } catch {
        log.info("Topology: replica set");
      }
      break;
    }
    default:
      log.info(`Topology: ${clusterType}`);
  }

  try {
    const stats = await collectionShardStats(db, collection);
    if (stats.sharded) {
      log.info(`Collection ${dbName}.${collection} is sharded`, { shards: stats.shards });
    } else {
      log.info(`Collection ${dbName}.${collection} is not sharded`);
    }
  } catch (error) {
    log.debug("Unable to get collection stats", { error: errorMessage(error) });
  }

  return clusterType;
}

export type ShardSetupResult =
  | { status: "skipped"; reason: "not_mongos" | "already_sharded" | "no_shard_key" }
  | { status: "sharded"; key: ShardKeyPattern; fallback: boolean }
  | { status: "failed"; error: string };

export interface EnsureShardKeyOptions {
  admin: CommandRunner;
  db: CommandRunner;
  dbName: string;
  collection: string;
  pattern: ShardKeyPattern | null;
  errorSink?: ErrorSink;
}

const HASHED_ID: ShardKeyPattern = { _id: "hashed" };

/**
 * Shard the collection on the topology's key when connected through mongos.
 * A compound (zone) key that cannot be applied falls back to `{ _id: "hashed" }`.
 */
export async function ensureShardKey(options: EnsureShardKeyOptions): Promise<ShardSetupResult> {
  const { admin, db, dbName, collection, pattern, errorSink } = options;
  const namespace = `${dbName}.${collection}`;

  const capture = (error: unknown, step: string) => {
    errorSink?.captureException(error, {
      source: "setup",
      tags: { step },
      extra: { namespace },
    });
  };

  if (!pattern) {
    return { status: "skipped", reason: "no_shard_key" };
  }

  try {
    if (!(await isMongos(admin))) {
      log.info("Not connected via mongos; skipping sharding step");
      return { status: "skipped", reason: "not_mongos" };
    }
  } catch (error) {
    log.debug("Could not determine whether connected via mongos", { error: errorMessage(error) });
    return { status: "skipped", reason: "not_mongos" };
  }

  try {
    const stats = await collectionShardStats(db, collection);
    if (stats.sharded) {
      log.info(`Collection ${namespace} already sharded; skipping`);
      return { status: "skipped", reason: "already_sharded" };
    }
  } catch (error) {
    // collStats fails for a collection that does not exist yet
    log.debug("collStats unavailable; creating and sharding", { error: errorMessage(error) });
  }

  try {
    await db.command({ create: collection });
  } catch (error) {
    log.debug("create collection skipped", { error: errorMessage(error) });
  }

  try {
    await admin.command({ enableSharding: dbName });
  } catch (error) {
    log.debug("enableSharding skipped", { error: errorMessage(error) });
  }

  try {
    await admin.command({ shardCollection: namespace, key: pattern });
    log.info(`Sharded ${namespace}`, { key: pattern });
    return { status: "sharded", key: pattern, fallback: false };
  } catch (error) {
    log.info("Shard step failed (likely already sharded or unauthorized)", {
      error: errorMessage(error),
    });
    capture(error, "shardCollection");

    if (isHashedIdOnly(pattern)) {
      return { status: "failed", error: errorMessage(error) };
    }
  }

  try {
    await admin.command({ shardCollection: namespace, key: HASHED_ID });
    log.info(`Fallback: sharded ${namespace}`, { key: HASHED_ID });
    return { status: "sharded", key: HASHED_ID, fallback: true };
  } catch (error) {
    log.info("Fallback shard step also failed", { error: errorMessage(error) });
    capture(error, "shardCollectionFallback");
    return { status: "failed", error: errorMessage(error) };
  }
}

function isHashedIdOnly(pattern: ShardKeyPattern): boolean {
  const keys = Object.keys(pattern);
  return keys.length === 1 && pattern._id === "hashed";
}
