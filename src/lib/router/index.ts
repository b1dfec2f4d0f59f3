/**
 * Topology-aware document keys
 */

import { ConfigError } from "../../utils/errors.js";
import { stableHexId } from "../../utils/seed-manager.js";
import {
  CLUSTER_TOPOLOGIES,
  isClusterTopology,
  type ClusterTopology,
  type DocumentKey,
} from "../../types/workload.js";
import { DEFAULT_ZONES } from "./zones.js";

export { DEFAULT_ZONES, parseZones } from "./zones.js";
export { KeySpace } from "./key-space.js";

export interface DocumentKeyRouterOptions {
  topology: ClusterTopology | string;
  zones?: readonly string[];
}

export type ShardKeyPattern = Record<string, 1 | "hashed">;

export type RoutingFilter = { _id: string; location?: string };

const ID_WIDTH = 12;

/**
 * Query filter that targets the shard owning `key`
 */
export function routingFilter(key: DocumentKey): RoutingFilter {
  return key.location === undefined ? { _id: key.id } : { _id: key.id, location: key.location };
}

/**
 * Builds document keys for a fixed cluster topology.
 *
 * Keys are a pure function of the sequence number, so a find or update can
 * rebuild the exact routing fields (id and, for geosharded clusters,
 * location) of any document it knows the sequence of.
 */
export class DocumentKeyRouter {
  readonly topology: ClusterTopology;
  readonly zones: readonly string[];

  constructor(options: DocumentKeyRouterOptions) {
    if (!isClusterTopology(options.topology)) {
      throw new ConfigError(
        `Invalid cluster topology "${options.topology}". Expected one of: ${CLUSTER_TOPOLOGIES.join(", ")}`,
        { topology: options.topology },
      );
    }
    this.topology = options.topology;

    const zones = options.zones ?? DEFAULT_ZONES;
    if (zones.length === 0) {
      throw new ConfigError("Zone set must contain at least one location");
    }
    const seen = new Set<string>();
    for (const zone of zones) {
      if (seen.has(zone)) {
        throw new ConfigError(`Duplicate zone "${zone}" in zone set`, { zones: [...zones] });
      }
      seen.add(zone);
    }
    this.zones = Object.freeze([...zones]);
  }

  buildKey(sequence: number): DocumentKey {
    if (!Number.isSafeInteger(sequence) || sequence < 0) {
      throw new RangeError(`Sequence must be a non-negative integer, got ${sequence}`);
    }

    switch (this.topology) {
      case "replica_set":
        return { id: `doc-${String(sequence).padStart(ID_WIDTH, "0")}`, sequence };
      case "sharded":
        return { id: hashedId(sequence), sequence };
      case "geosharded":
        return { id: hashedId(sequence), sequence, location: this.locationFor(sequence) };
    }
  }

  /**
   * Zone a sequence number maps to; stable across runs.
   */
  locationFor(sequence: number): string {
    const zone = this.zones[sequence % this.zones.length];
    if (zone === undefined) {
      throw new RangeError(`No zone for sequence ${sequence}`);
    }
    return zone;
  }

  /**
   * Shard key the collection should carry for this topology
   */
  shardKeyPattern(): ShardKeyPattern | null {
    switch (this.topology) {
      case "replica_set":
        return null;
      case "sharded":
        return { _id: "hashed" };
      case "geosharded":
        return { location: 1, _id: "hashed" };
    }
  }
}

function hashedId(sequence: number): string {
  return stableHexId(`doc:${sequence}`, 24);
}
