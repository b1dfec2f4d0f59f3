/**
 * Workload domain types shared across modules
 */

export const OPERATION_KINDS = ["find", "insert", "update"] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

/**
 * Relative weight per operation kind. Weights need not sum to 100.
 */
export type OperationMix = Partial<Record<OperationKind, number>>;

export const CLUSTER_TOPOLOGIES = ["replica_set", "sharded", "geosharded"] as const;

export type ClusterTopology = (typeof CLUSTER_TOPOLOGIES)[number];

export function isOperationKind(value: string): value is OperationKind {
  return OPERATION_KINDS.some((kind) => kind === value);
}

export function isClusterTopology(value: string): value is ClusterTopology {
  return CLUSTER_TOPOLOGIES.some((topology) => topology === value);
}

/**
 * Routing identity of a document. `location` is set only for geosharded clusters.
 */
export interface DocumentKey {
  id: string;
  sequence: number;
  location?: string;
}

export interface DocumentRecord {
  _id: string;
  k: number;
  location?: string;
  ts: Date;
  n: number;
  [field: string]: unknown;
}

/**
 * Fields applied by an update operation
 */
export interface UpdateFields {
  $inc?: Record<string, number>;
  $set?: Record<string, unknown>;
}
