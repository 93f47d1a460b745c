import { CacheConstraintError } from "../graph/errors.js";

/** Persisted view of a node. `name` is the only identity shared across processes. */
export interface CachedNodeRecord {
  readonly name: string;
  readonly externalID: string | null;
  /** Whether the node's neighbor set has been written to the cache at least once. */
  readonly areNeighborsCached: boolean;
  /** Creation date formatted as `YYYY-MM-DD`. */
  readonly createdAt: string;
}

/** Persisted undirected edge. Names are stored in canonical order (`sourceName < targetName`). */
export interface CachedEdgeRecord {
  readonly sourceName: string;
  readonly targetName: string;
  readonly weight: number;
  readonly createdAt: string;
}

/**
 * Durable store of named nodes and undirected weighted edges. Writes become
 * visible to other processes only after {@link commit}; {@link rollback}
 * discards everything written since the last commit.
 *
 * Implementations enforce the record constraints: non-empty names, canonical
 * edge order, positive weights and edges referencing existing node records.
 * Violations raise {@link CacheConstraintError}; I/O failures raise
 * `CacheStoreError`.
 */
export interface GraphCacheStore {
  findNodeByName(name: string): Promise<CachedNodeRecord | undefined>;
  /** Returns the record only when exactly one node carries {@link externalID}. */
  findNodeByExternalID(externalID: string): Promise<CachedNodeRecord | undefined>;
  /**
   * Inserts the node when absent. An existing record keeps its flag and
   * creation date; its external ID is replaced when a non-null one is given.
   */
  upsertNode(name: string, externalID: string | null): Promise<CachedNodeRecord>;
  setNeighborsCached(name: string, areNeighborsCached: boolean): Promise<void>;
  findEdgeByNames(nameA: string, nameB: string): Promise<CachedEdgeRecord | undefined>;
  /** Inserts the edge or updates its weight. Either name order is accepted. */
  upsertEdge(nameA: string, nameB: string, weight: number): Promise<CachedEdgeRecord>;
  /** Names of the nodes sharing an edge with {@link name}, ascending. */
  neighborNamesOf(name: string): Promise<string[]>;
  /** Records of the nodes sharing an edge with {@link name}, ordered by name. */
  neighborsOf(name: string): Promise<CachedNodeRecord[]>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

/** Clock returning the current date, injectable for deterministic tests. */
export type DateClock = () => Date;

/** Formats {@link date} as the `YYYY-MM-DD` creation date stored with records. */
export function toCreationDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Trims {@link name}; an empty result violates the record constraints. */
export function normaliseRecordName(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new CacheConstraintError("cache records require a non-empty name", { name });
  }
  return trimmed;
}

export function normaliseExternalID(externalID: string | null | undefined): string | null {
  if (externalID === null || externalID === undefined) {
    return null;
  }
  const trimmed = externalID.trim();
  return trimmed.length === 0 ? null : trimmed;
}

/**
 * Orders an edge's endpoint names lexicographically so the same unordered
 * pair always maps to one record. Self-loops are rejected.
 */
export function canonicalEdgeNames(nameA: string, nameB: string): [string, string] {
  const left = normaliseRecordName(nameA);
  const right = normaliseRecordName(nameB);
  if (left === right) {
    throw new CacheConstraintError("an edge cannot connect a node to itself", { name: left });
  }
  return left < right ? [left, right] : [right, left];
}

export function assertPositiveWeight(weight: number): void {
  if (!Number.isFinite(weight) || weight <= 0) {
    throw new CacheConstraintError("edge weights must be finite and greater than zero", { weight });
  }
}

/** Key addressing the canonical pair in map-backed stores. */
export function edgeRecordKey(sourceName: string, targetName: string): string {
  return `${sourceName}\u0000${targetName}`;
}
