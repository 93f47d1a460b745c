import { CacheConstraintError, CacheStoreError } from "../graph/errors.js";
import {
  assertPositiveWeight,
  canonicalEdgeNames,
  type CachedEdgeRecord,
  type CachedNodeRecord,
  type DateClock,
  edgeRecordKey,
  type GraphCacheStore,
  normaliseExternalID,
  normaliseRecordName,
  toCreationDate,
} from "./store.js";

/** Options accepted by {@link InMemoryGraphCacheStore}. */
export interface InMemoryGraphCacheStoreOptions {
  /** Clock used to stamp creation dates. */
  readonly clock?: DateClock;
}

/** Records written since the last commit, in their final state. */
export interface CacheChangeSet {
  readonly nodes: readonly CachedNodeRecord[];
  readonly edges: readonly CachedEdgeRecord[];
}

/**
 * Map-backed store keeping a committed state and an overlay of pending
 * writes. Commit folds the overlay into the committed state; rollback drops
 * it. Nothing survives the process.
 */
export class InMemoryGraphCacheStore implements GraphCacheStore {
  private readonly nodes = new Map<string, CachedNodeRecord>();
  private readonly edges = new Map<string, CachedEdgeRecord>();
  /** Committed adjacency, name to neighbor names. */
  private readonly adjacency = new Map<string, Set<string>>();
  private readonly pendingNodes = new Map<string, CachedNodeRecord>();
  private readonly pendingEdges = new Map<string, CachedEdgeRecord>();
  private readonly clock: DateClock;
  private closed = false;

  constructor(options: InMemoryGraphCacheStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  async findNodeByName(name: string): Promise<CachedNodeRecord | undefined> {
    this.assertOpen();
    return this.lookupNode(name.trim());
  }

  async findNodeByExternalID(externalID: string): Promise<CachedNodeRecord | undefined> {
    this.assertOpen();
    const wanted = normaliseExternalID(externalID);
    if (wanted === null) {
      return undefined;
    }
    let match: CachedNodeRecord | undefined;
    for (const record of this.currentNodes()) {
      if (record.externalID !== wanted) {
        continue;
      }
      if (match) {
        return undefined;
      }
      match = record;
    }
    return match;
  }

  async upsertNode(name: string, externalID: string | null): Promise<CachedNodeRecord> {
    this.assertOpen();
    const key = normaliseRecordName(name);
    const normalisedExternalID = normaliseExternalID(externalID);
    const existing = this.lookupNode(key);
    if (existing) {
      if (normalisedExternalID === null || normalisedExternalID === existing.externalID) {
        return existing;
      }
      const updated: CachedNodeRecord = { ...existing, externalID: normalisedExternalID };
      this.pendingNodes.set(key, updated);
      return updated;
    }
    const record: CachedNodeRecord = {
      name: key,
      externalID: normalisedExternalID,
      areNeighborsCached: false,
      createdAt: toCreationDate(this.clock()),
    };
    this.pendingNodes.set(key, record);
    return record;
  }

  async setNeighborsCached(name: string, areNeighborsCached: boolean): Promise<void> {
    this.assertOpen();
    const key = normaliseRecordName(name);
    const existing = this.lookupNode(key);
    if (!existing) {
      throw new CacheConstraintError(`node '${key}' is not cached`, { name: key });
    }
    if (existing.areNeighborsCached !== areNeighborsCached) {
      this.pendingNodes.set(key, { ...existing, areNeighborsCached });
    }
  }

  async findEdgeByNames(nameA: string, nameB: string): Promise<CachedEdgeRecord | undefined> {
    this.assertOpen();
    const left = nameA.trim();
    const right = nameB.trim();
    if (left.length === 0 || right.length === 0 || left === right) {
      return undefined;
    }
    const [sourceName, targetName] = left < right ? [left, right] : [right, left];
    return this.lookupEdge(edgeRecordKey(sourceName, targetName));
  }

  async upsertEdge(nameA: string, nameB: string, weight: number): Promise<CachedEdgeRecord> {
    this.assertOpen();
    const [sourceName, targetName] = canonicalEdgeNames(nameA, nameB);
    assertPositiveWeight(weight);
    for (const endpoint of [sourceName, targetName]) {
      if (!this.lookupNode(endpoint)) {
        throw new CacheConstraintError(`edge endpoint '${endpoint}' is not cached`, { sourceName, targetName });
      }
    }

    const key = edgeRecordKey(sourceName, targetName);
    const existing = this.lookupEdge(key);
    if (existing && existing.weight === weight) {
      return existing;
    }
    const record: CachedEdgeRecord = existing
      ? { ...existing, weight }
      : { sourceName, targetName, weight, createdAt: toCreationDate(this.clock()) };
    this.pendingEdges.set(key, record);
    return record;
  }

  async neighborNamesOf(name: string): Promise<string[]> {
    this.assertOpen();
    return this.collectNeighborNames(name.trim());
  }

  async neighborsOf(name: string): Promise<CachedNodeRecord[]> {
    this.assertOpen();
    const records: CachedNodeRecord[] = [];
    for (const neighborName of this.collectNeighborNames(name.trim())) {
      const record = this.lookupNode(neighborName);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  async commit(): Promise<void> {
    this.assertOpen();
    if (this.pendingNodes.size === 0 && this.pendingEdges.size === 0) {
      return;
    }
    const changes: CacheChangeSet = {
      nodes: [...this.pendingNodes.values()],
      edges: [...this.pendingEdges.values()],
    };
    await this.persistChanges(changes);
    this.applyChanges(changes);
    this.pendingNodes.clear();
    this.pendingEdges.clear();
  }

  async rollback(): Promise<void> {
    this.pendingNodes.clear();
    this.pendingEdges.clear();
  }

  async close(): Promise<void> {
    this.pendingNodes.clear();
    this.pendingEdges.clear();
    this.closed = true;
  }

  /** Durability hook run before a commit becomes visible. Throwing aborts the commit. */
  protected async persistChanges(_changes: CacheChangeSet): Promise<void> {}

  /** Folds {@link changes} into the committed state without persisting them. */
  protected applyChanges(changes: CacheChangeSet): void {
    for (const node of changes.nodes) {
      this.nodes.set(node.name, node);
    }
    for (const edge of changes.edges) {
      this.edges.set(edgeRecordKey(edge.sourceName, edge.targetName), edge);
      this.link(edge.sourceName, edge.targetName);
      this.link(edge.targetName, edge.sourceName);
    }
  }

  /** Drops the committed state, used when a backing file is reset. */
  protected clearCommitted(): void {
    this.nodes.clear();
    this.edges.clear();
    this.adjacency.clear();
  }

  protected assertOpen(): void {
    if (this.closed) {
      throw new CacheStoreError("the graph cache store is closed");
    }
  }

  private lookupNode(name: string): CachedNodeRecord | undefined {
    return this.pendingNodes.get(name) ?? this.nodes.get(name);
  }

  private lookupEdge(key: string): CachedEdgeRecord | undefined {
    return this.pendingEdges.get(key) ?? this.edges.get(key);
  }

  private *currentNodes(): Iterable<CachedNodeRecord> {
    for (const [name, record] of this.nodes) {
      if (!this.pendingNodes.has(name)) {
        yield record;
      }
    }
    yield* this.pendingNodes.values();
  }

  private collectNeighborNames(name: string): string[] {
    const names = new Set(this.adjacency.get(name) ?? []);
    for (const edge of this.pendingEdges.values()) {
      if (edge.sourceName === name) {
        names.add(edge.targetName);
      } else if (edge.targetName === name) {
        names.add(edge.sourceName);
      }
    }
    return [...names].sort();
  }

  private link(from: string, to: string): void {
    let neighbors = this.adjacency.get(from);
    if (!neighbors) {
      neighbors = new Set();
      this.adjacency.set(from, neighbors);
    }
    neighbors.add(to);
  }
}
