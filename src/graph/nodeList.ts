import { type CachedNodeRecord, normaliseExternalID } from "../cache/store.js";
import { CacheWriteBatch } from "../cache/writeBatch.js";
import { GraphValidationError } from "./errors.js";
import type { Graph } from "./graph.js";
import type { Node, NodeFactory } from "./node.js";

/** Options accepted by {@link NodeList.getNodeByName}. */
export interface GetNodeByNameOptions {
  /**
   * On a miss in memory and in the cache, ask the graph for the canonical
   * identity of the candidate and create the node when one exists.
   */
  readonly canValidateAndLoad?: boolean;
  /** External ID stored with a node created by validation, preferred over the resolver's. */
  readonly externalID?: string | null;
  /** Stages the insertion of a validated node here instead of committing it. */
  readonly batch?: CacheWriteBatch;
}

/**
 * Registry of the nodes of one graph, indexed by creation order and by name.
 * Registration is synchronous and checks the name index first, so concurrent
 * resolutions of the same name always end up with the same node.
 */
export class NodeList {
  private readonly byIndex: Node[] = [];
  private readonly byName = new Map<string, Node>();
  private readonly byExternalID = new Map<string, Node>();

  constructor(
    private readonly graph: Graph,
    private readonly factory: NodeFactory,
  ) {}

  get size(): number {
    return this.byIndex.length;
  }

  /** In-memory lookup by index or by name. */
  get(key: number | string): Node | undefined {
    return typeof key === "number" ? this.getNode(key) : this.byName.get(key.trim());
  }

  getNode(index: number): Node | undefined {
    return Number.isInteger(index) && index >= 0 ? this.byIndex[index] : undefined;
  }

  /** Nodes in index order. */
  list(): Node[] {
    return [...this.byIndex];
  }

  /**
   * Returns the node called {@link name}, creating and persisting it when
   * neither memory nor the cache knows it.
   */
  async addNodeByName(name: string, externalID?: string | null): Promise<Node> {
    const key = name.trim();
    if (key.length === 0) {
      throw new GraphValidationError("node names must be non-empty", { name });
    }
    const existing = await this.getNodeByName(key);
    if (existing) {
      return existing;
    }
    const normalisedExternalID = normaliseExternalID(externalID);
    await this.graph.commitBatch(new CacheWriteBatch().upsertNode(key, normalisedExternalID));
    return this.register(key, normalisedExternalID, false);
  }

  /**
   * Three-tier resolution: memory, then the cache (materialized with its
   * stored flag, neighbors untouched), then, with `canValidateAndLoad`, the
   * graph's identity resolution. Returns `null` when nothing matches.
   */
  async getNodeByName(name: string, options: GetNodeByNameOptions = {}): Promise<Node | null> {
    const key = name.trim();
    if (key.length === 0) {
      return null;
    }
    const known = await this.findKnown(key);
    if (known || !options.canValidateAndLoad) {
      return known;
    }

    const identity = await this.graph.resolveIdentity(key);
    if (!identity) {
      return null;
    }
    const canonicalName = identity.name.trim();
    if (canonicalName.length === 0) {
      return null;
    }
    const canonical = canonicalName === key ? null : await this.findKnown(canonicalName);
    if (canonical) {
      return canonical;
    }

    const externalID = normaliseExternalID(options.externalID) ?? normaliseExternalID(identity.externalID);
    if (options.batch) {
      options.batch.upsertNode(canonicalName, externalID);
    } else {
      await this.graph.commitBatch(new CacheWriteBatch().upsertNode(canonicalName, externalID));
    }
    return this.register(canonicalName, externalID, false);
  }

  /** Memory first, then the cache; a unique cache match only. */
  async getNodeByExternalID(externalID: string): Promise<Node | undefined> {
    const key = normaliseExternalID(externalID);
    if (key === null) {
      return undefined;
    }
    const local = this.byExternalID.get(key);
    if (local) {
      return local;
    }
    const record = await this.graph.readCache((store) => store.findNodeByExternalID(key));
    return record ? this.materialize(record) : undefined;
  }

  /**
   * Returns the in-memory node for {@link record}, registering it with the
   * record's cached flag when absent. Never persists and never loads neighbors.
   */
  materialize(record: CachedNodeRecord): Node {
    return this.register(record.name, record.externalID, record.areNeighborsCached);
  }

  private async findKnown(name: string): Promise<Node | null> {
    const local = this.byName.get(name);
    if (local) {
      return local;
    }
    const record = await this.graph.readCache((store) => store.findNodeByName(name));
    return record ? this.materialize(record) : null;
  }

  private register(name: string, externalID: string | null, areNeighborsCached: boolean): Node {
    const existing = this.byName.get(name);
    if (existing) {
      return existing;
    }
    const node = this.factory({ graph: this.graph, index: this.byIndex.length, name, externalID, areNeighborsCached });
    if (node.index !== this.byIndex.length || node.name !== name || node.graph !== this.graph) {
      throw new GraphValidationError("node factory returned a node that does not match its init", {
        name,
        index: this.byIndex.length,
      });
    }
    this.byIndex.push(node);
    this.byName.set(name, node);
    if (node.externalID !== null && !this.byExternalID.has(node.externalID)) {
      this.byExternalID.set(node.externalID, node);
    }
    this.graph.logger.debug("node_created", { name, index: node.index, cached: areNeighborsCached });
    return node;
  }
}
