import { CacheWriteBatch } from "../cache/writeBatch.js";
import { DEFAULT_EDGE_WEIGHT, type Edge } from "./edge.js";
import { describeError, GraphError, GraphValidationError, NeighborFetchError } from "./errors.js";
import type { Graph } from "./graph.js";
import { identityOf, type NodeIdentity } from "./identity.js";

/**
 * Number of hops materialized when neighbors are hydrated from the cache.
 * Neighbors created by hydration are registered but never resolved in turn,
 * which bounds the fan-out of a single resolution.
 */
export const HYDRATION_DEPTH = 1;

/** Arguments handed to a {@link NodeFactory}. */
export interface NodeInit {
  readonly graph: Graph;
  readonly index: number;
  readonly name: string;
  readonly externalID: string | null;
  /** Cached flag read from the store when the node is materialized from a record. */
  readonly areNeighborsCached?: boolean;
}

/** Builds the concrete node registered by a graph. */
export type NodeFactory = (init: NodeInit) => Node;

export type NodeLoadState = "unresolved" | "cached" | "loaded";

/** Payload delivered to `neighborAdded` listeners. */
export interface NeighborAddedEvent {
  readonly node: Node;
  readonly neighbor: Node;
  readonly edge: Edge;
}

/**
 * Named vertex and unit of lazy loading. Neighbors are fetched from the
 * graph's neighbor source at most once per node (durably recorded in the
 * cache), then hydrated from the cache into memory.
 */
export class Node {
  readonly graph: Graph;
  readonly index: number;
  readonly name: string;
  readonly externalID: string | null;

  private readonly neighborEdges = new Map<string, Edge>();
  private neighborsCachedInStore: boolean;
  private neighborsLoadedLocally = false;

  constructor(init: NodeInit) {
    const name = init.name.trim();
    if (name.length === 0) {
      throw new GraphValidationError("node names must be non-empty", { index: init.index });
    }
    if (!Number.isSafeInteger(init.index) || init.index < 0) {
      throw new GraphValidationError("node indices must be non-negative integers", { index: init.index });
    }
    const externalID = init.externalID?.trim() ?? "";
    this.graph = init.graph;
    this.index = init.index;
    this.name = name;
    this.externalID = externalID.length > 0 ? externalID : null;
    this.neighborsCachedInStore = init.areNeighborsCached ?? false;
  }

  get areNeighborsCachedInStore(): boolean {
    return this.neighborsCachedInStore;
  }

  get areNeighborsLoadedLocally(): boolean {
    return this.neighborsLoadedLocally;
  }

  get loadState(): NodeLoadState {
    if (!this.neighborsCachedInStore) {
      return "unresolved";
    }
    return this.neighborsLoadedLocally ? "loaded" : "cached";
  }

  get identity(): NodeIdentity {
    return identityOf(this.name, this.externalID);
  }

  /** Number of neighbors currently held in memory, without triggering a load. */
  get localDegree(): number {
    return this.neighborEdges.size;
  }

  /** Neighbors currently held in memory, in registration order, without triggering a load. */
  get localNeighbors(): Node[] {
    return [...this.neighborEdges.values()].map((edge) => edge.other(this));
  }

  get localEdges(): Edge[] {
    return [...this.neighborEdges.values()];
  }

  async getNeighbors(): Promise<Node[]> {
    await this.resolveNeighbors();
    return this.localNeighbors;
  }

  async getDegree(): Promise<number> {
    await this.resolveNeighbors();
    return this.localDegree;
  }

  /**
   * Completes the lazy-loading sequence. Concurrent calls for the same node
   * share one in-flight resolution; a failure leaves the node retryable.
   */
  async resolveNeighbors(): Promise<void> {
    if (this.neighborsCachedInStore && this.neighborsLoadedLocally) {
      return;
    }
    await this.graph.runResolution(this.name, () => this.loadNeighbors());
  }

  /**
   * Registers {@link edge} on this endpoint. Called by the edge constructor
   * for both endpoints; repeated registration of the same pair is ignored.
   */
  addNeighborEdge(edge: Edge): void {
    if (!edge.touches(this)) {
      throw new GraphValidationError(`edge does not touch node '${this.name}'`, {
        node: this.name,
        source: edge.source.name,
        target: edge.target.name,
      });
    }
    const key = edge.key;
    if (this.neighborEdges.has(key)) {
      return;
    }
    this.neighborEdges.set(key, edge);
    this.graph.notifyNeighborAdded({ node: this, neighbor: edge.other(this), edge });
  }

  toString(): string {
    return `Node(${this.index}, ${this.name})`;
  }

  private async loadNeighbors(): Promise<void> {
    if (!this.neighborsCachedInStore) {
      await this.fetchAndCacheNeighbors();
    }
    if (!this.neighborsLoadedLocally) {
      await this.hydrateFromCache();
    }
  }

  /**
   * Asks the neighbor source for this node's neighbors, validates each one
   * through the graph, and writes the nodes, edges and the cached flag with
   * a single commit. The flag is set and the edges are registered in memory
   * only once that commit succeeded.
   */
  private async fetchAndCacheNeighbors(): Promise<void> {
    const { logger, neighborSource } = this.graph;
    const batch = new CacheWriteBatch().upsertNode(this.name, this.externalID);
    const accepted: Node[] = [];

    if (neighborSource) {
      try {
        const identities = await neighborSource.fetchNeighbors(this.identity);
        for (const identity of identities) {
          const neighbor = await this.graph.nodes.getNodeByName(identity.name, {
            canValidateAndLoad: true,
            externalID: identity.externalID,
            batch,
          });
          if (!neighbor || neighbor === this) {
            logger.debug("neighbor_skipped", { node: this.name, candidate: identity.name });
            continue;
          }
          const weight = this.graph.edges.getEdge(this, neighbor)?.weight ?? DEFAULT_EDGE_WEIGHT;
          batch.upsertNode(neighbor.name, neighbor.externalID);
          batch.upsertEdge(this.name, neighbor.name, weight);
          accepted.push(neighbor);
        }
      } catch (error) {
        if (error instanceof GraphError) {
          throw error;
        }
        logger.warn("neighbor_fetch_failed", { node: this.name, message: describeError(error) });
        throw new NeighborFetchError(this.name, error);
      }
    }

    batch.setNeighborsCached(this.name, true);
    await this.graph.commitBatch(batch);
    this.neighborsCachedInStore = true;
    for (const neighbor of accepted) {
      this.graph.edges.connect(this, neighbor);
    }
    logger.info("neighbors_fetched", { node: this.name, neighbors: accepted.length });
  }

  /**
   * Materializes the cached neighbors of this node, {@link HYDRATION_DEPTH}
   * hops out. Every node of an expanded frontier ends up with its complete
   * cached neighbor set in memory.
   */
  private async hydrateFromCache(): Promise<void> {
    let frontier: Node[] = [this];
    let created = 0;
    for (let hop = 0; hop < HYDRATION_DEPTH && frontier.length > 0; hop += 1) {
      const next: Node[] = [];
      for (const node of frontier) {
        const records = await this.graph.readCache((store) => store.neighborsOf(node.name));
        for (const record of records) {
          const neighbor = this.graph.nodes.materialize(record);
          if (neighbor === node) {
            continue;
          }
          if (!this.graph.edges.getEdge(node, neighbor)) {
            this.graph.edges.connect(node, neighbor);
            created += 1;
          }
          if (!neighbor.neighborsLoadedLocally) {
            next.push(neighbor);
          }
        }
        node.neighborsLoadedLocally = true;
      }
      frontier = next;
    }
    this.graph.logger.debug("neighbors_hydrated", { node: this.name, degree: this.localDegree, edges_created: created });
  }
}
