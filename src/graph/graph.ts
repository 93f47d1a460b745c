import type { GraphCacheStore } from "../cache/store.js";
import { applyCacheWriteBatch, type CacheWriteBatch, type CacheWriteResult } from "../cache/writeBatch.js";
import { createSilentLogger, type StructuredLogger } from "../logger.js";
import { DEFAULT_EDGE_WEIGHT, type Edge } from "./edge.js";
import { EdgeList } from "./edgeList.js";
import { describeError, GraphValidationError } from "./errors.js";
import { identityOf, type NameResolver, type NeighborSource, type NodeIdentity } from "./identity.js";
import { type NeighborAddedEvent, Node, type NodeFactory } from "./node.js";
import { NodeList } from "./nodeList.js";
import { AsyncMutex, SingleFlight } from "./singleFlight.js";

/** Endpoint accepted by {@link Graph.addEdge}: a node, its index or its name. */
export type NodeRef = Node | number | string;

export type NeighborAddedListener = (event: NeighborAddedEvent) => void;

export interface GraphOptions {
  /** Shared cache; the caller owns it and closes it. */
  readonly store: GraphCacheStore;
  /** Origin of neighbor data. Without one, resolution only hydrates from the cache. */
  readonly neighborSource?: NeighborSource;
  /**
   * Canonical-name lookup for candidates unknown to memory and the cache.
   * Without one, a candidate is authentic only when a node already resolves to it.
   */
  readonly nameResolver?: NameResolver;
  readonly nodeFactory?: NodeFactory;
  readonly logger?: StructuredLogger;
}

const defaultNodeFactory: NodeFactory = (init) => new Node(init);

/**
 * Composition root binding the node and edge registries to a cache store and
 * an optional external source. The graph alone decides whether a candidate
 * name denotes a real external entity.
 */
export class Graph {
  readonly nodes: NodeList;
  readonly edges: EdgeList;
  readonly store: GraphCacheStore;
  readonly logger: StructuredLogger;
  readonly neighborSource: NeighborSource | null;
  readonly nameResolver: NameResolver | null;

  private readonly listeners = new Set<NeighborAddedListener>();
  private readonly resolutions = new SingleFlight<void>();
  private readonly storeMutex = new AsyncMutex();

  constructor(options: GraphOptions) {
    this.store = options.store;
    this.logger = options.logger ?? createSilentLogger();
    this.neighborSource = options.neighborSource ?? null;
    this.nameResolver = options.nameResolver ?? null;
    this.nodes = new NodeList(this, options.nodeFactory ?? defaultNodeFactory);
    this.edges = new EdgeList(this);
  }

  addNode(name: string, externalID?: string | null): Promise<Node> {
    return this.nodes.addNodeByName(name, externalID);
  }

  /**
   * Connects two existing nodes and persists the edge. Returns `null` when an
   * endpoint resolves neither in memory nor in the cache.
   */
  async addEdge(source: NodeRef, target: NodeRef, weight: number = DEFAULT_EDGE_WEIGHT): Promise<Edge | null> {
    assertEdgeWeight(weight);
    if (sameRef(source, target)) {
      throw new GraphValidationError("an edge cannot connect a node to itself", { node: describeRef(source) });
    }
    const sourceNode = await this.resolveRef(source);
    const targetNode = await this.resolveRef(target);
    if (!sourceNode || !targetNode) {
      return null;
    }
    if (sourceNode === targetNode) {
      throw new GraphValidationError("an edge cannot connect a node to itself", { node: sourceNode.name });
    }
    return this.edges.addEdge(sourceNode, targetNode, weight, true);
  }

  async addEdgeByIndex(
    sourceIndex: number,
    targetIndex: number,
    weight: number = DEFAULT_EDGE_WEIGHT,
    persistToCache = true,
  ): Promise<Edge | null> {
    assertEdgeWeight(weight);
    if (sourceIndex === targetIndex) {
      throw new GraphValidationError("an edge cannot connect a node to itself", { index: sourceIndex });
    }
    const sourceNode = this.nodes.getNode(sourceIndex);
    const targetNode = this.nodes.getNode(targetIndex);
    if (!sourceNode || !targetNode) {
      return null;
    }
    return this.edges.addEdge(sourceNode, targetNode, weight, persistToCache);
  }

  /** Canonical name of {@link candidate}, or `null` when it denotes nothing known. */
  async getAuthenticNodeName(candidate: string): Promise<string | null> {
    const identity = await this.resolveIdentity(candidate);
    return identity ? identity.name : null;
  }

  /**
   * Canonical identity of {@link candidate}: the name resolver's answer when
   * one is configured, otherwise the node already known under that name.
   */
  async resolveIdentity(candidate: string): Promise<NodeIdentity | null> {
    const key = candidate.trim();
    if (key.length === 0) {
      return null;
    }
    if (this.nameResolver) {
      const identity = await this.nameResolver.resolveIdentity(key);
      if (!identity || identity.name.trim().length === 0) {
        return null;
      }
      return identityOf(identity.name.trim(), identity.externalID);
    }
    const node = await this.nodes.getNodeByName(key);
    return node ? node.identity : null;
  }

  async nodeExists(name: string): Promise<boolean> {
    return (await this.getAuthenticNodeName(name)) !== null;
  }

  /** Registers {@link listener} for every first registration of an edge on a node. Returns the unsubscribe function. */
  onNeighborAdded(listener: NeighborAddedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** @internal Delivers the event synchronously; a throwing listener is logged and skipped. */
  notifyNeighborAdded(event: NeighborAddedEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn("neighbor_listener_failed", {
          node: event.node.name,
          neighbor: event.neighbor.name,
          message: describeError(error),
        });
      }
    }
  }

  /** @internal Runs the neighbor resolution of {@link nodeName}, sharing it with concurrent callers. */
  runResolution(nodeName: string, operation: () => Promise<void>): Promise<void> {
    return this.resolutions.run(nodeName, operation);
  }

  /** @internal Reads from the store outside of any in-progress batch. */
  readCache<T>(operation: (store: GraphCacheStore) => Promise<T>): Promise<T> {
    return this.storeMutex.runExclusive(() => operation(this.store));
  }

  /** @internal Applies {@link batch} with a single commit. */
  async commitBatch(batch: CacheWriteBatch): Promise<CacheWriteResult> {
    try {
      return await this.storeMutex.runExclusive(() => applyCacheWriteBatch(this.store, batch));
    } catch (error) {
      this.logger.error("cache_commit_failed", { operations: batch.size, message: describeError(error) });
      throw error;
    }
  }

  private async resolveRef(ref: NodeRef): Promise<Node | null> {
    if (ref instanceof Node) {
      if (ref.graph !== this) {
        throw new GraphValidationError(`node '${ref.name}' belongs to another graph`, { node: ref.name });
      }
      return ref;
    }
    if (typeof ref === "number") {
      return this.nodes.getNode(ref) ?? null;
    }
    return this.nodes.getNodeByName(ref);
  }
}

function assertEdgeWeight(weight: number): void {
  if (typeof weight !== "number" || !Number.isFinite(weight) || weight <= 0) {
    throw new GraphValidationError("edge weight must be a finite number greater than zero", { weight });
  }
}

function sameRef(left: NodeRef, right: NodeRef): boolean {
  if (typeof left === "string" && typeof right === "string") {
    return left.trim() === right.trim();
  }
  return left === right;
}

function describeRef(ref: NodeRef): string | number {
  return ref instanceof Node ? ref.name : ref;
}
