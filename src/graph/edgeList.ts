import { CacheWriteBatch } from "../cache/writeBatch.js";
import { DEFAULT_EDGE_WEIGHT, Edge, edgeKey, validateEdge } from "./edge.js";
import type { Graph } from "./graph.js";
import type { Node } from "./node.js";
import { SingleFlight } from "./singleFlight.js";

/** Registry holding at most one edge per unordered pair of nodes. */
export class EdgeList {
  private readonly edges = new Map<string, Edge>();
  private readonly pendingPersists = new SingleFlight<Edge>();

  constructor(private readonly graph: Graph) {}

  get size(): number {
    return this.edges.size;
  }

  /**
   * Connects {@link source} and {@link target}. A self-loop returns `null` and
   * an already connected pair returns the existing edge, both without side
   * effects. With {@link persistToCache} the edge and both endpoint records
   * are upserted, either into {@link batch} (the caller commits) or with a
   * commit of their own that only happens when a record changed.
   */
  async addEdge(
    source: Node,
    target: Node,
    weight: number = DEFAULT_EDGE_WEIGHT,
    persistToCache = true,
    batch?: CacheWriteBatch,
  ): Promise<Edge | null> {
    if (source === target) {
      return null;
    }
    const existing = this.getEdge(source, target);
    if (existing) {
      return existing;
    }
    if (!persistToCache) {
      return this.connect(source, target, weight);
    }

    validateEdge(source, target, weight);
    if (batch) {
      stageEdge(batch, source, target, weight);
      return this.connect(source, target, weight);
    }
    return this.pendingPersists.run(edgeKey(source.index, target.index), () =>
      this.persistEdge(source, target, weight),
    );
  }

  /**
   * Commits the edge, then registers it. Concurrent callers for the same pair
   * share this call; when another path registered the pair during the commit,
   * the cache is brought in line with the edge held in memory.
   */
  private async persistEdge(source: Node, target: Node, weight: number): Promise<Edge> {
    await this.graph.commitBatch(stageEdge(new CacheWriteBatch(), source, target, weight));
    const edge = this.connect(source, target, weight);
    if (edge.weight !== weight) {
      await this.graph.commitBatch(new CacheWriteBatch().upsertEdge(source.name, target.name, edge.weight));
    }
    return edge;
  }

  /**
   * Synchronous check-then-insert of the in-memory edge. Returns the existing
   * edge when the pair is already connected.
   */
  connect(source: Node, target: Node, weight: number = DEFAULT_EDGE_WEIGHT): Edge {
    const existing = this.getEdge(source, target);
    if (existing) {
      return existing;
    }
    const edge = new Edge(source, target, weight);
    this.edges.set(edge.key, edge);
    this.graph.logger.debug("edge_created", { source: source.name, target: target.name, weight });
    return edge;
  }

  getEdge(nodeA: Node, nodeB: Node): Edge | undefined {
    return this.edges.get(edgeKey(nodeA.index, nodeB.index));
  }

  getEdgeByIndex(indexA: number, indexB: number): Edge | undefined {
    return this.edges.get(edgeKey(indexA, indexB));
  }

  /** Resolves both names through memory and the cache, without validation. */
  async getEdgeByName(nameA: string, nameB: string): Promise<Edge | undefined> {
    const nodeA = await this.graph.nodes.getNodeByName(nameA);
    const nodeB = await this.graph.nodes.getNodeByName(nameB);
    if (!nodeA || !nodeB) {
      return undefined;
    }
    return this.getEdge(nodeA, nodeB);
  }

  /** Edges sorted by their canonical index pair, ascending. */
  list(): Edge[] {
    return [...this.edges.values()].sort((left, right) => {
      const [leftMin, leftMax] = left.indices;
      const [rightMin, rightMax] = right.indices;
      return leftMin - rightMin || leftMax - rightMax;
    });
  }
}

function stageEdge(batch: CacheWriteBatch, source: Node, target: Node, weight: number): CacheWriteBatch {
  return batch
    .upsertNode(source.name, source.externalID)
    .upsertNode(target.name, target.externalID)
    .upsertEdge(source.name, target.name, weight);
}
