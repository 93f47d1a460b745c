import { distance as levenshteinDistance } from "fastest-levenshtein";
import Graphology from "graphology";

import type { NameResolver, NeighborSource, NodeIdentity } from "../graph/identity.js";

/**
 * Read-only surface of an in-memory graph. A graphology graph satisfies it
 * as is; vertices are addressed by their string key.
 */
export interface StaticGraphView {
  hasNode(node: string): boolean;
  nodes(): string[];
  neighbors(node: string): string[];
  getNodeAttributes(node: string): Record<string, unknown>;
}

export type UndirectedGraphology = InstanceType<typeof Graphology.UndirectedGraph>;

/** Empty undirected graphology graph, reached through the package's CommonJS default export. */
export function createUndirectedGraph(): UndirectedGraphology {
  return new Graphology.UndirectedGraph();
}

export interface StaticGraphSourceOptions {
  /**
   * Largest Levenshtein distance accepted when no vertex matches a candidate
   * exactly. `0` disables fuzzy matching.
   */
  readonly maxTypoDistance?: number;
}

/**
 * Neighbor source and name resolver over a static graph. A vertex's canonical
 * name is its `name` attribute when set, its key otherwise. Candidates are
 * matched by key, then by `name` attribute, then as an index into `nodes()`,
 * then (when enabled) by the closest name within the typo budget.
 */
export class StaticGraphSource implements NeighborSource, NameResolver {
  private readonly view: StaticGraphView;
  private readonly maxTypoDistance: number;
  private readonly keys: readonly string[];
  private readonly keyByName = new Map<string, string>();

  constructor(view: StaticGraphView, options: StaticGraphSourceOptions = {}) {
    this.view = view;
    this.maxTypoDistance = Math.max(0, Math.floor(options.maxTypoDistance ?? 0));
    this.keys = view.nodes();
    for (const key of this.keys) {
      const name = this.canonicalNameOf(key);
      if (!this.keyByName.has(name)) {
        this.keyByName.set(name, key);
      }
    }
  }

  /** Builds an undirected graphology graph from name pairs. Self-pairs only add the vertex. */
  static fromEdges(
    pairs: Iterable<readonly [string, string]>,
    options: StaticGraphSourceOptions = {},
  ): StaticGraphSource {
    const graph = createUndirectedGraph();
    for (const [left, right] of pairs) {
      graph.mergeNode(left);
      graph.mergeNode(right);
      if (left !== right) {
        graph.mergeEdge(left, right);
      }
    }
    return new StaticGraphSource(graph, options);
  }

  get size(): number {
    return this.keys.length;
  }

  async resolveIdentity(candidate: string): Promise<NodeIdentity | null> {
    const key = this.findVertex(candidate, true);
    return key === null ? null : this.identityOf(key);
  }

  async fetchNeighbors(identity: NodeIdentity): Promise<readonly NodeIdentity[]> {
    const key = this.findVertex(identity.name, false);
    if (key === null) {
      return [];
    }
    return this.view.neighbors(key).map((neighbor) => this.identityOf(neighbor));
  }

  /** Key of the vertex matching {@link candidate}, or `null`. */
  findVertex(candidate: string, allowTypos: boolean): string | null {
    const trimmed = candidate.trim();
    if (trimmed.length === 0) {
      return null;
    }
    if (this.view.hasNode(trimmed)) {
      return trimmed;
    }
    const byName = this.keyByName.get(trimmed);
    if (byName !== undefined) {
      return byName;
    }
    if (/^\d+$/.test(trimmed)) {
      const index = Number.parseInt(trimmed, 10);
      if (index < this.keys.length) {
        return this.keys[index];
      }
    }
    return allowTypos ? this.closestVertex(trimmed) : null;
  }

  canonicalNameOf(key: string): string {
    const name = this.view.getNodeAttributes(key)["name"];
    return typeof name === "string" && name.trim().length > 0 ? name.trim() : key;
  }

  private identityOf(key: string): NodeIdentity {
    const attributes = this.view.getNodeAttributes(key);
    const externalID = attributes["externalID"] ?? attributes["external_id"];
    return {
      name: this.canonicalNameOf(key),
      externalID: typeof externalID === "string" || typeof externalID === "number" ? String(externalID) : null,
    };
  }

  private closestVertex(candidate: string): string | null {
    if (this.maxTypoDistance === 0) {
      return null;
    }
    const wanted = candidate.toLowerCase();
    let best: { key: string; distance: number } | null = null;
    for (const key of this.keys) {
      const distance = levenshteinDistance(wanted, this.canonicalNameOf(key).toLowerCase());
      if (distance <= this.maxTypoDistance && (best === null || distance < best.distance)) {
        best = { key, distance };
      }
    }
    return best ? best.key : null;
  }
}
