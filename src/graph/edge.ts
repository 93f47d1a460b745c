import { GraphValidationError } from "./errors.js";
import { Node } from "./node.js";

export const DEFAULT_EDGE_WEIGHT = 1;

/** Canonical key of the unordered index pair, smaller index first. */
export function edgeKey(indexA: number, indexB: number): string {
  return indexA < indexB ? `${indexA}:${indexB}` : `${indexB}:${indexA}`;
}

/** Throws {@link GraphValidationError} unless the arguments describe a valid edge. */
export function validateEdge(source: Node, target: Node, weight: number): void {
  if (!(source instanceof Node) || !(target instanceof Node)) {
    throw new GraphValidationError("edge endpoints must be graph nodes");
  }
  if (source.graph !== target.graph) {
    throw new GraphValidationError("edge endpoints must belong to the same graph", {
      source: source.name,
      target: target.name,
    });
  }
  if (typeof weight !== "number" || !Number.isFinite(weight) || weight <= 0) {
    throw new GraphValidationError("edge weight must be a finite number greater than zero", { weight });
  }
  if (source.index === target.index) {
    throw new GraphValidationError("an edge cannot connect a node to itself", { node: source.name });
  }
}

/**
 * Undirected weighted connection between two nodes of the same graph.
 * Construction registers the edge on both endpoints; the edge never changes
 * afterwards.
 */
export class Edge {
  readonly source: Node;
  readonly target: Node;
  readonly weight: number;

  constructor(source: Node, target: Node, weight: number = DEFAULT_EDGE_WEIGHT) {
    validateEdge(source, target, weight);

    this.source = source;
    this.target = target;
    this.weight = weight;
    Object.freeze(this);

    source.addNeighborEdge(this);
    target.addNeighborEdge(this);
  }

  get key(): string {
    return edgeKey(this.source.index, this.target.index);
  }

  /** Endpoint indices in canonical order. */
  get indices(): [number, number] {
    const { index: a } = this.source;
    const { index: b } = this.target;
    return a < b ? [a, b] : [b, a];
  }

  touches(node: Node): boolean {
    return node === this.source || node === this.target;
  }

  /** Endpoint opposite to {@link node}. */
  other(node: Node): Node {
    if (node === this.source) {
      return this.target;
    }
    if (node === this.target) {
      return this.source;
    }
    throw new GraphValidationError(`node '${node.name}' is not an endpoint of this edge`, {
      node: node.name,
      source: this.source.name,
      target: this.target.name,
    });
  }

  toString(): string {
    return `Edge(${this.source.name} <-> ${this.target.name}, ${this.weight})`;
  }
}
