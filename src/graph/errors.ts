/**
 * Error taxonomy shared by the graph core and the cache stores. Every error
 * carries a stable `code`, an operator `hint` and structured `details` so
 * callers can branch without parsing messages. "Not found" is never an error:
 * lookups return `undefined` or `null` instead.
 */

/** Base class for every failure raised by the graph core or its stores. */
export abstract class GraphError extends Error {
  public abstract readonly code: string;
  public abstract readonly hint: string;
  public readonly details: Record<string, unknown>;

  protected constructor(message: string, details: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.details = details;
  }
}

/** Malformed construction argument: empty name, bad weight, self-loop, foreign endpoint. */
export class GraphValidationError extends GraphError {
  public readonly code = "E-GRAPH-VALIDATION";
  public readonly hint = "fix the offending argument; nothing was created";

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "GraphValidationError";
  }
}

/** The neighbor source failed while a node was resolving its neighbors. */
export class NeighborFetchError extends GraphError {
  public readonly code = "E-GRAPH-SOURCE";
  public readonly hint = "the node stays unresolved; retry once the source recovers";

  constructor(nodeName: string, cause: unknown) {
    super(`failed to fetch neighbors of '${nodeName}'`, { node: nodeName }, { cause });
    this.name = "NeighborFetchError";
  }
}

/** Persistent cache could not be read, written or replayed. */
export class CacheStoreError extends GraphError {
  public readonly code = "E-CACHE-IO";
  public readonly hint = "check the cache location and retry; uncommitted writes were rolled back";

  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, details, { cause });
    this.name = "CacheStoreError";
  }
}

/** A cache record violates a store constraint (canonical order, weight, foreign key). */
export class CacheConstraintError extends GraphError {
  public readonly code = "E-CACHE-CONSTRAINT";
  public readonly hint = "create both node records first and use a positive weight";

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, details);
    this.name = "CacheConstraintError";
  }
}

/** Normalises a thrown value into a message suitable for logs. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
