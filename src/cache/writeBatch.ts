import { CacheStoreError, describeError, GraphError } from "../graph/errors.js";
import type { GraphCacheStore } from "./store.js";

/** Single staged write. */
export type CacheWriteOperation =
  | { readonly kind: "upsertNode"; readonly name: string; readonly externalID: string | null }
  | { readonly kind: "upsertEdge"; readonly nameA: string; readonly nameB: string; readonly weight: number }
  | { readonly kind: "setNeighborsCached"; readonly name: string; readonly areNeighborsCached: boolean };

/**
 * Unit of work collecting cache writes so a logical step (one node creation,
 * one neighbor resolution) reaches the store with a single commit.
 */
export class CacheWriteBatch {
  private readonly operations: CacheWriteOperation[] = [];

  upsertNode(name: string, externalID: string | null): this {
    this.operations.push({ kind: "upsertNode", name, externalID });
    return this;
  }

  upsertEdge(nameA: string, nameB: string, weight: number): this {
    this.operations.push({ kind: "upsertEdge", nameA, nameB, weight });
    return this;
  }

  setNeighborsCached(name: string, areNeighborsCached: boolean): this {
    this.operations.push({ kind: "setNeighborsCached", name, areNeighborsCached });
    return this;
  }

  get size(): number {
    return this.operations.length;
  }

  get isEmpty(): boolean {
    return this.operations.length === 0;
  }

  list(): readonly CacheWriteOperation[] {
    return [...this.operations];
  }
}

/** Outcome of {@link applyCacheWriteBatch}. */
export interface CacheWriteResult {
  /** Number of operations that changed a record. */
  readonly writes: number;
  readonly committed: boolean;
}

/**
 * Applies the staged operations in order and commits once when at least one
 * record changed. Any failure rolls the store back and propagates; failures
 * that are not already graph errors are wrapped in {@link CacheStoreError}.
 *
 * Edge upserts only count as writes when the stored weight differs, so a
 * batch replaying known edges leaves the store untouched.
 */
export async function applyCacheWriteBatch(
  store: GraphCacheStore,
  batch: CacheWriteBatch,
): Promise<CacheWriteResult> {
  if (batch.isEmpty) {
    return { writes: 0, committed: false };
  }

  let writes = 0;
  try {
    for (const operation of batch.list()) {
      if (await applyOperation(store, operation)) {
        writes += 1;
      }
    }
    if (writes > 0) {
      await store.commit();
    }
  } catch (error) {
    await rollbackAfterFailure(store, error);
    if (error instanceof GraphError) {
      throw error;
    }
    throw new CacheStoreError(`cache write failed: ${describeError(error)}`, { writes }, error);
  }
  return { writes, committed: writes > 0 };
}

async function applyOperation(store: GraphCacheStore, operation: CacheWriteOperation): Promise<boolean> {
  switch (operation.kind) {
    case "upsertNode": {
      const before = await store.findNodeByName(operation.name);
      const after = await store.upsertNode(operation.name, operation.externalID);
      return before === undefined || before.externalID !== after.externalID;
    }
    case "upsertEdge": {
      const before = await store.findEdgeByNames(operation.nameA, operation.nameB);
      if (before && before.weight === operation.weight) {
        return false;
      }
      await store.upsertEdge(operation.nameA, operation.nameB, operation.weight);
      return true;
    }
    case "setNeighborsCached": {
      const before = await store.findNodeByName(operation.name);
      await store.setNeighborsCached(operation.name, operation.areNeighborsCached);
      return before?.areNeighborsCached !== operation.areNeighborsCached;
    }
  }
}

async function rollbackAfterFailure(store: GraphCacheStore, cause: unknown): Promise<void> {
  try {
    await store.rollback();
  } catch (rollbackError) {
    throw new CacheStoreError(
      `cache rollback failed after: ${describeError(cause)}`,
      { rollback: describeError(rollbackError) },
      cause,
    );
  }
}
