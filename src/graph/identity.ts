/** Identity of an entity as known to an external source. */
export interface NodeIdentity {
  readonly name: string;
  readonly externalID: string | null;
}

/**
 * Out-of-process origin of neighbor data. Implementations must tolerate being
 * called any number of times; the graph calls them at most once per node per
 * process while the node's neighbors are not cached.
 */
export interface NeighborSource {
  fetchNeighbors(identity: NodeIdentity): Promise<readonly NodeIdentity[]>;
}

/**
 * Maps a user-supplied candidate to the canonical identity of a real external
 * entity, or `null` when the source knows nothing matching.
 */
export interface NameResolver {
  resolveIdentity(candidate: string): Promise<NodeIdentity | null>;
}

export function identityOf(name: string, externalID?: string | null): NodeIdentity {
  return { name, externalID: externalID ?? null };
}
