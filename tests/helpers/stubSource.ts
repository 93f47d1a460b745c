import { identityOf, type NameResolver, type NeighborSource, type NodeIdentity } from "../../src/graph/identity.js";

/** Clock pinned to 2024-03-05 so cached records carry a predictable creation date. */
export const FIXED_DATE = "2024-03-05";
export const fixedClock = (): Date => new Date(`${FIXED_DATE}T10:00:00.000Z`);

/**
 * Scripted neighbor source. Every name appearing in the adjacency (as a key
 * or as a neighbor) is authentic; anything else resolves to `null`.
 */
export class StubNeighborSource implements NeighborSource, NameResolver {
  readonly fetchCalls: string[] = [];
  readonly resolveCalls: string[] = [];

  private readonly adjacency = new Map<string, readonly string[]>();
  private readonly known = new Set<string>();
  private readonly failures = new Map<string, Error>();
  private gate: Promise<void> | null = null;

  constructor(adjacency: Readonly<Record<string, readonly string[]>> = {}) {
    for (const [name, neighbors] of Object.entries(adjacency)) {
      this.adjacency.set(name, neighbors);
      this.known.add(name);
      for (const neighbor of neighbors) {
        this.known.add(neighbor);
      }
    }
  }

  /** Makes the next fetch of {@link name} throw {@link error}. */
  failNext(name: string, error: Error): void {
    this.failures.set(name, error);
  }

  /** Blocks every fetch until the returned function is called. */
  hold(): () => void {
    let release: () => void = () => {};
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    return () => {
      this.gate = null;
      release();
    };
  }

  async fetchNeighbors(identity: NodeIdentity): Promise<readonly NodeIdentity[]> {
    this.fetchCalls.push(identity.name);
    if (this.gate) {
      await this.gate;
    }
    const failure = this.failures.get(identity.name);
    if (failure) {
      this.failures.delete(identity.name);
      throw failure;
    }
    return (this.adjacency.get(identity.name) ?? []).map((name) => identityOf(name));
  }

  async resolveIdentity(candidate: string): Promise<NodeIdentity | null> {
    this.resolveCalls.push(candidate);
    return this.known.has(candidate) ? identityOf(candidate) : null;
  }
}
