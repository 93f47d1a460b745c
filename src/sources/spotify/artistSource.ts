import { DEFAULT_SPOTIFY_NEIGHBOR_COUNT } from "../../config/graphConfig.js";
import type { NameResolver, NeighborSource, NodeIdentity } from "../../graph/identity.js";
import type { StructuredLogger } from "../../logger.js";
import type { SpotifyArtistApi } from "./client.js";
import { SpotifyArtistSourceError } from "./errors.js";

export interface SpotifyArtistSourceOptions {
  readonly client: SpotifyArtistApi;
  /** Related artists kept per node. Non-positive values fall back to the default. */
  readonly neighborCount?: number;
  readonly logger?: StructuredLogger;
}

/**
 * Artist graph backed by the Spotify Web API. Candidates resolve to the first
 * search hit; an artist's neighbors are its related artists, truncated to
 * {@link SpotifyArtistSource.neighborCount}.
 */
export class SpotifyArtistSource implements NeighborSource, NameResolver {
  readonly neighborCount: number;
  private readonly client: SpotifyArtistApi;
  private readonly logger: StructuredLogger | null;

  constructor(options: SpotifyArtistSourceOptions) {
    this.client = options.client;
    const requested = options.neighborCount ?? DEFAULT_SPOTIFY_NEIGHBOR_COUNT;
    this.neighborCount = requested > 0 ? Math.floor(requested) : DEFAULT_SPOTIFY_NEIGHBOR_COUNT;
    this.logger = options.logger ?? null;
  }

  async resolveIdentity(candidate: string): Promise<NodeIdentity | null> {
    const [first] = await this.client.searchArtists(candidate);
    return first ? { name: first.name, externalID: first.id } : null;
  }

  async fetchNeighbors(identity: NodeIdentity): Promise<readonly NodeIdentity[]> {
    const artistId = identity.externalID ?? (await this.lookupArtistId(identity.name));
    if (!artistId) {
      throw new SpotifyArtistSourceError(identity.name);
    }
    const related = await this.client.relatedArtists(artistId);
    this.logger?.debug("spotify_related_artists", { artist: identity.name, count: related.length });
    return related.slice(0, this.neighborCount).map((artist) => ({ name: artist.name, externalID: artist.id }));
  }

  /** ID of the search hit whose name equals {@link name} exactly. */
  private async lookupArtistId(name: string): Promise<string | null> {
    const matches = await this.client.searchArtists(name);
    return matches.find((artist) => artist.name === name)?.id ?? null;
  }
}
