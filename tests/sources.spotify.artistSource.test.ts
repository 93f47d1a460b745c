import { expect } from "chai";
import { describe, it } from "mocha";

import { InMemoryGraphCacheStore } from "../src/cache/memoryStore.js";
import { NeighborFetchError } from "../src/graph/errors.js";
import { Graph } from "../src/graph/graph.js";
import { SpotifyArtistSource } from "../src/sources/spotify/artistSource.js";
import type { SpotifyArtist, SpotifyArtistApi } from "../src/sources/spotify/client.js";
import { SpotifyArtistSourceError } from "../src/sources/spotify/errors.js";
import { captureRejection } from "./helpers/storeContract.js";

/** In-memory catalogue answering searches by case-insensitive substring. */
class FakeArtistApi implements SpotifyArtistApi {
  readonly searches: string[] = [];
  readonly relatedLookups: string[] = [];

  constructor(
    private readonly artists: readonly SpotifyArtist[],
    private readonly related: Readonly<Record<string, readonly SpotifyArtist[]>>,
  ) {}

  async searchArtists(name: string): Promise<SpotifyArtist[]> {
    this.searches.push(name);
    const wanted = name.toLowerCase();
    return this.artists.filter((artist) => artist.name.toLowerCase().includes(wanted));
  }

  async relatedArtists(artistId: string): Promise<SpotifyArtist[]> {
    this.relatedLookups.push(artistId);
    return [...(this.related[artistId] ?? [])];
  }
}

const NINA = { id: "artist-1", name: "Nina Simone" };
const MIRIAM = { id: "artist-2", name: "Miriam Makeba" };
const ODETTA = { id: "artist-3", name: "Odetta" };
const ABBEY = { id: "artist-4", name: "Abbey Lincoln" };

function createApi(): FakeArtistApi {
  return new FakeArtistApi([NINA, MIRIAM, ODETTA, ABBEY], {
    "artist-1": [MIRIAM, ODETTA, ABBEY],
    "artist-2": [NINA],
  });
}

describe("sources/spotify/artistSource", () => {
  it("resolves a candidate to the first search hit", async () => {
    const source = new SpotifyArtistSource({ client: createApi() });

    expect(await source.resolveIdentity("nina")).to.deep.equal({ name: "Nina Simone", externalID: "artist-1" });
    expect(await source.resolveIdentity("Fela Kuti")).to.equal(null);
  });

  it("truncates related artists to the neighbor count", async () => {
    const api = createApi();
    const source = new SpotifyArtistSource({ client: api, neighborCount: 2 });

    expect(await source.fetchNeighbors({ name: "Nina Simone", externalID: "artist-1" })).to.deep.equal([
      { name: "Miriam Makeba", externalID: "artist-2" },
      { name: "Odetta", externalID: "artist-3" },
    ]);
    expect(api.searches).to.deep.equal([]);
    expect(api.relatedLookups).to.deep.equal(["artist-1"]);
  });

  it("falls back to the default count for non-positive values", () => {
    expect(new SpotifyArtistSource({ client: createApi(), neighborCount: 0 }).neighborCount).to.equal(6);
    expect(new SpotifyArtistSource({ client: createApi(), neighborCount: 2.7 }).neighborCount).to.equal(2);
  });

  it("looks up a missing artist ID by exact name", async () => {
    const api = createApi();
    const source = new SpotifyArtistSource({ client: api });

    expect(await source.fetchNeighbors({ name: "Miriam Makeba", externalID: null })).to.deep.equal([
      { name: "Nina Simone", externalID: "artist-1" },
    ]);
    expect(api.searches).to.deep.equal(["Miriam Makeba"]);
  });

  it("refuses artists without an exact match", async () => {
    const source = new SpotifyArtistSource({ client: createApi() });

    const error = await captureRejection(source.fetchNeighbors({ name: "nina", externalID: null }));
    expect(error).to.be.instanceOf(SpotifyArtistSourceError);
    if (error instanceof SpotifyArtistSourceError) {
      expect(error.code).to.equal("E-SPOTIFY-ARTIST");
      expect(error.details).to.deep.equal({ artist: "nina" });
    }
  });

  it("builds an artist graph from loose candidate names", async () => {
    const source = new SpotifyArtistSource({ client: createApi() });
    const graph = new Graph({ store: new InMemoryGraphCacheStore(), neighborSource: source, nameResolver: source });

    const nina = await graph.nodes.getNodeByName("simone", { canValidateAndLoad: true });
    expect(nina?.identity).to.deep.equal({ name: "Nina Simone", externalID: "artist-1" });

    const neighbors = (await nina?.getNeighbors()) ?? [];
    expect(neighbors.map((node) => node.identity)).to.deep.equal([
      { name: "Miriam Makeba", externalID: "artist-2" },
      { name: "Odetta", externalID: "artist-3" },
      { name: "Abbey Lincoln", externalID: "artist-4" },
    ]);
  });

  it("surfaces source failures as neighbor fetch errors", async () => {
    const source = new SpotifyArtistSource({ client: createApi() });
    const graph = new Graph({ store: new InMemoryGraphCacheStore(), neighborSource: source, nameResolver: source });
    const stranger = await graph.addNode("Unknown Singer");

    const error = await captureRejection(stranger.getNeighbors());
    expect(error).to.be.instanceOf(NeighborFetchError);
    if (error instanceof NeighborFetchError) {
      expect(error.cause).to.be.instanceOf(SpotifyArtistSourceError);
    }
  });
});
