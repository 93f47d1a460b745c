import { expect } from "chai";
import { describe, it } from "mocha";

import { SpotifyClient } from "../src/sources/spotify/client.js";
import { SpotifyClientError } from "../src/sources/spotify/errors.js";
import type { AccessTokenProvider } from "../src/sources/spotify/token.js";
import {
  createFetchStub,
  createJsonResponse,
  createTextResponse,
  type FetchStep,
  hangUntilAborted,
  type RecordedRequest,
} from "./helpers/fetchStub.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { captureRejection } from "./helpers/storeContract.js";

const API_BASE_URL = "https://api.spotify.test/v1/";

/** Hands out `token-1`, `token-2`, ... advancing on every invalidation. */
class SequentialTokenProvider implements AccessTokenProvider {
  invalidations = 0;

  async getAccessToken(): Promise<string> {
    return `token-${this.invalidations + 1}`;
  }

  invalidate(): void {
    this.invalidations += 1;
  }
}

function createClient(steps: FetchStep[], options: { maxRetries?: number; timeoutMs?: number } = {}) {
  const requests: RecordedRequest[] = [];
  const tokens = new SequentialTokenProvider();
  const logger = new RecordingLogger();
  const client = new SpotifyClient({
    tokenProvider: tokens,
    apiBaseUrl: API_BASE_URL,
    retryDelayMs: 0,
    maxRetries: options.maxRetries,
    timeoutMs: options.timeoutMs,
    fetchImpl: createFetchStub(steps, requests),
    logger,
  });
  return { client, requests, tokens, logger };
}

async function expectClientFailure(promise: Promise<unknown>, code: string): Promise<SpotifyClientError> {
  const error = await captureRejection(promise);
  if (!(error instanceof SpotifyClientError)) {
    throw new Error(`expected a SpotifyClientError, got ${String(error)}`);
  }
  expect(error.code).to.equal(code);
  return error;
}

const NINA = { id: "artist-1", name: "Nina Simone", popularity: 71, genres: ["jazz"] };

describe("sources/spotify/client", () => {
  it("searches artists with a bearer token and strips extra fields", async () => {
    const { client, requests } = createClient([createJsonResponse({ artists: { items: [NINA], total: 1 } })]);

    expect(await client.searchArtists(" Nina Simone ")).to.deep.equal([{ id: "artist-1", name: "Nina Simone" }]);
    expect(requests).to.have.length(1);
    expect(requests[0]?.url).to.equal(`${API_BASE_URL}search?q=Nina+Simone&type=artist&limit=5`);
    expect(requests[0]?.headers.get("authorization")).to.equal("Bearer token-1");
  });

  it("keeps the path of a base URL given without a trailing slash", async () => {
    const requests: RecordedRequest[] = [];
    const client = new SpotifyClient({
      tokenProvider: new SequentialTokenProvider(),
      apiBaseUrl: "https://api.spotify.test/v1",
      fetchImpl: createFetchStub([createJsonResponse({ artists: { items: [NINA] } })], requests),
    });

    await client.searchArtists("Nina");
    expect(requests.map((request) => request.url)).to.deep.equal([
      "https://api.spotify.test/v1/search?q=Nina&type=artist&limit=5",
    ]);
  });

  it("skips the request for blank queries", async () => {
    const { client, requests } = createClient([]);

    expect(await client.searchArtists("   ")).to.deep.equal([]);
    expect(requests).to.have.length(0);
  });

  it("lists related artists", async () => {
    const { client, requests } = createClient([
      createJsonResponse({ artists: [{ id: "artist-2", name: "Miriam Makeba" }] }),
      createTextResponse(""),
    ]);

    expect(await client.relatedArtists("artist-1")).to.deep.equal([{ id: "artist-2", name: "Miriam Makeba" }]);
    expect(requests[0]?.url).to.equal(`${API_BASE_URL}artists/artist-1/related-artists`);
    expect(await client.relatedArtists("artist-1")).to.deep.equal([]);
  });

  it("refreshes a rejected token once without spending a retry", async () => {
    const { client, requests, tokens } = createClient(
      [createTextResponse("", 401), createJsonResponse({ artists: [] })],
      { maxRetries: 0 },
    );

    expect(await client.relatedArtists("artist-1")).to.deep.equal([]);
    expect(tokens.invalidations).to.equal(1);
    expect(requests.map((request) => request.headers.get("authorization"))).to.deep.equal([
      "Bearer token-1",
      "Bearer token-2",
    ]);
  });

  it("gives up when the refreshed token is rejected too", async () => {
    const { client, requests } = createClient([createTextResponse("", 401), createTextResponse("", 401)]);

    const error = await expectClientFailure(client.relatedArtists("artist-1"), "E-SPOTIFY-AUTH");
    expect(error.status).to.equal(401);
    expect(requests).to.have.length(2);
  });

  it("retries throttling and gateway errors", async () => {
    const { client, requests, logger } = createClient([
      createTextResponse("slow down", 429),
      createTextResponse("bad gateway", 503),
      createJsonResponse({ artists: { items: [NINA] } }),
    ]);

    expect(await client.searchArtists("Nina")).to.have.length(1);
    expect(requests).to.have.length(3);
    expect(logger.find("spotify_request_retry").map((entry) => entry.payload)).to.deep.equal([
      { url: "/v1/search", status: 429, attempt: 1 },
      { url: "/v1/search", status: 503, attempt: 2 },
    ]);
  });

  it("fails once retries are exhausted", async () => {
    const { client, requests } = createClient(
      [createTextResponse("", 503), createTextResponse("", 503), createTextResponse("", 503)],
      { maxRetries: 2 },
    );

    const error = await expectClientFailure(client.searchArtists("Nina"), "E-SPOTIFY-HTTP");
    expect(error.status).to.equal(503);
    expect(requests).to.have.length(3);
  });

  it("does not retry other HTTP errors or network failures", async () => {
    const { client, requests } = createClient([createTextResponse("missing", 404), new TypeError("fetch failed")]);

    const notFound = await expectClientFailure(client.relatedArtists("artist-9"), "E-SPOTIFY-HTTP");
    expect(notFound.status).to.equal(404);
    await expectClientFailure(client.relatedArtists("artist-9"), "E-SPOTIFY-NETWORK");
    expect(requests).to.have.length(2);
  });

  it("rejects payloads that are not JSON or do not match the schema", async () => {
    const { client } = createClient([createTextResponse("<html>"), createJsonResponse({ artists: { total: 0 } })]);

    await expectClientFailure(client.searchArtists("Nina"), "E-SPOTIFY-SCHEMA");
    await expectClientFailure(client.searchArtists("Nina"), "E-SPOTIFY-SCHEMA");
  });

  it("aborts requests exceeding the timeout", async () => {
    const { client } = createClient([hangUntilAborted()], { timeoutMs: 10, maxRetries: 0 });

    const error = await expectClientFailure(client.relatedArtists("artist-1"), "E-SPOTIFY-NETWORK");
    expect(error.message).to.equal("Spotify request timed out");
  });
});
