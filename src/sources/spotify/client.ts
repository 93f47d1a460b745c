import { setTimeout as delay } from "node:timers/promises";

import { z } from "zod";

import { DEFAULT_SPOTIFY_API_BASE_URL, ensureTrailingSlash } from "../../config/graphConfig.js";
import type { StructuredLogger } from "../../logger.js";
import {
  ERROR_SPOTIFY_AUTH,
  ERROR_SPOTIFY_HTTP,
  ERROR_SPOTIFY_NETWORK,
  ERROR_SPOTIFY_SCHEMA,
  SpotifyClientError,
} from "./errors.js";
import type { AccessTokenProvider } from "./token.js";

/** Default number of artists requested by {@link SpotifyClient.searchArtists}. */
export const DEFAULT_SEARCH_LIMIT = 5;

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 150;

const artistSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
  })
  .passthrough()
  .transform((artist): SpotifyArtist => ({ id: artist.id, name: artist.name }));

const searchResponseSchema = z
  .object({
    artists: z.object({ items: z.array(artistSchema) }).passthrough(),
  })
  .passthrough();

const relatedArtistsResponseSchema = z
  .object({
    artists: z.array(artistSchema),
  })
  .passthrough();

/** Artist reduced to the fields the graph needs. */
export interface SpotifyArtist {
  readonly id: string;
  readonly name: string;
}

/** Operations the artist source relies on. */
export interface SpotifyArtistApi {
  searchArtists(name: string, limit?: number): Promise<SpotifyArtist[]>;
  relatedArtists(artistId: string): Promise<SpotifyArtist[]>;
}

export interface SpotifyClientOptions {
  readonly tokenProvider: AccessTokenProvider;
  readonly apiBaseUrl?: string;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  /** Base delay of the linear backoff applied between retries. */
  readonly retryDelayMs?: number;
  readonly fetchImpl?: typeof fetch;
  readonly logger?: StructuredLogger;
}

/** Helper discriminating whether a status should trigger a retry. */
function isRetriableStatus(status: number): boolean {
  return status === 429 || status === 502 || status === 503 || status === 504;
}

/**
 * Minimal Spotify Web API client. Requests carry a bearer token from the
 * provider, time out through an `AbortController`, are retried on throttling
 * and gateway errors, and have their payloads validated before use.
 */
export class SpotifyClient implements SpotifyArtistApi {
  private readonly tokenProvider: AccessTokenProvider;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: StructuredLogger | null;

  constructor(options: SpotifyClientOptions) {
    this.tokenProvider = options.tokenProvider;
    this.apiBaseUrl = ensureTrailingSlash(options.apiBaseUrl ?? DEFAULT_SPOTIFY_API_BASE_URL);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS);
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? null;
  }

  /** Artists matching {@link name}, in Spotify's relevance order. */
  async searchArtists(name: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<SpotifyArtist[]> {
    const query = name.trim();
    if (query.length === 0) {
      return [];
    }
    const url = new URL("search", this.apiBaseUrl);
    url.search = new URLSearchParams({ q: query, type: "artist", limit: String(limit) }).toString();
    const payload = await this.getJson(url);
    if (payload === null) {
      return [];
    }
    return this.validate(searchResponseSchema, payload).artists.items;
  }

  /** Artists Spotify lists as related to {@link artistId}. */
  async relatedArtists(artistId: string): Promise<SpotifyArtist[]> {
    const url = new URL(`artists/${encodeURIComponent(artistId.trim())}/related-artists`, this.apiBaseUrl);
    const payload = await this.getJson(url);
    if (payload === null) {
      return [];
    }
    return this.validate(relatedArtistsResponseSchema, payload).artists;
  }

  /** GETs {@link url}; `null` stands for an empty body. */
  private async getJson(url: URL): Promise<unknown> {
    const maxAttempts = this.maxRetries + 1;
    let attempt = 0;
    let refreshedToken = false;
    let lastError: unknown;

    while (attempt < maxAttempts) {
      attempt += 1;
      try {
        const token = await this.tokenProvider.getAccessToken();
        const response = await this.performRequest(url, token);
        return await this.parseBody(response);
      } catch (error) {
        lastError = error;
        if (!(error instanceof SpotifyClientError)) {
          throw error;
        }
        if (error.code === ERROR_SPOTIFY_AUTH && error.status === 401 && !refreshedToken) {
          // The API rejected a token the provider still considered valid.
          refreshedToken = true;
          this.tokenProvider.invalidate();
          attempt -= 1;
          continue;
        }
        const retriable = error.code === ERROR_SPOTIFY_HTTP && isRetriableStatus(error.status ?? 0);
        if (!retriable || attempt >= maxAttempts) {
          throw error;
        }
        this.logger?.warn("spotify_request_retry", { url: url.pathname, status: error.status, attempt });
        await delay(this.retryDelayMs * attempt + Math.floor(Math.random() * this.retryDelayMs));
      }
    }

    throw new SpotifyClientError("Failed to query Spotify after retries", {
      code: ERROR_SPOTIFY_NETWORK,
      cause: lastError,
    });
  }

  private async performRequest(url: URL, token: string): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: { Accept: "application/json", Authorization: `Bearer ${token}` },
        signal: controller.signal,
      });
      if (response.status === 401) {
        throw new SpotifyClientError("Spotify rejected the access token", { code: ERROR_SPOTIFY_AUTH, status: 401 });
      }
      if (!response.ok) {
        throw new SpotifyClientError(`Spotify responded with HTTP ${response.status}`, {
          code: ERROR_SPOTIFY_HTTP,
          status: response.status,
        });
      }
      return response;
    } catch (error) {
      if (error instanceof SpotifyClientError) {
        throw error;
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new SpotifyClientError("Spotify request timed out", { code: ERROR_SPOTIFY_NETWORK, cause: error });
      }
      throw new SpotifyClientError("Failed to execute request against Spotify", {
        code: ERROR_SPOTIFY_NETWORK,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async parseBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text.trim().length === 0) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new SpotifyClientError("Unable to parse Spotify JSON payload", {
        code: ERROR_SPOTIFY_SCHEMA,
        status: response.status,
        cause: error,
      });
    }
  }

  private validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
    const result = schema.safeParse(payload);
    if (!result.success) {
      throw new SpotifyClientError("Spotify payload did not match the expected schema", {
        code: ERROR_SPOTIFY_SCHEMA,
        cause: result.error,
      });
    }
    return result.data;
  }
}
