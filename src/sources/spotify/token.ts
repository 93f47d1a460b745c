import { Buffer } from "node:buffer";

import { z } from "zod";

import { DEFAULT_SPOTIFY_TOKEN_URL } from "../../config/graphConfig.js";
import type { StructuredLogger } from "../../logger.js";
import { ERROR_SPOTIFY_AUTH, ERROR_SPOTIFY_NETWORK, ERROR_SPOTIFY_SCHEMA, SpotifyClientError } from "./errors.js";

/** A token expiring within this many milliseconds is refreshed before use. */
export const TOKEN_REFRESH_THRESHOLD_MS = 60_000;

const DEFAULT_TOKEN_TIMEOUT_MS = 10_000;

const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().positive(),
  })
  .passthrough();

/** Supplies bearer tokens to the API client. */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
  /** Drops the current token so the next call requests a fresh one. */
  invalidate(): void;
}

export interface ClientCredentialsOptions {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly tokenUrl?: string;
  readonly timeoutMs?: number;
  readonly fetchImpl?: typeof fetch;
  /** Clock returning epoch milliseconds. */
  readonly clock?: () => number;
  readonly logger?: StructuredLogger;
}

/**
 * OAuth client-credentials flow. Tokens are cached until less than
 * {@link TOKEN_REFRESH_THRESHOLD_MS} of validity remain; concurrent callers
 * share a single refresh request.
 */
export class ClientCredentialsTokenProvider implements AccessTokenProvider {
  private readonly clientId: string;
  private readonly clientSecret: string;
  private readonly tokenUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: () => number;
  private readonly logger: StructuredLogger | null;

  private token: { value: string; expiresAt: number } | null = null;
  private pending: Promise<string> | null = null;

  constructor(options: ClientCredentialsOptions) {
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.tokenUrl = options.tokenUrl ?? DEFAULT_SPOTIFY_TOKEN_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOKEN_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger ?? null;
  }

  async getAccessToken(): Promise<string> {
    if (this.token && this.token.expiresAt >= this.clock() + TOKEN_REFRESH_THRESHOLD_MS) {
      return this.token.value;
    }
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  invalidate(): void {
    this.token = null;
  }

  private async requestToken(): Promise<string> {
    const credentials = Buffer.from(`${this.clientId}:${this.clientSecret}`, "utf8").toString("base64");
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(this.tokenUrl, {
        method: "POST",
        headers: {
          Authorization: `Basic ${credentials}`,
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: new URLSearchParams({ grant_type: "client_credentials" }).toString(),
        signal: controller.signal,
      });
    } catch (error) {
      throw new SpotifyClientError("Failed to request a Spotify access token", {
        code: ERROR_SPOTIFY_NETWORK,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new SpotifyClientError(`Spotify token endpoint responded with HTTP ${response.status}`, {
        code: ERROR_SPOTIFY_AUTH,
        status: response.status,
      });
    }

    let payload: z.infer<typeof tokenResponseSchema>;
    try {
      payload = tokenResponseSchema.parse(await response.json());
    } catch (error) {
      throw new SpotifyClientError("Spotify token payload did not match the expected schema", {
        code: ERROR_SPOTIFY_SCHEMA,
        status: response.status,
        cause: error,
      });
    }

    const expiresAt = this.clock() + payload.expires_in * 1000;
    this.token = { value: payload.access_token, expiresAt };
    this.logger?.info("spotify_token_refreshed", { expires_in: payload.expires_in });
    return payload.access_token;
  }
}
