import { LOG_THRESHOLDS, type LogThreshold } from "../logger.js";
import {
  type EnvSource,
  readBool,
  readEnum,
  readInt,
  readOptionalString,
  readString,
} from "./env.js";

/** Storage engines able to back the graph cache. */
export const CACHE_BACKENDS = ["memory", "file", "sqlite"] as const;
export type CacheBackend = (typeof CACHE_BACKENDS)[number];

const DEFAULT_FILE_CACHE_PATH = "./graph-cache";
const DEFAULT_SQLITE_CACHE_PATH = "./graph-cache.db";

export const DEFAULT_SPOTIFY_API_BASE_URL = "https://api.spotify.com/v1/";
export const DEFAULT_SPOTIFY_TOKEN_URL = "https://accounts.spotify.com/api/token";
export const DEFAULT_SPOTIFY_NEIGHBOR_COUNT = 6;
const DEFAULT_SPOTIFY_TIMEOUT_MS = 10_000;
const DEFAULT_SPOTIFY_MAX_RETRIES = 2;

export interface CacheConfig {
  readonly backend: CacheBackend;
  /**
   * Directory holding the journal for the `file` backend, database file for
   * `sqlite`. Ignored by the `memory` backend.
   */
  readonly path: string;
  /** Discards any previously persisted records when the store is opened. */
  readonly reset: boolean;
}

export interface LoggingConfig {
  readonly level: LogThreshold;
  readonly file: string | null;
}

export interface SpotifyConfig {
  /** `null` when either credential is missing; the artist graph cannot be built then. */
  readonly credentials: { readonly clientId: string; readonly clientSecret: string } | null;
  readonly apiBaseUrl: string;
  readonly tokenUrl: string;
  readonly neighborCount: number;
  readonly timeoutMs: number;
  readonly maxRetries: number;
}

export interface GraphConfig {
  readonly cache: CacheConfig;
  readonly logging: LoggingConfig;
  readonly spotify: SpotifyConfig;
}

/** Builds the runtime configuration from environment variables. */
export function loadGraphConfig(env: EnvSource = process.env): GraphConfig {
  const backend = readEnum("GRAPH_CACHE_BACKEND", CACHE_BACKENDS, "memory", env);
  const defaultPath = backend === "sqlite" ? DEFAULT_SQLITE_CACHE_PATH : DEFAULT_FILE_CACHE_PATH;

  const clientId = readOptionalString("SPOTIFY_CLIENT_ID", env);
  const clientSecret = readOptionalString("SPOTIFY_CLIENT_SECRET", env);

  return {
    cache: {
      backend,
      path: readString("GRAPH_CACHE_PATH", defaultPath, env),
      reset: readBool("GRAPH_CACHE_RESET", false, env),
    },
    logging: {
      level: readEnum("GRAPH_LOG_LEVEL", LOG_THRESHOLDS, "info", env),
      file: readOptionalString("GRAPH_LOG_FILE", env) ?? null,
    },
    spotify: {
      credentials: clientId && clientSecret ? { clientId, clientSecret } : null,
      apiBaseUrl: ensureTrailingSlash(readString("SPOTIFY_API_BASE_URL", DEFAULT_SPOTIFY_API_BASE_URL, env)),
      tokenUrl: readString("SPOTIFY_TOKEN_URL", DEFAULT_SPOTIFY_TOKEN_URL, env),
      neighborCount: readInt("SPOTIFY_NEIGHBOR_COUNT", DEFAULT_SPOTIFY_NEIGHBOR_COUNT, { min: 1 }, env),
      timeoutMs: readInt("SPOTIFY_TIMEOUT_MS", DEFAULT_SPOTIFY_TIMEOUT_MS, { min: 1 }, env),
      maxRetries: readInt("SPOTIFY_MAX_RETRIES", DEFAULT_SPOTIFY_MAX_RETRIES, { min: 0, max: 10 }, env),
    },
  };
}

// Relative paths such as `search` are resolved against the base URL, which
// drops the last segment unless it ends with a slash.
/** Base URLs resolve relative paths beneath them only when they end in a slash. */
export function ensureTrailingSlash(url: string): string {
  return url.endsWith("/") ? url : `${url}/`;
}
