import { createGraphCacheStore } from "./cache/factory.js";
import { InMemoryGraphCacheStore } from "./cache/memoryStore.js";
import type { GraphCacheStore } from "./cache/store.js";
import { type GraphConfig, loadGraphConfig } from "./config/graphConfig.js";
import { Graph } from "./graph/graph.js";
import type { NodeFactory } from "./graph/node.js";
import { StructuredLogger } from "./logger.js";
import { SpotifyArtistSource } from "./sources/spotify/artistSource.js";
import { SpotifyClient } from "./sources/spotify/client.js";
import { ClientCredentialsTokenProvider } from "./sources/spotify/token.js";
import { StaticGraphSource, type StaticGraphSourceOptions, type StaticGraphView } from "./sources/staticGraph.js";

interface CommonGraphOptions {
  /** Defaults to a fresh in-memory store. */
  readonly store?: GraphCacheStore;
  readonly logger?: StructuredLogger;
  readonly nodeFactory?: NodeFactory;
}

export interface StaticGraphOptions extends CommonGraphOptions, StaticGraphSourceOptions {}

/** Graph whose neighbors and canonical names come from a static in-memory graph. */
export function createStaticGraph(view: StaticGraphView, options: StaticGraphOptions = {}): Graph {
  const source = new StaticGraphSource(view, { maxTypoDistance: options.maxTypoDistance });
  return new Graph({
    store: options.store ?? new InMemoryGraphCacheStore(),
    neighborSource: source,
    nameResolver: source,
    nodeFactory: options.nodeFactory,
    logger: options.logger,
  });
}

export interface SpotifyArtistGraphOptions extends CommonGraphOptions {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly neighborCount?: number;
  readonly apiBaseUrl?: string;
  readonly tokenUrl?: string;
  readonly timeoutMs?: number;
  readonly maxRetries?: number;
  readonly fetchImpl?: typeof fetch;
}

/** Graph of artists related through the Spotify Web API. */
export function createSpotifyArtistGraph(options: SpotifyArtistGraphOptions): Graph {
  const tokenProvider = new ClientCredentialsTokenProvider({
    clientId: options.clientId,
    clientSecret: options.clientSecret,
    tokenUrl: options.tokenUrl,
    timeoutMs: options.timeoutMs,
    fetchImpl: options.fetchImpl,
    logger: options.logger,
  });
  const client = new SpotifyClient({
    tokenProvider,
    apiBaseUrl: options.apiBaseUrl,
    timeoutMs: options.timeoutMs,
    maxRetries: options.maxRetries,
    fetchImpl: options.fetchImpl,
    logger: options.logger,
  });
  const source = new SpotifyArtistSource({ client, neighborCount: options.neighborCount, logger: options.logger });
  return new Graph({
    store: options.store ?? new InMemoryGraphCacheStore(),
    neighborSource: source,
    nameResolver: source,
    nodeFactory: options.nodeFactory,
    logger: options.logger,
  });
}

export interface GraphFromConfigOptions {
  /** Serves neighbors from this static graph instead of Spotify. */
  readonly view?: StaticGraphView;
  readonly maxTypoDistance?: number;
  readonly fetchImpl?: typeof fetch;
}

/** Graph built from configuration, together with the resources it holds. */
export interface ConfiguredGraph {
  readonly graph: Graph;
  readonly store: GraphCacheStore;
  readonly logger: StructuredLogger;
  /** Closes the store and waits for pending log writes. */
  close(): Promise<void>;
}

/**
 * Opens the configured store and logger, then builds a static graph when a
 * view is given, a Spotify artist graph when credentials are configured, or a
 * cache-only graph otherwise.
 */
export async function createGraphFromConfig(
  config: GraphConfig = loadGraphConfig(),
  options: GraphFromConfigOptions = {},
): Promise<ConfiguredGraph> {
  const credentials = config.spotify.credentials;
  const logger = new StructuredLogger({
    minLevel: config.logging.level,
    logFile: config.logging.file,
    redactSecrets: credentials ? [credentials.clientSecret] : [],
  });
  const store = await createGraphCacheStore(config.cache, { logger });

  let graph: Graph;
  if (options.view) {
    graph = createStaticGraph(options.view, { store, logger, maxTypoDistance: options.maxTypoDistance });
  } else if (credentials) {
    graph = createSpotifyArtistGraph({
      ...credentials,
      store,
      logger,
      neighborCount: config.spotify.neighborCount,
      apiBaseUrl: config.spotify.apiBaseUrl,
      tokenUrl: config.spotify.tokenUrl,
      timeoutMs: config.spotify.timeoutMs,
      maxRetries: config.spotify.maxRetries,
      fetchImpl: options.fetchImpl,
    });
  } else {
    graph = new Graph({ store, logger });
  }
  logger.info("graph_ready", {
    cache_backend: config.cache.backend,
    source: options.view ? "static" : credentials ? "spotify" : "none",
  });

  return {
    graph,
    store,
    logger,
    async close() {
      await store.close();
      await logger.flush();
    },
  };
}
