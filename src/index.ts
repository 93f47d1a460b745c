export { createGraphCacheStore } from "./cache/factory.js";
export { FileGraphCacheStore, type FileGraphCacheStoreOptions, JOURNAL_FILE_NAME } from "./cache/fileStore.js";
export { type CacheChangeSet, InMemoryGraphCacheStore, type InMemoryGraphCacheStoreOptions } from "./cache/memoryStore.js";
export { SqliteGraphCacheStore, type SqliteGraphCacheStoreOptions } from "./cache/sqliteStore.js";
export type { CachedEdgeRecord, CachedNodeRecord, DateClock, GraphCacheStore } from "./cache/store.js";
export {
  applyCacheWriteBatch,
  CacheWriteBatch,
  type CacheWriteOperation,
  type CacheWriteResult,
} from "./cache/writeBatch.js";
export {
  CACHE_BACKENDS,
  type CacheBackend,
  type CacheConfig,
  type GraphConfig,
  loadGraphConfig,
  type LoggingConfig,
  type SpotifyConfig,
} from "./config/graphConfig.js";
export {
  type ConfiguredGraph,
  createGraphFromConfig,
  createSpotifyArtistGraph,
  createStaticGraph,
  type GraphFromConfigOptions,
  type SpotifyArtistGraphOptions,
  type StaticGraphOptions,
} from "./factories.js";
export { DEFAULT_EDGE_WEIGHT, Edge } from "./graph/edge.js";
export { EdgeList } from "./graph/edgeList.js";
export {
  CacheConstraintError,
  CacheStoreError,
  GraphError,
  GraphValidationError,
  NeighborFetchError,
} from "./graph/errors.js";
export { Graph, type GraphOptions, type NeighborAddedListener, type NodeRef } from "./graph/graph.js";
export type { NameResolver, NeighborSource, NodeIdentity } from "./graph/identity.js";
export {
  HYDRATION_DEPTH,
  type NeighborAddedEvent,
  Node,
  type NodeFactory,
  type NodeInit,
  type NodeLoadState,
} from "./graph/node.js";
export { type GetNodeByNameOptions, NodeList } from "./graph/nodeList.js";
export { createSilentLogger, type LogEntry, type LoggerOptions, type LogLevel, StructuredLogger } from "./logger.js";
export { SpotifyArtistSource, type SpotifyArtistSourceOptions } from "./sources/spotify/artistSource.js";
export { type SpotifyArtist, type SpotifyArtistApi, SpotifyClient, type SpotifyClientOptions } from "./sources/spotify/client.js";
export { SpotifyArtistSourceError, SpotifyClientError, type SpotifyClientErrorCode } from "./sources/spotify/errors.js";
export { type AccessTokenProvider, ClientCredentialsTokenProvider } from "./sources/spotify/token.js";
export {
  createUndirectedGraph,
  StaticGraphSource,
  type StaticGraphSourceOptions,
  type StaticGraphView,
  type UndirectedGraphology,
} from "./sources/staticGraph.js";
