import type { CacheConfig } from "../config/graphConfig.js";
import type { StructuredLogger } from "../logger.js";
import { FileGraphCacheStore } from "./fileStore.js";
import { InMemoryGraphCacheStore } from "./memoryStore.js";
import { SqliteGraphCacheStore } from "./sqliteStore.js";
import type { DateClock, GraphCacheStore } from "./store.js";

export interface CreateGraphCacheStoreOptions {
  readonly logger?: StructuredLogger;
  readonly clock?: DateClock;
}

/** Opens the store selected by {@link CacheConfig.backend}. The caller owns it and must close it. */
export async function createGraphCacheStore(
  config: CacheConfig,
  options: CreateGraphCacheStoreOptions = {},
): Promise<GraphCacheStore> {
  switch (config.backend) {
    case "memory":
      return new InMemoryGraphCacheStore({ clock: options.clock });
    case "file":
      return FileGraphCacheStore.create({
        directory: config.path,
        reset: config.reset,
        clock: options.clock,
        logger: options.logger,
      });
    case "sqlite":
      return new SqliteGraphCacheStore({ filename: config.path, reset: config.reset, clock: options.clock });
  }
}
