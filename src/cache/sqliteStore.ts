import Database from "better-sqlite3";
import { z } from "zod";

import { CacheConstraintError, CacheStoreError, describeError } from "../graph/errors.js";
import {
  assertPositiveWeight,
  canonicalEdgeNames,
  type CachedEdgeRecord,
  type CachedNodeRecord,
  type DateClock,
  type GraphCacheStore,
  normaliseExternalID,
  normaliseRecordName,
  toCreationDate,
} from "./store.js";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS nodes (
    name TEXT PRIMARY KEY NOT NULL CHECK (length(name) > 0),
    external_id TEXT,
    are_neighbors_cached INTEGER NOT NULL DEFAULT 0,
    creation_date TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS nodes_external_id ON nodes (external_id);
  CREATE TABLE IF NOT EXISTS edges (
    source_name TEXT NOT NULL REFERENCES nodes (name),
    target_name TEXT NOT NULL REFERENCES nodes (name),
    weight REAL NOT NULL CHECK (weight > 0),
    creation_date TEXT NOT NULL,
    PRIMARY KEY (source_name, target_name),
    CHECK (source_name < target_name)
  );
  CREATE INDEX IF NOT EXISTS edges_target_name ON edges (target_name);
`;

const nodeRowSchema = z
  .object({
    name: z.string(),
    external_id: z.string().nullable(),
    are_neighbors_cached: z.number().int(),
    creation_date: z.string(),
  })
  .transform(
    (row): CachedNodeRecord => ({
      name: row.name,
      externalID: row.external_id,
      areNeighborsCached: row.are_neighbors_cached !== 0,
      createdAt: row.creation_date,
    }),
  );

const edgeRowSchema = z
  .object({
    source_name: z.string(),
    target_name: z.string(),
    weight: z.number(),
    creation_date: z.string(),
  })
  .transform(
    (row): CachedEdgeRecord => ({
      sourceName: row.source_name,
      targetName: row.target_name,
      weight: row.weight,
      createdAt: row.creation_date,
    }),
  );

const nameRowSchema = z.object({ name: z.string() });

/** Options accepted by {@link SqliteGraphCacheStore}. */
export interface SqliteGraphCacheStoreOptions {
  /** Database file, or `:memory:` for a private in-process database. */
  readonly filename: string;
  /** Drops both tables before recreating them. */
  readonly reset?: boolean;
  readonly clock?: DateClock;
}

/**
 * Relational store backed by SQLite. A transaction is opened by the first
 * write after a commit or rollback, so a logical step becomes durable as a
 * whole or not at all.
 */
export class SqliteGraphCacheStore implements GraphCacheStore {
  private readonly db: Database.Database;
  private readonly clock: DateClock;

  constructor(options: SqliteGraphCacheStoreOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.db = openDatabase(options);
  }

  async findNodeByName(name: string): Promise<CachedNodeRecord | undefined> {
    return this.execute("findNodeByName", () => this.selectNode(name.trim()));
  }

  async findNodeByExternalID(externalID: string): Promise<CachedNodeRecord | undefined> {
    const wanted = normaliseExternalID(externalID);
    if (wanted === null) {
      return undefined;
    }
    return this.execute("findNodeByExternalID", () => {
      const rows = this.db.prepare("SELECT * FROM nodes WHERE external_id = ? LIMIT 2").all(wanted);
      return rows.length === 1 ? nodeRowSchema.parse(rows[0]) : undefined;
    });
  }

  async upsertNode(name: string, externalID: string | null): Promise<CachedNodeRecord> {
    const key = normaliseRecordName(name);
    const normalisedExternalID = normaliseExternalID(externalID);
    return this.execute("upsertNode", () => {
      const existing = this.selectNode(key);
      if (existing) {
        if (normalisedExternalID === null || normalisedExternalID === existing.externalID) {
          return existing;
        }
        this.beginWrite();
        this.db.prepare("UPDATE nodes SET external_id = ? WHERE name = ?").run(normalisedExternalID, key);
        return { ...existing, externalID: normalisedExternalID };
      }
      const record: CachedNodeRecord = {
        name: key,
        externalID: normalisedExternalID,
        areNeighborsCached: false,
        createdAt: toCreationDate(this.clock()),
      };
      this.beginWrite();
      this.db
        .prepare("INSERT INTO nodes (name, external_id, are_neighbors_cached, creation_date) VALUES (?, ?, 0, ?)")
        .run(record.name, record.externalID, record.createdAt);
      return record;
    });
  }

  async setNeighborsCached(name: string, areNeighborsCached: boolean): Promise<void> {
    const key = normaliseRecordName(name);
    this.execute("setNeighborsCached", () => {
      const existing = this.selectNode(key);
      if (!existing) {
        throw new CacheConstraintError(`node '${key}' is not cached`, { name: key });
      }
      if (existing.areNeighborsCached === areNeighborsCached) {
        return;
      }
      this.beginWrite();
      this.db.prepare("UPDATE nodes SET are_neighbors_cached = ? WHERE name = ?").run(areNeighborsCached ? 1 : 0, key);
    });
  }

  async findEdgeByNames(nameA: string, nameB: string): Promise<CachedEdgeRecord | undefined> {
    const left = nameA.trim();
    const right = nameB.trim();
    if (left.length === 0 || right.length === 0 || left === right) {
      return undefined;
    }
    const [sourceName, targetName] = left < right ? [left, right] : [right, left];
    return this.execute("findEdgeByNames", () => this.selectEdge(sourceName, targetName));
  }

  async upsertEdge(nameA: string, nameB: string, weight: number): Promise<CachedEdgeRecord> {
    const [sourceName, targetName] = canonicalEdgeNames(nameA, nameB);
    assertPositiveWeight(weight);
    return this.execute("upsertEdge", () => {
      for (const endpoint of [sourceName, targetName]) {
        if (!this.selectNode(endpoint)) {
          throw new CacheConstraintError(`edge endpoint '${endpoint}' is not cached`, { sourceName, targetName });
        }
      }
      const existing = this.selectEdge(sourceName, targetName);
      if (existing) {
        if (existing.weight === weight) {
          return existing;
        }
        this.beginWrite();
        this.db
          .prepare("UPDATE edges SET weight = ? WHERE source_name = ? AND target_name = ?")
          .run(weight, sourceName, targetName);
        return { ...existing, weight };
      }
      const record: CachedEdgeRecord = { sourceName, targetName, weight, createdAt: toCreationDate(this.clock()) };
      this.beginWrite();
      this.db
        .prepare("INSERT INTO edges (source_name, target_name, weight, creation_date) VALUES (?, ?, ?, ?)")
        .run(sourceName, targetName, weight, record.createdAt);
      return record;
    });
  }

  async neighborNamesOf(name: string): Promise<string[]> {
    const key = name.trim();
    return this.execute("neighborNamesOf", () =>
      this.db
        .prepare(
          `SELECT target_name AS name FROM edges WHERE source_name = ?
           UNION SELECT source_name AS name FROM edges WHERE target_name = ?
           ORDER BY name`,
        )
        .all(key, key)
        .map((row) => nameRowSchema.parse(row).name),
    );
  }

  async neighborsOf(name: string): Promise<CachedNodeRecord[]> {
    const key = name.trim();
    return this.execute("neighborsOf", () =>
      this.db
        .prepare(
          `SELECT nodes.* FROM nodes
           JOIN (
             SELECT target_name AS name FROM edges WHERE source_name = ?
             UNION SELECT source_name AS name FROM edges WHERE target_name = ?
           ) AS adjacent ON adjacent.name = nodes.name
           ORDER BY nodes.name`,
        )
        .all(key, key)
        .map((row) => nodeRowSchema.parse(row)),
    );
  }

  async commit(): Promise<void> {
    this.execute("commit", () => {
      if (this.db.inTransaction) {
        this.db.exec("COMMIT");
      }
    });
  }

  async rollback(): Promise<void> {
    this.execute("rollback", () => {
      if (this.db.inTransaction) {
        this.db.exec("ROLLBACK");
      }
    });
  }

  async close(): Promise<void> {
    if (!this.db.open) {
      return;
    }
    this.execute("close", () => {
      if (this.db.inTransaction) {
        this.db.exec("ROLLBACK");
      }
      this.db.close();
    });
  }

  private beginWrite(): void {
    if (!this.db.inTransaction) {
      this.db.exec("BEGIN");
    }
  }

  private selectNode(name: string): CachedNodeRecord | undefined {
    const row = this.db.prepare("SELECT * FROM nodes WHERE name = ?").get(name);
    return row === undefined ? undefined : nodeRowSchema.parse(row);
  }

  private selectEdge(sourceName: string, targetName: string): CachedEdgeRecord | undefined {
    const row = this.db
      .prepare("SELECT * FROM edges WHERE source_name = ? AND target_name = ?")
      .get(sourceName, targetName);
    return row === undefined ? undefined : edgeRowSchema.parse(row);
  }

  /** Runs {@link operation}, translating driver failures into cache errors. */
  private execute<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof CacheConstraintError || error instanceof CacheStoreError) {
        throw error;
      }
      if (isConstraintViolation(error)) {
        throw new CacheConstraintError(describeError(error), { operation });
      }
      throw new CacheStoreError(`graph cache ${operation} failed: ${describeError(error)}`, { operation }, error);
    }
  }
}

function openDatabase(options: SqliteGraphCacheStoreOptions): Database.Database {
  try {
    const db = new Database(options.filename);
    db.pragma("foreign_keys = ON");
    if (options.reset) {
      db.exec("DROP TABLE IF EXISTS edges; DROP TABLE IF EXISTS nodes;");
    }
    db.exec(SCHEMA);
    return db;
  } catch (error) {
    throw new CacheStoreError(
      `unable to open the graph cache database: ${describeError(error)}`,
      { filename: options.filename },
      error,
    );
  }
}

function isConstraintViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("SQLITE_CONSTRAINT")
  );
}
