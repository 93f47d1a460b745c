import { Buffer } from "node:buffer";
import { promises as fs } from "node:fs";
import { open as openFile, type FileHandle } from "node:fs/promises";
import path from "node:path";

import { z } from "zod";

import { CacheStoreError, describeError } from "../graph/errors.js";
import type { StructuredLogger } from "../logger.js";
import { type CacheChangeSet, InMemoryGraphCacheStore } from "./memoryStore.js";
import type { DateClock } from "./store.js";

/** Name of the journal file created inside the configured directory. */
export const JOURNAL_FILE_NAME = "graph-cache.jsonl";

const creationDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const nodeRecordSchema = z.object({
  name: z.string().min(1),
  externalID: z.string().min(1).nullable(),
  areNeighborsCached: z.boolean(),
  createdAt: creationDateSchema,
});

const edgeRecordSchema = z
  .object({
    sourceName: z.string().min(1),
    targetName: z.string().min(1),
    weight: z.number().positive().finite(),
    createdAt: creationDateSchema,
  })
  .refine((edge) => edge.sourceName < edge.targetName, {
    message: "edge names must be stored in canonical order",
  });

/** One journal line holds every record changed by a single commit. */
const journalEntrySchema = z.object({
  nodes: z.array(nodeRecordSchema),
  edges: z.array(edgeRecordSchema),
});

type JournalEntry = z.infer<typeof journalEntrySchema>;

/** Configuration accepted by {@link FileGraphCacheStore.create}. */
export interface FileGraphCacheStoreOptions {
  /** Directory holding the JSONL journal. Created when missing. */
  readonly directory: string;
  /** Truncates the journal before replaying it. */
  readonly reset?: boolean;
  /** `always` syncs the journal to disk on every commit. */
  readonly fsyncMode?: "always" | "never";
  readonly clock?: DateClock;
  readonly logger?: StructuredLogger;
}

/**
 * Durable store persisting committed records in an append-only JSONL journal.
 * Each commit appends a single line so a crash never leaves half a commit
 * behind; an unterminated trailing line is dropped on the next open.
 */
export class FileGraphCacheStore extends InMemoryGraphCacheStore {
  private readonly journalPath: string;
  private readonly fsyncMode: "always" | "never";
  private journalHandle: FileHandle | null = null;

  private constructor(options: FileGraphCacheStoreOptions) {
    super({ clock: options.clock });
    this.journalPath = path.join(options.directory, JOURNAL_FILE_NAME);
    this.fsyncMode = options.fsyncMode ?? "always";
  }

  /** Opens the journal under {@link FileGraphCacheStoreOptions.directory} and replays it. */
  static async create(options: FileGraphCacheStoreOptions): Promise<FileGraphCacheStore> {
    const store = new FileGraphCacheStore(options);
    try {
      await fs.mkdir(options.directory, { recursive: true });
      if (options.reset) {
        await fs.rm(store.journalPath, { force: true });
      }
      await store.replayJournal(options.logger);
      store.journalHandle = await openFile(store.journalPath, "a");
    } catch (error) {
      if (error instanceof CacheStoreError) {
        throw error;
      }
      throw new CacheStoreError(
        `unable to open the graph cache journal: ${describeError(error)}`,
        { path: store.journalPath },
        error,
      );
    }
    return store;
  }

  get path(): string {
    return this.journalPath;
  }

  override async close(): Promise<void> {
    await super.close();
    if (this.journalHandle) {
      await this.journalHandle.close();
      this.journalHandle = null;
    }
  }

  protected override async persistChanges(changes: CacheChangeSet): Promise<void> {
    const handle = this.journalHandle;
    if (!handle) {
      throw new CacheStoreError("the graph cache journal is not open", { path: this.journalPath });
    }
    const entry: JournalEntry = { nodes: [...changes.nodes], edges: [...changes.edges] };
    try {
      await handle.write(`${JSON.stringify(entry)}\n`);
      if (this.fsyncMode === "always") {
        await handle.sync();
      }
    } catch (error) {
      throw new CacheStoreError(
        `failed to append to the graph cache journal: ${describeError(error)}`,
        { path: this.journalPath },
        error,
      );
    }
  }

  private async replayJournal(logger: StructuredLogger | undefined): Promise<void> {
    let content: string;
    try {
      content = await fs.readFile(this.journalPath, "utf8");
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return;
      }
      throw error;
    }

    this.clearCommitted();
    const lastNewline = content.lastIndexOf("\n");
    const complete = content.slice(0, lastNewline + 1);
    if (complete.length < content.length) {
      logger?.warn("cache_journal_truncated", {
        path: this.journalPath,
        dropped_bytes: Buffer.byteLength(content.slice(lastNewline + 1), "utf8"),
      });
      await fs.truncate(this.journalPath, Buffer.byteLength(complete, "utf8"));
    }

    const lines = complete.split(/\r?\n/);
    for (const [index, rawLine] of lines.entries()) {
      const line = rawLine.trim();
      if (line.length === 0) {
        continue;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (error) {
        throw new CacheStoreError(
          `graph cache journal line ${index + 1} is not valid JSON`,
          { path: this.journalPath, line: index + 1 },
          error,
        );
      }
      const result = journalEntrySchema.safeParse(parsed);
      if (!result.success) {
        throw new CacheStoreError(
          `graph cache journal line ${index + 1} does not describe cache records`,
          { path: this.journalPath, line: index + 1, issues: result.error.issues.map((issue) => issue.message) },
          result.error,
        );
      }
      this.applyChanges(result.data);
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
