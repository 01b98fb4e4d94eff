/**
 * hepc – collects CodeQL database archives and serves them, with
 * per-query-pack result metadata, over HTTP.
 */
import type { Server } from "node:http";

import { buildStorage, buildStore, DEFAULT_BASE_URL, parseConfig } from "./config.js";
import { Collector, DEFAULT_CONCURRENCY } from "./core/collector.js";
import { ConfigurationError, MigrationError } from "./core/exceptions.js";
import { ResultIngestor } from "./core/ingest.js";
import type { CollectionReport, IngestReport, ResultRecord } from "./core/types.js";
import { createHepcServer } from "./server/http.js";
import type { StorageBackend } from "./storage/backend.js";
import { StoreHandle } from "./store/handle.js";
import { MetadataStore } from "./store/metadata.js";
import {
  isFile,
  migrateStore,
  sameFile,
  type MigrateOptions,
  type MigrationResult,
} from "./store/migrate.js";

export { ConfigSchema, configFromEnv, parseConfig, type Config, type RawConfig } from "./config.js";
export * from "./core/exceptions.js";
export type * from "./core/types.js";
export { Collector } from "./core/collector.js";
export { MetadataStore, FILTER_COLUMNS, type ArchiveFilter } from "./store/metadata.js";
export { StoreHandle } from "./store/handle.js";
export { migrateStore, defaultDestination } from "./store/migrate.js";
export { DiskStorage } from "./storage/disk.js";
export { SQLiteBackend } from "./db/sqlite.js";
export { createHepcServer, listen, close } from "./server/http.js";
export { buildResultUrl } from "./server/urls.js";

export interface HepcOptions {
  /** External base URL; prefix of newly generated result URLs. */
  baseUrl?: string;
  /** Default limit for `collect` when the caller gives none. */
  maxDbs?: number;
  concurrency?: number;
  /** Default query pack recorded by `collect`. */
  queryPack?: string | null;
  /** Path of the live store; the default migration source. */
  dbPath?: string;
}

export interface CollectRequest {
  startingPath: string;
  maxDbs?: number;
  queryPack?: string | null;
}

export class Hepc {
  private storage: StorageBackend;
  private handle: StoreHandle;
  private options: HepcOptions;
  private collector: Collector;

  constructor(storage: StorageBackend, store: MetadataStore, options: HepcOptions = {}) {
    this.storage = storage;
    this.handle = new StoreHandle(store);
    this.options = options;
    this.collector = this.buildCollector();
  }

  /** Construct from a configuration object (validates with Zod). */
  static async fromConfig(raw: unknown): Promise<Hepc> {
    const config = parseConfig(raw);
    const store = await buildStore(config);
    return new Hepc(buildStorage(config), store, {
      baseUrl: config.baseUrl,
      maxDbs: config.collector.maxDbs,
      concurrency: config.collector.concurrency,
      queryPack: config.collector.queryPack,
      dbPath: config.db.config.path,
    });
  }

  get store(): MetadataStore {
    return this.handle.current;
  }

  /** File of the live store, if it has one. */
  get dbPath(): string | undefined {
    return this.options.dbPath;
  }

  private get baseUrl(): string {
    return this.options.baseUrl ?? DEFAULT_BASE_URL;
  }

  private buildCollector(): Collector {
    return new Collector({
      storage: this.storage,
      store: this.store,
      baseUrl: this.baseUrl,
      concurrency: this.options.concurrency ?? DEFAULT_CONCURRENCY,
    });
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /** Collect into this instance's Archive Store; runs are serialised. */
  async collect(request: CollectRequest): Promise<CollectionReport> {
    const maxDbs = request.maxDbs ?? this.options.maxDbs;
    if (maxDbs === undefined) throw new ConfigurationError("maxDbs is required");
    return this.collector.collect({
      startingPath: request.startingPath,
      maxDbs,
      queryPack: request.queryPack ?? this.options.queryPack ?? null,
    });
  }

  async ingestResults(manifestPath: string): Promise<IngestReport> {
    return new ResultIngestor(this.store, this.baseUrl).ingest(manifestPath);
  }

  async latestResult(queryPack: string): Promise<ResultRecord | null> {
    return this.store.latestResult(queryPack);
  }

  async allLatestResults(): Promise<ResultRecord[]> {
    return this.store.allLatestResults();
  }

  /** Migrate a copy of the store; the source defaults to the live store's file. */
  async migrate(
    opts: Omit<MigrateOptions, "source"> & { source?: string },
  ): Promise<MigrationResult> {
    const source = opts.source ?? this.options.dbPath;
    if (!source) throw new MigrationError("No source store given");
    return migrateStore({ ...opts, source });
  }

  /**
   * Point the Serving Layer at another, existing store file. Returns the
   * previous store, still open: requests that started on it may still be
   * reading, so the caller closes it once they have drained.
   *
   * The target must not be the live store's own file. The live connection
   * keeps its WAL beside that path, so a copy moved over it would be read
   * through the old WAL.
   */
  async cutover(dbPath: string): Promise<MetadataStore> {
    if (!(await isFile(dbPath))) {
      throw new MigrationError(`Missing cutover store: ${dbPath}`);
    }
    if (this.options.dbPath !== undefined && (await sameFile(dbPath, this.options.dbPath))) {
      throw new MigrationError(`Cutover store is the live store: ${dbPath}`);
    }
    const next = await MetadataStore.open(dbPath, { fileMustExist: true });
    const previous = this.handle.swap(next);
    this.options = { ...this.options, dbPath };
    this.collector = this.buildCollector();
    return previous;
  }

  createServer(): Server {
    return createHepcServer({ handle: this.handle, storage: this.storage });
  }

  async close(): Promise<void> {
    await this.handle.current.close();
  }

  // Expose for tests
  get _storage(): StorageBackend {
    return this.storage;
  }
}
