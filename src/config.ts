/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { ConfigurationError } from "./core/exceptions.js";
import { DEFAULT_CONCURRENCY } from "./core/collector.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { DiskStorage } from "./storage/disk.js";
import type { StorageBackend } from "./storage/backend.js";
import { MetadataStore } from "./store/metadata.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const StorageConfigSchema = z.object({
  provider: z.literal("disk").default("disk"),
  config: z
    .object({
      basePath: z.string().min(1).default("./values"),
    })
    .default({}),
});

const DbConfigSchema = z.object({
  provider: z.literal("sqlite").default("sqlite"),
  config: z
    .object({
      path: z.string().min(1).default("./metadata.sql"),
    })
    .default({}),
});

const ServerConfigSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.coerce.number().int().min(0).max(65535).default(8070),
});

const CollectorConfigSchema = z.object({
  maxDbs: z.coerce.number().int().positive().default(3000),
  concurrency: z.coerce.number().int().positive().default(DEFAULT_CONCURRENCY),
  queryPack: z.string().trim().min(1).nullable().default(null),
});

export const DEFAULT_BASE_URL = "http://127.0.0.1:8070";

export const ConfigSchema = z.object({
  /** The external base URL the server is known by; prefix of new result URLs. */
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  storage: StorageConfigSchema.default({}),
  db: DbConfigSchema.default({}),
  server: ServerConfigSchema.default({}),
  collector: CollectorConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Unvalidated configuration as it comes from the environment or CLI flags. */
export interface RawConfig {
  baseUrl?: string;
  storage?: { provider?: string; config?: { basePath?: string } };
  db?: { provider?: string; config?: { path?: string } };
  server?: { host?: string; port?: string | number };
  collector?: {
    maxDbs?: string | number;
    concurrency?: string | number;
    queryPack?: string | null;
  };
}

export function parseConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value.trim() : undefined;
}

/** Raw configuration from HEPC_* variables; unset variables fall back to defaults. */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RawConfig {
  return {
    baseUrl: nonEmpty(env.HEPC_BASE_URL),
    storage: { config: { basePath: nonEmpty(env.HEPC_STORE_DIR) } },
    db: { config: { path: nonEmpty(env.HEPC_DB_PATH) } },
    server: {
      host: nonEmpty(env.HEPC_HOST),
      port: nonEmpty(env.HEPC_PORT),
    },
    collector: {
      maxDbs: nonEmpty(env.HEPC_MAX_DBS),
      concurrency: nonEmpty(env.HEPC_CONCURRENCY),
      queryPack: nonEmpty(env.HEPC_QUERY_PACK),
    },
  };
}

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

export function buildStorage(config: Config): StorageBackend {
  return new DiskStorage(config.storage.config.basePath);
}

export async function buildStore(config: Config): Promise<MetadataStore> {
  const store = new MetadataStore(new SQLiteBackend(config.db.config.path));
  await store.initialize();
  return store;
}
