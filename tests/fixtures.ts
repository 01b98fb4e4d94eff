/**
 * Shared test fixtures: CodeQL database zips, source trees, pre-configured Hepc.
 */
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { createHash } from "node:crypto";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import { strToU8, zipSync } from "fflate";

import { Hepc } from "../src/index.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { DiskStorage } from "../src/storage/disk.js";
import { MetadataStore } from "../src/store/metadata.js";
import type { StoredArchive } from "../src/core/types.js";

export const BASE_URL = "https://hepc.test/values";

// ---------------------------------------------------------------------------
// Zip builders
// ---------------------------------------------------------------------------

export function buildZip(files: Record<string, string | Uint8Array>): Uint8Array {
  const zipFiles: Record<string, Uint8Array> = {};
  for (const [name, data] of Object.entries(files)) {
    zipFiles[name] = typeof data === "string" ? strToU8(data) : data;
  }
  // Fixed mtime: the same inputs always give the same bytes.
  return zipSync(zipFiles, { mtime: new Date("2024-01-01T00:00:00Z") });
}

export interface DescriptorFields {
  language?: string;
  sha?: string;
  cliVersion?: string;
  creationTime?: string;
}

export function descriptorYml(fields: DescriptorFields = {}): string {
  return [
    `sourceLocationPrefix: "/home/runner/work/src"`,
    `baselineLinesOfCode: 1234`,
    `unicodeNewlines: false`,
    `columnKind: "utf16"`,
    `primaryLanguage: "${fields.language ?? "cpp"}"`,
    `creationMetadata:`,
    `  sha: "${fields.sha ?? "0123456789abcdef0123456789abcdef01234567"}"`,
    `  cliVersion: "${fields.cliVersion ?? "2.17.0"}"`,
    `  creationTime: "${fields.creationTime ?? "2024-05-01T12:00:00.000Z"}"`,
    `finalised: true`,
    ``,
  ].join("\n");
}

/** A zip shaped like a CodeQL database; `salt` makes the bytes distinct. */
export function buildDatabaseZip(salt: string, fields: DescriptorFields = {}): Uint8Array {
  return buildZip({
    "codeql_db/codeql-database.yml": descriptorYml(fields),
    "codeql_db/db-cpp/default/strings.rel": `strings for ${salt}`,
    "codeql_db/src.zip": new Uint8Array(16),
  });
}

export function sha256Hex(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

// ---------------------------------------------------------------------------
// Temp dirs and source trees
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "hepc-test-"));
}

export function writeFileAt(root: string, relativePath: string, data: Uint8Array | string): string {
  const full = join(root, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, data);
  return full;
}

/**
 * `count` databases laid out as `<owner>/<repo>/codeql/db.zip`, with
 * owners `owner00`, `owner01`, ... each holding one repo `repoNN`.
 */
export function writeSourceTree(root: string, count: number): string[] {
  const paths: string[] = [];
  for (let i = 0; i < count; i++) {
    const n = String(i).padStart(2, "0");
    paths.push(writeFileAt(root, `owner${n}/repo${n}/codeql/db.zip`, buildDatabaseZip(`db-${n}`)));
  }
  return paths;
}

// ---------------------------------------------------------------------------
// Stores
// ---------------------------------------------------------------------------

export async function makeStore(path = ":memory:"): Promise<MetadataStore> {
  const store = new MetadataStore(new SQLiteBackend(path));
  await store.initialize();
  return store;
}

export function makeArchive(archiveId: string, overrides: Partial<StoredArchive> = {}): StoredArchive {
  return {
    archiveId,
    filePath: `${archiveId}.zip`,
    size: 100,
    createdAt: "2024-06-01T00:00:00.000Z",
    gitOwner: "octo",
    gitRepo: "demo",
    gitBranch: null,
    gitCommitId: "abc123",
    primaryLanguage: "cpp",
    toolName: "codeql",
    toolVersion: "2.17.0",
    projname: "octo/demo",
    dbCreatedAt: null,
    sourcePath: `/src/${archiveId}.zip`,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Pre-configured Hepc
// ---------------------------------------------------------------------------

export async function makeHepc(
  dir: string,
  options: { concurrency?: number; queryPack?: string | null; dbPath?: string } = {},
): Promise<Hepc> {
  const storage = new DiskStorage(join(dir, "values"));
  const store = await makeStore(options.dbPath ?? ":memory:");
  return new Hepc(storage, store, {
    baseUrl: BASE_URL,
    concurrency: options.concurrency,
    queryPack: options.queryPack ?? null,
    dbPath: options.dbPath,
  });
}
