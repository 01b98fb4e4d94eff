/**
 * Collector: walks a source tree, admits up to `maxDbs` CodeQL database
 * archives into the Archive Store and records them in the Metadata Store.
 *
 * Archives are inspected (read, hashed, descriptor parsed) concurrently, but
 * admitted one at a time in walk order, so the admitted id sequence depends
 * only on the tree and the limit.
 */
import { realpath, stat } from "node:fs/promises";
import { relative, resolve, sep } from "node:path";
import pLimit from "p-limit";

import type { StorageBackend } from "../storage/backend.js";
import type { MetadataStore } from "../store/metadata.js";
import { buildResultUrl } from "../server/urls.js";
import { archiveFileName, deriveArchiveId, repositoryIdentity } from "./archive-id.js";
import { inspectArchive, type InspectedArchive } from "./codeql-db.js";
import { ConfigurationError } from "./exceptions.js";
import { logDebug, logInfo, logWarning } from "./logger.js";
import type { CollectedArchive, CollectionReport, StoredArchive } from "./types.js";
import { walkFiles } from "./walk.js";

export const DEFAULT_CONCURRENCY = 4;

export interface CollectorOptions {
  storage: StorageBackend;
  store: MetadataStore;
  /** External base URL used for the result_url of recorded results. */
  baseUrl: string;
  concurrency?: number;
}

export interface CollectOptions {
  startingPath: string;
  maxDbs: number;
  /** Record a result under this pack for every archive in the collection. */
  queryPack?: string | null;
}

type Inspection =
  | { kind: "database"; archive: InspectedArchive }
  | { kind: "not-database" }
  | { kind: "error"; message: string };

interface Pending {
  path: string;
  inspection: Promise<Inspection>;
}

interface RunState {
  root: string;
  maxDbs: number;
  queryPack: string | null;
  report: CollectionReport;
  admittedIds: Set<string>;
}

export function isCandidate(path: string): boolean {
  return path.toLowerCase().endsWith(".zip");
}

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

export class Collector {
  private storage: StorageBackend;
  private store: MetadataStore;
  private baseUrl: string;
  private concurrency: number;
  private writer: Promise<void> = Promise.resolve();

  constructor(opts: CollectorOptions) {
    const concurrency = opts.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigurationError(`concurrency must be a positive integer, got ${concurrency}`);
    }
    this.storage = opts.storage;
    this.store = opts.store;
    this.baseUrl = opts.baseUrl;
    this.concurrency = concurrency;
  }

  /** Runs one at a time; a second call waits for the first to finish. */
  collect(opts: CollectOptions): Promise<CollectionReport> {
    const run = this.writer.then(() => this.run(opts));
    this.writer = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async run(opts: CollectOptions): Promise<CollectionReport> {
    const root = await this.validate(opts);
    await this.storage.prepare();
    const destination = await realpath(this.storage.location);

    const state: RunState = {
      root,
      maxDbs: opts.maxDbs,
      queryPack: opts.queryPack ?? null,
      admittedIds: new Set(),
      report: {
        startingPath: root,
        destination,
        maxDbs: opts.maxDbs,
        archives: [],
        skipped: [],
        errors: [],
        scanned: 0,
        limitReached: false,
      },
    };
    const { report } = state;
    const full = (): boolean => report.archives.length >= state.maxDbs;

    logInfo("Collecting CodeQL databases", {
      startingPath: root,
      destination,
      maxDbs: opts.maxDbs,
    });

    const limit = pLimit(this.concurrency);
    const window: Pending[] = [];
    const walk = walkFiles(root, {
      exclude: [destination],
      onError: (path, err) => {
        logWarning("Cannot read path", { path, error: String(err) });
        // Only an unreadable archive is a failed collection; other entries are just not walked.
        if (isCandidate(path)) report.errors.push({ path, message: String(err) });
      },
    });

    try {
      for await (const path of walk) {
        if (!isCandidate(path)) continue;
        window.push({ path, inspection: limit(() => this.inspect(path)) });
        if (window.length < this.concurrency) continue;

        const next = window.shift();
        if (next) await this.admit(state, next);
        if (full()) break;
      }

      while (!full()) {
        const next = window.shift();
        if (!next) break;
        await this.admit(state, next);
      }
    } finally {
      // Inspections past the limit are discarded, but never left running.
      await Promise.all(window.map((p) => p.inspection));
    }

    report.limitReached = full();
    logInfo("Collection finished", {
      admitted: report.archives.length,
      skipped: report.skipped.length,
      errors: report.errors.length,
      limitReached: report.limitReached,
    });
    return report;
  }

  private async validate(opts: CollectOptions): Promise<string> {
    if (!Number.isInteger(opts.maxDbs) || opts.maxDbs < 1) {
      throw new ConfigurationError(`maxDbs must be a positive integer, got ${opts.maxDbs}`);
    }
    const root = resolve(opts.startingPath);
    let isDirectory = false;
    try {
      isDirectory = (await stat(root)).isDirectory();
    } catch (err) {
      throw new ConfigurationError(`Starting path does not exist: ${root} (${String(err)})`);
    }
    if (!isDirectory) {
      throw new ConfigurationError(`Starting path is not a directory: ${root}`);
    }
    return root;
  }

  private async inspect(path: string): Promise<Inspection> {
    try {
      const archive = await inspectArchive(path);
      return archive ? { kind: "database", archive } : { kind: "not-database" };
    } catch (err) {
      return { kind: "error", message: err instanceof Error ? err.message : String(err) };
    }
  }

  private async admit(state: RunState, pending: Pending): Promise<void> {
    const { report } = state;
    const { path } = pending;
    const inspection = await pending.inspection;
    report.scanned++;

    if (inspection.kind === "error") {
      report.errors.push({ path, message: inspection.message });
      logWarning("Skipping unreadable archive", { path, error: inspection.message });
      return;
    }
    if (inspection.kind === "not-database") {
      report.skipped.push({ path, reason: "not a CodeQL database" });
      logDebug("Skipping zip without codeql-database.yml", { path });
      return;
    }

    const { archive } = inspection;
    const identity = repositoryIdentity(toPosix(relative(state.root, path)));
    const archiveId = deriveArchiveId(identity, archive.contentHash);
    if (state.admittedIds.has(archiveId)) {
      report.skipped.push({ path, reason: `duplicate of ${archiveId}` });
      logInfo("Skipping duplicate archive", { path, archiveId });
      return;
    }

    let collected: CollectedArchive;
    try {
      const existing = await this.store.getArchive(archiveId);
      if (existing && (await this.storage.exists(existing.filePath))) {
        collected = { record: existing, status: "existing" };
      } else if (existing) {
        await this.storage.copyIn(path, existing.filePath);
        collected = { record: existing, status: "restored" };
      } else {
        const record: StoredArchive = {
          archiveId,
          filePath: archiveFileName(archiveId),
          size: archive.size,
          createdAt: new Date().toISOString(),
          gitOwner: identity.owner,
          gitRepo: identity.repo,
          gitBranch: null,
          gitCommitId: archive.descriptor.commitSha,
          primaryLanguage: archive.descriptor.primaryLanguage,
          toolName: "codeql",
          toolVersion: archive.descriptor.cliVersion,
          projname: `${identity.owner}/${identity.repo}`,
          dbCreatedAt: archive.descriptor.creationTime,
          sourcePath: path,
        };
        await this.storage.copyIn(path, record.filePath);
        if (!(await this.store.putArchive(record))) {
          report.skipped.push({ path, reason: `archive id collision: ${archiveId}` });
          logWarning("Archive id already taken, not overwriting", { path, archiveId });
          return;
        }
        collected = { record, status: "copied" };
      }
    } catch (err) {
      report.errors.push({ path, message: String(err) });
      logWarning("Failed to admit archive", { path, archiveId, error: String(err) });
      return;
    }

    state.admittedIds.add(archiveId);
    report.archives.push(collected);
    logDebug("Admitted archive", { path, archiveId, status: collected.status });

    if (state.queryPack) await this.recordResult(state.queryPack, collected);
  }

  private async recordResult(queryPack: string, collected: CollectedArchive): Promise<void> {
    const { record } = collected;
    // Results already on file keep their URL (it may have been migrated).
    if (collected.status !== "copied" && (await this.store.getResult(queryPack, record.archiveId))) {
      return;
    }
    await this.store.putResult({
      queryPack,
      archiveId: record.archiveId,
      resultUrl: buildResultUrl(this.baseUrl, record.filePath),
      producedAt: record.dbCreatedAt ?? record.createdAt,
    });
  }
}
