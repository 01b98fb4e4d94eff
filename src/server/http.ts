/**
 * Serving Layer: read-only HTTP front end over the live Metadata Store and
 * the Archive Store.
 *
 * - `GET /index`                                 JSON list of query packs
 * - `GET /api/v1/latest_results/{query_pack}`    results, one per archive, latest first
 * - `GET /api/v1/databases?<column>=<value>`     archive listing with equality filters
 * - `GET /api/v1/databases/values/{column}`      distinct values of a filter column
 * - `GET /db/{path}`                             raw archive bytes
 *
 * The store is looked up through the StoreHandle on every request, so a
 * cutover to a migrated store takes effect for the next request.
 */
import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { AddressInfo } from "node:net";
import { pipeline } from "node:stream/promises";

import {
  ConsistencyError,
  InvalidQueryError,
  StorageKeyError,
} from "../core/exceptions.js";
import { logDebug, logError, logWarning } from "../core/logger.js";
import type { ResultRecord, StoredArchive } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";
import type { StoreHandle } from "../store/handle.js";
import type { ArchiveFilter } from "../store/metadata.js";
import { archiveKeyFromPath, DOWNLOAD_ROUTE } from "./urls.js";

const LATEST_RESULTS_ROUTE = "/api/v1/latest_results/";
const DATABASES_ROUTE = "/api/v1/databases";
const DATABASE_VALUES_ROUTE = "/api/v1/databases/values/";

export interface ServerOptions {
  handle: StoreHandle;
  storage: StorageBackend;
}

/** Wire shape of a result, named after the columns of the metadata table. */
export interface ResultPayload {
  query_pack: string;
  archive_id: string;
  result_url: string;
  produced_at: string;
  git_owner: string;
  git_repo: string;
  git_branch: string | null;
  git_commit_id: string | null;
  primary_language: string | null;
  tool_name: string;
  tool_version: string | null;
  projname: string;
  db_file_size: number;
  ingestion_datetime_utc: string;
}

export type ArchivePayload = Omit<ResultPayload, "query_pack" | "result_url" | "produced_at"> & {
  file_path: string;
};

class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "HttpError";
    this.status = status;
  }
}

// ---------------------------------------------------------------------------
// Serialisation
// ---------------------------------------------------------------------------

function toArchivePayload(archive: StoredArchive): ArchivePayload {
  return {
    archive_id: archive.archiveId,
    file_path: archive.filePath,
    git_owner: archive.gitOwner,
    git_repo: archive.gitRepo,
    git_branch: archive.gitBranch,
    git_commit_id: archive.gitCommitId,
    primary_language: archive.primaryLanguage,
    tool_name: archive.toolName,
    tool_version: archive.toolVersion,
    projname: archive.projname,
    db_file_size: archive.size,
    ingestion_datetime_utc: archive.createdAt,
  };
}

function toResultPayload(result: ResultRecord, archive: StoredArchive): ResultPayload {
  return {
    query_pack: result.queryPack,
    archive_id: result.archiveId,
    result_url: result.resultUrl,
    produced_at: result.producedAt,
    git_owner: archive.gitOwner,
    git_repo: archive.gitRepo,
    git_branch: archive.gitBranch,
    git_commit_id: archive.gitCommitId,
    primary_language: archive.primaryLanguage,
    tool_name: archive.toolName,
    tool_version: archive.toolVersion,
    projname: archive.projname,
    db_file_size: archive.size,
    ingestion_datetime_utc: archive.createdAt,
  };
}

function sendJson(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  status = 200,
): void {
  const text = JSON.stringify(body);
  res.writeHead(status, {
    "content-type": "application/json; charset=utf-8",
    "content-length": Buffer.byteLength(text),
    "cache-control": "no-store",
  });
  res.end(req.method === "HEAD" ? undefined : text);
}

function statusFor(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof InvalidQueryError || err instanceof StorageKeyError) return 400;
  if (err instanceof ConsistencyError) return 404;
  return 500;
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new HttpError(400, `Malformed path segment: ${segment}`);
  }
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

async function latestResults(
  opts: ServerOptions,
  queryPack: string,
): Promise<ResultPayload[]> {
  const store = opts.handle.current;
  const results = await store.resultsFor(queryPack);
  if (results.length === 0) {
    throw new HttpError(404, `Unknown query pack: ${queryPack}`);
  }

  const payloads: ResultPayload[] = [];
  for (const result of results) {
    const archive = await store.getArchive(result.archiveId);
    if (!archive || !(await opts.storage.exists(archive.filePath))) {
      logWarning("Result refers to a missing archive; not serving it", {
        queryPack,
        archiveId: result.archiveId,
      });
      continue;
    }
    payloads.push(toResultPayload(result, archive));
  }
  if (payloads.length === 0) {
    throw new ConsistencyError(
      results[0].archiveId,
      `No archive available for query pack: ${queryPack}`,
    );
  }
  return payloads;
}

function filterFrom(params: URLSearchParams): ArchiveFilter {
  const filter: Record<string, string> = {};
  for (const [column, value] of params) filter[column] = value;
  return filter;
}

async function download(
  opts: ServerOptions,
  req: IncomingMessage,
  res: ServerResponse,
  pathname: string,
): Promise<void> {
  const key = archiveKeyFromPath(pathname);
  if (key === null) throw new HttpError(400, `Malformed archive path: ${pathname}`);

  const object = await opts.storage.stat(key);
  if (!object) throw new HttpError(404, `Archive not found: ${key}`);

  res.writeHead(200, {
    "content-type": "application/zip",
    "content-length": object.size,
  });
  if (req.method === "HEAD") {
    res.end();
    return;
  }
  await pipeline(opts.storage.readStream(key), res);
}

async function route(
  opts: ServerOptions,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  if (req.method !== "GET" && req.method !== "HEAD") {
    res.setHeader("allow", "GET, HEAD");
    throw new HttpError(405, `Method not allowed: ${req.method ?? ""}`);
  }

  const { pathname, searchParams } = new URL(req.url ?? "/", "http://localhost");

  if (pathname === "/index") {
    sendJson(req, res, await opts.handle.current.queryPacks());
    return;
  }
  if (pathname.startsWith(LATEST_RESULTS_ROUTE)) {
    const queryPack = decodeSegment(pathname.slice(LATEST_RESULTS_ROUTE.length));
    if (!queryPack) throw new HttpError(404, "Missing query pack");
    sendJson(req, res, await latestResults(opts, queryPack));
    return;
  }
  if (pathname === DATABASES_ROUTE) {
    const archives = await opts.handle.current.listArchives(filterFrom(searchParams));
    sendJson(req, res, archives.map(toArchivePayload));
    return;
  }
  if (pathname.startsWith(DATABASE_VALUES_ROUTE)) {
    const column = decodeSegment(pathname.slice(DATABASE_VALUES_ROUTE.length));
    sendJson(req, res, await opts.handle.current.distinctValues(column));
    return;
  }
  if (pathname.startsWith(DOWNLOAD_ROUTE)) {
    await download(opts, req, res, pathname);
    return;
  }
  throw new HttpError(404, `Not found: ${pathname}`);
}

// ---------------------------------------------------------------------------
// Server
// ---------------------------------------------------------------------------

// Raised by the response side when the client disconnects mid-body.
const CLIENT_GONE = new Set(["ERR_STREAM_PREMATURE_CLOSE", "ECONNRESET", "EPIPE"]);

function clientWentAway(err: unknown): boolean {
  return err instanceof Error && "code" in err && typeof err.code === "string" && CLIENT_GONE.has(err.code);
}

export function createHepcServer(opts: ServerOptions): Server {
  return createServer((req, res) => {
    route(opts, req, res).catch((err: unknown) => {
      if (res.headersSent && clientWentAway(err)) {
        logDebug("Client disconnected mid-response", { method: req.method, url: req.url });
        res.destroy();
        return;
      }
      const status = statusFor(err);
      if (status >= 500) {
        logError("Request failed", {
          method: req.method,
          url: req.url,
          error: err instanceof Error ? err.stack ?? err.message : String(err),
        });
      }
      if (res.headersSent) {
        // Mid-stream failure: the client sees a truncated body.
        res.destroy(err instanceof Error ? err : undefined);
        return;
      }
      const message = status >= 500 ? "Internal server error" : err instanceof Error ? err.message : String(err);
      sendJson(req, res, { ok: false, error: message }, status);
    });
  });
}

/** Listen and resolve with the bound address (port 0 picks a free port). */
export function listen(server: Server, host: string, port: number): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error(`Unexpected server address: ${String(address)}`));
        return;
      }
      resolve(address);
    });
  });
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
