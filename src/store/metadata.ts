/**
 * Metadata Store: archives and per-query-pack results over a raw-SQL backend.
 */
import { z } from "zod";
import type { DatabaseBackend, SqlValue } from "../db/backend.js";
import { SQLiteBackend, type SQLiteOptions } from "../db/sqlite.js";
import {
  ConsistencyError,
  InvalidQueryError,
  InvalidRecordError,
  MigrationError,
} from "../core/exceptions.js";
import type { ResultRecord, StoredArchive } from "../core/types.js";

// ---------------------------------------------------------------------------
// Rows
// ---------------------------------------------------------------------------

interface ArchiveRow {
  archive_id: string;
  file_path: string;
  size: number;
  created_at: string;
  git_owner: string;
  git_repo: string;
  git_branch: string | null;
  git_commit_id: string | null;
  primary_language: string | null;
  tool_name: string;
  tool_version: string | null;
  projname: string;
  db_created_at: string | null;
  source_path: string;
}

interface ResultRow {
  query_pack: string;
  archive_id: string;
  result_url: string;
  produced_at: string;
}

/** Archive columns a listing can filter on. */
export const FILTER_COLUMNS = [
  "git_owner",
  "git_repo",
  "git_branch",
  "git_commit_id",
  "primary_language",
  "tool_name",
  "tool_version",
  "projname",
] as const;

export type FilterColumn = (typeof FILTER_COLUMNS)[number];
export type ArchiveFilter = Partial<Record<FilterColumn, string>>;

export function isFilterColumn(value: string): value is FilterColumn {
  return FILTER_COLUMNS.some((column) => column === value);
}

function toArchive(row: ArchiveRow): StoredArchive {
  return {
    archiveId: row.archive_id,
    filePath: row.file_path,
    size: row.size,
    createdAt: row.created_at,
    gitOwner: row.git_owner,
    gitRepo: row.git_repo,
    gitBranch: row.git_branch,
    gitCommitId: row.git_commit_id,
    primaryLanguage: row.primary_language,
    toolName: row.tool_name,
    toolVersion: row.tool_version,
    projname: row.projname,
    dbCreatedAt: row.db_created_at,
    sourcePath: row.source_path,
  };
}

function toResult(row: ResultRow): ResultRecord {
  return {
    queryPack: row.query_pack,
    archiveId: row.archive_id,
    resultUrl: row.result_url,
    producedAt: row.produced_at,
  };
}

const ResultRecordSchema = z.object({
  queryPack: z.string().trim().min(1),
  archiveId: z.string().min(1),
  resultUrl: z.string().min(1),
  producedAt: z.string().datetime({ offset: true }),
});

const RESULT_COLUMNS = "query_pack, archive_id, result_url, produced_at";

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class MetadataStore {
  private db: DatabaseBackend;
  private isLive = false;

  constructor(db: DatabaseBackend) {
    this.db = db;
  }

  /** Open a SQLite-backed store at `path`, creating it unless `fileMustExist`. */
  static async open(
    path: string,
    options: Pick<SQLiteOptions, "fileMustExist"> = {},
  ): Promise<MetadataStore> {
    const store = new MetadataStore(new SQLiteBackend(path, options));
    await store.initialize();
    return store;
  }

  async initialize(): Promise<void> {
    await this.db.initialize();
  }

  /** Set once the store is handed to the Serving Layer; URL rewrites are then refused. */
  markLive(): void {
    this.isLive = true;
  }

  get live(): boolean {
    return this.isLive;
  }

  // ------------------------------------------------------------------
  // Archives
  // ------------------------------------------------------------------

  /** Insert an archive row. Returns false, leaving the row untouched, if the id exists. */
  async putArchive(archive: StoredArchive): Promise<boolean> {
    const changes = await this.db.execute(
      `INSERT OR IGNORE INTO archives (archive_id, file_path, size, created_at, git_owner, git_repo, git_branch, git_commit_id, primary_language, tool_name, tool_version, projname, db_created_at, source_path)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        archive.archiveId,
        archive.filePath,
        archive.size,
        archive.createdAt,
        archive.gitOwner,
        archive.gitRepo,
        archive.gitBranch,
        archive.gitCommitId,
        archive.primaryLanguage,
        archive.toolName,
        archive.toolVersion,
        archive.projname,
        archive.dbCreatedAt,
        archive.sourcePath,
      ],
    );
    return changes === 1;
  }

  async getArchive(archiveId: string): Promise<StoredArchive | null> {
    const row = await this.db.queryOne<ArchiveRow>(
      "SELECT * FROM archives WHERE archive_id = ?",
      [archiveId],
    );
    return row ? toArchive(row) : null;
  }

  async listArchives(filter: ArchiveFilter = {}): Promise<StoredArchive[]> {
    const conditions: string[] = [];
    const params: SqlValue[] = [];
    for (const [column, value] of Object.entries(filter)) {
      if (!isFilterColumn(column)) {
        throw new InvalidQueryError(`Unknown filter column: ${column}`);
      }
      if (value === undefined || value === "") continue;
      conditions.push(`${column} = ?`);
      params.push(value);
    }

    let sql = "SELECT * FROM archives";
    if (conditions.length > 0) sql += ` WHERE ${conditions.join(" AND ")}`;
    sql += " ORDER BY git_owner, git_repo, primary_language, archive_id";

    const rows = await this.db.query<ArchiveRow>(sql, params);
    return rows.map(toArchive);
  }

  async distinctValues(column: string): Promise<string[]> {
    if (!isFilterColumn(column)) {
      throw new InvalidQueryError(`Unknown filter column: ${column}`);
    }
    const rows = await this.db.query<{ value: string }>(
      `SELECT DISTINCT ${column} AS value FROM archives WHERE ${column} IS NOT NULL ORDER BY ${column}`,
    );
    return rows.map((r) => r.value);
  }

  // ------------------------------------------------------------------
  // Results
  // ------------------------------------------------------------------

  /** Upsert a result keyed by (queryPack, archiveId). The archive must exist. */
  async putResult(record: ResultRecord): Promise<ResultRecord> {
    const parsed = ResultRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new InvalidRecordError(
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      );
    }
    const normalised: ResultRecord = {
      ...parsed.data,
      producedAt: new Date(parsed.data.producedAt).toISOString(),
    };

    await this.db.transaction(async () => {
      const archive = await this.db.queryOne(
        "SELECT archive_id FROM archives WHERE archive_id = ?",
        [normalised.archiveId],
      );
      if (!archive) throw new ConsistencyError(normalised.archiveId);

      await this.db.execute(
        `INSERT INTO metadata (${RESULT_COLUMNS}) VALUES (?, ?, ?, ?)
         ON CONFLICT (query_pack, archive_id) DO UPDATE SET
           result_url = excluded.result_url,
           produced_at = excluded.produced_at`,
        [
          normalised.queryPack,
          normalised.archiveId,
          normalised.resultUrl,
          normalised.producedAt,
        ],
      );
    });
    return normalised;
  }

  async getResult(queryPack: string, archiveId: string): Promise<ResultRecord | null> {
    const row = await this.db.queryOne<ResultRow>(
      `SELECT ${RESULT_COLUMNS} FROM metadata WHERE query_pack = ? AND archive_id = ?`,
      [queryPack, archiveId],
    );
    return row ? toResult(row) : null;
  }

  /** The result with the greatest producedAt; ties go to the smallest archive id. */
  async latestResult(queryPack: string): Promise<ResultRecord | null> {
    const row = await this.db.queryOne<ResultRow>(
      `SELECT ${RESULT_COLUMNS} FROM metadata WHERE query_pack = ?
       ORDER BY produced_at DESC, archive_id ASC LIMIT 1`,
      [queryPack],
    );
    return row ? toResult(row) : null;
  }

  /** One latest result per query pack, ordered by pack. */
  async allLatestResults(): Promise<ResultRecord[]> {
    const rows = await this.db.query<ResultRow>(
      `SELECT ${RESULT_COLUMNS} FROM metadata m
       WHERE NOT EXISTS (
         SELECT 1 FROM metadata o
         WHERE o.query_pack = m.query_pack
           AND (o.produced_at > m.produced_at
                OR (o.produced_at = m.produced_at AND o.archive_id < m.archive_id))
       )
       ORDER BY query_pack`,
    );
    return rows.map(toResult);
  }

  /** Every result of a pack, one per archive, latest first. */
  async resultsFor(queryPack: string): Promise<ResultRecord[]> {
    const rows = await this.db.query<ResultRow>(
      `SELECT ${RESULT_COLUMNS} FROM metadata WHERE query_pack = ?
       ORDER BY produced_at DESC, archive_id ASC`,
      [queryPack],
    );
    return rows.map(toResult);
  }

  async queryPacks(): Promise<string[]> {
    const rows = await this.db.query<{ query_pack: string }>(
      "SELECT DISTINCT query_pack FROM metadata ORDER BY query_pack",
    );
    return rows.map((r) => r.query_pack);
  }

  /**
   * Replace `oldPrefix` with `newPrefix` on every result_url that starts with
   * it. The match is a literal, case-sensitive string prefix; LIKE would fold
   * case and treat `_` and `%` as wildcards.
   */
  async rewriteUrlPrefix(oldPrefix: string, newPrefix: string): Promise<number> {
    if (this.isLive) {
      throw new MigrationError(
        "Refusing to rewrite URLs on the live store; migrate a copy instead",
      );
    }
    if (oldPrefix.length === 0) {
      throw new InvalidRecordError("old URL prefix must not be empty");
    }
    return this.db.transaction(() =>
      this.db.execute(
        `UPDATE metadata
         SET result_url = ? || substr(result_url, length(?) + 1)
         WHERE substr(result_url, 1, length(?)) = ?`,
        [newPrefix, oldPrefix, oldPrefix, oldPrefix],
      ),
    );
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
