/**
 * Metadata Store schema.
 *
 * `archives` holds one row per admitted archive file; `metadata` holds one
 * result per (query pack, archive). Timestamps are ISO-8601 UTC strings, so
 * lexical order is chronological order.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS archives (
  archive_id        TEXT PRIMARY KEY,
  file_path         TEXT NOT NULL UNIQUE,
  size              INTEGER NOT NULL,
  created_at        TEXT NOT NULL,
  git_owner         TEXT NOT NULL,
  git_repo          TEXT NOT NULL,
  git_branch        TEXT,
  git_commit_id     TEXT,
  primary_language  TEXT,
  tool_name         TEXT NOT NULL,
  tool_version      TEXT,
  projname          TEXT NOT NULL,
  db_created_at     TEXT,
  source_path       TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_archives_owner_repo ON archives (git_owner, git_repo);

CREATE TABLE IF NOT EXISTS metadata (
  query_pack   TEXT NOT NULL,
  archive_id   TEXT NOT NULL REFERENCES archives (archive_id),
  result_url   TEXT NOT NULL,
  produced_at  TEXT NOT NULL,
  PRIMARY KEY (query_pack, archive_id)
);

CREATE INDEX IF NOT EXISTS idx_metadata_latest ON metadata (query_pack, produced_at DESC, archive_id);
`;
