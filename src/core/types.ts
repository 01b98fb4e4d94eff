/**
 * Archive, result and report types.
 */

/** An immutable archive file admitted into the Archive Store. */
export interface ArchiveRecord {
  archiveId: string;
  /** Relative to the Archive Store root, `/`-separated. */
  filePath: string;
  size: number;
  /** ISO-8601 UTC ingestion time. */
  createdAt: string;
}

/** Descriptor fields recorded next to each archive. */
export interface DatabaseInfo {
  gitOwner: string;
  gitRepo: string;
  gitBranch: string | null;
  gitCommitId: string | null;
  primaryLanguage: string | null;
  toolName: string;
  toolVersion: string | null;
  projname: string;
  /** Creation time from `codeql-database.yml`, if it had one. */
  dbCreatedAt: string | null;
  /** Where the Collector found the archive. */
  sourcePath: string;
}

export type StoredArchive = ArchiveRecord & DatabaseInfo;

/** One analysis result of a query pack, backed by an archive. */
export interface ResultRecord {
  queryPack: string;
  archiveId: string;
  resultUrl: string;
  /** ISO-8601 UTC. */
  producedAt: string;
}

export type CollectedStatus = "copied" | "existing" | "restored";

export interface CollectedArchive {
  record: StoredArchive;
  status: CollectedStatus;
}

/** Result returned from Collector#collect(). */
export interface CollectionReport {
  startingPath: string;
  destination: string;
  maxDbs: number;
  archives: CollectedArchive[];
  skipped: { path: string; reason: string }[];
  errors: { path: string; message: string }[];
  /** Candidate files looked at, including skipped and failed ones. */
  scanned: number;
  limitReached: boolean;
}

/** Result returned from Hepc#ingestResults(). */
export interface IngestReport {
  accepted: number;
  rejected: number;
  errors: string[];
}
