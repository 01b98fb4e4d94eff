/**
 * Error taxonomy for collection, metadata and serving operations.
 */

/** Bad paths, bad limits or invalid configuration. Fatal, never retried. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** A single archive could not be read, parsed or copied. */
export class ArchiveIOError extends Error {
  path: string;

  constructor(path: string, message?: string) {
    super(message ? `Archive I/O failed for ${path}: ${message}` : `Archive I/O failed for ${path}`);
    this.name = "ArchiveIOError";
    this.path = path;
  }
}

/** A result record refers to an archive that is unknown or gone. */
export class ConsistencyError extends Error {
  archiveId: string;

  constructor(archiveId: string, message?: string) {
    super(message ?? `Unknown archive: ${archiveId}`);
    this.name = "ConsistencyError";
    this.archiveId = archiveId;
  }
}

export class MigrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MigrationError";
  }
}

export class InvalidRecordError extends Error {
  constructor(message?: string) {
    super(message ? `Invalid record: ${message}` : "Invalid record");
    this.name = "InvalidRecordError";
  }
}

/** An archive key resolving outside the store root. */
export class StorageKeyError extends Error {
  key: string;

  constructor(key: string) {
    super(`Storage key escapes the store root: ${key}`);
    this.name = "StorageKeyError";
    this.key = key;
  }
}

/** A listing or filter request naming something the store does not have. */
export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}
