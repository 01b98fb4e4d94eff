/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { DatabaseBackend, SqlValue } from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

export interface SQLiteOptions {
  /** Open an existing file without write access (no pragmas, no schema). */
  readonly?: boolean;
  /** Fail instead of creating a missing file. */
  fileMustExist?: boolean;
}

export class SQLiteBackend implements DatabaseBackend {
  readonly path: string;
  private db: Database.Database;
  // better-sqlite3 is synchronous but `transaction` awaits its callback, so
  // two callers could otherwise interleave statements inside one BEGIN.
  private writeLock: Promise<void> = Promise.resolve();

  constructor(path: string = ":memory:", options: SQLiteOptions = {}) {
    this.path = path;
    if (options.readonly) {
      this.db = new Database(path, { readonly: true, fileMustExist: true });
      return;
    }
    if (options.fileMustExist) {
      this.db = new Database(path, { fileMustExist: true });
    } else {
      if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
      this.db = new Database(path);
    }
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    this.db.exec(SCHEMA_SQL);
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    return this.db.prepare(sql).run(...params).changes;
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T[]> {
    return this.db.prepare(sql).all(...params) as T[];
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: SqlValue[] = [],
  ): Promise<T | null> {
    const row = this.db.prepare(sql).get(...params);
    return (row as T | undefined) ?? null;
  }

  /** Not reentrant: calling `transaction` from inside `fn` deadlocks. */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.writeLock.then(async () => {
      this.db.exec("BEGIN IMMEDIATE");
      try {
        const result = await fn();
        this.db.exec("COMMIT");
        return result;
      } catch (err) {
        this.db.exec("ROLLBACK");
        throw err;
      }
    });
    this.writeLock = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  async backup(destination: string): Promise<void> {
    mkdirSync(dirname(destination), { recursive: true });
    await this.db.backup(destination);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
