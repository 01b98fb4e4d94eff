/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL; no ORM.
 */
export type SqlValue = string | number | bigint | null;

export interface DatabaseBackend {
  /** Create tables / indexes from SCHEMA_SQL. */
  initialize(): Promise<void>;

  /** Execute a write statement (INSERT, UPDATE, DELETE) and return the changed row count. */
  execute(sql: string, params?: SqlValue[]): Promise<number>;

  /** Run a SELECT and return all matching rows. */
  query<T = Record<string, unknown>>(sql: string, params?: SqlValue[]): Promise<T[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: SqlValue[],
  ): Promise<T | null>;

  /** Execute `fn` inside a transaction. Transactions never interleave. */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /** Copy a consistent snapshot of the database to `destination`. */
  backup(destination: string): Promise<void>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
