/**
 * Abstract storage backend interface for the Archive Store.
 *
 * Keys are `/`-separated paths relative to the store root.
 */
import type { Readable } from "node:stream";

export interface StoredObject {
  size: number;
}

export interface StorageBackend {
  /** Human-readable location of the store (a directory for DiskStorage). */
  readonly location: string;

  /** Create the store root if absent. */
  prepare(): Promise<void>;

  /** Copy a local file to the given key. Readers never see a partial object. */
  copyIn(localPath: string, key: string): Promise<void>;

  /** Open a readable stream for the given key. */
  readStream(key: string): Readable;

  /** Size of the object at `key`, or null when there is none. */
  stat(key: string): Promise<StoredObject | null>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;
}
