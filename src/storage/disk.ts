/**
 * Local filesystem storage backend.
 */
import { createReadStream } from "node:fs";
import { copyFile, mkdir, rename, rm, stat } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import { dirname, resolve, sep } from "node:path";
import type { Readable } from "node:stream";
import { StorageKeyError } from "../core/exceptions.js";
import type { StorageBackend, StoredObject } from "./backend.js";

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class DiskStorage implements StorageBackend {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  get location(): string {
    return this.basePath;
  }

  private resolve(key: string): string {
    const full = resolve(this.basePath, key);
    if (full !== this.basePath && !full.startsWith(this.basePath + sep)) {
      throw new StorageKeyError(key);
    }
    return full;
  }

  /** Write through a sibling temp file and rename it into place. */
  private async atomically(
    key: string,
    produce: (tmpPath: string) => Promise<void>,
  ): Promise<void> {
    const fullPath = this.resolve(key);
    await mkdir(dirname(fullPath), { recursive: true });
    const tmpPath = `${fullPath}.${process.pid}-${randomBytes(4).toString("hex")}.tmp`;
    try {
      await produce(tmpPath);
      await rename(tmpPath, fullPath);
    } catch (err) {
      await rm(tmpPath, { force: true });
      throw err;
    }
  }

  async prepare(): Promise<void> {
    await mkdir(this.basePath, { recursive: true });
  }

  async copyIn(localPath: string, key: string): Promise<void> {
    await this.atomically(key, (tmpPath) => copyFile(localPath, tmpPath));
  }

  readStream(key: string): Readable {
    return createReadStream(this.resolve(key));
  }

  async stat(key: string): Promise<StoredObject | null> {
    try {
      const s = await stat(this.resolve(key));
      return s.isFile() ? { size: s.size } : null;
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async exists(key: string): Promise<boolean> {
    return (await this.stat(key)) !== null;
  }
}
