/**
 * Offline URL migration: copy a Metadata Store, then rewrite result_url
 * prefixes in the copy. The source file is only ever opened read-only.
 */
import { realpath, rm, stat } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import { SQLiteBackend } from "../db/sqlite.js";
import { MigrationError } from "../core/exceptions.js";
import { logInfo } from "../core/logger.js";
import { MetadataStore } from "./metadata.js";

export interface MigrateOptions {
  source: string;
  /** Defaults to the source name with `-adjust` before the extension. */
  destination?: string;
  oldPrefix: string;
  newPrefix: string;
  /** Replace an existing destination. */
  force?: boolean;
}

export interface MigrationResult {
  source: string;
  destination: string;
  rewritten: number;
}

/** `metadata.sql` → `metadata-adjust.sql` */
export function defaultDestination(source: string): string {
  const ext = extname(source);
  const stem = basename(source, ext);
  return join(dirname(source), `${stem}-adjust${ext}`);
}

export async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function canonical(path: string): Promise<string> {
  try {
    return await realpath(path);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return resolve(path);
    throw err;
  }
}

/** True when both paths name the same file once symlinks are resolved. */
export async function sameFile(a: string, b: string): Promise<boolean> {
  return (await canonical(a)) === (await canonical(b));
}

export async function migrateStore(opts: MigrateOptions): Promise<MigrationResult> {
  const source = resolve(opts.source);
  const destination = resolve(opts.destination ?? defaultDestination(opts.source));

  if (opts.oldPrefix.length === 0) {
    throw new MigrationError("Old URL prefix must not be empty");
  }
  if (!(await isFile(source))) {
    throw new MigrationError(`Missing source store: ${source}`);
  }
  if (await sameFile(destination, source)) {
    throw new MigrationError("Destination store must differ from the source store");
  }
  if (await isFile(destination)) {
    if (!opts.force) {
      throw new MigrationError(`Destination store already exists: ${destination}`);
    }
    for (const suffix of ["", "-wal", "-shm"]) {
      await rm(`${destination}${suffix}`, { force: true });
    }
  }

  const reader = new SQLiteBackend(source, { readonly: true });
  try {
    await reader.backup(destination);
  } catch (err) {
    throw new MigrationError(`Could not copy ${source}: ${String(err)}`);
  } finally {
    await reader.close();
  }

  const copy = await MetadataStore.open(destination);
  try {
    const rewritten = await copy.rewriteUrlPrefix(opts.oldPrefix, opts.newPrefix);
    logInfo("Rewrote result URL prefixes", {
      source,
      destination,
      rewritten,
    });
    return { source, destination, rewritten };
  } finally {
    await copy.close();
  }
}
