/**
 * Recognises CodeQL database archives and reads their `codeql-database.yml`.
 */
import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { open, stat } from "node:fs/promises";
import { strFromU8 } from "fflate";
import YAML from "yaml";
import { z } from "zod";
import { ArchiveIOError } from "./exceptions.js";
import { listEntries, readEntry, ZipFormatError } from "./zip.js";

export const DESCRIPTOR_NAME = "codeql-database.yml";

const HASH_CHUNK = 1 << 20;

const Scalar = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .optional()
  .nullable();

export const CodeQLDatabaseYmlSchema = z
  .object({
    primaryLanguage: Scalar,
    sourceLocationPrefix: Scalar,
    creationMetadata: z
      .object({
        sha: Scalar,
        cliVersion: Scalar,
        creationTime: Scalar,
      })
      .passthrough()
      .optional()
      .nullable(),
  })
  .passthrough();

export type CodeQLDatabaseYml = z.infer<typeof CodeQLDatabaseYmlSchema>;

export interface DatabaseDescriptor {
  primaryLanguage: string | null;
  commitSha: string | null;
  cliVersion: string | null;
  /** ISO-8601 UTC, or null when absent or unparseable. */
  creationTime: string | null;
}

export interface InspectedArchive {
  sourcePath: string;
  size: number;
  /** Hex SHA-256 of the archive bytes. */
  contentHash: string;
  descriptor: DatabaseDescriptor;
}

function isDescriptorEntry(name: string): boolean {
  return name === DESCRIPTOR_NAME || name.endsWith(`/${DESCRIPTOR_NAME}`);
}

function depth(name: string): number {
  return name.split("/").length;
}

function normaliseTime(value: string | null | undefined): string | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

export function parseDescriptor(text: string): DatabaseDescriptor {
  const raw: unknown = YAML.parse(text);
  const parsed = CodeQLDatabaseYmlSchema.parse(raw ?? {});
  return {
    primaryLanguage: parsed.primaryLanguage ?? null,
    commitSha: parsed.creationMetadata?.sha ?? null,
    cliVersion: parsed.creationMetadata?.cliVersion ?? null,
    creationTime: normaliseTime(parsed.creationMetadata?.creationTime),
  };
}

async function hashFile(path: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(path, { highWaterMark: HASH_CHUNK })) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

async function readDescriptor(path: string, size: number): Promise<Uint8Array | null> {
  const handle = await open(path, "r");
  try {
    const entries = await listEntries(handle, size, isDescriptorEntry);
    const shallowest = entries.sort((a, b) => depth(a.name) - depth(b.name))[0];
    return shallowest ? await readEntry(handle, shallowest) : null;
  } finally {
    await handle.close();
  }
}

/**
 * Hash an archive and parse its descriptor. Returns null when the zip is
 * valid but holds no `codeql-database.yml`. Only the central directory and
 * the descriptor entry are read into memory; the hash is streamed.
 */
export async function inspectArchive(path: string): Promise<InspectedArchive | null> {
  let raw: Uint8Array | null;
  let size: number;
  try {
    size = (await stat(path)).size;
    raw = await readDescriptor(path, size);
  } catch (err) {
    if (err instanceof ZipFormatError) {
      throw new ArchiveIOError(path, `corrupt zip: ${err.message}`);
    }
    throw new ArchiveIOError(path, String(err));
  }
  if (raw === null) return null;

  let descriptor: DatabaseDescriptor;
  try {
    descriptor = parseDescriptor(strFromU8(raw));
  } catch (err) {
    throw new ArchiveIOError(path, `unreadable ${DESCRIPTOR_NAME}: ${String(err)}`);
  }

  let contentHash: string;
  try {
    contentHash = await hashFile(path);
  } catch (err) {
    throw new ArchiveIOError(path, String(err));
  }

  return { sourcePath: path, size, contentHash, descriptor };
}
