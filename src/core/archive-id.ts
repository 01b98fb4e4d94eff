/**
 * Archive identity: `<owner>-<repo>-<content hash fragment>`.
 *
 * Owner and repo come from the archive's location under the collection root
 * (`<owner>/<repo>/.../<file>.zip`, the layout of a repository mirror); the
 * fragment is the head of the SHA-256 of the archive bytes. The same bytes
 * found for the same repository always map to the same id.
 */
import { posix } from "node:path";

export const HASH_FRAGMENT_LENGTH = 12;

export interface RepositoryIdentity {
  owner: string;
  repo: string;
}

export function sanitizeSegment(segment: string): string {
  const cleaned = segment.replace(/[^A-Za-z0-9._-]/g, "-");
  return cleaned.length > 0 ? cleaned : "_";
}

function fileStem(fileName: string): string {
  return fileName.replace(/\.zip$/i, "");
}

/** Identity from a `/`-separated path relative to the collection root. */
export function repositoryIdentity(relativePath: string): RepositoryIdentity {
  const dir = posix.dirname(relativePath);
  const segments = dir === "." ? [] : dir.split("/").filter((s) => s.length > 0);
  const stem = fileStem(posix.basename(relativePath));

  if (segments.length === 0) return { owner: "_", repo: stem };
  if (segments.length === 1) return { owner: segments[0], repo: stem };
  return { owner: segments[0], repo: segments[1] };
}

export function deriveArchiveId(identity: RepositoryIdentity, contentHash: string): string {
  const fragment = contentHash.slice(0, HASH_FRAGMENT_LENGTH).toLowerCase();
  return `${sanitizeSegment(identity.owner)}-${sanitizeSegment(identity.repo)}-${fragment}`;
}

export function archiveFileName(archiveId: string): string {
  return `${archiveId}.zip`;
}
