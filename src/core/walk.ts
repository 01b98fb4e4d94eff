/**
 * Deterministic, cycle-safe directory walk.
 *
 * Depth first with an explicit stack; entries of each directory are visited
 * in code-unit order. Directories are tracked by canonical path, so symlink
 * cycles and aliased subtrees are entered once.
 */
import { readdir, realpath, stat } from "node:fs/promises";
import { join } from "node:path";

export interface WalkOptions {
  /** Canonical directory paths never to enter. */
  exclude?: Iterable<string>;
  /** Called for entries that cannot be stat'ed or listed; the walk goes on. */
  onError?: (path: string, err: unknown) => void;
}

export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export async function* walkFiles(
  root: string,
  options: WalkOptions = {},
): AsyncGenerator<string> {
  const excluded = new Set(options.exclude ?? []);
  const visited = new Set<string>();
  const onError = options.onError ?? (() => undefined);
  const stack: string[] = [root];

  while (stack.length > 0) {
    const path = stack.pop();
    if (path === undefined) break;

    let isDirectory: boolean;
    try {
      const info = await stat(path);
      if (info.isFile()) {
        yield path;
        continue;
      }
      isDirectory = info.isDirectory();
    } catch (err) {
      onError(path, err);
      continue;
    }
    if (!isDirectory) continue;

    let names: string[];
    try {
      const canonical = await realpath(path);
      if (visited.has(canonical) || excluded.has(canonical)) continue;
      visited.add(canonical);
      names = await readdir(path);
    } catch (err) {
      onError(path, err);
      continue;
    }

    names.sort(compareNames);
    for (let i = names.length - 1; i >= 0; i--) {
      stack.push(join(path, names[i]));
    }
  }
}
