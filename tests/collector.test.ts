import { describe, test, expect } from "vitest";
import { readdirSync, readFileSync, realpathSync, rmSync, symlinkSync } from "node:fs";
import { join } from "node:path";

import { Collector } from "../src/core/collector.js";
import { ConfigurationError } from "../src/core/exceptions.js";
import { DiskStorage } from "../src/storage/disk.js";
import {
  BASE_URL,
  buildDatabaseZip,
  buildZip,
  makeHepc,
  makeStore,
  makeTmpDir,
  sha256Hex,
  writeFileAt,
  writeSourceTree,
} from "./fixtures.js";

function expectedId(path: string, owner: string, repo: string): string {
  return `${owner}-${repo}-${sha256Hex(readFileSync(path)).slice(0, 12)}`;
}

function expectedIds(paths: string[]): string[] {
  return paths.map((path, i) => {
    const n = String(i).padStart(2, "0");
    return expectedId(path, `owner${n}`, `repo${n}`);
  });
}

describe("Collector", () => {
  test("stops at maxDbs and copies archives byte for byte", async () => {
    const dir = makeTmpDir();
    const paths = writeSourceTree(join(dir, "src"), 20);
    const hepc = await makeHepc(dir);

    const report = await hepc.collect({ startingPath: join(dir, "src"), maxDbs: 17 });

    const ids = expectedIds(paths).slice(0, 17);
    expect(report.archives.map((a) => a.record.archiveId)).toEqual(ids);
    expect(report.archives.every((a) => a.status === "copied")).toBe(true);
    expect(report.errors).toEqual([]);
    expect(report.skipped).toEqual([]);
    expect(report.scanned).toBe(17);
    expect(report.limitReached).toBe(true);
    expect(report.destination).toBe(realpathSync(join(dir, "values")));

    expect(readdirSync(join(dir, "values")).sort()).toEqual(ids.map((id) => `${id}.zip`).sort());
    expect(readFileSync(join(dir, "values", `${ids[3]}.zip`))).toEqual(readFileSync(paths[3]));

    const first = report.archives[0].record;
    expect(first).toMatchObject({
      archiveId: ids[0],
      filePath: `${ids[0]}.zip`,
      size: readFileSync(paths[0]).byteLength,
      gitOwner: "owner00",
      gitRepo: "repo00",
      gitBranch: null,
      gitCommitId: "0123456789abcdef0123456789abcdef01234567",
      primaryLanguage: "cpp",
      toolName: "codeql",
      toolVersion: "2.17.0",
      projname: "owner00/repo00",
      dbCreatedAt: "2024-05-01T12:00:00.000Z",
      sourcePath: paths[0],
    });
    expect(await hepc.store.getArchive(ids[0])).toEqual(first);
    expect(await hepc.store.listArchives()).toHaveLength(17);
    await hepc.close();
  });

  test("collects everything when the tree holds fewer than maxDbs", async () => {
    const dir = makeTmpDir();
    writeSourceTree(join(dir, "src"), 3);
    const hepc = await makeHepc(dir);

    const report = await hepc.collect({ startingPath: join(dir, "src"), maxDbs: 17 });
    expect(report.archives).toHaveLength(3);
    expect(report.limitReached).toBe(false);
    await hepc.close();
  });

  test("never exceeds maxDbs", async () => {
    const dir = makeTmpDir();
    writeSourceTree(join(dir, "src"), 6);
    for (const maxDbs of [1, 2, 5]) {
      const hepc = await makeHepc(join(dir, `run-${maxDbs}`));
      const report = await hepc.collect({ startingPath: join(dir, "src"), maxDbs });
      expect(report.archives).toHaveLength(maxDbs);
      expect(readdirSync(join(dir, `run-${maxDbs}`, "values"))).toHaveLength(maxDbs);
      await hepc.close();
    }
  });

  test("the admitted set does not depend on concurrency", async () => {
    const dir = makeTmpDir();
    const paths = writeSourceTree(join(dir, "src"), 12);
    const results: string[][] = [];
    for (const concurrency of [1, 3, 8]) {
      const hepc = await makeHepc(join(dir, `c${concurrency}`), { concurrency });
      const report = await hepc.collect({ startingPath: join(dir, "src"), maxDbs: 7 });
      results.push(report.archives.map((a) => a.record.archiveId));
      await hepc.close();
    }
    const ids = expectedIds(paths).slice(0, 7);
    expect(results).toEqual([ids, ids, ids]);
  });

  test("a rerun finds archives already collected", async () => {
    const dir = makeTmpDir();
    writeSourceTree(join(dir, "src"), 5);
    const hepc = await makeHepc(dir);

    const first = await hepc.collect({ startingPath: join(dir, "src"), maxDbs: 5 });
    const second = await hepc.collect({ startingPath: join(dir, "src"), maxDbs: 5 });

    expect(second.archives.map((a) => a.status)).toEqual(Array(5).fill("existing"));
    expect(second.archives.map((a) => a.record)).toEqual(first.archives.map((a) => a.record));
    expect(readdirSync(join(dir, "values"))).toHaveLength(5);
    await hepc.close();
  });

  test("an archive file missing from the store is restored", async () => {
    const dir = makeTmpDir();
    writeSourceTree(join(dir, "src"), 2);
    const hepc = await makeHepc(dir);

    const first = await hepc.collect({ startingPath: join(dir, "src"), maxDbs: 2 });
    rmSync(join(dir, "values", first.archives[1].record.filePath));

    const second = await hepc.collect({ startingPath: join(dir, "src"), maxDbs: 2 });
    expect(second.archives.map((a) => a.status)).toEqual(["existing", "restored"]);
    expect(await hepc._storage.exists(first.archives[1].record.filePath)).toBe(true);
    await hepc.close();
  });

  test("concurrent runs are serialised", async () => {
    const dir = makeTmpDir();
    writeSourceTree(join(dir, "src"), 4);
    const hepc = await makeHepc(dir);

    const [a, b] = await Promise.all([
      hepc.collect({ startingPath: join(dir, "src"), maxDbs: 4 }),
      hepc.collect({ startingPath: join(dir, "src"), maxDbs: 4 }),
    ]);
    expect(a.archives.map((x) => x.status)).toEqual(Array(4).fill("copied"));
    expect(b.archives.map((x) => x.status)).toEqual(Array(4).fill("existing"));
    await hepc.close();
  });

  test("a store inside the starting path is not walked", async () => {
    const dir = makeTmpDir();
    writeSourceTree(dir, 3);
    const hepc = await makeHepc(dir);

    await hepc.collect({ startingPath: dir, maxDbs: 10 });
    const second = await hepc.collect({ startingPath: dir, maxDbs: 10 });
    expect(second.archives).toHaveLength(3);
    expect(second.scanned).toBe(3);
    expect(second.archives.every((a) => a.status === "existing")).toBe(true);
    await hepc.close();
  });

  test("skips non-databases, duplicates and corrupt zips", async () => {
    const dir = makeTmpDir();
    const src = join(dir, "src");
    const db = buildDatabaseZip("dup");
    const a = writeFileAt(src, "octo/demo/a.zip", db);
    const b = writeFileAt(src, "octo/demo/b.zip", db);
    const broken = writeFileAt(src, "octo/demo/c.zip", "not a zip");
    const plain = writeFileAt(src, "octo/demo/d.zip", buildZip({ "readme.md": "# hi" }));
    writeFileAt(src, "octo/demo/notes.txt", "ignored");
    const hepc = await makeHepc(dir);

    const report = await hepc.collect({ startingPath: src, maxDbs: 10 });
    const id = expectedId(a, "octo", "demo");

    expect(report.archives.map((x) => x.record.archiveId)).toEqual([id]);
    expect(report.skipped).toEqual([
      { path: b, reason: `duplicate of ${id}` },
      { path: plain, reason: "not a CodeQL database" },
    ]);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0].path).toBe(broken);
    expect(report.errors[0].message).toContain("corrupt zip");
    expect(report.scanned).toBe(4);
    await hepc.close();
  });

  test("unreadable entries that are not archives are not errors", async () => {
    const dir = makeTmpDir();
    const src = join(dir, "src");
    writeSourceTree(src, 2);
    symlinkSync(join(dir, "gone"), join(src, "owner00", "repo00", "latest"));
    const hepc = await makeHepc(dir);

    const clean = await hepc.collect({ startingPath: src, maxDbs: 10 });
    expect(clean.archives).toHaveLength(2);
    expect(clean.errors).toEqual([]);

    const dangling = join(src, "owner01", "repo01", "old.zip");
    symlinkSync(join(dir, "gone.zip"), dangling);
    const withZip = await hepc.collect({ startingPath: src, maxDbs: 10 });
    expect(withZip.archives).toHaveLength(2);
    expect(withZip.errors.map((e) => e.path)).toEqual([dangling]);
    await hepc.close();
  });

  test("records a result per archive under the query pack", async () => {
    const dir = makeTmpDir();
    const paths = writeSourceTree(join(dir, "src"), 3);
    const hepc = await makeHepc(dir, { queryPack: "codeql-all" });

    await hepc.collect({ startingPath: join(dir, "src"), maxDbs: 3 });
    const ids = expectedIds(paths);

    const results = await hepc.store.resultsFor("codeql-all");
    expect(results).toEqual(
      [...ids].sort().map((id) => ({
        queryPack: "codeql-all",
        archiveId: id,
        resultUrl: `${BASE_URL}/db/${id}.zip`,
        producedAt: "2024-05-01T12:00:00.000Z",
      })),
    );
    expect((await hepc.latestResult("codeql-all"))?.archiveId).toBe([...ids].sort()[0]);
    await hepc.close();
  });

  test("a rerun keeps results already on file", async () => {
    const dir = makeTmpDir();
    writeSourceTree(join(dir, "src"), 1);
    const hepc = await makeHepc(dir, { queryPack: "codeql-all" });

    const first = await hepc.collect({ startingPath: join(dir, "src"), maxDbs: 1 });
    const id = first.archives[0].record.archiveId;
    await hepc.store.putResult({
      queryPack: "codeql-all",
      archiveId: id,
      resultUrl: "https://moved.example/db/x.zip",
      producedAt: "2024-05-01T12:00:00.000Z",
    });

    await hepc.collect({ startingPath: join(dir, "src"), maxDbs: 1 });
    expect((await hepc.store.getResult("codeql-all", id))?.resultUrl).toBe("https://moved.example/db/x.zip");
    await hepc.close();
  });

  test("rejects bad limits and starting paths", async () => {
    const dir = makeTmpDir();
    const file = writeFileAt(dir, "file.txt", "x");
    const hepc = await makeHepc(dir);

    await expect(hepc.collect({ startingPath: dir, maxDbs: 0 })).rejects.toThrow(ConfigurationError);
    await expect(hepc.collect({ startingPath: dir, maxDbs: 1.5 })).rejects.toThrow(ConfigurationError);
    await expect(hepc.collect({ startingPath: dir })).rejects.toThrow("maxDbs is required");
    await expect(hepc.collect({ startingPath: join(dir, "absent"), maxDbs: 1 })).rejects.toThrow(
      /Starting path does not exist/,
    );
    await expect(hepc.collect({ startingPath: file, maxDbs: 1 })).rejects.toThrow(
      /Starting path is not a directory/,
    );
    await hepc.close();
  });

  test("rejects a non-positive concurrency", async () => {
    const dir = makeTmpDir();
    const store = await makeStore();
    expect(
      () =>
        new Collector({
          storage: new DiskStorage(join(dir, "values")),
          store,
          baseUrl: BASE_URL,
          concurrency: 0,
        }),
    ).toThrow(ConfigurationError);
    await store.close();
  });
});
