import { describe, test, expect } from "vitest";
import { closeSync, createReadStream, openSync, writeSync } from "node:fs";
import { createHash } from "node:crypto";
import { join } from "node:path";
import { deflateSync, strToU8, zipSync } from "fflate";
import { inspectArchive, parseDescriptor } from "../src/core/codeql-db.js";
import { ArchiveIOError } from "../src/core/exceptions.js";
import {
  buildDatabaseZip,
  buildZip,
  descriptorYml,
  makeTmpDir,
  sha256Hex,
  writeFileAt,
} from "./fixtures.js";

describe("parseDescriptor", () => {
  test("reads language, commit, CLI version and creation time", () => {
    expect(parseDescriptor(descriptorYml({ language: "java", creationTime: "2024-05-01T14:00:00+02:00" }))).toEqual({
      primaryLanguage: "java",
      commitSha: "0123456789abcdef0123456789abcdef01234567",
      cliVersion: "2.17.0",
      creationTime: "2024-05-01T12:00:00.000Z",
    });
  });

  test("missing fields become null", () => {
    expect(parseDescriptor("primaryLanguage: ruby\n")).toEqual({
      primaryLanguage: "ruby",
      commitSha: null,
      cliVersion: null,
      creationTime: null,
    });
    expect(parseDescriptor("")).toEqual({
      primaryLanguage: null,
      commitSha: null,
      cliVersion: null,
      creationTime: null,
    });
  });

  test("an unparseable creation time is dropped", () => {
    const text = "creationMetadata:\n  cliVersion: 2.15\n  creationTime: sometime\n";
    expect(parseDescriptor(text)).toEqual({
      primaryLanguage: null,
      commitSha: null,
      cliVersion: "2.15",
      creationTime: null,
    });
  });
});

function localHeader(name: Buffer, method: number, size: number, compressed: number): Buffer {
  const header = Buffer.alloc(30);
  header.writeUInt32LE(0x04034b50, 0);
  header.writeUInt16LE(20, 4);
  header.writeUInt16LE(method, 8);
  header.writeUInt32LE(compressed, 18);
  header.writeUInt32LE(size, 22);
  header.writeUInt16LE(name.length, 26);
  return Buffer.concat([header, name]);
}

function centralHeader(
  name: Buffer,
  method: number,
  size: number,
  compressed: number,
  offset: number,
): Buffer {
  const header = Buffer.alloc(46);
  header.writeUInt32LE(0x02014b50, 0);
  header.writeUInt16LE(20, 4);
  header.writeUInt16LE(20, 6);
  header.writeUInt16LE(method, 10);
  header.writeUInt32LE(compressed, 20);
  header.writeUInt32LE(size, 24);
  header.writeUInt16LE(name.length, 28);
  header.writeUInt32LE(offset, 42);
  return Buffer.concat([header, name]);
}

/**
 * Writes a zip whose first entry is `bigSize` stored zero bytes, left as a
 * hole in the file, followed by a deflated descriptor. Returns the file size.
 */
function writeSparseDatabase(path: string, bigSize: number, yml: string): number {
  const bigName = Buffer.from("db/db-go/trap.bin");
  const ymlName = Buffer.from("db/codeql-database.yml");
  const packed = Buffer.from(deflateSync(strToU8(yml)));
  const ymlBytes = Buffer.byteLength(yml);

  const first = localHeader(bigName, 0, bigSize, bigSize);
  const ymlOffset = first.length + bigSize;
  const second = Buffer.concat([localHeader(ymlName, 8, ymlBytes, packed.length), packed]);
  const central = Buffer.concat([
    centralHeader(bigName, 0, bigSize, bigSize, 0),
    centralHeader(ymlName, 8, ymlBytes, packed.length, ymlOffset),
  ]);
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(2, 8);
  end.writeUInt16LE(2, 10);
  end.writeUInt32LE(central.length, 12);
  end.writeUInt32LE(ymlOffset + second.length, 16);
  const tail = Buffer.concat([second, central, end]);

  const fd = openSync(path, "w");
  try {
    writeSync(fd, first, 0, first.length, 0);
    writeSync(fd, tail, 0, tail.length, ymlOffset);
  } finally {
    closeSync(fd);
  }
  return ymlOffset + tail.length;
}

async function streamedSha256(path: string): Promise<string> {
  const hash = createHash("sha256");
  for await (const chunk of createReadStream(path)) hash.update(chunk);
  return hash.digest("hex");
}

describe("inspectArchive", () => {
  test("hashes the archive and reads its descriptor", async () => {
    const dir = makeTmpDir();
    const bytes = buildDatabaseZip("one");
    const path = writeFileAt(dir, "db.zip", bytes);

    const inspected = await inspectArchive(path);
    expect(inspected).toEqual({
      sourcePath: path,
      size: bytes.byteLength,
      contentHash: sha256Hex(bytes),
      descriptor: {
        primaryLanguage: "cpp",
        commitSha: "0123456789abcdef0123456789abcdef01234567",
        cliVersion: "2.17.0",
        creationTime: "2024-05-01T12:00:00.000Z",
      },
    });
  });

  test("the shallowest descriptor wins", async () => {
    const dir = makeTmpDir();
    const path = writeFileAt(
      dir,
      "db.zip",
      buildZip({
        "db/nested/inner/codeql-database.yml": descriptorYml({ language: "go" }),
        "db/codeql-database.yml": descriptorYml({ language: "rust" }),
      }),
    );
    expect((await inspectArchive(path))?.descriptor.primaryLanguage).toBe("rust");
  });

  test("reads a stored descriptor", async () => {
    const dir = makeTmpDir();
    const path = writeFileAt(
      dir,
      "db.zip",
      zipSync(
        { "db/codeql-database.yml": [strToU8(descriptorYml({ language: "swift" })), { level: 0 }] },
        { mtime: new Date("2024-01-01T00:00:00Z") },
      ),
    );
    expect((await inspectArchive(path))?.descriptor.primaryLanguage).toBe("swift");
  });

  test("handles archives larger than 2 GiB", { timeout: 120_000 }, async () => {
    const dir = makeTmpDir();
    const path = join(dir, "big.zip");
    const size = writeSparseDatabase(path, 2 ** 31 + 4096, descriptorYml({ language: "go" }));

    const inspected = await inspectArchive(path);
    expect(inspected?.size).toBe(size);
    expect(inspected?.descriptor.primaryLanguage).toBe("go");
    expect(inspected?.contentHash).toBe(await streamedSha256(path));
  });

  test("a zip without a descriptor is not a database", async () => {
    const dir = makeTmpDir();
    const path = writeFileAt(dir, "plain.zip", buildZip({ "readme.txt": "hello" }));
    expect(await inspectArchive(path)).toBeNull();
  });

  test("a corrupt zip raises ArchiveIOError", async () => {
    const dir = makeTmpDir();
    const path = writeFileAt(dir, "broken.zip", "this is not a zip archive");
    await expect(inspectArchive(path)).rejects.toThrow(ArchiveIOError);
    await expect(inspectArchive(path)).rejects.toThrow(/corrupt zip/);
  });

  test("a missing file raises ArchiveIOError", async () => {
    const dir = makeTmpDir();
    await expect(inspectArchive(`${dir}/absent.zip`)).rejects.toThrow(ArchiveIOError);
  });

  test("a malformed descriptor raises ArchiveIOError", async () => {
    const dir = makeTmpDir();
    const path = writeFileAt(
      dir,
      "db.zip",
      buildZip({ "db/codeql-database.yml": "primaryLanguage: [unclosed\n" }),
    );
    await expect(inspectArchive(path)).rejects.toThrow(/unreadable codeql-database.yml/);
  });
});
