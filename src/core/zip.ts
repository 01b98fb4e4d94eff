/**
 * Random-access zip reading: locate entries through the central directory
 * and inflate one entry, without loading the rest of the archive.
 */
import type { FileHandle } from "node:fs/promises";
import { inflateSync, strFromU8 } from "fflate";

const EOCD_SIGNATURE = 0x06054b50;
const ZIP64_LOCATOR_SIGNATURE = 0x07064b50;
const ZIP64_EOCD_SIGNATURE = 0x06064b50;
const CENTRAL_SIGNATURE = 0x02014b50;
const LOCAL_SIGNATURE = 0x04034b50;

const EOCD_SIZE = 22;
const ZIP64_LOCATOR_SIZE = 20;
const ZIP64_EOCD_SIZE = 56;
const CENTRAL_HEADER_SIZE = 46;
const LOCAL_HEADER_SIZE = 30;
const MAX_COMMENT = 0xffff;
const U16_MAX = 0xffff;
const U32_MAX = 0xffffffff;

const STORED = 0;
const DEFLATED = 8;

/** The archive is not a well-formed zip. */
export class ZipFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ZipFormatError";
  }
}

export interface ZipEntry {
  name: string;
  method: number;
  compressedSize: number;
  localHeaderOffset: number;
}

interface Directory {
  offset: number;
  size: number;
}

async function readAt(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(buffer, filled, length - filled, position + filled);
    if (bytesRead === 0) throw new ZipFormatError("unexpected end of archive");
    filled += bytesRead;
  }
  return buffer;
}

function u64(buffer: Buffer, offset: number): number {
  const value = buffer.readBigUInt64LE(offset);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) throw new ZipFormatError("zip64 field out of range");
  return Number(value);
}

async function zip64Directory(handle: FileHandle, eocdOffset: number): Promise<Directory> {
  if (eocdOffset < ZIP64_LOCATOR_SIZE) throw new ZipFormatError("missing zip64 locator");
  const locator = await readAt(handle, eocdOffset - ZIP64_LOCATOR_SIZE, ZIP64_LOCATOR_SIZE);
  if (locator.readUInt32LE(0) !== ZIP64_LOCATOR_SIGNATURE) {
    throw new ZipFormatError("missing zip64 locator");
  }
  const record = await readAt(handle, u64(locator, 8), ZIP64_EOCD_SIZE);
  if (record.readUInt32LE(0) !== ZIP64_EOCD_SIGNATURE) {
    throw new ZipFormatError("missing zip64 end of central directory");
  }
  return { size: u64(record, 40), offset: u64(record, 48) };
}

async function findDirectory(handle: FileHandle, size: number): Promise<Directory> {
  if (size < EOCD_SIZE) throw new ZipFormatError("not a zip archive");
  const tailLength = Math.min(size, EOCD_SIZE + MAX_COMMENT);
  const tailStart = size - tailLength;
  const tail = await readAt(handle, tailStart, tailLength);

  for (let i = tailLength - EOCD_SIZE; i >= 0; i--) {
    if (tail.readUInt32LE(i) !== EOCD_SIGNATURE) continue;
    if (i + EOCD_SIZE + tail.readUInt16LE(i + 20) > tailLength) continue;

    const entries = tail.readUInt16LE(i + 10);
    const directory = { size: tail.readUInt32LE(i + 12), offset: tail.readUInt32LE(i + 16) };
    if (entries === U16_MAX || directory.size === U32_MAX || directory.offset === U32_MAX) {
      return zip64Directory(handle, tailStart + i);
    }
    return directory;
  }
  throw new ZipFormatError("not a zip archive");
}

/** Offsets from the zip64 extra field, for the fields the header maxed out. */
function applyZip64Extra(extra: Buffer, entry: ZipEntry, uncompressedMaxed: boolean): void {
  for (let p = 0; p + 4 <= extra.length; ) {
    const id = extra.readUInt16LE(p);
    const length = extra.readUInt16LE(p + 2);
    if (id === 0x0001) {
      let q = p + 4;
      const end = q + length;
      if (uncompressedMaxed) q += 8;
      if (entry.compressedSize === U32_MAX && q + 8 <= end) {
        entry.compressedSize = u64(extra, q);
        q += 8;
      }
      if (entry.localHeaderOffset === U32_MAX && q + 8 <= end) {
        entry.localHeaderOffset = u64(extra, q);
      }
      return;
    }
    p += 4 + length;
  }
}

/** List the entries accepted by `filter`, in central-directory order. */
export async function listEntries(
  handle: FileHandle,
  size: number,
  filter: (name: string) => boolean,
): Promise<ZipEntry[]> {
  const directory = await findDirectory(handle, size);
  if (directory.offset + directory.size > size) {
    throw new ZipFormatError("central directory lies outside the archive");
  }
  const central = await readAt(handle, directory.offset, directory.size);

  const entries: ZipEntry[] = [];
  let p = 0;
  while (p + CENTRAL_HEADER_SIZE <= central.length) {
    if (central.readUInt32LE(p) !== CENTRAL_SIGNATURE) {
      throw new ZipFormatError("bad central directory header");
    }
    const flags = central.readUInt16LE(p + 8);
    const nameLength = central.readUInt16LE(p + 28);
    const extraLength = central.readUInt16LE(p + 30);
    const commentLength = central.readUInt16LE(p + 32);
    const nameStart = p + CENTRAL_HEADER_SIZE;
    const extraStart = nameStart + nameLength;
    const next = extraStart + extraLength + commentLength;
    if (next > central.length) throw new ZipFormatError("truncated central directory");

    // Bit 11 marks a UTF-8 name; otherwise the name is CP437, read as latin1.
    const name = strFromU8(central.subarray(nameStart, extraStart), (flags & 0x800) === 0);
    if (filter(name)) {
      const entry: ZipEntry = {
        name,
        method: central.readUInt16LE(p + 10),
        compressedSize: central.readUInt32LE(p + 20),
        localHeaderOffset: central.readUInt32LE(p + 42),
      };
      applyZip64Extra(
        central.subarray(extraStart, extraStart + extraLength),
        entry,
        central.readUInt32LE(p + 24) === U32_MAX,
      );
      entries.push(entry);
    }
    p = next;
  }
  return entries;
}

/** Read and decompress a single entry. */
export async function readEntry(handle: FileHandle, entry: ZipEntry): Promise<Uint8Array> {
  const header = await readAt(handle, entry.localHeaderOffset, LOCAL_HEADER_SIZE);
  if (header.readUInt32LE(0) !== LOCAL_SIGNATURE) {
    throw new ZipFormatError(`bad local header for ${entry.name}`);
  }
  const dataStart =
    entry.localHeaderOffset + LOCAL_HEADER_SIZE + header.readUInt16LE(26) + header.readUInt16LE(28);
  const data = await readAt(handle, dataStart, entry.compressedSize);

  switch (entry.method) {
    case STORED:
      return data;
    case DEFLATED:
      try {
        return inflateSync(data);
      } catch (err) {
        throw new ZipFormatError(`cannot inflate ${entry.name}: ${String(err)}`);
      }
    default:
      throw new ZipFormatError(`unsupported compression method ${entry.method} for ${entry.name}`);
  }
}
