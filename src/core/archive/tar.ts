/**
 * POSIX ustar/pax archive codec.
 *
 * The writer turns a stream of entries into tar blocks. The reader walks a
 * (optionally gzip-compressed) archive file entry by entry without buffering
 * whole file bodies, validating header checksums, data lengths and the
 * end-of-archive marker as it goes.
 */

import { createReadStream } from "node:fs";
import { open } from "node:fs/promises";
import { pipeline } from "node:stream";
import { createGunzip } from "node:zlib";
import { errorMessage, IntegrityError, IOError, throwIfAborted } from "../../utils/errors";
import { logger } from "../../utils/logger";

export const BLOCK_SIZE = 512;

const END_OF_ARCHIVE = Buffer.alloc(BLOCK_SIZE * 2);
const MAX_OCTAL_SIZE = 8 ** 11 - 1;
const NAME_LENGTH = 100;
const PREFIX_LENGTH = 155;
const GZIP_MAGIC = [0x1f, 0x8b] as const;

export type EntryType = "file" | "directory" | "symlink" | "hardlink" | "other";

export interface TarEntry {
  path: string;
  type: EntryType;
  /** Raw typeflag character, useful when reporting unsupported entries */
  typeflag: string;
  mode: number;
  size: number;
  mtime: Date;
  linkpath: string;
}

export interface PackEntry {
  path: string;
  type: "file" | "directory" | "symlink";
  mode: number;
  mtime: Date;
  size: number;
  linkpath?: string;
  /** File content; must yield exactly `size` bytes */
  open?: () => AsyncIterable<Buffer>;
}

export interface HeaderFields {
  name: string;
  typeflag: string;
  mode?: number;
  uid?: number;
  gid?: number;
  size?: number;
  mtime?: Date;
  linkname?: string;
  prefix?: string;
}

// ============================================================================
// Writer
// ============================================================================

function encodeOctal(value: number, length: number): string {
  const digits = Math.floor(value).toString(8);
  if (digits.length > length - 1) {
    throw new RangeError(`Value ${value} does not fit in a ${length}-byte tar field`);
  }
  return `${digits.padStart(length - 1, "0")}\0`;
}

function computeHeaderChecksum(header: Buffer): number {
  let sum = 0;
  for (let i = 0; i < BLOCK_SIZE; i++) {
    // checksum field (148-155) counts as spaces
    sum += i >= 148 && i < 156 ? 0x20 : (header[i] ?? 0);
  }
  return sum;
}

/**
 * Encode a single 512-byte ustar header block.
 */
export function encodeHeader(fields: HeaderFields): Buffer {
  const header = Buffer.alloc(BLOCK_SIZE);

  header.write(fields.name, 0, NAME_LENGTH, "utf8");
  header.write(encodeOctal(fields.mode ?? 0o644, 8), 100, 8, "ascii");
  header.write(encodeOctal(fields.uid ?? 0, 8), 108, 8, "ascii");
  header.write(encodeOctal(fields.gid ?? 0, 8), 116, 8, "ascii");
  header.write(encodeOctal(fields.size ?? 0, 12), 124, 12, "ascii");
  header.write(encodeOctal(Math.floor((fields.mtime ?? new Date(0)).getTime() / 1000), 12), 136, 12, "ascii");
  header.write(fields.typeflag, 156, 1, "ascii");
  header.write(fields.linkname ?? "", 157, NAME_LENGTH, "utf8");
  header.write("ustar\0", 257, 6, "ascii");
  header.write("00", 263, 2, "ascii");
  header.write(fields.prefix ?? "", 345, PREFIX_LENGTH, "utf8");

  header.write(encodeOctal(computeHeaderChecksum(header), 7), 148, 7, "ascii");
  header[155] = 0x20;

  return header;
}

/**
 * One pax extended header record: "<length> <key>=<value>\n", where the
 * length counts the whole record including its own digits.
 */
export function encodePaxRecord(key: string, value: string): Buffer {
  const body = ` ${key}=${value}\n`;
  const bodyLength = Buffer.byteLength(body);
  let length = bodyLength + String(bodyLength).length;
  if (String(length).length + bodyLength !== length) {
    length = bodyLength + String(length).length;
  }
  return Buffer.from(`${length}${body}`, "utf8");
}

function paddingFor(size: number): number {
  const remainder = size % BLOCK_SIZE;
  return remainder === 0 ? 0 : BLOCK_SIZE - remainder;
}

function splitPath(entryPath: string): { name: string; prefix: string } | null {
  if (Buffer.byteLength(entryPath) <= NAME_LENGTH) {
    return { name: entryPath, prefix: "" };
  }

  for (let i = entryPath.indexOf("/"); i > 0; i = entryPath.indexOf("/", i + 1)) {
    const name = entryPath.slice(i + 1);
    if (name.length === 0 || Buffer.byteLength(name) > NAME_LENGTH) continue;

    const prefix = entryPath.slice(0, i);
    return Buffer.byteLength(prefix) <= PREFIX_LENGTH ? { name, prefix } : null;
  }
  return null;
}

function typeflagFor(type: PackEntry["type"]): string {
  switch (type) {
    case "directory":
      return "5";
    case "symlink":
      return "2";
    default:
      return "0";
  }
}

function encodeEntryHeaders(entry: PackEntry): Buffer[] {
  const entryPath = entry.type === "directory" ? `${entry.path.replace(/\/+$/, "")}/` : entry.path;
  const linkpath = entry.linkpath ?? "";
  const size = entry.type === "file" ? entry.size : 0;

  const records: Buffer[] = [];
  const split = splitPath(entryPath);
  if (!split) {
    records.push(encodePaxRecord("path", entryPath));
  }
  if (Buffer.byteLength(linkpath) > NAME_LENGTH) {
    records.push(encodePaxRecord("linkpath", linkpath));
  }
  if (size > MAX_OCTAL_SIZE) {
    records.push(encodePaxRecord("size", String(size)));
  }

  const blocks: Buffer[] = [];
  const fallbackName = entryPath.slice(-NAME_LENGTH);

  if (records.length > 0) {
    const paxData = Buffer.concat(records);
    blocks.push(
      encodeHeader({
        name: `PaxHeader/${fallbackName}`.slice(0, NAME_LENGTH),
        typeflag: "x",
        size: paxData.length,
        mtime: entry.mtime,
      }),
      paxData,
      Buffer.alloc(paddingFor(paxData.length)),
    );
  }

  blocks.push(
    encodeHeader({
      name: split ? split.name : fallbackName,
      prefix: split ? split.prefix : "",
      typeflag: typeflagFor(entry.type),
      mode: entry.mode & 0o7777,
      size: size > MAX_OCTAL_SIZE ? 0 : size,
      mtime: entry.mtime,
      linkname: Buffer.byteLength(linkpath) > NAME_LENGTH ? "" : linkpath,
    }),
  );

  return blocks;
}

/**
 * Serialize entries as an uncompressed tar stream, ending with the
 * two-block end-of-archive marker.
 */
export async function* packEntries(
  entries: AsyncIterable<PackEntry> | Iterable<PackEntry>,
): AsyncGenerator<Buffer> {
  for await (const entry of entries) {
    yield* encodeEntryHeaders(entry);

    if (entry.type !== "file") continue;
    if (!entry.open) {
      if (entry.size === 0) continue;
      throw new IOError(`No content source for ${entry.path}`);
    }

    let written = 0;
    for await (const chunk of entry.open()) {
      written += chunk.length;
      if (written > entry.size) {
        throw new IOError(`File changed size while archiving: ${entry.path}`);
      }
      yield chunk;
    }
    if (written !== entry.size) {
      throw new IOError(`File changed size while archiving: ${entry.path}`);
    }

    const padding = paddingFor(entry.size);
    if (padding > 0) {
      yield Buffer.alloc(padding);
    }
  }

  yield END_OF_ARCHIVE;
}

// ============================================================================
// Reader
// ============================================================================

function isZlibError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    error.code.startsWith("Z_")
  );
}

/**
 * Pulls exact byte counts out of an async chunk source.
 */
export class BlockReader {
  private buffered: Buffer[] = [];
  private bufferedLength = 0;
  private finished = false;
  position = 0;

  constructor(private readonly source: AsyncIterator<Buffer>) {}

  private async fill(): Promise<boolean> {
    if (this.finished) return false;

    let result: IteratorResult<Buffer>;
    try {
      result = await this.source.next();
    } catch (err) {
      if (isZlibError(err)) {
        throw new IntegrityError(`Corrupt compressed stream: ${errorMessage(err)}`, { cause: err });
      }
      throw err;
    }

    if (result.done) {
      this.finished = true;
      return false;
    }
    if (result.value.length > 0) {
      this.buffered.push(result.value);
      this.bufferedLength += result.value.length;
    }
    return true;
  }

  private take(n: number): Buffer {
    const parts: Buffer[] = [];
    let needed = n;
    while (needed > 0) {
      const head = this.buffered[0];
      if (!head) break;
      if (head.length <= needed) {
        parts.push(head);
        this.buffered.shift();
        needed -= head.length;
      } else {
        parts.push(head.subarray(0, needed));
        this.buffered[0] = head.subarray(needed);
        needed = 0;
      }
    }
    this.bufferedLength -= n;
    this.position += n;

    const [only] = parts;
    return parts.length === 1 && only ? only : Buffer.concat(parts, n);
  }

  /**
   * Exactly `n` bytes, or null if the source ended cleanly before any of
   * them. A partial read is a truncated archive.
   */
  async read(n: number): Promise<Buffer | null> {
    while (this.bufferedLength < n) {
      if (!(await this.fill())) break;
    }
    if (this.bufferedLength === 0 && n > 0) return null;
    if (this.bufferedLength < n) {
      throw new IntegrityError(`Archive truncated at byte ${this.position + this.bufferedLength}`);
    }
    return this.take(n);
  }

  /** Between 1 and `n` bytes; throws if the source has ended. */
  async readUpTo(n: number): Promise<Buffer> {
    while (this.bufferedLength === 0) {
      if (!(await this.fill())) {
        throw new IntegrityError(`Archive truncated at byte ${this.position}`);
      }
    }
    return this.take(Math.min(n, this.bufferedLength));
  }

  async skip(n: number): Promise<void> {
    let remaining = n;
    while (remaining > 0) {
      remaining -= (await this.readUpTo(remaining)).length;
    }
  }
}

function readString(block: Buffer, offset: number, length: number): string {
  const field = block.subarray(offset, offset + length);
  const end = field.indexOf(0);
  return field.subarray(0, end === -1 ? length : end).toString("utf8");
}

function readNumber(block: Buffer, offset: number, length: number): number {
  const field = block.subarray(offset, offset + length);

  // base-256 (GNU) for values too large for octal
  if (((field[0] ?? 0) & 0x80) !== 0) {
    let value = (field[0] ?? 0) & 0x7f;
    for (let i = 1; i < field.length; i++) {
      value = value * 256 + (field[i] ?? 0);
    }
    return value;
  }

  const text = field.toString("ascii").replace(/[\0 ]+/g, " ").trim();
  if (text === "") return 0;
  if (!/^[0-7]+$/.test(text)) {
    throw new IntegrityError(`Invalid numeric header field: ${JSON.stringify(text)}`);
  }
  return Number.parseInt(text, 8);
}

function isZeroBlock(block: Buffer): boolean {
  return block.every((byte) => byte === 0);
}

function verifyHeaderChecksum(block: Buffer, offset: number): void {
  const stored = readNumber(block, 148, 8);
  const unsigned = computeHeaderChecksum(block);

  let signed = 0;
  for (let i = 0; i < BLOCK_SIZE; i++) {
    const byte = i >= 148 && i < 156 ? 0x20 : (block[i] ?? 0);
    signed += byte > 127 ? byte - 256 : byte;
  }

  if (stored !== unsigned && stored !== signed) {
    throw new IntegrityError(`Header checksum mismatch at byte ${offset}`);
  }
}

export function parsePaxRecords(data: Buffer): Map<string, string> {
  const records = new Map<string, string>();
  let pos = 0;

  while (pos < data.length) {
    if (data[pos] === 0) break;

    const space = data.indexOf(0x20, pos);
    const length = Number.parseInt(data.subarray(pos, space).toString("ascii"), 10);
    if (space === -1 || !Number.isInteger(length) || length <= 0 || pos + length > data.length) {
      throw new IntegrityError("Malformed pax extended header");
    }

    const record = data.subarray(space + 1, pos + length - 1).toString("utf8");
    const equals = record.indexOf("=");
    if (equals === -1) {
      throw new IntegrityError("Malformed pax extended header");
    }
    records.set(record.slice(0, equals), record.slice(equals + 1));
    pos += length;
  }

  return records;
}

function entryTypeFor(typeflag: string): EntryType {
  switch (typeflag) {
    case "0":
    case "\0":
    case "":
    case "7":
      return "file";
    case "5":
      return "directory";
    case "2":
      return "symlink";
    case "1":
      return "hardlink";
    default:
      return "other";
  }
}

function applyPaxOverrides(entry: TarEntry, records: Map<string, string>): void {
  const pathValue = records.get("path");
  if (pathValue !== undefined) entry.path = pathValue;

  const linkpath = records.get("linkpath");
  if (linkpath !== undefined) entry.linkpath = linkpath;

  const size = records.get("size");
  if (size !== undefined) {
    const parsed = Number(size);
    if (!Number.isSafeInteger(parsed) || parsed < 0) {
      throw new IntegrityError(`Invalid pax size: ${size}`);
    }
    entry.size = parsed;
  }

  const mtime = records.get("mtime");
  if (mtime !== undefined && Number.isFinite(Number(mtime))) {
    entry.mtime = new Date(Number(mtime) * 1000);
  }
}

export type EntryVisitor = (entry: TarEntry, body: AsyncIterable<Buffer>) => void | Promise<void>;

export interface ReadArchiveOptions {
  signal?: AbortSignal;
}

export interface ReadArchiveSummary {
  entries: number;
  /** Total size of entry bodies */
  bytes: number;
}

async function isGzipFile(archivePath: string): Promise<boolean> {
  const handle = await open(archivePath, "r");
  try {
    const magic = Buffer.alloc(2);
    const { bytesRead } = await handle.read(magic, 0, 2, 0);
    return bytesRead === 2 && magic[0] === GZIP_MAGIC[0] && magic[1] === GZIP_MAGIC[1];
  } finally {
    await handle.close();
  }
}

async function openArchiveStream(
  archivePath: string,
  signal: AbortSignal | undefined,
): Promise<AsyncIterator<Buffer>> {
  const gzipped = await isGzipFile(archivePath);
  const file = createReadStream(archivePath, { signal });
  if (!gzipped) {
    return file[Symbol.asyncIterator]();
  }

  const gunzip = pipeline(file, createGunzip(), (err) => {
    if (err) logger.debug(`Archive stream closed: ${errorMessage(err)}`);
  });
  return gunzip[Symbol.asyncIterator]();
}

async function readBlocks(
  reader: BlockReader,
  visit: EntryVisitor,
  signal: AbortSignal | undefined,
): Promise<ReadArchiveSummary> {
  const summary: ReadArchiveSummary = { entries: 0, bytes: 0 };
  const globalPax = new Map<string, string>();
  let localPax = new Map<string, string>();
  let longName: string | null = null;
  let longLink: string | null = null;

  for (;;) {
    throwIfAborted(signal);

    const offset = reader.position;
    const block = await reader.read(BLOCK_SIZE);
    if (!block) {
      throw new IntegrityError("Missing end-of-archive marker");
    }

    if (isZeroBlock(block)) {
      const second = await reader.read(BLOCK_SIZE);
      if (!second || !isZeroBlock(second)) {
        throw new IntegrityError(`Incomplete end-of-archive marker at byte ${offset}`);
      }
      return summary;
    }

    verifyHeaderChecksum(block, offset);

    const typeflag = String.fromCharCode(block[156] ?? 0);
    const magic = readString(block, 257, 6);
    const name = readString(block, 0, NAME_LENGTH);
    const prefix = magic.startsWith("ustar") ? readString(block, 345, PREFIX_LENGTH) : "";

    const entry: TarEntry = {
      path: prefix ? `${prefix}/${name}` : name,
      type: entryTypeFor(typeflag),
      typeflag,
      mode: readNumber(block, 100, 8) & 0o7777,
      size: readNumber(block, 124, 12),
      mtime: new Date(readNumber(block, 136, 12) * 1000),
      linkpath: readString(block, 157, NAME_LENGTH),
    };

    // Metadata entries describe the entry that follows them
    if (typeflag === "x" || typeflag === "g" || typeflag === "L" || typeflag === "K") {
      const content = await reader.read(entry.size);
      if (!content) {
        throw new IntegrityError(`Archive truncated at byte ${reader.position}`);
      }
      await reader.skip(paddingFor(entry.size));

      if (typeflag === "x") {
        localPax = parsePaxRecords(content);
      } else if (typeflag === "g") {
        for (const [key, value] of parsePaxRecords(content)) globalPax.set(key, value);
      } else if (typeflag === "L") {
        longName = readString(content, 0, content.length);
      } else {
        longLink = readString(content, 0, content.length);
      }
      continue;
    }

    if (longName !== null) entry.path = longName;
    if (longLink !== null) entry.linkpath = longLink;
    applyPaxOverrides(entry, globalPax);
    applyPaxOverrides(entry, localPax);
    localPax = new Map();
    longName = null;
    longLink = null;

    entry.path = entry.path.replace(/\/+$/, "");

    let remaining = entry.size;
    const body: AsyncIterable<Buffer> = {
      async *[Symbol.asyncIterator]() {
        while (remaining > 0) {
          const chunk = await reader.readUpTo(remaining);
          remaining -= chunk.length;
          yield chunk;
        }
      },
    };

    await visit(entry, body);

    // Whatever the visitor left unread
    await reader.skip(remaining);
    await reader.skip(paddingFor(entry.size));

    summary.entries++;
    summary.bytes += entry.size;
  }
}

/**
 * Walk every entry of an archive. Bodies the visitor does not consume are
 * skipped. Structural problems raise IntegrityError.
 */
export async function readArchive(
  archivePath: string,
  visit: EntryVisitor,
  options: ReadArchiveOptions = {},
): Promise<ReadArchiveSummary> {
  const source = await openArchiveStream(archivePath, options.signal);
  try {
    return await readBlocks(new BlockReader(source), visit, options.signal);
  } finally {
    await source.return?.();
  }
}

/**
 * Headers of every entry, in archive order.
 */
export async function listArchive(
  archivePath: string,
  options: ReadArchiveOptions = {},
): Promise<TarEntry[]> {
  const entries: TarEntry[] = [];
  await readArchive(
    archivePath,
    (entry) => {
      entries.push(entry);
    },
    options,
  );
  return entries;
}
