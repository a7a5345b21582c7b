/**
 * Hand-built archives for reader and restore tests
 */

import { writeFile } from "node:fs/promises";
import { gzipSync } from "node:zlib";
import { BLOCK_SIZE, encodeHeader, type HeaderFields } from "../../src/core/archive/tar";

export interface FixtureEntry {
  header: HeaderFields;
  body?: Buffer | string;
}

function pad(data: Buffer): Buffer {
  const remainder = data.length % BLOCK_SIZE;
  return remainder === 0 ? data : Buffer.concat([data, Buffer.alloc(BLOCK_SIZE - remainder)]);
}

/** Raw tar bytes; header sizes default to the body length. */
export function buildTar(entries: FixtureEntry[], options: { endMarker?: boolean } = {}): Buffer {
  const blocks: Buffer[] = [];
  for (const { header, body } of entries) {
    const data = typeof body === "string" ? Buffer.from(body) : (body ?? Buffer.alloc(0));
    blocks.push(encodeHeader({ size: data.length, ...header }));
    if (data.length > 0) {
      blocks.push(pad(data));
    }
  }
  if (options.endMarker !== false) {
    blocks.push(Buffer.alloc(BLOCK_SIZE * 2));
  }
  return Buffer.concat(blocks);
}

export async function writeTar(
  filePath: string,
  entries: FixtureEntry[],
  options: { gzip?: boolean; endMarker?: boolean } = {},
): Promise<string> {
  const tar = buildTar(entries, options);
  await writeFile(filePath, options.gzip ? gzipSync(tar) : tar);
  return filePath;
}

export function file(name: string, body: string, mode = 0o644): FixtureEntry {
  return { header: { name, typeflag: "0", mode }, body };
}

export function dir(name: string): FixtureEntry {
  return { header: { name: `${name}/`, typeflag: "5", mode: 0o755 } };
}

export function symlink(name: string, target: string): FixtureEntry {
  return { header: { name, typeflag: "2", mode: 0o777, linkname: target } };
}

export function hardlink(name: string, target: string): FixtureEntry {
  return { header: { name, typeflag: "1", linkname: target } };
}

export async function collect(chunks: AsyncIterable<Buffer>): Promise<Buffer> {
  const parts: Buffer[] = [];
  for await (const chunk of chunks) {
    parts.push(chunk);
  }
  return Buffer.concat(parts);
}
