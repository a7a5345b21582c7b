/**
 * Sidecar checksum files: `<archive>.sha256` holding `<hex>  <basename>\n`
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { SHA256_HEX_PATTERN } from "../utils/crypto";
import { hasErrorCode, IntegrityError } from "../utils/errors";
import { getSidecarName } from "../utils/naming";
import { writeFileAtomic } from "./local";

export interface SidecarContent {
  checksum: string;
  filename: string;
}

export function getSidecarPath(archivePath: string): string {
  return path.join(path.dirname(archivePath), getSidecarName(path.basename(archivePath)));
}

export function formatSidecar(checksum: string, archiveName: string): string {
  return `${checksum}  ${archiveName}\n`;
}

export function parseSidecar(content: string): SidecarContent | null {
  const line = content.split("\n")[0]?.trim() ?? "";
  const match = line.match(/^([a-fA-F0-9]{64})\s+\*?(.+)$/);
  if (!match) return null;

  const [, checksum = "", filename = ""] = match;
  return { checksum: checksum.toLowerCase(), filename };
}

export async function writeSidecar(archivePath: string, checksum: string): Promise<string> {
  if (!SHA256_HEX_PATTERN.test(checksum)) {
    throw new IntegrityError(`Not a SHA-256 hex digest: ${checksum}`);
  }

  const sidecarPath = getSidecarPath(archivePath);
  await writeFileAtomic(sidecarPath, formatSidecar(checksum, path.basename(archivePath)));
  return sidecarPath;
}

/**
 * Read the digest recorded next to an archive. Returns null when there is no
 * sidecar; a sidecar that cannot be parsed is an IntegrityError.
 */
export async function readSidecar(archivePath: string): Promise<SidecarContent | null> {
  const sidecarPath = getSidecarPath(archivePath);

  let content: string;
  try {
    content = await readFile(sidecarPath, "utf8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return null;
    throw err;
  }

  const parsed = parseSidecar(content);
  if (!parsed) {
    throw new IntegrityError(`Malformed checksum file: ${sidecarPath}`);
  }
  return parsed;
}
