/**
 * Archive creation for backups
 */

import { createWriteStream } from "node:fs";
import { rename, stat } from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGzip } from "node:zlib";
import { getTempPath, removeIfExists } from "../../storage/local";
import type { BackupConfig } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { errorMessage } from "../../utils/errors";
import { formatBytes } from "../../utils/format";
import { logger } from "../../utils/logger";
import { isPathWithinDir } from "../../utils/path";
import { packEntries } from "../archive";
import { collectEntries, toPackEntry } from "./file-collector";

export interface ArchiveResult {
  archivePath: string;
  archiveName: string;
  checksum: string;
  sizeBytes: number;
  filesCount: number;
}

export interface CreateArchiveOptions {
  signal?: AbortSignal;
}

async function discard(filePath: string): Promise<void> {
  try {
    await removeIfExists(filePath);
  } catch (err) {
    logger.error(`Failed to remove partial file ${filePath}: ${errorMessage(err)}`);
  }
}

/**
 * Stream the source tree into `<destination>/<archiveName>`. The archive is
 * written under a hidden temp name and renamed into place once complete;
 * on failure nothing is left behind.
 */
export async function createArchive(
  config: BackupConfig,
  archiveName: string,
  options: CreateArchiveOptions = {},
): Promise<ArchiveResult> {
  const { signal } = options;
  const source = path.resolve(config.source);
  const destination = path.resolve(config.destination);

  const collected = await collectEntries(source, {
    exclude: config.exclude,
    skipPaths: isPathWithinDir(destination, source) ? [destination] : [],
    signal,
  });
  logger.info(
    `Found ${collected.filesCount} files to archive (${formatBytes(collected.totalBytes)})`,
  );

  const archivePath = path.join(destination, archiveName);
  const tempPath = getTempPath(archivePath);
  let renamed = false;

  try {
    const tarStream = Readable.from(
      packEntries(collected.entries.map((entry) => toPackEntry(entry, signal))),
    );
    const output = createWriteStream(tempPath, { flags: "wx" });

    if (config.compression) {
      await pipeline(tarStream, createGzip(), output, { signal });
    } else {
      await pipeline(tarStream, output, { signal });
    }

    await rename(tempPath, archivePath);
    renamed = true;

    const checksum = await computeFileChecksum(archivePath, signal);
    const { size } = await stat(archivePath);

    logger.info(`Archive created: ${archiveName} (${formatBytes(size)})`);

    return {
      archivePath,
      archiveName,
      checksum,
      sizeBytes: size,
      filesCount: collected.filesCount,
    };
  } catch (error) {
    await discard(tempPath);
    if (renamed) {
      await discard(archivePath);
    }
    throw error;
  }
}
