/**
 * Backup orchestration
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import { getBackupByArchiveFilename, insertBackup } from "../../db";
import { ensureDir, fileExists, removeIfExists } from "../../storage/local";
import { acquireLock } from "../../storage/locks";
import { getSidecarPath, writeSidecar } from "../../storage/sidecar";
import type { BackupConfig, BackupJob } from "../../types";
import { generateUUID } from "../../utils/crypto";
import {
  ConfigError,
  describeError,
  errorMessage,
  hasErrorCode,
  IOError,
  throwIfAborted,
} from "../../utils/errors";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { generateArchiveName, getHostIdentifier, isValidConfigName } from "../../utils/naming";
import { createArchive } from "./archive-creator";
import { runHook } from "./hooks";

export interface BackupOptions {
  signal?: AbortSignal;
  /** Clock override, mostly for tests */
  now?: Date;
  hostname?: string;
}

function freezeConfig(config: BackupConfig): Readonly<BackupConfig> {
  const copy = structuredClone(config);
  Object.freeze(copy.exclude);
  Object.freeze(copy.retention);
  if (copy.preHook) Object.freeze(copy.preHook);
  if (copy.postHook) Object.freeze(copy.postHook);
  return Object.freeze(copy);
}

async function validateSource(config: Readonly<BackupConfig>): Promise<void> {
  if (!isValidConfigName(config.name)) {
    throw new ConfigError(`Invalid backup name: "${config.name}"`);
  }

  try {
    const stats = await stat(config.source);
    if (!stats.isDirectory()) {
      throw new ConfigError(`Source is not a directory: ${config.source}`);
    }
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      throw new ConfigError(`Source path does not exist: ${config.source}`);
    }
    throw err;
  }

  try {
    await ensureDir(config.destination);
  } catch (err) {
    throw new IOError(`Cannot create destination ${config.destination}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}

async function assertNoCollision(archivePath: string): Promise<void> {
  const archiveName = path.basename(archivePath);
  if (
    (await fileExists(archivePath)) ||
    (await fileExists(getSidecarPath(archivePath))) ||
    getBackupByArchiveFilename(archiveName)
  ) {
    throw new ConfigError(`Archive name collision: ${archiveName} already exists`);
  }
}

async function discardArtifacts(archivePath: string): Promise<void> {
  for (const filePath of [archivePath, getSidecarPath(archivePath)]) {
    try {
      if (await removeIfExists(filePath)) {
        logger.debug(`Removed incomplete artifact: ${filePath}`);
      }
    } catch (err) {
      logger.error(`Failed to remove incomplete artifact ${filePath}: ${errorMessage(err)}`);
    }
  }
}

/**
 * Run one backup of a configuration. Never throws for run failures: the
 * returned job carries the error. The metadata database must already be open.
 */
export async function runBackup(
  config: BackupConfig,
  options: BackupOptions = {},
): Promise<Readonly<BackupJob>> {
  const { signal } = options;
  const startTime = Date.now();
  const settings = freezeConfig({
    ...config,
    source: path.resolve(config.source),
    destination: path.resolve(config.destination),
  });

  const job: BackupJob = {
    id: generateUUID(),
    configName: settings.name,
    status: "running",
    startedAt: new Date(startTime).toISOString(),
    finishedAt: null,
    archivePath: null,
    sizeBytes: 0,
    filesCount: 0,
    checksum: null,
    error: null,
    warnings: [],
  };

  logger.info(`Starting backup: ${job.id} (${settings.name})`);

  try {
    throwIfAborted(signal);
    await validateSource(settings);

    const lock = await acquireLock(settings.destination, settings.name);
    try {
      if (settings.preHook) {
        await runHook("pre-backup", settings.preHook, {
          cwd: settings.source,
          env: { RETAINER_BACKUP_NAME: settings.name },
          signal,
        });
      }
      throwIfAborted(signal);

      const now = options.now ?? new Date();
      const hostname = getHostIdentifier(options.hostname);
      const archiveName = generateArchiveName(settings.name, {
        hostname,
        now,
        compressed: settings.compression,
      });
      const archivePath = path.join(settings.destination, archiveName);
      await assertNoCollision(archivePath);

      let committed = false;
      try {
        const archive = await createArchive(settings, archiveName, { signal });
        await writeSidecar(archive.archivePath, archive.checksum);
        throwIfAborted(signal);

        insertBackup({
          id: job.id,
          created_at: now.toISOString(),
          config_name: settings.name,
          archive_filename: archiveName,
          size_bytes: archive.sizeBytes,
          checksum: archive.checksum,
          destination_dir: settings.destination,
          source_path: settings.source,
          hostname,
          files_count: archive.filesCount,
          compressed: settings.compression,
        });
        committed = true;

        job.archivePath = archive.archivePath;
        job.sizeBytes = archive.sizeBytes;
        job.filesCount = archive.filesCount;
        job.checksum = archive.checksum;
      } finally {
        if (!committed) {
          await discardArtifacts(archivePath);
        }
      }

      if (settings.postHook) {
        try {
          await runHook("post-backup", settings.postHook, {
            cwd: settings.source,
            env: { RETAINER_BACKUP_NAME: settings.name, RETAINER_ARCHIVE_PATH: archivePath },
            signal,
          });
        } catch (err) {
          const message = `Post-backup hook failed: ${errorMessage(err)}`;
          logger.warn(message);
          job.warnings.push(message);
        }
      }
    } finally {
      await lock.release();
    }

    job.status = "succeeded";
    logger.info(
      `Backup completed in ${formatDuration(Date.now() - startTime)}: ${path.basename(job.archivePath ?? "")} (${formatBytes(job.sizeBytes)}, ${job.filesCount} files)`,
    );
  } catch (err) {
    job.status = "failed";
    job.error = describeError(err);
    logger.error(`Backup ${job.id} failed: ${job.error.kind}: ${job.error.message}`);
  }

  job.finishedAt = new Date().toISOString();
  Object.freeze(job.warnings);
  return Object.freeze(job);
}
