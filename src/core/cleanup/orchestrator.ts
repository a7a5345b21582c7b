/**
 * Cleanup orchestration
 */

import { countBackups, deleteBackupRecord, getBackupById, listBackups, logDeletion } from "../../db";
import { removeFilesAsUnit } from "../../storage/local";
import { getSidecarPath } from "../../storage/sidecar";
import type { BackupConfig, BackupMetadata, DeletionReason } from "../../types";
import {
  ConfigError,
  describeError,
  type ErrorDetail,
  RetentionViolation,
} from "../../utils/errors";
import { formatBytes } from "../../utils/format";
import { logger } from "../../utils/logger";
import { planRetention, type RetentionPlan } from "./retention";
import { getArchivePath, validateDeletionCandidate } from "./validator";

export interface CleanupOptions {
  dryRun?: boolean;
  /** Re-hash each archive and refuse to delete it when the digest differs from the record */
  verifyChecksum?: boolean;
}

export interface CleanupDeletion {
  backupId: string;
  archiveFilename: string;
  sizeBytes: number;
  success: boolean;
  error: ErrorDetail | null;
}

export interface CleanupResult {
  configName: string;
  dryRun: boolean;
  totalChecked: number;
  kept: number;
  /** Deleted, or would be deleted in a dry run */
  deleted: number;
  /** Freed, or would be freed in a dry run; summed from recorded sizes */
  freedBytes: number;
  belowMinimum: boolean;
  minimumShortfall: number;
  plan: RetentionPlan;
  deletions: CleanupDeletion[];
  errors: ErrorDetail[];
}

export interface RemoveOptions {
  /** Remove even when the configuration would drop below its backup floor */
  force?: boolean;
  verifyChecksum?: boolean;
}

/**
 * Remove archive, sidecar and record as one unit and write the audit entry.
 * Throws when the unit could not be removed; the files are then back in place.
 */
async function removeUnit(
  backup: BackupMetadata,
  config: BackupConfig,
  reason: DeletionReason,
  verifyChecksum: boolean,
): Promise<void> {
  const auditEntry = {
    backup_id: backup.id,
    config_name: backup.config_name,
    archive_filename: backup.archive_filename,
    reason,
  };

  try {
    const validation = await validateDeletionCandidate(backup, config, { verifyChecksum });
    for (const warning of validation.warnings) {
      logger.warn(warning);
    }
    const [refusal] = validation.errors;
    if (refusal) {
      throw refusal;
    }

    const archivePath = getArchivePath(backup);
    await removeFilesAsUnit([archivePath, getSidecarPath(archivePath)], () => {
      if (!deleteBackupRecord(backup.id)) {
        logger.warn(`Record ${backup.id} was already removed`);
      }
    });
  } catch (err) {
    logDeletion({ ...auditEntry, success: false, error_message: describeError(err).message });
    throw err;
  }

  logDeletion({ ...auditEntry, success: true, error_message: null });
}

/**
 * Apply a configuration's retention policy. Works on a snapshot of the
 * records taken at the start; one record failing does not stop the pass.
 * The metadata database must already be open.
 */
export async function runCleanup(
  config: BackupConfig,
  options: CleanupOptions = {},
): Promise<CleanupResult> {
  const dryRun = options.dryRun ?? false;
  const snapshot = listBackups(config.name);
  const plan = planRetention(snapshot, config.retention);

  logger.info(
    `Retention for "${config.name}": ${plan.keep.length} to keep, ${plan.delete.length} to delete`,
  );

  const result: CleanupResult = {
    configName: config.name,
    dryRun,
    totalChecked: snapshot.length,
    kept: plan.keep.length,
    deleted: 0,
    freedBytes: 0,
    belowMinimum: plan.minimumShortfall > 0,
    minimumShortfall: plan.minimumShortfall,
    plan,
    deletions: [],
    errors: [],
  };

  if (result.belowMinimum) {
    logger.warn(
      `"${config.name}" has ${snapshot.length} backup(s), ${plan.minimumShortfall} short of the minimum of ${config.retention.minBackups}`,
    );
  }

  for (const backup of plan.delete) {
    const deletion: CleanupDeletion = {
      backupId: backup.id,
      archiveFilename: backup.archive_filename,
      sizeBytes: backup.size_bytes,
      success: true,
      error: null,
    };

    if (dryRun) {
      logger.info(`[DRY RUN] Would delete: ${backup.archive_filename}`);
    } else {
      try {
        await removeUnit(backup, config, "retention", options.verifyChecksum ?? false);
        logger.info(`Deleted: ${backup.archive_filename}`);
      } catch (err) {
        deletion.success = false;
        deletion.error = describeError(err);
        result.errors.push(deletion.error);
        logger.error(`Failed to delete ${backup.archive_filename}: ${deletion.error.message}`);
      }
    }

    if (deletion.success) {
      result.deleted++;
      result.freedBytes += backup.size_bytes;
    } else {
      result.kept++;
    }
    result.deletions.push(deletion);
  }

  logger.info(
    `${dryRun ? "[DRY RUN] " : ""}Cleanup of "${config.name}" ${dryRun ? "would free" : "freed"} ${formatBytes(result.freedBytes)}`,
  );

  return result;
}

/**
 * Manually delete one backup of a configuration.
 */
export async function removeBackup(
  config: BackupConfig,
  backupId: string,
  options: RemoveOptions = {},
): Promise<CleanupDeletion> {
  const backup = getBackupById(backupId);
  if (!backup) {
    throw new ConfigError(`Backup not found: ${backupId}`);
  }
  if (backup.config_name !== config.name) {
    throw new ConfigError(`Backup ${backupId} belongs to "${backup.config_name}", not "${config.name}"`);
  }

  const remaining = countBackups(config.name) - 1;
  if (remaining < config.retention.minBackups && !options.force) {
    throw new RetentionViolation(
      `Removing ${backup.archive_filename} would leave ${remaining} backup(s) for "${config.name}", below the minimum of ${config.retention.minBackups}`,
    );
  }

  await removeUnit(backup, config, "manual", options.verifyChecksum ?? false);
  logger.info(`Removed backup: ${backup.archive_filename}`);

  return {
    backupId: backup.id,
    archiveFilename: backup.archive_filename,
    sizeBytes: backup.size_bytes,
    success: true,
    error: null,
  };
}
