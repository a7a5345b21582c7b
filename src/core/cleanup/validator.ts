/**
 * Backup deletion validation
 */

import * as path from "node:path";
import { getBackupById } from "../../db";
import { fileExists } from "../../storage/local";
import { isArchiveLeased } from "../../storage/locks";
import type { BackupConfig, BackupMetadata } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import {
  ConfigError,
  IntegrityError,
  IOError,
  type RetainerError,
  SecurityError,
} from "../../utils/errors";
import { isValidArchiveName } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";

export interface ValidationResult {
  valid: boolean;
  /** Reasons the unit must not be removed */
  errors: RetainerError[];
  warnings: string[];
}

export interface ValidationOptions {
  verifyChecksum?: boolean;
}

export function getArchivePath(backup: BackupMetadata): string {
  return path.join(backup.destination_dir, backup.archive_filename);
}

/**
 * Check a backup before its archive, sidecar and record are removed.
 * Every check must pass; the first failure ends validation.
 */
export async function validateDeletionCandidate(
  backup: BackupMetadata,
  config: BackupConfig,
  options: ValidationOptions = {},
): Promise<ValidationResult> {
  const warnings: string[] = [];
  const refuse = (error: RetainerError): ValidationResult => ({
    valid: false,
    errors: [error],
    warnings,
  });

  // Re-fetch: the snapshot may be stale
  if (!getBackupById(backup.id)) {
    return refuse(new ConfigError(`Backup ${backup.id} not found in database - refusing to delete`));
  }

  if (!isValidArchiveName(backup.archive_filename, config.name)) {
    return refuse(
      new SecurityError(
        `Archive name "${backup.archive_filename}" doesn't match the naming pattern of "${config.name}" - refusing to delete`,
      ),
    );
  }

  const archivePath = getArchivePath(backup);
  if (!isPathWithinDir(archivePath, config.destination)) {
    return refuse(
      new SecurityError(
        `Archive "${archivePath}" is outside the configured destination "${config.destination}" - refusing to delete`,
      ),
    );
  }

  if (await isArchiveLeased(archivePath)) {
    return refuse(new IOError(`Archive "${archivePath}" is in use by a running restore - refusing to delete`));
  }

  if (!(await fileExists(archivePath))) {
    warnings.push(`Archive not found (already deleted?): ${archivePath}`);
  } else if (options.verifyChecksum) {
    const actual = await computeFileChecksum(archivePath);
    if (actual !== backup.checksum) {
      return refuse(
        new IntegrityError(
          `Checksum mismatch for "${archivePath}" - refusing to delete (file may have been modified)`,
        ),
      );
    }
  }

  return { valid: true, errors: [], warnings };
}
