/**
 * Database row mapping utilities
 */

import type { BackupMetadata, DeletionLogRecord, DeletionReason } from "../types";

export type RawBackupRow = Omit<BackupMetadata, "compressed"> & {
  compressed: number;
};

export type RawDeletionLogRow = Omit<DeletionLogRecord, "success" | "reason"> & {
  success: number;
  reason: string;
};

export function parseBackupRow(row: RawBackupRow): BackupMetadata {
  return {
    ...row,
    compressed: Boolean(row.compressed),
  };
}

export function serializeBackup(record: BackupMetadata): RawBackupRow {
  return {
    ...record,
    compressed: record.compressed ? 1 : 0,
  };
}

function parseDeletionReason(reason: string): DeletionReason {
  return reason === "manual" ? "manual" : "retention";
}

export function parseDeletionLogRow(row: RawDeletionLogRow): DeletionLogRecord {
  return {
    ...row,
    reason: parseDeletionReason(row.reason),
    success: Boolean(row.success),
  };
}
