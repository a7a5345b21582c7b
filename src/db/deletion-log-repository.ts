/**
 * Deletion log repository
 */

import type { DeletionLogRecord } from "../types";
import { getDatabase } from "./connection";
import { parseDeletionLogRow, type RawDeletionLogRow } from "./mappers";

export type DeletionLogInsert = Omit<DeletionLogRecord, "id" | "deleted_at">;

export function logDeletion(log: DeletionLogInsert): void {
  getDatabase()
    .prepare<[string, string, string, string, number, string | null]>(
      `INSERT INTO deletion_log (
        backup_id, config_name, archive_filename, reason, success, error_message
      ) VALUES (?, ?, ?, ?, ?, ?)`,
    )
    .run(
      log.backup_id,
      log.config_name,
      log.archive_filename,
      log.reason,
      log.success ? 1 : 0,
      log.error_message,
    );
}

export function getDeletionLogs(limit = 100): DeletionLogRecord[] {
  return getDatabase()
    .prepare<[number], RawDeletionLogRow>(
      "SELECT * FROM deletion_log ORDER BY id DESC LIMIT ?",
    )
    .all(limit)
    .map(parseDeletionLogRow);
}
