/**
 * Backup metadata repository
 */

import type { BackupMetadata } from "../types";
import { getDatabase } from "./connection";
import { parseBackupRow, type RawBackupRow, serializeBackup } from "./mappers";

const NEWEST_FIRST = "ORDER BY created_at DESC, id DESC";

/**
 * Append one record. The insert is a single statement, so concurrent readers
 * see either nothing or the whole row.
 */
export function insertBackup(record: BackupMetadata): BackupMetadata {
  const database = getDatabase();

  database
    .prepare<RawBackupRow>(`
      INSERT INTO backups (
        id, config_name, archive_filename, size_bytes, checksum, destination_dir,
        source_path, hostname, files_count, compressed, created_at
      ) VALUES (
        @id, @config_name, @archive_filename, @size_bytes, @checksum, @destination_dir,
        @source_path, @hostname, @files_count, @compressed, @created_at
      )
    `)
    .run(serializeBackup(record));

  const inserted = getBackupById(record.id);
  if (!inserted) {
    throw new Error(`Failed to retrieve inserted backup: ${record.id}`);
  }
  return inserted;
}

export function getBackupById(id: string): BackupMetadata | null {
  const row = getDatabase()
    .prepare<[string], RawBackupRow>("SELECT * FROM backups WHERE id = ?")
    .get(id);

  return row ? parseBackupRow(row) : null;
}

export function getBackupByArchiveFilename(archiveFilename: string): BackupMetadata | null {
  const row = getDatabase()
    .prepare<[string], RawBackupRow>("SELECT * FROM backups WHERE archive_filename = ?")
    .get(archiveFilename);

  return row ? parseBackupRow(row) : null;
}

/**
 * Records for one configuration (or all of them), newest first.
 */
export function listBackups(configName?: string): BackupMetadata[] {
  const database = getDatabase();

  const rows =
    configName === undefined
      ? database.prepare<[], RawBackupRow>(`SELECT * FROM backups ${NEWEST_FIRST}`).all()
      : database
          .prepare<[string], RawBackupRow>(
            `SELECT * FROM backups WHERE config_name = ? ${NEWEST_FIRST}`,
          )
          .all(configName);

  return rows.map(parseBackupRow);
}

export function countBackups(configName: string): number {
  const row = getDatabase()
    .prepare<[string], { total: number }>(
      "SELECT COUNT(*) AS total FROM backups WHERE config_name = ?",
    )
    .get(configName);

  return row?.total ?? 0;
}

/**
 * Remove one record. Deleting an id that is already gone is a no-op.
 */
export function deleteBackupRecord(id: string): boolean {
  const result = getDatabase().prepare<[string]>("DELETE FROM backups WHERE id = ?").run(id);
  return result.changes > 0;
}
