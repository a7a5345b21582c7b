/**
 * Database record type definitions
 */

export type DeletionReason = "retention" | "manual";

/**
 * Durable record of one succeeded backup.
 */
export interface BackupMetadata {
  id: string;
  created_at: string;
  config_name: string;
  archive_filename: string;
  size_bytes: number;
  checksum: string;
  destination_dir: string;
  source_path: string;
  hostname: string;
  files_count: number;
  compressed: boolean;
}

export interface DeletionLogRecord {
  id: number;
  backup_id: string;
  config_name: string;
  archive_filename: string;
  reason: DeletionReason;
  deleted_at: string;
  success: boolean;
  error_message: string | null;
}

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}
