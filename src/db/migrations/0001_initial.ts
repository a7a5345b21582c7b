import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "Backup metadata and deletion_log tables",
  up: `
CREATE TABLE backups (
    id TEXT PRIMARY KEY NOT NULL,
    config_name TEXT NOT NULL,
    archive_filename TEXT UNIQUE NOT NULL,
    size_bytes INTEGER NOT NULL,
    checksum TEXT NOT NULL,
    destination_dir TEXT NOT NULL,
    source_path TEXT NOT NULL,
    hostname TEXT NOT NULL,
    files_count INTEGER NOT NULL,
    compressed INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL
);

CREATE INDEX idx_backups_config_created ON backups(config_name, created_at DESC, id DESC);

CREATE TABLE deletion_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    backup_id TEXT NOT NULL,
    config_name TEXT NOT NULL,
    archive_filename TEXT NOT NULL,
    reason TEXT NOT NULL,
    deleted_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    success INTEGER NOT NULL,
    error_message TEXT
);

CREATE INDEX idx_deletion_log_backup ON deletion_log(backup_id);

CREATE TABLE schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
);
`,
};
