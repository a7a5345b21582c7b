import type Database from "better-sqlite3";
import type { Migration } from "../../types/database";

import { migration as m0001 } from "./0001_initial";

const migrations: Migration[] = [m0001];

export function getAllMigrations(): Migration[] {
  return [...migrations].sort((a, b) => a.version - b.version);
}

export function getLatestVersion(): number {
  const all = getAllMigrations();
  const lastMigration = all[all.length - 1];
  return lastMigration ? lastMigration.version : 0;
}

export function hasVersionTable(database: Database.Database): boolean {
  const row = database
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'schema_version'",
    )
    .get();
  return row !== undefined;
}

export function getCurrentVersion(database: Database.Database): number {
  if (!hasVersionTable(database)) {
    return 0;
  }
  const row = database
    .prepare<[], { version: number | null }>("SELECT MAX(version) AS version FROM schema_version")
    .get();
  return row?.version ?? 0;
}

export function getPendingMigrations(currentVersion: number): Migration[] {
  return getAllMigrations().filter((m) => m.version > currentVersion);
}

export function runMigrations(database: Database.Database): void {
  const pending = getPendingMigrations(getCurrentVersion(database));

  const apply = database.transaction((items: Migration[]) => {
    for (const migration of items) {
      database.exec(migration.up);
      database
        .prepare<[number]>("INSERT INTO schema_version (version) VALUES (?)")
        .run(migration.version);
    }
  });

  apply(pending);
}

export function initializeDatabase(database: Database.Database): void {
  database.pragma("journal_mode = WAL");
  database.pragma("foreign_keys = ON");
  runMigrations(database);
}
