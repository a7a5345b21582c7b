/**
 * Database connection management
 */

import { existsSync } from "node:fs";
import { copyFile, mkdir, unlink } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import { errorMessage, IOError } from "../utils/errors";
import { debug, info, error as logError, warn } from "../utils/logger";
import { getCurrentVersion, getLatestVersion, getPendingMigrations, initializeDatabase } from "./migrations";

const MEMORY_PATH = ":memory:";

let db: Database.Database | null = null;
let openPath: string | null = null;

function openDatabase(dbPath: string): Database.Database {
  const database = new Database(dbPath, { timeout: 5000 });
  try {
    initializeDatabase(database);
  } catch (err) {
    database.close();
    throw err;
  }
  return database;
}

async function removeMigrationBackup(backupPath: string): Promise<void> {
  try {
    await unlink(backupPath);
  } catch (err) {
    warn(`Could not remove migration backup ${backupPath}: ${errorMessage(err)}`);
  }
}

async function migrateWithBackup(dbPath: string, fromVersion: number): Promise<Database.Database> {
  const backupPath = `${dbPath}.migration-backup`;
  info(`Pending migrations detected, backing up database to ${backupPath}`);
  await copyFile(dbPath, backupPath);

  let database: Database.Database;
  try {
    database = openDatabase(dbPath);
  } catch (err) {
    logError(`Migration failed: ${errorMessage(err)}`);
    info("Rolling back database from backup...");
    await copyFile(backupPath, dbPath);
    await removeMigrationBackup(backupPath);
    throw new IOError(`Database migration failed and was rolled back: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  info(`Migrations completed successfully (v${fromVersion} -> v${getLatestVersion()})`);
  await removeMigrationBackup(backupPath);
  return database;
}

export async function initDatabase(dbPath: string): Promise<Database.Database> {
  const target = dbPath === MEMORY_PATH ? MEMORY_PATH : resolve(dbPath);

  if (db && openPath === target) {
    return db;
  }
  closeDatabase();

  if (target === MEMORY_PATH) {
    db = openDatabase(MEMORY_PATH);
    openPath = target;
    return db;
  }

  await mkdir(dirname(target), { recursive: true });

  if (existsSync(target)) {
    const probe = new Database(target, { readonly: true, fileMustExist: true });
    const currentVersion = getCurrentVersion(probe);
    probe.close();

    if (getPendingMigrations(currentVersion).length > 0 && currentVersion > 0) {
      db = await migrateWithBackup(target, currentVersion);
      openPath = target;
      return db;
    }
  }

  db = openDatabase(target);
  openPath = target;
  debug(`Opened metadata database: ${target}`);
  return db;
}

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    openPath = null;
  }
}
