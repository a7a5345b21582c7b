import { existsSync } from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { closeDatabase, getDatabase, initDatabase } from "../../src/db/connection";
import { getCurrentVersion, getLatestVersion } from "../../src/db/migrations";
import { makeTempDir, removeTempDir } from "../helpers/temp";

describe("connection", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("connection");
    // Reset the module's internal db state
    closeDatabase();
  });

  afterEach(async () => {
    closeDatabase();
    await removeTempDir(tempDir);
  });

  describe("initDatabase", () => {
    test("creates new database with all migrations applied", async () => {
      const db = await initDatabase(path.join(tempDir, "new.db"));

      expect(getCurrentVersion(db)).toBe(getLatestVersion());
    });

    test("creates parent directories if they don't exist", async () => {
      const dbPath = path.join(tempDir, "nested", "path", "db.sqlite");

      await initDatabase(dbPath);

      expect(existsSync(dbPath)).toBe(true);
    });

    test("returns existing connection on subsequent calls", async () => {
      const dbPath = path.join(tempDir, "singleton.db");

      const db1 = await initDatabase(dbPath);
      const db2 = await initDatabase(dbPath);

      expect(db1).toBe(db2);
    });

    test("switches connections when a different path is given", async () => {
      const db1 = await initDatabase(path.join(tempDir, "one.db"));
      const db2 = await initDatabase(path.join(tempDir, "two.db"));

      expect(db2).not.toBe(db1);
      expect(db1.open).toBe(false);
      expect(getDatabase()).toBe(db2);
    });

    test("keeps data across reopen", async () => {
      const dbPath = path.join(tempDir, "existing.db");
      const db1 = await initDatabase(dbPath);
      db1
        .prepare("INSERT INTO deletion_log (backup_id, config_name, archive_filename, reason, success) VALUES (?, ?, ?, ?, ?)")
        .run("b1", "www", "www_h_20240101_000000.tar.gz", "manual", 1);
      closeDatabase();

      const db2 = await initDatabase(dbPath);
      const row = db2.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM deletion_log").get();

      expect(row?.total).toBe(1);
      expect(getCurrentVersion(db2)).toBe(getLatestVersion());
      expect(existsSync(`${dbPath}.migration-backup`)).toBe(false);
    });

    test("supports an in-memory database", async () => {
      const db = await initDatabase(":memory:");
      expect(db.memory).toBe(true);
      expect(getCurrentVersion(db)).toBe(getLatestVersion());
    });
  });

  describe("getDatabase", () => {
    test("throws before initialization", () => {
      expect(() => getDatabase()).toThrow("Database not initialized");
    });
  });

  describe("closeDatabase", () => {
    test("is safe to call multiple times", async () => {
      await initDatabase(path.join(tempDir, "multiclose.db"));
      closeDatabase();
      closeDatabase();

      expect(() => getDatabase()).toThrow();
    });
  });
});
