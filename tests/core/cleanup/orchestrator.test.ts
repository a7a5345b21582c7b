import { mkdir, readdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { removeBackup, runCleanup } from "../../../src/core/cleanup/orchestrator";
import { closeDatabase, getDeletionLogs, initDatabase, listBackups } from "../../../src/db";
import { acquireLease } from "../../../src/storage/locks";
import { ConfigError, RetentionViolation } from "../../../src/utils/errors";
import { makeBackupConfig, NO_RETENTION } from "../../helpers/config";
import { seedBackup, seedDailyBackups } from "../../helpers/seed";
import { makeTempDir, removeTempDir } from "../../helpers/temp";

describe("cleanup", () => {
  let tempDir: string;
  let destDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("cleanup");
    destDir = path.join(tempDir, "backups");
    await mkdir(destDir, { recursive: true });
    await initDatabase(":memory:");
  });

  afterEach(async () => {
    closeDatabase();
    await removeTempDir(tempDir);
  });

  function config(retention = { ...NO_RETENTION, keepDaily: 7, minBackups: 3 }) {
    return makeBackupConfig({ source: path.join(tempDir, "src"), destination: destDir, retention });
  }

  describe("runCleanup", () => {
    test("deletes the oldest backups beyond the daily quota", async () => {
      const seeded = await seedDailyBackups(destDir, 10);
      const expectedFreed = seeded.slice(0, 3).reduce((sum, r) => sum + r.size_bytes, 0);

      const result = await runCleanup(config());

      expect(result.totalChecked).toBe(10);
      expect(result.kept).toBe(7);
      expect(result.deleted).toBe(3);
      expect(result.freedBytes).toBe(expectedFreed);
      expect(result.errors).toEqual([]);
      expect(result.deletions.map((d) => d.backupId)).toEqual(["day-03", "day-02", "day-01"]);

      expect(listBackups("www").map((r) => r.id)).toEqual([
        "day-10",
        "day-09",
        "day-08",
        "day-07",
        "day-06",
        "day-05",
        "day-04",
      ]);
      const files = await readdir(destDir);
      expect(files).toHaveLength(14);
      for (const removed of seeded.slice(0, 3)) {
        expect(files).not.toContain(removed.archive_filename);
        expect(files).not.toContain(`${removed.archive_filename}.sha256`);
      }
    });

    test("writes a deletion log entry per removed backup", async () => {
      await seedDailyBackups(destDir, 4);

      await runCleanup(config({ ...NO_RETENTION, keepDaily: 3 }));

      const logs = getDeletionLogs();
      expect(logs).toHaveLength(1);
      expect(logs[0]).toMatchObject({
        backup_id: "day-01",
        config_name: "www",
        reason: "retention",
        success: true,
        error_message: null,
      });
    });

    test("a dry run reports without touching anything", async () => {
      await seedDailyBackups(destDir, 10);

      const result = await runCleanup(config(), { dryRun: true });

      expect(result.dryRun).toBe(true);
      expect(result.deleted).toBe(3);
      expect(result.freedBytes).toBeGreaterThan(0);
      expect(listBackups("www")).toHaveLength(10);
      expect(await readdir(destDir)).toHaveLength(20);
      expect(getDeletionLogs()).toEqual([]);
    });

    test("never goes below the minimum and reports the shortfall", async () => {
      await seedDailyBackups(destDir, 2);

      const result = await runCleanup(config({ ...NO_RETENTION, minBackups: 3 }));

      expect(result.deleted).toBe(0);
      expect(result.kept).toBe(2);
      expect(result.belowMinimum).toBe(true);
      expect(result.minimumShortfall).toBe(1);
      expect(listBackups("www")).toHaveLength(2);
    });

    test("only looks at the configuration's own backups", async () => {
      await seedDailyBackups(destDir, 3);
      await seedBackup(destDir, "2023-06-01T02:00:00Z", { configName: "db" });

      await runCleanup(config({ ...NO_RETENTION, keepDaily: 1 }));

      expect(listBackups().map((r) => r.config_name).sort()).toEqual(["db", "www"]);
    });

    test("leaves leased archives in place and counts them as kept", async () => {
      const [oldest] = await seedDailyBackups(destDir, 3);
      if (!oldest) throw new Error("seed failed");
      const lease = await acquireLease(path.join(destDir, oldest.archive_filename));

      try {
        const result = await runCleanup(config({ ...NO_RETENTION, keepDaily: 2 }));

        expect(result.deleted).toBe(0);
        expect(result.kept).toBe(3);
        expect(result.errors).toHaveLength(1);
        expect(result.errors[0]?.kind).toBe("IOError");
        expect(listBackups("www")).toHaveLength(3);
        expect(getDeletionLogs()[0]).toMatchObject({ backup_id: oldest.id, success: false });
      } finally {
        await lease.release();
      }
    });

    test("refuses to delete an archive whose checksum changed", async () => {
      const [oldest] = await seedDailyBackups(destDir, 3);
      if (!oldest) throw new Error("seed failed");
      await writeFile(path.join(destDir, oldest.archive_filename), "tampered");

      const result = await runCleanup(config({ ...NO_RETENTION, keepDaily: 2 }), { verifyChecksum: true });

      expect(result.deleted).toBe(0);
      expect(result.errors[0]?.kind).toBe("IntegrityError");
      expect(await readdir(destDir)).toContain(oldest.archive_filename);
    });

    test("removes the record when the archive is already gone", async () => {
      const [oldest] = await seedDailyBackups(destDir, 3);
      if (!oldest) throw new Error("seed failed");
      await removeTempDir(path.join(destDir, oldest.archive_filename));

      const result = await runCleanup(config({ ...NO_RETENTION, keepDaily: 2 }), { verifyChecksum: true });

      expect(result.deleted).toBe(1);
      expect(listBackups("www").map((r) => r.id)).toEqual(["day-03", "day-02"]);
      expect(await readdir(destDir)).not.toContain(`${oldest.archive_filename}.sha256`);
    });

    test("refuses records that point outside the destination", async () => {
      const elsewhere = path.join(tempDir, "elsewhere");
      await mkdir(elsewhere);
      await seedBackup(elsewhere, "2024-01-01T02:00:00Z");
      await seedBackup(destDir, "2024-01-02T02:00:00Z");

      const result = await runCleanup(config({ ...NO_RETENTION, keepDaily: 1 }));

      expect(result.deleted).toBe(0);
      expect(result.errors[0]?.kind).toBe("SecurityError");
      expect(await readdir(elsewhere)).toHaveLength(2);
    });
  });

  describe("removeBackup", () => {
    test("removes one backup and logs a manual deletion", async () => {
      const [oldest] = await seedDailyBackups(destDir, 4);
      if (!oldest) throw new Error("seed failed");

      const deletion = await removeBackup(config(), oldest.id);

      expect(deletion).toEqual({
        backupId: oldest.id,
        archiveFilename: oldest.archive_filename,
        sizeBytes: oldest.size_bytes,
        success: true,
        error: null,
      });
      expect(listBackups("www")).toHaveLength(3);
      expect(getDeletionLogs()[0]).toMatchObject({ backup_id: oldest.id, reason: "manual", success: true });
    });

    test("refuses to drop below the minimum without force", async () => {
      const [oldest] = await seedDailyBackups(destDir, 3);
      if (!oldest) throw new Error("seed failed");

      await expect(removeBackup(config(), oldest.id)).rejects.toThrow(RetentionViolation);
      expect(listBackups("www")).toHaveLength(3);

      await removeBackup(config(), oldest.id, { force: true });
      expect(listBackups("www")).toHaveLength(2);
    });

    test("rejects unknown ids and other configurations' backups", async () => {
      const other = await seedBackup(destDir, "2024-01-01T02:00:00Z", { configName: "db" });

      await expect(removeBackup(config(), "missing")).rejects.toThrow(ConfigError);
      await expect(removeBackup(config(), other.id)).rejects.toThrow(`belongs to "db"`);
    });
  });
});
