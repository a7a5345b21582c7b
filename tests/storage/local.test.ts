import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  ensureDir,
  fileExists,
  getTempPath,
  removeFilesAsUnit,
  removeIfExists,
  writeFileAtomic,
} from "../../src/storage/local";
import { makeTempDir, removeTempDir } from "../helpers/temp";

describe("local storage", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("local");
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  describe("ensureDir", () => {
    test("creates nested directories and tolerates existing ones", async () => {
      const nested = path.join(tempDir, "a", "b", "c");

      await ensureDir(nested);
      await ensureDir(nested);

      expect(await fileExists(nested)).toBe(true);
    });
  });

  describe("fileExists", () => {
    test("reports presence and absence", async () => {
      const filePath = path.join(tempDir, "f.txt");
      expect(await fileExists(filePath)).toBe(false);
      await writeFile(filePath, "x");
      expect(await fileExists(filePath)).toBe(true);
    });
  });

  test("getTempPath is a hidden per-process sibling", () => {
    expect(getTempPath("/backups/a.tar.gz")).toBe(`/backups/.a.tar.gz.${process.pid}.tmp`);
  });

  describe("removeIfExists", () => {
    test("returns whether a file was removed", async () => {
      const filePath = path.join(tempDir, "f.txt");
      await writeFile(filePath, "x");

      expect(await removeIfExists(filePath)).toBe(true);
      expect(await removeIfExists(filePath)).toBe(false);
    });
  });

  describe("writeFileAtomic", () => {
    test("writes content and leaves no temp file", async () => {
      const filePath = path.join(tempDir, "out.txt");

      await writeFileAtomic(filePath, "first");
      await writeFileAtomic(filePath, "second");

      expect(await readFile(filePath, "utf8")).toBe("second");
      expect(await readdir(tempDir)).toEqual(["out.txt"]);
    });
  });

  describe("removeFilesAsUnit", () => {
    let files: string[];

    beforeEach(async () => {
      files = [path.join(tempDir, "a.tar.gz"), path.join(tempDir, "a.tar.gz.sha256")];
      for (const filePath of files) {
        await writeFile(filePath, path.basename(filePath));
      }
    });

    test("removes every file once the commit succeeds", async () => {
      let committed = false;

      await removeFilesAsUnit(files, () => {
        committed = true;
      });

      expect(committed).toBe(true);
      expect(await readdir(tempDir)).toEqual([]);
    });

    test("puts the files back when the commit fails", async () => {
      await expect(
        removeFilesAsUnit(files, () => {
          throw new Error("database is locked");
        }),
      ).rejects.toThrow("database is locked");

      expect((await readdir(tempDir)).sort()).toEqual(["a.tar.gz", "a.tar.gz.sha256"]);
      expect(await readFile(files[0] ?? "", "utf8")).toBe("a.tar.gz");
    });

    test("hides the files while the commit runs", async () => {
      await removeFilesAsUnit(files, async () => {
        expect(await fileExists(files[0] ?? "")).toBe(false);
      });
    });

    test("skips files that are already gone", async () => {
      await removeIfExists(files[0] ?? "");

      await removeFilesAsUnit(files, () => {});

      expect(await readdir(tempDir)).toEqual([]);
    });
  });

  test("removeFilesAsUnit fails before the commit when a file cannot be moved", async () => {
    const blocked = path.join(tempDir, "dir");
    await mkdir(path.join(blocked, "child"), { recursive: true });
    const staged = path.join(tempDir, `.dir.${process.pid}.deleting`);
    await mkdir(path.join(staged, "occupied"), { recursive: true });
    let committed = false;

    await expect(
      removeFilesAsUnit([blocked], () => {
        committed = true;
      }),
    ).rejects.toThrow();

    expect(committed).toBe(false);
    expect(await fileExists(path.join(blocked, "child"))).toBe(true);
  });
});
