import { readdir, readFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { restoreArchive } from "../../../src/core/restore/restorer";
import { acquireLease } from "../../../src/storage/locks";
import { file, writeTar } from "../../helpers/tar";
import { makeTempDir, removeTempDir } from "../../helpers/temp";

vi.mock("../../../src/storage/locks", async (importOriginal) => ({
  ...(await importOriginal<typeof import("../../../src/storage/locks")>()),
  acquireLease: vi.fn(),
}));

function fsError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: cannot create lease`), { code, syscall: "link" });
}

describe("restore from an archive directory that cannot take a lease", () => {
  let tempDir: string;
  let destDir: string;
  let archivePath: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("restore-ro");
    destDir = path.join(tempDir, "dest");
    archivePath = await writeTar(path.join(tempDir, "a.tar"), [file("f.txt", "content")]);
  });

  afterEach(async () => {
    vi.mocked(acquireLease).mockReset();
    await removeTempDir(tempDir);
  });

  test.each(["EROFS", "EACCES", "EPERM"])("restores without a lease on %s", async (code) => {
    vi.mocked(acquireLease).mockRejectedValue(fsError(code));

    const outcome = await restoreArchive(archivePath, destDir);

    expect(outcome.status).toBe("succeeded");
    expect(outcome.entriesWritten).toBe(1);
    expect(await readFile(path.join(destDir, "f.txt"), "utf8")).toBe("content");
  });

  test("other lease failures still fail the restore", async () => {
    vi.mocked(acquireLease).mockRejectedValue(fsError("ENOSPC"));

    const outcome = await restoreArchive(archivePath, destDir);

    expect(outcome.status).toBe("failed");
    expect(outcome.error).toEqual({ kind: "IOError", message: "ENOSPC: cannot create lease" });
    expect((await readdir(tempDir)).includes("dest")).toBe(false);
  });
});
