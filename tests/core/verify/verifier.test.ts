import { mkdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { gzipSync } from "node:zlib";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { verifyArchive } from "../../../src/core/verify/verifier";
import { writeSidecar } from "../../../src/storage/sidecar";
import { computeStringHash } from "../../../src/utils/crypto";
import { buildTar, dir, file } from "../../helpers/tar";
import { makeTempDir, removeTempDir } from "../../helpers/temp";

describe("verifyArchive", () => {
  let tempDir: string;
  let archivePath: string;
  let archiveBytes: Buffer;

  beforeEach(async () => {
    tempDir = await makeTempDir("verify");
    archivePath = path.join(tempDir, "www_testhost_20240315_020000.tar.gz");
    archiveBytes = gzipSync(
      buildTar([dir("www"), file("www/index.html", "<h1>hello</h1>"), file("www/data.bin", "d".repeat(4000))]),
    );
    await writeFile(archivePath, archiveBytes);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  test("accepts an intact archive with a matching sidecar", async () => {
    const checksum = computeStringHash(archiveBytes);
    await writeSidecar(archivePath, checksum);

    const result = await verifyArchive(archivePath);

    expect(result).toMatchObject({
      archivePath,
      isValid: true,
      checksumOk: true,
      extractable: true,
      expectedChecksum: checksum,
      actualChecksum: checksum,
      checksumSource: "sidecar",
      entriesCount: 3,
      sizeBytes: archiveBytes.length,
      errors: [],
    });
  });

  test("detects a flipped byte", async () => {
    await writeSidecar(archivePath, computeStringHash(archiveBytes));
    const damaged = Buffer.from(archiveBytes);
    const middle = Math.floor(damaged.length / 2);
    damaged[middle] = (damaged[middle] ?? 0) ^ 0xff;
    await writeFile(archivePath, damaged);

    const result = await verifyArchive(archivePath);

    expect(result.isValid).toBe(false);
    expect(result.checksumOk).toBe(false);
    expect(result.errors[0]).toBe(
      `Checksum mismatch (sidecar): expected ${computeStringHash(archiveBytes)}, got ${computeStringHash(damaged)}`,
    );
  });

  test("reports a truncated archive as not extractable", async () => {
    await writeSidecar(archivePath, computeStringHash(archiveBytes));
    await writeFile(archivePath, archiveBytes.subarray(0, Math.floor(archiveBytes.length / 2)));

    const result = await verifyArchive(archivePath);

    expect(result.extractable).toBe(false);
    expect(result.isValid).toBe(false);
    expect(result.errors.some((e) => e.startsWith("Archive is not extractable: "))).toBe(true);
  });

  test("reports a tar missing its end marker", async () => {
    const tarPath = path.join(tempDir, "www_testhost_20240316_020000.tar");
    const tar = buildTar([file("a.txt", "a")], { endMarker: false });
    await writeFile(tarPath, tar);

    const result = await verifyArchive(tarPath, { expectedChecksum: computeStringHash(tar) });

    expect(result.checksumOk).toBe(true);
    expect(result.extractable).toBe(false);
    expect(result.errors).toEqual(["Archive is not extractable: Missing end-of-archive marker"]);
  });

  test("uses a supplied digest when there is no sidecar", async () => {
    const result = await verifyArchive(archivePath, {
      expectedChecksum: computeStringHash(archiveBytes).toUpperCase(),
    });

    expect(result.isValid).toBe(true);
    expect(result.checksumSource).toBe("caller");
  });

  test("prefers the sidecar over a supplied digest", async () => {
    await writeSidecar(archivePath, computeStringHash(archiveBytes));

    const result = await verifyArchive(archivePath, { expectedChecksum: "f".repeat(64) });

    expect(result.isValid).toBe(true);
    expect(result.checksumSource).toBe("sidecar");
  });

  test("fails the checksum check when no digest is available", async () => {
    const result = await verifyArchive(archivePath);

    expect(result.checksumOk).toBe(false);
    expect(result.extractable).toBe(true);
    expect(result.isValid).toBe(false);
    expect(result.actualChecksum).toBe(computeStringHash(archiveBytes));
    expect(result.errors).toEqual(["No checksum available: no sidecar file and no expected digest supplied"]);
  });

  test("rejects a supplied value that is not a digest", async () => {
    const result = await verifyArchive(archivePath, { expectedChecksum: "abc" });

    expect(result.checksumOk).toBe(false);
    expect(result.errors).toEqual(["Supplied checksum is not a SHA-256 hex digest: abc"]);
  });

  test("reports a malformed sidecar", async () => {
    await writeFile(`${archivePath}.sha256`, "not a checksum\n");

    const result = await verifyArchive(archivePath);

    expect(result.isValid).toBe(false);
    expect(result.errors[0]).toBe(`Malformed checksum file: ${archivePath}.sha256`);
  });

  test("reports a missing archive", async () => {
    const missing = path.join(tempDir, "gone.tar.gz");

    const result = await verifyArchive(missing);

    expect(result.isValid).toBe(false);
    expect(result.errors).toEqual([`Archive not found: ${missing}`]);
  });

  test("rejects a directory", async () => {
    const folder = path.join(tempDir, "folder");
    await mkdir(folder);

    const result = await verifyArchive(folder);
    expect(result.errors).toEqual([`Not a regular file: ${folder}`]);
  });

  test("never modifies the archive or sidecar", async () => {
    await writeSidecar(archivePath, "0".repeat(64));
    const sidecarBefore = await readFile(`${archivePath}.sha256`, "utf8");

    await verifyArchive(archivePath);

    expect(await readFile(archivePath)).toEqual(archiveBytes);
    expect(await readFile(`${archivePath}.sha256`, "utf8")).toBe(sidecarBefore);
  });
});
