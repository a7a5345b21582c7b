import * as path from "node:path";
import { describe, expect, test } from "vitest";
import { isPathWithinDir, toPosixPath } from "../../src/utils/path";

describe("path utilities", () => {
  describe("isPathWithinDir", () => {
    test("accepts the directory itself and its descendants", () => {
      expect(isPathWithinDir("/backups", "/backups")).toBe(true);
      expect(isPathWithinDir("/backups/www/a.tar.gz", "/backups")).toBe(true);
    });

    test("rejects traversal and sibling prefixes", () => {
      expect(isPathWithinDir("/backups/../etc/passwd", "/backups")).toBe(false);
      expect(isPathWithinDir("/backups-old/a.tar.gz", "/backups")).toBe(false);
    });
  });

  test("toPosixPath joins segments with forward slashes", () => {
    expect(toPosixPath(["a", "b", "c.txt"].join(path.sep))).toBe("a/b/c.txt");
  });
});
