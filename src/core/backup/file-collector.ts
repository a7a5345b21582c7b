/**
 * File collection for backup archives
 */

import { createReadStream, type Stats } from "node:fs";
import { lstat, readdir, readlink } from "node:fs/promises";
import * as path from "node:path";
import { Minimatch } from "minimatch";
import { hasErrorCode, throwIfAborted } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { PackEntry } from "../archive";

export interface CollectedEntry {
  absolutePath: string;
  /** Forward-slash path inside the archive, rooted at the source directory's basename */
  archivePath: string;
  type: "file" | "directory" | "symlink";
  size: number;
  mode: number;
  mtime: Date;
  linkpath?: string;
}

export interface CollectResult {
  entries: CollectedEntry[];
  filesCount: number;
  totalBytes: number;
  /** Sockets, fifos and devices, which archives do not carry */
  skipped: string[];
}

export interface CollectOptions {
  exclude?: string[];
  /** Absolute paths left out along with their subtrees */
  skipPaths?: string[];
  signal?: AbortSignal;
}

/**
 * Build a matcher for exclude patterns. A pattern without a slash matches the
 * basename of any path component; one with a slash matches the path relative
 * to the source root.
 */
export function compileExcludes(patterns: string[]): (relativePath: string) => boolean {
  const matchers = patterns
    .map((pattern) => pattern.trim().replace(/\/+$/, ""))
    .filter((pattern) => pattern.length > 0)
    .map((pattern) => new Minimatch(pattern, { dot: true, matchBase: true }));

  return (relativePath) => matchers.some((matcher) => matcher.match(relativePath));
}

export async function collectEntries(
  sourceDir: string,
  options: CollectOptions = {},
): Promise<CollectResult> {
  const root = path.resolve(sourceDir);
  const isExcluded = compileExcludes(options.exclude ?? []);
  const skipPaths = new Set((options.skipPaths ?? []).map((p) => path.resolve(p)));
  const rootName = path.basename(root);

  const result: CollectResult = { entries: [], filesCount: 0, totalBytes: 0, skipped: [] };

  const rootStats = await lstat(root);
  result.entries.push({
    absolutePath: root,
    archivePath: rootName,
    type: "directory",
    size: 0,
    mode: rootStats.mode,
    mtime: rootStats.mtime,
  });

  async function walk(absoluteDir: string, relativeDir: string): Promise<void> {
    throwIfAborted(options.signal);

    const names = (await readdir(absoluteDir)).sort();
    for (const name of names) {
      const relativePath = relativeDir ? `${relativeDir}/${name}` : name;
      const absolutePath = path.join(absoluteDir, name);

      if (isExcluded(relativePath)) {
        logger.debug(`Excluded: ${relativePath}`);
        continue;
      }
      if (skipPaths.has(absolutePath)) {
        logger.debug(`Skipping destination inside source: ${absolutePath}`);
        continue;
      }

      let stats: Stats;
      try {
        stats = await lstat(absolutePath);
      } catch (err) {
        if (hasErrorCode(err, "ENOENT")) {
          logger.warn(`File vanished during collection: ${absolutePath}`);
          continue;
        }
        throw err;
      }

      const archivePath = `${rootName}/${relativePath}`;
      const base = { absolutePath, archivePath, mode: stats.mode, mtime: stats.mtime };

      if (stats.isDirectory()) {
        result.entries.push({ ...base, type: "directory", size: 0 });
        await walk(absolutePath, relativePath);
      } else if (stats.isFile()) {
        result.entries.push({ ...base, type: "file", size: stats.size });
        result.filesCount++;
        result.totalBytes += stats.size;
      } else if (stats.isSymbolicLink()) {
        result.entries.push({ ...base, type: "symlink", size: 0, linkpath: await readlink(absolutePath) });
      } else {
        logger.debug(`Skipping special file: ${absolutePath}`);
        result.skipped.push(relativePath);
      }
    }
  }

  await walk(root, "");
  logger.debug(`Collected ${result.entries.length} entries (${result.filesCount} files) from ${root}`);

  return result;
}

/**
 * Archive entry whose content is read lazily. The whole file is read, so a
 * file that grew since collection fails the pack instead of being cut short.
 */
export function toPackEntry(entry: CollectedEntry, signal?: AbortSignal): PackEntry {
  return {
    path: entry.archivePath,
    type: entry.type,
    mode: entry.mode,
    mtime: entry.mtime,
    size: entry.size,
    linkpath: entry.linkpath,
    open: () => createReadStream(entry.absolutePath, { signal }),
  };
}
