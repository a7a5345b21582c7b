/**
 * Archive restore
 *
 * Restores run in three phases. Planning reads every header and decides,
 * entry by entry, where it would land; unsafe entries fail a strict restore
 * before anything is written. Extraction writes accepted entries into a
 * staging directory inside the destination. Commit moves them into place,
 * creating links last, and undoes everything it did if a step fails.
 */

import { createWriteStream, type Stats } from "node:fs";
import { chmod, link, lstat, mkdir, mkdtemp, rename, rm, symlink, utimes } from "node:fs/promises";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { acquireLease, type MarkerHandle } from "../../storage/locks";
import type { RestoreOutcome, SkippedEntry } from "../../types";
import {
  describeError,
  errorMessage,
  hasErrorCode,
  IOError,
  SecurityError,
  throwIfAborted,
} from "../../utils/errors";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { isPathWithinDir } from "../../utils/path";
import { listArchive, readArchive, type TarEntry } from "../archive";

export interface RestoreOptions {
  /** Replace existing files instead of failing */
  overwrite?: boolean;
  /** Skip unsafe entries instead of failing the whole restore */
  bestEffort?: boolean;
  signal?: AbortSignal;
}

const READ_ONLY_CODES = ["EROFS", "EACCES", "EPERM"];

interface PlannedEntry {
  entry: TarEntry;
  /** Normalized forward-slash path relative to the destination */
  relativePath: string;
  target: string;
  /** Hard links: final path of the file linked to */
  linkTarget?: string;
}

/** A null reason marks an entry that is dropped without being reported */
type EntryCheck =
  | { ok: true; planned: PlannedEntry }
  | { ok: false; reason: string; unsafe: boolean }
  | { ok: false; reason: null; unsafe: false };

interface RestorePlan {
  /** Aligned with archive order; null for entries that are not restored */
  slots: Array<PlannedEntry | null>;
  /** Last occurrence of each path, in archive order */
  accepted: PlannedEntry[];
  skipped: SkippedEntry[];
  rejected: SkippedEntry[];
}

function toNativePath(root: string, relativePath: string): string {
  return path.join(root, ...relativePath.split("/"));
}

function isAbsoluteEntryPath(entryPath: string): boolean {
  return entryPath.startsWith("/") || entryPath.startsWith("\\") || /^[A-Za-z]:/.test(entryPath);
}

async function lstatOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await lstat(filePath);
  } catch (err) {
    if (hasErrorCode(err, "ENOENT") || hasErrorCode(err, "ENOTDIR")) return null;
    throw err;
  }
}

/**
 * Decide where one entry would land. Rejects entry paths that would resolve
 * outside `root`, including through a symbolic link. Symbolic links
 * themselves are restored as archived, whatever they point at; nothing is
 * ever written through one.
 */
export function checkEntry(
  entry: TarEntry,
  root: string,
  archivedSymlinks: ReadonlySet<string>,
): EntryCheck {
  if (entry.type === "other") {
    return { ok: false, reason: `unsupported entry type '${entry.typeflag}'`, unsafe: false };
  }
  if (entry.path === "") {
    return { ok: false, reason: "empty entry name", unsafe: false };
  }
  if (isAbsoluteEntryPath(entry.path)) {
    return { ok: false, reason: "absolute path", unsafe: true };
  }

  const relativePath = path.posix.normalize(entry.path.replace(/\\/g, "/"));
  const target = toNativePath(root, relativePath);
  if (target === root && entry.type === "directory") {
    return { ok: false, reason: null, unsafe: false };
  }
  if (target === root) {
    return { ok: false, reason: "path resolves to the destination itself", unsafe: true };
  }
  if (!isPathWithinDir(target, root)) {
    return { ok: false, reason: "path resolves outside the destination", unsafe: true };
  }

  const segments = relativePath.split("/");
  for (let i = 1; i < segments.length; i++) {
    if (archivedSymlinks.has(segments.slice(0, i).join("/"))) {
      return { ok: false, reason: "path passes through a symbolic link", unsafe: true };
    }
  }

  const planned: PlannedEntry = { entry, relativePath, target };

  if (entry.type === "symlink" && entry.linkpath === "") {
    return { ok: false, reason: "symbolic link without a target", unsafe: false };
  }

  if (entry.type === "hardlink") {
    if (isAbsoluteEntryPath(entry.linkpath)) {
      return { ok: false, reason: `link target "${entry.linkpath}" is absolute`, unsafe: true };
    }
    const linkTarget = toNativePath(root, path.posix.normalize(entry.linkpath));
    if (!isPathWithinDir(linkTarget, root) || linkTarget === root) {
      return { ok: false, reason: `link target "${entry.linkpath}" escapes the destination`, unsafe: true };
    }
    planned.linkTarget = linkTarget;
  }

  return { ok: true, planned };
}

async function hasSymlinkAncestor(target: string, root: string, cache: Map<string, boolean>): Promise<boolean> {
  for (let dir = path.dirname(target); dir !== root && isPathWithinDir(dir, root); dir = path.dirname(dir)) {
    let isLink = cache.get(dir);
    if (isLink === undefined) {
      isLink = (await lstatOrNull(dir))?.isSymbolicLink() ?? false;
      cache.set(dir, isLink);
    }
    if (isLink) return true;
  }
  return false;
}

async function planRestore(entries: TarEntry[], root: string): Promise<RestorePlan> {
  const plan: RestorePlan = { slots: [], accepted: [], skipped: [], rejected: [] };
  const archivedSymlinks = new Set<string>();
  const lastIndex = new Map<string, number>();
  const ancestorCache = new Map<string, boolean>();
  const restorable = new Set<string>();

  for (const entry of entries) {
    let check = checkEntry(entry, root, archivedSymlinks);

    if (check.ok && (await hasSymlinkAncestor(check.planned.target, root, ancestorCache))) {
      check = { ok: false, reason: "parent directory in the destination is a symbolic link", unsafe: true };
    }
    if (check.ok && check.planned.linkTarget !== undefined) {
      const linkRelative = path.posix.normalize(entry.linkpath);
      if (!restorable.has(linkRelative)) {
        check = { ok: false, reason: `link target "${entry.linkpath}" is not restored`, unsafe: false };
      }
    }

    if (!check.ok) {
      if (check.reason !== null) {
        (check.unsafe ? plan.rejected : plan.skipped).push({ path: entry.path, reason: check.reason });
      }
      plan.slots.push(null);
      continue;
    }

    const { planned } = check;
    if (entry.type === "symlink") archivedSymlinks.add(planned.relativePath);
    if (entry.type === "file") restorable.add(planned.relativePath);
    lastIndex.set(planned.relativePath, plan.slots.length);
    plan.slots.push(planned);
  }

  plan.accepted = plan.slots.filter(
    (slot, index): slot is PlannedEntry => slot !== null && lastIndex.get(slot.relativePath) === index,
  );
  return plan;
}

async function checkExistingTargets(accepted: PlannedEntry[], overwrite: boolean): Promise<void> {
  const conflicts: string[] = [];

  for (const planned of accepted) {
    const existing = await lstatOrNull(planned.target);
    if (!existing) continue;

    if (planned.entry.type === "directory") {
      if (!existing.isDirectory()) {
        throw new IOError(`Cannot restore directory over existing file: ${planned.target}`);
      }
    } else if (existing.isDirectory()) {
      throw new IOError(`Cannot restore ${planned.entry.type} over existing directory: ${planned.target}`);
    } else if (!overwrite) {
      conflicts.push(planned.target);
    }
  }

  if (conflicts.length > 0) {
    const listed = conflicts.slice(0, 5).join(", ");
    const more = conflicts.length > 5 ? ` and ${conflicts.length - 5} more` : "";
    throw new IOError(`Refusing to overwrite existing files: ${listed}${more}`);
  }
}

/**
 * mkdir -p that reports which directories it created, outermost first.
 */
async function createMissingDirectories(dir: string): Promise<string[]> {
  const missing: string[] = [];
  let current = dir;
  while (!(await lstatOrNull(current))) {
    missing.unshift(current);
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  for (const missingDir of missing) {
    await mkdir(missingDir);
  }
  return missing;
}

/**
 * Tracks every change made to the destination so a failed commit can be undone.
 */
class RestoreTransaction {
  private readonly created: string[] = [];
  private readonly replaced: Array<{ original: string; backup: string }> = [];
  private replacedCount = 0;

  constructor(
    private readonly replacedDir: string,
    private readonly signal: AbortSignal | undefined,
  ) {}

  async ensureDirectory(dir: string): Promise<void> {
    this.created.push(...(await createMissingDirectories(dir)));
  }

  private async setAside(target: string): Promise<void> {
    if (!(await lstatOrNull(target))) return;
    await mkdir(this.replacedDir, { recursive: true });
    const backup = path.join(this.replacedDir, String(this.replacedCount++));
    await rename(target, backup);
    this.replaced.push({ original: target, backup });
  }

  async place(planned: PlannedEntry, stagedPath: string): Promise<void> {
    throwIfAborted(this.signal);
    const { entry, target } = planned;

    if (entry.type === "directory") {
      await this.ensureDirectory(target);
      return;
    }

    await this.ensureDirectory(path.dirname(target));
    await this.setAside(target);

    if (entry.type === "file") {
      await rename(stagedPath, target);
      this.created.push(target);
      await utimes(target, entry.mtime, entry.mtime);
    } else if (entry.type === "hardlink" && planned.linkTarget !== undefined) {
      await link(planned.linkTarget, target);
      this.created.push(target);
    } else if (entry.type === "symlink") {
      await symlink(entry.linkpath, target);
      this.created.push(target);
    }
  }

  async rollback(): Promise<void> {
    for (const created of [...this.created].reverse()) {
      try {
        await rm(created, { recursive: true, force: true });
      } catch (err) {
        logger.error(`Rollback could not remove ${created}: ${errorMessage(err)}`);
      }
    }
    for (const { original, backup } of [...this.replaced].reverse()) {
      try {
        await rename(backup, original);
      } catch (err) {
        logger.error(`Rollback could not restore ${original}: ${errorMessage(err)}`);
      }
    }
  }
}

function commitOrder(planned: PlannedEntry): number {
  switch (planned.entry.type) {
    case "directory":
      return 0;
    case "file":
      return 1;
    case "hardlink":
      return 2;
    default:
      return 3;
  }
}

async function extractToStaging(
  archivePath: string,
  plan: RestorePlan,
  stagingRoot: string,
  signal: AbortSignal | undefined,
): Promise<void> {
  let index = 0;
  await readArchive(
    archivePath,
    async (entry, body) => {
      const planned = plan.slots[index++];
      if (!planned || planned.entry.path !== entry.path) return;

      const stagedPath = toNativePath(stagingRoot, planned.relativePath);
      logger.debug(`Extracting ${planned.relativePath}`);
      if (entry.type === "directory") {
        await mkdir(stagedPath, { recursive: true });
      } else if (entry.type === "file") {
        await mkdir(path.dirname(stagedPath), { recursive: true });
        await pipeline(
          Readable.from(body),
          createWriteStream(stagedPath, { mode: entry.mode || 0o644 }),
          { signal },
        );
      }
    },
    { signal },
  );
}

/**
 * Lease the archive for the duration of the restore. On a read-only backup
 * mount no lease can be written, and cleanup cannot delete from there either.
 */
async function leaseArchive(archivePath: string): Promise<MarkerHandle | null> {
  try {
    return await acquireLease(archivePath);
  } catch (err) {
    if (READ_ONLY_CODES.some((code) => hasErrorCode(err, code))) {
      logger.warn(`Could not lease ${archivePath}, restoring without a lease: ${errorMessage(err)}`);
      return null;
    }
    throw err;
  }
}

/**
 * Extract an archive into `destination`. Failures are reported in the
 * outcome; a failed restore leaves the destination as it was.
 */
export async function restoreArchive(
  archivePath: string,
  destination: string,
  options: RestoreOptions = {},
): Promise<RestoreOutcome> {
  const startTime = Date.now();
  const { signal } = options;
  const source = path.resolve(archivePath);
  const root = path.resolve(destination);

  const outcome: RestoreOutcome = {
    archivePath: source,
    destination: root,
    status: "failed",
    entriesWritten: 0,
    bytesWritten: 0,
    skipped: [],
    error: null,
    durationMs: 0,
  };

  logger.info(`Restoring ${path.basename(source)} to ${root}`);

  try {
    throwIfAborted(signal);
    const lease = await leaseArchive(source);
    try {
      const plan = await planRestore(await listArchive(source, { signal }), root);

      if (plan.rejected.length > 0 && !options.bestEffort) {
        throw new SecurityError(
          `Archive contains ${plan.rejected.length} unsafe entr${plan.rejected.length === 1 ? "y" : "ies"}: ${plan.rejected
            .map((r) => `${r.path} (${r.reason})`)
            .join(", ")}`,
          plan.rejected.map((r) => r.path),
        );
      }
      outcome.skipped = [...plan.rejected, ...plan.skipped];
      for (const skipped of outcome.skipped) {
        logger.warn(`Skipping ${skipped.path}: ${skipped.reason}`);
      }

      await checkExistingTargets(plan.accepted, options.overwrite ?? false);

      const createdRoot = await createMissingDirectories(root);

      let stagingDir: string | null = null;
      try {
        stagingDir = await mkdtemp(path.join(root, ".restore-"));
        logger.debug(`Staging in ${stagingDir}`);
        const stagingRoot = path.join(stagingDir, "tree");
        const commit = new RestoreTransaction(path.join(stagingDir, "replaced"), signal);

        await mkdir(stagingRoot);
        await extractToStaging(source, plan, stagingRoot, signal);

        const ordered = [...plan.accepted].sort((a, b) => commitOrder(a) - commitOrder(b));
        try {
          for (const planned of ordered) {
            await commit.place(planned, toNativePath(stagingRoot, planned.relativePath));
            outcome.entriesWritten++;
            if (planned.entry.type === "file") {
              outcome.bytesWritten += planned.entry.size;
            }
          }
          for (const planned of ordered) {
            if (planned.entry.type === "directory" && planned.entry.mode > 0) {
              await chmod(planned.target, planned.entry.mode);
            }
          }
        } catch (err) {
          outcome.entriesWritten = 0;
          outcome.bytesWritten = 0;
          await commit.rollback();
          throw err;
        }
      } catch (err) {
        // the staging directory lives inside the root, so remove it first
        if (stagingDir) {
          await rm(stagingDir, { recursive: true, force: true });
          stagingDir = null;
        }
        for (const dir of createdRoot.reverse()) {
          await rm(dir, { recursive: true, force: true });
        }
        throw err;
      } finally {
        if (stagingDir) {
          await rm(stagingDir, { recursive: true, force: true });
        }
      }
    } finally {
      await lease?.release();
    }

    outcome.status = "succeeded";
    logger.info(
      `Restored ${outcome.entriesWritten} entries (${formatBytes(outcome.bytesWritten)}) in ${formatDuration(Date.now() - startTime)}`,
    );
  } catch (err) {
    outcome.error = describeError(err);
    logger.error(`Restore of ${path.basename(source)} failed: ${outcome.error.kind}: ${outcome.error.message}`);
  }

  outcome.durationMs = Date.now() - startTime;
  return outcome;
}
