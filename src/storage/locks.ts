/**
 * Pid-stamped marker files: the per-configuration run lock and archive leases
 */

import { link, readdir, readFile, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { generateShortId } from "../utils/crypto";
import { hasErrorCode, IOError } from "../utils/errors";
import { logger } from "../utils/logger";
import { removeIfExists } from "./local";

const LEASE_EXTENSION = ".lease";

export interface MarkerHandle {
  path: string;
  release(): Promise<void>;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return hasErrorCode(err, "EPERM");
  }
}

async function readMarkerPid(markerPath: string): Promise<number | null> {
  try {
    const pid = Number.parseInt((await readFile(markerPath, "utf8")).trim(), 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return null;
    throw err;
  }
}

/**
 * The pid is written to a private file first and hard-linked into place, so
 * a marker is never visible without its pid. link() fails with EEXIST when
 * the marker is already taken.
 */
async function createMarker(markerPath: string): Promise<MarkerHandle> {
  const pendingPath = `${markerPath}.${process.pid}.${generateShortId()}.tmp`;
  await writeFile(pendingPath, `${process.pid}\n`, { flag: "wx" });
  try {
    await link(pendingPath, markerPath);
  } finally {
    await removeIfExists(pendingPath);
  }

  let released = false;
  return {
    path: markerPath,
    async release() {
      if (released) return;
      released = true;
      await removeIfExists(markerPath);
    },
  };
}

export function getLockPath(destinationDir: string, configName: string): string {
  return path.join(destinationDir, `.${configName}.lock`);
}

/**
 * Take the exclusive run lock for a configuration. A lock left behind by a
 * process that no longer exists is replaced.
 */
export async function acquireLock(destinationDir: string, configName: string): Promise<MarkerHandle> {
  const lockPath = getLockPath(destinationDir, configName);

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      return await createMarker(lockPath);
    } catch (err) {
      if (!hasErrorCode(err, "EEXIST")) throw err;
    }

    const holder = await readMarkerPid(lockPath);
    if (holder !== null && isProcessAlive(holder)) {
      throw new IOError(`Backup "${configName}" is already running (pid ${holder}, lock ${lockPath})`);
    }

    logger.warn(`Removing stale lock ${lockPath}`);
    await removeIfExists(lockPath);
  }

  throw new IOError(`Could not acquire lock ${lockPath}`);
}

function leasePrefix(archivePath: string): string {
  return `.${path.basename(archivePath)}.`;
}

/**
 * Mark an archive as in use. Cleanup leaves leased archives alone.
 */
export async function acquireLease(archivePath: string): Promise<MarkerHandle> {
  const leasePath = path.join(
    path.dirname(archivePath),
    `${leasePrefix(archivePath)}${generateShortId()}${LEASE_EXTENSION}`,
  );
  const lease = await createMarker(leasePath);
  logger.debug(`Leased ${archivePath}`);
  return lease;
}

/**
 * True when a live process holds a lease on the archive. Leases of dead
 * processes are removed along the way.
 */
export async function isArchiveLeased(archivePath: string): Promise<boolean> {
  const dir = path.dirname(archivePath);
  const prefix = leasePrefix(archivePath);

  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return false;
    throw err;
  }

  let leased = false;
  for (const name of names) {
    if (!name.startsWith(prefix) || !name.endsWith(LEASE_EXTENSION)) continue;

    const leasePath = path.join(dir, name);
    const holder = await readMarkerPid(leasePath);
    if (holder !== null && isProcessAlive(holder)) {
      leased = true;
    } else {
      logger.debug(`Removing stale lease ${leasePath}`);
      await removeIfExists(leasePath);
    }
  }
  return leased;
}
