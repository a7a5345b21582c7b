/**
 * Local filesystem primitives for the destination directory
 */

import { access, mkdir, open, rename, unlink } from "node:fs/promises";
import * as path from "node:path";
import { errorMessage, hasErrorCode } from "../utils/errors";
import { logger } from "../utils/logger";

export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return false;
    throw err;
  }
}

/**
 * Hidden per-process temp name beside the final file.
 */
export function getTempPath(finalPath: string): string {
  return path.join(path.dirname(finalPath), `.${path.basename(finalPath)}.${process.pid}.tmp`);
}

/**
 * Unlink a file, treating an already-missing file as success.
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) return false;
    throw err;
  }
}

/**
 * Write a file via temp-then-rename so readers see either the old content
 * or the complete new content.
 */
export async function writeFileAtomic(filePath: string, content: string | Buffer): Promise<void> {
  const tempPath = getTempPath(filePath);
  const handle = await open(tempPath, "wx");
  try {
    await handle.writeFile(content);
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await rename(tempPath, filePath);
  } catch (err) {
    await removeIfExists(tempPath);
    throw err;
  }
}

interface StagedFile {
  original: string;
  staged: string;
}

async function restoreStaged(staged: StagedFile[]): Promise<void> {
  for (const file of staged.reverse()) {
    try {
      await rename(file.staged, file.original);
    } catch (err) {
      logger.error(`Could not restore ${file.original} from ${file.staged}: ${errorMessage(err)}`);
    }
  }
}

/**
 * Remove a set of files together with a bookkeeping step.
 *
 * Each existing file is renamed aside first, then `commit` runs. If renaming or
 * `commit` fails, the files are renamed back and the error is rethrown. Once
 * `commit` has succeeded the renamed files are unlinked.
 */
export async function removeFilesAsUnit(
  filePaths: string[],
  commit: () => void | Promise<void>,
): Promise<void> {
  const staged: StagedFile[] = [];

  try {
    for (const original of filePaths) {
      const stagedPath = path.join(
        path.dirname(original),
        `.${path.basename(original)}.${process.pid}.deleting`,
      );
      try {
        await rename(original, stagedPath);
      } catch (err) {
        if (hasErrorCode(err, "ENOENT")) {
          logger.warn(`File already missing, skipping: ${original}`);
          continue;
        }
        throw err;
      }
      staged.push({ original, staged: stagedPath });
    }

    await commit();
  } catch (err) {
    await restoreStaged(staged);
    throw err;
  }

  for (const file of staged) {
    await removeIfExists(file.staged);
    logger.debug(`Deleted local file: ${file.original}`);
  }
}
