/**
 * Archive verification
 *
 * Read-only: neither the archive nor its sidecar is ever modified, whatever
 * the outcome. Problems are reported in the result, not thrown.
 */

import { stat } from "node:fs/promises";
import * as path from "node:path";
import { readSidecar } from "../../storage/sidecar";
import type { ChecksumSource, VerificationResult } from "../../types";
import { computeFileChecksum, SHA256_HEX_PATTERN } from "../../utils/crypto";
import { describeError, hasErrorCode } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { readArchive } from "../archive";

export interface VerifyOptions {
  /** Digest to compare against when the archive has no sidecar file */
  expectedChecksum?: string;
  signal?: AbortSignal;
}

interface ExpectedChecksum {
  checksum: string;
  source: ChecksumSource;
}

async function resolveExpectedChecksum(
  archivePath: string,
  supplied: string | undefined,
  errors: string[],
): Promise<ExpectedChecksum | null> {
  try {
    const sidecar = await readSidecar(archivePath);
    if (sidecar) {
      if (sidecar.filename !== path.basename(archivePath)) {
        logger.warn(`Checksum file for ${archivePath} names "${sidecar.filename}"`);
      }
      return { checksum: sidecar.checksum, source: "sidecar" };
    }
  } catch (err) {
    errors.push(describeError(err).message);
  }

  if (supplied !== undefined) {
    const normalized = supplied.trim().toLowerCase();
    if (!SHA256_HEX_PATTERN.test(normalized)) {
      errors.push(`Supplied checksum is not a SHA-256 hex digest: ${supplied}`);
      return null;
    }
    return { checksum: normalized, source: "caller" };
  }

  errors.push("No checksum available: no sidecar file and no expected digest supplied");
  return null;
}

export async function verifyArchive(
  archivePath: string,
  options: VerifyOptions = {},
): Promise<VerificationResult> {
  const resolved = path.resolve(archivePath);
  const result: VerificationResult = {
    archivePath: resolved,
    isValid: false,
    checksumOk: false,
    extractable: false,
    expectedChecksum: null,
    actualChecksum: null,
    checksumSource: null,
    entriesCount: 0,
    sizeBytes: 0,
    verifiedAt: new Date().toISOString(),
    errors: [],
  };

  try {
    const stats = await stat(resolved);
    if (!stats.isFile()) {
      result.errors.push(`Not a regular file: ${resolved}`);
      return result;
    }
    result.sizeBytes = stats.size;
  } catch (err) {
    result.errors.push(
      hasErrorCode(err, "ENOENT") ? `Archive not found: ${resolved}` : describeError(err).message,
    );
    return result;
  }

  logger.debug(`Verifying ${resolved}`);

  const expected = await resolveExpectedChecksum(resolved, options.expectedChecksum, result.errors);
  if (expected) {
    result.expectedChecksum = expected.checksum;
    result.checksumSource = expected.source;
  }

  try {
    result.actualChecksum = await computeFileChecksum(resolved, options.signal);
    if (expected) {
      result.checksumOk = result.actualChecksum === expected.checksum;
      if (!result.checksumOk) {
        result.errors.push(
          `Checksum mismatch (${expected.source}): expected ${expected.checksum}, got ${result.actualChecksum}`,
        );
      }
    }
  } catch (err) {
    result.errors.push(`Could not compute checksum: ${describeError(err).message}`);
  }

  try {
    const summary = await readArchive(resolved, () => {}, { signal: options.signal });
    result.extractable = true;
    result.entriesCount = summary.entries;
  } catch (err) {
    const detail = describeError(err);
    result.errors.push(`Archive is not extractable: ${detail.message}`);
  }

  result.isValid = result.checksumOk && result.extractable;
  if (result.isValid) {
    logger.info(`Verified ${path.basename(resolved)}: ${result.entriesCount} entries`);
  } else {
    logger.warn(`Verification failed for ${path.basename(resolved)}: ${result.errors.join("; ")}`);
  }

  return result;
}
