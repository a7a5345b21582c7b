/**
 * Operation result type definitions
 */

import type { ErrorDetail } from "../utils/errors";

export type BackupJobStatus = "pending" | "running" | "succeeded" | "failed";

export interface BackupJob {
  id: string;
  configName: string;
  status: BackupJobStatus;
  startedAt: string;
  finishedAt: string | null;
  archivePath: string | null;
  sizeBytes: number;
  filesCount: number;
  checksum: string | null;
  error: ErrorDetail | null;
  /** Problems that did not fail the job, such as a post-hook error */
  warnings: string[];
}

export type ChecksumSource = "sidecar" | "caller";

export interface VerificationResult {
  archivePath: string;
  isValid: boolean;
  checksumOk: boolean;
  extractable: boolean;
  expectedChecksum: string | null;
  actualChecksum: string | null;
  checksumSource: ChecksumSource | null;
  entriesCount: number;
  sizeBytes: number;
  verifiedAt: string;
  errors: string[];
}

export interface SkippedEntry {
  path: string;
  reason: string;
}

export interface RestoreOutcome {
  archivePath: string;
  destination: string;
  status: "succeeded" | "failed";
  entriesWritten: number;
  bytesWritten: number;
  skipped: SkippedEntry[];
  error: ErrorDetail | null;
  durationMs: number;
}
