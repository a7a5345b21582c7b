/**
 * Core module exports
 */

export { listBackups } from "../db";

// Archive codec
export { listArchive, readArchive, type TarEntry } from "./archive";

// Backup
export {
  type ArchiveResult,
  type BackupOptions,
  collectEntries,
  createArchive,
  runBackup,
  runHook,
} from "./backup";

// Cleanup
export {
  type CleanupDeletion,
  type CleanupOptions,
  type CleanupResult,
  planRetention,
  type RemoveOptions,
  type RetentionDecision,
  type RetentionPlan,
  removeBackup,
  runCleanup,
  type ValidationResult,
  validateDeletionCandidate,
} from "./cleanup";

// Restore
export { type RestoreOptions, restoreArchive } from "./restore";

// Verify
export { type VerifyOptions, verifyArchive } from "./verify";
