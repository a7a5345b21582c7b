/**
 * Centralized type exports
 */

// Operation result types
export type {
  BackupJob,
  BackupJobStatus,
  ChecksumSource,
  RestoreOutcome,
  SkippedEntry,
  VerificationResult,
} from "./backup";
// Config types
export type {
  BackupConfig,
  BackupDefinition,
  DatabaseConfig,
  HookConfig,
  RetainerConfig,
  RetentionPolicy,
  SafetyConfig,
} from "./config";
// Database types
export type {
  BackupMetadata,
  DeletionLogRecord,
  DeletionReason,
  Migration,
} from "./database";
