/**
 * Cleanup module exports
 */

export type { CleanupDeletion, CleanupOptions, CleanupResult, RemoveOptions } from "./orchestrator";
export { removeBackup, runCleanup } from "./orchestrator";
export type { KeepReason, RetentionDecision, RetentionPlan, RetentionTier } from "./retention";
export { bucketKey, isoWeekKey, planRetention, sortNewestFirst } from "./retention";
export type { ValidationOptions, ValidationResult } from "./validator";
export { getArchivePath, validateDeletionCandidate } from "./validator";
