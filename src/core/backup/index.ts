/**
 * Backup module exports
 */

export type { ArchiveResult, CreateArchiveOptions } from "./archive-creator";
export { createArchive } from "./archive-creator";
export type { CollectedEntry, CollectOptions, CollectResult } from "./file-collector";
export { collectEntries, compileExcludes, toPackEntry } from "./file-collector";
export type { HookResult, HookRunOptions } from "./hooks";
export { runHook } from "./hooks";
export type { BackupOptions } from "./orchestrator";
export { runBackup } from "./orchestrator";
