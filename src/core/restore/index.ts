/**
 * Restore module exports
 */

export type { RestoreOptions } from "./restorer";
export { checkEntry, restoreArchive } from "./restorer";
