/**
 * Storage module exports
 */

export {
  ensureDir,
  fileExists,
  getTempPath,
  removeFilesAsUnit,
  removeIfExists,
  writeFileAtomic,
} from "./local";
export type { MarkerHandle } from "./locks";
export {
  acquireLease,
  acquireLock,
  getLockPath,
  isArchiveLeased,
  isProcessAlive,
} from "./locks";
export type { SidecarContent } from "./sidecar";
export { formatSidecar, getSidecarPath, parseSidecar, readSidecar, writeSidecar } from "./sidecar";
