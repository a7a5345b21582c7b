/**
 * Utility exports
 */

// Crypto utilities
export {
  computeFileChecksum,
  computeStringHash,
  generateShortId,
  generateUUID,
  SHA256_HEX_PATTERN,
} from "./crypto";
// Errors
export {
  CancelledError,
  ConfigError,
  describeError,
  errorMessage,
  hasErrorCode,
  isAbortError,
  throwIfAborted,
  type ErrorDetail,
  type ErrorKind,
  HookFailedError,
  HookTimeoutError,
  IntegrityError,
  IOError,
  RetainerError,
  RetentionViolation,
  SecurityError,
} from "./errors";
// Formatting utilities
export { formatBytes, formatDuration } from "./format";
export type { LogLevel } from "./logger";
// Logger
export { debug, error, getLogLevel, info, logger, setLogLevel, warn } from "./logger";
export type { ArchiveNameOptions, ParsedArchiveName } from "./naming";
// Naming utilities
export {
  ARCHIVE_NAME_PATTERN,
  generateArchiveName,
  getHostIdentifier,
  getSidecarName,
  isValidArchiveName,
  isValidConfigName,
  parseArchiveName,
} from "./naming";
// Path utilities
export { isPathWithinDir, toPosixPath } from "./path";
