/**
 * Process exit codes, one per error kind
 */

import { describeError, type ErrorDetail } from "../utils/errors";

export const ExitCode = {
  Success: 0,
  Unexpected: 1,
  Config: 2,
  IO: 3,
  Integrity: 4,
  Security: 5,
  Hook: 6,
  Retention: 7,
  Cancelled: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeForKind(kind: ErrorDetail["kind"]): ExitCode {
  switch (kind) {
    case "ConfigError":
      return ExitCode.Config;
    case "IOError":
      return ExitCode.IO;
    case "IntegrityError":
      return ExitCode.Integrity;
    case "SecurityError":
      return ExitCode.Security;
    case "HookFailedError":
    case "HookTimeoutError":
      return ExitCode.Hook;
    case "RetentionViolation":
      return ExitCode.Retention;
    case "CancelledError":
      return ExitCode.Cancelled;
    case "UnexpectedError":
      return ExitCode.Unexpected;
  }
}

export function exitCodeForError(error: unknown): ExitCode {
  return exitCodeForKind(describeError(error).kind);
}
