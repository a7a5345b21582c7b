/**
 * Error taxonomy shared by every operation
 */

export type ErrorKind =
  | "ConfigError"
  | "IOError"
  | "HookFailedError"
  | "HookTimeoutError"
  | "IntegrityError"
  | "SecurityError"
  | "RetentionViolation"
  | "CancelledError";

export interface ErrorDetail {
  kind: ErrorKind | "UnexpectedError";
  message: string;
}

export abstract class RetainerError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or missing configuration, bad source path, duplicate or colliding names. */
export class ConfigError extends RetainerError {
  readonly kind = "ConfigError";
}

/** Disk full, permission denied, pre-existing destination file, held locks. */
export class IOError extends RetainerError {
  readonly kind = "IOError";
}

export class HookFailedError extends RetainerError {
  readonly kind = "HookFailedError";

  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stderr: string = "",
  ) {
    super(message);
  }
}

export class HookTimeoutError extends RetainerError {
  readonly kind = "HookTimeoutError";

  constructor(
    message: string,
    readonly timeoutSeconds: number,
  ) {
    super(message);
  }
}

/** Checksum mismatch or structurally corrupt archive. */
export class IntegrityError extends RetainerError {
  readonly kind = "IntegrityError";
}

/** Archive entry that would land outside the restore root. */
export class SecurityError extends RetainerError {
  readonly kind = "SecurityError";

  constructor(
    message: string,
    readonly rejectedPaths: string[] = [],
  ) {
    super(message);
  }
}

/** A requested deletion would take a configuration below its backup floor. */
export class RetentionViolation extends RetainerError {
  readonly kind = "RetentionViolation";
}

export class CancelledError extends RetainerError {
  readonly kind = "CancelledError";

  constructor(message = "Operation was cancelled") {
    super(message);
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error && typeof error.code === "string";
}

/** Errors raised by a failed system call (fs, child_process), as opposed to Node's ERR_* argument errors. */
function isSystemError(error: unknown): error is NodeJS.ErrnoException {
  return isErrnoException(error) && typeof error.syscall === "string";
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return isErrnoException(error) && error.code === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize anything thrown into a detail the caller can branch on.
 */
export function describeError(error: unknown): ErrorDetail {
  if (error instanceof RetainerError) {
    return { kind: error.kind, message: error.message };
  }
  if (isAbortError(error)) {
    return { kind: "CancelledError", message: "Operation was cancelled" };
  }
  if (isSystemError(error)) {
    return { kind: "IOError", message: error.message };
  }
  if (error instanceof Error) {
    return { kind: "UnexpectedError", message: error.message };
  }
  return { kind: "UnexpectedError", message: String(error) };
}

/** Throws CancelledError once the signal has fired. */
export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
