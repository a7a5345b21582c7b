import { describe, expect, test } from "vitest";
import {
  CancelledError,
  ConfigError,
  describeError,
  errorMessage,
  hasErrorCode,
  HookFailedError,
  HookTimeoutError,
  IntegrityError,
  IOError,
  RetentionViolation,
  SecurityError,
  throwIfAborted,
} from "../../src/utils/errors";

function systemError(code: string, message: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(message);
  err.code = code;
  err.syscall = "open";
  return err;
}

describe("errors", () => {
  test("each error carries its kind and class name", () => {
    const cases = [
      [new ConfigError("c"), "ConfigError"],
      [new IOError("i"), "IOError"],
      [new HookFailedError("h", 2), "HookFailedError"],
      [new HookTimeoutError("t", 5), "HookTimeoutError"],
      [new IntegrityError("x"), "IntegrityError"],
      [new SecurityError("s"), "SecurityError"],
      [new RetentionViolation("r"), "RetentionViolation"],
      [new CancelledError(), "CancelledError"],
    ] as const;

    for (const [err, kind] of cases) {
      expect(err.kind).toBe(kind);
      expect(err.name).toBe(kind);
      expect(err).toBeInstanceOf(Error);
    }
  });

  test("hook and security errors keep their details", () => {
    const failed = new HookFailedError("pre-hook exited with code 3", 3, "boom");
    expect(failed.exitCode).toBe(3);
    expect(failed.stderr).toBe("boom");

    const security = new SecurityError("unsafe", ["../etc/passwd"]);
    expect(security.rejectedPaths).toEqual(["../etc/passwd"]);
  });

  describe("describeError", () => {
    test("passes through our own errors", () => {
      expect(describeError(new IntegrityError("bad sum"))).toEqual({
        kind: "IntegrityError",
        message: "bad sum",
      });
    });

    test("maps failed system calls to IOError", () => {
      expect(describeError(systemError("EACCES", "permission denied"))).toEqual({
        kind: "IOError",
        message: "permission denied",
      });
    });

    test("maps aborts to CancelledError", () => {
      const abort = new Error("The operation was aborted");
      abort.name = "AbortError";
      expect(describeError(abort).kind).toBe("CancelledError");
    });

    test("treats Node argument errors as unexpected", () => {
      const parseError: NodeJS.ErrnoException = new Error("Unknown option '--bogus'");
      parseError.code = "ERR_PARSE_ARGS_UNKNOWN_OPTION";
      expect(describeError(parseError).kind).toBe("UnexpectedError");
    });

    test("stringifies non-errors", () => {
      expect(describeError("plain")).toEqual({ kind: "UnexpectedError", message: "plain" });
    });
  });

  test("hasErrorCode checks the errno code", () => {
    expect(hasErrorCode(systemError("ENOENT", "missing"), "ENOENT")).toBe(true);
    expect(hasErrorCode(systemError("ENOENT", "missing"), "EEXIST")).toBe(false);
    expect(hasErrorCode("ENOENT", "ENOENT")).toBe(false);
  });

  test("errorMessage handles errors and other values", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage(42)).toBe("42");
  });

  test("throwIfAborted throws CancelledError once aborted", () => {
    const controller = new AbortController();
    expect(() => throwIfAborted(controller.signal)).not.toThrow();
    expect(() => throwIfAborted(undefined)).not.toThrow();
    controller.abort();
    expect(() => throwIfAborted(controller.signal)).toThrow(CancelledError);
  });
});
