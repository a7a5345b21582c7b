import { describe, expect, test } from "vitest";
import { runHook } from "../../../src/core/backup/hooks";
import { CancelledError, HookFailedError, HookTimeoutError } from "../../../src/utils/errors";

describe("runHook", () => {
  test("captures output of a successful command", async () => {
    const result = await runHook("pre", { command: "echo hello; echo oops >&2", timeoutSeconds: 10 });

    expect(result.exitCode).toBe(0);
    expect(result.stdout).toBe("hello\n");
    expect(result.stderr).toBe("oops\n");
  });

  test("passes extra environment variables", async () => {
    const result = await runHook(
      "pre",
      { command: 'printf "%s" "$RETAINER_BACKUP_NAME"', timeoutSeconds: 10 },
      { env: { RETAINER_BACKUP_NAME: "www" } },
    );

    expect(result.stdout).toBe("www");
  });

  test("runs in the given working directory", async () => {
    const result = await runHook("pre", { command: "pwd", timeoutSeconds: 10 }, { cwd: "/" });
    expect(result.stdout.trim()).toBe("/");
  });

  test("rejects with HookFailedError on a non-zero exit", async () => {
    const error = await runHook("pre", { command: "echo broken >&2; exit 3", timeoutSeconds: 10 }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(HookFailedError);
    expect(error).toMatchObject({
      exitCode: 3,
      stderr: "broken\n",
      message: "pre hook failed with exit code 3: broken",
    });
  });

  test("kills the hook and rejects with HookTimeoutError when it runs too long", async () => {
    const started = Date.now();
    const error = await runHook("pre", { command: "sleep 30", timeoutSeconds: 1 }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HookTimeoutError);
    expect(error).toMatchObject({ message: "pre hook timed out after 1s", timeoutSeconds: 1 });
    expect(Date.now() - started).toBeLessThan(10_000);
  });

  test("rejects with CancelledError when aborted", async () => {
    const controller = new AbortController();
    const running = runHook("post", { command: "sleep 30", timeoutSeconds: 60 }, { signal: controller.signal });
    setTimeout(() => controller.abort(), 100);

    await expect(running).rejects.toThrow(CancelledError);
  });

  test("does not start when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      runHook("pre", { command: "echo never", timeoutSeconds: 10 }, { signal: controller.signal }),
    ).rejects.toThrow(CancelledError);
  });
});
