/**
 * Pre/post backup hook execution
 */

import { spawn } from "node:child_process";
import type { HookConfig } from "../../types";
import {
  CancelledError,
  hasErrorCode,
  HookFailedError,
  HookTimeoutError,
  throwIfAborted,
} from "../../utils/errors";
import { logger } from "../../utils/logger";

const MAX_CAPTURED_OUTPUT = 64 * 1024;

export interface HookResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface HookRunOptions {
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

/** Keeps the tail of a stream, dropping older output past the cap. */
class OutputTail {
  private chunks: Buffer[] = [];
  private length = 0;

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.length += chunk.length;
    while (this.length > MAX_CAPTURED_OUTPUT && this.chunks.length > 1) {
      this.length -= this.chunks.shift()?.length ?? 0;
    }
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString("utf8").slice(-MAX_CAPTURED_OUTPUT);
  }
}

function killProcessGroup(pid: number | undefined): void {
  if (pid === undefined) return;
  try {
    // negative pid targets the whole group the detached child leads
    process.kill(-pid, "SIGKILL");
  } catch (err) {
    if (!hasErrorCode(err, "ESRCH")) {
      logger.warn(`Could not kill hook process group ${pid}`, err);
    }
  }
}

/**
 * Run a hook command through the system shell. The hook runs in its own
 * process group, which is killed outright on timeout or cancellation.
 */
export async function runHook(
  label: string,
  hook: HookConfig,
  options: HookRunOptions = {},
): Promise<HookResult> {
  throwIfAborted(options.signal);
  logger.info(`Running ${label} hook: ${hook.command}`);

  return new Promise<HookResult>((resolve, reject) => {
    const startTime = Date.now();
    const child = spawn(hook.command, {
      shell: true,
      detached: true,
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ["ignore", "pipe", "pipe"],
    });

    const stdout = new OutputTail();
    const stderr = new OutputTail();
    child.stdout.on("data", (d: Buffer) => stdout.push(d));
    child.stderr.on("data", (d: Buffer) => stderr.push(d));

    let interruption: "timeout" | "cancelled" | null = null;
    let settled = false;

    const timer = setTimeout(() => {
      interruption = "timeout";
      killProcessGroup(child.pid);
    }, hook.timeoutSeconds * 1000);

    const onAbort = () => {
      interruption ??= "cancelled";
      killProcessGroup(child.pid);
    };
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const settle = (): boolean => {
      if (settled) return false;
      settled = true;
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      return true;
    };

    child.on("error", (err) => {
      if (!settle()) return;
      reject(new HookFailedError(`${label} hook could not be started: ${err.message}`, null));
    });

    child.on("close", (code, signalName) => {
      if (!settle()) return;
      const durationMs = Date.now() - startTime;

      if (interruption === "timeout") {
        reject(
          new HookTimeoutError(
            `${label} hook timed out after ${hook.timeoutSeconds}s`,
            hook.timeoutSeconds,
          ),
        );
        return;
      }
      if (interruption === "cancelled") {
        reject(new CancelledError(`${label} hook was cancelled`));
        return;
      }
      if (code !== 0) {
        const status = code === null ? `signal ${signalName ?? "unknown"}` : `exit code ${code}`;
        const detail = stderr.toString().trim();
        reject(
          new HookFailedError(
            `${label} hook failed with ${status}${detail ? `: ${detail}` : ""}`,
            code,
            stderr.toString(),
          ),
        );
        return;
      }

      logger.debug(`${label} hook finished in ${durationMs}ms`);
      resolve({ exitCode: 0, stdout: stdout.toString(), stderr: stderr.toString(), durationMs });
    });
  });
}
