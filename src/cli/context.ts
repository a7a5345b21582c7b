/**
 * Helpers shared by every command
 */

import { findAndLoadConfig } from "../config/loader";
import { getBackupConfig, getBackupNames } from "../config/resolver";
import { initDatabase } from "../db";
import type { BackupConfig, RetainerConfig } from "../types";
import { ConfigError, describeError } from "../utils/errors";
import { type ExitCode, exitCodeForKind } from "./exit-codes";
import { ui } from "./ui";

/**
 * Load the config file and open its metadata database
 */
export async function loadContext(configPath?: string): Promise<RetainerConfig> {
  const config = await findAndLoadConfig(configPath);
  await initDatabase(config.database.path);
  return config;
}

/**
 * Pick the backup a command works on: the one named, the only one
 * configured, or one chosen interactively.
 */
export async function selectBackup(
  config: RetainerConfig,
  name: string | undefined,
): Promise<BackupConfig | null> {
  if (name) {
    return getBackupConfig(config, name);
  }

  const names = getBackupNames(config);
  const [only] = names;
  if (names.length === 1 && only) {
    return getBackupConfig(config, only);
  }

  if (!ui.isInteractive()) {
    throw new ConfigError(`Specify a backup with --name (available: ${names.join(", ")})`);
  }

  const selected: string | symbol = await ui.select({
    message: "Select a backup",
    options: names.map((n) => {
      const definition = config.backups[n];
      return { value: n, label: n, hint: definition?.source };
    }),
  });

  if (ui.isCancel(selected)) {
    return null;
  }
  return getBackupConfig(config, selected);
}

/**
 * Print a failure and pick the exit code for it
 */
export function reportFailure(action: string, error: unknown, verbose: boolean): ExitCode {
  const detail = describeError(error);
  ui.error(`${action} failed: ${detail.message}`);
  if (verbose) {
    console.error(error);
  }
  return exitCodeForKind(detail.kind);
}

/**
 * Run with an AbortSignal that fires on Ctrl-C
 */
export async function withInterrupt<T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);
  try {
    return await run(controller.signal);
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }
}
