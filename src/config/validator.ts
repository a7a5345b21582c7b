/**
 * Configuration validation
 *
 * Turns the merged, untyped config document into a RetainerConfig, failing
 * with a ConfigError that names the offending key.
 */

import type { BackupDefinition, HookConfig, RetainerConfig, RetentionPolicy } from "../types";
import { ConfigError } from "../utils/errors";
import { isValidConfigName } from "../utils/naming";
import { DEFAULT_BACKUP, DEFAULT_HOOK_TIMEOUT_SECONDS, deepMerge, isPlainObject } from "./defaults";

function requireObject(value: unknown, key: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new ConfigError(`${key} must be an object`);
  }
  return value;
}

function requireString(value: unknown, key: string): string {
  if (typeof value !== "string" || value.trim() === "") {
    throw new ConfigError(`${key} must be a non-empty string`);
  }
  return value;
}

function requireBoolean(value: unknown, key: string): boolean {
  if (typeof value !== "boolean") {
    throw new ConfigError(`${key} must be a boolean`);
  }
  return value;
}

function requireCount(value: unknown, key: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer`);
  }
  return value;
}

function validateHook(value: unknown, key: string): HookConfig | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  // Shorthand: a bare command string
  if (typeof value === "string") {
    return { command: requireString(value, key), timeoutSeconds: DEFAULT_HOOK_TIMEOUT_SECONDS };
  }

  const hook = requireObject(value, key);
  const timeout = hook.timeoutSeconds ?? DEFAULT_HOOK_TIMEOUT_SECONDS;
  if (typeof timeout !== "number" || !Number.isFinite(timeout) || timeout <= 0) {
    throw new ConfigError(`${key}.timeoutSeconds must be a positive number`);
  }

  return { command: requireString(hook.command, `${key}.command`), timeoutSeconds: timeout };
}

function validateRetention(value: unknown, key: string): RetentionPolicy {
  const retention = requireObject(value, key);
  return {
    keepDaily: requireCount(retention.keepDaily, `${key}.keepDaily`),
    keepWeekly: requireCount(retention.keepWeekly, `${key}.keepWeekly`),
    keepMonthly: requireCount(retention.keepMonthly, `${key}.keepMonthly`),
    keepYearly: requireCount(retention.keepYearly, `${key}.keepYearly`),
    minBackups: requireCount(retention.minBackups, `${key}.minBackups`),
  };
}

function validateExclude(value: unknown, key: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${key} must be an array of glob patterns`);
  }
  return value.map((pattern, i) => requireString(pattern, `${key}[${i}]`));
}

export function validateBackup(name: string, value: unknown): BackupDefinition {
  const key = `backups.${name}`;
  if (!isValidConfigName(name)) {
    throw new ConfigError(
      `${key}: backup names must start with a letter or digit and contain only letters, digits, '-' and '_'`,
    );
  }

  const backup = deepMerge(DEFAULT_BACKUP, requireObject(value, key));

  const definition: BackupDefinition = {
    source: requireString(backup.source, `${key}.source`),
    destination: requireString(backup.destination, `${key}.destination`),
    compression: requireBoolean(backup.compression, `${key}.compression`),
    exclude: validateExclude(backup.exclude, `${key}.exclude`),
    retention: validateRetention(backup.retention, `${key}.retention`),
  };

  const preHook = validateHook(backup.preHook, `${key}.preHook`);
  if (preHook) definition.preHook = preHook;
  const postHook = validateHook(backup.postHook, `${key}.postHook`);
  if (postHook) definition.postHook = postHook;

  return definition;
}

/**
 * Validate a config document that has already been merged with defaults.
 */
export function validateConfig(config: unknown): RetainerConfig {
  const c = requireObject(config, "config");

  if (typeof c.version !== "string" || c.version === "") {
    throw new ConfigError("Config must have a 'version' field");
  }

  const database = requireObject(c.database, "database");
  const safety = requireObject(c.safety, "safety");
  const backupsSection = requireObject(c.backups, "backups");

  const names = Object.keys(backupsSection);
  if (names.length === 0) {
    throw new ConfigError("Config must define at least one backup under 'backups'");
  }

  const seen = new Map<string, string>();
  const backups: Record<string, BackupDefinition> = {};
  for (const name of names) {
    const folded = name.toLowerCase();
    const previous = seen.get(folded);
    if (previous !== undefined) {
      throw new ConfigError(`Duplicate backup name: "${name}" conflicts with "${previous}"`);
    }
    seen.set(folded, name);
    backups[name] = validateBackup(name, backupsSection[name]);
  }

  return {
    version: c.version,
    database: { path: requireString(database.path, "database.path") },
    safety: {
      verifyChecksumBeforeDelete: requireBoolean(
        safety.verifyChecksumBeforeDelete,
        "safety.verifyChecksumBeforeDelete",
      ),
    },
    backups,
  };
}
