/**
 * Default configuration values
 */

import type { BackupDefinition, RetainerConfig, RetentionPolicy } from "../types";

export const DEFAULT_HOOK_TIMEOUT_SECONDS = 300;

export const DEFAULT_RETENTION = {
  keepDaily: 7,
  keepWeekly: 4,
  keepMonthly: 6,
  keepYearly: 1,
  minBackups: 3,
} satisfies RetentionPolicy;

// version and backups are intentionally NOT defaulted - they must be specified by the user
export const DEFAULT_CONFIG = {
  database: {
    path: "./retainer.db",
  },
  safety: {
    verifyChecksumBeforeDelete: true,
  },
} satisfies Omit<RetainerConfig, "version" | "backups">;

export const DEFAULT_BACKUP = {
  compression: true,
  exclude: [],
  retention: DEFAULT_RETENTION,
} satisfies Omit<BackupDefinition, "source" | "destination">;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source overriding target
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
