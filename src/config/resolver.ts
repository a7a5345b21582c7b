/**
 * Configuration path resolution and backup lookup
 */

import * as path from "node:path";
import type { BackupConfig, BackupDefinition, RetainerConfig } from "../types";
import { ConfigError } from "../utils/errors";

/**
 * Resolve relative paths in config against the config file's directory
 */
export function resolvePaths(config: RetainerConfig, configPath: string): RetainerConfig {
  const configDir = path.dirname(path.resolve(configPath));
  const resolve = (p: string) => (path.isAbsolute(p) ? p : path.resolve(configDir, p));

  const backups: Record<string, BackupDefinition> = {};
  for (const [name, backup] of Object.entries(config.backups)) {
    backups[name] = {
      ...backup,
      source: resolve(backup.source),
      destination: resolve(backup.destination),
    };
  }

  return {
    ...config,
    database: {
      path: config.database.path === ":memory:" ? config.database.path : resolve(config.database.path),
    },
    backups,
  };
}

export function getBackupNames(config: RetainerConfig): string[] {
  return Object.keys(config.backups);
}

/**
 * Get one named backup configuration
 */
export function getBackupConfig(config: RetainerConfig, name: string): BackupConfig {
  const definition = config.backups[name];
  if (!definition) {
    const available = getBackupNames(config).join(", ");
    throw new ConfigError(`Backup "${name}" not found. Available: ${available}`);
  }
  return { ...definition, name };
}

export function getAllBackupConfigs(config: RetainerConfig): BackupConfig[] {
  return getBackupNames(config).map((name) => getBackupConfig(config, name));
}
