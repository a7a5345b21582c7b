/**
 * Configuration type definitions
 */

export interface HookConfig {
  /** Shell command line, run with the system shell */
  command: string;
  /** Hard wall-clock limit; the hook's process group is killed when it expires */
  timeoutSeconds: number;
}

export interface RetentionPolicy {
  keepDaily: number;
  keepWeekly: number;
  keepMonthly: number;
  keepYearly: number;
  /** Floor below which cleanup never reduces the number of backups */
  minBackups: number;
}

/**
 * One named backup definition as written in the config file.
 */
export interface BackupDefinition {
  source: string;
  destination: string;
  compression: boolean;
  exclude: string[];
  preHook?: HookConfig;
  postHook?: HookConfig;
  retention: RetentionPolicy;
}

export interface BackupConfig extends BackupDefinition {
  name: string;
}

export interface SafetyConfig {
  verifyChecksumBeforeDelete: boolean;
}

export interface DatabaseConfig {
  path: string;
}

export interface RetainerConfig {
  version: string;
  database: DatabaseConfig;
  safety: SafetyConfig;
  backups: Record<string, BackupDefinition>;
}
