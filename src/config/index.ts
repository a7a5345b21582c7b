/**
 * Configuration module exports
 */

// Defaults
export {
  DEFAULT_BACKUP,
  DEFAULT_CONFIG,
  DEFAULT_HOOK_TIMEOUT_SECONDS,
  DEFAULT_RETENTION,
  deepMerge,
  isPlainObject,
} from "./defaults";
// Loader
export {
  CONFIG_FILE_NAMES,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfigContent,
} from "./loader";
// Resolver
export { getAllBackupConfigs, getBackupConfig, getBackupNames, resolvePaths } from "./resolver";
// Validator
export { validateBackup, validateConfig } from "./validator";
