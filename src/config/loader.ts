/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { RetainerConfig } from "../types";
import { ConfigError, errorMessage, hasErrorCode } from "../utils/errors";
import { DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults";
import { resolvePaths } from "./resolver";
import { validateConfig } from "./validator";

export const CONFIG_FILE_NAMES = [
  "retainer.config.yaml",
  "retainer.config.yml",
  "retainer.config.json",
] as const;

export function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${errorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${errorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<RetainerConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch (err) {
    if (hasErrorCode(err, "ENOENT")) {
      throw new ConfigError(`Config file not found: ${absolutePath}`);
    }
    throw err;
  }

  const parsed = parseConfigContent(content, path.extname(absolutePath).toLowerCase());
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file must contain a mapping: ${absolutePath}`);
  }

  const config = validateConfig(deepMerge(DEFAULT_CONFIG, parsed));
  return resolvePaths(config, absolutePath);
}

/**
 * Find a config file in the given directory
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const configPath = path.join(startDir, name);
    if (existsSync(configPath)) {
      return configPath;
    }
  }
  return null;
}

/**
 * Find and load a config file
 */
export async function findAndLoadConfig(configPath?: string): Promise<RetainerConfig> {
  if (configPath) {
    return loadConfig(configPath);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      "No config file found. Create retainer.config.yaml or specify --config path",
    );
  }

  return loadConfig(found);
}
