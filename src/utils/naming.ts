/**
 * Archive naming utilities
 */

import * as os from "node:os";

// Pattern: config_host_YYYYMMDD_HHMMSS.tar[.gz]
export const ARCHIVE_NAME_PATTERN =
  /^([A-Za-z0-9][A-Za-z0-9_-]*)_([A-Za-z0-9-]+)_(\d{8})_(\d{6})\.(tar|tar\.gz)$/;

export const CONFIG_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export const SIDECAR_EXTENSION = ".sha256";

export interface ParsedArchiveName {
  configName: string;
  hostname: string;
  date: string;
  time: string;
  compressed: boolean;
}

export interface ArchiveNameOptions {
  hostname?: string;
  now?: Date;
  compressed?: boolean;
}

/**
 * Short host name with characters that would break the name pattern replaced.
 */
export function getHostIdentifier(hostname: string = os.hostname()): string {
  const short = hostname.split(".")[0] ?? "";
  const sanitized = short.replace(/[^A-Za-z0-9-]/g, "-");
  return sanitized.length > 0 ? sanitized : "localhost";
}

export function formatArchiveTimestamp(date: Date): { date: string; time: string } {
  const iso = date.toISOString();
  return {
    date: iso.slice(0, 10).replace(/-/g, ""),
    time: iso.slice(11, 19).replace(/:/g, ""),
  };
}

export function generateArchiveName(configName: string, options: ArchiveNameOptions = {}): string {
  const host = getHostIdentifier(options.hostname);
  const { date, time } = formatArchiveTimestamp(options.now ?? new Date());
  const extension = options.compressed === false ? "tar" : "tar.gz";

  return `${configName}_${host}_${date}_${time}.${extension}`;
}

export function parseArchiveName(archiveName: string): ParsedArchiveName | null {
  const match = archiveName.match(ARCHIVE_NAME_PATTERN);
  if (!match) return null;

  const [, configName = "", hostname = "", date = "", time = "", extension = ""] = match;

  return {
    configName,
    hostname,
    date,
    time,
    compressed: extension === "tar.gz",
  };
}

/**
 * Check that an archive name was produced for the given configuration.
 */
export function isValidArchiveName(archiveName: string, expectedConfig: string): boolean {
  const parsed = parseArchiveName(archiveName);
  return parsed !== null && parsed.configName === expectedConfig;
}

export function isValidConfigName(name: string): boolean {
  return CONFIG_NAME_PATTERN.test(name);
}

export function getSidecarName(archiveName: string): string {
  return `${archiveName}${SIDECAR_EXTENSION}`;
}
