import { existsSync } from "node:fs";
import * as path from "node:path";
import { parseArgs } from "node:util";
import { getBackupById, listBackups } from "../../db";
import { verifyArchive } from "../../core";
import type { VerificationResult } from "../../types";
import { ConfigError } from "../../utils/errors";
import { formatBytes } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { loadContext, reportFailure, withInterrupt } from "../context";
import { ExitCode } from "../exit-codes";
import { color, formatSummary, ui } from "../ui";

interface VerifyTarget {
  archivePath: string;
  /** Digest to fall back on when the archive has no sidecar */
  expectedChecksum?: string;
}

async function resolveTargets(
  positionals: string[],
  options: { all: boolean; name?: string; config?: string; checksum?: string },
): Promise<VerifyTarget[]> {
  const needsDatabase = options.all || positionals.some((arg) => !existsSync(arg));
  if (needsDatabase) {
    await loadContext(options.config);
  }

  if (options.all) {
    return listBackups(options.name).map((backup) => ({
      archivePath: path.join(backup.destination_dir, backup.archive_filename),
      expectedChecksum: backup.checksum,
    }));
  }

  if (positionals.length === 0) {
    throw new ConfigError("Specify archive paths or backup IDs, or use --all");
  }

  return positionals.map((arg): VerifyTarget => {
    if (existsSync(arg)) {
      return { archivePath: arg, expectedChecksum: options.checksum };
    }
    const backup = getBackupById(arg);
    if (!backup) {
      throw new ConfigError(`Not an archive file or known backup ID: ${arg}`);
    }
    return {
      archivePath: path.join(backup.destination_dir, backup.archive_filename),
      expectedChecksum: options.checksum ?? backup.checksum,
    };
  });
}

export async function verifyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      name: { type: "string", short: "n" },
      all: { type: "boolean", default: false },
      checksum: { type: "string" },
      format: { type: "string", default: "text" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return ExitCode.Success;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  const json = values.format === "json";

  try {
    const targets = await resolveTargets(positionals, {
      all: values.all ?? false,
      name: values.name,
      config: values.config,
      checksum: values.checksum,
    });

    if (!json) {
      ui.intro("retainer verify");
    }

    if (targets.length === 0) {
      if (json) {
        console.log("[]");
      } else {
        ui.success("No backups to verify");
        ui.outro("Done");
      }
      return ExitCode.Success;
    }

    const results: VerificationResult[] = [];
    await withInterrupt(async (signal) => {
      for (const target of targets) {
        results.push(
          await verifyArchive(target.archivePath, {
            expectedChecksum: target.expectedChecksum,
            signal,
          }),
        );
      }
    });

    const failed = results.filter((result) => !result.isValid);

    if (json) {
      console.log(JSON.stringify(results, null, 2));
      return failed.length > 0 ? ExitCode.Integrity : ExitCode.Success;
    }

    for (const result of results) {
      const name = path.basename(result.archivePath);
      if (result.isValid) {
        ui.success(`${name} ${color.dim(`(${result.entriesCount} entries, ${formatBytes(result.sizeBytes)})`)}`);
      } else {
        ui.error(name);
        for (const issue of result.errors) {
          ui.message(`  ${color.dim("•")} ${issue}`);
        }
      }
    }

    ui.note(
      formatSummary([
        { label: "Verified", value: results.length },
        { label: "Healthy", value: results.length - failed.length },
        { label: "With issues", value: failed.length },
      ]),
      "Verification Summary",
    );

    if (failed.length > 0) {
      ui.outro(color.red("Verification found problems"));
      return ExitCode.Integrity;
    }

    ui.outro("All archives verified!");
    return ExitCode.Success;
  } catch (error) {
    return reportFailure("Verify", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("retainer verify")} - Verify archive integrity

${color.dim("USAGE:")}
  retainer verify [OPTIONS] <archive|backup-id>...

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./retainer.config.yaml)
  -n, --name <name>       With --all, only verify one configuration
      --all               Verify every recorded backup
      --checksum <hex>    Expected SHA-256 when the archive has no .sha256 file
      --format <format>   Output format: text, json (default: text)
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("CHECKS:")}
  1. The SHA-256 of the archive matches its .sha256 file (or --checksum)
  2. Every entry can be read: gzip stream, tar headers, data lengths and
     the end-of-archive marker

  Archive files can be verified without a config file or database.

${color.dim("EXAMPLES:")}
  retainer verify /var/backups/www/www_host_20240101_020000.tar.gz
  retainer verify --all                    # Verify all recorded backups
  retainer verify --all --format json      # Machine-readable report
`);
}
