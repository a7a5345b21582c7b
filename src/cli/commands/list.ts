import { parseArgs } from "node:util";
import { listBackups } from "../../core";
import type { BackupMetadata } from "../../types";
import { ConfigError } from "../../utils/errors";
import { formatBytes } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { loadContext, reportFailure } from "../context";
import { ExitCode } from "../exit-codes";
import { color, csvField, formatTableRow, formatTableSeparator, ui } from "../ui";

const FORMATS = ["table", "json", "csv"] as const;
type OutputFormat = (typeof FORMATS)[number];

function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.some((format) => format === value);
}

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      name: { type: "string", short: "n" },
      limit: { type: "string", short: "l" },
      format: { type: "string", default: "table" },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return ExitCode.Success;
  }

  if (values.verbose) {
    setLogLevel("debug");
  }

  try {
    const format = values.format ?? "table";
    if (!isOutputFormat(format)) {
      throw new ConfigError(`Unknown format "${format}". Use one of: ${FORMATS.join(", ")}`);
    }

    const config = await loadContext(values.config);
    if (values.name && !config.backups[values.name]) {
      throw new ConfigError(
        `Backup "${values.name}" not found. Available: ${Object.keys(config.backups).join(", ")}`,
      );
    }

    let backups = listBackups(values.name);

    const limit = values.limit ? Number.parseInt(values.limit, 10) : undefined;
    if (limit && limit > 0) {
      backups = backups.slice(0, limit);
    }

    // Output based on format - no intro for scripting formats
    switch (format) {
      case "json":
        console.log(JSON.stringify(backups, null, 2));
        return ExitCode.Success;
      case "csv":
        printCsv(backups);
        return ExitCode.Success;
      case "table":
        ui.intro("retainer list");

        if (backups.length === 0) {
          ui.info("No backups found");
          ui.outro("Done");
          return ExitCode.Success;
        }

        printTable(backups, values.verbose ?? false);

        ui.outro(`${backups.length} backup(s) total`);
        return ExitCode.Success;
    }
  } catch (error) {
    return reportFailure("List", error, values.verbose ?? false);
  }
}

function printTable(backups: BackupMetadata[], verbose: boolean): void {
  const widths = verbose ? [36, 12, 19, 12, 6, 64] : [45, 12, 19, 12];
  const headers = verbose
    ? ["ID", "Backup", "Created", "Size", "Files", "Checksum"]
    : ["Archive", "Backup", "Created", "Size"];

  ui.step("Backups:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const backup of backups) {
    const created = backup.created_at.substring(0, 19).replace("T", " ");
    const row = verbose
      ? [
          backup.id,
          backup.config_name,
          created,
          formatBytes(backup.size_bytes),
          String(backup.files_count),
          backup.checksum,
        ]
      : [backup.archive_filename, backup.config_name, created, formatBytes(backup.size_bytes)];

    console.log(formatTableRow(row, widths));
  }

  console.log(formatTableSeparator(widths));
}

function printCsv(backups: BackupMetadata[]): void {
  console.log(
    "id,config_name,archive_filename,created_at,size_bytes,files_count,checksum,destination_dir,hostname",
  );

  for (const backup of backups) {
    console.log(
      [
        backup.id,
        backup.config_name,
        backup.archive_filename,
        backup.created_at,
        backup.size_bytes,
        backup.files_count,
        backup.checksum,
        backup.destination_dir,
        backup.hostname,
      ]
        .map(csvField)
        .join(","),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("retainer list")} - List existing backups

${color.dim("USAGE:")}
  retainer list [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./retainer.config.yaml)
  -n, --name <name>       Only list backups of one configuration
  -l, --limit <number>    Limit number of results
      --format <format>   Output format: table, json, csv (default: table)
  -v, --verbose           Show more details (backup IDs, checksums)
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  retainer list                            # List all backups, newest first
  retainer list -n www                     # List backups of "www" only
  retainer list -l 10                      # List the last 10 backups
  retainer list --format json              # Output as JSON (for scripting)
`);
}
