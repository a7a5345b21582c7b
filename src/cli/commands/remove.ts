import { parseArgs } from "node:util";
import { getBackupConfig } from "../../config/resolver";
import { removeBackup } from "../../core";
import { getBackupById } from "../../db";
import { ConfigError } from "../../utils/errors";
import { formatBytes } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { loadContext, reportFailure } from "../context";
import { ExitCode } from "../exit-codes";
import { color, formatSummary, ui } from "../ui";

export async function removeCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      force: { type: "boolean", default: false },
      yes: { type: "boolean", short: "y", default: false },
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

  try {
    const [backupId] = positionals;
    if (!backupId) {
      throw new ConfigError("Usage: retainer remove <backup-id>");
    }

    const config = await loadContext(values.config);
    const backup = getBackupById(backupId);
    if (!backup) {
      throw new ConfigError(`Backup not found: ${backupId}`);
    }
    const backupConfig = getBackupConfig(config, backup.config_name);

    ui.intro("retainer remove");

    ui.note(
      formatSummary([
        { label: "Backup", value: backup.config_name },
        { label: "Archive", value: backup.archive_filename },
        { label: "Created", value: backup.created_at },
        { label: "Size", value: formatBytes(backup.size_bytes) },
      ]),
      "Backup to remove",
    );

    if (!values.yes) {
      if (!ui.isInteractive()) {
        throw new ConfigError("Refusing to remove without confirmation; pass --yes");
      }
      const confirmed = await ui.confirm({ message: "Delete this backup permanently?" });
      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Removal cancelled");
        return ExitCode.Cancelled;
      }
    }

    const s = ui.spinner();
    s.start("Removing backup...");
    try {
      await removeBackup(backupConfig, backup.id, {
        force: values.force ?? false,
        verifyChecksum: config.safety.verifyChecksumBeforeDelete,
      });
    } catch (error) {
      s.stop(color.red("Removal failed"));
      throw error;
    }
    s.stop(`Removed ${backup.archive_filename}`);

    ui.outro(`Freed ${formatBytes(backup.size_bytes)}`);
    return ExitCode.Success;
  } catch (error) {
    return reportFailure("Remove", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("retainer remove")} - Delete one backup

${color.dim("USAGE:")}
  retainer remove [OPTIONS] <backup-id>

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./retainer.config.yaml)
      --force             Remove even if fewer than minBackups would remain
  -y, --yes               Do not ask for confirmation
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("NOTES:")}
  The archive, its .sha256 file and its record are removed together and
  the removal is written to the deletion log.
`);
}
