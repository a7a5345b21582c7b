import { parseArgs } from "node:util";
import { runBackup } from "../../core";
import { formatBytes, formatDuration } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { loadContext, reportFailure, selectBackup, withInterrupt } from "../context";
import { ExitCode, exitCodeForKind } from "../exit-codes";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      name: { type: "string", short: "n" },
      all: { type: "boolean", default: false },
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
    const config = await loadContext(values.config);

    ui.intro("retainer backup");

    const names = values.all ? Object.keys(config.backups) : [values.name ?? positionals[0]];
    let exitCode: ExitCode = ExitCode.Success;

    for (const name of names) {
      const backup = await selectBackup(config, name);
      if (!backup) {
        ui.cancel("Backup cancelled");
        return ExitCode.Cancelled;
      }

      const s = ui.spinner();
      s.start(`Backing up ${color.cyan(backup.name)}...`);

      const job = await withInterrupt((signal) => runBackup(backup, { signal }));

      if (job.status === "succeeded") {
        s.stop(`Backup of ${backup.name} complete`);
      } else {
        s.stop(color.red(`Backup of ${backup.name} failed`));
      }

      const durationMs = job.finishedAt
        ? new Date(job.finishedAt).getTime() - new Date(job.startedAt).getTime()
        : 0;

      ui.note(
        formatSummary([
          { label: "Backup ID", value: job.id },
          { label: "Archive", value: job.archivePath },
          { label: "Size", value: job.checksum ? formatBytes(job.sizeBytes) : null },
          { label: "Files", value: job.checksum ? job.filesCount : null },
          { label: "Checksum", value: job.checksum },
          { label: "Duration", value: formatDuration(durationMs) },
        ]),
        `Backup: ${backup.name}`,
      );

      for (const warning of job.warnings) {
        ui.warn(warning);
      }

      if (job.error) {
        ui.error(`${job.error.kind}: ${job.error.message}`);
        exitCode = exitCode === ExitCode.Success ? exitCodeForKind(job.error.kind) : exitCode;
      }
    }

    if (exitCode === ExitCode.Success) {
      ui.outro("Backup complete!");
    } else {
      ui.outro(color.red("Backup finished with errors"));
    }
    return exitCode;
  } catch (error) {
    return reportFailure("Backup", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("retainer backup")} - Create a backup

${color.dim("USAGE:")}
  retainer backup [OPTIONS] [NAME]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./retainer.config.yaml)
  -n, --name <name>       Backup to run (prompted for when omitted)
      --all               Run every configured backup in turn
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("EXAMPLES:")}
  retainer backup -n www                   # Back up the "www" configuration
  retainer backup --all                    # Back up everything
`);
}
