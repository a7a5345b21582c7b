import { existsSync } from "node:fs";
import * as path from "node:path";
import { parseArgs } from "node:util";
import { restoreArchive } from "../../core";
import { getBackupById } from "../../db";
import { ConfigError } from "../../utils/errors";
import { formatBytes, formatDuration } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { loadContext, reportFailure, withInterrupt } from "../context";
import { ExitCode, exitCodeForKind } from "../exit-codes";
import { color, formatSummary, ui } from "../ui";

async function resolveArchive(source: string, configPath: string | undefined): Promise<string> {
  if (existsSync(source)) {
    return source;
  }

  // Not a file: treat it as a backup ID
  await loadContext(configPath);
  const backup = getBackupById(source);
  if (!backup) {
    throw new ConfigError(`Not an archive file or known backup ID: ${source}`);
  }
  return path.join(backup.destination_dir, backup.archive_filename);
}

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      overwrite: { type: "boolean", default: false },
      "best-effort": { type: "boolean", default: false },
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
    const [source, destination] = positionals;
    if (!source || !destination) {
      throw new ConfigError("Usage: retainer restore <archive|backup-id> <destination>");
    }

    const archivePath = await resolveArchive(source, values.config);

    ui.intro("retainer restore");

    const s = ui.spinner();
    s.start(`Restoring ${color.cyan(path.basename(archivePath))}...`);

    const outcome = await withInterrupt((signal) =>
      restoreArchive(archivePath, destination, {
        overwrite: values.overwrite ?? false,
        bestEffort: values["best-effort"] ?? false,
        signal,
      }),
    );

    if (outcome.status === "succeeded") {
      s.stop("Restore complete");
    } else {
      s.stop(color.red("Restore failed"));
    }

    if (outcome.skipped.length > 0) {
      ui.warn(`Skipped ${outcome.skipped.length} entr${outcome.skipped.length === 1 ? "y" : "ies"}:`);
      for (const skipped of outcome.skipped) {
        ui.message(`  ${color.dim("•")} ${skipped.path} ${color.dim(`(${skipped.reason})`)}`);
      }
    }

    ui.note(
      formatSummary([
        { label: "Archive", value: outcome.archivePath },
        { label: "Destination", value: outcome.destination },
        { label: "Entries written", value: outcome.entriesWritten },
        { label: "Data written", value: formatBytes(outcome.bytesWritten) },
        { label: "Duration", value: formatDuration(outcome.durationMs) },
      ]),
      "Restore Summary",
    );

    if (outcome.error) {
      ui.error(`${outcome.error.kind}: ${outcome.error.message}`);
      ui.outro(color.red("Nothing was changed in the destination"));
      return exitCodeForKind(outcome.error.kind);
    }

    ui.outro("Restore complete!");
    return ExitCode.Success;
  } catch (error) {
    return reportFailure("Restore", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("retainer restore")} - Extract an archive into a directory

${color.dim("USAGE:")}
  retainer restore [OPTIONS] <archive|backup-id> <destination>

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (only needed for backup IDs)
      --overwrite         Replace files that already exist in the destination
      --best-effort       Skip unsafe entries instead of refusing the archive
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("SAFETY:")}
  Entries with absolute paths or ".." components that lead outside the
  destination are refused, as are entries that would be written through a
  symbolic link. Symbolic links are restored exactly as archived, wherever
  they point. Without --best-effort one refused entry aborts the restore
  before anything is written. A failed restore leaves the destination as
  it was.

${color.dim("EXAMPLES:")}
  retainer restore www_host_20240101_020000.tar.gz /srv/restore
  retainer restore 3f2a9c1e-... /srv/restore --overwrite
`);
}
