import { parseArgs } from "node:util";
import { getAllBackupConfigs, getBackupConfig } from "../../config/resolver";
import { type CleanupResult, runCleanup } from "../../core";
import type { BackupConfig } from "../../types";
import { ConfigError } from "../../utils/errors";
import { formatBytes } from "../../utils/format";
import { setLogLevel } from "../../utils/logger";
import { loadContext, reportFailure } from "../context";
import { ExitCode, exitCodeForKind } from "../exit-codes";
import { color, formatSummary, ui } from "../ui";

export async function cleanupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      config: { type: "string", short: "c" },
      name: { type: "string", short: "n" },
      "dry-run": { type: "boolean", default: false },
      force: { type: "boolean", default: false },
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
    const config = await loadContext(values.config);
    const verifyChecksum = config.safety.verifyChecksumBeforeDelete;
    const dryRun = values["dry-run"] ?? false;

    ui.intro("retainer cleanup");

    const targets: BackupConfig[] = values.name
      ? [getBackupConfig(config, values.name)]
      : getAllBackupConfigs(config);

    // Preview what will be deleted first
    const previews: CleanupResult[] = [];
    for (const target of targets) {
      previews.push(await runCleanup(target, { dryRun: true, verifyChecksum }));
    }

    for (const preview of previews) {
      if (preview.belowMinimum) {
        ui.warn(
          `${preview.configName}: ${preview.totalChecked} backup(s), ${preview.minimumShortfall} short of the minimum`,
        );
      }
    }

    const pending = previews.flatMap((preview) => preview.deletions);
    if (pending.length === 0) {
      ui.success("No backups need to be cleaned up");
      ui.outro("Nothing to do");
      return ExitCode.Success;
    }

    ui.step(`Found ${pending.length} backup(s) to delete:`);
    for (const deletion of pending) {
      ui.message(`  ${color.dim("•")} ${deletion.archiveFilename} ${color.dim(`(${formatBytes(deletion.sizeBytes)})`)}`);
    }

    if (dryRun) {
      const wouldFree = previews.reduce((sum, preview) => sum + preview.freedBytes, 0);
      ui.note(
        formatSummary([
          { label: "Would keep", value: previews.reduce((sum, p) => sum + p.kept, 0) },
          { label: "Would delete", value: pending.length },
          { label: "Would free", value: formatBytes(wouldFree) },
        ]),
        "Cleanup Preview",
      );
      ui.warn("[DRY RUN] No changes were made.");
      ui.outro("Preview complete");
      return ExitCode.Success;
    }

    // Confirm deletion unless --force
    if (!values.force) {
      if (!ui.isInteractive()) {
        throw new ConfigError("Refusing to delete without confirmation; pass --force");
      }
      const confirmed = await ui.confirm({
        message: `Delete ${pending.length} backup(s)?`,
        initialValue: false,
      });

      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Cleanup cancelled");
        return ExitCode.Cancelled;
      }
    }

    const s = ui.spinner();
    s.start("Cleaning up old backups...");

    const results: CleanupResult[] = [];
    for (const target of targets) {
      results.push(await runCleanup(target, { dryRun: false, verifyChecksum }));
    }

    s.stop("Cleanup complete");

    ui.step("Deletions:");
    for (const deletion of results.flatMap((result) => result.deletions)) {
      const status = deletion.success ? color.green("OK") : color.red("FAILED");
      ui.message(`  [${status}] ${deletion.archiveFilename}`);
      if (deletion.error) {
        ui.error(`         ${deletion.error.message}`);
      }
    }

    const errors = results.flatMap((result) => result.errors);
    ui.note(
      formatSummary([
        { label: "Checked", value: results.reduce((sum, r) => sum + r.totalChecked, 0) },
        { label: "Kept", value: results.reduce((sum, r) => sum + r.kept, 0) },
        { label: "Deleted", value: results.reduce((sum, r) => sum + r.deleted, 0) },
        { label: "Freed", value: formatBytes(results.reduce((sum, r) => sum + r.freedBytes, 0)) },
        { label: "Errors", value: errors.length },
      ]),
      "Cleanup Summary",
    );

    const [firstError] = errors;
    if (firstError) {
      ui.warn("Some backups could not be deleted");
      ui.outro("Cleanup finished with errors");
      return exitCodeForKind(firstError.kind);
    }

    ui.outro("Cleanup complete!");
    return ExitCode.Success;
  } catch (error) {
    return reportFailure("Cleanup", error, values.verbose ?? false);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("retainer cleanup")} - Delete backups the retention policy no longer keeps

${color.dim("USAGE:")}
  retainer cleanup [OPTIONS]

${color.dim("OPTIONS:")}
  -c, --config <path>     Path to config file (default: ./retainer.config.yaml)
  -n, --name <name>       Only clean up one configuration (default: all)
      --dry-run           Show what would be deleted without doing it
      --force             Skip confirmation prompts
  -v, --verbose           Verbose output
  -h, --help              Show this help message

${color.dim("SAFETY:")}
  Cleanup only deletes archives tracked in the database that pass every check:

  1. The record still exists in the database
  2. The archive name matches the configuration's naming pattern
  3. The archive lies inside the configured destination
  4. No running restore holds a lease on the archive
  5. The checksum matches the record (if enabled in config)

  Anything that fails a check is kept and reported. Cleanup never takes a
  configuration below its minBackups floor.

${color.dim("EXAMPLES:")}
  retainer cleanup                         # Clean up all configurations (with confirmation)
  retainer cleanup -n www                  # Clean up "www" only
  retainer cleanup --dry-run               # Preview what would be deleted
  retainer cleanup --force                 # Skip confirmation
`);
}
