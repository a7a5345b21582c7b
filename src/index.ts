#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { cleanupCommand } from "./cli/commands/cleanup";
import { listCommand } from "./cli/commands/list";
import { removeCommand } from "./cli/commands/remove";
import { restoreCommand } from "./cli/commands/restore";
import { verifyCommand } from "./cli/commands/verify";
import { ExitCode } from "./cli/exit-codes";
import { NAME, VERSION } from "./cli/ui";
import { closeDatabase } from "./db";
import { errorMessage, hasErrorCode } from "./utils/errors";

function printHelp(): void {
  p.intro(`${color.cyan(NAME)} ${color.dim(`v${VERSION}`)} - Backup lifecycle manager`);

  p.note(
    `${color.cyan("backup")}      Create a backup
${color.cyan("list")}        List existing backups
${color.cyan("verify")}      Verify archive integrity
${color.cyan("restore")}     Extract an archive into a directory
${color.cyan("cleanup")}     Delete backups outside the retention policy
${color.cyan("remove")}      Delete one backup`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `${NAME} backup -n www              ${color.dim("# Back up one configuration")}
${NAME} list --format json        ${color.dim("# List backups as JSON")}
${NAME} verify --all              ${color.dim("# Verify all backups")}
${NAME} cleanup --dry-run         ${color.dim("# Preview cleanup")}
${NAME} restore <archive> ./out   ${color.dim("# Restore an archive")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan(`${NAME} <command> --help`)} for command details`);
}

async function run(command: string | undefined, commandArgs: string[]): Promise<number> {
  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "cleanup":
      return cleanupCommand(commandArgs);

    case "remove":
      return removeCommand(commandArgs);

    case undefined:
    case "-h":
    case "--help":
    case "help":
      printHelp();
      return ExitCode.Success;

    case "-v":
    case "--version":
    case "version":
      console.log(`${NAME} v${VERSION}`);
      return ExitCode.Success;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan(`${NAME} --help`)} for usage information.`);
      return ExitCode.Config;
  }
}

async function main(): Promise<number> {
  const [command, ...commandArgs] = process.argv.slice(2);

  try {
    return await run(command, commandArgs);
  } catch (error) {
    // parseArgs rejects unknown or malformed options before a command starts
    if (
      hasErrorCode(error, "ERR_PARSE_ARGS_UNKNOWN_OPTION") ||
      hasErrorCode(error, "ERR_PARSE_ARGS_INVALID_OPTION_VALUE") ||
      hasErrorCode(error, "ERR_PARSE_ARGS_UNEXPECTED_POSITIONAL")
    ) {
      console.error(`${color.red("Error:")} ${errorMessage(error)}`);
      return ExitCode.Config;
    }
    throw error;
  } finally {
    closeDatabase();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exitCode = ExitCode.Unexpected;
  });
