import chalk from "chalk";
import type { Command, CommanderError } from "commander";

import { InventoryError } from "../aws/errors.js";
import { ConfigError } from "../config/errors.js";
import { ExitCode, type ExitCodeType } from "../constants.js";

/**
 * Configure exitOverride so that argument errors exit with CONFIG_ERROR.
 */
export function configureExitOverride(cmd: Command): Command {
  return cmd.exitOverride((err: CommanderError) => {
    // Commander uses exit code 1 for all errors by default
    if (
      err.code === "commander.invalidArgument" ||
      err.code === "commander.optionMissingArgument" ||
      err.code === "commander.unknownOption"
    ) {
      process.exit(ExitCode.CONFIG_ERROR);
    }
    // help and version
    process.exit(err.exitCode);
  });
}

/**
 * Print an error and map it to an exit code
 */
export function reportError(error: unknown): ExitCodeType {
  if (error instanceof ConfigError) {
    console.error(chalk.red(`Config error: ${error.message}`));
    return ExitCode.CONFIG_ERROR;
  }
  if (error instanceof InventoryError) {
    console.error(chalk.red(error.toString()));
    return ExitCode.RUNTIME_ERROR;
  }
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(chalk.red(`Error: ${message}`));
  return ExitCode.RUNTIME_ERROR;
}

export function handleError(error: unknown): never {
  process.exit(reportError(error));
}
