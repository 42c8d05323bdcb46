import chalk from "chalk";

import { createClientFactory } from "../aws/client-factory.js";
import type { ClientFactory } from "../aws/types.js";
import { ConfigError } from "../config/errors.js";
import type { Config } from "../config/schema.js";
import { DEFAULTS, type Engine, ExitCode, type ExitCodeType } from "../constants.js";
import { collectInventory } from "../inventory/orchestrator.js";
import type { InventoryResult, ProgressEvent } from "../inventory/types.js";
import { setLogLevel } from "../logger.js";
import { resolveOutputPath, writeReport } from "../output/writer.js";
import {
  type FieldToken,
  formatReport,
  isReportFormat,
  parseEngineList,
  parseFieldList,
  REPORT_EXTENSIONS,
  REPORT_FORMATS,
  type ReportFormat,
} from "../report/index.js";
import { reportError } from "./utils.js";

/**
 * Options as parsed by commander
 */
export interface CliOptions {
  region?: string;
  profile?: string;
  engine?: string;
  cluster?: string;
  infoType?: string;
  outputFormat?: string;
  outputFile?: string;
  verbose?: boolean;
  config?: string;
}

/**
 * Fully resolved run settings: flags over config file over defaults
 */
export interface RunSettings {
  region: string;
  profile?: string;
  engines: Engine[];
  clusterFilter?: string;
  fields: FieldToken[];
  format: ReportFormat;
  output: string;
  concurrency?: number;
  verbose: boolean;
}

function resolveFormat(value: string): ReportFormat {
  const format = value.trim().toLowerCase();
  if (!isReportFormat(format)) {
    throw new ConfigError(`Invalid output format: ${value}. Valid formats: ${REPORT_FORMATS.join(", ")}`);
  }
  return format;
}

/**
 * Merge CLI flags with the config file and validate the result
 */
export function resolveSettings(options: CliOptions, config: Config): RunSettings {
  const region = options.region ?? config.region;
  if (!region) {
    throw new ConfigError("A region is required: pass --region or set region in cachescope.toml");
  }

  return {
    region,
    profile: options.profile ?? config.profile,
    engines: parseEngineList(options.engine ?? config.engines ?? DEFAULTS.engines),
    clusterFilter: options.cluster ?? config.cluster,
    fields: parseFieldList(options.infoType ?? config.fields ?? DEFAULTS.fields),
    format: resolveFormat(options.outputFormat ?? config.format ?? DEFAULTS.format),
    output: options.outputFile ?? config.output ?? DEFAULTS.output,
    concurrency: config.concurrency,
    verbose: options.verbose ?? config.verbose ?? false,
  };
}

/**
 * Render a progress event as a single stderr line
 */
export function formatProgress(event: ProgressEvent): string {
  switch (event.type) {
    case "region-started":
      return chalk.dim(`Querying ${event.region}...`);
    case "region-completed":
      return chalk.green(`✓ ${event.region}: ${event.clusterCount} clusters`);
    case "region-failed":
      return chalk.yellow(`⚠ ${event.region}: ${event.error}`);
  }
}

function printFailureSummary(result: InventoryResult): void {
  const failed = result.regions.filter((outcome) => outcome.status === "failed");
  if (failed.length === 0) {
    return;
  }
  process.stderr.write(chalk.yellow(`\n${failed.length} region(s) could not be queried:\n`));
  for (const outcome of failed) {
    process.stderr.write(chalk.yellow(`  - ${outcome.region}: ${outcome.error ?? "unknown error"}\n`));
  }
}

export interface RunDependencies {
  /** Defaults to a factory over the AWS SDK for the configured profile */
  clientFactory?: ClientFactory;
  signal?: AbortSignal;
  now?: Date;
}

/**
 * Collect the inventory, print the table and write the report.
 * Returns the process exit code.
 */
export async function runInventory(
  settings: RunSettings,
  deps: RunDependencies = {}
): Promise<ExitCodeType> {
  if (settings.verbose) {
    setLogLevel("debug");
  }

  try {
    const result = await collectInventory({
      region: settings.region,
      engines: settings.engines,
      clusterFilter: settings.clusterFilter,
      clientFactory:
        deps.clientFactory ?? createClientFactory({ profile: settings.profile, signal: deps.signal }),
      concurrency: settings.concurrency,
      signal: deps.signal,
      onProgress: (event) => process.stderr.write(`${formatProgress(event)}\n`),
    });

    if (deps.signal?.aborted) {
      process.stderr.write(chalk.yellow("Interrupted\n"));
      return ExitCode.INTERRUPTED;
    }

    printFailureSummary(result);

    if (result.records.length === 0) {
      process.stdout.write("No ElastiCache clusters found\n");
      return ExitCode.SUCCESS;
    }

    process.stdout.write(`\n${formatReport(result.records, settings.fields, "markdown")}\n\n`);

    const filePath = resolveOutputPath({
      output: settings.output,
      region: settings.region,
      extension: REPORT_EXTENSIONS[settings.format],
      now: deps.now,
    });
    writeReport(filePath, formatReport(result.records, settings.fields, settings.format));
    process.stderr.write(chalk.green(`Report written to ${filePath}\n`));
    return ExitCode.SUCCESS;
  } catch (error) {
    return reportError(error);
  }
}
