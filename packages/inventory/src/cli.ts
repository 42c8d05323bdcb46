#!/usr/bin/env node

import { Command } from "commander";

import { runInventory, type CliOptions, resolveSettings } from "./cli/run.js";
import { configureExitOverride, handleError } from "./cli/utils.js";
import { loadConfig } from "./config/loader.js";
import { DEFAULTS } from "./constants.js";
import { REPORT_FORMATS } from "./report/index.js";
import { version } from "./version.js";

const program = new Command();

configureExitOverride(program)
  .name("cachescope")
  .description("Inventory ElastiCache clusters across a region and its Global Datastore peers")
  .version(version)
  .option("-r, --region <region>", "Home AWS region")
  .option("-p, --profile <profile>", "AWS profile name")
  .option("-e, --engine <engines>", `Comma-separated engines (default: ${DEFAULTS.engines.join(",")})`)
  .option("-c, --cluster <pattern>", "Cluster name filter (wildcards allowed)")
  .option("-i, --info-type <fields>", 'Comma-separated fields, or "all" (default: all)')
  .option(
    "-f, --output-format <format>",
    `Report format: ${REPORT_FORMATS.join(" or ")} (default: ${DEFAULTS.format})`
  )
  .option("-o, --output-file <path>", `Output file or directory (default: ${DEFAULTS.output})`)
  .option("-v, --verbose", "Enable debug logging")
  .option("--config <path>", "Path to cachescope.toml")
  .configureOutput({
    writeErr: (str: string) => {
      process.stderr.write(str);
    },
  })
  .action(async (options: CliOptions) => {
    try {
      const { config } = loadConfig(options.config);
      const settings = resolveSettings(options, config);

      const controller = new AbortController();
      process.once("SIGINT", () => controller.abort());

      const exitCode = await runInventory(settings, { signal: controller.signal });
      process.exit(exitCode);
    } catch (error) {
      handleError(error);
    }
  });

program.parseAsync().catch((error: unknown) => {
  handleError(error);
});
