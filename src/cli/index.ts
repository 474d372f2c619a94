#!/usr/bin/env node

/**
 * MQ Topology CLI
 * Runs the topology pipeline and inspects its artifacts
 */

import { Command } from "commander";
import chalk from "chalk";
import { runCommand } from "./commands/run.js";
import { diffCommand } from "./commands/diff.js";
import { gatewaysCommand } from "./commands/gateways.js";
import { statusCommand } from "./commands/status.js";
import { parseThreshold } from "./commands/shared.js";
import { isTopologyError } from "../core/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("mq-topology")
  .description("Infer IBM MQ queue-manager topology from CMDB exports")
  .version("0.1.0")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  });

// =============================================================================
// Commands
// =============================================================================

program
  .command("run")
  .description("Run the full pipeline: extract, enrich, diff against baseline, analyze gateways")
  .option("-c, --config <path>", "Configuration file")
  .option("-t, --threshold <percent>", "Minimum queue-count change to report", parseThreshold)
  .option("--no-change-detection", "Skip change detection and leave the baseline untouched")
  .action(runCommand);

program
  .command("diff")
  .description("Compare two enriched tree files")
  .argument("<current>", "Current enriched tree")
  .argument("<baseline>", "Baseline enriched tree")
  .option("-t, --threshold <percent>", "Minimum queue-count change to report", parseThreshold)
  .option("--json", "Print the full change set as JSON")
  .action(diffCommand);

program
  .command("gateways")
  .description("Gateway analytics for an enriched tree file")
  .argument("<tree>", "Enriched tree")
  .option("--json", "Print the full analytics as JSON")
  .action(gatewaysCommand);

program
  .command("status")
  .description("Show configuration and which input files are present")
  .option("-c, --config <path>", "Configuration file")
  .action(statusCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    const message = isTopologyError(error) ? error.toString() : error.message;
    console.error(chalk.red(`\nError: ${message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
