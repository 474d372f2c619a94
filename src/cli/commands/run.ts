/**
 * run command - Execute the full topology pipeline
 */

import * as path from "node:path";
import chalk from "chalk";
import ora, { type Ora } from "ora";
import { TopologyPipeline, type PipelineProgressEvent } from "../../core/pipeline/index.js";
import { loadConfig } from "../../utils/config.js";
import { createLogger } from "../../utils/logger.js";
import { formatDuration, rule } from "./shared.js";

const logger = createLogger("run");

export interface RunOptions {
  config?: string;
  threshold?: number;
  /** False when `--no-change-detection` is given */
  changeDetection?: boolean;
}

export async function runCommand(options: RunOptions): Promise<void> {
  logger.info({ options }, "Starting pipeline run");

  const resolved = await loadConfig(process.cwd(), { configPath: options.config });

  console.log();
  console.log(chalk.cyan.bold("MQ Topology Pipeline"));
  console.log(chalk.dim(rule()));
  console.log();

  const spinner = ora("Initializing...").start();
  const pipeline = new TopologyPipeline(resolved, {
    thresholdPercent: options.threshold,
    enableChangeDetection: options.changeDetection === false ? false : undefined,
    onProgress: (event) => updateSpinner(spinner, event),
    logger: createLogger("pipeline", { enableFileLogging: true, logDir: resolved.paths.logDir }),
  });

  const result = await pipeline.run();

  if (!result.success) {
    spinner.fail(chalk.red("Pipeline failed"));
    console.log(chalk.red(`  ${result.error?.toString() ?? "Unknown error"}`));
    process.exitCode = 1;
    return;
  }

  if (result.warnings.length > 0) {
    spinner.warn(chalk.yellow("Pipeline completed with warnings"));
  } else {
    spinner.succeed(chalk.green("Pipeline complete!"));
  }

  if (result.summary) {
    const summary = result.summary;
    console.log();
    console.log(chalk.white.bold("Summary"));
    console.log(`  Organizations:     ${summary.organizations}`);
    console.log(`  Departments:       ${summary.departments}`);
    console.log(`  Business owners:   ${summary.businessOwners}`);
    console.log(`  Applications:      ${summary.applications}`);
    console.log(`  MQ managers:       ${summary.managers}`);
    console.log(`  Total QLocal:      ${summary.totalQLocal}`);
    console.log(`  Total QRemote:     ${summary.totalQRemote}`);
    console.log(`  Total QAlias:      ${summary.totalQAlias}`);
    console.log(`  Connections:       ${summary.totalConnections}`);
    console.log(`  Duration:          ${formatDuration(result.durationMs)}`);
  }

  console.log();
  if (result.changes) {
    console.log(`${chalk.white.bold("Changes:")} ${result.changes.summary.total_changes} since baseline`);
  } else if (result.baselineUpdated) {
    console.log(chalk.dim("First run: baseline created"));
  }
  if (result.gatewayAnalytics) {
    const { summary, redundancy_analysis: redundancy } = result.gatewayAnalytics;
    console.log(
      `${chalk.white.bold("Gateways:")} ${summary.total_gateways} analyzed, ` +
        `${redundancy.spof_count} single point(s) of failure`
    );
  }

  if (result.warnings.length > 0) {
    console.log();
    console.log(chalk.yellow.bold(`Warnings (${result.warnings.length})`));
    for (const warning of result.warnings) {
      console.log(`  ${chalk.yellow("⚠")} ${warning}`);
    }
  }

  console.log();
  console.log(chalk.white.bold("Outputs"));
  for (const output of result.outputs) {
    console.log(`  ${chalk.dim(path.relative(process.cwd(), output))}`);
  }
  console.log();
  console.log(chalk.dim(rule()));

  logger.info({ outputs: result.outputs.length, warnings: result.warnings.length }, "Pipeline run finished");
}

function updateSpinner(spinner: Ora, event: PipelineProgressEvent): void {
  spinner.text = `${event.message}...`;
}
