/**
 * status command - Show configuration and which inputs are present
 */

import * as path from "node:path";
import chalk from "chalk";
import { loadConfig } from "../../utils/config.js";
import { fileExistsSync } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import { rule } from "./shared.js";

const logger = createLogger("status");

export interface StatusOptions {
  config?: string;
}

export async function statusCommand(options: StatusOptions): Promise<void> {
  const { config, paths, fromFile } = await loadConfig(process.cwd(), { configPath: options.config });
  logger.info({ configFile: paths.configFile, fromFile }, "Checking status");

  const show = (filePath: string): string => chalk.dim(path.relative(paths.root, filePath) || ".");
  const mark = (filePath: string, required = false): string => {
    if (fileExistsSync(filePath)) return chalk.green("✓");
    return required ? chalk.red("✗") : chalk.yellow("–");
  };

  console.log();
  console.log(chalk.cyan.bold("MQ Topology Status"));
  console.log(chalk.dim(rule()));

  console.log();
  console.log(chalk.white.bold("Configuration"));
  console.log(`  File:          ${fromFile ? show(paths.configFile) : chalk.dim("(defaults)")}`);
  console.log(`  Input dir:     ${show(paths.inputDir)}`);
  console.log(`  Output dir:    ${show(paths.outputDir)}`);
  console.log(`  Threshold:     ${config.changeThresholdPercent}%`);
  console.log(`  Change detection:  ${config.enableChangeDetection ? "on" : "off"}`);
  console.log(`  Gateway analytics: ${config.enableGatewayAnalytics ? "on" : "off"}`);

  console.log();
  console.log(chalk.white.bold("Inputs"));
  console.log(`  ${mark(paths.cmdbExport, true)} CMDB export       ${show(paths.cmdbExport)}`);
  console.log(`  ${mark(paths.orgHierarchy)} Org hierarchy     ${show(paths.orgHierarchy)}`);
  console.log(`  ${mark(paths.appMapping)} App mapping       ${show(paths.appMapping)}`);
  console.log(`  ${mark(paths.gateways)} Gateways          ${show(paths.gateways)}`);
  console.log(`  ${mark(paths.aliases)} Aliases           ${show(paths.aliases)}`);
  console.log(`  ${mark(paths.externalApps)} External apps     ${show(paths.externalApps)}`);

  console.log();
  console.log(chalk.white.bold("State"));
  console.log(`  ${mark(paths.processed)} Processed tree    ${show(paths.processed)}`);
  console.log(`  ${mark(paths.baseline)} Baseline          ${show(paths.baseline)}`);
  console.log();
}
