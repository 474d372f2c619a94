/**
 * diff command - Compare two enriched tree files
 */

import chalk from "chalk";
import { ChangeDetector } from "../../core/changes/index.js";
import { createLogger } from "../../utils/logger.js";
import { readJsonArgument, rule } from "./shared.js";

const logger = createLogger("diff");

export interface DiffOptions {
  threshold?: number;
  json?: boolean;
}

export async function diffCommand(currentPath: string, baselinePath: string, options: DiffOptions): Promise<void> {
  logger.info({ currentPath, baselinePath, options }, "Comparing trees");

  const [current, baseline] = await Promise.all([readJsonArgument(currentPath), readJsonArgument(baselinePath)]);
  const changes = new ChangeDetector({ thresholdPercent: options.threshold }).compare(current, baseline);

  if (options.json) {
    console.log(JSON.stringify(changes, null, 2));
    return;
  }

  const { summary } = changes;
  console.log();
  console.log(chalk.cyan.bold("Change Summary"));
  console.log(chalk.dim(rule()));
  console.log(`  Managers added:       ${summary.mqmanagers_added}`);
  console.log(`  Managers removed:     ${summary.mqmanagers_removed}`);
  console.log(`  Managers modified:    ${summary.mqmanagers_modified}`);
  console.log(`  Connections added:    ${summary.connections_added}`);
  console.log(`  Connections removed:  ${summary.connections_removed}`);
  console.log(`  Gateways added:       ${summary.gateways_added}`);
  console.log(`  Gateways removed:     ${summary.gateways_removed}`);
  console.log(`  Gateways modified:    ${summary.gateways_modified}`);
  console.log(`  Queue count changes:  ${summary.queue_count_changes}`);
  console.log(chalk.dim(rule()));
  console.log(`  ${chalk.white.bold("Total:")} ${summary.total_changes}`);

  for (const manager of changes.mqmanagers.added) {
    console.log(`  ${chalk.green("+")} ${manager.name} ${chalk.dim(`(${manager.organization})`)}`);
  }
  for (const manager of changes.mqmanagers.removed) {
    console.log(`  ${chalk.red("-")} ${manager.name} ${chalk.dim(`(${manager.organization})`)}`);
  }
  for (const change of changes.queue_counts) {
    console.log(
      `  ${chalk.yellow("~")} ${change.mqmanager} ${change.queue_type}: ` +
        `${change.old_count} → ${change.new_count} (${change.change_percent}%)`
    );
  }
  console.log();
}

