/**
 * gateways command - Gateway analytics for an enriched tree file
 */

import chalk from "chalk";
import { GatewayAnalyzer } from "../../core/analytics/index.js";
import { createLogger } from "../../utils/logger.js";
import { readJsonArgument, rule } from "./shared.js";

const logger = createLogger("gateways");

export interface GatewaysOptions {
  json?: boolean;
}

export async function gatewaysCommand(treePath: string, options: GatewaysOptions): Promise<void> {
  logger.info({ treePath }, "Analyzing gateways");

  const analyzer = new GatewayAnalyzer(await readJsonArgument(treePath));
  if (analyzer.gatewayCount === 0) {
    console.log(chalk.yellow("No gateways found in tree."));
    return;
  }

  const analytics = analyzer.analyze();
  if (options.json) {
    console.log(JSON.stringify(analytics, null, 2));
    return;
  }

  const { summary, redundancy_analysis: redundancy } = analytics;
  console.log();
  console.log(chalk.cyan.bold("Gateway Analytics"));
  console.log(chalk.dim(rule()));
  console.log(`  Gateways:      ${summary.total_gateways}`);
  console.log(`  Internal:      ${summary.internal_gateways}`);
  console.log(`  External:      ${summary.external_gateways}`);
  console.log(`  Connections:   ${summary.total_gateway_connections}`);

  console.log();
  if (redundancy.spof_count === 0) {
    console.log(chalk.green("All gateway routes are redundant"));
  } else {
    console.log(chalk.red.bold(`Single points of failure (${redundancy.spof_count})`));
    for (const spof of redundancy.single_points_of_failure) {
      console.log(`  ${chalk.red("✗")} ${spof.route} ${chalk.dim(`[${spof.type}]`)} via ${spof.gateway}`);
    }
  }
  console.log();
}
