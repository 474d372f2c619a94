/**
 * Configuration Loading
 *
 * Reads `mq-topology.config.json` from the project root (or the path in
 * `MQ_TOPOLOGY_CONFIG`), validates it with zod and resolves every directory
 * and input file to an absolute path. An absent file yields the defaults.
 *
 * @module
 */

import * as path from "node:path";
import { ConfigurationError, ErrorCode } from "../core/errors.js";
import { fileExists, readJsonFile } from "./fs.js";
import { createLogger } from "./logger.js";
import { formatZodError, PipelineConfigSchema, type PipelineConfig } from "./validation.js";

const logger = createLogger("config");

export const CONFIG_FILE = "mq-topology.config.json";
export const DATA_DIR = "data";
export const PROCESSED_FILE = "mq_cmdb_processed.json";
export const BASELINE_FILE = "mq_cmdb_baseline.json";

export interface ResolvedPaths {
  root: string;
  configFile: string;
  inputDir: string;
  outputDir: string;
  logDir: string;
  dataDir: string;
  cmdbExport: string;
  orgHierarchy: string;
  appMapping: string;
  gateways: string;
  aliases: string;
  externalApps: string;
  processed: string;
  baseline: string;
}

export interface ResolvedConfig {
  config: PipelineConfig;
  paths: ResolvedPaths;
  /** False when no config file was found and defaults were used */
  fromFile: boolean;
}

export interface LoadConfigOptions {
  /** Explicit config file; wins over `MQ_TOPOLOGY_CONFIG` */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate the pipeline configuration.
 *
 * @throws ConfigurationError when the file is unreadable, is not valid JSON,
 * fails validation, or maps two record fields to the same column
 */
export async function loadConfig(
  projectRoot: string = process.cwd(),
  options: LoadConfigOptions = {}
): Promise<ResolvedConfig> {
  const env = options.env ?? process.env;
  const root = path.resolve(projectRoot);
  const configFile = path.resolve(root, options.configPath ?? env.MQ_TOPOLOGY_CONFIG ?? CONFIG_FILE);

  let raw: unknown = {};
  const fromFile = await fileExists(configFile);
  if (fromFile) {
    try {
      raw = await readJsonFile(configFile);
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read configuration: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.CONFIG_INVALID,
        { configPath: configFile }
      );
    }
  } else if (options.configPath) {
    throw new ConfigurationError("Configuration file not found", ErrorCode.CONFIG_INVALID, {
      configPath: configFile,
    });
  }

  const parsed = PipelineConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatZodError(parsed.error).join("; ")}`, ErrorCode.CONFIG_INVALID, {
      configPath: configFile,
    });
  }

  const config = parsed.data;
  if (env.MQ_TOPOLOGY_OUTPUT_DIR) {
    config.outputDir = env.MQ_TOPOLOGY_OUTPUT_DIR;
  }

  assertDistinctFieldMappings(config, configFile);

  const paths = resolvePaths(root, configFile, config);
  logger.debug({ configFile, fromFile, outputDir: paths.outputDir }, "Configuration loaded");

  return { config, paths, fromFile };
}

/**
 * Absolute locations of every directory and file the pipeline touches.
 */
export function resolvePaths(root: string, configFile: string, config: PipelineConfig): ResolvedPaths {
  const inputDir = path.resolve(root, config.inputDir);
  const outputDir = path.resolve(root, config.outputDir);
  const dataDir = path.join(outputDir, DATA_DIR);

  return {
    root,
    configFile,
    inputDir,
    outputDir,
    logDir: path.resolve(root, config.logDir),
    dataDir,
    cmdbExport: path.join(outputDir, config.files.cmdbExport),
    orgHierarchy: path.join(inputDir, config.files.orgHierarchy),
    appMapping: path.join(inputDir, config.files.appMapping),
    gateways: path.join(inputDir, config.files.gateways),
    aliases: path.join(inputDir, config.files.aliases),
    externalApps: path.join(inputDir, config.files.externalApps),
    processed: path.join(dataDir, PROCESSED_FILE),
    baseline: path.join(dataDir, BASELINE_FILE),
  };
}

function assertDistinctFieldMappings(config: PipelineConfig, configFile: string): void {
  const seen = new Map<string, string>();
  for (const [field, column] of Object.entries(config.fieldMappings)) {
    const previous = seen.get(column);
    if (previous !== undefined) {
      throw new ConfigurationError(
        `Field mappings "${previous}" and "${field}" both read column "${column}"`,
        ErrorCode.CONFIG_FIELD_MAPPING_INVALID,
        { configPath: configFile }
      );
    }
    seen.set(column, field);
  }
}
