/**
 * Topology Pipeline
 *
 * Orchestrates a full run: Cleanup → Load → Deduplicate → Extract → Enrich →
 * Write → Detect Changes → Analyze Gateways → Summarize.
 *
 * Loading the CMDB export and building the tree are fatal when they fail.
 * Everything after the processed tree is written is best-effort: failures
 * are logged and collected as warnings.
 *
 * The baseline is replaced only when no baseline existed or the diff against
 * it succeeded, so a failed diff can be retried against the same baseline.
 *
 * @module
 */

import * as path from "node:path";
import type { ResolvedConfig } from "../../utils/config.js";
import { cleanupOutputDirectory, fileExists, readJsonFile, writeJsonFile } from "../../utils/fs.js";
import { createChildLogger, createLogger, type Logger } from "../../utils/logger.js";
import { GatewayAnalyzer } from "../analytics/gateway-analyzer.js";
import type { GatewayAnalytics } from "../analytics/types.js";
import { ChangeDetector } from "../changes/change-detector.js";
import type { ChangeSet } from "../changes/types.js";
import { ChangeDetectionError, ErrorCode, InputShapeError, wrapError, type TopologyError } from "../errors.js";
import { AssetDeduplicator } from "../extraction/deduplication.js";
import { ReferenceIndex } from "../extraction/reference-index.js";
import { logProcessingStats, RelationshipExtractor } from "../extraction/relationship-extractor.js";
import type { ProcessingStats } from "../extraction/types.js";
import { HierarchyEnricher } from "../hierarchy/hierarchy-enricher.js";
import { summarizeTree, type TreeSummary } from "../hierarchy/tree-summary.js";
import type { EnrichedTree } from "../hierarchy/types.js";
import { internalApplicationsOf, loadReferenceData } from "../reference/reference-loader.js";

const baseLogger = createLogger("pipeline");

// =============================================================================
// Types
// =============================================================================

export type PipelinePhase =
  | "cleanup"
  | "loading"
  | "deduplicating"
  | "extracting"
  | "enriching"
  | "writing"
  | "detecting-changes"
  | "analyzing-gateways"
  | "complete";

export interface PipelineProgressEvent {
  phase: PipelinePhase;
  message: string;
}

export interface PipelineOptions {
  /** Overrides `changeThresholdPercent` from the config */
  thresholdPercent?: number;
  /** Overrides `enableChangeDetection` from the config */
  enableChangeDetection?: boolean;
  /** Clock for output timestamps and cleanup age */
  now?: () => Date;
  onProgress?: (event: PipelineProgressEvent) => void;
  /** Parent logger for the run; defaults to the console logger */
  logger?: Logger;
}

export interface PipelineResult {
  success: boolean;
  /** Set when the run aborted */
  error?: TopologyError;
  summary: TreeSummary | null;
  stats: ProcessingStats | null;
  /** Null when no baseline existed, detection was disabled, or the diff failed */
  changes: ChangeSet | null;
  /** Null when there are no gateways or analytics failed */
  gatewayAnalytics: GatewayAnalytics | null;
  baselineUpdated: boolean;
  warnings: string[];
  /** Files written by this run */
  outputs: string[];
  durationMs: number;
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * @example
 * ```typescript
 * const resolved = await loadConfig(process.cwd());
 * const result = await new TopologyPipeline(resolved).run();
 * if (!result.success) console.error(result.error?.message);
 * ```
 */
export class TopologyPipeline {
  private readonly logger: Logger;

  constructor(
    private readonly resolved: ResolvedConfig,
    private readonly options: PipelineOptions = {}
  ) {
    this.logger = createChildLogger(options.logger ?? baseLogger, { outputDir: resolved.paths.outputDir });
  }

  async run(): Promise<PipelineResult> {
    const startedAt = Date.now();
    const now = this.options.now?.() ?? new Date();
    const timestamp = formatRunTimestamp(now);

    const result: PipelineResult = {
      success: false,
      summary: null,
      stats: null,
      changes: null,
      gatewayAnalytics: null,
      baselineUpdated: false,
      warnings: [],
      outputs: [],
      durationMs: 0,
    };

    try {
      await this.cleanup(now, result);

      const { tree, stats } = await this.buildTree(result);
      result.stats = stats;

      this.progress("writing", "Writing processed tree");
      await writeJsonFile(this.resolved.paths.processed, tree);
      result.outputs.push(this.resolved.paths.processed);
      this.logger.info({ file: this.resolved.paths.processed }, "Enriched tree saved");

      await this.detectChanges(tree, timestamp, result);
      await this.analyzeGateways(tree, timestamp, result);

      result.summary = summarizeTree(tree);
      result.success = true;
      this.logger.info({ summary: result.summary, warnings: result.warnings.length }, "Pipeline completed");
    } catch (error) {
      result.error = wrapError(error, "Pipeline failed");
      this.logger.error({ err: result.error }, "Pipeline aborted");
    }

    result.durationMs = Date.now() - startedAt;
    this.progress("complete", result.success ? "Pipeline completed" : "Pipeline aborted");
    return result;
  }

  // ===========================================================================
  // Steps
  // ===========================================================================

  private async cleanup(now: Date, result: PipelineResult): Promise<void> {
    const { cleanup } = this.resolved.config;
    if (!cleanup.enabled) return;

    this.progress("cleanup", "Removing old outputs");
    try {
      const cleaned = await cleanupOutputDirectory(
        this.resolved.paths.outputDir,
        cleanup.retentionDays,
        cleanup.patterns,
        now
      );
      if (cleaned.totalDeleted > 0) {
        this.logger.info({ deleted: cleaned.totalDeleted }, "Old outputs removed");
      }
      for (const message of cleaned.errors) {
        this.warn("Cleanup", message, result);
      }
    } catch (error) {
      this.warn("Cleanup", error, result);
    }
  }

  private async buildTree(result: PipelineResult): Promise<{ tree: EnrichedTree; stats: ProcessingStats }> {
    const { config, paths } = this.resolved;

    this.progress("loading", "Loading CMDB export");
    if (!(await fileExists(paths.cmdbExport))) {
      throw new InputShapeError(`CMDB export not found: ${paths.cmdbExport}`, ErrorCode.INPUT_FILE_NOT_FOUND, {
        filePath: paths.cmdbExport,
      });
    }

    let records: unknown;
    try {
      records = await readJsonFile(paths.cmdbExport);
    } catch (error) {
      throw wrapError(error, "Cannot read CMDB export", ErrorCode.FILE_SYSTEM_ERROR);
    }

    const reference = await loadReferenceData(paths);
    result.warnings.push(...reference.warnings.map((message) => `Reference data: ${message}`));

    if (config.dedup.enabled && Array.isArray(records)) {
      this.progress("deduplicating", "Collapsing duplicate assets");
      const deduplicator = new AssetDeduplicator({
        assetField: config.dedup.assetField,
        assetTypeField: config.fieldMappings.assetType,
        ignoreType: config.dedup.ignoreType,
      });
      const deduplicated = deduplicator.deduplicate<unknown>(records);
      this.logger.info({ before: records.length, after: deduplicated.length }, "Assets deduplicated");
      records = deduplicated;
    }

    this.progress("extracting", "Extracting manager relationships");
    const referenceIndex = ReferenceIndex.build({
      aliases: reference.data.aliases,
      internalApplications: internalApplicationsOf(reference.data.appMapping),
      externalApplications: reference.data.externalApplications,
    });
    const extractor = new RelationshipExtractor(records, {
      fieldMappings: config.fieldMappings,
      reference: referenceIndex,
    });
    this.logger.debug({ usableRecords: extractor.recordCount }, "Records normalized");
    const { snapshot, stats } = extractor.extract();
    logProcessingStats(stats);

    this.progress("enriching", "Enriching with organizational hierarchy");
    const enricher = new HierarchyEnricher(
      {
        orgHierarchy: reference.data.orgHierarchy,
        appMapping: reference.data.appMapping,
        gateways: reference.data.gateways,
      },
      referenceIndex
    );
    const { tree } = enricher.enrich(snapshot);

    return { tree, stats };
  }

  private async detectChanges(tree: EnrichedTree, timestamp: string, result: PipelineResult): Promise<void> {
    const enabled = this.options.enableChangeDetection ?? this.resolved.config.enableChangeDetection;
    if (!enabled) {
      this.logger.info("Change detection disabled, baseline left untouched");
      return;
    }

    this.progress("detecting-changes", "Comparing against baseline");
    const { baseline, dataDir } = this.resolved.paths;
    const baselineExists = await fileExists(baseline);
    let diffSucceeded = false;

    if (baselineExists) {
      try {
        const baselineTree = await readBaseline(baseline);
        const detector = new ChangeDetector({
          thresholdPercent: this.options.thresholdPercent ?? this.resolved.config.changeThresholdPercent,
        });
        const changes = detector.compare(tree, baselineTree);

        const changesFile = path.join(dataDir, `changes_${timestamp}.json`);
        await writeJsonFile(changesFile, changes);
        result.outputs.push(changesFile);
        result.changes = changes;
        diffSucceeded = true;
        this.logger.info({ totalChanges: changes.summary.total_changes, file: changesFile }, "Changes detected");
      } catch (error) {
        this.warn("Change detection", error, result);
      }
    } else {
      this.logger.warn("No baseline found, this run becomes the first baseline");
    }

    if (!baselineExists || diffSucceeded) {
      try {
        await writeJsonFile(baseline, tree);
        result.baselineUpdated = true;
        result.outputs.push(baseline);
        this.logger.info({ file: baseline }, "Baseline updated");
      } catch (error) {
        this.warn("Baseline update", error, result);
      }
    } else {
      this.logger.warn("Baseline not updated because change detection failed");
    }
  }

  private async analyzeGateways(tree: EnrichedTree, timestamp: string, result: PipelineResult): Promise<void> {
    if (!this.resolved.config.enableGatewayAnalytics) return;

    this.progress("analyzing-gateways", "Running gateway analytics");
    try {
      const analyzer = new GatewayAnalyzer(tree);
      if (analyzer.gatewayCount === 0) {
        this.logger.warn("No gateways found in data");
        return;
      }

      const analytics = analyzer.analyze();
      const analyticsFile = path.join(this.resolved.paths.dataDir, `gateway_analytics_${timestamp}.json`);
      await writeJsonFile(analyticsFile, analytics);
      result.outputs.push(analyticsFile);
      result.gatewayAnalytics = analytics;
    } catch (error) {
      this.warn("Gateway analytics", error, result);
    }
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private progress(phase: PipelinePhase, message: string): void {
    this.options.onProgress?.({ phase, message });
  }

  /**
   * Log a recoverable failure and record it as a warning.
   */
  private warn(step: string, error: unknown, result: PipelineResult): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger.warn({ step, err: error }, `${step} failed`);
    result.warnings.push(`${step}: ${message}`);
  }
}

async function readBaseline(filePath: string): Promise<unknown> {
  try {
    return await readJsonFile(filePath);
  } catch (error) {
    throw new ChangeDetectionError(
      `Baseline unreadable: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.BASELINE_UNREADABLE,
      { filePath }
    );
  }
}

/**
 * `YYYYMMDD_HHMMSS` in local time, used in output file names.
 */
export function formatRunTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
