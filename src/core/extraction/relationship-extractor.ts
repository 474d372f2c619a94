/**
 * Relationship Extractor
 *
 * Turns flat CMDB rows into the directed queue-manager graph.
 *
 * Two-Pass Architecture:
 * - Pass 1 (buildManagerIndex): collect every manager name and its directorate
 * - Pass 2 (this file): classify each asset remainder as a manager, a known
 *   application or an unresolved endpoint, and record queue counts
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { ErrorCode, InputShapeError } from "../errors.js";
import { ManagerGraphBuilder } from "../graph-builder/manager-graph.js";
import type { Direction, GraphSnapshot } from "../graph-builder/types.js";
import {
  classifyQueueType,
  extractRemainder,
  normalizeRecord,
  parseRole,
  splitTokens,
} from "./asset-parser.js";
import { buildManagerIndex, type ManagerIndex } from "./manager-index.js";
import { ReferenceIndex, type ReferenceTables } from "./reference-index.js";
import {
  DEFAULT_FIELD_MAPPINGS,
  createEmptyStats,
  type CmdbRecord,
  type FieldMappings,
  type ProcessingStats,
  type RemainderTarget,
} from "./types.js";

const logger = createLogger("extraction");

// =============================================================================
// Options & Results
// =============================================================================

export interface ExtractorOptions {
  fieldMappings?: Partial<FieldMappings>;
  /** Prebuilt index, or the raw tables to build one from */
  reference?: ReferenceIndex | ReferenceTables;
}

export interface ExtractionResult {
  graph: ManagerGraphBuilder;
  snapshot: GraphSnapshot;
  stats: ProcessingStats;
}

// =============================================================================
// Relationship Extractor
// =============================================================================

/**
 * @example
 * ```typescript
 * const extractor = new RelationshipExtractor(rows, {
 *   reference: { aliases, internalApplications, externalApplications },
 * });
 * const { snapshot, stats } = extractor.extract();
 * ```
 */
export class RelationshipExtractor {
  private readonly records: readonly CmdbRecord[];
  private readonly reference: ReferenceIndex;
  private readonly fieldMappings: FieldMappings;
  private readonly skippedRecords: number;
  private readonly totalRecords: number;

  /**
   * @throws InputShapeError when `rawRecords` is not a non-empty array
   */
  constructor(rawRecords: unknown, options: ExtractorOptions = {}) {
    if (!Array.isArray(rawRecords)) {
      throw new InputShapeError(
        `CMDB records must be a list, got ${rawRecords === null ? "null" : typeof rawRecords}`,
        ErrorCode.INPUT_NOT_A_LIST
      );
    }
    if (rawRecords.length === 0) {
      throw new InputShapeError("CMDB record list is empty", ErrorCode.INPUT_EMPTY);
    }

    this.fieldMappings = { ...DEFAULT_FIELD_MAPPINGS, ...options.fieldMappings };
    this.reference =
      options.reference instanceof ReferenceIndex
        ? options.reference
        : ReferenceIndex.build(options.reference);

    const records: CmdbRecord[] = [];
    for (const raw of rawRecords) {
      const record = normalizeRecord(raw, this.fieldMappings);
      if (record) records.push(record);
    }

    this.records = records;
    this.totalRecords = rawRecords.length;
    this.skippedRecords = rawRecords.length - records.length;

    logger.info(
      { records: this.totalRecords, skipped: this.skippedRecords },
      "Relationship extractor initialized"
    );
  }

  /**
   * Pass 1. Exposed for diagnostics; `extract()` calls it itself.
   */
  buildIndex(): ManagerIndex {
    const index = buildManagerIndex(this.records, this.reference);
    logger.info({ managers: index.size }, "Manager index built");
    return index;
  }

  /**
   * Run both passes and return a fresh graph. Safe to call repeatedly.
   */
  extract(): ExtractionResult {
    const index = this.buildIndex();
    const graph = new ManagerGraphBuilder(index);
    const stats = createEmptyStats(this.totalRecords);
    stats.skippedRecords = this.skippedRecords;

    for (const record of this.records) {
      this.processRecord(record, index, graph, stats);
    }

    logger.info({ stats, managers: graph.size }, "Relationship extraction complete");

    return { graph, snapshot: graph.toSnapshot(), stats };
  }

  // ===========================================================================
  // Pass 2
  // ===========================================================================

  private processRecord(
    record: CmdbRecord,
    index: ManagerIndex,
    graph: ManagerGraphBuilder,
    stats: ProcessingStats
  ): void {
    const self = index.canonicalize(record.managerName);
    if (self.viaAlias) stats.aliasesResolved++;

    graph.node(self.key);

    const queueType = classifyQueueType(record.assetType);
    if (queueType) {
      graph.countQueue(self.key, queueType);
    }

    const role = parseRole(record.role);
    if (!role || !record.assetName) return;

    const direction: Direction = role === "SENDER" ? "outbound" : "inbound";
    if (role === "SENDER") {
      stats.processedSender++;
    } else {
      stats.processedReceiver++;
    }

    const remainder = extractRemainder(record.assetName, record.managerName);
    if (!remainder) return;

    const target = this.classifyRemainder(remainder, self.key, index, stats);
    if (!target) return;

    switch (target.kind) {
      case "manager":
        if (direction === "outbound") {
          graph.addConnection(self.key, target.name);
          stats.outboundFound++;
        } else {
          graph.addConnection(target.name, self.key);
          stats.inboundFound++;
        }
        if (target.viaAlias) stats.aliasesResolved++;
        break;

      case "application":
        graph.addApplication(self.key, direction, target);
        if (direction === "outbound") {
          stats.outboundAppsFound++;
        } else {
          stats.inboundAppsFound++;
        }
        break;

      case "extra":
        graph.addExtra(self.key, direction, target.value);
        if (direction === "outbound") {
          stats.outboundExtraFound++;
        } else {
          stats.inboundExtraFound++;
        }
        break;
    }
  }

  /**
   * Manager tokens win over applications; anything else is an unresolved
   * endpoint kept verbatim. For manager targets `name` is the index key.
   * Null when the whole remainder names the record's own manager.
   */
  private classifyRemainder(
    remainder: string,
    selfKey: string,
    index: ManagerIndex,
    stats: ProcessingStats
  ): RemainderTarget | null {
    const tokens = splitTokens(remainder);

    const { match, sawSelf } = index.findManager(tokens, remainder, selfKey);
    if (match) {
      return { kind: "manager", name: match.key, viaAlias: match.viaAlias };
    }
    if (sawSelf) stats.selfReferencesDropped++;
    if (sawSelf && index.resolve(remainder)?.key === selfKey) {
      return null;
    }

    for (const candidate of [remainder, ...tokens]) {
      const application = this.reference.lookupApplication(candidate);
      if (application) {
        return { kind: "application", name: application.name, scope: application.scope };
      }
    }

    return { kind: "extra", value: remainder };
  }

  // ===========================================================================
  // Diagnostics
  // ===========================================================================

  get recordCount(): number {
    return this.records.length;
  }
}

/**
 * Log the statistics block operators read after a run.
 */
export function logProcessingStats(stats: ProcessingStats): void {
  logger.info(
    {
      totalRecords: stats.totalRecords,
      skippedRecords: stats.skippedRecords,
      senderRecords: stats.processedSender,
      receiverRecords: stats.processedReceiver,
      inboundConnections: stats.inboundFound,
      outboundConnections: stats.outboundFound,
      inboundExtra: stats.inboundExtraFound,
      outboundExtra: stats.outboundExtraFound,
      inboundApps: stats.inboundAppsFound,
      outboundApps: stats.outboundAppsFound,
      aliasesResolved: stats.aliasesResolved,
      selfReferencesDropped: stats.selfReferencesDropped,
    },
    "Processing statistics"
  );
}
