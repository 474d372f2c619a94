/**
 * Change Detector
 *
 * Structural diff between two enriched trees. Both trees are flattened to
 * `{managerName -> node}` first; manager names are unique across a tree, and
 * when they are not the last occurrence wins.
 *
 * Connections are diffed on outbound edges (manager and extra) only. Inbound
 * edges mirror them and would be counted twice.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { ChangeDetectionError, ErrorCode } from "../errors.js";
import { parseEnrichedTree } from "../hierarchy/tree-schema.js";
import { flattenTree } from "../hierarchy/tree-walk.js";
import type { EnrichedNode } from "../hierarchy/types.js";
import {
  COMPARED_FIELDS,
  QUEUE_TYPES,
  type ChangeDetectorOptions,
  type ChangeSet,
  type ChangeSummary,
  type ConnectionChange,
  type ManagerModified,
  type QueueCountChange,
} from "./types.js";

const logger = createLogger("change-detector");

export const DEFAULT_CHANGE_THRESHOLD_PERCENT = 20;

type FlatTree = ReadonlyMap<string, EnrichedNode>;

interface Connection {
  source: string;
  target: string;
}

/**
 * Compares a current enriched tree against a baseline.
 *
 * Stateless: every `compare` call builds a fresh ChangeSet.
 *
 * @example
 * ```typescript
 * const detector = new ChangeDetector({ thresholdPercent: 25 });
 * const changes = detector.compare(currentTree, baselineTree);
 * console.log(changes.summary.total_changes);
 * ```
 */
export class ChangeDetector {
  readonly thresholdPercent: number;

  constructor(options: ChangeDetectorOptions = {}) {
    const threshold = options.thresholdPercent ?? DEFAULT_CHANGE_THRESHOLD_PERCENT;
    if (!Number.isFinite(threshold) || threshold < 0) {
      throw new ChangeDetectionError(`Change threshold must be a non-negative number, got ${threshold}`, ErrorCode.INVALID_ARGUMENT);
    }
    this.thresholdPercent = threshold;
  }

  /**
   * @throws InputShapeError when either tree is not a mapping or holds a
   * malformed organization
   */
  compare(current: unknown, baseline: unknown): ChangeSet {
    const currentManagers = flattenTree(parseEnrichedTree(current, { label: "current tree", strict: true }));
    const baselineManagers = flattenTree(parseEnrichedTree(baseline, { label: "baseline tree", strict: true }));

    const mqmanagers = this.diffManagers(currentManagers, baselineManagers);
    const connections = this.diffConnections(currentManagers, baselineManagers);
    const gateways = this.diffGateways(currentManagers, baselineManagers);
    const queueCounts = this.diffQueueCounts(currentManagers, baselineManagers);

    const summary = summarize({ mqmanagers, connections, gateways, queue_counts: queueCounts });
    logger.info(
      { ...summary, currentManagers: currentManagers.size, baselineManagers: baselineManagers.size },
      "Change detection complete"
    );

    return { mqmanagers, connections, gateways, queue_counts: queueCounts, summary };
  }

  // ===========================================================================
  // Managers
  // ===========================================================================

  private diffManagers(current: FlatTree, baseline: FlatTree): ChangeSet["mqmanagers"] {
    const added = difference(current, baseline).map((name) => {
      const node = requireNode(current, name);
      return {
        name,
        organization: node.Organization,
        department: node.Department,
        application: node.Application,
        is_gateway: node.IsGateway,
      };
    });

    const removed = difference(baseline, current).map((name) => {
      const node = requireNode(baseline, name);
      return {
        name,
        organization: node.Organization,
        department: node.Department,
        application: node.Application,
      };
    });

    const modified: ManagerModified[] = [];
    for (const name of intersection(current, baseline)) {
      const curr = requireNode(current, name);
      const base = requireNode(baseline, name);
      const changes: ManagerModified["changes"] = {};
      let changed = false;
      for (const field of COMPARED_FIELDS) {
        if (curr[field] !== base[field]) {
          changes[field] = { old: base[field], new: curr[field] };
          changed = true;
        }
      }
      if (changed) modified.push({ name, changes });
    }

    return { added, removed, modified };
  }

  // ===========================================================================
  // Connections
  // ===========================================================================

  private diffConnections(current: FlatTree, baseline: FlatTree): ChangeSet["connections"] {
    const currentEdges = collectConnections(current);
    const baselineEdges = collectConnections(baseline);

    const describe = (managers: FlatTree, { source, target }: Connection): ConnectionChange => ({
      source,
      target,
      source_org: managers.get(source)?.Organization ?? "",
      target_org: managers.get(target)?.Organization ?? "",
    });

    return {
      added: sortedDifference(currentEdges, baselineEdges).map((edge) => describe(current, edge)),
      removed: sortedDifference(baselineEdges, currentEdges).map((edge) => describe(baseline, edge)),
    };
  }

  // ===========================================================================
  // Gateways
  // ===========================================================================

  private diffGateways(current: FlatTree, baseline: FlatTree): ChangeSet["gateways"] {
    const currentGateways = gatewaysOf(current);
    const baselineGateways = gatewaysOf(baseline);

    const added = difference(currentGateways, baselineGateways).map((name) => {
      const node = requireNode(currentGateways, name);
      return {
        name,
        scope: node.GatewayScope,
        organization: node.Organization,
        department: node.Department,
      };
    });

    const removed = difference(baselineGateways, currentGateways).map((name) => {
      const node = requireNode(baselineGateways, name);
      return { name, scope: node.GatewayScope, organization: node.Organization };
    });

    const modified = intersection(currentGateways, baselineGateways).flatMap((name) => {
      const oldScope = requireNode(baselineGateways, name).GatewayScope;
      const newScope = requireNode(currentGateways, name).GatewayScope;
      return oldScope === newScope ? [] : [{ name, old_scope: oldScope, new_scope: newScope }];
    });

    return { added, removed, modified };
  }

  // ===========================================================================
  // Queue Counts
  // ===========================================================================

  private diffQueueCounts(current: FlatTree, baseline: FlatTree): QueueCountChange[] {
    const changes: QueueCountChange[] = [];

    for (const name of intersection(current, baseline)) {
      const curr = requireNode(current, name);
      const base = requireNode(baseline, name);

      for (const queueType of QUEUE_TYPES) {
        const field = `${queueType}_count` as const;
        const percent = percentChange(base[field], curr[field]);
        if (percent === undefined || percent < this.thresholdPercent) continue;

        changes.push({
          mqmanager: name,
          queue_type: queueType,
          old_count: base[field],
          new_count: curr[field],
          change_percent: Math.round(percent * 10) / 10,
        });
      }
    }

    return changes;
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Percent change from `oldCount` to `newCount`. Undefined for 0 -> 0; any
 * change to or from zero is 100.
 */
export function percentChange(oldCount: number, newCount: number): number | undefined {
  if (oldCount === 0 && newCount === 0) return undefined;
  if (oldCount === 0 || newCount === 0) return 100;
  return (Math.abs(newCount - oldCount) * 100) / oldCount;
}

function summarize(changes: Omit<ChangeSet, "summary">): ChangeSummary {
  const counts = {
    mqmanagers_added: changes.mqmanagers.added.length,
    mqmanagers_removed: changes.mqmanagers.removed.length,
    mqmanagers_modified: changes.mqmanagers.modified.length,
    connections_added: changes.connections.added.length,
    connections_removed: changes.connections.removed.length,
    gateways_added: changes.gateways.added.length,
    gateways_removed: changes.gateways.removed.length,
    gateways_modified: changes.gateways.modified.length,
    queue_count_changes: changes.queue_counts.length,
  };
  const total = Object.values(counts).reduce((sum, count) => sum + count, 0);
  return { ...counts, total_changes: total };
}

function requireNode(managers: FlatTree, name: string): EnrichedNode {
  const node = managers.get(name);
  if (!node) {
    throw new ChangeDetectionError(`Manager ${name} vanished during comparison`);
  }
  return node;
}

function difference(left: FlatTree, right: FlatTree): string[] {
  return [...left.keys()].filter((name) => !right.has(name)).sort();
}

function intersection(left: FlatTree, right: FlatTree): string[] {
  return [...left.keys()].filter((name) => right.has(name)).sort();
}

function gatewaysOf(managers: FlatTree): Map<string, EnrichedNode> {
  return new Map([...managers].filter(([, node]) => node.IsGateway));
}

function connectionKey(source: string, target: string): string {
  return JSON.stringify([source, target]);
}

function collectConnections(managers: FlatTree): Map<string, Connection> {
  const edges = new Map<string, Connection>();
  for (const [source, node] of managers) {
    for (const target of [...node.outbound, ...node.outbound_extra]) {
      edges.set(connectionKey(source, target), { source, target });
    }
  }
  return edges;
}

function sortedDifference(left: Map<string, Connection>, right: Map<string, Connection>): Connection[] {
  return [...left]
    .filter(([key]) => !right.has(key))
    .map(([, edge]) => edge)
    .sort((a, b) => compareStrings(a.source, b.source) || compareStrings(a.target, b.target));
}

function compareStrings(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
