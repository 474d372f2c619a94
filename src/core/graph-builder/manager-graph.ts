/**
 * Manager Graph Builder
 *
 * Accumulates per-record facts into a per-directorate map of queue-manager
 * nodes. Every resolved edge is written on both endpoints in one call, so the
 * inverse edge exists even when the peer lives in another directorate bucket.
 *
 * @module
 */

import type { KnownApplication, QueueType } from "../extraction/types.js";
import type {
  Direction,
  GraphSnapshot,
  ManagerSnapshot,
  NodePlacement,
  QueueManagerNode,
} from "./types.js";

function createNode(name: string, directorate: string): QueueManagerNode {
  return {
    name,
    directorate,
    qlocalCount: 0,
    qremoteCount: 0,
    qaliasCount: 0,
    totalCount: 0,
    inbound: new Set(),
    outbound: new Set(),
    inboundExtra: new Set(),
    outboundExtra: new Set(),
    inboundApps: new Set(),
    outboundApps: new Set(),
    inboundAppsExternal: new Set(),
    outboundAppsExternal: new Set(),
  };
}

function sorted(values: Set<string>): string[] {
  return [...values].sort();
}

/**
 * Builds the flat manager graph.
 *
 * @example
 * ```typescript
 * const builder = new ManagerGraphBuilder(index);
 * builder.countQueue("QM_A", "qremote");
 * builder.addConnection("QM_A", "QM_B"); // QM_A.outbound += QM_B, QM_B.inbound += QM_A
 * const snapshot = builder.toSnapshot();
 * ```
 */
export class ManagerGraphBuilder {
  private readonly nodes = new Map<string, QueueManagerNode>();

  constructor(private readonly placement: NodePlacement) {}

  // ===========================================================================
  // Mutation
  // ===========================================================================

  /**
   * Get or lazily create the node for a manager key. Nodes only exist once a
   * record references them.
   */
  node(key: string): QueueManagerNode {
    let node = this.nodes.get(key);
    if (!node) {
      node = createNode(this.placement.displayName(key), this.placement.directorateOf(key));
      this.nodes.set(key, node);
    }
    return node;
  }

  countQueue(key: string, type: QueueType): void {
    const node = this.node(key);
    switch (type) {
      case "qlocal":
        node.qlocalCount++;
        break;
      case "qremote":
        node.qremoteCount++;
        break;
      case "qalias":
        node.qaliasCount++;
        break;
    }
    node.totalCount++;
  }

  /**
   * Record `fromKey -> toKey` on both endpoints.
   */
  addConnection(fromKey: string, toKey: string): void {
    const from = this.node(fromKey);
    const to = this.node(toKey);
    from.outbound.add(to.name);
    to.inbound.add(from.name);
  }

  addExtra(key: string, direction: Direction, endpoint: string): void {
    const node = this.node(key);
    (direction === "outbound" ? node.outboundExtra : node.inboundExtra).add(endpoint);
  }

  addApplication(key: string, direction: Direction, application: KnownApplication): void {
    const node = this.node(key);
    const external = application.scope === "External";
    if (direction === "outbound") {
      (external ? node.outboundAppsExternal : node.outboundApps).add(application.name);
    } else {
      (external ? node.inboundAppsExternal : node.inboundApps).add(application.name);
    }
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  get size(): number {
    return this.nodes.size;
  }

  getNode(name: string): QueueManagerNode | undefined {
    return this.nodes.get(name.toUpperCase());
  }

  /**
   * Nodes grouped by owning directorate, in first-seen order.
   */
  byDirectorate(): Map<string, QueueManagerNode[]> {
    const buckets = new Map<string, QueueManagerNode[]>();
    for (const node of this.nodes.values()) {
      const bucket = buckets.get(node.directorate);
      if (bucket) {
        bucket.push(node);
      } else {
        buckets.set(node.directorate, [node]);
      }
    }
    return buckets;
  }

  toSnapshot(): GraphSnapshot {
    const snapshot: GraphSnapshot = {};
    for (const [directorate, nodes] of this.byDirectorate()) {
      const bucket: Record<string, ManagerSnapshot> = {};
      for (const node of nodes) {
        bucket[node.name] = toManagerSnapshot(node);
      }
      snapshot[directorate] = bucket;
    }
    return snapshot;
  }
}

export function toManagerSnapshot(node: QueueManagerNode): ManagerSnapshot {
  return {
    directorate: node.directorate,
    mqmanager: node.name,
    qlocal_count: node.qlocalCount,
    qremote_count: node.qremoteCount,
    qalias_count: node.qaliasCount,
    total_count: node.totalCount,
    inbound: sorted(node.inbound),
    outbound: sorted(node.outbound),
    inbound_extra: sorted(node.inboundExtra),
    outbound_extra: sorted(node.outboundExtra),
    inbound_apps: sorted(node.inboundApps),
    outbound_apps: sorted(node.outboundApps),
    inbound_apps_external: sorted(node.inboundAppsExternal),
    outbound_apps_external: sorted(node.outboundAppsExternal),
  };
}
