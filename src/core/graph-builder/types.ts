/**
 * Manager Graph Types
 *
 * @module
 */

/**
 * The mutable node built during extraction. Edge sets hold display names;
 * application sets hold registered application names.
 */
export interface QueueManagerNode {
  readonly name: string;
  readonly directorate: string;
  qlocalCount: number;
  qremoteCount: number;
  qaliasCount: number;
  totalCount: number;
  /** Resolved managers that send to this one */
  readonly inbound: Set<string>;
  /** Resolved managers this one sends to */
  readonly outbound: Set<string>;
  /** Unresolved sender identifiers */
  readonly inboundExtra: Set<string>;
  /** Unresolved receiver identifiers */
  readonly outboundExtra: Set<string>;
  readonly inboundApps: Set<string>;
  readonly outboundApps: Set<string>;
  readonly inboundAppsExternal: Set<string>;
  readonly outboundAppsExternal: Set<string>;
}

export type Direction = "inbound" | "outbound";

/**
 * Where a node lives and how it is spelled. Implemented by the pass-1
 * manager index.
 */
export interface NodePlacement {
  directorateOf(key: string): string;
  displayName(key: string): string;
}

// =============================================================================
// Serialized form
// =============================================================================

/**
 * JSON form of a node. Sets become sorted arrays.
 */
export interface ManagerSnapshot {
  directorate: string;
  mqmanager: string;
  qlocal_count: number;
  qremote_count: number;
  qalias_count: number;
  total_count: number;
  inbound: string[];
  outbound: string[];
  inbound_extra: string[];
  outbound_extra: string[];
  inbound_apps: string[];
  outbound_apps: string[];
  inbound_apps_external: string[];
  outbound_apps_external: string[];
}

/**
 * `{directorate: {managerName: ManagerSnapshot}}`
 */
export type GraphSnapshot = Record<string, Record<string, ManagerSnapshot>>;
