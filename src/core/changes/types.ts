/**
 * ChangeSet wire format. Report generators read these keys directly.
 *
 * @module
 */

import type { GatewayScope } from "../hierarchy/types.js";

export const COMPARED_FIELDS = ["Organization", "Department", "Biz_Ownr", "Application"] as const;
export type ComparedField = (typeof COMPARED_FIELDS)[number];

export const QUEUE_TYPES = ["qlocal", "qremote", "qalias"] as const;
export type QueueCountType = (typeof QUEUE_TYPES)[number];

export interface ManagerAdded {
  name: string;
  organization: string;
  department: string;
  application: string;
  is_gateway: boolean;
}

export interface ManagerRemoved {
  name: string;
  organization: string;
  department: string;
  application: string;
}

export interface FieldChange {
  old: string;
  new: string;
}

export interface ManagerModified {
  name: string;
  changes: Partial<Record<ComparedField, FieldChange>>;
}

export interface ConnectionChange {
  source: string;
  target: string;
  source_org: string;
  target_org: string;
}

export interface GatewayAdded {
  name: string;
  scope: GatewayScope;
  organization: string;
  department: string;
}

export interface GatewayRemoved {
  name: string;
  scope: GatewayScope;
  organization: string;
}

export interface GatewayModified {
  name: string;
  old_scope: GatewayScope;
  new_scope: GatewayScope;
}

export interface QueueCountChange {
  mqmanager: string;
  queue_type: QueueCountType;
  old_count: number;
  new_count: number;
  /** Rounded to one decimal */
  change_percent: number;
}

export interface ChangeSummary {
  mqmanagers_added: number;
  mqmanagers_removed: number;
  mqmanagers_modified: number;
  connections_added: number;
  connections_removed: number;
  gateways_added: number;
  gateways_removed: number;
  gateways_modified: number;
  queue_count_changes: number;
  total_changes: number;
}

export interface ChangeSet {
  mqmanagers: {
    added: ManagerAdded[];
    removed: ManagerRemoved[];
    modified: ManagerModified[];
  };
  connections: {
    added: ConnectionChange[];
    removed: ConnectionChange[];
  };
  gateways: {
    added: GatewayAdded[];
    removed: GatewayRemoved[];
    modified: GatewayModified[];
  };
  queue_counts: QueueCountChange[];
  summary: ChangeSummary;
}

export interface ChangeDetectorOptions {
  /** Minimum queue-count change in percent; default 20 */
  thresholdPercent?: number;
}
