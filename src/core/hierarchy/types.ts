/**
 * Enriched Tree Types
 *
 * The enriched tree is the artifact every diagram, analytics and export
 * consumer reads, so its JSON shape is a wire format:
 *
 * ```
 * Organization -> { _org_type, _departments: Department -> BusinessOwner -> Application -> ManagerName -> EnrichedNode }
 * ```
 *
 * `_org_type` and `_departments` are the only keys at the organization level;
 * they separate metadata from child nodes.
 *
 * @module
 */

import type { Scope } from "../../types/index.js";

export type GatewayScope = Scope | "";

export interface EnrichedNode {
  Organization: string;
  Org_Type: Scope;
  Department: string;
  Biz_Ownr: string;
  Application: string;
  MQmanager: string;
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
  IsGateway: boolean;
  GatewayScope: GatewayScope;
  GatewayDescription: string;
}

/** managerName -> node */
export type ApplicationNode = Record<string, EnrichedNode>;

/** applicationName -> managers */
export type BusinessOwnerNode = Record<string, ApplicationNode>;

/** businessOwner -> applications */
export type DepartmentNode = Record<string, BusinessOwnerNode>;

export interface OrganizationNode {
  _org_type: Scope;
  _departments: Record<string, DepartmentNode>;
}

export type EnrichedTree = Record<string, OrganizationNode>;

/**
 * Constant-time context for a manager (`mqmgr_lookup`).
 */
export interface ManagerContext {
  Organization: string;
  Department: string;
  Biz_Ownr: string;
  Application: string;
  Org_Type: Scope;
}

export type ManagerLookup = Record<string, ManagerContext>;

// =============================================================================
// Reference rows
// =============================================================================

export interface OrgHierarchyRow {
  Biz_Ownr: string;
  Organization?: string;
  Department?: string;
  Org_Type?: string;
}

export interface AppMappingRow {
  QmgrName: string;
  Application?: string;
}

/** Either `QmgrName` or `name` identifies the manager. */
export interface GatewayDefinitionRow {
  QmgrName?: string;
  name?: string;
  Scope?: string;
  Description?: string;
}

// =============================================================================
// Defaults
// =============================================================================

export const UNKNOWN_ORGANIZATION = "Unknown Organization";
export const UNKNOWN_DEPARTMENT = "Unknown Department";
export const NO_APPLICATION = "No Application";
export const GATEWAY_BUCKET_PREFIX = "Gateway (";

export function gatewayBucketName(scope: Scope): string {
  return `${GATEWAY_BUCKET_PREFIX}${scope})`;
}

export function isGatewayBucket(application: string): boolean {
  return application.startsWith(GATEWAY_BUCKET_PREFIX);
}
