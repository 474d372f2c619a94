/**
 * Hierarchy Enricher
 *
 * Reshapes the flat `{directorate: {manager: node}}` graph into the
 * Organization -> Department -> BusinessOwner -> Application -> Manager tree.
 *
 * Every join is best-effort: a directorate missing from the hierarchy table
 * lands under "Unknown Organization"/"Unknown Department", a manager missing
 * from the application mapping under "No Application". Nothing is dropped and
 * nothing is raised for sparse reference data.
 *
 * Gateway managers are filed only under the synthetic `Gateway (<scope>)`
 * application, and that name becomes their Application field.
 *
 * Manager names in the app mapping and gateway tables go through the alias
 * table, so a row may name a manager by any of its aliases.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { isRecord, normalizeValue, toScope, type Scope } from "../../types/index.js";
import { ErrorCode, InputShapeError } from "../errors.js";
import { ReferenceIndex } from "../extraction/reference-index.js";
import type { GraphSnapshot, ManagerSnapshot } from "../graph-builder/types.js";
import { buildManagerLookup, getOrCreate } from "./tree-walk.js";
import {
  NO_APPLICATION,
  UNKNOWN_DEPARTMENT,
  UNKNOWN_ORGANIZATION,
  gatewayBucketName,
  type AppMappingRow,
  type EnrichedNode,
  type EnrichedTree,
  type GatewayDefinitionRow,
  type ManagerLookup,
  type OrgHierarchyRow,
} from "./types.js";

const logger = createLogger("hierarchy");

export interface HierarchyTables {
  orgHierarchy?: readonly OrgHierarchyRow[];
  appMapping?: readonly AppMappingRow[];
  gateways?: readonly GatewayDefinitionRow[];
}

export interface EnrichmentResult {
  tree: EnrichedTree;
  lookup: ManagerLookup;
}

interface HierarchyInfo {
  organization: string;
  department: string;
  bizOwner: string;
  orgType: Scope;
}

interface GatewayInfo {
  scope: Scope;
  description: string;
}

export class HierarchyEnricher {
  private readonly orgHierarchy: ReadonlyMap<string, HierarchyInfo>;
  private readonly appMapping: ReadonlyMap<string, string>;
  private readonly gateways: ReadonlyMap<string, GatewayInfo>;

  constructor(
    tables: HierarchyTables = {},
    private readonly reference: ReferenceIndex = ReferenceIndex.empty()
  ) {
    this.orgHierarchy = indexOrgHierarchy(tables.orgHierarchy ?? []);
    const managerKey = (name: string): string => this.managerKey(name);
    this.appMapping = indexAppMapping(tables.appMapping ?? [], managerKey);
    this.gateways = indexGateways(tables.gateways ?? [], managerKey);

    logger.info(
      {
        businessOwners: this.orgHierarchy.size,
        applicationMappings: this.appMapping.size,
        gateways: this.gateways.size,
      },
      "Hierarchy reference data indexed"
    );
  }

  /**
   * Build the enriched tree and its manager lookup. Pure: the same snapshot
   * and tables always yield an identical tree.
   *
   * @throws InputShapeError when `snapshot` is not a mapping
   */
  enrich(snapshot: GraphSnapshot): EnrichmentResult {
    if (!isRecord(snapshot)) {
      throw new InputShapeError("Manager graph must be a mapping of directorates", ErrorCode.INPUT_NOT_A_MAPPING);
    }

    const tree: EnrichedTree = {};
    let unmappedDirectorates = 0;

    for (const [directorate, managers] of Object.entries(snapshot)) {
      const info = this.orgHierarchy.get(directorate);
      if (!info) unmappedDirectorates++;
      const hierarchy = info ?? defaultHierarchy(directorate);

      const organization = getOrCreate(tree, hierarchy.organization, () => ({
        _org_type: hierarchy.orgType,
        _departments: {},
      }));
      const department = getOrCreate(organization._departments, hierarchy.department, () => ({}));
      const bizOwner = getOrCreate(department, hierarchy.bizOwner, () => ({}));

      for (const [managerName, manager] of Object.entries(managers)) {
        const node = this.enrichManager(managerName, manager, hierarchy);
        getOrCreate(bizOwner, node.Application, () => ({}))[managerName] = node;
      }
    }

    if (unmappedDirectorates > 0) {
      logger.warn({ unmappedDirectorates }, "Directorates without hierarchy rows filed under Unknown Organization");
    }

    return { tree, lookup: buildManagerLookup(tree) };
  }

  private enrichManager(managerName: string, manager: ManagerSnapshot, hierarchy: HierarchyInfo): EnrichedNode {
    const key = this.managerKey(managerName);
    const gateway = this.gateways.get(key);
    const application = gateway
      ? gatewayBucketName(gateway.scope)
      : this.appMapping.get(key) ?? NO_APPLICATION;

    return {
      Organization: hierarchy.organization,
      Org_Type: hierarchy.orgType,
      Department: hierarchy.department,
      Biz_Ownr: hierarchy.bizOwner,
      Application: application,
      MQmanager: managerName,
      qlocal_count: manager.qlocal_count,
      qremote_count: manager.qremote_count,
      qalias_count: manager.qalias_count,
      total_count: manager.total_count,
      inbound: [...manager.inbound],
      outbound: [...manager.outbound],
      inbound_extra: [...manager.inbound_extra],
      outbound_extra: [...manager.outbound_extra],
      inbound_apps: [...manager.inbound_apps],
      outbound_apps: [...manager.outbound_apps],
      inbound_apps_external: [...manager.inbound_apps_external],
      outbound_apps_external: [...manager.outbound_apps_external],
      IsGateway: gateway !== undefined,
      GatewayScope: gateway?.scope ?? "",
      GatewayDescription: gateway?.description ?? "",
    };
  }

  private managerKey(name: string): string {
    return (this.reference.resolveAlias(name) ?? name).toUpperCase();
  }
}

// =============================================================================
// Helpers
// =============================================================================

function defaultHierarchy(directorate: string): HierarchyInfo {
  return {
    organization: UNKNOWN_ORGANIZATION,
    department: UNKNOWN_DEPARTMENT,
    bizOwner: directorate,
    orgType: "Internal",
  };
}

function indexOrgHierarchy(rows: readonly OrgHierarchyRow[]): Map<string, HierarchyInfo> {
  const index = new Map<string, HierarchyInfo>();
  for (const row of rows) {
    const bizOwner = normalizeValue(row.Biz_Ownr);
    if (!bizOwner) continue;
    index.set(bizOwner, {
      organization: normalizeValue(row.Organization) || UNKNOWN_ORGANIZATION,
      department: normalizeValue(row.Department) || UNKNOWN_DEPARTMENT,
      bizOwner,
      orgType: toScope(row.Org_Type),
    });
  }
  return index;
}

function indexAppMapping(rows: readonly AppMappingRow[], managerKey: (name: string) => string): Map<string, string> {
  const index = new Map<string, string>();
  for (const row of rows) {
    const manager = normalizeValue(row.QmgrName);
    if (!manager) continue;
    index.set(managerKey(manager), normalizeValue(row.Application) || NO_APPLICATION);
  }
  return index;
}

function indexGateways(rows: readonly GatewayDefinitionRow[], managerKey: (name: string) => string): Map<string, GatewayInfo> {
  const index = new Map<string, GatewayInfo>();
  for (const row of rows) {
    const manager = normalizeValue(row.QmgrName) || normalizeValue(row.name);
    if (!manager) continue;
    index.set(managerKey(manager), {
      scope: toScope(row.Scope),
      description: normalizeValue(row.Description),
    });
  }
  return index;
}
