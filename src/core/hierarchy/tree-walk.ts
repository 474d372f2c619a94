/**
 * Tree walking helpers shared by the enricher, the change detector and the
 * analytics consumers.
 *
 * @module
 */

import type { EnrichedNode, EnrichedTree, ManagerLookup } from "./types.js";

export interface ManagerEntry {
  name: string;
  node: EnrichedNode;
}

/**
 * Yield every manager in tree order
 * (Organization, Department, BusinessOwner, Application, Manager).
 */
export function* iterManagers(tree: EnrichedTree): Generator<ManagerEntry> {
  for (const organization of Object.values(tree)) {
    for (const department of Object.values(organization._departments)) {
      for (const bizOwner of Object.values(department)) {
        for (const application of Object.values(bizOwner)) {
          for (const [name, node] of Object.entries(application)) {
            yield { name, node };
          }
        }
      }
    }
  }
}

/**
 * Flat `{managerName -> node}` view. Manager names are expected to be
 * globally unique; if one repeats, the last occurrence wins.
 */
export function flattenTree(tree: EnrichedTree): Map<string, EnrichedNode> {
  const managers = new Map<string, EnrichedNode>();
  for (const { name, node } of iterManagers(tree)) {
    managers.set(name, node);
  }
  return managers;
}

/**
 * The `mqmgr_lookup` index.
 */
export function buildManagerLookup(tree: EnrichedTree): ManagerLookup {
  const lookup: ManagerLookup = {};
  for (const { name, node } of iterManagers(tree)) {
    lookup[name] = {
      Organization: node.Organization,
      Department: node.Department,
      Biz_Ownr: node.Biz_Ownr,
      Application: node.Application,
      Org_Type: node.Org_Type,
    };
  }
  return lookup;
}

/**
 * Return `record[key]`, creating it first when absent. Used to grow the
 * nested tree levels in place.
 */
export function getOrCreate<T, U extends T>(record: Record<string, T>, key: string, create: () => U): T {
  const existing = record[key];
  if (existing !== undefined) return existing;
  const created: T = create();
  record[key] = created;
  return created;
}
