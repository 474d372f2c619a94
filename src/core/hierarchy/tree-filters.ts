/**
 * Sub-tree views over the enriched tree. Every result is a deep copy in the
 * same wire format, so it can be handed to any tree consumer.
 *
 * @module
 */

import type { Scope } from "../../types/index.js";
import { getOrCreate } from "./tree-walk.js";
import { gatewayBucketName, isGatewayBucket, type EnrichedTree } from "./types.js";

export function filterByOrganization(tree: EnrichedTree, organization: string): EnrichedTree {
  const org = tree[organization];
  if (!org) return {};
  return { [organization]: structuredClone(org) };
}

export function filterByDepartment(tree: EnrichedTree, organization: string, department: string): EnrichedTree {
  const org = tree[organization];
  const dept = org?._departments[department];
  if (!org || !dept) return {};
  return {
    [organization]: {
      _org_type: org._org_type,
      _departments: { [department]: structuredClone(dept) },
    },
  };
}

/**
 * Keep only the synthetic gateway buckets, optionally of a single scope.
 */
export function filterGatewaysOnly(tree: EnrichedTree, scope?: Scope): EnrichedTree {
  const filtered: EnrichedTree = {};
  const wanted = scope ? gatewayBucketName(scope) : undefined;

  for (const [orgName, org] of Object.entries(tree)) {
    for (const [deptName, dept] of Object.entries(org._departments)) {
      for (const [bizOwner, applications] of Object.entries(dept)) {
        for (const [appName, managers] of Object.entries(applications)) {
          if (!isGatewayBucket(appName)) continue;
          if (wanted && appName !== wanted) continue;

          const targetOrg = getOrCreate(filtered, orgName, () => ({ _org_type: org._org_type, _departments: {} }));
          const targetDept = getOrCreate(targetOrg._departments, deptName, () => ({}));
          getOrCreate(targetDept, bizOwner, () => ({}))[appName] = structuredClone(managers);
        }
      }
    }
  }

  return filtered;
}
