import type { EnrichedTree } from "./types.js";

export interface TreeSummary {
  organizations: number;
  departments: number;
  businessOwners: number;
  applications: number;
  managers: number;
  totalQLocal: number;
  totalQRemote: number;
  totalQAlias: number;
  totalConnections: number;
}

/**
 * Roll-up counts for the run summary. `totalConnections` counts outbound
 * manager edges only, so each edge is counted once.
 */
export function summarizeTree(tree: EnrichedTree): TreeSummary {
  const summary: TreeSummary = {
    organizations: Object.keys(tree).length,
    departments: 0,
    businessOwners: 0,
    applications: 0,
    managers: 0,
    totalQLocal: 0,
    totalQRemote: 0,
    totalQAlias: 0,
    totalConnections: 0,
  };

  for (const org of Object.values(tree)) {
    const departments = Object.values(org._departments);
    summary.departments += departments.length;

    for (const dept of departments) {
      const owners = Object.values(dept);
      summary.businessOwners += owners.length;

      for (const applications of owners) {
        const apps = Object.values(applications);
        summary.applications += apps.length;

        for (const managers of apps) {
          for (const node of Object.values(managers)) {
            summary.managers++;
            summary.totalQLocal += node.qlocal_count;
            summary.totalQRemote += node.qremote_count;
            summary.totalQAlias += node.qalias_count;
            summary.totalConnections += node.outbound.length;
          }
        }
      }
    }
  }

  return summary;
}
