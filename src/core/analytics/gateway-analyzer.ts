/**
 * Gateway Analyzer
 *
 * Traffic, connectivity, dependency, load and redundancy views over the
 * gateway managers of an enriched tree. A route (pair of organizations, or
 * pair of departments through Internal gateways) served by exactly one
 * gateway is a single point of failure.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { parseEnrichedTree } from "../hierarchy/tree-schema.js";
import { flattenTree } from "../hierarchy/tree-walk.js";
import { isGatewayBucket, type EnrichedNode } from "../hierarchy/types.js";
import type {
  GatewayAnalytics,
  GatewayDependencies,
  GatewayLoad,
  GatewaySummary,
  GatewayTraffic,
  RedundancyAnalysis,
  RouteConnectivity,
  RouteType,
  SinglePointOfFailure,
} from "./types.js";

const logger = createLogger("gateway-analyzer");

interface RouteAccumulator {
  gateways: Set<string>;
  connectionCount: number;
}

/**
 * @example
 * ```typescript
 * const analytics = new GatewayAnalyzer(enrichedTree).analyze();
 * for (const spof of analytics.redundancy_analysis.single_points_of_failure) {
 *   console.log(`${spof.route} depends on ${spof.gateway}`);
 * }
 * ```
 */
export class GatewayAnalyzer {
  private readonly managers: ReadonlyMap<string, EnrichedNode>;
  private readonly gateways: ReadonlyMap<string, EnrichedNode>;

  /**
   * @throws InputShapeError when `tree` is not a mapping
   */
  constructor(tree: unknown) {
    this.managers = flattenTree(parseEnrichedTree(tree));
    this.gateways = new Map([...this.managers].filter(([, node]) => node.IsGateway));
  }

  get gatewayCount(): number {
    return this.gateways.size;
  }

  analyze(): GatewayAnalytics {
    const orgConnectivity = this.routeConnectivity(this.gateways, (node) => node.Organization);
    const internalGateways = new Map([...this.gateways].filter(([, node]) => node.GatewayScope === "Internal"));
    const departmentConnectivity = this.routeConnectivity(internalGateways, (node) => node.Department);

    const analytics: GatewayAnalytics = {
      summary: this.summary(),
      gateway_traffic: this.traffic(),
      org_connectivity: orgConnectivity,
      department_connectivity: departmentConnectivity,
      gateway_dependencies: this.dependencies(),
      load_distribution: this.loadDistribution(),
      redundancy_analysis: redundancy(orgConnectivity, departmentConnectivity),
    };

    logger.info(
      { ...analytics.summary, spofCount: analytics.redundancy_analysis.spof_count },
      "Gateway analysis complete"
    );
    return analytics;
  }

  private summary(): GatewaySummary {
    const gateways = [...this.gateways.values()];
    return {
      total_gateways: gateways.length,
      internal_gateways: gateways.filter((node) => node.GatewayScope === "Internal").length,
      external_gateways: gateways.filter((node) => node.GatewayScope === "External").length,
      total_gateway_connections: gateways.reduce((sum, node) => sum + connectionsOf(node).length, 0),
    };
  }

  private traffic(): Record<string, GatewayTraffic> {
    const traffic: Record<string, GatewayTraffic> = {};

    for (const [name, node] of this.gateways) {
      const inbound = [...node.inbound, ...node.inbound_extra];
      const outbound = [...node.outbound, ...node.outbound_extra];
      const organizations = new Set<string>();
      const departments = new Set<string>();

      for (const peer of [...inbound, ...outbound]) {
        const peerNode = this.managers.get(peer);
        if (!peerNode) continue;
        organizations.add(peerNode.Organization);
        departments.add(peerNode.Department);
      }

      traffic[name] = {
        scope: node.GatewayScope,
        organization: node.Organization,
        department: node.Department,
        inbound_connections: inbound.length,
        outbound_connections: outbound.length,
        total_connections: inbound.length + outbound.length,
        connected_organizations: organizations.size,
        connected_departments: departments.size,
        queue_local: node.qlocal_count,
        queue_remote: node.qremote_count,
        queue_alias: node.qalias_count,
      };
    }

    return traffic;
  }

  /**
   * Group gateway edges by the unordered pair (gateway side, peer side)
   * whenever the two sides differ. Peers that are not managers are ignored.
   */
  private routeConnectivity(
    gateways: ReadonlyMap<string, EnrichedNode>,
    sideOf: (node: EnrichedNode) => string
  ): Record<string, RouteConnectivity> {
    const routes = new Map<string, RouteAccumulator>();

    for (const [name, node] of gateways) {
      const ownSide = sideOf(node);
      for (const peer of connectionsOf(node)) {
        const peerNode = this.managers.get(peer);
        if (!peerNode) continue;
        const peerSide = sideOf(peerNode);
        if (peerSide === ownSide) continue;

        const route = routeName(ownSide, peerSide);
        const accumulator = routes.get(route) ?? { gateways: new Set<string>(), connectionCount: 0 };
        accumulator.gateways.add(name);
        accumulator.connectionCount++;
        routes.set(route, accumulator);
      }
    }

    const result: Record<string, RouteConnectivity> = {};
    for (const route of [...routes.keys()].sort()) {
      const accumulator = routes.get(route);
      if (!accumulator) continue;
      result[route] = {
        gateways: [...accumulator.gateways].sort(),
        connection_count: accumulator.connectionCount,
      };
    }
    return result;
  }

  private dependencies(): Record<string, GatewayDependencies> {
    const dependencies: Record<string, GatewayDependencies> = {};

    for (const [name, node] of this.gateways) {
      const connections = connectionsOf(node);
      const applications = new Set<string>();
      for (const peer of connections) {
        const application = this.managers.get(peer)?.Application;
        if (application && !isGatewayBucket(application)) {
          applications.add(application);
        }
      }

      dependencies[name] = {
        dependent_mqmanagers: connections.length,
        dependent_applications: [...applications].sort(),
        application_count: applications.size,
      };
    }

    return dependencies;
  }

  private loadDistribution(): GatewayAnalytics["load_distribution"] {
    const internal: GatewayLoad[] = [];
    const external: GatewayLoad[] = [];

    for (const [name, node] of this.gateways) {
      const connections = connectionsOf(node).length;
      const queues = node.qlocal_count + node.qremote_count + node.qalias_count;
      const load: GatewayLoad = {
        gateway: name,
        connections,
        queues,
        load_score: connections * 2 + queues,
      };
      (node.GatewayScope === "Internal" ? internal : external).push(load);
    }

    const byLoad = (a: GatewayLoad, b: GatewayLoad): number => b.load_score - a.load_score;
    return {
      internal_gateways: internal.sort(byLoad),
      external_gateways: external.sort(byLoad),
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function connectionsOf(node: EnrichedNode): string[] {
  return [...node.inbound, ...node.outbound, ...node.inbound_extra, ...node.outbound_extra];
}

export function routeName(a: string, b: string): string {
  const [first, second] = a <= b ? [a, b] : [b, a];
  return `${first} <-> ${second}`;
}

function redundancy(
  orgConnectivity: Record<string, RouteConnectivity>,
  departmentConnectivity: Record<string, RouteConnectivity>
): RedundancyAnalysis {
  const spof: SinglePointOfFailure[] = [];
  let redundant = 0;

  const inspect = (routes: Record<string, RouteConnectivity>, type: RouteType): void => {
    for (const [route, data] of Object.entries(routes)) {
      const [only, ...rest] = data.gateways;
      if (only !== undefined && rest.length === 0) {
        spof.push({ route, gateway: only, connection_count: data.connection_count, type });
      } else if (data.gateways.length > 1) {
        redundant++;
      }
    }
  };

  inspect(orgConnectivity, "Organization");
  inspect(departmentConnectivity, "Department");

  return {
    single_points_of_failure: spof,
    spof_count: spof.length,
    routes_with_redundancy: redundant,
  };
}
