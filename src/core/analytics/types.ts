import type { GatewayScope } from "../hierarchy/types.js";

export interface GatewaySummary {
  total_gateways: number;
  internal_gateways: number;
  external_gateways: number;
  /** Inbound plus outbound edges, manager and extra, over all gateways */
  total_gateway_connections: number;
}

export interface GatewayTraffic {
  scope: GatewayScope;
  organization: string;
  department: string;
  inbound_connections: number;
  outbound_connections: number;
  total_connections: number;
  connected_organizations: number;
  connected_departments: number;
  queue_local: number;
  queue_remote: number;
  queue_alias: number;
}

export interface RouteConnectivity {
  gateways: string[];
  connection_count: number;
}

export interface GatewayDependencies {
  dependent_mqmanagers: number;
  dependent_applications: string[];
  application_count: number;
}

export interface GatewayLoad {
  gateway: string;
  connections: number;
  queues: number;
  load_score: number;
}

export type RouteType = "Organization" | "Department";

export interface SinglePointOfFailure {
  route: string;
  gateway: string;
  connection_count: number;
  type: RouteType;
}

export interface RedundancyAnalysis {
  single_points_of_failure: SinglePointOfFailure[];
  spof_count: number;
  routes_with_redundancy: number;
}

export interface GatewayAnalytics {
  summary: GatewaySummary;
  gateway_traffic: Record<string, GatewayTraffic>;
  /** Keyed `"<org A> <-> <org B>"`, names in sorted order */
  org_connectivity: Record<string, RouteConnectivity>;
  department_connectivity: Record<string, RouteConnectivity>;
  gateway_dependencies: Record<string, GatewayDependencies>;
  load_distribution: {
    internal_gateways: GatewayLoad[];
    external_gateways: GatewayLoad[];
  };
  redundancy_analysis: RedundancyAnalysis;
}
