import { describe, it, expect } from "vitest";
import { GatewayAnalyzer, routeName } from "../gateway-analyzer.js";
import { InputShapeError } from "../../errors.js";
import { enrichedNode, treeOf } from "../../hierarchy/__tests__/tree-fixtures.js";

const internalGateway = {
  Application: "Gateway (Internal)",
  IsGateway: true,
  GatewayScope: "Internal" as const,
};

describe("GatewayAnalyzer", () => {
  describe("single internal gateway", () => {
    const tree = treeOf(
      enrichedNode("GW1", { ...internalGateway, inbound: ["QM_Y"], outbound: ["QM_X"], outbound_extra: ["EXT.Q"], qlocal_count: 3 }),
      enrichedNode("QM_X", { Organization: "Org2", Department: "D2", Application: "Payroll", inbound: ["GW1"] }),
      enrichedNode("QM_Y", { Application: "Ledger", outbound: ["GW1"] })
    );
    const analytics = new GatewayAnalyzer(tree).analyze();

    it("summarizes gateways", () => {
      expect(analytics.summary).toEqual({
        total_gateways: 1,
        internal_gateways: 1,
        external_gateways: 0,
        total_gateway_connections: 3,
      });
    });

    it("profiles gateway traffic", () => {
      expect(analytics.gateway_traffic.GW1).toEqual({
        scope: "Internal",
        organization: "Org1",
        department: "D1",
        inbound_connections: 1,
        outbound_connections: 2,
        total_connections: 3,
        connected_organizations: 2,
        connected_departments: 2,
        queue_local: 3,
        queue_remote: 0,
        queue_alias: 0,
      });
    });

    it("groups cross-boundary edges into routes", () => {
      expect(analytics.org_connectivity).toEqual({ "Org1 <-> Org2": { gateways: ["GW1"], connection_count: 1 } });
      expect(analytics.department_connectivity).toEqual({ "D1 <-> D2": { gateways: ["GW1"], connection_count: 1 } });
    });

    it("flags routes served by one gateway", () => {
      expect(analytics.redundancy_analysis).toEqual({
        single_points_of_failure: [
          { route: "Org1 <-> Org2", gateway: "GW1", connection_count: 1, type: "Organization" },
          { route: "D1 <-> D2", gateway: "GW1", connection_count: 1, type: "Department" },
        ],
        spof_count: 2,
        routes_with_redundancy: 0,
      });
    });

    it("lists dependent applications and load", () => {
      expect(analytics.gateway_dependencies.GW1).toEqual({
        dependent_mqmanagers: 3,
        dependent_applications: ["Ledger", "Payroll"],
        application_count: 2,
      });
      expect(analytics.load_distribution).toEqual({
        internal_gateways: [{ gateway: "GW1", connections: 3, queues: 3, load_score: 9 }],
        external_gateways: [],
      });
    });
  });

  describe("redundant external gateways", () => {
    const external = { Organization: "Org3", Department: "D3", Application: "Gateway (External)", IsGateway: true, GatewayScope: "External" as const };
    const tree = treeOf(
      enrichedNode("GW3", { ...external, outbound: ["QM_X"] }),
      enrichedNode("GW2", { ...external, outbound: ["QM_X"], qlocal_count: 5 }),
      enrichedNode("QM_X", { Organization: "Org2", Department: "D2", inbound: ["GW2", "GW3"] })
    );
    const analytics = new GatewayAnalyzer(tree).analyze();

    it("counts a route with several gateways as redundant", () => {
      expect(analytics.org_connectivity).toEqual({ "Org2 <-> Org3": { gateways: ["GW2", "GW3"], connection_count: 2 } });
      expect(analytics.redundancy_analysis.spof_count).toBe(0);
      expect(analytics.redundancy_analysis.routes_with_redundancy).toBe(1);
    });

    it("leaves external gateways out of department connectivity", () => {
      expect(analytics.department_connectivity).toEqual({});
    });

    it("orders load by score", () => {
      expect(analytics.load_distribution.external_gateways.map((load) => load.gateway)).toEqual(["GW2", "GW3"]);
      expect(analytics.load_distribution.external_gateways[0]?.load_score).toBe(7);
    });
  });

  it("reports zero gateways for a tree without any", () => {
    expect(new GatewayAnalyzer(treeOf(enrichedNode("QM_A"))).gatewayCount).toBe(0);
  });

  it("rejects a tree that is not a mapping", () => {
    expect(() => new GatewayAnalyzer([])).toThrow(InputShapeError);
  });
});

describe("routeName", () => {
  it("orders the two sides", () => {
    expect(routeName("Org2", "Org1")).toBe("Org1 <-> Org2");
    expect(routeName("Org1", "Org2")).toBe("Org1 <-> Org2");
  });
});
