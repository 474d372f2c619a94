import { describe, it, expect } from "vitest";
import { filterByDepartment, filterByOrganization, filterGatewaysOnly } from "../tree-filters.js";
import { enrichedNode, treeOf } from "./tree-fixtures.js";

const tree = treeOf(
  enrichedNode("QM_A"),
  enrichedNode("QM_B", { Department: "D2" }),
  enrichedNode("GW_IN", { Application: "Gateway (Internal)", IsGateway: true, GatewayScope: "Internal" }),
  enrichedNode("GW_EX", {
    Organization: "Org2",
    Org_Type: "External",
    Application: "Gateway (External)",
    IsGateway: true,
    GatewayScope: "External",
  })
);

describe("tree filters", () => {
  it("returns a detached copy of one organization", () => {
    const filtered = filterByOrganization(tree, "Org1");

    expect(Object.keys(filtered)).toEqual(["Org1"]);
    expect(Object.keys(filtered.Org1?._departments ?? {})).toEqual(["D1", "D2"]);

    const copy = filtered.Org1?._departments.D1?.Owner1?.App1?.QM_A;
    copy?.outbound.push("CHANGED");
    expect(tree.Org1?._departments.D1?.Owner1?.App1?.QM_A?.outbound).toEqual([]);
  });

  it("returns one department with its organization type", () => {
    const filtered = filterByDepartment(tree, "Org1", "D2");

    expect(filtered.Org1?._org_type).toBe("Internal");
    expect(Object.keys(filtered.Org1?._departments ?? {})).toEqual(["D2"]);
  });

  it("returns an empty tree for unknown names", () => {
    expect(filterByOrganization(tree, "Nope")).toEqual({});
    expect(filterByDepartment(tree, "Org1", "Nope")).toEqual({});
    expect(filterByDepartment(tree, "Nope", "D1")).toEqual({});
  });

  it("keeps only gateway buckets", () => {
    const gateways = filterGatewaysOnly(tree);

    expect(Object.keys(gateways)).toEqual(["Org1", "Org2"]);
    expect(Object.keys(gateways.Org1?._departments ?? {})).toEqual(["D1"]);
    expect(Object.keys(gateways.Org1?._departments.D1?.Owner1 ?? {})).toEqual(["Gateway (Internal)"]);
  });

  it("narrows gateway buckets to one scope", () => {
    const external = filterGatewaysOnly(tree, "External");

    expect(Object.keys(external)).toEqual(["Org2"]);
    expect(external.Org2?._org_type).toBe("External");
    expect(external.Org2?._departments.D1?.Owner1?.["Gateway (External)"]?.GW_EX?.GatewayScope).toBe("External");
  });
});
