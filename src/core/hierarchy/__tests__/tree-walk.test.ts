import { describe, it, expect } from "vitest";
import { buildManagerLookup, flattenTree, getOrCreate, iterManagers } from "../tree-walk.js";
import { enrichedNode, treeOf } from "./tree-fixtures.js";

describe("tree walking", () => {
  const tree = treeOf(
    enrichedNode("QM_A"),
    enrichedNode("QM_B", { Department: "D2" }),
    enrichedNode("QM_C", { Organization: "Org2", Application: "App2" })
  );

  it("yields managers in tree order", () => {
    expect([...iterManagers(tree)].map((entry) => entry.name)).toEqual(["QM_A", "QM_B", "QM_C"]);
  });

  it("flattens with the last duplicate winning", () => {
    const duplicated = treeOf(enrichedNode("QM_A", { qlocal_count: 1 }), enrichedNode("QM_A", { Organization: "Org2", qlocal_count: 9 }));
    const flat = flattenTree(duplicated);

    expect(flat.size).toBe(1);
    expect(flat.get("QM_A")?.qlocal_count).toBe(9);
  });

  it("builds the manager lookup", () => {
    expect(buildManagerLookup(tree).QM_C).toEqual({
      Organization: "Org2",
      Department: "D1",
      Biz_Ownr: "Owner1",
      Application: "App2",
      Org_Type: "Internal",
    });
  });

  it("creates a missing entry once", () => {
    const record: Record<string, string[]> = {};
    getOrCreate(record, "k", () => []).push("a");
    getOrCreate(record, "k", () => ["unused"]).push("b");

    expect(record).toEqual({ k: ["a", "b"] });
  });
});
