import { describe, it, expect } from "vitest";
import { parseEnrichedTree } from "../tree-schema.js";
import { ErrorCode, InputShapeError } from "../../errors.js";
import { enrichedNode, treeOf } from "./tree-fixtures.js";

describe("parseEnrichedTree", () => {
  it("accepts a tree it wrote", () => {
    const tree = treeOf(enrichedNode("QM_A", { outbound: ["QM_B"] }));
    expect(parseEnrichedTree(JSON.parse(JSON.stringify(tree)))).toEqual(tree);
  });

  it("fills fields missing from older files", () => {
    const parsed = parseEnrichedTree({
      Org1: {
        _org_type: "external",
        _departments: { D1: { Owner1: { App1: { QM_A: { MQmanager: "QM_A", qlocal_count: 4, GatewayScope: null } } } } },
      },
    });

    const node = parsed.Org1?._departments.D1?.Owner1?.App1?.QM_A;
    expect(parsed.Org1?._org_type).toBe("External");
    expect(node?.qlocal_count).toBe(4);
    expect(node?.qremote_count).toBe(0);
    expect(node?.outbound_extra).toEqual([]);
    expect(node?.IsGateway).toBe(false);
    expect(node?.GatewayScope).toBe("");
    expect(node?.Org_Type).toBe("Internal");
  });

  it("skips entries that are not organizations", () => {
    const parsed = parseEnrichedTree({
      generated_at: "2024-01-01",
      Org1: { _org_type: "Internal", _departments: {} },
      Broken: { _departments: { D1: { Owner1: { App1: { QM_X: { qlocal_count: -1 } } } } } },
    });

    expect(Object.keys(parsed)).toEqual(["Org1"]);
  });

  it("raises on a malformed organization in strict mode", () => {
    const value = {
      Org1: { _org_type: "Internal", _departments: { D1: { Owner1: { App1: { QM_X: { qlocal_count: null } } } } } },
    };

    expect(() => parseEnrichedTree(value, { label: "baseline tree", strict: true })).toThrow(
      'Malformed organization "Org1" in baseline tree'
    );
    try {
      parseEnrichedTree(value, { strict: true });
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCode.INPUT_MALFORMED_TREE, context: { organization: "Org1" } });
    }
  });

  it("still skips entries without departments in strict mode", () => {
    const parsed = parseEnrichedTree(
      { generated_at: "2024-01-01", Org1: { _org_type: "Internal", _departments: {} } },
      { strict: true }
    );

    expect(Object.keys(parsed)).toEqual(["Org1"]);
  });

  it("rejects a value that is not a mapping", () => {
    for (const value of [null, [], "tree", 3]) {
      expect(() => parseEnrichedTree(value)).toThrow(InputShapeError);
    }
    expect(() => parseEnrichedTree([], { label: "baseline tree" })).toThrow("Enriched baseline tree must be a mapping of organizations");
  });

  it("reports the mapping error code", () => {
    try {
      parseEnrichedTree(null);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCode.INPUT_NOT_A_MAPPING });
    }
  });
});
