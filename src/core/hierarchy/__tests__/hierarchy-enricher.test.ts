import { describe, it, expect } from "vitest";
import { HierarchyEnricher } from "../hierarchy-enricher.js";
import { InputShapeError } from "../../errors.js";
import { ReferenceIndex } from "../../extraction/reference-index.js";
import type { GraphSnapshot } from "../../graph-builder/types.js";
import { managerSnapshot } from "./tree-fixtures.js";

const snapshot: GraphSnapshot = {
  Payments: {
    QM_A: managerSnapshot("QM_A", "Payments", { outbound: ["QM_B"], qlocal_count: 2, total_count: 2 }),
    GW1: managerSnapshot("GW1", "Payments"),
  },
  Mystery: {
    QM_B: managerSnapshot("QM_B", "Mystery", { inbound: ["QM_A"] }),
  },
  Partners: {
    QM_P: managerSnapshot("QM_P", "Partners"),
  },
};

const tables = {
  orgHierarchy: [
    { Biz_Ownr: "Payments", Organization: "Retail", Department: "Cards", Org_Type: "internal" },
    { Biz_Ownr: "Partners", Organization: "Outside", Department: "", Org_Type: "EXTERNAL" },
  ],
  appMapping: [
    { QmgrName: "qm_a", Application: "LEDGER" },
    { QmgrName: "GW1", Application: "IGNORED" },
  ],
  gateways: [{ QmgrName: "GW1", Scope: "Internal", Description: "Core gateway" }],
};

describe("HierarchyEnricher", () => {
  it("files managers under organization, department, owner and application", () => {
    const { tree } = new HierarchyEnricher(tables).enrich(snapshot);

    const node = tree.Retail?._departments.Cards?.Payments?.LEDGER?.QM_A;
    expect(tree.Retail?._org_type).toBe("Internal");
    expect(node).toMatchObject({
      Organization: "Retail",
      Org_Type: "Internal",
      Department: "Cards",
      Biz_Ownr: "Payments",
      Application: "LEDGER",
      MQmanager: "QM_A",
      qlocal_count: 2,
      total_count: 2,
      outbound: ["QM_B"],
      IsGateway: false,
      GatewayScope: "",
      GatewayDescription: "",
    });
  });

  it("places gateways only in their scope bucket", () => {
    const { tree } = new HierarchyEnricher(tables).enrich(snapshot);
    const owner = tree.Retail?._departments.Cards?.Payments;

    expect(Object.keys(owner ?? {})).toEqual(["LEDGER", "Gateway (Internal)"]);
    expect(owner?.["Gateway (Internal)"]?.GW1).toMatchObject({
      Application: "Gateway (Internal)",
      IsGateway: true,
      GatewayScope: "Internal",
      GatewayDescription: "Core gateway",
    });
  });

  it("falls back to unknown placeholders for missing reference rows", () => {
    const { tree, lookup } = new HierarchyEnricher(tables).enrich(snapshot);

    expect(tree["Unknown Organization"]?._departments["Unknown Department"]?.Mystery?.["No Application"]?.QM_B?.inbound).toEqual([
      "QM_A",
    ]);
    expect(lookup.QM_B).toEqual({
      Organization: "Unknown Organization",
      Department: "Unknown Department",
      Biz_Ownr: "Mystery",
      Application: "No Application",
      Org_Type: "Internal",
    });
  });

  it("keeps the organization type and defaults a blank department", () => {
    const { tree } = new HierarchyEnricher(tables).enrich(snapshot);

    expect(tree.Outside?._org_type).toBe("External");
    expect(tree.Outside?._departments["Unknown Department"]?.Partners?.["No Application"]?.QM_P?.Org_Type).toBe("External");
  });

  it("works with no reference data at all", () => {
    const { tree } = new HierarchyEnricher().enrich({ D: { QM_X: managerSnapshot("QM_X", "D") } });

    expect(Object.keys(tree)).toEqual(["Unknown Organization"]);
    expect(tree["Unknown Organization"]?._departments["Unknown Department"]?.D?.["No Application"]?.QM_X?.MQmanager).toBe("QM_X");
  });

  it("joins application rows listed under an alias of the manager", () => {
    const reference = ReferenceIndex.build({ aliases: [{ canonical: "XX_QM1", aliases: ["QM1"] }] });
    const enricher = new HierarchyEnricher({ appMapping: [{ QmgrName: "qm1", Application: "Billing" }] }, reference);

    const { lookup } = enricher.enrich({ D: { XX_QM1: managerSnapshot("XX_QM1", "D") } });

    expect(lookup.XX_QM1?.Application).toBe("Billing");
  });

  it("recognizes a gateway listed under an alias of the manager", () => {
    const reference = ReferenceIndex.build({ aliases: [{ canonical: "XX_QM1", aliases: ["QM1"] }] });
    const enricher = new HierarchyEnricher(
      { appMapping: [{ QmgrName: "QM1", Application: "Billing" }], gateways: [{ QmgrName: "QM1", Scope: "External" }] },
      reference
    );

    const { tree, lookup } = enricher.enrich({ D: { XX_QM1: managerSnapshot("XX_QM1", "D") } });

    expect(lookup.XX_QM1?.Application).toBe("Gateway (External)");
    const node = tree["Unknown Organization"]?._departments["Unknown Department"]?.D?.["Gateway (External)"]?.XX_QM1;
    expect(node?.IsGateway).toBe(true);
    expect(node?.GatewayScope).toBe("External");
  });

  it("is deterministic", () => {
    const enricher = new HierarchyEnricher(tables);
    expect(JSON.stringify(enricher.enrich(snapshot))).toBe(JSON.stringify(enricher.enrich(snapshot)));
  });

  it("rejects a snapshot that is not a mapping", () => {
    expect(() => new HierarchyEnricher().enrich(JSON.parse("null"))).toThrow(InputShapeError);
  });
});
