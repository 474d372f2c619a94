import { describe, it, expect } from "vitest";
import { ChangeDetector, percentChange } from "../change-detector.js";
import { ChangeDetectionError, InputShapeError } from "../../errors.js";
import { enrichedNode, treeOf } from "../../hierarchy/__tests__/tree-fixtures.js";

const baseline = treeOf(
  enrichedNode("QM_A", { outbound: ["QM_B"], qlocal_count: 10 }),
  enrichedNode("QM_B", { inbound: ["QM_A"], qlocal_count: 1000 }),
  enrichedNode("QM_OLD", { Organization: "Org2" }),
  enrichedNode("GW1", { IsGateway: true, GatewayScope: "Internal", Application: "Gateway (Internal)" }),
  enrichedNode("GW2", { IsGateway: true, GatewayScope: "External", Application: "Gateway (External)" })
);

const current = treeOf(
  enrichedNode("QM_A", { Department: "D2", outbound: ["QM_C"], outbound_extra: ["X.Q"], qlocal_count: 12 }),
  enrichedNode("QM_B", { qlocal_count: 1199 }),
  enrichedNode("QM_C", { Organization: "Org3", inbound: ["QM_A"] }),
  enrichedNode("GW1", { IsGateway: true, GatewayScope: "External", Application: "Gateway (External)" }),
  enrichedNode("GW3", { Organization: "Org3", IsGateway: true, GatewayScope: "Internal", Application: "Gateway (Internal)" })
);

describe("ChangeDetector", () => {
  it("reports nothing for identical trees", () => {
    const changes = new ChangeDetector().compare(current, structuredClone(current));

    expect(changes.summary.total_changes).toBe(0);
    expect(changes.mqmanagers).toEqual({ added: [], removed: [], modified: [] });
    expect(changes.queue_counts).toEqual([]);
  });

  it("reports added, removed and modified managers", () => {
    const { mqmanagers } = new ChangeDetector().compare(current, baseline);

    expect(mqmanagers.added).toEqual([
      { name: "GW3", organization: "Org3", department: "D1", application: "Gateway (Internal)", is_gateway: true },
      { name: "QM_C", organization: "Org3", department: "D1", application: "App1", is_gateway: false },
    ]);
    expect(mqmanagers.removed.map((entry) => entry.name)).toEqual(["GW2", "QM_OLD"]);
    expect(mqmanagers.modified).toEqual([
      { name: "GW1", changes: { Application: { old: "Gateway (Internal)", new: "Gateway (External)" } } },
      { name: "QM_A", changes: { Department: { old: "D1", new: "D2" } } },
    ]);
  });

  it("diffs outbound connections including unresolved endpoints", () => {
    const { connections } = new ChangeDetector().compare(current, baseline);

    expect(connections.added).toEqual([
      { source: "QM_A", target: "QM_C", source_org: "Org1", target_org: "Org3" },
      { source: "QM_A", target: "X.Q", source_org: "Org1", target_org: "" },
    ]);
    expect(connections.removed).toEqual([{ source: "QM_A", target: "QM_B", source_org: "Org1", target_org: "Org1" }]);
  });

  it("diffs gateways and their scope", () => {
    const { gateways } = new ChangeDetector().compare(current, baseline);

    expect(gateways.added).toEqual([{ name: "GW3", scope: "Internal", organization: "Org3", department: "D1" }]);
    expect(gateways.removed).toEqual([{ name: "GW2", scope: "External", organization: "Org1" }]);
    expect(gateways.modified).toEqual([{ name: "GW1", old_scope: "Internal", new_scope: "External" }]);
  });

  it("reports queue count changes at or above the threshold", () => {
    const { queue_counts } = new ChangeDetector({ thresholdPercent: 20 }).compare(current, baseline);

    expect(queue_counts).toEqual([
      { mqmanager: "QM_A", queue_type: "qlocal", old_count: 10, new_count: 12, change_percent: 20 },
    ]);
  });

  it("totals every category in the summary", () => {
    expect(new ChangeDetector().compare(current, baseline).summary).toEqual({
      mqmanagers_added: 2,
      mqmanagers_removed: 2,
      mqmanagers_modified: 2,
      connections_added: 2,
      connections_removed: 1,
      gateways_added: 1,
      gateways_removed: 1,
      gateways_modified: 1,
      queue_count_changes: 1,
      total_changes: 13,
    });
  });

  it("reports small changes with a zero threshold", () => {
    const before = treeOf(enrichedNode("QM_A", { qremote_count: 1000 }));
    const after = treeOf(enrichedNode("QM_A", { qremote_count: 1001 }));

    expect(new ChangeDetector({ thresholdPercent: 0 }).compare(after, before).queue_counts).toEqual([
      { mqmanager: "QM_A", queue_type: "qremote", old_count: 1000, new_count: 1001, change_percent: 0.1 },
    ]);
  });

  it("treats a count appearing from zero as a full change", () => {
    const before = treeOf(enrichedNode("QM_A"));
    const after = treeOf(enrichedNode("QM_A", { qalias_count: 5 }));

    expect(new ChangeDetector({ thresholdPercent: 50 }).compare(after, before).queue_counts).toEqual([
      { mqmanager: "QM_A", queue_type: "qalias", old_count: 0, new_count: 5, change_percent: 100 },
    ]);
  });

  it("rejects trees that are not mappings", () => {
    expect(() => new ChangeDetector().compare([], baseline)).toThrow(InputShapeError);
    expect(() => new ChangeDetector().compare(current, "baseline")).toThrow(
      "Enriched baseline tree must be a mapping of organizations"
    );
  });

  it("rejects a baseline with a malformed organization instead of dropping it", () => {
    const broken = JSON.parse(JSON.stringify(baseline));
    broken.Org1._departments.D1.Owner1.App1.QM_B.qlocal_count = null;

    expect(() => new ChangeDetector().compare(current, broken)).toThrow(InputShapeError);
    expect(() => new ChangeDetector().compare(current, broken)).toThrow('Malformed organization "Org1" in baseline tree');
  });

  it("rejects an invalid threshold", () => {
    expect(() => new ChangeDetector({ thresholdPercent: -1 })).toThrow(ChangeDetectionError);
    expect(() => new ChangeDetector({ thresholdPercent: Number.NaN })).toThrow(ChangeDetectionError);
  });
});

describe("percentChange", () => {
  it("is relative to the old count", () => {
    expect(percentChange(10, 12)).toBe(20);
    expect(percentChange(10, 5)).toBe(50);
    expect(percentChange(1000, 1199)).toBeCloseTo(19.9);
  });

  it("handles zero counts", () => {
    expect(percentChange(0, 0)).toBeUndefined();
    expect(percentChange(0, 7)).toBe(100);
    expect(percentChange(7, 0)).toBe(100);
  });
});
