import { describe, it, expect } from "vitest";
import { AssetDeduplicator } from "../deduplication.js";

describe("AssetDeduplicator", () => {
  it("drops cluster rows only where the asset is duplicated", () => {
    const rows = [
      { asset: "Q1", asset_type: "QLocal" },
      { asset: "Q1", asset_type: "QCluster" },
      { asset: "Q2", asset_type: "QCluster" },
      { asset: "Q3", asset_type: "QCluster", n: 1 },
      { asset: "Q3", asset_type: "QCluster", n: 2 },
      { asset: "Q4", asset_type: "QRemote" },
      { asset: "Q4", asset_type: "QAlias" },
    ];

    expect(new AssetDeduplicator().deduplicate(rows)).toEqual([
      { asset: "Q1", asset_type: "QLocal" },
      { asset: "Q2", asset_type: "QCluster" },
      { asset: "Q3", asset_type: "QCluster", n: 1 },
      { asset: "Q4", asset_type: "QRemote" },
      { asset: "Q4", asset_type: "QAlias" },
    ]);
  });

  it("returns a copy when the first row has no asset column", () => {
    const rows = [{ name: "Q1" }, { name: "Q1" }];
    const result = new AssetDeduplicator().deduplicate(rows);

    expect(result).toEqual(rows);
    expect(result).not.toBe(rows);
  });

  it("reads the configured columns", () => {
    const rows = [
      { queue: "Q1", kind: "Shadow" },
      { queue: "Q1", kind: "QLocal" },
    ];
    const deduplicator = new AssetDeduplicator({ assetField: "queue", assetTypeField: "kind", ignoreType: "Shadow" });

    expect(deduplicator.deduplicate(rows)).toEqual([{ queue: "Q1", kind: "QLocal" }]);
  });

  it("handles an empty list", () => {
    expect(new AssetDeduplicator().deduplicate([])).toEqual([]);
  });
});
