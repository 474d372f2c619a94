import { describe, it, expect } from "vitest";
import {
  AliasEntrySchema,
  ExternalApplicationRowSchema,
  GatewayDefinitionRowSchema,
  OrgHierarchyRowSchema,
  PipelineConfigSchema,
  formatZodError,
  safeValidate,
  validateRows,
} from "../validation.js";

describe("reference row schemas", () => {
  it("normalizes cells to trimmed strings", () => {
    const { valid, rejected } = validateRows(OrgHierarchyRowSchema, [
      { Biz_Ownr: " Payments ", Organization: 42, Department: null },
      { Organization: "No owner" },
      { Biz_Ownr: "   " },
      "not a row",
    ]);

    expect(valid).toEqual([{ Biz_Ownr: "Payments", Organization: "42" }]);
    expect(valid[0]?.Department).toBeUndefined();
    expect(rejected).toBe(3);
  });

  it("needs a name on gateway rows", () => {
    expect(GatewayDefinitionRowSchema.safeParse({ name: "GW1" }).success).toBe(true);
    expect(GatewayDefinitionRowSchema.safeParse({ Scope: "Internal" }).success).toBe(false);
  });

  it("defaults optional columns", () => {
    expect(ExternalApplicationRowSchema.parse({ name: "PARTNER" })).toEqual({ name: "PARTNER", type: "External" });
    expect(AliasEntrySchema.parse({ canonical: "QM1" })).toEqual({ canonical: "QM1", aliases: [] });
  });
});

describe("PipelineConfigSchema", () => {
  it("fills every default", () => {
    const config = PipelineConfigSchema.parse({});

    expect(config.inputDir).toBe("input");
    expect(config.outputDir).toBe("output");
    expect(config.files.cmdbExport).toBe("all_MQCMDB_assets.json");
    expect(config.dedup).toEqual({ enabled: true, assetField: "asset", ignoreType: "QCluster" });
    expect(config.cleanup).toEqual({
      enabled: true,
      retentionDays: 30,
      patterns: ["data/changes_*.json", "data/gateway_analytics_*.json"],
    });
  });

  it("formats issues with their path", () => {
    const result = safeValidate(PipelineConfigSchema, { cleanup: { retentionDays: 0 } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toEqual(["cleanup.retentionDays: Number must be greater than 0"]);
    }
  });
});
