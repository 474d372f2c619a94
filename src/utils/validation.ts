/**
 * Runtime Validation Schemas
 *
 * Zod schemas for the pipeline configuration and the reference tables read
 * from disk. Reference files are hand-maintained spreadsheets exported to
 * JSON, so cells may arrive as numbers or padded strings; every cell is
 * normalized to a trimmed string here.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Cells
// =============================================================================

/** A spreadsheet cell, normalized to a trimmed string. */
const CellSchema = z.union([z.string(), z.number()]).transform((value) => String(value).trim());

/** A cell that must be present and non-blank. */
const RequiredCellSchema = CellSchema.pipe(z.string().min(1));

/** A cell that may be absent, null or blank. */
const OptionalCellSchema = z
  .union([z.string(), z.number(), z.null()])
  .optional()
  .transform((value) => (value === null || value === undefined ? undefined : String(value).trim()));

// =============================================================================
// Reference Table Rows
// =============================================================================

export const AliasEntrySchema = z.object({
  canonical: RequiredCellSchema,
  aliases: z.array(CellSchema).default([]),
});

export const OrgHierarchyRowSchema = z.object({
  Biz_Ownr: RequiredCellSchema,
  Organization: OptionalCellSchema,
  Department: OptionalCellSchema,
  Org_Type: OptionalCellSchema,
});

export const AppMappingRowSchema = z.object({
  QmgrName: RequiredCellSchema,
  Application: OptionalCellSchema,
});

export const GatewayDefinitionRowSchema = z
  .object({
    QmgrName: OptionalCellSchema,
    name: OptionalCellSchema,
    Scope: OptionalCellSchema,
    Description: OptionalCellSchema,
  })
  .refine((row) => Boolean(row.QmgrName || row.name), {
    message: "Gateway row needs QmgrName or name",
  });

export const ExternalApplicationRowSchema = z.object({
  name: RequiredCellSchema,
  type: CellSchema.default("External"),
});

// =============================================================================
// Pipeline Configuration Schema
// =============================================================================

export const FieldMappingsSchema = z.object({
  manager: z.string().min(1).default("MQmanager"),
  asset: z.string().min(1).default("asset"),
  assetType: z.string().min(1).default("asset_type"),
  directorate: z.string().min(1).default("directorate"),
  role: z.string().min(1).default("Role"),
});

export const InputFilesSchema = z.object({
  /** CMDB export, read from the output directory where the exporter writes it */
  cmdbExport: z.string().min(1).default("all_MQCMDB_assets.json"),
  orgHierarchy: z.string().min(1).default("org_hierarchy.json"),
  appMapping: z.string().min(1).default("app_to_qmgr.json"),
  gateways: z.string().min(1).default("gateways.json"),
  aliases: z.string().min(1).default("mqmanager_aliases.json"),
  externalApps: z.string().min(1).default("external_apps.json"),
});

export const DedupConfigSchema = z.object({
  enabled: z.boolean().default(true),
  assetField: z.string().min(1).default("asset"),
  ignoreType: z.string().min(1).default("QCluster"),
});

export const CleanupConfigSchema = z.object({
  enabled: z.boolean().default(true),
  retentionDays: z.number().int().positive().default(30),
  patterns: z.array(z.string().min(1)).default(["data/changes_*.json", "data/gateway_analytics_*.json"]),
});

export const PipelineConfigSchema = z.object({
  inputDir: z.string().min(1).default("input"),
  outputDir: z.string().min(1).default("output"),
  logDir: z.string().min(1).default("logs"),

  files: InputFilesSchema.default({}),
  fieldMappings: FieldMappingsSchema.default({}),

  /** Minimum queue-count change, in percent, reported by change detection */
  changeThresholdPercent: z.number().min(0).default(20),
  enableChangeDetection: z.boolean().default(true),
  enableGatewayAnalytics: z.boolean().default(true),

  dedup: DedupConfigSchema.default({}),
  cleanup: CleanupConfigSchema.default({}),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate each row on its own, keeping the valid ones.
 */
export function validateRows<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  rows: readonly unknown[]
): { valid: T[]; rejected: number } {
  const valid: T[] = [];
  let rejected = 0;
  for (const row of rows) {
    const result = schema.safeParse(row);
    if (result.success) {
      valid.push(result.data);
    } else {
      rejected++;
    }
  }
  return { valid, rejected };
}
