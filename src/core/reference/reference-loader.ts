/**
 * Reference Data Loader
 *
 * Reads the optional reference tables. A missing file is an empty table; a
 * file that cannot be read or parsed is returned as a ReferenceDataError so
 * the caller decides whether to degrade or fail. Rows that fail validation
 * are dropped one by one.
 *
 * @module
 */

import * as path from "node:path";
import type { z } from "zod";
import { fileExists, readJsonFile } from "../../utils/fs.js";
import { createLogger } from "../../utils/logger.js";
import {
  AliasEntrySchema,
  AppMappingRowSchema,
  ExternalApplicationRowSchema,
  GatewayDefinitionRowSchema,
  OrgHierarchyRowSchema,
  validateRows,
} from "../../utils/validation.js";
import type { ResolvedPaths } from "../../utils/config.js";
import { err, ok, type Result } from "../../types/index.js";
import { ErrorCode, ReferenceDataError } from "../errors.js";
import type { AliasEntry, ExternalApplicationRow, InternalApplicationRow } from "../extraction/types.js";
import type { AppMappingRow, GatewayDefinitionRow, OrgHierarchyRow } from "../hierarchy/types.js";

const logger = createLogger("reference-loader");

export interface ReferenceData {
  orgHierarchy: OrgHierarchyRow[];
  appMapping: AppMappingRow[];
  gateways: GatewayDefinitionRow[];
  aliases: AliasEntry[];
  externalApplications: ExternalApplicationRow[];
}

export interface ReferenceLoadResult {
  data: ReferenceData;
  /** One message per table that existed but could not be used */
  warnings: string[];
}

export type ReferencePaths = Pick<ResolvedPaths, "orgHierarchy" | "appMapping" | "gateways" | "aliases" | "externalApps">;

/**
 * Load one table.
 */
export async function loadReferenceTable<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<Result<T[], ReferenceDataError>> {
  const table = path.basename(filePath);

  if (!(await fileExists(filePath))) {
    logger.debug({ table }, "Reference table not found, using empty table");
    return ok([]);
  }

  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    const malformed = error instanceof SyntaxError;
    return err(
      new ReferenceDataError(
        `${malformed ? "Malformed JSON in" : "Cannot read"} ${table}: ${error instanceof Error ? error.message : String(error)}`,
        malformed ? ErrorCode.REFERENCE_MALFORMED : ErrorCode.REFERENCE_UNREADABLE,
        { filePath }
      )
    );
  }

  if (!Array.isArray(raw)) {
    return err(
      new ReferenceDataError(`${table} must contain a JSON array of rows`, ErrorCode.REFERENCE_MALFORMED, {
        filePath,
        received: typeof raw,
      })
    );
  }

  const { valid, rejected } = validateRows(schema, raw);
  if (rejected > 0) {
    logger.debug({ table, rejected }, "Dropped invalid reference rows");
  }
  logger.debug({ table, rows: valid.length }, "Reference table loaded");
  return ok(valid);
}

/**
 * Load every reference table, degrading unusable ones to empty tables.
 */
export async function loadReferenceData(paths: ReferencePaths): Promise<ReferenceLoadResult> {
  const warnings: string[] = [];

  const settle = <T>(result: Result<T[], ReferenceDataError>): T[] => {
    if (result.ok) return result.value;
    logger.warn({ err: result.error, filePath: result.error.filePath }, "Reference table unusable, using empty table");
    warnings.push(result.error.message);
    return [];
  };

  const [orgHierarchy, appMapping, gateways, aliases, externalApplications] = await Promise.all([
    loadReferenceTable(paths.orgHierarchy, OrgHierarchyRowSchema),
    loadReferenceTable(paths.appMapping, AppMappingRowSchema),
    loadReferenceTable(paths.gateways, GatewayDefinitionRowSchema),
    loadReferenceTable(paths.aliases, AliasEntrySchema),
    loadReferenceTable(paths.externalApps, ExternalApplicationRowSchema),
  ]);

  const data: ReferenceData = {
    orgHierarchy: settle(orgHierarchy),
    appMapping: settle(appMapping),
    gateways: settle(gateways),
    aliases: settle(aliases),
    externalApplications: settle(externalApplications),
  };

  logger.info(
    {
      orgHierarchy: data.orgHierarchy.length,
      appMapping: data.appMapping.length,
      gateways: data.gateways.length,
      aliases: data.aliases.length,
      externalApplications: data.externalApplications.length,
    },
    "Reference data loaded"
  );

  return { data, warnings };
}

/**
 * Applications named by the app-to-manager mapping, all of them Internal.
 */
export function internalApplicationsOf(appMapping: readonly AppMappingRow[]): InternalApplicationRow[] {
  return appMapping.flatMap((row) => (row.Application ? [{ Application: row.Application }] : []));
}
