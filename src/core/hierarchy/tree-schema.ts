/**
 * Lenient reader for enriched trees loaded from disk.
 *
 * Baselines written by older runs may lack newer fields, so every manager
 * field falls back to its empty value when absent. Top-level entries without
 * a `_departments` mapping are not organizations and are skipped.
 *
 * A field that is present but malformed (a `null` count, a string list that
 * is not a list) invalidates its organization. In strict mode that raises;
 * otherwise the organization is skipped with a warning.
 *
 * @module
 */

import { z } from "zod";
import { createLogger } from "../../utils/logger.js";
import { formatZodError } from "../../utils/validation.js";
import { isRecord, toScope } from "../../types/index.js";
import { ErrorCode, InputShapeError } from "../errors.js";
import type { EnrichedTree, GatewayScope } from "./types.js";

const logger = createLogger("tree-schema");

const ScopeSchema = z
  .string()
  .nullish()
  .transform((value) => toScope(value));

const GatewayScopeSchema = z
  .string()
  .nullish()
  .transform((value): GatewayScope => (value ? toScope(value) : ""));

const NamesSchema = z.array(z.string()).default([]);
const CountSchema = z.number().nonnegative().default(0);

export const EnrichedNodeSchema = z.object({
  Organization: z.string().default(""),
  Org_Type: ScopeSchema,
  Department: z.string().default(""),
  Biz_Ownr: z.string().default(""),
  Application: z.string().default(""),
  MQmanager: z.string().default(""),
  qlocal_count: CountSchema,
  qremote_count: CountSchema,
  qalias_count: CountSchema,
  total_count: CountSchema,
  inbound: NamesSchema,
  outbound: NamesSchema,
  inbound_extra: NamesSchema,
  outbound_extra: NamesSchema,
  inbound_apps: NamesSchema,
  outbound_apps: NamesSchema,
  inbound_apps_external: NamesSchema,
  outbound_apps_external: NamesSchema,
  IsGateway: z.boolean().default(false),
  GatewayScope: GatewayScopeSchema,
  GatewayDescription: z.string().default(""),
});

export const OrganizationNodeSchema = z.object({
  _org_type: ScopeSchema,
  _departments: z.record(
    z.string(),
    z.record(z.string(), z.record(z.string(), z.record(z.string(), EnrichedNodeSchema)))
  ),
});

export interface ParseTreeOptions {
  /** Names the tree in messages */
  label?: string;
  /** Raise on a malformed organization instead of skipping it */
  strict?: boolean;
}

/**
 * Parse an enriched tree of unknown provenance.
 *
 * @throws InputShapeError when `value` is not a mapping, or in strict mode
 * when an organization is malformed
 */
export function parseEnrichedTree(value: unknown, options: ParseTreeOptions = {}): EnrichedTree {
  const { label = "tree", strict = false } = options;

  if (!isRecord(value)) {
    throw new InputShapeError(`Enriched ${label} must be a mapping of organizations`, ErrorCode.INPUT_NOT_A_MAPPING, {
      received: Array.isArray(value) ? "array" : typeof value,
    });
  }

  const tree: EnrichedTree = {};
  for (const [orgName, orgValue] of Object.entries(value)) {
    if (!isRecord(orgValue) || !("_departments" in orgValue)) {
      logger.debug({ label, key: orgName }, "Skipping non-organization entry");
      continue;
    }
    const result = OrganizationNodeSchema.safeParse(orgValue);
    if (!result.success) {
      const issues = formatZodError(result.error);
      if (strict) {
        throw new InputShapeError(
          `Malformed organization "${orgName}" in ${label}: ${issues.join("; ")}`,
          ErrorCode.INPUT_MALFORMED_TREE,
          { organization: orgName, issues }
        );
      }
      logger.warn({ label, organization: orgName, issues }, "Skipping malformed organization");
      continue;
    }
    tree[orgName] = result.data;
  }
  return tree;
}
