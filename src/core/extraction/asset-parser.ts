/**
 * Asset Parser
 *
 * Pure string helpers for reading one CMDB row: queue-type classification,
 * role detection and the remainder left after removing the owning manager's
 * name from the asset string.
 *
 * @module
 */

import { isRecord, normalizeValue } from "../../types/index.js";
import {
  UNKNOWN_DIRECTORATE,
  type CmdbRecord,
  type FieldMappings,
  type QueueType,
  type Role,
} from "./types.js";

/**
 * Read a raw row through the field mappings. Returns null for rows that are
 * not objects or carry no manager name; those are export noise, not errors.
 */
export function normalizeRecord(raw: unknown, mappings: FieldMappings): CmdbRecord | null {
  if (!isRecord(raw)) return null;

  const managerName = normalizeValue(raw[mappings.manager]);
  if (!managerName) return null;

  return {
    managerName,
    assetName: normalizeValue(raw[mappings.asset]),
    assetType: normalizeValue(raw[mappings.assetType]).toLowerCase(),
    directorate: normalizeValue(raw[mappings.directorate]) || UNKNOWN_DIRECTORATE,
    role: normalizeValue(raw[mappings.role]).toUpperCase(),
  };
}

/**
 * Substring match on the asset type hint. Unmatched hints count nothing.
 */
export function classifyQueueType(assetTypeHint: string): QueueType | null {
  const hint = assetTypeHint.toLowerCase();
  if (hint.includes("local") && !hint.includes("remote")) return "qlocal";
  if (hint.includes("remote")) return "qremote";
  if (hint.includes("alias")) return "qalias";
  return null;
}

/**
 * SENDER wins when a role mentions both.
 */
export function parseRole(role: string): Role | null {
  const value = role.toUpperCase();
  if (value.includes("SENDER")) return "SENDER";
  if (value.includes("RECEIVER")) return "RECEIVER";
  return null;
}

/**
 * Remove the manager name from the asset string and trim dots.
 *
 * - `QM_A.QM_B.QUEUE` on `QM_A` gives `QM_B.QUEUE`
 * - `APP.QM_A.TARGET` on `QM_A` gives `TARGET` (everything after the name)
 * - an asset that never mentions the manager is returned dot-trimmed
 */
export function extractRemainder(assetName: string, managerName: string): string {
  const asset = assetName.trim();
  const manager = managerName.trim();
  if (!asset || !manager) return "";

  const assetUpper = asset.toUpperCase();
  const managerUpper = manager.toUpperCase();
  const prefix = `${managerUpper}.`;

  let remainder: string;
  if (assetUpper.startsWith(prefix)) {
    remainder = asset.slice(prefix.length);
  } else {
    const index = assetUpper.indexOf(managerUpper);
    remainder = index >= 0 ? asset.slice(index + manager.length) : asset;
  }

  return trimDots(remainder);
}

export function trimDots(value: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && value[start] === ".") start++;
  while (end > start && value[end - 1] === ".") end--;
  return value.slice(start, end);
}

/**
 * Non-empty dot-separated tokens, in order.
 */
export function splitTokens(remainder: string): string[] {
  return remainder.split(".").filter((token) => token.length > 0);
}
