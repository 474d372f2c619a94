/**
 * Shared types for MQ Topology
 */

export * from "./result.js";

/**
 * Classification shared by organizations, applications and gateways.
 */
export type Scope = "Internal" | "External";

/**
 * Normalize a free-text scope or org type. Anything other than
 * "external" (case-insensitive) is Internal.
 */
export function toScope(value: string | null | undefined): Scope {
  return value?.trim().toLowerCase() === "external" ? "External" : "Internal";
}

/**
 * Normalize a raw cell value to a trimmed string.
 */
export function normalizeValue(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).trim();
}

/**
 * Plain object check used at the shape-validation boundary.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
