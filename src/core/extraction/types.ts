/**
 * Extraction Types
 *
 * Types shared by the asset parser, the reference index and the
 * manager processor.
 *
 * @module
 */

import type { Scope } from "../../types/index.js";

// =============================================================================
// CMDB Input
// =============================================================================

/**
 * Column names used to read a raw CMDB row. The export's headers vary between
 * source databases, so every field is configurable.
 */
export interface FieldMappings {
  manager: string;
  asset: string;
  assetType: string;
  directorate: string;
  role: string;
}

export const DEFAULT_FIELD_MAPPINGS: Readonly<FieldMappings> = {
  manager: "MQmanager",
  asset: "asset",
  assetType: "asset_type",
  directorate: "directorate",
  role: "Role",
};

/**
 * One normalized CMDB row. `assetType` is lowercased and `role` uppercased.
 */
export interface CmdbRecord {
  managerName: string;
  assetName: string;
  assetType: string;
  directorate: string;
  role: string;
}

/** Directorate assigned when a row carries none. */
export const UNKNOWN_DIRECTORATE = "Unknown";

// =============================================================================
// Classification
// =============================================================================

export type QueueType = "qlocal" | "qremote" | "qalias";

export type Role = "SENDER" | "RECEIVER";

/**
 * What the remainder of an asset string points at.
 */
export type RemainderTarget =
  | { kind: "manager"; name: string; viaAlias: boolean }
  | { kind: "application"; name: string; scope: Scope }
  | { kind: "extra"; value: string };

// =============================================================================
// Reference Tables
// =============================================================================

export interface AliasEntry {
  canonical: string;
  aliases: string[];
}

/** Row of the internal application table (the app-to-manager mapping). */
export interface InternalApplicationRow {
  Application: string;
}

export interface ExternalApplicationRow {
  name: string;
  type: string;
}

export interface KnownApplication {
  name: string;
  scope: Scope;
}

// =============================================================================
// Statistics
// =============================================================================

/**
 * Operator diagnostics. Nothing downstream reads these.
 */
export interface ProcessingStats {
  totalRecords: number;
  skippedRecords: number;
  processedSender: number;
  processedReceiver: number;
  inboundFound: number;
  outboundFound: number;
  inboundExtraFound: number;
  outboundExtraFound: number;
  inboundAppsFound: number;
  outboundAppsFound: number;
  aliasesResolved: number;
  /** Records whose remainder named no manager other than their own */
  selfReferencesDropped: number;
}

export function createEmptyStats(totalRecords: number = 0): ProcessingStats {
  return {
    totalRecords,
    skippedRecords: 0,
    processedSender: 0,
    processedReceiver: 0,
    inboundFound: 0,
    outboundFound: 0,
    inboundExtraFound: 0,
    outboundExtraFound: 0,
    inboundAppsFound: 0,
    outboundAppsFound: 0,
    aliasesResolved: 0,
    selfReferencesDropped: 0,
  };
}
