/**
 * Asset Deduplication
 *
 * Cluster definitions are exported alongside the concrete queue they front,
 * so the same asset shows up twice. When an asset is duplicated, rows whose
 * type equals the ignore type are dropped.
 *
 * @module
 */

import { isRecord } from "../../types/index.js";

export interface DeduplicatorOptions {
  assetField?: string;
  assetTypeField?: string;
  ignoreType?: string;
}

export class AssetDeduplicator {
  private readonly assetField: string;
  private readonly assetTypeField: string;
  private readonly ignoreType: string;

  constructor(options: DeduplicatorOptions = {}) {
    this.assetField = options.assetField ?? "asset";
    this.assetTypeField = options.assetTypeField ?? "asset_type";
    this.ignoreType = options.ignoreType ?? "QCluster";
  }

  /**
   * Groups keep first-seen order. A group made only of ignore-type rows
   * keeps its first row.
   */
  deduplicate<T>(records: readonly T[]): T[] {
    const first = records[0];
    if (first === undefined || !isRecord(first) || !(this.assetField in first)) {
      return [...records];
    }

    const groups = new Map<unknown, T[]>();
    for (const record of records) {
      const key = isRecord(record) ? record[this.assetField] : undefined;
      const group = groups.get(key);
      if (group) {
        group.push(record);
      } else {
        groups.set(key, [record]);
      }
    }

    const result: T[] = [];
    for (const group of groups.values()) {
      if (group.length === 1) {
        result.push(...group);
        continue;
      }
      const kept = group.filter((record) => !this.isIgnoredType(record));
      result.push(...(kept.length > 0 ? kept : group.slice(0, 1)));
    }
    return result;
  }

  private isIgnoredType(record: unknown): boolean {
    return isRecord(record) && record[this.assetTypeField] === this.ignoreType;
  }
}
