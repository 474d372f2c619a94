/**
 * Manager Index (pass 1)
 *
 * Scans every record once to collect the universe of valid manager names and
 * each manager's owning directorate. Relationship resolution for a record may
 * reference a manager that only appears in a later record, so this pass must
 * complete before any edge is inferred.
 *
 * @module
 */

import type { ReferenceIndex } from "./reference-index.js";
import { UNKNOWN_DIRECTORATE, type CmdbRecord } from "./types.js";

/**
 * A manager name after alias resolution.
 */
export interface CanonicalName {
  /** Uppercased canonical name, the key for every comparison */
  key: string;
  /** Spelling used for display and as the graph node name */
  display: string;
  /** True when the input was an alias of a different canonical name */
  viaAlias: boolean;
}

export type ManagerMatch = CanonicalName;

export interface ManagerSearchResult {
  match: ManagerMatch | null;
  /** A token named the current manager itself and was skipped */
  sawSelf: boolean;
}

export class ManagerIndex {
  private readonly displayNames = new Map<string, string>();
  private readonly directorates = new Map<string, string>();

  constructor(private readonly reference: ReferenceIndex) {}

  canonicalize(name: string): CanonicalName {
    const upper = name.trim().toUpperCase();
    const canonical = this.reference.resolveAlias(upper);
    if (canonical === undefined) {
      return { key: upper, display: this.displayNames.get(upper) ?? name.trim(), viaAlias: false };
    }
    const key = canonical.toUpperCase();
    return { key, display: canonical, viaAlias: key !== upper };
  }

  /**
   * Register a manager seen in a record. The first spelling is kept for
   * display; the first directorate other than "Unknown" owns the manager.
   */
  register(record: CmdbRecord): void {
    const name = this.canonicalize(record.managerName);
    if (!this.displayNames.has(name.key)) {
      this.displayNames.set(name.key, name.display);
    }

    const existing = this.directorates.get(name.key);
    if (
      existing === undefined ||
      (existing === UNKNOWN_DIRECTORATE && record.directorate !== UNKNOWN_DIRECTORATE)
    ) {
      this.directorates.set(name.key, record.directorate);
    }
  }

  has(key: string): boolean {
    return this.displayNames.has(key);
  }

  get size(): number {
    return this.displayNames.size;
  }

  displayName(key: string): string {
    return this.displayNames.get(key) ?? key;
  }

  directorateOf(key: string): string {
    return this.directorates.get(key) ?? UNKNOWN_DIRECTORATE;
  }

  /**
   * Resolve a single token to a known manager through the alias table.
   */
  resolve(token: string): ManagerMatch | null {
    const name = this.canonicalize(token);
    if (!this.has(name.key)) return null;
    return { key: name.key, display: this.displayName(name.key), viaAlias: name.viaAlias };
  }

  /**
   * First dot-separated token (then the whole string) naming a known manager
   * other than `selfKey`.
   */
  findManager(tokens: readonly string[], whole: string, selfKey: string): ManagerSearchResult {
    let sawSelf = false;

    for (const candidate of [...tokens, whole]) {
      const match = this.resolve(candidate);
      if (!match) continue;
      if (match.key === selfKey) {
        sawSelf = true;
        continue;
      }
      return { match, sawSelf };
    }

    return { match: null, sawSelf };
  }
}

/**
 * Pass 1: index every manager named by a record.
 */
export function buildManagerIndex(
  records: readonly CmdbRecord[],
  reference: ReferenceIndex
): ManagerIndex {
  const index = new ManagerIndex(reference);
  for (const record of records) {
    index.register(record);
  }
  return index;
}
