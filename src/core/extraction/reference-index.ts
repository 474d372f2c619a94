/**
 * Reference Index
 *
 * Immutable lookup structures for manager aliases and known applications,
 * built once when the extractor is constructed and shared read-only by the
 * parsing pass.
 *
 * @module
 */

import { createLogger } from "../../utils/logger.js";
import { normalizeValue, toScope } from "../../types/index.js";
import type {
  AliasEntry,
  ExternalApplicationRow,
  InternalApplicationRow,
  KnownApplication,
} from "./types.js";

const logger = createLogger("reference-index");

export interface ReferenceTables {
  aliases?: readonly AliasEntry[];
  internalApplications?: readonly InternalApplicationRow[];
  externalApplications?: readonly ExternalApplicationRow[];
}

/**
 * Alias and application lookups. All keys are uppercased.
 *
 * Invariants:
 * - every alias maps to exactly one canonical name (first entry wins on conflict)
 * - a canonical name maps to itself
 */
export class ReferenceIndex {
  private readonly aliasToCanonical: ReadonlyMap<string, string>;
  private readonly applications: ReadonlyMap<string, KnownApplication>;

  private constructor(
    aliasToCanonical: Map<string, string>,
    applications: Map<string, KnownApplication>
  ) {
    this.aliasToCanonical = aliasToCanonical;
    this.applications = applications;
  }

  static empty(): ReferenceIndex {
    return new ReferenceIndex(new Map(), new Map());
  }

  static build(tables: ReferenceTables = {}): ReferenceIndex {
    const aliasToCanonical = new Map<string, string>();
    let conflicts = 0;

    for (const entry of tables.aliases ?? []) {
      const canonical = normalizeValue(entry.canonical);
      if (!canonical) continue;

      const names = [canonical, ...entry.aliases.map(normalizeValue)];
      for (const name of names) {
        if (!name) continue;
        const key = name.toUpperCase();
        const existing = aliasToCanonical.get(key);
        if (existing === undefined) {
          aliasToCanonical.set(key, canonical);
        } else if (existing.toUpperCase() !== canonical.toUpperCase()) {
          conflicts++;
          logger.warn({ alias: name, kept: existing, ignored: canonical }, "Alias mapped to more than one canonical name");
        }
      }
    }

    const applications = new Map<string, KnownApplication>();
    for (const row of tables.internalApplications ?? []) {
      const name = normalizeValue(row.Application);
      if (name) {
        applications.set(name.toUpperCase(), { name, scope: "Internal" });
      }
    }
    // Explicitly typed entries override the implicit Internal classification
    for (const row of tables.externalApplications ?? []) {
      const name = normalizeValue(row.name);
      if (name) {
        applications.set(name.toUpperCase(), { name, scope: toScope(row.type) });
      }
    }

    logger.debug(
      { aliases: aliasToCanonical.size, applications: applications.size, conflicts },
      "Reference index built"
    );

    return new ReferenceIndex(aliasToCanonical, applications);
  }

  /**
   * Canonical spelling for a name that appears in the alias table,
   * or undefined when the name is not listed.
   */
  resolveAlias(name: string): string | undefined {
    return this.aliasToCanonical.get(name.toUpperCase());
  }

  lookupApplication(name: string): KnownApplication | undefined {
    return this.applications.get(name.toUpperCase());
  }

  get aliasCount(): number {
    return this.aliasToCanonical.size;
  }

  get applicationCount(): number {
    return this.applications.size;
  }
}
