// Version totalization.
// Purpose: fold per-version deltas into total, cumulative relations for every version v1..current.
// Assumes the model passed validation: re-declared slots carry the type they already had.

import type { OntologyModel, TypeName } from "../ontology/model.js";
import { deriveExportedFunctions } from "../ontology/model.js";
import { versionRange, versionRank, type VersionTag } from "../ontology/versions.js";
import { compareText } from "../validation/diagnostics.js";

// =============================================================================
// TYPES
// =============================================================================

export type Pair = readonly [left: string, right: string];

export type TotalizedVersion = {
  readonly id: VersionTag;
  /** Interface ids, sorted. */
  readonly exports: readonly string[];
  /** Function ids, sorted and deduplicated. */
  readonly exportedFunctions: readonly string[];
  /** Cumulative slot ids, sorted. */
  readonly layout: readonly string[];
  readonly slotTypes: ReadonlyMap<string, TypeName>;
};

export type TotalizedModel = {
  readonly model: OntologyModel;
  readonly packageId: string;
  readonly current: VersionTag;
  /** One entry per version v1..current, in version order. */
  readonly versions: readonly TotalizedVersion[];
  readonly bindings: readonly Pair[];
  readonly facetOf: readonly Pair[];
  readonly reads: readonly Pair[];
  readonly writes: readonly Pair[];
  readonly requires: readonly Pair[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function totalize(model: OntologyModel): TotalizedModel {
  const versions: TotalizedVersion[] = [];
  let layout = new Set<string>();
  let slotTypes = new Map<string, TypeName>();
  let exports: ReadonlySet<string> = new Set();

  for (const id of versionRange(model.current)) {
    const delta = model.versions.get(id);
    if (delta) {
      layout = new Set([...layout, ...delta.slots]);
      slotTypes = new Map(slotTypes);
      for (const [slot, type] of delta.slotTypes) {
        if (type !== undefined && !slotTypes.has(slot)) {
          slotTypes.set(slot, type);
        }
      }
      exports = delta.exports ?? exports;
    }

    versions.push({
      id,
      exports: sortedIds(exports),
      exportedFunctions: sortedIds(deriveExportedFunctions(model, exports)),
      layout: sortedIds(layout),
      slotTypes,
    });
  }

  const reads: Pair[] = [];
  const writes: Pair[] = [];
  for (const impl of model.implementations.values()) {
    for (const slot of impl.reads) reads.push([impl.id, slot]);
    for (const slot of impl.writes) writes.push([impl.id, slot]);
  }

  return {
    model,
    packageId: model.packageId,
    current: model.current,
    versions,
    bindings: sortPairs(model.bindings),
    facetOf: sortPairs(model.facetOf),
    reads: sortPairs(reads),
    writes: sortPairs(writes),
    requires: sortPairs(model.requires),
  };
}

export function currentVersion(totalized: TotalizedModel): TotalizedVersion {
  return versionAt(totalized, totalized.current);
}

/** Entry for `version`; versions are dense from v1, so the rank indexes directly. */
export function versionAt(totalized: TotalizedModel, version: VersionTag): TotalizedVersion {
  const entry = totalized.versions[versionRank(version) - 1];
  if (!entry || entry.id !== version) {
    throw new RangeError(`Totalized model has no entry for ${version}`);
  }
  return entry;
}

/** Type of `slot` in the cumulative layout at `version`. */
export function slotTypeAt(
  totalized: TotalizedModel,
  version: VersionTag,
  slot: string,
): TypeName | undefined {
  return versionAt(totalized, version).slotTypes.get(slot);
}

export function sortPairs(pairs: Iterable<readonly [string, string]>): Pair[] {
  const unique = new Map<string, Pair>();
  for (const [left, right] of pairs) {
    unique.set(`${left}\u0000${right}`, [left, right]);
  }
  return Array.from(unique.values()).sort(
    (a, b) => compareText(a[0], b[0]) || compareText(a[1], b[1]),
  );
}

// =============================================================================
// HELPERS
// =============================================================================

function sortedIds(ids: Iterable<string>): string[] {
  return Array.from(new Set(ids)).sort(compareText);
}
