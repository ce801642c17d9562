// Package invariant validation.
// Purpose: check a built ontology model against every structural invariant and collect all violations.
// Assumes the model passed shape construction; never throws and never mutates the model.

import {
  RESERVED_SYMBOLS,
  eventSymbol,
  functionSymbol,
  interfaceSymbol,
  selectorSymbol,
} from "../emit/symbols.js";
import {
  deriveExportedFunctions,
  relevantVersions,
  resolveExports,
  type OntologyModel,
  type TypeName,
  type VersionDelta,
} from "../ontology/model.js";
import { compareVersions, versionRange, type VersionTag } from "../ontology/versions.js";

import {
  RULES,
  compareText,
  createDiagnostic,
  sortDiagnostics,
  type Diagnostic,
} from "./diagnostics.js";

// =============================================================================
// TYPES
// =============================================================================

/** Package id -> `current` version of every package validated earlier in the run. */
export type PackageRegistry = ReadonlyMap<string, VersionTag>;

export type ValidateOptions = {
  registry?: PackageRegistry;
};

type Check = (model: OntologyModel, scope: ValidationScope, options: ValidateOptions) => Diagnostic[];

type ValidationScope = {
  versions: VersionDelta[];
  exportedAtCurrent: Set<string>;
  allocatedAtCurrent: Set<string>;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function validate(model: OntologyModel, options: ValidateOptions = {}): Diagnostic[] {
  const scope = buildScope(model);
  const diagnostics = CHECKS.flatMap((check) => check(model, scope, options));
  return sortDiagnostics(diagnostics);
}

// =============================================================================
// CHECKS
// =============================================================================

const checkSelectorInjectivity: Check = (model, scope) => {
  const bySelector = new Map<string, string[]>();
  for (const fnId of scope.exportedAtCurrent) {
    const fn = model.functions.get(fnId);
    if (!fn) continue;
    const group = bySelector.get(fn.selector) ?? [];
    group.push(fn.id);
    bySelector.set(fn.selector, group);
  }

  const diagnostics: Diagnostic[] = [];
  for (const [selector, group] of bySelector) {
    if (group.length < 2) continue;
    const ids = [...group].sort(compareText);
    diagnostics.push(
      createDiagnostic(
        RULES.selectorInjective,
        ids,
        `Functions ${ids.join(", ")} share selector ${selector} at ${model.current}.`,
      ),
    );
  }
  return diagnostics;
};

const checkExportDerivation: Check = (model, scope) => {
  const diagnostics: Diagnostic[] = [];

  for (const iface of model.interfaces.values()) {
    for (const fn of iface.functions) {
      if (!model.functions.has(fn)) {
        diagnostics.push(
          createDiagnostic(
            RULES.exportsDerived,
            [iface.id, fn],
            `Interface ${iface.id} lists undeclared function ${fn}.`,
          ),
        );
      }
    }
    for (const event of iface.events) {
      if (!model.events.has(event)) {
        diagnostics.push(
          createDiagnostic(
            RULES.exportsDerived,
            [iface.id, event],
            `Interface ${iface.id} lists undeclared event ${event}.`,
          ),
        );
      }
    }
  }

  for (const delta of scope.versions) {
    for (const ifaceId of delta.exports ?? []) {
      if (!model.interfaces.has(ifaceId)) {
        diagnostics.push(
          createDiagnostic(
            RULES.exportsDerived,
            [delta.id, ifaceId],
            `Version ${delta.id} exports undeclared interface ${ifaceId}.`,
          ),
        );
      }
    }

    if (delta.statedFunctions === null) continue;

    const derived = deriveExportedFunctions(model, resolveExports(model, delta.id));
    for (const fn of derived) {
      if (!delta.statedFunctions.has(fn)) {
        diagnostics.push(
          createDiagnostic(
            RULES.exportsDerived,
            [delta.id, fn],
            `Version ${delta.id} omits ${fn}, which its exported interfaces provide.`,
          ),
        );
      }
    }
    for (const fn of delta.statedFunctions) {
      if (!derived.has(fn)) {
        diagnostics.push(
          createDiagnostic(
            RULES.exportsDerived,
            [delta.id, fn],
            `Version ${delta.id} lists ${fn}, which none of its exported interfaces provide.`,
          ),
        );
      }
    }
  }

  return diagnostics;
};

const checkStorageTotality: Check = (_model, scope) => {
  const introduced = new Set<string>();
  const diagnostics: Diagnostic[] = [];

  for (const delta of scope.versions) {
    for (const [slot, type] of delta.slotTypes) {
      if (introduced.has(slot)) continue;
      introduced.add(slot);
      if (type === undefined) {
        diagnostics.push(
          createDiagnostic(
            RULES.storageTotal,
            [slot, delta.id],
            `Slot ${slot} enters the layout at ${delta.id} without a type.`,
          ),
        );
      }
    }
  }

  return diagnostics;
};

const checkStorageMonotonicity: Check = (_model, scope) => {
  const first = new Map<string, { version: VersionTag; type: TypeName }>();
  const reported = new Set<string>();
  const diagnostics: Diagnostic[] = [];

  for (const delta of scope.versions) {
    for (const [slot, type] of delta.slotTypes) {
      if (type === undefined || reported.has(slot)) continue;

      const earliest = first.get(slot);
      if (!earliest) {
        first.set(slot, { version: delta.id, type });
        continue;
      }

      if (earliest.type !== type) {
        reported.add(slot);
        diagnostics.push(
          createDiagnostic(
            RULES.storageMonotonic,
            [slot, earliest.version, delta.id],
            `Slot ${slot} changes type from ${earliest.type} at ${earliest.version} to ${type} at ${delta.id}.`,
            "Storage is grow-only: add a new slot instead of retyping an existing one.",
          ),
        );
      }
    }
  }

  return diagnostics;
};

const checkBindingDomain: Check = (model, scope) => {
  const diagnostics: Diagnostic[] = [];

  for (const fn of model.bindings.keys()) {
    if (scope.exportedAtCurrent.has(fn)) continue;
    const message = model.functions.has(fn)
      ? `Function ${fn} is bound but not exported at ${model.current}.`
      : `Binding refers to undeclared function ${fn}.`;
    diagnostics.push(createDiagnostic(RULES.bindingDomain, [fn], message));
  }

  return diagnostics;
};

const checkBindingRange: Check = (model) => {
  const diagnostics: Diagnostic[] = [];

  for (const [fn, impl] of model.bindings) {
    if (model.facetOf.has(impl)) continue;
    diagnostics.push(
      createDiagnostic(
        RULES.bindingRange,
        [fn, impl],
        `Function ${fn} is bound to ${impl}, which is not a declared implementation with a facet.`,
      ),
    );
  }

  return diagnostics;
};

const checkFootprints: Check = (model, scope) => {
  const diagnostics: Diagnostic[] = [];

  for (const impl of model.implementations.values()) {
    const slots = new Set([...impl.reads, ...impl.writes]);
    for (const slot of slots) {
      if (scope.allocatedAtCurrent.has(slot)) continue;

      const access = [impl.reads.has(slot) ? "reads" : null, impl.writes.has(slot) ? "writes" : null]
        .filter((kind): kind is string => kind !== null)
        .join(" and ");
      diagnostics.push(
        createDiagnostic(
          RULES.footprintAllocated,
          [impl.id, slot],
          `Implementation ${impl.id} ${access} slot ${slot}, which is not allocated at ${model.current}.`,
        ),
      );
    }
  }

  return diagnostics;
};

const checkDependencies: Check = (model, _scope, options) => {
  const diagnostics: Diagnostic[] = [];

  for (const [dependency, version] of model.requires) {
    if (dependency === model.packageId) {
      diagnostics.push(
        createDiagnostic(
          RULES.dependencySound,
          [dependency],
          `Package ${dependency} requires itself.`,
        ),
      );
      continue;
    }

    if (!options.registry) continue;

    const available = options.registry.get(dependency);
    if (available === undefined) {
      diagnostics.push(
        createDiagnostic(
          RULES.dependencySound,
          [dependency, version],
          `Package ${model.packageId} requires ${dependency} ${version}, but ${dependency} has not been validated.`,
        ),
      );
    } else if (compareVersions(version, available) > 0) {
      diagnostics.push(
        createDiagnostic(
          RULES.dependencySound,
          [dependency, version],
          `Package ${model.packageId} requires ${dependency} ${version}, but ${dependency} is only at ${available}.`,
        ),
      );
    }
  }

  return diagnostics;
};

// Slots, implementations, facets, packages and versions are emitted verbatim
// into the same B namespace as the prefixed symbols and the reserved names.
const checkSymbolNamespace: Check = (model, scope) => {
  const owners = new Map<string, Set<string>>();
  const claim = (kind: string, symbols: Iterable<string>): void => {
    for (const symbol of symbols) {
      const kinds = owners.get(symbol) ?? new Set<string>();
      kinds.add(kind);
      owners.set(symbol, kinds);
    }
  };

  const functions = Array.from(model.functions.values());
  claim("a slot", scope.allocatedAtCurrent);
  claim("an implementation", model.implementations.keys());
  claim("a facet", model.facetOf.values());
  claim("a package", [model.packageId, ...model.requires.keys()]);
  claim("a version", [...versionRange(model.current), ...model.requires.values()]);
  claim("a function", functions.map((fn) => functionSymbol(fn.id)));
  claim("a selector", functions.map((fn) => selectorSymbol(fn.selector)));
  claim("an event", Array.from(model.events.keys(), eventSymbol));
  claim("an interface", Array.from(model.interfaces.keys(), interfaceSymbol));
  claim("a reserved name", RESERVED_SYMBOLS);

  const diagnostics: Diagnostic[] = [];
  for (const [symbol, kinds] of owners) {
    if (kinds.size < 2) continue;
    diagnostics.push(
      createDiagnostic(
        RULES.symbolsDistinct,
        [symbol],
        `Symbol ${symbol} would name ${joinKinds([...kinds].sort(compareText))}.`,
        "Slots, implementations, facets, packages and versions share one B namespace: rename one of them.",
      ),
    );
  }
  return diagnostics;
};

const CHECKS: readonly Check[] = [
  checkSelectorInjectivity,
  checkExportDerivation,
  checkStorageTotality,
  checkStorageMonotonicity,
  checkBindingDomain,
  checkBindingRange,
  checkFootprints,
  checkDependencies,
  checkSymbolNamespace,
];

// =============================================================================
// HELPERS
// =============================================================================

function joinKinds(kinds: string[]): string {
  if (kinds.length < 2) return kinds.join("");
  return `${kinds.slice(0, -1).join(", ")} and ${kinds[kinds.length - 1]}`;
}

function buildScope(model: OntologyModel): ValidationScope {
  const versions = relevantVersions(model);
  const allocatedAtCurrent = new Set<string>();
  for (const delta of versions) {
    for (const slot of delta.slots) {
      allocatedAtCurrent.add(slot);
    }
  }

  return {
    versions,
    exportedAtCurrent: deriveExportedFunctions(model, resolveExports(model, model.current)),
    allocatedAtCurrent,
  };
}
