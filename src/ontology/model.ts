// Ontology model.
// Purpose: build the immutable, indexed in-memory package model from a parsed source object.
// Assumes the caller parsed the encoding already; shape problems come back as issues, never throws.

import {
  PackageSourceSchema,
  toShapeIssues,
  type PackageSource,
  type ShapeIssue,
} from "./source.js";
import { compareVersions, type VersionTag } from "./versions.js";

// =============================================================================
// MODEL TYPES
// =============================================================================

export type InterfaceKind = "external" | "internal";

/** Normalized Solidity type string (whitespace removed). */
export type TypeName = string;

export type InterfaceDecl = {
  readonly id: string;
  readonly kind: InterfaceKind;
  readonly functions: ReadonlySet<string>;
  readonly events: ReadonlySet<string>;
};

export type FunctionDecl = {
  readonly id: string;
  readonly argTypes: readonly TypeName[];
  readonly retTypes: readonly TypeName[];
  /** Lowercase `0x` + 8 hex digits. */
  readonly selector: string;
};

export type EventDecl = {
  readonly id: string;
  readonly argTypes: readonly TypeName[];
};

export type ImplementationDecl = {
  readonly id: string;
  readonly facet: string;
  readonly reads: ReadonlySet<string>;
  readonly writes: ReadonlySet<string>;
};

/**
 * What one version block declares. Slots are the incremental delta; a slot
 * listed without a type maps to `undefined` in `slotTypes`. `exports` is null
 * when the block does not restate them.
 */
export type VersionDelta = {
  readonly id: VersionTag;
  readonly exports: ReadonlySet<string> | null;
  readonly statedFunctions: ReadonlySet<string> | null;
  readonly slots: ReadonlySet<string>;
  readonly slotTypes: ReadonlyMap<string, TypeName | undefined>;
};

export type OntologyModel = {
  readonly packageId: string;
  readonly current: VersionTag;
  readonly interfaces: ReadonlyMap<string, InterfaceDecl>;
  readonly functions: ReadonlyMap<string, FunctionDecl>;
  readonly events: ReadonlyMap<string, EventDecl>;
  readonly implementations: ReadonlyMap<string, ImplementationDecl>;
  /** Declared version blocks keyed by tag, including staged ones after `current`. */
  readonly versions: ReadonlyMap<VersionTag, VersionDelta>;
  readonly bindings: ReadonlyMap<string, string>;
  readonly requires: ReadonlyMap<string, VersionTag>;
  /** Function id -> ids of interfaces listing it. */
  readonly declaringInterfaces: ReadonlyMap<string, readonly string[]>;
  /** Implementation id -> facet id (facetOf). */
  readonly facetOf: ReadonlyMap<string, string>;
};

export type OntologyBuildResult =
  | { ok: true; model: OntologyModel }
  | { ok: false; issues: ShapeIssue[] };

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function buildOntology(raw: unknown): OntologyBuildResult {
  const parsed = PackageSourceSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, issues: toShapeIssues(parsed.error.issues) };
  }

  return { ok: true, model: modelFromSource(parsed.data) };
}

export function normalizeTypeName(type: string): TypeName {
  return type.replace(/\s+/g, "");
}

// =============================================================================
// LOOKUPS
// =============================================================================

/**
 * Type stated for `slot` by the block of `version` itself; undefined when that
 * block does not list the slot. Cumulative types live on the totalized model.
 */
export function deltaSlotType(
  model: OntologyModel,
  version: VersionTag,
  slot: string,
): TypeName | undefined {
  return model.versions.get(version)?.slotTypes.get(slot);
}

/** Declared version blocks up to and including `current`, in version order. */
export function relevantVersions(model: OntologyModel): VersionDelta[] {
  return Array.from(model.versions.values())
    .filter((delta) => compareVersions(delta.id, model.current) <= 0)
    .sort((a, b) => compareVersions(a.id, b.id));
}

/**
 * Interfaces exported at `version`. A version whose block is missing or does
 * not restate exports keeps those of the closest version before it.
 */
export function resolveExports(model: OntologyModel, version: VersionTag): ReadonlySet<string> {
  let resolved: ReadonlySet<string> = new Set();
  for (const delta of relevantVersions(model)) {
    if (compareVersions(delta.id, version) > 0) break;
    resolved = delta.exports ?? resolved;
  }
  return resolved;
}

/** Union of the function sets of the declared interfaces in `exports`. */
export function deriveExportedFunctions(
  model: OntologyModel,
  exports: ReadonlySet<string>,
): Set<string> {
  const functions = new Set<string>();
  for (const ifaceId of exports) {
    const iface = model.interfaces.get(ifaceId);
    if (!iface) continue;
    for (const fn of iface.functions) {
      functions.add(fn);
    }
  }
  return functions;
}

// =============================================================================
// INTERNALS
// =============================================================================

function modelFromSource(source: PackageSource): OntologyModel {
  const interfaces = new Map<string, InterfaceDecl>();
  const declaringInterfaces = new Map<string, string[]>();

  for (const iface of source.interfaces) {
    interfaces.set(iface.id, {
      id: iface.id,
      kind: iface.kind,
      functions: new Set(iface.functions),
      events: new Set(iface.events),
    });

    for (const fn of new Set(iface.functions)) {
      const owners = declaringInterfaces.get(fn) ?? [];
      owners.push(iface.id);
      declaringInterfaces.set(fn, owners);
    }
  }

  const functions = new Map<string, FunctionDecl>();
  for (const fn of source.functions) {
    functions.set(fn.id, {
      id: fn.id,
      argTypes: fn.inputs.map(normalizeTypeName),
      retTypes: fn.outputs.map(normalizeTypeName),
      selector: fn.selector.toLowerCase(),
    });
  }

  const events = new Map<string, EventDecl>();
  for (const event of source.events) {
    events.set(event.id, { id: event.id, argTypes: event.inputs.map(normalizeTypeName) });
  }

  const versions = new Map<VersionTag, VersionDelta>();
  for (const version of source.versions) {
    const slotTypes = new Map<string, TypeName | undefined>();
    for (const entry of version.storage) {
      slotTypes.set(entry.slot, entry.type === undefined ? undefined : normalizeTypeName(entry.type));
    }

    versions.set(version.id, {
      id: version.id,
      exports: version.exports ? new Set(version.exports) : null,
      statedFunctions: version.functions ? new Set(version.functions) : null,
      slots: new Set(slotTypes.keys()),
      slotTypes,
    });
  }

  const implementations = new Map<string, ImplementationDecl>();
  const facetOf = new Map<string, string>();
  for (const impl of source.implementations) {
    implementations.set(impl.id, {
      id: impl.id,
      facet: impl.facet,
      reads: new Set(impl.reads),
      writes: new Set(impl.writes),
    });
    facetOf.set(impl.id, impl.facet);
  }

  return {
    packageId: source.package,
    current: source.current,
    interfaces,
    functions,
    events,
    implementations,
    versions,
    bindings: new Map(Object.entries(source.bindings)),
    requires: new Map(Object.entries(source.requires)),
    declaringInterfaces,
    facetOf,
  };
}
