// Artifact render context.
// Purpose: turn a totalized model into the single context both B artifacts are rendered from.
// Assumes the model was validated and totalized; nothing here re-checks invariants.

import { compareVersions, versionRank, type VersionTag } from "../ontology/versions.js";
import { currentVersion, sortPairs, type Pair, type TotalizedModel } from "../totalize/totalize.js";
import { compareText } from "../validation/diagnostics.js";

import {
  GLUE_CONSTANTS,
  INTERFACE_KINDS,
  REFINEMENT_VARIABLES,
  eventSymbol,
  functionSymbol,
  interfaceKindSymbol,
  interfaceSymbol,
  selectorSymbol,
} from "./symbols.js";
import { collectBTypes, toBType, type TypeOverrides } from "./type-map.js";

// =============================================================================
// TYPES
// =============================================================================

export type ArtifactNaming = {
  abstractMachine: string;
  refinementPrefix: string;
  gluePrefix: string;
  refinementExt: string;
  glueExt: string;
};

export const DEFAULT_ARTIFACT_NAMING: ArtifactNaming = {
  abstractMachine: "FT_PACKAGE",
  refinementPrefix: "FT_PACKAGE_INST_",
  gluePrefix: "FT_PACKAGE_GLUE_",
  refinementExt: ".ref",
  glueExt: ".mch",
};

export type RenderContextOptions = {
  naming?: ArtifactNaming;
  typeOverrides?: TypeOverrides;
};

export type RenderContext = {
  banner: string;
  refinementName: string;
  refinementFile: string;
  glueName: string;
  glueFile: string;
  abstractMachine: string;
  /** Glue SETS clause entries, separators included. */
  sets: string[];
  constants: string;
  /** Glue PROPERTIES conjuncts, separators included. */
  properties: string[];
  variables: string;
  /** Refinement INITIALISATION substitutions, indented and separated. */
  assignments: string[];
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildRenderContext(
  totalized: TotalizedModel,
  options: RenderContextOptions = {},
): RenderContext {
  const naming = options.naming ?? DEFAULT_ARTIFACT_NAMING;
  const overrides = options.typeOverrides ?? {};
  const refinementName = `${naming.refinementPrefix}${totalized.packageId}`;
  const glueName = `${naming.gluePrefix}${totalized.packageId}`;

  return {
    banner: `Generated by facet-refine from package ${totalized.packageId} at ${totalized.current}. Do not edit.`,
    refinementName,
    refinementFile: `${refinementName}${naming.refinementExt}`,
    glueName,
    glueFile: `${glueName}${naming.glueExt}`,
    abstractMachine: naming.abstractMachine,
    sets: buildSets(totalized, overrides),
    constants: GLUE_CONSTANTS.join(", "),
    properties: joinLines(buildProperties(totalized, overrides), " &"),
    variables: REFINEMENT_VARIABLES.join(", "),
    assignments: joinLines(buildAssignments(totalized, overrides), " ||"),
  };
}

// =============================================================================
// GLUE MACHINE
// =============================================================================

function buildSets(totalized: TotalizedModel, overrides: TypeOverrides): string[] {
  const { model } = totalized;
  const functions = Array.from(model.functions.values());
  const events = Array.from(model.events.values());
  const latest = currentVersion(totalized);

  const types = [
    ...latest.slotTypes.values(),
    ...functions.flatMap((fn) => [...fn.argTypes, ...fn.retTypes]),
    ...events.flatMap((event) => event.argTypes),
  ];

  const sets: Array<[string, string[]]> = [
    ["PKGS", packageSymbols(totalized)],
    ["VERSIONS", glueVersions(totalized)],
    ["IFACE_KINDS", INTERFACE_KINDS.map(interfaceKindSymbol)],
    ["IFACES", sortedSymbols(model.interfaces.keys(), interfaceSymbol)],
    ["FUNCS", sortedSymbols(model.functions.keys(), functionSymbol)],
    ["SELECTORS", sortedSymbols(functions.map((fn) => fn.selector), selectorSymbol)],
    ["EVENTS", sortedSymbols(model.events.keys(), eventSymbol)],
    ["SLOTS", [...latest.layout]],
    ["TYPES", collectBTypes(types, overrides).sort(compareText)],
    ["IMPLS", sortedSymbols(model.implementations.keys(), (id) => id)],
    ["FACETS", sortedSymbols(model.facetOf.values(), (id) => id)],
  ];

  return joinLines(
    sets.map(([name, elements]) =>
      elements.length === 0 ? name : `${name} = {${elements.join(", ")}}`,
    ),
    ";",
  );
}

function buildProperties(totalized: TotalizedModel, overrides: TypeOverrides): string[] {
  const { model } = totalized;
  const interfaces = Array.from(model.interfaces.values());

  const ifaceFunctions = sortPairs(
    interfaces.flatMap((iface) =>
      Array.from(iface.functions, (fn): Pair => [interfaceSymbol(iface.id), functionSymbol(fn)]),
    ),
  );
  const ifaceEvents = sortPairs(
    interfaces.flatMap((iface) =>
      Array.from(iface.events, (event): Pair => [interfaceSymbol(iface.id), eventSymbol(event)]),
    ),
  );
  const kinds = sortPairs(
    interfaces.map((iface): Pair => [interfaceSymbol(iface.id), interfaceKindSymbol(iface.kind)]),
  );
  const selectors = sortPairs(
    Array.from(model.functions.values(), (fn): Pair => [
      functionSymbol(fn.id),
      selectorSymbol(fn.selector),
    ]),
  );
  const funSigs = sortPairs(
    Array.from(model.functions.values(), (fn): Pair => [
      functionSymbol(fn.id),
      `(${sequence(fn.argTypes, overrides)} |-> ${sequence(fn.retTypes, overrides)})`,
    ]),
  );
  const eventSigs = sortPairs(
    Array.from(model.events.values(), (event): Pair => [
      eventSymbol(event.id),
      sequence(event.argTypes, overrides),
    ]),
  );
  const ranks = glueVersions(totalized).map(
    (version): Pair => [version, String(versionRank(version))],
  );

  return [
    "thisPkg : PKGS",
    `thisPkg = ${totalized.packageId}`,
    "vrank : VERSIONS >-> NAT1",
    `vrank = ${inlineSet(ranks)}`,
    "iface_kind : IFACES --> IFACE_KINDS",
    `iface_kind = ${inlineSet(kinds)}`,
    "iface_funcs : IFACES <-> FUNCS",
    `iface_funcs = ${inlineSet(ifaceFunctions)}`,
    "iface_events : IFACES <-> EVENTS",
    `iface_events = ${inlineSet(ifaceEvents)}`,
    "selector : FUNCS --> SELECTORS",
    `selector = ${inlineSet(selectors)}`,
    "funSig : FUNCS --> (seq(TYPES) * seq(TYPES))",
    `funSig = ${inlineSet(funSigs)}`,
    "eventSig : EVENTS --> seq(TYPES)",
    `eventSig = ${inlineSet(eventSigs)}`,
  ];
}

// =============================================================================
// REFINEMENT
// =============================================================================

function buildAssignments(totalized: TotalizedModel, overrides: TypeOverrides): string[] {
  const versions = totalized.versions;

  return [
    `    current := ${totalized.current}`,
    assignment(
      "exports",
      versions.map((version) => `${version.id} |-> ${idSet(version.exports.map(interfaceSymbol))}`),
    ),
    assignment(
      "exportedFuncs",
      versions.map(
        (version) => `${version.id} |-> ${idSet(version.exportedFunctions.map(functionSymbol))}`,
      ),
    ),
    assignment(
      "layout",
      versions.map((version) => `${version.id} |-> ${idSet(version.layout)}`),
    ),
    assignment(
      "slotType",
      versions.map((version) => {
        const entries = sortPairs(
          Array.from(version.slotTypes, ([slot, type]): Pair => [slot, toBType(type, overrides)]),
        );
        return `${version.id} |-> ${inlineSet(entries)}`;
      }),
    ),
    assignment(
      "ext_to_impl",
      totalized.bindings.map(([fn, impl]) => pair(functionSymbol(fn), impl)),
    ),
    assignment("facetOf", totalized.facetOf.map(([impl, facet]) => pair(impl, facet))),
    assignment("reads", totalized.reads.map(([impl, slot]) => pair(impl, slot))),
    assignment("writes", totalized.writes.map(([impl, slot]) => pair(impl, slot))),
    assignment("requires", totalized.requires.map(([pkg, version]) => pair(pkg, version))),
  ];
}

function assignment(name: string, entries: string[]): string {
  if (entries.length === 0) {
    return `    ${name} := {}`;
  }

  return [
    `    ${name} := {`,
    ...joinLines(entries, ",").map((entry) => `        ${entry}`),
    "    }",
  ].join("\n");
}

// =============================================================================
// HELPERS
// =============================================================================

function packageSymbols(totalized: TotalizedModel): string[] {
  const packages = new Set([totalized.packageId, ...totalized.requires.map(([pkg]) => pkg)]);
  return Array.from(packages).sort(compareText);
}

function glueVersions(totalized: TotalizedModel): VersionTag[] {
  const versions = new Set<VersionTag>(totalized.versions.map((version) => version.id));
  for (const version of totalized.model.requires.values()) {
    versions.add(version);
  }
  return Array.from(versions).sort(compareVersions);
}

function sortedSymbols(ids: Iterable<string>, toSymbol: (id: string) => string): string[] {
  return Array.from(new Set(Array.from(ids, toSymbol))).sort(compareText);
}

function sequence(types: readonly string[], overrides: TypeOverrides): string {
  return `[${types.map((type) => toBType(type, overrides)).join(", ")}]`;
}

function pair(left: string, right: string): string {
  return `${left} |-> ${right}`;
}

function idSet(ids: readonly string[]): string {
  return `{${ids.join(", ")}}`;
}

function inlineSet(pairs: readonly Pair[]): string {
  return idSet(pairs.map(([left, right]) => pair(left, right)));
}

function joinLines(lines: string[], separator: string): string[] {
  return lines.map((line, index) => (index < lines.length - 1 ? `${line}${separator}` : line));
}
