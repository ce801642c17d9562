// B symbol naming.
// Purpose: one place for how ontology ids become B identifiers and which names the artifacts reserve.
// Assumes slots, implementations, facets, packages and versions are emitted verbatim.

import { B_TYPE_SYMBOLS } from "./type-map.js";

export const functionSymbol = (id: string): string => `f_${id}`;
export const eventSymbol = (id: string): string => `e_${id}`;
export const interfaceSymbol = (id: string): string => `i_${id}`;
export const selectorSymbol = (selector: string): string => `sel_${selector.replace(/^0x/, "")}`;
export const interfaceKindSymbol = (kind: string): string => `ik_${kind}`;

export const INTERFACE_KINDS = ["external", "internal"] as const;

export const REFINEMENT_VARIABLES = [
  "current",
  "exports",
  "exportedFuncs",
  "layout",
  "slotType",
  "ext_to_impl",
  "facetOf",
  "reads",
  "writes",
  "requires",
] as const;

export const GLUE_CONSTANTS = [
  "thisPkg",
  "vrank",
  "iface_kind",
  "iface_funcs",
  "iface_events",
  "selector",
  "funSig",
  "eventSig",
] as const;

export const GLUE_SETS = [
  "PKGS",
  "VERSIONS",
  "IFACE_KINDS",
  "IFACES",
  "FUNCS",
  "SELECTORS",
  "EVENTS",
  "SLOTS",
  "TYPES",
  "IMPLS",
  "FACETS",
] as const;

/** Names the artifacts define regardless of the package contents. */
export const RESERVED_SYMBOLS: ReadonlySet<string> = new Set([
  ...REFINEMENT_VARIABLES,
  ...GLUE_CONSTANTS,
  ...GLUE_SETS,
  ...INTERFACE_KINDS.map(interfaceKindSymbol),
  ...B_TYPE_SYMBOLS,
]);
