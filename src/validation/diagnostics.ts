/**
 * Diagnostic types for package validation.
 *
 * One diagnostic shape covers every invariant: a stable rule id, the ids of
 * the offending entities and a message. Rule ids sort in check order.
 */

export const RULES = {
  selectorInjective: "PKG001-selector-injective",
  exportsDerived: "PKG002-exports-derived",
  storageTotal: "PKG003-storage-total",
  storageMonotonic: "PKG004-storage-monotonic",
  bindingDomain: "PKG005-binding-domain",
  bindingRange: "PKG006-binding-range",
  footprintAllocated: "PKG007-footprint-allocated",
  dependencySound: "PKG008-dependency-sound",
  symbolsDistinct: "PKG009-symbols-distinct",
  compositionSelectorDisjoint: "PKG101-composition-selector-disjoint",
  compositionStorageDisjoint: "PKG102-composition-storage-disjoint",
} as const;

export type RuleId = (typeof RULES)[keyof typeof RULES];

export type Diagnostic = {
  readonly rule: RuleId;
  readonly entities: readonly string[];
  readonly message: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  rule: RuleId,
  entities: readonly string[],
  message: string,
  hint?: string,
): Diagnostic => (hint === undefined ? { rule, entities, message } : { rule, entities, message, hint });

// Code unit order, not locale order: output must not depend on the host.
export const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export const compareEntityLists = (a: readonly string[], b: readonly string[]): number => {
  const shared = Math.min(a.length, b.length);
  for (let index = 0; index < shared; index += 1) {
    const order = compareText(a[index], b[index]);
    if (order !== 0) return order;
  }
  return a.length - b.length;
};

export const compareDiagnostics = (a: Diagnostic, b: Diagnostic): number =>
  compareText(a.rule, b.rule) ||
  compareEntityLists(a.entities, b.entities) ||
  compareText(a.message, b.message);

export const sortDiagnostics = (diagnostics: readonly Diagnostic[]): Diagnostic[] =>
  [...diagnostics].sort(compareDiagnostics);

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts = [diagnostic.rule, `[${diagnostic.entities.join(", ")}]`, diagnostic.message];
  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }
  return parts.join(" ");
};
