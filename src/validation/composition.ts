// Cross-package composition checks.
// Purpose: check selector and storage disjointness across packages composed behind one diamond.
// Assumes every package was validated and totalized on its own before this pass.

import { currentVersion, type TotalizedModel } from "../totalize/totalize.js";

import {
  RULES,
  compareText,
  createDiagnostic,
  sortDiagnostics,
  type Diagnostic,
} from "./diagnostics.js";

export function validateComposition(packages: readonly TotalizedModel[]): Diagnostic[] {
  return sortDiagnostics([
    ...checkSelectorDisjointness(packages),
    ...checkStorageDisjointness(packages),
  ]);
}

function checkSelectorDisjointness(packages: readonly TotalizedModel[]): Diagnostic[] {
  const bySelector = new Map<string, { packageId: string; functionId: string }[]>();

  for (const pkg of packages) {
    for (const functionId of currentVersion(pkg).exportedFunctions) {
      const fn = pkg.model.functions.get(functionId);
      if (!fn) continue;
      const owners = bySelector.get(fn.selector) ?? [];
      owners.push({ packageId: pkg.packageId, functionId });
      bySelector.set(fn.selector, owners);
    }
  }

  const diagnostics: Diagnostic[] = [];
  for (const [selector, owners] of bySelector) {
    const packageIds = new Set(owners.map((owner) => owner.packageId));
    if (packageIds.size < 2) continue;

    const entities = owners
      .map((owner) => `${owner.packageId}.${owner.functionId}`)
      .sort(compareText);
    diagnostics.push(
      createDiagnostic(
        RULES.compositionSelectorDisjoint,
        entities,
        `Selector ${selector} is exported by ${entities.join(", ")}.`,
      ),
    );
  }
  return diagnostics;
}

function checkStorageDisjointness(packages: readonly TotalizedModel[]): Diagnostic[] {
  const bySlot = new Map<string, string[]>();

  for (const pkg of packages) {
    for (const slot of currentVersion(pkg).layout) {
      const owners = bySlot.get(slot) ?? [];
      owners.push(pkg.packageId);
      bySlot.set(slot, owners);
    }
  }

  const diagnostics: Diagnostic[] = [];
  for (const [slot, owners] of bySlot) {
    if (owners.length < 2) continue;
    const packageIds = [...owners].sort(compareText);
    diagnostics.push(
      createDiagnostic(
        RULES.compositionStorageDisjoint,
        [slot, ...packageIds],
        `Slot ${slot} is allocated by ${packageIds.join(", ")}.`,
      ),
    );
  }
  return diagnostics;
}
