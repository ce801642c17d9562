// Package compilation pipeline.
// Purpose: gate validation -> totalization -> emission for one package or a multi-package workspace.
// Assumes models were built already; artifacts only exist when every diagnostic list is empty.

import type { ArtifactEmitter, PackageArtifacts } from "../emit/emitter.js";
import type { OntologyModel } from "../ontology/model.js";
import type { VersionTag } from "../ontology/versions.js";
import { totalize, type TotalizedModel } from "../totalize/totalize.js";
import { validateComposition } from "../validation/composition.js";
import {
  RULES,
  compareText,
  createDiagnostic,
  sortDiagnostics,
  type Diagnostic,
} from "../validation/diagnostics.js";
import { validate, type PackageRegistry } from "../validation/validate.js";

// =============================================================================
// TYPES
// =============================================================================

export type CompileOptions = {
  /** Omit for validation-only mode. */
  emitter?: ArtifactEmitter;
  registry?: PackageRegistry;
};

export type PackageCompileResult =
  | { status: "unsafe"; packageId: string; diagnostics: Diagnostic[] }
  | {
      status: "ok";
      packageId: string;
      totalized: TotalizedModel;
      artifacts: PackageArtifacts | null;
    };

export type WorkspaceCompileResult = {
  status: "ok" | "unsafe";
  /** Packages in dependency order. */
  packages: PackageCompileResult[];
  /** Workspace-level diagnostics: ordering problems and the composition pass. */
  workspace: Diagnostic[];
  artifacts: PackageArtifacts[];
};

// =============================================================================
// SINGLE PACKAGE
// =============================================================================

export function compilePackage(
  model: OntologyModel,
  options: CompileOptions = {},
): PackageCompileResult {
  const diagnostics = validate(model, { registry: options.registry });
  if (diagnostics.length > 0) {
    return { status: "unsafe", packageId: model.packageId, diagnostics };
  }

  const totalized = totalize(model);
  return {
    status: "ok",
    packageId: model.packageId,
    totalized,
    artifacts: options.emitter ? options.emitter.emit(totalized) : null,
  };
}

// =============================================================================
// WORKSPACE
// =============================================================================

export function compileWorkspace(
  models: readonly OntologyModel[],
  options: Pick<CompileOptions, "emitter"> = {},
): WorkspaceCompileResult {
  const workspace: Diagnostic[] = [...findDuplicatePackages(models)];
  const { ordered, cyclic } = orderByRequirements(models);

  if (cyclic.length > 0) {
    const ids = cyclic.map((model) => model.packageId);
    workspace.push(
      createDiagnostic(
        RULES.dependencySound,
        ids,
        `Packages ${ids.join(", ")} are on or behind a requirement cycle.`,
      ),
    );
  }

  const registry = new Map<string, VersionTag>();
  const packages: PackageCompileResult[] = [];
  for (const model of [...ordered, ...cyclic]) {
    const result = compilePackage(model, { registry });
    if (result.status === "ok" && !registry.has(model.packageId)) {
      registry.set(model.packageId, model.current);
    }
    packages.push(result);
  }

  const validated = packages.flatMap((result) =>
    result.status === "ok" ? [result.totalized] : [],
  );
  // A repeated id is already a PKG008; composing it against itself adds nothing.
  const composed = new Map<string, TotalizedModel>();
  for (const totalized of validated) {
    if (!composed.has(totalized.packageId)) composed.set(totalized.packageId, totalized);
  }
  workspace.push(...validateComposition(Array.from(composed.values())));

  const sortedWorkspace = sortDiagnostics(workspace);
  const safe = sortedWorkspace.length === 0 && validated.length === packages.length;
  if (!safe || !options.emitter) {
    return { status: safe ? "ok" : "unsafe", packages, workspace: sortedWorkspace, artifacts: [] };
  }

  const emitter = options.emitter;
  const emitted = packages.map((result) =>
    result.status === "ok" ? { ...result, artifacts: emitter.emit(result.totalized) } : result,
  );
  return {
    status: "ok",
    packages: emitted,
    workspace: sortedWorkspace,
    artifacts: emitted.flatMap((result) =>
      result.status === "ok" && result.artifacts ? [result.artifacts] : [],
    ),
  };
}

/** Every diagnostic of a workspace run, package results first. */
export function collectWorkspaceDiagnostics(result: WorkspaceCompileResult): Diagnostic[] {
  return [
    ...result.packages.flatMap((pkg) => (pkg.status === "unsafe" ? pkg.diagnostics : [])),
    ...result.workspace,
  ];
}

// =============================================================================
// HELPERS
// =============================================================================

function findDuplicatePackages(models: readonly OntologyModel[]): Diagnostic[] {
  const counts = new Map<string, number>();
  for (const model of models) {
    counts.set(model.packageId, (counts.get(model.packageId) ?? 0) + 1);
  }

  return Array.from(counts)
    .filter(([, count]) => count > 1)
    .map(([packageId, count]) =>
      createDiagnostic(
        RULES.dependencySound,
        [packageId],
        `Package ${packageId} is declared ${count} times in the workspace.`,
      ),
    );
}

// Kahn's algorithm over in-workspace requirements; ready packages are taken in id order.
// Models sharing an id stay together, in input order, so none drops out of the report.
function orderByRequirements(models: readonly OntologyModel[]): {
  ordered: OntologyModel[];
  cyclic: OntologyModel[];
} {
  const byId = new Map<string, OntologyModel[]>();
  for (const model of models) {
    const group = byId.get(model.packageId) ?? [];
    group.push(model);
    byId.set(model.packageId, group);
  }

  const remaining = new Map<string, Set<string>>();
  for (const [packageId, group] of byId) {
    const deps = group
      .flatMap((model) => Array.from(model.requires.keys()))
      .filter((dep) => dep !== packageId && byId.has(dep));
    remaining.set(packageId, new Set(deps));
  }

  const ordered: OntologyModel[] = [];
  while (true) {
    const ready = Array.from(remaining)
      .filter(([, deps]) => deps.size === 0)
      .map(([id]) => id)
      .sort(compareText);
    if (ready.length === 0) break;

    const next = ready[0];
    remaining.delete(next);
    for (const deps of remaining.values()) {
      deps.delete(next);
    }
    ordered.push(...(byId.get(next) ?? []));
  }

  const cyclic = Array.from(remaining.keys())
    .sort(compareText)
    .flatMap((id) => byId.get(id) ?? []);

  return { ordered, cyclic };
}
