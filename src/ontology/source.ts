// Package source schema.
// Purpose: define the parsed (YAML/JSON) shape of a package ontology and its shape-level checks.
// Assumes referential integrity is left to the validator; only "cannot be modeled" problems fail here.

import { z, type ZodIssue } from "zod";

import { MAX_VERSION_RANK, isVersionTag } from "./versions.js";

// =============================================================================
// PRIMITIVES
// =============================================================================

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SELECTOR_PATTERN = /^0x[0-9a-fA-F]{8}$/;

export const IdentifierSchema = z
  .string()
  .regex(IDENTIFIER_PATTERN, "Expected an identifier ([A-Za-z_][A-Za-z0-9_]*)");

export const VersionTagSchema = z
  .string()
  .refine(isVersionTag, {
    message: `Expected a version tag like v1, v2, ... up to v${MAX_VERSION_RANK}`,
  });

export const SelectorSchema = z
  .string()
  .regex(SELECTOR_PATTERN, "Expected a 4-byte selector written as 0x followed by 8 hex digits");

export const TypeNameSchema = z.string().trim().min(1);

// =============================================================================
// ENTITY BLOCKS
// =============================================================================

export const InterfaceSourceSchema = z
  .object({
    id: IdentifierSchema,
    kind: z.enum(["external", "internal"]).default("external"),
    functions: z.array(IdentifierSchema).default([]),
    events: z.array(IdentifierSchema).default([]),
  })
  .strict();

export const FunctionSourceSchema = z
  .object({
    id: IdentifierSchema,
    selector: SelectorSchema,
    inputs: z.array(TypeNameSchema).default([]),
    outputs: z.array(TypeNameSchema).default([]),
  })
  .strict();

export const EventSourceSchema = z
  .object({
    id: IdentifierSchema,
    inputs: z.array(TypeNameSchema).default([]),
  })
  .strict();

export const SlotSourceSchema = z
  .object({
    slot: IdentifierSchema,
    type: TypeNameSchema.optional(),
  })
  .strict();

export const VersionSourceSchema = z
  .object({
    id: VersionTagSchema,
    // Omitted: exports carry over from the previous version.
    exports: z.array(IdentifierSchema).optional(),
    functions: z.array(IdentifierSchema).optional(),
    storage: z.array(SlotSourceSchema).default([]),
  })
  .strict()
  .superRefine((version, ctx) => {
    reportDuplicates(
      version.storage.map((entry) => entry.slot),
      ["storage"],
      "slot",
      ctx,
    );
  });

export const ImplementationSourceSchema = z
  .object({
    id: IdentifierSchema,
    facet: IdentifierSchema,
    reads: z.array(IdentifierSchema).default([]),
    writes: z.array(IdentifierSchema).default([]),
  })
  .strict();

// =============================================================================
// PACKAGE
// =============================================================================

export const PackageSourceSchema = z
  .object({
    package: IdentifierSchema,
    current: VersionTagSchema,
    interfaces: z.array(InterfaceSourceSchema).default([]),
    functions: z.array(FunctionSourceSchema).default([]),
    events: z.array(EventSourceSchema).default([]),
    versions: z.array(VersionSourceSchema).min(1),
    implementations: z.array(ImplementationSourceSchema).default([]),
    bindings: z.record(IdentifierSchema, IdentifierSchema).default({}),
    requires: z.record(IdentifierSchema, VersionTagSchema).default({}),
  })
  .strict()
  .superRefine((pkg, ctx) => {
    reportDuplicates(pkg.interfaces.map((entry) => entry.id), ["interfaces"], "interface", ctx);
    reportDuplicates(pkg.functions.map((entry) => entry.id), ["functions"], "function", ctx);
    reportDuplicates(pkg.events.map((entry) => entry.id), ["events"], "event", ctx);
    reportDuplicates(pkg.versions.map((entry) => entry.id), ["versions"], "version", ctx);
    reportDuplicates(
      pkg.implementations.map((entry) => entry.id),
      ["implementations"],
      "implementation",
      ctx,
    );
  });

export type PackageSourceInput = z.input<typeof PackageSourceSchema>;
export type PackageSource = z.output<typeof PackageSourceSchema>;
export type InterfaceSource = z.output<typeof InterfaceSourceSchema>;
export type FunctionSource = z.output<typeof FunctionSourceSchema>;
export type EventSource = z.output<typeof EventSourceSchema>;
export type VersionSource = z.output<typeof VersionSourceSchema>;
export type ImplementationSource = z.output<typeof ImplementationSourceSchema>;

// =============================================================================
// ISSUE FORMATTING
// =============================================================================

export type ShapeIssue = {
  path: string;
  message: string;
};

export function toShapeIssues(issues: ZodIssue[]): ShapeIssue[] {
  return issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return { path, message: `Expected ${issue.expected}, received ${issue.received}` };
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return {
        path,
        message: `Expected one of ${options}, received ${JSON.stringify(issue.received)}`,
      };
    }
    if (issue.code === "unrecognized_keys") {
      return { path, message: `Unrecognized keys: ${issue.keys.join(", ")}` };
    }

    return { path, message: issue.message };
  });
}

export function formatShapeIssue(issue: ShapeIssue): string {
  return `${issue.path}: ${issue.message}`;
}

// =============================================================================
// HELPERS
// =============================================================================

function reportDuplicates(
  ids: string[],
  path: (string | number)[],
  label: string,
  ctx: z.RefinementCtx,
): void {
  const seen = new Set<string>();
  ids.forEach((id, index) => {
    if (seen.has(id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [...path, index],
        message: `Duplicate ${label} "${id}"`,
      });
      return;
    }
    seen.add(id);
  });
}
