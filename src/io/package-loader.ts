// Package source loading.
// Purpose: read a package description from disk and build its ontology model.
// Assumes YAML (JSON is accepted as a YAML subset); shape issues stop processing for that file.

import path from "node:path";

import fse from "fs-extra";
import YAML from "yaml";

import { SourceError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";
import { buildOntology, type OntologyModel } from "../ontology/model.js";
import { formatShapeIssue } from "../ontology/source.js";

export type LoadedPackage = {
  sourcePath: string;
  model: OntologyModel;
};

export async function readPackageSource(sourcePath: string): Promise<unknown> {
  const resolved = path.resolve(sourcePath);

  let raw: string;
  try {
    raw = await fse.readFile(resolved, "utf8");
  } catch (err) {
    throw new SourceError(`Failed to read package source at ${resolved}.`, resolved, err);
  }

  try {
    return YAML.parse(raw);
  } catch (err) {
    throw new SourceError(`Package source at ${resolved} is not valid YAML.`, resolved, err);
  }
}

export async function loadPackage(sourcePath: string): Promise<LoadedPackage> {
  const resolved = path.resolve(sourcePath);
  const built = buildOntology(await readPackageSource(resolved));

  if (!built.ok) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: "Package source malformed.",
      message: `${resolved} cannot be modeled (${built.issues.length} shape issue(s)).`,
      details: built.issues.map(formatShapeIssue),
      hint: "Fix the listed fields; invariants are only checked once the shape is valid.",
    });
  }

  return { sourcePath: resolved, model: built.model };
}
