import fs from "node:fs";
import path from "node:path";

import YAML from "yaml";

import { normalizeTypeName } from "../ontology/model.js";
import { formatShapeIssue, toShapeIssues } from "../ontology/source.js";

import { ProjectConfigSchema, type LoadedProjectConfig, type ProjectConfig } from "./config.js";
import { ConfigError, USER_FACING_ERROR_CODES, UserFacingError } from "./errors.js";

const CONFIG_HINT = "Fix facet-refine.config.yaml or pass --config <path>.";

export function loadProjectConfig(configPath: string): LoadedProjectConfig {
  const resolvedPath = path.resolve(configPath);

  if (!fs.existsSync(resolvedPath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `Config file not found at ${resolvedPath}.`,
      hint: CONFIG_HINT,
    });
  }

  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(resolvedPath, "utf8"));
  } catch (err) {
    throw new ConfigError(`Failed to parse config YAML at ${resolvedPath}.`, err);
  }

  const parsed = ProjectConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config invalid.",
      message: `Config at ${resolvedPath} does not match the expected schema.`,
      details: toShapeIssues(parsed.error.issues).map(formatShapeIssue),
      hint: CONFIG_HINT,
      cause: parsed.error,
    });
  }

  return {
    config: normalizeConfig(parsed.data),
    configPath: resolvedPath,
    baseDir: path.dirname(resolvedPath),
  };
}

export function defaultProjectConfig(baseDir: string): LoadedProjectConfig {
  return {
    config: ProjectConfigSchema.parse({}),
    configPath: null,
    baseDir,
  };
}

export function resolveConfigPath(loaded: LoadedProjectConfig, value: string): string {
  return path.resolve(loaded.baseDir, value);
}

// Type override keys are matched against normalized source types.
function normalizeConfig(config: ProjectConfig): ProjectConfig {
  const types: Record<string, string> = {};
  for (const [type, symbol] of Object.entries(config.types)) {
    types[normalizeTypeName(type)] = symbol;
  }
  return { ...config, types };
}
