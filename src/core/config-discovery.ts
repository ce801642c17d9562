import fs from "node:fs";
import path from "node:path";

import type { LoadedProjectConfig } from "./config.js";
import { defaultProjectConfig, loadProjectConfig } from "./config-loader.js";

export const CONFIG_FILE_NAME = "facet-refine.config.yaml";

export type ConfigSource = "explicit" | "discovered" | "defaults";

export type ConfigResolution = LoadedProjectConfig & {
  source: ConfigSource;
};

export function resolveProjectConfig(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { ...loadProjectConfig(path.resolve(cwd, args.explicitPath)), source: "explicit" };
  }

  const discovered = findConfigFile(cwd);
  if (discovered) {
    return { ...loadProjectConfig(discovered), source: "discovered" };
  }

  return { ...defaultProjectConfig(path.resolve(cwd)), source: "defaults" };
}

export function findConfigFile(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    const candidate = path.join(current, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) {
      return candidate;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
