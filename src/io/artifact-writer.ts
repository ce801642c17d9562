import path from "node:path";

import fse from "fs-extra";

import { OutputError } from "../core/errors.js";
import type { PackageArtifacts } from "../emit/emitter.js";

/** Writes both artifacts of each package into `outDir`; returns the written paths. */
export async function writeArtifacts(
  outDir: string,
  artifacts: readonly PackageArtifacts[],
): Promise<string[]> {
  const written: string[] = [];

  for (const pkg of artifacts) {
    for (const artifact of [pkg.refinement, pkg.glue]) {
      const target = path.join(path.resolve(outDir), artifact.fileName);
      try {
        await fse.outputFile(target, artifact.text, "utf8");
      } catch (err) {
        throw new OutputError(`Failed to write ${target}.`, err);
      }
      written.push(target);
    }
  }

  return written;
}
