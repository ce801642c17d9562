import { z } from "zod";

import { DEFAULT_ARTIFACT_NAMING } from "../emit/context.js";

const SymbolSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Expected a B identifier ([A-Za-z_][A-Za-z0-9_]*)");

const ExtensionSchema = z.string().regex(/^\.[A-Za-z0-9]+$/, "Expected an extension like .ref");

export const ArtifactsConfigSchema = z
  .object({
    abstract_machine: SymbolSchema.default(DEFAULT_ARTIFACT_NAMING.abstractMachine),
    refinement_prefix: SymbolSchema.default(DEFAULT_ARTIFACT_NAMING.refinementPrefix),
    glue_prefix: SymbolSchema.default(DEFAULT_ARTIFACT_NAMING.gluePrefix),
    refinement_ext: ExtensionSchema.default(DEFAULT_ARTIFACT_NAMING.refinementExt),
    glue_ext: ExtensionSchema.default(DEFAULT_ARTIFACT_NAMING.glueExt),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    output_dir: z.string().min(1).default("build/b"),
    artifacts: ArtifactsConfigSchema.default({}),
    types: z.record(z.string().min(1), SymbolSchema).default({}),
    log_file: z.string().min(1).optional(),
  })
  .strict();

export type ArtifactsConfig = z.infer<typeof ArtifactsConfigSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export type LoadedProjectConfig = {
  config: ProjectConfig;
  /** Absolute path of the config file, or null when defaults are in use. */
  configPath: string | null;
  /** Directory relative paths in the config resolve against. */
  baseDir: string;
};
