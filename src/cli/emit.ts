import path from "node:path";

import type { Command } from "commander";

import { resolveConfigPath } from "../core/config-loader.js";
import { logPipelineEvent } from "../core/logger.js";
import { createArtifactEmitter } from "../emit/emitter.js";
import { loadArtifactTemplates } from "../emit/templates.js";
import { writeArtifacts } from "../io/artifact-writer.js";

import {
  artifactNaming,
  compileModels,
  createCliContext,
  loadModels,
  withErrorReporting,
  type CliContext,
} from "./context.js";
import { printReport, type CommandReport } from "./output.js";

export type EmitCommandOptions = {
  out?: string;
  templates?: string;
};

export function registerEmitCommand(program: Command): void {
  program
    .command("emit")
    .description("Validate packages and write the B refinement and glue artifacts")
    .argument("<files...>", "Package YAML files (more than one runs a workspace composition)")
    .option("--out <dir>", "Output directory (default: output_dir from config)")
    .option("--templates <dir>", "Directory holding refinement.hbs and glue.hbs")
    .action(
      withErrorReporting(async (files: string[], opts: EmitCommandOptions, command: Command) => {
        await emitCommand(files, createCliContext(command), opts);
      }),
    );
}

export async function emitCommand(
  files: string[],
  ctx: CliContext,
  opts: EmitCommandOptions = {},
): Promise<CommandReport> {
  const models = await loadModels(files, ctx);
  const templates = await loadArtifactTemplates(
    opts.templates ? path.resolve(ctx.cwd, opts.templates) : undefined,
  );
  const emitter = createArtifactEmitter(templates, {
    naming: artifactNaming(ctx.config),
    typeOverrides: ctx.config.config.types,
  });

  const { report, artifacts } = compileModels("emit", models, ctx, emitter);
  if (report.status === "ok") {
    const outDir = opts.out
      ? path.resolve(ctx.cwd, opts.out)
      : resolveConfigPath(ctx.config, ctx.config.config.output_dir);
    logPipelineEvent(ctx.logger, "emit.complete", { packages: artifacts.length, out_dir: outDir });

    report.written = await writeArtifacts(outDir, artifacts);
    for (const filePath of report.written) {
      logPipelineEvent(ctx.logger, "artifact.written", { path: filePath });
    }
  }

  printReport(report, ctx.output);
  return report;
}
