import type { Command } from "commander";

import { resolveProjectConfig, type ConfigResolution } from "../core/config-discovery.js";
import { resolveConfigPath } from "../core/config-loader.js";
import { UserFacingError } from "../core/errors.js";
import { JsonlLogger, defaultRunId, logPipelineEvent } from "../core/logger.js";
import type { ArtifactNaming } from "../emit/context.js";
import type { ArtifactEmitter, PackageArtifacts } from "../emit/emitter.js";
import { loadPackage } from "../io/package-loader.js";
import type { OntologyModel } from "../ontology/model.js";
import { compilePackage, compileWorkspace } from "../pipeline/compile.js";

import { printError, type CommandReport, type OutputOptions } from "./output.js";

// =============================================================================
// TYPES
// =============================================================================

export type GlobalOptions = {
  config?: string;
  json?: boolean;
  debug?: boolean;
};

export type CompiledRun = {
  report: CommandReport;
  artifacts: PackageArtifacts[];
};

export type CliContextOptions = {
  cwd?: string;
  /** Open the configured log file. Off for commands that must not write files. */
  logging?: boolean;
};

export type CliContext = {
  cwd: string;
  config: ConfigResolution;
  logger: JsonlLogger | null;
  output: OutputOptions;
};

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveOutputOptions(command: Command): OutputOptions {
  const opts = command.optsWithGlobals<GlobalOptions>();
  return { json: opts.json ?? false, debug: opts.debug ?? false };
}

export function createCliContext(command: Command, options: CliContextOptions = {}): CliContext {
  const cwd = options.cwd ?? process.cwd();
  const opts = command.optsWithGlobals<GlobalOptions>();
  const config = resolveProjectConfig({ explicitPath: opts.config, cwd });
  const logFile = options.logging === false ? undefined : config.config.log_file;

  return {
    cwd,
    config,
    logger: logFile
      ? new JsonlLogger(resolveConfigPath(config, logFile), { runId: defaultRunId() })
      : null,
    output: resolveOutputOptions(command),
  };
}

export function artifactNaming(config: ConfigResolution): ArtifactNaming {
  const artifacts = config.config.artifacts;
  return {
    abstractMachine: artifacts.abstract_machine,
    refinementPrefix: artifacts.refinement_prefix,
    gluePrefix: artifacts.glue_prefix,
    refinementExt: artifacts.refinement_ext,
    glueExt: artifacts.glue_ext,
  };
}

/** Runs `action` and reports any thrown error with the command's output flags. */
export function withErrorReporting<TArgs extends unknown[]>(
  action: (...args: TArgs) => Promise<void>,
): (...args: TArgs) => Promise<void> {
  return async (...args: TArgs) => {
    try {
      await action(...args);
    } catch (error) {
      const command = args[args.length - 1];
      const output = isCommand(command)
        ? resolveOutputOptions(command)
        : { json: false, debug: false };
      printError(error, output);
    }
  };
}

// =============================================================================
// PIPELINE
// =============================================================================

export async function loadModels(files: string[], ctx: CliContext): Promise<OntologyModel[]> {
  const models: OntologyModel[] = [];

  for (const file of files) {
    try {
      const loaded = await loadPackage(file);
      logPipelineEvent(ctx.logger, "source.loaded", {
        path: loaded.sourcePath,
        package: loaded.model.packageId,
      });
      models.push(loaded.model);
    } catch (error) {
      logPipelineEvent(ctx.logger, "source.invalid", {
        path: file,
        details: error instanceof UserFacingError ? error.details : [],
      });
      throw error;
    }
  }

  return models;
}

export function compileModels(
  command: CommandReport["command"],
  models: OntologyModel[],
  ctx: CliContext,
  emitter?: ArtifactEmitter,
): CompiledRun {
  // A lone package has no workspace to resolve requirements against.
  if (models.length === 1) {
    const result = compilePackage(models[0], { emitter });
    logValidation(ctx, [result]);
    return {
      report: { command, status: result.status, packages: [result], workspace: [], written: [] },
      artifacts: result.status === "ok" && result.artifacts ? [result.artifacts] : [],
    };
  }

  const result = compileWorkspace(models, { emitter });
  logValidation(ctx, result.packages);
  logPipelineEvent(ctx.logger, "composition.complete", {
    status: result.status,
    diagnostics: result.workspace.length,
  });
  return {
    report: {
      command,
      status: result.status,
      packages: result.packages,
      workspace: result.workspace,
      written: [],
    },
    artifacts: result.artifacts,
  };
}

// =============================================================================
// HELPERS
// =============================================================================

function logValidation(ctx: CliContext, results: CommandReport["packages"]): void {
  for (const result of results) {
    logPipelineEvent(ctx.logger, "validate.complete", {
      package: result.packageId,
      status: result.status,
      diagnostics: result.status === "unsafe" ? result.diagnostics.length : 0,
    });
  }
}

function isCommand(value: unknown): value is Command {
  return (
    typeof value === "object" &&
    value !== null &&
    "optsWithGlobals" in value &&
    typeof value.optsWithGlobals === "function"
  );
}
