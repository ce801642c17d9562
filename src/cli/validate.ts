import type { Command } from "commander";

import {
  compileModels,
  createCliContext,
  loadModels,
  withErrorReporting,
  type CliContext,
} from "./context.js";
import { printReport, type CommandReport } from "./output.js";

export function registerValidateCommand(program: Command): void {
  program
    .command("validate")
    .description("Check package invariants without writing any artifacts")
    .argument("<files...>", "Package YAML files (more than one runs a workspace composition)")
    .action(
      withErrorReporting(async (files: string[], _opts: Record<string, never>, command: Command) => {
        await validateCommand(files, createCliContext(command, { logging: false }));
      }),
    );
}

export async function validateCommand(files: string[], ctx: CliContext): Promise<CommandReport> {
  const models = await loadModels(files, ctx);
  const { report } = compileModels("validate", models, ctx);
  printReport(report, ctx.output);
  return report;
}
