import { Command } from "commander";

import { registerEmitCommand } from "./cli/emit.js";
import { registerValidateCommand } from "./cli/validate.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("facet-refine")
    .description("Validate smart-contract package ontologies and emit B refinement artifacts")
    .version("0.1.0")
    .option("--config <path>", "Path to facet-refine.config.yaml")
    .option("--json", "Print machine-readable JSON", false)
    .option("--debug", "Include error codes, causes and stacks", false);

  registerValidateCommand(program);
  registerEmitCommand(program);

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}
