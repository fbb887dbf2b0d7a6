/**
 * Main CLI entry point for stratum
 */

import { Command } from "commander";
import { registerCheckpointCommand } from "./commands/checkpoint.js";
import { registerConfigCommand } from "./commands/config.js";
import { registerRunCommand } from "./commands/run.js";

/**
 * Build the stratum CLI program
 */
export function buildStratumProgram(): Command {
  const program = new Command();

  program
    .name("stratum")
    .description("Reasoning strategy runtime - run ReAct, chain-of-thought, tree-of-thoughts and recursive agents")
    .version("0.1.0");

  registerRunCommand(program);
  registerCheckpointCommand(program);
  registerConfigCommand(program);

  return program;
}

/**
 * Run the CLI
 */
export async function runStratumCli(args: string[] = process.argv): Promise<void> {
  const program = buildStratumProgram();

  try {
    await program.parseAsync(args);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
