/**
 * stratum run command - Replay a model transcript through a strategy
 */

import fs from "node:fs/promises";
import { Command } from "commander";
import { ScriptedModelBackend } from "../../boundary/model.js";
import { Runtime } from "../../boundary/runtime.js";
import { loadConfig } from "../../config/loader.js";
import { StrategyNameSchema } from "../../config/types.js";
import type { RequestOutcome } from "../../controller/controller.js";
import { createLogger } from "../../runtime/logger.js";
import { loadScript } from "../script.js";

export interface RunCommandOptions {
  script: string;
  strategy?: string;
  contextFile?: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Human-readable summary of an outcome
 */
export function formatOutcome(outcome: RequestOutcome, strategy: string): string {
  const lines = [
    `┌─ Request ${outcome.requestId}`,
    `│ Strategy:  ${strategy}`,
    `│ Status:    ${outcome.status}`,
    `│ Reason:    ${outcome.terminationReason ?? "-"}`,
    `│ Tokens:    ${outcome.usage.totalTokens}`,
    "└─",
  ];
  if (outcome.result !== null) {
    lines.push("", outcome.result);
  }
  if (outcome.error) {
    lines.push("", `Error (${outcome.error.kind}): ${outcome.error.message}`);
  }
  return lines.join("\n");
}

export function registerRunCommand(program: Command): void {
  program
    .command("run")
    .description("Answer a query by replaying a scripted model transcript")
    .argument("<query>", "Query to answer")
    .requiredOption("-s, --script <file>", "YAML transcript of model turns")
    .option("--strategy <name>", "Strategy: react, chain_of_thought, tree_of_thoughts, graph_of_thoughts, recursive")
    .option("-c, --context-file <file>", "Text file attached as the request context")
    .option("--json", "Output as JSON")
    .option("-v, --verbose", "Log directives and signals")
    .action(async (query: string, opts: RunCommandOptions) => {
      try {
        const config = await loadConfig();

        const strategy = StrategyNameSchema.safeParse(opts.strategy ?? config.strategy);
        if (!strategy.success) {
          console.error(`Unknown strategy: ${opts.strategy ?? config.strategy}`);
          process.exit(1);
        }

        const logger = createLogger("run", config.logging, {
          verbose: opts.verbose,
          quiet: opts.json,
        });
        const turns = await loadScript(opts.script);
        const context =
          opts.contextFile !== undefined ? await fs.readFile(opts.contextFile, "utf-8") : undefined;

        const runtime = new Runtime({
          model: new ScriptedModelBackend(turns),
          strategy: strategy.data,
          config,
          logger,
        });
        runtime.onSignal(({ signal, payload }) => {
          logger.debug(`Signal ${signal}`, { requestId: payload.requestId });
        });

        const outcome = await runtime.run(query, context !== undefined ? { context } : {});
        await runtime.drain();

        if (opts.json) {
          console.log(JSON.stringify(outcome, null, 2));
        } else {
          console.log(formatOutcome(outcome, strategy.data));
        }

        await logger.flush();
        if (outcome.status !== "completed") {
          process.exitCode = 1;
        }
      } catch (error) {
        console.error(`Run failed: ${error instanceof Error ? error.message : String(error)}`);
        if (process.env.DEBUG) {
          console.error(error);
        }
        process.exit(1);
      }
    });
}
