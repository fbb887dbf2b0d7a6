/**
 * stratum checkpoint command - Inspect and resume checkpoint tokens
 */

import { Command } from "commander";
import { ScriptedModelBackend } from "../../boundary/model.js";
import { Runtime } from "../../boundary/runtime.js";
import { loadConfig } from "../../config/loader.js";
import { CheckpointError, verifyCheckpoint, type CheckpointPayload } from "../../controller/checkpoint.js";
import { createLogger } from "../../runtime/logger.js";
import { loadScript } from "../script.js";
import { formatOutcome } from "./run.js";

export function describeCheckpoint(payload: CheckpointPayload): string {
  const { state } = payload;
  const pending = state.pendingToolCallOrder.filter(
    (callId) => state.pendingToolCalls[callId]?.outcome === null,
  );
  return [
    `┌─ Checkpoint (${payload.reason})`,
    `│ Issued:     ${new Date(payload.issuedAt).toISOString()}`,
    `│ Expires:    ${payload.expiresAt !== null ? new Date(payload.expiresAt).toISOString() : "never"}`,
    `│ Strategy:   ${state.strategy}`,
    `│ Request:    ${state.requestId ?? "-"}`,
    `│ Status:     ${state.status}`,
    `│ Iteration:  ${state.iteration}`,
    `│ Messages:   ${state.conversation.length}`,
    `│ Pending:    ${pending.length > 0 ? pending.join(", ") : "-"}`,
    "└─",
  ].join("\n");
}

function reportFailure(action: string, error: unknown): never {
  if (error instanceof CheckpointError) {
    console.error(`Invalid checkpoint (${error.code}): ${error.message}`);
  } else {
    console.error(`${action} failed: ${error instanceof Error ? error.message : String(error)}`);
  }
  process.exit(1);
}

export function registerCheckpointCommand(program: Command): void {
  const checkpointCmd = program.command("checkpoint").description("Work with checkpoint tokens");

  checkpointCmd
    .command("inspect")
    .description("Verify a token and show the state it carries")
    .argument("<token>", "Checkpoint token")
    .option("--json", "Output the full payload as JSON")
    .action(async (token: string, opts: { json?: boolean }) => {
      try {
        const config = await loadConfig();
        const payload = verifyCheckpoint(token, { secret: config.checkpoint.secret });
        console.log(opts.json ? JSON.stringify(payload, null, 2) : describeCheckpoint(payload));
      } catch (error) {
        reportFailure("Inspect", error);
      }
    });

  checkpointCmd
    .command("resume")
    .description("Resume a request from a token, replaying a transcript for the rest")
    .argument("<token>", "Checkpoint token")
    .requiredOption("-s, --script <file>", "YAML transcript of the remaining model turns")
    .option("--json", "Output as JSON")
    .option("-v, --verbose", "Log directives and signals")
    .action(async (token: string, opts: { script: string; json?: boolean; verbose?: boolean }) => {
      try {
        const config = await loadConfig();
        const logger = createLogger("resume", config.logging, {
          verbose: opts.verbose,
          quiet: opts.json,
        });
        const turns = await loadScript(opts.script);

        const runtime = Runtime.resume(token, {
          model: new ScriptedModelBackend(turns),
          config,
          logger,
        });
        const requestId = runtime.state.requestId;
        if (requestId === null) {
          console.error("Checkpoint carries no request");
          process.exit(1);
        }

        const outcome = await runtime.await(requestId);
        await runtime.drain();
        console.log(
          opts.json ? JSON.stringify(outcome, null, 2) : formatOutcome(outcome, runtime.strategy),
        );

        await logger.flush();
        if (outcome.status !== "completed") {
          process.exitCode = 1;
        }
      } catch (error) {
        reportFailure("Resume", error);
      }
    });
}
