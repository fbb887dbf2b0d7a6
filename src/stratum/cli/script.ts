/**
 * YAML model transcripts replayed by `stratum run`
 *
 * turns:
 *   - text: "Let me check."
 *     toolCalls:
 *       - { id: call_1, name: calculator, arguments: { operation: add, a: 2, b: 3 } }
 *   - text: "Final Answer: 5"
 *   - error: { type: rate_limit, message: "slow down" }
 */

import fs from "node:fs/promises";
import YAML from "yaml";
import { z } from "zod";
import type { ScriptedTurn } from "../boundary/model.js";
import { LLMErrorTypeSchema, LLMResponseSchema } from "../machine/schema.js";

const ErrorTurnSchema = z
  .object({
    error: z.object({ type: LLMErrorTypeSchema, message: z.string() }),
    delayMs: z.number().int().min(0).optional(),
  })
  .strict();

const ResponseTurnSchema = LLMResponseSchema.extend({
  deltas: z.array(z.string()).optional(),
  delayMs: z.number().int().min(0).optional(),
}).strict();

const ScriptFileSchema = z.object({
  turns: z.array(z.union([ErrorTurnSchema, ResponseTurnSchema])).min(1),
});

/**
 * Parse transcript YAML into scripted turns
 */
export function parseScript(source: string): ScriptedTurn[] {
  const parsed = ScriptFileSchema.safeParse(YAML.parse(source));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new Error(`Invalid script${where}: ${issue?.message ?? "unknown error"}`);
  }

  return parsed.data.turns.map((turn): ScriptedTurn => {
    if ("error" in turn) {
      return { error: turn.error, delayMs: turn.delayMs };
    }
    const { deltas, delayMs, ...response } = turn;
    return { response, deltas, delayMs };
  });
}

export async function loadScript(scriptPath: string): Promise<ScriptedTurn[]> {
  const source = await fs.readFile(scriptPath, "utf-8");
  return parseScript(source);
}
