/**
 * ReAct: alternate model turns and tool calls until the model answers
 */

import type { StrategyDefinition } from "../machine/strategy.js";
import type { LLMResponse, ToolSpec } from "../machine/schema.js";
import type { Interpretation } from "../machine/strategy.js";
import { extractFinalAnswer } from "./parsing.js";
import { REACT_SYSTEM_PROMPT, repairPrompt } from "./prompts.js";

/** Tools that only work against a request's context/workspace handles */
export function isHandleTool(name: string): boolean {
  return name.startsWith("context_") || name.startsWith("workspace_");
}

export function generalTools(tools: readonly ToolSpec[]): ToolSpec[] {
  return tools.filter((tool) => !isHandleTool(tool.name));
}

/**
 * A reply without tool calls is the answer: the text after "Final Answer:"
 * when present, the whole reply otherwise
 */
export function interpretAnswer(response: LLMResponse): Interpretation {
  const text = response.text.trim();
  if (text === "") {
    return { kind: "malformed", reason: "empty reply with no tool calls" };
  }
  return { kind: "final", answer: extractFinalAnswer(text) ?? text };
}

export const reactStrategy: StrategyDefinition = {
  name: "react",
  usesTools: true,

  systemPrompt: () => REACT_SYSTEM_PROMPT,
  userPrompt: (query) => query,
  initialData: () => ({ kind: "react" }),
  tools: (_state, env) => generalTools(env.settings.tools),
  phase: () => "react",
  interpret: (response) => interpretAnswer(response),
  repairPrompt: (reason) => repairPrompt(reason),
  toolContext: () => ({}),
};
