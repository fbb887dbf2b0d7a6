/**
 * Chain-of-Thought: a single model turn with explicit steps and an answer line
 */

import type { StrategyDefinition } from "../machine/strategy.js";
import { extractAnswerLine, extractSteps } from "./parsing.js";
import { CHAIN_OF_THOUGHT_SYSTEM_PROMPT, repairPrompt } from "./prompts.js";

export const chainOfThoughtStrategy: StrategyDefinition = {
  name: "chain_of_thought",
  usesTools: false,

  systemPrompt: () => CHAIN_OF_THOUGHT_SYSTEM_PROMPT,
  userPrompt: (query) => `${query}\n\nLet's think step by step.`,
  initialData: () => ({ kind: "chain_of_thought", steps: [] }),
  tools: () => [],
  phase: () => "reasoning",

  interpret(response) {
    const answer = extractAnswerLine(response.text);
    if (answer === null) {
      return { kind: "malformed", reason: "missing 'Answer:' line" };
    }
    return {
      kind: "final",
      answer,
      data: { kind: "chain_of_thought", steps: extractSteps(response.text) },
    };
  },

  repairPrompt: (reason) =>
    `${repairPrompt(reason)} End with a line 'Answer: <answer>'.`,
  toolContext: () => ({}),
};
