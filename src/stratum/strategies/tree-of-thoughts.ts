/**
 * Tree-of-Thoughts: propose candidate thoughts, score them, follow the best
 * one to the next depth, then answer along the chosen path
 */

import type { MachineSettings, StrategyDefinition } from "../machine/strategy.js";
import type { ThoughtStep } from "../machine/schema.js";
import { extractFinalAnswer, parseNumberedList, parseScores } from "./parsing.js";
import { TREE_OF_THOUGHTS_SYSTEM_PROMPT, repairPrompt } from "./prompts.js";

function generatePrompt(settings: MachineSettings): string {
  return `Propose ${settings.treeOfThoughts.branchingFactor} distinct next thoughts as a numbered list (1. ..., 2. ...).`;
}

function evaluatePrompt(candidates: readonly string[]): string {
  return [
    "Rate each thought from 0 to 1 by how likely it leads to a correct answer:",
    ...candidates.map((thought, i) => `${i + 1}. ${thought}`),
    `Reply with JSON only: {"scores": [<${candidates.length} numbers in the same order>]}`,
  ].join("\n");
}

function answerPrompt(path: readonly ThoughtStep[]): string {
  return [
    "Reasoning path:",
    ...path.map((step, i) => `${i + 1}. ${step.thought}`),
    "Using this path, reply with 'Final Answer: <answer>'.",
  ].join("\n");
}

/**
 * Index of the highest score; the earliest wins ties
 */
export function bestIndex(scores: readonly number[]): number {
  let best = 0;
  for (let i = 1; i < scores.length; i++) {
    if ((scores[i] ?? 0) > (scores[best] ?? 0)) {
      best = i;
    }
  }
  return best;
}

export const treeOfThoughtsStrategy: StrategyDefinition = {
  name: "tree_of_thoughts",
  usesTools: false,

  systemPrompt: () => TREE_OF_THOUGHTS_SYSTEM_PROMPT,
  userPrompt: (query, _opts, settings) => `Problem: ${query}\n\n${generatePrompt(settings)}`,
  initialData: () => ({
    kind: "tree_of_thoughts",
    phase: "generate",
    depth: 0,
    candidates: [],
    path: [],
  }),
  tools: () => [],
  phase: (state) => (state.data.kind === "tree_of_thoughts" ? state.data.phase : "generate"),

  interpret(response, state, env) {
    if (state.data.kind !== "tree_of_thoughts") {
      return { kind: "malformed", reason: "state does not belong to tree_of_thoughts" };
    }
    const data = state.data;
    const { branchingFactor, maxDepth } = env.settings.treeOfThoughts;

    switch (data.phase) {
      case "generate": {
        const candidates = parseNumberedList(response.text).slice(0, branchingFactor);
        if (candidates.length === 0) {
          return { kind: "malformed", reason: "expected a numbered list of thoughts" };
        }
        return {
          kind: "continue",
          followUp: evaluatePrompt(candidates),
          data: { ...data, phase: "evaluate", candidates },
        };
      }

      case "evaluate": {
        const scores = parseScores(response.text, data.candidates.length);
        if (scores === null) {
          return {
            kind: "malformed",
            reason: `expected JSON scores for ${data.candidates.length} thoughts`,
          };
        }
        const best = bestIndex(scores);
        const path = [
          ...data.path,
          { thought: data.candidates[best] ?? "", score: scores[best] ?? 0 },
        ];
        const depth = data.depth + 1;

        if (depth >= maxDepth) {
          return {
            kind: "continue",
            followUp: answerPrompt(path),
            data: { ...data, phase: "answer", depth, candidates: [], path },
          };
        }
        return {
          kind: "continue",
          followUp: `Expand the most promising thought: "${path[path.length - 1]?.thought ?? ""}"\n${generatePrompt(env.settings)}`,
          data: { ...data, phase: "generate", depth, candidates: [], path },
        };
      }

      case "answer": {
        const text = response.text.trim();
        if (text === "") {
          return { kind: "malformed", reason: "empty answer" };
        }
        return { kind: "final", answer: extractFinalAnswer(text) ?? text };
      }
    }
  },

  repairPrompt: (reason, state) =>
    state.data.kind === "tree_of_thoughts" && state.data.phase === "evaluate"
      ? `${repairPrompt(reason)}\n${evaluatePrompt(state.data.candidates)}`
      : repairPrompt(reason),
  toolContext: () => ({}),
};
