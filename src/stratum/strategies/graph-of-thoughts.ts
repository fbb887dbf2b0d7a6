/**
 * Graph-of-Thoughts: grow a graph of thoughts from the query, score and link
 * each new round, then aggregate the scored thoughts into one answer.
 *
 * generate: numbered thoughts become children of the focus thought
 * connect: scores for the new thoughts, plus links between any two thoughts
 * aggregate: a synthesized answer, or one conclusion per thought to tally
 */

import { z } from "zod";
import type { MachineSettings, StrategyDefinition } from "../machine/strategy.js";
import {
  ThoughtRelationSchema,
  type StrategyData,
  type ThoughtEdge,
  type ThoughtNode,
} from "../machine/schema.js";
import { extractFinalAnswer, extractJsonObject, parseNumberedList } from "./parsing.js";
import { GRAPH_OF_THOUGHTS_SYSTEM_PROMPT, repairPrompt } from "./prompts.js";
import { bestIndex } from "./tree-of-thoughts.js";

type GraphData = Extract<StrategyData, { kind: "graph_of_thoughts" }>;

const ConnectReplySchema = z.object({
  scores: z.array(z.number().min(0).max(1)),
  connections: z
    .array(
      z.object({
        from: z.number().int(),
        to: z.number().int(),
        relation: ThoughtRelationSchema,
      }),
    )
    .default([]),
});

const ConclusionsReplySchema = z.object({
  conclusions: z.array(z.string()),
});

function thoughtId(index: number): string {
  return `t${index + 1}`;
}

function thoughtNumber(id: string): string {
  return id.slice(1);
}

function generatePrompt(settings: MachineSettings, room: number): string {
  const count = Math.min(settings.graphOfThoughts.branchingFactor, room);
  return `Propose ${count} distinct thoughts as a numbered list (1. ..., 2. ...).`;
}

function connectPrompt(data: GraphData): string {
  const fresh = data.frontier.map(thoughtNumber);
  return [
    "Thoughts so far:",
    ...data.nodes.map((node, i) => `${i + 1}. ${node.content}`),
    `Rate the new thoughts ${fresh.join(", ")} from 0 to 1 and link any related thoughts.`,
    `Reply with JSON only: {"scores": [<${fresh.length} numbers>], "connections": [{"from": <n>, "to": <n>, "relation": "supports" | "contradicts" | "refines"}]}`,
  ].join("\n");
}

function aggregatePrompt(data: GraphData): string {
  if (data.aggregation === "synthesis") {
    const links = data.edges.map(
      (edge) => `- ${thoughtNumber(edge.from)} ${edge.relation} ${thoughtNumber(edge.to)}`,
    );
    return [
      "Thoughts:",
      ...data.nodes.map((node, i) => `${i + 1}. [${node.score ?? 0}] ${node.content}`),
      ...(links.length > 0 ? ["Links:", ...links] : []),
      "Combine the strongest thoughts into one answer. Reply with 'Final Answer: <answer>'.",
    ].join("\n");
  }
  return [
    "Thoughts:",
    ...data.nodes.map((node, i) => `${i + 1}. ${node.content}`),
    "For each thought, state the answer it leads to in a few words.",
    `Reply with JSON only: {"conclusions": [<${data.nodes.length} strings in the same order>]}`,
  ].join("\n");
}

/**
 * Most supported conclusion. Voting counts one per thought, weighted sums the
 * thoughts' scores; the earliest conclusion wins ties. Conclusions compare
 * case-insensitively and the first spelling seen is returned.
 */
export function tallyConclusions(
  conclusions: readonly string[],
  nodes: readonly ThoughtNode[],
  aggregation: "voting" | "weighted",
): string | null {
  const tally = new Map<string, { answer: string; weight: number }>();
  conclusions.forEach((conclusion, i) => {
    const answer = conclusion.trim();
    if (answer === "") return;
    const key = answer.toLowerCase().replace(/\s+/g, " ");
    const weight = aggregation === "voting" ? 1 : (nodes[i]?.score ?? 0);
    const entry = tally.get(key);
    if (entry) {
      entry.weight += weight;
    } else {
      tally.set(key, { answer, weight });
    }
  });

  let best: { answer: string; weight: number } | null = null;
  for (const entry of tally.values()) {
    if (best === null || entry.weight > best.weight) {
      best = entry;
    }
  }
  return best?.answer ?? null;
}

export const graphOfThoughtsStrategy: StrategyDefinition = {
  name: "graph_of_thoughts",
  usesTools: false,

  systemPrompt: () => GRAPH_OF_THOUGHTS_SYSTEM_PROMPT,
  userPrompt: (query, _opts, settings) =>
    `Problem: ${query}\n\n${generatePrompt(settings, settings.graphOfThoughts.maxNodes - 1)}`,
  initialData: (_opts, settings) => ({
    kind: "graph_of_thoughts",
    phase: "generate",
    aggregation: settings.graphOfThoughts.aggregation,
    depth: 0,
    nodes: [],
    edges: [],
    focusId: null,
    frontier: [],
  }),
  tools: () => [],
  phase: (state) => (state.data.kind === "graph_of_thoughts" ? state.data.phase : "generate"),

  interpret(response, state, env) {
    if (state.data.kind !== "graph_of_thoughts") {
      return { kind: "malformed", reason: "state does not belong to graph_of_thoughts" };
    }
    const data = state.data;
    const { branchingFactor, maxNodes, maxDepth } = env.settings.graphOfThoughts;

    switch (data.phase) {
      case "generate": {
        // The query is the root and takes one of the node slots
        const room = maxNodes - 1 - data.nodes.length;
        const thoughts = parseNumberedList(response.text).slice(0, Math.min(branchingFactor, room));
        if (thoughts.length === 0) {
          return { kind: "malformed", reason: "expected a numbered list of thoughts" };
        }
        const parent = data.nodes.find((node) => node.id === data.focusId);
        const added: ThoughtNode[] = thoughts.map((content, i) => ({
          id: thoughtId(data.nodes.length + i),
          content,
          depth: (parent?.depth ?? 0) + 1,
          parentId: parent?.id ?? null,
          score: null,
        }));
        const next: GraphData = {
          ...data,
          phase: "connect",
          nodes: [...data.nodes, ...added],
          frontier: added.map((node) => node.id),
        };
        return { kind: "continue", followUp: connectPrompt(next), data: next };
      }

      case "connect": {
        const parsed = ConnectReplySchema.safeParse(extractJsonObject(response.text));
        if (!parsed.success || parsed.data.scores.length !== data.frontier.length) {
          return {
            kind: "malformed",
            reason: `expected JSON scores for ${data.frontier.length} new thoughts`,
          };
        }
        const { scores, connections } = parsed.data;

        const nodes = data.nodes.map((node) => {
          const slot = data.frontier.indexOf(node.id);
          return slot === -1 ? node : { ...node, score: scores[slot] ?? 0 };
        });
        const edges: ThoughtEdge[] = [...data.edges];
        for (const link of connections) {
          const from = nodes[link.from - 1];
          const to = nodes[link.to - 1];
          if (!from || !to || from.id === to.id) continue;
          const known = edges.some(
            (edge) => edge.from === from.id && edge.to === to.id && edge.relation === link.relation,
          );
          if (!known) {
            edges.push({ from: from.id, to: to.id, relation: link.relation });
          }
        }

        const depth = data.depth + 1;
        const scored: GraphData = { ...data, depth, nodes, edges };

        if (depth >= maxDepth || nodes.length >= maxNodes - 1) {
          const next: GraphData = { ...scored, phase: "aggregate", focusId: null, frontier: [] };
          return { kind: "continue", followUp: aggregatePrompt(next), data: next };
        }

        const focus = nodes.find((node) => node.id === data.frontier[bestIndex(scores)]);
        if (!focus) {
          return { kind: "malformed", reason: "no thought to expand" };
        }
        return {
          kind: "continue",
          followUp: `Build on thought ${thoughtNumber(focus.id)}: "${focus.content}"\n${generatePrompt(env.settings, maxNodes - 1 - nodes.length)}`,
          data: { ...scored, phase: "generate", focusId: focus.id, frontier: [] },
        };
      }

      case "aggregate": {
        const { aggregation } = data;
        if (aggregation === "synthesis") {
          const text = response.text.trim();
          if (text === "") {
            return { kind: "malformed", reason: "empty answer" };
          }
          return { kind: "final", answer: extractFinalAnswer(text) ?? text };
        }

        const parsed = ConclusionsReplySchema.safeParse(extractJsonObject(response.text));
        if (!parsed.success || parsed.data.conclusions.length !== data.nodes.length) {
          return {
            kind: "malformed",
            reason: `expected JSON conclusions for ${data.nodes.length} thoughts`,
          };
        }
        const answer = tallyConclusions(parsed.data.conclusions, data.nodes, aggregation);
        if (answer === null) {
          return { kind: "malformed", reason: "no conclusions to aggregate" };
        }
        return { kind: "final", answer };
      }
    }
  },

  repairPrompt(reason, state) {
    if (state.data.kind !== "graph_of_thoughts") return repairPrompt(reason);
    switch (state.data.phase) {
      case "connect":
        return `${repairPrompt(reason)}\n${connectPrompt(state.data)}`;
      case "aggregate":
        return state.data.aggregation === "synthesis"
          ? repairPrompt(reason)
          : `${repairPrompt(reason)}\n${aggregatePrompt(state.data)}`;
      case "generate":
        return repairPrompt(reason);
    }
  },
  toolContext: () => ({}),
};
