import { describe, expect, it } from "vitest";
import type { AggregationStrategy } from "../config/types.js";
import type { InboundEvent } from "../machine/events.js";
import { createInitialState } from "../machine/machine.js";
import type { ThoughtNode } from "../machine/schema.js";
import { drive, ofType, reply, testEnv, testSettings } from "../testing/fixtures.js";
import { tallyConclusions } from "./graph-of-thoughts.js";
import { repairPrompt } from "./prompts.js";

const llmOk = (callId: string, text: string): InboundEvent => ({
  type: "llm_result",
  requestId: "req_1",
  callId,
  result: { ok: true, response: reply(text) },
});

const start: InboundEvent = { type: "start", requestId: "req_1", query: "Plan a trip" };

const env = (
  overrides: {
    branchingFactor?: number;
    maxNodes?: number;
    maxDepth?: number;
    aggregation?: AggregationStrategy;
  } = {},
) =>
  testEnv("graph_of_thoughts", {
    settings: testSettings({
      graphOfThoughts: {
        branchingFactor: 2,
        maxNodes: 20,
        maxDepth: 2,
        aggregation: "synthesis",
        ...overrides,
      },
    }),
  });

const CONNECT_FORMAT =
  'Reply with JSON only: {"scores": [<2 numbers>], "connections": [{"from": <n>, "to": <n>, "relation": "supports" | "contradicts" | "refines"}]}';

const FIRST_CONNECT_PROMPT = [
  "Thoughts so far:",
  "1. go by train",
  "2. go by car",
  "Rate the new thoughts 1, 2 from 0 to 1 and link any related thoughts.",
  CONNECT_FORMAT,
].join("\n");

const node = (id: string, score: number | null): ThoughtNode => ({
  id,
  content: id,
  depth: 1,
  parentId: null,
  score,
});

describe("graph_of_thoughts strategy", () => {
  it("generates, connects and synthesizes the thoughts", () => {
    const { state, transitions } = drive(
      createInitialState("graph_of_thoughts"),
      [
        start,
        llmOk("llm_1", "1. go by train\n2. go by car\n3. fly"),
        llmOk(
          "llm_2",
          '{"scores": [0.4, 0.8], "connections": [{"from": 1, "to": 2, "relation": "contradicts"}, {"from": 3, "to": 1, "relation": "supports"}, {"from": 2, "to": 2, "relation": "refines"}]}',
        ),
        llmOk("llm_3", "1. rent an electric car\n2. share the drive"),
        llmOk("llm_4", '{"scores": [0.9, 0.5], "connections": [{"from": 3, "to": 2, "relation": "refines"}]}'),
        llmOk("llm_5", "Final Answer: rent an electric car"),
      ],
      env(),
    );

    const [generate] = ofType(transitions[0]?.directives ?? [], "llm_call");
    expect(generate?.metadata.phase).toBe("generate");
    expect(generate?.context.at(-1)).toEqual({
      role: "user",
      content:
        "Problem: Plan a trip\n\nPropose 2 distinct thoughts as a numbered list (1. ..., 2. ...).",
    });

    const [connect] = ofType(transitions[1]?.directives ?? [], "llm_call");
    expect(connect?.metadata.phase).toBe("connect");
    expect(connect?.context.at(-1)).toEqual({ role: "user", content: FIRST_CONNECT_PROMPT });

    const [expand] = ofType(transitions[2]?.directives ?? [], "llm_call");
    expect(expand?.metadata.phase).toBe("generate");
    expect(expand?.context.at(-1)).toEqual({
      role: "user",
      content:
        'Build on thought 2: "go by car"\nPropose 2 distinct thoughts as a numbered list (1. ..., 2. ...).',
    });
    expect(transitions[2]?.state.data).toEqual({
      kind: "graph_of_thoughts",
      phase: "generate",
      aggregation: "synthesis",
      depth: 1,
      nodes: [
        { id: "t1", content: "go by train", depth: 1, parentId: null, score: 0.4 },
        { id: "t2", content: "go by car", depth: 1, parentId: null, score: 0.8 },
      ],
      edges: [{ from: "t1", to: "t2", relation: "contradicts" }],
      focusId: "t2",
      frontier: [],
    });

    const [aggregate] = ofType(transitions[4]?.directives ?? [], "llm_call");
    expect(aggregate?.metadata.phase).toBe("aggregate");
    expect(aggregate?.context.at(-1)).toEqual({
      role: "user",
      content: [
        "Thoughts:",
        "1. [0.4] go by train",
        "2. [0.8] go by car",
        "3. [0.9] rent an electric car",
        "4. [0.5] share the drive",
        "Links:",
        "- 1 contradicts 2",
        "- 3 refines 2",
        "Combine the strongest thoughts into one answer. Reply with 'Final Answer: <answer>'.",
      ].join("\n"),
    });
    expect(transitions[4]?.state.data).toMatchObject({
      depth: 2,
      nodes: [
        { id: "t1" },
        { id: "t2" },
        { id: "t3", depth: 2, parentId: "t2", score: 0.9 },
        { id: "t4", depth: 2, parentId: "t2", score: 0.5 },
      ],
    });

    expect(state.status).toBe("completed");
    expect(state.result).toBe("rent an electric car");
  });

  it("aggregates once the graph is full, before the depth is reached", () => {
    const { state, transitions } = drive(
      createInitialState("graph_of_thoughts"),
      [start, llmOk("llm_1", "1. a\n2. b\n3. c"), llmOk("llm_2", '{"scores": [0.5, 0.6]}')],
      env({ branchingFactor: 3, maxNodes: 3, maxDepth: 3 }),
    );

    const [generate] = ofType(transitions[0]?.directives ?? [], "llm_call");
    expect(generate?.context.at(-1)).toEqual({
      role: "user",
      content:
        "Problem: Plan a trip\n\nPropose 2 distinct thoughts as a numbered list (1. ..., 2. ...).",
    });

    const [aggregate] = ofType(transitions[2]?.directives ?? [], "llm_call");
    expect(aggregate?.context.at(-1)).toEqual({
      role: "user",
      content:
        "Thoughts:\n1. [0.5] a\n2. [0.6] b\nCombine the strongest thoughts into one answer. Reply with 'Final Answer: <answer>'.",
    });
    expect(state.data).toMatchObject({ phase: "aggregate", depth: 1, frontier: [] });
  });

  it("tallies conclusions by vote or by score", () => {
    const events: InboundEvent[] = [
      start,
      llmOk("llm_1", "1. via the north\n2. via the coast\n3. via the hills"),
      llmOk("llm_2", '{"scores": [0.2, 0.9, 0.3]}'),
      llmOk("llm_3", '{"conclusions": ["Paris", "Lyon", "paris "]}'),
    ];

    const voting = drive(
      createInitialState("graph_of_thoughts"),
      events,
      env({ branchingFactor: 3, maxDepth: 1, aggregation: "voting" }),
    );
    const [aggregate] = ofType(voting.transitions[2]?.directives ?? [], "llm_call");
    expect(aggregate?.context.at(-1)).toEqual({
      role: "user",
      content: [
        "Thoughts:",
        "1. via the north",
        "2. via the coast",
        "3. via the hills",
        "For each thought, state the answer it leads to in a few words.",
        'Reply with JSON only: {"conclusions": [<3 strings in the same order>]}',
      ].join("\n"),
    });
    expect(voting.state.result).toBe("Paris");

    const weighted = drive(
      createInitialState("graph_of_thoughts"),
      events,
      env({ branchingFactor: 3, maxDepth: 1, aggregation: "weighted" }),
    );
    expect(weighted.state.result).toBe("Lyon");
  });

  it("repeats the rating request when the scores do not parse", () => {
    const { state, transitions } = drive(
      createInitialState("graph_of_thoughts"),
      [start, llmOk("llm_1", "1. go by train\n2. go by car"), llmOk("llm_2", '{"scores": [0.5]}')],
      env(),
    );

    const [repair] = ofType(transitions[2]?.directives ?? [], "llm_call");
    expect(state.parseRetries).toBe(1);
    expect(repair?.context.at(-1)).toEqual({
      role: "user",
      content: `${repairPrompt("expected JSON scores for 2 new thoughts")}\n${FIRST_CONNECT_PROMPT}`,
    });
  });

  it("asks again when the conclusions do not match the thoughts", () => {
    const { state, transitions } = drive(
      createInitialState("graph_of_thoughts"),
      [
        start,
        llmOk("llm_1", "1. a\n2. b"),
        llmOk("llm_2", '{"scores": [0.5, 0.5]}'),
        llmOk("llm_3", '{"conclusions": ["x"]}'),
      ],
      env({ maxDepth: 1, aggregation: "voting" }),
    );

    const [repair] = ofType(transitions[3]?.directives ?? [], "llm_call");
    expect(state.status).toBe("awaiting_llm");
    expect(repair?.context.at(-1)).toEqual({
      role: "user",
      content: [
        repairPrompt("expected JSON conclusions for 2 thoughts"),
        "Thoughts:",
        "1. a",
        "2. b",
        "For each thought, state the answer it leads to in a few words.",
        'Reply with JSON only: {"conclusions": [<2 strings in the same order>]}',
      ].join("\n"),
    });
  });
});

describe("tallyConclusions", () => {
  it("prefers the earliest of equal tallies", () => {
    expect(tallyConclusions(["A", "B"], [node("t1", 0.5), node("t2", 0.5)], "voting")).toBe("A");
    expect(tallyConclusions(["A", "B"], [node("t1", 0.5), node("t2", 0.5)], "weighted")).toBe("A");
  });

  it("ignores blank conclusions", () => {
    expect(tallyConclusions(["", "  "], [node("t1", 1), node("t2", 1)], "voting")).toBeNull();
    expect(tallyConclusions(["", "B"], [node("t1", 1), node("t2", null)], "weighted")).toBe("B");
  });
});
