import { describe, expect, it } from "vitest";
import { chunkByLines } from "../delegation/chunker.js";
import type { InboundEvent, StartOptions, WorkerEvent } from "../machine/events.js";
import { createInitialState, outstandingDirectives } from "../machine/machine.js";
import type { StrategyState } from "../machine/schema.js";
import type { MachineEnv } from "../machine/strategy.js";
import { drive, ofType, okOutcome, reply, testEnv } from "../testing/fixtures.js";

const LINES = Array.from({ length: 100 }, (_, i) => `line ${i + 1}`);
const CHUNKS = chunkByLines(LINES, 34);

const OPTS: StartOptions = {
  contextHandle: "ctx_1",
  contextLines: 100,
  workspaceHandle: "ws_1",
  budgetHandle: "budget_1",
  depth: 0,
};

const budgetEnv = (remainingChildren = 8): MachineEnv =>
  testEnv("recursive", { budget: { remainingChildren, exceeded: false } });

const start = (opts: StartOptions = OPTS): InboundEvent => ({
  type: "start",
  requestId: "req_1",
  query: "Summarize the log",
  opts,
});

const chunked: InboundEvent = {
  type: "tool_result",
  requestId: "req_1",
  callId: "chunk_1",
  toolName: "context_chunk",
  outcome: okOutcome({ chunkCount: CHUNKS.length, chunks: CHUNKS }, "chunks"),
};

const worker = (event: WorkerEvent): InboundEvent => ({
  type: "worker_event",
  requestId: "req_1",
  event,
});

function spawned(env: MachineEnv): StrategyState {
  return drive(createInitialState("recursive"), [start(), chunked], env).state;
}

describe("recursive strategy", () => {
  it("chunks a large context before calling the model", () => {
    const env = budgetEnv();
    const { state, transitions } = drive(createInitialState("recursive"), [start()], env);

    expect(state.status).toBe("preparing");
    expect(state.conversation.at(-1)).toEqual({
      role: "user",
      content: "Summarize the log\n\nA context of 100 lines is available through the context_* tools.",
    });
    expect(transitions[0]?.directives).toEqual([
      {
        type: "tool_call",
        id: "chunk_1",
        requestId: "req_1",
        toolName: "context_chunk",
        arguments: { chunkLines: 34 },
        timeoutMs: 15000,
        maxRetries: 1,
        retryBackoffMs: 200,
        context: { contextHandle: "ctx_1", workspaceHandle: "ws_1", depth: 0 },
      },
    ]);
    expect(transitions[0]?.stablePoint).toBe("preparing");
  });

  it("spawns one worker per chunk", () => {
    const env = budgetEnv();
    const { transitions } = drive(createInitialState("recursive"), [start(), chunked], env);
    const directives = transitions[1]?.directives ?? [];

    expect(ofType(directives, "spawn_worker")).toEqual(
      CHUNKS.map((chunk, i) => ({
        type: "spawn_worker",
        tag: `req_1/w${i}`,
        requestId: "req_1",
        workerRef: "recursive",
        reserved: false,
        params: {
          query: "Summarize the log",
          chunks: [chunk],
          contextHandle: "ctx_1",
          workspaceHandle: "ws_1",
          budgetHandle: "budget_1",
          depth: 1,
        },
      })),
    );
    expect(transitions[1]?.stablePoint).toBe("preparing");
    expect(ofType(directives, "emit_signal")).toEqual([
      {
        type: "emit_signal",
        signal: "fanout.spawned",
        payload: {
          requestId: "req_1",
          chunkCount: 3,
          children: [
            { tag: "req_1/w0", chunkIds: ["c_0"] },
            { tag: "req_1/w1", chunkIds: ["c_1"] },
            { tag: "req_1/w2", chunkIds: ["c_2"] },
          ],
        },
      },
    ]);
  });

  it("groups chunks when the budget allows fewer children", () => {
    const env = budgetEnv(2);
    const { transitions } = drive(createInitialState("recursive"), [start(), chunked], env);

    expect(
      ofType(transitions[1]?.directives ?? [], "spawn_worker").map((d) =>
        d.params.chunks.map((c) => c.id),
      ),
    ).toEqual([["c_0", "c_1"], ["c_2"]]);
  });

  it("synthesizes partial results when a worker fails", () => {
    const env = budgetEnv();
    const { state, transitions } = drive(
      spawned(env),
      [
        worker({ kind: "started", tag: "req_1/w0" }),
        worker({ kind: "completed", tag: "req_1/w0", answer: "alpha  found\n here" }),
        worker({ kind: "completed", tag: "req_1/w1", answer: "beta" }),
        worker({ kind: "failed", tag: "req_1/w2", error: "budget exceeded" }),
      ],
      env,
    );

    expect(transitions.slice(0, 3).every((t) => t.directives.length === 0)).toBe(true);
    expect(transitions.map((t) => t.stablePoint)).toEqual([
      null,
      "preparing",
      "preparing",
      "after_workers",
    ]);
    expect(state.status).toBe("awaiting_llm");
    expect(state.toolsEnabled).toBe(false);

    const [signal, call] = transitions[3]?.directives ?? [];
    expect(signal).toEqual({
      type: "emit_signal",
      signal: "fanout.synthesis",
      payload: { requestId: "req_1", chunkCount: 3, completed: 2, errors: 1 },
    });
    expect(call?.type === "llm_call" && call.tools).toEqual([]);
    expect(call?.type === "llm_call" && call.metadata.phase).toBe("synthesis");
    expect(state.conversation.at(-1)).toEqual({
      role: "user",
      content: [
        "Original query: Summarize the log",
        "",
        "Fan-out results: 2 of 3 chunks completed.",
        "Note: 1 chunk failed (c_2 (lines 69-100)); answer from the partial results below.",
        "",
        "Findings:",
        "- [c_0 lines 1-34] alpha found here",
        "- [c_1 lines 35-68] beta",
        "",
        "Combine the findings into one answer to the original query. Reply with 'Final Answer: <answer>'.",
      ].join("\n"),
    });

    const done = drive(
      state,
      [
        {
          type: "llm_result",
          requestId: "req_1",
          callId: "llm_1",
          result: { ok: true, response: reply("Final Answer: alpha and beta") },
        },
      ],
      env,
    ).state;
    expect(done.status).toBe("completed");
    expect(done.result).toBe("alpha and beta");
  });

  it("counts a crashed or exited child as failed", () => {
    const env = budgetEnv();
    const { state } = drive(
      spawned(env),
      [
        worker({ kind: "crashed", tag: "req_1/w0" }),
        worker({ kind: "exited", tag: "req_1/w1" }),
        worker({ kind: "completed", tag: "req_1/w2", answer: "gamma" }),
      ],
      env,
    );

    const prompt = state.conversation.at(-1)?.content ?? "";
    expect(prompt).toContain("Note: 2 chunks failed (c_0 (lines 1-34), c_1 (lines 35-68));");
    expect(prompt).toContain("- [c_2 lines 69-100] gamma");
  });

  it("ignores events for unknown or finished children", () => {
    const env = budgetEnv();
    const before = drive(spawned(env), [worker({ kind: "completed", tag: "req_1/w0", answer: "a" })], env)
      .state;

    const { transitions } = drive(
      before,
      [
        worker({ kind: "completed", tag: "req_1/w9", answer: "x" }),
        worker({ kind: "failed", tag: "req_1/w0", error: "late" }),
      ],
      env,
    );

    expect(transitions[0]?.state).toBe(before);
    expect(transitions[1]?.state).toBe(before);
  });

  it("re-issues the children that have not finished", () => {
    const env = budgetEnv();
    const state = drive(
      spawned(env),
      [
        worker({ kind: "started", tag: "req_1/w0" }),
        worker({ kind: "started", tag: "req_1/w1" }),
        worker({ kind: "completed", tag: "req_1/w0", answer: "a" }),
      ],
      env,
    ).state;

    expect(
      ofType(outstandingDirectives(state, env), "spawn_worker").map((d) => [d.tag, d.reserved]),
    ).toEqual([
      ["req_1/w1", true],
      ["req_1/w2", false],
    ]);
  });

  it("re-issues the chunk call while chunking", () => {
    const env = budgetEnv();
    const { state } = drive(createInitialState("recursive"), [start()], env);

    expect(ofType(outstandingDirectives(state, env), "tool_call").map((d) => [d.id, d.toolName])).toEqual([
      ["chunk_1", "context_chunk"],
    ]);
  });

  it("falls back to a direct model call when chunking fails", () => {
    const env = budgetEnv();
    const { state, transitions } = drive(
      createInitialState("recursive"),
      [
        start(),
        {
          type: "tool_result",
          requestId: "req_1",
          callId: "chunk_1",
          toolName: "context_chunk",
          outcome: {
            ok: false,
            error: { type: "exception", message: "boom", retryable: true },
            attempts: 2,
          },
        },
      ],
      env,
    );

    expect(state.status).toBe("awaiting_llm");
    expect(ofType(transitions[1]?.directives ?? [], "llm_call").map((d) => d.id)).toEqual(["llm_1"]);
    expect(transitions[1]?.stablePoint).toBe("after_tools");
  });

  it("works directly on small contexts with the handle tools", () => {
    const env = budgetEnv();
    const { state, transitions } = drive(
      createInitialState("recursive"),
      [start({ contextHandle: "ctx_1", contextLines: 12 })],
      env,
    );

    const [call] = ofType(transitions[0]?.directives ?? [], "llm_call");
    expect(state.status).toBe("awaiting_llm");
    expect(call?.tools.map((t) => t.name)).toEqual([
      "calculator",
      "context_stats",
      "context_read_lines",
      "context_search",
    ]);
  });

  it("does not fan out at the depth limit or without a budget", () => {
    const child = drive(
      createInitialState("recursive"),
      [start({ ...OPTS, depth: 1 })],
      budgetEnv(),
    );
    const unbudgeted = drive(createInitialState("recursive"), [start()], testEnv("recursive"));

    expect(child.state.status).toBe("awaiting_llm");
    expect(child.state.conversation.at(-1)?.content).toBe(
      [
        "Summarize the log",
        "",
        "A context of 100 lines is available through the context_* tools.",
        "You are a sub-agent at depth 1; answer only from your context.",
      ].join("\n"),
    );
    expect(unbudgeted.state.status).toBe("awaiting_llm");
  });

  it("cancels while workers are running", () => {
    const env = budgetEnv();
    const { state } = drive(
      spawned(env),
      [{ type: "cancel", requestId: "req_1", reason: "stop" }],
      env,
    );

    expect(state.status).toBe("error");
    expect(state.terminationReason).toBe("cancelled");
  });
});
