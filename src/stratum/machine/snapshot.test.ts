import { describe, expect, it } from "vitest";
import { drive, reply, testEnv, toolCall } from "../testing/fixtures.js";
import type { InboundEvent } from "./events.js";
import { createInitialState } from "./machine.js";
import { snapshot } from "./snapshot.js";

const start: InboundEvent = { type: "start", requestId: "req_1", query: "2+3 and 4*5" };

describe("snapshot", () => {
  it("describes an idle state", () => {
    const view = snapshot(createInitialState("react"));

    expect(view.status).toBe("idle");
    expect(view.done).toBe(false);
    expect(view.details.activeRequestId).toBeNull();
  });

  it("lists pending tool calls in issuance order", () => {
    const { state } = drive(
      createInitialState("react"),
      [
        start,
        {
          type: "llm_result",
          requestId: "req_1",
          callId: "llm_1",
          result: {
            ok: true,
            response: reply("", {
              toolCalls: [
                toolCall("b", "calculator", { operation: "add", a: 2, b: 3 }),
                toolCall("a", "calculator", { operation: "multiply", a: 4, b: 5 }),
              ],
            }),
          },
        },
      ],
      testEnv("react"),
    );

    const view = snapshot(state);

    expect(view.status).toBe("running");
    expect(view.details.phase).toBe("awaiting_tool");
    expect(view.details.activeRequestId).toBe("req_1");
    expect(view.details.pendingToolCalls).toEqual([
      { callId: "b", toolName: "calculator", status: "pending" },
      { callId: "a", toolName: "calculator", status: "pending" },
    ]);
  });

  it("marks a finished request as done", () => {
    const { state } = drive(
      createInitialState("react"),
      [
        start,
        {
          type: "llm_result",
          requestId: "req_1",
          callId: "llm_1",
          result: { ok: true, response: reply("Final Answer: 5 and 20") },
        },
      ],
      testEnv("react"),
    );

    const view = snapshot(state);

    expect(view.status).toBe("success");
    expect(view.done).toBe(true);
    expect(view.result).toBe("5 and 20");
    expect(view.details.terminationReason).toBe("final_answer");
    expect(view.details.activeRequestId).toBeNull();
  });

  it("reports the fan-out stage of a preparing recursive request", () => {
    const { state } = drive(
      createInitialState("recursive"),
      [{ ...start, opts: { contextHandle: "ctx_1", contextLines: 100 } }],
      testEnv("recursive", { budget: { remainingChildren: 4, exceeded: false } }),
    );

    expect(snapshot(state).details.phase).toBe("chunking");
  });
});
