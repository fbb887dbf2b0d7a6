import { describe, expect, it } from "vitest";
import { parseScript } from "./script.js";

describe("parseScript", () => {
  it("reads response and error turns", () => {
    const turns = parseScript(`
turns:
  - text: "Let me check."
    toolCalls:
      - { id: call_1, name: calculator, arguments: { operation: add, a: 2, b: 3 } }
  - text: "Final Answer: 5"
    deltas: ["Final ", "Answer: 5"]
    usage: { inputTokens: 12, outputTokens: 4, totalTokens: 16 }
  - error: { type: rate_limit, message: "slow down" }
    delayMs: 10
`);

    expect(turns).toEqual([
      {
        response: {
          text: "Let me check.",
          toolCalls: [{ id: "call_1", name: "calculator", arguments: { operation: "add", a: 2, b: 3 } }],
        },
      },
      {
        response: {
          text: "Final Answer: 5",
          toolCalls: [],
          usage: { inputTokens: 12, outputTokens: 4, totalTokens: 16 },
        },
        deltas: ["Final ", "Answer: 5"],
      },
      { error: { type: "rate_limit", message: "slow down" }, delayMs: 10 },
    ]);
  });

  it("rejects an empty transcript", () => {
    expect(() => parseScript("turns: []")).toThrow(
      "Invalid script at turns: Array must contain at least 1 element(s)",
    );
  });

  it("rejects a document that is not a transcript", () => {
    expect(() => parseScript("hello")).toThrow("Invalid script: Expected object, received string");
  });

  it("rejects an unknown error type", () => {
    expect(() => parseScript("turns:\n  - error: { type: meltdown, message: x }\n")).toThrow(
      "Invalid script at turns.0",
    );
  });
});
