import { describe, expect, it } from "vitest";
import type { ToolCallContext } from "../machine/directives.js";
import { createStores, type RuntimeStores } from "../store/index.js";
import { createDefaultRegistry } from "./index.js";
import type { ToolReturn } from "./types.js";

const registry = createDefaultRegistry();

async function invoke(
  stores: RuntimeStores,
  name: string,
  args: Record<string, unknown>,
  values: ToolCallContext,
): Promise<ToolReturn> {
  const tool = registry.get(name);
  if (!tool) throw new Error(`missing tool ${name}`);
  const prepared = tool.prepare(args);
  if (!prepared.ok) throw new Error(prepared.issues.join("; "));
  return prepared.run({
    requestId: "req_1",
    callId: "tool_1",
    attempt: 1,
    values,
    stores,
    signal: new AbortController().signal,
  });
}

function numberedLines(count: number): string {
  return Array.from({ length: count }, (_, i) => `line ${i + 1}`).join("\n");
}

describe("builtin tools", () => {
  it("registers every builtin", () => {
    expect(registry.names()).toEqual([
      "calculator",
      "context_chunk",
      "context_stats",
      "context_read_lines",
      "context_search",
      "workspace_note",
      "workspace_summary",
    ]);
  });

  describe("context_chunk", () => {
    it("splits the context into line ranges", async () => {
      const stores = createStores();
      const contextHandle = stores.contexts.create(numberedLines(100), { owns: true });

      const result = await invoke(stores, "context_chunk", { chunkLines: 34 }, { contextHandle });

      expect(result).toEqual({
        ok: true,
        result: {
          chunkCount: 3,
          chunks: [
            { id: "c_0", startLine: 1, endLine: 34, preview: "line 1" },
            { id: "c_1", startLine: 35, endLine: 68, preview: "line 35" },
            { id: "c_2", startLine: 69, endLine: 100, preview: "line 69" },
          ],
        },
      });
    });

    it("reports a missing context handle", async () => {
      const result = await invoke(createStores(), "context_chunk", { chunkLines: 10 }, {});

      expect(result).toEqual({
        ok: false,
        error: { code: "MISSING_CONTEXT", reason: "No context is attached to this request" },
      });
    });

    it("reports a released context", async () => {
      const stores = createStores();
      const contextHandle = stores.contexts.create("a", { owns: true });
      stores.contexts.release(contextHandle);

      const result = await invoke(stores, "context_stats", {}, { contextHandle });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe("NOT_FOUND");
    });
  });

  it("reads an inclusive line range", async () => {
    const stores = createStores();
    const contextHandle = stores.contexts.create("a\nb\nc\nd", { owns: true });

    const result = await invoke(stores, "context_read_lines", { start: 2, end: 3 }, { contextHandle });

    expect(result).toEqual({ ok: true, result: "b\nc" });
  });

  it("rejects a reversed range before running", () => {
    const tool = registry.get("context_read_lines");
    const prepared = tool?.prepare({ start: 5, end: 2 });

    expect(prepared?.ok).toBe(false);
    if (!prepared || prepared.ok) return;
    expect(prepared.issues).toEqual(["(root): end must not precede start"]);
  });

  it("searches case-insensitively", async () => {
    const stores = createStores();
    const contextHandle = stores.contexts.create("ok\nERROR one\nfine\nerror two", { owns: true });

    const result = await invoke(stores, "context_search", { query: "error" }, { contextHandle });

    expect(result).toEqual({
      ok: true,
      result: {
        query: "error",
        count: 2,
        matches: [
          { line: 2, text: "ERROR one" },
          { line: 4, text: "error two" },
        ],
      },
    });
  });

  it("writes notes that the workspace summary reads back", async () => {
    const stores = createStores();
    const workspaceHandle = stores.workspaces.create({ owns: true });

    const noted = await invoke(
      stores,
      "workspace_note",
      { text: "totals look off" },
      { workspaceHandle, depth: 1 },
    );
    const summary = await invoke(stores, "workspace_summary", {}, { workspaceHandle });

    expect(noted).toEqual({ ok: true, result: { notes: 1 } });
    expect(summary).toEqual({ ok: true, result: "- (req_1@1) totals look off" });
  });

  it("multiplies with the calculator", async () => {
    const result = await invoke(
      createStores(),
      "calculator",
      { operation: "multiply", a: 6, b: 7 },
      {},
    );

    expect(result).toEqual({ ok: true, result: 42 });
  });
});
