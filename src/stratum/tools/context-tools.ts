/**
 * Tools over the request's context and workspace handles
 */

import { z } from "zod";
import { chunkByLines } from "../delegation/chunker.js";
import { ToolErrorCode, createToolError, defineTool, toolOk, type ToolExecutionContext } from "./types.js";

const MAX_READ_LINES = 200;
const MAX_SEARCH_RESULTS = 50;

function requireContext(ctx: ToolExecutionContext) {
  const handle = ctx.values.contextHandle;
  if (handle === undefined) {
    return createToolError(ToolErrorCode.MISSING_CONTEXT, "No context is attached to this request");
  }
  if (!ctx.stores.contexts.has(handle)) {
    return createToolError(ToolErrorCode.NOT_FOUND, `Context ${handle} is no longer available`);
  }
  return { ok: true as const, handle };
}

function requireWorkspace(ctx: ToolExecutionContext) {
  const handle = ctx.values.workspaceHandle;
  if (handle === undefined) {
    return createToolError(ToolErrorCode.MISSING_CONTEXT, "No workspace is attached to this request");
  }
  if (!ctx.stores.workspaces.has(handle)) {
    return createToolError(ToolErrorCode.NOT_FOUND, `Workspace ${handle} is no longer available`);
  }
  return { ok: true as const, handle };
}

export const contextChunkTool = defineTool({
  name: "context_chunk",
  description: "Split the context into line-range chunks.",
  parameters: {
    type: "object",
    properties: {
      chunkLines: { type: "integer", minimum: 1, description: "Lines per chunk" },
    },
    required: ["chunkLines"],
  },
  input: z.object({ chunkLines: z.number().int().min(1) }),
  async run({ chunkLines }, ctx) {
    const context = requireContext(ctx);
    if (!context.ok) return context;

    const chunks = chunkByLines(ctx.stores.contexts.lines(context.handle) ?? [], chunkLines);
    return toolOk({ chunkCount: chunks.length, chunks });
  },
});

export const contextStatsTool = defineTool({
  name: "context_stats",
  description: "Report the line, byte and character counts of the context.",
  parameters: { type: "object", properties: {} },
  input: z.object({}),
  async run(_args, ctx) {
    const context = requireContext(ctx);
    if (!context.ok) return context;
    return toolOk(ctx.stores.contexts.stats(context.handle));
  },
});

export const contextReadLinesTool = defineTool({
  name: "context_read_lines",
  description: `Read context lines start..end (1-based, inclusive, at most ${MAX_READ_LINES} lines).`,
  parameters: {
    type: "object",
    properties: {
      start: { type: "integer", minimum: 1 },
      end: { type: "integer", minimum: 1 },
    },
    required: ["start", "end"],
  },
  input: z
    .object({ start: z.number().int().min(1), end: z.number().int().min(1) })
    .refine((range) => range.end >= range.start, { message: "end must not precede start" })
    .refine((range) => range.end - range.start < MAX_READ_LINES, {
      message: `at most ${MAX_READ_LINES} lines per read`,
    }),
  async run({ start, end }, ctx) {
    const context = requireContext(ctx);
    if (!context.ok) return context;
    return toolOk(ctx.stores.contexts.readLines(context.handle, start, end) ?? "");
  },
});

export const contextSearchTool = defineTool({
  name: "context_search",
  description: "Find context lines containing a substring (case-insensitive).",
  parameters: {
    type: "object",
    properties: {
      query: { type: "string" },
      limit: { type: "integer", minimum: 1, maximum: MAX_SEARCH_RESULTS },
    },
    required: ["query"],
  },
  input: z.object({
    query: z.string().min(1),
    limit: z.number().int().min(1).max(MAX_SEARCH_RESULTS).optional(),
  }),
  async run({ query, limit }, ctx) {
    const context = requireContext(ctx);
    if (!context.ok) return context;
    const matches = ctx.stores.contexts.search(context.handle, query, limit) ?? [];
    return toolOk({ query, count: matches.length, matches });
  },
});

export const workspaceNoteTool = defineTool({
  name: "workspace_note",
  description: "Leave a note in the workspace shared with other agents.",
  parameters: {
    type: "object",
    properties: { text: { type: "string" } },
    required: ["text"],
  },
  input: z.object({ text: z.string().min(1) }),
  async run({ text }, ctx) {
    const workspace = requireWorkspace(ctx);
    if (!workspace.ok) return workspace;
    const author = `${ctx.requestId}@${ctx.values.depth ?? 0}`;
    const notes = ctx.stores.workspaces.appendNote(workspace.handle, { author, text });
    return toolOk({ notes });
  },
});

export const workspaceSummaryTool = defineTool({
  name: "workspace_summary",
  description: "Read the notes and findings collected in the workspace.",
  parameters: { type: "object", properties: {} },
  input: z.object({}),
  async run(_args, ctx) {
    const workspace = requireWorkspace(ctx);
    if (!workspace.ok) return workspace;
    return toolOk(ctx.stores.workspaces.summary(workspace.handle));
  },
});
