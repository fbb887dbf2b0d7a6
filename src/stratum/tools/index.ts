/**
 * Builtin tools
 */

import { calculatorTool } from "./calculator.js";
import {
  contextChunkTool,
  contextReadLinesTool,
  contextSearchTool,
  contextStatsTool,
  workspaceNoteTool,
  workspaceSummaryTool,
} from "./context-tools.js";
import { ToolRegistry } from "./registry.js";

export function createDefaultRegistry(): ToolRegistry {
  return new ToolRegistry()
    .register(calculatorTool)
    .register(contextChunkTool)
    .register(contextStatsTool)
    .register(contextReadLinesTool)
    .register(contextSearchTool)
    .register(workspaceNoteTool)
    .register(workspaceSummaryTool);
}

export { ToolRegistry, type PreparedToolCall, type RegisteredTool } from "./registry.js";
export { executeToolCall, type ToolExecutorOptions } from "./executor.js";
export { formatToolResult, truncateOutput, TRUNCATION_MARKER } from "./format.js";
export {
  ToolErrorCode,
  createToolError,
  defineTool,
  isToolError,
  toolOk,
  type ToolDefinition,
  type ToolExecutionContext,
  type ToolReturn,
} from "./types.js";
export { calculatorTool };
export {
  contextChunkTool,
  contextReadLinesTool,
  contextSearchTool,
  contextStatsTool,
  workspaceNoteTool,
  workspaceSummaryTool,
};
