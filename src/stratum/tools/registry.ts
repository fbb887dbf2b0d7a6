/**
 * Tool registry - name lookup and argument validation
 */

import type { z } from "zod";
import type { ToolSpec } from "../machine/schema.js";
import type { ToolDefinition, ToolExecutionContext, ToolReturn } from "./types.js";

export type PreparedToolCall =
  | { ok: true; run: (ctx: ToolExecutionContext) => Promise<ToolReturn> }
  | { ok: false; message: string; issues: string[] };

/**
 * A tool with its argument type erased behind validation
 */
export interface RegisteredTool {
  readonly spec: ToolSpec;
  prepare(args: Record<string, unknown>): PreparedToolCall;
}

function register<I extends z.ZodTypeAny>(tool: ToolDefinition<I>): RegisteredTool {
  return {
    spec: { name: tool.name, description: tool.description, parameters: tool.parameters },
    prepare(args) {
      const parsed = tool.input.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
        );
        return { ok: false, message: `Invalid arguments for ${tool.name}`, issues };
      }
      const data: z.infer<I> = parsed.data;
      return { ok: true, run: (ctx) => tool.run(data, ctx) };
    },
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register<I extends z.ZodTypeAny>(tool: ToolDefinition<I>): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, register(tool));
    return this;
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  specs(): ToolSpec[] {
    return [...this.tools.values()].map((tool) => tool.spec);
  }
}
