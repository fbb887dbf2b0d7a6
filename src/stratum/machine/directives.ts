/**
 * Directives: side effects the machine asks the boundary to carry out
 */

import type { StrategyName } from "../config/types.js";
import type { ChunkRef, Message, RuntimeErrorKind, ToolSpec } from "./schema.js";

export interface LlmCallMetadata {
  strategy: StrategyName;
  iteration: number;
  /** Sub-phase that issued the call, e.g. "react", "synthesis", "evaluate" */
  phase: string;
  maxTokens: number;
  temperature: number;
}

export interface LLMCallDirective {
  type: "llm_call";
  id: string;
  requestId: string;
  model: string;
  context: Message[];
  tools: ToolSpec[];
  metadata: LlmCallMetadata;
}

/**
 * Handles a tool may read; forwarded untouched by the boundary
 */
export interface ToolCallContext {
  contextHandle?: string;
  workspaceHandle?: string;
  depth?: number;
}

export interface ToolCallDirective {
  type: "tool_call";
  id: string;
  requestId: string;
  toolName: string;
  arguments: Record<string, unknown>;
  timeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  context: ToolCallContext;
}

export interface WorkerParams {
  query: string;
  chunks: ChunkRef[];
  contextHandle: string;
  workspaceHandle: string | null;
  budgetHandle: string | null;
  depth: number;
}

export interface SpawnWorkerDirective {
  type: "spawn_worker";
  tag: string;
  requestId: string;
  workerRef: StrategyName;
  params: WorkerParams;
  /** The budget already holds this child's slot (a re-issued running child) */
  reserved: boolean;
}

export interface CancelWorkerDirective {
  type: "cancel_worker";
  tag: string;
  requestId: string;
  reason: string;
}

export type SignalType =
  | "checkpoint"
  | "request.completed"
  | "request.failed"
  | "request.cancelled"
  | "fanout.spawned"
  | "fanout.synthesis";

export interface EmitSignalDirective {
  type: "emit_signal";
  signal: SignalType;
  payload: Record<string, unknown>;
}

export interface EmitRequestErrorDirective {
  type: "emit_request_error";
  requestId: string;
  reason: RuntimeErrorKind;
  message: string;
}

export type Directive =
  | LLMCallDirective
  | ToolCallDirective
  | SpawnWorkerDirective
  | CancelWorkerDirective
  | EmitSignalDirective
  | EmitRequestErrorDirective;

export type DirectiveType = Directive["type"];
