/**
 * Inbound events. Every event carries the request id it belongs to; the
 * controller drops any event whose id is not the active one.
 */

import type { LLMError, LLMResponse, ToolOutcome } from "./schema.js";

export interface StartOptions {
  contextHandle?: string;
  contextLines?: number;
  workspaceHandle?: string;
  budgetHandle?: string;
  /** Recursion depth of this runtime; 0 for a root request */
  depth?: number;
}

export interface StartEvent {
  type: "start";
  requestId: string;
  query: string;
  opts?: StartOptions;
}

export type LlmResult = { ok: true; response: LLMResponse } | { ok: false; error: LLMError };

export interface LlmResultEvent {
  type: "llm_result";
  requestId: string;
  callId: string;
  result: LlmResult;
}

export interface LlmPartialEvent {
  type: "llm_partial";
  requestId: string;
  callId: string;
  delta: string;
  channel?: "content" | "thinking";
}

export interface ToolResultEvent {
  type: "tool_result";
  requestId: string;
  callId: string;
  toolName: string;
  outcome: ToolOutcome;
}

export type WorkerEventKind = "started" | "completed" | "failed" | "exited" | "crashed";

export interface WorkerEvent {
  kind: WorkerEventKind;
  /** Child tag; absent when the request's own executor reports a crash */
  tag?: string;
  answer?: string;
  error?: string;
}

export interface WorkerEventEnvelope {
  type: "worker_event";
  requestId: string;
  event: WorkerEvent;
}

export interface CancelEvent {
  type: "cancel";
  requestId: string;
  reason: string;
}

export type InboundEvent =
  | StartEvent
  | LlmResultEvent
  | LlmPartialEvent
  | ToolResultEvent
  | WorkerEventEnvelope
  | CancelEvent;
