/**
 * Transition building blocks shared by every strategy
 */

import type { Directive, EmitSignalDirective, ToolCallDirective } from "./directives.js";
import type {
  LLMResponse,
  Message,
  MachineStatus,
  RuntimeError,
  StrategyState,
  TerminationReason,
  ToolCallRecord,
  ToolCallRequest,
  ToolOutcome,
  Usage,
} from "./schema.js";
import type { CheckpointReason, MachineEnv, Transition } from "./strategy.js";

export const MAX_ITERATIONS_MESSAGE = "Maximum iterations reached without a final answer.";

export const ACTIVE_STATUSES: readonly MachineStatus[] = ["preparing", "awaiting_llm", "awaiting_tool"];

export function isActive(state: StrategyState): boolean {
  return ACTIVE_STATUSES.includes(state.status);
}

export function isTerminal(state: StrategyState): boolean {
  return state.status === "completed" || state.status === "error";
}

export function emptyUsage(): Usage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

export function addUsage(total: Usage, delta: Usage | undefined): Usage {
  if (!delta) return total;
  return {
    inputTokens: total.inputTokens + delta.inputTokens,
    outputTokens: total.outputTokens + delta.outputTokens,
    totalTokens: total.totalTokens + delta.totalTokens,
  };
}

export function transition(
  state: StrategyState,
  directives: Directive[] = [],
  stablePoint: CheckpointReason | null = null,
): Transition {
  return { state, directives, stablePoint };
}

/**
 * Attach a stable point unless the transition already carries one
 */
export function markStable(t: Transition, point: CheckpointReason): Transition {
  return t.stablePoint ? t : { ...t, stablePoint: point };
}

export function appendMessages(state: StrategyState, ...messages: Message[]): StrategyState {
  return { ...state, conversation: [...state.conversation, ...messages] };
}

export function assistantMessage(response: LLMResponse, calls?: ToolCallRequest[]): Message {
  return calls && calls.length > 0
    ? { role: "assistant", content: response.text, toolCalls: calls }
    : { role: "assistant", content: response.text };
}

function requireRequestId(state: StrategyState): string {
  if (state.requestId === null) {
    throw new Error("State has no request id");
  }
  return state.requestId;
}

/**
 * Issue the next model call, or finish when the iteration cap is passed
 */
export function requestModel(state: StrategyState, env: MachineEnv): Transition {
  if (state.iteration > env.settings.maxIterations) {
    return finish(state, MAX_ITERATIONS_MESSAGE, "max_iterations");
  }

  const id = env.ids.next("llm");
  const next: StrategyState = {
    ...state,
    status: "awaiting_llm",
    currentLlmCallId: id,
    streamingText: "",
    thinkingText: "",
  };

  return transition(next, [
    {
      type: "llm_call",
      id,
      requestId: requireRequestId(state),
      model: env.settings.model,
      context: next.conversation,
      tools: next.toolsEnabled ? env.strategy.tools(next, env) : [],
      metadata: {
        strategy: env.strategy.name,
        iteration: next.iteration,
        phase: env.strategy.phase(next),
        maxTokens: env.settings.llm.maxTokens,
        temperature: env.settings.llm.temperature,
      },
    },
  ]);
}

/**
 * Record the requested calls and emit one ToolCall per call, in order
 */
export function dispatchToolCalls(
  state: StrategyState,
  response: LLMResponse,
  env: MachineEnv,
): Transition {
  const { timeoutMs, maxRetries, retryBackoffMs } = env.settings.toolExec;
  const requestId = requireRequestId(state);
  const context = env.strategy.toolContext(state);
  const seen = new Set<string>();
  const calls: ToolCallRequest[] = response.toolCalls.map((call) => {
    const id = seen.has(call.id) ? env.ids.next("tool") : call.id;
    seen.add(id);
    return { ...call, id };
  });

  // Attempts plus the backoff between them
  const window = timeoutMs * (maxRetries + 1) + retryBackoffMs * maxRetries;
  const pendingToolCalls: Record<string, ToolCallRecord> = {};
  const directives: ToolCallDirective[] = [];

  for (const call of calls) {
    pendingToolCalls[call.id] = {
      callId: call.id,
      toolName: call.name,
      arguments: call.arguments,
      status: "pending",
      retriesRemaining: maxRetries,
      deadline: env.now + window,
      outcome: null,
    };
    directives.push({
      type: "tool_call",
      id: call.id,
      requestId,
      toolName: call.name,
      arguments: call.arguments,
      timeoutMs,
      maxRetries,
      retryBackoffMs,
      context,
    });
  }

  const next: StrategyState = {
    ...appendMessages(state, assistantMessage(response, calls)),
    status: "awaiting_tool",
    pendingToolCalls,
    pendingToolCallOrder: calls.map((c) => c.id),
  };

  return transition(next, directives, "after_llm");
}

/**
 * Serialize a tool outcome for the conversation
 */
export function toolMessageContent(outcome: ToolOutcome): string {
  return outcome.ok ? outcome.content : `Error (${outcome.error.type}): ${outcome.error.message}`;
}

/**
 * Tool messages for every pending call, in issuance order
 */
export function orderedToolMessages(state: StrategyState): Message[] | null {
  const messages: Message[] = [];
  for (const callId of state.pendingToolCallOrder) {
    const record = state.pendingToolCalls[callId];
    if (!record?.outcome) return null;
    messages.push({
      role: "tool",
      toolCallId: callId,
      name: record.toolName,
      content: toolMessageContent(record.outcome),
    });
  }
  return messages;
}

function settled(state: StrategyState, status: "completed" | "error"): StrategyState {
  return {
    ...state,
    status,
    currentLlmCallId: null,
    pendingToolCalls: {},
    pendingToolCallOrder: [],
    streamingText: "",
  };
}

export function finish(
  state: StrategyState,
  result: string,
  reason: TerminationReason,
): Transition {
  const next: StrategyState = {
    ...settled(state, "completed"),
    result,
    error: null,
    terminationReason: reason,
  };
  const signal: EmitSignalDirective = {
    type: "emit_signal",
    signal: "request.completed",
    payload: {
      requestId: next.requestId,
      result,
      terminationReason: reason,
      usage: next.usage,
    },
  };
  return transition(next, [signal], "terminal");
}

export function fail(
  state: StrategyState,
  error: RuntimeError,
  reason: TerminationReason,
): Transition {
  const next: StrategyState = {
    ...settled(state, "error"),
    result: null,
    error,
    terminationReason: reason,
  };
  const signal: EmitSignalDirective = {
    type: "emit_signal",
    signal: reason === "cancelled" ? "request.cancelled" : "request.failed",
    payload: {
      requestId: next.requestId,
      error,
      terminationReason: reason,
    },
  };
  return transition(next, [signal], "terminal");
}
