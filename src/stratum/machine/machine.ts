/**
 * Pure transition function shared by all strategy variants
 *
 * update(state, event, env) -> { state', directives, stablePoint }
 *
 * The generic skeleton handles start/continuation, model results, streaming,
 * tool-result fan-in and cancellation. Anything strategy-specific is delegated
 * to the StrategyDefinition carried in the env.
 */

import type { StrategyName } from "../config/types.js";
import type { Directive } from "./directives.js";
import type {
  CancelEvent,
  InboundEvent,
  LlmPartialEvent,
  LlmResultEvent,
  StartEvent,
  ToolResultEvent,
  WorkerEventEnvelope,
} from "./events.js";
import type { Message, StrategyState } from "./schema.js";
import type { MachineEnv, Transition } from "./strategy.js";
import {
  addUsage,
  appendMessages,
  assistantMessage,
  dispatchToolCalls,
  emptyUsage,
  fail,
  finish,
  isActive,
  isTerminal,
  markStable,
  orderedToolMessages,
  requestModel,
  transition,
} from "./transitions.js";

/**
 * Fresh idle state for a strategy
 */
export function createInitialState(strategy: StrategyName): StrategyState {
  return {
    strategy,
    status: "idle",
    requestId: null,
    query: null,
    iteration: 0,
    conversation: [],
    pendingToolCalls: {},
    pendingToolCallOrder: [],
    currentLlmCallId: null,
    checkpointToken: null,
    terminationReason: null,
    result: null,
    error: null,
    usage: emptyUsage(),
    streamingText: "",
    thinkingText: "",
    parseRetries: 0,
    toolsEnabled: false,
    data: { kind: "react" },
  };
}

export function update(state: StrategyState, event: InboundEvent, env: MachineEnv): Transition {
  if (state.strategy !== env.strategy.name) {
    throw new Error(
      `State belongs to strategy "${state.strategy}" but was given "${env.strategy.name}"`,
    );
  }

  switch (event.type) {
    case "start":
      return start(state, event, env);
    case "llm_result":
      return applyLlmResult(state, event, env);
    case "llm_partial":
      return applyLlmPartial(state, event);
    case "tool_result":
      return applyToolResult(state, event, env);
    case "worker_event":
      return applyWorkerEvent(state, event, env);
    case "cancel":
      return cancel(state, event);
  }
}

function start(state: StrategyState, event: StartEvent, env: MachineEnv): Transition {
  if (isActive(state)) {
    return transition(state, [
      {
        type: "emit_request_error",
        requestId: event.requestId,
        reason: "busy",
        message:
          state.status === "preparing"
            ? `Strategy is preparing request ${state.requestId ?? "unknown"}`
            : `Strategy is busy with request ${state.requestId ?? "unknown"}`,
      },
    ]);
  }

  const query = event.query.trim();
  if (query === "") {
    return transition(state, [
      {
        type: "emit_request_error",
        requestId: event.requestId,
        reason: "validation",
        message: "Query must not be empty",
      },
    ]);
  }

  const { strategy, settings } = env;
  const opts = event.opts ?? {};
  const userMessage: Message = {
    role: "user",
    content: strategy.userPrompt(query, opts, settings),
  };

  // A terminal state keeps its conversation and usage: the new query continues it
  const conversation: Message[] = isTerminal(state)
    ? [...state.conversation, userMessage]
    : [
        { role: "system", content: settings.systemPrompt ?? strategy.systemPrompt(settings) },
        userMessage,
      ];

  const base: StrategyState = {
    ...(isTerminal(state) ? state : createInitialState(strategy.name)),
    status: "idle",
    requestId: event.requestId,
    query,
    iteration: 1,
    conversation,
    pendingToolCalls: {},
    pendingToolCallOrder: [],
    currentLlmCallId: null,
    terminationReason: null,
    result: null,
    error: null,
    streamingText: "",
    thinkingText: "",
    parseRetries: 0,
    toolsEnabled: strategy.usesTools && settings.tools.length > 0,
    data: strategy.initialData(opts, settings),
  };

  const begun = strategy.begin?.(base, env);
  return begun ?? requestModel(base, env);
}

function applyLlmResult(state: StrategyState, event: LlmResultEvent, env: MachineEnv): Transition {
  if (state.status !== "awaiting_llm" || event.callId !== state.currentLlmCallId) {
    return transition(state);
  }

  if (!event.result.ok) {
    const { error } = event.result;
    return fail(
      state,
      {
        kind: "llm_error",
        message: `${error.type}: ${error.message}`,
        details: { type: error.type, callId: event.callId },
      },
      "llm_error",
    );
  }

  const { response } = event.result;
  const applied: StrategyState = {
    ...state,
    usage: addUsage(state.usage, response.usage),
    currentLlmCallId: null,
    streamingText: "",
  };

  if (applied.toolsEnabled && response.toolCalls.length > 0) {
    return dispatchToolCalls(applied, response, env);
  }

  const interpretation = env.strategy.interpret(response, applied, env);
  const withReply = appendMessages(applied, assistantMessage(response));

  switch (interpretation.kind) {
    case "final":
      return finish(
        interpretation.data ? { ...withReply, data: interpretation.data } : withReply,
        interpretation.answer,
        "final_answer",
      );

    case "continue": {
      const next: StrategyState = {
        ...appendMessages(withReply, { role: "user", content: interpretation.followUp }),
        iteration: applied.iteration + 1,
        // Each phase gets its own repair allowance
        parseRetries: 0,
        data: interpretation.data,
      };
      return markStable(requestModel(next, env), "after_llm");
    }

    case "malformed": {
      if (applied.parseRetries >= env.settings.maxParseRetries) {
        return fail(
          withReply,
          { kind: "parse_error", message: interpretation.reason },
          "parse_error",
        );
      }
      const next: StrategyState = {
        ...appendMessages(withReply, {
          role: "user",
          content: env.strategy.repairPrompt(interpretation.reason, applied),
        }),
        iteration: applied.iteration + 1,
        parseRetries: applied.parseRetries + 1,
      };
      return markStable(requestModel(next, env), "after_llm");
    }
  }
}

function applyLlmPartial(state: StrategyState, event: LlmPartialEvent): Transition {
  if (state.status !== "awaiting_llm" || event.callId !== state.currentLlmCallId) {
    return transition(state);
  }
  return transition(
    event.channel === "thinking"
      ? { ...state, thinkingText: state.thinkingText + event.delta }
      : { ...state, streamingText: state.streamingText + event.delta },
  );
}

function applyToolResult(state: StrategyState, event: ToolResultEvent, env: MachineEnv): Transition {
  if (state.status === "preparing") {
    return env.strategy.prepare?.(state, event, env) ?? transition(state);
  }
  if (state.status !== "awaiting_tool") {
    return transition(state);
  }

  const record = state.pendingToolCalls[event.callId];
  // Unknown ids and second results for the same call are ignored
  if (!record || record.outcome !== null) {
    return transition(state);
  }

  const recorded: StrategyState = {
    ...state,
    pendingToolCalls: {
      ...state.pendingToolCalls,
      [event.callId]: {
        ...record,
        status: event.outcome.ok ? "completed" : "failed",
        retriesRemaining: Math.max(0, record.retriesRemaining - (event.outcome.attempts - 1)),
        outcome: event.outcome,
      },
    },
  };

  const messages = orderedToolMessages(recorded);
  if (!messages) {
    return transition(recorded);
  }

  const next: StrategyState = {
    ...appendMessages(recorded, ...messages),
    pendingToolCalls: {},
    pendingToolCallOrder: [],
    iteration: recorded.iteration + 1,
  };
  return markStable(requestModel(next, env), "after_tools");
}

function applyWorkerEvent(
  state: StrategyState,
  event: WorkerEventEnvelope,
  env: MachineEnv,
): Transition {
  if (state.status === "preparing" && event.event.tag !== undefined) {
    return env.strategy.prepare?.(state, event, env) ?? transition(state);
  }

  if (isActive(state) && event.event.kind === "crashed" && event.event.tag === undefined) {
    return fail(
      state,
      {
        kind: "worker_crash",
        message: event.event.error ?? "Executor crashed",
      },
      "worker_crash",
    );
  }

  return transition(state);
}

function cancel(state: StrategyState, event: CancelEvent): Transition {
  if (!isActive(state)) {
    return transition(state);
  }
  return fail(
    state,
    {
      kind: "cancelled",
      message: `Request cancelled: ${event.reason}`,
      details: { reason: event.reason },
    },
    "cancelled",
  );
}

/**
 * Directives that re-issue the outstanding work of a state, used when a
 * request is resumed from a checkpoint
 */
export function outstandingDirectives(state: StrategyState, env: MachineEnv): Directive[] {
  const requestId = state.requestId;
  if (requestId === null || !isActive(state)) {
    return [];
  }

  if (state.status === "awaiting_llm" && state.currentLlmCallId !== null) {
    return [
      {
        type: "llm_call",
        id: state.currentLlmCallId,
        requestId,
        model: env.settings.model,
        context: state.conversation,
        tools: state.toolsEnabled ? env.strategy.tools(state, env) : [],
        metadata: {
          strategy: env.strategy.name,
          iteration: state.iteration,
          phase: env.strategy.phase(state),
          maxTokens: env.settings.llm.maxTokens,
          temperature: env.settings.llm.temperature,
        },
      },
    ];
  }

  if (state.status === "awaiting_tool") {
    const { timeoutMs, maxRetries, retryBackoffMs } = env.settings.toolExec;
    const context = env.strategy.toolContext(state);
    const directives: Directive[] = [];
    for (const callId of state.pendingToolCallOrder) {
      const record = state.pendingToolCalls[callId];
      if (!record || record.outcome !== null) continue;
      directives.push({
        type: "tool_call",
        id: callId,
        requestId,
        toolName: record.toolName,
        arguments: record.arguments,
        timeoutMs,
        maxRetries,
        retryBackoffMs,
        context,
      });
    }
    return directives;
  }

  if (state.status === "preparing") {
    return env.strategy.outstanding?.(state, env) ?? [];
  }

  return [];
}
