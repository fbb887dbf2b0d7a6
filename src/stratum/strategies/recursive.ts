/**
 * Recursive decomposition: a ReAct loop over a large context that first fans
 * the context out to child runtimes and then synthesizes their findings.
 *
 * preparing/chunking  -> context_chunk tool call
 * preparing/spawning  -> one SpawnWorker per child, wait for every chunk
 * awaiting_llm        -> synthesis call with tools disabled
 *
 * Each of these steps is a `preparing` stable point, and the synthesis call
 * is an `after_workers` one.
 */

import {
  ChunkResultSchema,
  buildSynthesisPrompt,
  condenseFinding,
  countOutcomes,
  isFanoutSettled,
  planChildren,
} from "../delegation/fanout.js";
import type { Directive, SpawnWorkerDirective, ToolCallDirective } from "../machine/directives.js";
import type { ToolResultEvent, WorkerEvent } from "../machine/events.js";
import type {
  ChunkOutcome,
  ChunkRef,
  FanoutChild,
  StrategyDataOf,
  StrategyState,
} from "../machine/schema.js";
import type { MachineEnv, StrategyDefinition, Transition } from "../machine/strategy.js";
import { appendMessages, markStable, requestModel, transition } from "../machine/transitions.js";
import { interpretAnswer } from "./react.js";
import { RECURSIVE_SYSTEM_PROMPT, repairPrompt } from "./prompts.js";

type RecursiveData = StrategyDataOf<"recursive">;

export const CHUNK_TOOL = "context_chunk";

function recursiveData(state: StrategyState): RecursiveData {
  if (state.data.kind !== "recursive") {
    throw new Error(`Expected recursive strategy data, got "${state.data.kind}"`);
  }
  return state.data;
}

function withData(state: StrategyState, data: RecursiveData): StrategyState {
  return { ...state, data };
}

/**
 * Whether a fresh request should fan out instead of calling the model
 */
export function shouldFanOut(data: RecursiveData, env: MachineEnv): boolean {
  if (data.depth >= data.maxDepth || data.contextHandle === null) return false;
  if (data.contextLines <= env.settings.delegation.contextThresholdLines) return false;
  if (!env.budget || env.budget.exceeded || env.budget.remainingChildren <= 0) return false;
  return true;
}

function chunkDirective(
  state: StrategyState,
  callId: string,
  env: MachineEnv,
): ToolCallDirective {
  const { timeoutMs, maxRetries, retryBackoffMs } = env.settings.toolExec;
  return {
    type: "tool_call",
    id: callId,
    requestId: state.requestId ?? "",
    toolName: CHUNK_TOOL,
    arguments: { chunkLines: env.settings.delegation.chunkLines },
    timeoutMs,
    maxRetries,
    retryBackoffMs,
    context: recursiveStrategy.toolContext(state),
  };
}

function spawnDirectives(
  state: StrategyState,
  data: RecursiveData,
  chunks: readonly ChunkRef[],
  children: readonly FanoutChild[],
): SpawnWorkerDirective[] {
  const contextHandle = data.contextHandle;
  if (contextHandle === null) return [];

  return children.map((child) => ({
    type: "spawn_worker" as const,
    tag: child.tag,
    requestId: state.requestId ?? "",
    workerRef: "recursive" as const,
    // A running child was reported started, after its slot was reserved
    reserved: child.status === "running",
    params: {
      query: state.query ?? "",
      chunks: chunks.filter((chunk) => child.chunkIds.includes(chunk.id)),
      contextHandle,
      workspaceHandle: data.workspaceHandle,
      budgetHandle: data.budgetHandle,
      depth: data.depth + 1,
    },
  }));
}

/**
 * Leave the preparing phase and call the model directly
 */
function fallBackToModel(state: StrategyState, data: RecursiveData, env: MachineEnv): Transition {
  return markStable(requestModel(withData(state, { ...data, prepare: null }), env), "after_tools");
}

function onChunkResult(
  state: StrategyState,
  data: RecursiveData,
  event: ToolResultEvent,
  env: MachineEnv,
): Transition {
  if (!event.outcome.ok) {
    return fallBackToModel(state, data, env);
  }

  const parsed = ChunkResultSchema.safeParse(event.outcome.value);
  if (!parsed.success || parsed.data.chunks.length === 0) {
    return fallBackToModel(state, data, env);
  }

  const chunks = parsed.data.chunks;
  const requestId = state.requestId ?? "";
  const children = planChildren(requestId, chunks, env.budget?.remainingChildren ?? 0);
  if (children.length === 0) {
    return fallBackToModel(state, data, env);
  }

  const next = withData(state, {
    ...data,
    prepare: { phase: "spawning", chunks, children, outcomes: [] },
  });

  const directives: Directive[] = [
    ...spawnDirectives(next, data, chunks, children),
    {
      type: "emit_signal",
      signal: "fanout.spawned",
      payload: {
        requestId,
        chunkCount: chunks.length,
        children: children.map((c) => ({ tag: c.tag, chunkIds: c.chunkIds })),
      },
    },
  ];

  return transition(next, directives, "preparing");
}

function childOutcomes(
  child: FanoutChild,
  event: WorkerEvent,
  findingChars: number,
): ChunkOutcome[] {
  if (event.kind === "completed") {
    const text = condenseFinding(event.answer ?? "", findingChars);
    return child.chunkIds.map((chunkId) => ({ chunkId, status: "completed" as const, text }));
  }
  const text =
    event.error ??
    (event.kind === "exited" ? "worker exited before reporting" : `worker ${event.kind}`);
  return child.chunkIds.map((chunkId) => ({ chunkId, status: "failed" as const, text }));
}

function onWorkerEvent(
  state: StrategyState,
  data: RecursiveData,
  event: WorkerEvent,
  env: MachineEnv,
): Transition {
  const prepare = data.prepare;
  if (prepare?.phase !== "spawning") return transition(state);

  const child = prepare.children.find((c) => c.tag === event.tag);
  if (!child || child.status === "completed" || child.status === "failed") {
    return transition(state);
  }

  if (event.kind === "started") {
    const children = prepare.children.map((c) =>
      c.tag === child.tag ? { ...c, status: "running" as const } : c,
    );
    return transition(withData(state, { ...data, prepare: { ...prepare, children } }));
  }

  const finished: FanoutChild["status"] = event.kind === "completed" ? "completed" : "failed";
  const children = prepare.children.map((c) =>
    c.tag === child.tag ? { ...c, status: finished } : c,
  );
  const outcomes = [
    ...prepare.outcomes,
    ...childOutcomes(child, event, env.settings.delegation.findingChars),
  ];

  if (!isFanoutSettled(prepare.chunks.length, outcomes)) {
    return transition(
      withData(state, { ...data, prepare: { ...prepare, children, outcomes } }),
      [],
      "preparing",
    );
  }

  return synthesize(state, data, prepare.chunks, outcomes, env);
}

function synthesize(
  state: StrategyState,
  data: RecursiveData,
  chunks: readonly ChunkRef[],
  outcomes: readonly ChunkOutcome[],
  env: MachineEnv,
): Transition {
  const prompt = buildSynthesisPrompt(state.query ?? "", chunks, outcomes);
  const next: StrategyState = {
    ...appendMessages(withData(state, { ...data, prepare: null, synthesis: true }), {
      role: "user",
      content: prompt,
    }),
    toolsEnabled: false,
  };

  const called = markStable(requestModel(next, env), "after_workers");
  const counts = countOutcomes(chunks.length, outcomes);
  return {
    ...called,
    directives: [
      {
        type: "emit_signal",
        signal: "fanout.synthesis",
        payload: { requestId: state.requestId, ...counts },
      },
      ...called.directives,
    ],
  };
}

export const recursiveStrategy: StrategyDefinition = {
  name: "recursive",
  usesTools: true,

  systemPrompt: () => RECURSIVE_SYSTEM_PROMPT,

  userPrompt(query, opts) {
    const notes: string[] = [];
    if (opts.contextHandle !== undefined) {
      notes.push(
        `A context of ${opts.contextLines ?? 0} lines is available through the context_* tools.`,
      );
    }
    if ((opts.depth ?? 0) > 0) {
      notes.push(`You are a sub-agent at depth ${opts.depth ?? 0}; answer only from your context.`);
    }
    return notes.length > 0 ? `${query}\n\n${notes.join("\n")}` : query;
  },

  initialData: (opts, settings) => ({
    kind: "recursive",
    depth: opts.depth ?? 0,
    maxDepth: settings.delegation.maxDepth,
    contextHandle: opts.contextHandle ?? null,
    contextLines: opts.contextLines ?? 0,
    workspaceHandle: opts.workspaceHandle ?? null,
    budgetHandle: opts.budgetHandle ?? null,
    prepare: null,
    synthesis: false,
  }),

  tools(state, env) {
    const data = recursiveData(state);
    return env.settings.tools.filter((tool) => {
      if (tool.name === CHUNK_TOOL) return false;
      if (tool.name.startsWith("context_")) return data.contextHandle !== null;
      if (tool.name.startsWith("workspace_")) return data.workspaceHandle !== null;
      return true;
    });
  },

  phase(state) {
    const data = recursiveData(state);
    if (data.prepare) return data.prepare.phase;
    return data.synthesis ? "synthesis" : "react";
  },

  interpret: (response) => interpretAnswer(response),

  repairPrompt: (reason) => repairPrompt(reason),

  toolContext(state) {
    const data = recursiveData(state);
    return {
      ...(data.contextHandle !== null ? { contextHandle: data.contextHandle } : {}),
      ...(data.workspaceHandle !== null ? { workspaceHandle: data.workspaceHandle } : {}),
      depth: data.depth,
    };
  },

  begin(state, env) {
    const data = recursiveData(state);
    if (!shouldFanOut(data, env)) return null;

    const chunkCallId = env.ids.next("chunk");
    const next: StrategyState = withData(
      { ...state, status: "preparing" },
      { ...data, prepare: { phase: "chunking", chunkCallId } },
    );
    return transition(next, [chunkDirective(next, chunkCallId, env)], "preparing");
  },

  prepare(state, event, env) {
    const data = recursiveData(state);
    const prepare = data.prepare;
    if (!prepare) return transition(state);

    if (event.type === "tool_result") {
      if (prepare.phase !== "chunking" || event.callId !== prepare.chunkCallId) {
        return transition(state);
      }
      return onChunkResult(state, data, event, env);
    }

    if (event.type === "worker_event") {
      return onWorkerEvent(state, data, event.event, env);
    }

    return transition(state);
  },

  outstanding(state, env) {
    const data = recursiveData(state);
    const prepare = data.prepare;
    if (!prepare) return [];

    if (prepare.phase === "chunking") {
      return [chunkDirective(state, prepare.chunkCallId, env)];
    }
    const unfinished = prepare.children.filter(
      (child) => child.status === "pending" || child.status === "running",
    );
    return spawnDirectives(state, data, prepare.chunks, unfinished);
  },
};
