/**
 * Read-only view of a strategy state for pollers (CLI, telemetry)
 */

import type { MachineStatus, StrategyState, TerminationReason, Usage } from "./schema.js";
import { isActive } from "./transitions.js";

export type SnapshotStatus = "idle" | "running" | "success" | "failure";

export interface PendingToolCallView {
  callId: string;
  toolName: string;
  status: "pending" | "completed" | "failed";
}

export interface StrategySnapshot {
  status: SnapshotStatus;
  done: boolean;
  result: string | null;
  details: {
    strategy: string;
    phase: string;
    iteration: number;
    terminationReason: TerminationReason | null;
    error: string | null;
    streamingText: string;
    usage: Usage;
    pendingToolCalls: PendingToolCallView[];
    currentLlmCallId: string | null;
    checkpointToken: string | null;
    activeRequestId: string | null;
    conversationLength: number;
  };
}

const STATUS_MAP: Record<MachineStatus, SnapshotStatus> = {
  idle: "idle",
  preparing: "running",
  awaiting_llm: "running",
  awaiting_tool: "running",
  completed: "success",
  error: "failure",
};

/**
 * Sub-phase label: the fan-out stage while preparing, otherwise the status
 */
export function phaseOf(state: StrategyState): string {
  if (state.data.kind === "recursive") {
    if (state.status === "preparing" && state.data.prepare) {
      return state.data.prepare.phase;
    }
    if (state.status === "awaiting_llm" && state.data.synthesis) {
      return "synthesis";
    }
  }
  return state.status;
}

export function snapshot(state: StrategyState): StrategySnapshot {
  const status = STATUS_MAP[state.status];

  return {
    status,
    done: status === "success" || status === "failure",
    result: state.result,
    details: {
      strategy: state.strategy,
      phase: phaseOf(state),
      iteration: state.iteration,
      terminationReason: state.terminationReason,
      error: state.error?.message ?? null,
      streamingText: state.streamingText,
      usage: state.usage,
      pendingToolCalls: state.pendingToolCallOrder.flatMap((callId) => {
        const record = state.pendingToolCalls[callId];
        return record ? [{ callId, toolName: record.toolName, status: record.status }] : [];
      }),
      currentLlmCallId: state.currentLlmCallId,
      checkpointToken: state.checkpointToken,
      activeRequestId: isActive(state) ? state.requestId : null,
      conversationLength: state.conversation.length,
    },
  };
}
