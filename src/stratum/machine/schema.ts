/**
 * State machine data model
 *
 * Every type a StrategyState is made of is declared as a zod schema so that a
 * checkpoint payload can be validated back into a state without casts.
 */

import { z } from "zod";
import { AggregationStrategySchema, StrategyNameSchema } from "../config/types.js";

export const UsageSchema = z.object({
  inputTokens: z.number().int().min(0),
  outputTokens: z.number().int().min(0),
  totalTokens: z.number().int().min(0),
});

export type Usage = z.infer<typeof UsageSchema>;

export const ToolCallRequestSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.record(z.unknown()),
});

export type ToolCallRequest = z.infer<typeof ToolCallRequestSchema>;

export const MessageSchema = z.discriminatedUnion("role", [
  z.object({ role: z.literal("system"), content: z.string() }),
  z.object({ role: z.literal("user"), content: z.string() }),
  z.object({
    role: z.literal("assistant"),
    content: z.string(),
    toolCalls: z.array(ToolCallRequestSchema).optional(),
  }),
  z.object({
    role: z.literal("tool"),
    toolCallId: z.string(),
    name: z.string(),
    content: z.string(),
  }),
]);

export type Message = z.infer<typeof MessageSchema>;

/**
 * Model reply as delivered by a backend
 */
export const LLMResponseSchema = z.object({
  text: z.string().default(""),
  toolCalls: z.array(ToolCallRequestSchema).default([]),
  thinking: z.string().optional(),
  usage: UsageSchema.optional(),
});

export type LLMResponse = z.infer<typeof LLMResponseSchema>;

export const LLMErrorTypeSchema = z.enum(["provider", "transport", "rate_limit", "timeout", "cancelled"]);

export type LLMErrorType = z.infer<typeof LLMErrorTypeSchema>;

export interface LLMError {
  type: LLMErrorType;
  message: string;
}

export const ToolFailureTypeSchema = z.enum([
  "timeout",
  "exception",
  "execution_error",
  "validation_error",
  "unknown_tool",
]);

export type ToolFailureType = z.infer<typeof ToolFailureTypeSchema>;

export const ToolFailureSchema = z.object({
  type: ToolFailureTypeSchema,
  message: z.string(),
  retryable: z.boolean(),
  details: z.record(z.unknown()).optional(),
});

export type ToolFailure = z.infer<typeof ToolFailureSchema>;

/**
 * Terminal result of one tool call after all retries
 */
export const ToolOutcomeSchema = z.union([
  z.object({
    ok: z.literal(true),
    /** Serialized result fed back to the model */
    content: z.string(),
    /** Structured result for strategies that consume it */
    value: z.unknown(),
    attempts: z.number().int().min(1),
  }),
  z.object({
    ok: z.literal(false),
    error: ToolFailureSchema,
    attempts: z.number().int().min(1),
  }),
]);

export type ToolOutcome = z.infer<typeof ToolOutcomeSchema>;

export const ToolCallRecordSchema = z.object({
  callId: z.string(),
  toolName: z.string(),
  arguments: z.record(z.unknown()),
  status: z.enum(["pending", "completed", "failed"]),
  retriesRemaining: z.number().int().min(0),
  /** Latest time (ms since epoch) by which the pipeline must have answered */
  deadline: z.number(),
  outcome: ToolOutcomeSchema.nullable(),
});

export type ToolCallRecord = z.infer<typeof ToolCallRecordSchema>;

export const MachineStatusSchema = z.enum([
  "idle",
  "preparing",
  "awaiting_llm",
  "awaiting_tool",
  "completed",
  "error",
]);

export type MachineStatus = z.infer<typeof MachineStatusSchema>;

export const TerminationReasonSchema = z.enum([
  "final_answer",
  "max_iterations",
  "cancelled",
  "llm_error",
  "parse_error",
  "worker_crash",
]);

export type TerminationReason = z.infer<typeof TerminationReasonSchema>;

/**
 * Stable points a checkpoint is taken at. `preparing` covers the fan-out
 * steps of the recursive strategy, `after_workers` the call that follows them.
 */
export const CheckpointReasonSchema = z.enum([
  "after_llm",
  "after_tools",
  "preparing",
  "after_workers",
  "terminal",
]);

export type CheckpointReason = z.infer<typeof CheckpointReasonSchema>;

export const RuntimeErrorKindSchema = z.enum([
  "busy",
  "validation",
  "llm_error",
  "tool_error",
  "worker_crash",
  "cancelled",
  "budget_exceeded",
  "parse_error",
]);

export type RuntimeErrorKind = z.infer<typeof RuntimeErrorKindSchema>;

export const RuntimeErrorSchema = z.object({
  kind: RuntimeErrorKindSchema,
  message: z.string(),
  details: z.record(z.unknown()).optional(),
});

export type RuntimeError = z.infer<typeof RuntimeErrorSchema>;

// ------------------------------------------------------------
// Strategy-specific data
// ------------------------------------------------------------

export const ChunkRefSchema = z.object({
  id: z.string(),
  startLine: z.number().int().min(1),
  endLine: z.number().int().min(0),
  preview: z.string(),
});

export type ChunkRef = z.infer<typeof ChunkRefSchema>;

export const FanoutChildSchema = z.object({
  tag: z.string(),
  chunkIds: z.array(z.string()),
  status: z.enum(["pending", "running", "completed", "failed"]),
});

export type FanoutChild = z.infer<typeof FanoutChildSchema>;

export const ChunkOutcomeSchema = z.object({
  chunkId: z.string(),
  status: z.enum(["completed", "failed"]),
  /** Condensed answer, or the failure message */
  text: z.string(),
});

export type ChunkOutcome = z.infer<typeof ChunkOutcomeSchema>;

export const PrepareStateSchema = z.discriminatedUnion("phase", [
  z.object({ phase: z.literal("chunking"), chunkCallId: z.string() }),
  z.object({
    phase: z.literal("spawning"),
    chunks: z.array(ChunkRefSchema),
    children: z.array(FanoutChildSchema),
    outcomes: z.array(ChunkOutcomeSchema),
  }),
]);

export type PrepareState = z.infer<typeof PrepareStateSchema>;

export const ThoughtStepSchema = z.object({
  thought: z.string(),
  score: z.number(),
});

export type ThoughtStep = z.infer<typeof ThoughtStepSchema>;

/**
 * A thought in a Graph-of-Thoughts graph. The query is the implicit root:
 * top-level thoughts have no parent.
 */
export const ThoughtNodeSchema = z.object({
  /** `t<N>`, where N is the thought's number in prompts */
  id: z.string(),
  content: z.string(),
  depth: z.number().int().min(1),
  parentId: z.string().nullable(),
  score: z.number().min(0).max(1).nullable(),
});

export type ThoughtNode = z.infer<typeof ThoughtNodeSchema>;

export const ThoughtRelationSchema = z.enum(["supports", "contradicts", "refines"]);

export type ThoughtRelation = z.infer<typeof ThoughtRelationSchema>;

export const ThoughtEdgeSchema = z.object({
  from: z.string(),
  to: z.string(),
  relation: ThoughtRelationSchema,
});

export type ThoughtEdge = z.infer<typeof ThoughtEdgeSchema>;

export const StrategyDataSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("react") }),
  z.object({ kind: z.literal("chain_of_thought"), steps: z.array(z.string()) }),
  z.object({
    kind: z.literal("tree_of_thoughts"),
    phase: z.enum(["generate", "evaluate", "answer"]),
    depth: z.number().int().min(0),
    candidates: z.array(z.string()),
    path: z.array(ThoughtStepSchema),
  }),
  z.object({
    kind: z.literal("graph_of_thoughts"),
    phase: z.enum(["generate", "connect", "aggregate"]),
    /** Fixed at start so a resumed request aggregates the same way */
    aggregation: AggregationStrategySchema,
    /** Expansion rounds completed */
    depth: z.number().int().min(0),
    nodes: z.array(ThoughtNodeSchema),
    edges: z.array(ThoughtEdgeSchema),
    /** Thought being expanded; null for the query itself */
    focusId: z.string().nullable(),
    /** Thoughts generated in the current round, awaiting scores */
    frontier: z.array(z.string()),
  }),
  z.object({
    kind: z.literal("recursive"),
    depth: z.number().int().min(0),
    maxDepth: z.number().int().min(0),
    contextHandle: z.string().nullable(),
    contextLines: z.number().int().min(0),
    workspaceHandle: z.string().nullable(),
    budgetHandle: z.string().nullable(),
    prepare: PrepareStateSchema.nullable(),
    synthesis: z.boolean(),
  }),
]);

export type StrategyData = z.infer<typeof StrategyDataSchema>;

export type StrategyDataOf<K extends StrategyData["kind"]> = Extract<StrategyData, { kind: K }>;

export const StrategyStateSchema = z.object({
  strategy: StrategyNameSchema,
  status: MachineStatusSchema,
  /** Request the state currently belongs to (the last one once terminal) */
  requestId: z.string().nullable(),
  query: z.string().nullable(),
  iteration: z.number().int().min(0),
  conversation: z.array(MessageSchema),
  pendingToolCalls: z.record(ToolCallRecordSchema),
  pendingToolCallOrder: z.array(z.string()),
  currentLlmCallId: z.string().nullable(),
  checkpointToken: z.string().nullable(),
  terminationReason: TerminationReasonSchema.nullable(),
  result: z.string().nullable(),
  error: RuntimeErrorSchema.nullable(),
  usage: UsageSchema,
  streamingText: z.string(),
  thinkingText: z.string(),
  parseRetries: z.number().int().min(0),
  toolsEnabled: z.boolean(),
  data: StrategyDataSchema,
});

export type StrategyState = z.infer<typeof StrategyStateSchema>;

/**
 * Tool description offered to the model
 */
export interface ToolSpec {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}
