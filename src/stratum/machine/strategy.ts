/**
 * Strategy contract: the per-variant half of the transition function
 */

import type { StratumConfig, StrategyName } from "../config/types.js";
import type { IdSource } from "../runtime/ids.js";
import type { BudgetView } from "../store/budget-store.js";
import type { Directive, ToolCallContext } from "./directives.js";
import type { InboundEvent, StartOptions } from "./events.js";
import type {
  CheckpointReason,
  LLMResponse,
  StrategyData,
  StrategyState,
  ToolSpec,
} from "./schema.js";

export type { CheckpointReason };

/**
 * Output of one application of the transition function
 */
export interface Transition {
  state: StrategyState;
  directives: Directive[];
  /** Set when the new state is a point a checkpoint may be taken from */
  stablePoint: CheckpointReason | null;
}

export type MachineSettings = Pick<
  StratumConfig,
  | "model"
  | "systemPrompt"
  | "maxIterations"
  | "maxParseRetries"
  | "llm"
  | "toolExec"
  | "delegation"
  | "treeOfThoughts"
  | "graphOfThoughts"
> & {
  /** Tools the runtime can execute */
  tools: ToolSpec[];
};

/**
 * Inputs to `update` besides state and event. Passing time, ids and the
 * budget view in keeps the transition function free of side effects.
 */
export interface MachineEnv {
  strategy: StrategyDefinition;
  settings: MachineSettings;
  ids: IdSource;
  now: number;
  budget: BudgetView | null;
}

/**
 * How a strategy reads a model reply that carries no tool calls to run
 */
export type Interpretation =
  | { kind: "final"; answer: string; data?: StrategyData }
  | { kind: "continue"; followUp: string; data: StrategyData }
  | { kind: "malformed"; reason: string };

export interface StrategyDefinition {
  readonly name: StrategyName;
  /** Whether model calls may offer tools */
  readonly usesTools: boolean;

  systemPrompt(settings: MachineSettings): string;

  /** First user turn for a query */
  userPrompt(query: string, opts: StartOptions, settings: MachineSettings): string;

  initialData(opts: StartOptions, settings: MachineSettings): StrategyData;

  /** Tools offered on the next model call */
  tools(state: StrategyState, env: MachineEnv): ToolSpec[];

  /** Phase label attached to model calls */
  phase(state: StrategyState): string;

  interpret(response: LLMResponse, state: StrategyState, env: MachineEnv): Interpretation;

  repairPrompt(reason: string, state: StrategyState): string;

  /** Handles threaded into every ToolCall this strategy issues */
  toolContext(state: StrategyState): ToolCallContext;

  /**
   * Called after a start has built the conversation. Returning a transition
   * replaces the default first model call.
   */
  begin?(state: StrategyState, env: MachineEnv): Transition | null;

  /** Handles events while status is `preparing` */
  prepare?(state: StrategyState, event: InboundEvent, env: MachineEnv): Transition;

  /** Re-issues the in-flight work of a `preparing` state */
  outstanding?(state: StrategyState, env: MachineEnv): Directive[];
}
