/**
 * Stratum - reasoning strategy runtime
 *
 * Strategies are pure state machines that describe their side effects as
 * directives. A RequestController owns one strategy state per runtime and a
 * Runtime carries the directives out against a model backend, the tool
 * pipeline and child runtimes.
 */

// CLI
export { runStratumCli, buildStratumProgram } from "./cli/main.js";

// Runtime facade
export {
  Runtime,
  type RunOptions,
  type RuntimeOptions,
  type RuntimeSignal,
  type SignalListener,
} from "./boundary/runtime.js";
export {
  ModelBackendError,
  ScriptedModelBackend,
  classifyModelError,
  type ModelBackend,
  type ModelCallOptions,
  type ModelRequest,
  type ScriptedTurn,
  type ScriptResponder,
} from "./boundary/model.js";

// Controller
export {
  RequestController,
  type ControllerOptions,
  type ControllerStep,
  type RequestOutcome,
  type RequestRecord,
  type RequestStatus,
} from "./controller/controller.js";
export {
  CheckpointError,
  issueCheckpoint,
  verifyCheckpoint,
  type CheckpointErrorCode,
  type CheckpointPayload,
} from "./controller/checkpoint.js";

// State machine
export { createInitialState, outstandingDirectives, update } from "./machine/machine.js";
export { snapshot, type StrategySnapshot } from "./machine/snapshot.js";
export type { Directive, SignalType } from "./machine/directives.js";
export type { InboundEvent, StartOptions, WorkerEvent } from "./machine/events.js";
export type {
  LLMError,
  LLMResponse,
  Message,
  RuntimeError,
  StrategyState,
  TerminationReason,
  ToolOutcome,
  Usage,
} from "./machine/schema.js";
export type { MachineEnv, MachineSettings, StrategyDefinition, Transition } from "./machine/strategy.js";
export { getStrategy } from "./strategies/index.js";

// Tools
export {
  ToolRegistry,
  ToolErrorCode,
  createDefaultRegistry,
  createToolError,
  defineTool,
  executeToolCall,
  toolOk,
  type ToolDefinition,
  type ToolExecutionContext,
  type ToolReturn,
} from "./tools/index.js";

// Stores
export { createStores, type RuntimeStores } from "./store/index.js";

// Config
export { loadConfig, saveConfig, getConfigPath } from "./config/loader.js";
export {
  StratumConfigSchema,
  getDefaultConfig,
  type StrategyName,
  type StratumConfig,
} from "./config/types.js";
