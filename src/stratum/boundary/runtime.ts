/**
 * Runtime - the directive execution boundary
 *
 * Wraps a RequestController and carries out the directives it returns: model
 * calls, tool calls through the pipeline, child runtimes for fan-out, and
 * signals for listeners. Every asynchronous completion comes back as an
 * inbound event, delivered one at a time in arrival order.
 */

import { getDefaultConfig, type StrategyName, type StratumConfig } from "../config/types.js";
import {
  RequestController,
  budgetHandleOf,
  type ControllerStep,
  type RequestOutcome,
  type RequestRecord,
} from "../controller/controller.js";
import { formatLineRange } from "../delegation/chunker.js";
import { condenseFinding } from "../delegation/fanout.js";
import type {
  Directive,
  EmitRequestErrorDirective,
  LLMCallDirective,
  SignalType,
  SpawnWorkerDirective,
  ToolCallDirective,
  WorkerParams,
} from "../machine/directives.js";
import type { InboundEvent, LlmResult, StartOptions, WorkerEvent } from "../machine/events.js";
import type { StrategyState } from "../machine/schema.js";
import type { StrategySnapshot } from "../machine/snapshot.js";
import type { MachineSettings } from "../machine/strategy.js";
import { getStrategy } from "../strategies/index.js";
import { createIdSource, type IdSource } from "../runtime/ids.js";
import { createSilentLogger, type StratumLogger } from "../runtime/logger.js";
import { createStores, type Handle, type RuntimeStores } from "../store/index.js";
import { createDefaultRegistry } from "../tools/index.js";
import { executeToolCall } from "../tools/executor.js";
import type { ToolRegistry } from "../tools/registry.js";
import { ModelBackendError, classifyModelError, type ModelBackend } from "./model.js";
import { Semaphore } from "./semaphore.js";

export interface RuntimeSignal {
  signal: SignalType;
  payload: Record<string, unknown>;
}

export type SignalListener = (signal: RuntimeSignal) => void;

export interface RuntimeOptions {
  model: ModelBackend;
  strategy?: StrategyName;
  config?: StratumConfig;
  tools?: ToolRegistry;
  /** Shared with child runtimes */
  stores?: RuntimeStores;
  logger?: StratumLogger;
  ids?: IdSource;
  clock?: () => number;
  /** Wait used between tool retries */
  sleep?: (ms: number) => Promise<void>;
}

export interface RunOptions {
  /** Context text; stored under a handle owned by the request */
  context?: string;
  contextHandle?: Handle;
  workspaceHandle?: Handle;
  budgetHandle?: Handle;
  depth?: number;
}

interface OwnedResources {
  contexts: Handle[];
  workspaces: Handle[];
  budgets: Handle[];
}

interface PreparedResources {
  startOptions: StartOptions;
  owned: OwnedResources;
  budgetHandle: Handle | null;
}

interface Waiter {
  promise: Promise<RequestOutcome>;
  resolve: (outcome: RequestOutcome) => void;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Runtime {
  private readonly config: StratumConfig;
  private readonly tools: ToolRegistry;
  private readonly stores: RuntimeStores;
  private readonly logger: StratumLogger;
  private readonly ids: IdSource;
  private readonly clock: () => number;
  private readonly semaphore: Semaphore;
  private readonly controller: RequestController;

  private readonly listeners = new Set<SignalListener>();
  private readonly waiters = new Map<string, Waiter>();
  private readonly owned = new Map<string, OwnedResources>();
  private readonly budgetHandles = new Map<string, Handle>();
  private readonly aborts = new Map<string, AbortController>();
  private readonly children = new Map<string, Runtime>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly queue: InboundEvent[] = [];
  private delivering = false;

  constructor(
    private readonly options: RuntimeOptions,
    controller?: RequestController,
  ) {
    this.config = options.config ?? getDefaultConfig();
    this.tools = options.tools ?? createDefaultRegistry();
    this.stores = options.stores ?? createStores();
    this.logger = options.logger ?? createSilentLogger();
    this.ids = options.ids ?? createIdSource();
    this.clock = options.clock ?? Date.now;
    this.semaphore = new Semaphore(this.config.toolExec.concurrency);
    this.controller =
      controller ??
      new RequestController({
        strategy: getStrategy(options.strategy ?? this.config.strategy),
        settings: this.settings(),
        checkpoint: this.config.checkpoint,
        ids: this.ids,
        clock: this.clock,
        budgetView: (handle) => this.stores.budgets.view(handle),
        logger: this.logger,
      });
  }

  /**
   * Rebuild a runtime from a checkpoint token and re-dispatch its
   * outstanding work
   *
   * @throws CheckpointError when the token fails verification
   */
  static resume(token: string, options: RuntimeOptions): Runtime {
    const config = options.config ?? getDefaultConfig();
    const stores = options.stores ?? createStores();
    const logger = options.logger ?? createSilentLogger();
    const tools = options.tools ?? createDefaultRegistry();
    const { controller, directives } = RequestController.resume(token, {
      settings: settingsFrom(config, tools),
      checkpoint: config.checkpoint,
      ids: options.ids,
      clock: options.clock,
      budgetView: (handle) => stores.budgets.view(handle),
      logger,
    });

    const runtime = new Runtime({ ...options, config, stores, logger, tools }, controller);
    const state = controller.currentState;
    if (state.requestId !== null) {
      runtime.ensureWaiter(state.requestId);
      const budget = budgetHandleOf(state);
      if (budget !== null) runtime.budgetHandles.set(state.requestId, budget);
      if (controller.activeRequestId === null) {
        const record = controller.poll(state.requestId);
        if (record?.outcome) runtime.settleWaiter(record.outcome);
      }
    }
    runtime.exclusive(() => runtime.dispatchAll(directives));
    return runtime;
  }

  get strategy(): StrategyName {
    return this.controller.strategyName;
  }

  get activeRequestId(): string | null {
    return this.controller.activeRequestId;
  }

  get state(): StrategyState {
    return this.controller.currentState;
  }

  /**
   * Start a request and return its id. A busy runtime rejects the request
   * with a `busy` outcome.
   */
  start(query: string, options: RunOptions = {}): string {
    // A busy start is rejected, so it gets no resources of its own
    const busy = this.controller.activeRequestId !== null;
    const prepared: PreparedResources = busy
      ? { startOptions: {}, owned: emptyOwned(), budgetHandle: null }
      : this.prepareResources(options);
    const { startOptions, owned, budgetHandle } = prepared;

    const step = this.controller.start(query, startOptions);
    const { requestId } = step;
    this.ensureWaiter(requestId);
    this.owned.set(requestId, owned);
    if (budgetHandle !== null) this.budgetHandles.set(requestId, budgetHandle);

    this.logger.info("Request started", {
      requestId,
      strategy: this.strategy,
      depth: startOptions.depth ?? 0,
    });
    this.exclusive(() => this.apply(step));
    return requestId;
  }

  /**
   * Resolve once the request reaches a terminal state
   */
  await(requestId: string): Promise<RequestOutcome> {
    const waiter = this.waiters.get(requestId);
    if (!waiter) {
      return Promise.reject(new Error(`Unknown request: ${requestId}`));
    }
    return waiter.promise;
  }

  async run(query: string, options: RunOptions = {}): Promise<RequestOutcome> {
    return this.await(this.start(query, options));
  }

  poll(requestId: string): RequestRecord | undefined {
    return this.controller.poll(requestId);
  }

  /**
   * Cancel the active request. Returns false when `requestId` is not active.
   */
  cancel(requestId: string, reason = "cancelled by caller"): boolean {
    if (this.controller.activeRequestId !== requestId) return false;
    this.deliver({ type: "cancel", requestId, reason });
    return true;
  }

  snapshot(): StrategySnapshot {
    return this.controller.snapshot();
  }

  onSignal(listener: SignalListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Wait for every in-flight operation, including late ones of settled
   * requests
   */
  async drain(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.allSettled([...this.inflight]);
    }
  }

  // ------------------------------------------------------------
  // Event delivery
  // ------------------------------------------------------------

  private deliver(event: InboundEvent): void {
    this.queue.push(event);
    this.exclusive(() => {});
  }

  /**
   * Run `action`, then every queued event. Events raised while a step's
   * directives are being dispatched wait until the whole step is out.
   */
  private exclusive(action: () => void): void {
    if (this.delivering) {
      action();
      return;
    }

    this.delivering = true;
    try {
      action();
      let next = this.queue.shift();
      while (next) {
        this.apply(this.controller.handle(next));
        next = this.queue.shift();
      }
    } finally {
      this.delivering = false;
    }
  }

  private apply(step: ControllerStep): void {
    for (const outcome of step.settled) {
      this.settle(outcome);
    }
    this.dispatchAll(step.directives);
  }

  private settle(outcome: RequestOutcome): void {
    this.aborts.get(outcome.requestId)?.abort(new Error(`Request ${outcome.status}`));
    this.aborts.delete(outcome.requestId);
    this.releaseOwned(outcome.requestId);
    this.budgetHandles.delete(outcome.requestId);
    this.settleWaiter(outcome);
  }

  private settleWaiter(outcome: RequestOutcome): void {
    this.ensureWaiter(outcome.requestId).resolve(outcome);
  }

  private ensureWaiter(requestId: string): Waiter {
    const existing = this.waiters.get(requestId);
    if (existing) return existing;

    let resolve: (outcome: RequestOutcome) => void = () => {};
    const promise = new Promise<RequestOutcome>((r) => {
      resolve = r;
    });
    const waiter = { promise, resolve };
    this.waiters.set(requestId, waiter);
    return waiter;
  }

  private abortSignal(requestId: string): AbortSignal {
    let controller = this.aborts.get(requestId);
    if (!controller) {
      controller = new AbortController();
      this.aborts.set(requestId, controller);
    }
    return controller.signal;
  }

  /**
   * Run `task` in the background; a throw is reported as a crash of the
   * request's executor
   */
  private track(requestId: string, label: string, task: () => Promise<void>): void {
    const promise = task()
      .catch((error: unknown) => {
        this.logger.error(`${label} crashed`, { requestId, error: errorMessage(error) });
        this.deliver({
          type: "worker_event",
          requestId,
          event: { kind: "crashed", error: `${label} crashed: ${errorMessage(error)}` },
        });
      })
      .finally(() => {
        this.inflight.delete(promise);
      });
    this.inflight.add(promise);
  }

  // ------------------------------------------------------------
  // Directive execution
  // ------------------------------------------------------------

  private dispatchAll(directives: readonly Directive[]): void {
    for (const directive of directives) {
      this.dispatch(directive);
    }
  }

  private dispatch(directive: Directive): void {
    switch (directive.type) {
      case "llm_call":
        this.track(directive.requestId, "Model call", () => this.callModel(directive));
        return;
      case "tool_call":
        this.track(directive.requestId, `Tool ${directive.toolName}`, () => this.callTool(directive));
        return;
      case "spawn_worker":
        this.spawnWorker(directive);
        return;
      case "cancel_worker":
        this.cancelWorker(directive.tag, directive.reason);
        return;
      case "emit_signal":
        this.emit({ signal: directive.signal, payload: directive.payload });
        return;
      case "emit_request_error":
        this.emitRequestError(directive);
        return;
    }
  }

  private async callModel(directive: LLMCallDirective): Promise<void> {
    const { requestId, id: callId } = directive;
    const call = new AbortController();
    const parent = this.abortSignal(requestId);
    const onAbort = (): void => call.abort(parent.reason);
    parent.addEventListener("abort", onAbort, { once: true });

    const timeoutMs = this.config.llm.timeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ModelBackendError("timeout", `Model call timed out after ${timeoutMs}ms`));
        call.abort(new Error("timeout"));
      }, timeoutMs);
    });

    let result: LlmResult;
    try {
      const response = await Promise.race([
        this.options.model.complete(directive, {
          signal: call.signal,
          onDelta: (delta, channel) =>
            this.deliver({ type: "llm_partial", requestId, callId, delta, channel }),
        }),
        timeout,
      ]);
      result = { ok: true, response };
    } catch (error) {
      result = { ok: false, error: classifyModelError(error) };
    } finally {
      clearTimeout(timer);
      parent.removeEventListener("abort", onAbort);
    }

    if (result.ok && result.response.usage) {
      const budgetHandle = this.budgetHandles.get(requestId);
      if (budgetHandle !== undefined) {
        this.stores.budgets.recordTokens(budgetHandle, result.response.usage.totalTokens);
      }
    }
    if (!result.ok) {
      this.logger.warn("Model call failed", { requestId, callId, ...result.error });
    }

    this.deliver({ type: "llm_result", requestId, callId, result });
  }

  private async callTool(directive: ToolCallDirective): Promise<void> {
    const signal = this.abortSignal(directive.requestId);
    const outcome = await this.semaphore.run(() =>
      executeToolCall(directive, {
        registry: this.tools,
        stores: this.stores,
        logger: this.logger,
        maxResultBytes: this.config.toolExec.maxResultBytes,
        signal,
        sleep: this.options.sleep,
      }),
    );
    this.deliver({
      type: "tool_result",
      requestId: directive.requestId,
      callId: directive.id,
      toolName: directive.toolName,
      outcome,
    });
  }

  private spawnWorker(directive: SpawnWorkerDirective): void {
    const { requestId, tag, params } = directive;
    const report = (event: WorkerEvent): void =>
      this.deliver({ type: "worker_event", requestId, event });

    // Handles from a checkpoint may not exist in these stores
    const missing = this.missingWorkerHandle(params);
    if (missing !== null) {
      this.logger.warn("Child handle unavailable", { requestId, tag, handle: missing });
      report({ kind: "failed", tag, error: `${missing} is no longer available` });
      return;
    }

    if (params.budgetHandle !== null && !directive.reserved) {
      const granted = this.stores.budgets.reserveChildren(params.budgetHandle, 1);
      if (granted === 0) {
        this.logger.warn("Child denied by budget", { requestId, tag });
        report({ kind: "failed", tag, error: "budget exhausted: no children remaining" });
        return;
      }
    }

    const text = params.chunks
      .map((chunk) => this.stores.contexts.readLines(params.contextHandle, chunk.startLine, chunk.endLine) ?? "")
      .join("\n");

    const child = new Runtime(
      {
        ...this.options,
        strategy: directive.workerRef,
        config: this.config,
        tools: this.tools,
        stores: this.stores,
        logger: this.logger.child(tag),
        ids: this.ids,
        clock: this.clock,
      },
    );
    this.children.set(tag, child);

    this.track(requestId, `Worker ${tag}`, async () => {
      try {
        const childRequestId = child.start(params.query, {
          context: text,
          workspaceHandle: params.workspaceHandle ?? undefined,
          budgetHandle: params.budgetHandle ?? undefined,
          depth: params.depth,
        });
        report({ kind: "started", tag });

        const outcome = await child.await(childRequestId);
        if (outcome.status === "completed" && outcome.result !== null) {
          this.recordFindings(directive, outcome.result);
          report({ kind: "completed", tag, answer: outcome.result });
        } else {
          report({ kind: "failed", tag, error: outcome.error?.message ?? `worker ${outcome.status}` });
        }
        await child.drain();
      } catch (error) {
        report({ kind: "crashed", tag, error: errorMessage(error) });
      } finally {
        this.children.delete(tag);
      }
    });
  }

  private missingWorkerHandle(params: WorkerParams): string | null {
    if (!this.stores.contexts.has(params.contextHandle)) {
      return `Context ${params.contextHandle}`;
    }
    if (params.budgetHandle !== null && !this.stores.budgets.has(params.budgetHandle)) {
      return `Budget ${params.budgetHandle}`;
    }
    return null;
  }

  private recordFindings(directive: SpawnWorkerDirective, answer: string): void {
    const { workspaceHandle, chunks } = directive.params;
    if (workspaceHandle === null) return;

    const summary = condenseFinding(answer, this.config.delegation.findingChars);
    for (const chunk of chunks) {
      this.stores.workspaces.recordFinding(workspaceHandle, {
        chunkId: chunk.id,
        lines: formatLineRange(chunk),
        summary,
        source: directive.tag,
      });
    }
  }

  private cancelWorker(tag: string, reason: string): void {
    const child = this.children.get(tag);
    const active = child?.activeRequestId;
    if (child && active) {
      child.cancel(active, reason);
    }
  }

  private emitRequestError(directive: EmitRequestErrorDirective): void {
    this.emit({
      signal: "request.failed",
      payload: {
        requestId: directive.requestId,
        error: { kind: directive.reason, message: directive.message },
        terminationReason: null,
      },
    });
  }

  private emit(signal: RuntimeSignal): void {
    for (const listener of this.listeners) {
      try {
        listener(signal);
      } catch (error) {
        this.logger.error("Signal listener threw", { signal: signal.signal, error: errorMessage(error) });
      }
    }
  }

  // ------------------------------------------------------------
  // Resources
  // ------------------------------------------------------------

  private settings(): MachineSettings {
    return settingsFrom(this.config, this.tools);
  }

  private prepareResources(options: RunOptions): PreparedResources {
    const owned = emptyOwned();
    const { contexts, workspaces, budgets } = this.stores;

    let contextHandle = options.contextHandle;
    if (contextHandle === undefined && options.context !== undefined) {
      contextHandle = contexts.create(options.context, { owns: true });
      owned.contexts.push(contextHandle);
    }
    const contextLines =
      contextHandle !== undefined ? (contexts.stats(contextHandle)?.lines ?? 0) : undefined;

    let workspaceHandle = options.workspaceHandle;
    let budgetHandle = options.budgetHandle;
    if (this.strategy === "recursive") {
      if (workspaceHandle === undefined) {
        workspaceHandle = workspaces.create({ owns: true });
        owned.workspaces.push(workspaceHandle);
      }
      if (budgetHandle === undefined) {
        const { maxChildrenTotal, tokenBudget } = this.config.delegation;
        budgetHandle = budgets.create({ maxChildrenTotal, tokenBudget }, { owns: true });
        owned.budgets.push(budgetHandle);
      }
    }

    return {
      startOptions: {
        ...(contextHandle !== undefined ? { contextHandle, contextLines } : {}),
        ...(workspaceHandle !== undefined ? { workspaceHandle } : {}),
        ...(budgetHandle !== undefined ? { budgetHandle } : {}),
        depth: options.depth ?? 0,
      },
      owned,
      budgetHandle: budgetHandle ?? null,
    };
  }

  private releaseOwned(requestId: string): void {
    const owned = this.owned.get(requestId);
    if (!owned) return;

    for (const handle of owned.contexts) this.stores.contexts.release(handle);
    for (const handle of owned.workspaces) this.stores.workspaces.release(handle);
    for (const handle of owned.budgets) this.stores.budgets.release(handle);
    this.owned.delete(requestId);
  }
}

function emptyOwned(): OwnedResources {
  return { contexts: [], workspaces: [], budgets: [] };
}

function settingsFrom(config: StratumConfig, tools: ToolRegistry): MachineSettings {
  return {
    model: config.model,
    systemPrompt: config.systemPrompt,
    maxIterations: config.maxIterations,
    maxParseRetries: config.maxParseRetries,
    llm: config.llm,
    toolExec: config.toolExec,
    delegation: config.delegation,
    treeOfThoughts: config.treeOfThoughts,
    graphOfThoughts: config.graphOfThoughts,
    tools: tools.specs(),
  };
}
