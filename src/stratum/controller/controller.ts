/**
 * Request lifecycle controller
 *
 * Owns one strategy state and feeds it events. Guarantees at most one active
 * request, drops events that do not belong to it, turns stable points into
 * signed checkpoints, tracks live children so cancellation reaches them, and
 * keeps one record per request it has seen.
 */

import type { CheckpointConfig } from "../config/types.js";
import { getStrategy } from "../strategies/index.js";
import type { CancelWorkerDirective, Directive, EmitSignalDirective } from "../machine/directives.js";
import type { InboundEvent, StartOptions } from "../machine/events.js";
import { createInitialState, outstandingDirectives, update } from "../machine/machine.js";
import type {
  RuntimeError,
  StrategyState,
  TerminationReason,
  Usage,
} from "../machine/schema.js";
import { snapshot, type StrategySnapshot } from "../machine/snapshot.js";
import type { MachineEnv, MachineSettings, StrategyDefinition, Transition } from "../machine/strategy.js";
import { emptyUsage, isActive, isTerminal } from "../machine/transitions.js";
import { createIdSource, type IdSource } from "../runtime/ids.js";
import { createSilentLogger, type StratumLogger } from "../runtime/logger.js";
import type { BudgetView } from "../store/budget-store.js";
import { verifyCheckpoint, issueCheckpoint } from "./checkpoint.js";

export type RequestStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

/**
 * Final word on a request, including requests rejected before they ran
 */
export interface RequestOutcome {
  requestId: string;
  status: "completed" | "failed" | "cancelled";
  result: string | null;
  error: RuntimeError | null;
  terminationReason: TerminationReason | null;
  usage: Usage;
}

export interface RequestRecord {
  requestId: string;
  query: string;
  status: RequestStatus;
  usageAtStart: Usage;
  outcome: RequestOutcome | null;
}

export interface ControllerStep {
  directives: Directive[];
  /** Outcomes of requests settled by this step */
  settled: RequestOutcome[];
}

export interface ControllerOptions {
  strategy: StrategyDefinition;
  settings: MachineSettings;
  checkpoint: CheckpointConfig;
  ids?: IdSource;
  clock?: () => number;
  /** Current state of a budget handle, used to gate fan-out */
  budgetView?: (handle: string) => BudgetView | undefined;
  logger?: StratumLogger;
}

function subtractUsage(total: Usage, base: Usage): Usage {
  return {
    inputTokens: Math.max(0, total.inputTokens - base.inputTokens),
    outputTokens: Math.max(0, total.outputTokens - base.outputTokens),
    totalTokens: Math.max(0, total.totalTokens - base.totalTokens),
  };
}

export function budgetHandleOf(state: StrategyState): string | null {
  return state.data.kind === "recursive" ? state.data.budgetHandle : null;
}

export class RequestController {
  private state: StrategyState;
  private readonly records = new Map<string, RequestRecord>();
  private readonly liveChildren = new Set<string>();
  private readonly ids: IdSource;
  private readonly clock: () => number;
  private readonly logger: StratumLogger;

  constructor(
    private readonly options: ControllerOptions,
    initialState?: StrategyState,
  ) {
    this.state = initialState ?? createInitialState(options.strategy.name);
    this.ids = options.ids ?? createIdSource();
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Rebuild a controller from a checkpoint token. Outstanding work of an
   * active state is returned as directives; a terminal state yields none.
   *
   * @throws CheckpointError when the token fails verification
   */
  static resume(
    token: string,
    options: Omit<ControllerOptions, "strategy">,
  ): { controller: RequestController; directives: Directive[] } {
    const now = options.clock?.() ?? Date.now();
    const payload = verifyCheckpoint(token, { secret: options.checkpoint.secret, now });
    const state: StrategyState = { ...payload.state, checkpointToken: token };
    const controller = new RequestController(
      { ...options, strategy: getStrategy(state.strategy) },
      state,
    );

    if (state.requestId !== null) {
      controller.records.set(state.requestId, {
        requestId: state.requestId,
        query: state.query ?? "",
        status: isTerminal(state) ? settledStatus(state) : "running",
        usageAtStart: emptyUsage(),
        outcome: isTerminal(state) ? outcomeOf(state, emptyUsage()) : null,
      });
    }

    const directives = outstandingDirectives(state, controller.env(budgetHandleOf(state)));
    controller.track(directives);
    controller.logger.info("Resumed from checkpoint", {
      requestId: state.requestId,
      reason: payload.reason,
      outstanding: directives.length,
    });
    return { controller, directives };
  }

  get strategyName(): StrategyDefinition["name"] {
    return this.options.strategy.name;
  }

  get activeRequestId(): string | null {
    return isActive(this.state) ? this.state.requestId : null;
  }

  get currentState(): StrategyState {
    return this.state;
  }

  /**
   * Begin a request. A busy or invalid request settles immediately.
   */
  start(query: string, opts: StartOptions = {}): ControllerStep & { requestId: string } {
    const requestId = this.ids.next("req");
    this.records.set(requestId, {
      requestId,
      query,
      status: "pending",
      usageAtStart: this.state.usage,
      outcome: null,
    });
    return { requestId, ...this.handle({ type: "start", requestId, query, opts }) };
  }

  cancel(requestId: string, reason: string): ControllerStep {
    return this.handle({ type: "cancel", requestId, reason });
  }

  /**
   * Apply one inbound event
   */
  handle(event: InboundEvent): ControllerStep {
    if (event.type !== "start" && event.requestId !== this.activeRequestId) {
      this.logger.debug("Dropping event for inactive request", {
        type: event.type,
        requestId: event.requestId,
        activeRequestId: this.activeRequestId,
      });
      return { directives: [], settled: [] };
    }

    const budgetHandle =
      event.type === "start" ? (event.opts?.budgetHandle ?? null) : budgetHandleOf(this.state);
    const before = this.state;
    const result = update(before, event, this.env(budgetHandle));
    this.state = result.state;

    if (event.type === "worker_event" && event.event.tag !== undefined && event.event.kind !== "started") {
      this.liveChildren.delete(event.event.tag);
    }

    const directives = this.withCheckpoint(result);
    this.track(directives);

    const settled: RequestOutcome[] = [];
    for (const directive of directives) {
      if (directive.type === "emit_request_error") {
        settled.push(this.reject(directive.requestId, directive.reason, directive.message));
      }
    }

    if (event.type === "start" && this.state.requestId === event.requestId && this.state !== before) {
      this.markRunning(event.requestId);
    }

    // A continuation may also settle straight from one terminal state to another
    if (isTerminal(this.state) && (!isTerminal(before) || before.requestId !== this.state.requestId)) {
      settled.push(this.settle());
      directives.push(...this.cancelChildren(this.state.error?.message ?? "request finished"));
    }

    return { directives, settled };
  }

  snapshot(): StrategySnapshot {
    return snapshot(this.state);
  }

  poll(requestId: string): RequestRecord | undefined {
    const record = this.records.get(requestId);
    return record ? { ...record } : undefined;
  }

  liveChildTags(): string[] {
    return [...this.liveChildren];
  }

  private env(budgetHandle: string | null): MachineEnv {
    const view = budgetHandle !== null ? (this.options.budgetView?.(budgetHandle) ?? null) : null;
    return {
      strategy: this.options.strategy,
      settings: this.options.settings,
      ids: this.ids,
      now: this.clock(),
      budget: view,
    };
  }

  /**
   * Issue a checkpoint for a stable point and put its signal first
   */
  private withCheckpoint(result: Transition): Directive[] {
    if (!result.stablePoint) return [...result.directives];

    const { secret, ttlMs, compress } = this.options.checkpoint;
    const token = issueCheckpoint(result.state, result.stablePoint, {
      secret,
      ttlMs,
      compress,
      now: this.clock(),
    });
    this.state = { ...this.state, checkpointToken: token };

    const signal: EmitSignalDirective = {
      type: "emit_signal",
      signal: "checkpoint",
      payload: { requestId: this.state.requestId, reason: result.stablePoint, token },
    };
    return [signal, ...result.directives];
  }

  private track(directives: readonly Directive[]): void {
    for (const directive of directives) {
      if (directive.type === "spawn_worker") {
        this.liveChildren.add(directive.tag);
      }
    }
  }

  private cancelChildren(reason: string): CancelWorkerDirective[] {
    const requestId = this.state.requestId ?? "";
    const directives = [...this.liveChildren].map(
      (tag): CancelWorkerDirective => ({ type: "cancel_worker", tag, requestId, reason }),
    );
    this.liveChildren.clear();
    return directives;
  }

  private markRunning(requestId: string): void {
    const record = this.records.get(requestId);
    if (record && record.status === "pending") {
      record.status = "running";
    }
  }

  private settle(): RequestOutcome {
    const requestId = this.state.requestId ?? "";
    const record = this.records.get(requestId);
    const outcome = outcomeOf(this.state, record?.usageAtStart ?? emptyUsage());
    if (record) {
      record.status = outcome.status;
      record.outcome = outcome;
    }
    this.logger.info(`Request ${outcome.status}`, {
      requestId,
      terminationReason: outcome.terminationReason,
      totalTokens: outcome.usage.totalTokens,
    });
    return outcome;
  }

  private reject(requestId: string, kind: RuntimeError["kind"], message: string): RequestOutcome {
    const outcome: RequestOutcome = {
      requestId,
      status: "failed",
      result: null,
      error: { kind, message },
      terminationReason: null,
      usage: emptyUsage(),
    };
    const record = this.records.get(requestId);
    if (record) {
      record.status = "failed";
      record.outcome = outcome;
    }
    this.logger.warn("Request rejected", { requestId, kind, message });
    return outcome;
  }
}

function settledStatus(state: StrategyState): RequestOutcome["status"] {
  if (state.status === "completed") return "completed";
  return state.terminationReason === "cancelled" ? "cancelled" : "failed";
}

function outcomeOf(state: StrategyState, usageAtStart: Usage): RequestOutcome {
  return {
    requestId: state.requestId ?? "",
    status: settledStatus(state),
    result: state.result,
    error: state.error,
    terminationReason: state.terminationReason,
    usage: subtractUsage(state.usage, usageAtStart),
  };
}
