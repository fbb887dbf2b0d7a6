/**
 * Builders shared by the test suites
 */

import { vi } from "vitest";
import { getDefaultConfig, type StrategyName } from "../config/types.js";
import type { Directive } from "../machine/directives.js";
import type { InboundEvent } from "../machine/events.js";
import type { LLMResponse, StrategyState, ToolCallRequest, ToolOutcome, Usage } from "../machine/schema.js";
import type { MachineEnv, MachineSettings, Transition } from "../machine/strategy.js";
import { update } from "../machine/machine.js";
import { createSequentialIds, type IdSource } from "../runtime/ids.js";
import type { StratumLogger } from "../runtime/logger.js";
import type { BudgetView } from "../store/budget-store.js";
import { getStrategy } from "../strategies/index.js";
import { createDefaultRegistry } from "../tools/index.js";

export const NOW = 1_700_000_000_000;

export function testSettings(overrides: Partial<MachineSettings> = {}): MachineSettings {
  const config = getDefaultConfig();
  return {
    model: "test-model",
    systemPrompt: undefined,
    maxIterations: config.maxIterations,
    maxParseRetries: config.maxParseRetries,
    llm: config.llm,
    toolExec: config.toolExec,
    delegation: config.delegation,
    treeOfThoughts: config.treeOfThoughts,
    graphOfThoughts: config.graphOfThoughts,
    tools: createDefaultRegistry().specs(),
    ...overrides,
  };
}

export interface TestEnvOptions {
  settings?: MachineSettings;
  ids?: IdSource;
  now?: number;
  budget?: BudgetView | null;
}

export function testEnv(strategy: StrategyName, options: TestEnvOptions = {}): MachineEnv {
  return {
    strategy: getStrategy(strategy),
    settings: options.settings ?? testSettings(),
    ids: options.ids ?? createSequentialIds(),
    now: options.now ?? NOW,
    budget: options.budget ?? null,
  };
}

export function usage(inputTokens: number, outputTokens: number): Usage {
  return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens };
}

export function reply(text: string, extras: Partial<LLMResponse> = {}): LLMResponse {
  return { text, toolCalls: [], ...extras };
}

export function toolCall(
  id: string,
  name: string,
  args: Record<string, unknown> = {},
): ToolCallRequest {
  return { id, name, arguments: args };
}

export function okOutcome(value: unknown, content = String(value)): ToolOutcome {
  return { ok: true, content, value, attempts: 1 };
}

/**
 * Apply events in order, returning every transition
 */
export function drive(
  state: StrategyState,
  events: readonly InboundEvent[],
  env: MachineEnv,
): { state: StrategyState; transitions: Transition[] } {
  const transitions: Transition[] = [];
  let current = state;
  for (const event of events) {
    const t = update(current, event, env);
    transitions.push(t);
    current = t.state;
  }
  return { state: current, transitions };
}

export function mockLogger(): StratumLogger {
  const logger: StratumLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    tool: vi.fn(),
    child: () => logger,
    flush: vi.fn(async () => {}),
  };
  return logger;
}

export function ofType<T extends Directive["type"]>(
  directives: readonly Directive[],
  type: T,
): Extract<Directive, { type: T }>[] {
  return directives.filter((d): d is Extract<Directive, { type: T }> => d.type === type);
}
