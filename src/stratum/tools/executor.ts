/**
 * Tool executor - runs a ToolCall directive to exactly one outcome
 *
 * Each attempt races the tool against its timeout. Failed attempts are
 * classified and retried after a fixed backoff while they are retryable and
 * retries remain. Unknown tools and invalid arguments fail on the spot.
 */

import type { ToolCallDirective } from "../machine/directives.js";
import type { ToolFailure, ToolOutcome } from "../machine/schema.js";
import type { StratumLogger } from "../runtime/logger.js";
import type { RuntimeStores } from "../store/index.js";
import { formatToolResult } from "./format.js";
import type { PreparedToolCall, ToolRegistry } from "./registry.js";
import { RETRYABLE_CODES, isToolError } from "./types.js";

export interface ToolExecutorOptions {
  registry: ToolRegistry;
  stores: RuntimeStores;
  logger: StratumLogger;
  maxResultBytes: number;
  /** Aborts the current attempt and stops retrying */
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

type AttemptResult = { ok: true; value: unknown } | { ok: false; failure: ToolFailure };

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function runAttempt(
  prepared: Extract<PreparedToolCall, { ok: true }>,
  call: ToolCallDirective,
  attempt: number,
  options: ToolExecutorOptions,
): Promise<AttemptResult> {
  const controller = new AbortController();
  const onAbort = (): void => controller.abort(options.signal?.reason);
  options.signal?.addEventListener("abort", onAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<AttemptResult>((resolve) => {
    timer = setTimeout(() => {
      controller.abort(new Error("timeout"));
      resolve({
        ok: false,
        failure: {
          type: "timeout",
          message: `Tool ${call.toolName} timed out after ${call.timeoutMs}ms`,
          retryable: true,
        },
      });
    }, call.timeoutMs);
  });

  const execution = prepared
    .run({
      requestId: call.requestId,
      callId: call.id,
      attempt,
      values: call.context,
      stores: options.stores,
      signal: controller.signal,
    })
    .then((result): AttemptResult => {
      if (isToolError(result)) {
        return {
          ok: false,
          failure: {
            type: "execution_error",
            message: result.error.reason,
            retryable: RETRYABLE_CODES.has(result.error.code),
            details: { code: result.error.code, ...result.error.details },
          },
        };
      }
      return { ok: true, value: result.result };
    })
    .catch(
      (error: unknown): AttemptResult => ({
        ok: false,
        failure: { type: "exception", message: errorMessage(error), retryable: true },
      }),
    );

  try {
    return await Promise.race([execution, timeout]);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onAbort);
  }
}

async function runWithRetries(
  call: ToolCallDirective,
  options: ToolExecutorOptions,
): Promise<ToolOutcome> {
  const tool = options.registry.get(call.toolName);
  if (!tool) {
    return {
      ok: false,
      error: {
        type: "unknown_tool",
        message: `Unknown tool: ${call.toolName}`,
        retryable: false,
        details: { available: options.registry.names() },
      },
      attempts: 1,
    };
  }

  const prepared = tool.prepare(call.arguments);
  if (!prepared.ok) {
    return {
      ok: false,
      error: {
        type: "validation_error",
        message: `${prepared.message}: ${prepared.issues.join("; ")}`,
        retryable: false,
        details: { issues: prepared.issues },
      },
      attempts: 1,
    };
  }

  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = call.maxRetries + 1;

  for (let attempt = 1; ; attempt++) {
    const result = await runAttempt(prepared, call, attempt, options);
    if (result.ok) {
      return {
        ok: true,
        content: formatToolResult(result.value, options.maxResultBytes),
        value: result.value,
        attempts: attempt,
      };
    }

    const { failure } = result;
    const exhausted = attempt >= maxAttempts;
    if (!failure.retryable || exhausted || options.signal?.aborted) {
      return { ok: false, error: failure, attempts: attempt };
    }

    options.logger.debug(`Retrying ${call.toolName}`, {
      callId: call.id,
      attempt,
      type: failure.type,
      backoffMs: call.retryBackoffMs,
    });
    await sleep(call.retryBackoffMs);
  }
}

/**
 * Execute a tool call. Never rejects.
 */
export async function executeToolCall(
  call: ToolCallDirective,
  options: ToolExecutorOptions,
): Promise<ToolOutcome> {
  const startedAt = Date.now();
  let outcome: ToolOutcome;
  try {
    outcome = await runWithRetries(call, options);
  } catch (error) {
    outcome = {
      ok: false,
      error: { type: "exception", message: errorMessage(error), retryable: false },
      attempts: 1,
    };
  }

  options.logger.tool(call.toolName, call.id, outcome.ok ? "ok" : "error", Date.now() - startedAt);
  if (!outcome.ok) {
    options.logger.debug(`Tool ${call.toolName} failed`, {
      callId: call.id,
      type: outcome.error.type,
      message: outcome.error.message,
      attempts: outcome.attempts,
    });
  }
  return outcome;
}
