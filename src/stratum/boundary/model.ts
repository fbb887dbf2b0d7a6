/**
 * Model backend contract and error classification
 */

import { setTimeout as delay } from "node:timers/promises";
import type { LLMCallDirective } from "../machine/directives.js";
import type { LLMError, LLMErrorType, LLMResponse } from "../machine/schema.js";

export type ModelRequest = Omit<LLMCallDirective, "type">;

export interface ModelCallOptions {
  signal: AbortSignal;
  onDelta?: (delta: string, channel: "content" | "thinking") => void;
}

/**
 * Anything that can answer an LLMCall directive
 */
export interface ModelBackend {
  complete(request: ModelRequest, options: ModelCallOptions): Promise<LLMResponse>;
}

export class ModelBackendError extends Error {
  constructor(
    readonly type: LLMErrorType,
    message: string,
  ) {
    super(message);
    this.name = "ModelBackendError";
  }
}

const TRANSPORT_PATTERN = /ECONNRESET|ECONNREFUSED|ENOTFOUND|EPIPE|socket hang up|network|fetch failed/i;

/**
 * Map a thrown value onto an LLM error type
 */
export function classifyModelError(error: unknown): LLMError {
  if (error instanceof ModelBackendError) {
    return { type: error.type, message: error.message };
  }
  if (!(error instanceof Error)) {
    return { type: "provider", message: String(error) };
  }

  const { message } = error;
  if (error.name === "AbortError") {
    return { type: "cancelled", message };
  }
  if (/rate.?limit|\b429\b|too many requests/i.test(message)) {
    return { type: "rate_limit", message };
  }
  if (/timed? ?out/i.test(message)) {
    return { type: "timeout", message };
  }
  if (TRANSPORT_PATTERN.test(message)) {
    return { type: "transport", message };
  }
  return { type: "provider", message };
}

/**
 * One scripted model turn
 */
export type ScriptedTurn =
  | { response: LLMResponse; deltas?: string[]; thinkingDeltas?: string[]; delayMs?: number }
  | { error: LLMError; delayMs?: number };

export type ScriptResponder = (request: ModelRequest, index: number) => ScriptedTurn | undefined;

/**
 * In-process backend that replays a fixed list of turns, or asks a
 * responder for each one
 */
export class ScriptedModelBackend implements ModelBackend {
  readonly requests: ModelRequest[] = [];

  constructor(private readonly script: readonly ScriptedTurn[] | ScriptResponder) {}

  async complete(request: ModelRequest, options: ModelCallOptions): Promise<LLMResponse> {
    const index = this.requests.length;
    this.requests.push(request);

    const turn = typeof this.script === "function" ? this.script(request, index) : this.script[index];
    if (!turn) {
      throw new ModelBackendError("provider", `Script has no turn ${index + 1}`);
    }

    if (turn.delayMs !== undefined) {
      await delay(turn.delayMs, undefined, { signal: options.signal });
    }
    if (options.signal.aborted) {
      throw new ModelBackendError("cancelled", "Model call aborted");
    }

    if ("error" in turn) {
      throw new ModelBackendError(turn.error.type, turn.error.message);
    }

    for (const delta of turn.thinkingDeltas ?? []) {
      options.onDelta?.(delta, "thinking");
    }
    for (const delta of turn.deltas ?? []) {
      options.onDelta?.(delta, "content");
    }
    return turn.response;
  }

  get callCount(): number {
    return this.requests.length;
  }
}
