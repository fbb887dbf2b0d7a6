/**
 * Tool types and contracts
 */

import type { z } from "zod";
import type { ToolCallContext } from "../machine/directives.js";
import type { RuntimeStores } from "../store/index.js";

/**
 * Error codes a tool may report
 */
export enum ToolErrorCode {
  /** Arguments passed validation but make no sense (e.g. division by zero) */
  INVALID_INPUT = "INVALID_INPUT",
  /** The call context lacks a handle the tool needs */
  MISSING_CONTEXT = "MISSING_CONTEXT",
  /** A handle or item the tool looked up does not exist */
  NOT_FOUND = "NOT_FOUND",
  /** The tool failed in a way that may succeed on another attempt */
  EXECUTION_FAILED = "EXECUTION_FAILED",
}

/** Codes worth another attempt */
export const RETRYABLE_CODES: ReadonlySet<ToolErrorCode> = new Set([ToolErrorCode.EXECUTION_FAILED]);

/**
 * Structured tool error
 */
export interface ToolError {
  ok: false;
  error: {
    code: ToolErrorCode;
    reason: string;
    details?: Record<string, unknown>;
  };
}

export interface ToolSuccess<T> {
  ok: true;
  result: T;
}

/**
 * Tool result type - either success or error
 */
export type ToolReturn<T = unknown> = ToolSuccess<T> | ToolError;

/**
 * Check if result is an error
 */
export function isToolError<T>(result: ToolReturn<T>): result is ToolError {
  return !result.ok;
}

export function toolOk<T>(result: T): ToolSuccess<T> {
  return { ok: true, result };
}

/**
 * Create a tool error
 */
export function createToolError(
  code: ToolErrorCode,
  reason: string,
  details?: Record<string, unknown>,
): ToolError {
  return {
    ok: false,
    error: {
      code,
      reason,
      ...(details ? { details } : {}),
    },
  };
}

/**
 * What a tool sees besides its arguments
 */
export interface ToolExecutionContext {
  requestId: string;
  callId: string;
  /** 1 for the first attempt */
  attempt: number;
  values: ToolCallContext;
  stores: RuntimeStores;
  /** Aborted when the attempt times out or the request is cancelled */
  signal: AbortSignal;
}

/**
 * Tool definition. `input` validates arguments; `parameters` is the JSON
 * schema shown to the model.
 */
export interface ToolDefinition<I extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  input: I;
  run(args: z.infer<I>, ctx: ToolExecutionContext): Promise<ToolReturn>;
}

export function defineTool<I extends z.ZodTypeAny>(tool: ToolDefinition<I>): ToolDefinition<I> {
  return tool;
}
