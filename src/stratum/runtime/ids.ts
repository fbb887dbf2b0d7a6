/**
 * Identifier generation for requests, calls and workers
 */

import { randomBytes } from "node:crypto";

export type IdPrefix = "req" | "llm" | "tool" | "chunk";

/**
 * Source of correlation ids; the state machine only ever asks this for ids
 */
export interface IdSource {
  next(prefix: IdPrefix): string;
}

/**
 * Generate a new id, e.g. `req_lx3k9a_1f2e3d4c`
 */
export function generateId(prefix: IdPrefix): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(4).toString("hex");
  return `${prefix}_${timestamp}_${random}`;
}

/**
 * Random ids for production use
 */
export function createIdSource(): IdSource {
  return { next: generateId };
}

/**
 * Deterministic ids (`llm_1`, `tool_2`, ...) with one counter per prefix
 */
export function createSequentialIds(): IdSource {
  const counters = new Map<IdPrefix, number>();
  return {
    next(prefix) {
      const value = (counters.get(prefix) ?? 0) + 1;
      counters.set(prefix, value);
      return `${prefix}_${value}`;
    },
  };
}
