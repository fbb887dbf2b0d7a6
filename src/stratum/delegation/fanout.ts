/**
 * Fan-out planning and fan-in synthesis
 */

import { z } from "zod";
import {
  ChunkRefSchema,
  type ChunkOutcome,
  type ChunkRef,
  type FanoutChild,
} from "../machine/schema.js";
import { formatLineRange } from "./chunker.js";

/**
 * Structured result of the context_chunk tool
 */
export const ChunkResultSchema = z.object({
  chunkCount: z.number().int().min(0),
  chunks: z.array(ChunkRefSchema),
});

export type ChunkResult = z.infer<typeof ChunkResultSchema>;

export function childTag(requestId: string, index: number): string {
  return `${requestId}/w${index}`;
}

/**
 * Assign chunks to at most `maxChildren` children in contiguous groups whose
 * sizes differ by at most one
 */
export function planChildren(
  requestId: string,
  chunks: readonly ChunkRef[],
  maxChildren: number,
): FanoutChild[] {
  const count = Math.min(chunks.length, Math.max(0, maxChildren));
  if (count === 0) return [];

  const base = Math.floor(chunks.length / count);
  const extra = chunks.length % count;
  const children: FanoutChild[] = [];
  let offset = 0;

  for (let i = 0; i < count; i++) {
    const size = base + (i < extra ? 1 : 0);
    children.push({
      tag: childTag(requestId, i),
      chunkIds: chunks.slice(offset, offset + size).map((c) => c.id),
      status: "pending",
    });
    offset += size;
  }

  return children;
}

export interface FanoutCounts {
  chunkCount: number;
  completed: number;
  errors: number;
}

export function countOutcomes(chunkCount: number, outcomes: readonly ChunkOutcome[]): FanoutCounts {
  const completed = outcomes.filter((o) => o.status === "completed").length;
  return { chunkCount, completed, errors: outcomes.length - completed };
}

/**
 * Every chunk has either completed or failed
 */
export function isFanoutSettled(chunkCount: number, outcomes: readonly ChunkOutcome[]): boolean {
  const { completed, errors } = countOutcomes(chunkCount, outcomes);
  return completed + errors === chunkCount;
}

/**
 * Collapse whitespace and cut to `maxChars`
 */
export function condenseFinding(text: string, maxChars: number): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > maxChars ? `${flat.slice(0, maxChars)}...` : flat;
}

export function failureNote(errors: number): string {
  return `${errors} ${errors === 1 ? "chunk" : "chunks"} failed`;
}

export function buildSynthesisPrompt(
  query: string,
  chunks: readonly ChunkRef[],
  outcomes: readonly ChunkOutcome[],
): string {
  const { chunkCount, completed, errors } = countOutcomes(chunks.length, outcomes);
  const byId = new Map(chunks.map((chunk) => [chunk.id, chunk]));

  const findings = chunks.flatMap((chunk) => {
    const outcome = outcomes.find((o) => o.chunkId === chunk.id && o.status === "completed");
    return outcome ? [`- [${chunk.id} lines ${formatLineRange(chunk)}] ${outcome.text}`] : [];
  });

  const lines = [
    `Original query: ${query}`,
    "",
    `Fan-out results: ${completed} of ${chunkCount} chunks completed.`,
  ];

  if (errors > 0) {
    const failed = outcomes
      .filter((o) => o.status === "failed")
      .map((o) => {
        const chunk = byId.get(o.chunkId);
        return chunk ? `${o.chunkId} (lines ${formatLineRange(chunk)})` : o.chunkId;
      });
    lines.push(
      `Note: ${failureNote(errors)} (${failed.join(", ")}); answer from the partial results below.`,
    );
  }

  lines.push("", "Findings:", ...(findings.length > 0 ? findings : ["- (none)"]));
  lines.push(
    "",
    "Combine the findings into one answer to the original query. Reply with 'Final Answer: <answer>'.",
  );

  return lines.join("\n");
}
