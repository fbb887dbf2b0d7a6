/**
 * Line-range chunking of a context body
 */

import type { ChunkRef } from "../machine/schema.js";

const PREVIEW_CHARS = 80;

/**
 * Split `lines` into consecutive ranges of at most `chunkLines` lines.
 * Ids are `c_0..c_{n-1}`; ranges are 1-based and inclusive.
 */
export function chunkByLines(lines: readonly string[], chunkLines: number): ChunkRef[] {
  if (chunkLines < 1) {
    throw new Error(`chunkLines must be at least 1, got ${chunkLines}`);
  }

  const chunks: ChunkRef[] = [];
  for (let start = 0; start < lines.length; start += chunkLines) {
    const slice = lines.slice(start, start + chunkLines);
    chunks.push({
      id: `c_${chunks.length}`,
      startLine: start + 1,
      endLine: start + slice.length,
      preview: previewOf(slice),
    });
  }
  return chunks;
}

function previewOf(lines: readonly string[]): string {
  const first = lines.find((line) => line.trim() !== "")?.trim() ?? "";
  return first.length > PREVIEW_CHARS ? `${first.slice(0, PREVIEW_CHARS)}...` : first;
}

export function formatLineRange(chunk: ChunkRef): string {
  return `${chunk.startLine}-${chunk.endLine}`;
}
