/**
 * Immutable text bodies addressed by handle, read by line range
 */

import { Arena, type Handle } from "./arena.js";

export interface ContextBody {
  readonly text: string;
  readonly lines: readonly string[];
  readonly bytes: number;
}

export interface ContextStats {
  lines: number;
  bytes: number;
  chars: number;
}

export interface ContextMatch {
  line: number;
  text: string;
}

export class ContextStore {
  // Bodies are frozen on creation and never change, so no copy is needed
  private readonly arena = new Arena<ContextBody>("context", { clone: (body) => body });

  create(text: string, options: { owns: boolean }): Handle {
    const body: ContextBody = Object.freeze({
      text,
      lines: Object.freeze(splitLines(text)),
      bytes: Buffer.byteLength(text),
    });
    return this.arena.create(body, options.owns);
  }

  has(handle: Handle): boolean {
    return this.arena.has(handle);
  }

  stats(handle: Handle): ContextStats | undefined {
    const body = this.arena.get(handle);
    if (!body) return undefined;
    return { lines: body.lines.length, bytes: body.bytes, chars: body.text.length };
  }

  lines(handle: Handle): readonly string[] | undefined {
    return this.arena.get(handle)?.lines;
  }

  /**
   * Lines `start..end`, 1-based and inclusive, clamped to the body
   */
  readLines(handle: Handle, start: number, end: number): string | undefined {
    const body = this.arena.get(handle);
    if (!body) return undefined;
    const from = Math.max(1, start);
    const to = Math.min(body.lines.length, end);
    if (to < from) return "";
    return body.lines.slice(from - 1, to).join("\n");
  }

  /**
   * Case-insensitive substring search
   */
  search(handle: Handle, query: string, limit = 20): ContextMatch[] | undefined {
    const body = this.arena.get(handle);
    if (!body) return undefined;

    const needle = query.toLowerCase();
    const matches: ContextMatch[] = [];
    for (let i = 0; i < body.lines.length && matches.length < limit; i++) {
      const line = body.lines[i] ?? "";
      if (line.toLowerCase().includes(needle)) {
        matches.push({ line: i + 1, text: line });
      }
    }
    return matches;
  }

  release(handle: Handle): boolean {
    return this.arena.release(handle);
  }
}

/**
 * Split on newlines, dropping the empty tail left by a trailing newline
 */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}
