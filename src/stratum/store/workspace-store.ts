/**
 * Scratch notes and per-chunk findings shared by a request and its children
 */

import { Arena, type Handle } from "./arena.js";

export interface WorkspaceNote {
  author: string;
  text: string;
  at: number;
}

export interface WorkspaceFinding {
  chunkId: string;
  lines: string;
  summary: string;
  /** Worker tag that produced the finding */
  source: string;
}

export interface Workspace {
  notes: WorkspaceNote[];
  findings: WorkspaceFinding[];
}

export class WorkspaceStore {
  private readonly arena = new Arena<Workspace>("workspace");

  create(options: { owns: boolean }): Handle {
    return this.arena.create({ notes: [], findings: [] }, options.owns);
  }

  has(handle: Handle): boolean {
    return this.arena.has(handle);
  }

  get(handle: Handle): Workspace | undefined {
    return this.arena.get(handle);
  }

  isOwned(handle: Handle): boolean {
    return this.arena.isOwned(handle);
  }

  /**
   * Append a note; returns the note count after the append
   */
  appendNote(handle: Handle, note: Omit<WorkspaceNote, "at">, now = Date.now()): number {
    const updated = this.arena.update(handle, (workspace) => ({
      ...workspace,
      notes: [...workspace.notes, { ...note, at: now }],
    }));
    return updated.notes.length;
  }

  /**
   * Record the finding for a chunk, replacing any earlier one for the same
   * chunk. Returns false when the workspace has already been released.
   */
  recordFinding(handle: Handle, finding: WorkspaceFinding): boolean {
    if (!this.arena.has(handle)) return false;

    this.arena.update(handle, (workspace) => ({
      ...workspace,
      findings: [...workspace.findings.filter((f) => f.chunkId !== finding.chunkId), finding],
    }));
    return true;
  }

  /**
   * Render notes and findings as plain text for a prompt or a tool result
   */
  summary(handle: Handle, maxChars = 4000): string {
    const workspace = this.arena.get(handle);
    if (!workspace) return "";

    const lines: string[] = [];
    for (const note of workspace.notes) {
      lines.push(`- (${note.author}) ${note.text}`);
    }
    const findings = [...workspace.findings].sort((a, b) => compareChunkIds(a.chunkId, b.chunkId));
    for (const finding of findings) {
      lines.push(`- [${finding.chunkId} lines ${finding.lines}] ${finding.summary}`);
    }

    const text = lines.join("\n");
    return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
  }

  release(handle: Handle): boolean {
    return this.arena.release(handle);
  }
}

/**
 * Order `c_2` before `c_10`
 */
export function compareChunkIds(a: string, b: string): number {
  const na = Number(a.replace(/^\D+/, ""));
  const nb = Number(b.replace(/^\D+/, ""));
  if (Number.isFinite(na) && Number.isFinite(nb) && na !== nb) {
    return na - nb;
  }
  return a.localeCompare(b);
}
