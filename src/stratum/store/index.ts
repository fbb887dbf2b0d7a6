/**
 * Stores shared across a runtime tree
 */

import { BudgetStore } from "./budget-store.js";
import { ContextStore } from "./context-store.js";
import { WorkspaceStore } from "./workspace-store.js";

export { Arena, type Handle } from "./arena.js";
export { BudgetStore, type Budget, type BudgetView, type BudgetLimits } from "./budget-store.js";
export {
  WorkspaceStore,
  compareChunkIds,
  type Workspace,
  type WorkspaceFinding,
  type WorkspaceNote,
} from "./workspace-store.js";
export {
  ContextStore,
  splitLines,
  type ContextBody,
  type ContextMatch,
  type ContextStats,
} from "./context-store.js";

export interface RuntimeStores {
  budgets: BudgetStore;
  workspaces: WorkspaceStore;
  contexts: ContextStore;
}

export function createStores(): RuntimeStores {
  return {
    budgets: new BudgetStore(),
    workspaces: new WorkspaceStore(),
    contexts: new ContextStore(),
  };
}
