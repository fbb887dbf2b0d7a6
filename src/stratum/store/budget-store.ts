/**
 * Shared child/token quotas for a worker tree
 */

import { Arena, type Handle } from "./arena.js";

export interface Budget {
  maxChildrenTotal: number;
  childrenUsed: number;
  tokenBudget: number;
  tokensUsed: number;
  /** Set once tokensUsed reaches tokenBudget; never cleared */
  exceeded: boolean;
  /** Whether the runtime that created this budget is responsible for releasing it */
  owns: boolean;
}

/** What the state machine is allowed to see when planning a fan-out */
export interface BudgetView {
  remainingChildren: number;
  exceeded: boolean;
}

export interface BudgetLimits {
  maxChildrenTotal: number;
  tokenBudget: number;
}

type BudgetRecord = Omit<Budget, "owns">;

export class BudgetStore {
  private readonly arena = new Arena<BudgetRecord>("budget");

  create(limits: BudgetLimits, options: { owns: boolean }): Handle {
    return this.arena.create(
      {
        maxChildrenTotal: limits.maxChildrenTotal,
        childrenUsed: 0,
        tokenBudget: limits.tokenBudget,
        tokensUsed: 0,
        exceeded: false,
      },
      options.owns,
    );
  }

  has(handle: Handle): boolean {
    return this.arena.has(handle);
  }

  get(handle: Handle): Budget | undefined {
    const record = this.arena.get(handle);
    return record ? { ...record, owns: this.arena.isOwned(handle) } : undefined;
  }

  view(handle: Handle): BudgetView | undefined {
    const record = this.arena.get(handle);
    if (!record) return undefined;
    return {
      remainingChildren: record.maxChildrenTotal - record.childrenUsed,
      exceeded: record.exceeded,
    };
  }

  /**
   * Reserve up to `requested` child slots; returns how many were granted
   */
  reserveChildren(handle: Handle, requested: number): number {
    let granted = 0;
    this.arena.update(handle, (budget) => {
      const remaining = budget.maxChildrenTotal - budget.childrenUsed;
      granted = Math.max(0, Math.min(requested, remaining));
      return { ...budget, childrenUsed: budget.childrenUsed + granted };
    });
    return granted;
  }

  /**
   * Charge tokens to the budget. Unknown handles are ignored so a child that
   * outlives its parent's budget does not fail on its last report.
   */
  recordTokens(handle: Handle, tokens: number): Budget | undefined {
    if (!this.arena.has(handle)) return undefined;

    this.arena.update(handle, (budget) => {
      const tokensUsed = budget.tokensUsed + Math.max(0, tokens);
      return {
        ...budget,
        tokensUsed,
        exceeded: budget.exceeded || tokensUsed >= budget.tokenBudget,
      };
    });
    return this.get(handle);
  }

  release(handle: Handle): boolean {
    return this.arena.release(handle);
  }
}
