import { describe, expect, it } from "vitest";
import { BudgetStore } from "./budget-store.js";

describe("BudgetStore", () => {
  it("grants children up to the total and never beyond", () => {
    const store = new BudgetStore();
    const handle = store.create({ maxChildrenTotal: 3, tokenBudget: 100 }, { owns: true });

    expect(store.reserveChildren(handle, 2)).toBe(2);
    expect(store.reserveChildren(handle, 2)).toBe(1);
    expect(store.reserveChildren(handle, 1)).toBe(0);
    expect(store.get(handle)?.childrenUsed).toBe(3);
  });

  it("keeps childrenUsed within the limit across many single reservations", () => {
    const store = new BudgetStore();
    const handle = store.create({ maxChildrenTotal: 5, tokenBudget: 100 }, { owns: true });

    const granted = Array.from({ length: 12 }, () => store.reserveChildren(handle, 1));

    expect(granted.filter((g) => g === 1)).toHaveLength(5);
    expect(store.view(handle)).toEqual({ remainingChildren: 0, exceeded: false });
  });

  it("sets the exceeded flag once tokens reach the budget", () => {
    const store = new BudgetStore();
    const handle = store.create({ maxChildrenTotal: 2, tokenBudget: 100 }, { owns: true });

    expect(store.recordTokens(handle, 60)?.exceeded).toBe(false);
    expect(store.recordTokens(handle, 40)?.exceeded).toBe(true);
    expect(store.get(handle)?.tokensUsed).toBe(100);
  });

  it("ignores token reports for released budgets", () => {
    const store = new BudgetStore();
    const handle = store.create({ maxChildrenTotal: 2, tokenBudget: 100 }, { owns: true });
    store.release(handle);

    expect(store.recordTokens(handle, 10)).toBeUndefined();
  });

  it("reports ownership and only releases owned budgets", () => {
    const store = new BudgetStore();
    const inherited = store.create({ maxChildrenTotal: 1, tokenBudget: 10 }, { owns: false });

    expect(store.get(inherited)?.owns).toBe(false);
    expect(store.release(inherited)).toBe(false);
    expect(store.get(inherited)).toBeDefined();
  });
});
