import { describe, expect, it } from "vitest";
import { Arena } from "./arena.js";

describe("Arena", () => {
  it("hands out copies so callers cannot mutate stored values", () => {
    const arena = new Arena<{ items: string[] }>("test");
    const handle = arena.create({ items: ["a"] }, true);

    const copy = arena.get(handle);
    copy?.items.push("b");

    expect(arena.get(handle)).toEqual({ items: ["a"] });
  });

  it("prefixes handles with the arena kind", () => {
    const arena = new Arena<number>("budget");

    expect(arena.create(1, true)).toMatch(/^budget_[0-9a-f]{12}$/);
  });

  it("throws on update of an unknown handle", () => {
    const arena = new Arena<number>("budget");

    expect(() => arena.update("budget_missing", (n) => n + 1)).toThrow(
      "Unknown budget handle: budget_missing",
    );
  });

  it("release only removes owned entries", () => {
    const arena = new Arena<number>("n");
    const owned = arena.create(1, true);
    const borrowed = arena.create(2, false);

    expect(arena.release(owned)).toBe(true);
    expect(arena.release(borrowed)).toBe(false);
    expect(arena.has(owned)).toBe(false);
    expect(arena.has(borrowed)).toBe(true);
  });
});
