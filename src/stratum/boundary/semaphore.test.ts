import { describe, expect, it } from "vitest";
import { Semaphore } from "./semaphore.js";

describe("Semaphore", () => {
  it("bounds how many tasks run at once", async () => {
    const semaphore = new Semaphore(2);
    let running = 0;
    let peak = 0;
    const task = async (): Promise<void> => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    };

    await Promise.all([1, 2, 3, 4, 5].map(() => semaphore.run(task)));

    expect(peak).toBe(2);
    expect(semaphore.available).toBe(2);
  });

  it("queues acquirers in order and counts a release once", async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];

    const release = await semaphore.acquire();
    const waiting = semaphore.acquire().then((next) => {
      order.push("second");
      return next;
    });
    expect(semaphore.waiting).toBe(1);

    release();
    release();
    const releaseSecond = await waiting;

    expect(order).toEqual(["second"]);
    expect(semaphore.available).toBe(0);
    releaseSecond();
    expect(semaphore.available).toBe(1);
  });

  it("releases the permit when a task throws", async () => {
    const semaphore = new Semaphore(1);

    await expect(
      semaphore.run(async () => {
        throw new Error("task failed");
      }),
    ).rejects.toThrow("task failed");
    expect(semaphore.available).toBe(1);
  });

  it("needs at least one permit", () => {
    expect(() => new Semaphore(0)).toThrow("Semaphore needs at least one permit, got 0");
  });
});
