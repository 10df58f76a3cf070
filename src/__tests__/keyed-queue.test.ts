import { describe, expect, it } from "vitest";
import { KeyedQueue } from "../keyed-queue";

describe("KeyedQueue", () => {
  it("runs same-key tasks in submission order", async () => {
    const q = new KeyedQueue();
    const order: number[] = [];
    const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));
    await Promise.all([
      q.run("a", async () => {
        await delay(20);
        order.push(1);
      }),
      q.run("a", async () => {
        order.push(2);
      }),
      q.run("a", async () => {
        await delay(5);
        order.push(3);
      }),
    ]);
    expect(order).toEqual([1, 2, 3]);
  });

  it("keeps going after a rejected task and releases idle keys", async () => {
    const q = new KeyedQueue();
    const failed = q.run("a", async () => {
      throw new Error("boom");
    });
    const next = q.run("a", async () => "ok");
    expect(q.activeKeys()).toBe(1);
    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
    expect(q.activeKeys()).toBe(0);
  });
});
