import { describe, expect, it } from "vitest";

import { KeyedQueue, Mutex } from "./lock.js";

const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

describe("Mutex", () => {
  it("runs operations one at a time in call order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const gate = deferred();

    const first = mutex.run(async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
      return 1;
    });
    const second = mutex.run(async () => {
      events.push("second");
      return 2;
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(events).toEqual(["first:start"]);
    gate.resolve();

    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(["first:start", "first:end", "second"]);
  });

  it("releases the lock when an operation throws", async () => {
    const mutex = new Mutex();
    await expect(mutex.run(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    await expect(mutex.run(async () => "after")).resolves.toBe("after");
  });
});

describe("KeyedQueue", () => {
  it("serializes a key while other keys proceed", async () => {
    const queue = new KeyedQueue();
    const events: string[] = [];
    const gate = deferred();

    const a1 = queue.run("a", async () => {
      await gate.promise;
      events.push("a1");
    });
    const a2 = queue.run("a", async () => {
      events.push("a2");
    });
    const b1 = queue.run("b", async () => {
      events.push("b1");
    });

    await b1;
    expect(events).toEqual(["b1"]);
    gate.resolve();
    await Promise.all([a1, a2]);
    expect(events).toEqual(["b1", "a1", "a2"]);
  });

  it("forgets a key once its chain drains", async () => {
    const queue = new KeyedQueue();
    await queue.run("a", async () => undefined);
    expect(queue.pending()).toBe(0);
  });
});
