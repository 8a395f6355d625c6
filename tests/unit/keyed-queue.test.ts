import { KeyedQueue } from "../../src/utils/keyed-queue";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("KeyedQueue", () => {
  it("runs tasks for one key in submission order", async () => {
    const queue = new KeyedQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run("g1", async () => {
      await gate.promise;
      order.push("first");
    });
    const second = queue.run("g1", async () => {
      order.push("second");
    });

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(["first", "second"]);
  });

  it("does not hold other keys behind a slow task", async () => {
    const queue = new KeyedQueue();
    const order: string[] = [];
    const gate = deferred();

    const slow = queue.run("g1", async () => {
      await gate.promise;
      order.push("g1");
    });
    await queue.run("g2", async () => {
      order.push("g2");
    });

    gate.resolve();
    await slow;

    expect(order).toEqual(["g2", "g1"]);
  });

  it("keeps going after a task fails and returns each task's result", async () => {
    const queue = new KeyedQueue();

    const failing = queue.run("g1", async () => {
      throw new Error("boom");
    });
    const next = queue.run("g1", async () => 42);

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe(42);
  });

  it("forgets keys once their queue drains", async () => {
    const queue = new KeyedQueue();

    await queue.run("g1", async () => undefined);
    await new Promise(resolve => setImmediate(resolve));

    expect(queue.activeKeys).toBe(0);
  });
});
